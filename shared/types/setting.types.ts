export interface Setting {
  readonly id: number;
  readonly key: string;
  readonly value: string;
  readonly description: string | null;
  readonly timestamp: Date;
}

export interface SettingInput {
  id?: number;
  key: string;
  value: string;
  description?: string | null;
  timestamp?: Date;
}
