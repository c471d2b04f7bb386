export const DEFAULT_LOCALE = 'en-US';

export interface TipType {
  readonly id: number;
  readonly name: string;
  readonly i8n: string;
}

export interface TipTypeInput {
  id?: number;
  name: string;
  i8n?: string;
}

export interface Tip {
  readonly id: number;
  readonly tipTypeId: number;
  readonly title: string;
  readonly content: string;
  readonly fstop: string;
  readonly shutterSpeed: string;
  readonly iso: string;
  readonly i8n: string;
}

export interface TipInput {
  id?: number;
  tipTypeId: number;
  title: string;
  content?: string;
  fstop?: string;
  shutterSpeed?: string;
  iso?: string;
  i8n?: string;
}
