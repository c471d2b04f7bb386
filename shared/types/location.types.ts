export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

export interface Address {
  readonly city: string;
  readonly state: string;
}

export interface Location {
  readonly id: number;
  readonly title: string;
  readonly description: string;
  readonly coordinate: Coordinate;
  readonly address: Address;
  readonly photoPath: string | null;
  readonly isDeleted: boolean;
  readonly timestamp: Date;
}

export interface LocationInput {
  id?: number;
  title: string;
  description?: string;
  latitude: number;
  longitude: number;
  city?: string;
  state?: string;
  photoPath?: string | null;
  isDeleted?: boolean;
  timestamp?: Date;
}
