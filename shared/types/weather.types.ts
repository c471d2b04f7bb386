import type { Coordinate } from './location.types';

export interface WeatherForecast {
  readonly id: number;
  readonly weatherId: number;
  readonly date: Date;
  readonly sunrise: Date;
  readonly sunset: Date;
  readonly temperature: number;
  readonly minTemperature: number;
  readonly maxTemperature: number;
  readonly description: string;
  readonly icon: string;
  readonly windSpeed: number;
  readonly windDirection: number;
  readonly windGust: number | null;
  readonly humidity: number;
  readonly pressure: number;
  readonly clouds: number;
  readonly uvIndex: number;
  readonly precipitation: number | null;
  readonly moonRise: Date | null;
  readonly moonSet: Date | null;
  readonly moonPhase: number;
}

export interface WeatherForecastInput {
  id?: number;
  weatherId?: number;
  date: Date;
  sunrise: Date;
  sunset: Date;
  temperature: number;
  minTemperature: number;
  maxTemperature: number;
  description?: string;
  icon?: string;
  windSpeed: number;
  windDirection: number;
  windGust?: number | null;
  humidity: number;
  pressure: number;
  clouds: number;
  uvIndex: number;
  precipitation?: number | null;
  moonRise?: Date | null;
  moonSet?: Date | null;
  moonPhase: number;
}

export interface Weather {
  readonly id: number;
  readonly locationId: number;
  readonly coordinate: Coordinate;
  readonly timezone: string;
  readonly timezoneOffset: number;
  readonly lastUpdate: Date;
  readonly forecasts: readonly WeatherForecast[];
}

export interface WeatherInput {
  id?: number;
  locationId: number;
  latitude: number;
  longitude: number;
  timezone: string;
  timezoneOffset: number;
  lastUpdate?: Date;
  forecasts?: readonly WeatherForecastInput[];
}
