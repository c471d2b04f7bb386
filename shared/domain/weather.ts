import type { Weather, WeatherForecast, WeatherForecastInput, WeatherInput } from '../types';
import { WeatherForecastSchema, WeatherSchema, validateDomain } from '../schemas/domainSchemas';

export function createWeatherForecast(input: WeatherForecastInput): WeatherForecast {
  return Object.freeze(
    validateDomain(WeatherForecastSchema, 'WeatherForecast', {
      id: input.id ?? 0,
      weatherId: input.weatherId ?? 0,
      date: input.date,
      sunrise: input.sunrise,
      sunset: input.sunset,
      temperature: input.temperature,
      minTemperature: input.minTemperature,
      maxTemperature: input.maxTemperature,
      description: input.description ?? '',
      icon: input.icon ?? '',
      windSpeed: input.windSpeed,
      windDirection: input.windDirection,
      windGust: input.windGust ?? null,
      humidity: input.humidity,
      pressure: input.pressure,
      clouds: input.clouds,
      uvIndex: input.uvIndex,
      precipitation: input.precipitation ?? null,
      moonRise: input.moonRise ?? null,
      moonSet: input.moonSet ?? null,
      moonPhase: input.moonPhase,
    })
  );
}

export function createWeather(input: WeatherInput): Weather {
  const parsed = validateDomain(WeatherSchema, 'Weather', {
    id: input.id ?? 0,
    locationId: input.locationId,
    latitude: input.latitude,
    longitude: input.longitude,
    timezone: input.timezone,
    timezoneOffset: input.timezoneOffset,
    lastUpdate: input.lastUpdate ?? new Date(),
  });
  const forecasts = (input.forecasts ?? [])
    .map(forecast => createWeatherForecast({ ...forecast, weatherId: parsed.id }))
    .sort((a, b) => a.date.getTime() - b.date.getTime());

  return Object.freeze({
    id: parsed.id,
    locationId: parsed.locationId,
    coordinate: Object.freeze({ latitude: parsed.latitude, longitude: parsed.longitude }),
    timezone: parsed.timezone,
    timezoneOffset: parsed.timezoneOffset,
    lastUpdate: parsed.lastUpdate,
    forecasts: Object.freeze(forecasts),
  });
}

function toInput(weather: Weather): WeatherInput {
  return {
    id: weather.id,
    locationId: weather.locationId,
    latitude: weather.coordinate.latitude,
    longitude: weather.coordinate.longitude,
    timezone: weather.timezone,
    timezoneOffset: weather.timezoneOffset,
    lastUpdate: weather.lastUpdate,
    forecasts: weather.forecasts,
  };
}

export function withWeatherId(weather: Weather, id: number): Weather {
  return createWeather({ ...toInput(weather), id });
}

/**
 * Replaces the forecast list and stamps the update time.
 */
export function replaceForecasts(
  weather: Weather,
  forecasts: readonly WeatherForecastInput[],
  now: Date = new Date()
): Weather {
  return createWeather({ ...toInput(weather), forecasts, lastUpdate: now });
}

export function forecastForDate(weather: Weather, date: Date): WeatherForecast | null {
  const day = date.toISOString().slice(0, 10);
  return weather.forecasts.find(forecast => forecast.date.toISOString().slice(0, 10) === day) ?? null;
}

export function isWeatherStale(weather: Weather, maxAgeMs: number, now: Date = new Date()): boolean {
  return now.getTime() - weather.lastUpdate.getTime() > maxAgeMs;
}
