export const MPH_PER_METER_PER_SECOND = 2.237;
export const MAX_DAILY_FORECAST_DAYS = 7;

export type UnitSystem = 'imperial' | 'metric';
export type WeatherProviderId = 'openweathermap' | 'nws';

export interface Coordinates {
  readonly latitude: number;
  readonly longitude: number;
  readonly resolvedName: string;
}

export interface UnifiedCurrentConditions {
  temperature: number;
  feelsLike: number;
  /** Relative humidity, integer 0-100. */
  humidity: number;
  windSpeed: number;
  conditionText: string;
}

export interface UnifiedDailyForecast {
  /** Calendar date key, YYYY-MM-DD. */
  date: string;
  tempMin: number;
  tempMax: number;
  conditionText: string;
}

export interface WeatherSnapshot {
  provider: WeatherProviderId;
  units: UnitSystem;
  /** Date key the provider treated as "today" when ordering `daily`. */
  localDate: string;
  current: UnifiedCurrentConditions;
  daily: UnifiedDailyForecast[];
}

export const createCoordinates = (latitude: number, longitude: number, resolvedName: string): Coordinates =>
  Object.freeze({ latitude, longitude, resolvedName });

export const celsiusToF = (valueC: number): number => (valueC * 9) / 5 + 32;

export const fahrenheitToC = (valueF: number): number => ((valueF - 32) * 5) / 9;

export const metersPerSecondToMph = (valueMs: number): number => valueMs * MPH_PER_METER_PER_SECOND;

/** Normalizes a temperature in the given source unit into the requested system. */
export const convertTemperature = (value: number, sourceUnit: 'C' | 'F', units: UnitSystem): number => {
  if (units === 'imperial') {
    return sourceUnit === 'C' ? celsiusToF(value) : value;
  }
  return sourceUnit === 'F' ? fahrenheitToC(value) : value;
};

export const temperatureUnitLabel = (units: UnitSystem): string => (units === 'metric' ? '°C' : '°F');
export const windUnitLabel = (units: UnitSystem): string => (units === 'metric' ? 'm/s' : 'mph');

export const clampHumidity = (value: number): number => Math.min(100, Math.max(0, Math.trunc(value)));

export const capDailyForecast = (daily: UnifiedDailyForecast[]): UnifiedDailyForecast[] => daily.slice(0, MAX_DAILY_FORECAST_DAYS);

/** One acquisition strategy: resolves a ZIP code and fetches a normalized snapshot for it. */
export interface WeatherProvider {
  readonly id: WeatherProviderId;
  resolveCoordinates(zip: string): Promise<Coordinates>;
  fetchWeather(coordinates: Coordinates, units: UnitSystem): Promise<WeatherSnapshot>;
}
