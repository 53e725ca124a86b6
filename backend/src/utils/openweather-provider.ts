import { geocodeZipWithOpenWeather, OPENWEATHER_GEO_ENDPOINT } from './coordinate-resolver';
import {
  firstWeatherDescription,
  optionalString,
  requireArray,
  requireNumber,
  requireRecord,
} from './decode';
import { JsonClient } from './http-client';
import { dateKeyInTimeZone } from './time';
import {
  Coordinates,
  UnifiedCurrentConditions,
  UnifiedDailyForecast,
  UnitSystem,
  WeatherProvider,
  WeatherSnapshot,
  capDailyForecast,
  clampHumidity,
} from './weather';

export const OPENWEATHER_ONECALL_ENDPOINT = 'https://api.openweathermap.org/data/3.0/onecall';

const LABEL = 'weather';

export const buildOneCallUrl = (
  { latitude, longitude }: Coordinates,
  units: UnitSystem,
  apiKey: string,
  endpoint: string = OPENWEATHER_ONECALL_ENDPOINT,
): string => {
  const params = new URLSearchParams({
    lat: String(latitude),
    lon: String(longitude),
    exclude: 'minutely,hourly,alerts',
    units,
    appid: apiKey,
  });
  return `${endpoint}?${params.toString()}`;
};

const mapCurrent = (raw: unknown): UnifiedCurrentConditions => {
  const current = requireRecord(raw, LABEL, 'current');
  return {
    temperature: requireNumber(current.temp, LABEL, 'current.temp'),
    feelsLike: requireNumber(current.feels_like, LABEL, 'current.feels_like'),
    humidity: clampHumidity(requireNumber(current.humidity, LABEL, 'current.humidity')),
    windSpeed: requireNumber(current.wind_speed, LABEL, 'current.wind_speed'),
    conditionText: firstWeatherDescription(current.weather),
  };
};

const mapDaily = (raw: unknown, timeZone: string | null): UnifiedDailyForecast[] => {
  const seen = new Set<string>();
  const days: UnifiedDailyForecast[] = [];

  requireArray(raw, LABEL, 'daily').forEach((entry, index) => {
    const day = requireRecord(entry, LABEL, `daily[${index}]`);
    const temp = requireRecord(day.temp, LABEL, `daily[${index}].temp`);
    const dt = requireNumber(day.dt, LABEL, `daily[${index}].dt`);
    const date = dateKeyInTimeZone(new Date(dt * 1000), timeZone);
    if (!date || seen.has(date)) {
      return;
    }
    seen.add(date);
    const tempMin = requireNumber(temp.min, LABEL, `daily[${index}].temp.min`);
    const tempMax = requireNumber(temp.max, LABEL, `daily[${index}].temp.max`);
    days.push({
      date,
      tempMin: Math.min(tempMin, tempMax),
      tempMax: Math.max(tempMin, tempMax),
      conditionText: firstWeatherDescription(day.weather),
    });
  });

  return days.sort((a, b) => a.date.localeCompare(b.date));
};

/** Maps a One Call body onto the unified snapshot. `now` picks the local date in the response time zone. */
export const mapOneCallResponse = (payload: unknown, units: UnitSystem, now: Date = new Date()): WeatherSnapshot => {
  const body = requireRecord(payload, LABEL, 'body');
  const timeZone = optionalString(body.timezone) || null;
  const localDate = dateKeyInTimeZone(now, timeZone) || now.toISOString().slice(0, 10);
  const daily = mapDaily(body.daily, timeZone);
  const todayIndex = daily.findIndex((day) => day.date === localDate);
  const ordered = todayIndex > 0 ? [daily[todayIndex], ...daily.filter((_, index) => index !== todayIndex)] : daily;

  return {
    provider: 'openweathermap',
    units,
    localDate,
    current: mapCurrent(body.current),
    daily: capDailyForecast(ordered),
  };
};

interface CreateOpenWeatherProviderOptions {
  apiKey: string;
  client: JsonClient;
  geoEndpoint?: string;
  oneCallEndpoint?: string;
  now?: () => Date;
}

export const createOpenWeatherProvider = ({
  apiKey,
  client,
  geoEndpoint = OPENWEATHER_GEO_ENDPOINT,
  oneCallEndpoint = OPENWEATHER_ONECALL_ENDPOINT,
  now = () => new Date(),
}: CreateOpenWeatherProviderOptions): WeatherProvider => ({
  id: 'openweathermap',
  resolveCoordinates: (zip: string) => geocodeZipWithOpenWeather(zip, { apiKey, client, endpoint: geoEndpoint }),
  async fetchWeather(coordinates: Coordinates, units: UnitSystem): Promise<WeatherSnapshot> {
    const payload = await client.getJson(buildOneCallUrl(coordinates, units, apiKey, oneCallEndpoint), 'weather API');
    return mapOneCallResponse(payload, units, now());
  },
});
