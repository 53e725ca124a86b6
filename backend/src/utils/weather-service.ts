import { ZipTable, ZipTableEntry, assertValidZip } from './coordinate-resolver';
import { createJsonClient, buildClientHeaders, DEFAULT_ALLOWED_HOSTS, FetchLike } from './http-client';
import { createNwsProvider, DebugLog } from './nws-provider';
import { createOpenWeatherProvider } from './openweather-provider';
import {
  UnifiedCurrentConditions,
  UnifiedDailyForecast,
  UnitSystem,
  WeatherProvider,
  WeatherProviderId,
  WeatherSnapshot,
} from './weather';

interface CreateWeatherProviderOptions {
  /** OpenWeatherMap key; blank selects the NWS strategy. */
  apiKey?: string | null;
  fetchImpl: FetchLike;
  userAgent: string;
  allowedHosts?: readonly string[];
  zipTable?: ZipTable;
  defaultLocation?: ZipTableEntry;
  debugLog?: DebugLog;
}

export const createWeatherProvider = ({
  apiKey,
  fetchImpl,
  userAgent,
  allowedHosts = DEFAULT_ALLOWED_HOSTS,
  zipTable,
  defaultLocation,
  debugLog,
}: CreateWeatherProviderOptions): WeatherProvider => {
  const client = createJsonClient({ fetchImpl, headers: buildClientHeaders(userAgent), allowedHosts });
  const trimmedKey = (apiKey || '').trim();
  if (trimmedKey) {
    return createOpenWeatherProvider({ apiKey: trimmedKey, client });
  }
  return createNwsProvider({ client, zipTable, defaultLocation, debugLog });
};

/** Per-ZIP result handed to formatters, publishers and the HTTP route. */
export interface WeatherReport {
  locationId: string;
  locationName: string;
  /** ISO-8601 time the report was assembled. */
  timestamp: string;
  provider: WeatherProviderId;
  units: UnitSystem;
  current: UnifiedCurrentConditions;
  /** Today's entry, when the provider returned one. */
  today: UnifiedDailyForecast | null;
  /** Days after today, ascending. */
  forecast: UnifiedDailyForecast[];
  summary?: string;
}

export const buildWeatherReport = (zip: string, locationName: string, snapshot: WeatherSnapshot, now: Date = new Date()): WeatherReport => {
  const [first, ...rest] = snapshot.daily;
  const today = first && first.date === snapshot.localDate ? first : null;
  return {
    locationId: zip,
    locationName,
    timestamp: now.toISOString(),
    provider: snapshot.provider,
    units: snapshot.units,
    current: snapshot.current,
    today,
    forecast: today ? rest : snapshot.daily,
  };
};

interface GetLocationWeatherOptions {
  provider: WeatherProvider;
  units: UnitSystem;
  now?: () => Date;
}

export interface LocationWeather {
  snapshot: WeatherSnapshot;
  report: WeatherReport;
}

/** Coordinates -> snapshot -> report for one ZIP code. */
export const getLocationWeather = async (zip: string, { provider, units, now = () => new Date() }: GetLocationWeatherOptions): Promise<LocationWeather> => {
  assertValidZip(zip);
  const coordinates = await provider.resolveCoordinates(zip);
  const snapshot = await provider.fetchWeather(coordinates, units);
  return { snapshot, report: buildWeatherReport(zip, coordinates.resolvedName, snapshot, now()) };
};
