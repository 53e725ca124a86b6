import { resolveFromZipTable, ZipTable, ZipTableEntry, DEFAULT_LOCATION, DEFAULT_ZIP_TABLE } from './coordinate-resolver';
import { aggregateForecastPeriods, ForecastPeriod } from './daily-aggregator';
import {
  decodeFailure,
  isRecord,
  optionalNumber,
  optionalString,
  requireArray,
  requireNumber,
  requireRecord,
  requireString,
} from './decode';
import { NoStationsFoundError } from './errors';
import { JsonClient } from './http-client';
import { localDateKey } from './time';
import {
  Coordinates,
  UnifiedCurrentConditions,
  UnitSystem,
  WeatherProvider,
  WeatherSnapshot,
  capDailyForecast,
  clampHumidity,
  convertTemperature,
  metersPerSecondToMph,
} from './weather';

export const NWS_API_BASE = 'https://api.weather.gov';

export interface GridPoint {
  forecastUrl: string;
  /** Returned by the points resource; the pipeline does not use hourly data. */
  forecastHourlyUrl: string | null;
  observationStationsUrl: string;
  locality: string | null;
}

export type DebugLog = (...args: unknown[]) => void;

const noopLog: DebugLog = () => undefined;

export const buildPointsUrl = ({ latitude, longitude }: Coordinates, apiBase: string = NWS_API_BASE): string =>
  `${apiBase}/points/${latitude.toFixed(4)},${longitude.toFixed(4)}`;

export const buildLatestObservationUrl = (stationId: string, apiBase: string = NWS_API_BASE): string =>
  `${apiBase}/stations/${encodeURIComponent(stationId)}/observations/latest`;

export const resolveGridPoint = async (client: JsonClient, coordinates: Coordinates, apiBase: string = NWS_API_BASE): Promise<GridPoint> => {
  const label = 'NWS points';
  const body = requireRecord(await client.getJson(buildPointsUrl(coordinates, apiBase), label), label, 'body');
  const properties = requireRecord(body.properties, label, 'properties');
  const relativeLocation = isRecord(properties.relativeLocation) ? properties.relativeLocation : null;
  const relativeProps = relativeLocation && isRecord(relativeLocation.properties) ? relativeLocation.properties : null;

  return {
    forecastUrl: requireString(properties.forecast, label, 'properties.forecast'),
    forecastHourlyUrl: optionalString(properties.forecastHourly) || null,
    observationStationsUrl: requireString(properties.observationStations, label, 'properties.observationStations'),
    locality: relativeProps ? optionalString(relativeProps.city) || null : null,
  };
};

const readTemperatureUnit = (value: unknown): 'C' | 'F' => (value === 'C' ? 'C' : 'F');

export const fetchForecastPeriods = async (client: JsonClient, forecastUrl: string, units: UnitSystem): Promise<ForecastPeriod[]> => {
  const label = 'NWS forecast';
  const body = requireRecord(await client.getJson(forecastUrl, label), label, 'body');
  const properties = requireRecord(body.properties, label, 'properties');

  return requireArray(properties.periods, label, 'properties.periods').map((entry, index) => {
    const period = requireRecord(entry, label, `periods[${index}]`);
    const temperature = requireNumber(period.temperature, label, `periods[${index}].temperature`);
    return {
      startTime: optionalString(period.startTime),
      endTime: optionalString(period.endTime),
      temperature: convertTemperature(temperature, readTemperatureUnit(period.temperatureUnit), units),
      isDaytime: period.isDaytime === true,
      shortForecast: optionalString(period.shortForecast),
    };
  });
};

export const resolveNearestStation = async (client: JsonClient, stationsUrl: string): Promise<string> => {
  const label = 'NWS stations';
  const body = requireRecord(await client.getJson(stationsUrl, label), label, 'body');
  const features = requireArray(body.features, label, 'features');
  if (features.length === 0) {
    throw new NoStationsFoundError();
  }
  const first = requireRecord(features[0], label, 'features[0]');
  const properties = requireRecord(first.properties, label, 'features[0].properties');
  return requireString(properties.stationIdentifier, label, 'features[0].properties.stationIdentifier');
};

interface QuantitativeValue {
  value: number | null;
  unitCode: string;
}

const readQuantity = (value: unknown): QuantitativeValue => {
  if (!isRecord(value)) {
    return { value: null, unitCode: '' };
  }
  return { value: optionalNumber(value.value), unitCode: optionalString(value.unitCode).toLowerCase() };
};

const temperatureUnitFromCode = (unitCode: string): 'C' | 'F' => (unitCode.endsWith('degf') ? 'F' : 'C');

const windToMetersPerSecond = ({ value, unitCode }: QuantitativeValue): number => {
  if (value === null) {
    return 0;
  }
  return unitCode.includes('km_h') ? value / 3.6 : value;
};

export const mapObservation = (payload: unknown, units: UnitSystem): UnifiedCurrentConditions => {
  const label = 'NWS observation';
  const body = requireRecord(payload, label, 'body');
  const properties = requireRecord(body.properties, label, 'properties');

  const temperature = readQuantity(properties.temperature);
  if (temperature.value === null) {
    throw decodeFailure(label, 'properties.temperature.value is missing');
  }
  const heatIndex = readQuantity(properties.heatIndex);
  const feelsLike = heatIndex.value !== null && heatIndex.value !== 0 ? heatIndex : temperature;
  const windMs = windToMetersPerSecond(readQuantity(properties.windSpeed));
  const humidity = readQuantity(properties.relativeHumidity).value ?? 0;

  return {
    temperature: convertTemperature(temperature.value, temperatureUnitFromCode(temperature.unitCode), units),
    feelsLike: convertTemperature(feelsLike.value ?? temperature.value, temperatureUnitFromCode(feelsLike.unitCode), units),
    humidity: clampHumidity(humidity),
    windSpeed: units === 'imperial' ? metersPerSecondToMph(windMs) : windMs,
    conditionText: optionalString(properties.textDescription),
  };
};

export const fetchLatestObservation = async (
  client: JsonClient,
  stationId: string,
  units: UnitSystem,
  apiBase: string = NWS_API_BASE,
): Promise<UnifiedCurrentConditions> => {
  const label = 'NWS observation';
  return mapObservation(await client.getJson(buildLatestObservationUrl(stationId, apiBase), label), units);
};

interface CreateNwsProviderOptions {
  client: JsonClient;
  zipTable?: ZipTable;
  defaultLocation?: ZipTableEntry;
  apiBase?: string;
  today?: () => string;
  debugLog?: DebugLog;
}

/**
 * Credential-free strategy: points -> forecast -> stations -> latest observation,
 * then folds the 12-hour forecast periods into daily buckets.
 */
export const createNwsProvider = ({
  client,
  zipTable = DEFAULT_ZIP_TABLE,
  defaultLocation = DEFAULT_LOCATION,
  apiBase = NWS_API_BASE,
  today = () => localDateKey(),
  debugLog = noopLog,
}: CreateNwsProviderOptions): WeatherProvider => ({
  id: 'nws',
  resolveCoordinates: async (zip: string) => resolveFromZipTable(zip, { table: zipTable, defaultLocation }),
  async fetchWeather(coordinates: Coordinates, units: UnitSystem): Promise<WeatherSnapshot> {
    const grid = await resolveGridPoint(client, coordinates, apiBase);
    debugLog('[nws] grid point', grid.locality ?? coordinates.resolvedName, grid.forecastUrl);

    const periods = await fetchForecastPeriods(client, grid.forecastUrl, units);
    debugLog('[nws] forecast periods', periods.length);

    const stationId = await resolveNearestStation(client, grid.observationStationsUrl);
    debugLog('[nws] observation station', stationId);

    const current = await fetchLatestObservation(client, stationId, units, apiBase);
    const localDate = today();

    return {
      provider: 'nws',
      units,
      localDate,
      current,
      daily: capDailyForecast(aggregateForecastPeriods(periods, { today: localDate })),
    };
  },
});
