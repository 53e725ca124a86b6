import { InvalidInputError } from './errors';
import { requireNumber, requireRecord, optionalString } from './decode';
import { JsonClient } from './http-client';
import { Coordinates, createCoordinates } from './weather';

export const OPENWEATHER_GEO_ENDPOINT = 'https://api.openweathermap.org/geo/1.0/zip';

export interface ZipTableEntry {
  readonly latitude: number;
  readonly longitude: number;
  readonly city: string;
}

export type ZipTable = Readonly<Record<string, ZipTableEntry>>;

// Rough city-center coordinates; not a geocoder.
export const DEFAULT_ZIP_TABLE: ZipTable = Object.freeze({
  '90210': { latitude: 34.0901, longitude: -118.4065, city: 'Beverly Hills' },
  '10001': { latitude: 40.7501, longitude: -73.9996, city: 'New York' },
  '60601': { latitude: 41.8841, longitude: -87.6277, city: 'Chicago' },
  '02108': { latitude: 42.3581, longitude: -71.0636, city: 'Boston' },
  '94102': { latitude: 37.7794, longitude: -122.4184, city: 'San Francisco' },
  '98101': { latitude: 47.6097, longitude: -122.3331, city: 'Seattle' },
  '33101': { latitude: 25.7743, longitude: -80.1937, city: 'Miami' },
  '75201': { latitude: 32.7795, longitude: -96.8022, city: 'Dallas' },
  '77001': { latitude: 29.7604, longitude: -95.3698, city: 'Houston' },
  '85001': { latitude: 33.4484, longitude: -112.074, city: 'Phoenix' },
});

export const DEFAULT_LOCATION: ZipTableEntry = Object.freeze({ latitude: 40.7128, longitude: -74.006, city: 'New York' });

export const isValidZip = (zip: string): boolean => /^[0-9]{5}$/.test(zip);

export const assertValidZip = (zip: string): string => {
  if (!isValidZip(zip)) {
    throw new InvalidInputError(`invalid ZIP code format: ${zip}`);
  }
  return zip;
};

interface ZipTableLookupOptions {
  table?: ZipTable;
  defaultLocation?: ZipTableEntry;
}

/** Table lookup; ZIP codes missing from the table resolve to `defaultLocation`. */
export const resolveFromZipTable = (
  zip: string,
  { table = DEFAULT_ZIP_TABLE, defaultLocation = DEFAULT_LOCATION }: ZipTableLookupOptions = {},
): Coordinates => {
  assertValidZip(zip);
  const entry = Object.prototype.hasOwnProperty.call(table, zip) ? table[zip] : defaultLocation;
  return createCoordinates(entry.latitude, entry.longitude, entry.city);
};

interface GeocodeZipOptions {
  apiKey: string;
  client: JsonClient;
  endpoint?: string;
}

export const buildGeocodeUrl = (zip: string, apiKey: string, endpoint: string = OPENWEATHER_GEO_ENDPOINT): string => {
  const params = new URLSearchParams({ zip: `${zip},US`, appid: apiKey });
  return `${endpoint}?${params.toString()}`;
};

export const geocodeZipWithOpenWeather = async (
  zip: string,
  { apiKey, client, endpoint = OPENWEATHER_GEO_ENDPOINT }: GeocodeZipOptions,
): Promise<Coordinates> => {
  assertValidZip(zip);
  const label = 'geocode';
  const payload = requireRecord(await client.getJson(buildGeocodeUrl(zip, apiKey, endpoint), 'geocoding API'), label, 'body');
  return createCoordinates(
    requireNumber(payload.lat, label, 'lat'),
    requireNumber(payload.lon, label, 'lon'),
    optionalString(payload.name, zip),
  );
};
