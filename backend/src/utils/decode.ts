import { UpstreamError } from './errors';

export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const decodeFailure = (label: string, detail: string): UpstreamError =>
  new UpstreamError(`error decoding ${label} response: ${detail}`);

export const requireRecord = (value: unknown, label: string, path: string): JsonRecord => {
  if (!isRecord(value)) {
    throw decodeFailure(label, `${path} is not an object`);
  }
  return value;
};

export const requireArray = (value: unknown, label: string, path: string): unknown[] => {
  if (!Array.isArray(value)) {
    throw decodeFailure(label, `${path} is not an array`);
  }
  return value;
};

export const requireNumber = (value: unknown, label: string, path: string): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw decodeFailure(label, `${path} is not a number`);
  }
  return value;
};

export const requireString = (value: unknown, label: string, path: string): string => {
  if (typeof value !== 'string') {
    throw decodeFailure(label, `${path} is not a string`);
  }
  return value;
};

export const optionalNumber = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

export const optionalString = (value: unknown, fallback: string = ''): string =>
  typeof value === 'string' ? value : fallback;

/** First `weather[].description` of an OpenWeatherMap block, or ''. */
export const firstWeatherDescription = (value: unknown): string => {
  if (!Array.isArray(value) || value.length === 0) {
    return '';
  }
  const [first] = value;
  return isRecord(first) ? optionalString(first.description) : '';
};
