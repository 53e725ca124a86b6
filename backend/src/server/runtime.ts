import dotenv from 'dotenv';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

export const PORT = process.env.PORT || 3001;
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const DEBUG_WEATHER = process.env.DEBUG_WEATHER === 'true';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 9000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);

// Empty string selects the NWS fallback strategy.
export const OWM_API_KEY = (process.env.OWM_API_KEY || '').trim();
export const OPENAI_API_KEY = (process.env.OPENAI_API_KEY || '').trim();
export const OPENAI_MODEL = (process.env.OPENAI_MODEL || '').trim() || 'gpt-3.5-turbo';
export const NWS_USER_AGENT =
  (process.env.NWS_USER_AGENT || '').trim() || 'ZipWeatherPipeline/1.0 (+https://github.com/zip-weather/zip-weather)';
