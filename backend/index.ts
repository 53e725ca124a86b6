import { createApp, registerErrorHandler } from './src/server/create-app';
import { startServer } from './src/server/start-server';
import {
  PORT,
  IS_PRODUCTION,
  DEBUG_WEATHER,
  REQUEST_TIMEOUT_MS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  OWM_API_KEY,
  OPENAI_API_KEY,
  OPENAI_MODEL,
  NWS_USER_AGENT,
} from './src/server/runtime';
import { createFetchWithTimeout, FetchLike } from './src/utils/http-client';
import { summarizeForecast } from './src/utils/forecast-summary';
import { createWeatherProvider } from './src/utils/weather-service';
import { registerWeatherRoutes } from './src/routes/weather';
import { registerHealthRoutes } from './src/routes/health';

const weatherLog = (...args: unknown[]) => {
  if (DEBUG_WEATHER) {
    console.log(...args);
  }
};

interface CreateWeatherAppOptions {
  apiKey?: string;
  fetchImpl?: FetchLike;
  summarize?: (forecastText: string) => Promise<string>;
}

export const createWeatherApp = ({
  apiKey = OWM_API_KEY,
  fetchImpl = createFetchWithTimeout(REQUEST_TIMEOUT_MS),
  summarize = (forecastText: string) => summarizeForecast(forecastText, { apiKey: OPENAI_API_KEY, model: OPENAI_MODEL }),
}: CreateWeatherAppOptions = {}) => {
  const app = createApp({
    isProduction: IS_PRODUCTION,
    corsAllowlist: CORS_ALLOWLIST,
    rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
  });
  const provider = createWeatherProvider({ apiKey, fetchImpl, userAgent: NWS_USER_AGENT, debugLog: weatherLog });

  registerHealthRoutes(app, provider.id);
  registerWeatherRoutes({ app, provider, summarize });
  registerErrorHandler(app);
  return app;
};

export const app = createWeatherApp();

if (process.env.NODE_ENV !== 'test' && require.main === module) {
  startServer({ app, port: PORT });
}
