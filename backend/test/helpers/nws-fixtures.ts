import { FakeRoute } from './fake-fetch';

export const POINTS_URL_10001 = 'https://api.weather.gov/points/40.7501,-73.9996';
export const FORECAST_URL = 'https://api.weather.gov/gridpoints/OKX/33,37/forecast';
export const STATIONS_URL = 'https://api.weather.gov/gridpoints/OKX/33,37/stations';
export const OBSERVATION_URL = 'https://api.weather.gov/stations/KNYC/observations/latest';

export const pointsBody = {
  properties: {
    forecast: FORECAST_URL,
    forecastHourly: 'https://api.weather.gov/gridpoints/OKX/33,37/forecast/hourly',
    observationStations: STATIONS_URL,
    relativeLocation: { properties: { city: 'Hoboken', state: 'NJ' } },
  },
};

export const forecastPeriods = [
  { startTime: '2026-10-19T14:00:00-04:00', endTime: '2026-10-19T18:00:00-04:00', temperature: 68, temperatureUnit: 'F', isDaytime: true, shortForecast: 'Sunny' },
  { startTime: '2026-10-19T18:00:00-04:00', endTime: '2026-10-20T06:00:00-04:00', temperature: 52, temperatureUnit: 'F', isDaytime: false, shortForecast: 'Clear' },
  { startTime: '2026-10-20T06:00:00-04:00', endTime: '2026-10-20T18:00:00-04:00', temperature: 70, temperatureUnit: 'F', isDaytime: true, shortForecast: 'Partly Sunny' },
  { startTime: '2026-10-20T18:00:00-04:00', endTime: '2026-10-21T06:00:00-04:00', temperature: 55, temperatureUnit: 'F', isDaytime: false, shortForecast: 'Mostly Cloudy' },
  { startTime: '2026-10-21T06:00:00-04:00', endTime: '2026-10-21T18:00:00-04:00', temperature: 64, temperatureUnit: 'F', isDaytime: true, shortForecast: 'Rain' },
  { startTime: 'not-a-time', endTime: 'not-a-time', temperature: 99, temperatureUnit: 'F', isDaytime: true, shortForecast: 'Bogus' },
];

export const forecastBody = { properties: { periods: forecastPeriods } };

export const stationsBody = {
  features: [
    { properties: { stationIdentifier: 'KNYC', name: 'New York City, Central Park' } },
    { properties: { stationIdentifier: 'KLGA', name: 'LaGuardia Airport' } },
  ],
};

export const observationBody = {
  properties: {
    textDescription: 'Mostly Cloudy',
    temperature: { unitCode: 'wmoUnit:degC', value: 20 },
    windSpeed: { unitCode: 'wmoUnit:m_s-1', value: 10 },
    relativeHumidity: { unitCode: 'wmoUnit:percent', value: 65.7 },
    heatIndex: { unitCode: 'wmoUnit:degC', value: null },
  },
};

export const buildNwsRoutes = (overrides: Record<string, FakeRoute> = {}): Record<string, FakeRoute> => ({
  [POINTS_URL_10001]: { body: pointsBody },
  [FORECAST_URL]: { body: forecastBody },
  [STATIONS_URL]: { body: stationsBody },
  [OBSERVATION_URL]: { body: observationBody },
  ...overrides,
});
