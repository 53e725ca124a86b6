import { Express, NextFunction, Request, Response } from 'express';
import { getLocationWeather, WeatherReport } from '../utils/weather-service';
import { buildForecastText } from '../utils/forecast-summary';
import { UnitSystem, WeatherProvider } from '../utils/weather';

interface RegisterWeatherRoutesOptions {
  app: Express;
  provider: WeatherProvider;
  summarize: (forecastText: string) => Promise<string>;
}

const parseUnits = (value: unknown): UnitSystem | null => {
  if (value === undefined) {
    return 'imperial';
  }
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : '';
  if (normalized === 'imperial' || normalized === 'metric') {
    return normalized;
  }
  return null;
};

export const registerWeatherRoutes = ({ app, provider, summarize }: RegisterWeatherRoutesOptions) => {
  app.get('/api/weather', async (req: Request, res: Response, next: NextFunction) => {
    const zip = typeof req.query.zip === 'string' ? req.query.zip.trim() : '';
    const units = parseUnits(req.query.units);
    if (!units) {
      res.status(400).json({ error: 'InvalidInput', details: 'units must be "imperial" or "metric".' });
      return;
    }

    try {
      const { snapshot, report } = await getLocationWeather(zip, { provider, units });
      const withSummary: WeatherReport =
        req.query.summary === 'true' ? { ...report, summary: await summarize(buildForecastText(report)) } : report;
      res.json({ report: withSummary, snapshot });
    } catch (error) {
      next(error);
    }
  });
};
