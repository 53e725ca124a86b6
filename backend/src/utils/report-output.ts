import fs from 'node:fs';
import * as Papa from 'papaparse';
import { formatDayLabel } from './time';
import { WeatherReport } from './weather-service';
import { temperatureUnitLabel, windUnitLabel } from './weather';

export type OutputFormat = 'text' | 'json' | 'csv' | 'kafka';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'csv', 'kafka'];

export const isOutputFormat = (value: string): value is OutputFormat => OUTPUT_FORMATS.some((format) => format === value);

/** JSON and CSV are written once per run; text and kafka once per ZIP code. */
export const isBatchFormat = (format: OutputFormat): boolean => format === 'json' || format === 'csv';

export const formatTextReport = (report: WeatherReport): string => {
  const unit = temperatureUnitLabel(report.units);
  const windUnit = windUnitLabel(report.units);
  const { current } = report;
  const lines = [
    '',
    `📍 Weather for ${report.locationName} (ZIP: ${report.locationId})`,
    '-----------------------------------',
    `Now: ${current.temperature.toFixed(1)}${unit}, feels like ${current.feelsLike.toFixed(1)}${unit}, ${current.conditionText}`,
    `Humidity: ${current.humidity}%, Wind: ${current.windSpeed.toFixed(1)} ${windUnit}`,
    '',
    '📆 Forecast:',
    ...report.forecast.map(
      (day) => `${formatDayLabel(day.date)}: Min ${day.tempMin.toFixed(1)}${unit}, Max ${day.tempMax.toFixed(1)}${unit}, ${day.conditionText}`,
    ),
  ];
  if (report.summary) {
    lines.push('', '📝 AI-Generated Forecast:', report.summary);
  }
  return `${lines.join('\n')}\n`;
};

export interface JsonForecastDay {
  date: string;
  temp_min: number;
  temp_max: number;
  condition: string;
}

export interface JsonWeatherRecord {
  location_id: string;
  location_name: string;
  timestamp: string;
  provider: string;
  temperature: number;
  feels_like: number;
  temp_min: number | null;
  temp_max: number | null;
  humidity: number;
  wind_speed: number;
  condition: string;
  forecast_days: number;
  forecast: JsonForecastDay[];
  summary?: string;
  is_metric: boolean;
}

export const toJsonRecord = (report: WeatherReport): JsonWeatherRecord => ({
  location_id: report.locationId,
  location_name: report.locationName,
  timestamp: report.timestamp,
  provider: report.provider,
  temperature: report.current.temperature,
  feels_like: report.current.feelsLike,
  temp_min: report.today ? report.today.tempMin : null,
  temp_max: report.today ? report.today.tempMax : null,
  humidity: report.current.humidity,
  wind_speed: report.current.windSpeed,
  condition: report.current.conditionText,
  forecast_days: report.forecast.length,
  forecast: report.forecast.map((day) => ({
    date: day.date,
    temp_min: day.tempMin,
    temp_max: day.tempMax,
    condition: day.conditionText,
  })),
  ...(report.summary ? { summary: report.summary } : {}),
  is_metric: report.units === 'metric',
});

/** One report -> object, several -> array. */
export const formatJsonReports = (reports: readonly WeatherReport[]): string => {
  const records = reports.map(toJsonRecord);
  return `${JSON.stringify(records.length === 1 ? records[0] : records, null, 2)}\n`;
};

export const CSV_HEADER = [
  'location_id',
  'location_name',
  'timestamp',
  'temperature',
  'feels_like',
  'humidity',
  'wind_speed',
  'condition',
  'is_metric',
];

export const formatCsvReports = (reports: readonly WeatherReport[]): string => {
  const rows = reports.map((report) => [
    report.locationId,
    report.locationName,
    report.timestamp,
    report.current.temperature.toFixed(1),
    report.current.feelsLike.toFixed(1),
    String(report.current.humidity),
    report.current.windSpeed.toFixed(1),
    report.current.conditionText,
    String(report.units === 'metric'),
  ]);
  return `${Papa.unparse({ fields: CSV_HEADER, data: rows }, { newline: '\n' })}\n`;
};

export type OutputSink = (content: string) => void;

/**
 * Writes to `outputPath` when set, stdout otherwise. The first write of a sink
 * replaces the file and later writes append, so create one sink per batch.
 */
export const createOutputSink = (outputPath: string | null | undefined): OutputSink => {
  let started = false;
  return (content: string) => {
    if (!outputPath) {
      process.stdout.write(content);
      return;
    }
    if (started) {
      fs.appendFileSync(outputPath, content, 'utf8');
      return;
    }
    fs.writeFileSync(outputPath, content, 'utf8');
    started = true;
  };
};
