import { describeError } from './errors';
import { buildForecastText } from './forecast-summary';
import { publishToKafka } from './kafka-publisher';
import {
  OutputFormat,
  OutputSink,
  formatCsvReports,
  formatJsonReports,
  formatTextReport,
  isBatchFormat,
} from './report-output';
import { getLocationWeather, WeatherReport } from './weather-service';
import { WeatherProvider } from './weather';

export interface PipelineConfig {
  apiKey: string;
  zipCodes: string[];
  outputFormat: OutputFormat;
  outputPath: string | null;
  isMetric: boolean;
  kafkaBroker: string;
  kafkaTopic: string;
  /** 0 runs the batch once. */
  intervalSeconds: number;
  verbose: boolean;
}

interface ProcessLocationsOptions {
  config: PipelineConfig;
  provider: WeatherProvider;
  sink: OutputSink;
  /** Must not reject; see summarizeForecast. */
  summarize: (forecastText: string) => Promise<string>;
  now?: () => Date;
}

const emitReport = (report: WeatherReport, config: PipelineConfig, sink: OutputSink): void => {
  switch (config.outputFormat) {
    case 'text':
      sink(formatTextReport(report));
      break;
    case 'kafka':
      publishToKafka(report, { broker: config.kafkaBroker, topic: config.kafkaTopic }, config.verbose);
      break;
    default:
      break;
  }
};

const emitBatch = (reports: WeatherReport[], config: PipelineConfig, sink: OutputSink): void => {
  if (config.outputFormat === 'json') {
    sink(formatJsonReports(reports));
  } else if (config.outputFormat === 'csv') {
    sink(formatCsvReports(reports));
  }
};

// Output failures are logged like fetch failures; they never end the batch.
const tryEmit = (target: string, emit: () => void): void => {
  try {
    emit();
  } catch (error) {
    console.error(`[pipeline] Error writing output for ${target}: ${describeError(error)}`);
  }
};

/**
 * Runs every configured ZIP code in order. A failure for one ZIP code is
 * logged and skipped; the remaining codes still run.
 */
export const processLocations = async ({ config, provider, sink, summarize, now }: ProcessLocationsOptions): Promise<WeatherReport[]> => {
  const units = config.isMetric ? 'metric' : 'imperial';
  const reports: WeatherReport[] = [];

  for (const zip of config.zipCodes) {
    if (config.verbose) {
      console.log(`[pipeline] Processing ZIP code: ${zip}`);
    }

    let report: WeatherReport;
    try {
      ({ report } = await getLocationWeather(zip, { provider, units, now }));
    } catch (error) {
      console.error(`[pipeline] Error processing ${zip}: ${describeError(error)}`);
      continue;
    }

    if (config.outputFormat === 'text') {
      if (config.verbose) {
        console.log('[pipeline] Generating AI summary');
      }
      report = { ...report, summary: await summarize(buildForecastText(report)) };
    }

    reports.push(report);
    if (!isBatchFormat(config.outputFormat)) {
      const finished = report;
      tryEmit(zip, () => emitReport(finished, config, sink));
    }
  }

  if (reports.length > 0 && isBatchFormat(config.outputFormat)) {
    tryEmit('batch', () => emitBatch(reports, config, sink));
  }

  return reports;
};
