import { parseArgs } from 'node:util';
import { isValidZip } from '../utils/coordinate-resolver';
import { ConfigError, describeError } from '../utils/errors';
import { PipelineConfig } from '../utils/pipeline';
import { isOutputFormat, OUTPUT_FORMATS } from '../utils/report-output';

export const USAGE = `Usage: zip-weather [options] [zip]

Options:
  --api-key <key>        OpenWeatherMap API key (default: $OWM_API_KEY; empty uses NWS)
  --zip-codes <list>     Comma-separated list of ZIP codes
  --format <format>      Output format: ${OUTPUT_FORMATS.join(', ')} (default: text)
  --output <path>        Output file path (stdout if empty)
  --metric               Use metric units (Celsius, m/s)
  --kafka-broker <addr>  Kafka broker address (default: localhost:9092)
  --kafka-topic <topic>  Kafka topic for output (default: weather-data)
  --interval <seconds>   Polling interval in seconds (0 for one-time run)
  --verbose              Enable verbose logging
  --help                 Show this message
`;

// setInterval delays are capped at 2^31 - 1 ms; longer ones fire after 1 ms.
export const MAX_INTERVAL_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

export interface RawCliConfig {
  apiKey: string;
  zipCodes: string[];
  format: string;
  outputPath: string;
  isMetric: boolean;
  kafkaBroker: string;
  kafkaTopic: string;
  interval: string;
  verbose: boolean;
  help: boolean;
}

const readArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      'api-key': { type: 'string' },
      'zip-codes': { type: 'string' },
      format: { type: 'string', default: 'text' },
      output: { type: 'string', default: '' },
      metric: { type: 'boolean', default: false },
      'kafka-broker': { type: 'string', default: 'localhost:9092' },
      'kafka-topic': { type: 'string', default: 'weather-data' },
      interval: { type: 'string', default: '0' },
      verbose: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
  });

export const parseCliArgs = (argv: string[], env: NodeJS.ProcessEnv = process.env): RawCliConfig => {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw new ConfigError(describeError(error), { cause: error });
  }

  const { values, positionals } = parsed;
  const zipCodesRaw = values['zip-codes'] ?? '';
  const zipCodes = zipCodesRaw
    ? zipCodesRaw.split(',').map((zip) => zip.trim())
    : positionals.slice(0, 1);

  return {
    apiKey: values['api-key'] ?? env.OWM_API_KEY ?? '',
    zipCodes,
    format: values.format ?? 'text',
    outputPath: values.output ?? '',
    isMetric: values.metric ?? false,
    kafkaBroker: values['kafka-broker'] ?? '',
    kafkaTopic: values['kafka-topic'] ?? '',
    interval: values.interval ?? '0',
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
};

/** Checks everything that must hold before the first network call. */
export const validateConfig = (raw: RawCliConfig): PipelineConfig => {
  if (raw.zipCodes.length === 0) {
    throw new ConfigError('at least one ZIP code is required');
  }
  const invalidZip = raw.zipCodes.find((zip) => !isValidZip(zip));
  if (invalidZip !== undefined) {
    throw new ConfigError(`invalid ZIP code format: ${invalidZip}`);
  }

  const format = raw.format.trim().toLowerCase();
  if (!isOutputFormat(format)) {
    throw new ConfigError(`invalid output format: ${raw.format}`);
  }
  if (format === 'kafka' && !raw.kafkaBroker.trim()) {
    throw new ConfigError('kafka broker is required when using kafka output format');
  }

  const intervalSeconds = Number(raw.interval);
  if (!/^\d+$/.test(raw.interval.trim()) || !Number.isSafeInteger(intervalSeconds)) {
    throw new ConfigError(`invalid interval: ${raw.interval}`);
  }
  if (intervalSeconds > MAX_INTERVAL_SECONDS) {
    throw new ConfigError(`interval must be at most ${MAX_INTERVAL_SECONDS} seconds: ${raw.interval}`);
  }

  return {
    apiKey: raw.apiKey.trim(),
    zipCodes: [...raw.zipCodes],
    outputFormat: format,
    outputPath: raw.outputPath.trim() || null,
    isMetric: raw.isMetric,
    kafkaBroker: raw.kafkaBroker.trim(),
    kafkaTopic: raw.kafkaTopic.trim(),
    intervalSeconds,
    verbose: raw.verbose,
  };
};
