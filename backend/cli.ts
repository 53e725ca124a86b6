#!/usr/bin/env node
import { DEBUG_WEATHER, NWS_USER_AGENT, OPENAI_API_KEY, OPENAI_MODEL, REQUEST_TIMEOUT_MS } from './src/server/runtime';
import { parseCliArgs, validateConfig, USAGE } from './src/cli/config';
import { describeError, isWeatherPipelineError } from './src/utils/errors';
import { summarizeForecast } from './src/utils/forecast-summary';
import { createFetchWithTimeout } from './src/utils/http-client';
import { processLocations, PipelineConfig } from './src/utils/pipeline';
import { createOutputSink } from './src/utils/report-output';
import { startIntervalRunner } from './src/utils/scheduler';
import { createWeatherProvider } from './src/utils/weather-service';

const buildBatch = (config: PipelineConfig) => {
  const debugLog = (...args: unknown[]) => {
    if (config.verbose || DEBUG_WEATHER) {
      console.log(...args);
    }
  };
  const provider = createWeatherProvider({
    apiKey: config.apiKey,
    fetchImpl: createFetchWithTimeout(REQUEST_TIMEOUT_MS),
    userAgent: NWS_USER_AGENT,
    debugLog,
  });
  const summarize = (forecastText: string) => summarizeForecast(forecastText, { apiKey: OPENAI_API_KEY, model: OPENAI_MODEL });

  // Fresh sink per run: each run replaces the output file.
  return () => processLocations({ config, provider, sink: createOutputSink(config.outputPath), summarize });
};

const main = async (argv: string[]): Promise<void> => {
  const raw = parseCliArgs(argv);
  if (raw.help) {
    process.stdout.write(USAGE);
    return;
  }
  const config = validateConfig(raw);
  const runBatch = buildBatch(config);

  if (config.intervalSeconds > 0) {
    console.log(`[pipeline] Starting weather data pipeline. Fetching data every ${config.intervalSeconds}s`);
    const runner = startIntervalRunner(runBatch, config.intervalSeconds * 1000);
    const shutdown = (signal: string) => {
      console.log(`[pipeline] Received ${signal}. Stopping.`);
      runner.stop();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    await runner.firstRun;
    return;
  }

  await runBatch();
};

main(process.argv.slice(2)).catch((error: unknown) => {
  if (isWeatherPipelineError(error) && error.kind === 'InvalidInput') {
    console.error(`Configuration error: ${error.message}`);
    process.stderr.write(`\n${USAGE}`);
  } else {
    console.error('[pipeline] Fatal error:', describeError(error));
  }
  process.exit(1);
});
