import { describeError } from './errors';

export interface IntervalRunner {
  /** Settles when the immediate first run finishes. */
  firstRun: Promise<void>;
  stop: () => void;
}

/**
 * Runs `task` now and then every `intervalMs`. Each run starts from scratch;
 * a tick that lands while the previous run is still going is skipped.
 */
export const startIntervalRunner = (task: () => Promise<unknown>, intervalMs: number): IntervalRunner => {
  let running = false;

  const tick = async (): Promise<void> => {
    if (running) {
      console.warn('[scheduler] previous run still in progress, skipping tick');
      return;
    }
    running = true;
    try {
      await task();
    } catch (error) {
      console.error('[scheduler] run failed:', describeError(error));
    } finally {
      running = false;
    }
  };

  const firstRun = tick();
  const timer = setInterval(() => {
    void tick();
  }, intervalMs);

  return {
    firstRun,
    stop: () => clearInterval(timer),
  };
};
