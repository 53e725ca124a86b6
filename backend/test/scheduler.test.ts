import { startIntervalRunner } from '../src/utils/scheduler';

beforeEach(() => {
  jest.useFakeTimers();
});

afterEach(() => {
  jest.useRealTimers();
  jest.restoreAllMocks();
});

test('runs immediately and then once per interval until stopped', async () => {
  const task = jest.fn(async () => undefined);

  const runner = startIntervalRunner(task, 1000);
  await runner.firstRun;
  expect(task).toHaveBeenCalledTimes(1);

  await jest.advanceTimersByTimeAsync(3000);
  expect(task).toHaveBeenCalledTimes(4);

  runner.stop();
  await jest.advanceTimersByTimeAsync(5000);
  expect(task).toHaveBeenCalledTimes(4);
});

test('skips a tick while the previous run is still in flight', async () => {
  const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  const task = jest.fn(() => new Promise<void>((resolve) => setTimeout(resolve, 2500)));

  const runner = startIntervalRunner(task, 1000);
  await jest.advanceTimersByTimeAsync(2000);
  expect(task).toHaveBeenCalledTimes(1);
  expect(warnSpy).toHaveBeenCalledTimes(2);
  expect(warnSpy).toHaveBeenCalledWith('[scheduler] previous run still in progress, skipping tick');

  await jest.advanceTimersByTimeAsync(1000);
  expect(task).toHaveBeenCalledTimes(2);
  runner.stop();
});

test('a failed run is logged and later ticks keep running', async () => {
  const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  const task = jest.fn().mockRejectedValueOnce(new Error('network down')).mockResolvedValue(undefined);

  const runner = startIntervalRunner(task, 1000);
  await runner.firstRun;
  expect(errorSpy).toHaveBeenCalledWith('[scheduler] run failed:', 'network down');

  await jest.advanceTimersByTimeAsync(1000);
  expect(task).toHaveBeenCalledTimes(2);
  runner.stop();
});
