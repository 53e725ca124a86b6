import {
  celsiusToF,
  clampHumidity,
  convertTemperature,
  createCoordinates,
  fahrenheitToC,
  metersPerSecondToMph,
} from '../src/utils/weather';
import { dateKeyFromRfc3339, dateKeyInTimeZone, formatDayLabel, localDateKey } from '../src/utils/time';

test('celsius converts to fahrenheit exactly', () => {
  expect(celsiusToF(0)).toBe(32);
  expect(celsiusToF(100)).toBe(212);
  expect(celsiusToF(-40)).toBe(-40);
  expect(celsiusToF(20)).toBe(68);
});

test('meters per second converts to mph with the 2.237 factor', () => {
  expect(metersPerSecondToMph(10)).toBeCloseTo(22.37, 10);
  expect(metersPerSecondToMph(0)).toBe(0);
});

test('convertTemperature only converts when the source unit differs', () => {
  expect(convertTemperature(100, 'C', 'imperial')).toBe(212);
  expect(convertTemperature(70, 'F', 'imperial')).toBe(70);
  expect(convertTemperature(212, 'F', 'metric')).toBe(100);
  expect(convertTemperature(21, 'C', 'metric')).toBe(21);
  expect(fahrenheitToC(32)).toBe(0);
});

test('humidity is truncated to an integer within 0-100', () => {
  expect(clampHumidity(65.9)).toBe(65);
  expect(clampHumidity(104)).toBe(100);
  expect(clampHumidity(-3)).toBe(0);
});

test('coordinates are frozen once created', () => {
  const coordinates = createCoordinates(40.7128, -74.006, 'New York');
  expect(Object.isFrozen(coordinates)).toBe(true);
});

test('dateKeyFromRfc3339 keeps the written calendar date', () => {
  expect(dateKeyFromRfc3339('2026-10-19T23:30:00-07:00')).toBe('2026-10-19');
  expect(dateKeyFromRfc3339('2026-10-19T00:15:00+09:00')).toBe('2026-10-19');
  expect(dateKeyFromRfc3339('2026-10-19T06:00:00.500Z')).toBe('2026-10-19');
  expect(dateKeyFromRfc3339('2026-10-19')).toBeNull();
  expect(dateKeyFromRfc3339('2026-13-01T06:00:00Z')).toBeNull();
  expect(dateKeyFromRfc3339(undefined)).toBeNull();
});

test('dateKeyInTimeZone formats in the requested zone', () => {
  const instant = new Date('2026-10-20T02:00:00Z');
  expect(dateKeyInTimeZone(instant, 'America/Los_Angeles')).toBe('2026-10-19');
  expect(dateKeyInTimeZone(instant, 'UTC')).toBe('2026-10-20');
  expect(dateKeyInTimeZone('not a date')).toBeNull();
});

test('localDateKey pads month and day', () => {
  expect(localDateKey(new Date(2026, 0, 5, 12))).toBe('2026-01-05');
});

test('formatDayLabel renders a short weekday label', () => {
  expect(formatDayLabel('2026-10-19')).toBe('Mon Oct 19');
  expect(formatDayLabel('2026-10-20')).toBe('Tue Oct 20');
  expect(formatDayLabel('garbage')).toBe('garbage');
});
