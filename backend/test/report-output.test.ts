import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  CSV_HEADER,
  createOutputSink,
  formatCsvReports,
  formatJsonReports,
  formatTextReport,
  isBatchFormat,
  isOutputFormat,
  toJsonRecord,
} from '../src/utils/report-output';
import { buildWeatherReport } from '../src/utils/weather-service';
import { buildReport } from './helpers/reports';

test('formatTextReport prints current conditions and the days after today', () => {
  expect(formatTextReport(buildReport())).toBe(
    [
      '',
      '📍 Weather for New York (ZIP: 10001)',
      '-----------------------------------',
      'Now: 68.0°F, feels like 68.0°F, Mostly Cloudy',
      'Humidity: 65%, Wind: 22.4 mph',
      '',
      '📆 Forecast:',
      'Tue Oct 20: Min 55.0°F, Max 70.0°F, Partly Sunny',
      '',
    ].join('\n'),
  );
});

test('formatTextReport appends the summary and uses metric labels', () => {
  const text = formatTextReport(buildReport({ units: 'metric', forecast: [], summary: 'Mild and dry.' }));

  expect(text.split('\n')).toEqual([
    '',
    '📍 Weather for New York (ZIP: 10001)',
    '-----------------------------------',
    'Now: 68.0°C, feels like 68.0°C, Mostly Cloudy',
    'Humidity: 65%, Wind: 22.4 m/s',
    '',
    '📆 Forecast:',
    '',
    '📝 AI-Generated Forecast:',
    'Mild and dry.',
    '',
  ]);
});

test('toJsonRecord uses snake_case fields and omits an empty summary', () => {
  expect(toJsonRecord(buildReport())).toEqual({
    location_id: '10001',
    location_name: 'New York',
    timestamp: '2026-10-19T16:00:00.000Z',
    provider: 'nws',
    temperature: 68,
    feels_like: 68,
    temp_min: 52,
    temp_max: 68,
    humidity: 65,
    wind_speed: 22.37,
    condition: 'Mostly Cloudy',
    forecast_days: 1,
    forecast: [{ date: '2026-10-20', temp_min: 55, temp_max: 70, condition: 'Partly Sunny' }],
    is_metric: false,
  });
  expect(toJsonRecord(buildReport({ today: null })).temp_min).toBeNull();
});

test('formatJsonReports writes an object for one report and an array for several', () => {
  const single = JSON.parse(formatJsonReports([buildReport()]));
  const several = JSON.parse(formatJsonReports([buildReport(), buildReport({ locationId: '60601', locationName: 'Chicago' })]));

  expect(single.location_id).toBe('10001');
  expect(Array.isArray(several)).toBe(true);
  expect(several.map((record: { location_id: string }) => record.location_id)).toEqual(['10001', '60601']);
  expect(formatJsonReports([buildReport()]).startsWith('{\n  "location_id": "10001",')).toBe(true);
});

test('formatCsvReports writes the header and quotes fields that need it', () => {
  const csv = formatCsvReports([
    buildReport(),
    buildReport({
      locationId: '60601',
      locationName: 'Chicago',
      units: 'metric',
      current: { temperature: 11.25, feelsLike: 9, humidity: 80, windSpeed: 4, conditionText: 'Rain, "heavy" at times' },
    }),
  ]);

  expect(csv.split('\n')).toEqual([
    CSV_HEADER.join(','),
    '10001,New York,2026-10-19T16:00:00.000Z,68.0,68.0,65,22.4,Mostly Cloudy,false',
    '60601,Chicago,2026-10-19T16:00:00.000Z,11.3,9.0,80,4.0,"Rain, ""heavy"" at times",true',
    '',
  ]);
});

test('format helpers classify formats', () => {
  expect(isOutputFormat('csv')).toBe(true);
  expect(isOutputFormat('xml')).toBe(false);
  expect(isBatchFormat('json')).toBe(true);
  expect(isBatchFormat('text')).toBe(false);
  expect(isBatchFormat('kafka')).toBe(false);
});

test('buildWeatherReport splits today from the remaining forecast days', () => {
  const snapshot = {
    provider: 'nws' as const,
    units: 'imperial' as const,
    localDate: '2026-10-19',
    current: buildReport().current,
    daily: [
      { date: '2026-10-19', tempMin: 52, tempMax: 68, conditionText: 'Sunny' },
      { date: '2026-10-20', tempMin: 55, tempMax: 70, conditionText: 'Partly Sunny' },
    ],
  };

  const report = buildWeatherReport('10001', 'New York', snapshot, new Date('2026-10-19T16:00:00Z'));
  expect(report.today).toEqual(snapshot.daily[0]);
  expect(report.forecast).toEqual([snapshot.daily[1]]);
  expect(report.timestamp).toBe('2026-10-19T16:00:00.000Z');

  const withoutToday = buildWeatherReport('10001', 'New York', { ...snapshot, localDate: '2026-10-18' });
  expect(withoutToday.today).toBeNull();
  expect(withoutToday.forecast).toEqual(snapshot.daily);
});

test('createOutputSink replaces the file on the first write and appends after it', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'zip-weather-'));
  const outputPath = path.join(dir, 'report.txt');
  fs.writeFileSync(outputPath, 'old\n', 'utf8');

  try {
    const sink = createOutputSink(outputPath);
    sink('first\n');
    sink('second\n');
    expect(fs.readFileSync(outputPath, 'utf8')).toBe('first\nsecond\n');

    createOutputSink(outputPath)('next run\n');
    expect(fs.readFileSync(outputPath, 'utf8')).toBe('next run\n');
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test('createOutputSink writes to stdout without a path', () => {
  const writeSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);

  try {
    createOutputSink(null)('hello\n');
    expect(writeSpy).toHaveBeenCalledWith('hello\n');
  } finally {
    writeSpy.mockRestore();
  }
});
