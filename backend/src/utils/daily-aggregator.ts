import { dateKeyFromRfc3339, localDateKey } from './time';
import { UnifiedDailyForecast } from './weather';

export interface ForecastPeriod {
  startTime: string;
  endTime: string;
  /** Already expressed in the requested unit system. */
  temperature: number;
  isDaytime: boolean;
  shortForecast: string;
}

interface AggregateForecastPeriodsOptions {
  /** Date key that is moved to the front; defaults to the host-local date. */
  today?: string;
}

/**
 * Folds 12-hour forecast periods into one entry per calendar date.
 *
 * The first period of a date seeds min, max and condition. After that, only a
 * warmer daytime period raises the max (and supplies the condition) and only a
 * colder nighttime period lowers the min. Ties keep the earlier condition.
 * Periods whose start time does not parse are dropped. Today's entry, when
 * present, comes first; the remaining dates follow in ascending order.
 */
export const aggregateForecastPeriods = (
  periods: readonly ForecastPeriod[],
  { today = localDateKey() }: AggregateForecastPeriodsOptions = {},
): UnifiedDailyForecast[] => {
  const byDate = new Map<string, UnifiedDailyForecast>();

  for (const period of periods) {
    const dateKey = dateKeyFromRfc3339(period.startTime);
    if (!dateKey) {
      continue;
    }

    const day = byDate.get(dateKey);
    if (!day) {
      byDate.set(dateKey, {
        date: dateKey,
        tempMin: period.temperature,
        tempMax: period.temperature,
        conditionText: period.shortForecast,
      });
      continue;
    }

    if (period.isDaytime && period.temperature > day.tempMax) {
      day.tempMax = period.temperature;
      day.conditionText = period.shortForecast;
    }
    if (!period.isDaytime && period.temperature < day.tempMin) {
      day.tempMin = period.temperature;
    }
  }

  const sortedDates = [...byDate.keys()].sort();
  const todayEntry = byDate.get(today);
  const rest = sortedDates.filter((dateKey) => dateKey !== today).map((dateKey) => byDate.get(dateKey));

  return [todayEntry, ...rest].filter((entry): entry is UnifiedDailyForecast => entry !== undefined);
};
