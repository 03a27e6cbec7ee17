import { FrequencyClass, RecurrenceSpec } from '../common/types';

export const MINUTES_PER_DAY = 24 * 60;
export const MINUTES_PER_WEEK = 7 * MINUTES_PER_DAY;
// 30-day month
export const MINUTES_PER_MONTH = 30 * MINUTES_PER_DAY;

const DEFAULT_SPEC: RecurrenceSpec = { frequencyClass: FrequencyClass.DAILY, intervalMinutes: MINUTES_PER_DAY };

function firstInteger(phrase: string): number | null {
  const match = /\d+/.exec(phrase);
  if (!match) {
    return null;
  }
  const value = Number(match[0]);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

/**
 * Maps an interval phrase ("every 2 hours", "weekly") to a frequency class.
 * Unrecognized phrases fall back to daily.
 */
export function normalizeInterval(phrase: string): RecurrenceSpec {
  const lower = phrase.toLowerCase();

  if (lower.includes('minute')) {
    return { frequencyClass: FrequencyClass.CUSTOM, intervalMinutes: firstInteger(lower) ?? 60 };
  }
  if (lower.includes('hour')) {
    return { frequencyClass: FrequencyClass.CUSTOM, intervalMinutes: (firstInteger(lower) ?? 1) * 60 };
  }
  if (lower.includes('day') || lower.includes('daily')) {
    return { frequencyClass: FrequencyClass.DAILY, intervalMinutes: MINUTES_PER_DAY };
  }
  if (lower.includes('week')) {
    return { frequencyClass: FrequencyClass.WEEKLY, intervalMinutes: MINUTES_PER_WEEK };
  }
  if (lower.includes('month')) {
    return { frequencyClass: FrequencyClass.MONTHLY, intervalMinutes: MINUTES_PER_MONTH };
  }
  return { ...DEFAULT_SPEC };
}

const TOKEN_UNITS: Record<string, number> = {
  days: MINUTES_PER_DAY,
  weeks: MINUTES_PER_WEEK,
  months: MINUTES_PER_MONTH,
};

/**
 * Resolves a reminder's `repeat` value. Accepts the extractor's recurrence
 * tokens and, failing those, any phrase the interval normalizer understands.
 * `none` and blank mean one-time.
 */
export function recurrenceFromToken(token: string | undefined): RecurrenceSpec {
  const value = token?.trim().toLowerCase() ?? '';
  if (value === '' || value === 'none' || value === 'once') {
    return { frequencyClass: FrequencyClass.NONE, intervalMinutes: 0 };
  }
  if (value.startsWith('weekly-')) {
    return { frequencyClass: FrequencyClass.WEEKLY, intervalMinutes: MINUTES_PER_WEEK };
  }

  const custom = /^every-(\d+)-(days|weeks|months)$/.exec(value);
  if (custom) {
    const count = Number(custom[1]);
    if (count > 0) {
      return { frequencyClass: FrequencyClass.CUSTOM, intervalMinutes: count * TOKEN_UNITS[custom[2]] };
    }
  }

  return normalizeInterval(value);
}

function plural(count: number, unit: string): string {
  return count === 1 ? unit : `${count} ${unit}s`;
}

export function describeRecurrence(spec: RecurrenceSpec): string {
  switch (spec.frequencyClass) {
    case FrequencyClass.NONE:
      return 'once';
    case FrequencyClass.DAILY:
      return 'every day';
    case FrequencyClass.WEEKLY:
      return 'every week';
    case FrequencyClass.MONTHLY:
      return 'every month';
    case FrequencyClass.CUSTOM:
      if (spec.intervalMinutes % MINUTES_PER_DAY === 0) {
        return `every ${plural(spec.intervalMinutes / MINUTES_PER_DAY, 'day')}`;
      }
      if (spec.intervalMinutes % 60 === 0) {
        return `every ${plural(spec.intervalMinutes / 60, 'hour')}`;
      }
      return `every ${plural(spec.intervalMinutes, 'minute')}`;
  }
}
