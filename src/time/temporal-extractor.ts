import { TemporalExtractionResult } from '../common/types';
import { addDays, calendarDate, formatDate, formatTime } from './date-utils';

// Indexed like Date#getDay()
export const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'] as const;

export type Weekday = (typeof WEEKDAYS)[number];

// "sat" and "sun" are left out: both are everyday words.
const WEEKDAY_ALIASES: Record<string, Weekday> = {
  mon: 'monday',
  tue: 'tuesday',
  tues: 'tuesday',
  wed: 'wednesday',
  thu: 'thursday',
  thur: 'thursday',
  thurs: 'thursday',
  fri: 'friday',
};

const WEEKDAY_WORD = `(${[...WEEKDAYS, ...Object.keys(WEEKDAY_ALIASES)].join('|')})`;
const WEEKDAY_PATTERN = new RegExp(`\\b${WEEKDAY_WORD}\\b`);
const EVERY_WEEKDAY_PATTERN = new RegExp(`\\bevery\\s+${WEEKDAY_WORD}\\b`);

const MERIDIEM = '([ap])\\.?\\s?m\\.?(?![a-z])';
const CLOCK_WITH_MERIDIEM = new RegExp(`\\b(\\d{1,2}):(\\d{2})\\s*${MERIDIEM}`, 'g');
const HOUR_WITH_MERIDIEM = new RegExp(`\\b(\\d{1,2})\\s*${MERIDIEM}`, 'g');
const CLOCK_24H = /\b(\d{1,2}):(\d{2})\b/g;

const ISO_DATE = /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/;
const FULL_NUMERIC_DATE = /\b(\d{1,2})[/-](\d{1,2})[/-](\d{4}|\d{2})\b/;
const SHORT_NUMERIC_DATE = /\b(\d{1,2})[/-](\d{1,2})\b/;

const NAMED_PERIODS: Array<[RegExp, string]> = [
  [/\bnoon\b/, '12:00'],
  [/\bmidnight\b/, '00:00'],
  [/morning/, '09:00'],
  [/afternoon/, '14:00'],
  [/evening/, '18:00'],
  [/night/, '20:00'],
];

function toWeekday(word: string): Weekday | null {
  const alias = WEEKDAY_ALIASES[word];
  if (alias) {
    return alias;
  }
  return WEEKDAYS.find((day) => day === word) ?? null;
}

/**
 * Pulls a date, a time of day and a recurrence token out of free text.
 * Never throws; whatever cannot be resolved comes back as null.
 */
export function extractTemporal(text: string, now: Date = new Date()): TemporalExtractionResult {
  const lower = text.toLowerCase();
  return {
    date: extractDate(lower, now),
    time: extractTime(lower),
    recurrence: extractRecurrence(lower),
  };
}

export function extractDate(text: string, now: Date = new Date()): string | null {
  const lower = text.toLowerCase();

  if (/\bday after tomorrow\b/.test(lower)) {
    return formatDate(addDays(now, 2));
  }
  if (/\btoday\b/.test(lower)) {
    return formatDate(now);
  }
  if (/\btomorrow\b/.test(lower)) {
    return formatDate(addDays(now, 1));
  }

  const weekdayMatch = WEEKDAY_PATTERN.exec(lower);
  const weekday = weekdayMatch ? toWeekday(weekdayMatch[1]) : null;
  if (weekday) {
    // Nearest future occurrence. A day name equal to today means next week's,
    // with or without "next".
    let offset = (WEEKDAYS.indexOf(weekday) - now.getDay() + 7) % 7;
    if (offset === 0) {
      offset = 7;
    }
    return formatDate(addDays(now, offset));
  }

  if (/\bnext week\b/.test(lower) || /\bin a week\b/.test(lower)) {
    return formatDate(addDays(now, 7));
  }
  // Fixed 30 days, not calendar months.
  if (/\bnext month\b/.test(lower)) {
    return formatDate(addDays(now, 30));
  }

  return extractNumericDate(lower, now);
}

function extractNumericDate(text: string, now: Date): string | null {
  const iso = ISO_DATE.exec(text);
  if (iso) {
    const date = calendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    if (date) {
      return formatDate(date);
    }
  }

  const full = FULL_NUMERIC_DATE.exec(text);
  if (full) {
    let year = Number(full[3]);
    if (year < 100) {
      year += 2000;
    }
    const date = calendarDate(year, Number(full[1]), Number(full[2]));
    return date ? formatDate(date) : null;
  }

  const short = SHORT_NUMERIC_DATE.exec(text);
  if (short) {
    const month = Number(short[1]);
    const day = Number(short[2]);
    let year = now.getFullYear();
    const currentMonth = now.getMonth() + 1;
    if (month < currentMonth || (month === currentMonth && day < now.getDate())) {
      year += 1;
    }
    const date = calendarDate(year, month, day);
    return date ? formatDate(date) : null;
  }

  return null;
}

function to24Hour(hour: number, meridiem: string): number {
  if (meridiem === 'p' && hour < 12) {
    return hour + 12;
  }
  if (meridiem === 'a' && hour === 12) {
    return 0;
  }
  return hour;
}

function validClock(hour: number, minute: number): boolean {
  return hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59;
}

export function extractTime(text: string): string | null {
  const lower = text.toLowerCase();

  for (const match of lower.matchAll(CLOCK_WITH_MERIDIEM)) {
    const hour = to24Hour(Number(match[1]), match[3]);
    const minute = Number(match[2]);
    if (validClock(hour, minute)) {
      return formatTime(hour, minute);
    }
  }

  for (const match of lower.matchAll(HOUR_WITH_MERIDIEM)) {
    const hour = to24Hour(Number(match[1]), match[2]);
    if (validClock(hour, 0)) {
      return formatTime(hour, 0);
    }
  }

  for (const match of lower.matchAll(CLOCK_24H)) {
    const hour = Number(match[1]);
    const minute = Number(match[2]);
    if (validClock(hour, minute)) {
      return formatTime(hour, minute);
    }
  }

  for (const [pattern, time] of NAMED_PERIODS) {
    if (pattern.test(lower)) {
      return time;
    }
  }

  return null;
}

export function extractRecurrence(text: string): string | null {
  const lower = text.toLowerCase();

  if (/\bevery\s+day\b|\bdaily\b/.test(lower)) {
    return 'daily';
  }
  if (/\bevery\s+week\b|\bweekly\b/.test(lower)) {
    return 'weekly';
  }
  if (/\bevery\s+month\b|\bmonthly\b/.test(lower)) {
    return 'monthly';
  }

  const everyWeekday = EVERY_WEEKDAY_PATTERN.exec(lower);
  const weekday = everyWeekday ? toWeekday(everyWeekday[1]) : null;
  if (weekday) {
    return `weekly-${weekday}`;
  }

  for (const unit of ['day', 'week', 'month']) {
    const match = new RegExp(`\\bevery\\s+(\\d+)\\s+${unit}s?\\b`).exec(lower);
    if (match) {
      return `every-${match[1]}-${unit}s`;
    }
  }

  return null;
}
