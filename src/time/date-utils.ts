// Calendar helpers on local time. Day arithmetic goes through the Date
// constructor so month and year boundaries roll over on their own.

/** Same wall-clock time, `days` calendar days later. */
export function addDays(date: Date, days: number): Date {
  const result = new Date(date.getTime());
  result.setDate(result.getDate() + days);
  return result;
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60 * 1000);
}

export function endOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate(), 23, 59, 59, 999);
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function formatTime(hour: number, minute: number): string {
  return `${pad(hour)}:${pad(minute)}`;
}

export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${formatTime(date.getHours(), date.getMinutes())}`;
}

/** Builds a local date, or null when the components do not name a real calendar day. */
export function calendarDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

export function parseIsoDate(value: string): Date | null {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  return calendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function parseClockTime(value: string): { hour: number; minute: number } | null {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    return null;
  }
  return { hour, minute };
}

/** `YYYY-MM-DD` + `HH:MM` as a local timestamp. */
export function combineDateAndTime(date: string, time: string): Date | null {
  const day = parseIsoDate(date);
  const clock = parseClockTime(time);
  if (!day || !clock) {
    return null;
  }
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), clock.hour, clock.minute);
}
