/** Number of days ahead a free-text range like "this week" or "3 days" covers. */
export function parseDateRange(text: string | undefined, fallback = 7): number {
  const lower = text?.toLowerCase().trim() ?? '';
  if (lower === '') {
    return fallback;
  }
  if (lower.includes('today')) {
    return 0;
  }
  if (lower.includes('tomorrow')) {
    return 1;
  }
  if (lower.includes('week')) {
    return 7;
  }
  if (lower.includes('month')) {
    return 30;
  }
  const days = /(\d+)\s*days?/.exec(lower);
  if (days) {
    return Number(days[1]);
  }
  return 7;
}
