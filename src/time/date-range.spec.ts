import { parseDateRange } from './date-range';

describe('parseDateRange', () => {
  it.each([
    ['today', 0],
    ['Tomorrow', 1],
    ['this week', 7],
    ['next month', 30],
    ['next 3 days', 3],
    ['1 day', 1],
    ['whenever', 7],
  ])('%s', (text, days) => {
    expect(parseDateRange(text)).toBe(days);
  });

  it('uses the fallback when no range is given', () => {
    expect(parseDateRange(undefined, 3)).toBe(3);
    expect(parseDateRange('  ', 3)).toBe(3);
  });
});
