import dayjs from 'dayjs';

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

export type MonthName = (typeof MONTH_NAMES)[number];

export function currentMonthName(): MonthName {
  return MONTH_NAMES[dayjs().month()];
}

export function currentYear(): number {
  return dayjs().year();
}

export function today(): string {
  return dayjs().format('YYYY-MM-DD');
}

/**
 * Resolves "march", "Mar", "sept" and similar to a month name.
 * Returns null when the text holds no recognisable month.
 */
export function parseMonthName(text: string): MonthName | null {
  const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
  for (const word of words) {
    const found = MONTH_NAMES.find((name) => {
      const lower = name.toLowerCase();
      return lower === word || lower.slice(0, 3) === word || (word === 'sept' && lower === 'september');
    });
    if (found) return found;
  }
  return null;
}

/** Inclusive start and exclusive end (ISO dates) of a calendar month. */
export function monthWindow(month: string, year: number): { start: string; end: string } {
  const index = MONTH_NAMES.findIndex((name) => name.toLowerCase() === month.toLowerCase());
  const start = dayjs(new Date(year, index >= 0 ? index : dayjs().month(), 1));
  return {
    start: start.format('YYYY-MM-DD'),
    end: start.add(1, 'month').format('YYYY-MM-DD'),
  };
}
