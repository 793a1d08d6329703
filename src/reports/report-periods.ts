import dayjs, { Dayjs } from 'dayjs';
import { MONTH_NAMES, parseMonthName } from '../common/dates';

export type ReportKind = 'day' | 'week' | 'month';

export interface ReportPeriod {
  kind: ReportKind;
  label: string;
  /** Inclusive ISO dates. */
  startDate: string;
  endDate: string;
}

const EXPENSE_WORDS = /\b(?:expenses?|spending|spend|spent|transactions?)\b/;
const DAY_WORDS = /\b(?:today|yesterday|daily|days?\s+ago)\b/;
const WEEK_WORDS = /\b(?:week|weekly|weeks)\b/;
const MONTH_WORDS = /\b(?:month|monthly|january|february|march|april|may|june|july|august|september|october|november|december|jan|feb|mar|apr|jun|jul|aug|sep|sept|oct|nov|dec)\b/;

// digits that belong to the period itself rather than to an amount
const PERIOD_NUMBERS = /\b20\d{2}\b|\b\d+\s+days?\s+ago\b|\blast\s+\d+\s+weeks?\b/g;

const ISO = 'YYYY-MM-DD';

function mondayOf(date: Dayjs): Dayjs {
  return date.subtract((date.day() + 6) % 7, 'day').startOf('day');
}

/**
 * Recognises "show my expenses today", "weekly spending", "expenses for
 * march 2025". Null when the text is not a report request, including any
 * text carrying an amount.
 */
export function detectReportPeriod(text: string, now: Dayjs = dayjs()): ReportPeriod | null {
  const lower = text.toLowerCase();
  if (!EXPENSE_WORDS.test(lower)) return null;
  if (/\d/.test(lower.replace(PERIOD_NUMBERS, ' '))) return null;

  if (DAY_WORDS.test(lower)) return dayPeriod(lower, now);
  if (WEEK_WORDS.test(lower)) return weekPeriod(lower, now);
  if (MONTH_WORDS.test(lower)) return monthPeriod(lower, now);
  return null;
}

function dayPeriod(text: string, now: Dayjs): ReportPeriod {
  let date = now;
  let label = 'Today';
  const daysAgo = text.match(/\b(\d+)\s+days?\s+ago\b/);
  if (text.includes('yesterday')) {
    date = now.subtract(1, 'day');
    label = 'Yesterday';
  } else if (daysAgo) {
    const days = Math.min(30, Number(daysAgo[1]));
    date = now.subtract(days, 'day');
    label = `${days} Days Ago`;
  }
  const iso = date.format(ISO);
  return { kind: 'day', label, startDate: iso, endDate: iso };
}

function weekPeriod(text: string, now: Dayjs): ReportPeriod {
  const lastWeeks = text.match(/\blast\s+(\d+)\s+weeks?\b/);
  if (lastWeeks) {
    const weeks = Math.min(10, Math.max(1, Number(lastWeeks[1])));
    return {
      kind: 'week',
      label: `Last ${weeks} Weeks`,
      startDate: now.subtract(weeks * 7, 'day').format(ISO),
      endDate: now.format(ISO),
    };
  }

  const previous = /\b(?:last|previous)\s+week\b/.test(text);
  const start = previous ? mondayOf(now).subtract(7, 'day') : mondayOf(now);
  return {
    kind: 'week',
    label: previous ? 'Last Week' : 'This Week',
    startDate: start.format(ISO),
    endDate: start.add(6, 'day').format(ISO),
  };
}

function monthPeriod(text: string, now: Dayjs): ReportPeriod {
  const yearMatch = text.match(/\b(20\d{2})\b/);
  let start: Dayjs;

  const named = parseMonthName(text.replace(/\bmonthly\b|\bmonths?\b/g, ' '));
  if (named) {
    const year = yearMatch ? Number(yearMatch[1]) : now.year();
    start = dayjs(new Date(year, MONTH_NAMES.indexOf(named), 1));
  } else if (/\b(?:last|previous)\s+month\b/.test(text)) {
    start = now.startOf('month').subtract(1, 'month');
  } else {
    start = now.startOf('month');
  }

  return {
    kind: 'month',
    label: `${MONTH_NAMES[start.month()]} ${start.year()}`,
    startDate: start.format(ISO),
    endDate: start.endOf('month').format(ISO),
  };
}
