import { Injectable, Logger } from '@nestjs/common';
import { DateRangeView } from '@cottage-concierge/shared-types';
import {
  addDays,
  differenceInCalendarDays,
  format,
  isWeekend,
  nextMonday,
  parseISO,
  startOfDay,
} from 'date-fns';

import { Clock } from '../common/clock';

export interface StayNightDate {
  date: Date;
  isWeekend: boolean;
}

export interface DateRange {
  start: Date;
  /** Checkout day; the night of `end` is not part of the stay. */
  end: Date;
  nights: number;
  weekdayNights: number;
  weekendNights: number;
  stayNights: StayNightDate[];
}

export type DateRangeValidation = { valid: true } | { valid: false; reason: string };

export const MAX_STAY_NIGHTS = 30;
const MAX_DAYS_IN_PAST = 365;
const MAX_DAYS_IN_FUTURE = 730;

const MONTH =
  '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';
const DAY = '(\\d{1,2})(?:st|nd|rd|th)?';
const LEAD = '(?:from|arrival|check-in|starting|planning|stay|staying)?\\s*';
const TO = '\\s*(?:to|until|till|-)\\s*';

const MONTH_TYPOS: Array<[RegExp, string]> = [
  [/\bmatch\b(?=\s+\d)/g, 'march'],
  [/\b(?:martch|marchh)\b/g, 'march'],
  [/\b(?:feburary|febuary|februrary)\b/g, 'february'],
  [/\b(?:janurary|januray)\b/g, 'january'],
  [/\bseptmeber\b/g, 'september'],
  [/\bdecembr\b/g, 'december'],
];

type RangeParser = (match: RegExpExecArray, year: number) => [Date | null, Date | null];

interface RangePattern {
  name: string;
  pattern: RegExp;
  parse: RangeParser;
}

const monthIndex = (token: string): number =>
  ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'].indexOf(
    token.slice(0, 3),
  );

const fullYear = (token: string | undefined, fallback: number): number => {
  if (!token) {
    return fallback;
  }
  const value = Number.parseInt(token, 10);
  return value < 100 ? value + 2000 : value;
};

/** Local calendar date, or null when the parts roll over (e.g. 30 February). */
export const calendarDate = (year: number, monthZeroBased: number, day: number): Date | null => {
  const date = new Date(year, monthZeroBased, day);
  return date.getFullYear() === year && date.getMonth() === monthZeroBased && date.getDate() === day
    ? date
    : null;
};

const rollYearIfBefore = (start: Date | null, end: Date | null): [Date | null, Date | null] => {
  if (start && end && end < start) {
    return [start, calendarDate(end.getFullYear() + 1, end.getMonth(), end.getDate())];
  }
  return [start, end];
};

const rollMonthIfBefore = (start: Date | null, end: Date | null): [Date | null, Date | null] => {
  if (start && end && end < start) {
    const nextMonth = new Date(end.getFullYear(), end.getMonth() + 1, 1);
    return [start, calendarDate(nextMonth.getFullYear(), nextMonth.getMonth(), end.getDate())];
  }
  return [start, end];
};

const RANGE_PATTERNS: RangePattern[] = [
  {
    name: 'month-day-year to month-day-year',
    pattern: new RegExp(`\\b${MONTH}\\s+${DAY},?\\s*(\\d{2,4}),?${TO}${MONTH}\\s+${DAY},?\\s*(\\d{2,4})?`),
    parse: (m, year) => {
      const startYear = fullYear(m[3], year);
      return [
        calendarDate(startYear, monthIndex(m[1]), Number(m[2])),
        calendarDate(fullYear(m[6], startYear), monthIndex(m[4]), Number(m[5])),
      ];
    },
  },
  {
    name: 'month-day to month-day',
    pattern: new RegExp(`${LEAD}\\b${MONTH}\\s+${DAY}${TO}${MONTH}\\s+${DAY}\\b`),
    parse: (m, year) =>
      rollYearIfBefore(
        calendarDate(year, monthIndex(m[1]), Number(m[2])),
        calendarDate(year, monthIndex(m[3]), Number(m[4])),
      ),
  },
  {
    name: 'day-month to day-month',
    pattern: new RegExp(`${LEAD}\\b${DAY}\\s+(?:of\\s+)?${MONTH}${TO}${DAY}\\s+(?:of\\s+)?${MONTH}\\b`),
    parse: (m, year) =>
      rollYearIfBefore(
        calendarDate(year, monthIndex(m[2]), Number(m[1])),
        calendarDate(year, monthIndex(m[4]), Number(m[3])),
      ),
  },
  {
    name: 'day to day-month',
    pattern: new RegExp(`${LEAD}\\b${DAY}${TO}${DAY}\\s+(?:of\\s+)?${MONTH}\\b`),
    parse: (m, year) => {
      const month = monthIndex(m[3]);
      return rollMonthIfBefore(
        calendarDate(year, month, Number(m[1])),
        calendarDate(year, month, Number(m[2])),
      );
    },
  },
  {
    name: 'month day-day',
    pattern: new RegExp(`\\b${MONTH}\\s+${DAY}\\s*(?:-|to)\\s*${DAY}\\b`),
    parse: (m, year) => {
      const month = monthIndex(m[1]);
      return rollMonthIfBefore(
        calendarDate(year, month, Number(m[2])),
        calendarDate(year, month, Number(m[3])),
      );
    },
  },
  {
    name: 'numeric to numeric',
    pattern:
      /(?:from|arrival|check-in|starting)?\s*\b(\d{1,2})[/-](\d{1,2})[/-](\d{2,4})\s+(?:to|until|till|-)\s+(\d{1,2})[/-](\d{1,2})[/-](\d{2,4})\b/,
    parse: (m, year) => [
      calendarDate(fullYear(m[3], year), Number(m[2]) - 1, Number(m[1])),
      calendarDate(fullYear(m[6], year), Number(m[5]) - 1, Number(m[4])),
    ],
  },
];

const NOT_A_COUNT = '(?!\\s*(?:nights?|days?|people|guests?))';

// "may" is also a verb ("may 2 of us come"), so month-first "may" needs a lead word or a day suffix.
const SINGLE_DATE_PATTERNS: Array<{ pattern: RegExp; day: number; month: number }> = [
  { pattern: new RegExp(`\\b(?:on|for)\\s+${DAY}\\s+(?:of\\s+)?${MONTH}\\b`), day: 1, month: 2 },
  { pattern: new RegExp(`\\b${DAY}\\s+(?:of\\s+)?${MONTH}\\b`), day: 1, month: 2 },
  { pattern: new RegExp(`\\b(?:on|for|from)\\s+(may)\\s+${DAY}\\b${NOT_A_COUNT}`), day: 2, month: 1 },
  { pattern: new RegExp(`\\b(may)\\s+(\\d{1,2})(?:st|nd|rd|th)\\b${NOT_A_COUNT}`), day: 2, month: 1 },
  { pattern: new RegExp(`\\b(?!may\\b)${MONTH}\\s+${DAY}\\b${NOT_A_COUNT}`), day: 2, month: 1 },
];

@Injectable()
export class DateExtractor {
  private readonly logger = new Logger(DateExtractor.name);

  constructor(private readonly clock: Clock) {}

  today(): Date {
    return startOfDay(this.clock.now());
  }

  /** Anchor for stays given only as a night count: today, or next Monday for "next week". */
  stayAnchor(text: string): Date {
    const today = this.today();
    return /\bnext\s+week\b/i.test(text) ? nextMonday(today) : today;
  }

  normalizeMonthTypos(text: string): string {
    return MONTH_TYPOS.reduce(
      (current, [pattern, replacement]) => current.replace(pattern, replacement),
      text.toLowerCase(),
    );
  }

  extractDateRange(text: string): DateRange | null {
    const normalized = this.normalizeMonthTypos(text);
    const year = this.clock.now().getFullYear();

    for (const { name, pattern, parse } of RANGE_PATTERNS) {
      const match = pattern.exec(normalized);
      if (!match) {
        continue;
      }

      const [start, end] = parse(match, year);
      if (!start || !end) {
        this.logger.warn(`Ignoring impossible calendar date in "${match[0].trim()}"`);
        continue;
      }

      this.logger.debug(`Date range matched by ${name}: ${match[0].trim()}`);
      return this.buildRange(start, end);
    }

    for (const { pattern, day, month } of SINGLE_DATE_PATTERNS) {
      const match = pattern.exec(normalized);
      if (!match) {
        continue;
      }

      const start = calendarDate(year, monthIndex(match[month]), Number(match[day]));
      if (start) {
        return this.buildRange(start, addDays(start, 1));
      }
    }

    return null;
  }

  /** Walks the real calendar between check-in and checkout. A non-positive span becomes one night. */
  buildRange(start: Date, end: Date): DateRange {
    const checkIn = startOfDay(start);
    let checkOut = startOfDay(end);
    if (differenceInCalendarDays(checkOut, checkIn) <= 0) {
      checkOut = addDays(checkIn, 1);
    }

    const stayNights: StayNightDate[] = [];
    for (let night = checkIn; night < checkOut; night = addDays(night, 1)) {
      stayNights.push({ date: night, isWeekend: isWeekend(night) });
    }

    return this.summarize(checkIn, checkOut, stayNights);
  }

  /** The next `nights` weekday nights on or after the anchor. */
  buildWeekdayRange(anchor: Date, nights: number): DateRange {
    const stayNights: StayNightDate[] = [];
    let cursor = startOfDay(anchor);
    while (stayNights.length < Math.max(1, nights)) {
      if (!isWeekend(cursor)) {
        stayNights.push({ date: cursor, isWeekend: false });
      }
      cursor = addDays(cursor, 1);
    }

    const lastNight = stayNights[stayNights.length - 1].date;
    return this.summarize(stayNights[0].date, addDays(lastNight, 1), stayNights);
  }

  /** Keeps the check-in date and re-walks the calendar for a different night count. */
  withNights(range: DateRange, nights: number): DateRange {
    return this.buildRange(range.start, addDays(range.start, nights));
  }

  validateDateRange(start: Date, end: Date): DateRangeValidation {
    if (end <= start) {
      return { valid: false, reason: 'End date must be after start date' };
    }

    const today = this.today();
    if (differenceInCalendarDays(today, start) > MAX_DAYS_IN_PAST) {
      return { valid: false, reason: 'Start date is too far in the past' };
    }
    if (differenceInCalendarDays(start, today) > MAX_DAYS_IN_FUTURE) {
      return { valid: false, reason: 'Start date is too far in the future' };
    }

    const nights = differenceInCalendarDays(end, start);
    if (nights > MAX_STAY_NIGHTS) {
      return {
        valid: false,
        reason: `Stay duration (${nights} nights) exceeds maximum allowed (${MAX_STAY_NIGHTS} nights)`,
      };
    }

    return { valid: true };
  }

  toView(range: DateRange): DateRangeView {
    return {
      start: format(range.start, 'yyyy-MM-dd'),
      end: format(range.end, 'yyyy-MM-dd'),
      nights: range.nights,
      weekdayNights: range.weekdayNights,
      weekendNights: range.weekendNights,
      stayNights: range.stayNights.map((night) => ({
        date: format(night.date, 'yyyy-MM-dd'),
        isWeekend: night.isWeekend,
      })),
    };
  }

  fromView(view: DateRangeView): DateRange {
    return {
      start: parseISO(view.start),
      end: parseISO(view.end),
      nights: view.nights,
      weekdayNights: view.weekdayNights,
      weekendNights: view.weekendNights,
      stayNights: view.stayNights.map((night) => ({
        date: parseISO(night.date),
        isWeekend: night.isWeekend,
      })),
    };
  }

  describe(range: DateRange): string {
    return `${format(range.start, 'MMMM d, yyyy')} to ${format(range.end, 'MMMM d, yyyy')}`;
  }

  private summarize(start: Date, end: Date, stayNights: StayNightDate[]): DateRange {
    const weekendNights = stayNights.filter((night) => night.isWeekend).length;
    return {
      start,
      end,
      nights: stayNights.length,
      weekdayNights: stayNights.length - weekendNights,
      weekendNights,
      stayNights,
    };
  }
}
