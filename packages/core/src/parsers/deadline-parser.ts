/**
 * Parses the deadline a user types on the command line into a local point
 * in time.
 *
 * Accepted forms:
 *   - nothing               today at 17:00
 *   - `HH:MM[:SS]`          today at that time
 *   - `<day>`               that day at 17:00
 *   - `<day> HH:MM[:SS]`    that day at that time
 *
 * where `<day>` is yyyy-MM-dd, today/tomorrow/yesterday, a relative offset
 * (+3d/+2w/+1m), a weekday name (mon-sunday) or month+day (jan15).
 */

import { isEncodableTimestamp } from '../codec/timestamp.js';

export interface TimeOfDay {
  hours: number;
  minutes: number;
  seconds: number;
}

export const DEFAULT_TIME: TimeOfDay = { hours: 17, minutes: 0, seconds: 0 };

const TIME_RE = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{1,2})$/;

const DAY_MAP: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const MONTH_MAP: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3,
  may: 4, jun: 5, jul: 6, aug: 7,
  sep: 8, oct: 9, nov: 10, dec: 11,
};

const MIDNIGHT: TimeOfDay = { hours: 0, minutes: 0, seconds: 0 };

/** Local date; setFullYear keeps years below 100 literal (the Date constructor maps them to 19xx) */
function localDate(year: number, month: number, day: number, time: TimeOfDay = MIDNIGHT): Date {
  const d = new Date(0);
  d.setFullYear(year, month, day);
  d.setHours(time.hours, time.minutes, time.seconds, 0);
  return d;
}

/** Local midnight of the given instant (returns new Date) */
export function startOfDay(d: Date): Date {
  return localDate(d.getFullYear(), d.getMonth(), d.getDate());
}

function addDays(d: Date, n: number): Date {
  return localDate(d.getFullYear(), d.getMonth(), d.getDate() + n);
}

function addMonths(d: Date, n: number): Date {
  return localDate(d.getFullYear(), d.getMonth() + n, d.getDate());
}

function atTime(day: Date, time: TimeOfDay): Date {
  return localDate(day.getFullYear(), day.getMonth(), day.getDate(), time);
}

/** Parse `HH:MM` or `HH:MM:SS` (24-hour clock) */
export function parseTime(input: string): TimeOfDay | null {
  const m = TIME_RE.exec(input);
  if (!m) return null;

  const hours = Number(m[1]);
  const minutes = Number(m[2]);
  const seconds = m[3] ? Number(m[3]) : 0;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return { hours, minutes, seconds };
}

function tryParseRelative(input: string, today: Date): Date | null {
  const m = RELATIVE_RE.exec(input);
  if (!m) return null;

  const count = Number(m[1]);
  switch (m[2]) {
    case 'd': return addDays(today, count);
    case 'w': return addDays(today, count * 7);
    case 'm': return addMonths(today, count);
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Date): Date | null {
  const target = DAY_MAP[input];
  if (target === undefined) return null;

  let daysUntil = (target - today.getDay() + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // Next week if today
  return addDays(today, daysUntil);
}

function tryParseMonthDay(input: string, today: Date): Date | null {
  const m = MONTH_DAY_RE.exec(input);
  if (!m) return null;

  const month = MONTH_MAP[m[1] ?? ''];
  if (month === undefined) return null;

  const day = Number(m[2]);
  const candidate = localDate(today.getFullYear(), month, day);
  if (candidate.getMonth() !== month || candidate.getDate() !== day) {
    return null; // e.g. feb30
  }

  // Dates already past roll over to next year
  if (candidate < today) {
    return localDate(today.getFullYear() + 1, month, day);
  }
  return candidate;
}

function tryParseIso(input: string): Date | null {
  const m = ISO_DATE_RE.exec(input);
  if (!m) return null;

  const year = Number(m[1]);
  const month = Number(m[2]) - 1;
  const day = Number(m[3]);
  const d = localDate(year, month, day);
  // Rejects rollovers like 2026-02-30
  if (d.getFullYear() !== year || d.getMonth() !== month || d.getDate() !== day) return null;
  return d;
}

/**
 * Parse a day expression into local midnight of that day.
 * Returns null if the input can't be parsed.
 */
export function parseDay(input: string, now?: Date): Date | null {
  const today = startOfDay(now ?? new Date());
  const normalized = input.trim().toLowerCase();

  switch (normalized) {
    case 'today': return today;
    case 'tomorrow': return addDays(today, 1);
    case 'yesterday': return addDays(today, -1);
    default:
      return tryParseRelative(normalized, today)
        ?? tryParseDayOfWeek(normalized, today)
        ?? tryParseMonthDay(normalized, today)
        ?? tryParseIso(normalized);
  }
}

/**
 * Parse a deadline expression. Returns null if the input can't be parsed.
 *
 * @param now - Override "now" for testing. Defaults to the current time.
 */
export function parseDeadline(input: string | null | undefined, now?: Date): Date | null {
  const deadline = resolveDeadline(input, startOfDay(now ?? new Date()));
  // Far-off offsets overflow the task file's four-digit years, or Date itself
  return deadline && isEncodableTimestamp(deadline) ? deadline : null;
}

function resolveDeadline(input: string | null | undefined, today: Date): Date | null {
  const normalized = input?.trim().toLowerCase().replace(/\s+/g, ' ') ?? '';
  if (normalized === '') return atTime(today, DEFAULT_TIME);

  const time = parseTime(normalized);
  if (time) return atTime(today, time);

  const split = normalized.lastIndexOf(' ');
  if (split === -1) {
    const day = parseDay(normalized, today);
    return day ? atTime(day, DEFAULT_TIME) : null;
  }

  const day = parseDay(normalized.slice(0, split), today);
  const timeOfDay = parseTime(normalized.slice(split + 1));
  return day && timeOfDay ? atTime(day, timeOfDay) : null;
}
