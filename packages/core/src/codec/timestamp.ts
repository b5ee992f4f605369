/**
 * Machine-readable deadline timestamps (RFC 3339) and the human-readable
 * local-time rendering used in listings.
 */

import { TimestampError } from '../errors.js';

const RFC3339_RE = /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function isLeapYear(y: number): boolean {
  return (y % 4 === 0 && y % 100 !== 0) || y % 400 === 0;
}

function daysInMonth(y: number, m: number): number {
  if (m === 2) return isLeapYear(y) ? 29 : 28;
  return [4, 6, 9, 11].includes(m) ? 30 : 31;
}

/** True when the instant is a valid date whose UTC year has four digits */
export function isEncodableTimestamp(d: Date): boolean {
  if (Number.isNaN(d.getTime())) return false;
  const year = d.getUTCFullYear();
  return year >= 0 && year <= 9999;
}

/**
 * Format an instant as RFC 3339 in UTC with a numeric offset,
 * e.g. `2025-03-17T22:00:00+00:00`. Milliseconds appear only when non-zero.
 */
export function formatTimestamp(d: Date): string {
  const date = `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
  const time = `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
  const ms = d.getUTCMilliseconds();
  const fraction = ms === 0 ? '' : `.${pad(ms, 3)}`;
  return `${date}T${time}${fraction}+00:00`;
}

/**
 * Parse an RFC 3339 timestamp with an explicit offset.
 * Fractional seconds beyond millisecond precision are truncated.
 *
 * @throws TimestampError when the input is malformed or a field is out of range
 */
export function parseTimestamp(input: string): Date {
  const m = RFC3339_RE.exec(input);
  if (!m) throw new TimestampError('input is not an RFC 3339 timestamp');

  const [, ys, mos, ds, hs, mis, ss, frac, offset] = m;
  const year = Number(ys);
  const month = Number(mos);
  const day = Number(ds);
  const hours = Number(hs);
  const minutes = Number(mis);
  const seconds = Number(ss);

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw new TimestampError('date is out of range');
  }
  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new TimestampError('time is out of range');
  }

  const ms = frac ? Number(`${frac.slice(1)}00`.slice(0, 3)) : 0;
  const offsetMinutes = parseOffset(offset ?? 'Z');

  // setUTCFullYear keeps years below 100 literal (Date.UTC maps them to 19xx)
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  d.setUTCHours(hours, minutes, seconds, ms);
  return new Date(d.getTime() - offsetMinutes * 60_000);
}

function parseOffset(offset: string): number {
  if (offset === 'Z' || offset === 'z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const hours = Number(offset.slice(1, 3));
  const minutes = Number(offset.slice(4, 6));
  if (hours > 23 || minutes > 59) throw new TimestampError('offset is out of range');
  return sign * (hours * 60 + minutes);
}

/** Render a deadline in local time as `MM/DD/YYYY HH:MM:SS`; empty when absent. */
export function formatDeadline(deadline: Date | null): string {
  if (!deadline) return '';
  const d = deadline;
  return `${pad(d.getMonth() + 1)}/${pad(d.getDate())}/${pad(d.getFullYear(), 4)} `
    + `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}
