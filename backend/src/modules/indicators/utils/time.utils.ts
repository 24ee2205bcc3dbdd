/**
 * UTC calendar helpers. All series timestamps are UTC midnights.
 */

import { UTCDate } from '@date-fns/utc';
import { addMonths, differenceInCalendarDays, format, startOfMonth } from 'date-fns';

export const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_DAY = /^(\d{4})-(\d{1,2})(?:-(\d{1,2}))?(?:$|[T\s])/;
const US_DAY = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function utcDay(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const d = new Date(Date.UTC(year, month - 1, day));
  // rejects 2024-02-31 and friends
  if (d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return d;
}

/**
 * Parse a date cell to its UTC calendar day.
 * Accepts YYYY-MM-DD (optionally with a time part), YYYY-MM and M/D/YYYY.
 */
export function parseDay(raw: string | undefined): Date | null {
  if (!raw) return null;
  const text = raw.trim();

  const iso = ISO_DAY.exec(text);
  if (iso) {
    return utcDay(Number(iso[1]), Number(iso[2]), iso[3] ? Number(iso[3]) : 1);
  }

  const us = US_DAY.exec(text);
  if (us) {
    return utcDay(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  return null;
}

export function monthStartUtc(d: Date): Date {
  return new Date(startOfMonth(new UTCDate(d.getTime())).getTime());
}

export function addMonthsUtc(d: Date, months: number): Date {
  return new Date(addMonths(new UTCDate(d.getTime()), months).getTime());
}

export function daysBetween(from: Date, to: Date): number {
  return differenceInCalendarDays(new UTCDate(to.getTime()), new UTCDate(from.getTime()));
}

export function formatDay(d: Date): string {
  return format(new UTCDate(d.getTime()), 'yyyy-MM-dd');
}

export function monthKey(d: Date): string {
  return format(new UTCDate(d.getTime()), 'yyyy-MM');
}

/**
 * "Apr 01, 2024"
 */
export function formatDisplayDay(d: Date): string {
  return format(new UTCDate(d.getTime()), 'MMM dd, yyyy');
}
