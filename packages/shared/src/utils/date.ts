import { addDays, differenceInCalendarDays, format, isAfter, isBefore, isValid, parse, subDays } from 'date-fns';

const SERVICE_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const SERVICE_DATE_FORMAT = 'yyyy-MM-dd';

export function isValidServiceDate(value: string): boolean {
  if (!SERVICE_DATE_RE.test(value)) return false;
  const parsed = parse(value, SERVICE_DATE_FORMAT, new Date(0));
  return isValid(parsed) && format(parsed, SERVICE_DATE_FORMAT) === value;
}

/**
 * Parse a yyyy-MM-dd service date into a local-midnight Date.
 */
export function parseServiceDate(value: string): Date {
  if (!isValidServiceDate(value)) {
    throw new Error(`Invalid service date "${value}". Expected yyyy-MM-dd.`);
  }
  return parse(value, SERVICE_DATE_FORMAT, new Date(0));
}

export function toServiceDate(date: Date): string {
  return format(date, SERVICE_DATE_FORMAT);
}

export function addServiceDays(serviceDate: string, days: number): string {
  return toServiceDate(addDays(parseServiceDate(serviceDate), days));
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseServiceDate(to), parseServiceDate(from));
}

/**
 * Check if a service date falls within a trailing window of `lookbackDays`
 * ending at `asOf`, both bounds inclusive.
 * E.g. isWithinLookback("2026-01-21", 30, "2026-02-20") is true.
 */
export function isWithinLookback(serviceDate: string, lookbackDays: number, asOf: string): boolean {
  const ref = parseServiceDate(asOf);
  const cutoff = subDays(ref, lookbackDays);
  const observed = parseServiceDate(serviceDate);
  return !isBefore(observed, cutoff) && !isAfter(observed, ref);
}

/** Compact yyyyMMdd form used on NCPDP DUR/PPS segments. */
export function toNcpdpDate(serviceDate: string): string {
  return format(parseServiceDate(serviceDate), 'yyyyMMdd');
}
