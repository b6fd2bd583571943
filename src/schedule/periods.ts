/**
 * Calendar periods used by scheduling and retention. All arithmetic is in
 * UTC so results do not depend on the host timezone.
 */

export type PeriodKind = "DAILY" | "WEEKLY" | "MONTHLY" | "YEARLY";

export interface PeriodSettings {
  /** 0 = Sunday … 6 = Saturday. */
  weekStart: number;
  /** Day of the year (1-366) each yearly period begins on. */
  yearlyBackupDay: number;
}

const DAY_MS = 86_400_000;

export function startOfUtcDay(d: Date): Date {
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
}

/** Midnight UTC of the most recent `weekStart` day on or before `d`. */
export function startOfWeek(d: Date, weekStart: number): Date {
  const day = startOfUtcDay(d);
  const offset = (day.getUTCDay() - weekStart + 7) % 7;
  return new Date(day.getTime() - offset * DAY_MS);
}

export function startOfMonth(d: Date): Date {
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), 1));
}

/**
 * Start of the yearly period containing `d`. Day 366 in a non-leap year
 * falls back to December 31.
 */
export function startOfYearlyPeriod(d: Date, yearlyBackupDay: number): Date {
  const year = d.getUTCFullYear();
  const thisYear = yearlyAnchor(year, yearlyBackupDay);
  return d.getTime() >= thisYear.getTime() ? thisYear : yearlyAnchor(year - 1, yearlyBackupDay);
}

export function periodStart(kind: PeriodKind, d: Date, settings: PeriodSettings): Date {
  switch (kind) {
    case "DAILY":
      return startOfUtcDay(d);
    case "WEEKLY":
      return startOfWeek(d, settings.weekStart);
    case "MONTHLY":
      return startOfMonth(d);
    case "YEARLY":
      return startOfYearlyPeriod(d, settings.yearlyBackupDay);
  }
}

/**
 * Start of the period `steps` periods before the one beginning at `start`.
 * `start` must itself be a period start for `kind`.
 */
export function shiftPeriodBack(kind: PeriodKind, start: Date, steps: number, settings: PeriodSettings): Date {
  switch (kind) {
    case "DAILY":
      return new Date(start.getTime() - steps * DAY_MS);
    case "WEEKLY":
      return new Date(start.getTime() - steps * 7 * DAY_MS);
    case "MONTHLY":
      return new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth() - steps, 1));
    case "YEARLY":
      return yearlyAnchor(start.getUTCFullYear() - steps, settings.yearlyBackupDay);
  }
}

/**
 * Deterministic identifier of the period containing `d`:
 * `2026-10-19` (day), `2026-10-19` (first day of the week), `2026-10`, `2026`.
 */
export function slotKey(kind: PeriodKind, d: Date, settings: PeriodSettings): string {
  const start = periodStart(kind, d, settings);
  const iso = start.toISOString();
  switch (kind) {
    case "DAILY":
    case "WEEKLY":
      return iso.slice(0, 10);
    case "MONTHLY":
      return iso.slice(0, 7);
    case "YEARLY":
      return iso.slice(0, 4);
  }
}

/** `YYYY-MM-DD` of a timestamp, in UTC. */
export function utcDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

function yearlyAnchor(year: number, dayOfYear: number): Date {
  const daysInYear = isLeapYear(year) ? 366 : 365;
  const day = Math.min(dayOfYear, daysInYear);
  return new Date(Date.UTC(year, 0, 1) + (day - 1) * DAY_MS);
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}
