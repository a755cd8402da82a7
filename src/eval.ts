// Evaluator — backward search for the latest wall-clock time matching a spec.

import { Temporal } from "@js-temporal/polyfill";
import { FieldSet } from "./fieldset.js";
import type { CalendarSpec } from "./schedule.js";

export type CalendarUnit = "year" | "month" | "day" | "hour" | "minute" | "second";

/** Wall-clock fields of a candidate timestamp. */
export type DateTimeFields = Record<CalendarUnit, number>;

// =============================================================================
// Decrement With Carry
// =============================================================================
// The search keeps a candidate tuple and lowers it until every field is in its
// set. A field that is not in its set drops to the greatest member below it;
// all smaller fields then go to their ceiling (23:59:59 and so on), so the
// candidate stays the latest time at or before the one we started from.
//
// When a field has no member at or below its value, the next larger field is
// decremented (a "borrow") and the scan restarts from the year. Day 31 is used
// as the ceiling for every month and clamped to the month's length when the
// day field is resolved.
//
// Every restart leaves the candidate strictly smaller, and the year set has a
// floor of 1970, so the loop always terminates.
// =============================================================================

const UNITS: readonly CalendarUnit[] = ["year", "month", "day", "hour", "minute", "second"];

const FLOOR: Record<CalendarUnit, number> = {
  year: Number.NEGATIVE_INFINITY,
  month: 1,
  day: 1,
  hour: 0,
  minute: 0,
  second: 0,
};

const CEILING: Record<CalendarUnit, number> = {
  year: Number.POSITIVE_INFINITY,
  month: 12,
  day: 31,
  hour: 23,
  minute: 59,
  second: 59,
};

/** Set every unit smaller than `unit` to its ceiling. */
function fillBelow(c: DateTimeFields, unit: CalendarUnit): void {
  for (let i = UNITS.indexOf(unit) + 1; i < UNITS.length; i++) {
    c[UNITS[i]] = CEILING[UNITS[i]];
  }
}

/** Decrement `unit` by one, carrying into larger units. */
function borrow(c: DateTimeFields, unit: CalendarUnit): void {
  fillBelow(c, unit);
  for (let i = UNITS.indexOf(unit); i >= 0; i--) {
    const u = UNITS[i];
    c[u]--;
    if (c[u] >= FLOOR[u]) return;
    c[u] = CEILING[u];
  }
}

/** The wall-clock time one second before `fields`. */
export function stepBack(fields: DateTimeFields): DateTimeFields {
  const c = { ...fields };
  c.second--;
  if (c.second < 0) borrow(c, "minute");
  if (c.day > daysInMonth(c.year, c.month)) c.day = daysInMonth(c.year, c.month);
  return c;
}

// --- Calendar helpers ---

export function daysInMonth(year: number, month: number): number {
  return Temporal.PlainDate.from({ year, month, day: 1 }).daysInMonth;
}

/** Weekday of a date, Monday = 0. */
export function weekdayOf(year: number, month: number, day: number): number {
  return Temporal.PlainDate.from({ year, month, day }).dayOfWeek - 1;
}

const resolvedDays = new WeakMap<FieldSet, Map<number, FieldSet>>();

/**
 * Concrete days of a month with `length` days: positive days that exist,
 * plus `length + v + 1` for every count-from-end day `v`.
 */
export function resolveDays(days: FieldSet, length: number): FieldSet {
  let byLength = resolvedDays.get(days);
  if (!byLength) {
    byLength = new Map();
    resolvedDays.set(days, byLength);
  }
  const cached = byLength.get(length);
  if (cached) return cached;

  const concrete: number[] = [];
  for (const v of days.toArray()) {
    if (v > 0 && v <= length) concrete.push(v);
    if (v < 0) concrete.push(length + v + 1);
  }
  const resolved = FieldSet.of(1, 31, concrete);
  byLength.set(length, resolved);
  return resolved;
}

// --- Search ---

/**
 * The latest wall-clock time at or before `from` that satisfies every field
 * of `spec`, or null when there is none in or after 1970.
 */
export function previousMatch(spec: CalendarSpec, from: DateTimeFields): DateTimeFields | null {
  const c = { ...from };
  for (;;) {
    const year = spec.years.floor(c.year);
    if (year === null) return null;
    if (year !== c.year) {
      c.year = year;
      fillBelow(c, "year");
    }

    const month = spec.months.floor(c.month);
    if (month === null) {
      borrow(c, "year");
      continue;
    }
    if (month !== c.month) {
      c.month = month;
      fillBelow(c, "month");
    }

    const length = daysInMonth(c.year, c.month);
    const day = resolveDays(spec.days, length).floor(Math.min(c.day, length));
    if (day === null) {
      borrow(c, "month");
      continue;
    }
    if (day !== c.day) {
      c.day = day;
      fillBelow(c, "day");
    }

    // Weekday only moves with the date.
    if (!spec.weekdays.has(weekdayOf(c.year, c.month, c.day))) {
      borrow(c, "day");
      continue;
    }

    const hour = spec.hours.floor(c.hour);
    if (hour === null) {
      borrow(c, "day");
      continue;
    }
    if (hour !== c.hour) {
      c.hour = hour;
      fillBelow(c, "hour");
    }

    const minute = spec.minutes.floor(c.minute);
    if (minute === null) {
      borrow(c, "hour");
      continue;
    }
    if (minute !== c.minute) {
      c.minute = minute;
      fillBelow(c, "minute");
    }

    const second = spec.seconds.floor(c.second);
    if (second === null) {
      borrow(c, "minute");
      continue;
    }
    c.second = second;
    return c;
  }
}

/** Whether wall-clock `fields` satisfy every field of `spec`. */
export function matchesFields(spec: CalendarSpec, fields: DateTimeFields): boolean {
  const { year, month, day } = fields;
  return (
    spec.years.has(year) &&
    spec.months.has(month) &&
    resolveDays(spec.days, daysInMonth(year, month)).has(day) &&
    spec.weekdays.has(weekdayOf(year, month, day)) &&
    spec.hours.has(fields.hour) &&
    spec.minutes.has(fields.minute) &&
    spec.seconds.has(fields.second)
  );
}
