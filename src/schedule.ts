// Calendar specification types, field domains and name tables.

import { FieldSet } from "./fieldset.js";

export type CalendarField = "weekday" | "year" | "month" | "day" | "hour" | "minute" | "second";

export type NumericField = Exclude<CalendarField, "weekday">;

/** A parsed calendar expression. Weekdays count from Monday = 0. */
export interface CalendarSpec {
  readonly weekdays: FieldSet;
  readonly years: FieldSet;
  readonly months: FieldSet;
  /** Positive days of month, and negative days counted from month end (-1 = last). */
  readonly days: FieldSet;
  readonly hours: FieldSet;
  readonly minutes: FieldSet;
  readonly seconds: FieldSet;
}

export const MIN_YEAR = 1970;
export const MAX_YEAR = 2200;

/** Largest count-from-end magnitude: every month has at least 28 days. */
export const MAX_REVERSE_DAY = 28;

export const FIELD_BOUNDS: Record<NumericField, { min: number; max: number }> = {
  year: { min: MIN_YEAR, max: MAX_YEAR },
  month: { min: 1, max: 12 },
  day: { min: 1, max: 31 },
  hour: { min: 0, max: 23 },
  minute: { min: 0, max: 59 },
  second: { min: 0, max: 59 },
};

export const FIELD_LABELS: Record<CalendarField, string> = {
  weekday: "day-of-week",
  year: "year",
  month: "month",
  day: "day-of-month",
  hour: "hour",
  minute: "minute",
  second: "second",
};

export const WEEKDAY_ABBREVIATIONS = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"] as const;

/** Weekday number (Monday = 0) for a 3-letter or full name, any case. */
export function parseWeekdayName(s: string): number | null {
  return WEEKDAY_NAMES.get(s.toLowerCase()) ?? null;
}

const WEEKDAY_NAMES = new Map<string, number>([
  ["monday", 0],
  ["mon", 0],
  ["tuesday", 1],
  ["tue", 1],
  ["wednesday", 2],
  ["wed", 2],
  ["thursday", 3],
  ["thu", 3],
  ["friday", 4],
  ["fri", 4],
  ["saturday", 5],
  ["sat", 5],
  ["sunday", 6],
  ["sun", 6],
]);

/** Named expressions and the canonical expression each stands for. */
export const SHORTHANDS: ReadonlyMap<string, string> = new Map([
  ["minutely", "*-*-* *:*:00"],
  ["hourly", "*-*-* *:00:00"],
  ["daily", "*-*-* 00:00:00"],
  ["weekly", "Mon *-*-* 00:00:00"],
  ["monthly", "*-*-01 00:00:00"],
  ["quarterly", "*-01,04,07,10-01 00:00:00"],
  ["semiannually", "*-01,07-01 00:00:00"],
  ["yearly", "*-01-01 00:00:00"],
  ["annually", "*-01-01 00:00:00"],
]);

/** Domain of the days field: count-from-end values below zero, calendar days above. */
export const DAYS_DOMAIN = { min: -MAX_REVERSE_DAY, max: 31 } as const;

export const ALL_WEEKDAYS = FieldSet.range(0, 6);

export function fullField(field: NumericField): FieldSet {
  const { min, max } = FIELD_BOUNDS[field];
  return FieldSet.range(min, max);
}

export function singleton(field: NumericField, value: number): FieldSet {
  const { min, max } = FIELD_BOUNDS[field];
  return FieldSet.of(min, max, [value]);
}

/** Defaults for every omitted component: any date, at midnight. */
export function newCalendarSpec(): CalendarSpec {
  return {
    weekdays: ALL_WEEKDAYS,
    years: fullField("year"),
    months: fullField("month"),
    days: FieldSet.of(DAYS_DOMAIN.min, DAYS_DOMAIN.max, FieldSet.range(1, 31).toArray()),
    hours: singleton("hour", 0),
    minutes: singleton("minute", 0),
    seconds: singleton("second", 0),
  };
}
