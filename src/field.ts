// Field parser — turns one field token into a validated FieldSet.

import { CalendarError } from "./error.js";
import { FieldSet } from "./fieldset.js";
import type { CalendarField, NumericField } from "./schedule.js";
import {
  ALL_WEEKDAYS,
  DAYS_DOMAIN,
  FIELD_BOUNDS,
  MAX_REVERSE_DAY,
  parseWeekdayName,
} from "./schedule.js";

/** A slice of the input together with where it starts. */
export interface FieldToken {
  text: string;
  offset: number;
}

// value | value..value | value/step | value..value/step
const ITEM = /^(\d+)(?:\.\.(\d+))?(?:\/(\d+))?$/;
const WEEKDAY_ITEM = /^([a-z]+)(?:(?:\.\.|-)([a-z]+))?$/i;

class FieldReader {
  private field: CalendarField;
  private token: FieldToken;
  private input: string;

  constructor(field: CalendarField, token: FieldToken, input: string) {
    this.field = field;
    this.token = token;
    this.input = input;
  }

  error(reason: string, start = 0, end = this.token.text.length): CalendarError {
    const offset = this.token.offset;
    return CalendarError.badField(
      this.field,
      reason,
      { start: offset + start, end: offset + end },
      this.input,
    );
  }

  /** Split on commas, keeping each item's position within the token. */
  items(): FieldToken[] {
    const out: FieldToken[] = [];
    let pos = 0;
    for (const text of this.token.text.split(",")) {
      out.push({ text, offset: pos });
      pos += text.length + 1;
    }
    return out;
  }

  /**
   * Expand numeric items within `[min, max]`. In reverse mode a bare
   * `start/step` counts down towards `min` instead of up towards `max`.
   */
  numbers(min: number, max: number, reverse: boolean): number[] {
    if (this.token.text === "*") {
      const all: number[] = [];
      for (let v = min; v <= max; v++) all.push(v);
      return all;
    }

    const values: number[] = [];
    for (const item of this.items()) {
      const at = item.offset;
      const until = item.offset + item.text.length;
      if (item.text.startsWith("*")) {
        throw this.error("'*' cannot take a step or be combined with other values", at, until);
      }
      const m = ITEM.exec(item.text);
      if (!m) {
        throw this.error(`malformed value '${item.text}'`, at, until);
      }

      const start = Number(m[1]);
      const end = m[2] === undefined ? null : Number(m[2]);
      const step = m[3] === undefined ? null : Number(m[3]);

      for (const v of end === null ? [start] : [start, end]) {
        if (v < min || v > max) {
          throw this.error(`${v} is outside ${min}..${max}`, at, until);
        }
      }
      if (end !== null && end < start) {
        throw this.error(`range ${start}..${end} runs backwards`, at, until);
      }
      if (step !== null && step < 1) {
        throw this.error("step must be a positive integer", at, until);
      }

      if (step === null) {
        for (let v = start; v <= (end ?? start); v++) values.push(v);
      } else if (end === null && reverse) {
        for (let v = start; v >= min; v -= step) values.push(v);
      } else {
        for (let v = start; v <= (end ?? max); v += step) values.push(v);
      }
    }
    return values;
  }

  weekdays(): number[] {
    const values: number[] = [];
    for (const item of this.items()) {
      const at = item.offset;
      const until = item.offset + item.text.length;
      const m = WEEKDAY_ITEM.exec(item.text);
      if (!m) {
        throw this.error(`expected a weekday name, got '${item.text}'`, at, until);
      }
      const start = parseWeekdayName(m[1]);
      const end = m[2] === undefined ? start : parseWeekdayName(m[2]);
      if (start === null || end === null) {
        throw this.error(`unknown weekday '${item.text}'`, at, until);
      }
      if (end < start) {
        throw this.error(`range '${item.text}' runs backwards`, at, until);
      }
      for (let d = start; d <= end; d++) values.push(d);
    }
    return values;
  }
}

/** Parse a numeric field (year, month, day, hour, minute or second). */
export function parseField(field: NumericField, token: FieldToken, input: string): FieldSet {
  const { min, max } = FIELD_BOUNDS[field];
  const values = new FieldReader(field, token, input).numbers(min, max, false);
  if (field === "day") {
    return FieldSet.of(DAYS_DOMAIN.min, DAYS_DOMAIN.max, values);
  }
  return FieldSet.of(min, max, values);
}

/** Parse the day field of a `month~day` date: days counted back from month end. */
export function parseReverseDays(token: FieldToken, input: string): FieldSet {
  const magnitudes = new FieldReader("day", token, input).numbers(1, MAX_REVERSE_DAY, true);
  return FieldSet.of(DAYS_DOMAIN.min, DAYS_DOMAIN.max, magnitudes.map((v) => -v));
}

/** Parse a weekday list such as `Mon,Wed..Fri`. */
export function parseWeekdays(token: FieldToken, input: string): FieldSet {
  const values = new FieldReader("weekday", token, input).weekdays();
  return FieldSet.of(ALL_WEEKDAYS.min, ALL_WEEKDAYS.max, values);
}
