// oncal — Public API

import type { Temporal } from "@js-temporal/polyfill";
import { display } from "./display.js";
import { matchesFields } from "./eval.js";
import type { DateTimeLike, EitherIterator } from "./iterator.js";
import { BackwardIterator, wallClock } from "./iterator.js";
import { parse } from "./parser.js";
import type { CalendarSpec } from "./schedule.js";

type ZDT = Temporal.ZonedDateTime;
type PDT = Temporal.PlainDateTime;

export class CalendarEvent {
  readonly spec: CalendarSpec;

  private constructor(spec: CalendarSpec) {
    this.spec = spec;
  }

  /** Parse a calendar expression such as `Mon..Fri *-*-* 09:00`. */
  static parse(input: string): CalendarEvent {
    return new CalendarEvent(parse(input));
  }

  /** Check if an input string is a valid calendar expression. */
  static validate(input: string): boolean {
    try {
      parse(input);
      return true;
    } catch {
      return false;
    }
  }

  /** Check if a timestamp (on whole seconds) matches this event. */
  matches(datetime: DateTimeLike): boolean {
    if (datetime.millisecond !== 0 || datetime.microsecond !== 0 || datetime.nanosecond !== 0) {
      return false;
    }
    return matchesFields(this.spec, wallClock(datetime));
  }

  /** A lazy iterator over occurrences strictly before `start`, newest first. */
  backwardFrom(start: ZDT): BackwardIterator<ZDT>;
  backwardFrom(start: PDT): BackwardIterator<PDT>;
  backwardFrom(start: DateTimeLike): EitherIterator {
    return BackwardIterator.over(this.spec, start);
  }

  /** The most recent occurrence strictly before `start`. */
  previousFrom(start: ZDT): ZDT | null;
  previousFrom(start: PDT): PDT | null;
  previousFrom(start: DateTimeLike): DateTimeLike | null {
    return BackwardIterator.over(this.spec, start).produceNext();
  }

  /** The `n` most recent occurrences before `start`, newest first. */
  previousNFrom(start: ZDT, n: number): ZDT[];
  previousNFrom(start: PDT, n: number): PDT[];
  previousNFrom(start: DateTimeLike, n: number): DateTimeLike[] {
    return BackwardIterator.over(this.spec, start).take(n);
  }

  /** Render as canonical string (roundtrip-safe). */
  toString(): string {
    return display(this.spec);
  }
}

export { Temporal } from "@js-temporal/polyfill";
export type { DateTimeFields } from "./eval.js";
export type { CalendarErrorKind, Span } from "./error.js";
export type { DateTimeLike, EitherIterator } from "./iterator.js";
export type { CalendarField, CalendarSpec } from "./schedule.js";
// Re-exports
export { CalendarError } from "./error.js";
export { FieldSet } from "./fieldset.js";
export { BackwardIterator } from "./iterator.js";
export { parse } from "./parser.js";
