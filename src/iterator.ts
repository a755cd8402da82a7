// Backward iterator — pulls matching timestamps one at a time, newest first.

import { Temporal } from "@js-temporal/polyfill";
import type { DateTimeFields } from "./eval.js";
import { previousMatch, stepBack } from "./eval.js";
import { parse } from "./parser.js";
import type { CalendarSpec } from "./schedule.js";

type ZDT = Temporal.ZonedDateTime;
type PDT = Temporal.PlainDateTime;

/** A start instant: zoned, or plain wall-clock time with no zone. */
export type DateTimeLike = ZDT | PDT;

/** An iterator whose result type is only known at run time. */
export type EitherIterator = BackwardIterator<ZDT> | BackwardIterator<PDT>;

/** How wall-clock fields map to and from one kind of timestamp. */
interface Clock<T extends DateTimeLike> {
  fieldsOf(t: T): DateTimeFields;
  /** The timestamp for `fields`, or null if that wall-clock time does not exist. */
  localize(fields: DateTimeFields): T | null;
  compare(a: T, b: T): number;
}

/** Wall-clock fields of `t` on the ISO calendar, whichever calendar `t` carries. */
export function wallClock(t: DateTimeLike): DateTimeFields {
  const iso = t.withCalendar("iso8601");
  return {
    year: iso.year,
    month: iso.month,
    day: iso.day,
    hour: iso.hour,
    minute: iso.minute,
    second: iso.second,
  };
}

function sameWallClock(t: DateTimeLike, fields: DateTimeFields): boolean {
  return (
    t.year === fields.year &&
    t.month === fields.month &&
    t.day === fields.day &&
    t.hour === fields.hour &&
    t.minute === fields.minute &&
    t.second === fields.second
  );
}

// =============================================================================
// DST Handling
// =============================================================================
// Candidates are found on the wall clock of the start's time zone and then
// resolved to an instant with "compatible" disambiguation:
//
// 1. Gap (spring forward): the wall-clock time does not exist. Temporal would
//    push it past the gap; the candidate is skipped instead, since the
//    pushed time is a different wall-clock time the search reaches on its own.
// 2. Fold (fall back): the wall-clock time exists twice; the earlier instant
//    is used.
//
// Consecutive results may carry different UTC offsets.
// =============================================================================

function zonedClock(timeZone: string, calendar: string): Clock<ZDT> {
  return {
    fieldsOf: wallClock,
    localize(fields) {
      const pdt = Temporal.PlainDateTime.from(fields);
      const zdt = pdt.toZonedDateTime(timeZone, { disambiguation: "compatible" });
      return sameWallClock(zdt, fields) ? zdt.withCalendar(calendar) : null;
    },
    compare: Temporal.ZonedDateTime.compare,
  };
}

function plainClock(calendar: string): Clock<PDT> {
  return {
    fieldsOf: wallClock,
    localize: (fields) => Temporal.PlainDateTime.from(fields).withCalendar(calendar),
    compare: Temporal.PlainDateTime.compare,
  };
}

/**
 * Lazily produces every timestamp matching a calendar spec, strictly
 * decreasing, starting strictly before the start instant.
 *
 * Results keep the start's type: a `ZonedDateTime` start yields
 * `ZonedDateTime`s in the same zone, a `PlainDateTime` start yields
 * `PlainDateTime`s. Fields are matched on the ISO calendar and results carry
 * the start's calendar. Once no match is left at or after 1970 the iterator
 * is exhausted for good.
 */
export class BackwardIterator<T extends DateTimeLike> implements Iterable<T> {
  readonly spec: CalendarSpec;
  private readonly clock: Clock<T>;
  private cursor: DateTimeFields | null;
  private bound: T;

  private constructor(spec: CalendarSpec, start: T, clock: Clock<T>) {
    this.spec = spec;
    this.clock = clock;
    // Sub-second parts are dropped; a match equal to `start` is rejected by the bound.
    this.cursor = clock.fieldsOf(start);
    this.bound = start;
  }

  /** Parse `expression` and iterate backward from `start`. */
  static from(expression: string, start: ZDT): BackwardIterator<ZDT>;
  static from(expression: string, start: PDT): BackwardIterator<PDT>;
  static from(expression: string, start: DateTimeLike): EitherIterator;
  static from(expression: string, start: DateTimeLike): EitherIterator {
    return BackwardIterator.over(parse(expression), start);
  }

  /** Iterate an already parsed spec backward from `start`. */
  static over(spec: CalendarSpec, start: ZDT): BackwardIterator<ZDT>;
  static over(spec: CalendarSpec, start: PDT): BackwardIterator<PDT>;
  static over(spec: CalendarSpec, start: DateTimeLike): EitherIterator;
  static over(spec: CalendarSpec, start: DateTimeLike): EitherIterator {
    if (start instanceof Temporal.ZonedDateTime) {
      return new BackwardIterator(spec, start, zonedClock(start.timeZoneId, start.calendarId));
    }
    return new BackwardIterator(spec, start, plainClock(start.calendarId));
  }

  /** True once `produceNext` has returned null. */
  get exhausted(): boolean {
    return this.cursor === null;
  }

  /** The next older match, or null when exhausted. */
  produceNext(): T | null {
    while (this.cursor !== null) {
      const fields = previousMatch(this.spec, this.cursor);
      if (fields === null) {
        this.cursor = null;
        break;
      }
      this.cursor = stepBack(fields);

      const candidate = this.clock.localize(fields);
      if (candidate === null) continue;
      if (this.clock.compare(candidate, this.bound) >= 0) continue;

      this.bound = candidate;
      return candidate;
    }
    return null;
  }

  /** Up to `n` further matches. */
  take(n: number): T[] {
    const out: T[] = [];
    while (out.length < n) {
      const next = this.produceNext();
      if (next === null) break;
      out.push(next);
    }
    return out;
  }

  next(): IteratorResult<T, undefined> {
    const value = this.produceNext();
    if (value === null) return { done: true, value: undefined };
    return { done: false, value };
  }

  [Symbol.iterator](): Iterator<T> {
    return this;
  }
}
