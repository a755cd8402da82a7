import { describe, expect, it } from "vitest";
import type { DateTimeFields } from "../src/eval.js";
import {
  daysInMonth,
  matchesFields,
  previousMatch,
  resolveDays,
  stepBack,
  weekdayOf,
} from "../src/eval.js";
import { FieldSet } from "../src/fieldset.js";
import { parse } from "../src/parser.js";

function at(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): DateTimeFields {
  return { year, month, day, hour, minute, second };
}

describe("calendar helpers", () => {
  it("knows month lengths, leap years included", () => {
    expect(daysInMonth(2020, 2)).toBe(29);
    expect(daysInMonth(2019, 2)).toBe(28);
    expect(daysInMonth(2000, 2)).toBe(29);
    expect(daysInMonth(2100, 2)).toBe(28);
    expect(daysInMonth(2019, 4)).toBe(30);
    expect(daysInMonth(2019, 12)).toBe(31);
  });

  it("numbers weekdays from Monday", () => {
    expect(weekdayOf(2020, 1, 6)).toBe(0);
    expect(weekdayOf(2020, 1, 1)).toBe(2);
    expect(weekdayOf(2019, 12, 29)).toBe(6);
  });
});

describe("resolveDays", () => {
  const days = FieldSet.of(-28, 31, [-1, 30]);

  it("drops days past the month end and counts negatives back from it", () => {
    expect(resolveDays(days, 28).toArray()).toEqual([28]);
    expect(resolveDays(days, 29).toArray()).toEqual([29]);
    expect(resolveDays(days, 30).toArray()).toEqual([30]);
    expect(resolveDays(days, 31).toArray()).toEqual([30, 31]);
  });

  it("maps the last 28 days onto any month", () => {
    const lastFour = parse("*~1..4").days;
    expect(resolveDays(lastFour, 28).toArray()).toEqual([25, 26, 27, 28]);
    expect(resolveDays(lastFour, 31).toArray()).toEqual([28, 29, 30, 31]);
  });
});

describe("stepBack", () => {
  it("moves one second back within a minute", () => {
    expect(stepBack(at(2020, 3, 1, 12, 0, 30))).toEqual(at(2020, 3, 1, 12, 0, 29));
  });

  it("borrows across hour and day", () => {
    expect(stepBack(at(2020, 3, 1, 12))).toEqual(at(2020, 3, 1, 11, 59, 59));
  });

  it("lands on the last day of the previous month", () => {
    expect(stepBack(at(2020, 3, 1))).toEqual(at(2020, 2, 29, 23, 59, 59));
    expect(stepBack(at(2019, 5, 1))).toEqual(at(2019, 4, 30, 23, 59, 59));
  });

  it("borrows across the year", () => {
    expect(stepBack(at(2020, 1, 1))).toEqual(at(2019, 12, 31, 23, 59, 59));
  });
});

// =============================================================================
// previousMatch
// =============================================================================

describe("previousMatch", () => {
  it("returns the candidate itself when it matches", () => {
    expect(previousMatch(parse("*:*:*"), at(2020, 5, 5, 5, 5, 5))).toEqual(at(2020, 5, 5, 5, 5, 5));
  });

  it("lowers the second to the nearest step", () => {
    expect(previousMatch(parse("*:*:0/5"), at(2019, 12, 31, 23, 59, 59))).toEqual(
      at(2019, 12, 31, 23, 59, 55),
    );
  });

  it("borrows an hour when no minute is left", () => {
    expect(previousMatch(parse("*:30"), at(2020, 1, 1, 0, 15))).toEqual(at(2019, 12, 31, 23, 30));
  });

  it("borrows a day when no hour is left", () => {
    expect(previousMatch(parse("8..9:0:0"), at(2019, 1, 1, 7, 59, 59))).toEqual(
      at(2018, 12, 31, 9),
    );
  });

  it("resets smaller fields to their maximum when a field drops", () => {
    expect(previousMatch(parse("*-*-10 *:*:*"), at(2020, 6, 15, 3, 4, 5))).toEqual(
      at(2020, 6, 10, 23, 59, 59),
    );
  });

  it("moves the date until the weekday matches", () => {
    // 2020-01-01 is a Wednesday
    expect(previousMatch(parse("Fri"), at(2020, 1, 1))).toEqual(at(2019, 12, 27));
  });

  it("resolves count-from-end days per month", () => {
    expect(previousMatch(parse("*~1"), at(2020, 3, 15))).toEqual(at(2020, 2, 29));
    expect(previousMatch(parse("*~1"), at(2019, 3, 15))).toEqual(at(2019, 2, 28));
  });

  it("skips months too short for the day", () => {
    expect(previousMatch(parse("*-*-31"), at(2019, 7, 1))).toEqual(at(2019, 5, 31));
  });

  it("jumps straight to the latest allowed year", () => {
    expect(previousMatch(parse("2019-01-01"), at(2020, 6, 1))).toEqual(at(2019, 1, 1));
    expect(previousMatch(parse("*-12-31"), at(2300, 1, 1))).toEqual(at(2200, 12, 31));
  });

  it("returns null when the match would fall before 1970", () => {
    expect(previousMatch(parse("2021-01-01"), at(2020, 1, 1))).toBeNull();
    expect(previousMatch(parse("*:*:*"), at(1969, 12, 31, 23, 59, 59))).toBeNull();
    expect(previousMatch(parse("*-06-01"), at(1970, 5, 1))).toBeNull();
  });
});

describe("matchesFields", () => {
  it("checks every field including the weekday", () => {
    const spec = parse("Mon *-*-* 12:00");
    expect(matchesFields(spec, at(2020, 1, 6, 12))).toBe(true);
    expect(matchesFields(spec, at(2020, 1, 7, 12))).toBe(false);
    expect(matchesFields(spec, at(2020, 1, 6, 12, 0, 1))).toBe(false);
  });

  it("resolves count-from-end days for the month in question", () => {
    const spec = parse("*~1");
    expect(matchesFields(spec, at(2020, 2, 29))).toBe(true);
    expect(matchesFields(spec, at(2019, 2, 28))).toBe(true);
    expect(matchesFields(spec, at(2020, 2, 28))).toBe(false);
  });
});
