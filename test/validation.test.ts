import { describe, expect, it } from "vitest";
import { CalendarError } from "../src/error.js";
import { parse } from "../src/parser.js";

function parseError(input: string): CalendarError {
  try {
    parse(input);
  } catch (e) {
    if (e instanceof CalendarError) return e;
    throw e;
  }
  throw new Error(`expected '${input}' to be rejected`);
}

// =============================================================================
// Field Count
// =============================================================================

describe("field count", () => {
  it("rejects empty string", () => {
    const err = parseError("");
    expect(err.kind).toBe("fieldCount");
    expect(err.message).toBe("Wrong number of fields: expected 1 to 3, got 0");
  });

  it("rejects blank string", () => {
    expect(parseError("   ").message).toMatch(/^Wrong number of fields/);
  });

  it("rejects 4 components", () => {
    const err = parseError("Mon *-*-* *:*:* surprise");
    expect(err.kind).toBe("fieldCount");
    expect(err.message).toBe("Wrong number of fields: expected at most 3, got 4");
    expect(err.span).toEqual({ start: 16, end: 24 });
  });

  it("rejects two components of one role", () => {
    const err = parseError("Mon 2020-01-01 Tue");
    expect(err.kind).toBe("fieldCount");
    expect(err.message).toBe("Wrong number of fields: more than one weekday component");
    expect(err.span).toEqual({ start: 15, end: 18 });
    expect(parseError("1:00 2:00").message).toMatch(/more than one time/);
  });

  it("rejects a component of no known shape", () => {
    const err = parseError("2020-01-01T00:00");
    expect(err.kind).toBe("fieldCount");
    expect(err.message).toBe("Unrecognized component '2020-01-01T00:00'");
  });

  it("rejects dates and times with too many parts", () => {
    expect(parseError("1-1-1-1").message).toBe("Wrong number of fields in date '1-1-1-1'");
    expect(parseError("1:1:1:1").message).toBe("Wrong number of fields in time '1:1:1:1'");
    expect(parseError("1-1-1~1").kind).toBe("fieldCount");
  });
});

// =============================================================================
// Bad Values
// =============================================================================

describe("bad values", () => {
  const patterns = [
    "%s *-*-* *:*:*",
    "%s-*-*",
    "*-%s-*",
    "*-*-%s",
    "*-*~%s",
    "%s:*:*",
    "*:%s:*",
    "*:*:%s",
  ];
  const badValues = ["-1", "1000", "ABC", "1-1", "1:1", "Mon/1", "~1", "*/1", "*,1", "1..*"];

  for (const pattern of patterns) {
    for (const value of badValues) {
      const input = pattern.replace("%s", value);
      it(`rejects '${input}'`, () => {
        expect(() => parse(input)).toThrow(CalendarError);
      });
    }
  }
});

describe("field errors", () => {
  it("rejects lopsided range", () => {
    const err = parseError("*-*-5..1");
    expect(err.kind).toBe("badField");
    expect(err.field).toBe("day");
    expect(err.message).toBe("Bad day-of-month: range 5..1 runs backwards");
  });

  it("rejects underscores", () => {
    const err = parseError("*:1..1_0");
    expect(err.field).toBe("minute");
    expect(err.message).toBe("Bad minute: malformed value '1..1_0'");
    expect(err.span).toEqual({ start: 2, end: 8 });
  });

  it("rejects zero step", () => {
    expect(parseError("*:*/0").message).toMatch(/^Bad minute/);
    expect(parseError("*:0/0").message).toBe("Bad minute: step must be a positive integer");
  });

  it("checks day of month range", () => {
    expect(parseError("1-32").message).toBe("Bad day-of-month: 32 is outside 1..31");
  });

  it("rejects weekday star", () => {
    const err = parseError("* 1-1");
    expect(err.field).toBe("weekday");
    expect(err.message).toBe("Bad day-of-week: expected a weekday name, got '*'");
  });

  it("rejects weekday numbers, steps and unknown names", () => {
    expect(parseError("1 12:00").message).toMatch(/^Bad day-of-week/);
    expect(parseError("Mon/1").message).toMatch(/^Bad day-of-week/);
    expect(parseError("Mon,Funday").message).toBe("Bad day-of-week: unknown weekday 'Funday'");
    expect(parseError("Fri..Mon").message).toBe("Bad day-of-week: range 'Fri..Mon' runs backwards");
  });

  it("rejects reverse day of month above 28", () => {
    expect(parseError("1~29").message).toBe("Bad day-of-month: 29 is outside 1..28");
    expect(parse("1~28").days.toArray()).toEqual([-28]);
  });

  it("rejects years outside 1970..2200", () => {
    expect(parseError("1969-01-01").message).toBe("Bad year: 1969 is outside 1970..2200");
    expect(parseError("2201-01-01").field).toBe("year");
  });

  it("rejects out of range time fields", () => {
    expect(parseError("24:00").field).toBe("hour");
    expect(parseError("0:60").field).toBe("minute");
    expect(parseError("0:0:60").field).toBe("second");
    expect(parseError("*-13-01").field).toBe("month");
  });

  it("rejects empty list items", () => {
    expect(parseError("*:1,,2").message).toBe("Bad minute: malformed value ''");
    expect(parseError("Mon,,Tue").field).toBe("weekday");
  });
});

// =============================================================================
// Rich Display
// =============================================================================

describe("displayRich", () => {
  it("underlines the offending value", () => {
    expect(parseError("*:1..1_0").displayRich()).toBe(
      "error: Bad minute: malformed value '1..1_0'\n  *:1..1_0\n    ^^^^^^",
    );
  });

  it("points into later components", () => {
    expect(parseError("Mon 2020-13-01").displayRich()).toBe(
      "error: Bad month: 13 is outside 1..12\n  Mon 2020-13-01\n           ^^",
    );
  });

  it("falls back to the message without a span", () => {
    expect(new CalendarError("fieldCount", "boom").displayRich()).toBe("error: boom");
  });
});
