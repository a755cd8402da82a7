// Expression parser — splits an expression into weekday, date and time
// components and assembles a CalendarSpec from their fields.

import { CalendarError } from "./error.js";
import type { FieldToken } from "./field.js";
import { parseField, parseReverseDays, parseWeekdays } from "./field.js";
import type { CalendarSpec } from "./schedule.js";
import { SHORTHANDS, newCalendarSpec, singleton } from "./schedule.js";

export type ComponentRole = "weekday" | "date" | "time";

export type Component =
  | { type: ComponentRole; token: FieldToken }
  | { type: "unrecognized"; token: FieldToken };

const MAX_COMPONENTS = 3;

/**
 * Decide what a whitespace-separated component is from its shape alone.
 *
 * Anything without date or time separators is taken for a weekday list, so
 * `*` or a bare number is reported as a bad day-of-week rather than as an
 * unknown component.
 */
export function classify(token: FieldToken): Component {
  const text = token.text;
  const hasTime = text.includes(":");
  const hasDate = text.includes("-") || text.includes("~");
  if (hasTime && hasDate) return { type: "unrecognized", token };
  if (hasTime) return { type: "time", token };
  if (/^[a-z]/i.test(text)) return { type: "weekday", token };
  if (hasDate) return { type: "date", token };
  return { type: "weekday", token };
}

/** Split a token on `separator`, keeping each part's absolute offset. */
function splitToken(token: FieldToken, separator: string): FieldToken[] {
  const out: FieldToken[] = [];
  let offset = token.offset;
  for (const text of token.text.split(separator)) {
    out.push({ text, offset });
    offset += text.length + separator.length;
  }
  return out;
}

function spanOf(token: FieldToken) {
  return { start: token.offset, end: token.offset + token.text.length };
}

function badShape(message: string, token: FieldToken, input: string): CalendarError {
  return CalendarError.fieldCount(message, spanOf(token), input);
}

/** Two-digit years pivot on 1970: 00..69 are 2000..2069, 70..99 are 1970..1999. */
export function expandYear(value: number): number {
  if (value >= 100) return value;
  return value < 70 ? 2000 + value : 1900 + value;
}

function parseYear(token: FieldToken, input: string) {
  if (/^\d{1,2}$/.test(token.text)) {
    const year = expandYear(Number(token.text));
    return parseField("year", { text: String(year), offset: token.offset }, input);
  }
  return parseField("year", token, input);
}

type DateFields = Pick<CalendarSpec, "years" | "months" | "days">;
type TimeFields = Pick<CalendarSpec, "hours" | "minutes" | "seconds">;

function parseDate(token: FieldToken, input: string): DateFields {
  const defaults = newCalendarSpec();
  const tilde = token.text.indexOf("~");

  if (tilde !== -1) {
    const head = splitToken({ text: token.text.slice(0, tilde), offset: token.offset }, "-");
    if (head.length > 2) {
      throw badShape(`Wrong number of fields in date '${token.text}'`, token, input);
    }
    const day = { text: token.text.slice(tilde + 1), offset: token.offset + tilde + 1 };
    const month = head[head.length - 1];
    return {
      years: head.length === 2 ? parseYear(head[0], input) : defaults.years,
      months: parseField("month", month, input),
      days: parseReverseDays(day, input),
    };
  }

  const parts = splitToken(token, "-");
  if (parts.length < 2 || parts.length > 3) {
    throw badShape(`Wrong number of fields in date '${token.text}'`, token, input);
  }
  const [day, month] = [parts[parts.length - 1], parts[parts.length - 2]];
  return {
    years: parts.length === 3 ? parseYear(parts[0], input) : defaults.years,
    months: parseField("month", month, input),
    days: parseField("day", day, input),
  };
}

function parseTime(token: FieldToken, input: string): TimeFields {
  const parts = splitToken(token, ":");
  if (parts.length < 2 || parts.length > 3) {
    throw badShape(`Wrong number of fields in time '${token.text}'`, token, input);
  }
  return {
    hours: parseField("hour", parts[0], input),
    minutes: parseField("minute", parts[1], input),
    seconds: parts.length === 3 ? parseField("second", parts[2], input) : singleton("second", 0),
  };
}

function parseWeekdayComponent(token: FieldToken, input: string) {
  // "Mon, 12:00": the weekday list may end with a comma
  const text = token.text.endsWith(",") ? token.text.slice(0, -1) : token.text;
  return parseWeekdays({ text, offset: token.offset }, input);
}

/** Parse a calendar expression into its specification. */
export function parse(input: string): CalendarSpec {
  const expansion = SHORTHANDS.get(input.trim().toLowerCase());
  if (expansion !== undefined) {
    return parse(expansion);
  }

  const tokens: FieldToken[] = [];
  for (const m of input.matchAll(/\S+/g)) {
    tokens.push({ text: m[0], offset: m.index ?? 0 });
  }
  if (tokens.length === 0) {
    throw CalendarError.fieldCount(
      "Wrong number of fields: expected 1 to 3, got 0",
      { start: 0, end: input.length },
      input,
    );
  }
  if (tokens.length > MAX_COMPONENTS) {
    const extra = tokens[MAX_COMPONENTS];
    throw CalendarError.fieldCount(
      `Wrong number of fields: expected at most ${MAX_COMPONENTS}, got ${tokens.length}`,
      { start: extra.offset, end: input.trimEnd().length },
      input,
    );
  }

  const roles = new Map<ComponentRole, FieldToken>();
  for (const token of tokens) {
    const component = classify(token);
    if (component.type === "unrecognized") {
      throw badShape(`Unrecognized component '${token.text}'`, token, input);
    }
    if (roles.has(component.type)) {
      const message = `Wrong number of fields: more than one ${component.type} component`;
      throw badShape(message, token, input);
    }
    roles.set(component.type, token);
  }

  let spec = newCalendarSpec();
  const weekday = roles.get("weekday");
  if (weekday) {
    spec = { ...spec, weekdays: parseWeekdayComponent(weekday, input) };
  }
  const date = roles.get("date");
  if (date) {
    spec = { ...spec, ...parseDate(date, input) };
  }
  const time = roles.get("time");
  if (time) {
    spec = { ...spec, ...parseTime(time, input) };
  }
  return spec;
}
