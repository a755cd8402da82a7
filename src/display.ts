// Canonical rendering of calendar specs; the output parses back to an equal spec.

import type { FieldSet } from "./fieldset.js";
import type { CalendarSpec } from "./schedule.js";
import { MAX_REVERSE_DAY, WEEKDAY_ABBREVIATIONS } from "./schedule.js";

/** Render a spec as its canonical expression: `[weekdays ]date time`. */
export function display(spec: CalendarSpec): string {
  const parts: string[] = [];
  if (spec.weekdays.size < 7) {
    parts.push(formatWeekdays(spec.weekdays));
  }
  parts.push(displayDate(spec));
  parts.push(
    [spec.hours, spec.minutes, spec.seconds]
      .map((set) => formatValues(set.toArray(), set.max - set.min + 1, 2))
      .join(":"),
  );
  return parts.join(" ");
}

function displayDate(spec: CalendarSpec): string {
  const years = formatValues(spec.years.toArray(), spec.years.max - spec.years.min + 1, 4);
  const months = formatValues(spec.months.toArray(), 12, 2);
  const days = spec.days.toArray();
  const fromEnd = days.filter((d) => d < 0);
  const calendar = days.filter((d) => d > 0);

  if (fromEnd.length > 0 && calendar.length > 0) {
    throw new Error("days mix calendar and count-from-end values");
  }
  if (fromEnd.length > 0) {
    const magnitudes = fromEnd.map((d) => -d).sort((a, b) => a - b);
    return `${years}-${months}~${formatValues(magnitudes, MAX_REVERSE_DAY, 2)}`;
  }
  return `${years}-${months}-${formatValues(calendar, 31, 2)}`;
}

/** Collapse ascending values into `a..b` runs; `*` when all `domainSize` values are present. */
function formatValues(values: number[], domainSize: number, width: number): string {
  if (values.length === domainSize) return "*";
  const pad = (n: number) => String(n).padStart(width, "0");
  return runs(values)
    .map(([start, end]) => (start === end ? pad(start) : `${pad(start)}..${pad(end)}`))
    .join(",");
}

function formatWeekdays(weekdays: FieldSet): string {
  return runs(weekdays.toArray())
    .map(([start, end]) => {
      const first = WEEKDAY_ABBREVIATIONS[start];
      return start === end ? first : `${first}..${WEEKDAY_ABBREVIATIONS[end]}`;
    })
    .join(",");
}

function runs(values: number[]): [number, number][] {
  const out: [number, number][] = [];
  for (const v of values) {
    const last = out[out.length - 1];
    if (last && last[1] === v - 1) {
      last[1] = v;
    } else {
      out.push([v, v]);
    }
  }
  return out;
}
