import type { CalendarField } from "./schedule.js";
import { FIELD_LABELS } from "./schedule.js";

/** Character range within the input string. */
export interface Span {
  start: number;
  end: number;
}

export type CalendarErrorKind = "fieldCount" | "badField";

/** All errors produced while parsing a calendar expression. */
export class CalendarError extends Error {
  readonly kind: CalendarErrorKind;
  readonly field?: CalendarField;
  readonly span?: Span;
  readonly input?: string;

  constructor(
    kind: CalendarErrorKind,
    message: string,
    field?: CalendarField,
    span?: Span,
    input?: string,
  ) {
    super(message);
    this.name = "CalendarError";
    this.kind = kind;
    this.field = field;
    this.span = span;
    this.input = input;
  }

  static fieldCount(message: string, span?: Span, input?: string): CalendarError {
    return new CalendarError("fieldCount", message, undefined, span, input);
  }

  static badField(field: CalendarField, reason: string, span: Span, input: string): CalendarError {
    const message = `Bad ${FIELD_LABELS[field]}: ${reason}`;
    return new CalendarError("badField", message, field, span, input);
  }

  displayRich(): string {
    if (this.span && this.input !== undefined) {
      let out = `error: ${this.message}\n`;
      out += `  ${this.input}\n`;
      const padding = " ".repeat(this.span.start + 2);
      const underline = "^".repeat(Math.max(this.span.end - this.span.start, 1));
      out += padding + underline;
      return out;
    }
    return `error: ${this.message}`;
  }
}
