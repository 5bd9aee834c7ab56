export type ErrorKind = "lex" | "parse" | "eval" | "cron";

/** Half-open byte range into the source expression. */
export interface Span {
  start: number;
  end: number;
}

export class ScheduleError extends Error {
  readonly kind: ErrorKind;
  readonly span?: Span;
  readonly input?: string;
  readonly suggestion?: string;

  constructor(kind: ErrorKind, message: string, opts: { span?: Span; input?: string; suggestion?: string } = {}) {
    super(message);
    this.name = "ScheduleError";
    this.kind = kind;
    this.span = opts.span;
    this.input = opts.input;
    this.suggestion = opts.suggestion;
  }

  /** Renders the message with the source line and a caret underline beneath the span. */
  displayRich(): string {
    if ((this.kind === "lex" || this.kind === "parse") && this.span && this.input) {
      const width = Math.max(this.span.end - this.span.start, 1);
      let out = `error: ${this.message}\n  ${this.input}\n${" ".repeat(this.span.start + 2)}${"^".repeat(width)}`;
      if (this.suggestion) out += ` try: "${this.suggestion}"`;
      return out;
    }
    return `error: ${this.message}`;
  }
}

export function lexError(message: string, span: Span, input: string): ScheduleError {
  return new ScheduleError("lex", message, { span, input });
}

export function parseError(message: string, span: Span, input: string, suggestion?: string): ScheduleError {
  return new ScheduleError("parse", message, { span, input, suggestion });
}

export function evalError(message: string): ScheduleError {
  return new ScheduleError("eval", message);
}

export function cronError(message: string): ScheduleError {
  return new ScheduleError("cron", message);
}

export function isScheduleError(value: unknown): value is ScheduleError {
  return value instanceof ScheduleError;
}
