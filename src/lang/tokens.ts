import { MONTHS, WEEKDAYS, type IntervalUnit, type MonthName, type OrdinalPosition, type Weekday } from "./ast.js";
import type { Span } from "./error.js";

export type KeywordKind =
  | "every"
  | "on"
  | "at"
  | "from"
  | "to"
  | "in"
  | "of"
  | "the"
  | "last"
  | "except"
  | "until"
  | "starting"
  | "during"
  | "year"
  | "day"
  | "weekday"
  | "weekend"
  | "weeks"
  | "month"
  | "nearest"
  | "next"
  | "previous";

export type TokenValue =
  | { kind: KeywordKind }
  | { kind: "dayName"; day: Weekday }
  | { kind: "monthName"; month: MonthName }
  | { kind: "ordinal"; ordinal: Exclude<OrdinalPosition, "last"> }
  | { kind: "intervalUnit"; unit: IntervalUnit }
  | { kind: "number"; value: number }
  | { kind: "ordinalNumber"; value: number }
  | { kind: "time"; hour: number; minute: number }
  | { kind: "isoDate"; date: string }
  | { kind: "timezone"; zone: string }
  | { kind: "comma" };

export type Token = TokenValue & { span: Span };
export type TokenKind = TokenValue["kind"];

const FULL_MONTHS = ["january", "february", "march", "april", "may", "june", "july", "august", "september", "october", "november", "december"];

function buildKeywords(): ReadonlyMap<string, TokenValue> {
  const table = new Map<string, TokenValue>();
  const plain: KeywordKind[] = ["every", "on", "at", "from", "to", "in", "of", "the", "last", "except", "until", "starting", "during", "nearest", "next", "previous"];
  for (const kw of plain) table.set(kw, { kind: kw });

  const plurals: Array<[string, KeywordKind]> = [
    ["year", "year"], ["years", "year"],
    ["day", "day"], ["days", "day"],
    ["weekday", "weekday"], ["weekdays", "weekday"],
    ["weekend", "weekend"], ["weekends", "weekend"],
    ["week", "weeks"], ["weeks", "weeks"],
    ["month", "month"], ["months", "month"],
  ];
  for (const [word, kind] of plurals) table.set(word, { kind });

  for (const day of WEEKDAYS) {
    table.set(day, { kind: "dayName", day });
    table.set(day.slice(0, 3), { kind: "dayName", day });
  }
  MONTHS.forEach((month, i) => {
    table.set(month, { kind: "monthName", month });
    table.set(FULL_MONTHS[i], { kind: "monthName", month });
  });

  const ordinals = ["first", "second", "third", "fourth", "fifth"] as const;
  for (const ordinal of ordinals) table.set(ordinal, { kind: "ordinal", ordinal });

  for (const word of ["min", "mins", "minute", "minutes"]) table.set(word, { kind: "intervalUnit", unit: "min" });
  for (const word of ["hour", "hours", "hr", "hrs"]) table.set(word, { kind: "intervalUnit", unit: "hours" });
  return table;
}

/** Closed vocabulary: every word the lexer accepts, lowercased. */
export const KEYWORDS = buildKeywords();

export function describeToken(tok: Token): string {
  switch (tok.kind) {
    case "dayName": return tok.day;
    case "monthName": return tok.month;
    case "ordinal": return tok.ordinal;
    case "intervalUnit": return tok.unit;
    case "number": return String(tok.value);
    case "ordinalNumber": return `ordinal ${tok.value}`;
    case "time": return "time";
    case "isoDate": return tok.date;
    case "timezone": return tok.zone;
    case "comma": return "','";
    default: return `'${tok.kind}'`;
  }
}
