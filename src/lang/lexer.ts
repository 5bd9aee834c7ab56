import { lexError } from "./error.js";
import { KEYWORDS, type Token } from "./tokens.js";

const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= "0" && ch <= "9";
const isAlpha = (ch: string | undefined): boolean => ch !== undefined && ((ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z"));
const isWordChar = (ch: string | undefined): boolean => isAlpha(ch) || isDigit(ch) || ch === "_";
const isSpace = (ch: string | undefined): boolean => ch === " " || ch === "\t" || ch === "\n" || ch === "\r";

const ORDINAL_SUFFIXES = new Set(["st", "nd", "rd", "th"]);

class Lexer {
  private pos = 0;
  private afterIn = false;

  constructor(private readonly input: string) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      this.skipWhitespace();
      if (this.pos >= this.input.length) return tokens;

      if (this.afterIn) {
        this.afterIn = false;
        tokens.push(this.lexTimezone());
        continue;
      }

      const ch = this.input[this.pos];
      if (ch === ",") {
        tokens.push({ kind: "comma", span: { start: this.pos, end: ++this.pos } });
      } else if (isDigit(ch)) {
        tokens.push(this.lexNumeric());
      } else if (isAlpha(ch)) {
        tokens.push(this.lexWord());
      } else {
        throw lexError(`unexpected character '${ch}'`, { start: this.pos, end: this.pos + 1 }, this.input);
      }
    }
  }

  private skipWhitespace(): void {
    while (isSpace(this.input[this.pos])) this.pos++;
  }

  // Zone names carry '/' and '_' which appear nowhere else, so the rest of the run is taken verbatim.
  private lexTimezone(): Token {
    const start = this.pos;
    while (this.pos < this.input.length && !isSpace(this.input[this.pos])) this.pos++;
    const zone = this.input.slice(start, this.pos);
    if (!zone) throw lexError("expected timezone after 'in'", { start, end: start + 1 }, this.input);
    return { kind: "timezone", zone, span: { start, end: this.pos } };
  }

  private lexNumeric(): Token {
    const { input } = this;
    const start = this.pos;
    while (isDigit(input[this.pos])) this.pos++;
    const digits = input.slice(start, this.pos);

    if (
      digits.length === 4 &&
      input[start + 4] === "-" &&
      isDigit(input[start + 5]) &&
      isDigit(input[start + 6]) &&
      input[start + 7] === "-" &&
      isDigit(input[start + 8]) &&
      isDigit(input[start + 9])
    ) {
      this.pos = start + 10;
      return { kind: "isoDate", date: input.slice(start, this.pos), span: { start, end: this.pos } };
    }

    if (digits.length <= 2 && input[this.pos] === ":") {
      const minuteStart = this.pos + 1;
      let end = minuteStart;
      while (isDigit(input[end])) end++;
      if (end - minuteStart === 2) {
        this.pos = end;
        const hour = Number(digits);
        const minute = Number(input.slice(minuteStart, end));
        const span = { start, end };
        if (hour > 23 || minute > 59) throw lexError("invalid time", span, input);
        return { kind: "time", hour, minute, span };
      }
    }

    const value = Number(digits);
    const suffix = input.slice(this.pos, this.pos + 2).toLowerCase();
    if (ORDINAL_SUFFIXES.has(suffix)) {
      this.pos += 2;
      return { kind: "ordinalNumber", value, span: { start, end: this.pos } };
    }
    return { kind: "number", value, span: { start, end: this.pos } };
  }

  private lexWord(): Token {
    const start = this.pos;
    while (isWordChar(this.input[this.pos])) this.pos++;
    const word = this.input.slice(start, this.pos).toLowerCase();
    const span = { start, end: this.pos };
    const value = KEYWORDS.get(word);
    if (!value) throw lexError(`unknown keyword '${word}'`, span, this.input);
    if (value.kind === "in") this.afterIn = true;
    return { ...value, span };
  }
}

export function tokenize(input: string): Token[] {
  return new Lexer(input).tokenize();
}
