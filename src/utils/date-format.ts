/**
 * Fixed-format date parsing with strptime-style directives
 *
 * Supported directives: %Y %m %d %H %I %M %S %p %b %B
 * Whitespace in a format matches one or more whitespace characters,
 * everything else matches literally. Month names are case-insensitive.
 */

import { isValidCalendarDate, type CalendarDate } from "./calendar-date";

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const ABBREVIATED_MONTHS = MONTHS.map((m) => m.slice(0, 3));

type Directive = "Y" | "m" | "d" | "H" | "I" | "M" | "S" | "p" | "b" | "B";

const DIRECTIVE_PATTERNS: Record<Directive, string> = {
  Y: "(\\d{4})",
  m: "(\\d{1,2})",
  d: "(\\d{1,2})",
  H: "(\\d{1,2})",
  I: "(\\d{1,2})",
  M: "(\\d{1,2})",
  S: "(\\d{1,2})",
  p: "(am|pm)",
  b: `(${ABBREVIATED_MONTHS.join("|")})`,
  B: `(${MONTHS.join("|")})`,
};

// Inclusive ranges for the time fields, which only need validating
const TIME_RANGES: Partial<Record<Directive, [number, number]>> = {
  H: [0, 23],
  I: [1, 12],
  M: [0, 59],
  S: [0, 61],
};

function isDirective(char: string): char is Directive {
  return char in DIRECTIVE_PATTERNS;
}

interface CompiledFormat {
  regex: RegExp;
  directives: Directive[];
}

const compiled = new Map<string, CompiledFormat>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compileFormat(format: string): CompiledFormat {
  const cached = compiled.get(format);
  if (cached) return cached;

  let source = "";
  const directives: Directive[] = [];

  for (let i = 0; i < format.length; i++) {
    const char = format[i];
    if (char === "%" && i + 1 < format.length) {
      const next = format[i + 1];
      if (!isDirective(next)) {
        throw new Error(`Unsupported date directive %${next} in "${format}"`);
      }
      source += DIRECTIVE_PATTERNS[next];
      directives.push(next);
      i++;
    } else if (/\s/.test(char)) {
      source += "\\s+";
      while (i + 1 < format.length && /\s/.test(format[i + 1])) i++;
    } else {
      source += escapeRegExp(char);
    }
  }

  const result = { regex: new RegExp(`^${source}$`, "i"), directives };
  compiled.set(format, result);
  return result;
}

/**
 * Parse `text` against a single format
 * Returns null unless the whole text matches and names a real calendar date
 *
 * @example
 * parseDateFormat("Oct 10, 2012", "%b %d, %Y") // { year: 2012, month: 10, day: 10 }
 * parseDateFormat("2021-02-30", "%Y-%m-%d") // null
 */
export function parseDateFormat(
  text: string,
  format: string,
): CalendarDate | null {
  const { regex, directives } = compileFormat(format);
  const match = regex.exec(text);
  if (!match) return null;

  let year: number | undefined;
  let month: number | undefined;
  let day: number | undefined;

  for (let i = 0; i < directives.length; i++) {
    const directive = directives[i];
    const value = match[i + 1];

    switch (directive) {
      case "Y":
        year = Number(value);
        break;
      case "m":
        month = Number(value);
        break;
      case "d":
        day = Number(value);
        break;
      case "b":
        month = ABBREVIATED_MONTHS.indexOf(value.toLowerCase()) + 1;
        break;
      case "B":
        month = MONTHS.indexOf(value.toLowerCase()) + 1;
        break;
      case "p":
        break;
      default: {
        const range = TIME_RANGES[directive];
        const n = Number(value);
        if (range && (n < range[0] || n > range[1])) return null;
      }
    }
  }

  if (year === undefined || month === undefined || day === undefined) {
    return null;
  }

  const date = { year, month, day };
  return isValidCalendarDate(date) ? date : null;
}

/**
 * Try each format in order and return the first match
 */
export function parseFirstDateFormat(
  text: string,
  formats: readonly string[],
): CalendarDate | null {
  for (const format of formats) {
    const date = parseDateFormat(text, format);
    if (date) return date;
  }
  return null;
}
