/**
 * Date Normalizer
 * Turns a human-entered date string into a YYYY-MM-DD calendar date
 *
 * Dates come from heterogeneous legacy exports, so parsing is an ordered
 * fallback chain: exact ISO-like patterns first, then timezone stripping
 * and human-readable patterns, then a substring search. A date that
 * matches nothing becomes today's date; it never fails the conversion.
 */

import {
  formatIsoDate,
  localCalendarDate,
  type CalendarDate,
} from "./calendar-date";
import { parseDateFormat, parseFirstDateFormat } from "./date-format";
import type { Logger } from "./logger";
import type { NaturalDateParser } from "./natural-date-parser";

const ISO_FORMATS = [
  "%Y-%m-%d",
  "%Y-%m-%d %H:%M:%S",
  "%Y-%m-%d %I:%M %p",
] as const;

const HUMAN_FORMATS = [
  "%b %d, %Y %I:%M %p", // Oct 10, 2012 06:02 AM
  "%b %d, %Y %H:%M", // Oct 10, 2012 06:02
  "%b %d, %Y", // Oct 10, 2012
  "%B %d, %Y %I:%M %p", // October 10, 2012 06:02 AM
  "%B %d, %Y %H:%M",
  "%B %d, %Y",
] as const;

// Applied in order, each at most once: "GMT+0200", "UTC", then any short zone like "PDT"
const TIMEZONE_SUFFIXES = [
  /\s+\(?GMT[+-]?\d{1,4}\)?$/i,
  /\s+\(?UTC\)?$/i,
  /\s+\(?[A-Za-z]{1,5}\)?$/,
];

const EMBEDDED_DATE = /([A-Za-z]{3,}\s+\d{1,2},\s+\d{4})/;

export interface DateNormalizerOptions {
  naturalParser?: NaturalDateParser | null;
  logger?: Logger;
  // Called with the cleaned input when every strategy failed
  onUnrecognized?: (raw: string) => void;
  now?: () => Date;
}

export class DateNormalizer {
  private readonly naturalParser: NaturalDateParser | null;
  private readonly logger?: Logger;
  private readonly onUnrecognized?: (raw: string) => void;
  private readonly now: () => Date;

  constructor(options: DateNormalizerOptions = {}) {
    this.naturalParser = options.naturalParser ?? null;
    this.logger = options.logger;
    this.onUnrecognized = options.onUnrecognized;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Normalize a raw date to YYYY-MM-DD
   * Absent, empty or unrecognized input yields today's local date
   */
  normalize(rawDate?: string | null): string {
    const raw = stripQuotes(rawDate?.trim() ?? "");
    if (!raw) {
      return this.today();
    }

    const date = this.parse(raw);
    if (date) {
      return formatIsoDate(date);
    }

    this.logger?.warn(
      `Unrecognized date format: ${JSON.stringify(raw)}. Using today's date as fallback.`,
    );
    this.onUnrecognized?.(raw);
    return this.today();
  }

  /**
   * Run the fallback chain without the today fallback
   */
  parse(raw: string): CalendarDate | null {
    if (this.naturalParser) {
      const natural = this.parseNatural(this.naturalParser, raw);
      if (natural) return natural;
    }

    const iso = parseFirstDateFormat(raw, ISO_FORMATS);
    if (iso) return iso;

    const human = parseFirstDateFormat(stripTimezone(raw), HUMAN_FORMATS);
    if (human) return human;

    const embedded = EMBEDDED_DATE.exec(raw);
    if (embedded) {
      return parseDateFormat(embedded[1], "%b %d, %Y");
    }

    return null;
  }

  private parseNatural(
    parser: NaturalDateParser,
    raw: string,
  ): CalendarDate | null {
    try {
      return parser.parse(raw, this.now());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.debug(
        `Natural date parser failed on ${JSON.stringify(raw)}: ${message}`,
      );
      return null;
    }
  }

  today(): string {
    return formatIsoDate(localCalendarDate(this.now()));
  }
}

function stripQuotes(value: string): string {
  return value.replace(/^"+|"+$/g, "").replace(/^'+|'+$/g, "");
}

/**
 * Remove a trailing timezone designation
 *
 * @example
 * stripTimezone("Oct 10, 2012 06:02 AM PDT") // "Oct 10, 2012 06:02 AM"
 * stripTimezone("Oct 10, 2012 (GMT+0200)") // "Oct 10, 2012"
 */
export function stripTimezone(value: string): string {
  let cleaned = value;
  for (const suffix of TIMEZONE_SUFFIXES) {
    cleaned = cleaned.replace(suffix, "");
  }
  return cleaned.trim();
}
