/**
 * Natural-language date parsing
 * Optional collaborator of the DateNormalizer, backed by chrono-node when installed
 */

import type { CalendarDate } from "./calendar-date";

export interface NaturalDateParser {
  /**
   * Parse a free-form date and return the calendar date as written,
   * or null when the text is not recognized. Relative inputs such as
   * "tomorrow" resolve against `reference`, or the current time.
   */
  parse(text: string, reference?: Date): CalendarDate | null;
}

type ChronoModule = typeof import("chrono-node");

/**
 * Wrap chrono-node's parser
 *
 * Only a match anchored at the start of the text counts, so trailing
 * commentary still fails here and falls through to the pattern chain.
 * Components are read as written, which keeps the wall-clock date of
 * inputs like "Oct 10, 2012 11:30 PM PDT".
 */
export function createChronoParser(chrono: ChronoModule): NaturalDateParser {
  return {
    parse(text: string, reference?: Date): CalendarDate | null {
      const [result] = chrono.parse(text, reference);
      if (!result || result.index !== 0) {
        return null;
      }

      const year = result.start.get("year");
      const month = result.start.get("month");
      const day = result.start.get("day");
      if (year === null || month === null || day === null) {
        return null;
      }

      return { year, month, day };
    },
  };
}

/**
 * Detect chrono-node once at startup
 * Returns null when the optional dependency is not installed
 */
export async function detectNaturalDateParser(): Promise<NaturalDateParser | null> {
  try {
    const chrono = await import("chrono-node");
    return createChronoParser(chrono);
  } catch {
    return null;
  }
}
