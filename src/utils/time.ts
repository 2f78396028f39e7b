/**
 * Timestamp helpers shared by the trade source and the normalizer
 */

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Epoch values above this are milliseconds, below are seconds */
export const EPOCH_MS_THRESHOLD = 1e12;

const DIGITS_ONLY = /^-?\d+(\.\d+)?$/;
const HAS_ZONE = /([zZ]|[+-]\d{2}:?\d{2})$/;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d/;

/** `YYYY-MM-DD HH:MM...` → `YYYY-MM-DDTHH:MM...`, with `Z` when zone-less */
function asUtcIsoText(text: string): string {
  const isoText = `${text.slice(0, 10)}T${text.slice(11)}`;
  return HAS_ZONE.test(isoText) ? isoText : `${isoText}Z`;
}

/**
 * Parse a timestamp into a UTC Date.
 *
 * Accepts epoch seconds, epoch milliseconds (detected by magnitude), numeric
 * strings of either, ISO-8601 text (zone-less text is read as UTC) and Date
 * instances. Returns null when nothing usable can be recovered.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0) {
      return null;
    }
    const ms = value > EPOCH_MS_THRESHOLD ? value : value * 1000;
    return new Date(ms);
  }

  if (typeof value === "string") {
    const text = value.trim();
    if (!text) {
      return null;
    }
    if (DIGITS_ONLY.test(text)) {
      return parseTimestamp(Number(text));
    }
    const ms = Date.parse(ISO_DATE_TIME.test(text) ? asUtcIsoText(text) : text);
    return Number.isNaN(ms) ? null : new Date(ms);
  }

  return null;
}

/**
 * Whole and fractional days from `from` to `to`
 */
export function daysBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / DAY_MS;
}
