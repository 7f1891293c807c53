/**
 * Time conversion constants for milliseconds
 * Based on mathematical definitions, not configurable
 */
export const TIME = {
  /** 1 second in milliseconds */
  SECOND: 1000,
  /** 1 minute in milliseconds */
  MINUTE: 60 * 1000,
  /** 1 hour in milliseconds */
  HOUR: 60 * 60 * 1000,
} as const;

/** Current time as a JWT NumericDate (whole seconds since epoch) */
export function nowInSeconds(): number {
  return Math.floor(Date.now() / TIME.SECOND);
}

/** Convert a JWT NumericDate to a Date */
export function fromNumericDate(seconds: number): Date {
  return new Date(seconds * TIME.SECOND);
}

/** RFC 3339 timestamp truncated to whole seconds, e.g. `2024-05-01T12:00:00Z` */
export function toRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
