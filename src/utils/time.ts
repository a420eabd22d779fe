import { differenceInMilliseconds, isValid, parseISO } from 'date-fns';

const DURATION_PATTERN = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;
const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const WALL_CLOCK_PATTERN = /T(\d{2}):(\d{2})/;

/**
 * Parse a compact ISO-8601 duration such as `PT2H30M` or `P1DT1H` into hours.
 * Returns undefined for anything unparseable, including a bare `P` or `PT`.
 */
export function parseDurationHours(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const match = DURATION_PATTERN.exec(value.trim().toUpperCase());
  if (!match) return undefined;

  const [, days, hours, minutes, seconds] = match;
  if (days === undefined && hours === undefined && minutes === undefined && seconds === undefined) {
    return undefined;
  }
  return (
    Number(days ?? 0) * 24 +
    Number(hours ?? 0) +
    Number(minutes ?? 0) / 60 +
    Number(seconds ?? 0) / 3600
  );
}

/**
 * Minutes past midnight for an `HH:MM` string, or undefined if malformed.
 */
export function parseClock(value: string): number | undefined {
  const match = CLOCK_PATTERN.exec(value.trim());
  if (!match) return undefined;
  return Number(match[1]) * 60 + Number(match[2]);
}

/**
 * Local wall-clock minutes of a provider timestamp. Provider times are local to
 * the airport, so the clock digits are read as written, ignoring any offset.
 */
export function wallClockMinutes(timestamp: string | undefined): number | undefined {
  if (!timestamp) return undefined;
  const match = WALL_CLOCK_PATTERN.exec(timestamp);
  if (!match) return undefined;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return undefined;
  return hours * 60 + minutes;
}

export function parseTimestamp(timestamp: string | undefined): Date | undefined {
  if (!timestamp) return undefined;
  const parsed = parseISO(timestamp);
  return isValid(parsed) ? parsed : undefined;
}

/**
 * Absolute difference in hours between two timestamps, or undefined when
 * either side is missing or unparseable.
 */
export function hoursBetween(a: string | undefined, b: string | undefined): number | undefined {
  const first = parseTimestamp(a);
  const second = parseTimestamp(b);
  if (!first || !second) return undefined;
  return Math.abs(differenceInMilliseconds(first, second)) / 3_600_000;
}
