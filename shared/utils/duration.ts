/**
 * Duration formatting utilities
 */

export const NANOS_PER_MICROSECOND = 1_000;
export const NANOS_PER_MILLISECOND = 1_000_000;
export const NANOS_PER_SECOND = 1_000_000_000;
export const NANOS_PER_MINUTE = 60 * NANOS_PER_SECOND;
export const NANOS_PER_HOUR = 60 * NANOS_PER_MINUTE;

/**
 * Render a nanosecond duration at a human scale.
 *
 * @example
 * formatNanos(850) // "850 ns"
 * formatNanos(50_000_000) // "50 ms"
 * formatNanos(1_234_000_000) // "1.234 s"
 * formatNanos(3_750_000_000_000) // "1 h 2 mn"
 */
export function formatNanos(nanos: number): string {
  if (nanos >= NANOS_PER_HOUR) {
    const hours = Math.floor(nanos / NANOS_PER_HOUR);
    const minutes = Math.floor((nanos % NANOS_PER_HOUR) / NANOS_PER_MINUTE);
    return `${hours} h ${minutes} mn`;
  }

  if (nanos >= NANOS_PER_MINUTE) {
    const minutes = Math.floor(nanos / NANOS_PER_MINUTE);
    const seconds = Math.floor((nanos % NANOS_PER_MINUTE) / NANOS_PER_SECOND);
    return `${minutes} mn ${seconds} s`;
  }

  if (nanos >= NANOS_PER_SECOND) {
    const seconds = Math.floor(nanos / NANOS_PER_SECOND);
    const millis = Math.floor((nanos % NANOS_PER_SECOND) / NANOS_PER_MILLISECOND);
    return `${seconds}.${String(millis).padStart(3, '0')} s`;
  }

  if (nanos >= NANOS_PER_MILLISECOND) {
    return `${Math.floor(nanos / NANOS_PER_MILLISECOND)} ms`;
  }

  if (nanos >= NANOS_PER_MICROSECOND) {
    return `${Math.floor(nanos / NANOS_PER_MICROSECOND)} us`;
  }

  return `${nanos} ns`;
}

const UNIT_NANOS: Record<string, number> = {
  ns: 1,
  nanos: 1,
  nanosecond: 1,
  nanoseconds: 1,
  us: NANOS_PER_MICROSECOND,
  micros: NANOS_PER_MICROSECOND,
  microsecond: NANOS_PER_MICROSECOND,
  microseconds: NANOS_PER_MICROSECOND,
  ms: NANOS_PER_MILLISECOND,
  millis: NANOS_PER_MILLISECOND,
  millisecond: NANOS_PER_MILLISECOND,
  milliseconds: NANOS_PER_MILLISECOND,
  s: NANOS_PER_SECOND,
  second: NANOS_PER_SECOND,
  seconds: NANOS_PER_SECOND,
  m: NANOS_PER_MINUTE,
  minute: NANOS_PER_MINUTE,
  minutes: NANOS_PER_MINUTE,
  h: NANOS_PER_HOUR,
  hour: NANOS_PER_HOUR,
  hours: NANOS_PER_HOUR,
};

/**
 * Parse a duration such as "500ms", "2 seconds" or "1.5s" into nanoseconds.
 * A bare number is read as nanoseconds. Returns null when the text is not a duration.
 */
export function parseDurationNanos(text: string): number | null {
  const match = /^(\d+(?:\.\d+)?)\s*([a-z]*)$/i.exec(text.trim());
  if (!match) {
    return null;
  }

  const unit = match[2].toLowerCase();
  const multiplier = unit === '' ? 1 : UNIT_NANOS[unit];
  if (multiplier === undefined) {
    return null;
  }

  return Math.round(parseFloat(match[1]) * multiplier);
}
