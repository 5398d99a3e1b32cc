/**
 * Wall-clock timestamps as written in the dump.
 *
 * Keys are built from the fields written in the ISO string, never from a
 * converted instant, so a record stamped `10:00:00+02:00` lands on `10:00:00`.
 */
export interface ParsedTimestamp {
  /** Wall-clock fields encoded as if they were UTC */
  wallMs: number;
  /** Minutes east of UTC, or null when the string carries no offset */
  offsetMinutes: number | null;
  source: string;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

export function parseIsoTimestamp(value: string): ParsedTimestamp | null {
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "", offset] = match;
  const fields = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second)
  };

  if (fields.hour > 23 || fields.minute > 59 || fields.second > 59) {
    return null;
  }

  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0;
  const date = new Date(0);
  date.setUTCFullYear(fields.year, fields.month - 1, fields.day);
  date.setUTCHours(fields.hour, fields.minute, fields.second, millis);

  // Date rolls 2024-02-30 over into March; reject instead.
  if (date.getUTCMonth() !== fields.month - 1 || date.getUTCDate() !== fields.day) {
    return null;
  }

  const offsetMinutes = parseOffset(offset);
  if (offsetMinutes === undefined) {
    return null;
  }

  return { wallMs: date.getTime(), offsetMinutes, source: value };
}

function parseOffset(offset: string | undefined): number | null | undefined {
  if (!offset) {
    return null;
  }
  if (offset === "Z") {
    return 0;
  }

  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) {
    return undefined;
  }
  return sign * (hours * 60 + minutes);
}

/** Drops sub-second precision. */
export function truncateToSecond(wallMs: number): number {
  return Math.floor(wallMs / 1000) * 1000;
}

/** Renders `%d-%H:%M:%S`: day of month, hour, minute, second. */
export function formatTimestampKey(timestamp: ParsedTimestamp | number): string {
  const wallMs = typeof timestamp === "number" ? timestamp : timestamp.wallMs;
  const date = new Date(wallMs);
  return `${pad2(date.getUTCDate())}-${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(
    date.getUTCSeconds()
  )}`;
}

/**
 * Expresses `other` in the wall clock of `reference`. Both must carry an
 * offset, or neither.
 */
export function alignWallClock(reference: ParsedTimestamp, other: ParsedTimestamp): number {
  if (reference.offsetMinutes === null && other.offsetMinutes === null) {
    return other.wallMs;
  }
  if (reference.offsetMinutes === null || other.offsetMinutes === null) {
    throw new Error(
      `Cannot compare '${reference.source}' and '${other.source}': only one of them has a UTC offset`
    );
  }
  return other.wallMs + (reference.offsetMinutes - other.offsetMinutes) * 60 * 1000;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}
