import { LocationSample } from "../types/records";
import { ParsedTimestamp, alignWallClock, formatTimestampKey, truncateToSecond } from "./timestamp";

/**
 * Per-second location lookup keyed by `%d-%H:%M:%S`.
 *
 * Every second of the capture window gets an entry up front so that a
 * record can be told apart as "in range, no fix yet" (null) or "out of
 * range" (absent).
 */
export class LocationIndex {
  private readonly entries = new Map<string, LocationSample | null>();

  static forRange(start: ParsedTimestamp, end: ParsedTimestamp): LocationIndex {
    const index = new LocationIndex();
    const last = truncateToSecond(alignWallClock(start, end));

    for (let current = truncateToSecond(start.wallMs); current <= last; current += 1000) {
      index.entries.set(formatTimestampKey(current), null);
    }

    return index;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  record(key: string, sample: LocationSample): void {
    if (!this.entries.has(key)) {
      throw new Error(`Timestamp ${key} is outside the capture window`);
    }
    this.entries.set(key, sample);
  }

  /** Null when the second is unknown or has no fix. */
  lookup(key: string): LocationSample | null {
    return this.entries.get(key) ?? null;
  }

  /** Seconds holding a fix, in chronological order. */
  locations(): Array<[string, LocationSample]> {
    const rows: Array<[string, LocationSample]> = [];
    for (const [key, sample] of this.entries) {
      if (sample) {
        rows.push([key, sample]);
      }
    }
    return rows;
  }

  coveredSeconds(): number {
    return this.locations().length;
  }
}
