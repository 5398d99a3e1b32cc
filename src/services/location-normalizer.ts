import { RawObject } from "../types/nsg";
import { LocationSample } from "../types/records";

export const LOCATION_DIGITS = 2;

export function normalizeLocation(raw: RawObject): LocationSample {
  return {
    latitude: finiteOrNull(raw.Latitude),
    longitude: finiteOrNull(raw.Longitude),
    accuracy: roundTo(finiteOrNull(raw.Accuracy) ?? 0, LOCATION_DIGITS),
    speed: roundTo(finiteOrNull(raw.Speed) ?? 0, LOCATION_DIGITS)
  };
}

/**
 * Rounds half to even on the exact binary value: 0.125 -> 0.12, 0.375 -> 0.38,
 * while 2.675 (stored just below the tie) -> 2.67.
 */
export function roundTo(value: number, digits: number): number {
  if (isExactTie(value, digits)) {
    const scaled = value * Math.pow(10, digits);
    const lower = Math.floor(scaled);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return even / Math.pow(10, digits);
  }
  return Number(value.toFixed(digits));
}

// A double sits exactly halfway between two `digits`-place decimals only when
// it is an odd multiple of 2^-(digits + 1).
function isExactTie(value: number, digits: number): boolean {
  return Number.isInteger(value * Math.pow(2, digits + 1)) && !Number.isInteger(value * Math.pow(2, digits));
}

function finiteOrNull(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}
