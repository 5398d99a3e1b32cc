import { LocationSample, ModemEvent, SignallingMessage } from "../types/records";
import { LocationIndex } from "./location-index";
import { LOCATION_DIGITS } from "./location-normalizer";
import { formatTimestampKey } from "./timestamp";

export const COORDINATE_FIELDS = ["timestamp", "Latitude", "Longitude", "Accuracy", "Speed"] as const;
export const SIGNALLING_FIELDS = [
  "category",
  "direction",
  "detail",
  "timestamp",
  "title",
  "latitude",
  "longitude"
] as const;
export const EVENT_FIELDS = ["description", "timestamp", "title", "latitude", "longitude"] as const;

export type CsvValue = string | number | null;

export type CoordinateRow = Record<(typeof COORDINATE_FIELDS)[number], CsvValue>;
export type SignallingRow = Record<(typeof SIGNALLING_FIELDS)[number], CsvValue>;
export type EventRow = Record<(typeof EVENT_FIELDS)[number], CsvValue>;

export interface SignallingRowOptions {
  includeDetail?: boolean;
}

export function buildCoordinateRows(index: LocationIndex): CoordinateRow[] {
  return index.locations().map(([timestamp, location]) => ({
    timestamp,
    Latitude: location.latitude,
    Longitude: location.longitude,
    Accuracy: location.accuracy.toFixed(LOCATION_DIGITS),
    Speed: location.speed.toFixed(LOCATION_DIGITS)
  }));
}

export function buildSignallingRows(
  messages: SignallingMessage[],
  index: LocationIndex,
  options: SignallingRowOptions = {}
): SignallingRow[] {
  return messages.map((message) => {
    const timestamp = formatTimestampKey(message.timestamp);
    const position = joinLocation(index, timestamp);
    return {
      category: message.category,
      direction: message.direction,
      detail: options.includeDetail ? JSON.stringify(message.detail) : null,
      timestamp,
      title: message.title,
      latitude: position.latitude,
      longitude: position.longitude
    };
  });
}

export function buildEventRows(events: ModemEvent[], index: LocationIndex): EventRow[] {
  return events.map((event) => {
    const timestamp = formatTimestampKey(event.timestamp);
    const position = joinLocation(index, timestamp);
    return {
      description: event.description,
      timestamp,
      title: event.title,
      latitude: position.latitude,
      longitude: position.longitude
    };
  });
}

function joinLocation(index: LocationIndex, key: string): Pick<LocationSample, "latitude" | "longitude"> {
  const location = index.lookup(key);
  return {
    latitude: location?.latitude ?? null,
    longitude: location?.longitude ?? null
  };
}
