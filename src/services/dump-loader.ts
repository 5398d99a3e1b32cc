import { readFileSync } from "node:fs";
import { NsgRawDump } from "../types/nsg";
import { ParsedTimestamp, alignWallClock, parseIsoTimestamp } from "./timestamp";

export interface LoadedDump {
  source: string;
  device: string;
  start: ParsedTimestamp;
  end: ParsedTimestamp;
  records: unknown[];
}

const REQUIRED_KEYS: ReadonlyArray<keyof NsgRawDump> = ["device", "starttime", "endtime", "data"];

export function loadDump(filePath: string): LoadedDump {
  let content: string;
  try {
    content = readFileSync(filePath, "utf8");
  } catch (error) {
    throw new Error(`Failed to read ${filePath}: ${(error as Error).message}`);
  }
  return parseDump(content, filePath);
}

export function parseDump(content: string, source: string): LoadedDump {
  let payload: unknown;
  try {
    payload = JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to parse ${source}: ${(error as Error).message}`);
  }

  if (!isNsgRawDump(payload)) {
    throw new Error(`Unsupported dump structure in ${source}: ${describeProblem(payload)}`);
  }

  const start = parseIsoTimestamp(payload.starttime);
  const end = parseIsoTimestamp(payload.endtime);
  if (!start) {
    throw new Error(`Invalid starttime '${payload.starttime}' in ${source}`);
  }
  if (!end) {
    throw new Error(`Invalid endtime '${payload.endtime}' in ${source}`);
  }
  // Throws when only one of the two carries a UTC offset.
  alignWallClock(start, end);

  return {
    source,
    device: payload.device,
    start,
    end,
    records: payload.data
  };
}

function isNsgRawDump(value: unknown): value is NsgRawDump {
  return describeProblem(value) === undefined;
}

function describeProblem(value: unknown): string | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return "top level is not an object";
  }

  const missing = REQUIRED_KEYS.filter((key) => !(key in value));
  if (missing.length > 0) {
    return `missing key(s) ${missing.join(", ")}`;
  }

  const record = value as Record<string, unknown>;
  if (!Array.isArray(record.data)) {
    return "'data' is not an array";
  }
  for (const key of ["device", "starttime", "endtime"] as const) {
    if (typeof record[key] !== "string") {
      return `'${key}' is not a string`;
    }
  }
  return undefined;
}
