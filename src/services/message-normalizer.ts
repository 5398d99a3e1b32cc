import { RawObject } from "../types/nsg";
import { IssueNote, MessageCategory, MessageDirection, ModemEvent, SignallingMessage } from "../types/records";
import { ParsedTimestamp, parseIsoTimestamp } from "./timestamp";

export type Normalized<T> =
  | { ok: true; value: T; notes: IssueNote[] }
  | { ok: false; note: IssueNote };

const CATEGORIES: readonly MessageCategory[] = ["UNKNOWN", "GSM", "WCDMA", "LTE", "NR", "ESM", "EMM"];

const DIRECTION_ALIASES: Record<string, MessageDirection> = {
  UP: "UP",
  UPLINK: "UP",
  DOWN: "DOWN",
  DOWNLINK: "DOWN",
  UNKNOWN: "UNKNOWN"
};

export function normalizeMessage(raw: RawObject): Normalized<SignallingMessage> {
  const timestamp = resolveTimestamp(readString(raw.EquipmentTimestamp) ?? readString(raw.Timestamp));
  if (!timestamp.ok) {
    return timestamp;
  }

  const notes: IssueNote[] = [];
  const category = parseCategory(raw.Category);
  if (category.note) notes.push(category.note);
  const direction = parseDirection(raw.Direction);
  if (direction.note) notes.push(direction.note);

  return {
    ok: true,
    value: {
      category: category.value,
      direction: direction.value,
      detail: isPlainObject(raw.Detail) ? raw.Detail : {},
      pcap: readString(raw.PCAPPacket) ?? "",
      timestamp: timestamp.value,
      title: readString(raw.Title) ?? ""
    },
    notes
  };
}

export function normalizeEvent(raw: RawObject): Normalized<ModemEvent> {
  const timestamp = resolveTimestamp(readString(raw.Timestamp) ?? readString(raw.EquipmentTimestamp));
  if (!timestamp.ok) {
    return timestamp;
  }

  return {
    ok: true,
    value: {
      description: readString(raw.Description) ?? "",
      timestamp: timestamp.value,
      title: readString(raw.Title) ?? ""
    },
    notes: []
  };
}

export function parseCategory(raw: unknown): { value: MessageCategory; note?: IssueNote } {
  if (raw === undefined || raw === null) {
    return { value: "UNKNOWN" };
  }

  const candidate = String(raw).trim().toUpperCase();
  const match = CATEGORIES.find((category) => category === candidate);
  if (match) {
    return { value: match };
  }

  return {
    value: "UNKNOWN",
    note: { reason: "UNKNOWN_CATEGORY", detail: `Unrecognised category '${String(raw)}'` }
  };
}

export function parseDirection(raw: unknown): { value: MessageDirection; note?: IssueNote } {
  if (raw === undefined || raw === null) {
    return { value: "UNKNOWN" };
  }

  const match = DIRECTION_ALIASES[String(raw).trim().toUpperCase()];
  if (match) {
    return { value: match };
  }

  return {
    value: "UNKNOWN",
    note: { reason: "UNKNOWN_DIRECTION", detail: `Unrecognised direction '${String(raw)}'` }
  };
}

function resolveTimestamp(
  value: string | undefined
): { ok: true; value: ParsedTimestamp } | { ok: false; note: IssueNote } {
  if (!value) {
    return { ok: false, note: { reason: "MISSING_TIMESTAMP", detail: "No timestamp found" } };
  }

  const parsed = parseIsoTimestamp(value);
  if (!parsed) {
    return { ok: false, note: { reason: "INVALID_TIMESTAMP", detail: `Unparseable timestamp '${value}'` } };
  }

  return { ok: true, value: parsed };
}

export function readString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === "object" && !Array.isArray(value));
}
