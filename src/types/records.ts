import { ParsedTimestamp } from "../services/timestamp";

export type MessageCategory = "UNKNOWN" | "GSM" | "WCDMA" | "LTE" | "NR" | "ESM" | "EMM";

export type MessageDirection = "UP" | "DOWN" | "UNKNOWN";

export interface LocationSample {
  latitude: number | null;
  longitude: number | null;
  /** Rounded to 2 decimals */
  accuracy: number;
  /** Rounded to 2 decimals */
  speed: number;
}

export interface SignallingMessage {
  category: MessageCategory;
  direction: MessageDirection;
  detail: Record<string, unknown>;
  pcap: string;
  timestamp: ParsedTimestamp;
  title: string;
}

export interface ModemEvent {
  description: string;
  timestamp: ParsedTimestamp;
  title: string;
}

export type IssueReason =
  | "INVALID_RECORD"
  | "MISSING_TIMESTAMP"
  | "INVALID_TIMESTAMP"
  | "OUT_OF_RANGE"
  | "UNKNOWN_CATEGORY"
  | "UNKNOWN_DIRECTION";

export interface IssueNote {
  reason: IssueReason;
  detail: string;
}

export interface WalkIssue extends IssueNote {
  /** Position of the record in the dump's data array */
  recordIndex: number;
  kind: "record" | "message" | "event";
  /** False when the item was kept with a fallback value */
  skipped: boolean;
}
