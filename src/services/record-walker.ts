import { IssueNote, ModemEvent, SignallingMessage, WalkIssue } from "../types/records";
import { LocationIndex } from "./location-index";
import { normalizeLocation } from "./location-normalizer";
import { isPlainObject, normalizeEvent, normalizeMessage, readString } from "./message-normalizer";
import { formatTimestampKey, parseIsoTimestamp } from "./timestamp";

export interface WalkResult {
  messages: SignallingMessage[];
  events: ModemEvent[];
  issues: WalkIssue[];
  recordsAccepted: number;
  locationsRecorded: number;
}

const SUMMARY_LIMIT = 200;

/**
 * Classifies each record's payload and fills `index` with its location.
 * Records outside the capture window, or without a usable timestamp, are
 * reported in `issues` and left out.
 */
export function walkRecords(records: unknown[], index: LocationIndex): WalkResult {
  const result: WalkResult = {
    messages: [],
    events: [],
    issues: [],
    recordsAccepted: 0,
    locationsRecorded: 0
  };

  records.forEach((record, recordIndex) => {
    const skipRecord = (note: IssueNote): void => {
      result.issues.push({ ...note, recordIndex, kind: "record", skipped: true });
    };

    if (!isPlainObject(record)) {
      skipRecord({ reason: "INVALID_RECORD", detail: `Record is not an object: ${summarize(record)}` });
      return;
    }

    const rawTimestamp = readString(record.Timestamp) ?? readString(record.EquipmentTimestamp);
    if (!rawTimestamp) {
      skipRecord({ reason: "MISSING_TIMESTAMP", detail: `No timestamp found in row: ${summarize(record)}` });
      return;
    }

    const timestamp = parseIsoTimestamp(rawTimestamp);
    if (!timestamp) {
      skipRecord({ reason: "INVALID_TIMESTAMP", detail: `Unparseable timestamp '${rawTimestamp}'` });
      return;
    }

    const key = formatTimestampKey(timestamp);
    if (!index.has(key)) {
      skipRecord({ reason: "OUT_OF_RANGE", detail: `Timestamp outside range of testing: ${key}` });
      return;
    }

    result.recordsAccepted += 1;

    if (isPlainObject(record.Location)) {
      index.record(key, normalizeLocation(record.Location));
      result.locationsRecorded += 1;
    }

    if (Array.isArray(record.messages)) {
      for (const raw of record.messages) {
        const outcome = isPlainObject(raw)
          ? normalizeMessage(raw)
          : invalidItem(raw);
        if (outcome.ok) {
          result.messages.push(outcome.value);
          outcome.notes.forEach((note) =>
            result.issues.push({ ...note, recordIndex, kind: "message", skipped: false })
          );
        } else {
          result.issues.push({ ...outcome.note, recordIndex, kind: "message", skipped: true });
        }
      }
    }

    if (Array.isArray(record.events)) {
      for (const raw of record.events) {
        const outcome = isPlainObject(raw) ? normalizeEvent(raw) : invalidItem(raw);
        if (outcome.ok) {
          result.events.push(outcome.value);
        } else {
          result.issues.push({ ...outcome.note, recordIndex, kind: "event", skipped: true });
        }
      }
    }
  });

  return result;
}

function invalidItem(raw: unknown): { ok: false; note: IssueNote } {
  return { ok: false, note: { reason: "INVALID_RECORD", detail: `Entry is not an object: ${summarize(raw)}` } };
}

function summarize(value: unknown): string {
  const text = JSON.stringify(value) ?? String(value);
  return text.length > SUMMARY_LIMIT ? `${text.slice(0, SUMMARY_LIMIT)}...` : text;
}
