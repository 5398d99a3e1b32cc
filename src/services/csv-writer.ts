import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import Papa from "papaparse";
import { ModemEvent, SignallingMessage } from "../types/records";
import { ensureOutputDir, paths } from "../config/paths";
import { LocationIndex } from "./location-index";
import {
  COORDINATE_FIELDS,
  EVENT_FIELDS,
  SIGNALLING_FIELDS,
  SignallingRowOptions,
  buildCoordinateRows,
  buildEventRows,
  CsvValue,
  buildSignallingRows
} from "./row-builder";

const NEWLINE = "\r\n";

export interface CsvOutputSummary {
  file: string;
  rows: number;
}

export interface CsvOutputs {
  coordinates: CsvOutputSummary;
  signalling: CsvOutputSummary;
  events: CsvOutputSummary;
}

/** Header line first, then each row as an array in `fields` order. No rows means a header-only file. */
export function serializeCsv<F extends string>(fields: readonly F[], rows: Array<Record<F, CsvValue>>): string {
  const table: CsvValue[][] = [[...fields], ...rows.map((row) => fields.map((field) => row[field]))];
  const body = Papa.unparse(table, { newline: NEWLINE });
  return `${body}${NEWLINE}`;
}

export function writeCsv<F extends string>(
  filePath: string,
  fields: readonly F[],
  rows: Array<Record<F, CsvValue>>
): CsvOutputSummary {
  writeFileSync(filePath, serializeCsv(fields, rows), "utf8");
  return { file: filePath, rows: rows.length };
}

export function writeLocationsCsv(outputDir: string, index: LocationIndex): CsvOutputSummary {
  return writeCsv(resolve(outputDir, paths.outputFiles.coordinates), COORDINATE_FIELDS, buildCoordinateRows(index));
}

export function writeSignallingCsv(
  outputDir: string,
  messages: SignallingMessage[],
  index: LocationIndex,
  options: SignallingRowOptions = {}
): CsvOutputSummary {
  return writeCsv(
    resolve(outputDir, paths.outputFiles.signalling),
    SIGNALLING_FIELDS,
    buildSignallingRows(messages, index, options)
  );
}

export function writeEventsCsv(outputDir: string, events: ModemEvent[], index: LocationIndex): CsvOutputSummary {
  return writeCsv(resolve(outputDir, paths.outputFiles.events), EVENT_FIELDS, buildEventRows(events, index));
}

export function writeAllCsv(
  outputDir: string,
  index: LocationIndex,
  messages: SignallingMessage[],
  events: ModemEvent[],
  options: SignallingRowOptions = {}
): CsvOutputs {
  ensureOutputDir(outputDir);
  return {
    coordinates: writeLocationsCsv(outputDir, index),
    signalling: writeSignallingCsv(outputDir, messages, index, options),
    events: writeEventsCsv(outputDir, events, index)
  };
}
