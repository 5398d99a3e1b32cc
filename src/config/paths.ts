import { basename, resolve } from "node:path";
import { mkdirSync } from "node:fs";

const DEFAULT_OUTPUT_ROOT = "output";

export const paths = {
  defaultOutputRoot: DEFAULT_OUTPUT_ROOT,
  outputFiles: {
    coordinates: "coordinates.csv",
    signalling: "signalling.csv",
    events: "events.csv"
  }
};

/** `log.2024.json` -> `log`: everything before the first dot of the file name. */
export function dumpBasename(inputFile: string): string {
  return basename(inputFile).split(".")[0];
}

export function resolveOutputDir(inputFile: string, outputRoot: string = DEFAULT_OUTPUT_ROOT): string {
  return resolve(process.cwd(), outputRoot, dumpBasename(inputFile));
}

export function ensureOutputDir(outputDir: string): void {
  mkdirSync(outputDir, { recursive: true });
}
