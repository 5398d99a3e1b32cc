import { LoadedDump } from "./dump-loader";
import { LocationIndex } from "./location-index";
import { WalkResult, walkRecords } from "./record-walker";

export interface ConversionResult {
  dump: LoadedDump;
  index: LocationIndex;
  walk: WalkResult;
}

export function convertDump(dump: LoadedDump): ConversionResult {
  const index = LocationIndex.forRange(dump.start, dump.end);
  const walk = walkRecords(dump.records, index);
  return { dump, index, walk };
}
