/** A JSON object from the dump, before any field is trusted. */
export type RawObject = Record<string, unknown>;

/**
 * Top level of an NSG JSON dump. Records in `data` carry `Timestamp` or
 * `EquipmentTimestamp`, and optionally `Location`, `messages` and `events`.
 */
export interface NsgRawDump {
  device: string;
  starttime: string;
  endtime: string;
  data: unknown[];
}
