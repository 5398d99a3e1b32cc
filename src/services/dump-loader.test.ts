import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadDump, parseDump } from "./dump-loader";

const validDump = {
  device: "SM-G991B",
  starttime: "2024-03-05T10:00:00.250",
  endtime: "2024-03-05T10:05:00.750",
  data: [{ Timestamp: "2024-03-05T10:00:01" }]
};

describe("parseDump", () => {
  it("extracts device, capture window and records", () => {
    const dump = parseDump(JSON.stringify(validDump), "drive.json");

    expect(dump.source).toBe("drive.json");
    expect(dump.device).toBe("SM-G991B");
    expect(dump.start.source).toBe("2024-03-05T10:00:00.250");
    expect(dump.end.source).toBe("2024-03-05T10:05:00.750");
    expect(dump.records).toEqual([{ Timestamp: "2024-03-05T10:00:01" }]);
  });

  it("fails on malformed JSON", () => {
    expect(() => parseDump("{ not json", "drive.json")).toThrow(/^Failed to parse drive\.json: /);
  });

  it("fails when the top level is not an object", () => {
    expect(() => parseDump("[]", "drive.json")).toThrow(
      "Unsupported dump structure in drive.json: top level is not an object"
    );
  });

  it("names every missing top-level key", () => {
    expect(() => parseDump(JSON.stringify({ device: "x", data: [] }), "drive.json")).toThrow(
      "Unsupported dump structure in drive.json: missing key(s) starttime, endtime"
    );
  });

  it("fails when data is not an array", () => {
    expect(() => parseDump(JSON.stringify({ ...validDump, data: {} }), "drive.json")).toThrow(
      "Unsupported dump structure in drive.json: 'data' is not an array"
    );
  });

  it("fails on an unparseable capture window", () => {
    expect(() => parseDump(JSON.stringify({ ...validDump, starttime: "yesterday" }), "drive.json")).toThrow(
      "Invalid starttime 'yesterday' in drive.json"
    );
  });

  it("fails when only one end of the window has an offset", () => {
    expect(() =>
      parseDump(JSON.stringify({ ...validDump, endtime: "2024-03-05T10:05:00Z" }), "drive.json")
    ).toThrow("only one of them has a UTC offset");
  });
});

describe("loadDump", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "nsg-loader-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads a dump from disk", () => {
    const file = join(dir, "drive.json");
    writeFileSync(file, JSON.stringify(validDump), "utf8");

    expect(loadDump(file).device).toBe("SM-G991B");
  });

  it("fails when the file does not exist", () => {
    const file = join(dir, "missing.json");
    expect(() => loadDump(file)).toThrow(`Failed to read ${file}: `);
  });
});
