import { convertDump } from "./converter";
import { parseDump } from "./dump-loader";
import { DumpSummary, buildDumpSummary, formatDumpSummary, renderTable } from "./summary-formatter";

const dump = parseDump(
  JSON.stringify({
    device: "SM-G991B",
    starttime: "2024-03-05T10:00:00",
    endtime: "2024-03-05T10:00:02",
    data: [
      {
        Timestamp: "2024-03-05T10:00:01",
        Location: { Latitude: 48.8566, Longitude: 2.3522 },
        messages: [{ Category: "NR", Direction: "DOWN", Title: "RRC Reconfiguration", Timestamp: "2024-03-05T10:00:01" }]
      },
      {
        Timestamp: "2024-03-05T10:00:02",
        messages: [{ Category: "EMM", Direction: "UP", Title: "Service request", Timestamp: "2024-03-05T10:00:02" }]
      },
      { Timestamp: "2024-03-05T09:00:00" }
    ]
  }),
  "drive.json"
);

describe("buildDumpSummary", () => {
  it("counts records, payloads and location coverage", () => {
    const summary = buildDumpSummary(convertDump(dump));

    expect(summary).toMatchObject({
      device: "SM-G991B",
      start: "2024-03-05T10:00:00",
      end: "2024-03-05T10:00:02",
      records: 3,
      recordsAccepted: 2,
      recordsSkipped: 1,
      messages: 2,
      events: 0,
      seconds: 3,
      coveredSeconds: 1
    });
    expect(Array.from(summary.categories.entries())).toEqual([
      ["NR", 1],
      ["EMM", 1]
    ]);
    expect(Array.from(summary.directions.entries())).toEqual([
      ["DOWN", 1],
      ["UP", 1]
    ]);
  });
});

describe("formatDumpSummary", () => {
  it("prints the header lines and a sorted breakdown table", () => {
    const output = formatDumpSummary(buildDumpSummary(convertDump(dump)));

    expect(
      output.startsWith(
        "\nDevice: SM-G991B\n" +
          "Window: 2024-03-05T10:00:00 -> 2024-03-05T10:00:02\n" +
          "Records: 3 (2 accepted, 1 skipped)\n" +
          "Messages: 2\n" +
          "Events: 0\n" +
          "Location coverage: 1/3 seconds (33.3%)\n"
      )
    ).toBe(true);

    const lines = output.split("\n");
    const categoryRows = lines.filter((line) => line.startsWith("│ category"));
    expect(categoryRows).toEqual(["│ category  │ EMM   │ 1        │", "│ category  │ NR    │ 1        │"]);
    expect(lines).toContain("│ direction │ DOWN  │ 1        │");
  });

  it("omits the table when there are no messages", () => {
    const summary: DumpSummary = {
      device: "A52",
      start: "2024-03-05T10:00:00",
      end: "2024-03-05T09:00:00",
      records: 0,
      recordsAccepted: 0,
      recordsSkipped: 0,
      messages: 0,
      events: 0,
      seconds: 0,
      coveredSeconds: 0,
      categories: new Map(),
      directions: new Map()
    };

    expect(formatDumpSummary(summary)).toBe(
      "\nDevice: A52\n" +
        "Window: 2024-03-05T10:00:00 -> 2024-03-05T09:00:00\n" +
        "Records: 0 (0 accepted, 0 skipped)\n" +
        "Messages: 0\n" +
        "Events: 0\n" +
        "Location coverage: 0/0 seconds (0.0%)\n\n"
    );
  });
});

describe("renderTable", () => {
  it("pads every column to its widest cell", () => {
    expect(renderTable(["A", "Bb"], [["x", "yyy"]])).toBe(
      ["┌───┬─────┐", "│ A │ Bb  │", "├───┼─────┤", "│ x │ yyy │", "└───┴─────┘"].join("\n")
    );
  });
});
