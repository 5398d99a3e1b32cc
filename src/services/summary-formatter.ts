import { ConversionResult } from "./converter";

export interface DumpSummary {
  device: string;
  start: string;
  end: string;
  records: number;
  recordsAccepted: number;
  recordsSkipped: number;
  messages: number;
  events: number;
  seconds: number;
  coveredSeconds: number;
  categories: Map<string, number>;
  directions: Map<string, number>;
}

export function buildDumpSummary(result: ConversionResult): DumpSummary {
  const { dump, index, walk } = result;
  return {
    device: dump.device,
    start: dump.start.source,
    end: dump.end.source,
    records: dump.records.length,
    recordsAccepted: walk.recordsAccepted,
    recordsSkipped: walk.issues.filter((issue) => issue.kind === "record").length,
    messages: walk.messages.length,
    events: walk.events.length,
    seconds: index.size,
    coveredSeconds: index.coveredSeconds(),
    categories: countBy(walk.messages, (message) => message.category),
    directions: countBy(walk.messages, (message) => message.direction)
  };
}

export function formatDumpSummary(summary: DumpSummary): string {
  const coverage = summary.seconds > 0 ? ((summary.coveredSeconds / summary.seconds) * 100).toFixed(1) : "0.0";

  let output = `\nDevice: ${summary.device}\n`;
  output += `Window: ${summary.start} -> ${summary.end}\n`;
  output += `Records: ${summary.records} (${summary.recordsAccepted} accepted, ${summary.recordsSkipped} skipped)\n`;
  output += `Messages: ${summary.messages}\n`;
  output += `Events: ${summary.events}\n`;
  output += `Location coverage: ${summary.coveredSeconds}/${summary.seconds} seconds (${coverage}%)\n`;

  if (summary.messages === 0) {
    return `${output}\n`;
  }

  const rows: string[][] = [];
  for (const [category, count] of sortedEntries(summary.categories)) {
    rows.push(["category", category, String(count)]);
  }
  for (const [direction, count] of sortedEntries(summary.directions)) {
    rows.push(["direction", direction, String(count)]);
  }

  output += `\n${renderTable(["Field", "Value", "Messages"], rows)}\n`;
  return output;
}

export function renderTable(headers: string[], rows: string[][]): string {
  const columnWidths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index].length))
  );

  const topBorder = `┌${columnWidths.map((w) => "─".repeat(w + 2)).join("┬")}┐`;
  const midBorder = `├${columnWidths.map((w) => "─".repeat(w + 2)).join("┼")}┤`;
  const bottomBorder = `└${columnWidths.map((w) => "─".repeat(w + 2)).join("┴")}┘`;

  const renderRow = (contents: string[]): string =>
    contents.map((value, index) => ` ${value.padEnd(columnWidths[index], " ")} `).join("│");

  const lines = [topBorder, `│${renderRow(headers)}│`, midBorder];
  for (const row of rows) {
    lines.push(`│${renderRow(row)}│`);
  }
  lines.push(bottomBorder);
  return lines.join("\n");
}

export function countBy<T>(items: T[], mapper: (item: T) => string): Map<string, number> {
  const map = new Map<string, number>();
  for (const item of items) {
    const key = mapper(item);
    map.set(key, (map.get(key) ?? 0) + 1);
  }
  return map;
}

function sortedEntries(map: Map<string, number>): Array<[string, number]> {
  return Array.from(map.entries()).sort(([a], [b]) => a.localeCompare(b));
}
