/**
 * End-of-run summary tables
 */

import pc from "picocolors";
import { tallyTotal, type ResultTally } from "../core/types.ts";

export interface SummaryInput {
  transcode: ResultTally;
  copy: ResultTally;
  logFile: string | null;
  errorLogFile: string | null;
  cancelled: boolean;
}

type Row = [metric: string, value: string];

/**
 * Strip ANSI escapes so padding is computed on visible width
 */
function visibleLength(text: string): number {
  return text.replace(/\x1b\[[0-9;]*m/g, "").length;
}

function pad(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - visibleLength(text)));
}

export function renderTable(title: string, rows: Row[]): string {
  const header: Row = ["Metric", "Value"];
  const metricWidth = Math.max(...[header, ...rows].map(([metric]) => visibleLength(metric)));
  const valueWidth = Math.max(...[header, ...rows].map(([, value]) => visibleLength(value)));

  const rule = (left: string, mid: string, right: string) =>
    left + "─".repeat(metricWidth + 2) + mid + "─".repeat(valueWidth + 2) + right;
  const line = (metric: string, value: string) => `│ ${pad(metric, metricWidth)} │ ${pad(value, valueWidth)} │`;

  return [
    pc.italic(title),
    rule("┌", "┬", "┐"),
    line(pc.bold(pc.magenta(header[0])), pc.bold(pc.magenta(header[1]))),
    rule("├", "┼", "┤"),
    ...rows.map(([metric, value]) => line(pc.dim(metric), pc.bold(pc.yellow(value)))),
    rule("└", "┴", "┘"),
  ].join("\n");
}

export function renderSummary(input: SummaryInput): string {
  const { transcode, copy } = input;

  const transcodeRows: Row[] = [
    ["Total files found", String(tallyTotal(transcode))],
    ["Successfully transcoded", String(transcode.success)],
    ["Failed to transcode", String(transcode.failed)],
    ["Skipped (up-to-date or interrupted)", String(transcode.skipped)],
    ["Dry-run", String(transcode["dry-run"])],
  ];
  if (input.logFile) transcodeRows.push(["Main log", input.logFile]);
  if (input.errorLogFile) transcodeRows.push(["Error log", input.errorLogFile]);

  const copyRows: Row[] = [
    ["Copied", String(copy.success)],
    ["Skipped (up-to-date or interrupted)", String(copy.skipped)],
    ["Dry-run", String(copy["dry-run"])],
    ["Failed", String(copy.failed)],
  ];

  const parts = [renderTable("Transcoding Summary", transcodeRows), "", renderTable("Copy Summary", copyRows)];
  if (input.cancelled) {
    parts.push("", pc.red("Run was interrupted; the counts above are partial."));
  }
  return parts.join("\n");
}
