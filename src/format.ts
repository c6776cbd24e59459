// Pure formatting functions — no I/O.

import type { ChangeEvent, PriceBar } from "./domain.ts";
import type { PricesSummary, SyncSummary } from "./pipeline.ts";
import type { PipelineError } from "./ticker-source.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Files ---

export function changeLogHeader(takenAt: Date): string {
  return `=== ${takenAt.toISOString()} ===`;
}

/** One change-log line per event. */
export function changeLogLine(event: ChangeEvent): string {
  const at = new Date(event.timestamp).toISOString();
  switch (event._tag) {
    case "Added":
      return `${at} ADDED ${event.symbol}`;
    case "Removed":
      return `${at} REMOVED ${event.symbol}`;
    case "Renamed":
      return `${at} RENAMED ${event.previousSymbol} -> ${event.symbol}`;
  }
}

export const PRICES_HEADER = "date,open,high,low,close,volume";

export function pricesCsv(bars: ReadonlyArray<PriceBar>): string {
  const rows = bars.map((b) =>
    [
      b.date,
      b.open.toFixed(2),
      b.high.toFixed(2),
      b.low.toFixed(2),
      b.close.toFixed(2),
      String(b.volume),
    ].join(","),
  );
  return [PRICES_HEADER, ...rows].join("\n") + "\n";
}

// --- Run summaries ---

function eventLine(event: ChangeEvent): string {
  switch (event._tag) {
    case "Added":
      return `  ${GREEN}+ ${event.symbol}${RESET}`;
    case "Removed":
      return `  ${RED}- ${event.symbol}${RESET}`;
    case "Renamed":
      return `  ${YELLOW}~ ${event.previousSymbol} → ${event.symbol}${RESET}`;
  }
}

export function formatSyncSummary(summary: SyncSummary): string {
  const { result } = summary;
  const lines = [
    "",
    `${BOLD}  Ticker sync (${summary.page})${RESET}`,
    `  ${result.merged.length} tickers saved to ${summary.snapshotPath}`,
  ];

  if (summary.previousPath === undefined) {
    lines.push(`  ${DIM}First snapshot, no previous list to compare${RESET}`);
  } else if (result.events.length === 0) {
    lines.push(`  ${DIM}No changes since ${summary.previousPath}${RESET}`);
  } else {
    lines.push(`  ${DIM}Changes since ${summary.previousPath}:${RESET}`);
    lines.push(...result.events.map(eventLine));
  }

  if (result.updated.length > 0) {
    lines.push(`  ${DIM}${result.updated.length} field updates${RESET}`);
  }
  if (summary.skipped.length > 0) {
    lines.push(
      `  ${YELLOW}Details unavailable for: ${summary.skipped.join(", ")}${RESET}`,
    );
  }

  lines.push("");
  return lines.join("\n");
}

export function formatPricesSummary(summary: PricesSummary): string {
  return [
    "",
    `${BOLD}  Daily prices ${summary.range.start} → ${summary.range.end}${RESET}`,
    ...summary.files.map(
      (f) => `  ${f.symbol}: ${f.bars} bars (${f.source}) → ${f.path}`,
    ),
    "",
  ].join("\n");
}

// --- Error formatting ---

export function formatError(error: PipelineError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

export function formatConfigError(detail: string): string {
  return [
    "",
    `${RED}${BOLD}  ✗ Invalid configuration${RESET}`,
    `  ${DIM}${detail}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: PipelineError): ClassifiedError {
  switch (error._tag) {
    case "NetworkError":
      return {
        title: "Network error",
        hint: `${error.message}. Check your connection, or run with --mock.`,
      };
    case "ParseError":
      return {
        title: "Could not parse input",
        hint: error.message,
      };
    case "StoreError":
      return {
        title: "Could not read or write data files",
        hint: `${error.path}: ${error.message}`,
      };
  }
}
