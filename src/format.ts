// Pure formatting functions: no I/O.

import type { ChangeReport, TickerRecord } from "./domain.ts";
import type { CycleError, FetchError } from "./screener-api.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Report formatting ---

export function formatReport(report: ChangeReport): string {
  const lines = [
    "",
    `${BOLD}  Screener run ${new Date(report.timestamp).toISOString()}${RESET}`,
  ];

  if (report.added.length === 0 && report.dropped.length === 0) {
    lines.push(
      `  ${DIM}No changes detected. Total tickers: ${report.totalObserved}${RESET}`,
    );
  }

  if (report.added.length > 0) {
    lines.push(
      `  ${GREEN}▲ Added (${report.added.length}): ${report.added.join(", ")}${RESET}`,
    );
    lines.push(...report.addedDetails.map(formatDetails));
  }

  if (report.dropped.length > 0) {
    lines.push(
      `  ${RED}▼ Dropped (${report.dropped.length}): ${report.dropped.join(", ")}${RESET}`,
    );
  }

  if (report.estimatedSourceTotal > report.totalObserved) {
    lines.push(
      `  ${DIM}Observed ${report.totalObserved} of ${report.estimatedSourceTotal} listed; only the first page is monitored.${RESET}`,
    );
  }

  lines.push("");
  return lines.join("\n");
}

function formatDetails(record: TickerRecord): string {
  return `    ${record.symbol}  ${record.companyName} (${record.sector}) ${record.price} ${record.changePercent}`;
}

// --- Failure formatting ---

export function formatFailure(error: CycleError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

export function formatCrash(defect: unknown): string {
  const detail = defect instanceof Error ? defect.message : String(defect);
  return [
    "",
    `${RED}${BOLD}  ✗ Unexpected failure${RESET}`,
    `  ${DIM}${detail}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: CycleError): ClassifiedError {
  switch (error._tag) {
    case "FetchError":
      return classifyFetchError(error);
    case "ParseError":
      return {
        title: "Unexpected page layout",
        hint: error.message,
      };
    case "EmptyResultError":
      return {
        title: "No tickers parsed",
        hint: "The page loaded but no row had enough columns. The previous snapshot was kept.",
      };
    case "PersistenceError":
      return {
        title: "Snapshot store unavailable",
        hint: error.message,
      };
  }
}

function classifyFetchError(error: FetchError): ClassifiedError {
  switch (error.reason) {
    case "Timeout":
      return {
        title: "Request timed out",
        hint: "The screener did not answer in time. The next tick will retry.",
      };
    case "Transport":
      return {
        title: "Network error",
        hint: "Could not reach the screener. Check your internet connection.",
      };
    case "Status":
      break;
  }
  if (error.status === 403) {
    return {
      title: "Request blocked",
      hint: "The screener refused the request. Try a longer poll interval.",
    };
  }
  if (error.status === 429) {
    return {
      title: "Rate limited",
      hint: "Too many requests. Increase POLL_INTERVAL.",
    };
  }
  return {
    title: "HTTP error",
    hint: `HTTP ${error.status ?? "?"}`,
  };
}
