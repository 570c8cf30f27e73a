import { expect, test } from "vitest";
import { formatCrash, formatFailure, formatReport } from "./format.ts";
import {
  EmptyResultError,
  FetchError,
  ParseError,
  PersistenceError,
} from "./screener-api.ts";
import type { ChangeReport } from "./domain.ts";

// --- Test data ---

const sampleReport: ChangeReport = {
  added: ["TSLA"],
  dropped: ["GOOG"],
  addedDetails: [
    {
      symbol: "TSLA",
      companyName: "Tesla Inc",
      sector: "Consumer Cyclical",
      industry: "Auto Manufacturers",
      country: "USA",
      marketCap: "800.00B",
      peRatio: "60.10",
      price: "250.00",
      changePercent: "3.20%",
      volume: "90,000,000",
    },
  ],
  timestamp: Date.parse("2024-02-09T18:00:00Z"),
  totalObserved: 3,
  estimatedSourceTotal: 57,
};

function titleOf(output: string): string {
  return output.split("\n")[1];
}

// --- formatReport ---

test("formatReport: lists added with details, dropped, and the coverage note", () => {
  expect(formatReport(sampleReport)).toBe(
    [
      "",
      "\x1b[1m  Screener run 2024-02-09T18:00:00.000Z\x1b[0m",
      "  \x1b[32m▲ Added (1): TSLA\x1b[0m",
      "    TSLA  Tesla Inc (Consumer Cyclical) 250.00 3.20%",
      "  \x1b[31m▼ Dropped (1): GOOG\x1b[0m",
      "  \x1b[2mObserved 3 of 57 listed; only the first page is monitored.\x1b[0m",
      "",
    ].join("\n"),
  );
});

test("formatReport: no changes shows the total", () => {
  const output = formatReport({
    ...sampleReport,
    added: [],
    dropped: [],
    addedDetails: [],
    estimatedSourceTotal: 0,
  });
  expect(output.split("\n")).toEqual([
    "",
    "\x1b[1m  Screener run 2024-02-09T18:00:00.000Z\x1b[0m",
    "  \x1b[2mNo changes detected. Total tickers: 3\x1b[0m",
    "",
  ]);
});

test("formatReport: no coverage note when the whole listing was seen", () => {
  const output = formatReport({ ...sampleReport, estimatedSourceTotal: 3 });
  expect(output.split("\n").some((line) => line.includes("Observed"))).toBe(
    false,
  );
});

test("formatReport: dropped only", () => {
  const output = formatReport({
    ...sampleReport,
    added: [],
    addedDetails: [],
    dropped: ["AAA", "BBB"],
  });
  expect(output.split("\n")[2]).toBe(
    "  \x1b[31m▼ Dropped (2): AAA, BBB\x1b[0m",
  );
});

// --- formatFailure ---

test("formatFailure: transport error shows network error", () => {
  const output = formatFailure(
    new FetchError({ reason: "Transport", message: "ECONNRESET" }),
  );
  expect(titleOf(output)).toBe("\x1b[31m\x1b[1m  ✗ Network error\x1b[0m");
});

test("formatFailure: timeout shows request timed out", () => {
  const output = formatFailure(
    new FetchError({ reason: "Timeout", message: "slow" }),
  );
  expect(titleOf(output)).toBe("\x1b[31m\x1b[1m  ✗ Request timed out\x1b[0m");
});

test("formatFailure: HTTP 429 shows rate limited", () => {
  const output = formatFailure(
    new FetchError({ reason: "Status", message: "HTTP 429", status: 429 }),
  );
  expect(titleOf(output)).toBe("\x1b[31m\x1b[1m  ✗ Rate limited\x1b[0m");
});

test("formatFailure: HTTP 403 shows request blocked", () => {
  const output = formatFailure(
    new FetchError({ reason: "Status", message: "HTTP 403", status: 403 }),
  );
  expect(titleOf(output)).toBe("\x1b[31m\x1b[1m  ✗ Request blocked\x1b[0m");
});

test("formatFailure: other statuses show the code", () => {
  const output = formatFailure(
    new FetchError({ reason: "Status", message: "HTTP 502", status: 502 }),
  );
  expect(output.split("\n")[2]).toBe("  \x1b[2mHTTP 502\x1b[0m");
});

test("formatFailure: ParseError shows the layout problem", () => {
  const output = formatFailure(new ParseError({ message: "No rows match" }));
  expect(titleOf(output)).toBe("\x1b[31m\x1b[1m  ✗ Unexpected page layout\x1b[0m");
  expect(output.split("\n")[2]).toBe("  \x1b[2mNo rows match\x1b[0m");
});

test("formatFailure: EmptyResultError shows no tickers parsed", () => {
  const output = formatFailure(new EmptyResultError({ message: "none" }));
  expect(titleOf(output)).toBe("\x1b[31m\x1b[1m  ✗ No tickers parsed\x1b[0m");
});

test("formatFailure: PersistenceError shows store unavailable", () => {
  const output = formatFailure(new PersistenceError({ message: "disk full" }));
  expect(titleOf(output)).toBe(
    "\x1b[31m\x1b[1m  ✗ Snapshot store unavailable\x1b[0m",
  );
});

// --- formatCrash ---

test("formatCrash: shows the defect message", () => {
  const output = formatCrash(new Error("socket closed"));
  expect(titleOf(output)).toBe("\x1b[31m\x1b[1m  ✗ Unexpected failure\x1b[0m");
  expect(output.split("\n")[2]).toBe("  \x1b[2msocket closed\x1b[0m");
});

test("formatCrash: non-Error defects are stringified", () => {
  expect(formatCrash(42).split("\n")[2]).toBe("  \x1b[2m42\x1b[0m");
});
