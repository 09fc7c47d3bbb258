// Pure formatting functions — no I/O.

import type { Snapshot } from "./domain.ts";
import { formatServerTime } from "./market-hours.ts";
import type { HttpError, QuoteSourceError } from "./quote-source.ts";

// --- Wire format ---

/** JSON shape served by the API; key names are kept for existing consumers. */
export interface WireSnapshot {
  readonly code: string;
  readonly name: string;
  readonly price: number;
  readonly change: number;
  readonly changePercent: number;
  readonly timestamp: number; // epoch seconds
  readonly taipei_time: string;
  readonly source: string;
  readonly origin: string;
  readonly tx_price: number;
  readonly tx_change: number;
  readonly is_market_hours: boolean;
  readonly error?: string;
}

export interface WireResponse extends WireSnapshot {
  readonly request_time: number; // epoch seconds
  readonly server_time: string;
}

export function toWire(snapshot: Snapshot): WireSnapshot {
  return {
    code: snapshot.code,
    name: snapshot.name,
    price: snapshot.price,
    change: snapshot.change,
    changePercent: snapshot.changePercent,
    timestamp: snapshot.capturedAtEpoch / 1000,
    taipei_time: snapshot.capturedAtLocal,
    source: snapshot.source,
    origin: snapshot.origin,
    tx_price: snapshot.derivedPrice,
    tx_change: snapshot.derivedOffset,
    is_market_hours: snapshot.marketOpen,
    ...(snapshot.error !== undefined ? { error: snapshot.error } : {}),
  };
}

export function toWireResponse(snapshot: Snapshot, now: number): WireResponse {
  return {
    ...toWire(snapshot),
    request_time: now / 1000,
    server_time: formatServerTime(now),
  };
}

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Terminal formatting ---

// Taiwanese convention: red for a rise, green for a fall.
export function formatSnapshot(snapshot: Snapshot): string {
  const up = snapshot.change >= 0;
  const direction = up ? "▲" : "▼";
  const color = up ? RED : GREEN;
  const sign = up ? "+" : "";
  const offsetSign = snapshot.derivedOffset >= 0 ? "+" : "";

  const lines = [
    "",
    `${BOLD}  ${snapshot.name} (${snapshot.code})${RESET}`,
    `  ${BOLD}${snapshot.price.toFixed(2)}${RESET}`,
    `  ${color}${direction} ${sign}${snapshot.change.toFixed(2)} (${sign}${snapshot.changePercent.toFixed(2)}%)${RESET}`,
    `  Futures est. ${snapshot.derivedPrice} (${offsetSign}${snapshot.derivedOffset})`,
    `  ${DIM}${snapshot.capturedAtLocal} Taipei · ${snapshot.origin}${snapshot.marketOpen ? " · market open" : ""}${RESET}`,
  ];
  if (snapshot.error !== undefined) {
    lines.push(`  ${YELLOW}${snapshot.error}${RESET}`);
  }
  lines.push("");

  return lines.join("\n");
}

// --- Error formatting ---

export function formatError(error: QuoteSourceError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: QuoteSourceError): ClassifiedError {
  switch (error._tag) {
    case "NetworkError":
      return {
        title: "Network error",
        hint: "Could not reach the quote page. Check your internet connection.",
      };
    case "HttpError":
      return classifyHttpError(error);
    case "ParseError":
      return {
        title: "Page layout changed",
        hint: error.message,
      };
    case "ValueError":
      return {
        title: "Unexpected value",
        hint: error.message,
      };
  }
}

function classifyHttpError(error: HttpError): ClassifiedError {
  if (error.status === 403 || error.status === 429) {
    return {
      title: "Blocked by upstream",
      hint: "The quote page refused the request. Wait a moment and try again.",
    };
  }
  if (error.status >= 500 && error.status < 600) {
    return {
      title: "Server error",
      hint: "The quote page is having issues. Try again in a few minutes.",
    };
  }
  return {
    title: "HTTP error",
    hint: `HTTP ${error.status}`,
  };
}
