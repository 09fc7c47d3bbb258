// Pure domain types — no framework dependency, no I/O.

export const INDEX_CODE = "TWN";
export const INDEX_NAME = "FTSE Taiwan";

/** The three numeric fields scraped from the quote page, before rounding. */
export interface IndexQuote {
  readonly price: number;
  readonly change: number;
  readonly changePercent: number;
}

export type Provenance = "live" | "default-fallback";

export interface Snapshot {
  readonly code: string;
  readonly name: string;
  readonly price: number; // quarter-point rounded
  readonly change: number;
  readonly changePercent: number;
  readonly derivedPrice: number;
  readonly derivedOffset: number;
  readonly capturedAtEpoch: number; // epoch ms
  readonly capturedAtLocal: string; // Asia/Taipei, display only
  readonly source: Provenance;
  readonly origin: string;
  readonly marketOpen: boolean;
  readonly error?: string;
}

/** Values published when nothing usable is left to serve. */
export const DEFAULT_QUOTE: IndexQuote = {
  price: 1637.5,
  change: -68.3,
  changePercent: -4.0,
};
