// Snapshot construction — pure, clock passed in.

import {
  DEFAULT_QUOTE,
  INDEX_CODE,
  INDEX_NAME,
  type IndexQuote,
  type Provenance,
  type Snapshot,
} from "./domain.ts";
import { derivePrices } from "./derived-price.ts";
import { formatMarketTime, isMarketOpen } from "./market-hours.ts";
import { roundToQuarter } from "./quantize.ts";

export const DEFAULT_ORIGIN = "default";

function build(
  quote: IndexQuote,
  source: Provenance,
  origin: string,
  now: number,
): Snapshot {
  const price = roundToQuarter(quote.price);
  return {
    code: INDEX_CODE,
    name: INDEX_NAME,
    price,
    change: quote.change,
    changePercent: quote.changePercent,
    ...derivePrices(price),
    capturedAtEpoch: now,
    capturedAtLocal: formatMarketTime(now),
    source,
    origin,
    marketOpen: isMarketOpen(now),
  };
}

export function liveSnapshot(quote: IndexQuote, origin: string, now: number): Snapshot {
  return build(quote, "live", origin, now);
}

export function defaultSnapshot(error: string, now: number): Snapshot {
  return { ...build(DEFAULT_QUOTE, "default-fallback", DEFAULT_ORIGIN, now), error };
}
