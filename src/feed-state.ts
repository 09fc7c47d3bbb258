// Feed state — pure refresh policy and fallback transitions.
//
// Two clocks are tracked:
//   snapshot.capturedAtEpoch → when the numbers were last fetched successfully
//                              (validity window for reuse on failure)
//   lastAttemptAt            → when a refresh last completed, either way
//                              (decides when the next refresh is due)
//
// This module contains only types and pure transition functions.

import type { IndexQuote, Snapshot } from "./domain.ts";
import { isMarketOpen } from "./market-hours.ts";
import { defaultSnapshot, liveSnapshot } from "./snapshot.ts";

// --- State ---

export interface FeedState {
  readonly current: Snapshot | undefined;
  readonly lastAttemptAt: number; // epoch ms
}

/** State after any completed attempt: a snapshot is always present. */
export interface PublishedState extends FeedState {
  readonly current: Snapshot;
}

export const initialState: FeedState = { current: undefined, lastAttemptAt: 0 };

// --- Policy ---

export const VALIDITY_WINDOW_MS = 300_000;

export function refreshThresholdMs(marketOpen: boolean): number {
  return marketOpen ? 20_000 : 300_000;
}

/** Whether enough time has passed since the last attempt to fetch again. */
export function isDue(state: FeedState, now: number): boolean {
  return now - state.lastAttemptAt > refreshThresholdMs(isMarketOpen(now));
}

// --- Transitions ---

export type FailureResolution = "reused" | "default";

/** State after a successful fetch. */
export function onSuccess(
  state: FeedState,
  quote: IndexQuote,
  origin: string,
  now: number,
): PublishedState {
  // Keep capture time monotonic if the wall clock stepped back.
  const capturedAt = Math.max(now, state.current?.capturedAtEpoch ?? now);
  return { current: liveSnapshot(quote, origin, capturedAt), lastAttemptAt: now };
}

/** Resolution and state after a failed fetch. */
export function onFailure(
  state: FeedState,
  error: string,
  now: number,
): [FailureResolution, PublishedState] {
  const { current } = state;

  if (current !== undefined && now - current.capturedAtEpoch < VALIDITY_WINDOW_MS) {
    return ["reused", { current: { ...current, error }, lastAttemptAt: now }];
  }

  const capturedAt = Math.max(now, current?.capturedAtEpoch ?? now);
  return ["default", { current: defaultSnapshot(error, capturedAt), lastAttemptAt: now }];
}
