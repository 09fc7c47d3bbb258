// Quote source — service definition and domain errors.

import { Context, Data, Effect } from "effect";
import type { IndexQuote } from "./domain.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

/** An expected element is missing from the page. */
export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

/** An element is present but its text is not a number. */
export class ValueError extends Data.TaggedError("ValueError")<{
  readonly message: string;
}> {}

export class UnexpectedError extends Data.TaggedError("UnexpectedError")<{
  readonly message: string;
}> {}

export type ExtractError = ParseError | ValueError;

export type QuoteSourceError = NetworkError | HttpError | ExtractError;

export type RefreshError = QuoteSourceError | UnexpectedError;

// --- Service ---

export class QuoteSource extends Context.Tag("QuoteSource")<
  QuoteSource,
  {
    readonly name: string;
    readonly fetchQuote: Effect.Effect<IndexQuote, QuoteSourceError>;
  }
>() {}
