// Ticker source — fetcher capability and domain errors.

import { Context, Data, Effect } from "effect";
import type { DateRange } from "./domain.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class ConflictError extends Data.TaggedError("ConflictError")<{
  readonly symbol: string;
  readonly side: "previous" | "current";
}> {}

export class StoreError extends Data.TaggedError("StoreError")<{
  readonly message: string;
  readonly path: string;
}> {}

export type FetchError = NetworkError | HttpError;

// HttpError never leaves the retry boundary.
export type PipelineError = NetworkError | ParseError | StoreError;

// --- Targets ---

export type ListingPage = "market-watch" | "listed-companies";

export type FetchTarget =
  | { readonly _tag: "Listing"; readonly page: ListingPage }
  | { readonly _tag: "Company"; readonly symbol: string; readonly url: string }
  | { readonly _tag: "History"; readonly symbol: string; readonly range: DateRange };

export const Listing = (page: ListingPage): FetchTarget => ({
  _tag: "Listing",
  page,
});

export const Company = (symbol: string, url: string): FetchTarget => ({
  _tag: "Company",
  symbol,
  url,
});

export const History = (symbol: string, range: DateRange): FetchTarget => ({
  _tag: "History",
  symbol,
  range,
});

export function describeTarget(target: FetchTarget): string {
  switch (target._tag) {
    case "Listing":
      return `listing:${target.page}`;
    case "Company":
      return `company:${target.symbol}`;
    case "History":
      return `history:${target.symbol}`;
  }
}

// --- Service ---

export class Fetcher extends Context.Tag("Fetcher")<
  Fetcher,
  {
    readonly fetch: (target: FetchTarget) => Effect.Effect<string, FetchError>;
  }
>() {}
