// Fetch with a fixed retry budget, and fallback across listing pages.

import { Effect, Option, Schedule } from "effect";
import type { FetchPolicy, PortalConfig } from "./config.ts";
import type { TickerRecord } from "./domain.ts";
import { parseListing } from "./parser.ts";
import {
  describeTarget,
  type FetchError,
  Fetcher,
  type FetchTarget,
  Listing,
  type ListingPage,
  NetworkError,
  ParseError,
} from "./ticker-source.ts";

// --- Retryable error predicate ---

/** Transient failures. A 404 or other client error will not improve on
 *  retry and is given up on at once. */
export function isRetryable(e: FetchError): boolean {
  switch (e._tag) {
    case "NetworkError":
      return true;
    case "HttpError":
      return e.status >= 500 || e.status === 429;
  }
}

const describeError = (e: FetchError): string =>
  e._tag === "HttpError" ? `HTTP ${e.status}` : e.message;

// --- Retry boundary ---

/** Up to `policy.attempts` tries, `policy.delay` apart. Never fails: a
 *  target that cannot be fetched yields `None` so the caller can skip it. */
export function fetchWithRetry(
  target: FetchTarget,
  policy: FetchPolicy,
): Effect.Effect<Option.Option<string>, never, Fetcher> {
  const label = describeTarget(target);

  return Effect.gen(function* () {
    const fetcher = yield* Fetcher;
    return yield* fetcher.fetch(target).pipe(
      Effect.tapError((e) =>
        Effect.logDebug(`[fetch] ${label} failed: ${describeError(e)}`),
      ),
      Effect.retry({
        while: isRetryable,
        schedule: Schedule.spaced(policy.delay).pipe(
          Schedule.compose(Schedule.recurs(policy.attempts - 1)),
        ),
      }),
      Effect.map(Option.some),
      Effect.catchAll((e) =>
        Effect.logWarning(
          `[fetch] giving up on ${label}: ${describeError(e)}`,
        ).pipe(Effect.as(Option.none<string>())),
      ),
    );
  });
}

// --- Listing fallback ---

export const LISTING_PAGES: ReadonlyArray<ListingPage> = [
  "market-watch",
  "listed-companies",
];

export interface ListingResult {
  readonly page: ListingPage;
  readonly records: ReadonlyArray<TickerRecord>;
}

/** Try each listing page in order; the first that yields tickers wins.
 *  When all fail, the last page's error is returned. */
export function loadListing(
  pages: ReadonlyArray<ListingPage>,
  portal: PortalConfig,
  policy: FetchPolicy,
): Effect.Effect<ListingResult, NetworkError | ParseError, Fetcher> {
  const attempt = (
    page: ListingPage,
  ): Effect.Effect<ListingResult, NetworkError | ParseError, Fetcher> =>
    Effect.gen(function* () {
      const html = yield* fetchWithRetry(Listing(page), policy);
      if (Option.isNone(html)) {
        return yield* Effect.fail(
          new NetworkError({ message: `${page}: page unavailable` }),
        );
      }

      const records = yield* parseListing(html.value, portal);
      if (records.length === 0) {
        return yield* Effect.fail(
          new ParseError({ message: `${page}: listing contained no tickers` }),
        );
      }
      return { page, records };
    });

  const loop = (
    index: number,
    lastError: NetworkError | ParseError,
  ): Effect.Effect<ListingResult, NetworkError | ParseError, Fetcher> => {
    if (index >= pages.length) return Effect.fail(lastError);

    const page = pages[index];

    return Effect.logDebug(`[listing] trying ${page}...`).pipe(
      Effect.flatMap(() => attempt(page)),
      Effect.tapError((e) =>
        Effect.logWarning(`[listing] ${page} failed: ${e.message}`),
      ),
      Effect.catchAll((e) => loop(index + 1, e)),
    );
  };

  return loop(0, new NetworkError({ message: "No listing pages configured" }));
}
