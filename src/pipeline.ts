// Pipeline — ticker sync, daily prices, and the full run.

import { Effect, Option } from "effect";
import type { AppConfig, FetchPolicy } from "./config.ts";
import {
  type DateRange,
  isPlaceholder,
  type PriceBar,
  type TickerRecord,
} from "./domain.ts";
import { generate, type SeedPolicy } from "./generator.ts";
import { fetchWithRetry, LISTING_PAGES, loadListing } from "./listing-fallback.ts";
import { parseCompanyDetails, parseHistory } from "./parser.ts";
import { reconcile, type ReconcileResult } from "./reconciler.ts";
import { SnapshotStore } from "./snapshot-store.ts";
import {
  Company,
  Fetcher,
  History,
  type ListingPage,
  type NetworkError,
  ParseError,
  type StoreError,
} from "./ticker-source.ts";

// --- Types ---

export interface SyncOptions {
  /** Cap on per-ticker work; the listing itself is never cut. */
  readonly limit?: number;
  readonly details: boolean;
}

export interface SyncSummary {
  readonly page: ListingPage;
  readonly snapshotPath: string;
  readonly previousPath?: string;
  readonly result: ReconcileResult;
  /** Symbols within `limit`, in listing order. */
  readonly processed: ReadonlyArray<string>;
  /** Symbols whose company page could not be used. */
  readonly skipped: ReadonlyArray<string>;
}

export type PriceSource = "portal" | "synthetic";

export interface PriceOptions {
  readonly range: DateRange;
  readonly seedPolicy: SeedPolicy;
  /** Skip the portal and always generate. */
  readonly synthetic: boolean;
}

export interface PriceFile {
  readonly symbol: string;
  readonly bars: number;
  readonly path: string;
  readonly source: PriceSource;
}

export interface PricesSummary {
  readonly range: DateRange;
  readonly files: ReadonlyArray<PriceFile>;
}

export interface FullRunOptions extends SyncOptions, PriceOptions {}

export interface FullRunSummary {
  readonly sync: SyncSummary;
  readonly prices: PricesSummary;
}

const takeLimit = <A>(items: ReadonlyArray<A>, limit?: number) =>
  limit === undefined ? items : items.slice(0, limit);

// --- Company details ---

const needsDetails = (record: TickerRecord): boolean =>
  isPlaceholder(record.name) || isPlaceholder(record.sector);

interface Enriched {
  readonly record: TickerRecord;
  readonly skipped: boolean;
}

/** Fill placeholder name/sector from the company page. A page that cannot
 *  be fetched or has no record leaves the ticker as it was. */
export function enrichRecord(
  record: TickerRecord,
  policy: FetchPolicy,
): Effect.Effect<Enriched, never, Fetcher> {
  if (!needsDetails(record)) return Effect.succeed({ record, skipped: false });

  return Effect.gen(function* () {
    const page = yield* fetchWithRetry(Company(record.symbol, record.url), policy);
    if (Option.isNone(page)) return { record, skipped: true };

    const details = parseCompanyDetails(record.symbol, page.value);
    if (!details.found) {
      yield* Effect.logWarning("No company record on the portal");
      return { record, skipped: true };
    }

    return {
      record: {
        ...record,
        name: isPlaceholder(record.name) ? details.name : record.name,
        sector: isPlaceholder(record.sector) ? details.sector : record.sector,
      },
      skipped: false,
    };
  }).pipe(Effect.annotateLogs("symbol", record.symbol));
}

export function enrichDetails(
  records: ReadonlyArray<TickerRecord>,
  policy: FetchPolicy,
  limit?: number,
): Effect.Effect<
  { readonly records: ReadonlyArray<TickerRecord>; readonly skipped: ReadonlyArray<string> },
  never,
  Fetcher
> {
  const head = takeLimit(records, limit);
  const tail = records.slice(head.length);

  // One request at a time.
  return Effect.forEach(head, (record) => enrichRecord(record, policy)).pipe(
    Effect.map((results) => ({
      records: [...results.map((r) => r.record), ...tail],
      skipped: results.filter((r) => r.skipped).map((r) => r.record.symbol),
    })),
  );
}

// --- Sync ---

export function syncTickers(
  config: AppConfig,
  options: SyncOptions,
  startedAt: Date,
): Effect.Effect<
  SyncSummary,
  NetworkError | ParseError | StoreError,
  Fetcher | SnapshotStore
> {
  return Effect.gen(function* () {
    const store = yield* SnapshotStore;

    const listing = yield* loadListing(LISTING_PAGES, config.portal, config.fetch);
    yield* Effect.logInfo(
      `Fetched ${listing.records.length} tickers from ${listing.page}`,
    );

    const { records, skipped } = options.details
      ? yield* enrichDetails(listing.records, config.fetch, options.limit)
      : { records: listing.records, skipped: [] };

    const previous = Option.getOrUndefined(yield* store.latest);
    if (previous === undefined) {
      yield* Effect.logInfo("No previous snapshot, every ticker is new");
    }

    const result = reconcile(previous?.records ?? [], records, {
      timestamp: startedAt.getTime(),
      rules: config.rename,
    });

    for (const conflict of result.conflicts) {
      yield* Effect.logWarning(
        `Duplicate symbol ${conflict.symbol} in ${conflict.side} list, keeping the first`,
      );
    }
    for (const update of result.updated) {
      yield* Effect.logDebug(
        `${update.symbol} ${update.field}: '${update.from}' -> '${update.to}'`,
      );
    }

    const snapshotPath = yield* store.save(result.merged, startedAt);
    yield* store.appendLog(startedAt, result.events);
    yield* Effect.logInfo(
      `Saved ${result.merged.length} tickers, ${result.events.length} changes`,
    );

    return {
      page: listing.page,
      snapshotPath,
      previousPath: previous?.path,
      result,
      processed: takeLimit(listing.records, options.limit).map((r) => r.symbol),
      skipped,
    };
  });
}

// --- Prices ---

/** Explicit symbols, or every symbol in the latest snapshot. */
export function resolveSymbols(
  symbols: ReadonlyArray<string>,
  limit?: number,
): Effect.Effect<ReadonlyArray<string>, ParseError | StoreError, SnapshotStore> {
  if (symbols.length > 0) return Effect.succeed(takeLimit(symbols, limit));

  return Effect.gen(function* () {
    const store = yield* SnapshotStore;
    const latest = yield* store.latest;
    if (Option.isNone(latest)) {
      return yield* Effect.fail(
        new ParseError({
          message: "No ticker snapshot yet; run sync first or pass --symbol",
        }),
      );
    }

    yield* Effect.logInfo(`Using symbols from ${latest.value.path}`);
    return takeLimit(
      latest.value.records.map((r) => r.symbol),
      limit,
    );
  });
}

const inRange = (range: DateRange) => (bar: PriceBar): boolean =>
  bar.date >= range.start && bar.date <= range.end;

/** Portal history within the range; empty when the page is unavailable
 *  or has no usable rows. */
export function fetchHistory(
  symbol: string,
  range: DateRange,
  policy: FetchPolicy,
): Effect.Effect<ReadonlyArray<PriceBar>, never, Fetcher> {
  return fetchWithRetry(History(symbol, range), policy).pipe(
    Effect.map((page) =>
      Option.match(page, {
        onNone: (): ReadonlyArray<PriceBar> => [],
        onSome: (html) => parseHistory(html).filter(inRange(range)),
      }),
    ),
  );
}

/** One CSV per symbol: portal history where there is any, otherwise a
 *  synthetic series. */
export function downloadPrices(
  symbols: ReadonlyArray<string>,
  options: PriceOptions,
  policy: FetchPolicy,
): Effect.Effect<PricesSummary, StoreError, Fetcher | SnapshotStore> {
  return Effect.gen(function* () {
    const store = yield* SnapshotStore;

    const files = yield* Effect.forEach(symbols, (symbol) =>
      Effect.gen(function* () {
        const live: ReadonlyArray<PriceBar> = options.synthetic
          ? []
          : yield* fetchHistory(symbol, options.range, policy);

        let bars = live;
        let source: PriceSource = "portal";
        if (live.length === 0) {
          if (!options.synthetic) {
            yield* Effect.logInfo("No portal history, generating prices");
          }
          bars = yield* generate(symbol, options.range, options.seedPolicy);
          source = "synthetic";
        }

        const path = yield* store.writePrices(symbol, bars);
        yield* Effect.logDebug(`Wrote ${bars.length} ${source} bars`);
        return { symbol, bars: bars.length, path, source };
      }).pipe(Effect.annotateLogs("symbol", symbol)),
    );

    yield* Effect.logInfo(`Wrote prices for ${files.length} tickers`);
    return { range: options.range, files };
  });
}

// --- Full run ---

export function fullRun(
  config: AppConfig,
  options: FullRunOptions,
  startedAt: Date,
): Effect.Effect<
  FullRunSummary,
  NetworkError | ParseError | StoreError,
  Fetcher | SnapshotStore
> {
  return Effect.gen(function* () {
    const sync = yield* syncTickers(config, options, startedAt);
    const prices = yield* downloadPrices(sync.processed, options, config.fetch);
    return { sync, prices };
  });
}
