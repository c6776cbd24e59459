// Snapshot store — timestamped ticker snapshots, change log, price files.
//
// Layout under the data directory:
//   snapshots/tickers_<yyyyMMddTHHmmssSSSZ>.json   one per run, never overwritten
//   ticker_changes.log                             append-only, a block per run
//   prices/<SYMBOL>.csv                            replaced per generation

import { FileSystem, Path } from "@effect/platform";
import { Context, Effect, Layer, Option, Schema } from "effect";
import {
  type ChangeEvent,
  type PriceBar,
  type Snapshot,
  type TickerRecord,
  UNKNOWN,
} from "./domain.ts";
import { changeLogHeader, changeLogLine, pricesCsv } from "./format.ts";
import { StoreError } from "./ticker-source.ts";

// --- Snapshot file schema ---

// Older snapshots may lack sector or url.
const StoredTicker = Schema.Struct({
  symbol: Schema.String,
  name: Schema.optionalWith(Schema.String, { default: () => UNKNOWN }),
  sector: Schema.optionalWith(Schema.String, { default: () => UNKNOWN }),
  url: Schema.optionalWith(Schema.String, { default: () => "" }),
});

const SnapshotFile = Schema.parseJson(Schema.Array(StoredTicker));

// --- Naming ---

const SNAPSHOT_PATTERN = /^tickers_\d{8}T\d{9}Z\.json$/;

export function snapshotFileName(takenAt: Date): string {
  return `tickers_${takenAt.toISOString().replace(/[-:.]/g, "")}.json`;
}

export function priceFileName(symbol: string): string {
  return `${symbol.replace(/[^A-Za-z0-9_-]/g, "_")}.csv`;
}

// --- Service ---

export class SnapshotStore extends Context.Tag("SnapshotStore")<
  SnapshotStore,
  {
    /** Newest snapshot by filename order. */
    readonly latest: Effect.Effect<Option.Option<Snapshot>, StoreError>;
    readonly save: (
      records: ReadonlyArray<TickerRecord>,
      takenAt: Date,
    ) => Effect.Effect<string, StoreError>;
    /** A header line for the run, then one line per event. */
    readonly appendLog: (
      takenAt: Date,
      events: ReadonlyArray<ChangeEvent>,
    ) => Effect.Effect<void, StoreError>;
    readonly writePrices: (
      symbol: string,
      bars: ReadonlyArray<PriceBar>,
    ) => Effect.Effect<string, StoreError>;
  }
>() {}

// --- File system layer ---

export const makeSnapshotStore = (dataDir: string) =>
  Layer.effect(
    SnapshotStore,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const path = yield* Path.Path;

      const snapshotDir = path.join(dataDir, "snapshots");
      const pricesDir = path.join(dataDir, "prices");
      const changeLog = path.join(dataDir, "ticker_changes.log");

      const storeError =
        (target: string) =>
        (e: { readonly message: string }) =>
          new StoreError({ message: e.message, path: target });

      const ensureDir = (dir: string) =>
        fs
          .makeDirectory(dir, { recursive: true })
          .pipe(Effect.mapError(storeError(dir)));

      // Readers see either the old file or the complete new one.
      const writeAtomic = (file: string, content: string) => {
        const partial = `${file}.partial`;
        return fs.writeFileString(partial, content).pipe(
          Effect.zipRight(fs.rename(partial, file)),
          Effect.tapError(() =>
            fs.remove(partial).pipe(
              Effect.catchAll((e) =>
                Effect.logWarning(`Could not remove ${partial}: ${e.message}`),
              ),
            ),
          ),
          Effect.mapError(storeError(file)),
        );
      };

      const latest: Effect.Effect<Option.Option<Snapshot>, StoreError> =
        Effect.gen(function* () {
          const exists = yield* fs
            .exists(snapshotDir)
            .pipe(Effect.mapError(storeError(snapshotDir)));
          if (!exists) return Option.none();

          const names = yield* fs
            .readDirectory(snapshotDir)
            .pipe(Effect.mapError(storeError(snapshotDir)));
          const newest = names.filter((n) => SNAPSHOT_PATTERN.test(n)).sort().at(-1);
          if (newest === undefined) return Option.none();

          const file = path.join(snapshotDir, newest);
          const text = yield* fs
            .readFileString(file)
            .pipe(Effect.mapError(storeError(file)));
          const records = yield* Schema.decodeUnknown(SnapshotFile)(text).pipe(
            Effect.mapError(
              (e) =>
                new StoreError({
                  message: `Unreadable snapshot: ${e.message}`,
                  path: file,
                }),
            ),
          );

          return Option.some({ path: file, records });
        });

      const save = (records: ReadonlyArray<TickerRecord>, takenAt: Date) =>
        Effect.gen(function* () {
          yield* ensureDir(snapshotDir);
          const file = path.join(snapshotDir, snapshotFileName(takenAt));

          const exists = yield* fs
            .exists(file)
            .pipe(Effect.mapError(storeError(file)));
          if (exists) {
            return yield* Effect.fail(
              new StoreError({ message: "Snapshot already exists", path: file }),
            );
          }

          yield* writeAtomic(file, `${JSON.stringify(records, null, 2)}\n`);
          return file;
        });

      const appendLog = (takenAt: Date, events: ReadonlyArray<ChangeEvent>) =>
        ensureDir(dataDir).pipe(
          Effect.zipRight(
            fs
              .writeFileString(
                changeLog,
                [changeLogHeader(takenAt), ...events.map(changeLogLine)]
                  .map((line) => `${line}\n`)
                  .join(""),
                { flag: "a" },
              )
              .pipe(Effect.mapError(storeError(changeLog))),
          ),
        );

      const writePrices = (symbol: string, bars: ReadonlyArray<PriceBar>) =>
        Effect.gen(function* () {
          yield* ensureDir(pricesDir);
          const file = path.join(pricesDir, priceFileName(symbol));
          yield* writeAtomic(file, pricesCsv(bars));
          return file;
        });

      return SnapshotStore.of({ latest, save, appendLog, writePrices });
    }),
  );
