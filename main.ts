import { Command, Options } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Clock, ConfigError, Console, Effect, Layer, Option } from "effect";
import { AppConfig } from "./src/config.ts";
import {
  formatConfigError,
  formatError,
  formatPricesSummary,
  formatSyncSummary,
} from "./src/format.ts";
import { BySymbol, parseDateRange, Salted } from "./src/generator.ts";
import { formatTickerSymbol } from "./src/parser.ts";
import {
  downloadPrices,
  fullRun,
  resolveSymbols,
  syncTickers,
} from "./src/pipeline.ts";
import { makePsxMock } from "./src/providers/psx-mock.ts";
import { makePsxPortalLive } from "./src/providers/psx-portal.ts";
import { makeSnapshotStore } from "./src/snapshot-store.ts";
import { ParseError, type PipelineError } from "./src/ticker-source.ts";

// --- Options ---

const mock = Options.boolean("mock").pipe(
  Options.withDescription("Use canned listing data instead of the portal"),
);

const limit = Options.integer("limit").pipe(
  Options.withDescription("Process at most this many tickers"),
  Options.optional,
);

const skipDetails = Options.boolean("skip-details").pipe(
  Options.withDescription("Do not fetch company pages for missing names"),
);

const symbols = Options.text("symbol").pipe(
  Options.withDescription(
    "Ticker symbol, repeat for several (default: the latest snapshot's symbols)",
  ),
  Options.repeated,
);

const synthetic = Options.boolean("synthetic").pipe(
  Options.withDescription("Generate prices without asking the portal"),
);

const start = Options.text("start").pipe(
  Options.withDescription("First date, YYYY-MM-DD (default: a year before --end)"),
  Options.optional,
);

const end = Options.text("end").pipe(
  Options.withDescription("Last date, YYYY-MM-DD (default: today)"),
  Options.optional,
);

const salt = Options.text("salt").pipe(
  Options.withDescription("Vary the generated series without changing symbols"),
  Options.optional,
);

// --- Layers ---
// PSX_FETCH_SOURCE=mock (or --mock) selects canned pages.

const makeFetcher = (config: AppConfig, forceMock: boolean) =>
  forceMock || config.source === "mock"
    ? makePsxMock(config.portal)
    : makePsxPortalLive(config.portal, config.fetch).pipe(
        Layer.provide(FetchHttpClient.layer),
      );

const makeRuntime = (config: AppConfig, forceMock: boolean) =>
  Layer.merge(makeFetcher(config, forceMock), makeSnapshotStore(config.dataDir));

// --- Helpers ---

const now = Effect.map(Clock.currentTimeMillis, (ms) => new Date(ms));

const checkLimit = (
  value: Option.Option<number>,
): Effect.Effect<number | undefined, ParseError> => {
  if (Option.isNone(value)) return Effect.succeed(undefined);
  return value.value > 0
    ? Effect.succeed(value.value)
    : Effect.fail(new ParseError({ message: "--limit must be a positive integer" }));
};

const seedPolicy = (value: Option.Option<string>) =>
  Option.match(value, { onNone: () => BySymbol, onSome: Salted });

// --- Commands ---

const sync = Command.make(
  "sync",
  { mock, limit, skipDetails },
  ({ mock, limit, skipDetails }) =>
    Effect.gen(function* () {
      const config = yield* AppConfig;
      const cap = yield* checkLimit(limit);
      const startedAt = yield* now;

      const summary = yield* syncTickers(
        config,
        { limit: cap, details: !skipDetails },
        startedAt,
      ).pipe(Effect.provide(makeRuntime(config, mock)));

      yield* Console.log(formatSyncSummary(summary));
    }),
).pipe(Command.withDescription("Fetch the ticker list and record changes"));

const prices = Command.make(
  "prices",
  { symbols, mock, limit, synthetic, start, end, salt },
  ({ symbols, mock, limit, synthetic, start, end, salt }) =>
    Effect.gen(function* () {
      const config = yield* AppConfig;
      const cap = yield* checkLimit(limit);
      const range = yield* parseDateRange(
        Option.getOrUndefined(start),
        Option.getOrUndefined(end),
        yield* now,
      );

      const summary = yield* resolveSymbols(symbols.map(formatTickerSymbol), cap).pipe(
        Effect.flatMap((chosen) =>
          downloadPrices(
            chosen,
            { range, seedPolicy: seedPolicy(salt), synthetic },
            config.fetch,
          ),
        ),
        Effect.provide(makeRuntime(config, mock)),
      );

      yield* Console.log(formatPricesSummary(summary));
    }),
).pipe(Command.withDescription("Write daily prices, from the portal or synthetic"));

const run = Command.make(
  "run",
  { mock, limit, skipDetails, synthetic, start, end, salt },
  ({ mock, limit, skipDetails, synthetic, start, end, salt }) =>
    Effect.gen(function* () {
      const config = yield* AppConfig;
      const cap = yield* checkLimit(limit);
      const startedAt = yield* now;
      const range = yield* parseDateRange(
        Option.getOrUndefined(start),
        Option.getOrUndefined(end),
        startedAt,
      );

      const summary = yield* fullRun(
        config,
        {
          limit: cap,
          details: !skipDetails,
          range,
          seedPolicy: seedPolicy(salt),
          synthetic,
        },
        startedAt,
      ).pipe(Effect.provide(makeRuntime(config, mock)));

      yield* Console.log(formatSyncSummary(summary.sync));
      yield* Console.log(formatPricesSummary(summary.prices));
    }),
).pipe(Command.withDescription("Sync tickers, then write prices for them"));

const command = Command.make("psx-tickers").pipe(
  Command.withSubcommands([sync, prices, run]),
);

// --- Run ---

const cli = Command.run(command, {
  name: "psx-tickers",
  version: "0.1.0",
});

const fail = Effect.sync(() => {
  process.exitCode = 1;
});

const logPipelineError = (e: PipelineError) =>
  Console.error(formatError(e)).pipe(Effect.zipRight(fail));

cli(process.argv).pipe(
  Effect.catchIf(ConfigError.isConfigError, (e) =>
    Console.error(formatConfigError(String(e))).pipe(Effect.zipRight(fail)),
  ),
  Effect.catchTags({
    NetworkError: logPipelineError,
    ParseError: logPipelineError,
    StoreError: logPipelineError,
  }),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
