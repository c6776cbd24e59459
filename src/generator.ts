// Synthetic daily prices — a seeded random walk, one bar per business day.
//
// The seed comes from a stable hash of the symbol (optionally salted), never
// from the clock, so the same symbol and range always yield the same bars.

import {
  eachDayOfInterval,
  format,
  isValid,
  isWeekend,
  parseISO,
  subDays,
} from "date-fns";
import { Effect, Hash, Random } from "effect";
import type { DateRange, PriceBar } from "./domain.ts";
import { ParseError } from "./ticker-source.ts";

// --- Options ---

export interface GeneratorOptions {
  readonly drift: number;
  readonly volatility: number;
  readonly openNoise: number;
  readonly spreadNoise: number;
  readonly baseVolume: number;
  readonly volumeNoise: number;
  readonly minVolume: number;
  readonly minPrice: number;
  readonly maxPrice: number;
}

export const defaultGeneratorOptions: GeneratorOptions = {
  drift: 0.0002,
  volatility: 0.02,
  openNoise: 0.005,
  spreadNoise: 0.008,
  baseVolume: 500_000,
  volumeNoise: 300_000,
  minVolume: 1_000,
  minPrice: 1,
  maxPrice: 100_000,
};

// --- Seeding ---

export type SeedPolicy =
  | { readonly _tag: "BySymbol" }
  | { readonly _tag: "Salted"; readonly salt: string };

export const BySymbol: SeedPolicy = { _tag: "BySymbol" };

export const Salted = (salt: string): SeedPolicy => ({ _tag: "Salted", salt });

export function seedFor(symbol: string, policy: SeedPolicy): number {
  switch (policy._tag) {
    case "BySymbol":
      return Hash.string(symbol);
    case "Salted":
      return Hash.string(`${policy.salt}:${symbol}`);
  }
}

/** Starting price in [50, 500), fixed per symbol. */
export function basePrice(symbol: string): number {
  let sum = 0;
  for (const ch of symbol) sum += ch.codePointAt(0) ?? 0;
  return 50 + (sum % 450);
}

// --- Calendar ---

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DATE_FORMAT = "yyyy-MM-dd";

/** Monday–Friday dates in the inclusive range, ascending. */
export function businessDays(range: DateRange): ReadonlyArray<string> {
  const start = parseISO(range.start);
  const end = parseISO(range.end);
  if (start > end) return [];
  return eachDayOfInterval({ start, end })
    .filter((day) => !isWeekend(day))
    .map((day) => format(day, DATE_FORMAT));
}

/** Validate CLI dates; defaults to the year ending `today`. */
export function parseDateRange(
  start: string | undefined,
  end: string | undefined,
  today: Date,
): Effect.Effect<DateRange, ParseError> {
  const check = (label: string, value: string) =>
    ISO_DATE.test(value) && isValid(parseISO(value))
      ? Effect.succeed(value)
      : Effect.fail(
          new ParseError({ message: `Invalid ${label} date '${value}', expected YYYY-MM-DD` }),
        );

  return Effect.gen(function* () {
    const endDate = yield* check("end", end ?? format(today, DATE_FORMAT));
    const startDate = yield* check(
      "start",
      start ?? format(subDays(parseISO(endDate), 365), DATE_FORMAT),
    );
    return { start: startDate, end: endDate };
  });
}

// --- Generation ---

const round2 = (n: number): number => Math.round(n * 100) / 100;

const clamp = (n: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, n));

/** Box–Muller draw from N(mean, sd). */
const gaussian = (mean: number, sd: number): Effect.Effect<number> =>
  Effect.gen(function* () {
    const u1 = yield* Random.next;
    const u2 = yield* Random.next;
    const z = Math.sqrt(-2 * Math.log(1 - u1)) * Math.cos(2 * Math.PI * u2);
    return mean + sd * z;
  });

export function generate(
  symbol: string,
  range: DateRange,
  seedPolicy: SeedPolicy = BySymbol,
  options: GeneratorOptions = defaultGeneratorOptions,
): Effect.Effect<ReadonlyArray<PriceBar>> {
  const o = options;

  const walk = Effect.gen(function* () {
    const bars: PriceBar[] = [];
    let previousClose = basePrice(symbol);

    for (const date of businessDays(range)) {
      const logReturn = yield* gaussian(o.drift, o.volatility);
      const close = clamp(
        previousClose * Math.exp(logReturn),
        o.minPrice,
        o.maxPrice,
      );
      const open = clamp(
        previousClose * (1 + (yield* gaussian(0, o.openNoise))),
        o.minPrice,
        o.maxPrice,
      );

      const upSpread = Math.min(0.5, Math.abs(yield* gaussian(0, o.spreadNoise)));
      const downSpread = Math.min(0.5, Math.abs(yield* gaussian(0, o.spreadNoise)));
      const high = Math.max(open, close) * (1 + upSpread);
      const low = Math.min(open, close) * (1 - downSpread);

      // Wider days trade more.
      const dayRange = (high - low) / close;
      const volume = Math.max(
        o.minVolume,
        Math.round((yield* gaussian(o.baseVolume, o.volumeNoise)) * (1 + 5 * dayRange)),
      );

      bars.push({
        date,
        open: round2(open),
        high: round2(high),
        low: round2(low),
        close: round2(close),
        volume,
      });
      previousClose = close;
    }

    return bars;
  });

  // Fresh generator per run: re-running the effect replays the same series.
  return Effect.suspend(() =>
    walk.pipe(Effect.withRandom(Random.make(seedFor(symbol, seedPolicy)))),
  );
}
