// Pure domain types — no framework dependency, no I/O.

/** Placeholder for a name or sector the source did not provide. */
export const UNKNOWN = "Unknown";

// --- Tickers ---

export interface TickerRecord {
  readonly symbol: string;
  readonly name: string;
  readonly sector: string;
  readonly url: string;
}

export const isPlaceholder = (value: string): boolean =>
  value.trim().length === 0 || value === UNKNOWN;

// --- Change events ---

export type Added = {
  readonly _tag: "Added";
  readonly symbol: string;
  readonly timestamp: number; // epoch ms
};

export type Removed = {
  readonly _tag: "Removed";
  readonly symbol: string;
  readonly timestamp: number;
};

export type Renamed = {
  readonly _tag: "Renamed";
  readonly symbol: string;
  readonly previousSymbol: string;
  readonly timestamp: number;
};

export type ChangeEvent = Added | Removed | Renamed;

export const Added = (symbol: string, timestamp: number): Added => ({
  _tag: "Added",
  symbol,
  timestamp,
});

export const Removed = (symbol: string, timestamp: number): Removed => ({
  _tag: "Removed",
  symbol,
  timestamp,
});

export const Renamed = (
  previousSymbol: string,
  symbol: string,
  timestamp: number,
): Renamed => ({
  _tag: "Renamed",
  symbol,
  previousSymbol,
  timestamp,
});

// --- Prices ---

export interface PriceBar {
  readonly date: string; // YYYY-MM-DD
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export interface DateRange {
  readonly start: string; // YYYY-MM-DD, inclusive
  readonly end: string; // YYYY-MM-DD, inclusive
}

// --- Snapshots ---

export interface Snapshot {
  readonly path: string;
  readonly records: ReadonlyArray<TickerRecord>;
}
