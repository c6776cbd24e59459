// Ticker reconciliation — pure diff of two ticker lists.
//
//   previous ∖ current → Removed  (unless paired with an addition as a rename)
//   current ∖ previous → Added    (unless paired with a removal as a rename)
//   previous ∩ current → unchanged, attributes refreshed from current
//
// No I/O. Duplicate symbols are reported, not thrown.

import {
  Added,
  type ChangeEvent,
  isPlaceholder,
  Removed,
  Renamed,
  type TickerRecord,
} from "./domain.ts";
import { ConflictError } from "./ticker-source.ts";

// --- Rename rules ---

export interface SharedWordRule {
  /** Both names must be at least this long (after normalization). */
  readonly minNameLength: number;
  /** Only words at least this long count as shared. */
  readonly minWordLength: number;
}

export interface RenameRules {
  /** Equal names, or one name contained in the other. */
  readonly substring: boolean;
  /** Disabled when undefined. */
  readonly sharedWord?: SharedWordRule;
  readonly requireSameSector: boolean;
}

export const defaultRenameRules: RenameRules = {
  substring: true,
  requireSameSector: false,
};

export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/\s+/g, " ").trim();
}

/** A name carries no identity if it is the placeholder or just the symbol. */
function hasRealName(record: TickerRecord): boolean {
  return (
    !isPlaceholder(record.name) &&
    normalizeName(record.name) !== record.symbol.toLowerCase()
  );
}

export function isRenameMatch(
  removed: TickerRecord,
  added: TickerRecord,
  rules: RenameRules,
): boolean {
  if (!hasRealName(removed) || !hasRealName(added)) return false;

  if (
    rules.requireSameSector &&
    (isPlaceholder(removed.sector) || removed.sector !== added.sector)
  ) {
    return false;
  }

  const oldName = normalizeName(removed.name);
  const newName = normalizeName(added.name);

  if (
    rules.substring &&
    (oldName.includes(newName) || newName.includes(oldName))
  ) {
    return true;
  }

  if (rules.sharedWord !== undefined) {
    const { minNameLength, minWordLength } = rules.sharedWord;
    if (oldName.length < minNameLength || newName.length < minNameLength) {
      return false;
    }
    // Word of the old name found anywhere in the new one.
    return oldName
      .split(" ")
      .some((word) => word.length >= minWordLength && newName.includes(word));
  }

  return false;
}

// --- Result ---

export type TickerField = "name" | "sector" | "url";

export interface FieldUpdate {
  readonly symbol: string;
  readonly field: TickerField;
  readonly from: string;
  readonly to: string;
}

export interface ReconcileResult {
  /** Sorted by symbol. */
  readonly merged: ReadonlyArray<TickerRecord>;
  /** One per added, removed or renamed symbol, sorted by symbol. */
  readonly events: ReadonlyArray<ChangeEvent>;
  /** Symbols present in both lists, sorted. */
  readonly unchanged: ReadonlyArray<string>;
  readonly updated: ReadonlyArray<FieldUpdate>;
  readonly conflicts: ReadonlyArray<ConflictError>;
}

export interface ReconcileOptions {
  /** Stamped on every event (epoch ms). */
  readonly timestamp: number;
  readonly rules?: RenameRules;
}

// --- Helpers ---

const bySymbol = (a: { symbol: string }, b: { symbol: string }): number =>
  a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0;

function indexBySymbol(
  records: ReadonlyArray<TickerRecord>,
  side: ConflictError["side"],
): [Map<string, TickerRecord>, ConflictError[]] {
  const index = new Map<string, TickerRecord>();
  const conflicts: ConflictError[] = [];
  for (const record of records) {
    if (index.has(record.symbol)) {
      conflicts.push(new ConflictError({ symbol: record.symbol, side }));
    } else {
      index.set(record.symbol, record);
    }
  }
  return [index, conflicts];
}

/** Fresh values win, but a placeholder never replaces a known value. */
export function mergeRecord(
  previous: TickerRecord,
  current: TickerRecord,
): [TickerRecord, FieldUpdate[]] {
  const updates: FieldUpdate[] = [];
  const pick = (field: TickerField): string => {
    const from = previous[field];
    const to = current[field];
    if (isPlaceholder(to) && !isPlaceholder(from)) return from;
    if (from !== to) {
      updates.push({ symbol: current.symbol, field, from, to });
    }
    return to;
  };

  const record = {
    symbol: current.symbol,
    name: pick("name"),
    sector: pick("sector"),
    url: pick("url"),
  };
  return [record, updates];
}

// --- Reconcile ---

export function reconcile(
  previous: ReadonlyArray<TickerRecord>,
  current: ReadonlyArray<TickerRecord>,
  options: ReconcileOptions,
): ReconcileResult {
  const rules = options.rules ?? defaultRenameRules;
  const { timestamp } = options;

  const [prevIndex, prevConflicts] = indexBySymbol(previous, "previous");
  const [currIndex, currConflicts] = indexBySymbol(current, "current");

  const currentSorted = [...currIndex.values()].sort(bySymbol);
  const removed = [...prevIndex.values()]
    .filter((r) => !currIndex.has(r.symbol))
    .sort(bySymbol);

  const merged: TickerRecord[] = [];
  const updated: FieldUpdate[] = [];
  const events: ChangeEvent[] = [];
  const unchanged: string[] = [];
  const pendingAdded = new Map<string, TickerRecord>();

  for (const record of currentSorted) {
    const before = prevIndex.get(record.symbol);
    if (before === undefined) {
      pendingAdded.set(record.symbol, record);
      continue;
    }
    const [next, updates] = mergeRecord(before, record);
    merged.push(next);
    updated.push(...updates);
    unchanged.push(record.symbol);
  }

  // Greedy pairing: each removal takes the first matching addition.
  for (const oldRecord of removed) {
    const match = [...pendingAdded.values()].find((candidate) =>
      isRenameMatch(oldRecord, candidate, rules),
    );

    if (match === undefined) {
      events.push(Removed(oldRecord.symbol, timestamp));
      continue;
    }

    pendingAdded.delete(match.symbol);
    merged.push(mergeRecord(oldRecord, match)[0]);
    events.push(Renamed(oldRecord.symbol, match.symbol, timestamp));
  }

  for (const record of pendingAdded.values()) {
    merged.push(record);
    events.push(Added(record.symbol, timestamp));
  }

  return {
    merged: merged.sort(bySymbol),
    events: events.sort(bySymbol),
    unchanged,
    updated,
    conflicts: [...prevConflicts, ...currConflicts],
  };
}
