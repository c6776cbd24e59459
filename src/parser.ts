// HTML parsing — portal pages into ticker records. Pure, no I/O.

import * as cheerio from "cheerio";
import { format, isValid, parse, parseISO } from "date-fns";
import { Effect } from "effect";
import { companyUrl, type PortalConfig } from "./config.ts";
import { type PriceBar, type TickerRecord, UNKNOWN } from "./domain.ts";
import { ParseError } from "./ticker-source.ts";

// --- Symbols ---

/** Trim, uppercase, and drop any exchange suffix such as `.PA`. */
export function formatTickerSymbol(raw: string): string {
  const symbol = raw.trim().toUpperCase();
  const dot = symbol.indexOf(".");
  return dot === -1 ? symbol : symbol.slice(0, dot);
}

// "Select..." rows come from the portal's filter dropdowns.
const isListedSymbol = (symbol: string): boolean =>
  symbol.length > 1 && !symbol.includes("SELECT");

const clean = (text: string): string => text.replace(/\s+/g, " ").trim();

const orUnknown = (text: string): string => {
  const value = clean(text);
  return value.length > 0 ? value : UNKNOWN;
};

// --- Listing ---

interface ColumnMap {
  readonly symbol?: number;
  readonly name?: number;
  readonly sector?: number;
}

/** Column positions by header text; the first matching header wins. */
export function mapColumns(headers: ReadonlyArray<string>): ColumnMap {
  let symbol: number | undefined;
  let name: number | undefined;
  let sector: number | undefined;

  headers.forEach((header, i) => {
    const text = header.trim().toUpperCase();
    if (text.includes("SYMBOL")) symbol ??= i;
    else if (text.includes("NAME") || text.includes("COMPANY")) name ??= i;
    else if (text.includes("SECTOR")) sector ??= i;
  });

  return { symbol, name, sector };
}

// Listed-companies page: symbol, name, sector by position.
const POSITIONAL: ColumnMap = { symbol: 0, name: 1, sector: 2 };

function resolveUrl(
  href: string | undefined,
  symbol: string,
  portal: PortalConfig,
): string {
  if (href === undefined || href.trim().length === 0) {
    return companyUrl(portal.companyUrlTemplate, symbol);
  }
  try {
    return new URL(href.trim(), portal.baseUrl).toString();
  } catch {
    return companyUrl(portal.companyUrlTemplate, symbol);
  }
}

export function parseListing(
  html: string,
  portal: PortalConfig,
): Effect.Effect<ReadonlyArray<TickerRecord>, ParseError> {
  const $ = cheerio.load(html);

  const tables = $("table")
    .toArray()
    .map((el) => ({
      table: $(el),
      headers: $(el)
        .find("th")
        .toArray()
        .map((th) => $(th).text()),
    }));

  const primary =
    tables.find((t) => t.table.hasClass("table")) ??
    tables.find((t) =>
      t.headers.some((h) => h.toUpperCase().includes("SYMBOL")),
    );
  const fallback = tables.find((t) => t.table.hasClass("views-table"));

  const chosen = primary ?? fallback;
  if (chosen === undefined) {
    return Effect.fail(new ParseError({ message: "No ticker table found" }));
  }

  const columns =
    primary !== undefined ? mapColumns(chosen.headers) : POSITIONAL;
  const symbolColumn = columns.symbol ?? 0;

  const records: TickerRecord[] = [];
  chosen.table.find("tbody tr").each((_, row) => {
    const cells = $(row).find("td");
    if (cells.length < 2) return;

    const textAt = (index: number | undefined) =>
      index === undefined ? "" : cells.eq(index).text();

    const symbol = formatTickerSymbol(textAt(symbolColumn));
    if (!isListedSymbol(symbol)) return;

    records.push({
      symbol,
      name: orUnknown(textAt(columns.name)),
      sector: orUnknown(textAt(columns.sector)),
      url: resolveUrl(
        cells.eq(symbolColumn).find("a").attr("href"),
        symbol,
        portal,
      ),
    });
  });

  return Effect.succeed(records);
}

// --- Company page ---

export interface CompanyDetails {
  readonly found: boolean;
  readonly name: string;
  readonly sector: string;
}

const NAME_SELECTORS = ["h1", "h2", "h3", ".company-name", ".profile-title"];

const SECTOR_SELECTORS = [
  ".sector",
  ".industry",
  ".category",
  ".profile-sector",
  ".company-sector",
];

export function parseCompanyDetails(
  symbol: string,
  html: string,
): CompanyDetails {
  const $ = cheerio.load(html);

  if ($.root().text().toLowerCase().includes("no record found")) {
    return { found: false, name: UNKNOWN, sector: UNKNOWN };
  }

  const firstText = (selector: string) => clean($(selector).first().text());

  // Headings that only repeat the symbol carry no name.
  let name = NAME_SELECTORS.map(firstText).find(
    (text) => text.length > symbol.length && text !== symbol,
  );

  if (name === undefined) {
    // Titles read "Company Name - Exchange".
    const title = firstText("title");
    const head = title.includes(" - ") ? clean(title.split(" - ")[0]) : "";
    if (head.length > 0 && head !== symbol) name = head;
  }

  const sector = SECTOR_SELECTORS.map(firstText).find((text) => text.length > 0);

  return {
    found: true,
    name: name ?? UNKNOWN,
    sector: sector ?? UNKNOWN,
  };
}

// --- Price history ---

const HISTORY_COLUMNS = ["date", "open", "high", "low", "close", "volume"];

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** `2024-03-15` or `Mar 15, 2024`, as `YYYY-MM-DD`. */
export function parseHistoryDate(text: string): string | undefined {
  const value = clean(text);
  const date = ISO_DATE.test(value)
    ? parseISO(value)
    : parse(value, "MMM d, yyyy", new Date(0));
  return isValid(date) ? format(date, "yyyy-MM-dd") : undefined;
}

/** `1,234.50` as a number; blank or non-numeric is undefined. */
export function parseNumber(text: string): number | undefined {
  const value = clean(text).replace(/,/g, "");
  if (value.length === 0) return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/** Daily bars from the history page, ascending by date. A missing table,
 *  or one without all six columns, yields no bars. Rows with a bad date
 *  or price are dropped. */
export function parseHistory(html: string): ReadonlyArray<PriceBar> {
  const $ = cheerio.load(html);

  const preferred = $("table.historical-data-table").first();
  const table = preferred.length > 0 ? preferred : $("table.table").first();
  if (table.length === 0) return [];

  const headers = table
    .find("thead th")
    .toArray()
    .map((th) => clean($(th).text()).toLowerCase());

  const positions = HISTORY_COLUMNS.map((column) => headers.indexOf(column));
  if (positions.includes(-1)) return [];
  const [dateAt, openAt, highAt, lowAt, closeAt, volumeAt] = positions;

  const bars: PriceBar[] = [];
  table.find("tbody tr").each((_, row) => {
    const cells = $(row).find("td");
    if (cells.length !== headers.length) return;

    const textAt = (index: number) => cells.eq(index).text();

    const date = parseHistoryDate(textAt(dateAt));
    const open = parseNumber(textAt(openAt));
    const high = parseNumber(textAt(highAt));
    const low = parseNumber(textAt(lowAt));
    const close = parseNumber(textAt(closeAt));
    const volume = parseNumber(textAt(volumeAt));
    if (
      date === undefined ||
      open === undefined ||
      high === undefined ||
      low === undefined ||
      close === undefined ||
      volume === undefined
    ) {
      return;
    }

    bars.push({ date, open, high, low, close, volume });
  });

  return bars.sort((a, b) => a.date.localeCompare(b.date));
}
