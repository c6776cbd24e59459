import { Effect, Either } from "effect";
import { expect, test } from "vitest";
import { defaultPortal } from "./config.ts";
import type { PriceBar, TickerRecord } from "./domain.ts";
import {
  formatTickerSymbol,
  mapColumns,
  parseCompanyDetails,
  parseHistory,
  parseHistoryDate,
  parseListing,
  parseNumber,
} from "./parser.ts";
import {
  companyPage,
  historyPage,
  listedCompaniesPage,
  marketWatchPage,
  type MockCompany,
} from "./providers/psx-mock.ts";
import type { ParseError } from "./ticker-source.ts";

// --- Test data ---

const companies: ReadonlyArray<MockCompany> = [
  { symbol: "HBL", name: "Habib Bank Limited", sector: "Commercial Banks" },
  { symbol: "OGDC", name: "Oil & Gas Development Company", sector: "Oil & Gas" },
];

// --- Helpers ---

function parse(html: string): Promise<Either.Either<ReadonlyArray<TickerRecord>, ParseError>> {
  return Effect.runPromise(Effect.either(parseListing(html, defaultPortal)));
}

async function parseSuccess(html: string): Promise<ReadonlyArray<TickerRecord>> {
  const result = await parse(html);
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left.message}`);
  return result.right;
}

// --- formatTickerSymbol ---

test("formatTickerSymbol: trims, uppercases and drops the suffix", () => {
  expect(formatTickerSymbol("  hbl.pa ")).toBe("HBL");
  expect(formatTickerSymbol("ogdc")).toBe("OGDC");
});

// --- mapColumns ---

test("mapColumns: finds columns by header text", () => {
  expect(mapColumns(["Symbol", "Company Name", "Sector"])).toEqual({
    symbol: 0,
    name: 1,
    sector: 2,
  });
});

test("mapColumns: missing headers stay undefined", () => {
  const columns = mapColumns(["SYMBOL", "SECTOR", "CURRENT", "VOLUME"]);
  expect(columns.symbol).toBe(0);
  expect(columns.name).toBeUndefined();
  expect(columns.sector).toBe(1);
});

// --- parseListing ---

test("parseListing: market watch rows give symbol, sector and link", async () => {
  const records = await parseSuccess(marketWatchPage(companies));

  expect(records).toEqual([
    {
      symbol: "HBL",
      name: "Unknown",
      sector: "Commercial Banks",
      url: "https://dps.psx.com.pk/company/HBL",
    },
    {
      symbol: "OGDC",
      name: "Unknown",
      sector: "Oil & Gas",
      url: "https://dps.psx.com.pk/company/OGDC",
    },
  ]);
});

test("parseListing: listed companies table is read by position", async () => {
  const records = await parseSuccess(listedCompaniesPage(companies));

  expect(records).toEqual([
    {
      symbol: "HBL",
      name: "Habib Bank Limited",
      sector: "Commercial Banks",
      url: "https://dps.psx.com.pk/company/HBL",
    },
    {
      symbol: "OGDC",
      name: "Oil & Gas Development Company",
      sector: "Oil & Gas",
      url: "https://dps.psx.com.pk/company/OGDC",
    },
  ]);
});

test("parseListing: headers locate columns in any order", async () => {
  const html = `<table>
<thead><tr><th>Company</th><th>Symbol</th></tr></thead>
<tbody><tr><td>Lucky Cement Limited</td><td>luck</td></tr></tbody>
</table>`;

  const records = await parseSuccess(html);
  expect(records).toEqual([
    {
      symbol: "LUCK",
      name: "Lucky Cement Limited",
      sector: "Unknown",
      url: "https://dps.psx.com.pk/company/LUCK",
    },
  ]);
});

test("parseListing: filter rows, short symbols and short rows are skipped", async () => {
  const html = `<table class="table">
<thead><tr><th>SYMBOL</th><th>SECTOR</th></tr></thead>
<tbody>
<tr><td>Select Sector</td><td>All</td></tr>
<tr><td>X</td><td>Misc</td></tr>
<tr><td>ONLYONECELL</td></tr>
<tr><td>MCB</td><td>Commercial Banks</td></tr>
</tbody>
</table>`;

  const records = await parseSuccess(html);
  expect(records.map((r) => r.symbol)).toEqual(["MCB"]);
});

test("parseListing: blank cells become the placeholder", async () => {
  const html = `<table class="table">
<thead><tr><th>SYMBOL</th><th>SECTOR</th></tr></thead>
<tbody><tr><td>MCB</td><td>   </td></tr></tbody>
</table>`;

  const records = await parseSuccess(html);
  expect(records[0].sector).toBe("Unknown");
});

test("parseListing: page without a table is a ParseError", async () => {
  const result = await parse("<html><body><p>Maintenance</p></body></html>");

  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left.message).toBe("No ticker table found");
  }
});

// --- parseCompanyDetails ---

test("parseCompanyDetails: reads heading and sector", () => {
  expect(parseCompanyDetails("HBL", companyPage(companies[0]))).toEqual({
    found: true,
    name: "Habib Bank Limited",
    sector: "Commercial Banks",
  });
});

test("parseCompanyDetails: falls back to the page title", () => {
  const html = `<html><head><title>Lucky Cement - PSX</title></head>
<body><h1>LUCK</h1></body></html>`;

  expect(parseCompanyDetails("LUCK", html)).toEqual({
    found: true,
    name: "Lucky Cement",
    sector: "Unknown",
  });
});

test("parseCompanyDetails: no record found", () => {
  const html = "<html><body><div>No record found</div></body></html>";

  expect(parseCompanyDetails("GHOST", html)).toEqual({
    found: false,
    name: "Unknown",
    sector: "Unknown",
  });
});

// --- parseHistory ---

test("parseHistoryDate: ISO and month-name dates", () => {
  expect(parseHistoryDate("2024-03-15")).toBe("2024-03-15");
  expect(parseHistoryDate(" Mar 15, 2024 ")).toBe("2024-03-15");
  expect(parseHistoryDate("yesterday")).toBeUndefined();
});

test("parseNumber: thousands separators, blanks and dashes", () => {
  expect(parseNumber("1,234.50")).toBe(1234.5);
  expect(parseNumber("")).toBeUndefined();
  expect(parseNumber("-")).toBeUndefined();
});

test("parseHistory: newest-first page comes back ascending", () => {
  const bars: ReadonlyArray<PriceBar> = [
    { date: "2024-03-14", open: 100, high: 102.5, low: 99.75, close: 101.25, volume: 123456 },
    { date: "2024-03-15", open: 101.25, high: 103, low: 100.5, close: 102, volume: 98000 },
  ];

  expect(parseHistory(historyPage(bars))).toEqual(bars);
});

test("parseHistory: generic table with extra columns and bad rows", () => {
  const html = `<table class="table">
<thead><tr><th>Date</th><th>Open</th><th>High</th><th>Low</th><th>Close</th><th>Change</th><th>Volume</th></tr></thead>
<tbody>
<tr><td>Mar 15, 2024</td><td>1,010.00</td><td>1,020.00</td><td>1,000.00</td><td>1,015.00</td><td>5.00</td><td>2,500</td></tr>
<tr><td>Mar 14, 2024</td><td>-</td><td>1,012.00</td><td>1,001.00</td><td>1,010.00</td><td>0.00</td><td>1,800</td></tr>
<tr><td colspan="7">No more rows</td></tr>
</tbody>
</table>`;

  expect(parseHistory(html)).toEqual([
    { date: "2024-03-15", open: 1010, high: 1020, low: 1000, close: 1015, volume: 2500 },
  ]);
});

test("parseHistory: table without a volume column yields no bars", () => {
  const html = `<table class="table">
<thead><tr><th>Date</th><th>Open</th><th>High</th><th>Low</th><th>Close</th></tr></thead>
<tbody><tr><td>2024-03-15</td><td>1</td><td>2</td><td>1</td><td>2</td></tr></tbody>
</table>`;

  expect(parseHistory(html)).toEqual([]);
});

test("parseHistory: page without a table yields no bars", () => {
  expect(parseHistory("<p>Maintenance</p>")).toEqual([]);
});
