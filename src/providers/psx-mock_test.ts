import { Effect, Either } from "effect";
import { expect, test } from "vitest";
import { defaultPortal } from "../config.ts";
import { parseCompanyDetails, parseHistory, parseListing } from "../parser.ts";
import { Company, Fetcher, type FetchTarget, History, Listing } from "../ticker-source.ts";
import { makePsxMock, mockCompanies } from "./psx-mock.ts";

// --- Helpers ---

function fetchMock(target: FetchTarget, companies = mockCompanies) {
  return Effect.runPromise(
    Effect.either(
      Effect.gen(function* () {
        const fetcher = yield* Fetcher;
        return yield* fetcher.fetch(target);
      }),
    ).pipe(Effect.provide(makePsxMock(defaultPortal, companies))),
  );
}

async function fetchSuccess(target: FetchTarget): Promise<string> {
  const result = await fetchMock(target);
  if (Either.isLeft(result)) throw new Error(`Expected a page, got: ${result.left._tag}`);
  return result.right;
}

// --- Canned data ---

test("mockCompanies: symbols are unique", () => {
  const symbols = mockCompanies.map((c) => c.symbol);
  expect(new Set(symbols).size).toBe(symbols.length);
  expect(symbols.length).toBe(16);
});

// --- Listing pages ---

test("makePsxMock: market watch parses to every company, without names", async () => {
  const html = await fetchSuccess(Listing("market-watch"));
  const records = await Effect.runPromise(parseListing(html, defaultPortal));

  expect(records.map((r) => r.symbol)).toEqual(mockCompanies.map((c) => c.symbol));
  expect(records.every((r) => r.name === "Unknown")).toBe(true);
  expect(records.find((r) => r.symbol === "HUBC")?.sector).toBe(
    "Power Generation & Distribution",
  );
});

test("makePsxMock: listed companies page carries names", async () => {
  const html = await fetchSuccess(Listing("listed-companies"));
  const records = await Effect.runPromise(parseListing(html, defaultPortal));

  expect(records.find((r) => r.symbol === "HBL")).toEqual({
    symbol: "HBL",
    name: "Habib Bank Limited",
    sector: "Commercial Banks",
    url: "https://dps.psx.com.pk/company/HBL",
  });
});

// --- Company pages ---

test("makePsxMock: company page by URL", async () => {
  const html = await fetchSuccess(
    Company("LUCK", "https://dps.psx.com.pk/company/LUCK"),
  );

  expect(parseCompanyDetails("LUCK", html)).toEqual({
    found: true,
    name: "Lucky Cement Limited",
    sector: "Cement",
  });
});

test("makePsxMock: company page by symbol when the URL differs", async () => {
  const html = await fetchSuccess(Company("HBL", "https://example.test/hbl"));
  expect(parseCompanyDetails("HBL", html).name).toBe("Habib Bank Limited");
});

test("makePsxMock: unknown company is a 404", async () => {
  const result = await fetchMock(
    Company("GHOST", "https://dps.psx.com.pk/company/GHOST"),
  );

  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result) && result.left._tag === "HttpError") {
    expect(result.left.status).toBe(404);
  } else {
    throw new Error("Expected an HttpError");
  }
});

// --- History pages ---

const RANGE = { start: "2024-03-01", end: "2024-03-31" };

test("makePsxMock: history page serves the company's bars", async () => {
  const history = [
    { date: "2024-03-15", open: 250, high: 255.5, low: 248, close: 254, volume: 1200 },
  ];
  const result = await fetchMock(History("HBL", RANGE), [
    { symbol: "HBL", name: "Habib Bank Limited", sector: "Commercial Banks", history },
  ]);

  expect(Either.isRight(result)).toBe(true);
  if (Either.isRight(result)) expect(parseHistory(result.right)).toEqual(history);
});

test("makePsxMock: no history is a 404", async () => {
  const result = await fetchMock(History("HBL", RANGE));

  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result) && result.left._tag === "HttpError") {
    expect(result.left.status).toBe(404);
  } else {
    throw new Error("Expected an HttpError");
  }
});
