// PsxMock — canned implementation of Fetcher for tests and offline runs.

import { Effect, Layer } from "effect";
import { companyUrl, type PortalConfig } from "../config.ts";
import type { PriceBar } from "../domain.ts";
import { Fetcher, type FetchTarget, HttpError } from "../ticker-source.ts";
import listing from "./mock-listing.json";

export interface MockCompany {
  readonly symbol: string;
  readonly name: string;
  readonly sector: string;
  /** Served on the history page; without it the page is a 404. */
  readonly history?: ReadonlyArray<PriceBar>;
}

export const mockCompanies: ReadonlyArray<MockCompany> = listing;

// --- Pages ---

const escapeHtml = (text: string): string =>
  text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");

/** Market watch carries symbol and sector; names live on company pages. */
export function marketWatchPage(
  companies: ReadonlyArray<MockCompany>,
): string {
  const rows = companies
    .map(
      (c) =>
        `<tr><td><a href="/company/${c.symbol}">${c.symbol}</a></td>` +
        `<td>${escapeHtml(c.sector)}</td><td>100.00</td><td>250,000</td></tr>`,
    )
    .join("\n");

  return `<html><body>
<table class="table">
<thead><tr><th>SYMBOL</th><th>SECTOR</th><th>CURRENT</th><th>VOLUME</th></tr></thead>
<tbody>
${rows}
</tbody>
</table>
</body></html>`;
}

export function listedCompaniesPage(
  companies: ReadonlyArray<MockCompany>,
): string {
  const rows = companies
    .map(
      (c) =>
        `<tr><td>${c.symbol}</td><td>${escapeHtml(c.name)}</td>` +
        `<td>${escapeHtml(c.sector)}</td></tr>`,
    )
    .join("\n");

  return `<html><body>
<table class="views-table">
<tbody>
${rows}
</tbody>
</table>
</body></html>`;
}

export function companyPage(company: MockCompany): string {
  const name = escapeHtml(company.name);
  return `<html><head><title>${name} - PSX</title></head><body>
<h1>${name}</h1>
<div class="sector">${escapeHtml(company.sector)}</div>
</body></html>`;
}

/** The portal shows newest first, with thousands separators. */
export function historyPage(bars: ReadonlyArray<PriceBar>): string {
  const rows = [...bars]
    .reverse()
    .map(
      (b) =>
        `<tr><td>${b.date}</td><td>${b.open.toFixed(2)}</td>` +
        `<td>${b.high.toFixed(2)}</td><td>${b.low.toFixed(2)}</td>` +
        `<td>${b.close.toFixed(2)}</td><td>${b.volume.toLocaleString("en-US")}</td></tr>`,
    )
    .join("\n");

  return `<html><body>
<table class="historical-data-table">
<thead><tr><th>Date</th><th>Open</th><th>High</th><th>Low</th><th>Close</th><th>Volume</th></tr></thead>
<tbody>
${rows}
</tbody>
</table>
</body></html>`;
}

// --- Mock layer ---

export const makePsxMock = (
  portal: PortalConfig,
  companies: ReadonlyArray<MockCompany> = mockCompanies,
) => {
  const byUrl = new Map(
    companies.map((c) => [companyUrl(portal.companyUrlTemplate, c.symbol), c]),
  );
  const bySymbol = new Map(companies.map((c) => [c.symbol, c]));

  const fetch = (target: FetchTarget): Effect.Effect<string, HttpError> => {
    switch (target._tag) {
      case "Listing":
        return Effect.succeed(
          target.page === "market-watch"
            ? marketWatchPage(companies)
            : listedCompaniesPage(companies),
        );
      case "Company": {
        const company = byUrl.get(target.url) ?? bySymbol.get(target.symbol);
        return company !== undefined
          ? Effect.succeed(companyPage(company))
          : Effect.fail(new HttpError({ status: 404 }));
      }
      case "History": {
        const history = bySymbol.get(target.symbol)?.history;
        return history !== undefined
          ? Effect.succeed(historyPage(history))
          : Effect.fail(new HttpError({ status: 404 }));
      }
    }
  };

  return Layer.succeed(Fetcher, Fetcher.of({ fetch }));
};
