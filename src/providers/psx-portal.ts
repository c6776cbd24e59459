// PSX data portal — live HTTP implementation of Fetcher.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Effect, Layer } from "effect";
import { companyUrl, type FetchPolicy, type PortalConfig } from "../config.ts";
import {
  describeTarget,
  Fetcher,
  type FetchTarget,
  HttpError,
  type ListingPage,
  NetworkError,
} from "../ticker-source.ts";

// The portal serves a stripped page to unknown clients.
const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 " +
  "(KHTML, like Gecko) Chrome/124.0 Safari/537.36";

const LISTING_PATHS: Record<ListingPage, string> = {
  "market-watch": "/market-watch",
  "listed-companies": "/listing/listed-companies",
};

export function targetUrl(target: FetchTarget, portal: PortalConfig): string {
  switch (target._tag) {
    case "Listing":
      return new URL(LISTING_PATHS[target.page], portal.baseUrl).toString();
    case "Company":
      return target.url;
    case "History": {
      const url = new URL(companyUrl(portal.historyUrlTemplate, target.symbol));
      url.searchParams.set("from", target.range.start);
      url.searchParams.set("to", target.range.end);
      return url.toString();
    }
  }
}

// --- PSX portal layer ---

export const makePsxPortalLive = (portal: PortalConfig, policy: FetchPolicy) =>
  Layer.effect(
    Fetcher,
    Effect.gen(function* () {
      const client = (yield* HttpClient.HttpClient).pipe(
        HttpClient.filterStatusOk,
        HttpClient.mapRequest(
          HttpClientRequest.setHeader("User-Agent", USER_AGENT),
        ),
      );

      return Fetcher.of({
        fetch: (target: FetchTarget) =>
          Effect.gen(function* () {
            const response = yield* client.get(targetUrl(target, portal));
            return yield* response.text;
          }).pipe(
            // The response is released once its body has been read.
            Effect.scoped,
            Effect.catchTags({
              RequestError: (e) =>
                Effect.fail(new NetworkError({ message: e.message })),
              ResponseError: (e) =>
                e.reason === "StatusCode"
                  ? Effect.fail(new HttpError({ status: e.response.status }))
                  : Effect.fail(
                      new NetworkError({
                        message: `Body read failed: ${e.message}`,
                      }),
                    ),
            }),
            Effect.timeoutFail({
              duration: policy.timeout,
              onTimeout: () =>
                new NetworkError({
                  message: `${describeTarget(target)}: request timed out`,
                }),
            }),
          ),
      });
    }),
  );
