import { ConfigProvider, Duration, Effect, Either } from "effect";
import { expect, test } from "vitest";
import { AppConfig, companyUrl, defaultPortal } from "./config.ts";

// --- Helpers ---

function load(env: Record<string, string>) {
  return Effect.runPromise(
    Effect.either(
      Effect.withConfigProvider(
        AppConfig,
        ConfigProvider.fromMap(new Map(Object.entries(env))),
      ),
    ),
  );
}

async function loadSuccess(env: Record<string, string>): Promise<AppConfig> {
  const result = await load(env);
  if (Either.isLeft(result)) throw new Error(`Expected config, got: ${String(result.left)}`);
  return result.right;
}

// --- AppConfig ---

test("AppConfig: defaults with an empty environment", async () => {
  const config = await loadSuccess({});

  expect(config.dataDir).toBe("data");
  expect(config.source).toBe("portal");
  expect(config.portal).toEqual(defaultPortal);
  expect(config.fetch.attempts).toBe(3);
  expect(Duration.toMillis(config.fetch.delay)).toBe(2000);
  expect(Duration.toMillis(config.fetch.timeout)).toBe(30000);
  expect(config.rename).toEqual({ substring: true, requireSameSector: false });
});

test("AppConfig: environment overrides", async () => {
  const config = await loadSuccess({
    PSX_DATA_DIR: "/tmp/psx",
    PSX_FETCH_SOURCE: "mock",
    PSX_FETCH_ATTEMPTS: "5",
    PSX_FETCH_DELAY: "500 millis",
    PSX_RENAME_SHARED_WORD: "true",
    PSX_RENAME_MIN_WORD_LENGTH: "6",
  });

  expect(config.dataDir).toBe("/tmp/psx");
  expect(config.source).toBe("mock");
  expect(config.fetch.attempts).toBe(5);
  expect(Duration.toMillis(config.fetch.delay)).toBe(500);
  expect(config.rename.sharedWord).toEqual({ minNameLength: 11, minWordLength: 6 });
});

test("AppConfig: zero attempts is rejected", async () => {
  const result = await load({ PSX_FETCH_ATTEMPTS: "0" });
  expect(Either.isLeft(result)).toBe(true);
});

test("AppConfig: unknown fetch source is rejected", async () => {
  const result = await load({ PSX_FETCH_SOURCE: "ftp" });
  expect(Either.isLeft(result)).toBe(true);
});

// --- companyUrl ---

test("companyUrl: substitutes the encoded symbol", () => {
  expect(companyUrl("https://example.test/company/{symbol}", "A&B")).toBe(
    "https://example.test/company/A%26B",
  );
});
