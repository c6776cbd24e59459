// Application configuration — read once from the environment, then passed
// explicitly to each component.

import { Config, Duration } from "effect";
import type { RenameRules } from "./reconciler.ts";

// --- Types ---

export type FetchSource = "portal" | "mock";

export interface FetchPolicy {
  readonly attempts: number;
  readonly delay: Duration.Duration;
  readonly timeout: Duration.Duration;
}

export interface PortalConfig {
  readonly baseUrl: string;
  /** Company page URL with `{symbol}` as the placeholder. */
  readonly companyUrlTemplate: string;
  /** Daily price history page, `{symbol}` as above. */
  readonly historyUrlTemplate: string;
}

export interface AppConfig {
  readonly dataDir: string;
  readonly source: FetchSource;
  readonly portal: PortalConfig;
  readonly fetch: FetchPolicy;
  readonly rename: RenameRules;
}

// --- Defaults ---

export const defaultPortal: PortalConfig = {
  baseUrl: "https://dps.psx.com.pk",
  companyUrlTemplate: "https://dps.psx.com.pk/company/{symbol}",
  historyUrlTemplate: "https://dps.psx.com.pk/company/{symbol}/historical",
};

export const defaultFetchPolicy: FetchPolicy = {
  attempts: 3,
  delay: Duration.seconds(2),
  timeout: Duration.seconds(30),
};

export function companyUrl(template: string, symbol: string): string {
  return template.replace("{symbol}", encodeURIComponent(symbol));
}

// --- Environment ---

const positiveInt = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.withDefault(fallback),
    Config.validate({
      message: `${name} must be a positive integer`,
      validation: (n) => n > 0,
    }),
  );

const fetchPolicy: Config.Config<FetchPolicy> = Config.all({
  attempts: positiveInt("PSX_FETCH_ATTEMPTS", defaultFetchPolicy.attempts),
  delay: Config.duration("PSX_FETCH_DELAY").pipe(
    Config.withDefault(defaultFetchPolicy.delay),
  ),
  timeout: Config.duration("PSX_FETCH_TIMEOUT").pipe(
    Config.withDefault(defaultFetchPolicy.timeout),
  ),
});

const renameRules: Config.Config<RenameRules> = Config.all({
  substring: Config.boolean("PSX_RENAME_SUBSTRING").pipe(
    Config.withDefault(true),
  ),
  sharedWord: Config.boolean("PSX_RENAME_SHARED_WORD").pipe(
    Config.withDefault(false),
  ),
  minNameLength: positiveInt("PSX_RENAME_MIN_NAME_LENGTH", 11),
  minWordLength: positiveInt("PSX_RENAME_MIN_WORD_LENGTH", 4),
  requireSameSector: Config.boolean("PSX_RENAME_SAME_SECTOR").pipe(
    Config.withDefault(false),
  ),
}).pipe(
  Config.map(
    ({ substring, sharedWord, minNameLength, minWordLength, requireSameSector }) => ({
      substring,
      sharedWord: sharedWord ? { minNameLength, minWordLength } : undefined,
      requireSameSector,
    }),
  ),
);

export const AppConfig: Config.Config<AppConfig> = Config.all({
  dataDir: Config.string("PSX_DATA_DIR").pipe(Config.withDefault("data")),
  source: Config.literal("portal", "mock")("PSX_FETCH_SOURCE").pipe(
    Config.withDefault("portal"),
  ),
  portal: Config.all({
    baseUrl: Config.string("PSX_BASE_URL").pipe(
      Config.withDefault(defaultPortal.baseUrl),
    ),
    companyUrlTemplate: Config.string("PSX_COMPANY_URL_TEMPLATE").pipe(
      Config.withDefault(defaultPortal.companyUrlTemplate),
    ),
    historyUrlTemplate: Config.string("PSX_HISTORY_URL_TEMPLATE").pipe(
      Config.withDefault(defaultPortal.historyUrlTemplate),
    ),
  }),
  fetch: fetchPolicy,
  rename: renameRules,
});
