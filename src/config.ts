/**
 * Configuration: reads credentials and Graph API settings from the environment.
 * Entry points load .env from CWD via dotenv before calling into here.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_GRAPH_API_VERSION = "v22.0";
export const GRAPH_HOST = "https://graph.facebook.com";

export function graphApiBase(version: string = DEFAULT_GRAPH_API_VERSION): string {
  return `${GRAPH_HOST}/${version}`;
}

/** Secret names written to the CI secret store, in publish order. */
export const SECRET_NAMES = {
  accessToken: "INSTAGRAM_ACCESS_TOKEN",
  accountId: "INSTAGRAM_ACCOUNT_ID",
  appId: "FACEBOOK_APP_ID",
  appSecret: "FACEBOOK_APP_SECRET",
} as const;

export const REQUIRED_SCOPES = [
  "instagram_basic",
  "instagram_content_publish",
  "pages_read_engagement",
  "pages_show_list",
] as const;

export type Env = Record<string, string | undefined>;

// Blank values count as unset.
const optionalText = z
  .string()
  .optional()
  .transform((v) => v?.trim() || undefined);

const EnvSchema = z.object({
  GRAPH_API_VERSION: optionalText.pipe(
    z.string().regex(/^v\d+\.\d+$/, "GRAPH_API_VERSION must look like v22.0").optional(),
  ),
  GRAPH_API_RETRIES: optionalText.pipe(z.coerce.number().int().min(0).max(5).optional()),
  FACEBOOK_APP_ID: optionalText,
  FACEBOOK_APP_SECRET: optionalText,
  INSTAGRAM_ACCESS_TOKEN: optionalText,
  INSTAGRAM_SHORT_LIVED_TOKEN: optionalText,
  INSTAGRAM_ACCOUNT_ID: optionalText,
  PUBLISH_SECRETS: optionalText.pipe(z.enum(["true", "false"]).optional()),
  RENEWAL_THRESHOLD_DAYS: optionalText.pipe(z.coerce.number().int().min(0).optional()),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function loadEnv(env: Env = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid environment: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function requireVars<K extends keyof EnvConfig>(
  config: EnvConfig,
  names: K[],
): asserts config is EnvConfig & { [P in K]-?: NonNullable<EnvConfig[P]> } {
  const missing = names.filter((n) => config[n] === undefined);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variable(s): ${missing.join(", ")}`);
  }
}

export interface GraphSettings {
  version: string;
  retries: number;
}

export function loadGraphSettings(env: Env = process.env): GraphSettings {
  const config = loadEnv(env);
  return {
    version: config.GRAPH_API_VERSION ?? DEFAULT_GRAPH_API_VERSION,
    retries: config.GRAPH_API_RETRIES ?? 0,
  };
}

export interface VerifierConfig {
  accessToken: string;
  accountId: string;
}

export function loadVerifierConfig(env: Env = process.env): VerifierConfig {
  const config = loadEnv(env);
  requireVars(config, ["INSTAGRAM_ACCESS_TOKEN", "INSTAGRAM_ACCOUNT_ID"]);
  return {
    accessToken: config.INSTAGRAM_ACCESS_TOKEN,
    accountId: config.INSTAGRAM_ACCOUNT_ID,
  };
}

/** Token from the first positional argument, else INSTAGRAM_ACCESS_TOKEN. */
export function resolveAccessToken(args: string[], env: Env = process.env): string {
  const fromArgs = args[0]?.trim();
  if (fromArgs) return fromArgs;
  const config = loadEnv(env);
  if (!config.INSTAGRAM_ACCESS_TOKEN) {
    throw new ConfigurationError(
      "No access token given. Pass it as an argument or set INSTAGRAM_ACCESS_TOKEN.",
    );
  }
  return config.INSTAGRAM_ACCESS_TOKEN;
}

export interface RenewalConfig {
  accessToken: string;
  appId: string;
  appSecret: string;
  thresholdDays: number;
}

export function loadRenewalConfig(env: Env = process.env): RenewalConfig {
  const config = loadEnv(env);
  requireVars(config, ["INSTAGRAM_ACCESS_TOKEN", "FACEBOOK_APP_ID", "FACEBOOK_APP_SECRET"]);
  return {
    accessToken: config.INSTAGRAM_ACCESS_TOKEN,
    appId: config.FACEBOOK_APP_ID,
    appSecret: config.FACEBOOK_APP_SECRET,
    thresholdDays: config.RENEWAL_THRESHOLD_DAYS ?? 7,
  };
}
