/**
 * Access tokens: lifetime-tagged values, the short→long exchange, and debug_token inspection.
 */

import { z } from "zod";
import { expectOk, extractGraphError, type GraphApi, type GraphResponse } from "./api.js";
import { ConfigurationError, NetworkError, TokenExchangeError } from "./errors.js";

export type TokenKind = "short_lived" | "long_lived";

export interface AccessToken<K extends TokenKind = TokenKind> {
  readonly value: string;
  readonly kind: K;
  /** Seconds until expiry, as reported at issue time. */
  readonly expiresIn?: number;
}

export type ShortLivedToken = AccessToken<"short_lived">;
export type LongLivedToken = AccessToken<"long_lived">;

export interface AppCredential {
  readonly appId: string;
  readonly appSecret: string;
}

export const SECONDS_PER_DAY = 86_400;

function requireValue(value: string, label: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ConfigurationError(`${label} is required`);
  }
  return trimmed;
}

export function shortLivedToken(value: string): ShortLivedToken {
  return { value: requireValue(value, "Access token"), kind: "short_lived" };
}

/**
 * Wraps a token the caller knows to be long-lived (pasted by the user or read
 * from a secret). Tokens from {@link exchangeToken} are already long-lived.
 */
export function longLivedToken(value: string, expiresIn?: number): LongLivedToken {
  return { value: requireValue(value, "Access token"), kind: "long_lived", expiresIn };
}

export function appCredential(appId: string, appSecret: string): AppCredential {
  return {
    appId: requireValue(appId, "App ID"),
    appSecret: requireValue(appSecret, "App Secret"),
  };
}

export function daysFromSeconds(seconds: number): number {
  return Math.floor(seconds / SECONDS_PER_DAY);
}

/** First and last 8 characters, for logs. */
export function maskToken(value: string): string {
  return value.length > 16 ? `${value.slice(0, 8)}...${value.slice(-8)}` : "***MASKED***";
}

const ExchangeResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

/**
 * Exchanges a token for a long-lived one (fb_exchange_token grant). Works for
 * short-lived tokens and for renewing a long-lived token. Single attempt.
 */
export async function exchangeToken(
  api: GraphApi,
  credential: AppCredential,
  token: AccessToken,
): Promise<LongLivedToken> {
  let res: GraphResponse;
  try {
    res = await api("GET", "oauth/access_token", undefined, {
      grant_type: "fb_exchange_token",
      client_id: credential.appId,
      client_secret: credential.appSecret,
      fb_exchange_token: token.value,
    });
  } catch (err) {
    if (err instanceof NetworkError) {
      throw new TokenExchangeError(`Token exchange failed: ${err.message}`, "", undefined, err);
    }
    throw err;
  }

  if (!res.ok) {
    const upstream = extractGraphError(res.body);
    throw new TokenExchangeError(
      `Token exchange failed (${res.status}): ${upstream?.message ?? res.text}`,
      res.text,
      res.status,
    );
  }

  const parsed = ExchangeResponseSchema.safeParse(res.body);
  if (!parsed.success) {
    throw new TokenExchangeError("Token exchange response has no access_token", res.text, res.status);
  }
  return {
    value: parsed.data.access_token,
    kind: "long_lived",
    expiresIn: parsed.data.expires_in,
  };
}

export interface TokenInfo {
  isValid: boolean;
  appId?: string;
  userId?: string;
  /** Undefined when the token reports no expiry. */
  expiresAt?: Date;
  scopes: string[];
}

const DebugTokenSchema = z.object({
  data: z.object({
    is_valid: z.boolean().optional(),
    app_id: z.string().optional(),
    user_id: z.string().optional(),
    expires_at: z.number().optional(),
    scopes: z.array(z.string()).optional(),
  }),
});

export async function inspectToken(api: GraphApi, token: LongLivedToken): Promise<TokenInfo> {
  const res = await api("GET", "debug_token", token.value, { input_token: token.value });
  const { data } = expectOk(res, DebugTokenSchema, "Token inspection");
  return {
    isValid: data.is_valid ?? false,
    appId: data.app_id,
    userId: data.user_id,
    expiresAt: data.expires_at ? new Date(data.expires_at * 1000) : undefined,
    scopes: data.scopes ?? [],
  };
}

export function daysRemaining(info: TokenInfo, now: Date = new Date()): number | undefined {
  if (!info.expiresAt) return undefined;
  return daysFromSeconds((info.expiresAt.getTime() - now.getTime()) / 1000);
}
