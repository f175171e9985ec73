/**
 * Long-lived token renewal for scheduled CI runs.
 */

import type { GraphApi } from "./api.js";
import { SECRET_NAMES } from "./config.js";
import { CredentialToolError, TokenExchangeError, errorMessage } from "./errors.js";
import type { SecretStore } from "./secrets.js";
import {
  daysFromSeconds,
  daysRemaining,
  exchangeToken,
  inspectToken,
  type AppCredential,
  type LongLivedToken,
} from "./token.js";

export const DEFAULT_RENEWAL_THRESHOLD_DAYS = 7;

export interface RenewalCheck {
  needsRenewal: boolean;
  daysRemaining?: number;
  expiresAt?: Date;
  /** Why renewal is needed when the expiry could not be read. */
  reason?: string;
}

export type RenewalOutcome =
  | { status: "not_needed"; daysRemaining: number; expiresAt?: Date }
  | {
      status: "renewed";
      token: LongLivedToken;
      daysValid: number;
      /** False when no secret store was available; the caller must store the token. */
      published: boolean;
      previous: RenewalCheck;
    };

export interface RenewalOptions {
  thresholdDays?: number;
  now?: Date;
  secretStore?: SecretStore;
}

export async function checkTokenExpiry(
  api: GraphApi,
  token: LongLivedToken,
  thresholdDays: number = DEFAULT_RENEWAL_THRESHOLD_DAYS,
  now: Date = new Date(),
): Promise<RenewalCheck> {
  try {
    const info = await inspectToken(api, token);
    const days = daysRemaining(info, now);
    if (days === undefined) {
      return { needsRenewal: true, reason: "token reports no expiry" };
    }
    return { needsRenewal: days <= thresholdDays, daysRemaining: days, expiresAt: info.expiresAt };
  } catch (err) {
    if (!(err instanceof CredentialToolError)) throw err;
    return { needsRenewal: true, reason: `could not inspect token: ${errorMessage(err)}` };
  }
}

export async function renewIfNeeded(
  api: GraphApi,
  credential: AppCredential,
  token: LongLivedToken,
  options: RenewalOptions = {},
): Promise<RenewalOutcome> {
  const threshold = options.thresholdDays ?? DEFAULT_RENEWAL_THRESHOLD_DAYS;
  const now = options.now ?? new Date();

  const check = await checkTokenExpiry(api, token, threshold, now);
  if (!check.needsRenewal && check.daysRemaining !== undefined) {
    return { status: "not_needed", daysRemaining: check.daysRemaining, expiresAt: check.expiresAt };
  }

  const renewed = await exchangeToken(api, credential, token);

  const after = await checkTokenExpiry(api, renewed, 0, now);
  if (after.daysRemaining === undefined || after.daysRemaining <= 0) {
    throw new TokenExchangeError(
      `New token verification failed${after.reason ? `: ${after.reason}` : ""}`,
      "",
    );
  }

  let published = false;
  const store = options.secretStore;
  if (store && (await store.isAvailable())) {
    await store.setSecret(SECRET_NAMES.accessToken, renewed.value);
    published = true;
  }

  return {
    status: "renewed",
    token: renewed,
    daysValid: renewed.expiresIn !== undefined ? daysFromSeconds(renewed.expiresIn) : after.daysRemaining,
    published,
    previous: check,
  };
}
