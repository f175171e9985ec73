/**
 * Credential setup session.
 *
 * A strictly linear sequence of typed steps:
 *   collect_app_credential → collect_token → discover_account → verify → publish_secrets
 * User input comes from a SessionDriver, so the same steps run behind an
 * interactive terminal or a scripted (CI) driver.
 */

import type { GraphApi } from "./api.js";
import { REQUIRED_SCOPES, SECRET_NAMES } from "./config.js";
import { discoverInstagramAccount, type InstagramAccount, type PageCheck } from "./discovery.js";
import {
  CredentialToolError,
  NetworkError,
  NoInstagramAccountError,
  NoPagesFoundError,
  SecretStoreError,
  TokenExchangeError,
  UpstreamApiError,
} from "./errors.js";
import type { SecretStore } from "./secrets.js";
import {
  appCredential,
  exchangeToken,
  longLivedToken,
  shortLivedToken,
  type AppCredential,
  type LongLivedToken,
} from "./token.js";
import { verifyCredentials, type VerificationResult } from "./verify.js";

export type SessionStep =
  | "collect_app_credential"
  | "collect_token"
  | "discover_account"
  | "verify"
  | "publish_secrets";

export type TokenChoice = "short_lived" | "long_lived" | "help";

export interface NamedSecret {
  name: string;
  value: string;
  /** Sensitive values are masked whenever they are displayed. */
  sensitive: boolean;
}

export type SessionEvent =
  | { type: "step"; step: SessionStep }
  | { type: "token_exchanged"; expiresIn?: number }
  | { type: "token_ready"; length: number }
  | { type: "page_checked"; check: PageCheck }
  | { type: "account_found"; account: InstagramAccount }
  | { type: "verified"; result: VerificationResult }
  | { type: "secrets_published"; store: string; names: string[] }
  | { type: "secrets_manual"; secrets: NamedSecret[] };

export interface SessionDriver {
  collectAppCredential(): Promise<{ appId: string; appSecret: string }>;
  chooseTokenSource(): Promise<TokenChoice>;
  /** Called once when the user asks how to generate a token. */
  showTokenHelp(): Promise<void>;
  collectToken(kind: Exclude<TokenChoice, "help">): Promise<string>;
  confirmPublish(store: string): Promise<boolean>;
  report(event: SessionEvent): void;
}

export interface SessionDeps {
  api: GraphApi;
  /** Omitted or unavailable stores fall back to manual instructions. */
  secretStore?: SecretStore;
}

export type Remediation =
  | "switch_to_business"
  | "link_facebook_page"
  | "regenerate_token"
  | "check_connection"
  | "check_input"
  | "check_secret_store";

export type SessionOutcome =
  | {
      status: "completed";
      token: LongLivedToken;
      account: InstagramAccount;
      verification: VerificationResult;
      published: boolean;
    }
  | { status: "help" }
  | { status: "failed"; step: SessionStep; error: Error; remediation: Remediation };

export const REMEDIATION_HINTS: Record<Remediation, string> = {
  switch_to_business:
    "Make sure your Instagram account is a Business (or Creator) account and is linked to one of your Facebook Pages.",
  link_facebook_page:
    "Link your Instagram account to a Facebook Page you manage, and grant the pages_show_list permission.",
  regenerate_token:
    "Your token is invalid, expired or missing permissions. Generate a new one in the Graph API Explorer and run setup again.",
  check_connection: "Could not reach the Graph API. Check your connection and run setup again.",
  check_input: "Check the values you entered and run setup again.",
  check_secret_store: "Could not write to the secret store. Check `gh auth status` or add the secrets manually.",
};

export class VerificationFailedError extends CredentialToolError {
  constructor(public readonly result: VerificationResult) {
    super(`Credential verification failed: ${result.diagnosticMessage}`);
    this.name = "VerificationFailedError";
  }
}

export function remediationFor(error: unknown): Remediation {
  if (error instanceof NoPagesFoundError) return "link_facebook_page";
  if (error instanceof NoInstagramAccountError) return "switch_to_business";
  if (error instanceof TokenExchangeError) return "regenerate_token";
  if (error instanceof VerificationFailedError) return "regenerate_token";
  if (error instanceof UpstreamApiError) return "regenerate_token";
  if (error instanceof NetworkError) return "check_connection";
  if (error instanceof SecretStoreError) return "check_secret_store";
  return "check_input";
}

export function secretsFor(
  credential: AppCredential,
  token: LongLivedToken,
  account: InstagramAccount,
): NamedSecret[] {
  return [
    { name: SECRET_NAMES.accessToken, value: token.value, sensitive: false },
    { name: SECRET_NAMES.accountId, value: account.accountId, sensitive: false },
    { name: SECRET_NAMES.appId, value: credential.appId, sensitive: false },
    { name: SECRET_NAMES.appSecret, value: credential.appSecret, sensitive: true },
  ];
}

async function publishSecrets(
  driver: SessionDriver,
  store: SecretStore | undefined,
  secrets: NamedSecret[],
): Promise<boolean> {
  if (!store || !(await store.isAvailable()) || !(await driver.confirmPublish(store.label))) {
    driver.report({ type: "secrets_manual", secrets });
    return false;
  }
  for (const secret of secrets) {
    await store.setSecret(secret.name, secret.value);
  }
  driver.report({ type: "secrets_published", store: store.label, names: secrets.map((s) => s.name) });
  return true;
}

export async function runSession(driver: SessionDriver, deps: SessionDeps): Promise<SessionOutcome> {
  const { api } = deps;
  let step: SessionStep = "collect_app_credential";

  try {
    step = "collect_app_credential";
    driver.report({ type: "step", step });
    const answers = await driver.collectAppCredential();
    const credential = appCredential(answers.appId, answers.appSecret);

    step = "collect_token";
    driver.report({ type: "step", step });
    const choice = await driver.chooseTokenSource();
    if (choice === "help") {
      await driver.showTokenHelp();
      return { status: "help" };
    }
    const raw = await driver.collectToken(choice);
    let token: LongLivedToken;
    if (choice === "short_lived") {
      token = await exchangeToken(api, credential, shortLivedToken(raw));
      driver.report({ type: "token_exchanged", expiresIn: token.expiresIn });
    } else {
      token = longLivedToken(raw);
    }
    driver.report({ type: "token_ready", length: token.value.length });

    step = "discover_account";
    driver.report({ type: "step", step });
    const account = await discoverInstagramAccount(api, token, {
      onPage: (check) => driver.report({ type: "page_checked", check }),
    });
    driver.report({ type: "account_found", account });

    step = "verify";
    driver.report({ type: "step", step });
    const verification = await verifyCredentials(api, token, account.accountId, {
      requiredScopes: REQUIRED_SCOPES,
    });
    driver.report({ type: "verified", result: verification });
    if (!verification.ok) {
      throw new VerificationFailedError(verification);
    }

    step = "publish_secrets";
    driver.report({ type: "step", step });
    const published = await publishSecrets(driver, deps.secretStore, secretsFor(credential, token, account));

    return { status: "completed", token, account, verification, published };
  } catch (err) {
    if (!(err instanceof CredentialToolError)) {
      throw err;
    }
    return { status: "failed", step, error: err, remediation: remediationFor(err) };
  }
}

export function exitCodeFor(outcome: SessionOutcome): number {
  return outcome.status === "failed" ? 1 : 0;
}
