/**
 * Instagram credentials MCP server.
 * Registers the exchange, inspection, discovery and verification clients as
 * tools via @modelcontextprotocol/sdk McpServer.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { GraphApi } from "./api.js";
import { REQUIRED_SCOPES } from "./config.js";
import { discoverInstagramAccount, type PageCheck } from "./discovery.js";
import { CredentialToolError } from "./errors.js";
import {
  appCredential,
  daysFromSeconds,
  daysRemaining,
  exchangeToken,
  inspectToken,
  longLivedToken,
  shortLivedToken,
} from "./token.js";
import { verifyCredentials } from "./verify.js";
import { VERSION } from "./version.js";

function json(data: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }] };
}

/** Credential failures become tool errors; anything else propagates to the SDK. */
async function guard(fn: () => Promise<unknown>) {
  try {
    return json(await fn());
  } catch (err) {
    if (!(err instanceof CredentialToolError)) throw err;
    return { ...json({ error: err.message, name: err.name }), isError: true };
  }
}

export function createServer(api: GraphApi): McpServer {
  const server = new McpServer({ name: "InstagramCredentials", version: VERSION });

  // ── Tokens ──────────────────────────────────────────────────────────────

  server.tool(
    "exchange_token",
    "Exchange a short-lived user token for a long-lived one (~60 days).\nInput: app_id (str), app_secret (str), short_lived_token (str)\nOutput: access_token, expires_in (seconds), days_valid",
    { app_id: z.string(), app_secret: z.string(), short_lived_token: z.string() },
    async ({ app_id, app_secret, short_lived_token }) =>
      guard(async () => {
        const token = await exchangeToken(
          api,
          appCredential(app_id, app_secret),
          shortLivedToken(short_lived_token),
        );
        return {
          access_token: token.value,
          expires_in: token.expiresIn ?? null,
          days_valid: token.expiresIn !== undefined ? daysFromSeconds(token.expiresIn) : null,
        };
      }),
  );

  server.tool(
    "inspect_token",
    "Inspect a long-lived token with debug_token.\nInput: access_token (str)\nOutput: is_valid, app_id, user_id, expires_at, days_remaining, scopes",
    { access_token: z.string() },
    async ({ access_token }) =>
      guard(async () => {
        const info = await inspectToken(api, longLivedToken(access_token));
        return {
          is_valid: info.isValid,
          app_id: info.appId ?? null,
          user_id: info.userId ?? null,
          expires_at: info.expiresAt?.toISOString() ?? null,
          days_remaining: daysRemaining(info) ?? null,
          scopes: info.scopes,
        };
      }),
  );

  // ── Accounts ────────────────────────────────────────────────────────────

  server.tool(
    "discover_instagram_account",
    "Find the Instagram Business Account linked to the token's Facebook Pages (first match wins).\nInput: access_token (str)\nOutput: account_id, linked_page_id, page_name, pages_checked",
    { access_token: z.string() },
    async ({ access_token }) =>
      guard(async () => {
        const checked: PageCheck[] = [];
        const account = await discoverInstagramAccount(api, longLivedToken(access_token), {
          onPage: (check) => checked.push(check),
        });
        return {
          account_id: account.accountId,
          linked_page_id: account.linkedPageId,
          page_name: account.pageName ?? null,
          pages_checked: checked.length,
        };
      }),
  );

  server.tool(
    "verify_credentials",
    "Verify a token can read the Instagram account.\nInput: access_token (str), account_id (str), check_scopes (bool, optional)\nOutput: ok, diagnosis, diagnostic_message, missing_scopes, account",
    { access_token: z.string(), account_id: z.string(), check_scopes: z.boolean().optional() },
    async ({ access_token, account_id, check_scopes }) =>
      guard(async () => {
        const result = await verifyCredentials(api, longLivedToken(access_token), account_id, {
          requiredScopes: check_scopes ? REQUIRED_SCOPES : undefined,
        });
        return {
          ok: result.ok,
          diagnosis: result.diagnosis,
          diagnostic_message: result.diagnosticMessage,
          missing_scopes: [...result.missingScopes],
          account: result.account ?? null,
        };
      }),
  );

  return server;
}
