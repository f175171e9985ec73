#!/usr/bin/env node
/**
 * igcreds: Instagram Graph API credentials CLI
 * Get, verify, renew and publish the token and account ID an Instagram
 * publishing workflow needs. Reads .env from the current directory.
 */

import "dotenv/config";
import { createGraphApi, type GraphApi } from "../src/api.js";
import { REQUIRED_SCOPES, loadGraphSettings, loadRenewalConfig, loadVerifierConfig, resolveAccessToken } from "../src/config.js";
import { discoverInstagramAccount, listLinkedAccounts, type PageCheck } from "../src/discovery.js";
import { ScriptedDriver, TerminalDriver, answersFromEnv, formatEvent } from "../src/drivers.js";
import { CredentialToolError, errorMessage } from "../src/errors.js";
import { runCommand } from "../src/exec.js";
import { renewIfNeeded } from "../src/renew.js";
import { GhCliSecretStore } from "../src/secrets.js";
import { REMEDIATION_HINTS, exitCodeFor, runSession, type SessionOutcome } from "../src/session.js";
import {
  appCredential,
  daysRemaining,
  inspectToken,
  longLivedToken,
  maskToken,
  type LongLivedToken,
} from "../src/token.js";
import { verifyCredentials } from "../src/verify.js";
import { VERSION } from "../src/version.js";

// --- Helpers ---

function die(msg: string): never {
  console.error(`igcreds: ${msg}`);
  process.exit(1);
}

function out(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

const RULE = "━".repeat(70);

function printOutcome(outcome: SessionOutcome): void {
  console.log("");
  console.log(RULE);
  switch (outcome.status) {
    case "completed":
      console.log("Setup complete!");
      console.log(RULE);
      console.log("");
      console.log("Next steps:");
      console.log("  1. Run your publishing workflow to test the credentials");
      console.log("  2. Your token expires in ~60 days; schedule `igcreds renew` to keep it fresh");
      break;
    case "help":
      console.log("Run `igcreds setup` again once you have a token.");
      break;
    case "failed":
      console.log(`Setup failed during ${outcome.step.replace(/_/g, " ")}`);
      console.log(RULE);
      console.log(`  ${outcome.error.message}`);
      console.log("");
      console.log(`Hint: ${REMEDIATION_HINTS[outcome.remediation]}`);
      break;
  }
}

// --- Commands ---

async function cmdSetup(api: GraphApi): Promise<number> {
  console.log(RULE);
  console.log("Instagram Graph API Credentials Setup");
  console.log(RULE);
  console.log("");
  console.log("This will:");
  console.log("  1. Convert (or accept) your access token");
  console.log("  2. Find your Instagram Business Account ID");
  console.log("  3. Verify your credentials");
  console.log("  4. Add them to GitHub Secrets");

  const driver = new TerminalDriver();
  try {
    const outcome = await runSession(driver, { api, secretStore: new GhCliSecretStore(runCommand) });
    printOutcome(outcome);
    return exitCodeFor(outcome);
  } finally {
    driver.close();
  }
}

async function cmdSetupCi(api: GraphApi): Promise<number> {
  const driver = new ScriptedDriver(answersFromEnv(), (line) => console.log(line));
  const outcome = await runSession(driver, { api, secretStore: new GhCliSecretStore(runCommand) });
  printOutcome(outcome);
  return exitCodeFor(outcome);
}

async function cmdDiscover(api: GraphApi, args: string[]): Promise<number> {
  const token = longLivedToken(resolveAccessToken(args));
  console.log("Checking Facebook Pages...");
  const account = await discoverInstagramAccount(api, token, {
    onPage: (check) => formatEvent({ type: "page_checked", check }).forEach((l) => console.log(l)),
  });
  console.log("");
  console.log(`INSTAGRAM_ACCOUNT_ID=${account.accountId}`);
  return 0;
}

/** Lists the token's pages and their linked Instagram account IDs. */
async function suggestAccountIds(api: GraphApi, token: LongLivedToken): Promise<void> {
  console.log("");
  console.log("Your Facebook Pages:");
  let checks: PageCheck[];
  try {
    checks = await listLinkedAccounts(api, token);
  } catch (err) {
    if (!(err instanceof CredentialToolError)) throw err;
    console.log(`  Could not list pages: ${err.message}`);
    return;
  }
  if (checks.length === 0) {
    console.log("  (none)");
    return;
  }
  for (const check of checks) {
    formatEvent({ type: "page_checked", check }).forEach((l) => console.log(l));
  }
}

async function cmdVerify(api: GraphApi): Promise<number> {
  const config = loadVerifierConfig();
  console.log(`Token: ${maskToken(config.accessToken)} (${config.accessToken.length} characters)`);
  console.log(`Instagram Account ID: ${config.accountId}`);
  const token = longLivedToken(config.accessToken);
  const result = await verifyCredentials(api, token, config.accountId, {
    requiredScopes: REQUIRED_SCOPES,
  });
  formatEvent({ type: "verified", result }).forEach((l) => console.log(l));
  if (!result.ok) {
    switch (result.diagnosis) {
      case "expired_token":
        console.log(`Hint: ${REMEDIATION_HINTS.regenerate_token}`);
        break;
      case "invalid_account_id":
        console.log("Hint: use the Instagram Business Account ID, not the Facebook Page ID.");
        await suggestAccountIds(api, token);
        break;
      case "permission_denied":
      case "missing_scopes":
        console.log(`Hint: grant ${REQUIRED_SCOPES.join(", ")} and generate a new token.`);
        break;
      default:
        break;
    }
  }
  return result.ok ? 0 : 1;
}

async function cmdInspect(api: GraphApi, args: string[]): Promise<number> {
  const info = await inspectToken(api, longLivedToken(resolveAccessToken(args)));
  out({
    is_valid: info.isValid,
    app_id: info.appId ?? null,
    user_id: info.userId ?? null,
    expires_at: info.expiresAt?.toISOString() ?? "never",
    days_remaining: daysRemaining(info) ?? null,
    scopes: info.scopes,
  });
  return info.isValid ? 0 : 1;
}

async function cmdRenew(api: GraphApi): Promise<number> {
  const config = loadRenewalConfig();
  console.log("Checking token expiry...");
  const outcome = await renewIfNeeded(
    api,
    appCredential(config.appId, config.appSecret),
    longLivedToken(config.accessToken),
    { thresholdDays: config.thresholdDays, secretStore: new GhCliSecretStore(runCommand) },
  );
  if (outcome.status === "not_needed") {
    console.log(`Token is still valid for ${outcome.daysRemaining} days - no renewal needed`);
    return 0;
  }
  if (outcome.previous.reason) console.log(`Renewing: ${outcome.previous.reason}`);
  console.log(`Renewed token: ${maskToken(outcome.token.value)} (valid for ${outcome.daysValid} days)`);
  console.log(
    outcome.published
      ? "INSTAGRAM_ACCESS_TOKEN updated in GitHub Secrets."
      : "gh not available: update INSTAGRAM_ACCESS_TOKEN in your secret store manually.",
  );
  return 0;
}

// --- Help ---

const HELP = `igcreds v${VERSION}: Instagram Graph API credentials CLI

USAGE
  igcreds <command> [args...]

GLOBAL FLAGS
  --help       Show this help
  --version    Show version

COMMANDS
  setup              Interactive setup: token → account ID → verify → GitHub secrets
  setup-ci           Same steps, answers read from the environment
  discover [token]   Find the Instagram Business Account ID for a long-lived token
  verify             Check INSTAGRAM_ACCESS_TOKEN can read INSTAGRAM_ACCOUNT_ID
  inspect [token]    Show token validity, expiry and scopes
  renew              Renew INSTAGRAM_ACCESS_TOKEN when 7 days or fewer remain

ENVIRONMENT
  FACEBOOK_APP_ID, FACEBOOK_APP_SECRET     Meta app credentials (setup-ci, renew)
  INSTAGRAM_ACCESS_TOKEN                   Long-lived token (verify, discover, inspect, renew)
  INSTAGRAM_ACCOUNT_ID                     Instagram Business Account ID (verify)
  INSTAGRAM_SHORT_LIVED_TOKEN              Token to exchange (setup-ci)
  PUBLISH_SECRETS=true                     Write GitHub secrets with gh (setup-ci)
  RENEWAL_THRESHOLD_DAYS                   Renewal window in days (renew, default 7)
  GRAPH_API_VERSION                        Graph API version (default v22.0)
  GRAPH_API_RETRIES                        Extra attempts on network failure (default 0)

EXAMPLES
  # First-time setup
  igcreds setup

  # Find the account ID for a token you already have
  igcreds discover EAAB...

  # Check the credentials a workflow uses
  INSTAGRAM_ACCESS_TOKEN=EAAB... INSTAGRAM_ACCOUNT_ID=1784... igcreds verify

  # Pipe to jq: days until the token expires
  igcreds inspect | jq '.days_remaining'
`;

// --- Main ---

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(HELP);
    return 0;
  }
  if (args.includes("--version") || args.includes("-v")) {
    console.log(VERSION);
    return 0;
  }

  const command = args[0];
  const rest = args.slice(1);
  const api = createGraphApi(loadGraphSettings());

  switch (command) {
    case "setup":
      return cmdSetup(api);
    case "setup-ci":
      return cmdSetupCi(api);
    case "discover":
      return cmdDiscover(api, rest);
    case "verify":
      return cmdVerify(api);
    case "inspect":
      return cmdInspect(api, rest);
    case "renew":
      return cmdRenew(api);
    default:
      die(`Unknown command: ${command}. Run 'igcreds --help' for usage.`);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => die(errorMessage(err)),
);
