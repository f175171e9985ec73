/**
 * Session drivers: an interactive terminal driver and a scripted driver that
 * answers from values supplied up front (CI, tests).
 */

import { createInterface, type Interface } from "node:readline/promises";
import { Writable } from "node:stream";
import { loadEnv, type Env } from "./config.js";
import { ConfigurationError } from "./errors.js";
import type { SessionDriver, SessionEvent, SessionStep, TokenChoice } from "./session.js";
import { daysFromSeconds } from "./token.js";

const RULE = "━".repeat(70);

const STEP_TITLES: Record<SessionStep, string> = {
  collect_app_credential: "Step 1: Meta App Credentials",
  collect_token: "Step 2: Access Token",
  discover_account: "Step 3: Finding Instagram Account ID",
  verify: "Step 4: Verifying Credentials",
  publish_secrets: "Step 5: GitHub Secrets",
};

export const TOKEN_HELP = `How to get an access token:

1. Open the Graph API Explorer:
   https://developers.facebook.com/tools/explorer
2. Select your app in the dropdown (top right)
3. Under Permissions, add:
   instagram_basic
   instagram_content_publish
   pages_read_engagement
   pages_show_list
4. Click "Generate Access Token"
5. Copy the token and run setup again`;

export function formatEvent(event: SessionEvent): string[] {
  switch (event.type) {
    case "step":
      return ["", RULE, STEP_TITLES[event.step], RULE];
    case "token_exchanged":
      return event.expiresIn === undefined
        ? ["Converted to long-lived token."]
        : ["Converted to long-lived token.", `  Valid for: ${daysFromSeconds(event.expiresIn)} days`];
    case "token_ready":
      return [`Token ready (${event.length} characters)`];
    case "page_checked": {
      const { pageId, pageName, instagramAccountId } = event.check;
      const label = (pageName ?? "(unnamed page)").padEnd(25);
      return instagramAccountId
        ? [`  ${label} (ID: ${pageId}) → Instagram Account ID: ${instagramAccountId}`]
        : [`  ${label} (ID: ${pageId}) → no Instagram account linked`];
    }
    case "account_found":
      return [`Instagram Account ID: ${event.account.accountId} (page ${event.account.linkedPageId})`];
    case "verified": {
      const { result } = event;
      if (!result.ok) return [`Verification failed: ${result.diagnosticMessage}`];
      const lines = [`Credentials verified for @${result.account?.username ?? result.account?.id ?? "?"}`];
      if (result.account?.mediaCount !== undefined) {
        lines.push(`  Media count: ${result.account.mediaCount}`);
      }
      return lines;
    }
    case "secrets_published":
      return [`Added ${event.names.length} secret(s) to ${event.store}: ${event.names.join(", ")}`];
    case "secrets_manual":
      return [
        "Add these secrets manually (repository Settings → Secrets and variables → Actions):",
        ...event.secrets.map((s) => `  ${s.name} = ${s.sensitive ? "<the value you entered>" : s.value}`),
      ];
  }
}

/** Passes writes through to the terminal unless muted (for hidden input). */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) this.target.write(chunk);
    callback();
  }
}

/**
 * Reads answers from a single line queue, so lines that arrive before their
 * prompt (piped stdin, a fast paste) are kept for it. End of input rejects the
 * pending answer with ConfigurationError.
 */
export class TerminalDriver implements SessionDriver {
  private readonly output: MutableOutput;
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly target: NodeJS.WritableStream & { isTTY?: boolean } = process.stdout,
  ) {
    this.output = new MutableOutput(target);
    this.rl = createInterface({ input, output: this.output, terminal: target.isTTY === true });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  private print(...lines: string[]): void {
    for (const line of lines) this.target.write(`${line}\n`);
  }

  private async nextLine(what: string): Promise<string> {
    const next = await this.lines.next();
    if (next.done) {
      throw new ConfigurationError(`Input closed before ${what} was entered`);
    }
    return next.value.trim();
  }

  private async ask(prompt: string, what: string): Promise<string> {
    this.output.write(prompt);
    return this.nextLine(what);
  }

  private async askHidden(prompt: string, what: string): Promise<string> {
    this.output.write(prompt);
    this.output.muted = true;
    try {
      return await this.nextLine(what);
    } finally {
      this.output.muted = false;
      this.target.write("\n");
    }
  }

  async collectAppCredential(): Promise<{ appId: string; appSecret: string }> {
    this.print(
      "You need your Meta App credentials from:",
      "  https://developers.facebook.com/apps/ → your app → Settings → Basic",
      "",
    );
    const appId = await this.ask("Enter your App ID: ", "the App ID");
    const appSecret = await this.askHidden("Enter your App Secret: ", "the App Secret");
    return { appId, appSecret };
  }

  async chooseTokenSource(): Promise<TokenChoice> {
    this.print(
      "Choose an option:",
      "  1. I have a short-lived token (expires in ~1 hour)",
      "  2. I have a long-lived token (expires in ~60 days)",
      "  3. I need help getting a token",
      "",
    );
    const answer = await this.ask("Enter your choice (1-3): ", "a menu choice");
    switch (answer) {
      case "1":
        return "short_lived";
      case "2":
        return "long_lived";
      case "3":
        return "help";
      default:
        throw new ConfigurationError(`Invalid choice '${answer}'. Enter 1, 2 or 3.`);
    }
  }

  async showTokenHelp(): Promise<void> {
    this.print("", TOKEN_HELP);
  }

  async collectToken(): Promise<string> {
    return this.askHidden("Paste your access token: ", "the access token");
  }

  async confirmPublish(store: string): Promise<boolean> {
    const answer = await this.ask(`Add the secrets to ${store} now? (y/n): `, "a publish answer");
    return answer.toLowerCase() === "y";
  }

  report(event: SessionEvent): void {
    this.print(...formatEvent(event));
  }

  close(): void {
    this.rl.close();
  }
}

export interface ScriptedAnswers {
  appId: string;
  appSecret: string;
  tokenChoice: TokenChoice;
  token?: string;
  publish: boolean;
}

export class ScriptedDriver implements SessionDriver {
  readonly events: SessionEvent[] = [];

  constructor(
    private readonly answers: ScriptedAnswers,
    private readonly log?: (line: string) => void,
  ) {}

  async collectAppCredential(): Promise<{ appId: string; appSecret: string }> {
    return { appId: this.answers.appId, appSecret: this.answers.appSecret };
  }

  async chooseTokenSource(): Promise<TokenChoice> {
    return this.answers.tokenChoice;
  }

  async showTokenHelp(): Promise<void> {
    this.log?.(TOKEN_HELP);
  }

  async collectToken(): Promise<string> {
    if (!this.answers.token) {
      throw new ConfigurationError("No access token supplied");
    }
    return this.answers.token;
  }

  async confirmPublish(): Promise<boolean> {
    return this.answers.publish;
  }

  report(event: SessionEvent): void {
    this.events.push(event);
    if (this.log) {
      for (const line of formatEvent(event)) this.log(line);
    }
  }
}

/**
 * Answers for a non-interactive run. A short-lived token takes precedence over
 * a long-lived one; secrets are published only with PUBLISH_SECRETS=true.
 */
export function answersFromEnv(env: Env = process.env): ScriptedAnswers {
  const config = loadEnv(env);
  const missing: string[] = (["FACEBOOK_APP_ID", "FACEBOOK_APP_SECRET"] as const).filter((n) => !config[n]);
  if (!config.INSTAGRAM_SHORT_LIVED_TOKEN && !config.INSTAGRAM_ACCESS_TOKEN) {
    missing.push("INSTAGRAM_SHORT_LIVED_TOKEN or INSTAGRAM_ACCESS_TOKEN");
  }
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variable(s): ${missing.join(", ")}`);
  }
  return {
    appId: config.FACEBOOK_APP_ID ?? "",
    appSecret: config.FACEBOOK_APP_SECRET ?? "",
    tokenChoice: config.INSTAGRAM_SHORT_LIVED_TOKEN ? "short_lived" : "long_lived",
    token: config.INSTAGRAM_SHORT_LIVED_TOKEN ?? config.INSTAGRAM_ACCESS_TOKEN,
    publish: config.PUBLISH_SECRETS === "true",
  };
}
