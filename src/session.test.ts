import { describe, expect, it } from "vitest";
import { REQUIRED_SCOPES } from "./config.js";
import { ScriptedDriver, type ScriptedAnswers } from "./drivers.js";
import { SecretStoreError } from "./errors.js";
import { MemorySecretStore } from "./secrets.js";
import { exitCodeFor, runSession, type SessionEvent } from "./session.js";
import { fakeGraph, type FakeRoute } from "./test-utils.js";

const healthyRoutes: Record<string, FakeRoute> = {
  "oauth/access_token": { body: { access_token: "tok2", token_type: "bearer", expires_in: 5184000 } },
  "me/accounts": { body: { data: [{ id: "p1", name: "Shop" }, { id: "p2", name: "Blog" }] } },
  p1: { body: { id: "p1" } },
  p2: { body: { id: "p2", instagram_business_account: { id: "ig42" } } },
  ig42: { body: { id: "ig42", username: "nebula_daily", media_count: 12 } },
  debug_token: { body: { data: { is_valid: true, scopes: [...REQUIRED_SCOPES] } } },
};

function answers(overrides: Partial<ScriptedAnswers> = {}): ScriptedAnswers {
  return { appId: "123", appSecret: "secret", tokenChoice: "short_lived", token: "tok1", publish: true, ...overrides };
}

function eventTypes(events: SessionEvent[]): string[] {
  return events.map((e) => (e.type === "step" ? `step:${e.step}` : e.type));
}

describe("runSession", () => {
  it("exchanges, discovers, verifies and publishes", async () => {
    const graph = fakeGraph(healthyRoutes);
    const store = new MemorySecretStore();
    const driver = new ScriptedDriver(answers());

    const outcome = await runSession(driver, { api: graph.api, secretStore: store });

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;
    expect(outcome.token).toEqual({ value: "tok2", kind: "long_lived", expiresIn: 5184000 });
    expect(outcome.account).toEqual({ accountId: "ig42", linkedPageId: "p2", pageName: "Blog" });
    expect(outcome.verification.ok).toBe(true);
    expect(outcome.published).toBe(true);

    expect(Object.fromEntries(store.secrets)).toEqual({
      INSTAGRAM_ACCESS_TOKEN: "tok2",
      INSTAGRAM_ACCOUNT_ID: "ig42",
      FACEBOOK_APP_ID: "123",
      FACEBOOK_APP_SECRET: "secret",
    });
    expect(graph.paths()).toEqual(["oauth/access_token", "me/accounts", "p1", "p2", "ig42", "debug_token"]);
    expect(graph.calls[4].searchParams.get("access_token")).toBe("tok2");
    expect(eventTypes(driver.events)).toEqual([
      "step:collect_app_credential",
      "step:collect_token",
      "token_exchanged",
      "token_ready",
      "step:discover_account",
      "page_checked",
      "page_checked",
      "account_found",
      "step:verify",
      "verified",
      "step:publish_secrets",
      "secrets_published",
    ]);
    expect(exitCodeFor(outcome)).toBe(0);
  });

  it("uses a long-lived token as-is", async () => {
    const graph = fakeGraph(healthyRoutes);
    const outcome = await runSession(new ScriptedDriver(answers({ tokenChoice: "long_lived", token: "tok2" })), {
      api: graph.api,
      secretStore: new MemorySecretStore(),
    });

    expect(outcome.status).toBe("completed");
    expect(graph.paths()).not.toContain("oauth/access_token");
  });

  it("hands secrets to the driver when the store is unavailable", async () => {
    const graph = fakeGraph(healthyRoutes);
    const store = new MemorySecretStore(false);
    const driver = new ScriptedDriver(answers());

    const outcome = await runSession(driver, { api: graph.api, secretStore: store });

    expect(outcome).toMatchObject({ status: "completed", published: false });
    expect(store.secrets.size).toBe(0);
    expect(driver.events.at(-1)).toEqual({
      type: "secrets_manual",
      secrets: [
        { name: "INSTAGRAM_ACCESS_TOKEN", value: "tok2", sensitive: false },
        { name: "INSTAGRAM_ACCOUNT_ID", value: "ig42", sensitive: false },
        { name: "FACEBOOK_APP_ID", value: "123", sensitive: false },
        { name: "FACEBOOK_APP_SECRET", value: "secret", sensitive: true },
      ],
    });
  });

  it("skips publishing when the user declines", async () => {
    const graph = fakeGraph(healthyRoutes);
    const store = new MemorySecretStore();
    const outcome = await runSession(new ScriptedDriver(answers({ publish: false })), {
      api: graph.api,
      secretStore: store,
    });

    expect(outcome).toMatchObject({ status: "completed", published: false });
    expect(store.secrets.size).toBe(0);
  });

  it("ends after the help text without any request", async () => {
    const graph = fakeGraph(healthyRoutes);
    const outcome = await runSession(new ScriptedDriver(answers({ tokenChoice: "help" })), { api: graph.api });

    expect(outcome).toEqual({ status: "help" });
    expect(exitCodeFor(outcome)).toBe(0);
    expect(graph.calls).toHaveLength(0);
  });

  it("fails on a blank App ID before any request", async () => {
    const graph = fakeGraph(healthyRoutes);
    const outcome = await runSession(new ScriptedDriver(answers({ appId: " " })), { api: graph.api });

    expect(outcome).toMatchObject({ status: "failed", step: "collect_app_credential", remediation: "check_input" });
    expect(outcome.status === "failed" && outcome.error.message).toBe("App ID is required");
    expect(graph.calls).toHaveLength(0);
    expect(exitCodeFor(outcome)).toBe(1);
  });

  it("asks for a new token when the exchange fails", async () => {
    const graph = fakeGraph({
      ...healthyRoutes,
      "oauth/access_token": {
        status: 400,
        body: { error: { message: "Error validating access token: Session has expired", code: 190 } },
      },
    });
    const outcome = await runSession(new ScriptedDriver(answers()), { api: graph.api });

    expect(outcome).toMatchObject({ status: "failed", step: "collect_token", remediation: "regenerate_token" });
  });

  it("points to page linking when there are no pages", async () => {
    const graph = fakeGraph({ ...healthyRoutes, "me/accounts": { body: { data: [] } } });
    const outcome = await runSession(new ScriptedDriver(answers()), { api: graph.api });

    expect(outcome).toMatchObject({ status: "failed", step: "discover_account", remediation: "link_facebook_page" });
  });

  it("points to a business account when no page has one", async () => {
    const graph = fakeGraph({ ...healthyRoutes, p2: { body: { id: "p2" } } });
    const outcome = await runSession(new ScriptedDriver(answers()), { api: graph.api });

    expect(outcome).toMatchObject({ status: "failed", step: "discover_account", remediation: "switch_to_business" });
  });

  it("fails at verify when the token lacks scopes", async () => {
    const graph = fakeGraph({
      ...healthyRoutes,
      debug_token: { body: { data: { is_valid: true, scopes: ["pages_show_list"] } } },
    });
    const store = new MemorySecretStore();
    const outcome = await runSession(new ScriptedDriver(answers()), { api: graph.api, secretStore: store });

    expect(outcome).toMatchObject({ status: "failed", step: "verify", remediation: "regenerate_token" });
    expect(store.secrets.size).toBe(0);
  });

  it("reports network failures as a connection problem", async () => {
    const graph = fakeGraph({ ...healthyRoutes, "me/accounts": { throws: new TypeError("fetch failed") } });
    const outcome = await runSession(new ScriptedDriver(answers()), { api: graph.api });

    expect(outcome).toMatchObject({ status: "failed", step: "discover_account", remediation: "check_connection" });
  });

  it("stops publishing at the first store failure", async () => {
    const graph = fakeGraph(healthyRoutes);
    const written: string[] = [];
    const outcome = await runSession(new ScriptedDriver(answers()), {
      api: graph.api,
      secretStore: {
        label: "flaky",
        isAvailable: async () => true,
        setSecret: async (name) => {
          if (name === "INSTAGRAM_ACCOUNT_ID") {
            throw new SecretStoreError("gh secret set INSTAGRAM_ACCOUNT_ID failed: HTTP 403", name);
          }
          written.push(name);
        },
      },
    });

    expect(outcome).toMatchObject({ status: "failed", step: "publish_secrets", remediation: "check_secret_store" });
    expect(written).toEqual(["INSTAGRAM_ACCESS_TOKEN"]);
  });
});
