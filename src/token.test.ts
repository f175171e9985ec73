import { describe, expect, it } from "vitest";
import { createGraphApi } from "./api.js";
import { ConfigurationError, NetworkError, TokenExchangeError, UpstreamApiError } from "./errors.js";
import { failingBody, fakeGraph } from "./test-utils.js";
import {
  appCredential,
  daysRemaining,
  exchangeToken,
  inspectToken,
  longLivedToken,
  maskToken,
  shortLivedToken,
} from "./token.js";

const credential = appCredential("123", "secret");

describe("exchangeToken", () => {
  it("returns a long-lived token from the access_token field", async () => {
    const graph = fakeGraph({
      "oauth/access_token": { body: { access_token: "tok2", token_type: "bearer", expires_in: 5184000 } },
    });

    const token = await exchangeToken(graph.api, credential, shortLivedToken("tok1"));

    expect(token).toEqual({ value: "tok2", kind: "long_lived", expiresIn: 5184000 });
    const params = graph.calls[0].searchParams;
    expect(params.get("grant_type")).toBe("fb_exchange_token");
    expect(params.get("client_id")).toBe("123");
    expect(params.get("client_secret")).toBe("secret");
    expect(params.get("fb_exchange_token")).toBe("tok1");
  });

  it("fails with the raw body when access_token is missing", async () => {
    const graph = fakeGraph({ "oauth/access_token": { body: { token_type: "bearer" } } });
    const pending = exchangeToken(graph.api, credential, shortLivedToken("tok1"));

    await expect(pending).rejects.toBeInstanceOf(TokenExchangeError);
    await expect(pending).rejects.toMatchObject({
      message: "Token exchange response has no access_token",
      body: '{"token_type":"bearer"}',
      status: 200,
    });
  });

  it("surfaces the upstream error message on non-2xx", async () => {
    const graph = fakeGraph({
      "oauth/access_token": {
        status: 400,
        body: { error: { message: "Error validating client secret.", type: "OAuthException", code: 1 } },
      },
    });

    await expect(exchangeToken(graph.api, credential, shortLivedToken("tok1"))).rejects.toMatchObject({
      name: "TokenExchangeError",
      message: "Token exchange failed (400): Error validating client secret.",
      status: 400,
    });
  });

  it("wraps transport failures", async () => {
    const graph = fakeGraph({ "oauth/access_token": { throws: new TypeError("fetch failed") } });
    const err = await exchangeToken(graph.api, credential, shortLivedToken("tok1")).then(
      () => undefined,
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(TokenExchangeError);
    expect(err).toMatchObject({ body: "" });
    expect(err instanceof Error ? err.cause : undefined).toBeInstanceOf(NetworkError);
  });

  it("wraps a connection dropped while the body is read", async () => {
    const api = createGraphApi({ fetch: async () => new Response(failingBody()) });
    const pending = exchangeToken(api, credential, shortLivedToken("tok1"));

    await expect(pending).rejects.toBeInstanceOf(TokenExchangeError);
    await expect(pending).rejects.toThrow("Token exchange failed: Request to oauth/access_token failed: terminated");
  });

  it("makes a single attempt", async () => {
    const graph = fakeGraph({ "oauth/access_token": { status: 500, body: "oops" } });
    await expect(exchangeToken(graph.api, credential, shortLivedToken("tok1"))).rejects.toThrow(
      "Token exchange failed (500): oops",
    );
    expect(graph.calls).toHaveLength(1);
  });
});

describe("token construction", () => {
  it("rejects blank tokens and credentials", () => {
    expect(() => shortLivedToken("   ")).toThrow(ConfigurationError);
    expect(() => longLivedToken("")).toThrow("Access token is required");
    expect(() => appCredential("", "secret")).toThrow("App ID is required");
    expect(() => appCredential("123", " ")).toThrow("App Secret is required");
  });

  it("trims pasted values", () => {
    expect(longLivedToken("  tok2\n")).toEqual({ value: "tok2", kind: "long_lived", expiresIn: undefined });
  });
});

describe("inspectToken", () => {
  it("reads validity, expiry and scopes", async () => {
    const graph = fakeGraph({
      debug_token: {
        body: {
          data: {
            is_valid: true,
            app_id: "123",
            user_id: "u1",
            expires_at: 1767225600,
            scopes: ["instagram_basic", "pages_show_list"],
          },
        },
      },
    });

    const info = await inspectToken(graph.api, longLivedToken("tok2"));

    expect(info).toEqual({
      isValid: true,
      appId: "123",
      userId: "u1",
      expiresAt: new Date("2026-01-01T00:00:00Z"),
      scopes: ["instagram_basic", "pages_show_list"],
    });
    expect(graph.calls[0].searchParams.get("input_token")).toBe("tok2");
    expect(graph.calls[0].searchParams.get("access_token")).toBe("tok2");
  });

  it("treats expires_at 0 as no expiry", async () => {
    const graph = fakeGraph({ debug_token: { body: { data: { is_valid: true, expires_at: 0 } } } });
    const info = await inspectToken(graph.api, longLivedToken("tok2"));
    expect(info.expiresAt).toBeUndefined();
    expect(daysRemaining(info)).toBeUndefined();
  });

  it("throws UpstreamApiError for an invalid token", async () => {
    const graph = fakeGraph({
      debug_token: { status: 400, body: { error: { message: "Invalid OAuth access token.", code: 190 } } },
    });
    await expect(inspectToken(graph.api, longLivedToken("bad"))).rejects.toBeInstanceOf(UpstreamApiError);
  });
});

describe("daysRemaining", () => {
  it("counts whole days until expiry", () => {
    const now = new Date("2026-01-01T00:00:00Z");
    const expiresAt = new Date("2026-01-31T12:00:00Z");
    expect(daysRemaining({ isValid: true, expiresAt, scopes: [] }, now)).toBe(30);
  });
});

describe("maskToken", () => {
  it("keeps the first and last 8 characters", () => {
    expect(maskToken("EAABwzLixnjYBAOZCZCtest1234567890")).toBe("EAABwzLi...34567890");
  });

  it("hides short values entirely", () => {
    expect(maskToken("short")).toBe("***MASKED***");
  });
});
