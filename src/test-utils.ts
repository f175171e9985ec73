/**
 * In-process Graph API stand-in for tests: routes requests by path (the part
 * after the version segment) to canned replies and records every call.
 */

import { createGraphApi, type FetchLike, type GraphApi } from "./api.js";

export type FakeReply = { status?: number; body: unknown } | { throws: Error };

export type FakeRoute = FakeReply | ((url: URL) => FakeReply);

export interface FakeGraph {
  api: GraphApi;
  calls: URL[];
  /** Paths requested, in order. */
  paths(): string[];
}

export function fakeGraph(routes: Record<string, FakeRoute>, options: { retries?: number } = {}): FakeGraph {
  const calls: URL[] = [];
  const fetch: FetchLike = async (input) => {
    const url = new URL(input);
    calls.push(url);
    const path = url.pathname.replace(/^\/v\d+\.\d+\//, "");
    const route = routes[path];
    const reply: FakeReply =
      route === undefined
        ? { status: 404, body: { error: { message: `no route for ${path}`, code: 803 } } }
        : typeof route === "function"
          ? route(url)
          : route;
    if ("throws" in reply) throw reply.throws;
    const text = typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);
    return new Response(text, { status: reply.status ?? 200 });
  };
  return {
    api: createGraphApi({ fetch, retries: options.retries }),
    calls,
    paths: () => calls.map((u) => u.pathname.replace(/^\/v\d+\.\d+\//, "")),
  };
}

/** A response body whose stream errors as soon as it is read, like a dropped connection. */
export function failingBody(): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.error(new TypeError("terminated"));
    },
  });
}

/** Runs fn and returns what it threw, or undefined. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
