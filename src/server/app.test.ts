/**
 * app.test.ts - HTTP tests for the express app
 *
 * The app listens on an ephemeral port on 127.0.0.1 inside the test process
 * and is driven with fetch. Cluster and completion are fakes.
 */

import type { Server } from "http";
import pino from "pino";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createSnapshot } from "../cluster";
import type { ClusterReader } from "../cluster";
import type { CompletionProvider } from "../llm/completion";
import type { QueryDependencies } from "../query";
import { silentLogger } from "../utils/logger";
import { createApp, startServer } from "./app";

let server: Server | null = null;

afterEach(async () => {
  const running = server;
  server = null;
  if (running) {
    running.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      running.close((error) => (error ? reject(error) : resolve()))
    );
  }
});

/** A real pino logger that records each JSON line it writes */
function createRecordingLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "info" },
    { write: (line: string) => lines.push(JSON.parse(line)) }
  );
  return { logger, lines };
}

function makeDeps(overrides: Partial<QueryDependencies> = {}) {
  const collectSnapshot = vi.fn<ClusterReader["collectSnapshot"]>().mockResolvedValue(
    createSnapshot("default", {
      pods: {
        ok: true,
        items: ["api-1", "api-2", "api-3"].map((name) => ({
          name,
          namespace: "default",
          status: "Running" as const,
          node: "worker-1",
        })),
      },
      deployments: { ok: true, items: [] },
      nodes: { ok: true, items: [] },
    })
  );
  const fetchPodLogs = vi.fn<ClusterReader["fetchPodLogs"]>().mockResolvedValue("line1\nline2");
  const complete = vi.fn<CompletionProvider["complete"]>()
    .mockResolvedValue("There are 3 pods running in the default namespace.");

  const deps: QueryDependencies = {
    cluster: { collectSnapshot, fetchPodLogs },
    completion: { complete },
    logger: silentLogger,
    defaultNamespace: "default",
    ...overrides,
  };
  return { deps, collectSnapshot, fetchPodLogs, complete };
}

/** Starts the app and returns its base URL */
async function listen(deps: QueryDependencies): Promise<string> {
  server = await startServer(createApp(deps), "127.0.0.1", 0, silentLogger);
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Expected a TCP address");
  }
  return `http://127.0.0.1:${address.port}`;
}

function postQuery(baseUrl: string, body: string): Promise<Response> {
  return fetch(`${baseUrl}/query`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });
}

describe("POST /query", () => {
  it("answers a general question", async () => {
    const { deps, complete } = makeDeps();
    const baseUrl = await listen(deps);

    const res = await postQuery(baseUrl, JSON.stringify({ query: "how many pods are running?" }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      query: "how many pods are running?",
      answer: "There are 3 pods running in the default namespace.",
    });
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("returns pod logs for a log request", async () => {
    const { deps, fetchPodLogs, complete } = makeDeps();
    const baseUrl = await listen(deps);
    const query = "log for the pod web-7f8c in the default namespace";

    const res = await postQuery(baseUrl, JSON.stringify({ query }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ query, answer: "line1\nline2" });
    expect(fetchPodLogs).toHaveBeenCalledWith("web-7f8c", "default");
    expect(complete).not.toHaveBeenCalled();
  });

  it("passes the namespace through", async () => {
    const { deps, collectSnapshot } = makeDeps();
    const baseUrl = await listen(deps);

    await postQuery(baseUrl, JSON.stringify({ query: "list pods", namespace: "payments" }));

    expect(collectSnapshot).toHaveBeenCalledWith("payments");
  });

  it("rejects a missing query with 422", async () => {
    const { deps } = makeDeps();
    const baseUrl = await listen(deps);

    const res = await postQuery(baseUrl, JSON.stringify({}));

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      detail: [{ loc: ["body", "query"], msg: "Required", type: "invalid_type" }],
    });
  });

  it("rejects a blank query with 422", async () => {
    const { deps, complete } = makeDeps();
    const baseUrl = await listen(deps);

    const res = await postQuery(baseUrl, JSON.stringify({ query: "   " }));

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      detail: [{ loc: ["body", "query"], msg: "Query must not be empty", type: "custom" }],
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it("rejects malformed JSON with 400", async () => {
    const { deps } = makeDeps();
    const baseUrl = await listen(deps);

    const res = await postQuery(baseUrl, "{not json");

    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toEqual({ detail: expect.stringContaining("Malformed JSON body") });
  });

  it("returns 500 with the error message when answering fails", async () => {
    const { deps, complete } = makeDeps();
    complete.mockRejectedValue(new Error("Completion request failed: overloaded"));
    const baseUrl = await listen(deps);

    const res = await postQuery(baseUrl, JSON.stringify({ query: "how many nodes?" }));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      detail: "Completion request failed: overloaded",
    });
  });

  it("logs a failed query with the error object", async () => {
    const { logger, lines } = createRecordingLogger();
    const { deps, complete } = makeDeps({ logger });
    complete.mockRejectedValue(new Error("Completion request failed: overloaded"));
    const baseUrl = await listen(deps);

    await postQuery(baseUrl, JSON.stringify({ query: "how many nodes?" }));

    const failure = lines.find((line) => line.msg === "Query failed");
    expect(failure).toMatchObject({
      level: 50,
      query: "how many nodes?",
      err: { type: "Error", message: "Completion request failed: overloaded" },
    });
  });

  it("rejects an oversized body with 413", async () => {
    const { deps, complete } = makeDeps();
    const baseUrl = await listen(deps);

    const res = await postQuery(
      baseUrl,
      JSON.stringify({ query: "x".repeat(200 * 1024) })
    );

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ detail: "request entity too large" });
    expect(complete).not.toHaveBeenCalled();
  });
});

describe("GET /health", () => {
  it("reports ok", async () => {
    const { deps } = makeDeps();
    const baseUrl = await listen(deps);

    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });
});
