/**
 * app.ts - HTTP surface for the query gateway
 *
 * POST /query   { "query": string, "namespace"?: string } → { query, answer }
 * GET  /health  → { status: "ok" }
 *
 * Status codes:
 * - 422 when the body does not match the request schema
 * - 400 when the body is not valid JSON
 * - the parser's own 4xx for other unreadable bodies (413 when too large)
 * - 500 when answering fails, with the error message as detail
 */

import type { Server } from "http";
import express, { type ErrorRequestHandler, type Express } from "express";
import { z } from "zod";
import {
  answerQuery,
  queryRequestSchema,
  type QueryDependencies,
} from "../query";
import type { Logger } from "../utils/logger";

/** One validation problem, located by its path in the request */
export interface ValidationIssue {
  loc: Array<string | number>;
  msg: string;
  type: string;
}

function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    loc: ["body", ...issue.path],
    msg: issue.message,
    type: issue.code,
  }));
}

/** True for the error express.json() raises on an unparseable body */
function isJsonParseError(error: unknown): error is SyntaxError {
  return (
    error instanceof SyntaxError &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

/**
 * Client error status carried by a body-parser error (413 for an oversized
 * body, 415 for an unsupported charset), or null for anything else.
 */
function clientErrorStatus(error: unknown): number | null {
  if (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return error.status;
  }
  return null;
}

/**
 * Creates the express app around already-built dependencies.
 * Does not listen; see startServer().
 */
export function createApp(deps: QueryDependencies): Express {
  const { logger } = deps;
  const app = express();
  app.use(express.json());

  app.post("/query", async (req, res) => {
    const parsed = queryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const detail = toValidationIssues(parsed.error);
      logger.warn({ detail }, "Rejected invalid query request");
      res.status(422).json({ detail });
      return;
    }

    try {
      const response = await answerQuery(parsed.data, deps);
      res.json(response);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ err: error, query: parsed.data.query }, "Query failed");
      res.status(500).json({ detail: message });
    }
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  const handleError: ErrorRequestHandler = (error, _req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isJsonParseError(error)) {
      res.status(400).json({ detail: `Malformed JSON body: ${error.message}` });
      return;
    }
    const status = clientErrorStatus(error);
    if (status !== null && error instanceof Error) {
      logger.warn({ status, detail: error.message }, "Rejected request body");
      res.status(status).json({ detail: error.message });
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ err: error }, "Unhandled request error");
    res.status(500).json({ detail: message });
  };
  app.use(handleError);

  return app;
}

/**
 * Starts listening and resolves once the port is bound.
 * Rejects when the port cannot be bound (EADDRINUSE, EACCES).
 */
export function startServer(
  app: Express,
  host: string,
  port: number,
  logger: Logger
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      server.off("error", reject);
      logger.info({ host, port }, `kube-query listening on http://${host}:${port}`);
      resolve(server);
    });
    server.once("error", reject);
  });
}
