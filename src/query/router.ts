/**
 * router.ts - Answers one natural-language query
 *
 * Every surface (HTTP, CLI, MCP) funnels into answerQuery(). The query is
 * classified once, then takes exactly one path:
 *
 *   log request      → extract pod name → kubectl logs → raw text
 *   general question → snapshot → prompt → one completion call → model text
 *
 * The log path never calls the model. Failures on the general path reject;
 * cluster-side failures never do (the collector degrades instead).
 */

import { z } from "zod";
import type { ClusterReader } from "../cluster";
import type { CompletionProvider } from "../llm/completion";
import { setTraceAttribute, setTraceOutput, withQueryTracing } from "../tracing/request-tracing";
import type { Logger } from "../utils/logger";
import { classifyQuery } from "./classifier";
import { buildPromptMessages } from "./prompt";

/** Answer returned for a log request whose pod name could not be extracted */
export const POD_NAME_NOT_FOUND = "Pod name not found in the query.";

/**
 * Validates a query arriving from outside (HTTP body, MCP tool arguments).
 * A query of only whitespace is rejected on every surface.
 */
export const queryRequestSchema = z.object({
  query: z
    .string()
    .refine((value) => value.trim().length > 0, {
      message: "Query must not be empty",
    })
    .describe("Natural language question about the Kubernetes cluster"),
  namespace: z
    .string()
    .min(1)
    .optional()
    .describe("Namespace to answer from; the configured default when omitted"),
});

export interface QueryRequest {
  query: string;
  /** Namespace for pods, deployments and logs; the configured default when omitted */
  namespace?: string;
}

export interface QueryResponse {
  /** The request's query, echoed unchanged */
  query: string;
  answer: string;
}

/**
 * Collaborators built once at startup and shared by all requests.
 */
export interface QueryDependencies {
  cluster: ClusterReader;
  completion: CompletionProvider;
  logger: Logger;
  defaultNamespace: string;
}

/**
 * Answers a query.
 *
 * @returns The query echoed with its answer
 * @throws When the completion call or prompt assembly fails on the general path
 *
 * @example
 * ```typescript
 * const { answer } = await answerQuery({ query: "how many pods are running?" }, deps);
 * ```
 */
export async function answerQuery(
  request: QueryRequest,
  deps: QueryDependencies
): Promise<QueryResponse> {
  return withQueryTracing(request.query, async () => {
    const { logger } = deps;
    const namespace = request.namespace ?? deps.defaultNamespace;

    logger.info({ query: request.query, namespace }, "Received query");

    const classified = classifyQuery(request.query);
    setTraceAttribute("kube_query.query.kind", classified.kind);
    logger.info({ kind: classified.kind }, "Query classified");

    let answer: string;
    switch (classified.kind) {
      case "log": {
        if (classified.podName === null) {
          logger.warn({ query: request.query }, "Pod name not found in log request");
          answer = POD_NAME_NOT_FOUND;
          break;
        }
        logger.info({ podName: classified.podName, namespace }, "Extracted pod name");
        setTraceAttribute("k8s.pod.name", classified.podName);
        answer = await deps.cluster.fetchPodLogs(classified.podName, namespace);
        break;
      }
      case "general": {
        const snapshot = await deps.cluster.collectSnapshot(namespace);
        setTraceAttribute("kube_query.snapshot.pod_count", snapshot.podCount);
        setTraceAttribute("kube_query.snapshot.deployment_count", snapshot.deploymentCount);
        setTraceAttribute("kube_query.snapshot.node_count", snapshot.nodeCount);

        const messages = buildPromptMessages(snapshot, classified.text);
        answer = await deps.completion.complete(messages);
        logger.info({ answerLength: answer.length }, "Completion received");
        break;
      }
    }

    setTraceOutput(answer);
    return { query: request.query, answer };
  });
}
