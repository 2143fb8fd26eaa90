/**
 * MCP tool registration for kube-query
 *
 * Registers a single "query_cluster" tool that runs the same router as the
 * HTTP gateway and the CLI. One tool call produces one trace:
 *
 *   kube-query.mcp.query_cluster (root span)
 *   └── kube-query.query
 *       ├── kubectl get pods
 *       ├── kubectl get deployments
 *       ├── kubectl get nodes
 *       └── anthropic.chat
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { z } from "zod";
import {
  answerQuery,
  queryRequestSchema,
  type QueryDependencies,
} from "../query";
import {
  withMcpRequestTracing,
  type McpToolResult,
} from "../tracing/request-tracing";

export const QUERY_TOOL_NAME = "query_cluster";

export type QueryToolInput = z.infer<typeof queryRequestSchema>;

/**
 * Description shown to MCP clients.
 * Tells the client's LLM what the tool can and cannot answer.
 */
const queryToolDescription = `Answer a question about a Kubernetes namespace.

General questions are answered by a language model from a fresh snapshot of
the namespace's pods and deployments and the cluster's nodes.

Questions mentioning logs return the raw logs of the named pod, for example
"show the logs for the pod web-7f8c".

Example questions:
- "How many pods are running?"
- "Which deployments have fewer available replicas than desired?"
- "Are any nodes unschedulable?"
- "logs for the pod api-0"`;

/**
 * Runs one tool call. Failures become an isError result instead of a thrown
 * error, since MCP reports tool failures in-band.
 */
export async function handleQueryTool(
  input: QueryToolInput,
  deps: QueryDependencies
): Promise<McpToolResult> {
  const parsed = queryRequestSchema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => issue.message)
      .join("; ");
    deps.logger.warn(
      { tool: QUERY_TOOL_NAME, detail: message },
      "Rejected invalid query tool input"
    );
    return {
      content: [{ type: "text", text: `Query failed: ${message}` }],
      isError: true,
    };
  }

  try {
    const { answer } = await answerQuery(parsed.data, deps);
    return { content: [{ type: "text", text: answer }] };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    deps.logger.error({ err: error, tool: QUERY_TOOL_NAME }, "Query tool failed");
    return {
      content: [{ type: "text", text: `Query failed: ${message}` }],
      isError: true,
    };
  }
}

/**
 * Registers the query_cluster tool with an MCP server.
 *
 * @param server - The McpServer instance to register the tool with
 * @param deps - Collaborators built once at startup
 */
export function registerQueryTool(
  server: McpServer,
  deps: QueryDependencies
): void {
  server.registerTool(
    QUERY_TOOL_NAME,
    {
      description: queryToolDescription,
      inputSchema: queryRequestSchema.shape,
    },
    async (input: QueryToolInput) =>
      withMcpRequestTracing(QUERY_TOOL_NAME, { ...input }, () =>
        handleQueryTool(input, deps)
      )
  );
}
