/**
 * request-tracing.ts - Root spans for answered queries
 *
 * Every query, whether it arrives over HTTP, the CLI, or MCP, runs inside one
 * root span. The kubectl spans and the auto-instrumented Anthropic chat span
 * nest under it, so a single trace shows the whole request:
 *
 *   kube-query.query (root, this module)
 *   ├── kubectl get pods
 *   ├── kubectl get deployments
 *   ├── kubectl get nodes
 *   └── anthropic.chat
 *
 * The root span is also kept in AsyncLocalStorage so setTraceOutput() can
 * attach the final answer from deep inside the router without threading the
 * span through every call.
 */

import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";
import { type Span, SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer, isCaptureAiPayloads } from "./index";

/**
 * MCP tool result format per Model Context Protocol specification.
 *
 * The index signature satisfies the MCP SDK's CallToolResult, which allows
 * arbitrary extra fields.
 */
export interface McpToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

const rootSpanStorage = new AsyncLocalStorage<Span>();

/**
 * Records the answer on the current root span.
 * No-op outside a traced request or when payload capture is off.
 */
export function setTraceOutput(output: string): void {
  const span = rootSpanStorage.getStore();
  if (span && isCaptureAiPayloads) {
    span.setAttribute("traceloop.entity.output", output);
  }
}

/**
 * Records a named attribute on the current root span (e.g. the query route).
 * Safe to call outside a traced request.
 */
export function setTraceAttribute(key: string, value: string | number): void {
  rootSpanStorage.getStore()?.setAttribute(key, value);
}

/**
 * Ends a span with ERROR status for a thrown value.
 */
function recordFailure(span: Span, error: unknown): void {
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: error instanceof Error ? error.message : String(error),
  });
  if (error instanceof Error) {
    span.recordException(error);
  }
}

/**
 * Runs one query inside a root span.
 *
 * @param query - The user's question (recorded only when payload capture is on)
 * @param fn - The work that answers it
 * @returns Whatever fn resolves with; rejections are recorded and rethrown
 *
 * @example
 * ```typescript
 * const response = await withQueryTracing(request.query, () =>
 *   routeQuery(request, deps)
 * );
 * ```
 */
export async function withQueryTracing<T>(
  query: string,
  fn: () => Promise<T>
): Promise<T> {
  const attributes: Record<string, string> = {
    "kube_query.service.operation": "query",
    "traceloop.span.kind": "workflow",
    "traceloop.entity.name": "query",
  };
  if (isCaptureAiPayloads) {
    attributes["kube_query.user.query"] = query;
    attributes["traceloop.entity.input"] = query;
  }

  return getTracer().startActiveSpan(
    "kube-query.query",
    { kind: SpanKind.INTERNAL, attributes },
    async (span: Span) => {
      try {
        const result = await rootSpanStorage.run(span, fn);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        recordFailure(span, error);
        throw error;
      } finally {
        span.end();
      }
    }
  );
}

/**
 * Runs an MCP tool request inside a root span.
 *
 * Mirrors withQueryTracing() with GenAI semantic-convention attributes for tool
 * execution. A result with isError=true marks the span ERROR without throwing,
 * since MCP reports logical failures in-band.
 */
export async function withMcpRequestTracing(
  toolName: string,
  input: Record<string, unknown>,
  fn: () => Promise<McpToolResult>
): Promise<McpToolResult> {
  const attributes: Record<string, string> = {
    "kube_query.service.operation": toolName,
    "traceloop.span.kind": "workflow",
    "traceloop.entity.name": toolName,
    "kube_query.mcp.tool.name": toolName,
    // See: https://opentelemetry.io/docs/specs/semconv/gen-ai/gen-ai-spans/
    "gen_ai.operation.name": "execute_tool",
    "gen_ai.tool.name": toolName,
    "gen_ai.tool.type": "function",
    "gen_ai.tool.call.id": randomUUID(),
  };
  if (isCaptureAiPayloads) {
    attributes["traceloop.entity.input"] = JSON.stringify(input);
  }

  return getTracer().startActiveSpan(
    `kube-query.mcp.${toolName}`,
    { kind: SpanKind.INTERNAL, attributes },
    async (span: Span) => {
      try {
        const result = await rootSpanStorage.run(span, fn);

        const textContent = result.content
          .filter((c) => c.type === "text" && c.text)
          .map((c) => c.text)
          .join("\n");

        if (result.isError) {
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: textContent || "MCP tool returned error",
          });
        } else {
          span.setStatus({ code: SpanStatusCode.OK });
        }

        if (isCaptureAiPayloads && textContent) {
          span.setAttribute("traceloop.entity.output", textContent);
        }

        return result;
      } catch (error) {
        recordFailure(span, error);
        throw error;
      } finally {
        span.end();
      }
    }
  );
}
