/**
 * tracing/index.ts - OpenTelemetry initialization for kube-query
 *
 * What this file does:
 * Sets up OpenTelemetry tracing so each answered query can be followed end to
 * end: the root query span, one span per kubectl call, and the
 * auto-instrumented Anthropic chat call made through LangChain.
 *
 * Opt-in:
 * Tracing is disabled unless OTEL_TRACING_ENABLED=true. When disabled, the OTel
 * API hands out a no-op tracer, so instrumented code runs unchanged.
 *
 * Optional SDK packages:
 * @traceloop/node-server-sdk, @opentelemetry/sdk-trace-node and
 * @opentelemetry/exporter-trace-otlp-proto are optional peer dependencies loaded
 * through optional-deps.ts. When absent, initialization is skipped and the OTel
 * API returns no-op implementations.
 *
 * Exporter options (OTEL_EXPORTER_TYPE):
 * - console (default): prints spans to stdout
 * - otlp: sends spans over OTLP/protobuf to OTEL_EXPORTER_OTLP_ENDPOINT
 *
 * Status lines go to stderr. The console exporter still writes spans to
 * stdout, which the MCP stdio server uses for protocol frames, so the MCP
 * server needs the otlp exporter when tracing is enabled.
 *
 * OpenLLMetry owns the TracerProvider:
 * OTel has a single global TracerProvider. OpenLLMetry registers it and we
 * hand it our exporter, so the Anthropic spans it creates and our own query
 * and kubectl spans share one trace and one export destination.
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import {
  loadTraceloop,
  loadSdkTraceNode,
  loadExporterOtlpProto,
} from "./optional-deps";

const traceloop = loadTraceloop();
const sdkTraceNode = loadSdkTraceNode();
const exporterOtlpProto = loadExporterOtlpProto();

/** Service name reported on every span and used for the tracer */
export const SERVICE_NAME = "kube-query";

const isTracingEnabled = process.env.OTEL_TRACING_ENABLED === "true";

/**
 * Whether prompts, answers, and cluster context are written to span attributes.
 *
 * The context document embeds pod, deployment, and node names plus node
 * labels and IPs, and log answers carry raw application output. Off unless
 * OTEL_CAPTURE_AI_PAYLOADS=true.
 */
const isCaptureAiPayloads = process.env.OTEL_CAPTURE_AI_PAYLOADS === "true";

const exporterType = process.env.OTEL_EXPORTER_TYPE || "console";

/**
 * Creates the span exporter named by OTEL_EXPORTER_TYPE.
 *
 * Throws with install instructions when the requested exporter's package is
 * missing, and when OTLP is requested without an endpoint.
 */
function createSpanExporter(): SpanExporter {
  if (exporterType === "otlp") {
    if (!exporterOtlpProto) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp. " +
          "Set it to your collector URL (e.g., http://localhost:4318)."
      );
    }
    // Strip trailing slashes so we never produce "//v1/traces"
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    console.error(`[OTel] Using OTLP exporter → ${base}`);
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  if (!sdkTraceNode) {
    throw new Error(
      "Console exporter requires @opentelemetry/sdk-trace-node. " +
        "Install it: npm install @opentelemetry/sdk-trace-node"
    );
  }

  console.error("[OTel] Using console exporter");
  return new sdkTraceNode.ConsoleSpanExporter();
}

if (isTracingEnabled) {
  if (!traceloop) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @traceloop/node-server-sdk is not installed. " +
        "Tracing will be no-op. Install SDK packages for full telemetry."
    );
  } else {
    console.error("[OTel] Initializing OpenTelemetry tracing...");

    const exporter = createSpanExporter();

    // OpenLLMetry auto-instruments LangChain and the Anthropic SDK, adding
    // gen_ai.request.model, gen_ai.usage.* and friends to the chat span.
    traceloop.initialize({
      appName: SERVICE_NAME,
      exporter,
      // Export immediately; a CLI invocation may exit right after answering
      disableBatch: true,
      traceContent: isCaptureAiPayloads,
      silenceInitializationMessage: true,
    });

    console.error(`[OTel] Tracing enabled for ${SERVICE_NAME}`);
    console.error("[OTel] OpenLLMetry initialized for LLM instrumentation");

    // Flush in-flight spans on termination. The SDK exposes forceFlush() only.
    // A signal listener replaces the default exit, so the handler exits once
    // the flush settles.
    const traceloopSdk = traceloop;
    const shutdown = async (signal: NodeJS.Signals) => {
      try {
        await traceloopSdk.forceFlush();
        console.error("[OTel] Tracing shut down gracefully");
      } catch (error) {
        console.error("[OTel] Error shutting down tracing:", error);
      }
      process.exit(signal === "SIGINT" ? 130 : 143);
    };

    process.once("SIGTERM", (signal) => void shutdown(signal));
    process.once("SIGINT", (signal) => void shutdown(signal));
  }
}

/**
 * Get a tracer for creating spans.
 *
 * Returns the tracer from the globally registered TracerProvider
 * (OpenLLMetry's when tracing is enabled, the OTel no-op otherwise).
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

export { isCaptureAiPayloads };
