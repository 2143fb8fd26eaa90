/**
 * optional-deps.ts - Loads the tracing packages kube-query runs without
 *
 * loadOptional() returns the package, or null when it is not installed. Any
 * other load failure is rethrown so a broken install shows at startup.
 *
 * tracing/index.ts goes through the named loaders so its tests can
 * vi.mock("./optional-deps") in place of a real require().
 */

function isMissingPackage(error: unknown, packageName: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "MODULE_NOT_FOUND" &&
    error.message.includes(packageName)
  );
}

export function loadOptional<T>(packageName: string): T | null {
  try {
    const loaded: T = require(packageName);
    return loaded;
  } catch (error) {
    if (isMissingPackage(error, packageName)) return null;
    throw error;
  }
}

export const loadTraceloop = () =>
  loadOptional<typeof import("@traceloop/node-server-sdk")>("@traceloop/node-server-sdk");

export const loadSdkTraceNode = () =>
  loadOptional<typeof import("@opentelemetry/sdk-trace-node")>("@opentelemetry/sdk-trace-node");

export const loadExporterOtlpProto = () =>
  loadOptional<typeof import("@opentelemetry/exporter-trace-otlp-proto")>(
    "@opentelemetry/exporter-trace-otlp-proto"
  );
