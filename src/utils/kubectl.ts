/**
 * kubectl.ts - Executes kubectl commands as subprocesses
 *
 * How it works:
 * 1. Takes an array of kubectl arguments (e.g., ["get", "pods", "-n", "default", "-o", "json"])
 * 2. Spawns kubectl as a child process with execFile
 * 3. Resolves with the output as a string, or an error message if it fails
 *
 * kubectl owns authentication: it reads the local kubeconfig, or the pod's
 * service account when running inside the cluster. Nothing here touches
 * credentials.
 *
 * Why execFile instead of exec?
 * exec(string) passes the command to a shell (/bin/sh -c "..."), so shell
 * metacharacters like ; | ` $() are interpreted. Pod names come from user
 * queries. execFile(cmd, args[]) bypasses the shell entirely: each array
 * element becomes exactly one argument to kubectl, and "web; rm -rf /" fails
 * as "pod not found" instead of running a second command.
 *
 * Why asynchronous?
 * The HTTP server answers many requests at once and each request lists three
 * resource kinds. A synchronous spawn would stall every other request while
 * kubectl runs.
 *
 * OpenTelemetry instrumentation:
 * Each kubectl execution creates a CLIENT span carrying k8s.* attributes and
 * OTel semconv process.* attributes.
 */

import { execFile } from "child_process";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";

/**
 * Result from executing a kubectl command.
 *
 * The error state comes from kubectl's exit code, never from inspecting the
 * output: application logs legitimately contain the word "Error".
 */
export interface KubectlResult {
  output: string;
  isError: boolean;
}

/**
 * Signature of a kubectl executor.
 * Collector functions accept one of these so tests can inject a fake.
 */
export type KubectlExecutor = (args: string[]) => Promise<KubectlResult>;

export interface KubectlOptions {
  /** Kill kubectl after this many milliseconds (default 30000) */
  timeoutMs?: number;
}

/** Upper bound on captured stdout; large namespaces produce big JSON lists */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Metadata extracted from kubectl args for tracing attributes.
 */
interface KubectlMetadata {
  operation: string; // get, logs
  resource: string; // pods, deployments, nodes, or the pod name for logs
  namespace: string | undefined; // from -n flag
}

/**
 * Extracts operation metadata from kubectl args for tracing.
 *
 * - kubectl get pods -n default -o json → operation=get, resource=pods
 * - kubectl get nodes -o json          → operation=get, resource=nodes
 * - kubectl logs web-7f8c -n default   → operation=logs, resource=web-7f8c
 */
export function extractKubectlMetadata(args: string[]): KubectlMetadata {
  const operation = args[0] || "unknown";
  const resource = args[1] || "unknown";

  let namespaceIndex = args.indexOf("-n");
  if (namespaceIndex === -1) {
    namespaceIndex = args.indexOf("--namespace");
  }
  const namespace =
    namespaceIndex !== -1 && args[namespaceIndex + 1]
      ? args[namespaceIndex + 1]
      : undefined;

  return { operation, resource, namespace };
}

/**
 * Executes a kubectl command and resolves with a structured result.
 * Never rejects: spawn failures, timeouts, and non-zero exits all become
 * { isError: true } with a message naming the command.
 *
 * @param args - Arguments to pass to kubectl (e.g., ["get", "nodes", "-o", "json"])
 * @param options - Timeout override
 *
 * Example:
 *   await executeKubectl(["logs", "web-7f8c", "-n", "default"])
 *   // { output: "line1\nline2\n", isError: false }
 */
export function executeKubectl(
  args: string[],
  options?: KubectlOptions
): Promise<KubectlResult> {
  const tracer = getTracer();
  const metadata = extractKubectlMetadata(args);
  const timeoutMs = options?.timeoutMs ?? 30000;
  const startTime = Date.now();

  // Display form only; execution uses the args array
  const command = `kubectl ${args.join(" ")}`;

  return tracer.startActiveSpan(
    `kubectl ${metadata.operation} ${metadata.resource}`,
    { kind: SpanKind.CLIENT },
    (span) => {
      span.setAttribute("k8s.client", "kubectl");
      span.setAttribute("k8s.operation", metadata.operation);
      span.setAttribute("k8s.resource", metadata.resource);
      span.setAttribute("k8s.args", args.join(" "));
      if (metadata.namespace) {
        span.setAttribute("k8s.namespace", metadata.namespace);
      }
      span.setAttribute("process.executable.name", "kubectl");
      span.setAttribute("process.command_args", ["kubectl", ...args]);

      return new Promise<KubectlResult>((resolve) => {
        execFile(
          "kubectl",
          args,
          {
            encoding: "utf-8",
            timeout: timeoutMs,
            maxBuffer: MAX_OUTPUT_BYTES,
          },
          (error, stdout, stderr) => {
            span.setAttribute("k8s.duration_ms", Date.now() - startTime);

            if (!error) {
              span.setAttribute("process.exit.code", 0);
              span.setStatus({ code: SpanStatusCode.OK });
              span.end();
              resolve({ output: stdout, isError: false });
              return;
            }

            // A numeric code is kubectl's exit status (resource not found,
            // forbidden, ...). Anything else means kubectl never ran properly:
            // ENOENT when it is not installed, or a kill on timeout.
            const exitCode = typeof error.code === "number" ? error.code : -1;
            span.setAttribute("process.exit.code", exitCode);

            let message: string;
            if (error.killed) {
              message = `timed out after ${timeoutMs}ms`;
              span.setAttribute("error.type", "Timeout");
            } else if (exitCode === -1) {
              message = error.message;
              span.setAttribute("error.type", error.name);
              span.recordException({
                name: error.name,
                message: error.message,
                stack: error.stack,
              });
            } else {
              message = stderr.trim() || "Unknown error";
              span.setAttribute("error.type", "KubectlError");
            }

            span.setStatus({ code: SpanStatusCode.ERROR, message });
            span.end();
            resolve({
              output: `Error executing "${command}": ${message}`,
              isError: true,
            });
          }
        );
      });
    }
  );
}
