/**
 * kubectl.test.ts - Unit tests for the kubectl subprocess executor
 *
 * child_process.execFile is mocked, so no kubectl binary is needed.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { executeKubectl, extractKubectlMetadata } from "./kubectl";

type ExecFileCallback = (
  error: (Error & { code?: string | number | null; killed?: boolean }) | null,
  stdout: string,
  stderr: string
) => void;

const execFileMock = vi.hoisted(() => vi.fn());

vi.mock("child_process", () => ({
  execFile: execFileMock,
}));

const span = vi.hoisted(() => ({
  setAttribute: vi.fn(),
  setStatus: vi.fn(),
  recordException: vi.fn(),
  end: vi.fn(),
}));

vi.mock("../tracing", () => ({
  getTracer: () => ({
    startActiveSpan: (_name: string, _options: unknown, fn: (s: typeof span) => unknown) =>
      fn(span),
  }),
}));

/** Makes the next execFile call complete with the given outcome */
function completeWith(
  error: Parameters<ExecFileCallback>[0],
  stdout = "",
  stderr = ""
): void {
  execFileMock.mockImplementationOnce(
    (_file: string, _args: string[], _options: unknown, callback: ExecFileCallback) => {
      callback(error, stdout, stderr);
    }
  );
}

beforeEach(() => {
  execFileMock.mockReset();
  span.setAttribute.mockClear();
  span.setStatus.mockClear();
  span.recordException.mockClear();
  span.end.mockClear();
});

describe("executeKubectl", () => {
  it("resolves with stdout on success", async () => {
    completeWith(null, '{"items":[]}');

    const result = await executeKubectl(["get", "pods", "-n", "default", "-o", "json"]);

    expect(result).toEqual({ output: '{"items":[]}', isError: false });
    expect(execFileMock).toHaveBeenCalledWith(
      "kubectl",
      ["get", "pods", "-n", "default", "-o", "json"],
      expect.objectContaining({ encoding: "utf-8", timeout: 30000 }),
      expect.any(Function)
    );
  });

  it("passes a custom timeout", async () => {
    completeWith(null, "");

    await executeKubectl(["get", "nodes", "-o", "json"], { timeoutMs: 5000 });

    expect(execFileMock).toHaveBeenCalledWith(
      "kubectl",
      ["get", "nodes", "-o", "json"],
      expect.objectContaining({ timeout: 5000 }),
      expect.any(Function)
    );
  });

  it("reports kubectl's stderr on a non-zero exit", async () => {
    completeWith(
      Object.assign(new Error("Command failed"), { code: 1, killed: false }),
      "",
      'Error from server (NotFound): pods "web-1" not found\n'
    );

    const result = await executeKubectl(["logs", "web-1", "-n", "default"]);

    expect(result).toEqual({
      output:
        'Error executing "kubectl logs web-1 -n default": Error from server (NotFound): pods "web-1" not found',
      isError: true,
    });
  });

  it("falls back to a generic message when stderr is empty", async () => {
    completeWith(Object.assign(new Error("Command failed"), { code: 1, killed: false }));

    const result = await executeKubectl(["get", "nodes", "-o", "json"]);

    expect(result.output).toBe(
      'Error executing "kubectl get nodes -o json": Unknown error'
    );
  });

  it("reports a missing kubectl binary", async () => {
    completeWith(
      Object.assign(new Error("spawn kubectl ENOENT"), { code: "ENOENT", killed: false })
    );

    const result = await executeKubectl(["get", "nodes", "-o", "json"]);

    expect(result).toEqual({
      output: 'Error executing "kubectl get nodes -o json": spawn kubectl ENOENT',
      isError: true,
    });
  });

  it("records the spawn failure on the span", async () => {
    const failure = Object.assign(new Error("spawn kubectl ENOENT"), {
      code: "ENOENT",
      killed: false,
    });
    completeWith(failure);

    await executeKubectl(["get", "nodes", "-o", "json"]);

    expect(span.recordException).toHaveBeenCalledWith({
      name: "Error",
      message: "spawn kubectl ENOENT",
      stack: failure.stack,
    });
    expect(span.setAttribute).toHaveBeenCalledWith("process.exit.code", -1);
    expect(span.end).toHaveBeenCalledOnce();
  });

  it("does not record an exception for a kubectl exit status", async () => {
    completeWith(Object.assign(new Error("Command failed"), { code: 1, killed: false }));

    await executeKubectl(["get", "nodes", "-o", "json"]);

    expect(span.recordException).not.toHaveBeenCalled();
    expect(span.setAttribute).toHaveBeenCalledWith("error.type", "KubectlError");
  });

  it("reports a timeout", async () => {
    completeWith(
      Object.assign(new Error("Command failed"), { code: null, killed: true }),
      ""
    );

    const result = await executeKubectl(["get", "pods", "-n", "default", "-o", "json"], {
      timeoutMs: 5000,
    });

    expect(result.output).toBe(
      'Error executing "kubectl get pods -n default -o json": timed out after 5000ms'
    );
    expect(result.isError).toBe(true);
  });
});

describe("extractKubectlMetadata", () => {
  it("reads operation, resource, and namespace", () => {
    expect(extractKubectlMetadata(["get", "pods", "-n", "default", "-o", "json"])).toEqual({
      operation: "get",
      resource: "pods",
      namespace: "default",
    });
  });

  it("accepts the long namespace flag", () => {
    expect(extractKubectlMetadata(["logs", "web-1", "--namespace", "prod"])).toEqual({
      operation: "logs",
      resource: "web-1",
      namespace: "prod",
    });
  });

  it("leaves namespace undefined for cluster-scoped calls", () => {
    expect(extractKubectlMetadata(["get", "nodes", "-o", "json"]).namespace).toBeUndefined();
  });
});
