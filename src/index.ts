#!/usr/bin/env node
/**
 * index.ts - CLI entry point for kube-query
 *
 * Two modes:
 *
 * 1. Ask a question (default):
 *    kube-query "how many pods are running?" [-n namespace]
 *    Answers once and prints the answer.
 *
 * 2. Serve HTTP:
 *    kube-query serve [--port 8000] [--host 0.0.0.0] [-n namespace]
 *    Starts the POST /query gateway.
 *
 * The shebang (#!/usr/bin/env node) makes `kube-query "question"` work after
 * npm link.
 */

// Initialize OpenTelemetry tracing before any other imports
// This ensures the tracer provider is registered before any instrumented code runs
import "./tracing";

import { Command, InvalidArgumentError } from "commander";
import { execSync } from "child_process";
import { loadConfig, type AppConfig } from "./config";
import { createQueryDependencies } from "./dependencies";
import { answerQuery } from "./query";
import { createApp, startServer } from "./server/app";
import { createLogger } from "./utils/logger";

// ---------------------------------------------------------------------------
// Environment validation
// ---------------------------------------------------------------------------

/**
 * Validates that kubectl is available.
 * Every query path shells out to kubectl.
 */
function validateKubectl(): void {
  try {
    execSync("kubectl version --client", {
      encoding: "utf-8",
      stdio: ["pipe", "pipe", "pipe"],
    });
  } catch {
    console.error("Error: kubectl is not installed or not in PATH.");
    console.error("");
    console.error("Install kubectl:");
    console.error("  https://kubernetes.io/docs/tasks/tools/");
    process.exit(1);
  }
}

/**
 * Loads configuration, exiting with guidance when it is invalid.
 */
function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    console.error("");
    console.error("Export your API key:");
    console.error("  export ANTHROPIC_API_KEY=your-key-here");
    process.exit(1);
  }
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 0 and 65535.");
  }
  return port;
}

/**
 * Main function - sets up the CLI with ask (default) and serve subcommands
 */
async function main() {
  const program = new Command();

  program
    .name("kube-query")
    .description(
      "Answers natural language questions about a Kubernetes namespace"
    )
    .version("0.1.0")
    // Options after "serve" belong to serve, not to the default command
    .enablePositionalOptions();

  // -------------------------------------------------------------------------
  // Default command: ask a question
  // -------------------------------------------------------------------------

  program
    .argument("<question>", "Natural language question about your cluster")
    .option("-n, --namespace <namespace>", "Namespace to answer from")
    .action(async (question: string, options: { namespace?: string }) => {
      const config = loadConfigOrExit();
      validateKubectl();

      const logger = createLogger({
        level: config.logLevel,
        logDir: config.logDir,
        console: "stderr",
      });
      const deps = createQueryDependencies(config, logger);

      try {
        const { answer } = await answerQuery(
          { query: question, namespace: options.namespace },
          deps
        );
        console.log(answer);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ err: error }, "Query failed");
        console.error(`\nQuery failed: ${message}`);
        process.exit(1);
      }
    });

  // -------------------------------------------------------------------------
  // Serve subcommand: HTTP gateway
  // -------------------------------------------------------------------------

  program
    .command("serve")
    .description("Serve POST /query over HTTP")
    .option("-p, --port <port>", "Port to listen on (default: PORT env or 8000)", parsePort)
    .option("--host <host>", "Interface to bind (default: HOST env or 0.0.0.0)")
    .option(
      "-n, --namespace <namespace>",
      "Namespace used when a request names none (default: KUBE_QUERY_NAMESPACE env or default)"
    )
    .action(
      async (options: { port?: number; host?: string; namespace?: string }) => {
        const config = loadConfigOrExit();
        validateKubectl();

        const logger = createLogger({
          level: config.logLevel,
          logDir: config.logDir,
        });
        const deps = createQueryDependencies(
          { ...config, namespace: options.namespace ?? config.namespace },
          logger
        );

        try {
          await startServer(
            createApp(deps),
            options.host ?? config.host,
            options.port ?? config.port,
            logger
          );
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.fatal({ err: error }, "Could not start server");
          console.error(`\nCould not start server: ${message}`);
          process.exit(1);
        }
      }
    );

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
