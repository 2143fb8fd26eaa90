/**
 * config.ts - Process configuration for kube-query
 *
 * All settings come from environment variables and are read once at startup.
 * The zod schema below is the single source of truth for names, defaults, and
 * types; every entry point (CLI, HTTP server, MCP server) calls loadConfig()
 * before wiring anything else.
 *
 * The Anthropic API key is the only required value. Without it the process
 * must not serve traffic, so loadConfig() throws and the caller exits.
 */

import { z } from "zod";

/**
 * The Anthropic model used to answer general cluster questions.
 * Override with KUBE_QUERY_MODEL.
 */
export const DEFAULT_MODEL = "claude-sonnet-4-20250514";

/** Namespace queried when neither the request nor the environment names one */
export const DEFAULT_NAMESPACE = "default";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

/**
 * Environment schema.
 *
 * Numbers arrive as strings, so they go through z.coerce. Empty strings are
 * treated as "unset" for everything except LOG_DIR, where an empty value
 * explicitly disables the log file.
 */
const envSchema = z.object({
  ANTHROPIC_API_KEY: z
    .string({ required_error: "ANTHROPIC_API_KEY is not set" })
    .min(1, "ANTHROPIC_API_KEY is empty"),
  KUBE_QUERY_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  KUBE_QUERY_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  KUBE_QUERY_NAMESPACE: z.string().min(1).default(DEFAULT_NAMESPACE),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  KUBECTL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_DIR: z.string().default("logs"),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Validated, typed configuration handed to every component at startup.
 */
export interface AppConfig {
  anthropicApiKey: string;
  model: string;
  maxTokens: number;
  namespace: string;
  port: number;
  host: string;
  kubectlTimeoutMs: number;
  logLevel: LogLevel;
  /** Directory for the append-only log file, or null when file logging is off */
  logDir: string | null;
}

/**
 * Drops empty-string values so that `FOO=` behaves like an unset variable
 * and picks up the schema default. LOG_DIR is kept as-is.
 */
function withoutEmptyValues(
  env: NodeJS.ProcessEnv
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (value === "" && key !== "LOG_DIR") continue;
    result[key] = value;
  }
  return result;
}

/**
 * Reads and validates configuration from the environment.
 *
 * @param env - Environment to read (defaults to process.env; tests pass their own)
 * @returns The validated configuration
 * @throws Error listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutEmptyValues(env));

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const variable = issue.path.join(".");
      return issue.message.includes(variable)
        ? issue.message
        : `${variable}: ${issue.message}`;
    });
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const values = parsed.data;
  return {
    anthropicApiKey: values.ANTHROPIC_API_KEY,
    model: values.KUBE_QUERY_MODEL,
    maxTokens: values.KUBE_QUERY_MAX_TOKENS,
    namespace: values.KUBE_QUERY_NAMESPACE,
    port: values.PORT,
    host: values.HOST,
    kubectlTimeoutMs: values.KUBECTL_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
    logDir: values.LOG_DIR === "" ? null : values.LOG_DIR,
  };
}
