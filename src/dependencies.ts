/**
 * dependencies.ts - Builds the collaborators shared by every entry point
 *
 * The CLI, the HTTP server, and the MCP server all answer queries through the
 * same router. Each calls createQueryDependencies() once at startup with the
 * validated configuration and its own logger.
 */

import { createClusterReader } from "./cluster";
import type { AppConfig } from "./config";
import {
  createAnthropicModel,
  createCompletionProvider,
  type ChatModel,
} from "./llm/completion";
import type { QueryDependencies } from "./query";
import { executeKubectl, type KubectlExecutor } from "./utils/kubectl";
import type { Logger } from "./utils/logger";

export interface DependencyOverrides {
  /** Replaces the kubectl subprocess executor */
  kubectl?: KubectlExecutor;
  /** Replaces the ChatAnthropic model */
  model?: ChatModel;
}

export function createQueryDependencies(
  config: AppConfig,
  logger: Logger,
  overrides: DependencyOverrides = {}
): QueryDependencies {
  const kubectl: KubectlExecutor =
    overrides.kubectl ??
    ((args) => executeKubectl(args, { timeoutMs: config.kubectlTimeoutMs }));

  const model =
    overrides.model ??
    createAnthropicModel({
      apiKey: config.anthropicApiKey,
      model: config.model,
      maxTokens: config.maxTokens,
    });

  return {
    cluster: createClusterReader({ kubectl, logger }),
    completion: createCompletionProvider({ model }),
    logger,
    defaultNamespace: config.namespace,
  };
}
