/**
 * prompt.ts - Builds the instruction set for general cluster questions
 *
 * A snapshot becomes a context document with snake_case keys (the shape the
 * system prompt describes to the model), serialized as indented JSON and
 * placed in the user message ahead of the question.
 */

import * as fs from "fs";
import * as path from "path";
import type { ChatMessage } from "../llm/completion";
import type { ClusterSnapshot, CollectionFailure } from "../cluster";

/**
 * Path to the system prompt file.
 * Two levels up from src/query (or dist/query) is the project root.
 */
export const SYSTEM_PROMPT_PATH = path.join(
  __dirname,
  "../../prompts/cluster-assistant.md"
);

let cachedPrompt: string | null = null;

/**
 * Returns the system instruction, reading it from disk on first use.
 *
 * A missing file fails the request that needed it rather than the whole
 * process, so log requests keep working.
 */
export function getSystemInstruction(): string {
  if (cachedPrompt === null) {
    try {
      cachedPrompt = fs.readFileSync(SYSTEM_PROMPT_PATH, "utf8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(
        `Could not load system prompt from ${SYSTEM_PROMPT_PATH}: ${message}`,
        { cause: error }
      );
    }
  }
  return cachedPrompt;
}

/** The document the model answers from */
export interface ClusterContext {
  namespace: string;
  pods: Array<{
    name: string;
    namespace: string;
    status: string;
    node: string | null;
  }>;
  deployments: Array<{
    name: string;
    replicas: number;
    available_replicas: number | null;
    ready_replicas: number | null;
    status: string;
    selector: Record<string, string>;
    strategy: string;
  }>;
  nodes: Array<{
    name: string;
    status: string;
    labels: Record<string, string>;
    node_ip: string;
    unschedulable: boolean;
  }>;
  pod_count: number;
  deployment_count: number;
  node_count: number;
  /** Present only when at least one category could not be collected */
  collection_errors?: CollectionFailure[];
}

/**
 * Maps a snapshot onto the context document.
 *
 * Sequence order is preserved and counts come straight from the snapshot, so
 * pod_count always equals pods.length.
 */
export function buildClusterContext(snapshot: ClusterSnapshot): ClusterContext {
  const context: ClusterContext = {
    namespace: snapshot.namespace,
    pods: snapshot.pods.map((pod) => ({
      name: pod.name,
      namespace: pod.namespace,
      status: pod.status,
      node: pod.node,
    })),
    deployments: snapshot.deployments.map((deployment) => ({
      name: deployment.name,
      replicas: deployment.desiredReplicas,
      available_replicas: deployment.availableReplicas,
      ready_replicas: deployment.readyReplicas,
      status: deployment.status,
      selector: { ...deployment.selector },
      strategy: deployment.strategy,
    })),
    nodes: snapshot.nodes.map((node) => ({
      name: node.name,
      status: node.status,
      labels: { ...node.labels },
      node_ip: node.ip,
      unschedulable: node.unschedulable,
    })),
    pod_count: snapshot.podCount,
    deployment_count: snapshot.deploymentCount,
    node_count: snapshot.nodeCount,
  };

  if (snapshot.failures.length > 0) {
    context.collection_errors = snapshot.failures.map((failure) => ({
      category: failure.category,
      reason: failure.reason,
    }));
  }

  return context;
}

/** Indented JSON, two spaces, keys in declaration order */
export function serializeClusterContext(context: ClusterContext): string {
  return JSON.stringify(context, null, 2);
}

/**
 * Builds the two messages sent for a general question: the fixed system
 * instruction, then the serialized context followed by the question.
 */
export function buildPromptMessages(
  snapshot: ClusterSnapshot,
  query: string
): ChatMessage[] {
  const serialized = serializeClusterContext(buildClusterContext(snapshot));

  return [
    { role: "system", content: getSystemInstruction() },
    {
      role: "user",
      content: `Cluster data (JSON):\n${serialized}\n\nQuestion: ${query}`,
    },
  ];
}
