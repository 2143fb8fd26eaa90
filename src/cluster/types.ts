/**
 * types.ts - Records produced by the cluster snapshot collector
 *
 * Every value here is request-scoped: built while answering one query and
 * discarded once the response is sent. Nothing is cached between requests.
 */

import type { KubectlExecutor } from "../utils/kubectl";
import type { Logger } from "../utils/logger";

/** Pod phases reported by the API server; anything else maps to "Unknown" */
export const POD_PHASES = [
  "Pending",
  "Running",
  "Succeeded",
  "Failed",
  "Unknown",
] as const;

export type PodPhase = (typeof POD_PHASES)[number];

/**
 * A pod flattened to the fields the assistant reasons about.
 */
export interface PodRecord {
  name: string;
  namespace: string;
  status: PodPhase;
  /** Node the pod is scheduled on; null while the pod is still unscheduled */
  node: string | null;
}

export interface DeploymentRecord {
  name: string;
  /** spec.replicas */
  desiredReplicas: number;
  /** status.availableReplicas; null when the controller has not reported it */
  availableReplicas: number | null;
  /** status.readyReplicas; null when the controller has not reported it */
  readyReplicas: number | null;
  /** Type of the last reported condition (e.g. "Available"), or "Unknown" */
  status: string;
  /** spec.selector.matchLabels */
  selector: Record<string, string>;
  /** spec.strategy.type ("RollingUpdate", "Recreate"), or "Unknown" */
  strategy: string;
}

export interface NodeRecord {
  name: string;
  /** Type of the last reported condition (usually "Ready"), or "Unknown" */
  status: string;
  labels: Record<string, string>;
  /** InternalIP when reported, else the first address, else "Unknown" */
  ip: string;
  unschedulable: boolean;
}

/** The three categories collected for a snapshot */
export type ResourceCategory = "pods" | "deployments" | "nodes";

/**
 * Outcome of listing one category.
 *
 * Keeps "the namespace has no deployments" (ok, empty items) apart from
 * "listing deployments failed" (not ok, with a reason), even though both
 * contribute an empty list to the snapshot.
 */
export type CollectionResult<T> =
  | { ok: true; items: T[] }
  | { ok: false; items: []; reason: string };

/** A category that could not be collected, and why */
export interface CollectionFailure {
  category: ResourceCategory;
  reason: string;
}

/**
 * Point-in-time aggregate of one namespace plus the cluster's nodes.
 *
 * Counts are derived from the sequences when the snapshot is created and the
 * whole object is frozen, so podCount === pods.length always holds.
 */
export interface ClusterSnapshot {
  readonly namespace: string;
  readonly pods: readonly PodRecord[];
  readonly deployments: readonly DeploymentRecord[];
  readonly nodes: readonly NodeRecord[];
  readonly podCount: number;
  readonly deploymentCount: number;
  readonly nodeCount: number;
  readonly failures: readonly CollectionFailure[];
}

/**
 * Options shared by the collector functions.
 * Accepts injectable dependencies for testing.
 */
export interface CollectorOptions {
  /**
   * Injectable kubectl executor for testing.
   * Defaults to the real executeKubectl from utils/kubectl.
   */
  kubectl?: KubectlExecutor;
  /** Where degraded collections and log-fetch failures are reported */
  logger?: Logger;
}

/**
 * What the query router needs from the cluster.
 * createClusterReader() binds CollectorOptions into one of these.
 */
export interface ClusterReader {
  collectSnapshot(namespace: string): Promise<ClusterSnapshot>;
  fetchPodLogs(podName: string, namespace: string): Promise<string>;
}
