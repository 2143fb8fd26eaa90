/**
 * collector.ts - Cluster snapshot collector
 *
 * Lists pods, deployments, and nodes through kubectl and flattens each object
 * into the records the prompt builder serializes. Also fetches a single pod's
 * logs for log requests.
 *
 * Failure policy:
 * Each category is collected independently. If listing deployments fails
 * (kubectl missing, forbidden, timeout, unparseable output), the snapshot still
 * carries pods and nodes; deployments are empty and the reason is recorded in
 * snapshot.failures and logged. A failed log fetch yields "". Nothing in this
 * module throws for a cluster-side problem.
 */

import { z } from "zod";
import { executeKubectl as defaultKubectl } from "../utils/kubectl";
import { silentLogger } from "../utils/logger";
import {
  deploymentSchema,
  listSchema,
  nodeSchema,
  podSchema,
  type KubeCondition,
  type KubeDeployment,
  type KubeNode,
  type KubePod,
} from "./schemas";
import {
  POD_PHASES,
  type ClusterReader,
  type ClusterSnapshot,
  type CollectionFailure,
  type CollectionResult,
  type CollectorOptions,
  type DeploymentRecord,
  type NodeRecord,
  type PodPhase,
  type PodRecord,
  type ResourceCategory,
} from "./types";

/** Value reported when the API gives us nothing to derive a field from */
export const UNKNOWN = "Unknown";

/**
 * Pod names accepted by fetchPodLogs: must start with a letter or digit, so a
 * name can never be read by kubectl as a flag.
 */
const POD_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9.-]*$/;

// ---------------------------------------------------------------------------
// Pure normalizers (exported for unit testing)
// ---------------------------------------------------------------------------

/**
 * Returns the type of the last condition in the list, or "Unknown".
 *
 * The API server appends conditions as they are first observed, so the last
 * entry is treated as the most recent. Conditions are not guaranteed to be
 * ordered by lastTransitionTime; see DESIGN.md.
 */
export function lastConditionType(
  conditions: readonly KubeCondition[] | null | undefined
): string {
  if (!conditions || conditions.length === 0) return UNKNOWN;
  return conditions[conditions.length - 1].type;
}

function toPodPhase(phase: string | null | undefined): PodPhase {
  return POD_PHASES.find((known) => known === phase) ?? "Unknown";
}

export function toPodRecord(pod: KubePod, namespace: string): PodRecord {
  return {
    name: pod.metadata.name,
    namespace: pod.metadata.namespace ?? namespace,
    status: toPodPhase(pod.status?.phase),
    node: pod.spec?.nodeName ?? null,
  };
}

/**
 * Flattens a Deployment.
 * desiredReplicas falls back to 1, the API server's default for spec.replicas.
 */
export function toDeploymentRecord(
  deployment: KubeDeployment
): DeploymentRecord {
  return {
    name: deployment.metadata.name,
    desiredReplicas: deployment.spec?.replicas ?? 1,
    availableReplicas: deployment.status?.availableReplicas ?? null,
    readyReplicas: deployment.status?.readyReplicas ?? null,
    status: lastConditionType(deployment.status?.conditions),
    selector: deployment.spec?.selector?.matchLabels ?? {},
    strategy: deployment.spec?.strategy?.type ?? UNKNOWN,
  };
}

export function toNodeRecord(node: KubeNode): NodeRecord {
  const addresses = node.status?.addresses ?? [];
  const internal = addresses.find((a) => a.type === "InternalIP");

  return {
    name: node.metadata.name,
    status: lastConditionType(node.status?.conditions),
    labels: node.metadata.labels ?? {},
    ip: internal?.address ?? addresses[0]?.address ?? UNKNOWN,
    unschedulable: node.spec?.unschedulable ?? false,
  };
}

/**
 * Builds a frozen snapshot from the three category results.
 *
 * Counts are taken from the sequences here, never from anything the API
 * reported, and failed categories are listed in `failures`.
 */
export function createSnapshot(
  namespace: string,
  results: {
    pods: CollectionResult<PodRecord>;
    deployments: CollectionResult<DeploymentRecord>;
    nodes: CollectionResult<NodeRecord>;
  }
): ClusterSnapshot {
  const failures: CollectionFailure[] = [];
  const categories: ResourceCategory[] = ["pods", "deployments", "nodes"];
  for (const category of categories) {
    const result = results[category];
    if (!result.ok) {
      failures.push({ category, reason: result.reason });
    }
  }

  const pods = Object.freeze([...results.pods.items]);
  const deployments = Object.freeze([...results.deployments.items]);
  const nodes = Object.freeze([...results.nodes.items]);

  return Object.freeze({
    namespace,
    pods,
    deployments,
    nodes,
    podCount: pods.length,
    deploymentCount: deployments.length,
    nodeCount: nodes.length,
    failures: Object.freeze(failures),
  });
}

// ---------------------------------------------------------------------------
// kubectl-backed collection
// ---------------------------------------------------------------------------

/**
 * Runs one `kubectl get ... -o json`, validates the list, and normalizes it.
 * Every failure mode is converted into { ok: false, reason } and logged.
 */
async function listCategory<TItem, TRecord>(
  category: ResourceCategory,
  args: string[],
  schema: z.ZodType<{ items: TItem[] }, z.ZodTypeDef, unknown>,
  normalize: (item: TItem) => TRecord,
  options?: CollectorOptions
): Promise<CollectionResult<TRecord>> {
  const kubectl = options?.kubectl ?? defaultKubectl;
  const logger = options?.logger ?? silentLogger;

  const fail = (reason: string): CollectionResult<TRecord> => {
    logger.error({ category, reason }, `Failed to collect ${category}`);
    return { ok: false, items: [], reason };
  };

  let output: string;
  try {
    const result = await kubectl(args);
    if (result.isError) {
      return fail(result.output.trim());
    }
    output = result.output;
  } catch (error) {
    return fail(error instanceof Error ? error.message : String(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail(`kubectl returned invalid JSON: ${message}`);
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    return fail(`Unexpected ${category} list${where}: ${issue.message}`);
  }

  return { ok: true, items: validated.data.items.map(normalize) };
}

/** Lists pods in a namespace (`kubectl get pods -n <ns> -o json`) */
export function listPods(
  namespace: string,
  options?: CollectorOptions
): Promise<CollectionResult<PodRecord>> {
  return listCategory(
    "pods",
    ["get", "pods", "-n", namespace, "-o", "json"],
    listSchema(podSchema),
    (pod) => toPodRecord(pod, namespace),
    options
  );
}

/** Lists deployments in a namespace (`kubectl get deployments -n <ns> -o json`) */
export function listDeployments(
  namespace: string,
  options?: CollectorOptions
): Promise<CollectionResult<DeploymentRecord>> {
  return listCategory(
    "deployments",
    ["get", "deployments", "-n", namespace, "-o", "json"],
    listSchema(deploymentSchema),
    toDeploymentRecord,
    options
  );
}

/** Lists every node in the cluster; nodes are cluster-scoped */
export function listNodes(
  options?: CollectorOptions
): Promise<CollectionResult<NodeRecord>> {
  return listCategory(
    "nodes",
    ["get", "nodes", "-o", "json"],
    listSchema(nodeSchema),
    toNodeRecord,
    options
  );
}

/**
 * Collects pods, deployments, and nodes concurrently into one snapshot.
 *
 * @param namespace - Namespace for pods and deployments
 * @param options - Injectable kubectl executor and logger
 * @returns A frozen snapshot; never rejects for cluster-side failures
 */
export async function collectSnapshot(
  namespace: string,
  options?: CollectorOptions
): Promise<ClusterSnapshot> {
  const [pods, deployments, nodes] = await Promise.all([
    listPods(namespace, options),
    listDeployments(namespace, options),
    listNodes(options),
  ]);

  return createSnapshot(namespace, { pods, deployments, nodes });
}

/**
 * Reads a pod's logs (`kubectl logs <pod> -n <ns>`).
 *
 * @returns The raw log text, or "" when the pod name is unusable or kubectl fails
 */
export async function fetchPodLogs(
  podName: string,
  namespace: string,
  options?: CollectorOptions
): Promise<string> {
  const kubectl = options?.kubectl ?? defaultKubectl;
  const logger = options?.logger ?? silentLogger;

  if (!POD_NAME_PATTERN.test(podName)) {
    logger.error({ podName, namespace }, "Refusing to fetch logs for invalid pod name");
    return "";
  }

  try {
    const result = await kubectl(["logs", podName, "-n", namespace]);
    if (result.isError) {
      logger.error(
        { podName, namespace, reason: result.output.trim() },
        `Error fetching logs for pod ${podName}`
      );
      return "";
    }
    return result.output;
  } catch (error) {
    logger.error(
      { podName, namespace, err: error },
      `Error fetching logs for pod ${podName}`
    );
    return "";
  }
}

/**
 * Binds collector options into the ClusterReader the router depends on.
 * Built once at startup and shared by all requests.
 */
export function createClusterReader(options?: CollectorOptions): ClusterReader {
  return {
    collectSnapshot: (namespace) => collectSnapshot(namespace, options),
    fetchPodLogs: (podName, namespace) =>
      fetchPodLogs(podName, namespace, options),
  };
}
