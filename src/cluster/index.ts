/**
 * cluster/index.ts - Public API for cluster collection
 *
 * Import from here, not from collector.ts or types.ts directly.
 */

export type {
  PodPhase,
  PodRecord,
  DeploymentRecord,
  NodeRecord,
  ResourceCategory,
  CollectionResult,
  CollectionFailure,
  ClusterSnapshot,
  CollectorOptions,
  ClusterReader,
} from "./types";
export { POD_PHASES } from "./types";

export {
  UNKNOWN,
  lastConditionType,
  toPodRecord,
  toDeploymentRecord,
  toNodeRecord,
  createSnapshot,
  listPods,
  listDeployments,
  listNodes,
  collectSnapshot,
  fetchPodLogs,
  createClusterReader,
} from "./collector";
