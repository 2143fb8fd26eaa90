/**
 * query/index.ts - Public API for query answering
 */

export type { ClassifiedQuery } from "./classifier";
export { classifyQuery, extractPodName } from "./classifier";

export type { ClusterContext } from "./prompt";
export {
  buildClusterContext,
  serializeClusterContext,
  buildPromptMessages,
  getSystemInstruction,
} from "./prompt";

export type { QueryRequest, QueryResponse, QueryDependencies } from "./router";
export { answerQuery, POD_NAME_NOT_FOUND, queryRequestSchema } from "./router";
