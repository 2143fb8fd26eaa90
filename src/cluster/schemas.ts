/**
 * schemas.ts - Zod schemas for `kubectl get <kind> -o json` output
 *
 * Only the fields the collector reads are declared; zod strips the rest.
 * Almost everything is nullish because the API server omits fields that were
 * never set (a pending pod has no spec.nodeName, a fresh deployment has no
 * status.conditions). A list that fails these schemas is treated as a failed
 * collection, not as an empty namespace.
 */

import { z } from "zod";

const labelsSchema = z.record(z.string());

const metadataSchema = z.object({
  name: z.string(),
  namespace: z.string().nullish(),
  labels: labelsSchema.nullish(),
});

const conditionSchema = z.object({
  type: z.string(),
  status: z.string().nullish(),
});

export const podSchema = z.object({
  metadata: metadataSchema,
  spec: z
    .object({
      nodeName: z.string().nullish(),
    })
    .nullish(),
  status: z
    .object({
      phase: z.string().nullish(),
    })
    .nullish(),
});

export const deploymentSchema = z.object({
  metadata: metadataSchema,
  spec: z
    .object({
      replicas: z.number().int().nullish(),
      selector: z
        .object({
          matchLabels: labelsSchema.nullish(),
        })
        .nullish(),
      strategy: z
        .object({
          type: z.string().nullish(),
        })
        .nullish(),
    })
    .nullish(),
  status: z
    .object({
      availableReplicas: z.number().int().nullish(),
      readyReplicas: z.number().int().nullish(),
      conditions: z.array(conditionSchema).nullish(),
    })
    .nullish(),
});

export const nodeSchema = z.object({
  metadata: metadataSchema,
  spec: z
    .object({
      unschedulable: z.boolean().nullish(),
    })
    .nullish(),
  status: z
    .object({
      conditions: z.array(conditionSchema).nullish(),
      addresses: z
        .array(z.object({ type: z.string(), address: z.string() }))
        .nullish(),
    })
    .nullish(),
});

/** Wraps an item schema in the `{ "kind": "List", "items": [...] }` envelope */
export function listSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({ items: z.array(item) });
}

export type KubePod = z.infer<typeof podSchema>;
export type KubeDeployment = z.infer<typeof deploymentSchema>;
export type KubeNode = z.infer<typeof nodeSchema>;
export type KubeCondition = z.infer<typeof conditionSchema>;
