// Kubernetes object shapes the auditor reads.
// Purpose: validate just enough structure to route objects; everything else passes through untouched.

import { z } from "zod";

// =============================================================================
// SCHEMAS
// =============================================================================

export const ObjectMetaSchema = z
  .object({
    name: z.string().default(""),
    namespace: z.string().default(""),
    annotations: z.record(z.string()).default({}),
    labels: z.record(z.string()).optional(),
  })
  .passthrough();

export const ContainerSchema = z
  .object({
    name: z.string().min(1),
    image: z.string().optional(),
  })
  .passthrough();

export const PodSpecSchema = z
  .object({
    containers: z.array(ContainerSchema).default([]),
    initContainers: z.array(ContainerSchema).optional(),
  })
  .passthrough();

export const KubeObjectSchema = z
  .object({
    apiVersion: z.string().min(1),
    kind: z.string().min(1),
    metadata: ObjectMetaSchema.default({}),
  })
  .passthrough();

// =============================================================================
// TYPES
// =============================================================================

export type ObjectMeta = z.infer<typeof ObjectMetaSchema>;
export type Container = z.infer<typeof ContainerSchema>;
export type PodSpec = z.infer<typeof PodSpecSchema>;
export type KubeObject = z.infer<typeof KubeObjectSchema>;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
