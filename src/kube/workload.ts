// Workload extraction.
// Purpose: turn a raw controller or pod object into the shape the check pipeline consumes.

import { ManifestError } from "../core/errors.js";
import { PodSpecSchema, isPlainObject, type KubeObject, type ObjectMeta, type PodSpec } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type Workload = {
  kind: string;
  meta: ObjectMeta;
  podSpec: PodSpec;
  /** The object as it appeared in the manifest, used by controller-shaped checks. */
  original: KubeObject;
};

type PodSpecLocator = readonly string[];

// =============================================================================
// KNOWN CONTROLLERS
// =============================================================================

const TEMPLATE_SPEC: PodSpecLocator = ["spec", "template", "spec"];

const POD_SPEC_LOCATORS: ReadonlyMap<string, PodSpecLocator> = new Map<string, PodSpecLocator>([
  ["Pod", ["spec"]],
  ["Deployment", TEMPLATE_SPEC],
  ["StatefulSet", TEMPLATE_SPEC],
  ["DaemonSet", TEMPLATE_SPEC],
  ["ReplicaSet", TEMPLATE_SPEC],
  ["ReplicationController", TEMPLATE_SPEC],
  ["Job", TEMPLATE_SPEC],
  ["CronJob", ["spec", "jobTemplate", "spec", "template", "spec"]],
]);

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Returns the workload view of an object, or null when the object carries no pod template.
 * Unknown kinds still count as workloads when they embed `spec.template.spec.containers`.
 * Throws ManifestError when a pod template is present but does not parse.
 */
export function toWorkload(object: KubeObject): Workload | null {
  const knownLocator = POD_SPEC_LOCATORS.get(object.kind);
  const locator = knownLocator ?? TEMPLATE_SPEC;
  const rawSpec = readPath(object, locator);
  if (!isPlainObject(rawSpec)) {
    return null;
  }

  if (!knownLocator && !Array.isArray(rawSpec.containers)) {
    return null;
  }

  const parsed = PodSpecSchema.safeParse(rawSpec);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${[...locator, ...issue.path].join(".")}: ${issue.message}`)
      .join("; ");
    throw new ManifestError(
      `Invalid pod spec in ${object.kind} ${object.metadata.name}: ${issues}`,
      `${object.kind}/${object.metadata.name}`,
    );
  }

  return {
    kind: object.kind,
    meta: object.metadata,
    podSpec: parsed.data,
    original: object,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function readPath(value: unknown, segments: PodSpecLocator): unknown {
  let current = value;
  for (const segment of segments) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}
