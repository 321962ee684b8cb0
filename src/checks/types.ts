// Check definition types.
// Purpose: the decoded, immutable form of a check shared by the catalog and the engine.

import type { Container, KubeObject, PodSpec } from "../kube/types.js";

// =============================================================================
// SCOPES
// =============================================================================

export const TARGET_SCOPES = ["Pod", "Controller", "Container", "Other"] as const;

export type TargetScope = (typeof TARGET_SCOPES)[number];

export const CONTAINER_KINDS = ["initContainer", "container"] as const;

export type ContainerKind = (typeof CONTAINER_KINDS)[number];

export const SEVERITIES = ["danger", "warning", "ignore"] as const;

export type Severity = (typeof SEVERITIES)[number];

// =============================================================================
// PREDICATES
// =============================================================================

export type PredicateOutcome = { ok: true; passed: boolean } | { ok: false; reason: string };

export type Predicate<T> = (fragment: T) => PredicateOutcome;

/** The one predicate a definition carries, tagged by the fragment shape it expects. */
export type CheckEvaluation =
  | { shape: "pod"; predicate: Predicate<PodSpec> }
  | { shape: "controller"; predicate: Predicate<KubeObject> }
  | { shape: "container"; predicate: Predicate<Container> }
  | { shape: "object"; predicate: Predicate<KubeObject> };

// =============================================================================
// DEFINITIONS
// =============================================================================

export type KindFilter = {
  include: readonly string[];
  exclude: readonly string[];
};

export type ContainerFilter = {
  include: readonly ContainerKind[];
  exclude: readonly ContainerKind[];
};

export type CheckDefinition = {
  readonly id: string;
  readonly category: string;
  readonly target: TargetScope;
  readonly successMessage: string;
  readonly failureMessage: string;
  readonly controllers: KindFilter;
  readonly containers: ContainerFilter;
  /** Resource kinds an Other check applies to; empty means any kind. */
  readonly kinds: readonly string[];
  readonly evaluation: CheckEvaluation;
};
