// Scope resolution.
// Purpose: decide whether a configured check applies to the object (and container) being evaluated.

import type { CheckCatalog } from "../checks/catalog.js";
import type { CheckDefinition, ContainerKind, TargetScope } from "../checks/types.js";
import { severityOf, type AuditConfig } from "../core/config.js";
import { CheckNotFoundError, InvalidCustomCheckError, type CheckSubject } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type EvaluationMeta = Readonly<{
  namespace: string;
  name: string;
  annotations: Readonly<Record<string, string>>;
}>;

/** Built fresh for each manifest-scope pass and dropped with it. */
export type EvaluationContext = Readonly<{
  kind: string;
  scope: TargetScope;
  meta: EvaluationMeta;
  containerName?: string;
  isInitContainer?: boolean;
}>;

export type SkipReason =
  | "not-configured"
  | "severity-ignored"
  | "config-exemption"
  | "target-mismatch"
  | "controller-filtered"
  | "kind-filtered"
  | "container-filtered";

export type Resolution =
  | { action: "apply"; definition: CheckDefinition }
  | { action: "skip"; reason: SkipReason };

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Resolves a configured check ID for one evaluation context.
 * Unknown or invalid check IDs throw; every other reason not to run the check is a skip.
 */
export function resolveCheck(
  catalog: CheckCatalog,
  checkId: string,
  context: EvaluationContext,
  config: AuditConfig,
): Resolution {
  const lookup = catalog.resolve(checkId, config);
  if (lookup.status === "missing") {
    throw new CheckNotFoundError(checkId, subjectOf(context));
  }
  if (lookup.status === "invalid") {
    throw new InvalidCustomCheckError(checkId, lookup.issues, subjectOf(context));
  }

  const definition = lookup.definition;
  const globalSkip = globalSkipReason(config, definition.id, context);
  if (globalSkip) {
    return { action: "skip", reason: globalSkip };
  }

  const structuralSkip = structuralSkipReason(definition, context);
  if (structuralSkip) {
    return { action: "skip", reason: structuralSkip };
  }

  return { action: "apply", definition };
}

export function isGloballyActionable(
  config: AuditConfig,
  checkId: string,
  context: EvaluationContext,
): boolean {
  return globalSkipReason(config, checkId, context) === null;
}

export function isStructurallyActionable(
  definition: CheckDefinition,
  context: EvaluationContext,
): boolean {
  return structuralSkipReason(definition, context) === null;
}

export function subjectOf(context: EvaluationContext): CheckSubject {
  return {
    kind: context.kind,
    namespace: context.meta.namespace,
    name: context.meta.name,
    containerName: context.containerName,
  };
}

// =============================================================================
// GLOBAL ACTIONABILITY
// =============================================================================

function globalSkipReason(
  config: AuditConfig,
  checkId: string,
  context: EvaluationContext,
): SkipReason | null {
  const severity = severityOf(config, checkId);
  if (severity === undefined) return "not-configured";
  if (severity === "ignore") return "severity-ignored";

  const exempted = config.exemptions.some((rule) => {
    if (rule.namespace !== undefined && rule.namespace !== context.meta.namespace) {
      return false;
    }
    if (
      rule.controllerNames.length > 0 &&
      !rule.controllerNames.some((prefix) => context.meta.name.startsWith(prefix))
    ) {
      return false;
    }
    if (
      rule.containerNames.length > 0 &&
      (context.containerName === undefined || !rule.containerNames.includes(context.containerName))
    ) {
      return false;
    }
    if (rule.rules.length > 0 && !rule.rules.includes(checkId)) {
      return false;
    }
    return true;
  });

  return exempted ? "config-exemption" : null;
}

// =============================================================================
// STRUCTURAL ACTIONABILITY
// =============================================================================

function structuralSkipReason(
  definition: CheckDefinition,
  context: EvaluationContext,
): SkipReason | null {
  if (definition.target !== context.scope) {
    return "target-mismatch";
  }

  const { include, exclude } = definition.controllers;
  if (include.length > 0 && !include.includes(context.kind)) {
    return "controller-filtered";
  }
  if (exclude.includes(context.kind)) {
    return "controller-filtered";
  }

  if (definition.target === "Other" && definition.kinds.length > 0) {
    if (!definition.kinds.includes(context.kind)) {
      return "kind-filtered";
    }
  }

  if (context.scope === "Container") {
    const containerKind: ContainerKind = context.isInitContainer ? "initContainer" : "container";
    const filter = definition.containers;
    if (filter.include.length > 0 && !filter.include.includes(containerKind)) {
      return "container-filtered";
    }
    if (filter.exclude.includes(containerKind)) {
      return "container-filtered";
    }
  }

  return null;
}
