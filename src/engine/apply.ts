// Check application passes.
// Purpose: run the exemption, resolution, evaluation and aggregation pipeline for one scope of one manifest.

import type { CheckCatalog } from "../checks/catalog.js";
import { configuredCheckIds, type AuditConfig } from "../core/config.js";
import type { Container, KubeObject } from "../kube/types.js";
import type { Workload } from "../kube/workload.js";
import { evaluateCheck, type Fragments } from "./evaluator.js";
import { isExempt } from "./exemptions.js";
import { makeResult, ResultSet } from "./results.js";
import { resolveCheck, type EvaluationContext } from "./scope.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function applyPodChecks(
  config: AuditConfig,
  catalog: CheckCatalog,
  workload: Workload,
): ResultSet {
  return runPass(config, catalog, contextFor(workload, "Pod"), { podSpec: workload.podSpec });
}

export function applyControllerChecks(
  config: AuditConfig,
  catalog: CheckCatalog,
  workload: Workload,
): ResultSet {
  return runPass(config, catalog, contextFor(workload, "Controller"), {
    controller: workload.original,
  });
}

export function applyContainerChecks(
  config: AuditConfig,
  catalog: CheckCatalog,
  workload: Workload,
  container: Container,
  isInitContainer: boolean,
): ResultSet {
  const context: EvaluationContext = {
    ...contextFor(workload, "Container"),
    containerName: container.name,
    isInitContainer,
  };
  return runPass(config, catalog, context, { podSpec: workload.podSpec, container });
}

/** Runs Other-scoped checks against a resource that has no pod or controller shape. */
export function applyObjectChecks(
  config: AuditConfig,
  catalog: CheckCatalog,
  object: KubeObject,
): ResultSet {
  const context: EvaluationContext = {
    kind: object.kind,
    scope: "Other",
    meta: object.metadata,
  };
  return runPass(config, catalog, context, { object });
}

// =============================================================================
// PIPELINE
// =============================================================================

/**
 * Evaluates every configured check in check-ID order.
 * Any thrown error abandons the whole pass, so callers never see a partial result set.
 */
function runPass(
  config: AuditConfig,
  catalog: CheckCatalog,
  context: EvaluationContext,
  fragments: Fragments,
): ResultSet {
  const results = new ResultSet();

  for (const checkId of configuredCheckIds(config)) {
    if (isExempt(context.meta.annotations, checkId, config.disallowExemptions)) {
      continue;
    }

    const resolution = resolveCheck(catalog, checkId, context, config);
    if (resolution.action === "skip") {
      continue;
    }

    const passed = evaluateCheck(resolution.definition, fragments, context);
    results.add(makeResult(config, resolution.definition, passed));
  }

  return results;
}

function contextFor(workload: Workload, scope: EvaluationContext["scope"]): EvaluationContext {
  return { kind: workload.kind, scope, meta: workload.meta };
}
