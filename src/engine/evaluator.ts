// Check evaluation.
// Purpose: hand each check the fragment shape its predicate expects and surface malformed checks as errors.

import type { CheckDefinition, PredicateOutcome } from "../checks/types.js";
import { MalformedCheckError } from "../core/errors.js";
import type { Container, KubeObject, PodSpec } from "../kube/types.js";
import { subjectOf, type EvaluationContext } from "./scope.js";

// =============================================================================
// TYPES
// =============================================================================

/** Fragments available in the current scope; each pass fills in only what it has. */
export type Fragments = Readonly<{
  podSpec?: PodSpec;
  controller?: KubeObject;
  container?: Container;
  object?: KubeObject;
}>;

// =============================================================================
// PUBLIC API
// =============================================================================

/** Returns whether the check passed. Throws MalformedCheckError instead of guessing a verdict. */
export function evaluateCheck(
  definition: CheckDefinition,
  fragments: Fragments,
  context: EvaluationContext,
): boolean {
  const outcome = runPredicate(definition, fragments, context);
  if (!outcome.ok) {
    throw new MalformedCheckError(definition.id, outcome.reason, subjectOf(context));
  }
  return outcome.passed;
}

/**
 * Narrows a pod spec to a single container so pod-shaped predicates can judge it in isolation.
 * Sibling and init containers are dropped; everything else on the pod spec is kept.
 */
export function isolateContainer(podSpec: PodSpec, container: Container): PodSpec {
  return { ...podSpec, initContainers: [], containers: [container] };
}

// =============================================================================
// INTERNALS
// =============================================================================

function runPredicate(
  definition: CheckDefinition,
  fragments: Fragments,
  context: EvaluationContext,
): PredicateOutcome {
  const evaluation = definition.evaluation;

  switch (evaluation.shape) {
    case "pod": {
      const podSpec = podFragment(fragments, context);
      return podSpec ? evaluation.predicate(podSpec) : missingFragment("pod spec", context);
    }
    case "controller":
      return fragments.controller
        ? evaluation.predicate(fragments.controller)
        : missingFragment("controller object", context);
    case "container":
      return fragments.container
        ? evaluation.predicate(fragments.container)
        : missingFragment("container", context);
    case "object":
      return fragments.object
        ? evaluation.predicate(fragments.object)
        : missingFragment("object", context);
  }
}

function podFragment(fragments: Fragments, context: EvaluationContext): PodSpec | undefined {
  if (!fragments.podSpec) return undefined;
  if (context.scope !== "Container") return fragments.podSpec;
  if (!fragments.container) return undefined;
  return isolateContainer(fragments.podSpec, fragments.container);
}

function missingFragment(label: string, context: EvaluationContext): PredicateOutcome {
  return { ok: false, reason: `no ${label} is available in ${context.scope} scope` };
}
