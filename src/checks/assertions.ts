// Structural assertion language used by check definitions.
// Purpose: compile declarative `assert` blocks into pure predicates over manifest fragments.

import { z } from "zod";

import { isPlainObject } from "../kube/types.js";
import type { Predicate, PredicateOutcome } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type Scalar = string | number | boolean | null;

type PathField = { path?: string };

export type LeafAssertion = PathField &
  (
    | { op: "exists" | "absent" | "nonEmpty" }
    | { op: "equals" | "notEquals"; value: Scalar }
    | { op: "oneOf" | "noneOf" | "includesAny" | "excludesAll"; value: Scalar[] }
    | { op: "matches" | "notMatches"; value: string }
    | { op: "gt" | "gte" | "lt" | "lte"; value: number }
    | { op: "every" | "some" | "none"; assert: Assertion }
  );

export type Assertion =
  | { all: Assertion[] }
  | { any: Assertion[] }
  | { not: Assertion }
  | LeafAssertion;

export type AssertionOperator = LeafAssertion["op"];

// =============================================================================
// SCHEMA
// =============================================================================

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const PathSchema = z.string().optional();

export const AssertionSchema: z.ZodType<Assertion> = z.lazy(() =>
  z.union([
    z.object({ all: z.array(AssertionSchema).min(1) }).strict(),
    z.object({ any: z.array(AssertionSchema).min(1) }).strict(),
    z.object({ not: AssertionSchema }).strict(),
    z.discriminatedUnion("op", [
      z.object({ path: PathSchema, op: z.literal("exists") }).strict(),
      z.object({ path: PathSchema, op: z.literal("absent") }).strict(),
      z.object({ path: PathSchema, op: z.literal("nonEmpty") }).strict(),
      z.object({ path: PathSchema, op: z.literal("equals"), value: ScalarSchema }).strict(),
      z.object({ path: PathSchema, op: z.literal("notEquals"), value: ScalarSchema }).strict(),
      z.object({ path: PathSchema, op: z.literal("oneOf"), value: z.array(ScalarSchema) }).strict(),
      z.object({ path: PathSchema, op: z.literal("noneOf"), value: z.array(ScalarSchema) }).strict(),
      z
        .object({ path: PathSchema, op: z.literal("includesAny"), value: z.array(ScalarSchema) })
        .strict(),
      z
        .object({ path: PathSchema, op: z.literal("excludesAll"), value: z.array(ScalarSchema) })
        .strict(),
      z.object({ path: PathSchema, op: z.literal("matches"), value: z.string() }).strict(),
      z.object({ path: PathSchema, op: z.literal("notMatches"), value: z.string() }).strict(),
      z.object({ path: PathSchema, op: z.literal("gt"), value: z.number() }).strict(),
      z.object({ path: PathSchema, op: z.literal("gte"), value: z.number() }).strict(),
      z.object({ path: PathSchema, op: z.literal("lt"), value: z.number() }).strict(),
      z.object({ path: PathSchema, op: z.literal("lte"), value: z.number() }).strict(),
      z.object({ path: PathSchema, op: z.literal("every"), assert: AssertionSchema }).strict(),
      z.object({ path: PathSchema, op: z.literal("some"), assert: AssertionSchema }).strict(),
      z.object({ path: PathSchema, op: z.literal("none"), assert: AssertionSchema }).strict(),
    ]),
  ]),
);

// =============================================================================
// COMPILATION
// =============================================================================

export class AssertionSyntaxError extends Error {
  constructor(
    message: string,
    public readonly location: string,
  ) {
    super(`${location}: ${message}`);
    this.name = "AssertionSyntaxError";
  }
}

/**
 * Compiles an assertion tree into a predicate.
 * Static problems (bad paths, invalid patterns) throw AssertionSyntaxError here;
 * mismatches between the assertion and a concrete fragment surface as `{ ok: false }` outcomes.
 */
export function compileAssertion(assertion: Assertion, location = "assert"): Predicate<unknown> {
  if ("all" in assertion) {
    const children = assertion.all.map((child, index) =>
      compileAssertion(child, `${location}.all[${index}]`),
    );
    return (fragment) => combineAll(children, fragment);
  }

  if ("any" in assertion) {
    const children = assertion.any.map((child, index) =>
      compileAssertion(child, `${location}.any[${index}]`),
    );
    return (fragment) => combineAny(children, fragment);
  }

  if ("not" in assertion) {
    const child = compileAssertion(assertion.not, `${location}.not`);
    return (fragment) => {
      const outcome = child(fragment);
      return outcome.ok ? pass(!outcome.passed) : outcome;
    };
  }

  return compileLeaf(assertion, location);
}

function compileLeaf(leaf: LeafAssertion, location: string): Predicate<unknown> {
  const path = leaf.path ?? "";
  const segments = parsePath(path, location);
  const test = compileOperator(leaf, path, location);

  return (fragment) => {
    const resolved = resolvePath(fragment, segments, path);
    if (!resolved.ok) {
      return resolved;
    }
    return test(resolved.value);
  };
}

type ValueTest = (value: unknown) => PredicateOutcome;

function compileOperator(leaf: LeafAssertion, path: string, location: string): ValueTest {
  const label = path.length > 0 ? path : "<fragment>";

  switch (leaf.op) {
    case "exists":
      return (value) => pass(isPresent(value));
    case "absent":
      return (value) => pass(!isPresent(value));
    case "nonEmpty":
      return (value) => {
        if (!isPresent(value)) return pass(false);
        if (typeof value === "string" || Array.isArray(value)) return pass(value.length > 0);
        if (isPlainObject(value)) return pass(Object.keys(value).length > 0);
        return mismatch("nonEmpty", "a string, array or object", label, value);
      };
    case "equals": {
      const expected = leaf.value;
      return (value) => pass(value === expected);
    }
    case "notEquals": {
      const expected = leaf.value;
      return (value) => pass(value !== expected);
    }
    case "oneOf": {
      const allowed = leaf.value;
      return (value) => pass(allowed.some((item) => item === value));
    }
    case "noneOf": {
      const denied = leaf.value;
      return (value) => pass(!denied.some((item) => item === value));
    }
    case "includesAny": {
      const wanted = leaf.value;
      return (value) => {
        if (!isPresent(value)) return pass(false);
        if (!Array.isArray(value)) return mismatch("includesAny", "an array", label, value);
        return pass(value.some((item) => wanted.some((candidate) => candidate === item)));
      };
    }
    case "excludesAll": {
      const denied = leaf.value;
      return (value) => {
        if (!isPresent(value)) return pass(true);
        if (!Array.isArray(value)) return mismatch("excludesAll", "an array", label, value);
        return pass(!value.some((item) => denied.some((candidate) => candidate === item)));
      };
    }
    case "matches":
    case "notMatches": {
      const op = leaf.op;
      const pattern = compilePattern(leaf.value, location);
      const whenAbsent = op === "notMatches";
      return (value) => {
        if (!isPresent(value)) return pass(whenAbsent);
        if (typeof value !== "string") return mismatch(op, "a string", label, value);
        const matched = pattern.test(value);
        return pass(op === "matches" ? matched : !matched);
      };
    }
    case "gt":
    case "gte":
    case "lt":
    case "lte": {
      const op = leaf.op;
      const bound = leaf.value;
      return (value) => {
        if (!isPresent(value)) return pass(false);
        if (typeof value !== "number") return mismatch(op, "a number", label, value);
        return pass(compareNumbers(op, value, bound));
      };
    }
    case "every":
    case "some":
    case "none": {
      const op = leaf.op;
      const child = compileAssertion(leaf.assert, `${location}.assert`);
      return (value) => {
        if (!isPresent(value)) return pass(op !== "some");
        if (!Array.isArray(value)) return mismatch(op, "an array", label, value);
        return quantify(op, value, child);
      };
    }
  }
}

// =============================================================================
// EVALUATION HELPERS
// =============================================================================

function combineAll(children: Predicate<unknown>[], fragment: unknown): PredicateOutcome {
  for (const child of children) {
    const outcome = child(fragment);
    if (!outcome.ok || !outcome.passed) return outcome;
  }
  return pass(true);
}

function combineAny(children: Predicate<unknown>[], fragment: unknown): PredicateOutcome {
  for (const child of children) {
    const outcome = child(fragment);
    if (!outcome.ok || outcome.passed) return outcome;
  }
  return pass(false);
}

function quantify(
  op: "every" | "some" | "none",
  items: unknown[],
  child: Predicate<unknown>,
): PredicateOutcome {
  for (const item of items) {
    const outcome = child(item);
    if (!outcome.ok) return outcome;

    if (op === "every" && !outcome.passed) return pass(false);
    if (op === "some" && outcome.passed) return pass(true);
    if (op === "none" && outcome.passed) return pass(false);
  }
  return pass(op !== "some");
}

function compareNumbers(op: "gt" | "gte" | "lt" | "lte", value: number, bound: number): boolean {
  switch (op) {
    case "gt":
      return value > bound;
    case "gte":
      return value >= bound;
    case "lt":
      return value < bound;
    case "lte":
      return value <= bound;
  }
}

// =============================================================================
// PATHS
// =============================================================================

type ResolvedPath = { ok: true; value: unknown } | { ok: false; reason: string };

function parsePath(path: string, location: string): string[] {
  if (path.length === 0) return [];

  const segments = path.split(".");
  if (segments.some((segment) => segment.length === 0)) {
    throw new AssertionSyntaxError(`path "${path}" contains an empty segment`, location);
  }
  return segments;
}

function resolvePath(fragment: unknown, segments: string[], path: string): ResolvedPath {
  let current = fragment;

  for (const [index, segment] of segments.entries()) {
    if (!isPresent(current)) {
      return { ok: true, value: undefined };
    }

    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) {
        return cannotDescend(path, segments, index, current);
      }
      current = current[Number(segment)];
      continue;
    }

    if (isPlainObject(current)) {
      current = Object.hasOwn(current, segment) ? current[segment] : undefined;
      continue;
    }

    return cannotDescend(path, segments, index, current);
  }

  return { ok: true, value: current };
}

function cannotDescend(
  path: string,
  segments: string[],
  index: number,
  value: unknown,
): ResolvedPath {
  const parent = segments.slice(0, index).join(".") || "<fragment>";
  return {
    ok: false,
    reason: `path "${path}" cannot read "${segments[index]}" of ${describeType(value)} at ${parent}`,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function compilePattern(source: string, location: string): RegExp {
  try {
    return new RegExp(source);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new AssertionSyntaxError(`invalid regular expression: ${detail}`, location);
  }
}

function pass(passed: boolean): PredicateOutcome {
  return { ok: true, passed };
}

function mismatch(op: AssertionOperator, expected: string, label: string, value: unknown): PredicateOutcome {
  return {
    ok: false,
    reason: `${op} expects ${expected} at ${label}, found ${describeType(value)}`,
  };
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
