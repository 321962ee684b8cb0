// Check definition decoding.
// Purpose: validate raw check documents and bind each one to exactly one evaluation shape.

import yaml from "js-yaml";
import { z } from "zod";

import { formatIssues } from "../core/issues.js";
import { AssertionSchema, AssertionSyntaxError, compileAssertion } from "./assertions.js";
import {
  CONTAINER_KINDS,
  TARGET_SCOPES,
  type CheckDefinition,
  type CheckEvaluation,
  type TargetScope,
} from "./types.js";

// =============================================================================
// SCHEMA
// =============================================================================

const KindFilterSchema = z
  .object({
    include: z.array(z.string().min(1)).default([]),
    exclude: z.array(z.string().min(1)).default([]),
  })
  .strict();

const ContainerFilterSchema = z
  .object({
    include: z.array(z.enum(CONTAINER_KINDS)).default([]),
    exclude: z.array(z.enum(CONTAINER_KINDS)).default([]),
  })
  .strict();

export const RawCheckSchema = z
  .object({
    id: z.string().min(1).optional(),
    category: z.string().min(1),
    target: z.enum(TARGET_SCOPES),
    schemaTarget: z.enum(["Pod", "Container"]).optional(),
    successMessage: z.string().min(1),
    failureMessage: z.string().min(1),
    controllers: KindFilterSchema.default({}),
    containers: ContainerFilterSchema.default({}),
    kinds: z.array(z.string().min(1)).default([]),
    assert: AssertionSchema,
  })
  .strict()
  .superRefine((raw, ctx) => {
    if (raw.schemaTarget !== undefined && raw.target !== "Container") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["schemaTarget"],
        message: "schemaTarget is only valid for Container checks",
      });
    }
    if (raw.kinds.length > 0 && raw.target !== "Other") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["kinds"],
        message: "kinds is only valid for Other checks",
      });
    }
  });

export type RawCheck = z.infer<typeof RawCheckSchema>;

// =============================================================================
// PUBLIC API
// =============================================================================

export type DecodeResult =
  | { success: true; definition: CheckDefinition }
  | { success: false; issues: string[] };

/** Decodes an already-parsed check document. The catalog key wins over any `id` in the document. */
export function decodeCheckDefinition(checkId: string, doc: unknown): DecodeResult {
  const parsed = RawCheckSchema.safeParse(doc);
  if (!parsed.success) {
    return { success: false, issues: formatIssues(parsed.error.issues) };
  }

  const raw = parsed.data;
  if (raw.id !== undefined && raw.id !== checkId) {
    return {
      success: false,
      issues: [`id: Expected ${JSON.stringify(checkId)}, received ${JSON.stringify(raw.id)}`],
    };
  }

  let evaluation: CheckEvaluation;
  try {
    evaluation = bindEvaluation(raw);
  } catch (err) {
    if (err instanceof AssertionSyntaxError) {
      return { success: false, issues: [err.message] };
    }
    throw err;
  }

  const definition: CheckDefinition = Object.freeze({
    id: checkId,
    category: raw.category,
    target: raw.target,
    successMessage: raw.successMessage,
    failureMessage: raw.failureMessage,
    controllers: Object.freeze({
      include: Object.freeze([...raw.controllers.include]),
      exclude: Object.freeze([...raw.controllers.exclude]),
    }),
    containers: Object.freeze({
      include: Object.freeze([...raw.containers.include]),
      exclude: Object.freeze([...raw.containers.exclude]),
    }),
    kinds: Object.freeze([...raw.kinds]),
    evaluation: Object.freeze(evaluation),
  });

  return { success: true, definition };
}

/** Parses YAML or JSON check text and decodes it. */
export function parseCheckDefinition(checkId: string, text: string): DecodeResult {
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { success: false, issues: [`Failed to parse check YAML: ${detail}`] };
  }

  return decodeCheckDefinition(checkId, doc);
}

// =============================================================================
// INTERNALS
// =============================================================================

function bindEvaluation(raw: RawCheck): CheckEvaluation {
  const predicate = compileAssertion(raw.assert);
  const shape = resolveShape(raw.target, raw.schemaTarget);

  switch (shape) {
    case "pod":
      return { shape, predicate };
    case "controller":
      return { shape, predicate };
    case "container":
      return { shape, predicate };
    case "object":
      return { shape, predicate };
  }
}

function resolveShape(
  target: TargetScope,
  schemaTarget: RawCheck["schemaTarget"],
): CheckEvaluation["shape"] {
  switch (target) {
    case "Pod":
      return "pod";
    case "Controller":
      return "controller";
    case "Container":
      return schemaTarget === "Pod" ? "pod" : "container";
    case "Other":
      return "object";
  }
}
