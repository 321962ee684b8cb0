import { z } from "zod";

import type { CustomCheckEntry } from "../checks/catalog.js";
import { decodeCheckDefinition } from "../checks/definition.js";
import { SEVERITIES, type Severity } from "../checks/types.js";
import { ConfigError } from "./errors.js";
import { formatIssues } from "./issues.js";

// =============================================================================
// SCHEMA
// =============================================================================

const SeveritySchema = z.enum(SEVERITIES);

const ExemptionSchema = z
  .object({
    namespace: z.string().min(1).optional(),
    controllerNames: z.array(z.string().min(1)).default([]),
    containerNames: z.array(z.string().min(1)).default([]),
    rules: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const ConfigFileSchema = z
  .object({
    checks: z.record(SeveritySchema).default({}),
    // Decoded individually so one broken custom check does not reject the whole file.
    customChecks: z.record(z.unknown()).default({}),
    exemptions: z.array(ExemptionSchema).default([]),
    disallowExemptions: z.boolean().default(false),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type ConfigFileInput = z.input<typeof ConfigFileSchema>;

// =============================================================================
// RUNTIME CONFIG
// =============================================================================

export type ExemptionRule = Readonly<{
  namespace?: string;
  controllerNames: readonly string[];
  containerNames: readonly string[];
  rules: readonly string[];
}>;

/** Immutable per-invocation configuration shared by every evaluation pass. */
export type AuditConfig = Readonly<{
  checks: Readonly<Record<string, Severity>>;
  customChecks: ReadonlyMap<string, CustomCheckEntry>;
  exemptions: readonly ExemptionRule[];
  disallowExemptions: boolean;
}>;

export function buildAuditConfig(file: ConfigFile): AuditConfig {
  const customChecks = new Map<string, CustomCheckEntry>();
  for (const checkId of Object.keys(file.customChecks).sort()) {
    const decoded = decodeCheckDefinition(checkId, file.customChecks[checkId]);
    customChecks.set(
      checkId,
      decoded.success
        ? { status: "valid", definition: decoded.definition }
        : { status: "invalid", issues: Object.freeze(decoded.issues) },
    );
  }

  return Object.freeze({
    checks: Object.freeze({ ...file.checks }),
    customChecks,
    exemptions: Object.freeze(
      file.exemptions.map((rule) =>
        Object.freeze({
          namespace: rule.namespace,
          controllerNames: Object.freeze([...rule.controllerNames]),
          containerNames: Object.freeze([...rule.containerNames]),
          rules: Object.freeze([...rule.rules]),
        }),
      ),
    ),
    disallowExemptions: file.disallowExemptions,
  });
}

/** Validates a configuration document that has already been parsed from YAML or built in code. */
export function parseAuditConfig(doc: unknown, source = "<inline>"): AuditConfig {
  const parsed = ConfigFileSchema.safeParse(doc ?? {});
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues).join("\n");
    throw new ConfigError(`Invalid configuration at ${source}:\n${details}`, parsed.error);
  }

  return buildAuditConfig(parsed.data);
}

export function severityOf(config: AuditConfig, checkId: string): Severity | undefined {
  return Object.hasOwn(config.checks, checkId) ? config.checks[checkId] : undefined;
}

export function configuredCheckIds(config: AuditConfig): string[] {
  return Object.keys(config.checks).sort(compareCheckIds);
}

/** Code-unit order, independent of locale. */
export function compareCheckIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
