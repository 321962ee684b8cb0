// Check catalog.
// Purpose: hold the immutable built-in checks and resolve IDs against per-call custom checks.

import fs from "node:fs";
import path from "node:path";

import { CatalogLoadError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { builtInChecksDir } from "../core/paths.js";
import { parseCheckDefinition } from "./definition.js";
import type { CheckDefinition } from "./types.js";

// =============================================================================
// BUILT-IN ORDER
// =============================================================================

// Declared explicitly so evaluation-order-sensitive fixtures stay stable.
export const BUILT_IN_CHECK_ORDER = [
  // Controller checks
  "multipleReplicasForDeployment",
  // Pod checks
  "hostIPCSet",
  "hostPIDSet",
  "hostNetworkSet",
  // Container checks
  "memoryLimitsMissing",
  "memoryRequestsMissing",
  "cpuLimitsMissing",
  "cpuRequestsMissing",
  "readinessProbeMissing",
  "livenessProbeMissing",
  "pullPolicyNotAlways",
  "tagNotSpecified",
  "hostPortSet",
  "runAsRootAllowed",
  "runAsPrivileged",
  "notReadOnlyRootFilesystem",
  "privilegeEscalationAllowed",
  "dangerousCapabilities",
  "insecureCapabilities",
  // Pod checks
  "priorityClassNotSet",
  // Other checks
  "tlsSettingsMissing",
  "pdbDisruptionsAllowedGreaterThanZero",
] as const;

// =============================================================================
// TYPES
// =============================================================================

/** A custom check as decoded from configuration; rejected entries keep their issues for reporting. */
export type CustomCheckEntry =
  | { status: "valid"; definition: CheckDefinition }
  | { status: "invalid"; issues: readonly string[] };

export type CustomCheckSource = {
  customChecks: ReadonlyMap<string, CustomCheckEntry>;
};

export type CatalogLookup =
  | { status: "found"; definition: CheckDefinition; origin: "custom" | "builtIn" }
  | { status: "invalid"; issues: readonly string[] }
  | { status: "missing" };

// =============================================================================
// CATALOG
// =============================================================================

export class CheckCatalog {
  private readonly builtIns: ReadonlyMap<string, CheckDefinition>;
  readonly order: readonly string[];

  constructor(definitions: readonly CheckDefinition[]) {
    const builtIns = new Map<string, CheckDefinition>();
    for (const definition of definitions) {
      if (builtIns.has(definition.id)) {
        throw new CatalogLoadError(definition.id, "<definitions>", "duplicate check id");
      }
      builtIns.set(definition.id, definition);
    }

    this.builtIns = builtIns;
    this.order = Object.freeze(definitions.map((definition) => definition.id));
    Object.freeze(this);
  }

  has(checkId: string): boolean {
    return this.builtIns.has(checkId);
  }

  getBuiltIn(checkId: string): CheckDefinition | undefined {
    return this.builtIns.get(checkId);
  }


  /** Custom checks shadow built-ins that share their ID. */
  resolve(checkId: string, source: CustomCheckSource): CatalogLookup {
    const custom = source.customChecks.get(checkId);
    if (custom) {
      return custom.status === "valid"
        ? { status: "found", definition: custom.definition, origin: "custom" }
        : { status: "invalid", issues: custom.issues };
    }

    const builtIn = this.builtIns.get(checkId);
    if (builtIn) {
      return { status: "found", definition: builtIn, origin: "builtIn" };
    }

    return { status: "missing" };
  }
}

// =============================================================================
// LOADING
// =============================================================================

export type LoadCatalogOptions = {
  checksDir?: string;
  checkIds?: readonly string[];
};

/**
 * Loads the built-in checks from `<checksDir>/<id>.yaml` in declared order.
 * Any unreadable or undecodable definition throws CatalogLoadError.
 */
export function loadBuiltInCatalog(opts: LoadCatalogOptions = {}): CheckCatalog {
  const checksDir = opts.checksDir ?? builtInChecksDir();
  const checkIds = opts.checkIds ?? BUILT_IN_CHECK_ORDER;

  const definitions = checkIds.map((checkId) => {
    const source = path.join(checksDir, `${checkId}.yaml`);

    let text: string;
    try {
      text = fs.readFileSync(source, "utf8");
    } catch (err) {
      throw new CatalogLoadError(checkId, source, err);
    }

    const decoded = parseCheckDefinition(checkId, text);
    if (!decoded.success) {
      throw new CatalogLoadError(checkId, source, decoded.issues.join("; "));
    }
    return decoded.definition;
  });

  return new CheckCatalog(definitions);
}

/** loadBuiltInCatalog for commands: a broken install surfaces as a user-facing catalog error. */
export function loadCatalogForCli(opts: LoadCatalogOptions = {}): CheckCatalog {
  try {
    return loadBuiltInCatalog(opts);
  } catch (err) {
    if (!(err instanceof CatalogLoadError)) throw err;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.catalog,
      title: "Built-in checks unavailable.",
      message: `Built-in check ${err.checkId} could not be loaded from ${err.source}.`,
      hint: "Reinstall workload-auditor so the bundled checks directory is complete.",
      cause: err,
    });
  }
}
