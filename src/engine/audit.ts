// Manifest audit orchestration.
// Purpose: run every scope pass for each manifest, collect pass-level failures and summarize the outcome.

import type { CheckCatalog } from "../checks/catalog.js";
import type { AuditConfig } from "../core/config.js";
import { ManifestError, isPassError } from "../core/errors.js";
import { logAuditEvent, type AuditLogger } from "../core/logger.js";
import { isoNow } from "../core/utils.js";
import type { LoadedManifest, ManifestLoadFailure } from "../kube/manifest-loader.js";
import type { KubeObject } from "../kube/types.js";
import { toWorkload } from "../kube/workload.js";
import {
  applyContainerChecks,
  applyControllerChecks,
  applyObjectChecks,
  applyPodChecks,
} from "./apply.js";
import type { ResultSet } from "./results.js";

// =============================================================================
// TYPES
// =============================================================================

export type ContainerResult = {
  name: string;
  isInit: boolean;
  results: ResultSet;
};

export type PodResult = {
  results: ResultSet;
  containerResults: ContainerResult[];
};

export type AuditResult = {
  kind: string;
  namespace: string;
  name: string;
  source?: string;
  /** Controller-scope results for workloads, Other-scope results for everything else. */
  results: ResultSet;
  podResult?: PodResult;
};

export type AuditFailure = {
  kind?: string;
  namespace?: string;
  name?: string;
  source?: string;
  checkId?: string;
  error: string;
  message: string;
};

export type CountSummary = {
  successes: number;
  warnings: number;
  dangers: number;
};

export type AuditReport = {
  auditTime: string;
  sourceName: string;
  results: AuditResult[];
  failures: AuditFailure[];
  summary: CountSummary;
  score: number;
};

export type AuditOptions = {
  sourceName?: string;
  loadFailures?: ManifestLoadFailure[];
  logger?: AuditLogger;
  now?: () => string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** Audits one object. Pass-level errors propagate to the caller. */
export function auditObject(
  config: AuditConfig,
  catalog: CheckCatalog,
  object: KubeObject,
): AuditResult {
  const identity = {
    kind: object.kind,
    namespace: object.metadata.namespace,
    name: object.metadata.name,
  };

  const workload = toWorkload(object);
  if (!workload) {
    return { ...identity, results: applyObjectChecks(config, catalog, object) };
  }

  const results = applyControllerChecks(config, catalog, workload);
  const podResults = applyPodChecks(config, catalog, workload);
  const containerResults: ContainerResult[] = [
    ...(workload.podSpec.initContainers ?? []).map((container) => ({
      name: container.name,
      isInit: true,
      results: applyContainerChecks(config, catalog, workload, container, true),
    })),
    ...workload.podSpec.containers.map((container) => ({
      name: container.name,
      isInit: false,
      results: applyContainerChecks(config, catalog, workload, container, false),
    })),
  ];

  return {
    ...identity,
    results,
    podResult: { results: podResults, containerResults },
  };
}

/**
 * Audits every manifest. A manifest whose pass fails is reported as a failure
 * and contributes no results; the remaining manifests are still audited.
 */
export function auditManifests(
  config: AuditConfig,
  catalog: CheckCatalog,
  manifests: LoadedManifest[],
  opts: AuditOptions = {},
): AuditReport {
  const now = opts.now ?? isoNow;
  const auditTime = now();
  const results: AuditResult[] = [];
  const failures: AuditFailure[] = [];

  logAuditEvent(opts.logger, "audit.start", { manifests: manifests.length });

  for (const failure of opts.loadFailures ?? []) {
    failures.push({
      source: failure.source,
      error: "ManifestError",
      message: failure.issues.join("; "),
    });
    logAuditEvent(opts.logger, "manifest.load_failed", {
      source: failure.source,
      issues: failure.issues,
    });
  }

  for (const manifest of manifests) {
    try {
      results.push({ ...auditObject(config, catalog, manifest.object), source: manifest.source });
    } catch (err) {
      const failure = toAuditFailure(err, manifest);
      if (!failure) {
        throw err;
      }
      failures.push(failure);
      logAuditEvent(opts.logger, "manifest.failed", {
        source: manifest.source,
        kind: manifest.object.kind,
        name: manifest.object.metadata.name,
        message: failure.message,
      });
    }
  }

  const summary = summarize(results);
  const score = scoreOf(summary);
  logAuditEvent(opts.logger, "audit.complete", {
    results: results.length,
    failures: failures.length,
    score,
  });

  return {
    auditTime,
    sourceName: opts.sourceName ?? "manifests",
    results,
    failures,
    summary,
    score,
  };
}

export function summarize(results: AuditResult[]): CountSummary {
  const summary: CountSummary = { successes: 0, warnings: 0, dangers: 0 };

  for (const result of results) {
    for (const set of resultSetsOf(result)) {
      for (const record of set.values()) {
        if (record.success) {
          summary.successes += 1;
        } else if (record.severity === "warning") {
          summary.warnings += 1;
        } else if (record.severity === "danger") {
          summary.dangers += 1;
        }
      }
    }
  }

  return summary;
}

/** Dangers weigh twice as much as warnings. An audit with nothing evaluated scores 100. */
export function scoreOf(summary: CountSummary): number {
  const total = summary.successes * 2 + summary.warnings + summary.dangers * 2;
  if (total === 0) return 100;
  return Math.round((summary.successes * 2 * 100) / total);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resultSetsOf(result: AuditResult): ResultSet[] {
  if (!result.podResult) return [result.results];
  return [
    result.results,
    result.podResult.results,
    ...result.podResult.containerResults.map((container) => container.results),
  ];
}

function toAuditFailure(err: unknown, manifest: LoadedManifest): AuditFailure | null {
  const base = {
    kind: manifest.object.kind,
    namespace: manifest.object.metadata.namespace,
    name: manifest.object.metadata.name,
    source: manifest.source,
  };

  if (isPassError(err)) {
    return { ...base, checkId: err.checkId, error: err.name, message: err.message };
  }
  if (err instanceof ManifestError) {
    return { ...base, error: err.name, message: err.message };
  }
  return null;
}
