import { Command, InvalidArgumentError, Option } from "commander";

import { loadCatalogForCli } from "../checks/catalog.js";
import { loadAuditConfigOrDefault } from "../core/config-loader.js";
import { createAnsiFormatter, resolveColorEnabled } from "../core/error-format.js";
import { JsonlLogger } from "../core/logger.js";
import { defaultRunId } from "../core/utils.js";
import { auditManifests, type AuditReport } from "../engine/audit.js";
import { loadManifests } from "../kube/manifest-loader.js";

import { OUTPUT_FORMATS, renderReport, type OutputFormat } from "./render.js";

// =============================================================================
// EXIT CODES
// =============================================================================

export const AUDIT_EXIT_CODES = {
  ok: 0,
  failures: 1,
  danger: 3,
  belowScore: 4,
} as const;

// =============================================================================
// TYPES
// =============================================================================

export type AuditCommandOptions = {
  manifests: string[];
  config?: string;
  format: OutputFormat;
  onlyShowFailed?: boolean;
  setExitCodeOnDanger?: boolean;
  setExitCodeBelowScore?: number;
  logFile?: string;
  color?: boolean;
  cwd?: string;
};

export type AuditCommandResult = {
  report: AuditReport;
  output: string;
  exitCode: number;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerAuditCommand(program: Command): void {
  program
    .command("audit")
    .description("Audit Kubernetes manifests against the configured checks")
    .requiredOption("--manifests <paths...>", "Manifest files, directories or glob patterns")
    .addOption(
      new Option("--format <format>", "Output format").choices(OUTPUT_FORMATS).default("pretty"),
    )
    .option("--only-show-failed", "Hide passing results", false)
    .option("--set-exit-code-on-danger", "Exit with code 3 when any danger check fails", false)
    .option(
      "--set-exit-code-below-score <n>",
      "Exit with code 4 when the score is below this value",
      parseScoreThreshold,
    )
    .option("--log-file <path>", "Append JSONL audit events to this file")
    .option("--no-color", "Disable colored output")
    .action(async (opts, command: Command) => {
      const globals = command.optsWithGlobals<{ config?: string }>();
      const result = await auditCommand({
        manifests: opts.manifests,
        config: globals.config,
        format: opts.format,
        onlyShowFailed: opts.onlyShowFailed,
        setExitCodeOnDanger: opts.setExitCodeOnDanger,
        setExitCodeBelowScore: opts.setExitCodeBelowScore,
        logFile: opts.logFile,
        color: opts.color,
      });

      console.log(result.output);
      process.exitCode = result.exitCode;
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function auditCommand(opts: AuditCommandOptions): Promise<AuditCommandResult> {
  const config = loadAuditConfigOrDefault(opts.config);
  const catalog = loadCatalogForCli();
  const loaded = await loadManifests(opts.manifests, { cwd: opts.cwd });

  const logger = opts.logFile ? new JsonlLogger(opts.logFile, { runId: defaultRunId() }) : undefined;

  let report: AuditReport;
  try {
    report = auditManifests(config, catalog, loaded.manifests, {
      sourceName: opts.manifests.join(", "),
      loadFailures: loaded.failures,
      logger,
    });
  } finally {
    logger?.close();
  }

  const color = createAnsiFormatter(
    resolveColorEnabled({ stream: process.stdout, useColor: opts.color }),
  );
  const output = renderReport(report, {
    format: opts.format,
    onlyShowFailed: opts.onlyShowFailed,
    color,
  });

  return { report, output, exitCode: resolveAuditExitCode(report, opts) };
}

export function resolveAuditExitCode(
  report: AuditReport,
  opts: Pick<AuditCommandOptions, "setExitCodeOnDanger" | "setExitCodeBelowScore">,
): number {
  if (report.failures.length > 0) {
    return AUDIT_EXIT_CODES.failures;
  }
  if (opts.setExitCodeOnDanger && report.summary.dangers > 0) {
    return AUDIT_EXIT_CODES.danger;
  }
  if (opts.setExitCodeBelowScore !== undefined && report.score < opts.setExitCodeBelowScore) {
    return AUDIT_EXIT_CODES.belowScore;
  }
  return AUDIT_EXIT_CODES.ok;
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseScoreThreshold(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 100) {
    throw new InvalidArgumentError("Score threshold must be an integer between 0 and 100.");
  }
  return parsed;
}
