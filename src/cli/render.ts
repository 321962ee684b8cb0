/*
Purpose: render an AuditReport as pretty text, JSON or a bare score.
Assumptions: color is decided by the caller; records arrive already sorted by check ID.
*/

import type { AnsiFormatter } from "../core/error-format.js";
import type { AuditFailure, AuditReport, AuditResult } from "../engine/audit.js";
import type { ResultRecord, ResultSet } from "../engine/results.js";

// =============================================================================
// TYPES
// =============================================================================

export const OUTPUT_FORMATS = ["pretty", "json", "score"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type RenderOptions = {
  format: OutputFormat;
  onlyShowFailed?: boolean;
  color?: AnsiFormatter;
};

type ReportSection = {
  label: string;
  results: ResultSet;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function renderReport(report: AuditReport, options: RenderOptions): string {
  switch (options.format) {
    case "score":
      return String(report.score);
    case "json":
      return JSON.stringify(serializeReport(report, options.onlyShowFailed ?? false), null, 2);
    case "pretty":
      return renderPretty(report, options.onlyShowFailed ?? false, options.color ?? plain);
  }
}

export function serializeReport(report: AuditReport, onlyShowFailed: boolean): object {
  const pick = (set: ResultSet): ResultRecord[] => selectRecords(set, onlyShowFailed);

  return {
    auditTime: report.auditTime,
    sourceName: report.sourceName,
    score: report.score,
    summary: report.summary,
    results: report.results.map((result) => ({
      kind: result.kind,
      namespace: result.namespace,
      name: result.name,
      ...(result.source ? { source: result.source } : {}),
      results: pick(result.results),
      ...(result.podResult
        ? {
            podResult: {
              results: pick(result.podResult.results),
              containerResults: result.podResult.containerResults.map((container) => ({
                name: container.name,
                isInit: container.isInit,
                results: pick(container.results),
              })),
            },
          }
        : {}),
    })),
    failures: report.failures,
  };
}

// =============================================================================
// PRETTY
// =============================================================================

function renderPretty(report: AuditReport, onlyShowFailed: boolean, color: AnsiFormatter): string {
  const lines: string[] = [];
  const { successes, warnings, dangers } = report.summary;

  lines.push(color(`Audit of ${report.sourceName} at ${report.auditTime}`, ["bold"]));
  lines.push(
    `Score: ${color(String(report.score), ["bold"])} ` +
      `(${successes} passed, ${warnings} warnings, ${dangers} dangers)`,
  );

  for (const result of report.results) {
    const sections = sectionsOf(result)
      .map((section) => ({
        label: section.label,
        records: selectRecords(section.results, onlyShowFailed),
      }))
      .filter((section) => section.records.length > 0);
    if (sections.length === 0) continue;

    lines.push("");
    lines.push(color(`${result.kind} ${describeObject(result)}`, ["bold"]) + sourceSuffix(result, color));
    for (const section of sections) {
      lines.push(`  ${section.label}:`);
      for (const record of section.records) {
        lines.push(`    ${statusBadge(record, color)} ${record.id}: ${record.message}`);
      }
    }
  }

  if (report.failures.length > 0) {
    lines.push("");
    lines.push(color("Failures:", ["red", "bold"]));
    for (const failure of report.failures) {
      lines.push(`  ${describeFailure(failure)}`);
    }
  }

  return lines.join("\n");
}

function sectionsOf(result: AuditResult): ReportSection[] {
  if (!result.podResult) {
    return [{ label: "Object", results: result.results }];
  }

  return [
    { label: "Controller", results: result.results },
    { label: "Pod", results: result.podResult.results },
    ...result.podResult.containerResults.map((container) => ({
      label: `${container.isInit ? "Init container" : "Container"} ${container.name}`,
      results: container.results,
    })),
  ];
}

function statusBadge(record: ResultRecord, color: AnsiFormatter): string {
  if (record.success) return color("[pass]", ["green"]);
  switch (record.severity) {
    case "danger":
      return color("[danger]", ["red"]);
    case "warning":
      return color("[warning]", ["yellow"]);
    case "ignore":
      return color("[ignore]", ["dim"]);
  }
}

function describeObject(target: { namespace?: string; name?: string }): string {
  const name = target.name ?? "";
  return target.namespace ? `${target.namespace}/${name}` : name;
}

function sourceSuffix(result: AuditResult, color: AnsiFormatter): string {
  return result.source ? ` ${color(`(${result.source})`, ["dim"])}` : "";
}

function describeFailure(failure: AuditFailure): string {
  const subject = failure.kind ? `${failure.kind} ${describeObject(failure)}` : failure.source ?? "";
  return `${failure.error} ${subject}: ${failure.message}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function selectRecords(set: ResultSet, onlyShowFailed: boolean): ResultRecord[] {
  return onlyShowFailed ? set.failures() : set.values();
}

const plain: AnsiFormatter = (text) => text;
