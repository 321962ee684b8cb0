import { Command } from "commander";

import { loadCatalogForCli, type CheckCatalog } from "../checks/catalog.js";
import type { Severity } from "../checks/types.js";
import { loadAuditConfigOrDefault } from "../core/config-loader.js";
import { compareCheckIds, severityOf, type AuditConfig } from "../core/config.js";

// =============================================================================
// TYPES
// =============================================================================

export type CheckListing = {
  id: string;
  origin: "builtIn" | "custom";
  status: "valid" | "invalid";
  category?: string;
  target?: string;
  severity?: Severity;
  issues?: string[];
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerChecksCommand(program: Command): void {
  program
    .command("checks")
    .description("List built-in and custom checks with their configured severity")
    .option("--json", "Emit JSON output", false)
    .action((opts, command: Command) => {
      const globals = command.optsWithGlobals<{ config?: string }>();
      const config = loadAuditConfigOrDefault(globals.config);
      const listings = listChecks(config, loadCatalogForCli());

      console.log(opts.json ? JSON.stringify(listings, null, 2) : formatCheckTable(listings));
    });
}

// =============================================================================
// LISTING
// =============================================================================

/** Built-ins in catalog order, then custom checks that do not shadow a built-in. */
export function listChecks(config: AuditConfig, catalog: CheckCatalog): CheckListing[] {
  const customIds = [...config.customChecks.keys()].sort(compareCheckIds);
  const extraIds = customIds.filter((checkId) => !catalog.has(checkId));

  return [...catalog.order, ...extraIds].map((checkId): CheckListing => {
    const lookup = catalog.resolve(checkId, config);
    const severity = severityOf(config, checkId);
    const origin = config.customChecks.has(checkId) ? "custom" : "builtIn";

    if (lookup.status === "found") {
      return {
        id: checkId,
        origin,
        status: "valid",
        category: lookup.definition.category,
        target: lookup.definition.target,
        ...(severity ? { severity } : {}),
      };
    }

    return {
      id: checkId,
      origin,
      status: "invalid",
      ...(severity ? { severity } : {}),
      issues: lookup.status === "invalid" ? [...lookup.issues] : [],
    };
  });
}

export function formatCheckTable(listings: CheckListing[]): string {
  const rows = listings.map((listing) => [
    listing.id,
    listing.status === "valid" ? listing.category ?? "" : "(invalid)",
    listing.target ?? "",
    listing.severity ?? "-",
    listing.origin === "custom" ? "custom" : "",
  ]);
  const header = ["ID", "CATEGORY", "TARGET", "SEVERITY", "ORIGIN"];
  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => row[column].length)),
  );

  return [header, ...rows]
    .map((row) =>
      row
        .map((cell, column) => cell.padEnd(widths[column]))
        .join("  ")
        .trimEnd(),
    )
    .join("\n");
}
