import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { AUDIT_EXIT_CODES, auditCommand } from "./audit.js";

// =============================================================================
// HELPERS
// =============================================================================

const DEPLOYMENT = [
  "apiVersion: apps/v1",
  "kind: Deployment",
  "metadata:",
  "  name: web",
  "  namespace: default",
  "spec:",
  "  template:",
  "    spec:",
  "      hostPID: true",
  "      containers:",
  "        - name: app",
  "          image: nginx:1.25",
  "          resources:",
  "            limits:",
  "              memory: 128Mi",
].join("\n");

const CONFIG = [
  "checks:",
  "  hostPIDSet: danger",
  "  memoryLimitsMissing: warning",
  "  cpuLimitsMissing: warning",
].join("\n");

function setupWorkspace(config = CONFIG): { root: string; configPath: string } {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "audit-cli-"));
  fs.mkdirSync(path.join(root, "k8s"));
  fs.writeFileSync(path.join(root, "k8s", "web.yaml"), DEPLOYMENT);
  const configPath = path.join(root, "audit.yaml");
  fs.writeFileSync(configPath, config);
  return { root, configPath };
}

// =============================================================================
// TESTS
// =============================================================================

describe("auditCommand", () => {
  it("audits a manifest directory and prints the score", async () => {
    const { root, configPath } = setupWorkspace();

    const result = await auditCommand({
      manifests: ["k8s"],
      config: configPath,
      format: "score",
      cwd: root,
    });

    // memory limits pass (2), cpu limits warn (1), hostPID danger (2)
    expect(result.report.summary).toEqual({ successes: 1, warnings: 1, dangers: 1 });
    expect(result.output).toBe("40");
    expect(result.exitCode).toBe(AUDIT_EXIT_CODES.ok);
  });

  it("sets the danger exit code when requested", async () => {
    const { root, configPath } = setupWorkspace();

    const result = await auditCommand({
      manifests: ["k8s"],
      config: configPath,
      format: "score",
      setExitCodeOnDanger: true,
      cwd: root,
    });

    expect(result.exitCode).toBe(AUDIT_EXIT_CODES.danger);
  });

  it("sets the score exit code below the threshold", async () => {
    const { root, configPath } = setupWorkspace();

    const result = await auditCommand({
      manifests: ["k8s"],
      config: configPath,
      format: "score",
      setExitCodeBelowScore: 50,
      cwd: root,
    });

    expect(result.exitCode).toBe(AUDIT_EXIT_CODES.belowScore);
  });

  it("reports pass failures with a non-zero exit code", async () => {
    const { root, configPath } = setupWorkspace("checks:\n  myOrgCheck: danger\n");

    const result = await auditCommand({
      manifests: ["k8s"],
      config: configPath,
      format: "pretty",
      color: false,
      cwd: root,
    });

    expect(result.exitCode).toBe(AUDIT_EXIT_CODES.failures);
    expect(result.output.split("\n").slice(-2)).toEqual([
      "Failures:",
      "  CheckNotFoundError Deployment default/web: Check myOrgCheck not found (Deployment default/web)",
    ]);
  });

  it("writes audit events to the log file", async () => {
    const { root, configPath } = setupWorkspace();
    const logFile = path.join(root, "logs", "audit.jsonl");

    await auditCommand({
      manifests: ["k8s"],
      config: configPath,
      format: "json",
      logFile,
      cwd: root,
    });

    const types = fs
      .readFileSync(logFile, "utf8")
      .trim()
      .split("\n")
      .map((line) => (JSON.parse(line) as { type: string }).type);
    expect(types).toEqual(["audit.start", "audit.complete"]);
  });
});
