import { describe, expect, it } from "vitest";

import { loadBuiltInCatalog } from "../checks/catalog.js";
import { loadAuditConfigOrDefault } from "../core/config-loader.js";
import { parseAuditConfig, type ConfigFileInput } from "../core/config.js";
import { CheckNotFoundError } from "../core/errors.js";
import { applyContainerChecks, applyControllerChecks, applyPodChecks } from "../engine/apply.js";
import { auditObject } from "../engine/audit.js";
import { toWorkload, type Workload } from "../kube/workload.js";

import { deployment, type DeploymentOptions } from "./manifests.js";

// =============================================================================
// HELPERS
// =============================================================================

const catalog = loadBuiltInCatalog();
const defaults = loadAuditConfigOrDefault();

function workloadOf(opts: DeploymentOptions = {}): Workload {
  const workload = toWorkload(deployment(opts));
  if (!workload) {
    throw new Error("expected a workload");
  }
  return workload;
}

function withDefaults(overrides: Partial<ConfigFileInput>) {
  return parseAuditConfig({
    checks: { ...defaults.checks },
    exemptions: defaults.exemptions.map((rule) => ({
      namespace: rule.namespace,
      controllerNames: [...rule.controllerNames],
      containerNames: [...rule.containerNames],
      rules: [...rule.rules],
    })),
    ...overrides,
  });
}

function containerResults(config = defaults, opts: DeploymentOptions = {}) {
  const workload = workloadOf(opts);
  return applyContainerChecks(config, catalog, workload, workload.podSpec.containers[0], false);
}

const memoryExempt = { "polaris.fairwinds.com/memoryLimitsMissing-exempt": "true" };

// =============================================================================
// END-TO-END SCENARIOS
// =============================================================================

describe("audit scenarios", () => {
  it("flags a container without memory limits under the default config", () => {
    const results = containerResults();

    expect(results.get("memoryLimitsMissing")).toEqual({
      id: "memoryLimitsMissing",
      message: "Memory limits should be set",
      success: false,
      severity: "warning",
      category: "Efficiency",
    });
  });

  it("omits a check exempted by annotation", () => {
    const results = containerResults(defaults, { annotations: memoryExempt });

    expect(results.has("memoryLimitsMissing")).toBe(false);
    expect(results.has("cpuLimitsMissing")).toBe(true);
  });

  it("ignores exemption annotations when they are disallowed", () => {
    const results = containerResults(withDefaults({ disallowExemptions: true }), {
      annotations: memoryExempt,
    });

    expect(results.get("memoryLimitsMissing")?.success).toBe(false);
  });

  it("fails the pass for an unknown custom check ID", () => {
    const config = withDefaults({ checks: { ...defaults.checks, myOrgCheck: "danger" } });
    const workload = workloadOf();

    expect(() => applyPodChecks(config, catalog, workload)).toThrow(CheckNotFoundError);
    expect(() => applyControllerChecks(config, catalog, workload)).toThrow(
      "Check myOrgCheck not found (Deployment default/web)",
    );
  });
});

// =============================================================================
// PROPERTIES
// =============================================================================

describe("audit properties", () => {
  it("exempts every check with the blanket annotation", () => {
    const workload = workloadOf({ annotations: { "polaris.fairwinds.com/exempt": "true" } });

    expect(applyControllerChecks(defaults, catalog, workload).size).toBe(0);
    expect(applyPodChecks(defaults, catalog, workload).size).toBe(0);
    expect(
      applyContainerChecks(defaults, catalog, workload, workload.podSpec.containers[0], false).size,
    ).toBe(0);
  });

  it("lets a custom check replace the built-in with the same ID", () => {
    const config = withDefaults({
      customChecks: {
        memoryLimitsMissing: {
          category: "Custom",
          target: "Container",
          successMessage: "Memory limit recorded",
          failureMessage: "Memory limit not recorded",
          assert: { path: "resources.limits", op: "exists" },
        },
      },
    });

    const results = containerResults(config, {
      containers: [{ name: "app", image: "nginx:1.25", resources: { limits: { cpu: "1" } } }],
    });

    expect(results.get("memoryLimitsMissing")).toEqual({
      id: "memoryLimitsMissing",
      message: "Memory limit recorded",
      success: true,
      severity: "warning",
      category: "Custom",
    });
  });

  it("judges pod-level checks per container", () => {
    const opts: DeploymentOptions = {
      podFields: { securityContext: { runAsNonRoot: true } },
      containers: [
        { name: "app", image: "nginx:1.25" },
        { name: "debug", image: "busybox:1.36", securityContext: { runAsUser: 0 } },
      ],
    };
    const workload = workloadOf(opts);
    const [app, debug] = workload.podSpec.containers;

    expect(
      applyContainerChecks(defaults, catalog, workload, app, false).get("runAsRootAllowed")?.success,
    ).toBe(true);
    expect(
      applyContainerChecks(defaults, catalog, workload, debug, false).get("runAsRootAllowed")?.success,
    ).toBe(false);
  });

  it("applies config exemptions by namespace and controller name prefix", () => {
    const workload = workloadOf({
      namespace: "kube-system",
      name: "kube-proxy-abc12",
      podFields: { hostNetwork: true },
    });

    const pod = applyPodChecks(defaults, catalog, workload);

    expect(pod.has("hostNetworkSet")).toBe(false);
    expect(pod.get("hostIPCSet")?.success).toBe(true);
  });

  it("produces identical results for identical inputs", () => {
    const object = deployment({ podFields: { hostPID: true } });

    const first = auditObject(defaults, catalog, object);
    const second = auditObject(defaults, catalog, object);

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    expect(first.podResult?.results.get("hostPIDSet")?.success).toBe(false);
  });
});
