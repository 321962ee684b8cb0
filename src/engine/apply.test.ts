import { describe, expect, it } from "vitest";

import { deployment, ingress, kubeObject } from "../__tests__/manifests.js";
import { loadBuiltInCatalog } from "../checks/catalog.js";
import { parseAuditConfig } from "../core/config.js";
import { CheckNotFoundError, MalformedCheckError } from "../core/errors.js";
import type { KubeObject } from "../kube/types.js";
import { toWorkload, type Workload } from "../kube/workload.js";

import {
  applyContainerChecks,
  applyControllerChecks,
  applyObjectChecks,
  applyPodChecks,
} from "./apply.js";
import { EXEMPT_ALL_ANNOTATION, checkExemptionAnnotation } from "./exemptions.js";

// =============================================================================
// HELPERS
// =============================================================================

const catalog = loadBuiltInCatalog();

const config = parseAuditConfig({
  checks: {
    hostIPCSet: "danger",
    memoryLimitsMissing: "warning",
    multipleReplicasForDeployment: "warning",
    readinessProbeMissing: "warning",
    tlsSettingsMissing: "warning",
  },
});

function annotatedIngress(annotations: Record<string, string>): KubeObject {
  return kubeObject({
    apiVersion: "networking.k8s.io/v1",
    kind: "Ingress",
    metadata: { name: "edge", namespace: "default", annotations },
    spec: { rules: [{ host: "example.test" }] },
  });
}

function workloadOf(object = deployment()): Workload {
  const workload = toWorkload(object);
  if (!workload) {
    throw new Error("expected a workload");
  }
  return workload;
}

// =============================================================================
// TESTS
// =============================================================================

describe("applyControllerChecks", () => {
  it("runs only controller-targeted checks", () => {
    const results = applyControllerChecks(config, catalog, workloadOf());

    expect(results.ids()).toEqual(["multipleReplicasForDeployment"]);
    expect(results.get("multipleReplicasForDeployment")).toEqual({
      id: "multipleReplicasForDeployment",
      message: "Only one replica is scheduled",
      success: false,
      severity: "warning",
      category: "Reliability",
    });
  });

  it("skips checks whose controller filter excludes the kind", () => {
    const statefulSet = kubeObject({
      apiVersion: "apps/v1",
      kind: "StatefulSet",
      metadata: { name: "db" },
      spec: { template: { spec: { containers: [{ name: "db", image: "postgres:16" }] } } },
    });

    expect(applyControllerChecks(config, catalog, workloadOf(statefulSet)).size).toBe(0);
  });
});

describe("applyPodChecks", () => {
  it("runs pod-targeted checks against the pod spec", () => {
    const results = applyPodChecks(
      config,
      catalog,
      workloadOf(deployment({ podFields: { hostIPC: true } })),
    );

    expect(results.ids()).toEqual(["hostIPCSet"]);
    expect(results.get("hostIPCSet")?.success).toBe(false);
    expect(results.get("hostIPCSet")?.message).toBe("Host IPC should not be configured");
  });

  it("returns a check-not-found error for unknown configured IDs", () => {
    const broken = parseAuditConfig({ checks: { myOrgCheck: "danger" } });

    expect(() => applyPodChecks(broken, catalog, workloadOf())).toThrow(CheckNotFoundError);
  });
});

describe("applyContainerChecks", () => {
  const workload = workloadOf(
    deployment({
      initContainers: [{ name: "migrate", image: "migrate:1.0" }],
      containers: [{ name: "app", image: "nginx:1.25", readinessProbe: { httpGet: { path: "/" } } }],
    }),
  );

  it("applies probe checks to regular containers", () => {
    const results = applyContainerChecks(config, catalog, workload, workload.podSpec.containers[0], false);

    expect(results.ids()).toEqual(["memoryLimitsMissing", "readinessProbeMissing"]);
    expect(results.get("memoryLimitsMissing")?.success).toBe(false);
    expect(results.get("readinessProbeMissing")?.success).toBe(true);
  });

  it("skips checks that exclude init containers", () => {
    const [migrate] = workload.podSpec.initContainers ?? [];

    const results = applyContainerChecks(config, catalog, workload, migrate, true);

    expect(results.ids()).toEqual(["memoryLimitsMissing"]);
  });

  it("abandons the pass when a check cannot be evaluated", () => {
    const custom = parseAuditConfig({
      checks: { memoryLimitsMissing: "warning", zzStrict: "danger" },
      customChecks: {
        zzStrict: {
          category: "Custom",
          target: "Container",
          successMessage: "ok",
          failureMessage: "bad",
          assert: { path: "image", op: "gt", value: 1 },
        },
      },
    });

    expect(() =>
      applyContainerChecks(custom, catalog, workload, workload.podSpec.containers[0], false),
    ).toThrow(MalformedCheckError);
  });
});

describe("applyObjectChecks", () => {
  it("checks TLS on ingresses", () => {
    expect(applyObjectChecks(config, catalog, ingress("plain")).get("tlsSettingsMissing")?.success).toBe(
      false,
    );
    expect(
      applyObjectChecks(config, catalog, ingress("secure", [{ hosts: ["example.test"] }])).get(
        "tlsSettingsMissing",
      )?.success,
    ).toBe(true);
  });

  it("skips kind-restricted checks for other kinds", () => {
    const service = kubeObject({ apiVersion: "v1", kind: "Service", metadata: { name: "svc" } });

    expect(applyObjectChecks(config, catalog, service).size).toBe(0);
  });

  it("honours a per-check exemption annotation", () => {
    const edge = annotatedIngress({ [checkExemptionAnnotation("tlsSettingsMissing")]: "true" });

    expect(applyObjectChecks(config, catalog, edge).ids()).toEqual([]);
  });

  it("honours the blanket exemption annotation in any case", () => {
    const edge = annotatedIngress({ [EXEMPT_ALL_ANNOTATION]: "TRUE" });

    expect(applyObjectChecks(config, catalog, edge).size).toBe(0);
  });

  it("ignores exemption annotations when exemptions are disallowed", () => {
    const strict = parseAuditConfig({
      checks: { tlsSettingsMissing: "warning" },
      disallowExemptions: true,
    });
    const edge = annotatedIngress({ [EXEMPT_ALL_ANNOTATION]: "true" });

    expect(applyObjectChecks(strict, catalog, edge).get("tlsSettingsMissing")?.success).toBe(false);
  });
});
