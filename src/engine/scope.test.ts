import { describe, expect, it } from "vitest";

import { CheckCatalog } from "../checks/catalog.js";
import { decodeCheckDefinition } from "../checks/definition.js";
import type { CheckDefinition } from "../checks/types.js";
import { parseAuditConfig, type ConfigFileInput } from "../core/config.js";
import { CheckNotFoundError, InvalidCustomCheckError } from "../core/errors.js";

import {
  isGloballyActionable,
  isStructurallyActionable,
  resolveCheck,
  type EvaluationContext,
} from "./scope.js";

// =============================================================================
// HELPERS
// =============================================================================

function check(id: string, overrides: Record<string, unknown> = {}): CheckDefinition {
  const decoded = decodeCheckDefinition(id, {
    category: "Security",
    target: "Container",
    successMessage: "ok",
    failureMessage: "bad",
    assert: { path: "image", op: "exists" },
    ...overrides,
  });
  if (!decoded.success) {
    throw new Error(decoded.issues.join("; "));
  }
  return decoded.definition;
}

function context(overrides: Partial<EvaluationContext> = {}): EvaluationContext {
  return {
    kind: "Deployment",
    scope: "Container",
    meta: { namespace: "default", name: "web", annotations: {} },
    containerName: "app",
    isInitContainer: false,
    ...overrides,
  };
}

function config(input: ConfigFileInput) {
  return parseAuditConfig(input);
}

// =============================================================================
// TESTS
// =============================================================================

describe("resolveCheck", () => {
  const catalog = new CheckCatalog([check("imageSet")]);

  it("applies a configured check whose target matches the scope", () => {
    const resolution = resolveCheck(catalog, "imageSet", context(), config({ checks: { imageSet: "danger" } }));

    expect(resolution.action).toBe("apply");
  });

  it("throws CheckNotFoundError naming the subject", () => {
    const run = () => resolveCheck(catalog, "ghost", context(), config({ checks: { ghost: "danger" } }));

    expect(run).toThrow(CheckNotFoundError);
    expect(run).toThrow("Check ghost not found (Deployment default/web container app)");
  });

  it("throws InvalidCustomCheckError for a rejected custom check", () => {
    const cfg = config({
      checks: { imageSet: "danger" },
      customChecks: { imageSet: { target: "Container" } },
    });

    expect(() => resolveCheck(catalog, "imageSet", context(), cfg)).toThrow(InvalidCustomCheckError);
  });

  it("skips ignored checks before structural filters", () => {
    const resolution = resolveCheck(
      catalog,
      "imageSet",
      context({ scope: "Pod" }),
      config({ checks: { imageSet: "ignore" } }),
    );

    expect(resolution).toEqual({ action: "skip", reason: "severity-ignored" });
  });

  it("skips when the target differs from the scope", () => {
    const resolution = resolveCheck(
      catalog,
      "imageSet",
      context({ scope: "Pod" }),
      config({ checks: { imageSet: "warning" } }),
    );

    expect(resolution).toEqual({ action: "skip", reason: "target-mismatch" });
  });
});

describe("isGloballyActionable", () => {
  const ctx = context();

  it("is false for unconfigured checks", () => {
    expect(isGloballyActionable(config({}), "imageSet", ctx)).toBe(false);
  });

  it("applies namespace, controller prefix, container and rule filters", () => {
    const matching = {
      namespace: "default",
      controllerNames: ["we"],
      containerNames: ["app"],
      rules: ["imageSet"],
    };

    expect(
      isGloballyActionable(config({ checks: { imageSet: "danger" }, exemptions: [matching] }), "imageSet", ctx),
    ).toBe(false);
    expect(
      isGloballyActionable(
        config({ checks: { imageSet: "danger" }, exemptions: [{ ...matching, namespace: "prod" }] }),
        "imageSet",
        ctx,
      ),
    ).toBe(true);
    expect(
      isGloballyActionable(
        config({ checks: { imageSet: "danger" }, exemptions: [{ ...matching, controllerNames: ["api"] }] }),
        "imageSet",
        ctx,
      ),
    ).toBe(true);
    expect(
      isGloballyActionable(
        config({ checks: { imageSet: "danger" }, exemptions: [{ ...matching, containerNames: ["sidecar"] }] }),
        "imageSet",
        ctx,
      ),
    ).toBe(true);
    expect(
      isGloballyActionable(
        config({ checks: { imageSet: "danger" }, exemptions: [{ ...matching, rules: ["other"] }] }),
        "imageSet",
        ctx,
      ),
    ).toBe(true);
  });

  it("does not match container-specific rules outside container scope", () => {
    const cfg = config({
      checks: { imageSet: "danger" },
      exemptions: [{ containerNames: ["app"], rules: ["imageSet"] }],
    });

    expect(isGloballyActionable(cfg, "imageSet", context({ scope: "Pod", containerName: undefined }))).toBe(
      true,
    );
  });

  it("treats a rule with no filters as exempting everything", () => {
    const cfg = config({ checks: { imageSet: "danger" }, exemptions: [{}] });

    expect(isGloballyActionable(cfg, "imageSet", ctx)).toBe(false);
  });

  it("keeps config exemptions when annotation exemptions are disallowed", () => {
    const cfg = config({
      checks: { imageSet: "danger" },
      exemptions: [{ rules: ["imageSet"] }],
      disallowExemptions: true,
    });

    expect(isGloballyActionable(cfg, "imageSet", ctx)).toBe(false);
  });
});

describe("isStructurallyActionable", () => {
  it("honours controller include and exclude lists", () => {
    const deploymentsOnly = check("replicas", {
      target: "Controller",
      controllers: { include: ["Deployment"] },
    });
    const noJobs = check("probe", { controllers: { exclude: ["Job"] } });

    expect(isStructurallyActionable(deploymentsOnly, context({ scope: "Controller" }))).toBe(true);
    expect(isStructurallyActionable(deploymentsOnly, context({ scope: "Controller", kind: "StatefulSet" }))).toBe(
      false,
    );
    expect(isStructurallyActionable(noJobs, context({ kind: "Job" }))).toBe(false);
    expect(isStructurallyActionable(noJobs, context())).toBe(true);
  });

  it("restricts other-object checks to their kinds", () => {
    const ingressOnly = check("tls", { target: "Other", kinds: ["Ingress"] });
    const anyKind = check("labels", { target: "Other" });

    expect(isStructurallyActionable(ingressOnly, context({ scope: "Other", kind: "Ingress" }))).toBe(true);
    expect(isStructurallyActionable(ingressOnly, context({ scope: "Other", kind: "Service" }))).toBe(false);
    expect(isStructurallyActionable(anyKind, context({ scope: "Other", kind: "Service" }))).toBe(true);
  });

  it("filters by container kind", () => {
    const mainOnly = check("probe", { containers: { exclude: ["initContainer"] } });
    const initOnly = check("init", { containers: { include: ["initContainer"] } });

    expect(isStructurallyActionable(mainOnly, context({ isInitContainer: true }))).toBe(false);
    expect(isStructurallyActionable(mainOnly, context())).toBe(true);
    expect(isStructurallyActionable(initOnly, context())).toBe(false);
    expect(isStructurallyActionable(initOnly, context({ isInitContainer: true }))).toBe(true);
  });
});
