export {
  BUILT_IN_CHECK_ORDER,
  CheckCatalog,
  loadBuiltInCatalog,
  type CatalogLookup,
  type CustomCheckEntry,
} from "./checks/catalog.js";
export { compileAssertion, type Assertion } from "./checks/assertions.js";
export { decodeCheckDefinition, parseCheckDefinition } from "./checks/definition.js";
export type { CheckDefinition, Severity, TargetScope } from "./checks/types.js";
export { loadAuditConfig, loadAuditConfigOrDefault } from "./core/config-loader.js";
export { parseAuditConfig, type AuditConfig, type ConfigFileInput } from "./core/config.js";
export {
  AuditError,
  CatalogLoadError,
  CheckNotFoundError,
  ConfigError,
  InvalidCustomCheckError,
  MalformedCheckError,
  ManifestError,
  UserFacingError,
} from "./core/errors.js";
export { JsonlLogger, MemoryLogger, type AuditLogger } from "./core/logger.js";
export {
  applyContainerChecks,
  applyControllerChecks,
  applyObjectChecks,
  applyPodChecks,
} from "./engine/apply.js";
export {
  auditManifests,
  auditObject,
  scoreOf,
  summarize,
  type AuditReport,
  type AuditResult,
} from "./engine/audit.js";
export { isExempt } from "./engine/exemptions.js";
export { ResultSet, type ResultRecord } from "./engine/results.js";
export { resolveCheck, type EvaluationContext } from "./engine/scope.js";
export { loadManifests, parseManifestText } from "./kube/manifest-loader.js";
export type { KubeObject } from "./kube/types.js";
export { toWorkload, type Workload } from "./kube/workload.js";
