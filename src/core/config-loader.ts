import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";

import { parseAuditConfig, type AuditConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { defaultConfigPath } from "./paths.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Pass --config <path> pointing at an existing YAML file, or omit it to use the defaults.";
const INVALID_CONFIG_HINT = "Fix the config file and rerun. Run `workload-auditor checks` to list known check IDs.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const mark: unknown = error.mark;
  if (!mark || typeof mark !== "object") {
    return null;
  }

  const line = "line" in mark ? mark.line : undefined;
  const column = "column" in mark ? mark.column : undefined;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Audit config missing.",
    message: `Audit config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Audit config invalid.",
    message: `Audit config at ${configPath} is invalid.`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadAuditConfig(configPath: string): AuditConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read audit config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    const expanded = expandEnv(doc, { file: absolutePath, trail: [] });
    return parseAuditConfig(expanded, absolutePath);
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

/** Loads the explicit config when given, otherwise the bundled defaults. */
export function loadAuditConfigOrDefault(explicitPath?: string): AuditConfig {
  return loadAuditConfig(explicitPath ?? defaultConfigPath());
}
