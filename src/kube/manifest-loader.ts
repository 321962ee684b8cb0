import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";
import yaml from "js-yaml";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { formatIssues } from "../core/issues.js";
import { KubeObjectSchema, isPlainObject, type KubeObject } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoadedManifest = {
  object: KubeObject;
  source: string;
  /** Position of the document within its file, counting flattened List items. */
  index: number;
};

export type ManifestLoadFailure = {
  source: string;
  index?: number;
  issues: string[];
};

export type ManifestLoadResult = {
  manifests: LoadedManifest[];
  failures: ManifestLoadFailure[];
};

const MANIFEST_GLOBS = ["**/*.yaml", "**/*.yml", "**/*.json"];

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Loads every Kubernetes object from the given files, directories or glob patterns.
 * Unparseable files and invalid documents become failures; only an empty match throws.
 */
export async function loadManifests(
  inputs: string[],
  opts: { cwd?: string } = {},
): Promise<ManifestLoadResult> {
  const cwd = opts.cwd ?? process.cwd();
  const files = await expandManifestInputs(inputs, cwd);
  if (files.length === 0) {
    throw createNoManifestsError(inputs);
  }

  const manifests: LoadedManifest[] = [];
  const failures: ManifestLoadFailure[] = [];

  for (const file of files) {
    let text: string;
    try {
      text = await fse.readFile(file, "utf8");
    } catch (err) {
      failures.push({ source: file, issues: [`Failed to read manifest: ${formatError(err)}`] });
      continue;
    }

    const parsed = parseManifestText(text, file);
    manifests.push(...parsed.manifests);
    failures.push(...parsed.failures);
  }

  return { manifests, failures };
}

export function parseManifestText(text: string, source: string): ManifestLoadResult {
  let docs: unknown[];
  try {
    docs = yaml.loadAll(text);
  } catch (err) {
    return {
      manifests: [],
      failures: [{ source, issues: [`Invalid YAML: ${formatError(err)}`] }],
    };
  }

  const manifests: LoadedManifest[] = [];
  const failures: ManifestLoadFailure[] = [];
  let index = 0;

  for (const doc of flattenLists(docs)) {
    const parsed = KubeObjectSchema.safeParse(doc);
    if (parsed.success) {
      manifests.push({ object: parsed.data, source, index });
    } else {
      failures.push({ source, index, issues: formatIssues(parsed.error.issues) });
    }
    index += 1;
  }

  return { manifests, failures };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function expandManifestInputs(inputs: string[], cwd: string): Promise<string[]> {
  const files = new Set<string>();

  for (const input of inputs) {
    const absolute = path.resolve(cwd, input);
    const stat = await fse.stat(absolute).catch(() => null);

    if (stat?.isDirectory()) {
      const matches = await fg(MANIFEST_GLOBS, { cwd: absolute, absolute: true, onlyFiles: true });
      matches.forEach((match) => files.add(path.normalize(match)));
      continue;
    }

    if (stat?.isFile()) {
      files.add(absolute);
      continue;
    }

    const matches = await fg(input, { cwd, absolute: true, onlyFiles: true });
    matches.forEach((match) => files.add(path.normalize(match)));
  }

  return [...files].sort();
}

function flattenLists(docs: unknown[]): unknown[] {
  const flattened: unknown[] = [];

  for (const doc of docs) {
    if (doc === null || doc === undefined) continue;

    if (isPlainObject(doc) && doc.kind === "List" && Array.isArray(doc.items)) {
      flattened.push(...flattenLists(doc.items));
      continue;
    }

    flattened.push(doc);
  }

  return flattened;
}

function createNoManifestsError(inputs: string[]): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.manifest,
    title: "No manifests found.",
    message: `No YAML or JSON files matched: ${inputs.join(", ")}.`,
    hint: "Pass files, directories or glob patterns with --manifests.",
  });
}

function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
