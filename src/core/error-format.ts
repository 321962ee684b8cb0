/*
Purpose: turn any thrown value into structured lines for CLI output and log warnings.
Assumptions: UserFacingError carries its own title/hint; everything else gets a generic title.
Usage: formatErrorLines(err, { mode: "short" }), formatErrorMessage(err).
*/

import {
  AuditError,
  CatalogLoadError,
  describeCheckSubject,
  isPassError,
  UserFacingError,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "check"
  | "subject"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "green" | "cyan" | "dim" | "bold";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const debug = options.mode === "debug";
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (debug) {
      lines.push({ kind: "code", text: error.code });
    }
    if (error.cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
    }
  } else if (error instanceof AuditError) {
    lines.push({ kind: "title", text: "Audit failed." });
    lines.push({ kind: "message", text: error.message });
    lines.push(...checkLines(error));
    if (debug) {
      lines.push({ kind: "name", text: error.name });
    }
    if (error.cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
    }
  } else {
    lines.push({ kind: "title", text: "Unexpected error." });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
    if (debug && error instanceof Error) {
      lines.push({ kind: "name", text: error.name });
    }
  }

  if (!debug) {
    lines.push({ kind: "next", text: "Rerun with --debug for more detail." });
    return lines;
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

function checkLines(error: AuditError): ErrorFormatLine[] {
  if (error instanceof CatalogLoadError) return [{ kind: "check", text: error.checkId }];
  if (!isPassError(error)) return [];

  const lines: ErrorFormatLine[] = [{ kind: "check", text: error.checkId }];
  if (error.subject) lines.push({ kind: "subject", text: describeCheckSubject(error.subject) });
  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  green: [32, 39],
  cyan: [36, 39],
  dim: [2, 22],
  bold: [1, 22],
};

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (options.useColor === false) return false;
  if (process.env.NO_COLOR !== undefined) return false;
  // Piped output stays plain even when color was requested.
  return Boolean(options.stream?.isTTY);
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
}
