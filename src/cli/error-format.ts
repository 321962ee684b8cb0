// CLI error output.
// Purpose: print any thrown value as labelled lines on stderr, colored only for terminals.

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineLabel = { label: string; styles: AnsiStyle[]; dimText?: boolean };

// Titles, messages and stacks have their own layout.
type LabelledKind = Exclude<ErrorFormatLineKind, "title" | "message" | "stack">;

const LINE_LABELS: Record<LabelledKind, LineLabel> = {
  check: { label: "Check:", styles: ["bold"] },
  subject: { label: "Object:", styles: ["bold"] },
  hint: { label: "Hint:", styles: ["yellow"] },
  next: { label: "Next:", styles: ["cyan"] },
  code: { label: "Code:", styles: ["dim"], dimText: true },
  name: { label: "Name:", styles: ["dim"], dimText: true },
  cause: { label: "Cause:", styles: ["dim"], dimText: true },
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const enabled = resolveColorEnabled({
    stream: options.stream ?? process.stderr,
    useColor: options.useColor,
  });
  const format = createAnsiFormatter(enabled);

  return formatErrorLines(error, { mode: options.debug ? "debug" : "short" })
    .map((line) => renderErrorLine(line, format))
    .join("\n");
}

export function renderErrorLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const { kind, text } = line;
  if (kind === "title") {
    return `${format("Error:", ["red", "bold"])} ${format(text, ["bold"])}`;
  }
  if (kind === "message") {
    return text;
  }
  if (kind === "stack") {
    const indented = text
      .split("\n")
      .map((stackLine) => `  ${stackLine}`)
      .join("\n");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const { label, styles, dimText } = LINE_LABELS[kind];
  return `${format(label, styles)} ${dimText ? format(text, ["dim"]) : text}`;
}
