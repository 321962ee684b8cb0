import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  run_id: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  runId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type AuditLogger = {
  log: (event: LogEventInput) => void;
};

type EventDefaults = {
  runId?: string;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements AuditLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
    options: { debug?: boolean } = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = options.debug ?? false;
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

/** Collects events in memory; handy for callers that inspect events after an audit. */
export class MemoryLogger implements AuditLogger {
  readonly events: LogEvent[] = [];

  constructor(private readonly defaults: EventDefaults = { runId: "memory" }) {}

  log(event: LogEventInput): void {
    this.events.push(eventWithTs(event, this.defaults));
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const runId = event.runId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const ts = event.ts;
  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ts: normalizedTs,
    type: event.type,
    run_id: runId,
  };

  if (event.payload && Object.keys(event.payload).length > 0) {
    result.payload = event.payload;
  }

  return result;
}

export function logAuditEvent(
  logger: AuditLogger | undefined,
  type: string,
  payload: JsonObject = {},
): void {
  if (!logger) return;
  logger.log({ type, payload });
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = resolveDebugStack(error);
  if (!stack) {
    return message;
  }

  return `${message}\n${stack}`;
}

function resolveDebugStack(error: unknown): string | undefined {
  const lines = formatErrorLines(error, { mode: "debug" });
  const stackLine = lines.find((line) => line.kind === "stack");
  return stackLine?.text;
}
