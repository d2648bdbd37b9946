import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export const RUN_EVENT_TYPES = [
  "run.start",
  "run.abort",
  "run.complete",
  "stage.start",
  "stage.complete",
  "stage.reclassified",
  "tool.start",
  "tool.complete",
  "report.render_failed",
] as const;

export type RunEventType = (typeof RUN_EVENT_TYPES)[number];
export type ToolEventType = Extract<RunEventType, `tool.${string}`>;

/** Identifies the run every event in one log belongs to. */
export type RunEventScope = {
  runId: string;
  dataset: string;
};

export type RunEventFields = {
  stage?: string;
  payload?: JsonObject;
};

/** One line of events.jsonl. */
export type RunEvent = {
  ts: string;
  type: RunEventType;
  run_id: string;
  dataset: string;
  stage?: string;
  payload?: JsonObject;
};

export type RunEventLogOptions = {
  debug?: boolean;
  now?: () => Date;
};

// =============================================================================
// EVENT LOG
// =============================================================================

/**
 * Append-only JSONL log for a single gate run.
 *
 * Writes are synchronous so the file is complete when a stage throws. Write and
 * close failures become console warnings; the run itself never fails on logging.
 */
export class RunEventLog {
  private readonly fd: number;
  private readonly debug: boolean;
  private readonly now: () => Date;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly scope: RunEventScope,
    options: RunEventLogOptions = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
    this.debug = options.debug ?? false;
    this.now = options.now ?? (() => new Date());
  }

  emit(type: RunEventType, fields: RunEventFields = {}): void {
    if (this.closed) return;
    const line = JSON.stringify(toRunEvent(type, this.scope, fields, this.now()));
    try {
      fs.writeSync(this.fd, `${line}\n`);
    } catch (err) {
      console.warn(logFailureWarning(`write event to ${this.filePath}`, err, this.debug));
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.fsyncSync(this.fd);
      fs.closeSync(this.fd);
    } catch (err) {
      console.warn(logFailureWarning(`close ${this.filePath}`, err, this.debug));
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function toRunEvent(
  type: RunEventType,
  scope: RunEventScope,
  fields: RunEventFields,
  at: Date,
): RunEvent {
  const event: RunEvent = { ts: at.toISOString(), type, run_id: scope.runId, dataset: scope.dataset };
  if (fields.stage !== undefined) event.stage = fields.stage;
  // Empty payloads are noise in the log.
  if (fields.payload && Object.keys(fields.payload).length > 0) event.payload = fields.payload;
  return event;
}

function logFailureWarning(action: string, error: unknown, debug: boolean): string {
  const message = `Warning: failed to ${action}: ${formatErrorMessage(error)}`;
  if (!debug) return message;

  const stack = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stack ? `${message}\n${stack.text}` : message;
}
