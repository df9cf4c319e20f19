import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

/** One line of a run log: fixed envelope keys plus the event's own fields. */
export type RunLogEvent = JsonObject & {
  ts: string;
  type: string;
  run_id: string;
  task_id?: string;
};

export type RunLogFields = JsonObject & { taskId?: string };

// =============================================================================
// LOGGER
// =============================================================================

/**
 * Append-only JSON Lines log for one run, fsynced per event.
 * Write failures are reported on stderr and never reach the caller.
 */
export class JsonlLogger {
  private readonly fd: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    public readonly runId: string,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
  }

  log(type: string, fields: RunLogFields = {}): void {
    if (this.closed) return;
    const line = JSON.stringify(buildRunLogEvent(this.runId, type, fields));
    try {
      fs.writeSync(this.fd, `${line}\n`);
      fs.fsyncSync(this.fd);
    } catch (err) {
      warnLogFailure(`write log event to ${this.filePath}`, err);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.fsyncSync(this.fd);
      fs.closeSync(this.fd);
    } catch (err) {
      warnLogFailure(`close log file ${this.filePath}`, err);
    }
  }
}

// =============================================================================
// RUN EVENTS
// =============================================================================

function buildRunLogEvent(
  runId: string,
  type: string,
  fields: RunLogFields,
  ts: string = isoNow(),
): RunLogEvent {
  const { taskId, ...rest } = fields;
  const event: RunLogEvent = { ...rest, ts, type, run_id: runId };
  if (taskId) event.task_id = taskId;
  return event;
}

export function logRunEvent(
  logger: JsonlLogger | undefined,
  type: string,
  fields: RunLogFields = {},
): void {
  logger?.log(type, fields);
}

export function logRunResume(
  logger: JsonlLogger | undefined,
  details: { doneTasks: number; failedTasks: number; interruptedTasks: number },
): void {
  logRunEvent(logger, "run.resume", {
    done_tasks: details.doneTasks,
    failed_tasks: details.failedTasks,
    interrupted_tasks: details.interruptedTasks,
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

function warnLogFailure(action: string, error: unknown): void {
  const message = `Warning: failed to ${action}: ${formatErrorMessage(error)}`;
  const debug = process.env.PROVISIONER_DEBUG === "1" || process.env.PROVISIONER_DEBUG === "true";
  const stack = debug && error instanceof Error ? error.stack : undefined;
  console.warn(stack ? `${message}\n${stack}` : message);
}
