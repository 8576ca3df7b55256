import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow, readArgvFlag } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** One line of the event log, as written. */
export type LogEvent = {
  ts: string;
  type: string;
  project_id?: number;
  task_id?: number;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  projectId?: number;
  taskId?: number;
  payload?: JsonObject;
  ts?: string | Date;
};

/** Append-only sink for audit events. */
export interface EventLog {
  log(event: LogEventInput): void;
  close(): void;
}

export type JsonlEventLogOptions = {
  /** Adds stack traces to failure warnings. Defaults to `--debug` on the command line. */
  debug?: boolean;
  warn?: (message: string) => void;
};

// =============================================================================
// JSONL SINK
// =============================================================================

/**
 * Writes one JSON object per line and syncs after each event. I/O failures become
 * warnings; the event is lost but the operation that logged it goes on.
 */
export class JsonlEventLog implements EventLog {
  private fd: number | null;
  private readonly debug: boolean;
  private readonly warn: (message: string) => void;

  constructor(
    public readonly filePath: string,
    options: JsonlEventLogOptions = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
    this.debug = options.debug ?? readArgvFlag(process.argv, "debug") ?? false;
    this.warn = options.warn ?? ((message) => console.warn(message));
  }

  log(event: LogEventInput): void {
    const fd = this.fd;
    if (fd === null) return;

    const line = JSON.stringify(toLogEvent(event));
    this.attempt(`write log event to ${this.filePath}`, () => {
      fs.writeSync(fd, `${line}\n`);
      fs.fsyncSync(fd);
    });
  }

  close(): void {
    const fd = this.fd;
    if (fd === null) return;

    this.fd = null;
    this.attempt(`close log file ${this.filePath}`, () => {
      fs.fsyncSync(fd);
      fs.closeSync(fd);
    });
  }

  private attempt(action: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.warn(describeFailure(action, err, this.debug));
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function toLogEvent(event: LogEventInput): LogEvent {
  const ts = event.ts instanceof Date ? event.ts.toISOString() : (event.ts ?? isoNow());
  const out: LogEvent = { ts, type: event.type };

  if (event.projectId !== undefined) out.project_id = event.projectId;
  if (event.taskId !== undefined) out.task_id = event.taskId;
  if (event.payload && Object.keys(event.payload).length > 0) out.payload = event.payload;

  return out;
}

export function logTaskEvent(
  log: EventLog,
  type: string,
  task: { id: number; project_id: number },
  payload: JsonObject = {},
): void {
  log.log({ type, projectId: task.project_id, taskId: task.id, payload });
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeFailure(action: string, error: unknown, debug: boolean): string {
  const message = `Warning: failed to ${action}: ${formatErrorMessage(error)}`;
  if (!debug) return message;

  const stack = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stack ? `${message}\n${stack.text}` : message;
}
