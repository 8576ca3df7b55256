import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { makeTemporaryDirectory, removeTemporaryDirectories } from "../../test/helpers.js";

import { JsonlEventLog, logTaskEvent, toLogEvent } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
  removeTemporaryDirectories();
});

function readEvents(logPath: string): Record<string, unknown>[] {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("JsonlEventLog", () => {
  it("writes events with project and task metadata", () => {
    const tmpDir = makeTemporaryDirectory("jsonl-logger-");
    const logPath = path.join(tmpDir, "nested", "events.jsonl");
    const logger = new JsonlEventLog(logPath);

    logger.log({ type: "task.created", projectId: 3, taskId: 9, payload: { name: "Build" } });
    logger.close();

    const events = readEvents(logPath);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: "task.created",
      project_id: 3,
      task_id: 9,
      payload: { name: "Build" },
    });
    expect(new Date(String(events[0].ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const tmpDir = makeTemporaryDirectory("jsonl-logger-");
    const logPath = path.join(tmpDir, "events.jsonl");

    const first = new JsonlEventLog(logPath);
    first.log({ type: "first", payload: { order: 1 } });
    first.close();

    const second = new JsonlEventLog(logPath);
    second.log({ type: "second", payload: { order: 2 } });
    second.close();

    const events = readEvents(logPath);
    expect(events.map((e) => e.type)).toEqual(["first", "second"]);
    expect(events.map((e) => e.payload)).toEqual([{ order: 1 }, { order: 2 }]);
  });

  it("ignores events logged after close", () => {
    const tmpDir = makeTemporaryDirectory("jsonl-logger-");
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlEventLog(logPath);

    logger.log({ type: "kept" });
    logger.close();
    logger.log({ type: "dropped" });
    logger.close();

    expect(readEvents(logPath).map((e) => e.type)).toEqual(["kept"]);
  });

  it("reports write failures through the warn hook and keeps going", () => {
    const tmpDir = makeTemporaryDirectory("jsonl-logger-");
    const logPath = path.join(tmpDir, "events.jsonl");
    const warnings: string[] = [];
    const logger = new JsonlEventLog(logPath, { debug: false, warn: (m) => warnings.push(m) });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });

    logger.log({ type: "task.created" });
    logger.close();

    expect(warnings).toEqual([`Warning: failed to write log event to ${logPath}: disk full`]);
  });

  it("falls back to console.warn and adds the stack in debug mode", () => {
    const tmpDir = makeTemporaryDirectory("jsonl-logger-");
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlEventLog(logPath, { debug: true });

    const writeError = new Error("disk full");
    writeError.stack = "Error: disk full\n    at fake:1:1";
    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw writeError;
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "task.created" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full\nError: disk full\n    at fake:1:1`,
    );
  });
});

describe("toLogEvent", () => {
  it("omits empty payloads and absent ids and normalizes dates", () => {
    const event = toLogEvent({
      type: "sample",
      payload: {},
      ts: new Date("2026-02-01T00:00:00.000Z"),
    });

    expect(event).toEqual({ ts: "2026-02-01T00:00:00.000Z", type: "sample" });
  });

  it("renames ids to their snake_case keys", () => {
    expect(toLogEvent({ type: "x", projectId: 2, taskId: 7, ts: "t" })).toEqual({
      ts: "t",
      type: "x",
      project_id: 2,
      task_id: 7,
    });
  });
});

describe("logTaskEvent", () => {
  it("copies the task's ids onto the event", () => {
    const events: unknown[] = [];
    const sink = { log: (event: unknown) => events.push(event), close: () => undefined };

    logTaskEvent(sink, "task.approved", { id: 5, project_id: 2 }, { approved_by: "dana" });

    expect(events).toEqual([
      { type: "task.approved", projectId: 2, taskId: 5, payload: { approved_by: "dana" } },
    ]);
  });
});
