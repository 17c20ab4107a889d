import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  JsonlLogger,
  MemoryEventSink,
  eventWithTs,
  logRepoEvent,
  resolveDebugFlagFromArgv,
} from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function readEvents(logPath: string): Record<string, unknown>[] {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("JsonlLogger", () => {
  it("writes events with run and repository metadata", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "nested", "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-1" });

    logRepoEvent(logger, "repo.phase", "ot3-firmware", { phase: "syncing" });
    logger.close();

    const events = readEvents(logPath);
    expect(events).toHaveLength(1);
    expect(events[0].type).toBe("repo.phase");
    expect(events[0].run_id).toBe("run-1");
    expect(events[0].repo).toBe("ot3-firmware");
    expect(events[0].payload).toEqual({ phase: "syncing" });
    expect(new Date(String(events[0].ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");

    const first = new JsonlLogger(logPath, { runId: "run-2" });
    first.log({ type: "run.start", payload: { order: 1 } });
    first.close();

    const second = new JsonlLogger(logPath, { runId: "run-3" });
    second.log({ type: "run.start", payload: { order: 2 } });
    second.close();

    const events = readEvents(logPath);
    expect(events.map((e) => e.run_id)).toEqual(["run-2", "run-3"]);
    expect(events.map((e) => e.payload)).toEqual([{ order: 1 }, { order: 2 }]);
  });

  it("ignores events after close", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-4" });

    logger.log({ type: "run.start" });
    logger.close();
    logger.log({ type: "run.complete" });
    logger.close();

    expect(readEvents(logPath).map((e) => e.type)).toEqual(["run.start"]);
  });

  it("warns on write failures with formatted messages", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-5" });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "run.start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
  });
});

describe("MemoryEventSink", () => {
  it("keeps events in order", () => {
    const sink = new MemoryEventSink({ runId: "run-mem" });

    sink.log({ type: "run.start" });
    logRepoEvent(sink, "repo.done", "oe-core");

    expect(sink.events.map((e) => [e.type, e.repo ?? null])).toEqual([
      ["run.start", null],
      ["repo.done", "oe-core"],
    ]);
  });
});

describe("eventWithTs", () => {
  it("merges defaults and drops an empty payload", () => {
    const event = eventWithTs(
      { type: "sample", repo: "buildroot", payload: {}, ts: new Date(0) },
      { runId: "run-x" },
    );

    expect(event).toEqual({
      ts: "1970-01-01T00:00:00.000Z",
      type: "sample",
      run_id: "run-x",
      repo: "buildroot",
    });
  });

  it("throws when runId is missing", () => {
    expect(() => eventWithTs({ type: "missing-run" })).toThrow(/run_id is required/i);
  });
});

describe("resolveDebugFlagFromArgv", () => {
  it("takes the last flag before the argument terminator", () => {
    expect(resolveDebugFlagFromArgv(["node", "cli", "--debug", "--no-debug"])).toBe(false);
    expect(resolveDebugFlagFromArgv(["node", "cli", "--debug", "--", "--no-debug"])).toBe(true);
    expect(resolveDebugFlagFromArgv(["node", "cli"])).toBeUndefined();
  });
});
