import { afterEach, describe, expect, it, vi } from "vitest";

import { buildSpec, FakeMirror, type FakeMirrorPlan } from "../app/orchestrator/__tests__/fakes.js";
import { parseReleaseSyncConfig } from "../core/config-loader.js";
import { MirrorUnavailableError, UserFacingError } from "../core/errors.js";

import type { ReleasePrompter } from "./prompts.js";
import { syncCommand } from "./sync.js";

const CONFIG = parseReleaseSyncConfig(
  `
default_base_version: v8.4.0
repositories:
  - name: firmware
    url: https://example.com/org/firmware.git
    tag_patterns: { external: v, internal: internal@ }
  - name: oe-core
    url: https://example.com/org/oe-core.git
    tag_patterns: { external: v, internal: internal@ }
`,
  "inline.yaml",
);

const specs = [
  buildSpec({ name: "firmware", url: "https://example.com/org/firmware.git" }),
  buildSpec({ name: "oe-core", url: "https://example.com/org/oe-core.git" }),
];

function plans(release: string): Record<string, FakeMirrorPlan> {
  return {
    firmware: {
      remoteBranches: ["main", release],
      tags: [
        { name: "v8.4.0", createdAt: 100, mergedInto: ["main", release] },
        { name: "internal@8.4.1-alpha.0", createdAt: 200, mergedInto: [release] },
      ],
      commits: { "refs/tags/v8.4.0": "tip", [`refs/heads/${release}`]: "tip" },
    },
    "oe-core": {
      remoteBranches: ["main"],
      tags: [{ name: "v8.3.0", createdAt: 50, mergedInto: ["main"] }],
      commits: { "refs/tags/v8.3.0": "old", "refs/heads/main": "new" },
      log: [{ sha: "abc1234", subject: "bump kernel" }],
    },
  };
}

function captureLog(): string[] {
  const lines: string[] = [];
  vi.spyOn(console, "log").mockImplementation((line?: unknown) => {
    lines.push(String(line));
  });
  return lines;
}

class ScriptedPrompter implements ReleasePrompter {
  readonly questions: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  async choose<T extends string>(question: string, choices: readonly T[], fallback: T): Promise<T> {
    const answer = await this.ask(question, fallback);
    return choices.find((choice) => choice === answer) ?? fallback;
  }

  async ask(question: string, fallback: string): Promise<string> {
    this.questions.push(question);
    return this.answers.shift() ?? fallback;
  }

  close(): void {
    this.closed = true;
  }
}

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe("syncCommand", () => {
  it("takes defaults without prompting under --no-input", async () => {
    const output = captureLog();
    const release = "chore_release-8.4.0";

    const report = await syncCommand(
      CONFIG,
      specs,
      { input: false },
      { createMirror: (spec) => new FakeMirror(plans(release)[spec.name]) },
    );

    expect(report.result.context.channel).toBe("external");
    expect(report.result.context.stability).toBe("unstable");
    expect(report.result.context.releaseBranch).toBe(release);
    expect(report.result.ok).toBe(true);
    expect(output[0]).toBe(
      `Release: external, Stability: unstable, Version: v8.4.0 (release branch ${release})`,
    );
    expect(output).toContain("No changes in firmware since v8.4.0 on chore_release-8.4.0");
    expect(output).toContain("Changes in oe-core since v8.3.0 on main:");
    expect(output).toContain("  abc1234 bump kernel");
    expect(process.exitCode).toBeUndefined();
  });

  it("asks for whatever was not passed as a flag", async () => {
    captureLog();
    const prompter = new ScriptedPrompter(["stable", "8.4.1"]);
    const release = "chore_release-8.4.1";

    const report = await syncCommand(
      CONFIG,
      specs,
      { channel: "internal" },
      { prompter, createMirror: (spec) => new FakeMirror(plans(release)[spec.name]) },
    );

    expect(prompter.questions).toEqual(["Stability", "Base version"]);
    expect(prompter.closed).toBe(true);
    expect(report.result.context.baseVersion).toBe("v8.4.1");
    expect(report.summary[0]).toMatchObject({
      repo: "firmware",
      branch: release,
      tag: "internal@8.4.1-alpha.0",
    });
  });

  it("emits one JSON document and sets a failing exit code", async () => {
    const output = captureLog();
    const release = "chore_release-8.4.0";
    const failing: Record<string, FakeMirrorPlan> = {
      ...plans(release),
      "oe-core": { ensureError: new MirrorUnavailableError("no route to host", "oe-core") },
    };

    await syncCommand(
      CONFIG,
      specs,
      { input: false, json: true },
      { createMirror: (spec) => new FakeMirror(failing[spec.name]) },
    );

    expect(output).toHaveLength(1);
    const doc: unknown = JSON.parse(output[0]);
    expect(doc).toMatchObject({
      ok: false,
      release: {
        channel: "external",
        base_version: "v8.4.0",
        version: "8.4.0",
        prerelease: false,
        release_branch: release,
      },
      repositories: [
        { name: "firmware", phase: "done", release_branch: release, release_branch_source: "exact" },
        {
          name: "oe-core",
          phase: "failed",
          history: ["pending", "syncing", "failed"],
          failure: { kind: "remote_unreachable", message: "no route to host" },
        },
      ],
      summary: [{ repo: "firmware", kind: "ok" }, { repo: "oe-core", kind: "failed" }],
    });
    expect(process.exitCode).toBe(1);
  });

  it("rejects flag values outside the allowed choices", async () => {
    const run = syncCommand(CONFIG, specs, { channel: "beta", input: false });

    await expect(run).rejects.toBeInstanceOf(UserFacingError);
    await expect(syncCommand(CONFIG, specs, { maxParallel: 0, input: false })).rejects.toThrow(
      "--max-parallel must be a positive integer.",
    );
  });
});
