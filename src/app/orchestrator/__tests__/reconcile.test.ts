import { describe, expect, it } from "vitest";

import { CheckoutConflictError, GitError, MirrorUnavailableError } from "../../../core/errors.js";
import { MemoryEventSink } from "../../../core/logger.js";
import { reconcileRepositories, syncRepository, type RepoOutcome } from "../reconcile.js";

import { buildContext, buildSpec, FakeMirror, type FakeMirrorPlan } from "./fakes.js";

const RELEASE = "chore_release-8.4.1";

function healthyPlan(): FakeMirrorPlan {
  return {
    remoteBranches: ["main", RELEASE],
    tags: [
      { name: "v8.4.0", createdAt: 100, mergedInto: ["main", RELEASE] },
      { name: "v8.4.1-alpha.0", createdAt: 200, mergedInto: [RELEASE] },
    ],
  };
}

describe("syncRepository", () => {
  it("walks every phase for a healthy repository", async () => {
    const mirror = new FakeMirror(healthyPlan());

    const outcome = await syncRepository(buildSpec(), mirror, { context: buildContext() });

    expect(outcome.phase).toBe("done");
    expect(outcome.history).toEqual(["pending", "syncing", "branch_resolved", "tags_collected", "done"]);
    expect(outcome.ensure).toBe("cloned");
    expect(outcome.synced).toEqual([
      { branch: "main", lastCommitDate: "date-of-main" },
      { branch: RELEASE, lastCommitDate: `date-of-${RELEASE}` },
    ]);
    expect(outcome.state?.branchTags).toEqual({
      main: { v: ["v8.4.0"], "internal@": [] },
      [RELEASE]: { v: ["v8.4.1-alpha.0", "v8.4.0"], "internal@": [] },
    });
    expect(outcome.failure).toBeUndefined();
  });

  it("fails from syncing when the remote is unreachable", async () => {
    const mirror = new FakeMirror({
      ensureError: new MirrorUnavailableError("Unable to clone firmware", "firmware"),
    });

    const outcome = await syncRepository(buildSpec(), mirror, { context: buildContext() });

    expect(outcome.history).toEqual(["pending", "syncing", "failed"]);
    expect(outcome.failure).toMatchObject({
      phase: "syncing",
      kind: "remote_unreachable",
      message: "Unable to clone firmware",
    });
    expect(outcome.state).toBeUndefined();
    expect(mirror.calls).toEqual(["ensure"]);
  });

  it("keeps the tags of branches synced before a checkout conflict", async () => {
    const mirror = new FakeMirror({
      ...healthyPlan(),
      checkoutErrors: {
        [RELEASE]: new CheckoutConflictError("local release branch diverged", RELEASE),
      },
    });

    const outcome = await syncRepository(buildSpec(), mirror, { context: buildContext() });

    expect(outcome.history).toEqual(["pending", "syncing", "branch_resolved", "failed"]);
    expect(outcome.failure).toMatchObject({
      phase: "branch_resolved",
      kind: "checkout_conflict",
      branch: RELEASE,
    });
    expect(outcome.synced.map((entry) => entry.branch)).toEqual(["main"]);
    expect(outcome.state?.branchTags).toEqual({ main: { v: ["v8.4.0"], "internal@": [] } });
    expect(outcome.state?.latestTags.v).toBe("v8.4.1-alpha.0");
  });

  it("still syncs the release branch when the primary branch fails to check out", async () => {
    const events = new MemoryEventSink({ runId: "run-test" });
    const mirror = new FakeMirror({
      ...healthyPlan(),
      checkoutErrors: { main: new CheckoutConflictError("local main diverged", "main") },
    });

    const outcome = await syncRepository(buildSpec(), mirror, { context: buildContext(), events });

    expect(outcome.phase).toBe("failed");
    expect(outcome.history).toEqual(["pending", "syncing", "branch_resolved", "failed"]);
    expect(outcome.failure).toMatchObject({ kind: "checkout_conflict", branch: "main" });
    expect(outcome.failedBranches).toEqual([
      { branch: "main", kind: "checkout_conflict", message: "local main diverged" },
    ]);
    expect(mirror.calls).toContain(`checkout:${RELEASE}`);
    expect(outcome.synced.map((entry) => entry.branch)).toEqual([RELEASE]);
    expect(outcome.state?.branchTags).toEqual({
      [RELEASE]: { v: ["v8.4.1-alpha.0", "v8.4.0"], "internal@": [] },
    });
    expect(events.events.filter((event) => event.type === "repo.checkout_failed")).toHaveLength(1);
  });

  it("reports the first failure when every branch fails to check out", async () => {
    const mirror = new FakeMirror({
      ...healthyPlan(),
      checkoutErrors: {
        main: new GitError("git checkout main failed"),
        [RELEASE]: new CheckoutConflictError("local release branch diverged", RELEASE),
      },
    });

    const outcome = await syncRepository(buildSpec(), mirror, { context: buildContext() });

    expect(outcome.failure).toMatchObject({ kind: "git_error", branch: "main" });
    expect(outcome.failedBranches.map((entry) => [entry.branch, entry.kind])).toEqual([
      ["main", "git_error"],
      [RELEASE, "checkout_conflict"],
    ]);
    expect(outcome.synced).toEqual([]);
    expect(outcome.state?.branchTags).toEqual({});
  });

  it("logs phase changes and the failure", async () => {
    const events = new MemoryEventSink({ runId: "run-test" });
    const mirror = new FakeMirror({ ensureError: new Error("offline") });

    await syncRepository(buildSpec(), mirror, { context: buildContext(), events });

    expect(events.events.map((event) => [event.type, event.payload ?? null])).toEqual([
      ["repo.phase", { phase: "syncing" }],
      ["repo.phase", { phase: "failed" }],
      ["repo.failed", { phase: "syncing", kind: "git_error", message: "offline" }],
    ]);
  });
});

describe("reconcileRepositories", () => {
  it("isolates a failing repository from the others", async () => {
    const specs = [
      buildSpec({ name: "buildroot" }),
      buildSpec({ name: "oe-core" }),
      buildSpec({ name: "opentrons" }),
    ];
    const plans: Record<string, FakeMirrorPlan> = {
      buildroot: healthyPlan(),
      "oe-core": { ensureError: new MirrorUnavailableError("no route to host", "oe-core") },
      opentrons: healthyPlan(),
    };
    const settledOrder: string[] = [];

    const result = await reconcileRepositories({
      specs,
      context: buildContext(),
      createMirror: (spec) => new FakeMirror(plans[spec.name]),
      onRepoSettled: (outcome: RepoOutcome) => settledOrder.push(outcome.name),
    });

    expect(result.ok).toBe(false);
    expect([...result.outcomes.keys()]).toEqual(["buildroot", "oe-core", "opentrons"]);
    expect([...result.outcomes.values()].map((outcome) => outcome.phase)).toEqual([
      "done",
      "failed",
      "done",
    ]);
    expect(settledOrder.sort()).toEqual(["buildroot", "oe-core", "opentrons"]);
  });

  it("records a repository whose task threw outside the pipeline", async () => {
    const result = await reconcileRepositories({
      specs: [buildSpec({ name: "broken" })],
      context: buildContext(),
      createMirror: () => {
        throw new Error("mirror factory exploded");
      },
    });

    expect(result.outcomes.get("broken")).toMatchObject({
      phase: "failed",
      history: ["pending", "failed"],
      failure: { phase: "pending", kind: "git_error", message: "mirror factory exploded" },
    });
  });

  it("bounds the number of repositories processed at once", async () => {
    let active = 0;
    let peak = 0;
    const specs = ["a", "b", "c", "d", "e"].map((name) => buildSpec({ name }));

    const result = await reconcileRepositories({
      specs,
      context: buildContext(),
      maxParallel: 2,
      createMirror: () => {
        const mirror = new FakeMirror({ ...healthyPlan(), delayMs: 10 });
        const ensure = mirror.ensure.bind(mirror);
        mirror.ensure = async () => {
          active += 1;
          peak = Math.max(peak, active);
          try {
            return await ensure();
          } finally {
            active -= 1;
          }
        };
        return mirror;
      },
    });

    expect(result.ok).toBe(true);
    expect(peak).toBe(2);
  });

  it("frames the run with start and complete events", async () => {
    const events = new MemoryEventSink({ runId: "run-test" });

    await reconcileRepositories({
      specs: [buildSpec({ name: "buildroot" })],
      context: buildContext(),
      createMirror: () => new FakeMirror({ ensureError: new Error("offline") }),
      events,
    });

    const first = events.events[0];
    const last = events.events[events.events.length - 1];
    expect(first.type).toBe("run.start");
    expect(first.payload).toEqual({
      channel: "external",
      base_version: "v8.4.1",
      version: "8.4.1",
      prerelease: false,
      release_branch: RELEASE,
      repositories: ["buildroot"],
    });
    expect(last.type).toBe("run.complete");
    expect(last.payload).toEqual({ ok: false, failed: ["buildroot"] });
  });
});
