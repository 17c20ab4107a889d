import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTempGitRepo, type TempGitRepo } from "../../../__tests__/helpers/temp-git-repo.js";
import { createRepositorySpec } from "../../../core/repository-spec.js";
import { GitMirror } from "../../../git/mirror.js";
import { reconcileRepositories } from "../reconcile.js";
import { buildChangeSummaries, buildCompareRows, buildSummaryRows } from "../report.js";

import { buildContext } from "./fakes.js";

describe("reconcileRepositories (integration)", () => {
  let upstream: TempGitRepo;

  beforeEach(async () => {
    upstream = await createTempGitRepo({ branch: "edge" });
    await upstream.commit("base", { date: "2024-03-01T00:00:00Z" });
    await upstream.tag("v8.4.0", { date: "2024-03-02T00:00:00Z" });
    await upstream.commit("edge work", { date: "2024-03-03T00:00:00Z" });

    await upstream.git(["checkout", "-b", "chore_release-8.4.1", "v8.4.0"]);
    await upstream.commit("release fix", { date: "2024-03-04T00:00:00Z" });
    await upstream.tag("v8.4.1-alpha.0", { date: "2024-03-05T00:00:00Z" });
    await upstream.git(["checkout", "edge"]);
  });

  afterEach(async () => {
    await upstream.cleanup();
  });

  it("syncs real mirrors and reports tags, links and changes", async () => {
    const mirrorRoot = path.join(upstream.tempRoot, "mirrors");
    const specs = [
      createRepositorySpec(
        {
          name: "opentrons",
          url: upstream.repoDir,
          primary_branch: "edge",
          track_release_branch: true,
          release_branch_policy: "exact",
          tag_patterns: { external: "v", internal: "ot3@" },
          extra_tag_patterns: [],
        },
        mirrorRoot,
      ),
      createRepositorySpec(
        {
          name: "missing",
          url: path.join(upstream.tempRoot, "nowhere"),
          primary_branch: "main",
          track_release_branch: true,
          release_branch_policy: "exact",
          tag_patterns: { external: "v", internal: "internal@" },
          extra_tag_patterns: [],
        },
        mirrorRoot,
      ),
    ];
    const createMirror = (spec: (typeof specs)[number]) => new GitMirror(spec);

    const result = await reconcileRepositories({
      specs,
      context: buildContext("v8.4.1"),
      createMirror,
    });

    expect(result.ok).toBe(false);
    expect(result.outcomes.get("missing")?.failure?.kind).toBe("remote_unreachable");

    const opentrons = result.outcomes.get("opentrons");
    expect(opentrons?.phase).toBe("done");
    expect(opentrons?.state?.branchTags).toEqual({
      edge: { v: ["v8.4.0"], "ot3@": [] },
      "chore_release-8.4.1": { v: ["v8.4.1-alpha.0", "v8.4.0"], "ot3@": [] },
    });

    const [summary] = buildSummaryRows(specs, result);
    expect(summary).toEqual({
      repo: "opentrons",
      kind: "ok",
      pattern: "v",
      branch: "chore_release-8.4.1",
      tag: "v8.4.1-alpha.0",
      latestAnywhere: "v8.4.1-alpha.0",
    });

    const compare = buildCompareRows(specs, result);
    expect(compare[0]).toMatchObject({
      url: `${upstream.repoDir}/compare/v8.4.1-alpha.0...chore_release-8.4.1`,
    });

    const changes = await buildChangeSummaries(specs, compare, createMirror);
    expect(changes).toEqual([
      {
        repo: "opentrons",
        kind: "no_changes",
        tag: "v8.4.1-alpha.0",
        branch: "chore_release-8.4.1",
      },
    ]);
  });
});
