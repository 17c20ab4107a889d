import { afterEach, describe, expect, it } from "vitest";

import { createTempGitRepo } from "./temp-git-repo.js";

type TempRepoHandle = Awaited<ReturnType<typeof createTempGitRepo>>;

let repoHandle: TempRepoHandle | null = null;

afterEach(async () => {
  if (!repoHandle) return;
  await repoHandle.cleanup();
  repoHandle = null;
});

// =============================================================================
// TESTS
// =============================================================================

describe("temp git repo helper", () => {
  it("creates commits on the requested branch", async () => {
    repoHandle = await createTempGitRepo({ branch: "edge" });

    await repoHandle.writeFile("notes/first.txt", "first\n");
    const firstSha = await repoHandle.commit("first commit");
    const secondSha = await repoHandle.commit("second commit");

    expect(firstSha).not.toEqual(secondSha);
    expect(await repoHandle.git(["rev-parse", "--abbrev-ref", "HEAD"])).toBe("edge");
    expect(await repoHandle.git(["log", "--format=%s"])).toBe("second commit\nfirst commit");
  });

  it("dates annotated tags with the given creator date", async () => {
    repoHandle = await createTempGitRepo();
    await repoHandle.commit("base");

    await repoHandle.tag("v1.0.0", { date: "2024-01-02T03:04:05Z" });

    const created = await repoHandle.git([
      "for-each-ref",
      "--format=%(creatordate:unix)",
      "refs/tags/v1.0.0",
    ]);
    expect(created).toBe(String(Date.UTC(2024, 0, 2, 3, 4, 5) / 1000));
  });
});
