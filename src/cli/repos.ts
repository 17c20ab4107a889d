import type { RepositorySpec } from "../core/repository-spec.js";

import { renderTable } from "./table.js";

export function reposCommand(specs: readonly RepositorySpec[], opts: { json?: boolean }): void {
  if (opts.json) {
    console.log(JSON.stringify(specs, null, 2));
    return;
  }

  for (const line of renderRepositoryList(specs)) {
    console.log(line);
  }
}

export function renderRepositoryList(specs: readonly RepositorySpec[]): string[] {
  return renderTable({
    headers: ["Repository", "Primary", "Release branch", "Tag patterns", "Mirror"],
    rows: specs.map((spec) => [
      spec.name,
      spec.primaryBranch,
      spec.wantsReleaseBranch ? spec.releaseBranchPolicy : "off",
      spec.tagPatterns.join(", "),
      spec.localPath,
    ]),
  });
}
