import { execa, ExecaError } from "execa";

import { GitError } from "../core/errors.js";

export const DEFAULT_GIT_TIMEOUT_MS = 120_000;

export type GitRunOptions = {
  /** Kills the git process after this many milliseconds. */
  timeoutMs?: number;
  env?: Record<string, string>;
};

export type GitResult = {
  stdout: string;
  stderr: string;
};

/**
 * Run one git command. Non-zero exits, spawn failures and timeouts all become
 * a GitError carrying the captured output.
 */
export async function git(
  cwd: string,
  args: string[],
  opts: GitRunOptions = {},
): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      timeout: opts.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS,
      // Never block on a credential prompt; an unreachable remote should fail fast.
      env: { GIT_TERMINAL_PROMPT: "0", ...opts.env },
    });
    return { stdout: res.stdout, stderr: res.stderr };
  } catch (err) {
    throw buildGitErrorFromCommand(args, cwd, err);
  }
}

/** Like `git`, but only the trimmed stdout. */
export async function gitOutput(
  cwd: string,
  args: string[],
  opts: GitRunOptions = {},
): Promise<string> {
  const res = await git(cwd, args, opts);
  return res.stdout.trim();
}

export function isTimeoutError(err: unknown): boolean {
  return err instanceof GitError && err.output?.timedOut === true;
}

/** `git pull --ff-only` refusing to move a branch that has diverged from its upstream. */
export function isFastForwardRejection(err: unknown): boolean {
  if (!(err instanceof GitError)) return false;

  const output = `${err.output?.stdout ?? ""}\n${err.output?.stderr ?? ""}`.toLowerCase();
  return (
    output.includes("not possible to fast-forward") ||
    output.includes("diverging branches") ||
    output.includes("have diverged")
  );
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

function buildGitErrorFromCommand(args: string[], cwd: string, err: unknown): GitError {
  const { stdout, stderr, message, timedOut } = resolveExecaErrorOutput(err);
  const detail = timedOut ? "timed out" : stderr || message || "Unknown git error.";
  return new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${detail}`, {
    stdout,
    stderr,
    timedOut,
  });
}

function resolveExecaErrorOutput(err: unknown): {
  stdout: string;
  stderr: string;
  message: string;
  timedOut: boolean;
} {
  if (!(err instanceof ExecaError)) {
    const message = err instanceof Error ? err.message : String(err);
    return { stdout: "", stderr: "", message, timedOut: false };
  }

  return {
    stdout: asText(err.stdout),
    stderr: asText(err.stderr).trim(),
    message: err.message,
    timedOut: err.timedOut,
  };
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  return value ? String(value) : "";
}
