import { stderr, stdin, stdout } from "node:process";
import { createInterface, type Interface } from "node:readline/promises";

// =============================================================================
// TYPES
// =============================================================================

export type PromptStreams = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

export interface ReleasePrompter {
  choose<T extends string>(question: string, choices: readonly T[], fallback: T): Promise<T>;
  ask(question: string, fallback: string): Promise<string>;
  close(): void;
}

// =============================================================================
// CONSOLE PROMPTER
// =============================================================================

export class ConsoleReleasePrompter implements ReleasePrompter {
  private rl: Interface | null = null;

  constructor(readonly streams: PromptStreams = { input: stdin, output: stdout }) {}

  async choose<T extends string>(question: string, choices: readonly T[], fallback: T): Promise<T> {
    for (;;) {
      const answer = await this.ask(`${question} [${choices.join("/")}]`, fallback);
      const match = choices.find((choice) => choice === answer.toLowerCase());
      if (match) return match;
      this.streams.output.write(`Please choose one of: ${choices.join(", ")}\n`);
    }
  }

  async ask(question: string, fallback: string): Promise<string> {
    const answer = await this.session().question(`${question} (${fallback}): `);
    const trimmed = answer.trim();
    return trimmed.length > 0 ? trimmed : fallback;
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  private session(): Interface {
    this.rl ??= createInterface(this.streams);
    return this.rl;
  }
}

/** Answers every question with its default; used for `--no-input`. */
export class DefaultsReleasePrompter implements ReleasePrompter {
  async choose<T extends string>(_question: string, _choices: readonly T[], fallback: T): Promise<T> {
    return fallback;
  }

  async ask(_question: string, fallback: string): Promise<string> {
    return fallback;
  }

  close(): void {}
}

// Under --json stdout carries only the report, so questions go to stderr.
export function createReleasePrompter(options: {
  interactive: boolean;
  json?: boolean;
}): ReleasePrompter {
  if (!options.interactive) return new DefaultsReleasePrompter();
  return new ConsoleReleasePrompter({ input: stdin, output: options.json ? stderr : stdout });
}
