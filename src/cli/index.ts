import { Command } from "commander";

import { loadConfigForCli } from "./config.js";
import { manifestsCommand } from "./manifests.js";
import { reposCommand } from "./repos.js";
import { syncCommand } from "./sync.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("release-sync")
    .description("Mirror release repositories and report their release tags")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Override config path (defaults to ./release-sync.yaml, then the packaged config)",
    )
    .option("--debug", "Show error codes, causes and stack traces");

  program
    .command("sync")
    .description("Fetch every repository, resolve release branches and report tags")
    .option("--channel <channel>", "Release channel: external or internal")
    .option("--stability <stability>", "Stability: stable or unstable")
    .option("--base-version <version>", "Base version, e.g. v8.4.0")
    .option("--no-input", "Do not prompt; take defaults for anything not given")
    .option("--max-parallel <n>", "Repositories processed at once", (v) => parseInt(v, 10))
    .option("--json", "Emit JSON output", false)
    .option("--log-file <path>", "Append structured run events (JSONL) to this file")
    .action(async (opts, command: Command) => {
      const globals = command.optsWithGlobals<{ config?: string }>();
      const { config, specs } = loadConfigForCli({ explicitConfigPath: globals.config });
      await syncCommand(config, specs, {
        channel: opts.channel,
        stability: opts.stability,
        baseVersion: opts.baseVersion,
        input: opts.input,
        maxParallel: opts.maxParallel,
        json: opts.json,
        logFile: opts.logFile,
      });
    });

  program
    .command("manifests")
    .description("Show the published app and robot release manifests")
    .option("--channel <channel>", "Release channel: external or internal", "external")
    .option("--json", "Emit JSON output", false)
    .action(async (opts, command: Command) => {
      const globals = command.optsWithGlobals<{ config?: string }>();
      const { config } = loadConfigForCli({ explicitConfigPath: globals.config });
      await manifestsCommand(config, { channel: opts.channel, json: opts.json });
    });

  program
    .command("repos")
    .description("List configured repositories")
    .option("--json", "Emit JSON output", false)
    .action((opts, command: Command) => {
      const globals = command.optsWithGlobals<{ config?: string }>();
      const { specs } = loadConfigForCli({ explicitConfigPath: globals.config });
      reposCommand(specs, { json: opts.json });
    });

  return program;
}
