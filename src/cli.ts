#!/usr/bin/env node

import { Command } from "commander";
import { z } from "zod";
import { runApp } from "./app.js";
import { getConfig, loadEnvConfig, mergeConfig, type DeepPartial, type LifelineConfig } from "./config.js";
import { processRunner } from "./runners/process.js";
import { parseDuration } from "./schemas.js";
import { log, setLogLevel } from "./utils/logger.js";

type ExecOptions = {
  shutdownTimeout?: string;
  cleanupTimeout?: string;
  forceOnRepeat?: boolean;
};

const program = new Command();

program
  .name("lifeline")
  .description("Run processes side by side and shut them all down together")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals<{ debug?: boolean }>();
  if (opts.debug) setLogLevel("debug");
});

function durationOption(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const ms = parseDuration(value);
  if (ms === undefined) {
    program.error(`error: option '${flag}' must be a duration such as 500ms, 15s or 2m (got "${value}")`);
  }
  return ms;
}

// --- exec ---
program
  .command("exec")
  .description("Run each command as a child process; stop all of them when one fails or on Ctrl+C")
  .argument("<commands...>", "Shell commands to run concurrently")
  .option("--shutdown-timeout <duration>", "How long to wait for processes to exit after stopping them")
  .option("--cleanup-timeout <duration>", "Deadline for the cleanup step")
  .option("--force-on-repeat", "Stop waiting when a second termination signal arrives")
  .action(async (commands: string[], opts: ExecOptions) => {
    const overrides: DeepPartial<LifelineConfig> = {
      shutdown: {
        timeoutMs: durationOption("--shutdown-timeout", opts.shutdownTimeout),
        repeatSignal: opts.forceOnRepeat ? "force" : undefined,
      },
      cleanup: { timeoutMs: durationOption("--cleanup-timeout", opts.cleanupTimeout) },
    };

    await runApp(
      ({ logger }) => ({
        runners: commands.map((command, i) =>
          processRunner(command, { name: `${i}:${command}`, logger: logger.child({ process: i }) }),
        ),
      }),
      {
        schema: z.object({}),
        config: overrides,
        exit: (code) => {
          process.exitCode = code;
        },
      },
    );
  });

// --- config ---
program
  .command("config")
  .description("Print the effective configuration (defaults plus LIFELINE_* environment variables)")
  .action(() => {
    try {
      console.log(JSON.stringify(mergeConfig(getConfig(), loadEnvConfig()), null, 2));
    } catch (err) {
      log.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
