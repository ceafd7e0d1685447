import { Argument, Command, CommanderError, InvalidArgumentError } from "commander";

import { EXIT_CODES } from "./commands/exit-codes.js";
import { executeList } from "./commands/list.js";
import { executeRun, type RunCommandOptions } from "./commands/run.js";
import {
  executeTrigger,
  TRIGGER_KINDS,
  type TriggerCommandOptions,
  type TriggerKind,
} from "./commands/trigger.js";
import type { CliDeps, CommonOptions } from "./commands/types.js";
import { version } from "./version.js";

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function isTriggerKind(value: string): value is TriggerKind {
  return TRIGGER_KINDS.some((kind) => kind === value);
}

function withCommonOptions(command: Command): Command {
  return command
    .option("-C, --cwd <dir>", "Project directory (default: current directory)")
    .option("--json", "Print the result as JSON")
    .option("-v, --verbose", "Log at debug level");
}

/**
 * Builds the `phaseflow` program. Each action reports its exit code
 * through `setExitCode` instead of exiting the process.
 */
export function createProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name("phaseflow")
    .description("Run workflows of phased, triggerable workers")
    .version(version)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.io.write(text),
      writeErr: (text) => deps.io.writeError(text),
    });

  withCommonOptions(
    program
      .command("run <workflow> [argument]")
      .description("Run a workflow to completion")
      .option("-f, --focus <focus>", "Only dispatch workers matching this focus")
      .option("-i, --interactive", "Ask before moving past each phase")
      .option("-n, --max-iterations <n>", "Cap every validation loop", parsePositiveInt)
      .option("-t, --timeout <ms>", "Deadline for each worker invocation", parsePositiveInt)
  ).action(async (workflow: string, argument: string | undefined, options: RunCommandOptions) => {
    setExitCode(await executeRun(workflow, argument, options, deps));
  });

  withCommonOptions(
    program.command("list").description("List available workflows and workers")
  ).action(async (options: CommonOptions) => {
    setExitCode(await executeList(options, deps));
  });

  withCommonOptions(
    program
      .command("trigger")
      .description("Run the workers an observed event selects")
      .addArgument(new Argument("<kind>", "Event kind").choices(TRIGGER_KINDS))
      .argument("<value>", "File path, error text or command line")
      .option("-y, --yes", "Run workers that need confirmation without asking")
      .option("-t, --timeout <ms>", "Deadline for each worker invocation", parsePositiveInt)
  ).action(async (kind: string, value: string, options: TriggerCommandOptions) => {
    if (!isTriggerKind(kind)) {
      throw new InvalidArgumentError(`Unknown event kind "${kind}".`);
    }
    setExitCode(await executeTrigger(kind, value, options, deps));
  });

  return program;
}

/**
 * Parses `argv` (without the node and script entries) and runs the
 * selected command.
 *
 * @returns The process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let exitCode: number = EXIT_CODES.Succeeded;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.Succeeded : EXIT_CODES.USAGE_ERROR;
    }
    throw error;
  }

  return exitCode;
}
