/**
 * Command-line program: global options, commands and exit codes.
 */

import { Command, CommanderError } from "commander";
import { attachVersionCommand } from "./commands/version";
import { attachInstallCommand } from "./commands/install";
import { attachEvalCommand } from "./commands/eval";
import { PROGRAM_NAME, reportError } from "./output";
import type { CliDeps, GlobalOptions } from "./types";

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Build the commander program. Commander's own exits (help, usage errors)
 * are turned into CommanderErrors instead of calling process.exit.
 */
export function createProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description("Installs the pkl CLI on demand and evaluates Pkl modules")
    .option("-v, --verbose", "Increase log verbosity (repeatable)", increaseVerbosity, 0)
    .option("--config <path>", "Path of config.json")
    .option("--json", "Output JSON for scripting", false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.output.write(text),
      writeErr: (text) => deps.output.error(text),
    });

  attachVersionCommand(program, deps);
  attachInstallCommand(program, deps);
  attachEvalCommand(program, deps);

  return program;
}

/**
 * Run the program with user arguments (argv without node and script).
 *
 * @returns Process exit code
 */
export async function runCli(args: readonly string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync([...args], { from: "user" });
    return 0;
  } catch (error) {
    // Commander has already printed help or the usage error
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    reportError(deps.output, error, program.opts<GlobalOptions>().json);
    return 1;
  }
}
