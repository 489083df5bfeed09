import type { Command } from "commander";
import { PROGRAM_NAME, printJson } from "../output";
import type { CliDeps, GlobalOptions } from "../types";

export function attachVersionCommand(program: Command, deps: CliDeps): void {
  program
    .command("version")
    .description("Print the version")
    .action(() => {
      const { json } = program.opts<GlobalOptions>();
      const { platform, arch } = deps.platformInfo;
      if (json) {
        printJson(deps.output, { version: deps.version, platform, arch });
        return;
      }
      deps.output.write(`${PROGRAM_NAME} version ${deps.version} ${platform}/${arch}\n`);
    });
}
