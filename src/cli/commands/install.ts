import { resolve } from "node:path";
import type { Command } from "commander";
import { ensurePkl } from "../ensure-pkl";
import { printJson } from "../output";
import type { CliDeps, GlobalOptions } from "../types";

interface InstallOptions {
  readonly path?: string;
  readonly yes: boolean;
}

/**
 * `install`: install pkl unless it is already on PATH, then print its location.
 */
export function attachInstallCommand(program: Command, deps: CliDeps): void {
  program
    .command("install")
    .description("Install pkl if it is not on PATH")
    .option("--path <file>", "Install to this file, even if pkl is on PATH")
    .option("-y, --yes", "Install without asking", false)
    .action(async (options: InstallOptions) => {
      const globals = program.opts<GlobalOptions>();
      const services = await deps.createServices(globals);

      const location = await ensurePkl(services, {
        assumeYes: options.yes,
        ...(options.path !== undefined && { targetPath: resolve(options.path) }),
      });

      if (globals.json) {
        printJson(deps.output, location);
      } else if (location.installed) {
        deps.output.write(`Installed pkl at ${location.path}\n`);
      } else {
        deps.output.write(`Using pkl at ${location.path}\n`);
      }
    });
}
