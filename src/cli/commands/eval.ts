import type { Command } from "commander";
import { ProcessError } from "../../services/errors";
import { ensurePkl } from "../ensure-pkl";
import type { CliDeps, GlobalOptions } from "../types";

interface EvalOptions {
  readonly yes: boolean;
}

/**
 * `eval <module>`: evaluate a Pkl module to JSON with the pkl binary.
 */
export function attachEvalCommand(program: Command, deps: CliDeps): void {
  program
    .command("eval")
    .description("Evaluate a Pkl module and print it as JSON")
    .argument("<module>", "Pkl module to evaluate")
    .option("-y, --yes", "Install pkl without asking if it is missing", false)
    .action(async (module: string, options: EvalOptions) => {
      const services = await deps.createServices(program.opts<GlobalOptions>());
      const pkl = await ensurePkl(services, { assumeYes: options.yes });

      const result = await services.processRunner
        .run(pkl.path, ["eval", "--format", "json", module])
        .wait();

      if (result.exitCode !== 0) {
        const detail =
          result.stderr.trim() ||
          (result.signal !== undefined ? `terminated by ${result.signal}` : `exit code ${String(result.exitCode)}`);
        throw new ProcessError(`pkl eval failed: ${detail}`, "EXIT_CODE");
      }

      deps.output.write(result.stdout.endsWith("\n") ? result.stdout : `${result.stdout}\n`);
    });
}
