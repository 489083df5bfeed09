/**
 * Printing results and errors.
 */

import { getErrorMessage, isServiceError } from "../services/errors";
import type { CliOutput } from "./types";

export const PROGRAM_NAME = "pkl-provisioner";

/**
 * Print a value as a single JSON line on stdout.
 */
export function printJson(output: CliOutput, value: unknown): void {
  output.write(`${JSON.stringify(value)}\n`);
}

/**
 * Report a failed command on stderr.
 *
 * Text mode prints `pkl-provisioner: <message>`; JSON mode prints the
 * serialized error so scripts can branch on its code.
 */
export function reportError(output: CliOutput, error: unknown, json: boolean): void {
  if (!json) {
    output.error(`${PROGRAM_NAME}: ${getErrorMessage(error)}\n`);
    return;
  }
  const payload = isServiceError(error)
    ? error.toJSON()
    : { type: "unknown", message: getErrorMessage(error) };
  output.error(`${JSON.stringify({ error: payload })}\n`);
}
