/**
 * Command-line layer public API.
 */

export { runCli, createProgram } from "./program";
export { createCliServices, type BootstrapOptions } from "./bootstrap";
export { ensurePkl, PKL_NOT_FOUND_MESSAGE, type EnsurePklOptions, type PklLocation } from "./ensure-pkl";
export { ReadlinePrompter, type Prompter, type PromptInput } from "./prompter";
export type { CliDeps, CliOutput, CliServices, GlobalOptions } from "./types";
