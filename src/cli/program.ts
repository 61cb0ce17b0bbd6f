/**
 * termctx command-line program.
 */

import { Command } from "commander";
import type { BuildOptions } from "../context/service.js";
import { registerContextCommands } from "./commands/context.js";

export function createProgram(build: BuildOptions = {}): Command {
  const program = new Command();
  program
    .name("termctx")
    .description("Fetch bounded, relevance-filtered context for a batch of query terms")
    .version("0.1.0")
    .option("-c, --config <file>", "YAML config file")
    .option("--log-level <level>", "debug | info | warn | error | silent");

  registerContextCommands(program, build);
  return program;
}
