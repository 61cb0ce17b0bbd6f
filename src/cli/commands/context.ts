/**
 * Context commands — literature, foods, combined.
 */

import type { Command } from "commander";
import { loadConfig } from "../../config/loader.js";
import {
  ContextService,
  createFoodAggregator,
  createLiteraturePipeline,
  type BuildOptions,
} from "../../context/service.js";
import { ConfigurationError } from "../../errors.js";
import { LogLevel, type TermContextConfig } from "../../schemas/config.js";

export interface GlobalOptions {
  config?: string;
  logLevel?: string;
}

/** Config file plus the --log-level override. */
export async function resolveCliConfig(opts: GlobalOptions): Promise<TermContextConfig> {
  const config = await loadConfig(opts.config);
  if (opts.logLevel === undefined) return config;

  const level = LogLevel.safeParse(opts.logLevel);
  if (!level.success) {
    throw new ConfigurationError("CONFIG_INVALID", `Unknown log level: ${opts.logLevel}`);
  }
  return { ...config, logLevel: level.data };
}

async function runCommand(
  program: Command,
  build: BuildOptions,
  produce: (config: TermContextConfig) => Promise<string>,
): Promise<void> {
  try {
    const config = await resolveCliConfig(program.opts<GlobalOptions>());
    console.log(await produce(config));
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`❌ ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

/**
 * Register the context commands. `build` is passed to every pipeline
 * builder (tests inject fetch, env and logger through it).
 */
export function registerContextCommands(program: Command, build: BuildOptions = {}): void {
  program
    .command("literature <terms...>")
    .description("Relevant arXiv abstracts per term, joined in input order")
    .action(async (terms: string[]) => {
      await runCommand(program, build, (config) =>
        createLiteraturePipeline(config, build).orchestrator.resolveAll(terms),
      );
    });

  program
    .command("foods <terms...>")
    .description("FoodData Central summaries under the global token budget")
    .action(async (terms: string[]) => {
      await runCommand(program, build, (config) => createFoodAggregator(config, build).aggregate(terms));
    });

  program
    .command("combined <terms...>")
    .description("Food summaries followed by literature context")
    .action(async (terms: string[]) => {
      await runCommand(program, build, (config) =>
        ContextService.fromConfig(config, build).buildContext(terms),
      );
    });
}
