#!/usr/bin/env node

/**
 * tagsweep CLI
 * Pulls recent X posts matching a set of hashtags into data/tweets_<timestamp>.<csv|json>
 */

import { Command, InvalidArgumentError, Option } from "commander";
import * as dotenv from "dotenv";
import { DEFAULT_RESULT_LIMIT, OUTPUT_FORMATS } from "../config/constants";
import { loadAppConfig } from "../core/env";
import { ErrorClassifier } from "../core/errors";
import { listPresets } from "../core/presets";
import { executeSearch, type SearchJobDependencies } from "../core/search-job";
import type { OutputFormat } from "../utils/export";
import { createModuleLogger, enableFileLogging, setLogLevel } from "../utils/logger";

const log = createModuleLogger("CLI");

export interface CliOptions {
  hashtags?: string[];
  preset?: string;
  since?: string;
  until?: string;
  lang?: string;
  limit: number;
  format: OutputFormat;
  outputDir?: string;
  wait: boolean;
  debug: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function createProgram(run: (options: CliOptions) => Promise<number>): Command {
  const program = new Command();

  program
    .name("tagsweep")
    .description("Search recent X posts for a set of hashtags and save them as CSV or JSON")
    .version("1.0.0");

  program
    .option("--hashtags <terms...>", "Hashtags/terms to OR together")
    .addOption(
      new Option("--preset <name>", "Use a preset group of hashtags").choices(listPresets()).conflicts("hashtags")
    )
    .option("--since <date>", "Start date YYYY-MM-DD (UTC, inclusive)")
    .option("--until <date>", "End date YYYY-MM-DD (UTC, inclusive; today means up to now)")
    .option("--lang <code>", "ISO 639-1 language code filter, e.g. es or en")
    .option("--limit <number>", "Maximum number of posts to fetch", parsePositiveInt, DEFAULT_RESULT_LIMIT)
    .addOption(new Option("--format <format>", "Output format").choices([...OUTPUT_FORMATS]).default("csv"))
    .option("--output-dir <dir>", "Directory for the output file (default: $OUTPUT_DIR or ./data)")
    .option("--no-wait", "Do not sleep on rate limit; save partial results")
    .option("-d, --debug", "Show per-page API details and troubleshooting tips", false)
    .action(async () => {
      process.exitCode = await run(program.opts<CliOptions>());
    });

  return program;
}

export interface CliDependencies extends Omit<SearchJobDependencies, "config"> {
  /** Environment to read and to load .env into; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** .env location; dotenv looks in the working directory when omitted */
  envPath?: string;
}

export async function runCli(options: CliOptions, deps: CliDependencies = {}): Promise<number> {
  const { env = process.env, envPath, ...jobDeps } = deps;
  const { parsed } = dotenv.config({ path: envPath, processEnv: {} });
  for (const [key, value] of Object.entries(parsed ?? {})) {
    // variables already set take precedence over .env
    if (env[key] === undefined) env[key] = value;
  }
  enableFileLogging(env.LOG_DIR);
  if (options.debug) {
    setLogLevel("debug");
  }

  try {
    const config = loadAppConfig(env);
    setLogLevel(options.debug ? "debug" : config.logLevel);
    if (options.debug) {
      log.info("🚀 Starting X API search...");
      log.info(`📋 Preset: ${options.preset ?? "custom hashtags"}`);
      log.info(`🔤 Language filter: ${options.lang ?? "any"}`);
      log.info(`📅 Date range: ${options.since ?? "any"} to ${options.until ?? "now"}`);
    }

    const result = await executeSearch(
      {
        query: {
          terms: options.hashtags,
          preset: options.preset,
          language: options.lang,
          since: options.since,
          until: options.until,
          maxResults: options.limit,
        },
        waitOnRateLimit: options.wait,
        format: options.format,
        outputDir: options.outputDir,
        debug: options.debug,
      },
      { ...jobDeps, config }
    );

    for (const line of result.summary) {
      console.log(line);
    }
    return result.exitCode;
  } catch (error) {
    const searchError = ErrorClassifier.classify(error);
    log.debug("Search failed before completion", { error: searchError.toJSON() });
    console.error(`❌ ${searchError.getUserMessage()}`);
    return 1;
  }
}

if (require.main === module) {
  createProgram(runCli)
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error("Fatal error:", error);
      process.exit(1);
    });
}
