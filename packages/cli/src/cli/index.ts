#!/usr/bin/env node
// pattern: Imperative Shell

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { Command, Option } from "@commander-js/extra-typings";

import {
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
} from "../logger/index.js";

import { makeSchemaCommand } from "./schema/index.js";
import { parseChoice } from "./_utils/parse-options.js";
import { reportCliError } from "./_utils/with-error-handling.js";
import { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./_deps.js";
import { setConfigPath, setNoParentFlag, setStartDir } from "./_globals.js";
import { makeEnvCommand } from "./env.js";
import { makeProbeCommand } from "./probe.js";
import { makeVerifyCommand } from "./verify.js";

// Determine defaults based on environment
function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env["SEALCHECK_LOG_LEVEL"];
  return LOG_LEVELS.find(level => level === envLevel) ?? "info";
}

function isNonInteractive(): boolean {
  return (
    !process.stdout.isTTY || process.env["SEALCHECK_NON_INTERACTIVE"] === "1"
  );
}

function getDefaultLogFormat(): LogFormat {
  return isNonInteractive() ? "json" : "nice";
}

// Define the root command
export const rootCommand = new Command("sealcheck")
  .version("0.1.0")
  .description("verify that a build succeeds with no network access")
  // Global options go before the command, so `--format` stays free for subcommands
  .enablePositionalOptions()
  .addOption(
    new Option("-l, --log-level <level>", "Set log level")
      .choices(LOG_LEVELS)
      .default(getDefaultLogLevel())
      .argParser(parseChoice(LOG_LEVELS))
  )
  .addOption(
    new Option("--non-interactive", "Disable interactive features").default(
      isNonInteractive()
    )
  )
  .addOption(
    new Option("-f, --format <format>", "Log output format")
      .choices(LOG_FORMATS)
      .default(getDefaultLogFormat())
      .argParser(parseChoice(LOG_FORMATS))
  )
  .addOption(
    new Option("-c, --config <path>", "Use this config file, skipping the search")
  )
  .addOption(
    new Option("-d, --dir <path>", "Directory the config file search starts from")
  )
  .addOption(
    new Option(
      "--no-parent",
      "Only search for config files in the start directory, do not search parent directories"
    )
  )
  .hook("preAction", thisCommand => {
    // Configure CLI_LOGGER and the config search before any action runs
    const options = thisCommand.opts();

    initializeLogger(options.format, options.nonInteractive);
    setCliLogLevel(options.logLevel);
    CLI_LOGGER.debug(
      `Log level configured to: ${options.logLevel}, format: ${options.format}, non-interactive: ${options.nonInteractive}`
    );

    setStartDir(options.dir);
    if (options.dir) {
      CLI_LOGGER.debug(`Start directory override: ${options.dir}`);
    }

    setConfigPath(options.config);
    if (options.config) {
      CLI_LOGGER.debug(`Config file override: ${options.config}`);
    }

    // --no-parent makes commander store `parent: false`
    setNoParentFlag(!options.parent);
    if (!options.parent) {
      CLI_LOGGER.debug(
        "No-parent flag enabled: config search will not climb parent directories"
      );
    }
  })
  .addCommand(makeVerifyCommand())
  .addCommand(makeProbeCommand())
  .addCommand(makeEnvCommand())
  .addCommand(makeSchemaCommand());

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  // Errors before the preAction hook (config loading included) still get a logger
  initializeLogger(getDefaultLogFormat(), isNonInteractive());

  // Actions report their own errors; this catches the preAction hook's
  await rootCommand.parseAsync(process.argv).catch(reportCliError);
}
