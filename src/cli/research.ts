#!/usr/bin/env node
/**
 * CLI command to run the research pipeline for one topic.
 *
 * Configuration is layered: built-in defaults, then environment
 * variables (see .env.example), then the JSON file given by --config.
 *
 * Usage:
 *   npx tsx src/cli/research.ts --topic "offshore wind" [options]
 *   npm start -- --topic "offshore wind"
 *
 * Options:
 *   --topic <text>        Research topic (required)
 *   --query <text>        Search query (default: the topic)
 *   --format <format>     markdown | html | pdf (default: html)
 *   --max-sources <n>     Maximum research results (default: 5)
 *   --config <path>       JSON file with pipeline configuration overrides
 *   --json                Print the run report as JSON
 *   -h, --help            Show help
 *
 * Exit codes:
 *   0 - Run succeeded, or failed only after research
 *   1 - Research failed
 *   2 - Invalid arguments or configuration
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  config as appConfig,
  loadPipelineConfig,
  pipelineOverridesFromEnv,
  validateConfig,
  ConfigError,
  type PipelineConfig,
} from "../config/index.js";
import { WorkflowCoordinator, type RunReport, type StepResult } from "../coordinator/index.js";
import { describeError, ValidationError } from "../errors/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import { createDefaultAdapters } from "../stages/index.js";
import { SourceStore } from "../store/index.js";

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: research --topic <text> [options]

Options:
  --topic <text>        Research topic (required)
  --query <text>        Search query (default: the topic)
  --format <format>     markdown | html | pdf (default: html)
  --max-sources <n>     Maximum research results (default: 5)
  --config <path>       JSON file with pipeline configuration overrides
  --json                Print the run report as JSON
  -h, --help            Show this help message
`;

interface CliArgs {
  topic: string;
  query?: string;
  format?: string;
  maxSources?: number;
  configPath?: string;
  json: boolean;
}

function parseCliArgs(): CliArgs | null {
  const { values } = parseArgs({
    options: {
      topic: { type: "string" },
      query: { type: "string" },
      format: { type: "string" },
      "max-sources": { type: "string" },
      config: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    return null;
  }

  if (values.topic === undefined) {
    throw new ValidationError("--topic is required");
  }

  let maxSources: number | undefined;
  if (values["max-sources"] !== undefined) {
    maxSources = Number(values["max-sources"]);
    if (!Number.isInteger(maxSources)) {
      throw new ValidationError(`--max-sources must be an integer, got "${values["max-sources"]}"`);
    }
  }

  return {
    topic: values.topic,
    query: values.query,
    format: values.format,
    maxSources,
    configPath: values.config,
    json: values.json,
  };
}

function loadConfigFile(path: string): unknown {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new ConfigError(`Config file not found: ${fullPath}`);
  }
  try {
    return JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${fullPath} (${describeError(err)})`);
  }
}

function loadConfig(args: CliArgs): PipelineConfig {
  const overrides: unknown[] = [pipelineOverridesFromEnv()];
  if (args.configPath) overrides.push(loadConfigFile(args.configPath));
  return loadPipelineConfig(...overrides);
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printStep(step: StepResult): void {
  const mark = step.status === "completed" ? c("green", "✓") : c("red", "✗");
  const attempts = step.attempts === 1 ? "1 attempt" : `${step.attempts} attempts`;
  console.log(
    `${mark} ${c("bold", step.stepName.padEnd(13))} ${step.agentName.padEnd(18)} ${c("dim", `${attempts}, ${step.durationMs}ms`)}`
  );
  if (step.status === "error") {
    console.log(`    ${c("red", "•")} ${step.error}`);
  } else if (step.stepName === "rendering") {
    const report = step.result["report"];
    if (report !== null && typeof report === "object" && !Array.isArray(report)) {
      console.log(`    ${c("dim", "•")} ${String(report["filepath"])}`);
    }
  }
}

function printReport(report: RunReport): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", ` Research: ${report.topic}`));
  console.log(c("dim", ` Run ${report.runId}`));
  console.log(c("bold", "═".repeat(60)));
  console.log("");

  for (const step of report.steps) printStep(step);

  console.log("");
  const { persistence } = report;
  if (persistence.status === "stored") {
    console.log(
      `Sources stored: ${persistence.added} added, ${persistence.duplicates} duplicates, ${persistence.errors} errors`
    );
  } else if (persistence.status === "skipped") {
    console.log(c("dim", `Sources not stored: ${persistence.reason}`));
  } else {
    console.log(c("yellow", `Storing sources failed: ${persistence.error}`));
  }

  console.log("─".repeat(60));
  const color = report.overallStatus === "success" ? "green" : report.overallStatus === "failure" ? "red" : "yellow";
  console.log(c(color, `${report.overallStatus} in ${report.durationMs}ms`));
  console.log("─".repeat(60));
  console.log("");
}

// ============================================================
// Main
// ============================================================

async function execute(args: CliArgs, config: PipelineConfig, logger: Logger): Promise<number> {
  logger.info("Research CLI starting", {
    topic: args.topic,
    searchProvider: config.research.searchProvider,
    dbPath: config.store.dbPath,
  });
  const store = await SourceStore.open(config.store, { logger });
  const coordinator = new WorkflowCoordinator({
    config,
    adapters: createDefaultAdapters(config, { store, logger }),
    store,
    logger,
  });

  try {
    const report = await coordinator.run({
      topic: args.topic,
      query: args.query,
      format: args.format,
      maxSources: args.maxSources,
    });

    if (args.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(report);
    }
    return report.overallStatus === "failure" ? 1 : 0;
  } finally {
    await coordinator.cleanup();
    await store.close();
  }
}

async function main(): Promise<number> {
  let args: CliArgs | null;
  let config: PipelineConfig;
  try {
    validateConfig();
    args = parseCliArgs();
    if (!args) return 0;
    config = loadConfig(args);
  } catch (err) {
    console.error(err instanceof ValidationError ? err.format() : describeError(err));
    return 2;
  }

  initRunId();
  const logger = createLogger({
    level: appConfig.logLevel,
    logDir: appConfig.logDir,
    logFile: "research.log",
    console: !args.json,
  });

  try {
    return await execute(args, config, logger);
  } catch (err) {
    if (err instanceof ValidationError) {
      console.error(err.format());
      return 2;
    }
    throw err;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Unexpected error:", err);
    process.exitCode = 1;
  }
);
