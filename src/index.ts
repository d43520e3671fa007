#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig } from "./config/index.js";
import { loadVocabulary } from "./config/vocabulary.js";
import { Logger, isLogLevel } from "./core/logger.js";
import { BrowserManager } from "./core/browser-manager.js";
import { RunAbortedError } from "./core/errors.js";
import { BatchRunner } from "./services/batch-runner.js";
import { createPortalSteps } from "./services/shop-pipeline.js";
import { loadRegistry, registryOverrides, toRunOptions } from "./services/registry.js";
import { serializeReport, writeReport } from "./services/report.js";
import { DEFAULT_OUTPUT_FILE } from "./constants.js";
import type { CrawlReport } from "./types.js";

async function main(): Promise<number> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName("pds-shop-crawler")
    .usage("$0 --registry <file> [options]")
    .option("registry", {
      type: "string",
      demandOption: true,
      describe: "JSON file with { shops: [{ id, district, taluk }], options? }",
    })
    .option("output", {
      type: "string",
      default: DEFAULT_OUTPUT_FILE,
      describe: "Where to write the crawl report",
    })
    .option("stdout", {
      type: "boolean",
      default: false,
      describe: "Also print the report to stdout",
    })
    .option("headless", { type: "boolean", describe: "Run Chromium headless" })
    .option("include-details", {
      type: "boolean",
      describe: "Open the last-transaction dialog of online shops",
    })
    .option("time-budget", { type: "number", describe: "Stop starting new shops after this many ms" })
    .option("artifacts-dir", { type: "string", describe: "Directory for failure screenshots and HTML" })
    .option("log-level", {
      type: "string",
      default: process.env.PDS_LOG_LEVEL ?? "info",
      describe: "debug | info | warn | error",
    })
    .strict()
    .parseAsync();

  const level = argv["log-level"];
  if (!isLogLevel(level)) {
    console.error(`Invalid --log-level '${level}'`);
    return 1;
  }
  const logger = new Logger(level);

  const registry = loadRegistry(argv.registry);
  const config = loadConfig({
    overrides: {
      ...registryOverrides(registry),
      headless: argv.headless,
      include_details: argv["include-details"],
      time_budget_ms: argv["time-budget"],
      artifacts_dir: argv["artifacts-dir"],
    },
  });
  const options = toRunOptions(config);
  const vocabulary = loadVocabulary(config.vocabulary_path);
  logger.info("Config loaded", {
    shops: registry.shops.length,
    headless: options.headless,
    include_details: options.includeDetails,
    max_attempts: config.max_attempts,
    time_budget_ms: config.time_budget_ms,
  });

  const browserManager = new BrowserManager(logger.child("browser"), config);
  const runner = new BatchRunner({
    factory: () => browserManager.openSession(),
    steps: createPortalSteps(config, vocabulary),
    options,
    settings: {
      maxAttempts: config.max_attempts,
      retryPauseMs: config.retry_pause_ms,
      artifactsDir: config.artifacts_dir,
      timeBudgetMs: config.time_budget_ms,
    },
    logger,
  });

  // First signal finishes the current shop; a second one exits immediately
  const controller = new AbortController();
  const onSignal = (name: string) => {
    if (controller.signal.aborted) process.exit(130);
    logger.warn(`${name} received, stopping after the current shop...`);
    controller.abort();
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  let report: CrawlReport;
  let exitCode = 0;
  try {
    report = await runner.run(registry.shops, controller.signal);
  } catch (error) {
    if (!(error instanceof RunAbortedError)) throw error;
    logger.error(error.message);
    report = error.report;
    exitCode = 1;
  } finally {
    await browserManager.close();
  }

  writeReport(argv.output, report);
  logger.info(`Report written to ${argv.output}`, report.summary);
  if (argv.stdout) {
    process.stdout.write(serializeReport(report));
  }
  return exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
