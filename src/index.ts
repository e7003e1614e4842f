#!/usr/bin/env node

import { ConfigError } from "./errors";
import { ConfigLoaderService } from "./services/config-loader.service";
import { disableTerminalPrompts } from "./services/git.service";
import { HealthService, formatHealthReport } from "./services/health.service";
import { Logger } from "./services/logger.service";
import { ReconciliationService } from "./services/reconciliation.service";
import { SchedulerService } from "./services/scheduler.service";
import { parseArguments } from "./utils/cli";
import { parseSchedule } from "./utils/cron";
import { getErrorMessage } from "./utils/error-message";

import type { Config } from "./types";
import type { CliOptions } from "./utils/cli";

async function runHealthCheck(options: CliOptions): Promise<void> {
  const loader = new ConfigLoaderService();
  const problems: string[] = [];

  try {
    await loader.resolveConfig(options);
  } catch (error) {
    problems.push(getErrorMessage(error));
  }

  const health = new HealthService(loader.resolveStatusFile(options));
  const report = await health.check(problems);
  console.log(formatHealthReport(report));
  process.exit(report.healthy ? 0 : 1);
}

function printStartupBanner(config: Config, logger: Logger): void {
  logger.info("📋 Configuration:");
  logger.info(`   Token: ${config.token ? "***SET***" : "NOT SET"}`);
  logger.info(`   Users: ${config.accounts.join(", ")}`);
  logger.info(`   Base directory: ${config.baseDir}`);
  logger.info(`   Sync mode: ${config.syncMode}`);
  if (config.syncMode === "selective") {
    logger.info(`   Branch patterns: ${config.branchPatterns}`);
  }
  logger.info(`   Create new branches: ${config.createNewBranches}`);
  logger.info(`   Schedule: ${config.schedule}`);
  logger.info(`   Status file: ${config.statusFile}`);
}

async function runSync(config: Config): Promise<void> {
  const logger = new Logger({ debug: config.debug, timestamps: !config.runOnce });
  const runConfig: Config = { ...config, logger };
  printStartupBanner(runConfig, logger);

  if (config.runOnce) {
    const summary = await new ReconciliationService(runConfig).run();
    process.exit(summary.errors.length > 0 ? 1 : 0);
  }

  const health = new HealthService(config.statusFile);
  const scheduler = new SchedulerService({
    schedule: parseSchedule(config.schedule),
    runOnStartup: config.runOnStartup,
    // A fresh service per run keeps summaries from leaking between runs
    task: () => new ReconciliationService(runConfig).run(),
    logger,
    onStatusChange: (status) => health.writeStatus(status),
  });

  const shutdown = (signal: string) => {
    logger.info(`🛑 Received ${signal}, stopping scheduler...`);
    scheduler.stop();
    process.exit(0);
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await scheduler.start();
}

async function main(): Promise<void> {
  const { command, options } = parseArguments();

  if (command === "health") {
    await runHealthCheck(options);
    return;
  }

  let config: Config;
  try {
    config = await new ConfigLoaderService().resolveConfig(options);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  disableTerminalPrompts();
  await runSync(config);
}

main().catch((error) => {
  console.error("❌ Unhandled error:", error);
  process.exit(1);
});
