import yargs from "yargs";
import { hideBin } from "yargs/helpers";

export type CliCommand = "sync" | "health";

export interface CliOptions {
  usernames?: string[];
  tokenFile?: string;
  usernamesFile?: string;
  baseDir?: string;
  syncMode?: string;
  branches?: string;
  createNewBranches?: boolean;
  schedule?: string;
  runOnStartup?: boolean;
  runOnce?: boolean;
  statusFile?: string;
  debug?: boolean;
}

export interface ParsedArguments {
  command: CliCommand;
  options: CliOptions;
}

export function parseArguments(args: string[] = hideBin(process.argv)): ParsedArguments {
  const argv = yargs(args)
    .scriptName("fork-syncer")
    // Usernames such as 007 must keep their leading zeros
    .parserConfiguration({ "parse-positional-numbers": false })
    .usage("$0 [usernames..]\n$0 health")
    .option("token-file", {
      type: "string",
      description: "File holding the GitHub token (default: GITHUB_TOKEN, then GITHUB_TOKEN_FILE)",
    })
    .option("usernames-file", {
      type: "string",
      description: "Newline-separated list of GitHub usernames (lowest priority account source)",
    })
    .option("base-dir", {
      alias: "d",
      type: "string",
      description: "Directory holding the local fork clones (REPO_BASE_DIR)",
    })
    .option("sync-mode", {
      alias: "m",
      type: "string",
      choices: ["default", "all", "selective"],
      description: "Which branches to sync (SYNC_MODE)",
    })
    .option("branches", {
      alias: "b",
      type: "string",
      description: "Comma-separated branch patterns for selective mode, e.g. 'main,release/*' (SYNC_BRANCHES)",
    })
    .option("create-new-branches", {
      type: "boolean",
      description: "Create upstream branches missing from the fork (CREATE_NEW_BRANCHES)",
    })
    .option("schedule", {
      alias: "s",
      type: "string",
      description: "Five-field cron expression for scheduled runs (SYNC_SCHEDULE)",
    })
    .option("run-on-startup", {
      type: "boolean",
      description: "Run once immediately when the scheduler starts (RUN_ON_STARTUP)",
    })
    .option("run-once", {
      type: "boolean",
      description: "Run a single sync and exit; exits non-zero when any error occurred",
    })
    .option("status-file", {
      type: "string",
      description: "Where the scheduler records its status for the health check (STATUS_FILE)",
    })
    .option("debug", {
      type: "boolean",
      description: "Enable debug logging (DEBUG)",
    })
    .help()
    .alias("help", "h")
    .parseSync();

  const positionals = argv._.map(String);
  const command: CliCommand = positionals[0] === "health" ? "health" : "sync";
  const usernames = command === "health" ? [] : positionals;

  return {
    command,
    options: {
      usernames: usernames.length > 0 ? usernames : undefined,
      tokenFile: argv["token-file"],
      usernamesFile: argv["usernames-file"],
      baseDir: argv["base-dir"],
      syncMode: argv["sync-mode"],
      branches: argv.branches,
      createNewBranches: argv["create-new-branches"],
      schedule: argv.schedule,
      runOnStartup: argv["run-on-startup"],
      runOnce: argv["run-once"],
      statusFile: argv["status-file"],
      debug: argv.debug,
    },
  };
}
