import * as fs from "fs/promises";
import * as path from "path";

import { DEFAULT_CONFIG } from "../constants";
import { ConfigValidationError } from "../errors";
import { SYNC_MODES } from "../types";
import { parseSchedule } from "../utils/cron";
import { getErrorMessage } from "../utils/error-message";

import type { Config, SyncMode } from "../types";
import type { CliOptions } from "../utils/cli";

export type Environment = Record<string, string | undefined>;

export type AccountSource = "arguments" | "GITHUB_USERNAMES" | "GITHUB_USERNAME" | "file";

export interface ResolvedAccounts {
  accounts: string[];
  source: AccountSource;
}

const TRUE_VALUES = ["true", "1", "yes", "on"];
const FALSE_VALUES = ["false", "0", "no", "off"];

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

function isSyncMode(value: string): value is SyncMode {
  return SYNC_MODES.some((mode) => mode === value);
}

export class ConfigLoaderService {
  /**
   * Builds the runtime configuration from command-line options and the
   * environment. Command-line values win over environment values.
   *
   * @throws ConfigValidationError when the token or accounts are missing or a value is invalid
   */
  async resolveConfig(options: CliOptions, env: Environment = process.env): Promise<Config> {
    const token = await this.resolveToken(options, env);
    const { accounts } = await this.resolveAccounts(options, env);
    const baseDir = this.resolveBaseDir(options, env);

    const syncModeText = nonEmpty(options.syncMode) ?? nonEmpty(env.SYNC_MODE) ?? DEFAULT_CONFIG.SYNC_MODE;
    const syncMode = syncModeText.toLowerCase();
    if (!isSyncMode(syncMode)) {
      throw new ConfigValidationError("syncMode", `'${syncModeText}' is not one of ${SYNC_MODES.join(", ")}`);
    }

    const schedule = nonEmpty(options.schedule) ?? nonEmpty(env.SYNC_SCHEDULE) ?? DEFAULT_CONFIG.SCHEDULE;
    // Reject malformed schedules before anything is scheduled
    parseSchedule(schedule);

    return {
      token,
      accounts,
      baseDir,
      syncMode,
      branchPatterns: nonEmpty(options.branches) ?? nonEmpty(env.SYNC_BRANCHES) ?? DEFAULT_CONFIG.BRANCH_PATTERNS,
      createNewBranches:
        options.createNewBranches ??
        this.parseBoolean(env.CREATE_NEW_BRANCHES, "CREATE_NEW_BRANCHES", DEFAULT_CONFIG.CREATE_NEW_BRANCHES),
      schedule,
      runOnStartup:
        options.runOnStartup ?? this.parseBoolean(env.RUN_ON_STARTUP, "RUN_ON_STARTUP", DEFAULT_CONFIG.RUN_ON_STARTUP),
      runOnce: options.runOnce ?? false,
      gitUserName: nonEmpty(env.GIT_USER_NAME) ?? DEFAULT_CONFIG.GIT_USER_NAME,
      gitUserEmail: nonEmpty(env.GIT_USER_EMAIL) ?? DEFAULT_CONFIG.GIT_USER_EMAIL,
      statusFile: this.resolveStatusFile(options, env),
      retry: {
        maxAttempts: DEFAULT_CONFIG.RETRY.MAX_ATTEMPTS,
        initialDelayMs: DEFAULT_CONFIG.RETRY.INITIAL_DELAY_MS,
        maxDelayMs: DEFAULT_CONFIG.RETRY.MAX_DELAY_MS,
        backoffMultiplier: DEFAULT_CONFIG.RETRY.BACKOFF_MULTIPLIER,
      },
      debug: options.debug ?? this.parseBoolean(env.DEBUG, "DEBUG", false),
    };
  }

  async resolveToken(options: CliOptions, env: Environment = process.env): Promise<string> {
    const tokenFile = nonEmpty(options.tokenFile);
    if (tokenFile) {
      return this.readTokenFile(tokenFile);
    }

    const token = nonEmpty(env.GITHUB_TOKEN);
    if (token) {
      return token;
    }

    const envTokenFile = nonEmpty(env.GITHUB_TOKEN_FILE);
    if (envTokenFile) {
      return this.readTokenFile(envTokenFile);
    }

    throw new ConfigValidationError("token", "GITHUB_TOKEN is not set");
  }

  /**
   * Accounts come from exactly one source, the first one that yields a name:
   * arguments, GITHUB_USERNAMES, GITHUB_USERNAME, then the usernames file.
   */
  async resolveAccounts(options: CliOptions, env: Environment = process.env): Promise<ResolvedAccounts> {
    const fromArguments = (options.usernames ?? []).flatMap((arg) => arg.split(/[\s,]+/)).filter(Boolean);
    if (fromArguments.length > 0) {
      return { accounts: unique(fromArguments), source: "arguments" };
    }

    const fromList = (env.GITHUB_USERNAMES ?? "").split(/[\s,]+/).filter(Boolean);
    if (fromList.length > 0) {
      return { accounts: unique(fromList), source: "GITHUB_USERNAMES" };
    }

    const single = nonEmpty(env.GITHUB_USERNAME);
    if (single) {
      return { accounts: [single], source: "GITHUB_USERNAME" };
    }

    const usernamesFile = nonEmpty(options.usernamesFile) ?? nonEmpty(env.GITHUB_USERNAMES_FILE);
    if (usernamesFile) {
      const accounts = await this.readUsernamesFile(usernamesFile);
      if (accounts.length > 0) {
        return { accounts, source: "file" };
      }
    }

    throw new ConfigValidationError(
      "accounts",
      "No usernames specified. Pass them as arguments or set GITHUB_USERNAMES, GITHUB_USERNAME or GITHUB_USERNAMES_FILE",
    );
  }

  resolveBaseDir(options: CliOptions, env: Environment = process.env): string {
    return path.resolve(nonEmpty(options.baseDir) ?? nonEmpty(env.REPO_BASE_DIR) ?? DEFAULT_CONFIG.BASE_DIR);
  }

  resolveStatusFile(options: CliOptions, env: Environment = process.env): string {
    const explicit = nonEmpty(options.statusFile) ?? nonEmpty(env.STATUS_FILE);
    if (explicit) {
      return path.resolve(explicit);
    }
    return path.join(this.resolveBaseDir(options, env), DEFAULT_CONFIG.STATUS_FILE_NAME);
  }

  parseBoolean(value: string | undefined, field: string, fallback: boolean): boolean {
    const normalized = nonEmpty(value)?.toLowerCase();
    if (normalized === undefined) {
      return fallback;
    }
    if (TRUE_VALUES.includes(normalized)) {
      return true;
    }
    if (FALSE_VALUES.includes(normalized)) {
      return false;
    }
    throw new ConfigValidationError(field, `'${value}' is not a boolean (use true or false)`);
  }

  private async readTokenFile(filePath: string): Promise<string> {
    let content: string;
    try {
      content = await fs.readFile(path.resolve(filePath), "utf-8");
    } catch (error) {
      throw new ConfigValidationError("tokenFile", `cannot read ${filePath}: ${getErrorMessage(error)}`);
    }
    const token = content.trim();
    if (!token) {
      throw new ConfigValidationError("tokenFile", `${filePath} is empty`);
    }
    return token;
  }

  private async readUsernamesFile(filePath: string): Promise<string[]> {
    let content: string;
    try {
      content = await fs.readFile(path.resolve(filePath), "utf-8");
    } catch (error) {
      throw new ConfigValidationError("usernamesFile", `cannot read ${filePath}: ${getErrorMessage(error)}`);
    }
    return unique(
      content
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith("#")),
    );
  }
}
