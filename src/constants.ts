import * as os from "os";
import * as path from "path";

export const GIT_CONSTANTS = {
  ORIGIN: "origin",
  UPSTREAM: "upstream",
  GITHUB_HOST: "github.com",
  DEFAULT_BRANCH: "main",
  GIT_DIR: ".git",
  HEADS_PREFIX: "refs/heads/",
} as const;

export const GITHUB_CONSTANTS = {
  PER_PAGE: 100,
  TOKEN_USER: "x-access-token",
} as const;

export const SCHEDULER_CONSTANTS = {
  POLL_INTERVAL_MS: 60_000,
} as const;

export const DEFAULT_CONFIG = {
  SCHEDULE: "0 0 * * *",
  SYNC_MODE: "all",
  BRANCH_PATTERNS: "main,master,develop,dev,feature/*,release/*",
  CREATE_NEW_BRANCHES: true,
  RUN_ON_STARTUP: true,
  BASE_DIR: path.join(os.homedir(), ".fork-syncer", "repos"),
  STATUS_FILE_NAME: ".fork-syncer-status.json",
  GIT_USER_NAME: "Fork Syncer",
  GIT_USER_EMAIL: "fork-syncer@users.noreply.github.com",
  RETRY: {
    MAX_ATTEMPTS: 3,
    INITIAL_DELAY_MS: 1000,
    MAX_DELAY_MS: 30000,
    BACKOFF_MULTIPLIER: 2,
  },
} as const;

export const ERROR_MESSAGES = {
  MERGE_CONFLICT: ["CONFLICT", "Automatic merge failed", "fix conflicts"],
  TRANSIENT_NETWORK: [
    "Could not read from remote repository",
    "fatal: unable to access",
    "Connection reset",
    "Connection timed out",
    "Operation timed out",
    "The remote end hung up unexpectedly",
  ],
  TRANSIENT_CODES: ["ENOTFOUND", "ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EAI_AGAIN"],
} as const;

export const SYNC_FAILURES = {
  CLONE: "Clone failed",
  NOT_A_REPOSITORY: "Not a git repository",
  ADD_UPSTREAM: "Failed to add upstream remote",
  FETCH_UPSTREAM: "Failed to fetch upstream",
  NO_UPSTREAM_BRANCHES: "No upstream branches found",
  UNEXPECTED: "Unexpected error",
  CHECKOUT: "Checkout failed",
  RESET: "Reset failed",
  MERGE_CONFLICT: "Merge conflict",
  MERGE: "Merge failed",
  PUSH: "Push failed",
  PUSH_NEW_BRANCH: "Push new branch failed",
  CREATE_BRANCH: "Create branch failed",
} as const;
