import type { Logger } from "../services/logger.service";

export type SyncMode = "default" | "all" | "selective";

export const SYNC_MODES: readonly SyncMode[] = ["default", "all", "selective"];

export interface RetryConfig {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
}

export interface Config {
  token: string;
  accounts: string[];
  baseDir: string;
  syncMode: SyncMode;
  /** Comma-separated glob-like patterns; only consulted in selective mode. */
  branchPatterns: string;
  createNewBranches: boolean;
  schedule: string;
  runOnStartup: boolean;
  runOnce: boolean;
  gitUserName: string;
  gitUserEmail: string;
  statusFile: string;
  retry?: RetryConfig;
  debug?: boolean;
  logger?: Logger;
}

export interface ForkRecord {
  repoName: string;
  ownerAccount: string;
  /** `owner/repo` of the parent repository. */
  upstreamFullName: string;
  upstreamDefaultBranch: string;
}

export type BranchSyncOutcome =
  | { status: "synced" }
  | { status: "created" }
  | { status: "skipped" }
  | { status: "failed"; reason: string };

export type BranchSyncResult = BranchSyncOutcome & { branch: string };

export interface SyncError {
  scope: string;
  message: string;
}

export interface ForkSyncResult {
  fork: ForkRecord;
  branches: BranchSyncResult[];
  errors: SyncError[];
  summaryLine: string;
}

export interface RunSummary {
  reposProcessed: number;
  branchesSynced: number;
  branchesCreated: number;
  branchesSkipped: number;
  errors: SyncError[];
  forkSummaries: string[];
  startedAt: Date;
  finishedAt?: Date;
}
