import * as path from "path";

import { GITHUB_CONSTANTS, GIT_CONSTANTS, SYNC_FAILURES } from "../constants";
import { MergeConflictError } from "../errors";
import { matchesBranchPattern } from "../utils/branch-pattern";
import { getErrorMessage } from "../utils/error-message";
import { formatForkSummaryLine } from "../utils/summary";

import { createGitService } from "./git.service";
import { Logger } from "./logger.service";

import type { WorkingCopy, WorkingCopyFactory } from "./git.service";
import type { BranchSyncOutcome, BranchSyncResult, Config, ForkRecord, ForkSyncResult, SyncError, SyncMode } from "../types";

export type ForkSyncConfig = Pick<
  Config,
  | "token"
  | "baseDir"
  | "syncMode"
  | "branchPatterns"
  | "createNewBranches"
  | "gitUserName"
  | "gitUserEmail"
  | "retry"
  | "debug"
  | "logger"
>;

const { ORIGIN, UPSTREAM } = GIT_CONSTANTS;

export function forkRemoteUrl(token: string, account: string, repoName: string): string {
  return `https://${GITHUB_CONSTANTS.TOKEN_USER}:${token}@${GIT_CONSTANTS.GITHUB_HOST}/${account}/${repoName}.git`;
}

export function upstreamRemoteUrl(upstreamFullName: string): string {
  return `https://${GIT_CONSTANTS.GITHUB_HOST}/${upstreamFullName}`;
}

export function getWorkingCopyPath(baseDir: string, fork: ForkRecord): string {
  return path.join(baseDir, fork.ownerAccount, fork.repoName);
}

export function selectCandidateBranches(
  mode: SyncMode,
  upstreamBranches: string[],
  defaultBranch: string,
  branchPatterns: string,
): string[] {
  switch (mode) {
    case "default":
      return [defaultBranch];
    case "all":
      return [...upstreamBranches];
    case "selective":
      return upstreamBranches.filter((branch) => matchesBranchPattern(branch, branchPatterns));
  }
}

function failed(reason: string): BranchSyncOutcome {
  return { status: "failed", reason };
}

/**
 * Reconciles one fork with its upstream: clones or reuses the local copy,
 * merges upstream branches into the fork's branches, creates missing ones and
 * pushes the result. Failures are recorded on the result and never thrown.
 */
export class ForkSyncService {
  private logger: Logger;

  constructor(
    private config: ForkSyncConfig,
    private createWorkingCopy: WorkingCopyFactory = createGitService,
  ) {
    this.logger = config.logger ?? Logger.createDefault(undefined, config.debug);
  }

  async syncFork(fork: ForkRecord): Promise<ForkSyncResult> {
    const scope = `${fork.ownerAccount}/${fork.repoName}`;
    const branches: BranchSyncResult[] = [];
    const errors: SyncError[] = [];

    const finish = (): ForkSyncResult => ({
      fork,
      branches,
      errors,
      summaryLine: formatForkSummaryLine(fork.repoName, {
        synced: branches.filter((b) => b.status === "synced").length,
        created: branches.filter((b) => b.status === "created").length,
        errors: errors.length,
      }),
    });

    const abortFork = (message: string, error?: unknown): ForkSyncResult => {
      this.logger.error(`  ❌ ${fork.repoName}: ${message}${error ? ` (${getErrorMessage(error)})` : ""}`);
      errors.push({ scope, message });
      return finish();
    };

    this.logger.info(`  🔄 Syncing ${fork.repoName}...`);

    const repoPath = getWorkingCopyPath(this.config.baseDir, fork);
    const workingCopy = this.createWorkingCopy(repoPath, {
      logger: this.logger.child(scope),
      retry: this.config.retry,
    });
    const originUrl = forkRemoteUrl(this.config.token, fork.ownerAccount, fork.repoName);

    const state = await workingCopy.getState();
    if (state === "missing") {
      this.logger.debug(`  Cloning ${scope} into ${repoPath}`);
      try {
        await workingCopy.clone(originUrl);
      } catch (error) {
        return abortFork(SYNC_FAILURES.CLONE, error);
      }
    } else if (state === "not-a-repository") {
      return abortFork(SYNC_FAILURES.NOT_A_REPOSITORY);
    }

    try {
      await workingCopy.ensureRemote(ORIGIN, originUrl);
    } catch (error) {
      this.logger.warn(`  ⚠️  ${fork.repoName}: could not update origin URL (${getErrorMessage(error)})`);
    }

    try {
      const change = await workingCopy.ensureRemote(UPSTREAM, upstreamRemoteUrl(fork.upstreamFullName));
      if (change !== "unchanged") {
        this.logger.debug(`  Upstream remote ${change}: ${fork.upstreamFullName}`);
      }
    } catch (error) {
      return abortFork(SYNC_FAILURES.ADD_UPSTREAM, error);
    }

    try {
      await workingCopy.configureIdentity(this.config.gitUserName, this.config.gitUserEmail);
    } catch (error) {
      this.logger.warn(`  ⚠️  ${fork.repoName}: could not configure commit identity (${getErrorMessage(error)})`);
    }

    try {
      await workingCopy.fetch(UPSTREAM);
    } catch (error) {
      return abortFork(SYNC_FAILURES.FETCH_UPSTREAM, error);
    }

    try {
      await workingCopy.fetch(ORIGIN);
    } catch (error) {
      // Local view of the fork may be stale; branch pushes will surface real problems
      this.logger.warn(`  ⚠️  ${fork.repoName}: fetch from origin failed (${getErrorMessage(error)})`);
    }

    let upstreamBranches: string[] = [];
    try {
      upstreamBranches = await workingCopy.listRemoteBranches(UPSTREAM);
    } catch (error) {
      this.logger.warn(`  ⚠️  ${fork.repoName}: listing upstream branches failed (${getErrorMessage(error)})`);
    }
    if (upstreamBranches.length === 0) {
      return abortFork(SYNC_FAILURES.NO_UPSTREAM_BRANCHES);
    }

    let forkBranches = new Set<string>();
    if (this.config.syncMode !== "default") {
      try {
        forkBranches = new Set(await workingCopy.listRemoteBranches(ORIGIN));
      } catch (error) {
        this.logger.warn(`  ⚠️  ${fork.repoName}: listing fork branches failed (${getErrorMessage(error)})`);
      }
    }

    const candidates = selectCandidateBranches(
      this.config.syncMode,
      upstreamBranches,
      fork.upstreamDefaultBranch,
      this.config.branchPatterns,
    );
    this.logger.debug(
      `  ${candidates.length} of ${upstreamBranches.length} upstream branches selected (${this.config.syncMode} mode)`,
    );

    for (const branch of candidates) {
      // In default mode the fork is expected to carry its default branch already
      const existsOnFork = this.config.syncMode === "default" || forkBranches.has(branch);
      const outcome = existsOnFork
        ? await this.syncExistingBranch(workingCopy, branch)
        : await this.createBranch(workingCopy, branch, fork.upstreamDefaultBranch);

      branches.push({ branch, ...outcome });
      this.logOutcome(branch, outcome);

      if (outcome.status === "failed") {
        errors.push({ scope: `${scope}/${branch}`, message: outcome.reason });
      }
    }

    try {
      await workingCopy.checkout(fork.upstreamDefaultBranch);
    } catch (error) {
      this.logger.warn(
        `  ⚠️  ${fork.repoName}: could not switch back to '${fork.upstreamDefaultBranch}' (${getErrorMessage(error)})`,
      );
    }

    return finish();
  }

  private async syncExistingBranch(workingCopy: WorkingCopy, branch: string): Promise<BranchSyncOutcome> {
    try {
      await workingCopy.checkoutTracking(branch, ORIGIN);
    } catch (error) {
      this.logger.debug(`    checkout ${branch}: ${getErrorMessage(error)}`);
      return failed(SYNC_FAILURES.CHECKOUT);
    }

    try {
      // The local clone is a cache: the fork's remote branch is authoritative
      await workingCopy.resetHard(`${ORIGIN}/${branch}`);
    } catch (error) {
      this.logger.debug(`    reset ${branch}: ${getErrorMessage(error)}`);
      return failed(SYNC_FAILURES.RESET);
    }

    try {
      await workingCopy.merge(`${UPSTREAM}/${branch}`, branch);
    } catch (error) {
      this.logger.debug(`    merge ${branch}: ${getErrorMessage(error)}`);
      await this.abortMerge(workingCopy, branch);
      return failed(error instanceof MergeConflictError ? SYNC_FAILURES.MERGE_CONFLICT : SYNC_FAILURES.MERGE);
    }

    try {
      await workingCopy.push(ORIGIN, branch);
    } catch (error) {
      this.logger.debug(`    push ${branch} rejected, retrying with lease: ${getErrorMessage(error)}`);
      try {
        await workingCopy.push(ORIGIN, branch, { forceWithLease: true });
      } catch (leaseError) {
        this.logger.debug(`    push --force-with-lease ${branch}: ${getErrorMessage(leaseError)}`);
        return failed(SYNC_FAILURES.PUSH);
      }
    }

    return { status: "synced" };
  }

  private async createBranch(workingCopy: WorkingCopy, branch: string, defaultBranch: string): Promise<BranchSyncOutcome> {
    if (!this.config.createNewBranches) {
      return { status: "skipped" };
    }

    try {
      await workingCopy.createBranch(branch, `${UPSTREAM}/${branch}`);
    } catch (error) {
      this.logger.debug(`    create ${branch}: ${getErrorMessage(error)}`);
      return failed(SYNC_FAILURES.CREATE_BRANCH);
    }

    try {
      await workingCopy.push(ORIGIN, branch, { setUpstream: true });
      return { status: "created" };
    } catch (error) {
      this.logger.debug(`    push new branch ${branch}: ${getErrorMessage(error)}`);
      await this.rollbackCreatedBranch(workingCopy, branch, defaultBranch);
      return failed(SYNC_FAILURES.PUSH_NEW_BRANCH);
    }
  }

  private async abortMerge(workingCopy: WorkingCopy, branch: string): Promise<void> {
    try {
      await workingCopy.abortMerge();
    } catch (error) {
      // Nothing to abort when the merge never started
      this.logger.debug(`    merge --abort on ${branch}: ${getErrorMessage(error)}`);
    }
  }

  private async rollbackCreatedBranch(workingCopy: WorkingCopy, branch: string, defaultBranch: string): Promise<void> {
    try {
      await workingCopy.checkout(defaultBranch);
      await workingCopy.deleteBranch(branch);
    } catch (error) {
      this.logger.warn(`    ⚠️  Could not remove local branch '${branch}' after failed push (${getErrorMessage(error)})`);
    }
  }

  private logOutcome(branch: string, outcome: BranchSyncOutcome): void {
    switch (outcome.status) {
      case "synced":
        this.logger.info(`    ✅ ${branch}: synced`);
        break;
      case "created":
        this.logger.info(`    📥 ${branch}: created`);
        break;
      case "skipped":
        this.logger.info(`    ⏭️  ${branch}: skipped (branch creation disabled)`);
        break;
      case "failed":
        this.logger.warn(`    ❌ ${branch}: ${outcome.reason}`);
        break;
    }
  }
}
