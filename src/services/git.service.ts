import * as fs from "fs/promises";
import * as path from "path";

import simpleGit, { GitResponseError } from "simple-git";

import { GIT_CONSTANTS } from "../constants";
import { GitOperationError, MergeConflictError, isMergeConflictError } from "../errors";
import { getErrorMessage, redactCredentials } from "../utils/error-message";
import { retry } from "../utils/retry";

import type { Logger } from "./logger.service";
import type { RetryConfig } from "../types";
import type { MergeResult, SimpleGit } from "simple-git";

export type WorkingCopyState = "missing" | "repository" | "not-a-repository";

export type RemoteChange = "added" | "updated" | "unchanged";

export interface PushOptions {
  forceWithLease?: boolean;
  setUpstream?: boolean;
}

/**
 * Operations the reconciliation engine needs from one local clone. The clone
 * is a disposable cache; the remotes are the source of truth.
 */
export interface WorkingCopy {
  readonly path: string;
  getState(): Promise<WorkingCopyState>;
  clone(remoteUrl: string): Promise<void>;
  ensureRemote(name: string, url: string): Promise<RemoteChange>;
  configureIdentity(name: string, email: string): Promise<void>;
  fetch(remote: string): Promise<void>;
  listRemoteBranches(remote: string): Promise<string[]>;
  /** Switches to `branch`, creating it from `<remote>/<branch>` when no local branch exists. */
  checkoutTracking(branch: string, remote: string): Promise<void>;
  checkout(branch: string): Promise<void>;
  resetHard(ref: string): Promise<void>;
  merge(ref: string, branch: string): Promise<void>;
  abortMerge(): Promise<void>;
  push(remote: string, branch: string, options?: PushOptions): Promise<void>;
  createBranch(branch: string, startPoint: string): Promise<void>;
  deleteBranch(branch: string): Promise<void>;
}

export interface WorkingCopyOptions {
  logger: Logger;
  retry?: RetryConfig;
}

export type WorkingCopyFactory = (repoPath: string, options: WorkingCopyOptions) => WorkingCopy;

export function parseLsRemoteHeads(output: string): string[] {
  const branches: string[] = [];
  for (const line of output.split("\n")) {
    const ref = line.trim().split(/\s+/)[1];
    if (ref && ref.startsWith(GIT_CONSTANTS.HEADS_PREFIX)) {
      branches.push(ref.slice(GIT_CONSTANTS.HEADS_PREFIX.length));
    }
  }
  return branches.sort();
}

/**
 * Makes git fail instead of waiting for credentials on a terminal. Set on the
 * process environment because simple-git rejects `.env()` maps that carry
 * variables such as EDITOR or GIT_ASKPASS.
 */
export function disableTerminalPrompts(env: NodeJS.ProcessEnv = process.env): void {
  env.GIT_TERMINAL_PROMPT = "0";
}

export class GitService implements WorkingCopy {
  private git: SimpleGit | null = null;
  private logger: Logger;
  private retryConfig?: RetryConfig;

  constructor(
    public readonly path: string,
    options: WorkingCopyOptions,
  ) {
    this.logger = options.logger;
    this.retryConfig = options.retry;
  }

  private getGit(): SimpleGit {
    // simple-git refuses to bind to a directory that does not exist yet, so bind lazily
    if (!this.git) {
      this.git = simpleGit(this.path);
    }
    return this.git;
  }

  private withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      ...this.retryConfig,
      onRetry: (error, attempt) => {
        this.logger.warn(`⚠️  ${operation} attempt ${attempt} failed: ${redactCredentials(getErrorMessage(error))}`);
      },
    });
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new GitOperationError(operation, redactCredentials(getErrorMessage(error)).trim(), cause);
    }
  }

  async getState(): Promise<WorkingCopyState> {
    try {
      await fs.access(this.path);
    } catch {
      return "missing";
    }
    try {
      await fs.access(path.join(this.path, GIT_CONSTANTS.GIT_DIR));
      return "repository";
    } catch {
      return "not-a-repository";
    }
  }

  async clone(remoteUrl: string): Promise<void> {
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    await this.run("clone", () =>
      this.withRetry("Clone", () => simpleGit().clone(remoteUrl, this.path)),
    );
  }

  async ensureRemote(name: string, url: string): Promise<RemoteChange> {
    const git = this.getGit();

    let existing: string | null = null;
    try {
      existing = (await git.remote(["get-url", name])) || "";
    } catch {
      existing = null;
    }

    if (existing === null) {
      await this.run("remote add", () => git.addRemote(name, url));
      return "added";
    }
    if (existing.trim() !== url) {
      await this.run("remote set-url", () => git.remote(["set-url", name, url]));
      return "updated";
    }
    return "unchanged";
  }

  async configureIdentity(name: string, email: string): Promise<void> {
    const git = this.getGit();
    await this.run("config", async () => {
      await git.addConfig("user.name", name);
      await git.addConfig("user.email", email);
    });
  }

  async fetch(remote: string): Promise<void> {
    const git = this.getGit();
    await this.run(`fetch ${remote}`, () => this.withRetry(`Fetch from ${remote}`, () => git.fetch([remote, "--prune"])));
  }

  async listRemoteBranches(remote: string): Promise<string[]> {
    const git = this.getGit();
    const output = await this.run(`ls-remote ${remote}`, () =>
      this.withRetry(`Listing ${remote} branches`, () => git.raw(["ls-remote", "--heads", remote])),
    );
    return parseLsRemoteHeads(output);
  }

  async checkoutTracking(branch: string, remote: string): Promise<void> {
    const git = this.getGit();
    const local = await this.run("branch", () => git.branchLocal());

    if (local.all.includes(branch)) {
      await this.run("checkout", () => git.checkout(branch));
    } else {
      await this.run("checkout", () => git.checkoutBranch(branch, `${remote}/${branch}`));
    }
  }

  async checkout(branch: string): Promise<void> {
    const git = this.getGit();
    await this.run("checkout", () => git.checkout(branch));
  }

  async resetHard(ref: string): Promise<void> {
    const git = this.getGit();
    await this.run("reset", () => git.reset(["--hard", ref]));
  }

  async merge(ref: string, branch: string): Promise<void> {
    const git = this.getGit();
    try {
      await git.merge([ref, "--no-edit"]);
    } catch (error) {
      if (error instanceof GitResponseError) {
        const result: MergeResult = error.git;
        throw new MergeConflictError(
          branch,
          result.conflicts.map((conflict) => conflict.file ?? conflict.reason),
          error,
        );
      }
      const message = getErrorMessage(error);
      const cause = error instanceof Error ? error : undefined;
      if (isMergeConflictError(message)) {
        throw new MergeConflictError(branch, [], cause);
      }
      throw new GitOperationError("merge", redactCredentials(message).trim(), cause);
    }
  }

  async abortMerge(): Promise<void> {
    const git = this.getGit();
    await this.run("merge --abort", () => git.merge(["--abort"]));
  }

  async push(remote: string, branch: string, options: PushOptions = {}): Promise<void> {
    const git = this.getGit();
    const args: string[] = [];
    if (options.forceWithLease) {
      args.push("--force-with-lease");
    }
    if (options.setUpstream) {
      args.push("--set-upstream");
    }
    await this.run("push", () => this.withRetry(`Push to ${remote}`, () => git.push(remote, branch, args)));
  }

  async createBranch(branch: string, startPoint: string): Promise<void> {
    const git = this.getGit();
    await this.run("checkout -b", () => git.checkoutBranch(branch, startPoint));
  }

  async deleteBranch(branch: string): Promise<void> {
    const git = this.getGit();
    await this.run("branch -D", () => git.deleteLocalBranch(branch, true));
  }
}

export const createGitService: WorkingCopyFactory = (repoPath, options) => new GitService(repoPath, options);
