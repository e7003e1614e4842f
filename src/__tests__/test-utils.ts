import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { Logger } from "../services/logger.service";

import type { PushOptions, RemoteChange, WorkingCopy, WorkingCopyFactory, WorkingCopyState } from "../services/git.service";
import type { RepositoryDetail, RepositoryHost, RepositorySummary } from "../services/github-api.service";
import type { LogLevel } from "../services/logger.service";
import type { Config, ForkRecord } from "../types";

export const TEST_TOKEN = "test-secret";

export interface CapturedLine {
  level: LogLevel;
  message: string;
}

export function createCapturingLogger(debug = false): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = new Logger({ debug, outputFn: (message, level) => lines.push({ level, message }) });
  return { logger, lines };
}

export function messages(lines: CapturedLine[], level?: LogLevel): string[] {
  return lines.filter((line) => !level || line.level === level).map((line) => line.message);
}

export function createTestConfig(overrides: Partial<Config> = {}): Config {
  return {
    token: TEST_TOKEN,
    accounts: ["octo"],
    baseDir: "/tmp/fork-syncer-test",
    syncMode: "all",
    branchPatterns: "main,master,develop,dev,feature/*,release/*",
    createNewBranches: true,
    schedule: "0 0 * * *",
    runOnStartup: true,
    runOnce: true,
    gitUserName: "Fork Syncer",
    gitUserEmail: "fork-syncer@users.noreply.github.com",
    statusFile: "/tmp/fork-syncer-test/.fork-syncer-status.json",
    retry: { maxAttempts: 1 },
    ...overrides,
  };
}

export function createFork(overrides: Partial<ForkRecord> = {}): ForkRecord {
  return {
    repoName: "widgets",
    ownerAccount: "octo",
    upstreamFullName: "upstream-org/widgets",
    upstreamDefaultBranch: "main",
    ...overrides,
  };
}

/**
 * In-memory working copy. Every call is recorded as a short command line
 * (`merge upstream/main`, `push dev --set-upstream`); `failOn` makes the
 * matching call throw.
 */
export class FakeWorkingCopy implements WorkingCopy {
  state: WorkingCopyState = "repository";
  remoteBranches: Record<string, string[]> = { upstream: ["main"], origin: ["main"] };
  calls: string[] = [];
  private failures = new Map<string, unknown>();

  constructor(public readonly path: string = "/tmp/fork-syncer-test/octo/widgets") {}

  failOn(call: string, error: unknown = new Error(`${call} failed`)): this {
    this.failures.set(call, error);
    return this;
  }

  private record(call: string): void {
    this.calls.push(call);
    if (this.failures.has(call)) {
      throw this.failures.get(call);
    }
  }

  async getState(): Promise<WorkingCopyState> {
    this.record("getState");
    return this.state;
  }

  async clone(remoteUrl: string): Promise<void> {
    this.record(`clone ${remoteUrl}`);
    this.state = "repository";
  }

  async ensureRemote(name: string, url: string): Promise<RemoteChange> {
    this.record(`ensureRemote ${name} ${url}`);
    return "unchanged";
  }

  async configureIdentity(name: string, email: string): Promise<void> {
    this.record(`configureIdentity ${name} ${email}`);
  }

  async fetch(remote: string): Promise<void> {
    this.record(`fetch ${remote}`);
  }

  async listRemoteBranches(remote: string): Promise<string[]> {
    this.record(`listRemoteBranches ${remote}`);
    return [...(this.remoteBranches[remote] ?? [])];
  }

  async checkoutTracking(branch: string, remote: string): Promise<void> {
    this.record(`checkoutTracking ${branch} ${remote}`);
  }

  async checkout(branch: string): Promise<void> {
    this.record(`checkout ${branch}`);
  }

  async resetHard(ref: string): Promise<void> {
    this.record(`resetHard ${ref}`);
  }

  async merge(ref: string): Promise<void> {
    this.record(`merge ${ref}`);
  }

  async abortMerge(): Promise<void> {
    this.record("abortMerge");
  }

  async push(remote: string, branch: string, options: PushOptions = {}): Promise<void> {
    const flags = [options.forceWithLease ? " --force-with-lease" : "", options.setUpstream ? " --set-upstream" : ""];
    this.record(`push ${remote} ${branch}${flags.join("")}`);
    const branches = this.remoteBranches[remote] ?? [];
    if (!branches.includes(branch)) {
      this.remoteBranches[remote] = [...branches, branch].sort();
    }
  }

  async createBranch(branch: string, startPoint: string): Promise<void> {
    this.record(`createBranch ${branch} ${startPoint}`);
  }

  async deleteBranch(branch: string): Promise<void> {
    this.record(`deleteBranch ${branch}`);
  }
}

/** Hands out pre-registered fakes by path, creating fresh ones for unknown paths. */
export function createFakeFactory(copies: Record<string, FakeWorkingCopy> = {}): {
  factory: WorkingCopyFactory;
  copies: Record<string, FakeWorkingCopy>;
} {
  const factory: WorkingCopyFactory = (repoPath) => {
    const existing = copies[repoPath];
    if (existing) {
      return existing;
    }
    const created = new FakeWorkingCopy(repoPath);
    copies[repoPath] = created;
    return created;
  };
  return { factory, copies };
}

export class FakeRepositoryHost implements RepositoryHost {
  repositories: Record<string, RepositorySummary[]> = {};
  details: Record<string, RepositoryDetail> = {};
  listErrors: Record<string, Error> = {};
  detailErrors: Record<string, Error> = {};
  detailRequests: string[] = [];

  addFork(account: string, repoName: string, parentFullName: string | null, defaultBranch: string | null = "main"): this {
    this.repositories[account] = [...(this.repositories[account] ?? []), { name: repoName, fork: true }];
    this.details[`${account}/${repoName}`] = {
      name: repoName,
      parent: parentFullName ? { fullName: parentFullName, defaultBranch } : null,
    };
    return this;
  }

  addSource(account: string, repoName: string): this {
    this.repositories[account] = [...(this.repositories[account] ?? []), { name: repoName, fork: false }];
    return this;
  }

  async listUserRepositories(account: string): Promise<RepositorySummary[]> {
    const error = this.listErrors[account];
    if (error) {
      throw error;
    }
    return this.repositories[account] ?? [];
  }

  async getRepository(owner: string, repo: string): Promise<RepositoryDetail> {
    const key = `${owner}/${repo}`;
    this.detailRequests.push(key);
    const error = this.detailErrors[key];
    if (error) {
      throw error;
    }
    const detail = this.details[key];
    if (!detail) {
      throw new Error(`Not Found: ${key}`);
    }
    return detail;
  }
}

const tempDirs: string[] = [];

export async function createTempDirectory(prefix = "fork-syncer-test-"): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function cleanupTempDirectories(): Promise<void> {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
}
