import { Octokit } from "@octokit/rest";

import { GITHUB_CONSTANTS } from "../constants";
import { GitHubApiError } from "../errors";
import { getErrorMessage } from "../utils/error-message";
import { retry } from "../utils/retry";

import type { Logger } from "./logger.service";
import type { RetryConfig } from "../types";

export interface RepositorySummary {
  name: string;
  fork: boolean;
}

export interface RepositoryParent {
  fullName: string;
  defaultBranch: string | null;
}

export interface RepositoryDetail {
  name: string;
  parent: RepositoryParent | null;
}

/** The slice of the hosting API that fork discovery reads. */
export interface RepositoryHost {
  listUserRepositories(account: string): Promise<RepositorySummary[]>;
  getRepository(owner: string, repo: string): Promise<RepositoryDetail>;
}

export interface GitHubApiOptions {
  logger: Logger;
  retry?: RetryConfig;
  userAgent?: string;
}

export function toGitHubApiError(error: unknown): GitHubApiError {
  if (error instanceof GitHubApiError) {
    return error;
  }
  const status =
    error && typeof error === "object" && "status" in error && typeof error.status === "number"
      ? error.status
      : undefined;
  const cause = error instanceof Error ? error : undefined;
  return new GitHubApiError(getErrorMessage(error), status, cause);
}

export class GitHubApiService implements RepositoryHost {
  private octokit: Octokit;
  private logger: Logger;
  private retryConfig?: RetryConfig;

  constructor(token: string, options: GitHubApiOptions) {
    this.octokit = new Octokit({ auth: token, userAgent: options.userAgent ?? "fork-syncer" });
    this.logger = options.logger;
    this.retryConfig = options.retry;
  }

  private call<T>(description: string, fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      ...this.retryConfig,
      onRetry: (error, attempt) => {
        this.logger.warn(`⚠️  ${description} attempt ${attempt} failed: ${getErrorMessage(error)}`);
      },
    }).catch((error: unknown) => {
      throw toGitHubApiError(error);
    });
  }

  async listUserRepositories(account: string): Promise<RepositorySummary[]> {
    const repositories = await this.call(`Listing repositories of ${account}`, () =>
      this.octokit.paginate(this.octokit.rest.repos.listForUser, {
        username: account,
        per_page: GITHUB_CONSTANTS.PER_PAGE,
      }),
    );
    return repositories.map((repo) => ({ name: repo.name, fork: repo.fork }));
  }

  async getRepository(owner: string, repo: string): Promise<RepositoryDetail> {
    const { data } = await this.call(`Fetching ${owner}/${repo}`, () => this.octokit.rest.repos.get({ owner, repo }));
    return {
      name: data.name,
      parent: data.parent
        ? { fullName: data.parent.full_name, defaultBranch: data.parent.default_branch || null }
        : null,
    };
  }
}
