import { GIT_CONSTANTS } from "../constants";
import { getErrorMessage } from "../utils/error-message";

import type { RepositoryHost } from "./github-api.service";
import type { Logger } from "./logger.service";
import type { ForkRecord, SyncError } from "../types";

export interface ForkDiscoveryResult {
  forks: ForkRecord[];
  errors: SyncError[];
}

export class ForkDiscoveryService {
  constructor(
    private host: RepositoryHost,
    private logger: Logger,
  ) {}

  /**
   * Lists the account's forks together with their upstream repository. Never
   * throws: a failed listing yields an empty result with one error entry, and a
   * fork whose details cannot be read is left out.
   */
  async discoverForks(account: string): Promise<ForkDiscoveryResult> {
    const errors: SyncError[] = [];
    const forks: ForkRecord[] = [];

    this.logger.info("");
    this.logger.info(`🔍 Processing forks for user: ${account}`);

    let forkNames: string[];
    try {
      const repositories = await this.host.listUserRepositories(account);
      forkNames = repositories.filter((repo) => repo.fork).map((repo) => repo.name);
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.error(`  ❌ GitHub API Error for ${account}: ${message}`);
      errors.push({ scope: account, message: `GitHub API Error - ${message}` });
      return { forks, errors };
    }

    if (forkNames.length === 0) {
      this.logger.info(`  ℹ️  No forks found for ${account}`);
      return { forks, errors };
    }

    this.logger.info(`  📦 Found ${forkNames.length} fork(s)`);

    for (const repoName of forkNames) {
      try {
        const detail = await this.host.getRepository(account, repoName);

        if (!detail.parent || !detail.parent.fullName) {
          this.logger.warn(`  ⚠️  Skipping ${repoName}: no parent repository reported`);
          continue;
        }

        forks.push({
          repoName,
          ownerAccount: account,
          upstreamFullName: detail.parent.fullName,
          upstreamDefaultBranch: detail.parent.defaultBranch || GIT_CONSTANTS.DEFAULT_BRANCH,
        });
        this.logger.debug(`  ${repoName} → ${detail.parent.fullName}`);
      } catch (error) {
        const message = getErrorMessage(error);
        this.logger.warn(`  ⚠️  Skipping ${repoName}: failed to fetch details (${message})`);
        errors.push({ scope: `${account}/${repoName}`, message: `Failed to fetch details - ${message}` });
      }
    }

    if (forks.length === 0) {
      this.logger.info("  ⚠️  No valid forks with upstream found");
    }

    return { forks, errors };
  }
}
