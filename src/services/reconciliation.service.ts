import { SYNC_FAILURES } from "../constants";
import { getErrorMessage } from "../utils/error-message";
import { appendErrors, createRunSummary, formatRunSummary, mergeForkResult } from "../utils/summary";

import { ForkDiscoveryService } from "./fork-discovery.service";
import { ForkSyncService } from "./fork-sync.service";
import { GitHubApiService } from "./github-api.service";
import { Logger } from "./logger.service";

import type { RepositoryHost } from "./github-api.service";
import type { Config, RunSummary } from "../types";

export interface ReconciliationDependencies {
  host?: RepositoryHost;
  forkSync?: ForkSyncService;
  clock?: () => Date;
}

/**
 * One reconciliation run: every account, every fork, one at a time. The
 * returned summary belongs to this run only.
 */
export class ReconciliationService {
  private logger: Logger;
  private discovery: ForkDiscoveryService;
  private forkSync: ForkSyncService;
  private clock: () => Date;

  constructor(
    private config: Config,
    dependencies: ReconciliationDependencies = {},
  ) {
    this.logger = config.logger ?? Logger.createDefault(undefined, config.debug);
    const host = dependencies.host ?? new GitHubApiService(config.token, { logger: this.logger, retry: config.retry });
    this.discovery = new ForkDiscoveryService(host, this.logger);
    this.forkSync = dependencies.forkSync ?? new ForkSyncService({ ...config, logger: this.logger });
    this.clock = dependencies.clock ?? (() => new Date());
  }

  async run(): Promise<RunSummary> {
    let summary = createRunSummary(this.clock());

    this.logger.info("==========================================");
    this.logger.info("🔄 Fork Syncer");
    this.logger.info("==========================================");
    this.logger.info(`👥 Users: ${this.config.accounts.join(" ")}`);
    this.logger.info(`📋 Mode: ${this.config.syncMode}`);
    this.logger.info("==========================================");

    for (const account of this.config.accounts) {
      const { forks, errors } = await this.discovery.discoverForks(account);
      summary = appendErrors(summary, errors);

      for (const fork of forks) {
        try {
          summary = mergeForkResult(summary, await this.forkSync.syncFork(fork));
        } catch (error) {
          const message = `${SYNC_FAILURES.UNEXPECTED} - ${getErrorMessage(error)}`;
          this.logger.error(`  ❌ ${fork.repoName}: ${message}`);
          summary = appendErrors(
            { ...summary, reposProcessed: summary.reposProcessed + 1 },
            [{ scope: `${account}/${fork.repoName}`, message }],
          );
        }
      }
    }

    summary = { ...summary, finishedAt: this.clock() };
    this.logger.block(formatRunSummary(summary));

    return summary;
  }
}
