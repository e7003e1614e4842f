import Table from "cli-table3";

import type { ForkSyncResult, RunSummary, SyncError } from "../types";

export interface ForkCounts {
  synced: number;
  created: number;
  errors: number;
}

const RULE = "==========================================";

export function formatForkSummaryLine(repoName: string, counts: ForkCounts): string {
  const parts: string[] = [];
  if (counts.synced > 0) {
    parts.push(`✅ ${counts.synced} synced`);
  }
  if (counts.created > 0) {
    parts.push(`📥 ${counts.created} created`);
  }
  if (counts.errors > 0) {
    parts.push(`❌ ${counts.errors} errors`);
  }
  return `${repoName}: ${parts.length > 0 ? parts.join(", ") : "⏭️  no changes"}`;
}

export function createRunSummary(startedAt: Date = new Date()): RunSummary {
  return {
    reposProcessed: 0,
    branchesSynced: 0,
    branchesCreated: 0,
    branchesSkipped: 0,
    errors: [],
    forkSummaries: [],
    startedAt,
  };
}

export function mergeForkResult(summary: RunSummary, result: ForkSyncResult): RunSummary {
  const count = (status: string) => result.branches.filter((b) => b.status === status).length;
  return {
    ...summary,
    reposProcessed: summary.reposProcessed + 1,
    branchesSynced: summary.branchesSynced + count("synced"),
    branchesCreated: summary.branchesCreated + count("created"),
    branchesSkipped: summary.branchesSkipped + count("skipped"),
    errors: [...summary.errors, ...result.errors],
    forkSummaries: [...summary.forkSummaries, result.summaryLine],
  };
}

export function appendErrors(summary: RunSummary, errors: SyncError[]): RunSummary {
  if (errors.length === 0) {
    return summary;
  }
  return { ...summary, errors: [...summary.errors, ...errors] };
}

export function formatStatisticsTable(summary: RunSummary): string {
  const table = new Table({
    head: ["Statistic", "Count"],
    style: {
      head: [],
      border: [],
    },
  });

  table.push(
    ["Repositories processed", String(summary.reposProcessed)],
    ["Branches synced", String(summary.branchesSynced)],
    ["Branches created", String(summary.branchesCreated)],
    ["Branches skipped", String(summary.branchesSkipped)],
    ["Errors", String(summary.errors.length)],
  );

  return table.toString();
}

/** Renders the end-of-run report. Counts and the itemised error list are kept in separate sections. */
export function formatRunSummary(summary: RunSummary): string {
  const lines: string[] = [RULE, "📊 SYNC SUMMARY", RULE];

  if (summary.forkSummaries.length > 0) {
    lines.push("", "Repository Updates:");
    for (const line of summary.forkSummaries) {
      lines.push(`  ${line}`);
    }
  }

  lines.push("", "Statistics:", formatStatisticsTable(summary));

  if (summary.errors.length > 0) {
    lines.push("", "Errors:");
    for (const error of summary.errors) {
      lines.push(`  ❌ ${error.scope}: ${error.message}`);
    }
  } else {
    lines.push("", "✅ All operations completed successfully!");
  }

  lines.push(RULE);
  return lines.join("\n");
}
