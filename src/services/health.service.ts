import * as fs from "fs/promises";
import * as path from "path";

import { getErrorMessage } from "../utils/error-message";

import type { SchedulerState, SchedulerStatus } from "./scheduler.service";

export interface StatusFileContents {
  pid: number;
  state: SchedulerState;
  startedAt: string;
  lastFireAt: string | null;
  lastFireMinute: string | null;
  lastRunHadErrors: boolean | null;
  updatedAt: string;
}

export interface HealthReport {
  healthy: boolean;
  problems: string[];
  status: StatusFileContents | null;
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

export function isStatusFileContents(value: unknown): value is StatusFileContents {
  if (!value || typeof value !== "object") {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.pid === "number" &&
    (record.state === "idle" || record.state === "firing") &&
    typeof record.startedAt === "string" &&
    isNullableString(record.lastFireAt) &&
    isNullableString(record.lastFireMinute) &&
    (record.lastRunHadErrors === null || typeof record.lastRunHadErrors === "boolean") &&
    typeof record.updatedAt === "string"
  );
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return !!error && typeof error === "object" && "code" in error && error.code === "EPERM";
  }
}

/**
 * Persists the scheduler's status so an out-of-process liveness probe can
 * inspect it, and performs that probe.
 */
export class HealthService {
  constructor(
    private statusFile: string,
    private processAlive: (pid: number) => boolean = isProcessAlive,
    private clock: () => Date = () => new Date(),
  ) {}

  async writeStatus(status: SchedulerStatus, pid: number = process.pid): Promise<void> {
    const contents: StatusFileContents = {
      pid,
      state: status.state,
      startedAt: status.startedAt.toISOString(),
      lastFireAt: status.lastFireAt ? status.lastFireAt.toISOString() : null,
      lastFireMinute: status.lastFireMinute,
      lastRunHadErrors: status.lastRunHadErrors,
      updatedAt: this.clock().toISOString(),
    };
    await fs.mkdir(path.dirname(this.statusFile), { recursive: true });
    await fs.writeFile(this.statusFile, JSON.stringify(contents, null, 2) + "\n", "utf-8");
  }

  async readStatus(): Promise<StatusFileContents> {
    const raw = await fs.readFile(this.statusFile, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (!isStatusFileContents(parsed)) {
      throw new Error(`Status file ${this.statusFile} has an unexpected format`);
    }
    return parsed;
  }

  /**
   * @param configProblems configuration errors found by the caller; any entry makes the report unhealthy
   */
  async check(configProblems: string[] = []): Promise<HealthReport> {
    const problems = [...configProblems];
    let status: StatusFileContents | null = null;

    try {
      status = await this.readStatus();
    } catch (error) {
      problems.push(`scheduler status unavailable: ${getErrorMessage(error)}`);
    }

    if (status && !this.processAlive(status.pid)) {
      problems.push(`scheduler process ${status.pid} is not running`);
    }

    return { healthy: problems.length === 0, problems, status };
  }
}

export function formatHealthReport(report: HealthReport): string {
  if (!report.healthy) {
    return report.problems.map((problem) => `ERROR: ${problem}`).join("\n");
  }
  const lines = ["HEALTHY: All health checks passed", "- scheduler: running", "- environment: configured"];
  if (report.status?.lastFireAt) {
    lines.push(`- last sync: ${report.status.lastFireAt}`);
  }
  return lines.join("\n");
}
