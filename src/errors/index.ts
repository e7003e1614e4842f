import { ERROR_MESSAGES } from "../constants";

export class ForkSyncerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class GitError extends ForkSyncerError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, `GIT_${code}`, cause);
  }
}

export class GitOperationError extends GitError {
  constructor(
    public readonly operation: string,
    details: string,
    cause?: Error,
  ) {
    super(`Git operation '${operation}' failed: ${details}`, "OPERATION_FAILED", cause);
  }
}

export class MergeConflictError extends GitError {
  constructor(
    public readonly branchName: string,
    public readonly conflicts: string[],
    cause?: Error,
  ) {
    const files = conflicts.length > 0 ? `: ${conflicts.join(", ")}` : "";
    super(`Merge conflict on branch '${branchName}'${files}`, "MERGE_CONFLICT", cause);
  }
}

export class GitHubApiError extends ForkSyncerError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, "GITHUB_API_ERROR", cause);
  }
}

export class ConfigError extends ForkSyncerError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, `CONFIG_${code}`, cause);
  }
}

export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Invalid configuration for '${field}': ${reason}`, "VALIDATION_FAILED");
  }
}

export class ScheduleParseError extends ConfigError {
  constructor(
    public readonly expression: string,
    public readonly reason: string,
  ) {
    super(`Invalid schedule expression '${expression}': ${reason}`, "SCHEDULE_INVALID");
  }
}

export function isMergeConflictError(error: Error | string): boolean {
  if (error instanceof MergeConflictError) {
    return true;
  }
  const message = typeof error === "string" ? error : error.message;
  return ERROR_MESSAGES.MERGE_CONFLICT.some((pattern) => message.includes(pattern));
}

export function isTransientNetworkError(error: unknown): boolean {
  if (error instanceof GitHubApiError) {
    return error.status !== undefined && error.status >= 500;
  }
  if (!error || typeof error !== "object") {
    return false;
  }
  const code = "code" in error ? error.code : undefined;
  const status = "status" in error ? error.status : undefined;
  const message = "message" in error ? error.message : undefined;

  if (typeof code === "string" && ERROR_MESSAGES.TRANSIENT_CODES.some((c) => c === code)) {
    return true;
  }
  if (typeof status === "number" && status >= 500) {
    return true;
  }
  if (typeof message === "string") {
    return ERROR_MESSAGES.TRANSIENT_NETWORK.some((pattern) => message.includes(pattern));
  }
  return false;
}
