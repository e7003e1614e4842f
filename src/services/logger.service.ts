export type LogLevel = "info" | "warn" | "error" | "debug";
export type LogOutputFn = (message: string, level: LogLevel) => void;

export interface LoggerOptions {
  scope?: string;
  debug?: boolean;
  timestamps?: boolean;
  outputFn?: LogOutputFn;
  clock?: () => Date;
}

export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export class Logger {
  private scope?: string;
  private debugEnabled: boolean;
  private timestamps: boolean;
  private outputFn?: LogOutputFn;
  private clock: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.scope = options.scope;
    this.debugEnabled = options.debug ?? false;
    this.timestamps = options.timestamps ?? false;
    this.outputFn = options.outputFn;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Derives a logger whose lines carry `[scope]`, sharing this logger's sink and settings. */
  child(scope: string): Logger {
    return new Logger({
      scope: this.scope ? `${this.scope}/${scope}` : scope,
      debug: this.debugEnabled,
      timestamps: this.timestamps,
      outputFn: this.outputFn,
      clock: this.clock,
    });
  }

  private prefix(): string {
    const time = this.timestamps ? `[${formatTimestamp(this.clock())}] ` : "";
    const scope = this.scope ? `[${this.scope}] ` : "";
    return time + scope;
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.debugEnabled) return;
    this.write(this.prefix() + this.formatMessage(message, args), "debug");
  }

  info(message: string, ...args: unknown[]): void {
    this.write(this.prefix() + this.formatMessage(message, args), "info");
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(this.prefix() + this.formatMessage(message, args), "warn");
  }

  error(message: string, error?: Error | unknown): void {
    let formattedMessage = this.prefix() + message;
    if (error instanceof Error) {
      formattedMessage += ` ${error.message}`;
    } else if (error) {
      formattedMessage += ` ${String(error)}`;
    }
    this.write(formattedMessage, "error");
  }

  /** Writes a pre-rendered block (summaries, tables) without a prefix. */
  block(content: string): void {
    this.write("\n" + content + "\n", "info");
  }

  private write(message: string, level: LogLevel): void {
    if (this.outputFn) {
      this.outputFn(message, level);
      return;
    }
    switch (level) {
      case "error":
        console.error(message);
        break;
      case "warn":
        console.warn(message);
        break;
      default:
        console.log(message);
    }
  }

  private formatMessage(message: string, args: unknown[]): string {
    if (args.length === 0) {
      return message;
    }

    return args.reduce<string>((msg, arg) => msg.replace("%s", String(arg)), message);
  }

  static createDefault(scope?: string, debug?: boolean): Logger {
    return new Logger({ scope, debug });
  }
}
