type Level = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  debugEnabled?: boolean;
  scope?: string;
  write?: (line: string) => void;
}

export class Logger {
  private readonly debugEnabled: boolean;
  private readonly scope?: string;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debugEnabled ?? true;
    this.scope = options.scope;
    this.write = options.write ?? ((line) => process.stdout.write(line));
  }

  child(scope: string): Logger {
    return new Logger({
      debugEnabled: this.debugEnabled,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      write: this.write,
    });
  }

  debug(message: string): void {
    if (!this.debugEnabled) {
      return;
    }
    this.print("debug", message);
  }

  info(message: string): void {
    this.print("info", message);
  }

  warn(message: string): void {
    this.print("warn", message);
  }

  error(message: string): void {
    this.print("error", message);
  }

  private print(level: Level, message: string): void {
    const ts = new Date().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : "";
    // Unified, grep-friendly log format.
    this.write(`[${ts}] [${level.toUpperCase()}]${scope} ${message}\n`);
  }
}
