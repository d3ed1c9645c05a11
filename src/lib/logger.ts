// ─── Logging ────────────────────────────────────────────────────────────────
// One JSON object per line. Progress and summaries go to stdout, failures to
// stderr, so `saas-funnel-synth ... > run.log` keeps the run report.

export const LOG_LEVELS = ["debug", "info", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const SERVICE_NAME = "saas-funnel-synth";

type Fields = Record<string, unknown>;

export interface LogLine {
  timestamp: string;
  service: typeof SERVICE_NAME;
  level: LogLevel;
  message: string;
  context?: Fields;
  error?: { name: string; message: string; stack?: string };
}

export class Logger {
  constructor(
    readonly level: LogLevel,
    private readonly bound: Fields = {},
  ) {}

  debug(message: string, fields?: Fields): void { this.write("debug", message, fields); }
  info(message: string, fields?: Fields): void { this.write("info", message, fields); }

  error(message: string, err?: Error, fields?: Fields): void {
    this.write("error", message, fields, err);
  }

  /** Same level; `fields` are attached to every line and lose to per-call fields. */
  child(fields: Fields): Logger {
    return new Logger(this.level, { ...this.bound, ...fields });
  }

  private write(level: LogLevel, message: string, fields?: Fields, err?: Error): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) return;

    const context = { ...this.bound, ...fields };
    const line: LogLine = {
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      level,
      message,
      ...(Object.keys(context).length > 0 ? { context } : {}),
      ...(err ? { error: { name: err.name, message: err.message, stack: err.stack } } : {}),
    };

    if (level === "error") console.error(JSON.stringify(line));
    else console.log(JSON.stringify(line));
  }
}

let root = new Logger("info");

export function configureLogger(level: LogLevel): Logger {
  root = new Logger(level);
  return root;
}

export function getLogger(): Logger {
  return root;
}
