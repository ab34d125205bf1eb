import { createWriteStream, type WriteStream } from "node:fs";
import { format } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  close(): Promise<void>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function formatLogLine(
  level: LogLevel,
  message: string,
  args: unknown[],
  now: Date,
): string {
  return `${now.toISOString()} [${level.toUpperCase()}] ${format(message, ...args)}`;
}

export type LoggerOptions = {
  level: LogLevel;
  // append-only log file; omitted -> console only
  file?: string;
  console?: Pick<Console, "debug" | "info" | "warn" | "error">;
  now?: () => Date;
};

export function createLogger(opts: LoggerOptions): Logger {
  const out = opts.console ?? console;
  const now = opts.now ?? (() => new Date());
  const min = LEVEL_PRIORITY[opts.level];
  let stream: WriteStream | undefined = opts.file
    ? createWriteStream(opts.file, { flags: "a", encoding: "utf8" })
    : undefined;

  stream?.on("error", (err) => {
    out.error(`[log] cannot write ${opts.file}: ${err.message}`);
    stream = undefined;
  });

  const write = (level: LogLevel, message: string, args: unknown[]) => {
    if (LEVEL_PRIORITY[level] < min) return;
    const line = formatLogLine(level, message, args, now());
    out[level](line);
    stream?.write(line + "\n");
  };

  return {
    debug: (message, ...args) => write("debug", message, args),
    info: (message, ...args) => write("info", message, args),
    warn: (message, ...args) => write("warn", message, args),
    error: (message, ...args) => write("error", message, args),
    close: () =>
      new Promise<void>((resolve) => {
        if (!stream) return resolve();
        stream.end(() => resolve());
        stream = undefined;
      }),
  };
}
