import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export type AppLogger = Logger & {
  path: string;
  close: () => Promise<void>;
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

type AppLoggerParams = {
  filePath: string;
};

/** JSON-lines file logger used by `--log-file`. Write failures disable the logger. */
export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  const filePath = path.resolve(params.filePath);
  await mkdir(path.dirname(filePath), { recursive: true });
  const stream = createWriteStream(filePath, { flags: "a" });
  let closed = false;

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (closed) return;
    const normalizedLevel = level === "warn" ? "warning" : level;
    const payload = {
      timestamp: new Date().toISOString(),
      level: normalizedLevel,
      message,
      meta: meta ?? undefined
    };
    try {
      stream.write(`${JSON.stringify(payload)}\n`);
    } catch {
      closed = true;
    }
  };

  stream.on("error", () => {
    closed = true;
  });

  const close = async () => {
    if (closed) return;
    closed = true;
    await new Promise<void>((resolve) => stream.end(resolve));
  };

  return {
    path: filePath,
    close,
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}

type ConsoleLoggerParams = {
  verbose?: boolean;
  stream?: { write: (chunk: string) => unknown };
  color?: boolean;
};

type Colors = ReturnType<typeof pc.createColors>;

function formatMeta(colors: Colors, meta?: Record<string, unknown>): string {
  if (!meta) return "";
  const entries = Object.entries(meta).filter(([, value]) => value !== undefined);
  if (!entries.length) return "";
  return ` ${colors.dim(entries.map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`).join(" "))}`;
}

export function createConsoleLogger(params: ConsoleLoggerParams = {}): Logger {
  const stream = params.stream ?? process.stderr;
  const verbose = Boolean(params.verbose);
  const colors = pc.createColors(params.color ?? pc.isColorSupported);
  const emit = (line: string) => {
    stream.write(`${line}\n`);
  };
  return {
    debug: (message, meta) => {
      if (!verbose) return;
      emit(`${colors.dim("debug")} ${message}${formatMeta(colors, meta)}`);
    },
    info: (message, meta) => emit(`${message}${verbose ? formatMeta(colors, meta) : ""}`),
    warn: (message, meta) => emit(colors.yellow(`${message}${verbose ? formatMeta(colors, meta) : ""}`)),
    error: (message, meta) => emit(colors.red(`${message}${verbose ? formatMeta(colors, meta) : ""}`))
  };
}

export function combineLoggers(...loggers: Logger[]): Logger {
  return {
    debug: (message, meta) => loggers.forEach((logger) => logger.debug(message, meta)),
    info: (message, meta) => loggers.forEach((logger) => logger.info(message, meta)),
    warn: (message, meta) => loggers.forEach((logger) => logger.warn(message, meta)),
    error: (message, meta) => loggers.forEach((logger) => logger.error(message, meta))
  };
}
