import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import pc from "picocolors";
import { STATE_DIR_NAME } from "../config/defaults.js";

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
  projectRoot: string;
  command: string;
};

// One JSONL file per command run under <projectRoot>/.fleetlens/logs.
export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  const logDir = path.join(params.projectRoot, STATE_DIR_NAME, "logs");
  await mkdir(logDir, { recursive: true });
  const startedAt = new Date().toISOString();
  const filePath = path.join(logDir, `${params.command}-${startedAt.replace(/[:.]/g, "-")}.jsonl`);
  const stream = createWriteStream(filePath, { flags: "a" });
  let open = true;
  stream.on("error", () => {
    open = false;
  });

  const record =
    (level: LogLevel) =>
    (message: string, meta?: Record<string, unknown>): void => {
      if (!open) return;
      const entry = {
        timestamp: new Date().toISOString(),
        command: params.command,
        level: level === "warn" ? "warning" : level,
        message,
        ...(meta ? { meta } : {})
      };
      stream.write(`${JSON.stringify(entry)}\n`);
    };

  return {
    path: filePath,
    close: async () => {
      if (!open) return;
      open = false;
      await new Promise<void>((resolve) => stream.end(resolve));
    },
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error")
  };
}

type TerminalLoggerParams = {
  sink: Logger;
  debug?: boolean;
  write?: (line: string) => void;
};

// Everything goes to the sink; warnings and errors are echoed to stderr as well.
export function createTerminalLogger(params: TerminalLoggerParams): Logger {
  const echo = params.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  return {
    debug: (message, meta) => {
      params.sink.debug(message, meta);
      if (params.debug) echo(pc.dim(message));
    },
    info: (message, meta) => params.sink.info(message, meta),
    warn: (message, meta) => {
      params.sink.warn(message, meta);
      echo(pc.yellow(message));
    },
    error: (message, meta) => {
      params.sink.error(message, meta);
      echo(pc.red(message));
    }
  };
}

export type CommandLogger = {
  logger: Logger;
  logPath: string | null;
  close: () => Promise<void>;
};

type CommandLoggerParams = {
  projectRoot: string;
  command: string;
  debug?: boolean;
  write?: (line: string) => void;
};

/**
 * Terminal logger for a CLI command, backed by the command's JSONL log file.
 * When the log file cannot be opened the command still runs, with a warning
 * and terminal output only.
 */
export async function openCommandLogger(params: CommandLoggerParams): Promise<CommandLogger> {
  let appLogger: AppLogger | null = null;
  let openError: string | null = null;
  try {
    appLogger = await createAppLogger({ projectRoot: params.projectRoot, command: params.command });
  } catch (err) {
    openError = err instanceof Error ? err.message : String(err);
  }

  const logger = createTerminalLogger({ sink: appLogger ?? noopLogger, debug: params.debug, write: params.write });
  if (openError) logger.warn(`File logging disabled: ${openError}`);
  if (appLogger) logger.debug(`Writing log to ${appLogger.path}`);

  return {
    logger,
    logPath: appLogger?.path ?? null,
    close: async () => {
      await appLogger?.close();
    }
  };
}
