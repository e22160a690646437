import pino, { type Logger } from "pino";
import path from "path";
import { fileURLToPath } from "url";
import fs from "fs";
import type { Request, Response, NextFunction } from "express";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const logsDir = path.join(__dirname, "../data/logs");

// Rotate log file daily — filename: pipeline-YYYY-MM-DD.log
function logFilePath(): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(logsDir, `pipeline-${date}.log`);
}

function createLogger(): Logger {
  // Tests run silent: no worker threads, no files
  if (process.env.NODE_ENV === "test") {
    return pino({ level: "silent" });
  }

  if (!fs.existsSync(logsDir)) fs.mkdirSync(logsDir, { recursive: true });

  // Multi-destination: stderr (human-readable) + file (JSON for parsing)
  const transport = pino.transport({
    targets: [
      {
        target: "pino-pretty",
        options: {
          destination: 2, // stderr — keeps stdout clean for CLI output
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
        level: process.env.LOG_LEVEL ?? "info",
      },
      {
        target: "pino/file",
        options: {
          destination: logFilePath(),
          mkdir: true,
        },
        level: "debug", // file gets everything
      },
    ],
  });

  return pino(
    {
      level: "debug", // base level — targets filter individually
      base: { service: "equity-analytics" },
    },
    transport,
  );
}

export const logger = createLogger();

// One child per pipeline stage, plus the HTTP surface
export const logFetch = logger.child({ subsystem: "fetcher" });
export const logValidate = logger.child({ subsystem: "validator" });
export const logPipeline = logger.child({ subsystem: "pipeline" });
export const logRest = logger.child({ subsystem: "rest" });

/** Logs each finished request; server errors at warn so they reach the console. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();
  res.on("finish", () => {
    const durationMs = Number((process.hrtime.bigint() - startedAt) / 1_000_000n);
    const entry = { method: req.method, path: req.path, status: res.statusCode, duration_ms: durationMs };
    const line = `${req.method} ${req.originalUrl} → ${res.statusCode} (${durationMs}ms)`;
    if (res.statusCode >= 500) logRest.warn(entry, line);
    else logRest.info(entry, line);
  });
  next();
}

const LOG_FILE_PATTERN = /^pipeline-(\d{4}-\d{2}-\d{2})\.log$/;

/** Delete daily log files older than `keepDays`. Returns how many were removed. */
export function pruneOldLogs(keepDays = 30, now: Date = new Date()): number {
  if (!fs.existsSync(logsDir)) return 0;
  const cutoff = new Date(now.getTime() - keepDays * 86_400_000).toISOString().slice(0, 10);
  let pruned = 0;
  try {
    for (const file of fs.readdirSync(logsDir)) {
      const day = LOG_FILE_PATTERN.exec(file)?.[1];
      if (day === undefined || day >= cutoff) continue;
      fs.unlinkSync(path.join(logsDir, file));
      pruned++;
    }
  } catch (e) {
    logger.warn({ err: e, pruned }, "Failed to prune old logs");
  }
  if (pruned > 0) logger.info({ pruned, keepDays }, "Pruned old log files");
  return pruned;
}
