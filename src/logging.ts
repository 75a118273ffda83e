import pino from "pino";
import path from "node:path";
import fs from "node:fs";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function toLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const val = (raw ?? "").trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === val) ?? fallback;
}

// stderr (human-readable) from the start; the JSON file joins once the
// run's logs dir is known. stdout is left to the CLI's operator lines.
const streams = pino.multistream([
  {
    level: toLogLevel(process.env.LOG_LEVEL),
    stream: pino.transport({
      target: "pino-pretty",
      options: {
        destination: 2,
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      },
    }),
  },
]);

export const logger = pino(
  {
    level: "debug",
    base: { service: "batchload" },
  },
  streams,
);

export const logPlanner = logger.child({ subsystem: "planner" });
export const logExec = logger.child({ subsystem: "executor" });
export const logTemplates = logger.child({ subsystem: "templates" });
export const logConfig = logger.child({ subsystem: "config" });

const RUN_LOG_PATTERN = /^orchestrator-(\d{4}-\d{2}-\d{2})\.log$/;

/** orchestrator-YYYY-MM-DD.log, one file per day */
export function runLogName(date: Date = new Date()): string {
  return `orchestrator-${date.toISOString().slice(0, 10)}.log`;
}

let runLogPath: string | null = null;

/**
 * Add the daily JSON log file under logsDir (everything from debug up).
 * Later calls return the file already attached.
 */
export function attachRunLog(logsDir: string): string {
  if (runLogPath !== null) return runLogPath;
  const file = path.join(path.resolve(logsDir), runLogName());
  streams.add({
    level: "debug",
    stream: pino.transport({ target: "pino/file", options: { destination: file, mkdir: true } }),
  });
  runLogPath = file;
  return file;
}

/**
 * Delete orchestrator-*.log files older than keepDays. Per-file loader logs
 * in the mode subdirectories are not touched. Returns the deleted names.
 */
export function pruneOldLogs(logsDir: string, keepDays: number = 30, now: Date = new Date()): string[] {
  if (!fs.existsSync(logsDir)) return [];

  const cutoff = new Date(now);
  cutoff.setDate(cutoff.getDate() - keepDays);
  const cutoffDay = cutoff.toISOString().slice(0, 10);

  const pruned: string[] = [];
  for (const name of fs.readdirSync(logsDir)) {
    const day = RUN_LOG_PATTERN.exec(name)?.[1];
    if (day === undefined || day >= cutoffDay) continue;
    try {
      fs.unlinkSync(path.join(logsDir, name));
      pruned.push(name);
    } catch (err) {
      logger.warn({ err, file: name }, "Could not prune old run log");
    }
  }
  if (pruned.length > 0) logger.info({ logsDir, pruned }, "Pruned old run logs");
  return pruned;
}
