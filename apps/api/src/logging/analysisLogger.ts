import fs from "node:fs";
import path from "node:path";
import pino, { type BaseLogger } from "pino";
import type { AnalyzerConfig } from "@tra/shared";

/** The slice of a pino logger the analysis stages write to. Fastify's `app.log` fits too. */
export type AnalysisLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

// One sink per log file for the whole process; concurrent requests append to the same destination.
const sinks = new Map<string, pino.Logger>();

export function createSilentLogger(): AnalysisLogger {
  return pino({ enabled: false });
}

function openSink(logFile: string, truncate: boolean): pino.Logger {
  const resolved = path.resolve(logFile);
  const existing = sinks.get(resolved);
  if (existing) {
    return existing;
  }

  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  if (truncate) {
    fs.writeFileSync(resolved, `=== Analyzer log started at ${new Date().toISOString()} ===\n`, "utf8");
  } else {
    fs.closeSync(fs.openSync(resolved, "a"));
  }

  const destination = pino.destination({ dest: resolved, append: true, sync: true });
  const logger = pino(
    { level: "debug", timestamp: pino.stdTimeFunctions.isoTime },
    pino.multistream([
      { level: "debug", stream: destination },
      { level: "debug", stream: process.stdout },
    ])
  );

  sinks.set(resolved, logger);
  return logger;
}

/**
 * Builds the per-request analysis logger from configuration.
 * Disabled unless `debug_logging` is set. A log file that cannot be opened is
 * reported on `serviceLogger` and the request continues with a silent logger.
 *
 * Sinks are cached per log file for the life of the process, so
 * `truncate_log_on_run` truncates only when the process first opens the file;
 * later requests append to it.
 */
export function createAnalysisLogger(config: AnalyzerConfig, serviceLogger: AnalysisLogger): AnalysisLogger {
  if (!config.debug_logging) {
    return createSilentLogger();
  }

  try {
    return openSink(config.log_file, config.truncate_log_on_run);
  } catch (err) {
    serviceLogger.warn({ log_file: config.log_file, err }, "analysis_log_unavailable");
    return createSilentLogger();
  }
}

// Drops cached sinks so the next request reopens (and, if configured, truncates) its log file.
export function resetAnalysisLogSinks(): void {
  for (const logger of sinks.values()) {
    logger.flush();
  }
  sinks.clear();
}
