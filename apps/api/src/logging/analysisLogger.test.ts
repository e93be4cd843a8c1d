import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AnalyzerConfigSchema } from "@tra/shared";
import { createAnalysisLogger, resetAnalysisLogSinks } from "./analysisLogger";

function serviceLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("createAnalysisLogger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "analysis-log-"));
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  afterEach(async () => {
    resetAnalysisLogSinks();
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes nothing when debug logging is off", async () => {
    const logFile = path.join(dir, "off.log");
    const logger = createAnalysisLogger(
      AnalyzerConfigSchema.parse({ mock_mode: true, log_file: logFile }),
      serviceLogger()
    );

    logger.info({ step: 1 }, "ignored");

    await expect(fs.access(logFile)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("appends structured debug entries to the log file", async () => {
    const logFile = path.join(dir, "debug.log");
    await fs.writeFile(logFile, "previous run\n", "utf8");
    const config = AnalyzerConfigSchema.parse({ mock_mode: true, debug_logging: true, log_file: logFile });

    const logger = createAnalysisLogger(config, serviceLogger());
    logger.debug({ prompt: "full prompt" }, "completion_prompt");

    const lines = (await fs.readFile(logFile, "utf8")).trim().split("\n");
    expect(lines[0]).toBe("previous run");
    expect(JSON.parse(lines[1])).toMatchObject({ level: 20, prompt: "full prompt", msg: "completion_prompt" });
  });

  it("truncates the log file once per process when configured", async () => {
    const logFile = path.join(dir, "truncate.log");
    await fs.writeFile(logFile, "stale entries\n", "utf8");
    const config = AnalyzerConfigSchema.parse({
      mock_mode: true,
      debug_logging: true,
      truncate_log_on_run: true,
      log_file: logFile,
    });

    createAnalysisLogger(config, serviceLogger()).info({ request: 1 }, "first");
    createAnalysisLogger(config, serviceLogger()).info({ request: 2 }, "second");

    const lines = (await fs.readFile(logFile, "utf8")).trim().split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^=== Analyzer log started at .+ ===$/);
    expect(JSON.parse(lines[1])).toMatchObject({ request: 1, msg: "first" });
    expect(JSON.parse(lines[2])).toMatchObject({ request: 2, msg: "second" });
  });

  it("warns and continues silently when the log file cannot be opened", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "", "utf8");
    const service = serviceLogger();
    const config = AnalyzerConfigSchema.parse({
      mock_mode: true,
      debug_logging: true,
      log_file: path.join(blocker, "nested.log"),
    });

    const logger = createAnalysisLogger(config, service);
    logger.info({}, "still works");

    expect(service.warn).toHaveBeenCalledTimes(1);
    expect(service.warn.mock.calls[0][1]).toBe("analysis_log_unavailable");
  });
});
