import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationInvalidError, ConfigurationMissingError } from "../modules/analysis/analysis.errors";
import { loadAnalyzerConfig, resolveConfigPath } from "./loadConfig";

describe("loadAnalyzerConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "analyzer-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(value: unknown) {
    const configPath = path.join(dir, "config.json");
    await fs.writeFile(configPath, typeof value === "string" ? value : JSON.stringify(value), "utf8");
    return configPath;
  }

  it("applies defaults to a minimal mock-mode file", async () => {
    const config = await loadAnalyzerConfig(await writeConfig({ mock_mode: true }));

    expect(config).toEqual({
      model: "claude-sonnet-4",
      max_tokens: 4000,
      temperature: 0.1,
      timeout_seconds: 300,
      mock_mode: true,
      debug_logging: false,
      log_file: "analyzer_debug.log",
      truncate_log_on_run: false,
      artifact_ttl_minutes: 60,
    });
  });

  it("requires endpoint credentials outside mock mode", async () => {
    const configPath = await writeConfig({ model: "m" });

    const failure = loadAnalyzerConfig(configPath);

    await expect(failure).rejects.toBeInstanceOf(ConfigurationInvalidError);
    await expect(failure).rejects.toMatchObject({
      issues: [
        "api_url: api_url is required unless mock_mode is enabled",
        "api_key: api_key is required unless mock_mode is enabled",
      ],
    });
  });

  it("raises ConfigurationMissingError when the file does not exist", async () => {
    const configPath = path.join(dir, "absent.json");

    const failure = loadAnalyzerConfig(configPath);

    await expect(failure).rejects.toBeInstanceOf(ConfigurationMissingError);
    await expect(failure).rejects.toMatchObject({ configPath, kind: "configuration_missing" });
  });

  it("rejects malformed JSON and unknown keys", async () => {
    await expect(loadAnalyzerConfig(await writeConfig("{ not json"))).rejects.toBeInstanceOf(
      ConfigurationInvalidError
    );
    await expect(loadAnalyzerConfig(await writeConfig({ mock_mode: true, verbose: 1 }))).rejects.toBeInstanceOf(
      ConfigurationInvalidError
    );
  });
});

describe("resolveConfigPath", () => {
  it("prefers an explicit path", () => {
    expect(resolveConfigPath("/etc/analyzer/config.json")).toBe(path.resolve("/etc/analyzer/config.json"));
  });
});
