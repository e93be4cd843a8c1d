import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { AnalyzerConfigSchema, type AnalyzerConfig } from "@tra/shared";
import {
  ConfigurationInvalidError,
  ConfigurationMissingError,
} from "../modules/analysis/analysis.errors";

export function resolveConfigPath(explicitPath?: string): string {
  const configured = explicitPath ?? process.env.ANALYZER_CONFIG_PATH;
  return configured && configured.trim() ? path.resolve(configured) : path.resolve(process.cwd(), "config.json");
}

function summarizeZodIssues(error: z.ZodError) {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Reads and validates the analyzer configuration. Called fresh for every request,
 * so edits to the file apply without a restart.
 */
export async function loadAnalyzerConfig(configPath: string): Promise<AnalyzerConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new ConfigurationMissingError(configPath);
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationInvalidError(configPath, [err instanceof Error ? err.message : String(err)]);
  }

  const parsed = AnalyzerConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationInvalidError(configPath, summarizeZodIssues(parsed.error));
  }
  return parsed.data;
}
