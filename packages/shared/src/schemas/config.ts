import { z } from "zod";
import { DEFAULT_MODEL } from "../constants";

/**
 * Analyzer configuration, read from config.json once per request.
 * - Defaults mirror what the service ran with before the file existed.
 * - Endpoint credentials are only optional while mock_mode is on.
 */
export const AnalyzerConfigSchema = z
  .object({
    api_url: z.url().optional(),
    api_key: z.string().min(1).optional(),
    model: z.string().min(1).default(DEFAULT_MODEL),
    max_tokens: z.number().int().positive().default(4000),
    temperature: z.number().min(0).max(2).default(0.1),
    timeout_seconds: z.number().positive().default(300),
    mock_mode: z.boolean().default(false),
    debug_logging: z.boolean().default(false),
    log_file: z.string().min(1).default("analyzer_debug.log"),
    truncate_log_on_run: z.boolean().default(false),
    artifact_dir: z.string().min(1).optional(),
    artifact_ttl_minutes: z.number().int().positive().default(60),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.mock_mode) {
      return;
    }
    if (!value.api_url) {
      ctx.addIssue({
        code: "custom",
        path: ["api_url"],
        message: "api_url is required unless mock_mode is enabled",
      });
    }
    if (!value.api_key) {
      ctx.addIssue({
        code: "custom",
        path: ["api_key"],
        message: "api_key is required unless mock_mode is enabled",
      });
    }
  });

export type AnalyzerConfig = Readonly<z.infer<typeof AnalyzerConfigSchema>>;
