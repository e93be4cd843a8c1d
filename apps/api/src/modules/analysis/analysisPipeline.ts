import {
  ANALYSIS_PREVIEW_LIMIT,
  countAnnotatedTickets,
  countTickets,
  type AnalysisSummary,
  type AnalyzerConfig,
  type TicketDataset,
} from "@tra/shared";
import type { AnalysisLogger } from "../../logging/analysisLogger";
import { AnalysisError, DatasetParseError, errorMessage } from "./analysis.errors";
import type { ArtifactStore } from "./artifactStore";
import { requestCompletion } from "./completionClient";
import { decodeWithFallback } from "./encoding";
import { buildAnalysisPrompt } from "./promptBuilder";
import { deriveArtifacts } from "./responseSplitter";

export type AnalysisInput = {
  config: AnalyzerConfig;
  severityDocument: Uint8Array;
  ticketDataset: Uint8Array;
  store: ArtifactStore;
  logger: AnalysisLogger;
};

/**
 * A run either completes (possibly with the original dataset standing in for the
 * enhanced one) or fails at one stage. Nothing from a failed run reaches the caller.
 */
export type AnalysisOutcome =
  | { status: "completed"; result: AnalysisSummary }
  | { status: "failed"; error: AnalysisError | UnclassifiedAnalysisError };

export class UnclassifiedAnalysisError extends Error {
  constructor(cause: unknown) {
    super(`Analysis failed: ${errorMessage(cause)}`, { cause });
    this.name = "UnclassifiedAnalysisError";
  }
}

// Counts code points, so a surrogate pair is never split.
export function buildPreview(text: string): string {
  const codePoints = Array.from(text);
  return codePoints.length > ANALYSIS_PREVIEW_LIMIT
    ? `${codePoints.slice(0, ANALYSIS_PREVIEW_LIMIT).join("")}...`
    : text;
}

function parseDataset(text: string): TicketDataset {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DatasetParseError(errorMessage(err), { cause: err });
  }
}

async function execute(input: AnalysisInput): Promise<AnalysisSummary> {
  const { config, logger, store } = input;

  const severity = decodeWithFallback(input.severityDocument);
  const dataset = decodeWithFallback(input.ticketDataset);
  logger.info(
    { severity_encoding: severity.encoding, dataset_encoding: dataset.encoding },
    "documents_decoded"
  );

  const original = parseDataset(dataset.text);
  const ticketsAnalyzed = countTickets(original);
  logger.info({ tickets: ticketsAnalyzed }, "dataset_parsed");

  const prompt = buildAnalysisPrompt(severity.text, dataset.text);
  const analysis = await requestCompletion(config, prompt, logger);

  const split = deriveArtifacts(analysis, original);
  if (split.kind === "fallback") {
    logger.warn({ reason: split.reason }, "enhanced_dataset_fallback");
  }

  const persisted = await store.persist(split.artifacts);

  return {
    markdown_handle: persisted.markdown.handle,
    json_handle: persisted.json.handle,
    tickets_analyzed: ticketsAnalyzed,
    annotated_tickets: countAnnotatedTickets(split.artifacts.enhancedDataset),
    model_used: config.model,
    mock_mode: config.mock_mode,
    analysis_preview: buildPreview(analysis),
    analysis,
    enhanced_dataset: split.artifacts.enhancedDataset,
    enhancement_status: split.kind === "enhanced" ? "enhanced" : split.reason,
    artifacts: persisted,
    encodings: {
      severity_document: severity.encoding,
      ticket_dataset: dataset.encoding,
    },
  };
}

/** Runs decode → prompt → completion → split → persist for one request. */
export async function runAnalysis(input: AnalysisInput): Promise<AnalysisOutcome> {
  const { logger } = input;
  logger.info({ model: input.config.model, mock_mode: input.config.mock_mode }, "analysis_started");

  try {
    const result = await execute(input);
    logger.info({ markdown_handle: result.markdown_handle, json_handle: result.json_handle }, "analysis_completed");
    return { status: "completed", result };
  } catch (err) {
    const error = err instanceof AnalysisError ? err : new UnclassifiedAnalysisError(err);
    logger.error({ err: error }, "analysis_failed");
    return { status: "failed", error };
  }
}
