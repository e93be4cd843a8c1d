import type { EnhancementStatus, TicketDataset } from "@tra/shared";

export type FenceScan =
  | { kind: "found"; markdown: string; jsonText: string }
  | { kind: "not_found"; fullText: string };

export type AnalysisArtifacts = {
  markdownReport: string;
  enhancedDataset: TicketDataset;
};

export type SplitOutcome =
  | { kind: "enhanced"; artifacts: AnalysisArtifacts }
  | { kind: "fallback"; reason: Exclude<EnhancementStatus, "enhanced">; artifacts: AnalysisArtifacts };

const JSON_FENCE_OPEN = "```json";
const FENCE_CLOSE = "```";

/**
 * Two-phase scan over the model answer: find the first ```json marker, then the
 * next closing fence. An unterminated block runs to the end of the text.
 * The marker is matched exactly, so ```JSON is not a json fence.
 */
export function splitModelResponse(text: string): FenceScan {
  const openAt = text.indexOf(JSON_FENCE_OPEN);
  if (openAt === -1) {
    return { kind: "not_found", fullText: text };
  }

  const bodyStart = openAt + JSON_FENCE_OPEN.length;
  const close = text.indexOf(FENCE_CLOSE, bodyStart);
  const jsonText = (close === -1 ? text.slice(bodyStart) : text.slice(bodyStart, close)).trim();

  return {
    kind: "found",
    markdown: text.slice(0, openAt).trim(),
    jsonText,
  };
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Derives the report and the enhanced dataset from the model answer.
 * Never throws: without a usable JSON block the original dataset is returned as is.
 */
export function deriveArtifacts(text: string, originalDataset: TicketDataset): SplitOutcome {
  const scan = splitModelResponse(text);

  if (scan.kind === "not_found") {
    return {
      kind: "fallback",
      reason: "no_json_fence",
      artifacts: { markdownReport: scan.fullText, enhancedDataset: originalDataset },
    };
  }

  const parsed = tryParseJson(scan.jsonText);
  if (!parsed.ok) {
    return {
      kind: "fallback",
      reason: "invalid_json",
      artifacts: { markdownReport: scan.markdown, enhancedDataset: originalDataset },
    };
  }

  return {
    kind: "enhanced",
    artifacts: { markdownReport: scan.markdown, enhancedDataset: parsed.value },
  };
}
