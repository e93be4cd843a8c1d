// packages/shared/src/constants.ts

/** Encodings tried, in order, when decoding an uploaded document. */
export const CANDIDATE_ENCODINGS = ["utf-8", "windows-1252", "latin-1"] as const;

/** Persisted artifact kinds and the file extension each handle must carry. */
export const ARTIFACT_KINDS = ["markdown", "json"] as const;

export const ARTIFACT_EXTENSIONS = {
  markdown: ".md",
  json: ".json",
} as const;

export const ARTIFACT_CONTENT_TYPES = {
  markdown: "text/markdown",
  json: "application/json",
} as const;

/** How the enhanced dataset in a result was obtained. */
export const ENHANCEMENT_STATUSES = ["enhanced", "no_json_fence", "invalid_json"] as const;

export const DEFAULT_MODEL = "claude-sonnet-4";

/** Characters of the model answer echoed back in `analysis_preview`. */
export const ANALYSIS_PREVIEW_LIMIT = 500;
