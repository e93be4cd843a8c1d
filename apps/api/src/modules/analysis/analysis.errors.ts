import type { CandidateEncoding } from "@tra/shared";

export type AnalysisErrorKind =
  | "configuration_missing"
  | "configuration_invalid"
  | "decoding_failed"
  | "dataset_parse_failed"
  | "api_error"
  | "unexpected_response_format"
  | "persistence_failed"
  | "artifact_not_found"
  | "invalid_artifact_type";

/**
 * Base class for every failure the analysis pipeline and the artifact store raise.
 * `kind` lets callers branch without an instanceof chain.
 */
export abstract class AnalysisError extends Error {
  abstract readonly kind: AnalysisErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationMissingError extends AnalysisError {
  readonly kind = "configuration_missing";

  constructor(readonly configPath: string) {
    super(`Configuration file not found: ${configPath}`);
  }
}

export class ConfigurationInvalidError extends AnalysisError {
  readonly kind = "configuration_invalid";

  constructor(configPath: string, readonly issues: string[]) {
    super(`Configuration file is invalid (${configPath}): ${issues.join("; ")}`);
  }
}

export class DecodingError extends AnalysisError {
  readonly kind = "decoding_failed";

  constructor(readonly attemptedEncodings: readonly CandidateEncoding[]) {
    super(`Could not decode content with any of the attempted encodings: ${attemptedEncodings.join(", ")}`);
  }
}

export class DatasetParseError extends AnalysisError {
  readonly kind = "dataset_parse_failed";

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Invalid JSON file: ${detail}`, options);
  }
}

export class ApiError extends AnalysisError {
  readonly kind = "api_error";

  constructor(message: string, readonly statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UnexpectedResponseFormatError extends AnalysisError {
  readonly kind = "unexpected_response_format";

  constructor(detail: string) {
    super(`Unexpected API response format: ${detail}`);
  }
}

export class PersistenceError extends AnalysisError {
  readonly kind = "persistence_failed";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ArtifactNotFoundError extends AnalysisError {
  readonly kind = "artifact_not_found";

  constructor(handle: string) {
    super(`Artifact not found: ${handle}`);
  }
}

export class InvalidArtifactTypeError extends AnalysisError {
  readonly kind = "invalid_artifact_type";

  constructor(handle: string, expectedExtension: string) {
    super(`Invalid file type for ${handle}: expected ${expectedExtension}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
