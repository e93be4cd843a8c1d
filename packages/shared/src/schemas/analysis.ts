import { z } from "zod";
import {
  ARTIFACT_CONTENT_TYPES,
  ARTIFACT_KINDS,
  CANDIDATE_ENCODINGS,
  ENHANCEMENT_STATUSES,
} from "../constants";

/**
 * Shapes exchanged with callers of the analysis service.
 * - Artifact metadata is what the store hands back after a persist.
 * - The analyze response is a success/failure union keyed by `success`.
 */

const IsoDateSchema = z.iso.datetime();

export const CandidateEncodingSchema = z.enum(CANDIDATE_ENCODINGS);
export type CandidateEncoding = z.infer<typeof CandidateEncodingSchema>;

export const ArtifactKindSchema = z.enum(ARTIFACT_KINDS);
export type ArtifactKind = z.infer<typeof ArtifactKindSchema>;

export const EnhancementStatusSchema = z.enum(ENHANCEMENT_STATUSES);
export type EnhancementStatus = z.infer<typeof EnhancementStatusSchema>;

// Bare file name: no separators, no leading dot.
export const ArtifactHandleSchema = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/);

export const ArtifactMetadataSchema = z
  .object({
    handle: ArtifactHandleSchema,
    kind: ArtifactKindSchema,
    content_type: z.enum([ARTIFACT_CONTENT_TYPES.markdown, ARTIFACT_CONTENT_TYPES.json]),
    sha256: z.string().regex(/^[a-f0-9]{64}$/),
    bytes: z.number().int().nonnegative(),
    created_at: IsoDateSchema,
    expires_at: IsoDateSchema,
  })
  .strict();

export type ArtifactMetadata = z.infer<typeof ArtifactMetadataSchema>;

export const AnalysisSummarySchema = z
  .object({
    markdown_handle: ArtifactHandleSchema,
    json_handle: ArtifactHandleSchema,
    tickets_analyzed: z.number().int().nonnegative(),
    annotated_tickets: z.number().int().nonnegative(),
    model_used: z.string().min(1),
    mock_mode: z.boolean(),
    analysis_preview: z.string(),
    analysis: z.string(),
    enhanced_dataset: z.unknown(),
    enhancement_status: EnhancementStatusSchema,
    artifacts: z
      .object({
        markdown: ArtifactMetadataSchema,
        json: ArtifactMetadataSchema,
      })
      .strict(),
    encodings: z
      .object({
        severity_document: CandidateEncodingSchema,
        ticket_dataset: CandidateEncodingSchema,
      })
      .strict(),
  })
  .strict();

export type AnalysisSummary = z.infer<typeof AnalysisSummarySchema>;

export const AnalyzeSuccessResponseSchema = AnalysisSummarySchema.extend({
  success: z.literal(true),
}).strict();

export const AnalyzeFailureResponseSchema = z
  .object({
    success: z.literal(false),
    error: z.string().min(1),
  })
  .strict();

export const AnalyzeResponseSchema = z.discriminatedUnion("success", [
  AnalyzeSuccessResponseSchema,
  AnalyzeFailureResponseSchema,
]);

export type AnalyzeResponse = z.infer<typeof AnalyzeResponseSchema>;
