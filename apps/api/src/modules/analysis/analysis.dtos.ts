import { z } from "zod";
import type { ArtifactKind } from "@tra/shared";

// Multipart field names the upload form posts.
export const UPLOAD_FIELDS = ["severity_file", "json_file"] as const;
export type UploadField = (typeof UPLOAD_FIELDS)[number];

// Request params for downloading an artifact by handle
export const DownloadParamsSchema = z.object({ handle: z.string().min(1) }).strict();

// File name offered to the browser for each artifact kind.
export const DOWNLOAD_FILENAMES: Record<ArtifactKind, string> = {
  markdown: "vulnerability_analysis.md",
  json: "enhanced_tickets.json",
};
