import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import {
  AnalyzeFailureResponseSchema,
  AnalyzeSuccessResponseSchema,
  type AnalyzerConfig,
  type ArtifactKind,
} from "@tra/shared";
import { loadAnalyzerConfig } from "../../config/loadConfig";
import { createAnalysisLogger } from "../../logging/analysisLogger";
import {
  DOWNLOAD_FILENAMES,
  DownloadParamsSchema,
  UPLOAD_FIELDS,
  type UploadField,
} from "./analysis.dtos";
import {
  AnalysisError,
  ArtifactNotFoundError,
  InvalidArtifactTypeError,
  type AnalysisErrorKind,
} from "./analysis.errors";
import { runAnalysis, type AnalysisOutcome } from "./analysisPipeline";
import { artifactStoreFor } from "./artifactStore";

type Upload = { filename: string; content: Buffer };

type UploadsResult =
  | { ok: true; severity: Upload; dataset: Upload }
  | { ok: false; message: string };

const STATUS_BY_KIND: Record<AnalysisErrorKind, number> = {
  configuration_missing: 500,
  configuration_invalid: 500,
  decoding_failed: 400,
  dataset_parse_failed: 400,
  api_error: 502,
  unexpected_response_format: 502,
  persistence_failed: 500,
  artifact_not_found: 404,
  invalid_artifact_type: 400,
};

function isUploadField(name: string): name is UploadField {
  return (UPLOAD_FIELDS as readonly string[]).includes(name);
}

function statusFor(error: Extract<AnalysisOutcome, { status: "failed" }>["error"]) {
  return error instanceof AnalysisError ? STATUS_BY_KIND[error.kind] : 500;
}

function failure(message: string) {
  return AnalyzeFailureResponseSchema.parse({ success: false, error: message });
}

async function readUploads(request: FastifyRequest): Promise<UploadsResult> {
  const uploads: Partial<Record<UploadField, Upload>> = {};

  if (request.isMultipart()) {
    for await (const part of request.parts()) {
      if (part.type !== "file") {
        continue;
      }
      if (!isUploadField(part.fieldname)) {
        part.file.resume();
        continue;
      }
      uploads[part.fieldname] = { filename: part.filename, content: await part.toBuffer() };
    }
  }

  const severity = uploads.severity_file;
  const dataset = uploads.json_file;
  if (!severity || !dataset) {
    return { ok: false, message: "Both severity_file and json_file are required" };
  }
  if (severity.filename === "" || dataset.filename === "") {
    return { ok: false, message: "Both files must be selected" };
  }
  return { ok: true, severity, dataset };
}

export function createAnalysisController(deps: { configPath: string }) {
  const { configPath } = deps;

  async function loadConfigOrReply(reply: FastifyReply): Promise<AnalyzerConfig | null> {
    try {
      return await loadAnalyzerConfig(configPath);
    } catch (err) {
      if (err instanceof AnalysisError) {
        reply.code(500).send({ error: "server_misconfigured", message: err.message });
        return null;
      }
      throw err;
    }
  }

  async function sendArtifact(kind: ArtifactKind, request: FastifyRequest, reply: FastifyReply) {
    try {
      const { handle } = DownloadParamsSchema.parse(request.params);
      const config = await loadConfigOrReply(reply);
      if (!config) {
        return reply;
      }

      const artifact = await artifactStoreFor(config, request.log).read(kind, handle);
      return reply
        .header("Content-Disposition", `attachment; filename="${DOWNLOAD_FILENAMES[kind]}"`)
        .header("X-Content-SHA256", artifact.sha256)
        .header("Expires", new Date(artifact.expires_at).toUTCString())
        .type(`${artifact.content_type}; charset=utf-8`)
        .send(artifact.content);
    } catch (err) {
      if (err instanceof InvalidArtifactTypeError) {
        return reply.code(400).send({ error: "invalid_file_type", message: err.message });
      }
      if (err instanceof ArtifactNotFoundError) {
        return reply.code(404).send({ error: "file_not_found", message: err.message });
      }
      if (err instanceof z.ZodError) {
        return reply.code(400).send({ error: "bad_request", issues: err.issues });
      }
      throw err;
    }
  }

  return {
    async analyze(request: FastifyRequest, reply: FastifyReply) {
      let config: AnalyzerConfig;
      try {
        config = await loadAnalyzerConfig(configPath);
      } catch (err) {
        if (err instanceof AnalysisError) {
          request.log.error({ err }, "analysis_config_unavailable");
          return reply.code(500).send(failure(err.message));
        }
        throw err;
      }

      const logger = createAnalysisLogger(config, request.log);
      logger.info({ request_id: request.id }, "analysis_request_received");

      const uploads = await readUploads(request);
      if (!uploads.ok) {
        logger.error({ request_id: request.id }, uploads.message);
        return reply.code(400).send(failure(uploads.message));
      }
      logger.info(
        { severity_file: uploads.severity.filename, json_file: uploads.dataset.filename },
        "analysis_files_received"
      );

      const outcome = await runAnalysis({
        config,
        severityDocument: uploads.severity.content,
        ticketDataset: uploads.dataset.content,
        store: artifactStoreFor(config, logger),
        logger,
      });

      if (outcome.status === "failed") {
        return reply.code(statusFor(outcome.error)).send(failure(outcome.error.message));
      }
      return reply.send(AnalyzeSuccessResponseSchema.parse({ success: true, ...outcome.result }));
    },

    async downloadMarkdown(request: FastifyRequest, reply: FastifyReply) {
      return sendArtifact("markdown", request, reply);
    },

    async downloadJson(request: FastifyRequest, reply: FastifyReply) {
      return sendArtifact("json", request, reply);
    },
  };
}
