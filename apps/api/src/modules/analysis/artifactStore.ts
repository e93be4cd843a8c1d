import os from "node:os";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { promises as fs, type Stats } from "node:fs";
import {
  ARTIFACT_CONTENT_TYPES,
  ARTIFACT_EXTENSIONS,
  type AnalyzerConfig,
  ArtifactHandleSchema,
  ArtifactMetadataSchema,
  type ArtifactKind,
  type ArtifactMetadata,
} from "@tra/shared";
import type { AnalysisLogger } from "../../logging/analysisLogger";
import { createSilentLogger } from "../../logging/analysisLogger";
import {
  ArtifactNotFoundError,
  InvalidArtifactTypeError,
  PersistenceError,
  errorMessage,
} from "./analysis.errors";
import {
  ensureDir,
  isErrnoCode,
  removeIfExists,
  serializeJson,
  sha256Hex,
  writeTextAtomic,
} from "./fileStorage";
import type { AnalysisArtifacts } from "./responseSplitter";

/**
 * ArtifactStore (filesystem) - persists analysis outputs for later download.
 *
 * Folder model:
 * - <artifactDir>/<uuid>.md   (markdown report)
 * - <artifactDir>/<uuid>.json (enhanced dataset)
 *
 * Artifacts expire `ttlMinutes` after they were written. Expired files, and
 * temp files older than the TTL, are removed when a new analysis is persisted;
 * a read that finds an artifact stale deletes it.
 */

export type PersistedArtifacts = {
  markdown: ArtifactMetadata;
  json: ArtifactMetadata;
};

export type StoredArtifact = {
  handle: string;
  kind: ArtifactKind;
  content: string;
  content_type: ArtifactMetadata["content_type"];
  sha256: string;
  expires_at: string;
};

// Store-written artifacts, plus temp files a crashed write left behind.
const MANAGED_FILE = /^[0-9a-f-]{36}\.(md|json)(\.tmp)?$/;

export const DEFAULT_ARTIFACT_DIR = path.join(os.tmpdir(), "ticket-risk-analyzer");

export class ArtifactStore {
  private readonly artifactDir: string;
  private readonly ttlMs: number;
  private readonly logger: AnalysisLogger;
  private readonly now: () => Date;

  constructor(opts?: { artifactDir?: string; ttlMinutes?: number; logger?: AnalysisLogger; now?: () => Date }) {
    this.artifactDir = opts?.artifactDir ?? DEFAULT_ARTIFACT_DIR;
    this.ttlMs = (opts?.ttlMinutes ?? 60) * 60_000;
    this.logger = opts?.logger ?? createSilentLogger();
    this.now = opts?.now ?? (() => new Date());
  }

  async persist(artifacts: AnalysisArtifacts): Promise<PersistedArtifacts> {
    try {
      await ensureDir(this.artifactDir);
    } catch (err) {
      throw new PersistenceError(`Could not prepare artifact directory: ${errorMessage(err)}`, { cause: err });
    }
    try {
      await this.pruneExpired();
    } catch (err) {
      this.logger.warn({ artifact_dir: this.artifactDir, err }, "artifact_prune_failed");
    }

    const id = randomUUID();
    const createdAt = this.now();
    const writes = await Promise.allSettled([
      this.writeArtifact("markdown", `${id}${ARTIFACT_EXTENSIONS.markdown}`, artifacts.markdownReport, createdAt),
      this.writeArtifact("json", `${id}${ARTIFACT_EXTENSIONS.json}`, serializeJson(artifacts.enhancedDataset), createdAt),
    ]);

    const [markdown, json] = writes;
    if (markdown.status === "fulfilled" && json.status === "fulfilled") {
      this.logger.info(
        { markdown_handle: markdown.value.handle, json_handle: json.value.handle },
        "artifacts_persisted"
      );
      return { markdown: markdown.value, json: json.value };
    }

    // No half-persisted analysis: drop whichever file made it to disk.
    const cleanup = await Promise.allSettled([
      removeIfExists(this.resolve(`${id}${ARTIFACT_EXTENSIONS.markdown}`)),
      removeIfExists(this.resolve(`${id}${ARTIFACT_EXTENSIONS.json}`)),
    ]);
    for (const result of cleanup) {
      if (result.status === "rejected") {
        this.logger.warn({ artifact_id: id, err: result.reason }, "artifact_cleanup_failed");
      }
    }
    const failure = markdown.status === "rejected" ? markdown.reason : json.status === "rejected" ? json.reason : undefined;
    throw new PersistenceError(`Could not persist analysis artifacts: ${errorMessage(failure)}`, { cause: failure });
  }

  async read(kind: ArtifactKind, handle: string): Promise<StoredArtifact> {
    const extension = ARTIFACT_EXTENSIONS[kind];
    if (!handle.endsWith(extension)) {
      throw new InvalidArtifactTypeError(handle, extension);
    }
    if (!ArtifactHandleSchema.safeParse(handle).success) {
      throw new ArtifactNotFoundError(handle);
    }

    const filePath = this.resolve(handle);
    let stat: Stats;
    try {
      stat = await fs.stat(filePath);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) {
        throw new ArtifactNotFoundError(handle);
      }
      throw err;
    }

    if (!stat.isFile()) {
      throw new ArtifactNotFoundError(handle);
    }
    if (this.isExpired(stat.mtimeMs)) {
      await removeIfExists(filePath);
      throw new ArtifactNotFoundError(handle);
    }

    const content = await fs.readFile(filePath, "utf8");
    return {
      handle,
      kind,
      content,
      content_type: ARTIFACT_CONTENT_TYPES[kind],
      sha256: sha256Hex(content),
      expires_at: new Date(stat.mtimeMs + this.ttlMs).toISOString(),
    };
  }

  // Deletes store-managed artifacts older than the TTL and returns how many were removed.
  async pruneExpired(): Promise<number> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.artifactDir);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) {
        return 0;
      }
      throw err;
    }

    let removed = 0;
    for (const entry of entries.filter((name) => MANAGED_FILE.test(name))) {
      const filePath = this.resolve(entry);
      try {
        const stat = await fs.stat(filePath);
        if (this.isExpired(stat.mtimeMs)) {
          await removeIfExists(filePath);
          removed += 1;
        }
      } catch (err) {
        if (!isErrnoCode(err, "ENOENT")) {
          this.logger.warn({ handle: entry, err }, "artifact_prune_failed");
        }
      }
    }

    if (removed > 0) {
      this.logger.info({ removed }, "artifacts_pruned");
    }
    return removed;
  }

  private async writeArtifact(
    kind: ArtifactKind,
    handle: string,
    content: string,
    createdAt: Date
  ): Promise<ArtifactMetadata> {
    await writeTextAtomic(this.resolve(handle), content);
    return ArtifactMetadataSchema.parse({
      handle,
      kind,
      content_type: ARTIFACT_CONTENT_TYPES[kind],
      sha256: sha256Hex(content),
      bytes: Buffer.byteLength(content, "utf8"),
      created_at: createdAt.toISOString(),
      expires_at: new Date(createdAt.getTime() + this.ttlMs).toISOString(),
    });
  }

  private isExpired(mtimeMs: number) {
    return mtimeMs + this.ttlMs <= this.now().getTime();
  }

  private resolve(handle: string) {
    return path.join(this.artifactDir, handle);
  }
}

export function artifactStoreFor(config: AnalyzerConfig, logger: AnalysisLogger): ArtifactStore {
  return new ArtifactStore({
    artifactDir: config.artifact_dir,
    ttlMinutes: config.artifact_ttl_minutes,
    logger,
  });
}
