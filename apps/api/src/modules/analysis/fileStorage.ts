import { promises as fs } from "node:fs";
import { createHash } from "node:crypto";

/**
 * File helpers for artifact persistence.
 * - Atomic writes keep a reader from ever seeing a half-written artifact.
 * - Digests let callers confirm a download matches what was stored.
 */

// Ensure a directory exists, creates it if doesn't.
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

// Writes a file via temp + rename so updates are atomic (prevents partial writes).
export async function writeTextAtomic(filePath: string, contents: string): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  await fs.writeFile(tmpPath, contents, "utf8");

  try {
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    // Windows can fail renaming over an existing file.
    if (isErrnoCode(err, "EEXIST", "EPERM", "EACCES")) {
      await removeIfExists(filePath);
      await fs.rename(tmpPath, filePath);
      return;
    }
    await removeIfExists(tmpPath);
    throw err;
  }
}

// Pretty-printed JSON with a trailing newline, the on-disk form of every JSON artifact.
export function serializeJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + "\n";
}

// Computes a SHA-256 hex digest for content integrity checks.
export function sha256Hex(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

export async function removeIfExists(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (!isErrnoCode(err, "ENOENT")) {
      throw err;
    }
  }
}

export function isErrnoCode(err: unknown, ...codes: string[]): boolean {
  return err instanceof Error && "code" in err && typeof err.code === "string" && codes.includes(err.code);
}
