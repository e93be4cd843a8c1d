import { CANDIDATE_ENCODINGS, type CandidateEncoding } from "@tra/shared";
import { DecodingError } from "./analysis.errors";

export type DecodedText = {
  text: string;
  encoding: CandidateEncoding;
};

// Code points Windows-1252 leaves unassigned; WHATWG decoders map them to C1 controls instead of failing.
const WINDOWS_1252_UNDEFINED = new Set([0x81, 0x8d, 0x8f, 0x90, 0x9d]);

function tryDecode(bytes: Uint8Array, encoding: CandidateEncoding): string | null {
  switch (encoding) {
    case "utf-8":
      try {
        return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
      } catch {
        return null;
      }
    case "windows-1252":
      if (bytes.some((byte) => WINDOWS_1252_UNDEFINED.has(byte))) {
        return null;
      }
      return new TextDecoder("windows-1252").decode(bytes);
    case "latin-1":
      return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1");
  }
}

/**
 * Decodes uploaded bytes with the first candidate encoding that accepts them.
 * Trial decoding only; there is no detection beyond the fixed candidate order.
 */
export function decodeWithFallback(
  bytes: Uint8Array,
  candidates: readonly CandidateEncoding[] = CANDIDATE_ENCODINGS
): DecodedText {
  for (const encoding of candidates) {
    const text = tryDecode(bytes, encoding);
    if (text !== null) {
      return { text, encoding };
    }
  }

  throw new DecodingError(candidates);
}
