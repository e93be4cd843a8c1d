import { vi } from "vitest";
import { AnalyzerConfigSchema, type AnalyzerConfig } from "@tra/shared";
import type { AnalysisLogger } from "../../logging/analysisLogger";

export function testConfig(overrides: Record<string, unknown> = {}): AnalyzerConfig {
  return AnalyzerConfigSchema.parse({
    api_url: "https://llm.test/v1/chat/completions",
    api_key: "test-key",
    model: "test-model",
    max_tokens: 1200,
    temperature: 0.2,
    timeout_seconds: 5,
    ...overrides,
  });
}

export function recordingLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies AnalysisLogger;
}

export function completionResponse(content: string, init: ResponseInit = { status: 200 }) {
  return new Response(JSON.stringify({ id: "cmpl-1", choices: [{ index: 0, message: { role: "assistant", content } }] }), {
    ...init,
    headers: { "Content-Type": "application/json" },
  });
}
