import { z } from "zod";
import type { AnalyzerConfig } from "@tra/shared";
import type { AnalysisLogger } from "../../logging/analysisLogger";
import {
  ApiError,
  ConfigurationInvalidError,
  UnexpectedResponseFormatError,
  errorMessage,
} from "./analysis.errors";

export const MOCK_ANALYSIS_REPORT = `# Vulnerability Risk Analysis Report

## Executive Summary
This is a mock analysis response for testing purposes. The actual API call was skipped because mock_mode is enabled in the configuration.

## Analysis Results
- Total tickets analyzed: [Mock Data]
- High severity issues: [Mock Data]
- Medium severity issues: [Mock Data]
- Low severity issues: [Mock Data]

## Recommendations
1. Review high-severity vulnerabilities immediately
2. Implement security patches for critical systems
3. Conduct regular security assessments

*Note: This is mock data generated for testing purposes.*
`;

// Only the path we read is checked; providers add plenty of other fields.
const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

function extractText(body: unknown): string {
  const parsed = ChatCompletionSchema.safeParse(body);
  if (!parsed.success) {
    throw new UnexpectedResponseFormatError("missing choices[0].message.content");
  }
  return parsed.data.choices[0].message.content;
}

/**
 * Sends the prompt to the configured chat-completion endpoint and returns the generated text.
 * One attempt per call; resubmitting is up to the caller.
 */
export async function requestCompletion(
  config: AnalyzerConfig,
  prompt: string,
  logger: AnalysisLogger
): Promise<string> {
  logger.info(
    {
      model: config.model,
      max_tokens: config.max_tokens,
      temperature: config.temperature,
      prompt_length: prompt.length,
    },
    "completion_request_started"
  );
  logger.debug({ prompt }, "completion_prompt");

  if (config.mock_mode) {
    logger.info({ mock_mode: true }, "completion_mock_response");
    return MOCK_ANALYSIS_REPORT;
  }

  const { api_url: apiUrl, api_key: apiKey } = config;
  if (!apiUrl || !apiKey) {
    throw new ConfigurationInvalidError("analyzer configuration", [
      "api_url and api_key are required unless mock_mode is enabled",
    ]);
  }

  let response: Response;
  try {
    response = await fetch(apiUrl, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: config.model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: config.max_tokens,
        temperature: config.temperature,
      }),
      signal: AbortSignal.timeout(config.timeout_seconds * 1000),
    });
  } catch (err) {
    const error = new ApiError(`API request failed: ${errorMessage(err)}`, undefined, { cause: err });
    logger.error({ err: error }, "completion_request_failed");
    throw error;
  }

  logger.info({ status: response.status }, "completion_response_received");

  if (!response.ok) {
    let detail: string;
    let cause: unknown;
    try {
      detail = (await response.text()) || response.statusText;
    } catch (err) {
      detail = `${response.statusText || "error body unreadable"} (${errorMessage(err)})`;
      cause = err;
    }
    const error = new ApiError(`API request failed with ${response.status}: ${detail}`, response.status, { cause });
    logger.error({ err: error }, "completion_request_failed");
    throw error;
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    const error = new ApiError(`Failed to parse API response: ${errorMessage(err)}`, response.status, {
      cause: err,
    });
    logger.error({ err: error }, "completion_request_failed");
    throw error;
  }

  logger.debug({ body }, "completion_response_body");

  try {
    const text = extractText(body);
    logger.info({ response_length: text.length }, "completion_request_succeeded");
    return text;
  } catch (err) {
    logger.error({ err }, "completion_response_unexpected");
    throw err;
  }
}
