import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ApiError, UnexpectedResponseFormatError } from "./analysis.errors";
import { MOCK_ANALYSIS_REPORT, requestCompletion } from "./completionClient";
import { completionResponse, recordingLogger, testConfig } from "./testSupport";

describe("requestCompletion", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the placeholder report in mock mode without calling the API", async () => {
    const config = testConfig({ mock_mode: true, api_url: undefined, api_key: undefined });

    const first = await requestCompletion(config, "prompt", recordingLogger());
    const second = await requestCompletion(config, "prompt", recordingLogger());

    expect(first).toBe(MOCK_ANALYSIS_REPORT);
    expect(second).toBe(first);
    expect(first.startsWith("# Vulnerability Risk Analysis Report")).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("posts a single user message and returns the first choice content", async () => {
    fetchMock.mockResolvedValue(completionResponse("# Report"));

    const text = await requestCompletion(testConfig(), "Analyze this", recordingLogger());

    expect(text).toBe("# Report");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.test/v1/chat/completions");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({
      Authorization: "Bearer test-key",
      "Content-Type": "application/json",
    });
    expect(JSON.parse(init.body)).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "Analyze this" }],
      max_tokens: 1200,
      temperature: 0.2,
    });
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it("raises ApiError with the status for a non-2xx response", async () => {
    fetchMock.mockResolvedValue(new Response("upstream down", { status: 503 }));

    const failure = requestCompletion(testConfig(), "p", recordingLogger());

    await expect(failure).rejects.toBeInstanceOf(ApiError);
    await expect(failure).rejects.toMatchObject({
      message: "API request failed with 503: upstream down",
      statusCode: 503,
    });
  });

  it("raises ApiError when the error body cannot be read", async () => {
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error("socket reset"));
      },
    });
    fetchMock.mockResolvedValue(new Response(body, { status: 500 }));

    const failure = requestCompletion(testConfig(), "p", recordingLogger());

    await expect(failure).rejects.toBeInstanceOf(ApiError);
    await expect(failure).rejects.toMatchObject({
      kind: "api_error",
      statusCode: 500,
      message: expect.stringMatching(/^API request failed with 500: error body unreadable \(/),
      cause: expect.any(Error),
    });
  });

  it("raises ApiError for transport failures and timeouts", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    await expect(requestCompletion(testConfig(), "p", recordingLogger())).rejects.toMatchObject({
      kind: "api_error",
      message: "API request failed: fetch failed",
    });

    fetchMock.mockRejectedValueOnce(
      Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" })
    );
    await expect(requestCompletion(testConfig(), "p", recordingLogger())).rejects.toMatchObject({
      kind: "api_error",
      message: "API request failed: The operation was aborted due to timeout",
    });
  });

  it("raises ApiError when the body is not JSON", async () => {
    fetchMock.mockResolvedValue(new Response("<html>oops</html>", { status: 200 }));

    const failure = requestCompletion(testConfig(), "p", recordingLogger());

    await expect(failure).rejects.toBeInstanceOf(ApiError);
    await expect(failure).rejects.toThrow(/^Failed to parse API response: /);
  });

  it("raises UnexpectedResponseFormatError when choices are missing", async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ choices: [] }), { status: 200 }));

    const failure = requestCompletion(testConfig(), "p", recordingLogger());

    await expect(failure).rejects.toBeInstanceOf(UnexpectedResponseFormatError);
    await expect(failure).rejects.toThrow("Unexpected API response format: missing choices[0].message.content");
  });

  it("logs the prompt and raw body only at debug level", async () => {
    fetchMock.mockResolvedValue(completionResponse("answer"));
    const logger = recordingLogger();

    await requestCompletion(testConfig(), "secret prompt text", logger);

    expect(logger.info).toHaveBeenCalledWith(
      { model: "test-model", max_tokens: 1200, temperature: 0.2, prompt_length: 18 },
      "completion_request_started"
    );
    expect(logger.info).toHaveBeenCalledWith({ status: 200 }, "completion_response_received");
    expect(logger.info).toHaveBeenCalledWith({ response_length: 6 }, "completion_request_succeeded");
    expect(logger.debug).toHaveBeenCalledWith({ prompt: "secret prompt text" }, "completion_prompt");
    expect(JSON.stringify(logger.info.mock.calls)).not.toContain("secret prompt text");
    expect(logger.debug).toHaveBeenCalledWith(
      { body: expect.objectContaining({ id: "cmpl-1" }) },
      "completion_response_body"
    );
  });
});
