import type { LlmPort } from "../../core/ports/outboundPorts";
import type { AppBoundaryError } from "../../core/entities/appError";
import { err, ok, type Result } from "neverthrow";
import { HttpClient, type HttpClientError } from "../http/httpClient";

type OllamaChatResponse = {
  message?: { content?: string };
};

/**
 * Encapsulates chat-model access so filing analysis stays portable across LLM providers.
 */
export class OllamaLlm implements LlmPort {
  constructor(
    private readonly baseUrl: string,
    readonly model: string,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpClient(),
  ) {}

  /**
   * Sends one system + user exchange and returns the trimmed assistant reply.
   */
  async analyze(
    systemPrompt: string,
    content: string,
  ): Promise<Result<string, AppBoundaryError>> {
    const response = await this.httpClient.requestJson<OllamaChatResponse>({
      url: `${this.baseUrl}/api/chat`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        model: this.model,
        stream: false,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content },
        ],
      },
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 300,
    });

    if (response.isErr()) {
      return err({
        source: "llm",
        code: this.mapHttpCode(response.error.httpStatus, response.error.code),
        provider: "ollama",
        message: response.error.message,
        retryable: response.error.retryable,
        httpStatus: response.error.httpStatus,
        cause: response.error.cause,
      });
    }

    const reply = response.value.message?.content?.trim();
    if (!reply) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "ollama",
        message: "Ollama chat payload did not contain message.content.",
        retryable: false,
      });
    }

    return ok(reply);
  }

  private mapHttpCode(
    httpStatus: number | undefined,
    errorCode: HttpClientError["code"],
  ): AppBoundaryError["code"] {
    if (httpStatus === 429) {
      return "rate_limited";
    }

    if (httpStatus === 401 || httpStatus === 403) {
      return "auth_invalid";
    }

    if (errorCode === "timeout") {
      return "timeout";
    }

    if (errorCode === "invalid_json") {
      return "invalid_json";
    }

    if (errorCode === "transport_error") {
      return "transport_error";
    }

    return "provider_error";
  }
}
