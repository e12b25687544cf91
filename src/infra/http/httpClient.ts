import { err, ok, type Result } from "neverthrow";

type HttpMethod = "GET" | "POST";

export type HttpRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  redirect?: RequestInit["redirect"];
};

export type HttpClientError = {
  code:
    | "timeout"
    | "transport_error"
    | "non_success_status"
    | "invalid_json"
    | "redirect";
  message: string;
  httpStatus?: number;
  /** Set on `redirect` failures when the response carried a Location header. */
  location?: string;
  retryable: boolean;
  cause?: unknown;
};

type HttpTextResponse = {
  body: string;
  contentType: string | null;
};

type HttpBytesResponse = {
  body: Buffer;
  contentType: string | null;
};

type BodyReader<T> = (response: Response) => Promise<Result<T, HttpClientError>>;

const readJson = async <T>(
  response: Response,
): Promise<Result<T, HttpClientError>> => {
  try {
    return ok((await response.json()) as T);
  } catch (jsonError) {
    return err({
      code: "invalid_json",
      message: "HTTP response body was not valid JSON.",
      retryable: false,
      cause: jsonError,
    });
  }
};

const CHARSET_PATTERN = /charset\s*=\s*["']?([^;"'\s]+)/i;

/**
 * Decodes with the charset named in Content-Type, falling back to UTF-8 when it is absent or unknown.
 */
const decodeBody = (
  bytes: ArrayBuffer,
  contentType: string | null,
): string => {
  const charset = CHARSET_PATTERN.exec(contentType ?? "")?.[1];
  if (charset) {
    try {
      return new TextDecoder(charset).decode(bytes);
    } catch (error) {
      if (!(error instanceof RangeError)) {
        throw error;
      }
    }
  }

  return new TextDecoder().decode(bytes);
};

const readText = async (
  response: Response,
): Promise<Result<HttpTextResponse, HttpClientError>> => {
  const contentType = response.headers.get("content-type");
  return ok({
    body: decodeBody(await response.arrayBuffer(), contentType),
    contentType,
  });
};

const readBytes = async (
  response: Response,
): Promise<Result<HttpBytesResponse, HttpClientError>> =>
  ok({
    body: Buffer.from(await response.arrayBuffer()),
    contentType: response.headers.get("content-type"),
  });

/**
 * Centralizes outbound HTTP IO so adapters share one timeout/retry/status parsing policy.
 */
export class HttpClient {
  /**
   * Executes JSON requests with bounded retries to avoid duplicated fetch policy across adapters.
   */
  async requestJson<T>(
    request: HttpRequest,
  ): Promise<Result<T, HttpClientError>> {
    return this.requestWithRetries(request, readJson<T>);
  }

  /**
   * Same retry policy as JSON requests, for HTML and plain-text documents.
   */
  async requestText(
    request: HttpRequest,
  ): Promise<Result<HttpTextResponse, HttpClientError>> {
    return this.requestWithRetries(request, readText);
  }

  async requestBytes(
    request: HttpRequest,
  ): Promise<Result<HttpBytesResponse, HttpClientError>> {
    return this.requestWithRetries(request, readBytes);
  }

  private async requestWithRetries<T>(
    request: HttpRequest,
    readBody: BodyReader<T>,
  ): Promise<Result<T, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request, readBody);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.delay(request.retryDelayMs * attempt);
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  private async performRequest<T>(
    request: HttpRequest,
    readBody: BodyReader<T>,
  ): Promise<Result<T, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
        redirect: request.redirect,
      });

      const isRedirect = response.status >= 300 && response.status < 400;
      if (request.redirect === "manual" && isRedirect) {
        return err({
          code: "redirect",
          message: `HTTP request was redirected with status ${response.status}.`,
          httpStatus: response.status,
          location: response.headers.get("location") ?? undefined,
          retryable: false,
        });
      }

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      return await readBody(response);
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
