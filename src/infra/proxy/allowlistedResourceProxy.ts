import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  ProxiedResource,
  ResourceProxyPort,
} from "../../core/ports/outboundPorts";
import { HttpClient, type HttpClientError } from "../http/httpClient";

const FALLBACK_CONTENT_TYPE = "application/octet-stream";
const MAX_REDIRECTS = 5;

/**
 * Relays https resources from an allowlisted set of hosts, sending the configured User-Agent.
 */
export class AllowlistedResourceProxy implements ResourceProxyPort {
  private readonly allowedHosts: Set<string>;

  constructor(
    allowedHosts: string[],
    private readonly userAgent: string,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpClient(),
  ) {
    this.allowedHosts = new Set(
      allowedHosts.map((host) => host.trim().toLowerCase()).filter(Boolean),
    );
  }

  /**
   * Redirects are followed by hand so every hop passes the same allowlist check as the first URL.
   */
  async fetchResource(
    rawUrl: string,
  ): Promise<Result<ProxiedResource, AppBoundaryError>> {
    const target = this.parseTarget(rawUrl);
    if (target.isErr()) {
      return err(target.error);
    }

    let url = target.value;
    for (let hop = 0; hop <= MAX_REDIRECTS; hop += 1) {
      const response = await this.httpClient.requestBytes({
        url: url.toString(),
        method: "GET",
        headers: { "User-Agent": this.userAgent, Accept: "*/*" },
        timeoutMs: this.timeoutMs,
        retries: 1,
        retryDelayMs: 300,
        redirect: "manual",
      });

      if (response.isOk()) {
        return ok({
          body: response.value.body,
          contentType: response.value.contentType ?? FALLBACK_CONTENT_TYPE,
        });
      }

      const failure = response.error;
      if (failure.code !== "redirect" || !failure.location) {
        return err(this.toBoundaryError(failure, rawUrl));
      }

      const next = this.parseTarget(failure.location, url);
      if (next.isErr()) {
        return err(next.error);
      }

      url = next.value;
    }

    return err({
      source: "proxy",
      code: "provider_error",
      provider: "proxy",
      message: `Failed to fetch: more than ${MAX_REDIRECTS} redirects`,
      retryable: false,
      cause: { url: rawUrl },
    });
  }

  private parseTarget(
    rawUrl: string,
    base?: URL,
  ): Result<URL, AppBoundaryError> {
    let url: URL;
    try {
      url = new URL(rawUrl, base);
    } catch (cause) {
      return err({
        source: "proxy",
        code: "validation_error",
        provider: "proxy",
        message: `Invalid 'url' parameter: ${rawUrl}`,
        retryable: false,
        cause,
      });
    }

    if (url.protocol !== "https:" || !this.allowedHosts.has(url.hostname)) {
      return err({
        source: "proxy",
        code: "forbidden",
        provider: "proxy",
        message: `Proxying to ${url.protocol}//${url.hostname} is not allowed`,
        retryable: false,
      });
    }

    return ok(url);
  }

  private toBoundaryError(
    error: HttpClientError,
    rawUrl: string,
  ): AppBoundaryError {
    const code =
      error.code === "timeout"
        ? "timeout"
        : error.code === "transport_error"
          ? "transport_error"
          : "provider_error";

    return {
      source: "proxy",
      code,
      provider: "proxy",
      message: `Failed to fetch: ${error.message}`,
      retryable: error.retryable,
      httpStatus: error.httpStatus,
      cause: { url: rawUrl, error: error.cause },
    };
  }
}
