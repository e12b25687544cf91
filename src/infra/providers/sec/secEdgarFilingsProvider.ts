import type {
  CompanyDirectoryPort,
  DocumentRequest,
  FilingsProviderPort,
  SubmissionRequest,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CompanySearchResult } from "../../../core/entities/company";
import type {
  CompanySubmission,
  FilingEntity,
} from "../../../core/entities/filing";
import type { FilingDocument } from "../../../core/entities/document";
import { err, ok, type Result } from "neverthrow";
import {
  HttpClient,
  type HttpClientError,
  type HttpRequest,
} from "../../http/httpClient";
import {
  buildArchiveUrl,
  describeFormType,
  normalizeCik,
  padCik,
} from "../../../shared/identifiers/secIdentifiers";

type EdgarTickerRecord = {
  ticker?: string;
  cik_str?: number;
  title?: string;
};

type EdgarTickersResponse = Record<string, EdgarTickerRecord>;

type EdgarRecentFilings = {
  form?: string[];
  accessionNumber?: string[];
  filingDate?: string[];
  reportDate?: string[];
  primaryDocument?: string[];
};

type EdgarSubmissionResponse = {
  name?: string;
  tickers?: string[];
  exchanges?: string[];
  filings?: {
    recent?: EdgarRecentFilings;
  };
};

type SecEdgarFilingsError =
  | { code: "not_found"; message: string }
  | {
      code: "http_failure";
      message: string;
      httpStatus?: number;
      retryable: boolean;
      cause?: unknown;
    }
  | { code: "malformed_response"; message: string; cause?: unknown };

const DOCUMENT_ACCEPT =
  "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8";

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const asIsoDate = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed && ISO_DATE_PATTERN.test(trimmed) ? trimmed : undefined;
};

/**
 * Adapts SEC EDGAR submissions, archives and the ticker directory behind provider ports.
 */
export class SecEdgarFilingsProvider
  implements FilingsProviderPort, CompanyDirectoryPort
{
  constructor(
    private readonly baseUrl: string,
    private readonly archivesBaseUrl: string,
    private readonly tickersUrl: string,
    private readonly userAgent: string,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.userAgent.trim()) {
      throw new Error(
        "SEC_EDGAR_USER_AGENT is required when SEC EDGAR filings provider is enabled.",
      );
    }
  }

  /**
   * Pulls SEC submission history for a CIK and maps the recent-filing columns into filing records.
   */
  async fetchSubmission(
    request: SubmissionRequest,
  ): Promise<Result<CompanySubmission | null, AppBoundaryError>> {
    const cik = normalizeCik(request.cik);
    if (!cik) {
      return err({
        source: "filings",
        code: "validation_error",
        provider: "sec-edgar",
        message: `'${request.cik}' is not a valid CIK.`,
        retryable: false,
      });
    }

    const url = new URL(
      `/submissions/CIK${padCik(cik)}.json`,
      this.baseUrl,
    ).toString();
    const response = await this.fetchJson<EdgarSubmissionResponse>(url);

    if (response.isErr()) {
      if (response.error.code === "not_found") {
        return ok(null);
      }
      return err(this.mapToBoundaryError(response.error, { cik }));
    }

    const submission = response.value;
    if (!submission || typeof submission !== "object") {
      return err(
        this.mapToBoundaryError(
          {
            code: "malformed_response",
            message: "SEC submissions payload was malformed.",
          },
          { cik },
        ),
      );
    }

    return ok({
      cik,
      name: submission.name?.trim() || cik,
      tickers: (submission.tickers ?? [])
        .map((ticker) => ticker.trim().toUpperCase())
        .filter(Boolean),
      exchanges: (submission.exchanges ?? [])
        .map((exchange) => exchange?.trim())
        .filter((exchange): exchange is string => Boolean(exchange)),
      filings: this.toFilings(cik, submission.filings?.recent),
    });
  }

  /**
   * Downloads a primary filing document as text; archives serve HTML and plain-text submissions.
   */
  async fetchDocument(
    request: DocumentRequest,
  ): Promise<Result<FilingDocument, AppBoundaryError>> {
    const response = await this.httpClient.requestText(
      this.buildRequest(request.url, DOCUMENT_ACCEPT),
    );

    if (response.isErr()) {
      return err(
        this.mapToBoundaryError(this.toProviderError(response.error), {
          url: request.url,
        }),
      );
    }

    return ok({
      url: request.url,
      contentType: response.value.contentType ?? "text/html",
      body: response.value.body,
    });
  }

  /**
   * Reads the SEC ticker file into search records; the first ticker seen for a CIK wins.
   */
  async fetchDirectory(): Promise<
    Result<CompanySearchResult[], AppBoundaryError>
  > {
    const response = await this.fetchJson<EdgarTickersResponse>(
      this.tickersUrl,
    );
    if (response.isErr()) {
      return err(this.mapToBoundaryError(response.error, {}));
    }

    const payload = response.value;
    if (!payload || typeof payload !== "object") {
      return err(
        this.mapToBoundaryError(
          {
            code: "malformed_response",
            message: "SEC ticker mapping payload was malformed.",
          },
          {},
        ),
      );
    }

    const byCik = new Map<string, CompanySearchResult>();
    for (const record of Object.values(payload)) {
      const ticker = record.ticker?.trim().toUpperCase();
      const cikValue = record.cik_str;
      if (!ticker || !Number.isInteger(cikValue)) {
        continue;
      }

      const cik = String(cikValue);
      if (byCik.has(cik)) {
        continue;
      }

      byCik.set(cik, {
        cik,
        name: record.title?.trim() || ticker,
        ticker,
      });
    }

    return ok(Array.from(byCik.values()));
  }

  private toFilings(
    cik: string,
    recent: EdgarRecentFilings | undefined,
  ): FilingEntity[] {
    const forms = recent?.form ?? [];
    const accessionNumbers = recent?.accessionNumber ?? [];
    const filingDates = recent?.filingDate ?? [];
    const reportDates = recent?.reportDate ?? [];
    const primaryDocuments = recent?.primaryDocument ?? [];

    const results: FilingEntity[] = [];

    for (let index = 0; index < forms.length; index += 1) {
      const formType = forms[index]?.trim().toUpperCase();
      const accessionNumber = accessionNumbers[index]?.trim();
      const filingDate = asIsoDate(filingDates[index]);

      if (!formType || !accessionNumber || !filingDate) {
        continue;
      }

      // Filings without a primary document still have the full submission text file.
      const primaryDocument =
        primaryDocuments[index]?.trim() || `${accessionNumber}.txt`;

      results.push({
        cik,
        accessionNumber,
        formType,
        ...describeFormType(formType),
        filingDate,
        reportDate: asIsoDate(reportDates[index]),
        primaryDocument,
        url: buildArchiveUrl(
          this.archivesBaseUrl,
          cik,
          accessionNumber,
          primaryDocument,
        ),
      });
    }

    return results;
  }

  private buildRequest(url: string, accept: string): HttpRequest {
    return {
      url,
      method: "GET",
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 300,
      headers: {
        "User-Agent": this.userAgent,
        Accept: accept,
      },
    };
  }

  /**
   * Applies SEC-required headers and timeout handling consistently for all EDGAR JSON requests.
   */
  private async fetchJson<T>(
    url: string,
  ): Promise<Result<T | null, SecEdgarFilingsError>> {
    const response = await this.httpClient.requestJson<T>(
      this.buildRequest(url, "application/json"),
    );

    if (response.isErr()) {
      return err(this.toProviderError(response.error));
    }

    return ok(response.value);
  }

  private toProviderError(failure: HttpClientError): SecEdgarFilingsError {
    if (failure.httpStatus === 404) {
      return { code: "not_found", message: failure.message };
    }

    if (failure.code === "invalid_json") {
      return {
        code: "malformed_response",
        message: failure.message,
        cause: failure.cause,
      };
    }

    return {
      code: "http_failure",
      message: failure.message,
      httpStatus: failure.httpStatus,
      retryable: failure.retryable,
      cause: failure.cause,
    };
  }

  private mapToBoundaryError(
    failure: SecEdgarFilingsError,
    context: Record<string, string>,
  ): AppBoundaryError {
    if (failure.code === "not_found") {
      return {
        source: "filings",
        code: "not_found",
        provider: "sec-edgar",
        message: failure.message,
        retryable: false,
        httpStatus: 404,
        cause: context,
      };
    }

    if (failure.code === "malformed_response") {
      return {
        source: "filings",
        code: "malformed_response",
        provider: "sec-edgar",
        message: failure.message,
        retryable: false,
        cause: failure.cause ?? context,
      };
    }

    return {
      source: "filings",
      code: this.mapHttpCode(failure.httpStatus, failure.message),
      provider: "sec-edgar",
      message: failure.message,
      retryable: failure.retryable,
      httpStatus: failure.httpStatus,
      cause: failure.cause,
    };
  }

  private mapHttpCode(
    httpStatus: number | undefined,
    message: string,
  ): AppBoundaryError["code"] {
    if (httpStatus === 429) {
      return "rate_limited";
    }

    if (httpStatus === 401 || httpStatus === 403) {
      return "auth_invalid";
    }

    if (/timed out/i.test(message)) {
      return "timeout";
    }

    if (httpStatus === undefined) {
      return "transport_error";
    }

    return "provider_error";
  }
}
