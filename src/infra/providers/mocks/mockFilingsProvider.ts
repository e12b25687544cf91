import { readFileSync } from "node:fs";
import type {
  CompanyDirectoryPort,
  DocumentRequest,
  FilingsProviderPort,
  SubmissionRequest,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CompanySearchResult } from "../../../core/entities/company";
import type { CompanySubmission } from "../../../core/entities/filing";
import type { FilingDocument } from "../../../core/entities/document";
import { err, ok, type Result } from "neverthrow";
import {
  buildArchiveUrl,
  describeFormType,
  normalizeCik,
  padCik,
} from "../../../shared/identifiers/secIdentifiers";

const MOCK_ARCHIVES_BASE_URL = "https://example.local/Archives/edgar/data";

const MOCK_DIRECTORY: CompanySearchResult[] = [
  { cik: "1000001", name: "Mock Holdings Inc.", ticker: "MOCK" },
  { cik: "1000002", name: "Sample Industries Corp", ticker: "SMPL" },
  { cik: "1000003", name: "Placeholder Energy Co", ticker: "PHEC" },
];

const MOCK_FORMS: Array<{
  formType: string;
  filingDate: string;
  reportDate?: string;
}> = [
  { formType: "10-K", filingDate: "2024-11-01", reportDate: "2024-09-28" },
  { formType: "10-Q", filingDate: "2025-01-31", reportDate: "2024-12-28" },
  { formType: "8-K", filingDate: "2025-02-03", reportDate: "2025-02-03" },
  { formType: "PX14A6N", filingDate: "2025-02-10" },
];

const loadAnnualReport = (): string =>
  readFileSync(
    new URL("./fixtures/mock-annual-report.html", import.meta.url),
    "utf8",
  );

/**
 * Supplies deterministic SEC-shaped fixtures so the API can run locally without EDGAR access.
 */
export class MockFilingsProvider
  implements FilingsProviderPort, CompanyDirectoryPort
{
  async fetchSubmission(
    request: SubmissionRequest,
  ): Promise<Result<CompanySubmission | null, AppBoundaryError>> {
    const cik = normalizeCik(request.cik);
    const company = MOCK_DIRECTORY.find((entry) => entry.cik === cik);
    if (!cik || !company) {
      return ok(null);
    }

    return ok({
      cik,
      name: company.name,
      tickers: [company.ticker],
      exchanges: ["MOCK"],
      filings: MOCK_FORMS.map((form, index) => {
        const accessionNumber = `${padCik(cik)}-${form.filingDate.slice(2, 4)}-${String(index + 1).padStart(6, "0")}`;
        const primaryDocument = `${company.ticker.toLowerCase()}-${form.formType.toLowerCase()}.htm`;
        return {
          cik,
          accessionNumber,
          formType: form.formType,
          ...describeFormType(form.formType),
          filingDate: form.filingDate,
          reportDate: form.reportDate,
          primaryDocument,
          url: buildArchiveUrl(
            MOCK_ARCHIVES_BASE_URL,
            cik,
            accessionNumber,
            primaryDocument,
          ),
        };
      }),
    });
  }

  /**
   * Serves the same annual-report fixture for every mock filing URL.
   */
  async fetchDocument(
    request: DocumentRequest,
  ): Promise<Result<FilingDocument, AppBoundaryError>> {
    if (!request.url.startsWith(MOCK_ARCHIVES_BASE_URL)) {
      return err({
        source: "filings",
        code: "not_found",
        provider: "mock-edgar",
        message: `Mock provider has no document at ${request.url}.`,
        retryable: false,
      });
    }

    return ok({
      url: request.url,
      contentType: "text/html",
      body: loadAnnualReport(),
    });
  }

  async fetchDirectory(): Promise<
    Result<CompanySearchResult[], AppBoundaryError>
  > {
    return ok(MOCK_DIRECTORY.map((entry) => ({ ...entry })));
  }
}
