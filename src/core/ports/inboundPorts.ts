import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { CompanySearchResult } from "../entities/company";
import type { CompanySubmission } from "../entities/filing";
import type { FilingDocument } from "../entities/document";

export type SubmissionRequest = {
  cik: string;
};

export type DocumentRequest = {
  url: string;
};

export interface FilingsProviderPort {
  /**
   * Resolves to `null` when the SEC has no submissions for the CIK.
   */
  fetchSubmission(
    request: SubmissionRequest,
  ): Promise<Result<CompanySubmission | null, AppBoundaryError>>;

  fetchDocument(
    request: DocumentRequest,
  ): Promise<Result<FilingDocument, AppBoundaryError>>;
}

export interface CompanyDirectoryPort {
  fetchDirectory(): Promise<Result<CompanySearchResult[], AppBoundaryError>>;
}
