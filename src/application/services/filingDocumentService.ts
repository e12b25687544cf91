import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  ParsedFilingDocument,
  StructuredFilingDocument,
} from "../../core/entities/document";
import type { FilingEntity } from "../../core/entities/filing";
import type { FilingsProviderPort } from "../../core/ports/inboundPorts";
import {
  linesToText,
  parseFilingDocument,
} from "../../infra/parsing/documentParser";
import { selectMetadataExtractor } from "../../infra/parsing/metadataExtractors";
import { logger } from "../../shared/logger/logger";
import type { CompanyService } from "./companyService";

type ParsedFiling = {
  filing: FilingEntity;
  parsed: ParsedFilingDocument;
};

/**
 * Downloads a resolved filing's primary document and exposes it as text or as a structured document.
 */
export class FilingDocumentService {
  constructor(
    private readonly companyService: CompanyService,
    private readonly filingsProvider: FilingsProviderPort,
  ) {}

  async loadParsedFiling(
    cik: string,
    accessionNumber: string,
  ): Promise<Result<ParsedFiling, AppBoundaryError>> {
    const resolved = await this.companyService.resolveFiling(
      cik,
      accessionNumber,
    );
    if (resolved.isErr()) {
      return err(resolved.error);
    }

    const filing = resolved.value;
    const document = await this.filingsProvider.fetchDocument({
      url: filing.url,
    });
    if (document.isErr()) {
      return err(document.error);
    }

    return ok({ filing, parsed: parseFilingDocument(document.value) });
  }

  async getFilingText(
    cik: string,
    accessionNumber: string,
  ): Promise<Result<string, AppBoundaryError>> {
    const loaded = await this.loadParsedFiling(cik, accessionNumber);
    return loaded.map(({ parsed }) => linesToText(parsed.lines));
  }

  async getStructuredDocument(
    cik: string,
    accessionNumber: string,
  ): Promise<Result<StructuredFilingDocument, AppBoundaryError>> {
    const loaded = await this.loadParsedFiling(cik, accessionNumber);
    if (loaded.isErr()) {
      return err(loaded.error);
    }

    const { filing, parsed } = loaded.value;
    const { extractor, isFallback } = selectMetadataExtractor(
      filing.baseForm,
      parsed.lines,
    );
    if (isFallback) {
      logger.warn(
        { cik, accessionNumber, formType: filing.formType },
        "No metadata extractor for form type; using default extractor",
      );
    }

    const metadata = extractor.extract();

    return ok({
      cik: filing.cik,
      accessionNumber: filing.accessionNumber,
      formType: filing.formType,
      filingDate: filing.filingDate,
      reportPeriod: metadata.reportPeriod ?? filing.reportDate ?? null,
      metadata,
      sections: parsed.sections.map(({ title, text, startPage, endPage }) => ({
        title,
        text,
        startPage,
        endPage,
      })),
    });
  }
}
