import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { CompanyEntity } from "../../core/entities/company";
import type { CompanyDetail, FilingEntity } from "../../core/entities/filing";
import type { FilingsProviderPort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  CompanyRepositoryPort,
  FilingRepositoryPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";

const ALL_FILING_TYPES = "All";

type CompanyDetailQuery = {
  page: number;
  limit: number;
  filingType: string;
};

type CompanyServiceOptions = {
  refreshAfterMinutes: number;
};

const companyNotFound = (cik: string): AppBoundaryError => ({
  source: "companies",
  code: "not_found",
  provider: "filings-api",
  message: `No company found for CIK ${cik}`,
  retryable: false,
});

const filingNotFound = (cik: string, accession: string): AppBoundaryError => ({
  source: "filings",
  code: "not_found",
  provider: "filings-api",
  message: `No filing found for CIK ${cik} and accession number ${accession}`,
  retryable: false,
});

/**
 * Newest first; accession number breaks ties between filings of the same day.
 */
const compareFilings = (left: FilingEntity, right: FilingEntity): number =>
  right.filingDate.localeCompare(left.filingDate) ||
  right.accessionNumber.localeCompare(left.accessionNumber);

/**
 * Serves companies and their filings from storage, refreshing from SEC submissions when stored data is stale.
 * CIKs passed in are expected without leading zeros.
 */
export class CompanyService {
  constructor(
    private readonly companyRepo: CompanyRepositoryPort,
    private readonly filingRepo: FilingRepositoryPort,
    private readonly filingsProvider: FilingsProviderPort,
    private readonly clock: ClockPort,
    private readonly options: CompanyServiceOptions,
  ) {}

  async getCompanyDetail(
    cik: string,
    query: CompanyDetailQuery,
  ): Promise<Result<CompanyDetail, AppBoundaryError>> {
    const loaded = await this.loadCompany(cik);
    if (loaded.isErr()) {
      return err(loaded.error);
    }

    const company = loaded.value;
    const filings = await this.filingRepo.listByCik(company.cik);
    const allFilingTypes = [
      ALL_FILING_TYPES,
      ...Array.from(new Set(filings.map((filing) => filing.formType))).sort(),
    ];

    const filter = query.filingType.trim();
    const filterActive = filter !== "" && filter !== ALL_FILING_TYPES;
    const matching = (
      filterActive
        ? filings.filter((filing) => filing.formType === filter)
        : [...filings]
    ).sort(compareFilings);

    const start = (query.page - 1) * query.limit;

    return ok({
      cik: company.cik,
      name: company.name,
      ticker: company.ticker,
      filings: matching.slice(start, start + query.limit),
      currentPage: query.page,
      totalPages: Math.ceil(matching.length / query.limit),
      totalFilings: matching.length,
      filingType: filterActive ? filter : ALL_FILING_TYPES,
      allFilingTypes,
    });
  }

  /**
   * Finds a filing in storage, refreshing the company from SEC once before giving up.
   */
  async resolveFiling(
    cik: string,
    accessionNumber: string,
  ): Promise<Result<FilingEntity, AppBoundaryError>> {
    const stored = await this.filingRepo.findByAccession(cik, accessionNumber);
    if (stored) {
      return ok(stored);
    }

    const existing = await this.companyRepo.findByCik(cik);
    const refreshed = await this.refreshCompany(cik, existing);
    if (refreshed.isErr()) {
      return refreshed.error.code === "not_found"
        ? err(filingNotFound(cik, accessionNumber))
        : err(refreshed.error);
    }

    const filing = await this.filingRepo.findByAccession(cik, accessionNumber);
    return filing ? ok(filing) : err(filingNotFound(cik, accessionNumber));
  }

  /**
   * Returns the stored company when fresh; otherwise refreshes it and falls back to stored data if SEC is unavailable.
   */
  async loadCompany(
    cik: string,
  ): Promise<Result<CompanyEntity, AppBoundaryError>> {
    const existing = await this.companyRepo.findByCik(cik);
    if (existing && !this.isStale(existing)) {
      return ok(existing);
    }

    const refreshed = await this.refreshCompany(cik, existing);
    if (refreshed.isOk()) {
      return refreshed;
    }

    if (existing) {
      logger.warn(
        {
          cik,
          code: refreshed.error.code,
          message: refreshed.error.message,
        },
        "Filings refresh failed; serving stored company data",
      );
      return ok(existing);
    }

    return err(refreshed.error);
  }

  private isStale(company: CompanyEntity): boolean {
    if (!company.filingsSyncedAt) {
      return true;
    }

    const ageMs =
      this.clock.now().getTime() - company.filingsSyncedAt.getTime();
    return ageMs >= this.options.refreshAfterMinutes * 60_000;
  }

  private async refreshCompany(
    cik: string,
    existing: CompanyEntity | null,
  ): Promise<Result<CompanyEntity, AppBoundaryError>> {
    const submission = await this.filingsProvider.fetchSubmission({ cik });
    if (submission.isErr()) {
      return err(submission.error);
    }

    if (!submission.value) {
      return err(companyNotFound(cik));
    }

    const { name, tickers, exchanges, filings } = submission.value;
    const company: CompanyEntity = {
      cik,
      name: name || existing?.name || "",
      ticker: tickers[0] ?? existing?.ticker ?? "",
      exchange: exchanges[0] ?? existing?.exchange,
      filingsSyncedAt: this.clock.now(),
    };

    await this.companyRepo.upsert(company);
    await this.filingRepo.upsertMany(
      filings.map((filing) => ({ ...filing, cik })),
    );

    logger.debug(
      { cik, filings: filings.length },
      "Refreshed company filings from SEC",
    );

    return ok(company);
  }
}
