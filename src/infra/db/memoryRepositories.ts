import type {
  CompanyEntity,
  CompanySearchResult,
} from "../../core/entities/company";
import type { FilingEntity } from "../../core/entities/filing";
import type {
  CompanyRepositoryPort,
  FilingRepositoryPort,
} from "../../core/ports/outboundPorts";

const tokenize = (value: string): string[] =>
  value
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);

const toSearchResult = (company: CompanyEntity): CompanySearchResult => ({
  cik: company.cik,
  name: company.name,
  ticker: company.ticker,
});

/**
 * Process-local company store with the same search semantics as the Postgres repository.
 */
export class InMemoryCompanyRepository implements CompanyRepositoryPort {
  private readonly companies = new Map<string, CompanyEntity>();

  async searchByTickerPrefix(
    query: string,
    limit: number,
  ): Promise<CompanySearchResult[]> {
    const prefix = query.toLowerCase();
    return this.sorted((company) => company.ticker)
      .filter(
        (company) =>
          company.ticker !== "" &&
          company.ticker.toLowerCase().startsWith(prefix),
      )
      .slice(0, limit)
      .map(toSearchResult);
  }

  async searchByNamePrefix(
    query: string,
    limit: number,
  ): Promise<CompanySearchResult[]> {
    const prefix = query.toLowerCase();
    return this.sorted((company) => company.name)
      .filter((company) => company.name.toLowerCase().startsWith(prefix))
      .slice(0, limit)
      .map(toSearchResult);
  }

  /**
   * Scores companies by how many query words appear in their name or ticker.
   */
  async searchByText(
    query: string,
    limit: number,
  ): Promise<CompanySearchResult[]> {
    const queryTokens = new Set(tokenize(query));
    if (queryTokens.size === 0) {
      return [];
    }

    return this.sorted((company) => company.name)
      .map((company) => {
        const companyTokens = new Set(
          tokenize(`${company.name} ${company.ticker}`),
        );
        let score = 0;
        queryTokens.forEach((token) => {
          if (companyTokens.has(token)) {
            score += 1;
          }
        });
        return { company, score };
      })
      .filter((candidate) => candidate.score > 0)
      .sort((left, right) => right.score - left.score)
      .slice(0, limit)
      .map((candidate) => toSearchResult(candidate.company));
  }

  async findByCik(cik: string): Promise<CompanyEntity | null> {
    const company = this.companies.get(cik);
    return company ? { ...company } : null;
  }

  async upsert(company: CompanyEntity): Promise<void> {
    this.companies.set(company.cik, { ...company });
  }

  async upsertDirectory(companies: CompanySearchResult[]): Promise<number> {
    companies.forEach((entry) => {
      const existing = this.companies.get(entry.cik);
      this.companies.set(entry.cik, {
        ...existing,
        ...entry,
        filingsSyncedAt: existing?.filingsSyncedAt ?? null,
      });
    });
    return companies.length;
  }

  private sorted(key: (company: CompanyEntity) => string): CompanyEntity[] {
    return Array.from(this.companies.values()).sort((left, right) =>
      key(left).localeCompare(key(right)),
    );
  }
}

export class InMemoryFilingRepository implements FilingRepositoryPort {
  private readonly filings = new Map<string, FilingEntity>();

  async listByCik(cik: string): Promise<FilingEntity[]> {
    return Array.from(this.filings.values())
      .filter((filing) => filing.cik === cik)
      .sort((left, right) => right.filingDate.localeCompare(left.filingDate));
  }

  async findByAccession(
    cik: string,
    accessionNumber: string,
  ): Promise<FilingEntity | null> {
    return this.filings.get(`${cik}:${accessionNumber}`) ?? null;
  }

  async upsertMany(filings: FilingEntity[]): Promise<void> {
    filings.forEach((filing) => {
      const key = `${filing.cik}:${filing.accessionNumber}`;
      if (!this.filings.has(key)) {
        this.filings.set(key, { ...filing });
      }
    });
  }
}
