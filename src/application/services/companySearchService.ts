import type { CompanySearchResult } from "../../core/entities/company";
import type { CompanyRepositoryPort } from "../../core/ports/outboundPorts";

const SEARCH_LIMIT = 10;

type SearchTier = (
  query: string,
  limit: number,
) => Promise<CompanySearchResult[]>;

/**
 * Tiered company lookup: ticker prefix, then name prefix, then full text. The first tier with hits wins.
 */
export class CompanySearchService {
  constructor(private readonly companyRepo: CompanyRepositoryPort) {}

  async search(query: string): Promise<CompanySearchResult[]> {
    const trimmed = query.trim();
    if (!trimmed) {
      return [];
    }

    const tiers: SearchTier[] = [
      (value, limit) => this.companyRepo.searchByTickerPrefix(value, limit),
      (value, limit) => this.companyRepo.searchByNamePrefix(value, limit),
      (value, limit) => this.companyRepo.searchByText(value, limit),
    ];

    for (const tier of tiers) {
      const results = await tier(trimmed, SEARCH_LIMIT);
      if (results.length > 0) {
        return this.uniqueByCik(results).slice(0, SEARCH_LIMIT);
      }
    }

    return [];
  }

  private uniqueByCik(results: CompanySearchResult[]): CompanySearchResult[] {
    const seen = new Set<string>();
    return results.filter((result) => {
      if (seen.has(result.cik)) {
        return false;
      }

      seen.add(result.cik);
      return true;
    });
  }
}
