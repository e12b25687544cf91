export type CompanySearchResult = {
  cik: string;
  name: string;
  ticker: string;
};

export type CompanyEntity = CompanySearchResult & {
  exchange?: string;
  filingsSyncedAt: Date | null;
};
