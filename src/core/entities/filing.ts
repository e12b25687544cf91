export type FilingEntity = {
  cik: string;
  accessionNumber: string;
  formType: string;
  baseForm: string;
  isAmendment: boolean;
  amendedAccession?: string;
  filingDate: string;
  reportDate?: string;
  primaryDocument: string;
  url: string;
};

export type CompanyDetail = {
  cik: string;
  name: string;
  ticker: string;
  filings: FilingEntity[];
  currentPage: number;
  totalPages: number;
  totalFilings: number;
  filingType: string;
  allFilingTypes: string[];
};

/**
 * Company profile and recent filings as reported by the SEC submissions feed.
 */
export type CompanySubmission = {
  cik: string;
  name: string;
  tickers: string[];
  exchanges: string[];
  filings: FilingEntity[];
};
