import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { CompanyEntity, CompanySearchResult } from "../entities/company";
import type { FilingEntity } from "../entities/filing";

export interface CompanyRepositoryPort {
  searchByTickerPrefix(
    query: string,
    limit: number,
  ): Promise<CompanySearchResult[]>;
  searchByNamePrefix(
    query: string,
    limit: number,
  ): Promise<CompanySearchResult[]>;
  searchByText(query: string, limit: number): Promise<CompanySearchResult[]>;
  findByCik(cik: string): Promise<CompanyEntity | null>;
  upsert(company: CompanyEntity): Promise<void>;
  upsertDirectory(companies: CompanySearchResult[]): Promise<number>;
}

export interface FilingRepositoryPort {
  listByCik(cik: string): Promise<FilingEntity[]>;
  findByAccession(
    cik: string,
    accessionNumber: string,
  ): Promise<FilingEntity | null>;
  upsertMany(filings: FilingEntity[]): Promise<void>;
}

export interface LlmPort {
  readonly model: string;
  analyze(
    systemPrompt: string,
    content: string,
  ): Promise<Result<string, AppBoundaryError>>;
}

export interface ClockPort {
  now(): Date;
}

export type SleepFn = (ms: number) => Promise<void>;

export type ProxiedResource = {
  body: Buffer;
  contentType: string;
};

export interface ResourceProxyPort {
  fetchResource(
    rawUrl: string,
  ): Promise<Result<ProxiedResource, AppBoundaryError>>;
}
