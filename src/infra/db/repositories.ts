import { and, asc, desc, eq, ilike, sql } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type {
  CompanyEntity,
  CompanySearchResult,
} from "../../core/entities/company";
import type { FilingEntity } from "../../core/entities/filing";
import type {
  CompanyRepositoryPort,
  FilingRepositoryPort,
} from "../../core/ports/outboundPorts";
import { companiesTable, filingsTable } from "./schema";

type Database = PostgresJsDatabase<Record<string, never>>;

const DIRECTORY_BATCH_SIZE = 1_000;
// Postgres caps one statement at 65534 bind parameters; a filing row binds 11.
export const FILING_BATCH_SIZE = 1_000;

/**
 * Splits rows into consecutive slices of at most `size` for multi-row inserts.
 */
export const toBatches = <T>(rows: T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let offset = 0; offset < rows.length; offset += size) {
    batches.push(rows.slice(offset, offset + size));
  }
  return batches;
};

const searchColumns = {
  cik: companiesTable.cik,
  name: companiesTable.name,
  ticker: companiesTable.ticker,
};

/**
 * Escapes LIKE wildcards so user input only ever matches literally.
 */
export const escapeLikePattern = (value: string): string =>
  value.replace(/[\\%_]/g, "\\$&");

const toFilingEntity = (
  row: typeof filingsTable.$inferSelect,
): FilingEntity => ({
  cik: row.cik,
  accessionNumber: row.accessionNumber,
  formType: row.formType,
  baseForm: row.baseForm,
  isAmendment: row.isAmendment,
  amendedAccession: row.amendedAccession ?? undefined,
  filingDate: row.filingDate,
  reportDate: row.reportDate ?? undefined,
  primaryDocument: row.primaryDocument,
  url: row.url,
});

export const toFilingRow = (
  filing: FilingEntity,
): typeof filingsTable.$inferInsert => ({
  id: `${filing.cik}:${filing.accessionNumber}`,
  cik: filing.cik,
  accessionNumber: filing.accessionNumber,
  formType: filing.formType,
  baseForm: filing.baseForm,
  isAmendment: filing.isAmendment,
  amendedAccession: filing.amendedAccession ?? null,
  filingDate: filing.filingDate,
  reportDate: filing.reportDate ?? null,
  primaryDocument: filing.primaryDocument,
  url: filing.url,
});

/**
 * Serves tiered company lookups and keeps the SEC-derived company profile current.
 */
export class PostgresCompanyRepositoryService implements CompanyRepositoryPort {
  constructor(private readonly db: Database) {}

  async searchByTickerPrefix(
    query: string,
    limit: number,
  ): Promise<CompanySearchResult[]> {
    return this.db
      .select(searchColumns)
      .from(companiesTable)
      .where(ilike(companiesTable.ticker, `${escapeLikePattern(query)}%`))
      .orderBy(asc(companiesTable.ticker))
      .limit(limit);
  }

  async searchByNamePrefix(
    query: string,
    limit: number,
  ): Promise<CompanySearchResult[]> {
    return this.db
      .select(searchColumns)
      .from(companiesTable)
      .where(ilike(companiesTable.name, `${escapeLikePattern(query)}%`))
      .orderBy(asc(companiesTable.name))
      .limit(limit);
  }

  /**
   * Ranks full-text matches over name and ticker; backed by the GIN expression index.
   */
  async searchByText(
    query: string,
    limit: number,
  ): Promise<CompanySearchResult[]> {
    const document = sql`to_tsvector('english', ${companiesTable.name} || ' ' || ${companiesTable.ticker})`;
    const tsQuery = sql`plainto_tsquery('english', ${query})`;

    return this.db
      .select(searchColumns)
      .from(companiesTable)
      .where(sql`${document} @@ ${tsQuery}`)
      .orderBy(desc(sql`ts_rank(${document}, ${tsQuery})`))
      .limit(limit);
  }

  async findByCik(cik: string): Promise<CompanyEntity | null> {
    const [row] = await this.db
      .select()
      .from(companiesTable)
      .where(eq(companiesTable.cik, cik))
      .limit(1);

    if (!row) {
      return null;
    }

    return {
      cik: row.cik,
      name: row.name,
      ticker: row.ticker,
      exchange: row.exchange ?? undefined,
      filingsSyncedAt: row.filingsSyncedAt,
    };
  }

  async upsert(company: CompanyEntity): Promise<void> {
    const now = new Date();
    await this.db
      .insert(companiesTable)
      .values({
        cik: company.cik,
        name: company.name,
        ticker: company.ticker,
        exchange: company.exchange ?? null,
        filingsSyncedAt: company.filingsSyncedAt,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: companiesTable.cik,
        set: {
          name: company.name,
          ticker: company.ticker,
          exchange: company.exchange ?? null,
          filingsSyncedAt: company.filingsSyncedAt,
          updatedAt: now,
        },
      });
  }

  /**
   * Refreshes names and tickers from the SEC directory without touching filing sync state.
   */
  async upsertDirectory(companies: CompanySearchResult[]): Promise<number> {
    for (const batch of toBatches(companies, DIRECTORY_BATCH_SIZE)) {
      await this.db
        .insert(companiesTable)
        .values(batch)
        .onConflictDoUpdate({
          target: companiesTable.cik,
          set: {
            name: sql`excluded.name`,
            ticker: sql`excluded.ticker`,
            updatedAt: sql`now()`,
          },
        });
    }

    return companies.length;
  }
}

/**
 * Stores filing index entries; accession records are immutable once filed.
 */
export class PostgresFilingRepositoryService implements FilingRepositoryPort {
  constructor(private readonly db: Database) {}

  async listByCik(cik: string): Promise<FilingEntity[]> {
    const rows = await this.db
      .select()
      .from(filingsTable)
      .where(eq(filingsTable.cik, cik))
      .orderBy(desc(filingsTable.filingDate));

    return rows.map(toFilingEntity);
  }

  async findByAccession(
    cik: string,
    accessionNumber: string,
  ): Promise<FilingEntity | null> {
    const [row] = await this.db
      .select()
      .from(filingsTable)
      .where(
        and(
          eq(filingsTable.cik, cik),
          eq(filingsTable.accessionNumber, accessionNumber),
        ),
      )
      .limit(1);

    return row ? toFilingEntity(row) : null;
  }

  async upsertMany(filings: FilingEntity[]): Promise<void> {
    const rows = filings.map(toFilingRow);
    for (const batch of toBatches(rows, FILING_BATCH_SIZE)) {
      await this.db.insert(filingsTable).values(batch).onConflictDoNothing();
    }
  }
}
