import { sql } from "drizzle-orm";
import {
  boolean,
  index,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";

export const companiesTable = pgTable(
  "companies",
  {
    cik: text("cik").primaryKey(),
    name: text("name").notNull(),
    ticker: text("ticker").notNull().default(""),
    exchange: text("exchange"),
    filingsSyncedAt: timestamp("filings_synced_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    nameIdx: index("companies_name_idx").on(table.name),
    tickerIdx: index("companies_ticker_idx").on(table.ticker),
    searchIdx: index("companies_search_idx").using(
      "gin",
      sql`to_tsvector('english', ${table.name} || ' ' || ${table.ticker})`,
    ),
  }),
);

export const filingsTable = pgTable(
  "filings",
  {
    id: text("id").primaryKey(),
    cik: text("cik")
      .notNull()
      .references(() => companiesTable.cik, { onDelete: "cascade" }),
    accessionNumber: text("accession_number").notNull(),
    formType: text("form_type").notNull(),
    baseForm: text("base_form").notNull(),
    isAmendment: boolean("is_amendment").notNull(),
    amendedAccession: text("amended_accession"),
    filingDate: text("filing_date").notNull(),
    reportDate: text("report_date"),
    primaryDocument: text("primary_document").notNull(),
    url: text("url").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    accessionIdx: uniqueIndex("filings_cik_accession_uidx").on(
      table.cik,
      table.accessionNumber,
    ),
    formTypeIdx: index("filings_cik_form_type_idx").on(
      table.cik,
      table.formType,
    ),
  }),
);
