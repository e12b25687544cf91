import { describe, expect, it } from "vitest";
import {
  InMemoryCompanyRepository,
  InMemoryFilingRepository,
} from "./memoryRepositories";
import { escapeLikePattern } from "./repositories";

const seedCompanies = async () => {
  const repo = new InMemoryCompanyRepository();
  await repo.upsertDirectory([
    { cik: "320193", name: "Apple Inc.", ticker: "AAPL" },
    { cik: "1418091", name: "Twitter, Inc.", ticker: "TWTR" },
    { cik: "6951", name: "APPLIED MATERIALS INC /DE", ticker: "AMAT" },
    { cik: "1730168", name: "Broadcom Inc.", ticker: "AVGO" },
  ]);
  return repo;
};

describe("InMemoryCompanyRepository", () => {
  it("matches ticker prefixes case-insensitively", async () => {
    const repo = await seedCompanies();

    expect(await repo.searchByTickerPrefix("a", 10)).toEqual([
      { cik: "320193", name: "Apple Inc.", ticker: "AAPL" },
      { cik: "6951", name: "APPLIED MATERIALS INC /DE", ticker: "AMAT" },
      { cik: "1730168", name: "Broadcom Inc.", ticker: "AVGO" },
    ]);
    expect(await repo.searchByTickerPrefix("a", 1)).toHaveLength(1);
  });

  it("matches name prefixes case-insensitively", async () => {
    const repo = await seedCompanies();

    const results = await repo.searchByNamePrefix("appl", 10);

    expect(results.map((company) => company.cik)).toEqual(["320193", "6951"]);
  });

  it("ranks text matches by the number of matching words", async () => {
    const repo = await seedCompanies();

    const results = await repo.searchByText("materials applied", 10);

    expect(results).toEqual([
      { cik: "6951", name: "APPLIED MATERIALS INC /DE", ticker: "AMAT" },
    ]);
    expect(await repo.searchByText("inc", 10)).toHaveLength(4);
    expect(await repo.searchByText("  ", 10)).toEqual([]);
  });

  it("keeps filing sync state when the directory is refreshed", async () => {
    const repo = await seedCompanies();
    const syncedAt = new Date("2025-01-01T00:00:00.000Z");
    await repo.upsert({
      cik: "320193",
      name: "Apple Inc.",
      ticker: "AAPL",
      filingsSyncedAt: syncedAt,
    });

    await repo.upsertDirectory([
      { cik: "320193", name: "APPLE INC", ticker: "AAPL" },
    ]);

    expect(await repo.findByCik("320193")).toEqual({
      cik: "320193",
      name: "APPLE INC",
      ticker: "AAPL",
      filingsSyncedAt: syncedAt,
    });
    expect(await repo.findByCik("1")).toBeNull();
  });
});

describe("InMemoryFilingRepository", () => {
  it("keeps the first stored record for an accession number", async () => {
    const repo = new InMemoryFilingRepository();
    const filing = {
      cik: "320193",
      accessionNumber: "0000320193-24-000123",
      formType: "10-K",
      baseForm: "10-K",
      isAmendment: false,
      filingDate: "2024-11-01",
      primaryDocument: "aapl-20240928.htm",
      url: "https://www.sec.gov/Archives/edgar/data/320193/000032019324000123/aapl-20240928.htm",
    };

    await repo.upsertMany([filing]);
    await repo.upsertMany([{ ...filing, formType: "10-K/A" }]);

    expect(
      await repo.findByAccession("320193", "0000320193-24-000123"),
    ).toEqual(filing);
    expect(await repo.listByCik("320193")).toEqual([filing]);
    expect(await repo.listByCik("789019")).toEqual([]);
  });
});

describe("escapeLikePattern", () => {
  it("escapes LIKE wildcards and backslashes", () => {
    expect(escapeLikePattern("50%_off\\")).toBe("50\\%\\_off\\\\");
  });
});
