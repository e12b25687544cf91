import { afterEach, describe, expect, it } from "vitest";
import { SecEdgarFilingsProvider } from "./secEdgarFilingsProvider";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler as typeof fetch;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const createProvider = () =>
  new SecEdgarFilingsProvider(
    "https://data.sec.gov",
    "https://www.sec.gov/Archives/edgar/data",
    "https://www.sec.gov/files/company_tickers.json",
    "filings-api-test/1.0 (contact: dev@example.com)",
    5_000,
  );

describe("SecEdgarFilingsProvider", () => {
  it("maps SEC submissions to filing records", async () => {
    const calls: Array<{ url: string; userAgent: string | null }> = [];

    setFetch(async (input, init) => {
      const url = String(input);
      calls.push({
        url,
        userAgent: new Headers(init?.headers).get("user-agent"),
      });

      if (url.includes("/submissions/CIK0000320193.json")) {
        return new Response(
          JSON.stringify({
            name: "Apple Inc.",
            tickers: ["aapl"],
            exchanges: ["Nasdaq"],
            filings: {
              recent: {
                form: ["10-K", "PX14A6N", "8-K/A", "4"],
                accessionNumber: [
                  "0000320193-24-000123",
                  "0001214659-25-000456",
                  "0000320193-25-000010",
                  "",
                ],
                filingDate: [
                  "2024-11-01",
                  "2025-01-10",
                  "2025-02-03",
                  "2025-02-04",
                ],
                reportDate: ["2024-09-28", "", "2025-01-31", ""],
                primaryDocument: [
                  "aapl-20240928.htm",
                  "",
                  "aapl-8ka.htm",
                  "form4.xml",
                ],
              },
            },
          }),
          { status: 200 },
        );
      }

      return new Response("not found", { status: 404 });
    });

    const result = await createProvider().fetchSubmission({
      cik: "0000320193",
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(calls).toEqual([
      {
        url: "https://data.sec.gov/submissions/CIK0000320193.json",
        userAgent: "filings-api-test/1.0 (contact: dev@example.com)",
      },
    ]);

    expect(result.value).toEqual({
      cik: "320193",
      name: "Apple Inc.",
      tickers: ["AAPL"],
      exchanges: ["Nasdaq"],
      filings: [
        {
          cik: "320193",
          accessionNumber: "0000320193-24-000123",
          formType: "10-K",
          baseForm: "10-K",
          isAmendment: false,
          filingDate: "2024-11-01",
          reportDate: "2024-09-28",
          primaryDocument: "aapl-20240928.htm",
          url: "https://www.sec.gov/Archives/edgar/data/320193/000032019324000123/aapl-20240928.htm",
        },
        {
          cik: "320193",
          accessionNumber: "0001214659-25-000456",
          formType: "PX14A6N",
          baseForm: "PX14A6N",
          isAmendment: false,
          filingDate: "2025-01-10",
          reportDate: undefined,
          primaryDocument: "0001214659-25-000456.txt",
          url: "https://www.sec.gov/Archives/edgar/data/320193/000121465925000456/0001214659-25-000456.txt",
        },
        {
          cik: "320193",
          accessionNumber: "0000320193-25-000010",
          formType: "8-K/A",
          baseForm: "8-K",
          isAmendment: true,
          filingDate: "2025-02-03",
          reportDate: "2025-01-31",
          primaryDocument: "aapl-8ka.htm",
          url: "https://www.sec.gov/Archives/edgar/data/320193/000032019325000010/aapl-8ka.htm",
        },
      ],
    });
  });

  it("returns null when the SEC has no submissions for the CIK", async () => {
    setFetch(async () => new Response("not found", { status: 404 }));

    const result = await createProvider().fetchSubmission({ cik: "999" });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toBeNull();
  });

  it("rejects malformed CIKs without calling the SEC", async () => {
    let called = false;
    setFetch(async () => {
      called = true;
      return new Response("{}", { status: 200 });
    });

    const result = await createProvider().fetchSubmission({ cik: "AAPL" });

    expect(called).toBe(false);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe("validation_error");
    }
  });

  it("maps SEC throttling to rate_limited errors", async () => {
    let attempts = 0;
    setFetch(async () => {
      attempts += 1;
      return new Response("slow down", { status: 429 });
    });

    const result = await createProvider().fetchSubmission({ cik: "320193" });

    expect(attempts).toBe(3);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe("rate_limited");
      expect(result.error.httpStatus).toBe(429);
      expect(result.error.retryable).toBe(true);
    }
  });

  it("downloads filing documents with their content type", async () => {
    setFetch(
      async () =>
        new Response("<html><body><p>Annual report</p></body></html>", {
          status: 200,
          headers: { "content-type": "text/html" },
        }),
    );

    const result = await createProvider().fetchDocument({
      url: "https://www.sec.gov/Archives/edgar/data/320193/000032019324000123/aapl-20240928.htm",
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual({
      url: "https://www.sec.gov/Archives/edgar/data/320193/000032019324000123/aapl-20240928.htm",
      contentType: "text/html",
      body: "<html><body><p>Annual report</p></body></html>",
    });
  });

  it("maps missing documents to not_found", async () => {
    setFetch(async () => new Response("gone", { status: 404 }));

    const result = await createProvider().fetchDocument({
      url: "https://www.sec.gov/Archives/edgar/data/1/000000000000000000/missing.htm",
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe("not_found");
      expect(result.error.retryable).toBe(false);
    }
  });

  it("builds the company directory from the ticker file", async () => {
    setFetch(
      async () =>
        new Response(
          JSON.stringify({
            "0": { cik_str: 320193, ticker: "aapl", title: "Apple Inc." },
            "1": { cik_str: 789019, ticker: "MSFT", title: "MICROSOFT CORP" },
            "2": { cik_str: 1652044, ticker: "GOOGL", title: "Alphabet Inc." },
            "3": { cik_str: 1652044, ticker: "GOOG", title: "Alphabet Inc." },
            "4": { ticker: "NOCIK", title: "Missing CIK" },
          }),
          { status: 200 },
        ),
    );

    const result = await createProvider().fetchDirectory();

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual([
      { cik: "320193", name: "Apple Inc.", ticker: "AAPL" },
      { cik: "789019", name: "MICROSOFT CORP", ticker: "MSFT" },
      { cik: "1652044", name: "Alphabet Inc.", ticker: "GOOGL" },
    ]);
  });

  it("throws when user-agent is missing", () => {
    expect(
      () =>
        new SecEdgarFilingsProvider(
          "https://data.sec.gov",
          "https://www.sec.gov/Archives/edgar/data",
          "https://www.sec.gov/files/company_tickers.json",
          "",
        ),
    ).toThrow("SEC_EDGAR_USER_AGENT is required");
  });
});
