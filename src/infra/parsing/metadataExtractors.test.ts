import { describe, expect, it } from "vitest";
import type { DocumentLine } from "../../core/entities/document";
import {
  AnnualReportExtractor,
  DefaultExtractor,
  selectMetadataExtractor,
} from "./metadataExtractors";
import { findDateInText } from "./dateUtils";

const toLines = (...texts: string[]): DocumentLine[] =>
  texts.map((text) => ({ text, page: 1 }));

describe("metadata extractors", () => {
  it("reads registrant name and fiscal year end from a 10-K cover", () => {
    const extractor = new AnnualReportExtractor(
      toLines(
        "FORM 10-K",
        "For the fiscal year ended September 28, 2024",
        "Mock Holdings Inc.",
        "(Exact name of registrant as specified in its charter)",
      ),
    );

    expect(extractor.extract()).toEqual({
      companyName: "Mock Holdings Inc.",
      reportPeriod: "2024-09-28",
    });
  });

  it("reads the quarter end when the date is on the next line", () => {
    const { extractor, isFallback } = selectMetadataExtractor(
      "10-Q",
      toLines("For the quarterly period ended", "December 28, 2024"),
    );

    expect(isFallback).toBe(false);
    expect(extractor.extract()).toEqual({
      companyName: null,
      reportPeriod: "2024-12-28",
    });
  });

  it("reads the 8-K event date from the preceding line", () => {
    const { extractor } = selectMetadataExtractor(
      "8-K",
      toLines(
        "January 30, 2025",
        "Date of Report (Date of earliest event reported)",
        "Sample Industries Corp",
        "(Exact name of registrant as specified in its charter)",
      ),
    );

    expect(extractor.extract()).toEqual({
      companyName: "Sample Industries Corp",
      eventDate: "2025-01-30",
    });
  });

  it("falls back to the default extractor for other forms", () => {
    const { extractor, isFallback } = selectMetadataExtractor(
      "PX14A6N",
      toLines("NOTICE OF EXEMPT SOLICITATION", "Vote against proposal 4"),
    );

    expect(isFallback).toBe(true);
    expect(extractor).toBeInstanceOf(DefaultExtractor);
    expect(extractor.extract()).toEqual({
      title: "NOTICE OF EXEMPT SOLICITATION",
      note: "fallback extractor - key fields may be missing",
    });
  });

  it("returns null for missing cover facts", () => {
    const extractor = new AnnualReportExtractor(toLines("ANNUAL REPORT"));

    expect(extractor.extract()).toEqual({
      companyName: null,
      reportPeriod: null,
    });
  });
});

describe("findDateInText", () => {
  it("parses long and numeric dates", () => {
    expect(findDateInText("ended June 1 2024 and")).toBe("2024-06-01");
    expect(findDateInText("as of 03/31/2025")).toBe("2025-03-31");
  });

  it("rejects impossible calendar dates", () => {
    expect(findDateInText("February 30, 2024")).toBeNull();
    expect(findDateInText("13/01/2024")).toBeNull();
    expect(findDateInText("no date here")).toBeNull();
  });
});
