import { describe, expect, it } from "vitest";
import { err, ok } from "neverthrow";
import {
  FilingAnalysisService,
  type ParsedFilingLoader,
} from "./filingAnalysisService";
import { CompanyService } from "./companyService";
import { FilingDocumentService } from "./filingDocumentService";
import { TokenRateLimiter } from "./tokenRateLimiter";
import { getSectionPrompt, getSystemPrompt } from "./analysisPrompts";
import { MockFilingsProvider } from "../../infra/providers/mocks/mockFilingsProvider";
import {
  InMemoryCompanyRepository,
  InMemoryFilingRepository,
} from "../../infra/db/memoryRepositories";
import type { LlmPort } from "../../core/ports/outboundPorts";
import type { DocumentSection } from "../../core/entities/document";
import type { FilingEntity } from "../../core/entities/filing";

const createManualClock = () => {
  let current = Date.parse("2026-02-18T00:00:00.000Z");
  return {
    clock: { now: () => new Date(current) },
    advance: (ms: number) => {
      current += ms;
    },
  };
};

const createFakeLlm = () => {
  const calls: Array<{ systemPrompt: string; content: string }> = [];
  const llm: LlmPort = {
    model: "test-model",
    analyze: async (systemPrompt, content) => {
      calls.push({ systemPrompt, content });
      return ok(`reply ${calls.length}`);
    },
  };
  return { llm, calls };
};

const createLimiter = (
  options: {
    tokensPerMinute?: number;
    maxTokensPerRequest?: number;
    reservedTokens?: number;
  } = {},
) => {
  const { clock, advance } = createManualClock();
  const sleeps: number[] = [];
  const limiter = new TokenRateLimiter(
    {
      tokensPerMinute: options.tokensPerMinute ?? 100_000,
      maxTokensPerRequest: options.maxTokensPerRequest ?? 4_000,
      reservedTokens: options.reservedTokens ?? 1_000,
    },
    clock,
    async (ms) => {
      sleeps.push(ms);
      advance(ms);
    },
  );
  return { limiter, sleeps };
};

const proxyFiling: FilingEntity = {
  cik: "1000002",
  accessionNumber: "0001000002-25-000004",
  formType: "PX14A6N",
  baseForm: "PX14A6N",
  isAmendment: false,
  filingDate: "2025-02-10",
  primaryDocument: "smpl-px14a6n.htm",
  url: "https://example.local/Archives/edgar/data/1000002/000100000225000004/smpl-px14a6n.htm",
};

const loaderFor = (
  filing: FilingEntity,
  sections: DocumentSection[],
): ParsedFilingLoader => ({
  loadParsedFiling: async () => ok({ filing, parsed: { lines: [], sections } }),
});

const documentSection = (text: string): DocumentSection => ({
  key: null,
  title: "Document",
  text,
  startPage: 1,
  endPage: 1,
});

describe("FilingAnalysisService", () => {
  it("analyzes annual report section groups with their prompts", async () => {
    const provider = new MockFilingsProvider();
    const companyService = new CompanyService(
      new InMemoryCompanyRepository(),
      new InMemoryFilingRepository(),
      provider,
      { now: () => new Date("2026-02-18T00:00:00.000Z") },
      { refreshAfterMinutes: 60 },
    );
    const documents = new FilingDocumentService(companyService, provider);
    const { llm, calls } = createFakeLlm();
    const { limiter } = createLimiter();

    const result = await new FilingAnalysisService(
      documents,
      llm,
      limiter,
    ).analyzeFiling("1000001", "0001000001-24-000001");

    expect(result._unsafeUnwrap()).toEqual({
      cik: "1000001",
      accessionNumber: "0001000001-24-000001",
      formType: "10-K",
      filingDate: "2024-11-01",
      model: "test-model",
      sectionAnalyses: [
        { sectionName: "business_overview", analysis: "reply 1" },
        { sectionName: "financial_metrics", analysis: "reply 2" },
        { sectionName: "risk_factors", analysis: "reply 3" },
        { sectionName: "management_discussion", analysis: "reply 4" },
      ],
    });
    expect(calls[0]).toEqual({
      systemPrompt: getSectionPrompt("10-K", "business_overview"),
      content:
        "The Company designs and sells simulated widgets. Demand was steady across regions. Supply chain disruption could reduce margins. Currency movements affect results.",
    });
    expect(calls[1]?.content).toBe(
      "Net sales increased 4% year over year. Gross margin was 46.2%.",
    );
  });

  it("splits a whole-document group into chunks and joins the replies", async () => {
    const { llm, calls } = createFakeLlm();
    const { limiter, sleeps } = createLimiter({
      maxTokensPerRequest: 12,
      reservedTokens: 2,
    });
    const service = new FilingAnalysisService(
      loaderFor(proxyFiling, [
        documentSection(
          "Vote against proposal 4. The board disagrees. Shareholders should review.",
        ),
      ]),
      llm,
      limiter,
    );

    const analysis = (
      await service.analyzeFiling("1000002", "0001000002-25-000004")
    )._unsafeUnwrap();

    expect(analysis.sectionAnalyses).toEqual([
      { sectionName: "document", analysis: "reply 1\n\nreply 2\n\nreply 3" },
    ]);
    expect(calls.map((call) => call.content)).toEqual([
      "Vote against proposal 4.",
      "The board disagrees.",
      "Shareholders should review.",
    ]);
    expect(
      calls.every((call) => call.systemPrompt === getSystemPrompt("PX14A6N")),
    ).toBe(true);
    expect(sleeps).toEqual([]);
  });

  it("waits for the token window between calls", async () => {
    const { llm, calls } = createFakeLlm();
    const { limiter, sleeps } = createLimiter({
      tokensPerMinute: 1,
      maxTokensPerRequest: 12,
      reservedTokens: 2,
    });
    const service = new FilingAnalysisService(
      loaderFor(proxyFiling, [
        documentSection(
          "Vote against proposal 4. The board disagrees. Shareholders should review.",
        ),
      ]),
      llm,
      limiter,
    );

    await service.analyzeFiling("1000002", "0001000002-25-000004");

    expect(calls).toHaveLength(3);
    expect(sleeps).toHaveLength(120);
  });

  it("falls back to the whole document when no annual report item has text", async () => {
    const { llm, calls } = createFakeLlm();
    const { limiter } = createLimiter();
    const annualFiling: FilingEntity = {
      ...proxyFiling,
      formType: "10-K/A",
      baseForm: "10-K",
      isAmendment: true,
    };
    const service = new FilingAnalysisService(
      loaderFor(annualFiling, [
        documentSection("Amendment to add exhibits."),
        {
          key: "Item 15.",
          title: "Item 15. Exhibits",
          text: "",
          startPage: 1,
          endPage: 1,
        },
      ]),
      llm,
      limiter,
    );

    const analysis = (
      await service.analyzeFiling("1000002", "0001000002-25-000004")
    )._unsafeUnwrap();

    expect(analysis.formType).toBe("10-K/A");
    expect(analysis.sectionAnalyses).toEqual([
      { sectionName: "document", analysis: "reply 1" },
    ]);
    expect(calls).toEqual([
      {
        systemPrompt: getSystemPrompt("10-K"),
        content: "Amendment to add exhibits.",
      },
    ]);
  });

  it("fails the analysis when the LLM call fails", async () => {
    const llm: LlmPort = {
      model: "test-model",
      analyze: async () =>
        err({
          source: "llm",
          code: "timeout",
          provider: "ollama",
          message: "Request timed out",
          retryable: true,
        }),
    };
    const { limiter } = createLimiter();
    const service = new FilingAnalysisService(
      loaderFor(proxyFiling, [documentSection("Short notice.")]),
      llm,
      limiter,
    );

    const result = await service.analyzeFiling(
      "1000002",
      "0001000002-25-000004",
    );

    expect(result._unsafeUnwrapErr().code).toBe("timeout");
  });
});
