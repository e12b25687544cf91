import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  FilingAnalysis,
  SectionAnalysis,
} from "../../core/entities/analysis";
import type { DocumentSection } from "../../core/entities/document";
import type { LlmPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { getSectionPrompt, getSystemPrompt } from "./analysisPrompts";
import type { FilingDocumentService } from "./filingDocumentService";
import type { TokenRateLimiter } from "./tokenRateLimiter";

const DOCUMENT_GROUP = "document";

const SECTION_GROUPS: Record<string, Array<[string, string[]]>> = {
  "10-K": [
    ["business_overview", ["Item 1.", "Item 1A.", "Item 1B.", "Item 1C."]],
    ["financial_metrics", ["Item 6.", "Item 7.", "Item 7A."]],
    ["risk_factors", ["Item 1A."]],
    ["management_discussion", ["Item 7."]],
  ],
  "10-Q": [
    ["financial_statements", ["Item 1.", "Item 2."]],
    ["management_discussion", ["Item 2."]],
  ],
};

type AnalysisGroup = {
  name: string;
  prompt: string;
  content: string;
};

export type ParsedFilingLoader = Pick<
  FilingDocumentService,
  "loadParsedFiling"
>;

const joinContent = (parts: string[]): string =>
  parts
    .map((part) => part.trim())
    .filter(Boolean)
    .join(" ");

/**
 * Runs an LLM over a filing's sections, grouped by form type, staying within the token budget.
 */
export class FilingAnalysisService {
  constructor(
    private readonly documents: ParsedFilingLoader,
    private readonly llm: LlmPort,
    private readonly rateLimiter: TokenRateLimiter,
  ) {}

  async analyzeFiling(
    cik: string,
    accessionNumber: string,
  ): Promise<Result<FilingAnalysis, AppBoundaryError>> {
    const loaded = await this.documents.loadParsedFiling(cik, accessionNumber);
    if (loaded.isErr()) {
      return err(loaded.error);
    }

    const { filing, parsed } = loaded.value;
    const groups = this.planGroups(filing.baseForm, parsed.sections);
    const sectionAnalyses: SectionAnalysis[] = [];

    for (const group of groups) {
      const analysis = await this.analyzeGroup(group);
      if (analysis.isErr()) {
        return err(analysis.error);
      }

      sectionAnalyses.push({ sectionName: group.name, analysis: analysis.value });
    }

    logger.info(
      {
        cik,
        accessionNumber,
        formType: filing.formType,
        groups: sectionAnalyses.map((entry) => entry.sectionName),
      },
      "Filing analysis completed",
    );

    return ok({
      cik: filing.cik,
      accessionNumber: filing.accessionNumber,
      formType: filing.formType,
      filingDate: filing.filingDate,
      model: this.llm.model,
      sectionAnalyses,
    });
  }

  /**
   * Uses the form's section groups when any of them has content, otherwise one group over the whole document.
   */
  private planGroups(
    baseForm: string,
    sections: DocumentSection[],
  ): AnalysisGroup[] {
    const textByKey = new Map<string, string[]>();
    for (const section of sections) {
      if (section.key === null) {
        continue;
      }

      const texts = textByKey.get(section.key) ?? [];
      texts.push(section.text);
      textByKey.set(section.key, texts);
    }

    const grouped = (SECTION_GROUPS[baseForm] ?? [])
      .map(([name, keys]) => ({
        name,
        prompt: getSectionPrompt(baseForm, name),
        content: joinContent(keys.flatMap((key) => textByKey.get(key) ?? [])),
      }))
      .filter((group) => group.content !== "");

    if (grouped.length > 0) {
      return grouped;
    }

    const content = joinContent(sections.map((section) => section.text));
    if (!content) {
      return [];
    }

    return [
      { name: DOCUMENT_GROUP, prompt: getSystemPrompt(baseForm), content },
    ];
  }

  private async analyzeGroup(
    group: AnalysisGroup,
  ): Promise<Result<string, AppBoundaryError>> {
    const promptTokens = this.rateLimiter.countTokens(group.prompt);
    const replies: string[] = [];

    for (const chunk of this.rateLimiter.splitIntoChunks(group.content)) {
      const chunkTokens = this.rateLimiter.countTokens(chunk);
      await this.rateLimiter.acquire(chunkTokens, chunkTokens + promptTokens);

      const reply = await this.llm.analyze(group.prompt, chunk);
      if (reply.isErr()) {
        return err(reply.error);
      }

      replies.push(reply.value);
    }

    return ok(replies.join("\n\n"));
  }
}
