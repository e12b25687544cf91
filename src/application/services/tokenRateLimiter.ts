import type { ClockPort, SleepFn } from "../../core/ports/outboundPorts";

const WINDOW_MS = 60_000;
const POLL_INTERVAL_MS = 1_000;
const SENTENCE_SEPARATOR = ". ";

type TokenRateLimiterOptions = {
  tokensPerMinute: number;
  maxTokensPerRequest: number;
  reservedTokens: number;
};

type TokenUsage = {
  at: number;
  tokens: number;
};

/**
 * Rough token estimate (about four characters per token) used for budgeting LLM calls.
 */
export const estimateTokens = (text: string): number =>
  Math.ceil(text.length / 4);

/**
 * Keeps LLM traffic under a tokens-per-minute budget and sizes request chunks to the per-request budget.
 */
export class TokenRateLimiter {
  private usage: TokenUsage[] = [];

  constructor(
    private readonly options: TokenRateLimiterOptions,
    private readonly clock: ClockPort,
    private readonly sleep: SleepFn,
  ) {}

  /**
   * Tokens a single chunk may use once the reserve for prompt and reply is taken out.
   */
  get chunkBudget(): number {
    return Math.max(
      1,
      this.options.maxTokensPerRequest - this.options.reservedTokens,
    );
  }

  countTokens(text: string): number {
    return estimateTokens(text);
  }

  availableTokens(): number {
    const cutoff = this.clock.now().getTime() - WINDOW_MS;
    this.usage = this.usage.filter((entry) => entry.at > cutoff);

    const used = this.usage.reduce((total, entry) => total + entry.tokens, 0);
    return Math.max(0, this.options.tokensPerMinute - used);
  }

  canRequest(tokens: number): boolean {
    return tokens <= this.availableTokens();
  }

  recordUsage(tokens: number): void {
    this.usage.push({ at: this.clock.now().getTime(), tokens });
  }

  /**
   * Polls until the window has room for `tokens` (capped at the whole per-minute budget), then records
   * `recorded` tokens in the same synchronous step so concurrent callers cannot both claim the room.
   */
  async acquire(tokens: number, recorded = tokens): Promise<void> {
    const required = Math.min(tokens, this.options.tokensPerMinute);
    while (!this.canRequest(required)) {
      await this.sleep(POLL_INTERVAL_MS);
    }
    this.recordUsage(recorded);
  }

  /**
   * Splits text on sentence boundaries into chunks that fit the chunk budget.
   * Sentences over budget are split on whitespace instead.
   */
  splitIntoChunks(text: string): string[] {
    const budget = this.chunkBudget;
    const chunks: string[] = [];
    let current: string[] = [];
    let currentTokens = 0;

    const flush = () => {
      if (current.length === 0) {
        return;
      }

      const joined = current.join(SENTENCE_SEPARATOR);
      chunks.push(joined.endsWith(".") ? joined : `${joined}.`);
      current = [];
      currentTokens = 0;
    };

    for (const rawSentence of text.split(SENTENCE_SEPARATOR)) {
      const sentence = rawSentence.trim();
      if (!sentence) {
        continue;
      }

      const tokens = this.countTokens(sentence);
      if (tokens > budget) {
        flush();
        chunks.push(...this.splitWords(sentence, budget));
        continue;
      }

      if (currentTokens + tokens > budget) {
        flush();
      }

      current.push(sentence);
      currentTokens += tokens;
    }

    flush();
    return chunks;
  }

  private splitWords(sentence: string, budget: number): string[] {
    const chunks: string[] = [];
    let words: string[] = [];
    let wordTokens = 0;

    for (const word of sentence.split(/\s+/)) {
      const tokens = this.countTokens(word);
      if (wordTokens + tokens > budget && words.length > 0) {
        chunks.push(words.join(" "));
        words = [];
        wordTokens = 0;
      }

      words.push(word);
      wordTokens += tokens;
    }

    if (words.length > 0) {
      chunks.push(words.join(" "));
    }

    return chunks;
  }
}
