import { describe, expect, it } from "vitest";
import { TokenRateLimiter, estimateTokens } from "./tokenRateLimiter";

const createManualClock = () => {
  let current = Date.parse("2026-02-18T00:00:00.000Z");
  return {
    clock: { now: () => new Date(current) },
    advance: (ms: number) => {
      current += ms;
    },
  };
};

const createLimiter = (
  maxTokensPerRequest: number,
  reservedTokens = 2,
  tokensPerMinute = 1_000,
) => {
  const { clock, advance } = createManualClock();
  const sleeps: number[] = [];
  const limiter = new TokenRateLimiter(
    { tokensPerMinute, maxTokensPerRequest, reservedTokens },
    clock,
    async (ms) => {
      sleeps.push(ms);
      advance(ms);
    },
  );

  return { limiter, sleeps, advance };
};

describe("estimateTokens", () => {
  it("rounds four characters per token up", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });
});

describe("TokenRateLimiter", () => {
  it("keeps sentences together while they fit the chunk budget", () => {
    const { limiter } = createLimiter(12);

    expect(
      limiter.splitIntoChunks("Revenue grew. Margins fell. Cash rose"),
    ).toEqual(["Revenue grew. Margins fell. Cash rose."]);
  });

  it("starts a new chunk when the next sentence would overflow", () => {
    const { limiter } = createLimiter(6);

    expect(
      limiter.splitIntoChunks("Revenue grew. Margins fell. Cash rose."),
    ).toEqual(["Revenue grew.", "Margins fell.", "Cash rose."]);
  });

  it("splits an oversized sentence into word chunks in order", () => {
    const { limiter } = createLimiter(6);

    expect(
      limiter.splitIntoChunks("Intro. alpha beta gamma delta epsilon zeta"),
    ).toEqual(["Intro.", "alpha beta", "gamma delta", "epsilon zeta"]);
  });

  it("frees capacity once usage leaves the one-minute window", async () => {
    const { limiter, sleeps } = createLimiter(4_000, 1_000, 100);

    limiter.recordUsage(80);
    expect(limiter.availableTokens()).toBe(20);
    expect(limiter.canRequest(30)).toBe(false);

    await limiter.acquire(30);

    expect(sleeps).toHaveLength(60);
    expect(sleeps.every((ms) => ms === 1_000)).toBe(true);
    expect(limiter.availableTokens()).toBe(70);
  });

  it("does not wait when the request already fits", async () => {
    const { limiter, sleeps } = createLimiter(4_000, 1_000, 100);

    limiter.recordUsage(50);
    await limiter.acquire(50, 45);

    expect(sleeps).toEqual([]);
    expect(limiter.availableTokens()).toBe(5);
  });

  it("caps requests larger than the per-minute budget", async () => {
    const { limiter, sleeps } = createLimiter(4_000, 1_000, 100);

    await limiter.acquire(500);

    expect(sleeps).toEqual([]);
    expect(limiter.availableTokens()).toBe(0);
  });

  it("does not let concurrent callers claim the same capacity", async () => {
    const { limiter, sleeps } = createLimiter(4_000, 1_000, 100);

    await Promise.all([limiter.acquire(60), limiter.acquire(60)]);

    expect(sleeps).toHaveLength(60);
    expect(limiter.availableTokens()).toBe(40);
  });
});
