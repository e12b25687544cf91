import { CompanyDirectorySyncService } from "../services/companyDirectorySyncService";
import { CompanySearchService } from "../services/companySearchService";
import { CompanyService } from "../services/companyService";
import { FilingAnalysisService } from "../services/filingAnalysisService";
import { FilingDocumentService } from "../services/filingDocumentService";
import { TokenRateLimiter } from "../services/tokenRateLimiter";
import {
  env,
  filingsProvider,
  proxyAllowedHosts,
  storageDriver,
} from "../../shared/config/env";
import { createDb } from "../../infra/db/client";
import {
  InMemoryCompanyRepository,
  InMemoryFilingRepository,
} from "../../infra/db/memoryRepositories";
import {
  PostgresCompanyRepositoryService,
  PostgresFilingRepositoryService,
} from "../../infra/db/repositories";
import { OllamaLlm } from "../../infra/llm/ollamaLlm";
import { MockFilingsProvider } from "../../infra/providers/mocks/mockFilingsProvider";
import { SecEdgarFilingsProvider } from "../../infra/providers/sec/secEdgarFilingsProvider";
import { AllowlistedResourceProxy } from "../../infra/proxy/allowlistedResourceProxy";
import { SystemClock, systemSleep } from "../../infra/system/systemPorts";
import type {
  CompanyDirectoryPort,
  FilingsProviderPort,
} from "../../core/ports/inboundPorts";
import type {
  CompanyRepositoryPort,
  FilingRepositoryPort,
} from "../../core/ports/outboundPorts";

type StorageRuntime = {
  companyRepo: CompanyRepositoryPort;
  filingRepo: FilingRepositoryPort;
  close: () => Promise<void>;
};

/**
 * Resolves the configured storage; the memory driver keeps everything in process for local runs.
 */
const createStorage = (): StorageRuntime => {
  if (storageDriver() === "memory") {
    return {
      companyRepo: new InMemoryCompanyRepository(),
      filingRepo: new InMemoryFilingRepository(),
      close: async () => undefined,
    };
  }

  const { db, sql } = createDb(env.POSTGRES_URL);
  return {
    companyRepo: new PostgresCompanyRepositoryService(db),
    filingRepo: new PostgresFilingRepositoryService(db),
    close: async () => {
      await sql.end();
    },
  };
};

/**
 * Resolves the configured filings adapter while preserving a mock fallback for local development.
 */
const createFilingsProvider = (): FilingsProviderPort & CompanyDirectoryPort => {
  if (filingsProvider() === "sec-edgar") {
    return new SecEdgarFilingsProvider(
      env.SEC_EDGAR_BASE_URL,
      env.SEC_EDGAR_ARCHIVES_BASE_URL,
      env.SEC_EDGAR_TICKERS_URL,
      env.SEC_EDGAR_USER_AGENT,
      env.SEC_EDGAR_TIMEOUT_MS,
    );
  }

  return new MockFilingsProvider();
};

/**
 * Centralizes runtime wiring so the server and CLI commands share one composition root.
 */
export const createRuntime = () => {
  const storage = createStorage();
  const provider = createFilingsProvider();
  const clock = new SystemClock();

  const llm = new OllamaLlm(
    env.OLLAMA_BASE_URL,
    env.OLLAMA_CHAT_MODEL,
    env.OLLAMA_CHAT_TIMEOUT_MS,
  );
  const rateLimiter = new TokenRateLimiter(
    {
      tokensPerMinute: env.LLM_TOKENS_PER_MINUTE,
      maxTokensPerRequest: env.LLM_MAX_TOKENS_PER_REQUEST,
      reservedTokens: env.LLM_RESERVED_TOKENS,
    },
    clock,
    systemSleep,
  );

  const companyService = new CompanyService(
    storage.companyRepo,
    storage.filingRepo,
    provider,
    clock,
    { refreshAfterMinutes: env.FILINGS_REFRESH_MINUTES },
  );
  const documentService = new FilingDocumentService(companyService, provider);

  return {
    companySearchService: new CompanySearchService(storage.companyRepo),
    companyService,
    documentService,
    analysisService: new FilingAnalysisService(
      documentService,
      llm,
      rateLimiter,
    ),
    directorySyncService: new CompanyDirectorySyncService(
      provider,
      storage.companyRepo,
    ),
    resourceProxy: new AllowlistedResourceProxy(
      proxyAllowedHosts(),
      env.SEC_EDGAR_USER_AGENT,
      env.PROXY_TIMEOUT_MS,
    ),
    close: storage.close,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
