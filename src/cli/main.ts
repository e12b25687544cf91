import { once } from "node:events";
import { Command } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { createApp } from "../http/app";
import {
  allowedOrigins,
  env,
  filingsProvider,
  proxyAllowedHosts,
  storageDriver,
} from "../shared/config/env";
import { logger, toErrorDetails } from "../shared/logger/logger";

/**
 * Defines a single command surface so the server and maintenance tasks share one runtime.
 */
const buildCli = () => {
  const cli = new Command();
  cli.name("filings-api").description("SEC EDGAR filings API");

  cli
    .command("serve")
    .description("Start the HTTP API")
    .option("--port <port>", "Port to listen on", String(env.PORT))
    .action(async (opts: { port: string }) => {
      const runtime = createRuntime();
      const app = createApp(runtime, { allowedOrigins: allowedOrigins() });
      const port = Number(opts.port);
      if (!Number.isInteger(port) || port < 0 || port > 65_535) {
        throw new Error(`Invalid port '${opts.port}'.`);
      }

      const server = app.listen(port, env.HOST);
      await once(server, "listening");
      logger.info(
        {
          host: env.HOST,
          port,
          storageDriver: storageDriver(),
          filingsProvider: filingsProvider(),
        },
        "HTTP API listening",
      );

      const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, "Shutting down");
        server.close((closeError) => {
          runtime
            .close()
            .then(() => process.exit(closeError ? 1 : 0))
            .catch((error: unknown) => {
              logger.error(
                { error: toErrorDetails(error) },
                "Storage shutdown failed",
              );
              process.exit(1);
            });
        });
      };

      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

  cli
    .command("sync-companies")
    .description("Load the SEC ticker directory into company storage")
    .action(async () => {
      const runtime = createRuntime();
      try {
        const result = await runtime.directorySyncService.sync();
        if (result.isErr()) {
          throw new Error(
            `Company directory sync failed (${result.error.code}): ${result.error.message}`,
          );
        }

        logger.info({ companies: result.value }, "Company directory stored");
      } finally {
        await runtime.close();
      }
    });

  cli
    .command("status")
    .description("Report runtime configuration")
    .action(() => {
      logger.info(
        {
          host: env.HOST,
          port: env.PORT,
          allowedOrigins: allowedOrigins(),
          storageDriver: storageDriver(),
          postgres: env.POSTGRES_URL,
          filingsProvider: filingsProvider(),
          secEdgarBaseUrl: env.SEC_EDGAR_BASE_URL,
          secEdgarUserAgentConfigured:
            env.SEC_EDGAR_USER_AGENT.trim().length > 0,
          filingsRefreshMinutes: env.FILINGS_REFRESH_MINUTES,
          ollama: env.OLLAMA_BASE_URL,
          chatModel: env.OLLAMA_CHAT_MODEL,
          tokenBudget: {
            tokensPerMinute: env.LLM_TOKENS_PER_MINUTE,
            maxTokensPerRequest: env.LLM_MAX_TOKENS_PER_REQUEST,
            reservedTokens: env.LLM_RESERVED_TOKENS,
          },
          proxyAllowedHosts: proxyAllowedHosts(),
          startupWorkflow: [
            "npm run db:generate",
            "npm run db:migrate",
            "npm run sync-companies",
            "npm start",
          ],
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
