import cors from "cors";
import express, { type Express, type RequestHandler } from "express";
import type { ResourceProxyPort } from "../core/ports/outboundPorts";
import { logger } from "../shared/logger/logger";
import { errorHandler, notFoundHandler } from "./errors";
import { createAnalysisRouter } from "./routes/analysisRouter";
import {
  createCompaniesRouter,
  type CompaniesRouterDeps,
} from "./routes/companiesRouter";
import {
  createFilingsRouter,
  type FilingsRouterDeps,
} from "./routes/filingsRouter";
import { createHealthRouter } from "./routes/healthRouter";
import { createProxyRouter } from "./routes/proxyRouter";

type HttpDependencies = CompaniesRouterDeps & {
  documentService: FilingsRouterDeps["documentService"] &
    Parameters<typeof createAnalysisRouter>[0];
  analysisService: FilingsRouterDeps["analysisService"];
  resourceProxy: ResourceProxyPort;
};

type HttpAppOptions = {
  allowedOrigins: string[];
};

const requestLogger: RequestHandler = (req, res, next) => {
  const startedAt = performance.now();
  const { method, path } = req;
  res.on("finish", () => {
    logger.info(
      {
        method,
        path,
        status: res.statusCode,
        durationMs: Math.round(performance.now() - startedAt),
      },
      "Request completed",
    );
  });
  next();
};

/**
 * Builds the express app without binding a port so tests and the CLI share the same wiring.
 */
export const createApp = (
  deps: HttpDependencies,
  options: HttpAppOptions,
): Express => {
  const app = express();

  app.disable("x-powered-by");
  app.use(requestLogger);
  app.use(
    cors({
      origin: options.allowedOrigins,
      credentials: true,
    }),
  );

  app.use("/health", createHealthRouter());
  app.use("/api/v1/filings", createFilingsRouter(deps));
  app.use("/api/analysis", createAnalysisRouter(deps.documentService));
  app.use("/api/companies", createCompaniesRouter(deps));
  app.use("/proxy", createProxyRouter(deps.resourceProxy));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
