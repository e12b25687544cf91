import { Router } from "express";
import type { FilingAnalysisService } from "../../application/services/filingAnalysisService";
import type { FilingDocumentService } from "../../application/services/filingDocumentService";
import { asyncHandler, sendBoundaryError } from "../errors";
import { filingParamsSchema, validateRequest } from "../validation";

export type FilingsRouterDeps = {
  documentService: Pick<FilingDocumentService, "getFilingText">;
  analysisService: Pick<FilingAnalysisService, "analyzeFiling">;
};

export const createFilingsRouter = ({
  documentService,
  analysisService,
}: FilingsRouterDeps): Router => {
  const router = Router();

  router.get(
    "/:cik/:accession/text",
    asyncHandler(async (req, res) => {
      const params = validateRequest(filingParamsSchema, req.params);
      if (params.isErr()) {
        sendBoundaryError(res, params.error);
        return;
      }

      const text = await documentService.getFilingText(
        params.value.cik,
        params.value.accession,
      );
      if (text.isErr()) {
        sendBoundaryError(res, text.error);
        return;
      }

      res.type("text/plain").send(text.value);
    }),
  );

  router.get(
    "/:cik/:accession/analyze",
    asyncHandler(async (req, res) => {
      const params = validateRequest(filingParamsSchema, req.params);
      if (params.isErr()) {
        sendBoundaryError(res, params.error);
        return;
      }

      const analysis = await analysisService.analyzeFiling(
        params.value.cik,
        params.value.accession,
      );
      if (analysis.isErr()) {
        sendBoundaryError(res, analysis.error);
        return;
      }

      res.json(analysis.value);
    }),
  );

  return router;
};
