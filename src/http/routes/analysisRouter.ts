import { Router } from "express";
import type { FilingDocumentService } from "../../application/services/filingDocumentService";
import { asyncHandler, sendBoundaryError } from "../errors";
import { filingParamsSchema, validateRequest } from "../validation";

/**
 * Structured view of a filing: cover metadata plus page-ranged sections.
 */
export const createAnalysisRouter = (
  documentService: Pick<FilingDocumentService, "getStructuredDocument">,
): Router => {
  const router = Router();

  router.get(
    "/:cik/:accession",
    asyncHandler(async (req, res) => {
      const params = validateRequest(filingParamsSchema, req.params);
      if (params.isErr()) {
        sendBoundaryError(res, params.error);
        return;
      }

      const document = await documentService.getStructuredDocument(
        params.value.cik,
        params.value.accession,
      );
      if (document.isErr()) {
        sendBoundaryError(res, document.error);
        return;
      }

      res.json(document.value);
    }),
  );

  return router;
};
