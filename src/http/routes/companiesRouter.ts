import { Router } from "express";
import type { CompanySearchService } from "../../application/services/companySearchService";
import type { CompanyService } from "../../application/services/companyService";
import { asyncHandler, sendBoundaryError } from "../errors";
import {
  companyDetailQuerySchema,
  companyParamsSchema,
  companySearchQuerySchema,
  validateRequest,
} from "../validation";

export type CompaniesRouterDeps = {
  companySearchService: Pick<CompanySearchService, "search">;
  companyService: Pick<CompanyService, "getCompanyDetail">;
};

export const createCompaniesRouter = ({
  companySearchService,
  companyService,
}: CompaniesRouterDeps): Router => {
  const router = Router();

  // Registered before "/:cik" so "search" is never read as a CIK.
  router.get(
    "/search",
    asyncHandler(async (req, res) => {
      const query = validateRequest(companySearchQuerySchema, req.query);
      if (query.isErr()) {
        sendBoundaryError(res, query.error);
        return;
      }

      res.json(await companySearchService.search(query.value.query));
    }),
  );

  router.get(
    "/:cik",
    asyncHandler(async (req, res) => {
      const params = validateRequest(companyParamsSchema, req.params);
      if (params.isErr()) {
        sendBoundaryError(res, params.error);
        return;
      }

      const query = validateRequest(companyDetailQuerySchema, req.query);
      if (query.isErr()) {
        sendBoundaryError(res, query.error);
        return;
      }

      const detail = await companyService.getCompanyDetail(params.value.cik, {
        page: query.value.page,
        limit: query.value.limit,
        filingType: query.value.filing_type,
      });
      if (detail.isErr()) {
        sendBoundaryError(res, detail.error);
        return;
      }

      res.json(detail.value);
    }),
  );

  return router;
};
