import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../core/entities/appError";
import {
  isAccessionNumber,
  normalizeCik,
} from "../shared/identifiers/secIdentifiers";

const cikSchema = z
  .string()
  .regex(/^\d{1,10}$/, "Company identifier must be 1 to 10 digits")
  .transform((value, ctx) => {
    const cik = normalizeCik(value);
    if (!cik) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Company identifier must not be zero",
      });
      return z.NEVER;
    }
    return cik;
  });

const accessionSchema = z
  .string()
  .refine(
    isAccessionNumber,
    "Accession number must have the form 0000000000-00-000000",
  );

export const filingParamsSchema = z.object({
  cik: cikSchema,
  accession: accessionSchema,
});

export const companyParamsSchema = z.object({
  cik: cikSchema,
});

export const companyDetailQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  filing_type: z.string().default(""),
});

export const companySearchQuerySchema = z.object({
  query: z.string(),
});

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");

/**
 * Parses request input into a typed value or a `validation_error` boundary error.
 */
export const validateRequest = <Schema extends z.ZodTypeAny>(
  schema: Schema,
  input: unknown,
): Result<z.output<Schema>, AppBoundaryError> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return err({
      source: "request",
      code: "validation_error",
      provider: "filings-api",
      message: describeIssues(parsed.error),
      retryable: false,
    });
  }

  return ok(parsed.data);
};
