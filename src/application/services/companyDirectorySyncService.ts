import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { CompanyDirectoryPort } from "../../core/ports/inboundPorts";
import type { CompanyRepositoryPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";

/**
 * Loads the SEC ticker directory into the company store so search works without per-company lookups.
 */
export class CompanyDirectorySyncService {
  constructor(
    private readonly directory: CompanyDirectoryPort,
    private readonly companyRepo: CompanyRepositoryPort,
  ) {}

  async sync(): Promise<Result<number, AppBoundaryError>> {
    const fetched = await this.directory.fetchDirectory();
    if (fetched.isErr()) {
      return err(fetched.error);
    }

    const upserted = await this.companyRepo.upsertDirectory(fetched.value);
    logger.info({ companies: upserted }, "Company directory synced");

    return ok(upserted);
  }
}
