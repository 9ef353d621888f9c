import type { ResourceKind, ResourceRef, ResourceSnapshot } from "../../domain/entities/remote-resources";
import { errorMessage } from "../../domain/errors/file-search.errors";
import type { IFileSearchGateway } from "../../domain/interfaces/ifile.search.gateway";

export type CleanupResourcesUseCaseParams = Partial<ResourceSnapshot>;

export interface FailedDeletion extends ResourceRef {
  error: string;
}

export interface CleanupReport {
  deleted: ResourceRef[];
  failed: FailedDeletion[];
}

/**
 * Deletes vector stores, then responses, then the file. Each deletion is
 * attempted independently; failures are logged and reported, never thrown.
 */
export class CleanupResourcesUseCase {
  constructor(private gateway: IFileSearchGateway) {}

  async execute(params: CleanupResourcesUseCaseParams): Promise<CleanupReport> {
    const { vectorStoreIds = [], responseIds = [], fileId } = params;
    const report: CleanupReport = { deleted: [], failed: [] };

    for (const vectorStoreId of vectorStoreIds) {
      console.log(`Deleting vector store ${vectorStoreId}...`);
      await this.attempt(report, "vector store", vectorStoreId, () =>
        this.gateway.deleteVectorStore(vectorStoreId)
      );
    }

    for (const responseId of responseIds) {
      console.log(`Deleting response ${responseId}...`);
      await this.attempt(report, "response", responseId, () =>
        this.gateway.deleteResponse(responseId)
      );
    }

    if (fileId) {
      console.log("Deleting uploaded file...");
      await this.attempt(report, "file", fileId, () => this.gateway.deleteFile(fileId));
    }

    console.log("Cleanup completed.");
    return report;
  }

  private async attempt(
    report: CleanupReport,
    kind: ResourceKind,
    id: string,
    remove: () => Promise<void>
  ): Promise<void> {
    try {
      await remove();
      report.deleted.push({ kind, id });
    } catch (error) {
      const message = errorMessage(error);
      console.error(`Error deleting ${kind} ${id}: ${message}`);
      report.failed.push({ kind, id, error: message });
    }
  }
}
