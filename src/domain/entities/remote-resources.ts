export interface UploadedFile {
  id: string;
  filename?: string;
  bytes?: number;
  reused: boolean; // true when the id came from configuration and nothing was uploaded
}

export interface VectorStore {
  id: string;
  name: string;
}

export type ResourceKind = "vector store" | "response" | "file";

export interface ResourceRef {
  kind: ResourceKind;
  id: string;
}

export interface ResourceSnapshot {
  fileId?: string;
  vectorStoreIds: string[];
  responseIds: string[];
}

/**
 * Ids of the remote resources created during a run, kept so they can be
 * deleted at the end.
 */
export class ResourceLedger {
  private fileId: string | undefined;
  private vectorStoreIds: string[] = [];
  private responseIds: string[] = [];

  trackFile(id: string): void {
    this.fileId = id;
  }

  trackVectorStore(id: string): void {
    if (!this.vectorStoreIds.includes(id)) {
      this.vectorStoreIds.push(id);
    }
  }

  trackResponse(id: string): void {
    if (!this.responseIds.includes(id)) {
      this.responseIds.push(id);
    }
  }

  releaseVectorStore(id: string): void {
    this.vectorStoreIds = this.vectorStoreIds.filter((storeId) => storeId !== id);
  }

  snapshot(): ResourceSnapshot {
    return {
      fileId: this.fileId,
      vectorStoreIds: [...this.vectorStoreIds],
      responseIds: [...this.responseIds],
    };
  }
}
