import type { IngestionJob } from "../../domain/entities/ingestion-job";
import type { ResourceLedger, UploadedFile, VectorStore } from "../../domain/entities/remote-resources";
import { ConfigError, VectorStoreIngestionError } from "../../domain/errors/file-search.errors";
import type {
  ChunkingOptions,
  FileAttributes,
  IFileSearchGateway,
} from "../../domain/interfaces/ifile.search.gateway";
import type { JobPoller } from "../services/job.poller";
import type { CleanupResourcesUseCase } from "./cleanup-resources.use-case";

export interface UploadToVectorStoreUseCaseParams {
  filePath: string;
  vectorStoreName: string;
  existingFileId?: string; // Skip the upload and attach this file instead
  expiresAfterDays?: number; // default: 7
  chunking?: ChunkingOptions; // default: 100 tokens, 20 overlap
  attributes?: FileAttributes;
  ledger: ResourceLedger;
  signal?: AbortSignal;
}

export interface UploadToVectorStoreResult {
  file: UploadedFile;
  vectorStore: VectorStore;
  job: IngestionJob;
}

export const DEFAULT_CHUNKING: ChunkingOptions = {
  maxChunkSizeTokens: 100,
  chunkOverlapTokens: 20,
};

// Limits of the static chunking strategy
export const MIN_CHUNK_SIZE_TOKENS = 100;
export const MAX_CHUNK_SIZE_TOKENS = 4096;

export function validateChunking(chunking: ChunkingOptions): void {
  const { maxChunkSizeTokens, chunkOverlapTokens } = chunking;
  if (
    !Number.isInteger(maxChunkSizeTokens) ||
    maxChunkSizeTokens < MIN_CHUNK_SIZE_TOKENS ||
    maxChunkSizeTokens > MAX_CHUNK_SIZE_TOKENS
  ) {
    throw new ConfigError(
      `max chunk size must be an integer between ${MIN_CHUNK_SIZE_TOKENS} and ${MAX_CHUNK_SIZE_TOKENS} tokens, got ${maxChunkSizeTokens}`
    );
  }
  if (
    !Number.isInteger(chunkOverlapTokens) ||
    chunkOverlapTokens < 0 ||
    chunkOverlapTokens > maxChunkSizeTokens / 2
  ) {
    throw new ConfigError(
      `chunk overlap must be an integer between 0 and half the max chunk size (${maxChunkSizeTokens / 2}), got ${chunkOverlapTokens}`
    );
  }
}

export class UploadToVectorStoreUseCase {
  constructor(
    private gateway: IFileSearchGateway,
    private poller: JobPoller,
    private cleanup: CleanupResourcesUseCase
  ) {}

  async execute(params: UploadToVectorStoreUseCaseParams): Promise<UploadToVectorStoreResult> {
    const {
      filePath,
      vectorStoreName,
      existingFileId,
      expiresAfterDays = 7,
      chunking = DEFAULT_CHUNKING,
      attributes,
      ledger,
      signal,
    } = params;

    validateChunking(chunking);

    let file: UploadedFile;
    if (existingFileId) {
      file = { id: existingFileId, reused: true };
      console.log(`Using existing file ID: ${file.id}`);
    } else {
      file = await this.gateway.uploadFile(filePath);
      console.log(`File ID: ${file.id}`);
    }
    ledger.trackFile(file.id);

    const vectorStore = await this.gateway.createVectorStore({
      name: vectorStoreName,
      expiresAfterDays,
    });
    ledger.trackVectorStore(vectorStore.id);
    console.log(`Vector Store ID: ${vectorStore.id}`);

    const attached = await this.gateway.attachFile({
      vectorStoreId: vectorStore.id,
      fileId: file.id,
      chunking,
      attributes,
    });

    const outcome = await this.poller.pollUntilTerminal(
      () => this.gateway.getIngestionJob(vectorStore.id, attached.id),
      signal
    );

    if (outcome.status === "failed") {
      const detail = outcome.error
        ? ` ${outcome.error.code}: ${outcome.error.message}`
        : "";
      console.error(`File batch ${outcome.job.status}.${detail}`);

      // The file is left in place; only the half-built store goes
      await this.cleanup.execute({ vectorStoreIds: [vectorStore.id] });
      ledger.releaseVectorStore(vectorStore.id);

      throw new VectorStoreIngestionError(
        vectorStore.id,
        file.id,
        outcome.job.status,
        outcome.error
      );
    }

    console.log("File batch completed successfully.");
    return { file, vectorStore, job: outcome.job };
  }
}
