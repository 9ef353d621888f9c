import type { FileSearchAnswer } from "../entities/file-search-answer";
import type { IngestionJob } from "../entities/ingestion-job";
import type { UploadedFile, VectorStore } from "../entities/remote-resources";

export interface ChunkingOptions {
  maxChunkSizeTokens: number;
  chunkOverlapTokens: number;
}

export type FileAttributes = Record<string, string | number | boolean>;

export type AttributeComparison = "eq" | "ne" | "gt" | "gte" | "lt" | "lte";

export interface AttributeFilter {
  type: AttributeComparison;
  key: string;
  value: string | number | boolean;
}

export interface RankingOptions {
  ranker: "auto" | "default-2024-11-15";
  scoreThreshold: number;
}

export interface AttachFileParams {
  vectorStoreId: string;
  fileId: string;
  chunking: ChunkingOptions;
  attributes?: FileAttributes;
}

export interface FileSearchRequest {
  model: string;
  input: string;
  vectorStoreIds: string[];
  maxNumResults: number;
  filter?: AttributeFilter;
  ranking?: RankingOptions;
}

// Port to the hosted file/vector-store/responses API
export interface IFileSearchGateway {
  uploadFile(filePath: string): Promise<UploadedFile>;
  createVectorStore(params: { name: string; expiresAfterDays: number }): Promise<VectorStore>;
  attachFile(params: AttachFileParams): Promise<IngestionJob>;
  getIngestionJob(vectorStoreId: string, fileId: string): Promise<IngestionJob>;
  createFileSearchResponse(request: FileSearchRequest): Promise<FileSearchAnswer>;
  deleteVectorStore(vectorStoreId: string): Promise<void>;
  deleteResponse(responseId: string): Promise<void>;
  deleteFile(fileId: string): Promise<void>;
}
