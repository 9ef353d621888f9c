import fs from "fs";
import path from "path";
import type { FileCreateParams, FileObject } from "openai/resources/files";
import type {
  FileSearchTool,
  Response,
  ResponseCreateParamsNonStreaming,
  ResponseFileSearchToolCall,
} from "openai/resources/responses/responses";
import type {
  FileCreateParams as VectorStoreFileCreateParams,
  VectorStoreFile,
} from "openai/resources/vector-stores/files";
import type {
  VectorStore as VectorStoreObject,
  VectorStoreCreateParams,
} from "openai/resources/vector-stores/vector-stores";
import type { FileSearchAnswer, FileSearchHit } from "../../domain/entities/file-search-answer";
import type { IngestionJob } from "../../domain/entities/ingestion-job";
import type { UploadedFile, VectorStore } from "../../domain/entities/remote-resources";
import type {
  AttachFileParams,
  FileSearchRequest,
  IFileSearchGateway,
} from "../../domain/interfaces/ifile.search.gateway";

type IngestionFile = Pick<VectorStoreFile, "id" | "vector_store_id" | "status" | "last_error">;
type AnswerResponse = Pick<Response, "id" | "model" | "output" | "output_text">;

export function toIngestionJob(file: IngestionFile): IngestionJob {
  return {
    id: file.id,
    vectorStoreId: file.vector_store_id,
    status: file.status,
    lastError: file.last_error
      ? { code: file.last_error.code, message: file.last_error.message }
      : undefined,
  };
}

export function buildFileSearchTool(request: FileSearchRequest): FileSearchTool {
  const tool: FileSearchTool = {
    type: "file_search",
    vector_store_ids: request.vectorStoreIds,
    max_num_results: request.maxNumResults,
  };
  if (request.filter) {
    tool.filters = {
      type: request.filter.type,
      key: request.filter.key,
      value: request.filter.value,
    };
  }
  if (request.ranking) {
    tool.ranking_options = {
      ranker: request.ranking.ranker,
      score_threshold: request.ranking.scoreThreshold,
    };
  }
  return tool;
}

function isFileSearchCall(item: Response["output"][number]): item is ResponseFileSearchToolCall {
  return item.type === "file_search_call";
}

export function toFileSearchAnswer(response: AnswerResponse): FileSearchAnswer {
  const results: FileSearchHit[] = [];
  for (const call of response.output.filter(isFileSearchCall)) {
    for (const result of call.results ?? []) {
      results.push({
        fileId: result.file_id ?? "",
        filename: result.filename ?? "",
        score: result.score ?? 0,
        text: result.text ?? "",
        attributes: result.attributes ?? {},
      });
    }
  }

  return {
    responseId: response.id,
    model: response.model,
    outputText: response.output_text,
    results,
    raw: response,
  };
}

/**
 * The part of the OpenAI SDK client the gateway calls. `OpenAI` and
 * `AzureOpenAI` instances both satisfy it.
 */
export interface FileSearchClient {
  files: {
    create(body: FileCreateParams): PromiseLike<Pick<FileObject, "id" | "filename" | "bytes">>;
    del(fileId: string): PromiseLike<unknown>;
  };
  vectorStores: {
    create(body: VectorStoreCreateParams): PromiseLike<Pick<VectorStoreObject, "id" | "name">>;
    del(vectorStoreId: string): PromiseLike<unknown>;
    files: {
      create(vectorStoreId: string, body: VectorStoreFileCreateParams): PromiseLike<IngestionFile>;
      retrieve(vectorStoreId: string, fileId: string): PromiseLike<IngestionFile>;
    };
  };
  responses: {
    create(body: ResponseCreateParamsNonStreaming): PromiseLike<AnswerResponse>;
    del(responseId: string): PromiseLike<unknown>;
  };
}

/**
 * Talks to the hosted files, vector store and responses endpoints through the
 * OpenAI SDK. Works with both OpenAI and AzureOpenAI clients.
 */
export class OpenAIFileSearchGateway implements IFileSearchGateway {
  constructor(private client: FileSearchClient) {}

  async uploadFile(filePath: string): Promise<UploadedFile> {
    try {
      await fs.promises.access(filePath, fs.constants.R_OK);
    } catch {
      throw new Error(`Document not readable: ${filePath}`);
    }

    console.log(`[OpenAIFileSearchGateway] Uploading ${path.basename(filePath)}`);
    const uploaded = await this.client.files.create({
      file: fs.createReadStream(filePath),
      purpose: "assistants",
    });
    return {
      id: uploaded.id,
      filename: uploaded.filename,
      bytes: uploaded.bytes,
      reused: false,
    };
  }

  async createVectorStore(params: { name: string; expiresAfterDays: number }): Promise<VectorStore> {
    const store = await this.client.vectorStores.create({
      name: params.name,
      expires_after: {
        anchor: "last_active_at",
        days: params.expiresAfterDays,
      },
    });
    return { id: store.id, name: store.name };
  }

  async attachFile(params: AttachFileParams): Promise<IngestionJob> {
    const file = await this.client.vectorStores.files.create(params.vectorStoreId, {
      file_id: params.fileId,
      chunking_strategy: {
        type: "static",
        static: {
          max_chunk_size_tokens: params.chunking.maxChunkSizeTokens,
          chunk_overlap_tokens: params.chunking.chunkOverlapTokens,
        },
      },
      attributes: params.attributes,
    });
    return toIngestionJob(file);
  }

  async getIngestionJob(vectorStoreId: string, fileId: string): Promise<IngestionJob> {
    const file = await this.client.vectorStores.files.retrieve(vectorStoreId, fileId);
    return toIngestionJob(file);
  }

  async createFileSearchResponse(request: FileSearchRequest): Promise<FileSearchAnswer> {
    console.log(
      `[OpenAIFileSearchGateway] Querying ${request.vectorStoreIds.length} vector store(s) with ${request.model}`
    );
    const response = await this.client.responses.create({
      model: request.model,
      input: request.input,
      tools: [buildFileSearchTool(request)],
      // Includes search results in the response
      include: ["file_search_call.results"],
    });
    return toFileSearchAnswer(response);
  }

  async deleteVectorStore(vectorStoreId: string): Promise<void> {
    await this.client.vectorStores.del(vectorStoreId);
  }

  async deleteResponse(responseId: string): Promise<void> {
    await this.client.responses.del(responseId);
  }

  async deleteFile(fileId: string): Promise<void> {
    await this.client.files.del(fileId);
  }
}
