import type { FileSearchAnswer } from "../../domain/entities/file-search-answer";
import { ResourceLedger } from "../../domain/entities/remote-resources";
import { errorMessage } from "../../domain/errors/file-search.errors";
import type {
  AttributeFilter,
  ChunkingOptions,
  FileAttributes,
  RankingOptions,
} from "../../domain/interfaces/ifile.search.gateway";
import type { CleanupReport, CleanupResourcesUseCase } from "./cleanup-resources.use-case";
import type { QueryVectorStoreUseCase } from "./query-vector-store.use-case";
import type { UploadToVectorStoreUseCase } from "./upload-to-vector-store.use-case";

export interface RunFileSearchUseCaseParams {
  filePath: string;
  vectorStoreName: string;
  existingFileId?: string;
  expiresAfterDays?: number;
  chunking?: ChunkingOptions;
  attributes?: FileAttributes;
  model: string;
  question: string;
  maxNumResults?: number;
  filter?: AttributeFilter;
  ranking?: RankingOptions;
  signal?: AbortSignal;
}

export type RunFileSearchResult =
  | { ok: true; answer: FileSearchAnswer; cleanup: CleanupReport }
  | { ok: false; error: unknown; cleanup: CleanupReport };

export function formatAnswerSummary(answer: FileSearchAnswer): string {
  const lines = [`Answer: ${answer.outputText}`];
  if (answer.results.length === 0) {
    lines.push("No file search results.");
  }
  for (const hit of answer.results) {
    lines.push(`  [${hit.score.toFixed(3)}] ${hit.filename}`);
  }
  return lines.join("\n");
}

/**
 * Upload, ingest, ask, print, then delete everything that was created,
 * whether or not the earlier steps succeeded.
 */
export class RunFileSearchUseCase {
  constructor(
    private uploadToVectorStore: UploadToVectorStoreUseCase,
    private queryVectorStore: QueryVectorStoreUseCase,
    private cleanupResources: CleanupResourcesUseCase
  ) {}

  async execute(params: RunFileSearchUseCaseParams): Promise<RunFileSearchResult> {
    const ledger = new ResourceLedger();
    let answer: FileSearchAnswer | undefined;
    let failure: unknown;

    try {
      const { vectorStore } = await this.uploadToVectorStore.execute({
        filePath: params.filePath,
        vectorStoreName: params.vectorStoreName,
        existingFileId: params.existingFileId,
        expiresAfterDays: params.expiresAfterDays,
        chunking: params.chunking,
        attributes: params.attributes,
        ledger,
        signal: params.signal,
      });

      answer = await this.queryVectorStore.execute({
        model: params.model,
        question: params.question,
        vectorStoreIds: [vectorStore.id],
        maxNumResults: params.maxNumResults,
        filter: params.filter,
        ranking: params.ranking,
        ledger,
      });

      console.log(JSON.stringify(answer.raw, null, 2));
      console.log(formatAnswerSummary(answer));
    } catch (error) {
      failure = error;
      console.error(`An error occurred: ${errorMessage(error)}`);
    }

    const cleanup = await this.cleanupResources.execute(ledger.snapshot());

    if (answer && failure === undefined) {
      return { ok: true, answer, cleanup };
    }
    return { ok: false, error: failure, cleanup };
  }
}
