import type { FileSearchAnswer } from "../../domain/entities/file-search-answer";
import type { ResourceLedger } from "../../domain/entities/remote-resources";
import type {
  AttributeFilter,
  IFileSearchGateway,
  RankingOptions,
} from "../../domain/interfaces/ifile.search.gateway";

export interface QueryVectorStoreUseCaseParams {
  model: string;
  question: string;
  vectorStoreIds: string[];
  maxNumResults?: number; // default: 1
  filter?: AttributeFilter;
  ranking?: RankingOptions;
  ledger: ResourceLedger;
}

export class QueryVectorStoreUseCase {
  constructor(private gateway: IFileSearchGateway) {}

  async execute(params: QueryVectorStoreUseCaseParams): Promise<FileSearchAnswer> {
    const { model, question, vectorStoreIds, maxNumResults = 1, filter, ranking, ledger } = params;

    if (vectorStoreIds.length === 0) {
      throw new Error("At least one vector store is required for file search");
    }
    if (!question.trim()) {
      throw new Error("Question must not be empty");
    }

    const answer = await this.gateway.createFileSearchResponse({
      model,
      input: question,
      vectorStoreIds,
      maxNumResults,
      filter,
      ranking,
    });
    ledger.trackResponse(answer.responseId);

    return answer;
  }
}
