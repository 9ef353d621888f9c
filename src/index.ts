import { getConfig } from "./infrastructure/config/app.config";
import { createAzureOpenAIClient } from "./infrastructure/openai/azure-openai.client";
import { OpenAIFileSearchGateway } from "./infrastructure/openai/openai.file.search.gateway";
import { JobPoller } from "./application/services/job.poller";
import { CleanupResourcesUseCase } from "./application/use-cases/cleanup-resources.use-case";
import { UploadToVectorStoreUseCase } from "./application/use-cases/upload-to-vector-store.use-case";
import { QueryVectorStoreUseCase } from "./application/use-cases/query-vector-store.use-case";
import { RunFileSearchUseCase } from "./application/use-cases/run-file-search.use-case";

async function main(): Promise<void> {
  const config = getConfig();

  // Initialize infrastructure
  const client = createAzureOpenAIClient(config.azureOpenAI);
  const gateway = new OpenAIFileSearchGateway(client);
  const poller = new JobPoller({
    intervalMs: config.polling.intervalMs,
    maxAttempts: config.polling.maxAttempts,
    label: "File batch",
  });

  // Initialize use cases
  const cleanupResourcesUseCase = new CleanupResourcesUseCase(gateway);
  const uploadToVectorStoreUseCase = new UploadToVectorStoreUseCase(
    gateway,
    poller,
    cleanupResourcesUseCase
  );
  const queryVectorStoreUseCase = new QueryVectorStoreUseCase(gateway);
  const runFileSearchUseCase = new RunFileSearchUseCase(
    uploadToVectorStoreUseCase,
    queryVectorStoreUseCase,
    cleanupResourcesUseCase
  );

  // Stop polling on Ctrl+C so the created resources still get deleted
  const abortController = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    console.log(`${signal} received, stopping and cleaning up`);
    abortController.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const result = await runFileSearchUseCase.execute({
      filePath: config.document.path,
      vectorStoreName: config.vectorStore.name,
      existingFileId: config.document.uploadedFileId,
      expiresAfterDays: config.vectorStore.expiresAfterDays,
      chunking: {
        maxChunkSizeTokens: config.vectorStore.maxChunkSizeTokens,
        chunkOverlapTokens: config.vectorStore.chunkOverlapTokens,
      },
      attributes: config.document.attributes,
      model: config.azureOpenAI.deploymentName,
      question: config.search.query,
      maxNumResults: config.search.maxNumResults,
      filter: config.search.filter,
      ranking: { ranker: "auto", scoreThreshold: config.search.scoreThreshold },
      signal: abortController.signal,
    });

    if (!result.ok || result.cleanup.failed.length > 0) {
      process.exitCode = 1;
    }
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  }
}

main().catch((error) => {
  console.error("Failed to run file search:", error);
  process.exitCode = 1;
});
