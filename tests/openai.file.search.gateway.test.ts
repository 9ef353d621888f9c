import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ResponseOutputItem } from "openai/resources/responses/responses";
import {
  OpenAIFileSearchGateway,
  buildFileSearchTool,
  toFileSearchAnswer,
  toIngestionJob,
} from "../src/infrastructure/openai/openai.file.search.gateway";
import type { FileSearchClient } from "../src/infrastructure/openai/openai.file.search.gateway";

describe("toIngestionJob", () => {
  it("maps an in-progress vector store file", () => {
    expect(
      toIngestionJob({ id: "file-1", vector_store_id: "vs-1", status: "in_progress", last_error: null })
    ).toEqual({ id: "file-1", vectorStoreId: "vs-1", status: "in_progress", lastError: undefined });
  });

  it("keeps the last error of a failed file", () => {
    const job = toIngestionJob({
      id: "file-1",
      vector_store_id: "vs-1",
      status: "failed",
      last_error: { code: "invalid_file", message: "The file could not be parsed" },
    });

    expect(job.lastError).toEqual({ code: "invalid_file", message: "The file could not be parsed" });
  });
});

describe("buildFileSearchTool", () => {
  it("includes filter and ranking options when given", () => {
    expect(
      buildFileSearchTool({
        model: "gpt-4o-mini",
        input: "q",
        vectorStoreIds: ["vs-1"],
        maxNumResults: 1,
        filter: { type: "eq", key: "category", value: "Marketing" },
        ranking: { ranker: "auto", scoreThreshold: 0.01 },
      })
    ).toEqual({
      type: "file_search",
      vector_store_ids: ["vs-1"],
      max_num_results: 1,
      filters: { type: "eq", key: "category", value: "Marketing" },
      ranking_options: { ranker: "auto", score_threshold: 0.01 },
    });
  });

  it("omits optional settings", () => {
    expect(
      buildFileSearchTool({ model: "m", input: "q", vectorStoreIds: ["vs-1", "vs-2"], maxNumResults: 4 })
    ).toEqual({ type: "file_search", vector_store_ids: ["vs-1", "vs-2"], max_num_results: 4 });
  });
});

describe("toFileSearchAnswer", () => {
  const searchCall: ResponseOutputItem = {
    id: "fs-1",
    type: "file_search_call",
    status: "completed",
    queries: ["Contoso phone number"],
    results: [
      {
        file_id: "file-1",
        filename: "Contoso_Brochure.pdf",
        score: 0.92,
        text: "Call us at 555-0100",
        attributes: { category: "Marketing" },
      },
      { file_id: "file-1", score: 0.41 },
    ],
  };
  const emptyCall: ResponseOutputItem = {
    id: "fs-2",
    type: "file_search_call",
    status: "completed",
    queries: [],
    results: null,
  };

  it("collects hits from every file search call and fills gaps", () => {
    const response = {
      id: "resp-1",
      model: "gpt-4o-mini",
      output: [searchCall, emptyCall],
      output_text: "The number is 555-0100.",
    };

    const answer = toFileSearchAnswer(response);

    expect(answer.responseId).toBe("resp-1");
    expect(answer.model).toBe("gpt-4o-mini");
    expect(answer.outputText).toBe("The number is 555-0100.");
    expect(answer.results).toEqual([
      {
        fileId: "file-1",
        filename: "Contoso_Brochure.pdf",
        score: 0.92,
        text: "Call us at 555-0100",
        attributes: { category: "Marketing" },
      },
      { fileId: "file-1", filename: "", score: 0.41, text: "", attributes: {} },
    ]);
    expect(answer.raw).toBe(response);
  });

  it("returns no hits when the model did not search", () => {
    const answer = toFileSearchAnswer({ id: "resp-2", model: "m", output: [], output_text: "Hi" });

    expect(answer.results).toEqual([]);
  });
});

interface RecordedCall {
  method: string;
  args: unknown[];
}

function createStubClient(calls: RecordedCall[]): FileSearchClient {
  const record = (method: string, ...args: unknown[]) => {
    calls.push({ method, args });
  };
  const ingestionFile = {
    id: "file-1",
    vector_store_id: "vs-1",
    status: "in_progress" as const,
    last_error: null,
  };

  return {
    files: {
      create: async (body) => {
        // Only the stream's path is kept; close it so no descriptor stays open
        if (body.file instanceof fs.ReadStream) {
          record("files.create", { file: String(body.file.path), purpose: body.purpose });
          const stream = body.file;
          stream.destroy();
          await new Promise<void>((resolve) => stream.once("close", () => resolve()));
        } else {
          record("files.create", body);
        }
        return { id: "file-1", filename: "brochure.pdf", bytes: 7 };
      },
      del: async (fileId) => record("files.del", fileId),
    },
    vectorStores: {
      create: async (body) => {
        record("vectorStores.create", body);
        return { id: "vs-1", name: body.name ?? "" };
      },
      del: async (vectorStoreId) => record("vectorStores.del", vectorStoreId),
      files: {
        create: async (vectorStoreId, body) => {
          record("vectorStores.files.create", vectorStoreId, body);
          return ingestionFile;
        },
        retrieve: async (vectorStoreId, fileId) => {
          record("vectorStores.files.retrieve", vectorStoreId, fileId);
          return { ...ingestionFile, status: "completed" as const };
        },
      },
    },
    responses: {
      create: async (body) => {
        record("responses.create", body);
        return { id: "resp-1", model: "gpt-4o-mini", output: [], output_text: "555-0100" };
      },
      del: async (responseId) => record("responses.del", responseId),
    },
  };
}

describe("OpenAIFileSearchGateway", () => {
  let calls: RecordedCall[];
  let gateway: OpenAIFileSearchGateway;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    calls = [];
    gateway = new OpenAIFileSearchGateway(createStubClient(calls));
  });

  describe("uploadFile", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "file-search-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("streams the document with the assistants purpose", async () => {
      const filePath = path.join(dir, "brochure.pdf");
      fs.writeFileSync(filePath, "%PDF-1.");

      const file = await gateway.uploadFile(filePath);

      expect(file).toEqual({ id: "file-1", filename: "brochure.pdf", bytes: 7, reused: false });
      expect(calls).toEqual([
        { method: "files.create", args: [{ file: filePath, purpose: "assistants" }] },
      ]);
    });

    it("rejects a document that cannot be read before calling the API", async () => {
      const missing = path.join(dir, "missing.pdf");

      await expect(gateway.uploadFile(missing)).rejects.toThrow(`Document not readable: ${missing}`);
      expect(calls).toEqual([]);
    });
  });

  it("creates a vector store that expires after its last activity", async () => {
    const store = await gateway.createVectorStore({ name: "Travel Brochure", expiresAfterDays: 7 });

    expect(store).toEqual({ id: "vs-1", name: "Travel Brochure" });
    expect(calls).toEqual([
      {
        method: "vectorStores.create",
        args: [{ name: "Travel Brochure", expires_after: { anchor: "last_active_at", days: 7 } }],
      },
    ]);
  });

  it("attaches a file with a static chunking strategy and attributes", async () => {
    const job = await gateway.attachFile({
      vectorStoreId: "vs-1",
      fileId: "file-1",
      chunking: { maxChunkSizeTokens: 100, chunkOverlapTokens: 20 },
      attributes: { source: "Contoso", category: "Marketing" },
    });

    expect(job).toEqual({ id: "file-1", vectorStoreId: "vs-1", status: "in_progress", lastError: undefined });
    expect(calls).toEqual([
      {
        method: "vectorStores.files.create",
        args: [
          "vs-1",
          {
            file_id: "file-1",
            chunking_strategy: {
              type: "static",
              static: { max_chunk_size_tokens: 100, chunk_overlap_tokens: 20 },
            },
            attributes: { source: "Contoso", category: "Marketing" },
          },
        ],
      },
    ]);
  });

  it("retrieves the ingestion job by vector store id, then file id", async () => {
    const job = await gateway.getIngestionJob("vs-1", "file-1");

    expect(job.status).toBe("completed");
    expect(calls).toEqual([{ method: "vectorStores.files.retrieve", args: ["vs-1", "file-1"] }]);
  });

  it("asks for file search results in the response", async () => {
    const answer = await gateway.createFileSearchResponse({
      model: "gpt-4o-mini",
      input: "What is the phone number?",
      vectorStoreIds: ["vs-1"],
      maxNumResults: 1,
      filter: { type: "eq", key: "category", value: "Marketing" },
      ranking: { ranker: "auto", scoreThreshold: 0.01 },
    });

    expect(answer.responseId).toBe("resp-1");
    expect(answer.outputText).toBe("555-0100");
    expect(calls).toEqual([
      {
        method: "responses.create",
        args: [
          {
            model: "gpt-4o-mini",
            input: "What is the phone number?",
            tools: [
              {
                type: "file_search",
                vector_store_ids: ["vs-1"],
                max_num_results: 1,
                filters: { type: "eq", key: "category", value: "Marketing" },
                ranking_options: { ranker: "auto", score_threshold: 0.01 },
              },
            ],
            include: ["file_search_call.results"],
          },
        ],
      },
    ]);
  });

  it("deletes each resource kind through its own endpoint", async () => {
    await gateway.deleteVectorStore("vs-1");
    await gateway.deleteResponse("resp-1");
    await gateway.deleteFile("file-1");

    expect(calls).toEqual([
      { method: "vectorStores.del", args: ["vs-1"] },
      { method: "responses.del", args: ["resp-1"] },
      { method: "files.del", args: ["file-1"] },
    ]);
  });
});
