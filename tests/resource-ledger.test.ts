import { describe, expect, it } from "vitest";
import { ResourceLedger } from "../src/domain/entities/remote-resources";

describe("ResourceLedger", () => {
  it("starts empty", () => {
    const ledger = new ResourceLedger();

    expect(ledger.snapshot()).toEqual({ fileId: undefined, vectorStoreIds: [], responseIds: [] });
  });

  it("keeps insertion order and ignores duplicates", () => {
    const ledger = new ResourceLedger();
    ledger.trackVectorStore("vs-2");
    ledger.trackVectorStore("vs-1");
    ledger.trackVectorStore("vs-2");
    ledger.trackResponse("resp-1");
    ledger.trackResponse("resp-1");

    expect(ledger.snapshot()).toEqual({
      fileId: undefined,
      vectorStoreIds: ["vs-2", "vs-1"],
      responseIds: ["resp-1"],
    });
  });

  it("releases a vector store and keeps the rest", () => {
    const ledger = new ResourceLedger();
    ledger.trackFile("file-1");
    ledger.trackVectorStore("vs-1");
    ledger.trackVectorStore("vs-2");
    ledger.trackResponse("resp-1");

    ledger.releaseVectorStore("vs-1");
    ledger.releaseVectorStore("vs-unknown");

    expect(ledger.snapshot()).toEqual({
      fileId: "file-1",
      vectorStoreIds: ["vs-2"],
      responseIds: ["resp-1"],
    });
  });

  it("hands out copies", () => {
    const ledger = new ResourceLedger();
    ledger.trackVectorStore("vs-1");

    ledger.snapshot().vectorStoreIds.push("vs-x");

    expect(ledger.snapshot().vectorStoreIds).toEqual(["vs-1"]);
  });
});
