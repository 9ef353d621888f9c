import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AzureOpenAI } from "openai";
import { createAzureOpenAIClient } from "../src/infrastructure/openai/azure-openai.client";

const endpoint = "https://example-resource.openai.azure.com";

describe("createAzureOpenAIClient", () => {
  beforeEach(() => {
    // The SDK falls back to this variable when no key is passed
    vi.stubEnv("AZURE_OPENAI_API_KEY", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("uses the API key when one is configured", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const client = createAzureOpenAIClient({
      endpoint,
      deploymentName: "gpt-4o-mini",
      apiVersion: "2025-03-01-preview",
      apiKey: "test-key",
    });

    expect(client).toBeInstanceOf(AzureOpenAI);
    expect(client.apiKey).toBe("test-key");
    expect(client.apiVersion).toBe("2025-03-01-preview");
    expect(log).toHaveBeenCalledWith("[AzureOpenAIClient] Authenticating with API key");
  });

  it("falls back to Entra ID without an API key", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const client = createAzureOpenAIClient({
      endpoint,
      deploymentName: "gpt-4o-mini",
      apiVersion: "2025-03-01-preview",
    });

    expect(client).toBeInstanceOf(AzureOpenAI);
    expect(client.apiKey).not.toBe("test-key");
    expect(log).toHaveBeenCalledWith(
      "[AzureOpenAIClient] Authenticating with Entra ID (DefaultAzureCredential)"
    );
  });
});
