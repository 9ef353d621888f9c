import { AzureOpenAI } from "openai";
import { DefaultAzureCredential, getBearerTokenProvider } from "@azure/identity";
import type { AppConfig } from "../config/app.config";

export const COGNITIVE_SERVICES_SCOPE = "https://cognitiveservices.azure.com/.default";

export function createAzureOpenAIClient(config: AppConfig["azureOpenAI"]): AzureOpenAI {
  if (config.apiKey) {
    console.log("[AzureOpenAIClient] Authenticating with API key");
    return new AzureOpenAI({
      endpoint: config.endpoint,
      apiKey: config.apiKey,
      apiVersion: config.apiVersion,
    });
  }

  console.log("[AzureOpenAIClient] Authenticating with Entra ID (DefaultAzureCredential)");
  const azureADTokenProvider = getBearerTokenProvider(
    new DefaultAzureCredential(),
    COGNITIVE_SERVICES_SCOPE
  );

  return new AzureOpenAI({
    endpoint: config.endpoint,
    azureADTokenProvider,
    apiVersion: config.apiVersion,
  });
}
