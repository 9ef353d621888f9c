/**
 * Application configuration
 * Centralizes all environment variables with type safety and default values
 */

import dotenv from "dotenv";
import { ConfigError } from "../../domain/errors/file-search.errors";
import type {
  AttributeFilter,
  FileAttributes,
} from "../../domain/interfaces/ifile.search.gateway";

// Load environment variables from .env file
dotenv.config();

export interface AppConfig {
  // Azure OpenAI
  azureOpenAI: {
    endpoint: string;
    deploymentName: string;
    apiVersion: string;
    apiKey?: string; // Falls back to Entra ID when unset
  };

  // Ingestion
  document: {
    path: string;
    uploadedFileId?: string; // Reuse an already uploaded file instead of uploading
    attributes: FileAttributes;
  };
  vectorStore: {
    name: string;
    expiresAfterDays: number;
    maxChunkSizeTokens: number;
    chunkOverlapTokens: number;
  };

  // Query
  search: {
    query: string;
    maxNumResults: number;
    filter?: AttributeFilter;
    scoreThreshold: number;
  };

  // Polling
  polling: {
    intervalMs: number;
    maxAttempts: number; // 0 = unbounded
  };
}

export const DEFAULT_API_VERSION = "2025-03-01-preview";

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`${name} environment variable is required`);
  }
  return value;
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

// setTimeout fires after 1ms for anything larger
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

function parseInteger(
  env: Env,
  name: string,
  fallback: number,
  min = 0,
  max = Number.MAX_SAFE_INTEGER
): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const value = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  if (value > max) {
    throw new ConfigError(`${name} must be at most ${max}, got "${raw}"`);
  }
  return value;
}

function parseNumber(env: Env, name: string, fallback: number): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Parses "key=value,key2=value2". Values stay strings.
 */
export function parseKeyValueList(raw: string, name: string): FileAttributes {
  const result: FileAttributes = {};
  for (const pair of raw.split(",")) {
    if (!pair.trim()) continue;
    const separator = pair.indexOf("=");
    const key = separator > 0 ? pair.slice(0, separator).trim() : "";
    if (!key) {
      throw new ConfigError(`${name} entries must look like key=value, got "${pair.trim()}"`);
    }
    result[key] = pair.slice(separator + 1).trim();
  }
  return result;
}

export function parseFilter(raw: string, name: string): AttributeFilter | undefined {
  const entries = Object.entries(parseKeyValueList(raw, name));
  if (entries.length === 0) return undefined;
  if (entries.length > 1) {
    throw new ConfigError(`${name} takes a single key=value pair`);
  }
  const [key, value] = entries[0];
  return { type: "eq", key, value };
}

export function getConfig(env: Env = process.env): AppConfig {
  const rawAttributes = env.FILE_ATTRIBUTES ?? "source=Contoso,category=Marketing";
  const rawFilter = env.SEARCH_FILTER ?? "category=Marketing";

  return {
    azureOpenAI: {
      endpoint: required(env, "AZURE_OPENAI_ENDPOINT"),
      deploymentName: required(env, "AZURE_OPENAI_DEPLOYMENT_NAME"),
      apiVersion: optional(env, "AZURE_OPENAI_API_VERSION") || DEFAULT_API_VERSION,
      apiKey: optional(env, "AZURE_OPENAI_API_KEY"),
    },

    document: {
      path: optional(env, "DOCUMENT_PATH") || "./Contoso_Brochure.pdf",
      uploadedFileId: optional(env, "UPLOADED_FILE_ID"),
      attributes: parseKeyValueList(rawAttributes, "FILE_ATTRIBUTES"),
    },

    vectorStore: {
      name: optional(env, "VECTOR_STORE_NAME") || "Travel Brochure",
      expiresAfterDays: parseInteger(env, "VECTOR_STORE_EXPIRES_AFTER_DAYS", 7, 1),
      maxChunkSizeTokens: parseInteger(env, "CHUNK_MAX_TOKENS", 100, 1),
      chunkOverlapTokens: parseInteger(env, "CHUNK_OVERLAP_TOKENS", 20),
    },

    search: {
      query: optional(env, "SEARCH_QUERY") || "What is Contoso Travel Agency's phone number?",
      maxNumResults: parseInteger(env, "SEARCH_MAX_RESULTS", 1, 1),
      filter: parseFilter(rawFilter, "SEARCH_FILTER"),
      scoreThreshold: parseNumber(env, "SEARCH_SCORE_THRESHOLD", 0.01),
    },

    polling: {
      intervalMs: parseInteger(env, "POLL_INTERVAL_MS", 5000, 0, MAX_TIMER_DELAY_MS),
      maxAttempts: parseInteger(env, "POLL_MAX_ATTEMPTS", 0),
    },
  };
}
