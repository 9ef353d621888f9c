import type { IngestionJobError } from "../entities/ingestion-job";

export class FileSearchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FileSearchError";
  }
}

export class ConfigError extends FileSearchError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class VectorStoreIngestionError extends FileSearchError {
  constructor(
    public readonly vectorStoreId: string,
    public readonly fileId: string,
    public readonly status: string,
    public readonly detail?: IngestionJobError
  ) {
    super(
      detail
        ? `File batch ${status} for vector store ${vectorStoreId}: ${detail.code}: ${detail.message}`
        : `File batch ${status} for vector store ${vectorStoreId}`
    );
    this.name = "VectorStoreIngestionError";
  }
}

export class PollTimeoutError extends FileSearchError {
  constructor(public readonly attempts: number, public readonly lastStatus: string) {
    super(`Job still "${lastStatus}" after ${attempts} status checks`);
    this.name = "PollTimeoutError";
  }
}

export class PollAbortedError extends FileSearchError {
  constructor(public readonly attempts: number) {
    super(`Polling aborted after ${attempts} status checks`);
    this.name = "PollAbortedError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
