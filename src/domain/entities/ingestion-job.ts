export type IngestionJobStatus =
  | "pending"
  | "in_progress"
  | "completed"
  | "failed"
  | "cancelled";

export interface IngestionJobError {
  code: string;
  message: string;
}

/**
 * A file being ingested into a vector store. Owned by the remote service;
 * we only ever read it.
 */
export interface IngestionJob {
  id: string;
  vectorStoreId: string;
  // Unknown statuses reported by the service are passed through as-is
  status: IngestionJobStatus | (string & {});
  lastError?: IngestionJobError;
}

export const TERMINAL_SUCCESS_STATUSES: readonly string[] = ["completed"];
export const TERMINAL_FAILURE_STATUSES: readonly string[] = ["failed", "cancelled"];
