/**
 * Memory subsystem errors. None of these reach the chat pipeline: the
 * summarizer turns them into retries and sentinels, the lake into logged
 * null results.
 */

export class MemoryError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, options: { code: string; details?: Record<string, unknown> } = { code: "MEMORY_ERROR" }) {
    super(message);
    this.name = "MemoryError";
    this.code = options.code;
    this.details = options.details;
  }
}

/**
 * Text-generation backend failure (HTTP error, empty completion, timeout)
 */
export class SummarizerError extends MemoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: "SUMMARIZER_ERROR", details });
    this.name = "SummarizerError";
  }
}

/**
 * Failure writing record, index or vocabulary files
 */
export class MemoryStoreError extends MemoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: "STORE_ERROR", details });
    this.name = "MemoryStoreError";
  }
}

export class MigrationError extends MemoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: "MIGRATION_ERROR", details });
    this.name = "MigrationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
