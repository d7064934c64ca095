/**
 * Raised when reconciled Greeks cannot be written back to the cache file.
 * Fatal for a reconciliation pass.
 */
export class CachePersistenceError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to persist Greeks cache to ${filePath}: ${reason}`, { cause });
    this.name = "CachePersistenceError";
    this.filePath = filePath;
  }
}
