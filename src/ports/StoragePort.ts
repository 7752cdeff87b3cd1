export type StorageReadOptions = {
  /** Persist `fallback` when the file does not exist yet. */
  persistFallback?: boolean;
};

/**
 * JSON documents on disk. Reads never fail: a missing or unparsable file yields
 * the fallback.
 */
export interface StoragePort {
  readJson(filePath: string, fallback: unknown, options?: StorageReadOptions): Promise<unknown>;
  writeJson(filePath: string, data: unknown): Promise<void>;
}
