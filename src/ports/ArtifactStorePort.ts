export type StoredFile = {
  id: string;
  filename: string;
  path: string;
};

/**
 * Writable directory whose files the players fetch over HTTP.
 */
export interface ArtifactStorePort {
  write(data: Buffer, extension: string): Promise<StoredFile>;
  /** Reserves a fresh path without writing, e.g. for a transcoder output. */
  allocate(extension: string): StoredFile;
  remove(filePath: string): Promise<'removed' | 'missing'>;
  /** Absolute path of a stored file, or `null` for names outside the store. */
  resolve(filename: string): string | null;
  publicUrl(filename: string): string;
}
