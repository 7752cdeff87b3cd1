import type { StoragePort, StorageReadOptions } from '@/ports/StoragePort';
import { fileExists, readJson, writeJson } from '@/shared/utils/file';

export class StorageAdapter implements StoragePort {
  public async readJson(filePath: string, fallback: unknown, options: StorageReadOptions = {}): Promise<unknown> {
    const stored = await readJson(filePath);
    if (stored !== undefined) {
      return stored;
    }
    // An unparsable file stays on disk for the user to fix.
    if (options.persistFallback && !(await fileExists(filePath))) {
      await writeJson(filePath, fallback);
    }
    return fallback;
  }

  public writeJson(filePath: string, data: unknown): Promise<void> {
    return writeJson(filePath, data);
  }
}
