import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ArtifactStorePort, StoredFile } from '@/ports/ArtifactStorePort';
import { ensureDir, removeFile } from '@/shared/utils/file';

const SAFE_FILENAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const FILE_PREFIX = 'announcement';

/**
 * Flat directory of generated audio, addressed by `<publicBaseUrl>/media/<filename>`.
 */
export class FileArtifactStore implements ArtifactStorePort {
  private readonly root: string;

  constructor(
    directory: string,
    private readonly publicBaseUrl: () => string,
  ) {
    this.root = path.resolve(directory);
  }

  public get directory(): string {
    return this.root;
  }

  public allocate(extension: string): StoredFile {
    const id = randomUUID();
    const ext = extension.replace(/^\./, '').toLowerCase() || 'bin';
    const filename = `${FILE_PREFIX}-${id}.${ext}`;
    return { id, filename, path: path.join(this.root, filename) };
  }

  public async write(data: Buffer, extension: string): Promise<StoredFile> {
    const file = this.allocate(extension);
    await ensureDir(this.root);
    await fs.writeFile(file.path, data);
    return file;
  }

  public remove(filePath: string): Promise<'removed' | 'missing'> {
    const resolved = path.resolve(filePath);
    if (path.dirname(resolved) !== this.root) {
      return Promise.reject(new Error(`refusing to remove file outside artifact store: ${filePath}`));
    }
    return removeFile(resolved);
  }

  public resolve(filename: string): string | null {
    if (!SAFE_FILENAME.test(filename) || filename.includes('..')) {
      return null;
    }
    const resolved = path.join(this.root, filename);
    return path.dirname(resolved) === this.root ? resolved : null;
  }

  public publicUrl(filename: string): string {
    return `${this.publicBaseUrl()}/media/${encodeURIComponent(filename)}`;
  }
}
