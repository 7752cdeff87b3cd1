import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { safeJsonParse } from '@/shared/bestEffort';
import { describeError, isErrnoCode } from '@/shared/errors';

const log = createLogger('Core', 'File');

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads and parses a JSON file; `undefined` when missing or unparsable.
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!isErrnoCode(error, 'ENOENT')) {
      log.warn('failed to read json', { filePath, error: describeError(error) });
    }
    return undefined;
  }
  const parsed = safeJsonParse(content, {
    onError: 'debug',
    log,
    label: 'json parse failed',
    context: { filePath },
  });
  if (parsed === undefined) {
    log.warn('failed to read json', { filePath, error: 'invalid json' });
  }
  return parsed;
}

/**
 * Serializes a value to pretty-printed JSON, creating parent directories.
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

/**
 * Deletes a file. Resolves `missing` instead of failing when it is already gone.
 */
export async function removeFile(filePath: string): Promise<'removed' | 'missing'> {
  try {
    await fs.unlink(filePath);
    return 'removed';
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      return 'missing';
    }
    throw error;
  }
}
