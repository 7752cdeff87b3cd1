import { promises as fs } from 'node:fs';
import type { ArtifactStorePort } from '@/ports/ArtifactStorePort';
import { contentTypeForFile } from '@/domain/announcement/contentTypes';
import { createLogger } from '@/shared/logging/logger';
import { describeError, isErrnoCode } from '@/shared/errors';
import { requestPath, sendJson } from '@/adapters/http/utils/jsonBody';
import type { ApiRequest, ResponseSink } from '@/adapters/http/utils/jsonBody';

const MEDIA_PREFIX = '/media/';

/**
 * Serves generated announcement audio to the players.
 */
export class MediaFileHandler {
  private readonly log = createLogger('Http', 'Media');

  constructor(private readonly store: Pick<ArtifactStorePort, 'resolve'>) {}

  public matches(pathname: string): boolean {
    return pathname.startsWith(MEDIA_PREFIX);
  }

  public async handle(req: ApiRequest, res: ResponseSink): Promise<void> {
    const method = (req.method ?? 'GET').toUpperCase();
    if (method !== 'GET' && method !== 'HEAD') {
      sendJson(res, 405, { error: 'method-not-allowed' });
      return;
    }

    const filename = requestPath(req.url).slice(MEDIA_PREFIX.length);
    const filePath = this.store.resolve(filename);
    if (!filePath) {
      sendJson(res, 404, { error: 'not-found' });
      return;
    }

    let data: Buffer;
    try {
      data = await fs.readFile(filePath);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        sendJson(res, 404, { error: 'not-found' });
        return;
      }
      this.log.warn('media read failed', { filename, message: describeError(error) });
      sendJson(res, 500, { error: 'media-read-failed' });
      return;
    }

    this.log.spam('serving media', { filename, bytes: data.length });
    res.writeHead(200, {
      'Content-Type': contentTypeForFile(filePath),
      'Content-Length': String(data.length),
      'Cache-Control': 'no-cache',
    });
    res.end(method === 'HEAD' ? undefined : data);
  }
}
