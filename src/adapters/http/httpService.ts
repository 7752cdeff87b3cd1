import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { createLogger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';
import type { HttpServerConfig } from '@/config/http';
import { AnnounceApiHandler } from '@/adapters/http/announceApi/announceApiHandler';
import type { AnnounceApiDeps } from '@/adapters/http/announceApi/announceApiHandler';
import { MediaFileHandler } from '@/adapters/http/media/mediaFileHandler';
import { requestPath, sendJson } from '@/adapters/http/utils/jsonBody';
import type { ApiRequest, ResponseSink } from '@/adapters/http/utils/jsonBody';
import type { ArtifactStorePort } from '@/ports/ArtifactStorePort';

interface RouteHandler {
  matches(pathname: string): boolean;
  handle(req: ApiRequest, res: ResponseSink): Promise<void>;
}

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET,HEAD,POST,PATCH,OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
  'Cache-Control': 'no-cache',
};

export type HttpServiceOptions = Omit<AnnounceApiDeps, 'maxBodyBytes'> & {
  store: Pick<ArtifactStorePort, 'resolve'>;
};

/**
 * The HTTP gateway: `/api/*` for callers and `/media/*` for the players that
 * fetch announcement audio.
 */
export class HttpService {
  private readonly log = createLogger('Http');
  private readonly routes: RouteHandler[];
  private server: http.Server | null = null;

  constructor(private readonly config: HttpServerConfig, options: HttpServiceOptions) {
    this.routes = [
      new AnnounceApiHandler({ ...options, maxBodyBytes: config.maxBodyBytes }),
      new MediaFileHandler(options.store),
    ];
  }

  public async start(): Promise<void> {
    if (this.server) return;

    const server = http.createServer((req, res) => {
      this.dispatch(req, res).catch((error: unknown) => this.failRequest(res, error));
    });
    this.server = server;

    const { port, host } = this.config;
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.removeListener('error', reject);
        this.log.info('http gateway listening', { port, host });
        resolve();
      });
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  private async dispatch(req: IncomingMessage, res: ServerResponse): Promise<void> {
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const pathname = requestPath(req.url);
    this.log.spam('request', { method: req.method, path: pathname });
    const route = this.routes.find((candidate) => candidate.matches(pathname));
    if (!route) {
      sendJson(res, 404, { error: 'not-found' });
      return;
    }
    await route.handle(req, res);
  }

  private failRequest(res: ServerResponse, error: unknown): void {
    this.log.error('http request failed', { message: describeError(error) });
    if (res.headersSent) {
      res.end();
      return;
    }
    sendJson(res, 500, { error: 'http-internal-error' });
  }
}
