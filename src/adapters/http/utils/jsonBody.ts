/**
 * Request side of a JSON exchange: any readable body, plus the socket to drop
 * when a client keeps streaming past the limit.
 */
export type BodySource = NodeJS.ReadableStream & {
  socket?: { destroyed: boolean; destroy(): void } | null;
};

export type ApiRequest = BodySource & {
  method?: string;
  url?: string;
  headers?: NodeJS.Dict<string | string[]>;
};

/** The parts of `ServerResponse` the API handlers write through. */
export type ResponseSink = {
  readonly writableEnded: boolean;
  writeHead(status: number, headers: Record<string, string>): unknown;
  end(data?: string | Buffer): unknown;
  once(event: 'finish' | 'close', listener: () => void): unknown;
};

export function sendJson(res: ResponseSink, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

type BodyError = 'payload-too-large' | 'invalid-json';

const ERROR_STATUS: Record<BodyError, number> = {
  'payload-too-large': 413,
  'invalid-json': 400,
};

function dropConnection(req: BodySource): void {
  if (req.socket && !req.socket.destroyed) {
    req.socket.destroy();
  }
}

/**
 * Reads and parses a JSON body. Oversized payloads answer 413 and malformed
 * ones 400; in both cases the response is already sent and `null` is returned.
 * An empty body is `null` without a response.
 */
export function readJsonBody(req: BodySource, res: ResponseSink, maxBytes: number): Promise<unknown> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let finished = false;

    const finish = (value: unknown, error?: BodyError): void => {
      if (finished) return;
      finished = true;
      req.removeListener('data', onData);
      req.removeListener('end', onEnd);
      req.removeListener('error', onStreamError);
      req.removeListener('aborted', onAborted);
      if (error && !res.writableEnded) {
        sendJson(res, ERROR_STATUS[error], { error });
      }
      resolve(value);
    };

    function onData(chunk: Buffer | string): void {
      if (finished) return;
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      received += buffer.length;
      if (received <= maxBytes) {
        chunks.push(buffer);
        return;
      }
      // Stop reading; the socket goes once the 413 is flushed.
      req.pause();
      res.once('finish', () => dropConnection(req));
      res.once('close', () => dropConnection(req));
      finish(null, 'payload-too-large');
    }

    function onEnd(): void {
      if (received === 0) {
        finish(null);
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(Buffer.concat(chunks).toString('utf8'));
      } catch {
        finish(null, 'invalid-json');
        return;
      }
      finish(parsed);
    }

    function onStreamError(): void {
      finish(null, 'invalid-json');
    }

    function onAborted(): void {
      finish(null);
    }

    req.on('data', onData);
    req.once('end', onEnd);
    req.once('error', onStreamError);
    req.once('aborted', onAborted);
  });
}

/** Path without query string, percent-decoded where possible. */
export function requestPath(url: string | undefined): string {
  const [pathname] = (url ?? '/').split('?');
  try {
    return decodeURIComponent(pathname || '/');
  } catch {
    return pathname || '/';
  }
}

export function requestQuery(url: string | undefined): URLSearchParams {
  const index = (url ?? '').indexOf('?');
  return new URLSearchParams(index === -1 ? '' : (url ?? '').slice(index + 1));
}
