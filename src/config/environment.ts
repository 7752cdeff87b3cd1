import path from 'node:path';
import type { LogLevel } from '@/types/logLevel';

export type NodeEnv = 'development' | 'production' | 'test';

/**
 * Process-level settings: where to listen and where `config.json` and the
 * generated audio live. Everything else is in the stored config.
 */
export interface EnvironmentConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  httpPort: number;
  httpHost: string;
  dataDir: string;
}

const DEFAULT_HTTP_PORT = 8099;
const DEFAULT_HTTP_HOST = '0.0.0.0';

function parsePort(raw: string | undefined): number {
  const port = Number(raw);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_HTTP_PORT;
}

function parseNodeEnv(raw: string | undefined): NodeEnv {
  return raw === 'production' || raw === 'test' ? raw : 'development';
}

/**
 * `ANNOUNCER_HTTP_PORT`, `ANNOUNCER_HTTP_HOST` and `ANNOUNCER_DATA_DIR` override
 * the defaults; invalid values are ignored.
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const dataDir = env.ANNOUNCER_DATA_DIR?.trim();
  return {
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    logLevel: 'info',
    httpPort: parsePort(env.ANNOUNCER_HTTP_PORT),
    httpHost: env.ANNOUNCER_HTTP_HOST?.trim() || DEFAULT_HTTP_HOST,
    dataDir: path.resolve(process.cwd(), dataDir || 'data'),
  };
}
