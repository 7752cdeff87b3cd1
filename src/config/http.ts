import type { EnvironmentConfig } from '@/config/environment';

export interface HttpServerConfig {
  port: number;
  host: string;
  /** Recordings arrive base64 encoded inside the JSON body. */
  maxBodyBytes: number;
}

const MAX_BODY_BYTES = 25 * 1024 * 1024;

export function buildHttpServerConfig(env: Pick<EnvironmentConfig, 'httpPort' | 'httpHost'>): HttpServerConfig {
  return { port: env.httpPort, host: env.httpHost, maxBodyBytes: MAX_BODY_BYTES };
}
