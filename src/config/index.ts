import { loadEnvironment } from '@/config/environment';
import { buildHttpServerConfig } from '@/config/http';

export type AppConfig = {
  env: ReturnType<typeof loadEnvironment>;
  http: ReturnType<typeof buildHttpServerConfig>;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const environment = loadEnvironment(env);
  return { env: environment, http: buildHttpServerConfig(environment) };
}
