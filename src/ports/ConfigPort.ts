import type { AnnouncerConfig } from '@/domain/config/types';

export interface ConfigPort {
  load(): Promise<AnnouncerConfig>;
  getConfig(): AnnouncerConfig;
  updateConfig(mutator: (config: AnnouncerConfig) => void | Promise<void>): Promise<AnnouncerConfig>;
}

export type { AnnouncerConfig };
