import path from 'node:path';
import type { StoragePort } from '@/ports/StoragePort';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { AnnouncerConfig } from '@/domain/config/types';
import { createDefaultConfig } from '@/domain/config/defaults';
import { normalizeConfig } from '@/domain/config/normalize';
import { createLogger } from '@/shared/logging/logger';

export const CONFIG_FILENAME = 'config.json';

/**
 * Owns `<dataDir>/config.json`: loads it over the defaults and persists every
 * update after normalizing it again.
 */
export class ConfigRepository implements ConfigPort {
  private readonly log = createLogger('Config', 'Repository');
  private readonly filePath: string;
  private current: AnnouncerConfig | null = null;

  constructor(
    private readonly storage: StoragePort,
    dataDir: string,
  ) {
    this.filePath = path.join(dataDir, CONFIG_FILENAME);
  }

  public async load(): Promise<AnnouncerConfig> {
    const raw = await this.storage.readJson(this.filePath, createDefaultConfig(), { persistFallback: true });
    this.current = normalizeConfig(raw);
    if (!this.current.homeAssistant.token) {
      this.log.warn('home assistant token missing; commands will be rejected', { file: this.filePath });
    }
    return this.current;
  }

  public getConfig(): AnnouncerConfig {
    if (!this.current) {
      throw new Error('config not loaded');
    }
    return this.current;
  }

  /** The mutator edits a copy; readers keep the old object until the save succeeds. */
  public async updateConfig(
    mutator: (config: AnnouncerConfig) => void | Promise<void>,
  ): Promise<AnnouncerConfig> {
    const draft = structuredClone(this.getConfig());
    await mutator(draft);
    const next = normalizeConfig({ ...draft, updatedAt: new Date().toISOString() });
    await this.storage.writeJson(this.filePath, next);
    this.current = next;
    this.log.info('config updated', { file: this.filePath });
    return next;
  }
}
