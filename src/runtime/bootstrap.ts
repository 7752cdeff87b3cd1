import { loadConfig } from '@/config';
import { createLogger, logManager } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';
import { HttpService } from '@/adapters/http/httpService';
import { createAnnouncementPipeline } from '@/application/announcements/createAnnouncementPipeline';
import type { AnnouncementPipeline } from '@/application/announcements/createAnnouncementPipeline';
import { createHostPorts, createRuntimePorts } from '@/runtime/ports';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

export function createRuntime(): Runtime {
  const appConfig = loadConfig();
  const ports = createRuntimePorts({ dataDir: appConfig.env.dataDir });
  const configPort = ports.config;
  let httpService: HttpService | null = null;
  let pipeline: AnnouncementPipeline | null = null;

  async function startServices(): Promise<void> {
    const storedConfig = await configPort.load();
    logManager.configure({
      level: storedConfig.system.logging.consoleLevel ?? appConfig.env.logLevel,
      json: storedConfig.system.logging.json,
    });
    const log = createLogger('Server');
    log.info('bootstrapping announcer', {
      env: appConfig.env.nodeEnv,
      homeAssistant: storedConfig.homeAssistant.baseUrl,
      publicBaseUrl: storedConfig.system.publicBaseUrl,
    });
    if (!storedConfig.system.apiToken) {
      log.warn('system.apiToken is empty; every /api call will be refused');
    }

    const host = createHostPorts(configPort, appConfig.env.dataDir);
    pipeline = createAnnouncementPipeline({
      ...host,
      clock: ports.clock,
      scheduler: ports.scheduler,
      config: () => configPort.getConfig(),
    });

    httpService = new HttpService(appConfig.http, {
      announcements: pipeline.service,
      devices: host.devices,
      classifier: pipeline.classifier,
      stopper: pipeline.stopper,
      tts: pipeline.tts,
      configPort,
      store: host.store,
    });
    await httpService.start();
    log.info('startup complete', { artifacts: host.store.directory });
  }

  async function stopServices(): Promise<void> {
    const log = createLogger('Server');
    const services: LifecycleService[] = [];
    const activePipeline = pipeline;
    if (activePipeline) {
      services.push({
        name: 'restorations',
        stop: async () => {
          activePipeline.restorations.cancelAll();
          activePipeline.lifecycle.dispose();
        },
      });
    }
    const activeHttp = httpService;
    if (activeHttp) {
      services.push({ name: 'http', stop: () => activeHttp.stop() });
    }

    const results = await Promise.all(
      services.map((service) => stopWithTimeout(service.name, service.stop, 6000, log)),
    );
    ports.scheduler.clear();
    const failed = results.filter((result) => result.kind !== 'stopped').length;
    if (failed) {
      log.warn('shutdown finished with failures', { failed });
    }

    httpService = null;
    pipeline = null;
  }

  return {
    start: async () => {
      try {
        await startServices();
      } catch (error) {
        createLogger('Server').error('startup failed', { message: describeError(error) });
        await stopServices();
        throw error;
      }
    },
    stop: stopServices,
  };
}
