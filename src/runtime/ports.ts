import path from 'node:path';
import type { StoragePort } from '@/ports/StoragePort';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { CommandBusPort } from '@/ports/CommandBusPort';
import type { DeviceStatePort } from '@/ports/DeviceStatePort';
import type { SpeechPort } from '@/ports/SpeechPort';
import type { MediaProbePort } from '@/ports/MediaProbePort';
import type { TranscoderPort } from '@/ports/TranscoderPort';
import type { ClockPort } from '@/ports/ClockPort';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import { ConfigRepository } from '@/application/config/configRepository';
import { HomeAssistantClient } from '@/adapters/homeassistant/homeAssistantClient';
import { HomeAssistantCommandBus } from '@/adapters/homeassistant/HomeAssistantCommandBus';
import { HomeAssistantDeviceState } from '@/adapters/homeassistant/HomeAssistantDeviceState';
import { HomeAssistantSpeechAdapter } from '@/adapters/homeassistant/HomeAssistantSpeechAdapter';
import { FfprobeDurationProbe } from '@/adapters/media/ffprobeDurationProbe';
import { MetadataDurationProbe } from '@/adapters/media/metadataDurationProbe';
import { FfmpegTranscoder } from '@/adapters/media/ffmpegTranscoder';
import { loadFfmpegPath } from '@/adapters/media/ffmpegLoader';
import { FileArtifactStore } from '@/adapters/artifacts/FileArtifactStore';
import { systemClock } from '@/infrastructure/time/systemClock';
import { TimerScheduler } from '@/infrastructure/time/timerScheduler';

export type RuntimePorts = {
  storage: StoragePort;
  config: ConfigPort;
  clock: ClockPort;
  scheduler: TimerScheduler;
};

export function createRuntimePorts(deps: { dataDir: string }): RuntimePorts {
  const storage = new StorageAdapter();
  return {
    storage,
    config: new ConfigRepository(storage, deps.dataDir),
    clock: systemClock,
    scheduler: new TimerScheduler(),
  };
}

export type HostPorts = {
  commands: CommandBusPort;
  devices: DeviceStatePort;
  speech: SpeechPort;
  probes: MediaProbePort[];
  transcoder: TranscoderPort;
  store: FileArtifactStore;
};

/**
 * Adapters that read their settings through the config port, so option edits
 * apply to the next request without a restart.
 */
export function createHostPorts(config: ConfigPort, dataDir: string): HostPorts {
  const settings = () => config.getConfig();
  const client = new HomeAssistantClient(() => settings().homeAssistant);
  return {
    commands: new HomeAssistantCommandBus(client),
    devices: new HomeAssistantDeviceState(client),
    speech: new HomeAssistantSpeechAdapter(client),
    probes: [
      new FfprobeDurationProbe({
        binary: () => settings().artifacts.ffprobePath,
        timeoutMs: () => settings().artifacts.probeTimeoutMs,
      }),
      new MetadataDurationProbe(),
    ],
    transcoder: new FfmpegTranscoder({
      resolveBinary: loadFfmpegPath,
      timeoutMs: () => settings().artifacts.transcodeTimeoutMs,
    }),
    store: new FileArtifactStore(
      path.resolve(dataDir, settings().artifacts.directory),
      () => settings().system.publicBaseUrl,
    ),
  };
}
