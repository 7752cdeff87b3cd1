import type { AnnouncerConfig } from '@/domain/config/types';
import type { ArtifactStorePort } from '@/ports/ArtifactStorePort';
import type { ClockPort } from '@/ports/ClockPort';
import type { CommandBusPort } from '@/ports/CommandBusPort';
import type { DeviceStatePort } from '@/ports/DeviceStatePort';
import type { MediaProbePort } from '@/ports/MediaProbePort';
import type { SchedulerPort } from '@/ports/SchedulerPort';
import type { SpeechPort } from '@/ports/SpeechPort';
import type { TranscoderPort } from '@/ports/TranscoderPort';
import { AnnouncementService } from '@/application/announcements/announcementService';
import { ArtifactLifecycleManager } from '@/application/announcements/artifactLifecycleManager';
import { ContentNegotiator } from '@/application/announcements/contentNegotiator';
import { DeliveryOrchestrator } from '@/application/announcements/deliveryOrchestrator';
import { DeviceCapabilityClassifier } from '@/application/announcements/deviceClassifier';
import { DurationProbe } from '@/application/announcements/durationProbe';
import { RestorationScheduler } from '@/application/announcements/restorationScheduler';
import { StateSnapshotManager } from '@/application/announcements/stateSnapshotManager';
import { PlaybackStopper } from '@/application/announcements/playbackStopper';
import { TargetExpander } from '@/application/announcements/targetExpander';
import { VolumeController } from '@/application/announcements/volumeController';
import { TtsCatalog } from '@/application/tts/ttsCatalog';
import { createLogger } from '@/shared/logging/logger';
import type { ComponentLogger } from '@/shared/logging/logger';

export type AnnouncementPipelineDeps = {
  commands: CommandBusPort;
  devices: DeviceStatePort;
  speech: SpeechPort;
  transcoder: TranscoderPort;
  probes: readonly MediaProbePort[];
  store: ArtifactStorePort;
  clock: ClockPort;
  scheduler: SchedulerPort;
  config: () => AnnouncerConfig;
  log?: ComponentLogger;
};

export type AnnouncementPipeline = {
  service: AnnouncementService;
  orchestrator: DeliveryOrchestrator;
  classifier: DeviceCapabilityClassifier;
  restorations: RestorationScheduler;
  lifecycle: ArtifactLifecycleManager;
  stopper: PlaybackStopper;
  tts: TtsCatalog;
};

/**
 * Wires the announcement components over a set of ports. Every component reads
 * its settings through `config`, so edits apply to the next request.
 */
export function createAnnouncementPipeline(deps: AnnouncementPipelineDeps): AnnouncementPipeline {
  const log = deps.log ?? createLogger('Announce');
  const config = deps.config;

  const restorations = new RestorationScheduler(deps.scheduler, deps.clock, log.child('Restore'));
  const classifier = new DeviceCapabilityClassifier(() => config().quirkyDevices);
  const expander = new TargetExpander(deps.devices, log.child('Targets'));
  const orchestrator = new DeliveryOrchestrator({
    devices: deps.devices,
    expander,
    classifier,
    volume: new VolumeController(deps.commands, restorations, log.child('Volume')),
    snapshots: new StateSnapshotManager(deps.commands, restorations, () => config().quirkyDevices, log.child('Snapshot')),
    negotiator: new ContentNegotiator(
      deps.commands,
      deps.devices,
      deps.clock,
      () => config().negotiation,
      log.child('Negotiator'),
    ),
    durations: new DurationProbe({
      probes: deps.probes,
      defaultSeconds: () => config().timing.defaultDurationSeconds,
      log: log.child('Duration'),
    }),
    settings: () => ({
      alternateContentTypes: config().negotiation.alternateContentTypes,
      timing: config().timing,
    }),
    log: log.child('Orchestrator'),
  });
  const lifecycle = new ArtifactLifecycleManager(deps.store, deps.scheduler, log.child('Artifacts'));
  const service = new AnnouncementService({
    orchestrator,
    store: deps.store,
    transcoder: deps.transcoder,
    speech: deps.speech,
    lifecycle,
    clock: deps.clock,
    config,
    log: log.child('Service'),
  });

  const stopper = new PlaybackStopper(expander, deps.commands, log.child('Stop'));
  const tts = new TtsCatalog(deps.devices);

  return { service, orchestrator, classifier, restorations, lifecycle, stopper, tts };
}
