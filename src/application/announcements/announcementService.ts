import { randomUUID } from 'node:crypto';
import path from 'node:path';
import type {
  AnnouncementOptions,
  AnnouncementRequest,
  AudioArtifact,
  DeliveryReport,
  SourceKind,
} from '@/domain/announcement/types';
import { contentTypeForFile, extensionForContentType } from '@/domain/announcement/contentTypes';
import type { AnnouncerConfig, ArtifactConfig } from '@/domain/config/types';
import type { ArtifactStorePort, StoredFile } from '@/ports/ArtifactStorePort';
import type { ClockPort } from '@/ports/ClockPort';
import type { SpeechPort, SynthesizedAudio } from '@/ports/SpeechPort';
import type { TranscoderPort } from '@/ports/TranscoderPort';
import type { ArtifactLifecycleManager } from '@/application/announcements/artifactLifecycleManager';
import type { DeliveryOrchestrator } from '@/application/announcements/deliveryOrchestrator';
import type { Logger } from '@/shared/logging/logger';
import { bestEffort } from '@/shared/bestEffort';
import { describeError } from '@/shared/errors';
import { isFiniteNumber } from '@/shared/utils/guards';

const DEFAULT_RECORDING_EXTENSION = 'webm';

/** Silence in seconds, or a rendered phrase file that replaces it. */
type LeadIn = { seconds: number; file: StoredFile | null };

export type OptionOverrides = {
  volumeBoost?: boolean;
  volumeBoostAmount?: number;
};

export type RecordingAnnouncement = OptionOverrides & {
  targetId: string;
  data: Buffer;
  contentType?: string;
  filename?: string;
};

export type SpeechAnnouncement = OptionOverrides & {
  targetId: string;
  text: string;
  language?: string;
};

export type AnnouncementServiceDeps = {
  orchestrator: DeliveryOrchestrator;
  store: ArtifactStorePort;
  transcoder: TranscoderPort;
  speech: SpeechPort;
  lifecycle: ArtifactLifecycleManager;
  clock: ClockPort;
  config: () => AnnouncerConfig;
  log: Logger;
};

/**
 * Entry point for announcements: turns an upload or a text into a served
 * artifact, then hands it to the orchestrator.
 */
export class AnnouncementService {
  private lastReport: DeliveryReport | null = null;

  constructor(private readonly deps: AnnouncementServiceDeps) {}

  public async announceRecording(input: RecordingAnnouncement): Promise<DeliveryReport> {
    const extension =
      extensionForContentType(input.contentType) ??
      extensionFromFilename(input.filename) ??
      DEFAULT_RECORDING_EXTENSION;
    const artifact = input.data.length
      ? await this.createArtifact(input.data, extension, this.deps.config().artifacts.transcodeRecordings)
      : null;
    return this.deliver('recording', input.targetId, artifact, input);
  }

  public async announceSpeech(input: SpeechAnnouncement): Promise<DeliveryReport> {
    const tts = this.deps.config().tts;
    const audio = await this.deps.speech.synthesize({
      text: input.text,
      language: input.language ?? tts.language,
      engine: tts.engine,
      voice: tts.voice,
      speaker: tts.speaker,
    });
    const artifact = audio ? await this.createArtifact(audio.data, audio.extension, false) : null;
    return this.deliver('speech', input.targetId, artifact, input);
  }

  public getLastReport(): DeliveryReport | null {
    return this.lastReport;
  }

  public resolveOptions(overrides: OptionOverrides): AnnouncementOptions {
    const delivery = this.deps.config().delivery;
    const amount = isFiniteNumber(overrides.volumeBoostAmount)
      ? Math.min(Math.max(overrides.volumeBoostAmount, 0), 1)
      : delivery.volumeBoostAmount;
    return {
      volumeBoostEnabled: overrides.volumeBoost ?? delivery.volumeBoostEnabled,
      volumeBoostAmount: amount,
    };
  }

  private async deliver(
    sourceKind: SourceKind,
    targetId: string,
    artifact: AudioArtifact | null,
    overrides: OptionOverrides,
  ): Promise<DeliveryReport> {
    const request: AnnouncementRequest = Object.freeze({
      id: randomUUID(),
      sourceKind,
      artifact,
      targetId: targetId.trim(),
      options: Object.freeze(this.resolveOptions(overrides)),
    });
    const report = await this.deps.orchestrator.deliver(request);
    this.lastReport = report;
    return report;
  }

  private async createArtifact(data: Buffer, extension: string, transcode: boolean): Promise<AudioArtifact | null> {
    const { store, lifecycle, clock, log } = this.deps;
    const settings = this.deps.config().artifacts;
    let stored: StoredFile;
    try {
      stored = await store.write(data, extension);
    } catch (error) {
      log.error('failed to store announcement audio', { message: describeError(error) });
      return null;
    }

    const leadIn = await this.prepareLeadIn(settings);
    const needsMp3 = transcode && extension !== 'mp3';
    if (needsMp3 || leadIn.seconds > 0 || leadIn.file) {
      stored = await this.transcode(stored, leadIn);
    }
    if (leadIn.file) {
      await this.discard(leadIn.file);
    }

    const createdAt = clock.now();
    const artifact: AudioArtifact = {
      id: stored.id,
      filename: stored.filename,
      path: stored.path,
      url: store.publicUrl(stored.filename),
      contentType: contentTypeForFile(stored.filename),
      createdAt,
      retentionDeadline: createdAt + settings.retentionSeconds * 1000,
    };
    lifecycle.track(artifact, settings.retentionSeconds);
    log.debug('artifact ready', { filename: artifact.filename, contentType: artifact.contentType });
    return artifact;
  }

  /**
   * `announcement` renders the attention phrase through the speech port; when
   * that yields nothing the configured silence is used instead.
   */
  private async prepareLeadIn(settings: ArtifactConfig): Promise<LeadIn> {
    const silence: LeadIn = { seconds: settings.leadInSilenceSeconds, file: null };
    if (settings.leadIn === 'disabled') {
      return { seconds: 0, file: null };
    }
    if (settings.leadIn === 'silence') {
      return silence;
    }

    const { speech, store, log } = this.deps;
    const tts = this.deps.config().tts;
    const phrase = await bestEffort<SynthesizedAudio | null>(
      () =>
        speech.synthesize({
          text: settings.announcementPhrase,
          language: tts.language,
          engine: tts.engine,
          voice: tts.voice,
          speaker: tts.speaker,
        }),
      { fallback: null, onError: 'warn', label: 'announcement phrase failed', log },
    );
    if (!phrase) {
      log.warn('announcement phrase unavailable; using silence');
      return silence;
    }
    const file = await bestEffort<StoredFile | null>(() => store.write(phrase.data, phrase.extension), {
      fallback: null,
      onError: 'warn',
      label: 'failed to store announcement phrase',
      log,
    });
    return file ? { seconds: 0, file } : silence;
  }

  /** Falls back to the untouched source when ffmpeg fails. */
  private async transcode(source: StoredFile, leadIn: LeadIn): Promise<StoredFile> {
    const { store, transcoder, log } = this.deps;
    const target = store.allocate('mp3');
    const result = await transcoder.transcodeToMp3({
      sourcePath: source.path,
      targetPath: target.path,
      leadInSeconds: leadIn.seconds,
      ...(leadIn.file ? { leadInPath: leadIn.file.path } : {}),
    });
    if (result.kind === 'error') {
      log.warn('transcoding failed; serving original audio', { file: source.filename, message: result.message });
      await this.discard(target);
      return source;
    }
    await this.discard(source);
    return target;
  }

  private async discard(file: StoredFile): Promise<void> {
    try {
      await this.deps.store.remove(file.path);
    } catch (error) {
      this.deps.log.debug('failed to remove intermediate audio', {
        file: file.filename,
        message: describeError(error),
      });
    }
  }
}

function extensionFromFilename(filename: string | undefined): string | undefined {
  if (!filename) {
    return undefined;
  }
  const ext = path.extname(filename).slice(1).toLowerCase();
  return ext && /^[a-z0-9]{1,5}$/.test(ext) ? ext : undefined;
}
