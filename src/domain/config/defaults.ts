import type { AnnouncerConfig } from '@/domain/config/types';

const DEFAULT_VOLUME_BOOST_AMOUNT = 0.1;

export function createDefaultConfig(): AnnouncerConfig {
  return {
    system: {
      logging: { consoleLevel: 'info', json: false },
      publicBaseUrl: 'http://127.0.0.1:8099',
      apiToken: '',
    },
    homeAssistant: {
      baseUrl: 'http://homeassistant.local:8123',
      token: '',
      requestTimeoutMs: 10000,
    },
    delivery: {
      volumeBoostEnabled: true,
      volumeBoostAmount: DEFAULT_VOLUME_BOOST_AMOUNT,
    },
    negotiation: {
      alternateContentTypes: ['audio/mpeg', 'audio/mp3', 'music', 'audio', 'application/octet-stream'],
      verifyGraceMs: 2000,
      busyGraceMs: 4000,
      busyPatterns: [
        'busy',
        'conflict',
        'transition',
        'in use',
        'not allowed in this state',
        'upnp error 701',
      ],
    },
    timing: {
      marginMs: 2000,
      floorMs: 5000,
      fallbackMs: 20000,
      stateRestoreLagMs: 1500,
      defaultDurationSeconds: 10,
    },
    artifacts: {
      directory: 'announcements',
      retentionSeconds: 3600,
      transcodeRecordings: true,
      leadIn: 'silence',
      leadInSilenceSeconds: 3,
      announcementPhrase: 'Achtung.',
      ffprobePath: 'ffprobe',
      probeTimeoutMs: 5000,
      transcodeTimeoutMs: 30000,
    },
    quirkyDevices: {
      namePatterns: ['sonos'],
      integrations: ['sonos'],
      snapshotService: 'sonos.snapshot',
      restoreService: 'sonos.restore',
    },
    tts: {
      engine: 'auto',
      language: 'de_DE',
      voice: null,
      speaker: null,
    },
  };
}
