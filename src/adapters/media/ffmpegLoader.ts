import { createLogger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';

const FALLBACK_BINARY = 'ffmpeg';

let binaryPromise: Promise<string> | null = null;

/**
 * Resolves the bundled ffmpeg binary once. Platforms without a bundled build
 * fall back to `ffmpeg` on PATH.
 */
export const loadFfmpegPath = async (): Promise<string> => {
  if (!binaryPromise) {
    binaryPromise = import('@ffmpeg-installer/ffmpeg').then(
      (mod) => mod.default.path || FALLBACK_BINARY,
      (error: unknown) => {
        createLogger('Media', 'Ffmpeg').warn('bundled ffmpeg unavailable; using PATH', {
          message: describeError(error),
        });
        return FALLBACK_BINARY;
      },
    );
  }
  return binaryPromise;
};
