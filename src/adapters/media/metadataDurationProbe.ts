import { parseFile } from 'music-metadata';
import type { MediaProbePort } from '@/ports/MediaProbePort';

/**
 * In-process fallback when `ffprobe` is missing; slower on long files because
 * it may need to scan frames.
 */
export class MetadataDurationProbe implements MediaProbePort {
  public readonly name = 'music-metadata';

  public async probeDuration(filePath: string): Promise<number | null> {
    const meta = await parseFile(filePath, { duration: true, skipCovers: true });
    const duration = meta.format.duration;
    return typeof duration === 'number' && duration > 0 ? duration : null;
  }
}
