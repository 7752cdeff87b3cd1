import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { MediaProbePort } from '@/ports/MediaProbePort';

const execFileAsync = promisify(execFile);

export type FfprobeOptions = {
  binary: () => string;
  timeoutMs: () => number;
};

export function parseFfprobeDuration(stdout: string): number | null {
  const value = Number.parseFloat(stdout.trim());
  return Number.isFinite(value) && value > 0 ? value : null;
}

/**
 * Reads the container duration with the external `ffprobe` tool.
 */
export class FfprobeDurationProbe implements MediaProbePort {
  public readonly name = 'ffprobe';

  constructor(private readonly options: FfprobeOptions) {}

  public async probeDuration(filePath: string): Promise<number | null> {
    const { stdout } = await execFileAsync(
      this.options.binary(),
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', filePath],
      { timeout: this.options.timeoutMs() },
    );
    return parseFfprobeDuration(stdout);
  }
}
