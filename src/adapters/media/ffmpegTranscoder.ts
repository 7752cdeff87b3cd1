import { spawn } from 'node:child_process';
import type { TranscodeRequest, TranscodeResult, TranscoderPort } from '@/ports/TranscoderPort';
import { createLogger } from '@/shared/logging/logger';
import { describeError } from '@/shared/errors';

const STDERR_TAIL_BYTES = 2000;

export type FfmpegTranscoderOptions = {
  resolveBinary: () => Promise<string>;
  timeoutMs: () => number;
};

// Both concat inputs must share rate, sample format and layout.
const CONCAT_INPUT_FORMAT = 'aresample=44100,aformat=sample_fmts=fltp:channel_layouts=stereo';

/**
 * Builds the ffmpeg argument list. A lead-in file is joined in front with the
 * `concat` filter; otherwise lead-in silence is added with `adelay`, which pads
 * every channel (`all=1`) before the first sample.
 */
export function buildTranscodeArgs(request: TranscodeRequest): string[] {
  const args = ['-hide_banner', '-loglevel', 'error', '-y'];
  if (request.leadInPath) {
    args.push(
      '-i',
      request.leadInPath,
      '-i',
      request.sourcePath,
      '-filter_complex',
      `[0:a]${CONCAT_INPUT_FORMAT}[lead];[1:a]${CONCAT_INPUT_FORMAT}[main];[lead][main]concat=n=2:v=0:a=1[out]`,
      '-map',
      '[out]',
    );
  } else {
    args.push('-i', request.sourcePath, '-vn');
    const leadInMs = Math.round(Math.max(0, request.leadInSeconds) * 1000);
    if (leadInMs > 0) {
      args.push('-af', `adelay=${leadInMs}:all=1`);
    }
  }
  args.push('-codec:a', 'libmp3lame', '-q:a', '4', '-f', 'mp3', request.targetPath);
  return args;
}

export class FfmpegTranscoder implements TranscoderPort {
  private readonly log = createLogger('Media', 'Transcoder');

  constructor(private readonly options: FfmpegTranscoderOptions) {}

  public async transcodeToMp3(request: TranscodeRequest): Promise<TranscodeResult> {
    const binary = await this.options.resolveBinary();
    const args = buildTranscodeArgs(request);
    const timeoutMs = this.options.timeoutMs();
    this.log.debug('transcoding', {
      source: request.sourcePath,
      leadInSeconds: request.leadInSeconds,
      leadInFile: request.leadInPath,
    });

    return new Promise<TranscodeResult>((resolve) => {
      let stderr = '';
      let settled = false;
      const finish = (result: TranscodeResult): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const proc = spawn(binary, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      const timer = setTimeout(() => {
        proc.kill('SIGKILL');
        finish({ kind: 'error', message: `ffmpeg timed out after ${timeoutMs}ms` });
      }, timeoutMs);

      proc.stderr.on('data', (chunk: Buffer) => {
        stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_BYTES);
      });
      proc.on('error', (error) => {
        finish({ kind: 'error', message: describeError(error) });
      });
      proc.on('close', (code) => {
        if (code === 0) {
          finish({ kind: 'ok' });
          return;
        }
        finish({ kind: 'error', message: stderr.trim() || `ffmpeg exited with code ${code}` });
      });
    });
  }
}
