export type TranscodeRequest = {
  sourcePath: string;
  targetPath: string;
  /** Seconds of silence prepended to the output. */
  leadInSeconds: number;
  /** Audio file played before the source; takes the place of the silence. */
  leadInPath?: string;
};

export type TranscodeResult = { kind: 'ok' } | { kind: 'error'; message: string };

export interface TranscoderPort {
  transcodeToMp3(request: TranscodeRequest): Promise<TranscodeResult>;
}
