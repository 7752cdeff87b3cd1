export type SpeechRequest = {
  text: string;
  language: string;
  engine: string;
  voice: string | null;
  speaker: string | null;
};

export type SynthesizedAudio = {
  data: Buffer;
  extension: string;
};

export interface SpeechPort {
  synthesize(request: SpeechRequest): Promise<SynthesizedAudio | null>;
}
