export type AudioEncoding = 'linear16' | 'mulaw' | 'mp3';

export interface SynthesisOptions {
  voice: string;
  encoding: AudioEncoding;
  sampleRate: number;
}

export interface SynthesisService {
  /** Identifies the endpoint for circuit breaking and logs. */
  readonly target: string;
  synthesize(text: string, options: SynthesisOptions, signal?: AbortSignal): Promise<Buffer>;
}

export interface AudioChunk {
  sequence: number;
  text: string;
  audio: Buffer;
  /** Audio stands in for a segment whose own synthesis failed. */
  substituted?: boolean;
}

/** Real-time playback target. Chunks arrive in sequence order. */
export interface AudioSink {
  write(chunk: AudioChunk): Promise<void>;
  close?(): Promise<void>;
}
