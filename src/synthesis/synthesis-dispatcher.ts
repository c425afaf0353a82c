import type { SegmentEvent, SpeechSegment } from '../streaming/sentence-segmenter.js';
import type { AudioSink, SynthesisOptions, SynthesisService } from './types.js';

export interface SynthesisDispatcherOptions {
  synthesizer: SynthesisService;
  synthesis: SynthesisOptions;
  /** Spoken in place of a final segment whose synthesis failed. */
  fallbackPhrase: string;
  maxConcurrency?: number;
  now?: () => number;
  onSegmentError?: (sequence: number, error: Error) => void;
}

export interface DispatchSummary {
  delivered: number[];
  skipped: number[];
  substituted: number | null;
  /** Text of the delivered segments, in order. */
  spokenText: string;
  /** Error event received from the segment stream. */
  error?: Error;
  /** The sink refused a write; nothing after it was delivered. */
  sinkError?: Error;
  cancelled: boolean;
  firstAudioAt?: number;
}

type SlotResult =
  | { ok: true; audio: Buffer }
  | { ok: false; error: Error };

/**
 * Synthesizes segments concurrently (bounded) and releases audio to the
 * sink strictly in sequence order. A failed segment is skipped once a
 * later one exists; a failed last segment is replaced by the fallback
 * phrase.
 */
export class SynthesisDispatcher {
  private maxConcurrency: number;
  private now: () => number;

  constructor(private options: SynthesisDispatcherOptions) {
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? 3);
    this.now = options.now ?? Date.now;
  }

  async dispatch(
    segments: AsyncIterable<SegmentEvent>,
    sink: AudioSink,
    signal?: AbortSignal
  ): Promise<DispatchSummary> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const summary: DispatchSummary = {
      delivered: [],
      skipped: [],
      substituted: null,
      spokenText: '',
      cancelled: false,
    };
    const spoken: string[] = [];
    const texts = new Map<number, string>();
    const results = new Map<number, SlotResult>();
    const inFlight = new Set<Promise<void>>();

    let nextToRelease = 1;
    let highestSeen = 0;
    let streamEnded = false;
    let releasing: Promise<void> = Promise.resolve();

    const deliver = async (sequence: number, text: string, audio: Buffer, substituted: boolean) => {
      await sink.write({ sequence, text, audio, ...(substituted ? { substituted } : {}) });
      summary.firstAudioAt ??= this.now();
      summary.delivered.push(sequence);
      spoken.push(text);
    };

    const releaseReady = async (): Promise<void> => {
      while (!controller.signal.aborted) {
        const sequence = nextToRelease;
        const result = results.get(sequence);
        if (!result) {
          return;
        }

        const text = texts.get(sequence) ?? '';
        if (result.ok) {
          await deliver(sequence, text, result.audio, false);
        } else if (sequence < highestSeen || (streamEnded && summary.error)) {
          summary.skipped.push(sequence);
        } else if (streamEnded) {
          await this.substitute(sequence, controller.signal, deliver, summary);
        } else {
          // Cannot tell yet whether this is the last segment.
          return;
        }

        results.delete(sequence);
        texts.delete(sequence);
        nextToRelease++;
      }
    };

    const scheduleRelease = (): Promise<void> => {
      releasing = releasing
        .then(releaseReady)
        .catch((error: unknown) => {
          summary.sinkError = error instanceof Error ? error : new Error(String(error));
          console.error('[Dispatcher] Audio sink write failed, stopping turn audio:', summary.sinkError.message);
          controller.abort();
        });
      return releasing;
    };

    const synthesizeOne = async (segment: SpeechSegment): Promise<void> => {
      try {
        const audio = await this.options.synthesizer.synthesize(
          segment.text,
          this.options.synthesis,
          controller.signal
        );
        results.set(segment.sequence, { ok: true, audio });
      } catch (error) {
        if (controller.signal.aborted) {
          return;
        }
        const failure = error instanceof Error ? error : new Error(String(error));
        console.warn(`[Dispatcher] Synthesis failed for segment ${segment.sequence}: ${failure.message}`);
        this.options.onSegmentError?.(segment.sequence, failure);
        results.set(segment.sequence, { ok: false, error: failure });
      }
      await scheduleRelease();
    };

    try {
      for await (const event of segments) {
        if (controller.signal.aborted) {
          break;
        }
        if (event.type === 'error') {
          summary.error = event.error;
          break;
        }

        highestSeen = event.sequence;
        texts.set(event.sequence, event.text);

        while (inFlight.size >= this.maxConcurrency) {
          await Promise.race(inFlight);
        }
        if (controller.signal.aborted) {
          break;
        }

        const task: Promise<void> = synthesizeOne(event).finally(() => inFlight.delete(task));
        inFlight.add(task);
      }
    } finally {
      streamEnded = true;
      await Promise.all(inFlight);
      await scheduleRelease();
      signal?.removeEventListener('abort', onAbort);
    }

    summary.cancelled = signal?.aborted ?? false;
    summary.spokenText = spoken.join('');
    return summary;
  }

  private async substitute(
    sequence: number,
    signal: AbortSignal,
    deliver: (sequence: number, text: string, audio: Buffer, substituted: boolean) => Promise<void>,
    summary: DispatchSummary
  ): Promise<void> {
    const phrase = this.options.fallbackPhrase;
    let audio: Buffer;
    try {
      audio = await this.options.synthesizer.synthesize(phrase, this.options.synthesis, signal);
    } catch (error) {
      console.warn(`[Dispatcher] Fallback phrase synthesis failed for segment ${sequence}:`,
        error instanceof Error ? error.message : error);
      summary.skipped.push(sequence);
      return;
    }

    await deliver(sequence, phrase, audio, true);
    summary.substituted = sequence;
  }
}
