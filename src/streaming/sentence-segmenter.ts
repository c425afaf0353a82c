import type { GenerationDelta, TokenUsage } from '../generation/types.js';
import { SegmentationError, classifyError } from '../resilience/errors.js';

export type SegmentEvent =
  | { type: 'sentence'; sequence: number; text: string }
  | { type: 'final'; sequence: number; text: string }
  | { type: 'error'; error: Error };

export type SpeechSegment = Extract<SegmentEvent, { type: 'sentence' | 'final' }>;

export interface SegmenterOptions {
  /** When the turn's generation request was started, for first-token latency. */
  startedAt?: number;
  now?: () => number;
  onFirstToken?: (latencyMs: number) => void;
  abbreviations?: string[];
}

export const DEFAULT_ABBREVIATIONS = ['mr', 'mrs', 'ms', 'dr', 'prof', 'sr', 'jr', 'st', 'vs', 'e.g', 'i.e'];

// Terminal punctuation (plus closing quotes/brackets) followed by whitespace and a capital.
const BOUNDARY = /[.!?]+["')\]]*(?=\s+["'(]?\p{Lu})/gu;
const TERMINATED = /[.!?]+["')\]]*\s*$/u;

/**
 * Splits a live token stream into sentences so synthesis can start before
 * the response is complete. One instance per turn; not reentrant.
 */
export class SentenceSegmenter {
  private buffer = '';
  private emitted = 0;
  private firstTokenAt: number | null = null;
  private state: 'open' | 'ended' | 'failed' = 'open';
  private now: () => number;
  private startedAt: number;
  private abbreviations: Set<string>;

  usage?: TokenUsage;

  constructor(private options: SegmenterOptions = {}) {
    this.now = options.now ?? Date.now;
    this.startedAt = options.startedAt ?? this.now();
    this.abbreviations = new Set(options.abbreviations ?? DEFAULT_ABBREVIATIONS);
  }

  get emittedCount(): number {
    return this.emitted;
  }

  get firstTokenLatencyMs(): number | null {
    return this.firstTokenAt === null ? null : this.firstTokenAt - this.startedAt;
  }

  /** Text received but not yet emitted. */
  get pending(): string {
    return this.buffer;
  }

  push(delta: string): SegmentEvent[] {
    if (this.state !== 'open') {
      return [];
    }
    if (typeof delta !== 'string') {
      return this.fail(new SegmentationError('Received a non-text delta'));
    }
    if (delta.length === 0) {
      return [];
    }

    if (this.firstTokenAt === null) {
      this.firstTokenAt = this.now();
      this.options.onFirstToken?.(this.firstTokenAt - this.startedAt);
    }

    this.buffer += delta;

    const cuts = this.boundaries();
    if (cuts.length === 0) {
      return [];
    }

    const events: SegmentEvent[] = [];
    let start = 0;
    for (const cut of cuts) {
      events.push({ type: 'sentence', sequence: ++this.emitted, text: this.buffer.slice(start, cut) });
      start = cut;
    }
    this.buffer = this.buffer.slice(start);

    return events;
  }

  /**
   * End of stream. A buffer ending in terminal punctuation is a complete
   * sentence; anything else left over goes out as the final remainder.
   */
  end(): SegmentEvent[] {
    if (this.state !== 'open') {
      return [];
    }
    this.state = 'ended';

    const text = this.buffer.replace(/\s+$/u, '');
    this.buffer = '';
    if (text.trim().length === 0) {
      return [];
    }

    const type = TERMINATED.test(text) ? 'sentence' : 'final';
    return [{ type, sequence: ++this.emitted, text }];
  }

  fail(error: Error): SegmentEvent[] {
    if (this.state !== 'open') {
      return [];
    }
    this.state = 'failed';
    this.buffer = '';
    return [{ type: 'error', error }];
  }

  /**
   * Adapt a generation delta stream into a segment stream. Stops after
   * the first error.
   */
  async *segment(deltas: AsyncIterable<GenerationDelta>): AsyncGenerator<SegmentEvent> {
    try {
      for await (const delta of deltas) {
        switch (delta.type) {
          case 'content':
            yield* this.push(delta.text);
            break;
          case 'end':
            this.usage = delta.usage;
            yield* this.end();
            return;
          case 'error':
            yield* this.fail(delta.error);
            return;
        }
        if (this.state === 'failed') {
          return;
        }
      }
    } catch (error) {
      yield* this.fail(classifyError(error));
      return;
    }

    yield* this.end();
  }

  private boundaries(): number[] {
    const cuts: number[] = [];
    for (const match of this.buffer.matchAll(BOUNDARY)) {
      const index = match.index ?? 0;
      if (this.isAbbreviation(index, match[0])) {
        continue;
      }
      cuts.push(index + match[0].length);
    }
    return cuts;
  }

  private isAbbreviation(index: number, punctuation: string): boolean {
    if (punctuation !== '.') {
      return false;
    }
    const word = /(\S+)$/u.exec(this.buffer.slice(0, index));
    return word !== null && this.abbreviations.has(word[1].toLowerCase());
  }
}
