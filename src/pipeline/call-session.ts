import type { ConversationContext, Message } from '../context/types.js';
import { CancelledError } from '../resilience/errors.js';
import type { AudioSink } from '../synthesis/types.js';
import type { TurnOptions, TurnResult, VoiceTurnPipeline } from './voice-turn-pipeline.js';

export type TurnRecordStatus = 'queued' | 'running' | 'finished' | 'error';

export interface TurnRecord {
  turnId: string;
  utterance: string;
  status: TurnRecordStatus;
  queuedAt: number;
  startedAt?: number;
  endedAt?: number;
  result?: TurnResult;
  error?: string;
}

export interface CallSessionOptions {
  pipeline: Pick<VoiceTurnPipeline, 'runTurn'>;
  sink: AudioSink;
  context: ConversationContext;
  turnDefaults?: Omit<TurnOptions, 'signal'>;
  onTurnComplete?: (result: TurnResult, record: TurnRecord) => void;
  /** Called when a turn ended without the caller hearing anything useful. */
  onTerminalFailure?: (result: TurnResult, record: TurnRecord) => void;
  now?: () => number;
}

/**
 * A live call. Turns run one at a time in submission order, and each
 * finished turn is appended to the conversation before the next one
 * starts. Hanging up cancels the running turn and rejects the queue.
 */
export class CallSession {
  private queue: Promise<unknown> = Promise.resolve();
  private controller = new AbortController();
  private records: TurnRecord[] = [];
  private ended = false;
  private counter = 0;
  private now: () => number;

  constructor(private options: CallSessionOptions) {
    this.now = options.now ?? Date.now;
  }

  get callId(): string {
    return this.options.context.callId;
  }

  get context(): Readonly<ConversationContext> {
    return this.options.context;
  }

  get active(): boolean {
    return !this.ended;
  }

  listTurns(): TurnRecord[] {
    return this.records.map(record => ({ ...record }));
  }

  submit(utterance: string, options: Omit<TurnOptions, 'signal'> = {}): Promise<TurnResult> {
    if (this.ended) {
      return Promise.reject(new CancelledError(`Call ${this.callId} has ended`, this.callId));
    }

    const record: TurnRecord = {
      turnId: `${this.callId}-turn-${++this.counter}`,
      utterance,
      status: 'queued',
      queuedAt: this.now(),
    };
    this.records.push(record);

    const run = this.queue
      .catch(() => undefined)
      .then(() => this.runTurn(record, options))
      .catch((error: unknown) => {
        record.status = 'error';
        record.endedAt = this.now();
        record.error = error instanceof Error ? error.message : String(error);
        throw error;
      });

    this.queue = run;
    return run;
  }

  /**
   * End the call: abort the running turn, let queued turns drain as
   * cancelled, then close the sink.
   */
  async hangup(): Promise<void> {
    if (this.ended) return;
    this.ended = true;
    this.controller.abort();
    console.log(`[Session] Call ${this.callId} ended after ${this.counter} turn(s)`);

    await this.queue.catch(() => undefined);
    await this.options.sink.close?.();
  }

  private async runTurn(record: TurnRecord, options: Omit<TurnOptions, 'signal'>): Promise<TurnResult> {
    if (this.controller.signal.aborted) {
      throw new CancelledError(`Call ${this.callId} ended before the turn started`, this.callId);
    }

    record.status = 'running';
    record.startedAt = this.now();

    const context = this.options.context;
    const snapshot: ConversationContext = { ...context, turns: [...context.turns] };
    const result = await this.options.pipeline.runTurn(
      record.utterance,
      snapshot,
      this.options.sink,
      { ...this.options.turnDefaults, ...options, signal: this.controller.signal }
    );

    record.status = 'finished';
    record.endedAt = this.now();
    record.result = result;

    if (result.status !== 'cancelled') {
      this.appendHistory(record.utterance, result);
    }

    if (result.status === 'failed') {
      this.options.onTerminalFailure?.(result, record);
    }
    this.options.onTurnComplete?.(result, record);
    return result;
  }

  private appendHistory(utterance: string, result: TurnResult): void {
    const context = this.options.context;
    const timestamp = new Date(this.now());
    const entries: Message[] = [{ role: 'user', content: utterance.trim(), timestamp }];

    const reply = result.responseText.trim() || (result.apologized ? result.spokenText.trim() : '');
    if (reply) {
      entries.push({
        role: 'assistant',
        content: reply,
        timestamp,
        tokens: result.usage?.outputTokens,
        metadata: { modelId: result.modelId, status: result.status },
      });
    }

    context.turns.push(...entries);
    context.multiTurn = true;
  }
}
