import { describe, it, expect, vi } from 'vitest';
import { SentenceSegmenter, type SegmentEvent } from '../../src/streaming/sentence-segmenter.js';
import { SegmentationError, ServiceUnavailableError } from '../../src/resilience/errors.js';
import { collect, content, deltas } from '../helpers.js';

function feed(segmenter: SentenceSegmenter, ...texts: string[]): SegmentEvent[] {
  const events = texts.flatMap(text => segmenter.push(text));
  return [...events, ...segmenter.end()];
}

describe('SentenceSegmenter', () => {
  it('emits two sentences for a two-sentence stream', () => {
    const events = feed(new SentenceSegmenter(), 'Hello', ' world.', ' How are you?');
    expect(events).toEqual([
      { type: 'sentence', sequence: 1, text: 'Hello world.' },
      { type: 'sentence', sequence: 2, text: ' How are you?' },
    ]);
  });

  it('emits a sentence as soon as the next one starts', () => {
    const segmenter = new SentenceSegmenter();
    expect(segmenter.push('Sure thing.')).toEqual([]);
    expect(segmenter.push(' Let')).toEqual([{ type: 'sentence', sequence: 1, text: 'Sure thing.' }]);
    expect(segmenter.pending).toBe(' Let');
  });

  it('emits unpunctuated text as one final event', () => {
    expect(feed(new SentenceSegmenter(), 'no', ' punctuation')).toEqual([
      { type: 'final', sequence: 1, text: 'no punctuation' },
    ]);
  });

  it('shares one counter between sentences and the final remainder', () => {
    const events = feed(new SentenceSegmenter(), 'One. Two! Three? And then');
    expect(events.map(event => event.type === 'error' ? -1 : event.sequence)).toEqual([1, 2, 3, 4]);
    expect(events[3]).toEqual({ type: 'final', sequence: 4, text: ' And then' });
  });

  it('does not split after common abbreviations', () => {
    const events = feed(new SentenceSegmenter(), 'Dr. Smith will call you. Thanks.');
    expect(events).toEqual([
      { type: 'sentence', sequence: 1, text: 'Dr. Smith will call you.' },
      { type: 'sentence', sequence: 2, text: ' Thanks.' },
    ]);
  });

  it('does not split before a lowercase word or inside numbers', () => {
    const events = feed(new SentenceSegmenter(), 'It costs 3.50 dollars. ok then.');
    expect(events).toEqual([{ type: 'sentence', sequence: 1, text: 'It costs 3.50 dollars. ok then.' }]);
  });

  it('keeps closing quotes with their sentence', () => {
    const events = feed(new SentenceSegmenter(), 'She said "yes." Then she left.');
    expect(events[0]).toEqual({ type: 'sentence', sequence: 1, text: 'She said "yes."' });
  });

  it('emits nothing for an empty or whitespace stream', () => {
    expect(feed(new SentenceSegmenter())).toEqual([]);
    expect(feed(new SentenceSegmenter(), '  ', '\n')).toEqual([]);
  });

  it('records first-token latency once', () => {
    let clock = 1000;
    const onFirstToken = vi.fn();
    const segmenter = new SentenceSegmenter({ startedAt: 900, now: () => clock, onFirstToken });

    segmenter.push('Hel');
    clock = 1500;
    segmenter.push('lo.');

    expect(onFirstToken).toHaveBeenCalledTimes(1);
    expect(onFirstToken).toHaveBeenCalledWith(100);
    expect(segmenter.firstTokenLatencyMs).toBe(100);
  });

  it('ignores empty deltas for first-token latency', () => {
    let clock = 0;
    const segmenter = new SentenceSegmenter({ startedAt: 0, now: () => clock });
    segmenter.push('');
    clock = 40;
    segmenter.push('Hi');
    expect(segmenter.firstTokenLatencyMs).toBe(40);
  });

  it('stops after an error and emits nothing more', () => {
    const segmenter = new SentenceSegmenter();
    const error = new ServiceUnavailableError('dropped');

    expect(segmenter.push('First one. Sec')).toEqual([{ type: 'sentence', sequence: 1, text: 'First one.' }]);
    expect(segmenter.fail(error)).toEqual([{ type: 'error', error }]);
    expect(segmenter.push('ond. Third.')).toEqual([]);
    expect(segmenter.end()).toEqual([]);
  });

  describe('segment', () => {
    it('adapts a delta stream and keeps the usage', async () => {
      const segmenter = new SentenceSegmenter();
      const events = await collect(segmenter.segment(deltas(
        ...content('Yes.', ' I can help.'),
        { type: 'end', usage: { inputTokens: 10, outputTokens: 4 } }
      )));

      expect(events).toEqual([
        { type: 'sentence', sequence: 1, text: 'Yes.' },
        { type: 'sentence', sequence: 2, text: ' I can help.' },
      ]);
      expect(segmenter.usage).toEqual({ inputTokens: 10, outputTokens: 4 });
    });

    it('ends with an error event and drops later deltas', async () => {
      const error = new SegmentationError('Malformed stream data');
      const events = await collect(new SentenceSegmenter().segment(deltas(
        ...content('Fine. Then'),
        { type: 'error', error },
        ...content(' more. Text.')
      )));

      expect(events).toEqual([
        { type: 'sentence', sequence: 1, text: 'Fine.' },
        { type: 'error', error },
      ]);
    });

    it('turns a thrown source error into an error event', async () => {
      async function* throwing(): AsyncGenerator<{ type: 'content'; text: string }> {
        yield { type: 'content', text: 'Partial' };
        throw new Error('socket closed');
      }
      const events = await collect(new SentenceSegmenter().segment(throwing()));

      expect(events).toHaveLength(1);
      const last = events[0];
      expect(last.type === 'error' && last.error).toBeInstanceOf(ServiceUnavailableError);
    });

    it('flushes the remainder when the source ends without an end delta', async () => {
      const events = await collect(new SentenceSegmenter().segment(deltas(...content('trailing words'))));
      expect(events).toEqual([{ type: 'final', sequence: 1, text: 'trailing words' }]);
    });
  });
});
