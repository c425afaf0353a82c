import { describe, it, expect, vi } from 'vitest';
import { Readable } from 'stream';
import type { AxiosInstance } from 'axios';
import { HttpGenerationClient, parseEventStream } from '../../src/generation/generation-client.js';
import type { GenerationRequest } from '../../src/generation/types.js';
import { RateLimitedError, SegmentationError, ServiceUnavailableError } from '../../src/resilience/errors.js';
import { collect, httpError } from '../helpers.js';

function sse(...events: unknown[]): string {
  return events.map(event => `data: ${typeof event === 'string' ? event : JSON.stringify(event)}\n\n`).join('');
}

function chunk(text: string): unknown {
  return { choices: [{ delta: { content: text }, finish_reason: null }] };
}

const request: GenerationRequest = {
  model: 'test-model',
  region: 'eu-west-1',
  system: 'Be brief.',
  messages: [{ role: 'user', content: 'Hello' }],
  temperature: 0.3,
  maxTokens: 100,
};

describe('parseEventStream', () => {
  it('reassembles lines split across chunks', async () => {
    const raw = sse(chunk('Hello'), chunk(' there.'), '[DONE]');
    const pieces = [raw.slice(0, 17), raw.slice(17, 40), raw.slice(40)];

    const out = await collect(parseEventStream(Readable.from(pieces.map(piece => Buffer.from(piece)))));

    expect(out).toEqual([
      { type: 'content', text: 'Hello' },
      { type: 'content', text: ' there.' },
      { type: 'end', usage: undefined },
    ]);
  });

  it('decodes a multibyte character split across chunks', async () => {
    const bytes = Buffer.from(sse(chunk('café'), '[DONE]'));
    const cut = bytes.indexOf(0xc3) + 1;

    const out = await collect(parseEventStream(Readable.from([bytes.subarray(0, cut), bytes.subarray(cut)])));

    expect(out).toEqual([
      { type: 'content', text: 'café' },
      { type: 'end', usage: undefined },
    ]);
  });

  it('reports token usage on the end delta', async () => {
    const raw = sse(
      chunk('Hi.'),
      { choices: [], usage: { prompt_tokens: 12, completion_tokens: 3 } },
      '[DONE]'
    );
    const out = await collect(parseEventStream(Readable.from([raw])));
    expect(out[out.length - 1]).toEqual({ type: 'end', usage: { inputTokens: 12, outputTokens: 3 } });
  });

  it('ignores comments and empty deltas', async () => {
    const raw = `: keep-alive\n\n${sse({ choices: [{ delta: {} }] }, chunk('Ok.'), '[DONE]')}`;
    const out = await collect(parseEventStream(Readable.from([raw])));
    expect(out).toEqual([{ type: 'content', text: 'Ok.' }, { type: 'end', usage: undefined }]);
  });

  it('stops with a segmentation error on malformed data', async () => {
    const raw = sse(chunk('Fine.')) + 'data: {not json\n\n' + sse(chunk('never'));
    const out = await collect(parseEventStream(Readable.from([raw]), 'test-model'));

    expect(out).toHaveLength(2);
    const last = out[1];
    expect(last.type).toBe('error');
    if (last.type === 'error') {
      expect(last.error).toBeInstanceOf(SegmentationError);
    }
  });

  it('surfaces an in-band error as service unavailable', async () => {
    const out = await collect(parseEventStream(Readable.from([sse({ error: { message: 'overloaded' } })])));
    expect(out).toHaveLength(1);
    const only = out[0];
    expect(only.type === 'error' && only.error).toBeInstanceOf(ServiceUnavailableError);
  });

  it('turns a broken connection into an error delta', async () => {
    async function* broken(): AsyncGenerator<string> {
      yield sse(chunk('Half'));
      throw httpError(undefined, 'ECONNRESET');
    }
    const out = await collect(parseEventStream(broken()));

    expect(out[0]).toEqual({ type: 'content', text: 'Half' });
    expect(out[1].type === 'error' && out[1].error).toBeInstanceOf(ServiceUnavailableError);
  });

  it('ends cleanly when the body closes without a done marker', async () => {
    const out = await collect(parseEventStream(Readable.from([`data: ${JSON.stringify(chunk('Tail'))}`])));
    expect(out).toEqual([{ type: 'content', text: 'Tail' }, { type: 'end', usage: undefined }]);
  });
});

describe('HttpGenerationClient', () => {
  it('posts to the regional endpoint and streams deltas', async () => {
    const post = vi.fn(async () => ({ data: Readable.from([sse(chunk('Sure.'), '[DONE]')]) }));
    const http = { post } as unknown as AxiosInstance;
    const client = new HttpGenerationClient({
      baseUrl: 'http://default.test',
      endpoints: { 'eu-west-1': 'http://eu.test/' },
      http,
    });

    const out = await collect(client.stream(request));

    expect(out).toEqual([{ type: 'content', text: 'Sure.' }, { type: 'end', usage: undefined }]);
    expect(post).toHaveBeenCalledWith(
      'http://eu.test/v1/chat/completions',
      expect.objectContaining({
        model: 'test-model',
        stream: true,
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: 'Hello' },
        ],
      }),
      expect.objectContaining({ responseType: 'stream' })
    );
  });

  it('uses the base url for regions without an endpoint', () => {
    const client = new HttpGenerationClient({ baseUrl: 'http://default.test/' });
    expect(client.endpointFor('ap-northeast-1')).toBe('http://default.test');
  });

  it('maps tools and reasoning onto the wire format', () => {
    const client = new HttpGenerationClient({ baseUrl: 'http://default.test' });
    const body = client.toWireRequest({
      ...request,
      tools: [{ name: 'lookup', description: 'Look up', parameters: { type: 'object' } }],
      reasoning: { budgetTokens: 2048 },
    });

    expect(body.tools).toEqual([
      { type: 'function', function: { name: 'lookup', description: 'Look up', parameters: { type: 'object' } } },
    ]);
    expect(body.tool_choice).toBe('auto');
    expect(body.thinking).toEqual({ type: 'enabled', budget_tokens: 2048 });
  });

  it('throws a classified error when the request is refused', async () => {
    const post = vi.fn(async () => {
      throw httpError(429);
    });
    const client = new HttpGenerationClient({ baseUrl: 'http://default.test', http: { post } as unknown as AxiosInstance });

    await expect(collect(client.stream(request))).rejects.toBeInstanceOf(RateLimitedError);
  });
});
