import axios, { type AxiosInstance } from 'axios';
import { StringDecoder } from 'string_decoder';
import { z } from 'zod';
import {
  SegmentationError,
  ServiceUnavailableError,
  classifyError,
} from '../resilience/errors.js';
import type {
  GenerationDelta,
  GenerationRequest,
  GenerationService,
  TokenUsage,
} from './types.js';

export interface HttpGenerationOptions {
  baseUrl: string;
  /** Region to base URL; regions without an entry use `baseUrl`. */
  endpoints?: Record<string, string>;
  timeoutMs?: number;
  http?: AxiosInstance;
}

const StreamChunkSchema = z.object({
  choices: z.array(z.object({
    delta: z.object({
      content: z.string().nullish(),
    }).passthrough().optional(),
    finish_reason: z.string().nullish(),
  }).passthrough()).optional(),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
  }).passthrough().nullish(),
  error: z.object({
    message: z.string(),
  }).passthrough().optional(),
}).passthrough();

type StreamChunk = z.infer<typeof StreamChunkSchema>;

/**
 * Streaming client for an OpenAI-compatible chat completions endpoint
 * fronting the regional model deployments.
 */
export class HttpGenerationClient implements GenerationService {
  private http: AxiosInstance;
  private baseUrl: string;
  private endpoints: Record<string, string>;
  private timeoutMs: number;

  constructor(options: HttpGenerationOptions) {
    this.http = options.http ?? axios.create();
    this.baseUrl = options.baseUrl;
    this.endpoints = options.endpoints ?? {};
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  endpointFor(region: string): string {
    return (this.endpoints[region] ?? this.baseUrl).replace(/\/+$/, '');
  }

  toWireRequest(request: GenerationRequest): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: request.model,
      messages: [
        { role: 'system', content: request.system },
        ...request.messages,
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      stream: true,
      stream_options: { include_usage: true },
    };

    if (request.tools && request.tools.length > 0) {
      body.tools = request.tools.map(tool => ({
        type: 'function',
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters,
        },
      }));
      body.tool_choice = 'auto';
    }

    if (request.reasoning) {
      body.thinking = { type: 'enabled', budget_tokens: request.reasoning.budgetTokens };
    }

    return body;
  }

  async *stream(request: GenerationRequest, signal?: AbortSignal): AsyncGenerator<GenerationDelta> {
    const url = `${this.endpointFor(request.region)}/v1/chat/completions`;

    let body: AsyncIterable<Buffer | string>;
    try {
      const response = await this.http.post<AsyncIterable<Buffer | string>>(
        url,
        this.toWireRequest(request),
        {
          timeout: this.timeoutMs,
          headers: {
            'Content-Type': 'application/json',
            Accept: 'text/event-stream',
          },
          responseType: 'stream',
          signal,
        }
      );
      body = response.data;
    } catch (error) {
      throw classifyError(error, request.model);
    }

    yield* parseEventStream(body, request.model);
  }
}

/**
 * Turn a server-sent event byte stream into generation deltas. Lines and
 * multibyte characters may be split across chunks. Malformed data ends the stream with a
 * SegmentationError.
 */
export async function* parseEventStream(
  body: AsyncIterable<Buffer | string>,
  target?: string
): AsyncGenerator<GenerationDelta> {
  let pending = '';
  const decoder = new StringDecoder('utf8');
  const state: { usage?: TokenUsage } = {};

  const handleLine = (line: string): GenerationDelta[] | 'done' => {
    const trimmed = line.trim();
    if (!trimmed.startsWith('data:')) {
      return [];
    }

    const data = trimmed.slice(5).trim();
    if (data === '[DONE]') {
      return 'done';
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch {
      return [{ type: 'error', error: new SegmentationError(`Malformed stream data: ${data.slice(0, 80)}`, target) }];
    }

    const parsed = StreamChunkSchema.safeParse(json);
    if (!parsed.success) {
      return [{ type: 'error', error: new SegmentationError('Unexpected stream chunk shape', target) }];
    }

    return fromChunk(parsed.data);
  };

  const fromChunk = (chunk: StreamChunk): GenerationDelta[] => {
    if (chunk.error) {
      return [{ type: 'error', error: new ServiceUnavailableError(chunk.error.message, target) }];
    }
    if (chunk.usage) {
      state.usage = {
        inputTokens: chunk.usage.prompt_tokens,
        outputTokens: chunk.usage.completion_tokens,
      };
    }
    const text = chunk.choices?.[0]?.delta?.content;
    return text ? [{ type: 'content', text }] : [];
  };

  try {
    for await (const chunk of body) {
      pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);
      const lines = pending.split('\n');
      pending = lines.pop() ?? '';

      for (const line of lines) {
        const result = handleLine(line);
        if (result === 'done') {
          yield { type: 'end', usage: state.usage };
          return;
        }
        for (const delta of result) {
          yield delta;
          if (delta.type === 'error') {
            return;
          }
        }
      }
    }
  } catch (error) {
    yield { type: 'error', error: classifyError(error, target) };
    return;
  }

  pending += decoder.end();
  if (pending.trim().length > 0) {
    const result = handleLine(pending);
    if (result !== 'done') {
      for (const delta of result) {
        yield delta;
        if (delta.type === 'error') {
          return;
        }
      }
    }
  }

  yield { type: 'end', usage: state.usage };
}
