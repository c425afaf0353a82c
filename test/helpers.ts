import { AxiosError, AxiosHeaders } from 'axios';
import type { GenerationDelta } from '../src/generation/types.js';

/** An axios error as thrown for an HTTP status or a network error code. */
export function httpError(status?: number, code?: string): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response = status === undefined
    ? undefined
    : { status, statusText: 'error', headers: {}, config, data: null };
  return new AxiosError(
    status === undefined ? `network error ${code ?? ''}` : `Request failed with status code ${status}`,
    code,
    config,
    undefined,
    response
  );
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}

export async function* deltas(...items: GenerationDelta[]): AsyncGenerator<GenerationDelta> {
  for (const item of items) {
    yield item;
  }
}

export function content(...texts: string[]): GenerationDelta[] {
  return texts.map((text): GenerationDelta => ({ type: 'content', text }));
}

/** A promise with its resolve/reject exposed. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: unknown) => void } {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
