import WebSocket from 'ws';
import type { AudioChunk, AudioSink } from './types.js';

/** Collects chunks in memory. Used for dry runs and the CLI. */
export class MemoryAudioSink implements AudioSink {
  readonly chunks: AudioChunk[] = [];
  closed = false;

  async write(chunk: AudioChunk): Promise<void> {
    this.chunks.push(chunk);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get sequences(): number[] {
    return this.chunks.map(chunk => chunk.sequence);
  }
}

/**
 * Streams audio to a media socket (e.g. a telephony media stream) as
 * binary frames. Each write resolves once the frame has been flushed to
 * the socket, so frames cannot overtake each other.
 */
export class WebSocketAudioSink implements AudioSink {
  constructor(private socket: WebSocket) {}

  write(chunk: AudioChunk): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error(`Audio socket is not open (state ${this.socket.readyState})`));
    }

    return new Promise((resolve, reject) => {
      this.socket.send(chunk.audio, { binary: true }, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return;
    }
    // Closing during the handshake aborts it, and ws reports that as an error.
    this.socket.once('error', (error: Error) => {
      console.warn(`[AudioSink] Socket error while closing: ${error.message}`);
    });
    await new Promise<void>((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.close(1000, 'call ended');
    });
  }
}
