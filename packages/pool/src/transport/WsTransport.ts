/**
 * Node transport over the `ws` package.
 */

import WebSocket from 'ws';
import { AsyncChannel } from '../utils/channel.js';
import { abortReason, type RelayTransport, type TransportFactory } from './types.js';

/**
 * Options for createWsTransportFactory().
 */
export interface WsTransportOptions {
  /** Extra HTTP headers sent with the upgrade request */
  headers?: Record<string, string>;
  /** Largest accepted incoming frame in bytes (default: ws default) */
  maxPayload?: number;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

class WsTransport implements RelayTransport {
  private readonly frames = new AsyncChannel<string>();
  private failure: Error | undefined;

  constructor(private readonly socket: WebSocket) {
    socket.on('message', (data, isBinary) => {
      if (!isBinary) this.frames.push(rawDataToString(data));
    });
    socket.on('close', () => this.frames.close());
    // 'close' follows 'error'; the error is reported once the frames are drained
    socket.on('error', (error) => {
      this.failure = error;
    });
  }

  send(frame: string): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new Error('WebSocket is not open');
    }
    this.socket.send(frame);
  }

  async nextFrame(): Promise<string | null> {
    const result = await this.frames.next();
    if (!result.done) return result.value;
    if (this.failure) throw this.failure;
    return null;
  }

  close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.close();
    });
  }
}

/**
 * Creates a factory that connects with a Node `ws` WebSocket.
 */
export function createWsTransportFactory(options: WsTransportOptions = {}): TransportFactory {
  return (url, signal) =>
    new Promise<RelayTransport>((resolve, reject) => {
      if (signal.aborted) {
        reject(abortReason(signal));
        return;
      }

      const socket = new WebSocket(url, { headers: options.headers, maxPayload: options.maxPayload });

      const cleanup = (): void => {
        socket.off('open', onOpen);
        socket.off('error', onError);
        signal.removeEventListener('abort', onAbort);
      };
      const onOpen = (): void => {
        cleanup();
        resolve(new WsTransport(socket));
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(error);
      };
      const onAbort = (): void => {
        cleanup();
        // terminate() before the handshake emits an error we already report
        socket.once('error', () => undefined);
        socket.terminate();
        reject(abortReason(signal));
      };

      socket.once('open', onOpen);
      socket.once('error', onError);
      signal.addEventListener('abort', onAbort, { once: true });
    });
}
