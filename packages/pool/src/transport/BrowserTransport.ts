/**
 * Transport over a WHATWG WebSocket, as provided by browsers and other
 * runtimes. The constructor is injected so this module has no global
 * dependency.
 */

import { AsyncChannel } from '../utils/channel.js';
import { abortReason, type RelayTransport, type TransportFactory } from './types.js';

const OPEN = 1;
const CLOSED = 3;

export interface BrowserSocketEvent {
  readonly data?: unknown;
}

/**
 * The subset of the WHATWG WebSocket interface this transport uses.
 */
export interface BrowserWebSocketLike {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  addEventListener(
    type: 'open' | 'message' | 'error' | 'close',
    listener: (event: BrowserSocketEvent) => void
  ): void;
  removeEventListener(
    type: 'open' | 'message' | 'error' | 'close',
    listener: (event: BrowserSocketEvent) => void
  ): void;
}

export type BrowserWebSocketConstructor = new (url: string) => BrowserWebSocketLike;

class BrowserTransport implements RelayTransport {
  private readonly frames = new AsyncChannel<string>();

  constructor(private readonly socket: BrowserWebSocketLike) {
    socket.addEventListener('message', (event) => {
      // binary frames are not part of the protocol
      if (typeof event.data === 'string') this.frames.push(event.data);
    });
    socket.addEventListener('close', () => this.frames.close());
  }

  send(frame: string): void {
    if (this.socket.readyState !== OPEN) {
      throw new Error('WebSocket is not open');
    }
    this.socket.send(frame);
  }

  async nextFrame(): Promise<string | null> {
    const result = await this.frames.next();
    return result.done ? null : result.value;
  }

  close(): Promise<void> {
    if (this.socket.readyState === CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      this.socket.addEventListener('close', () => resolve());
      this.socket.close();
    });
  }
}

/**
 * Creates a factory that connects with the given WebSocket constructor,
 * e.g. `createBrowserTransportFactory(WebSocket)` in a browser.
 */
export function createBrowserTransportFactory(
  WebSocketImpl: BrowserWebSocketConstructor
): TransportFactory {
  return (url, signal) =>
    new Promise<RelayTransport>((resolve, reject) => {
      if (signal.aborted) {
        reject(abortReason(signal));
        return;
      }

      const socket = new WebSocketImpl(url);

      const cleanup = (): void => {
        socket.removeEventListener('open', onOpen);
        socket.removeEventListener('error', onFailure);
        socket.removeEventListener('close', onFailure);
        signal.removeEventListener('abort', onAbort);
      };
      const onOpen = (): void => {
        cleanup();
        resolve(new BrowserTransport(socket));
      };
      const onFailure = (): void => {
        cleanup();
        reject(new Error(`failed to connect to ${url}`));
      };
      const onAbort = (): void => {
        cleanup();
        socket.close();
        reject(abortReason(signal));
      };

      socket.addEventListener('open', onOpen);
      socket.addEventListener('error', onFailure);
      socket.addEventListener('close', onFailure);
      signal.addEventListener('abort', onAbort, { once: true });
    });
}
