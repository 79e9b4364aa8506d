import { afterEach, describe, it, expect } from 'vitest';
import {
  createBrowserTransportFactory,
  type BrowserSocketEvent,
  type BrowserWebSocketLike,
} from './BrowserTransport.js';

type SocketEventType = 'open' | 'message' | 'error' | 'close';
type Listener = (event: BrowserSocketEvent) => void;

class FakeBrowserSocket implements BrowserWebSocketLike {
  static readonly instances: FakeBrowserSocket[] = [];

  readyState = 0;
  readonly sent: string[] = [];
  private readonly listeners = new Map<SocketEventType, Set<Listener>>();

  constructor(readonly url: string) {
    FakeBrowserSocket.instances.push(this);
  }

  send(data: string): void {
    this.sent.push(data);
  }

  close(): void {
    this.readyState = 3;
    this.dispatch('close', {});
  }

  addEventListener(type: SocketEventType, listener: Listener): void {
    const set = this.listeners.get(type) ?? new Set<Listener>();
    set.add(listener);
    this.listeners.set(type, set);
  }

  removeEventListener(type: SocketEventType, listener: Listener): void {
    this.listeners.get(type)?.delete(listener);
  }

  dispatch(type: SocketEventType, event: BrowserSocketEvent): void {
    for (const listener of [...(this.listeners.get(type) ?? [])]) listener(event);
  }

  open(): void {
    this.readyState = 1;
    this.dispatch('open', {});
  }
}

function lastSocket(): FakeBrowserSocket {
  const socket = FakeBrowserSocket.instances[FakeBrowserSocket.instances.length - 1];
  if (!socket) throw new Error('no socket created');
  return socket;
}

describe('createBrowserTransportFactory', () => {
  const factory = createBrowserTransportFactory(FakeBrowserSocket);

  afterEach(() => {
    FakeBrowserSocket.instances.length = 0;
  });

  it('resolves once the socket opens', async () => {
    const connecting = factory('wss://relay.test', new AbortController().signal);
    const socket = lastSocket();

    socket.open();
    const transport = await connecting;
    transport.send('["CLOSE","sub1"]');

    expect(socket.url).toBe('wss://relay.test');
    expect(socket.sent).toEqual(['["CLOSE","sub1"]']);
  });

  it('rejects when the socket errors before opening', async () => {
    const connecting = factory('wss://relay.test', new AbortController().signal);

    lastSocket().dispatch('error', {});

    await expect(connecting).rejects.toThrow('failed to connect to wss://relay.test');
  });

  it('closes the socket when the signal aborts', async () => {
    const controller = new AbortController();
    const connecting = factory('wss://relay.test', controller.signal);

    controller.abort(new Error('connect timed out after 10ms'));

    await expect(connecting).rejects.toThrow('connect timed out after 10ms');
    expect(lastSocket().readyState).toBe(3);
  });

  it('returns string frames and skips binary data', async () => {
    const connecting = factory('wss://relay.test', new AbortController().signal);
    const socket = lastSocket();
    socket.open();
    const transport = await connecting;

    socket.dispatch('message', { data: new Uint8Array([1, 2]) });
    socket.dispatch('message', { data: '["EOSE","sub1"]' });
    socket.close();

    expect(await transport.nextFrame()).toBe('["EOSE","sub1"]');
    expect(await transport.nextFrame()).toBeNull();
  });

  it('refuses to send on a closed socket', async () => {
    const connecting = factory('wss://relay.test', new AbortController().signal);
    const socket = lastSocket();
    socket.open();
    const transport = await connecting;

    await transport.close();

    expect(socket.readyState).toBe(3);
    expect(() => transport.send('["CLOSE","sub1"]')).toThrow('WebSocket is not open');
  });
});
