/**
 * In-process relay stand-in. Speaks the relay side of the protocol over
 * in-memory connections so links and pools can run without a network.
 */

import { isSignedEvent, type SignedEvent } from '@nostrand/core';
import { matchFilters, type Filter } from 'nostr-tools/filter';
import { AsyncChannel } from '../utils/channel.js';
import { abortReason, type RelayTransport, type TransportFactory } from './types.js';

/**
 * Options for MemoryRelay.
 */
export interface MemoryRelayOptions {
  /** Stored events answered to matching REQs (default: none) */
  events?: SignedEvent[];
  /** Answer each REQ with stored matches and EOSE (default: true) */
  answerRequests?: boolean;
  /** Store published events and reply OK (default: true) */
  acknowledgePublishes?: boolean;
  /** Reason given with a rejecting OK; when set, every publish is refused */
  rejectPublishes?: string;
}

class MemoryConnection implements RelayTransport {
  private readonly inbound = new AsyncChannel<string>();
  private open = true;

  constructor(private readonly relay: MemoryRelay) {}

  get isOpen(): boolean {
    return this.open;
  }

  send(frame: string): void {
    if (!this.open) throw new Error('connection closed');
    this.relay.handleFrame(this, frame);
  }

  async nextFrame(): Promise<string | null> {
    const result = await this.inbound.next();
    return result.done ? null : result.value;
  }

  async close(): Promise<void> {
    this.terminate();
  }

  /** Relay to client. */
  deliver(frame: string): void {
    if (this.open) this.inbound.push(frame);
  }

  terminate(): void {
    if (!this.open) return;
    this.open = false;
    this.inbound.close();
    this.relay.forget(this);
  }
}

/**
 * A relay that lives in the current process.
 *
 * @example
 * ```typescript
 * const relay = new MemoryRelay('wss://relay.test', { events: [note] });
 * const pool = new RelayPool({ relays: [relay.url] }, {
 *   transportFactory: createMemoryTransportFactory([relay]),
 * });
 * ```
 */
export class MemoryRelay {
  /** Every frame received from clients, in arrival order */
  readonly received: unknown[][] = [];
  private readonly connections = new Set<MemoryConnection>();
  private readonly stored: SignedEvent[];
  private refusing = false;
  private connectionAttempts = 0;

  constructor(
    readonly url: string,
    private readonly options: MemoryRelayOptions = {}
  ) {
    this.stored = [...(options.events ?? [])];
  }

  /** Currently open client connections. */
  get connectionCount(): number {
    return this.connections.size;
  }

  /** Connection attempts seen so far, refused ones included. */
  get attempts(): number {
    return this.connectionAttempts;
  }

  /** Events held by the relay, in insertion order. */
  get events(): readonly SignedEvent[] {
    return this.stored;
  }

  /**
   * Frames received with the given leading tag.
   */
  framesOfType(type: string): unknown[][] {
    return this.received.filter((frame) => frame[0] === type);
  }

  /**
   * Accepts a new client connection.
   */
  async connect(signal: AbortSignal): Promise<RelayTransport> {
    this.connectionAttempts++;
    await Promise.resolve();
    if (signal.aborted) throw abortReason(signal);
    if (this.refusing) throw new Error(`connection to ${this.url} refused`);
    const connection = new MemoryConnection(this);
    this.connections.add(connection);
    return connection;
  }

  /** Makes later connection attempts fail (or succeed again). */
  refuseConnections(refuse = true): void {
    this.refusing = refuse;
  }

  /** Sends a frame to every connected client. */
  deliver(frame: unknown[]): void {
    this.deliverRaw(JSON.stringify(frame));
  }

  /** Sends unparsed text to every connected client. */
  deliverRaw(text: string): void {
    for (const connection of this.connections) connection.deliver(text);
  }

  /** Drops every connection from the relay side. */
  dropConnections(): void {
    for (const connection of [...this.connections]) connection.terminate();
  }

  handleFrame(connection: MemoryConnection, text: string): void {
    const frame: unknown = JSON.parse(text);
    if (!Array.isArray(frame)) return;
    this.received.push(frame);

    const [type, ...rest] = frame;
    if (type === 'REQ' && this.options.answerRequests !== false) {
      const [subscriptionId, ...filters] = rest;
      if (typeof subscriptionId !== 'string') return;
      const matching = this.stored.filter((event) => matchFilters(filters.filter(isFilter), event));
      for (const event of matching) {
        connection.deliver(JSON.stringify(['EVENT', subscriptionId, event]));
      }
      connection.deliver(JSON.stringify(['EOSE', subscriptionId]));
    } else if (type === 'EVENT' && this.options.acknowledgePublishes !== false) {
      const [event] = rest;
      if (!isSignedEvent(event)) return;
      if (this.options.rejectPublishes !== undefined) {
        connection.deliver(JSON.stringify(['OK', event.id, false, this.options.rejectPublishes]));
        return;
      }
      this.stored.push(event);
      connection.deliver(JSON.stringify(['OK', event.id, true, '']));
    }
  }

  forget(connection: MemoryConnection): void {
    this.connections.delete(connection);
  }
}

function isFilter(value: unknown): value is Filter {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Routes connections to the MemoryRelay whose url matches. Unknown URLs fail
 * to connect.
 */
export function createMemoryTransportFactory(relays: MemoryRelay[]): TransportFactory {
  const byUrl = new Map<string, MemoryRelay>();
  for (const relay of relays) byUrl.set(relay.url, relay);
  return async (url, signal) => {
    const relay = byUrl.get(url);
    if (!relay) throw new Error(`no relay at ${url}`);
    return relay.connect(signal);
  };
}
