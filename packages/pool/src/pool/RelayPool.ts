/**
 * Pool of relay links with merged, deduplicated subscriptions and per-relay
 * publish results.
 *
 * All bookkeeping (pool entries, subscriptions, the seen set and pending
 * publishes) is mutated by one consumer loop draining one inbox. Public
 * methods and link events only enqueue messages, so the order in which the
 * inbox is drained is the only order that matters.
 */

import { bytesToHex, randomBytes } from '@noble/hashes/utils';
import { verifyEvent, type SignedEvent } from '@nostrand/core';
import { resolvePoolConfig, validateRelayUrl, type PoolConfig, type PoolConfigInput } from '../config.js';
import { PoolError, PoolShutdownError } from '../errors.js';
import type { ClientFrame, RelayMessage } from '../protocol/frames.js';
import { RelayLink } from '../relay/RelayLink.js';
import type { TransportFactory } from '../transport/types.js';
import { createWsTransportFactory } from '../transport/WsTransport.js';
import type {
  Filter,
  LinkEvent,
  Logger,
  PoolNotice,
  PublishResult,
  RelayLinkState,
  SubscriptionEvent,
} from '../types.js';
import { AsyncChannel } from '../utils/channel.js';
import { SeenSet } from './SeenSet.js';

/**
 * Construction options for RelayPool.
 */
export interface RelayPoolOptions {
  /** Opens relay connections (default: Node `ws` transport) */
  transportFactory?: TransportFactory;
  /** Logger (default: console) */
  logger?: Logger;
  /** Jitter source handed to every link (default: Math.random) */
  random?: () => number;
}

export interface SubscribeOptions {
  /** Subscription id (default: random 16-character hex) */
  id?: string;
  /** Restrict the subscription to these relays (default: every relay) */
  relays?: string[];
}

export interface PublishOptions {
  /** Restrict the publish to these relays (default: every open relay) */
  relays?: string[];
  /** Wait for OK acknowledgements (default: config.publishTimeoutMs) */
  timeoutMs?: number;
}

export interface QueryOptions {
  relays?: string[];
  /** Give up waiting for every relay's EOSE after this long (default: config.publishTimeoutMs) */
  timeoutMs?: number;
}

/**
 * Handle returned by subscribe().
 */
export interface PoolSubscription {
  readonly id: string;
  /** Leaving a for-await loop over the stream unsubscribes. */
  readonly events: AsyncIterable<SubscriptionEvent>;
  unsubscribe(): void;
}

interface PoolEntry {
  url: string;
  link: RelayLink;
  /** Subscription ids sent to this link */
  subscriptions: Set<string>;
  state: RelayLinkState;
  /** Faulted or exhausted since the link was last open */
  down: boolean;
  exhausted: boolean;
}

interface SubscriptionRecord {
  id: string;
  filters: Filter[];
  relays: Set<string> | undefined;
  channel: AsyncChannel<SubscriptionEvent>;
  sentTo: Set<string>;
  eosed: Set<string>;
  closedBy: Set<string>;
  eoseAllSent: boolean;
  degraded: boolean;
}

interface PendingPublish {
  token: number;
  event: SignedEvent;
  relays: string[];
  results: Map<string, PublishResult>;
  timer: ReturnType<typeof setTimeout>;
  resolve: (results: PublishResult[]) => void;
}

type InboxMessage =
  | { type: 'link'; link: RelayLink; event: LinkEvent }
  | { type: 'add'; url: string }
  | { type: 'remove'; url: string; resolve: () => void; reject: (error: unknown) => void }
  | { type: 'subscribe'; subscription: SubscriptionRecord }
  | { type: 'unsubscribe'; id: string }
  | {
      type: 'publish';
      event: SignedEvent;
      relays: Set<string> | undefined;
      timeoutMs: number;
      resolve: (results: PublishResult[]) => void;
    }
  | { type: 'publish-timeout'; token: number }
  | { type: 'shutdown'; resolve: () => void };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isUnavailable(entry: PoolEntry | undefined): boolean {
  if (!entry || entry.down || entry.exhausted) return true;
  const { status } = entry.state;
  return status === 'closing' || status === 'closed';
}

/**
 * A set of relays behind one subscribe/publish surface.
 *
 * @example
 * ```typescript
 * const pool = new RelayPool({ relays: ['wss://relay.example.com'] });
 * const sub = pool.subscribe([{ kinds: [1], limit: 10 }]);
 * for await (const item of sub.events) {
 *   if (item.type === 'event') console.log(item.event.content);
 *   if (item.type === 'eose-all') break;
 * }
 * await pool.close();
 * ```
 */
export class RelayPool {
  /** Relay notices, state changes and dropped input, bounded drop-oldest. */
  readonly notices: AsyncChannel<PoolNotice>;

  private readonly config: PoolConfig;
  private readonly transportFactory: TransportFactory;
  private readonly logger: Logger;
  private readonly random: (() => number) | undefined;
  private readonly inbox = new AsyncChannel<InboxMessage>();
  private readonly seen: SeenSet;

  // Consumer-owned state
  private readonly entries = new Map<string, PoolEntry>();
  private readonly subscriptions = new Map<string, SubscriptionRecord>();
  private readonly pending = new Map<number, PendingPublish>();
  private nextToken = 0;

  // Caller-side state
  private readonly activeIds = new Set<string>();
  private shutdown: Promise<void> | undefined;

  /**
   * @param config - Overrides for DEFAULT_POOL_CONFIG; `relays` are added immediately
   * @param options - Transport, logger and jitter source
   * @throws ConfigError if the configuration is invalid
   */
  constructor(config: PoolConfigInput = {}, options: RelayPoolOptions = {}) {
    this.config = resolvePoolConfig(config);
    this.transportFactory = options.transportFactory ?? createWsTransportFactory();
    this.logger = options.logger ?? console;
    this.random = options.random;
    this.seen = new SeenSet(this.config.seenCapacity);
    this.notices = new AsyncChannel<PoolNotice>(this.config.noticeBufferSize);

    this.consume().catch((error: unknown) => {
      this.logger.error('[RelayPool] Consumer loop failed:', errorMessage(error));
    });

    for (const url of this.config.relays) {
      this.inbox.push({ type: 'add', url });
    }
  }

  /**
   * Adds a relay and starts connecting. Adding a known relay does nothing.
   *
   * @throws ConfigError if the URL is not ws:// or wss://
   * @throws {PoolShutdownError} After close()
   */
  addRelay(url: string): void {
    this.assertRunning('add relay');
    this.inbox.push({ type: 'add', url: validateRelayUrl(url, 'url') });
  }

  /**
   * Removes a relay, sending CLOSE for its subscriptions and closing its link.
   */
  removeRelay(url: string): Promise<void> {
    if (this.shutdown) return Promise.reject(new PoolShutdownError('remove relay'));
    return new Promise((resolve, reject) => {
      this.inbox.push({ type: 'remove', url, resolve, reject });
    });
  }

  /**
   * Snapshot of each relay's last observed link state.
   */
  relayStates(): Map<string, RelayLinkState> {
    const states = new Map<string, RelayLinkState>();
    for (const [url, entry] of this.entries) states.set(url, entry.state);
    return states;
  }

  /**
   * Opens a subscription on every relay (or the given subset), including
   * relays that are added later.
   *
   * @throws {PoolError} If `id` belongs to an active subscription
   * @throws {PoolShutdownError} After close()
   */
  subscribe(filters: Filter[], options: SubscribeOptions = {}): PoolSubscription {
    this.assertRunning('subscribe');
    const id = options.id ?? bytesToHex(randomBytes(8));
    if (this.activeIds.has(id)) {
      throw new PoolError(`subscription "${id}" is already active`);
    }
    this.activeIds.add(id);

    const subscription: SubscriptionRecord = {
      id,
      filters: filters.map((filter) => ({ ...filter })),
      relays: options.relays ? new Set(options.relays) : undefined,
      channel: new AsyncChannel<SubscriptionEvent>(),
      sentTo: new Set(),
      eosed: new Set(),
      closedBy: new Set(),
      eoseAllSent: false,
      degraded: false,
    };
    this.inbox.push({ type: 'subscribe', subscription });

    return {
      id,
      events: {
        [Symbol.asyncIterator]: (): AsyncIterator<SubscriptionEvent, undefined> => ({
          next: () => subscription.channel.next(),
          return: async () => {
            this.unsubscribe(id);
            subscription.channel.close();
            return { value: undefined, done: true };
          },
        }),
      },
      unsubscribe: () => this.unsubscribe(id),
    };
  }

  /**
   * Closes a subscription on every relay holding it and ends its stream.
   * Unknown ids, and any call after close(), are ignored.
   */
  unsubscribe(id: string): void {
    if (this.shutdown || !this.activeIds.delete(id)) return;
    this.inbox.push({ type: 'unsubscribe', id });
  }

  /**
   * Sends `event` to every open relay (or the open relays in `relays`) and
   * waits for their OK acknowledgements.
   *
   * @returns One result per relay the event was sent to; relays that do not
   *   answer within the timeout, or drop, are reported as not accepted
   */
  publish(event: SignedEvent, options: PublishOptions = {}): Promise<PublishResult[]> {
    if (this.shutdown) return Promise.reject(new PoolShutdownError('publish'));
    return new Promise((resolve) => {
      this.inbox.push({
        type: 'publish',
        event,
        relays: options.relays ? new Set(options.relays) : undefined,
        timeoutMs: options.timeoutMs ?? this.config.publishTimeoutMs,
        resolve,
      });
    });
  }

  /**
   * Collects stored events until every relay has sent EOSE (or the timeout
   * passes), then closes the subscription.
   */
  async query(filters: Filter[], options: QueryOptions = {}): Promise<SignedEvent[]> {
    const subscription = this.subscribe(filters, { relays: options.relays });
    const timer = setTimeout(
      () => subscription.unsubscribe(),
      options.timeoutMs ?? this.config.publishTimeoutMs
    );

    const events: SignedEvent[] = [];
    try {
      for await (const item of subscription.events) {
        if (item.type === 'event') events.push(item.event);
        else if (item.type === 'eose-all') break;
      }
    } finally {
      clearTimeout(timer);
      subscription.unsubscribe();
    }
    return events;
  }

  /**
   * Shuts the pool down: later calls fail with PoolShutdownError, open
   * subscriptions get CLOSE frames, links close within their close timeout,
   * pending publishes settle and every stream ends.
   */
  close(): Promise<void> {
    this.shutdown ??= new Promise((resolve) => {
      this.inbox.push({ type: 'shutdown', resolve });
    });
    return this.shutdown;
  }

  private assertRunning(operation: string): void {
    if (this.shutdown) throw new PoolShutdownError(operation);
  }

  private async consume(): Promise<void> {
    for await (const message of this.inbox) {
      this.handle(message);
    }
  }

  private handle(message: InboxMessage): void {
    switch (message.type) {
      case 'link':
        this.handleLinkEvent(message.link, message.event);
        break;
      case 'add':
        this.handleAdd(message.url);
        break;
      case 'remove':
        this.handleRemove(message.url).then(message.resolve, message.reject);
        break;
      case 'subscribe':
        this.handleSubscribe(message.subscription);
        break;
      case 'unsubscribe':
        this.handleUnsubscribe(message.id);
        break;
      case 'publish':
        this.handlePublish(message.event, message.relays, message.timeoutMs, message.resolve);
        break;
      case 'publish-timeout':
        this.handlePublishTimeout(message.token);
        break;
      case 'shutdown':
        this.handleShutdown().then(message.resolve, (error: unknown) => {
          this.logger.error('[RelayPool] Shutdown failed:', errorMessage(error));
          message.resolve();
        });
        break;
    }
  }

  private handleAdd(url: string): void {
    if (this.entries.has(url)) return;

    const link = new RelayLink(url, {
      transportFactory: this.transportFactory,
      config: this.config.link,
      logger: this.logger,
      random: this.random,
    });
    const entry: PoolEntry = {
      url,
      link,
      subscriptions: new Set(),
      state: link.getState(),
      down: false,
      exhausted: false,
    };
    this.entries.set(url, entry);
    this.forward(link);
    link.start();
    this.logger.info(`[RelayPool] Added relay ${url}`);

    for (const subscription of this.subscriptions.values()) {
      if (!subscription.relays || subscription.relays.has(url)) {
        this.sendRequest(entry, subscription);
      }
    }
  }

  private async handleRemove(url: string): Promise<void> {
    const entry = this.entries.get(url);
    if (!entry) return;
    this.entries.delete(url);

    for (const id of entry.subscriptions) {
      this.trySend(entry, ['CLOSE', id]);
    }
    for (const id of entry.subscriptions) {
      const subscription = this.subscriptions.get(id);
      if (subscription) this.checkCompletion(subscription);
    }
    this.failPendingPublishes(url, 'relay removed');

    this.logger.info(`[RelayPool] Removed relay ${url}`);
    await entry.link.close();
  }

  private handleSubscribe(subscription: SubscriptionRecord): void {
    this.subscriptions.set(subscription.id, subscription);
    for (const entry of this.entries.values()) {
      if (!subscription.relays || subscription.relays.has(entry.url)) {
        this.sendRequest(entry, subscription);
      }
    }
    this.checkCompletion(subscription);
  }

  private handleUnsubscribe(id: string): void {
    const subscription = this.subscriptions.get(id);
    if (!subscription) return;
    this.subscriptions.delete(id);

    for (const url of subscription.sentTo) {
      const entry = this.entries.get(url);
      if (!entry) continue;
      entry.subscriptions.delete(id);
      this.trySend(entry, ['CLOSE', id]);
    }
    subscription.channel.close();
  }

  private handlePublish(
    event: SignedEvent,
    relays: Set<string> | undefined,
    timeoutMs: number,
    resolve: (results: PublishResult[]) => void
  ): void {
    const targets = [...this.entries.values()].filter(
      (entry) => entry.state.status === 'open' && (!relays || relays.has(entry.url))
    );
    if (targets.length === 0) {
      resolve([]);
      return;
    }

    const token = this.nextToken++;
    const publish: PendingPublish = {
      token,
      event,
      relays: targets.map((entry) => entry.url),
      results: new Map(),
      timer: setTimeout(() => this.inbox.push({ type: 'publish-timeout', token }), timeoutMs),
      resolve,
    };
    this.pending.set(token, publish);

    for (const entry of targets) {
      if (!this.trySend(entry, ['EVENT', event])) {
        publish.results.set(entry.url, {
          relay: entry.url,
          accepted: false,
          message: 'link closed',
        });
      }
    }
    this.settleIfComplete(publish);
  }

  private handlePublishTimeout(token: number): void {
    const publish = this.pending.get(token);
    if (!publish) return;
    for (const relay of publish.relays) {
      if (!publish.results.has(relay)) {
        publish.results.set(relay, { relay, accepted: false, message: 'timed out waiting for OK' });
      }
    }
    this.settleIfComplete(publish);
  }

  private async handleShutdown(): Promise<void> {
    for (const subscription of this.subscriptions.values()) {
      for (const url of subscription.sentTo) {
        const entry = this.entries.get(url);
        if (entry && entry.state.status === 'open') this.trySend(entry, ['CLOSE', subscription.id]);
      }
      subscription.channel.close();
    }
    this.subscriptions.clear();
    this.activeIds.clear();

    for (const url of this.entries.keys()) {
      this.failPendingPublishes(url, 'pool shut down');
    }

    const links = [...this.entries.values()].map((entry) => entry.link);
    this.entries.clear();
    this.seen.clear();

    const results = await Promise.allSettled(links.map((link) => link.close()));
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn('[RelayPool] Link close failed:', errorMessage(result.reason));
      }
    }

    this.logger.info('[RelayPool] Shut down');
    this.notices.close();
    this.inbox.close();
  }

  private handleLinkEvent(link: RelayLink, event: LinkEvent): void {
    const entry = this.entries.get(link.url);
    // events from a removed (or replaced) link
    if (!entry || entry.link !== link) return;

    switch (event.type) {
      case 'state':
        this.handleStateChange(entry, event.state, event.reconnected);
        break;
      case 'exhausted':
        entry.exhausted = true;
        entry.down = true;
        this.notify({ type: 'exhausted', relay: entry.url, attempts: event.attempts });
        this.checkSubscriptionsOf(entry);
        break;
      case 'violation':
        this.notify({ type: 'violation', relay: entry.url, reason: event.reason });
        break;
      case 'message':
        this.handleRelayMessage(entry, event.message);
        break;
    }
  }

  private handleStateChange(entry: PoolEntry, state: RelayLinkState, reconnected: boolean): void {
    entry.state = state;
    this.notify({ type: 'state', relay: entry.url, state });

    if (state.status === 'open') {
      entry.down = false;
      entry.exhausted = false;
      for (const id of entry.subscriptions) {
        const subscription = this.subscriptions.get(id);
        if (subscription) subscription.degraded = false;
      }
      if (reconnected) {
        entry.link.resume(this.replayFrames(entry));
      }
    } else if (state.status === 'faulted') {
      entry.down = true;
      this.failPendingPublishes(entry.url, `link faulted: ${state.reason}`);
      this.checkSubscriptionsOf(entry);
    }
  }

  private replayFrames(entry: PoolEntry): ClientFrame[] {
    const frames: ClientFrame[] = [];
    for (const id of entry.subscriptions) {
      const subscription = this.subscriptions.get(id);
      if (subscription && !subscription.closedBy.has(entry.url)) {
        frames.push(['REQ', id, ...subscription.filters]);
      }
    }
    return frames;
  }

  private handleRelayMessage(entry: PoolEntry, message: RelayMessage): void {
    switch (message.type) {
      case 'EVENT': {
        const subscription = this.subscriptions.get(message.subscriptionId);
        if (!subscription || !entry.subscriptions.has(subscription.id)) return;
        const { event } = message;
        if (this.config.verifyEvents && !verifyEvent(event)) {
          this.logger.warn(`[RelayPool] Dropped event ${event.id} from ${entry.url}: invalid signature`);
          this.notify({ type: 'invalid-signature', relay: entry.url, eventId: event.id });
          return;
        }
        if (!this.seen.add(`${subscription.id}:${event.id}`)) return;
        subscription.channel.push({ type: 'event', relay: entry.url, event });
        break;
      }
      case 'EOSE': {
        const subscription = this.subscriptions.get(message.subscriptionId);
        if (!subscription || !subscription.sentTo.has(entry.url)) return;
        if (subscription.eosed.has(entry.url)) return;
        subscription.eosed.add(entry.url);
        subscription.channel.push({ type: 'eose', relay: entry.url });
        this.checkCompletion(subscription);
        break;
      }
      case 'CLOSED': {
        const subscription = this.subscriptions.get(message.subscriptionId);
        if (!subscription || !subscription.sentTo.has(entry.url)) return;
        subscription.closedBy.add(entry.url);
        entry.subscriptions.delete(subscription.id);
        subscription.channel.push({ type: 'closed', relay: entry.url, message: message.message });
        this.checkCompletion(subscription);
        break;
      }
      case 'OK':
        this.recordAcknowledgement(entry.url, message.eventId, message.accepted, message.message);
        break;
      case 'NOTICE':
        this.logger.info(`[RelayPool] Notice from ${entry.url}: ${message.message}`);
        this.notify({ type: 'notice', relay: entry.url, message: message.message });
        break;
      case 'AUTH':
        this.notify({ type: 'auth', relay: entry.url, challenge: message.challenge });
        break;
    }
  }

  private recordAcknowledgement(
    relay: string,
    eventId: string,
    accepted: boolean,
    message: string
  ): void {
    for (const publish of this.pending.values()) {
      if (
        publish.event.id === eventId &&
        publish.relays.includes(relay) &&
        !publish.results.has(relay)
      ) {
        publish.results.set(relay, { relay, accepted, message });
        this.settleIfComplete(publish);
      }
    }
  }

  private failPendingPublishes(relay: string, message: string): void {
    for (const publish of [...this.pending.values()]) {
      if (publish.relays.includes(relay) && !publish.results.has(relay)) {
        publish.results.set(relay, { relay, accepted: false, message });
        this.settleIfComplete(publish);
      }
    }
  }

  private settleIfComplete(publish: PendingPublish): void {
    if (publish.results.size < publish.relays.length) return;
    clearTimeout(publish.timer);
    this.pending.delete(publish.token);
    publish.resolve(
      publish.relays.map(
        (relay) =>
          publish.results.get(relay) ?? { relay, accepted: false, message: 'no acknowledgement' }
      )
    );
  }

  private sendRequest(entry: PoolEntry, subscription: SubscriptionRecord): void {
    if (this.trySend(entry, ['REQ', subscription.id, ...subscription.filters])) {
      entry.subscriptions.add(subscription.id);
      subscription.sentTo.add(entry.url);
    }
  }

  private trySend(entry: PoolEntry, frame: ClientFrame): boolean {
    try {
      entry.link.send(frame);
      return true;
    } catch (error) {
      this.logger.warn(`[RelayPool] Failed to send ${frame[0]} to ${entry.url}:`, errorMessage(error));
      return false;
    }
  }

  private checkSubscriptionsOf(entry: PoolEntry): void {
    for (const id of entry.subscriptions) {
      const subscription = this.subscriptions.get(id);
      if (subscription) this.checkCompletion(subscription);
    }
  }

  /**
   * Emits the one-shot `eose-all` once every relay the subscription was sent
   * to has sent EOSE, closed it, been removed or exhausted its retries, and
   * `degraded` once none of those relays is usable.
   */
  private checkCompletion(subscription: SubscriptionRecord): void {
    if (!subscription.eoseAllSent) {
      const done = [...subscription.sentTo].every((url) => {
        const entry = this.entries.get(url);
        return (
          subscription.eosed.has(url) ||
          subscription.closedBy.has(url) ||
          !entry ||
          entry.exhausted ||
          entry.state.status === 'closed'
        );
      });
      if (done) {
        subscription.eoseAllSent = true;
        subscription.channel.push({ type: 'eose-all' });
      }
    }

    if (!subscription.degraded && subscription.sentTo.size > 0) {
      const allDown = [...subscription.sentTo].every((url) => isUnavailable(this.entries.get(url)));
      if (allDown) {
        subscription.degraded = true;
        this.logger.warn(`[RelayPool] Subscription ${subscription.id} degraded: no usable relay`);
        subscription.channel.push({ type: 'degraded' });
        this.notify({ type: 'degraded', subscriptionId: subscription.id });
      }
    }
  }

  private forward(link: RelayLink): void {
    const pump = async (): Promise<void> => {
      for await (const event of link.events) {
        this.inbox.push({ type: 'link', link, event });
      }
    };
    pump().catch((error: unknown) => {
      this.logger.error(`[RelayPool] Event forwarding from ${link.url} failed:`, errorMessage(error));
    });
  }

  private notify(notice: PoolNotice): void {
    this.notices.push(notice);
  }
}
