/**
 * One supervised connection to one relay.
 *
 * A supervisor loop owns the connection: it opens a transport, runs a session
 * (a send loop draining the outbox and a receive loop parsing frames), and on
 * disconnect schedules a reconnect with jittered exponential backoff. The
 * link reports what happens on its `events` channel and never touches pool
 * state.
 *
 * After a reconnect the outbox is held until the owner calls resume() with
 * the frames the relay must see again (its subscriptions), so those go out
 * before anything queued while the link was down.
 */

import { resolveRelayLinkConfig, type RelayLinkConfig } from '../config.js';
import { LinkClosedError, LinkFaultedError } from '../errors.js';
import { encodeClientFrame, parseRelayMessage, type ClientFrame } from '../protocol/frames.js';
import type { RelayTransport, TransportFactory } from '../transport/types.js';
import type { LinkEvent, Logger, RelayLinkState } from '../types.js';
import { computeBackoffDelay, delay, settleWithin } from '../utils/backoff.js';
import { AsyncChannel } from '../utils/channel.js';

/**
 * Construction options for RelayLink.
 */
export interface RelayLinkOptions {
  /** Opens the underlying connection */
  transportFactory: TransportFactory;
  /** Overrides for DEFAULT_RELAY_LINK_CONFIG */
  config?: Partial<RelayLinkConfig>;
  /** Logger (default: console) */
  logger?: Logger;
  /** Jitter source returning values in [0, 1) (default: Math.random) */
  random?: () => number;
}

interface ConnectWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

function requestedSubscription(frame: ClientFrame): string | undefined {
  const [type, id] = frame;
  return type === 'REQ' && typeof id === 'string' ? id : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RelayLink {
  readonly url: string;
  /** Everything the link reports, in order. Ends after close(). */
  readonly events = new AsyncChannel<LinkEvent>();

  private readonly config: RelayLinkConfig;
  private readonly transportFactory: TransportFactory;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly outbox = new AsyncChannel<ClientFrame>();
  private readonly lifetime = new AbortController();

  private state: RelayLinkState = { status: 'connecting' };
  private supervisor: Promise<void> | undefined;
  private closing: Promise<void> | undefined;
  private transport: RelayTransport | undefined;
  private sending: Promise<void> | undefined;
  private attempts = 0;
  private sessions = 0;
  private connectWaiters: ConnectWaiter[] = [];
  private pendingResume: ((replay: ClientFrame[] | undefined) => void) | undefined;
  private pendingReset: (() => void) | undefined;

  /**
   * @throws ConfigError if the link configuration is invalid
   */
  constructor(url: string, options: RelayLinkOptions) {
    this.url = url;
    this.transportFactory = options.transportFactory;
    this.config = resolveRelayLinkConfig(options.config);
    this.logger = options.logger ?? console;
    this.random = options.random ?? Math.random;
  }

  /** Last state the link entered. */
  getState(): RelayLinkState {
    return this.state;
  }

  /** True while the link has stopped retrying and waits for reset(). */
  get isExhausted(): boolean {
    return this.pendingReset !== undefined;
  }

  /**
   * Starts the supervisor. Idempotent; does nothing after close().
   */
  start(): void {
    if (this.supervisor || this.lifetime.signal.aborted) return;
    this.supervisor = this.run().catch((error: unknown) => {
      this.logger.error(`[RelayLink] ${this.url} supervisor stopped:`, errorMessage(error));
    });
  }

  /**
   * Starts the link if needed and waits until it is open. An exhausted link
   * is reset first.
   *
   * @throws {LinkFaultedError} If the retry ceiling is reached first
   * @throws {LinkClosedError} If the link is closed first
   */
  connect(): Promise<void> {
    if (this.lifetime.signal.aborted) {
      return Promise.reject(new LinkClosedError(this.url));
    }
    if (this.state.status === 'open') return Promise.resolve();

    const opened = new Promise<void>((resolve, reject) => {
      this.connectWaiters.push({ resolve, reject });
    });
    this.reset();
    this.start();
    return opened;
  }

  /**
   * Queues a frame. Frames queued while connecting or reconnecting go out
   * once a session is open, in order.
   *
   * @throws {LinkClosedError} If the link has been closed
   */
  send(frame: ClientFrame): void {
    if (this.lifetime.signal.aborted) {
      throw new LinkClosedError(this.url);
    }
    this.outbox.push(frame);
  }

  /**
   * Releases the outbox after a reconnect. `replay` is sent first; queued
   * REQ frames for the same subscription ids are dropped as duplicates.
   * Ignored when the link is not waiting for it.
   */
  resume(replay: ClientFrame[]): void {
    const pending = this.pendingResume;
    this.pendingResume = undefined;
    pending?.(replay);
  }

  /**
   * Restarts reconnect attempts after exhaustion. Ignored otherwise.
   */
  reset(): void {
    const pending = this.pendingReset;
    this.pendingReset = undefined;
    pending?.();
  }

  /**
   * Closes the link for good: stops accepting frames, flushes the outbox
   * best-effort, closes the transport and cancels any handshake or backoff.
   * Each wait is bounded by `timeoutMs`.
   */
  close(timeoutMs: number = this.config.closeTimeoutMs): Promise<void> {
    this.closing ??= this.shutdown(timeoutMs);
    return this.closing;
  }

  private async shutdown(timeoutMs: number): Promise<void> {
    this.setState({ status: 'closing' });
    this.outbox.close();
    this.lifetime.abort(new LinkClosedError(this.url));

    if (this.sending) {
      await settleWithin(this.sending, timeoutMs);
    }

    const transport = this.transport;
    if (transport) {
      try {
        if (!(await settleWithin(transport.close(), timeoutMs))) {
          this.logger.warn(`[RelayLink] ${this.url} close timed out after ${timeoutMs}ms`);
        }
      } catch (error) {
        this.logger.warn(`[RelayLink] ${this.url} close failed:`, errorMessage(error));
      }
    }

    if (this.supervisor) {
      await settleWithin(this.supervisor, timeoutMs);
    }

    this.setState({ status: 'closed' });
    this.rejectConnectWaiters(new LinkClosedError(this.url));
    this.logger.info(`[RelayLink] ${this.url} closed`);
    this.events.close();
  }

  private async run(): Promise<void> {
    const signal = this.lifetime.signal;

    while (!signal.aborted) {
      this.setState({ status: 'connecting' });

      let transport: RelayTransport;
      try {
        transport = await this.openTransport(signal);
      } catch (error) {
        if (signal.aborted) return;
        this.fault(`connect failed: ${errorMessage(error)}`);
        if (!(await this.backoff(signal))) return;
        continue;
      }

      if (signal.aborted) {
        await transport.close();
        return;
      }

      const reason = await this.runSession(transport, signal);
      if (signal.aborted) return;
      this.fault(reason);
      if (!(await this.backoff(signal))) return;
    }
  }

  private async openTransport(signal: AbortSignal): Promise<RelayTransport> {
    const attempt = new AbortController();
    const onAbort = (): void => attempt.abort(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => {
      attempt.abort(new Error(`connect timed out after ${this.config.connectTimeoutMs}ms`));
    }, this.config.connectTimeoutMs);

    try {
      return await this.transportFactory(this.url, attempt.signal);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async runSession(transport: RelayTransport, lifetime: AbortSignal): Promise<string> {
    const session = new AbortController();
    const endSession = (): void => session.abort();
    lifetime.addEventListener('abort', endSession, { once: true });

    const reconnected = this.sessions > 0;
    this.sessions++;
    this.attempts = 0;
    this.transport = transport;
    this.setState({ status: 'open' }, reconnected);
    this.logger.info(`[RelayLink] ${this.url} ${reconnected ? 'reconnected' : 'connected'}`);
    for (const waiter of this.connectWaiters.splice(0)) waiter.resolve();

    this.sending = this.sendLoop(transport, reconnected, session.signal);
    const reason = await this.receiveLoop(transport);

    session.abort();
    lifetime.removeEventListener('abort', endSession);
    await this.sending;
    this.transport = undefined;
    return reason;
  }

  private async sendLoop(
    transport: RelayTransport,
    reconnected: boolean,
    signal: AbortSignal
  ): Promise<void> {
    if (reconnected) {
      const replay = await this.waitForResume(signal);
      if (replay === undefined) return;

      const replayed = new Set<string>();
      for (const frame of replay) {
        const id = requestedSubscription(frame);
        if (id !== undefined) replayed.add(id);
      }
      this.outbox.retain((frame) => {
        const id = requestedSubscription(frame);
        return id === undefined || !replayed.has(id);
      });

      for (const frame of replay) {
        if (!this.transmit(transport, frame)) return;
      }
    }

    for (;;) {
      const next = await this.outbox.next(signal);
      if (next.done) return;
      if (!this.transmit(transport, next.value)) {
        this.outbox.unshift(next.value);
        return;
      }
    }
  }

  private transmit(transport: RelayTransport, frame: ClientFrame): boolean {
    try {
      transport.send(encodeClientFrame(frame));
      return true;
    } catch (error) {
      this.logger.warn(`[RelayLink] ${this.url} send failed:`, errorMessage(error));
      return false;
    }
  }

  private async receiveLoop(transport: RelayTransport): Promise<string> {
    for (;;) {
      let raw: string | null;
      try {
        raw = await transport.nextFrame();
      } catch (error) {
        return errorMessage(error);
      }
      if (raw === null) return 'connection closed';

      const parsed = parseRelayMessage(raw);
      if (parsed.ok) {
        this.events.push({ type: 'message', message: parsed.message });
      } else {
        this.logger.warn(`[RelayLink] ${this.url} protocol violation: ${parsed.reason}`);
        this.events.push({ type: 'violation', reason: parsed.reason, raw });
      }
    }
  }

  private async backoff(signal: AbortSignal): Promise<boolean> {
    if (this.attempts >= this.config.maxRetries) {
      const attempts = this.attempts;
      this.logger.error(`[RelayLink] ${this.url} giving up after ${attempts} reconnect attempts`);
      this.events.push({ type: 'exhausted', attempts });
      this.rejectConnectWaiters(
        new LinkFaultedError(this.url, `no connection after ${attempts} retries`)
      );
      await this.waitForReset(signal);
      this.attempts = 0;
      return !signal.aborted;
    }

    const wait = computeBackoffDelay(this.attempts, this.config, this.random);
    this.attempts++;
    this.logger.debug(
      `[RelayLink] ${this.url} retrying in ${wait}ms (${this.attempts}/${this.config.maxRetries})`
    );
    await delay(wait, signal);
    return !signal.aborted;
  }

  private waitForResume(signal: AbortSignal): Promise<ClientFrame[] | undefined> {
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve(undefined);
        return;
      }
      const onAbort = (): void => {
        if (this.pendingResume === settle) this.pendingResume = undefined;
        resolve(undefined);
      };
      const settle = (replay: ClientFrame[] | undefined): void => {
        signal.removeEventListener('abort', onAbort);
        resolve(replay);
      };
      this.pendingResume = settle;
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private waitForReset(signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const onAbort = (): void => {
        if (this.pendingReset === settle) this.pendingReset = undefined;
        resolve();
      };
      const settle = (): void => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      };
      this.pendingReset = settle;
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private fault(reason: string): void {
    this.logger.warn(`[RelayLink] ${this.url} faulted: ${reason}`);
    this.setState({ status: 'faulted', reason });
  }

  private setState(state: RelayLinkState, reconnected = false): void {
    this.state = state;
    this.events.push({ type: 'state', state, reconnected });
  }

  private rejectConnectWaiters(error: Error): void {
    for (const waiter of this.connectWaiters.splice(0)) waiter.reject(error);
  }
}
