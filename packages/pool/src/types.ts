/**
 * Shared types for relay links and the pool.
 */

import type { SignedEvent } from '@nostrand/core';
import type { Filter } from 'nostr-tools/filter';
import type { RelayMessage } from './protocol/frames.js';

export type { Filter };

/**
 * Minimal logger surface. `console` satisfies it.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Connection state of one relay link.
 */
export type RelayLinkState =
  | { status: 'connecting' }
  | { status: 'open' }
  | { status: 'closing' }
  | { status: 'closed' }
  | { status: 'faulted'; reason: string };

export type RelayLinkStatus = RelayLinkState['status'];

/**
 * What a link reports to its owner.
 *
 * `reconnected` is set on an `open` state that follows an earlier session;
 * the link then holds its send queue until resume() is called.
 */
export type LinkEvent =
  | { type: 'state'; state: RelayLinkState; reconnected: boolean }
  | { type: 'message'; message: RelayMessage }
  | { type: 'violation'; reason: string; raw: string }
  | { type: 'exhausted'; attempts: number };

/**
 * Items delivered on a subscription stream.
 */
export type SubscriptionEvent =
  | { type: 'event'; relay: string; event: SignedEvent }
  | { type: 'eose'; relay: string }
  | { type: 'eose-all' }
  | { type: 'closed'; relay: string; message: string }
  | { type: 'degraded' };

/**
 * Pool-level notices not tied to one subscription stream.
 */
export type PoolNotice =
  | { type: 'notice'; relay: string; message: string }
  | { type: 'auth'; relay: string; challenge: string }
  | { type: 'violation'; relay: string; reason: string }
  | { type: 'state'; relay: string; state: RelayLinkState }
  | { type: 'exhausted'; relay: string; attempts: number }
  | { type: 'degraded'; subscriptionId: string }
  | { type: 'invalid-signature'; relay: string; eventId: string };

/**
 * Outcome of a publish on one relay.
 */
export interface PublishResult {
  relay: string;
  accepted: boolean;
  message: string;
}
