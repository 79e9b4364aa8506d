/**
 * @nostrand/pool
 *
 * Relay connections for Nostr clients: supervised links with reconnect and
 * a pool that merges, deduplicates and fans out subscriptions and publishes.
 */

export const VERSION = '0.1.0';

// Error classes
export {
  PoolError,
  LinkClosedError,
  LinkFaultedError,
  PoolShutdownError,
  ConfigError,
} from './errors.js';

// TypeScript interfaces
export type {
  Filter,
  Logger,
  RelayLinkState,
  RelayLinkStatus,
  LinkEvent,
  SubscriptionEvent,
  PoolNotice,
  PublishResult,
} from './types.js';

// Configuration
export {
  DEFAULT_RELAY_LINK_CONFIG,
  DEFAULT_POOL_CONFIG,
  resolveRelayLinkConfig,
  resolvePoolConfig,
  loadPoolConfigFromEnv,
  validateRelayUrl,
  type RelayLinkConfig,
  type PoolConfig,
  type PoolConfigInput,
} from './config.js';

// Wire frames
export {
  encodeClientFrame,
  parseRelayMessage,
  type ClientFrame,
  type RelayMessage,
  type ParseResult,
} from './protocol/frames.js';

// Transports
export type { RelayTransport, TransportFactory } from './transport/types.js';
export { createWsTransportFactory, type WsTransportOptions } from './transport/WsTransport.js';
export {
  createBrowserTransportFactory,
  type BrowserWebSocketLike,
  type BrowserWebSocketConstructor,
  type BrowserSocketEvent,
} from './transport/BrowserTransport.js';
export {
  MemoryRelay,
  createMemoryTransportFactory,
  type MemoryRelayOptions,
} from './transport/MemoryTransport.js';

// Links and pool
export { RelayLink, type RelayLinkOptions } from './relay/RelayLink.js';
export { SeenSet } from './pool/SeenSet.js';
export {
  RelayPool,
  type RelayPoolOptions,
  type SubscribeOptions,
  type PublishOptions,
  type QueryOptions,
  type PoolSubscription,
} from './pool/RelayPool.js';
export { AsyncChannel } from './utils/channel.js';
export { computeBackoffDelay, type BackoffOptions } from './utils/backoff.js';
