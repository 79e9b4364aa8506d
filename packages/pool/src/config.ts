/**
 * Pool and relay link configuration: defaults, validation and environment
 * loading.
 */

import { ConfigError } from './errors.js';

/**
 * Connection behavior of one relay link.
 */
export interface RelayLinkConfig {
  /** Handshake timeout in milliseconds (default: 10000) */
  connectTimeoutMs: number;
  /** Reconnect attempts before the link reports exhaustion (default: 8) */
  maxRetries: number;
  /** First reconnect delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Reconnect delay cap in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Fraction of each delay removed at random, 0 to 1 (default: 0.3) */
  jitter: number;
  /** Bound on a graceful close in milliseconds (default: 2000) */
  closeTimeoutMs: number;
}

/**
 * Configuration for RelayPool.
 */
export interface PoolConfig {
  /** Relay URLs (ws:// or wss://) added at construction (default: none) */
  relays: string[];
  /** Subscription/event pairs remembered for deduplication (default: 10000) */
  seenCapacity: number;
  /** Wait for relay OK acknowledgements in milliseconds (default: 10000) */
  publishTimeoutMs: number;
  /** Drop events whose identifier or signature does not verify (default: true) */
  verifyEvents: boolean;
  /** Buffered pool notices before the oldest is dropped (default: 1000) */
  noticeBufferSize: number;
  /** Settings applied to every relay link */
  link: RelayLinkConfig;
}

/**
 * Partial PoolConfig accepted by the pool constructor.
 */
export interface PoolConfigInput extends Partial<Omit<PoolConfig, 'link'>> {
  link?: Partial<RelayLinkConfig>;
}

export const DEFAULT_RELAY_LINK_CONFIG: Readonly<RelayLinkConfig> = {
  connectTimeoutMs: 10000,
  maxRetries: 8,
  baseDelayMs: 500,
  maxDelayMs: 30000,
  jitter: 0.3,
  closeTimeoutMs: 2000,
};

export const DEFAULT_POOL_CONFIG: Readonly<PoolConfig> = {
  relays: [],
  seenCapacity: 10000,
  publishTimeoutMs: 10000,
  verifyEvents: true,
  noticeBufferSize: 1000,
  link: DEFAULT_RELAY_LINK_CONFIG,
};

function requirePositiveInteger(variable: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError(variable, `must be a positive integer, got ${value}`);
  }
}

/**
 * Checks that `url` is an absolute ws:// or wss:// URL.
 *
 * @returns The URL unchanged
 * @throws ConfigError if the URL cannot be parsed or uses another scheme
 */
export function validateRelayUrl(url: string, variable = 'relays'): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(variable, `invalid relay URL "${url}"`);
  }
  if (parsed.protocol !== 'ws:' && parsed.protocol !== 'wss:') {
    throw new ConfigError(variable, `relay URL must use ws:// or wss://, got "${url}"`);
  }
  return url;
}

/**
 * Merges link settings over the defaults and validates them.
 *
 * @throws ConfigError on any invalid value
 */
export function resolveRelayLinkConfig(input: Partial<RelayLinkConfig> = {}): RelayLinkConfig {
  const config: RelayLinkConfig = { ...DEFAULT_RELAY_LINK_CONFIG, ...input };

  requirePositiveInteger('connectTimeoutMs', config.connectTimeoutMs);
  requirePositiveInteger('baseDelayMs', config.baseDelayMs);
  requirePositiveInteger('maxDelayMs', config.maxDelayMs);
  requirePositiveInteger('closeTimeoutMs', config.closeTimeoutMs);
  if (!Number.isSafeInteger(config.maxRetries) || config.maxRetries < 0) {
    throw new ConfigError('maxRetries', `must be a non-negative integer, got ${config.maxRetries}`);
  }
  if (config.maxDelayMs < config.baseDelayMs) {
    throw new ConfigError(
      'maxDelayMs',
      `must be at least baseDelayMs (${config.baseDelayMs}), got ${config.maxDelayMs}`
    );
  }
  if (!(config.jitter >= 0 && config.jitter <= 1)) {
    throw new ConfigError('jitter', `must be between 0 and 1, got ${config.jitter}`);
  }
  return config;
}

/**
 * Merges pool settings over the defaults and validates them.
 *
 * @throws ConfigError on any invalid value
 */
export function resolvePoolConfig(input: PoolConfigInput = {}): PoolConfig {
  const { link, ...rest } = input;
  const config: PoolConfig = {
    ...DEFAULT_POOL_CONFIG,
    ...rest,
    link: resolveRelayLinkConfig(link),
  };

  config.relays = config.relays.map((url) => validateRelayUrl(url));
  requirePositiveInteger('seenCapacity', config.seenCapacity);
  requirePositiveInteger('publishTimeoutMs', config.publishTimeoutMs);
  requirePositiveInteger('noticeBufferSize', config.noticeBufferSize);
  return config;
}

function parseIntegerEnv(env: NodeJS.ProcessEnv, variable: string): number | undefined {
  const raw = env[variable];
  if (raw === undefined || raw === '') return undefined;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(variable, `must be a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

function parseNumberEnv(env: NodeJS.ProcessEnv, variable: string): number | undefined {
  const raw = env[variable];
  if (raw === undefined || raw === '') return undefined;
  if (!/^\d+(\.\d+)?$/.test(raw.trim())) {
    throw new ConfigError(variable, `must be a non-negative number, got "${raw}"`);
  }
  return Number.parseFloat(raw);
}

function parseBooleanEnv(env: NodeJS.ProcessEnv, variable: string): boolean | undefined {
  const raw = env[variable];
  if (raw === undefined || raw === '') return undefined;
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigError(variable, `must be "true" or "false", got "${raw}"`);
  }
}

/**
 * Load pool configuration from environment variables.
 *
 * All variables are optional:
 * - NOSTR_RELAYS: Comma-separated relay URLs
 * - POOL_SEEN_CAPACITY: Deduplication window size
 * - POOL_PUBLISH_TIMEOUT_MS: Wait for OK acknowledgements
 * - POOL_VERIFY_EVENTS: "true" or "false"
 * - POOL_NOTICE_BUFFER_SIZE: Buffered pool notices
 * - RELAY_CONNECT_TIMEOUT_MS, RELAY_MAX_RETRIES, RELAY_BASE_DELAY_MS,
 *   RELAY_MAX_DELAY_MS, RELAY_CLOSE_TIMEOUT_MS: Link connection settings
 * - RELAY_JITTER: Fraction of each reconnect delay randomized, 0 to 1
 *
 * @returns Validated PoolConfig
 * @throws ConfigError if any variable is malformed
 */
export function loadPoolConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const input: PoolConfigInput = {};
  const link: Partial<RelayLinkConfig> = {};

  const rawRelays = env['NOSTR_RELAYS'];
  if (rawRelays !== undefined && rawRelays.trim() !== '') {
    input.relays = rawRelays
      .split(',')
      .map((url) => url.trim())
      .filter((url) => url.length > 0)
      .map((url) => validateRelayUrl(url, 'NOSTR_RELAYS'));
  }

  const seenCapacity = parseIntegerEnv(env, 'POOL_SEEN_CAPACITY');
  if (seenCapacity !== undefined) input.seenCapacity = seenCapacity;
  const publishTimeoutMs = parseIntegerEnv(env, 'POOL_PUBLISH_TIMEOUT_MS');
  if (publishTimeoutMs !== undefined) input.publishTimeoutMs = publishTimeoutMs;
  const verifyEvents = parseBooleanEnv(env, 'POOL_VERIFY_EVENTS');
  if (verifyEvents !== undefined) input.verifyEvents = verifyEvents;
  const noticeBufferSize = parseIntegerEnv(env, 'POOL_NOTICE_BUFFER_SIZE');
  if (noticeBufferSize !== undefined) input.noticeBufferSize = noticeBufferSize;

  const connectTimeoutMs = parseIntegerEnv(env, 'RELAY_CONNECT_TIMEOUT_MS');
  if (connectTimeoutMs !== undefined) link.connectTimeoutMs = connectTimeoutMs;
  const maxRetries = parseIntegerEnv(env, 'RELAY_MAX_RETRIES');
  if (maxRetries !== undefined) link.maxRetries = maxRetries;
  const baseDelayMs = parseIntegerEnv(env, 'RELAY_BASE_DELAY_MS');
  if (baseDelayMs !== undefined) link.baseDelayMs = baseDelayMs;
  const maxDelayMs = parseIntegerEnv(env, 'RELAY_MAX_DELAY_MS');
  if (maxDelayMs !== undefined) link.maxDelayMs = maxDelayMs;
  const jitter = parseNumberEnv(env, 'RELAY_JITTER');
  if (jitter !== undefined) link.jitter = jitter;
  const closeTimeoutMs = parseIntegerEnv(env, 'RELAY_CLOSE_TIMEOUT_MS');
  if (closeTimeoutMs !== undefined) link.closeTimeoutMs = closeTimeoutMs;

  input.link = link;
  return resolvePoolConfig(input);
}
