/**
 * Error classes for @nostrand/pool.
 */

import { NostrandError } from '@nostrand/core';

/**
 * Error thrown on pool misuse, such as reusing an active subscription id.
 */
export class PoolError extends NostrandError {
  constructor(message: string, code = 'POOL_ERROR', cause?: Error) {
    super(message, code, cause);
    this.name = 'PoolError';
  }
}

/**
 * Error thrown when a frame is sent on a link that has been closed for good.
 */
export class LinkClosedError extends PoolError {
  constructor(public readonly url: string) {
    super(`link to ${url} is closed`, 'LINK_CLOSED');
    this.name = 'LinkClosedError';
  }
}

/**
 * Error thrown when a link gives up connecting after its retry ceiling.
 */
export class LinkFaultedError extends PoolError {
  constructor(
    public readonly url: string,
    message: string,
    cause?: Error
  ) {
    super(`link to ${url} faulted: ${message}`, 'LINK_FAULTED', cause);
    this.name = 'LinkFaultedError';
  }
}

/**
 * Error thrown for operations attempted after the pool was closed.
 */
export class PoolShutdownError extends PoolError {
  constructor(operation: string) {
    super(`cannot ${operation}: pool is shut down`, 'POOL_SHUTDOWN');
    this.name = 'PoolShutdownError';
  }
}

/**
 * Error thrown when configuration is invalid.
 * Includes the variable (or option) name and the validation failure.
 */
export class ConfigError extends NostrandError {
  constructor(
    public readonly variable: string,
    message: string
  ) {
    super(`${variable}: ${message}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}
