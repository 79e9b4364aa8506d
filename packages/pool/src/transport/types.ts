/**
 * Capability interface every relay transport implements. RelayLink is written
 * once against it; concrete transports differ only in the socket they wrap.
 */
export interface RelayTransport {
  /**
   * Sends one text frame.
   *
   * @throws Error if the connection is no longer open
   */
  send(frame: string): void;

  /**
   * Waits for the next text frame. Resolves null once the connection has
   * closed and every received frame has been returned.
   */
  nextFrame(): Promise<string | null>;

  /** Closes the connection; resolves when it is closed. */
  close(): Promise<void>;
}

/**
 * Opens a transport to `url`, resolving once the handshake completes.
 * Rejects if the handshake fails or `signal` aborts first.
 */
export type TransportFactory = (url: string, signal: AbortSignal) => Promise<RelayTransport>;

export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('connection aborted');
}
