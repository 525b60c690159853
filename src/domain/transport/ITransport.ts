/**
 * Transport Interface
 *
 * The contract the pool needs from whatever actually performs I/O to a
 * destination. Abstracts the wire client from connection bookkeeping.
 */

export interface TransportHandle {
  close(): void | Promise<void>;
}

export interface Transport<H extends TransportHandle> {
  /**
   * Open a handle to a destination. `keepAliveMs` is the idle threshold the
   * pool reaps at, passed on so the transport can time out its own sockets.
   */
  open(destination: string, keepAliveMs: number): H | Promise<H>;

  /**
   * True when the error means the peer closed or reset the connection, or
   * refused a connect. A previously working connection then gets one reconnect.
   */
  isConnectionReset(error: unknown): boolean;
}

export type ConnectionWork<H, R> = (handle: H) => Promise<R>;
