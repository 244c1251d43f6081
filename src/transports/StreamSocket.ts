/**
 * Generic non-blocking socket interfaces.
 *
 * The connection layer is written against these so that it can own partial
 * reads, partial writes and backpressure itself. Implementations report
 * failures by throwing `SocketError` with an errno-style name.
 */

import type { Pollable } from '../reactor.ts';

/**
 * A connected stream socket.
 */
export interface StreamSocket extends Pollable {
  /**
   * Receive the next available bytes.
   *
   * Returns an empty buffer at end of stream. Throws `SocketError('EAGAIN')`
   * when nothing is available yet.
   */
  recv(): Buffer;

  /**
   * Send as much of `data` as the socket accepts right now.
   *
   * Returns the number of bytes accepted. Throws `SocketError('EAGAIN')` when
   * the socket cannot accept anything yet, `SocketError('EPIPE')` once the
   * peer is gone and `SocketError('EBADF')` after `close()`.
   */
  send(data: Buffer): number;

  /**
   * Close the socket. Further calls are no-ops.
   */
  close(): void;
}

/**
 * A bound, listening socket.
 */
export interface ListenSocket extends Pollable {
  /**
   * Accept one pending connection, or return null if there is none.
   */
  accept(): StreamSocket | null;

  /**
   * Stop listening and release the bound path.
   */
  close(): Promise<void>;
}

/**
 * Binds a listening socket at a filesystem path.
 */
export type ListenSocketFactory = (path: string, backlog: number) => Promise<ListenSocket>;
