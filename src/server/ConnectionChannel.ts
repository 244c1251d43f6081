/**
 * One accepted client connection.
 *
 * Owns the inbound partial-frame buffer and the outbound send queue. Reads
 * happen one per readiness event; writes are flushed by a single loop per
 * connection that pauses on backpressure instead of spinning.
 */

import createDebug from 'debug';
import { decodeFrame, encodeFrame, splitFrames } from '../codec.ts';
import { SocketError, isRetryableSocketError } from '../errors.ts';
import type { Reactor, FdHandle } from '../reactor.ts';
import type { RequestTask } from '../RequestRouter.ts';
import type { StreamSocket } from '../transports/StreamSocket.ts';
import type { ClientConnection } from '../types.ts';
import { parseRequestFrame } from '../validation.ts';
import { WebRequest } from '../WebRequest.ts';

const debug = createDebug('api-server:connection');

const EMPTY = Buffer.alloc(0);

let nextUid = 1;

/**
 * The listener that tracks this connection.
 */
export interface ConnectionOwner {
  popClient(uid: number): void;
}

/**
 * Where decoded requests go.
 */
export interface RequestSink {
  submit(task: RequestTask): void;
}

export interface ConnectionChannelOptions {
  /** Retryable send failures tolerated per stall before closing. */
  sendRetries: number;
  /** Pause between send retries in milliseconds. */
  sendRetryPauseMs: number;
}

export class ConnectionChannel implements ClientConnection {
  readonly uid = nextUid++;

  private _owner: ConnectionOwner;
  private _socket: StreamSocket;
  private _reactor: Reactor;
  private _sink: RequestSink;
  private _options: ConnectionChannelOptions;

  private _fdHandle: FdHandle | null;
  private _partialData: Buffer = EMPTY;
  private _sendBuffer: Buffer = EMPTY;
  private _isSendingData = false;

  constructor(
    owner: ConnectionOwner,
    socket: StreamSocket,
    reactor: Reactor,
    sink: RequestSink,
    options: ConnectionChannelOptions
  ) {
    this._owner = owner;
    this._socket = socket;
    this._reactor = reactor;
    this._sink = sink;
    this._options = options;

    this._fdHandle = this._reactor.registerFd(this._socket, () => this.onReadable());
    debug('New connection established (uid=%d)', this.uid);
  }

  /**
   * Whether a flush loop is currently scheduled or running.
   */
  get isSending(): boolean {
    return this._isSendingData;
  }

  /**
   * Bytes queued but not yet accepted by the socket.
   */
  get pendingBytes(): number {
    return this._sendBuffer.length;
  }

  isClosed(): boolean {
    return this._fdHandle === null;
  }

  /**
   * Handle one readiness event: a single non-blocking receive.
   */
  onReadable(): void {
    if (this.isClosed()) return;

    let data: Buffer;
    try {
      data = this._socket.recv();
    } catch (err) {
      // A bad descriptor reads as end of stream; anything else is retried on
      // the next readiness event.
      if (err instanceof SocketError && err.errno === 'EBADF') {
        data = EMPTY;
      } else {
        if (!isRetryableSocketError(err)) {
          debug('recv failed (uid=%d): %o', this.uid, err);
        }
        return;
      }
    }

    if (data.length === 0) {
      this.close();
      return;
    }

    const { frames, rest } = splitFrames(this._partialData, data);
    this._partialData = rest;

    for (const frame of frames) {
      debug('Request received (uid=%d): %s', this.uid, frame);
      let request: WebRequest;
      try {
        request = new WebRequest(this, parseRequestFrame(decodeFrame(frame)));
      } catch (err) {
        debug('Error decoding request %s: %o', frame, err);
        continue;
      }
      this._sink.submit({ connection: this, request });
    }
  }

  /**
   * Queue a value for delivery. Never blocks; no-op once closed.
   */
  enqueue(value: unknown): void {
    if (this.isClosed()) {
      debug('Discarding data for closed connection (uid=%d)', this.uid);
      return;
    }
    this._sendBuffer = Buffer.concat([this._sendBuffer, encodeFrame(value)]);
    if (!this._isSendingData) {
      this._isSendingData = true;
      this._reactor.registerCallback(() => this._startFlush());
    }
  }

  /**
   * Send the queued bytes, pausing on backpressure.
   *
   * Resolves once the queue is empty or the connection has been closed.
   */
  async flush(): Promise<void> {
    let retries = this._options.sendRetries;
    while (this._sendBuffer.length > 0 && !this.isClosed()) {
      let sent: number;
      try {
        sent = this._socket.send(this._sendBuffer);
      } catch (err) {
        if (isRetryableSocketError(err) && retries > 0) {
          retries--;
          await this._reactor.pause(this._reactor.monotonic() + this._options.sendRetryPauseMs);
          continue;
        }
        debug('send failed (uid=%d): %o', this.uid, err);
        sent = 0;
      }

      retries = this._options.sendRetries;
      if (sent > 0) {
        this._sendBuffer = this._sendBuffer.subarray(sent);
      } else {
        debug('Error sending server data, closing socket (uid=%d)', this.uid);
        this.close();
      }
    }
    this._isSendingData = false;
  }

  /**
   * Close the connection. Safe to call more than once.
   */
  close(): void {
    const handle = this._fdHandle;
    if (handle === null) return;
    this._fdHandle = null;

    debug('Client connection closed (uid=%d)', this.uid);
    this._reactor.unregisterFd(handle);
    try {
      this._socket.close();
    } catch (err) {
      debug('socket close failed (uid=%d): %o', this.uid, err);
    }
    this._sendBuffer = EMPTY;
    this._partialData = EMPTY;
    this._owner.popClient(this.uid);
  }

  private _startFlush(): void {
    this.flush().catch((err) => {
      debug('flush failed (uid=%d): %O', this.uid, err);
      this._isSendingData = false;
      this.close();
    });
  }
}
