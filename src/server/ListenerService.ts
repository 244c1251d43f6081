/**
 * Listening socket and connection table.
 */

import { unlink } from 'node:fs/promises';
import createDebug from 'debug';
import { getErrorCode } from '../errors.ts';
import type { FdHandle, Reactor } from '../reactor.ts';
import type { ListenSocket, ListenSocketFactory } from '../transports/StreamSocket.ts';
import type { StartArgs } from '../types.ts';
import { ConnectionChannel } from './ConnectionChannel.ts';
import type { ConnectionChannelOptions, ConnectionOwner, RequestSink } from './ConnectionChannel.ts';

const debug = createDebug('api-server:listener');

export interface ListenerServiceOptions extends ConnectionChannelOptions {
  listenBacklog: number;
  listenSocketFactory: ListenSocketFactory;
}

/**
 * Remove a stale socket file. A missing file is fine; anything else is not.
 */
export async function removeSocketFile(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if (getErrorCode(err) === 'ENOENT') return;
    debug('Unable to delete socket file %s: %o', path, err);
    throw err;
  }
}

export class ListenerService implements ConnectionOwner {
  private _reactor: Reactor;
  private _sink: RequestSink;
  private _options: ListenerServiceOptions;

  private _socket: ListenSocket | null = null;
  private _fdHandle: FdHandle | null = null;
  private _closed = false;
  private _clients = new Map<number, ConnectionChannel>();

  constructor(reactor: Reactor, sink: RequestSink, options: ListenerServiceOptions) {
    this._reactor = reactor;
    this._sink = sink;
    this._options = options;
  }

  /**
   * Whether the listening socket is open.
   */
  get listening(): boolean {
    return this._socket !== null;
  }

  get connectionCount(): number {
    return this._clients.size;
  }

  /**
   * Live connections.
   */
  get connections(): ConnectionChannel[] {
    return [...this._clients.values()];
  }

  /**
   * Bind the socket named by the start arguments.
   *
   * Does nothing when no path is configured or the host replays debug input.
   * A socket bound after `handleDisconnect()` is closed again at once.
   * Filesystem and bind errors propagate to the caller.
   */
  async start(startArgs: StartArgs): Promise<void> {
    const path = startArgs.apiServer;
    if (!path || startArgs.debugInput) {
      debug('API server disabled');
      return;
    }
    if (this._socket) {
      throw new Error('Listener already started');
    }

    await removeSocketFile(path);
    const socket = await this._options.listenSocketFactory(path, this._options.listenBacklog);
    if (this._closed) {
      // Host disconnected while binding.
      debug('Listener closed before %s was bound', path);
      await socket.close();
      return;
    }
    this._socket = socket;
    this._fdHandle = this._reactor.registerFd(socket, () => this.handleAccept());
    debug('Listening on %s', path);
  }

  /**
   * Accept at most one pending connection.
   */
  handleAccept(): void {
    if (!this._socket) return;
    const socket = this._socket.accept();
    if (!socket) return;

    const client = new ConnectionChannel(this, socket, this._reactor, this._sink, {
      sendRetries: this._options.sendRetries,
      sendRetryPauseMs: this._options.sendRetryPauseMs,
    });
    this._clients.set(client.uid, client);
  }

  /**
   * Host shutdown: close every connection, then the listening socket.
   */
  async handleDisconnect(): Promise<void> {
    this._closed = true;
    for (const client of [...this._clients.values()]) {
      client.close();
    }

    const socket = this._socket;
    if (!socket) return;
    this._socket = null;
    if (this._fdHandle) {
      this._reactor.unregisterFd(this._fdHandle);
      this._fdHandle = null;
    }
    await socket.close();
    debug('Listener closed');
  }

  popClient(uid: number): void {
    this._clients.delete(uid);
  }
}
