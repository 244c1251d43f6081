/**
 * Unix domain socket transport on `node:net`.
 *
 * Node sockets are event driven and buffer writes without limit. These
 * wrappers expose them as non-blocking sockets instead: each received chunk
 * is one readiness event, and `send()` only accepts what fits below the
 * socket's high water mark, so a slow reader surfaces as partial sends and
 * `EAGAIN` just like a full kernel buffer.
 */

import net from 'node:net';
import createDebug from 'debug';
import { SocketError } from '../errors.ts';
import type { ListenSocket, StreamSocket } from './StreamSocket.ts';

const debug = createDebug('api-server:unix-transport');

const EMPTY = Buffer.alloc(0);

/**
 * Fan readiness notifications out to at most one watcher, replaying events
 * that arrived before anyone was watching.
 */
class ReadinessSignal {
  private _watcher: (() => void) | null = null;
  private _missed = 0;

  watch(onReady: () => void): () => void {
    this._watcher = onReady;
    const missed = this._missed;
    this._missed = 0;
    for (let i = 0; i < missed; i++) {
      setImmediate(() => this._watcher?.());
    }
    return () => {
      if (this._watcher === onReady) {
        this._watcher = null;
      }
    };
  }

  notify(): void {
    if (this._watcher) {
      this._watcher();
    } else {
      this._missed++;
    }
  }
}

export class NetStreamSocket implements StreamSocket {
  private _socket: net.Socket;
  private _signal = new ReadinessSignal();
  private _chunks: Buffer[] = [];
  private _eof = false;
  private _error: SocketError | null = null;
  private _closed = false;

  constructor(socket: net.Socket) {
    this._socket = socket;

    socket.on('data', (chunk: Buffer) => {
      this._chunks.push(chunk);
      this._signal.notify();
    });
    socket.on('end', () => {
      this._eof = true;
      this._signal.notify();
    });
    socket.on('error', (err: NodeJS.ErrnoException) => {
      debug('socket error: %o', err);
      this._error = new SocketError(err.code ?? 'EIO', err.message);
      this._signal.notify();
    });
    socket.on('close', () => {
      if (this._eof) return;
      this._eof = true;
      this._signal.notify();
    });
  }

  watch(onReady: () => void): () => void {
    return this._signal.watch(onReady);
  }

  recv(): Buffer {
    if (this._closed) {
      throw new SocketError('EBADF', 'Bad file descriptor');
    }
    const error = this._error;
    if (error) {
      this._error = null;
      throw error;
    }
    const chunk = this._chunks.shift();
    if (chunk) return chunk;
    if (this._eof) return EMPTY;
    throw new SocketError('EAGAIN', 'Resource temporarily unavailable');
  }

  send(data: Buffer): number {
    if (this._closed) {
      throw new SocketError('EBADF', 'Bad file descriptor');
    }
    if (this._socket.destroyed || !this._socket.writable) {
      throw new SocketError('EPIPE', 'Broken pipe');
    }

    const room = this._socket.writableHighWaterMark - this._socket.writableLength;
    if (room <= 0) {
      throw new SocketError('EAGAIN', 'Resource temporarily unavailable');
    }

    const accepted = data.length <= room ? data : data.subarray(0, room);
    this._socket.write(accepted);
    return accepted.length;
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this._chunks = [];
    this._socket.destroy();
  }
}

export class NetListenSocket implements ListenSocket {
  private _server: net.Server;
  private _signal = new ReadinessSignal();
  private _pending: net.Socket[] = [];

  private constructor(server: net.Server) {
    this._server = server;
    this._server.on('connection', (socket) => {
      this._pending.push(socket);
      this._signal.notify();
    });
  }

  /**
   * Bind and listen on a Unix socket path.
   */
  static bind(path: string, backlog: number): Promise<NetListenSocket> {
    const server = net.createServer();
    const listener = new NetListenSocket(server);

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        server.off('listening', onListening);
        reject(err);
      };
      const onListening = () => {
        server.off('error', onError);
        server.on('error', (err) => debug('listen socket error: %o', err));
        debug('listening on %s', path);
        resolve(listener);
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen({ path, backlog });
    });
  }

  watch(onReady: () => void): () => void {
    return this._signal.watch(onReady);
  }

  accept(): StreamSocket | null {
    const socket = this._pending.shift();
    return socket ? new NetStreamSocket(socket) : null;
  }

  close(): Promise<void> {
    for (const socket of this._pending) {
      socket.destroy();
    }
    this._pending = [];

    return new Promise((resolve) => {
      this._server.close((err) => {
        if (err) debug('close failed: %o', err);
        debug('closed');
        resolve();
      });
    });
  }
}

/**
 * Default `ListenSocketFactory`.
 */
export function bindUnixSocket(path: string, backlog: number): Promise<ListenSocket> {
  return NetListenSocket.bind(path, backlog);
}
