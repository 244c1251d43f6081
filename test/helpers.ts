/**
 * Test utilities: fake host, scripted sockets, a manually driven reactor and
 * a framed client for end-to-end tests over a real Unix socket.
 */

import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import { decodeFrame, encodeFrame, splitFrames } from '../src/codec.ts';
import { SocketError } from '../src/errors.ts';
import { NEVER } from '../src/reactor.ts';
import type { FdHandle, Pollable, Reactor, ReactorTimer, TimerCallback } from '../src/reactor.ts';
import type { ListenSocket, ListenSocketFactory, StreamSocket } from '../src/transports/StreamSocket.ts';
import type {
  ClientConnection,
  GcodeOutputSource,
  Host,
  HostEvent,
  HostState,
  JsonObject,
  JsonValue,
  StartArgs,
  StatusProvider,
} from '../src/types.ts';
import { WebRequest } from '../src/WebRequest.ts';

/**
 * Promise-based delay.
 *
 * @param ms - Delay in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Let pending microtasks and immediates run.
 */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 *
 * More reliable than fixed delays for tests that check state conditions.
 *
 * @param condition - Function that returns true when condition is met
 * @param timeout - Maximum time to wait in milliseconds (default: 5000)
 * @param pollInterval - How often to check condition in milliseconds (default: 10)
 * @returns Promise that resolves when condition is true, rejects on timeout
 */
export async function waitUntil(
  condition: () => boolean,
  timeout = 5000,
  pollInterval = 10
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}

// Socket paths: one per call, under the OS temp dir.
let socketCounter = 0;

/**
 * Get a unique Unix socket path for testing.
 */
export function tmpSocketPath(): string {
  return path.join(os.tmpdir(), `api-server-test-${process.pid}-${socketCounter++}.sock`);
}

/**
 * Build a request as the connection layer would.
 */
export function makeRequest(
  connection: ClientConnection,
  requestPath: string,
  args: JsonObject = {},
  id: JsonValue = 1
): WebRequest {
  return new WebRequest(connection, { id, path: requestPath, args });
}

// ============================================================================
// Host
// ============================================================================

/**
 * Registry object with a fixed status.
 */
export class StatusObject implements StatusProvider {
  status: Record<string, unknown>;
  calls = 0;

  constructor(status: Record<string, unknown>) {
    this.status = status;
  }

  getStatus(_eventtime: number): Record<string, unknown> {
    this.calls++;
    return this.status;
  }
}

/**
 * Console output source that tests drive by hand.
 */
export class FakeGcode implements GcodeOutputSource {
  handlers: Array<(message: string) => void> = [];

  registerOutputHandler(handler: (message: string) => void): void {
    this.handlers.push(handler);
  }

  respond(message: string): void {
    for (const handler of this.handlers) {
      handler(message);
    }
  }
}

export class FakeHost implements Host {
  objects: Map<string, unknown>;
  startArgs: StartArgs;
  state: HostState = 'ready';
  stateMessage = 'Printer is ready';
  shutdownReasons: string[] = [];

  private _handlers = new Map<HostEvent, Array<() => void>>();

  constructor(objects: Record<string, unknown> = {}, startArgs: StartArgs = {}) {
    this.objects = new Map(Object.entries(objects));
    this.startArgs = startArgs;
  }

  lookupObjects(): Iterable<[string, unknown]> {
    return [...this.objects.entries()];
  }

  lookupObject(name: string): unknown {
    return this.objects.get(name);
  }

  getStartArgs(): StartArgs {
    return this.startArgs;
  }

  getStateMessage(): { message: string; state: HostState } {
    return { message: this.stateMessage, state: this.state };
  }

  invokeShutdown(reason: string): void {
    this.shutdownReasons.push(reason);
  }

  registerEventHandler(event: HostEvent, handler: () => void): void {
    const handlers = this._handlers.get(event) ?? [];
    handlers.push(handler);
    this._handlers.set(event, handlers);
  }

  emit(event: HostEvent): void {
    for (const handler of this._handlers.get(event) ?? []) {
      handler();
    }
  }
}

// ============================================================================
// Connections and sockets
// ============================================================================

let fakeUid = 1_000_000;

/**
 * Connection that records everything enqueued on it.
 */
export class FakeConnection implements ClientConnection {
  readonly uid = fakeUid++;
  sent: unknown[] = [];
  closed = false;

  enqueue(value: unknown): void {
    if (!this.closed) this.sent.push(value);
  }

  isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Connection that encodes what it is given, the way a socket channel does.
 */
export class EncodingConnection extends FakeConnection {
  enqueue(value: unknown): void {
    encodeFrame(value);
    super.enqueue(value);
  }
}

/**
 * Parse every complete frame out of a byte buffer.
 */
export function parseFrames(data: Buffer): unknown[] {
  return splitFrames(Buffer.alloc(0), data).frames.map((frame) => decodeFrame(frame));
}

/**
 * Stream socket with scripted reads and sends.
 *
 * `sendBehavior` receives the data and the 1-based attempt number, and
 * returns how many bytes to accept or throws a `SocketError`.
 */
export class FakeStreamSocket implements StreamSocket {
  written: Buffer = Buffer.alloc(0);
  sendCalls = 0;
  closeCalls = 0;
  closeError: Error | null = null;
  sendBehavior: (data: Buffer, attempt: number) => number = (data) => data.length;

  private _watcher: (() => void) | null = null;
  private _inbound: Array<Buffer | SocketError> = [];
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  get watched(): boolean {
    return this._watcher !== null;
  }

  watch(onReady: () => void): () => void {
    this._watcher = onReady;
    return () => {
      if (this._watcher === onReady) this._watcher = null;
    };
  }

  /**
   * Make data (or a receive error) available and signal readiness.
   */
  deliver(data: string | Buffer | SocketError): void {
    this._inbound.push(typeof data === 'string' ? Buffer.from(data, 'utf8') : data);
    this._watcher?.();
  }

  /**
   * Peer closed its end.
   */
  end(): void {
    this.deliver(Buffer.alloc(0));
  }

  recv(): Buffer {
    if (this._closed) throw new SocketError('EBADF');
    const next = this._inbound.shift();
    if (next === undefined) throw new SocketError('EAGAIN');
    if (next instanceof SocketError) throw next;
    return next;
  }

  send(data: Buffer): number {
    this.sendCalls++;
    if (this._closed) throw new SocketError('EBADF');
    const accepted = this.sendBehavior(data, this.sendCalls);
    this.written = Buffer.concat([this.written, data.subarray(0, accepted)]);
    return accepted;
  }

  close(): void {
    this.closeCalls++;
    this._closed = true;
    if (this.closeError) throw this.closeError;
  }

  frames(): unknown[] {
    return parseFrames(this.written);
  }
}

/**
 * Listening socket whose connections are handed in by the test.
 */
export class FakeListenSocket implements ListenSocket {
  pending: StreamSocket[] = [];
  closed = false;

  private _watcher: (() => void) | null = null;

  watch(onReady: () => void): () => void {
    this._watcher = onReady;
    return () => {
      if (this._watcher === onReady) this._watcher = null;
    };
  }

  connect(socket: StreamSocket): void {
    this.pending.push(socket);
    this._watcher?.();
  }

  accept(): StreamSocket | null {
    return this.pending.shift() ?? null;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Factory handing out one `FakeListenSocket` per bind, recording the calls.
 */
export function fakeListenFactory(): {
  factory: ListenSocketFactory;
  binds: Array<{ path: string; backlog: number; socket: FakeListenSocket }>;
} {
  const binds: Array<{ path: string; backlog: number; socket: FakeListenSocket }> = [];
  const factory: ListenSocketFactory = async (socketPath, backlog) => {
    const socket = new FakeListenSocket();
    binds.push({ path: socketPath, backlog, socket });
    return socket;
  };
  return { factory, binds };
}

// ============================================================================
// Reactor
// ============================================================================

class ManualTimer implements ReactorTimer {
  waketime: number;
  readonly callback: TimerCallback;

  constructor(callback: TimerCallback, waketime: number) {
    this.callback = callback;
    this.waketime = waketime;
  }
}

class ManualFdHandle implements FdHandle {
  readonly source: Pollable;
  readonly unwatch: () => void;

  constructor(source: Pollable, unwatch: () => void) {
    this.source = source;
    this.unwatch = unwatch;
  }
}

/**
 * Reactor driven explicitly by the test.
 *
 * Callbacks run on `runCallbacks()`, timers fire on `advance()`, and
 * `pause()` moves the clock forward and resolves at once.
 */
export class ManualReactor implements Reactor {
  now = 1000;
  pauses = 0;
  activeFds = 0;

  private _callbacks: Array<(eventtime: number) => void> = [];
  private _timers = new Set<ManualTimer>();

  get pendingCallbacks(): number {
    return this._callbacks.length;
  }

  monotonic(): number {
    return this.now;
  }

  registerCallback(callback: (eventtime: number) => void): void {
    this._callbacks.push(callback);
  }

  /**
   * Run queued callbacks, including ones queued while running.
   */
  runCallbacks(): void {
    let callback = this._callbacks.shift();
    while (callback) {
      callback(this.now);
      callback = this._callbacks.shift();
    }
  }

  registerTimer(callback: TimerCallback, waketime = NEVER): ReactorTimer {
    const timer = new ManualTimer(callback, waketime);
    this._timers.add(timer);
    return timer;
  }

  updateTimer(timer: ReactorTimer, waketime: number): void {
    this._own(timer).waketime = waketime;
  }

  unregisterTimer(timer: ReactorTimer): void {
    const owned = this._own(timer);
    owned.waketime = NEVER;
    this._timers.delete(owned);
  }

  /**
   * Earliest wake time of any registered timer.
   */
  nextWake(): number {
    let next = NEVER;
    for (const timer of this._timers) {
      next = Math.min(next, timer.waketime);
    }
    return next;
  }

  /**
   * Move the clock forward and fire every timer that is due, once.
   */
  advance(ms: number): void {
    this.now += ms;
    for (const timer of [...this._timers]) {
      if (!this._timers.has(timer) || timer.waketime > this.now) continue;
      timer.waketime = timer.callback(this.now);
    }
  }

  registerFd(source: Pollable, callback: (eventtime: number) => void): FdHandle {
    const unwatch = source.watch(() => callback(this.now));
    this.activeFds++;
    return new ManualFdHandle(source, unwatch);
  }

  unregisterFd(handle: FdHandle): void {
    if (!(handle instanceof ManualFdHandle)) {
      throw new Error('Handle was not registered with this reactor');
    }
    handle.unwatch();
    this.activeFds--;
  }

  pause(waketime: number): Promise<number> {
    this.pauses++;
    this.now = Math.max(this.now, waketime);
    return Promise.resolve(this.now);
  }

  private _own(timer: ReactorTimer): ManualTimer {
    if (!(timer instanceof ManualTimer) || !this._timers.has(timer)) {
      throw new Error('Timer was not registered with this reactor');
    }
    return timer;
  }
}

// ============================================================================
// Framed client
// ============================================================================

/**
 * Client side of the framed JSON protocol over a Unix socket.
 */
export class FrameClient {
  frames: unknown[] = [];

  private _socket: net.Socket;
  private _pending: Buffer = Buffer.alloc(0);
  private _closed = false;

  private constructor(socket: net.Socket) {
    this._socket = socket;
    socket.on('data', (chunk: Buffer) => {
      const { frames, rest } = splitFrames(this._pending, chunk);
      this._pending = rest;
      for (const frame of frames) {
        this.frames.push(decodeFrame(frame));
      }
    });
    socket.on('close', () => {
      this._closed = true;
    });
  }

  static connect(socketPath: string): Promise<FrameClient> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection(socketPath);
      socket.once('error', reject);
      socket.once('connect', () => {
        socket.off('error', reject);
        resolve(new FrameClient(socket));
      });
    });
  }

  get closed(): boolean {
    return this._closed;
  }

  send(value: unknown): void {
    this._socket.write(encodeFrame(value));
  }

  sendRaw(data: string | Buffer): void {
    this._socket.write(data);
  }

  /**
   * Wait for the first received frame matching `predicate`, and remove it.
   */
  async next(predicate: (frame: unknown) => boolean = () => true, timeout = 2000): Promise<unknown> {
    let index = -1;
    await waitUntil(() => {
      index = this.frames.findIndex(predicate);
      return index !== -1;
    }, timeout);
    const [frame] = this.frames.splice(index, 1);
    return frame;
  }

  /**
   * Wait for the reply to request `id`.
   */
  reply(id: JsonValue, timeout = 2000): Promise<unknown> {
    return this.next((frame) => isReplyTo(frame, id), timeout);
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._socket.destroy();
    await waitUntil(() => this._closed);
  }
}

function isReplyTo(frame: unknown, id: JsonValue): boolean {
  return typeof frame === 'object' && frame !== null && 'request_id' in frame && frame.request_id === id;
}
