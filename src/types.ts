/**
 * Core type definitions for the API server and the host it is embedded in.
 */

import type { Reactor } from './reactor.ts';
import type { ListenSocketFactory } from './transports/StreamSocket.ts';
import type { ApiPlugin } from './plugins.ts';
import type { WebRequest } from './WebRequest.ts';

/**
 * Any value representable in JSON.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/**
 * A JSON object.
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Host lifecycle states reported by `info` and the server status.
 */
export type HostState = 'startup' | 'ready' | 'error' | 'shutdown';

/**
 * Host lifecycle events the server reacts to.
 * - `ready`: the host finished configuring its objects
 * - `restart`: a restart was requested; objects are about to go away
 * - `disconnect`: the host is shutting down
 */
export type HostEvent = 'ready' | 'restart' | 'disconnect';

/**
 * Process start arguments the host was launched with.
 */
export interface StartArgs {
  /** Unix socket path to serve on. Absent disables the server. */
  apiServer?: string | null;
  /** Set when the host replays input from a file instead of running live. */
  debugInput?: string | null;
  logFile?: string | null;
  configFile?: string | null;
  softwareVersion?: string | null;
  cpuInfo?: string | null;
}

/**
 * An object that can report a snapshot of its live status.
 */
export interface StatusProvider {
  getStatus(eventtime: number): Record<string, unknown>;
}

/**
 * An object that publishes G-Code console output.
 */
export interface GcodeOutputSource {
  registerOutputHandler(handler: (message: string) => void): void;
}

/**
 * Lookup surface of the host's object registry.
 */
export interface ObjectRegistry {
  lookupObjects(): Iterable<[string, unknown]>;
  lookupObject(name: string): unknown;
}

/**
 * Host state and shutdown surface.
 */
export interface HostControl {
  getStartArgs(): StartArgs;
  getStateMessage(): { message: string; state: HostState };
  invokeShutdown(reason: string): void;
}

/**
 * Host lifecycle event registration.
 */
export interface HostEvents {
  registerEventHandler(event: HostEvent, handler: () => void): void;
}

/**
 * Everything the server needs from the host process.
 */
export type Host = ObjectRegistry & HostControl & HostEvents;

/**
 * Server configuration options.
 */
export interface ApiServerOptions {
  /** Interval between subscription pushes in milliseconds. Default: 250 */
  refreshMs?: number;
  /** Retryable send failures tolerated per stall before closing. Default: 10 */
  sendRetries?: number;
  /** Pause between send retries in milliseconds. Default: 1 */
  sendRetryPauseMs?: number;
  /** Listen backlog for the Unix socket. Default: 1 */
  listenBacklog?: number;
  /** Reported as `install_path` by `info`. Default: the package root */
  installPath?: string;
  /**
   * Override the event loop implementation.
   * Default: `NodeReactor`.
   */
  reactor?: Reactor;
  /**
   * Override how the listening socket is bound.
   * Default: Unix domain socket via `node:net`.
   */
  listenSocketFactory?: ListenSocketFactory;
  /** Domain modules contributing endpoints during setup. */
  plugins?: ApiPlugin[];
}

/**
 * Handler for a registered endpoint path.
 *
 * Handlers answer through `request.send()`, report recoverable failures by
 * throwing a `CommandError`, or return without sending for a default `"ok"`.
 */
export type EndpointHandler = (request: WebRequest) => void | Promise<void>;

/**
 * Anything endpoints can be registered on.
 */
export interface EndpointRegistrar {
  registerEndpoint(path: string, handler: EndpointHandler): void;
}

/**
 * What a request handler or push producer can address on a connection.
 */
export interface ClientConnection {
  readonly uid: number;
  enqueue(value: unknown): void;
  isClosed(): boolean;
}

/**
 * Type guard for registry objects exposing a status accessor.
 */
export function hasStatus(obj: unknown): obj is StatusProvider {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'getStatus' in obj &&
    typeof obj.getStatus === 'function'
  );
}

/**
 * Type guard for registry objects publishing G-Code output.
 */
export function isGcodeOutputSource(obj: unknown): obj is GcodeOutputSource {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'registerOutputHandler' in obj &&
    typeof obj.registerOutputHandler === 'function'
  );
}

/**
 * Type guard for plain JSON objects (not arrays, not null).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
