/**
 * Request routing.
 *
 * Maps request paths to handlers, runs decoded requests as deferred tasks and
 * turns handler outcomes into replies. A handler failure that is not a
 * `CommandError` is fatal: the client still gets an error reply, and the host
 * is shut down.
 */

import os from 'node:os';
import createDebug from 'debug';
import {
  CommandError,
  DuplicateEndpointError,
  UnknownEndpointError,
  WebRequestError,
} from './errors.ts';
import type { Reactor } from './reactor.ts';
import type { ClientConnection, EndpointHandler, HostControl } from './types.ts';
import type { WebRequest } from './WebRequest.ts';

const debug = createDebug('api-server:router');

/** Reason passed to the host when a client requests an emergency stop. */
export const EMERGENCY_STOP_REASON = 'Shutdown due to API request';

/**
 * A decoded request waiting to be dispatched.
 */
export interface RequestTask {
  connection: ClientConnection;
  request: WebRequest;
}

/**
 * How a handler invocation ended.
 */
export type HandlerOutcome =
  | { kind: 'success' }
  | { kind: 'recoverable'; error: CommandError }
  | { kind: 'fatal'; error: Error };

/**
 * Run a handler and classify how it ended.
 */
export async function invokeHandler(handler: EndpointHandler, request: WebRequest): Promise<HandlerOutcome> {
  try {
    await handler(request);
    return { kind: 'success' };
  } catch (err) {
    if (err instanceof CommandError) {
      return { kind: 'recoverable', error: err };
    }
    return { kind: 'fatal', error: err instanceof Error ? err : new Error(String(err)) };
  }
}

function toWebRequestError(error: CommandError): WebRequestError {
  return error instanceof WebRequestError ? error : new WebRequestError(error.message);
}

export interface RequestRouterOptions {
  /** Reported as `install_path` by `info`. */
  installPath: string;
}

export class RequestRouter {
  private _host: HostControl;
  private _reactor: Reactor;
  private _installPath: string;

  private _endpoints = new Map<string, EndpointHandler>();
  private _sealed = false;

  private _pending: RequestTask[] = [];
  private _drainScheduled = false;

  constructor(host: HostControl, reactor: Reactor, options: RequestRouterOptions) {
    this._host = host;
    this._reactor = reactor;
    this._installPath = options.installPath;

    this.registerEndpoint('list_endpoints', (request) => this._handleListEndpoints(request));
    this.registerEndpoint('info', (request) => this._handleInfo(request));
    this.registerEndpoint('emergency_stop', () => this._handleEmergencyStop());
  }

  /**
   * Register a handler for a path.
   *
   * @throws DuplicateEndpointError if the path already has a handler
   */
  registerEndpoint(path: string, handler: EndpointHandler): void {
    if (this._sealed) {
      throw new Error(`Cannot register endpoint "${path}" after the server has started`);
    }
    if (this._endpoints.has(path)) {
      throw new DuplicateEndpointError(path);
    }
    this._endpoints.set(path, handler);
    debug('Registered endpoint %s', path);
  }

  /**
   * Registered paths in registration order.
   */
  listEndpoints(): string[] {
    return [...this._endpoints.keys()];
  }

  /**
   * Close registration. The endpoint table is read-only from here on.
   */
  seal(): void {
    this._sealed = true;
  }

  /**
   * Queue a decoded request. Tasks run from a reactor callback, in
   * submission order; tasks whose connection closed meanwhile are dropped.
   */
  submit(task: RequestTask): void {
    this._pending.push(task);
    if (this._drainScheduled) return;
    this._drainScheduled = true;
    this._reactor.registerCallback(() => this._drain());
  }

  /**
   * Run one request through its handler and enqueue the reply.
   */
  async dispatch(request: WebRequest): Promise<void> {
    const handler = this._endpoints.get(request.path);
    let outcome: HandlerOutcome;
    if (handler) {
      outcome = await invokeHandler(handler, request);
    } else {
      const error = new UnknownEndpointError(request.path);
      debug(error.message);
      outcome = { kind: 'recoverable', error };
    }

    let shutdownReason: string | null = null;
    switch (outcome.kind) {
      case 'success':
        break;
      case 'recoverable':
        request.setError(toWebRequestError(outcome.error));
        break;
      case 'fatal':
        shutdownReason = `Internal Error on WebRequest: ${request.path}`;
        debug('%s: %O', shutdownReason, outcome.error);
        request.setError(new WebRequestError(outcome.error.message));
        break;
    }

    const reply = request.finish();
    debug('Sending response - %j', reply);
    try {
      request.connection.enqueue(reply);
    } catch (err) {
      // The response itself could not be encoded: answer with the error instead.
      const error = err instanceof Error ? err : new Error(String(err));
      debug('Unable to encode response for %s: %O', request.path, error);
      if (shutdownReason === null) {
        shutdownReason = `Internal Error on WebRequest: ${request.path}`;
      }
      request.connection.enqueue({ request_id: reply.request_id, response: new WebRequestError(error.message).toDict() });
    }

    if (shutdownReason !== null) {
      this._host.invokeShutdown(shutdownReason);
    }
  }

  private _drain(): void {
    this._drainScheduled = false;
    const tasks = this._pending;
    this._pending = [];

    for (const { connection, request } of tasks) {
      if (connection.isClosed()) {
        debug('Dropping request %s: connection %d closed', request.path, connection.uid);
        continue;
      }
      this.dispatch(request).catch((err) => {
        debug('Failed to complete request %s: %O', request.path, err);
      });
    }
  }

  private _handleListEndpoints(request: WebRequest): void {
    request.send({ endpoints: this.listEndpoints() });
  }

  private _handleInfo(request: WebRequest): void {
    const { message, state } = this._host.getStateMessage();
    const startArgs = this._host.getStartArgs();
    request.send({
      state,
      state_message: message,
      hostname: os.hostname(),
      install_path: this._installPath,
      runtime_path: process.execPath,
      log_file: startArgs.logFile ?? null,
      config_file: startArgs.configFile ?? null,
      software_version: startArgs.softwareVersion ?? null,
      cpu_info: startArgs.cpuInfo ?? null,
    });
  }

  private _handleEmergencyStop(): void {
    this._host.invokeShutdown(EMERGENCY_STOP_REASON);
  }
}
