/**
 * ApiServer class - composition root.
 *
 * Wires the request router, listener, subscription engine and G-Code output
 * relay to a host, and follows the host's lifecycle events.
 */

import { fileURLToPath } from 'node:url';
import createDebug from 'debug';
import { GcodeOutputEndpoint } from './endpoints/GcodeOutputEndpoint.ts';
import { SubscriptionEngine } from './endpoints/SubscriptionEngine.ts';
import { installPlugins } from './plugins.ts';
import { NodeReactor } from './reactor.ts';
import type { Reactor } from './reactor.ts';
import { RequestRouter } from './RequestRouter.ts';
import { ListenerService } from './server/ListenerService.ts';
import { bindUnixSocket } from './transports/UnixSocketTransport.ts';
import type { ApiServerOptions, EndpointHandler, Host, HostState, StatusProvider } from './types.ts';

const debug = createDebug('api-server:server');

const DEFAULT_INSTALL_PATH = fileURLToPath(new URL('..', import.meta.url));

/**
 * API server embedded in a host process.
 */
export class ApiServer implements StatusProvider {
  private _host: Host;
  private _options: {
    refreshMs: number;
    sendRetries: number;
    sendRetryPauseMs: number;
    listenBacklog: number;
    installPath: string;
  };

  private _reactor: Reactor;
  private _router: RequestRouter;
  private _listener: ListenerService;
  private _subscriptions: SubscriptionEngine;
  private _gcodeOutput: GcodeOutputEndpoint;

  private _started = false;
  private _closed = false;

  constructor(host: Host, options: ApiServerOptions = {}) {
    this._host = host;
    this._options = {
      refreshMs: options.refreshMs ?? 250,
      sendRetries: options.sendRetries ?? 10,
      sendRetryPauseMs: options.sendRetryPauseMs ?? 1,
      listenBacklog: options.listenBacklog ?? 1,
      installPath: options.installPath ?? DEFAULT_INSTALL_PATH,
    };

    this._reactor = options.reactor ?? new NodeReactor();
    this._router = new RequestRouter(host, this._reactor, { installPath: this._options.installPath });
    this._listener = new ListenerService(this._reactor, this._router, {
      listenBacklog: this._options.listenBacklog,
      listenSocketFactory: options.listenSocketFactory ?? bindUnixSocket,
      sendRetries: this._options.sendRetries,
      sendRetryPauseMs: this._options.sendRetryPauseMs,
    });
    this._subscriptions = new SubscriptionEngine(host, this._reactor, this._router, {
      refreshMs: this._options.refreshMs,
    });
    this._gcodeOutput = new GcodeOutputEndpoint(host, this._router);

    installPlugins(options.plugins ?? [], {
      host,
      reactor: this._reactor,
      registerEndpoint: (path, handler) => this.registerEndpoint(path, handler),
    });

    host.registerEventHandler('ready', () => this._subscriptions.handleReady());
    host.registerEventHandler('restart', () => this._subscriptions.handleRestart());
    host.registerEventHandler('disconnect', () => this._handleDisconnect());
  }

  get reactor(): Reactor {
    return this._reactor;
  }

  get router(): RequestRouter {
    return this._router;
  }

  get listener(): ListenerService {
    return this._listener;
  }

  get subscriptions(): SubscriptionEngine {
    return this._subscriptions;
  }

  get gcodeOutput(): GcodeOutputEndpoint {
    return this._gcodeOutput;
  }

  /**
   * Register an endpoint. Only allowed before `start()`.
   */
  registerEndpoint(path: string, handler: EndpointHandler): void {
    this._router.registerEndpoint(path, handler);
  }

  /**
   * Close endpoint registration and open the socket.
   *
   * Resolves immediately when the host has no socket path configured.
   */
  async start(): Promise<void> {
    if (this._started) {
      throw new Error('Server already started');
    }
    this._started = true;
    this._router.seal();
    await this._listener.start(this._host.getStartArgs());
    debug('Server started (listening=%s)', this._listener.listening);
  }

  /**
   * Stop pushing, close every connection and the listening socket.
   */
  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    debug('Closing server');
    this._subscriptions.stop();
    await this._listener.handleDisconnect();
    debug('Server closed');
  }

  getStatus(): { state: HostState; state_message: string } {
    const { message, state } = this._host.getStateMessage();
    return { state, state_message: message };
  }

  private _handleDisconnect(): void {
    this.close().catch((err) => {
      debug('Error closing server on disconnect: %O', err);
    });
  }
}
