/**
 * Object status queries and subscriptions.
 *
 * Keeps a catalog of the host objects that expose a status accessor, merges
 * every client's subscription into one global field set per object, and
 * pushes a single snapshot of that set to all subscribers on a fixed timer.
 */

import createDebug from 'debug';
import copy from 'fast-copy';
import { InvalidArgumentError } from '../errors.ts';
import { NEVER, NOW } from '../reactor.ts';
import type { Reactor, ReactorTimer } from '../reactor.ts';
import { hasStatus, isJsonObject } from '../types.ts';
import type { ClientConnection, EndpointRegistrar, JsonObject, JsonValue, ObjectRegistry } from '../types.ts';
import type { WebRequest } from '../WebRequest.ts';
import type { PushFrame } from '../wire.ts';

const debug = createDebug('api-server:subscriptions');

/** Sentinel selecting every field of an object. Sent as `[]` on the wire. */
export const ALL_FIELDS: 'all' = 'all';

/**
 * Either every field of an object, or exactly the named ones.
 */
export type FieldSelection = typeof ALL_FIELDS | ReadonlySet<string>;

/**
 * Requested fields per object name.
 */
export type SubscriptionSet = ReadonlyMap<string, FieldSelection>;

/** Returned by status queries while the host is not ready. */
export const NOT_READY_STATUS = { status: 'Host Not Ready' } as const;

/** Argument carrying the client's push envelope. */
export const RESPONSE_TEMPLATE_ARG = 'response_template';

/**
 * Merge a new field request into an existing one.
 *
 * `ALL_FIELDS` on either side wins; otherwise the result is the union.
 */
export function mergeFieldSelection(existing: FieldSelection | undefined, requested: FieldSelection): FieldSelection {
  if (existing === undefined) return requested;
  if (existing === ALL_FIELDS || requested === ALL_FIELDS) return ALL_FIELDS;
  return new Set([...existing, ...requested]);
}

/**
 * Parse a wire field list: `[]` or `null` for all fields, else field names.
 */
export function parseFieldSelection(objectName: string, value: JsonValue): FieldSelection {
  if (value === null) return ALL_FIELDS;
  if (!Array.isArray(value)) {
    throw new InvalidArgumentError(`Invalid Argument [${objectName}]: expected a list of field names`);
  }
  const fields = new Set<string>();
  for (const field of value) {
    if (typeof field !== 'string') {
      throw new InvalidArgumentError(`Invalid Argument [${objectName}]: field names must be strings`);
    }
    fields.add(field);
  }
  return fields.size === 0 ? ALL_FIELDS : fields;
}

/**
 * Parse request arguments of the form `{ objectName: [field, ...] }`.
 * Keys listed in `exclude` are not object names.
 */
export function parseSubscriptionSet(args: Readonly<JsonObject>, exclude: readonly string[] = []): Map<string, FieldSelection> {
  const result = new Map<string, FieldSelection>();
  for (const [name, value] of Object.entries(args)) {
    if (exclude.includes(name)) continue;
    result.set(name, parseFieldSelection(name, value));
  }
  return result;
}

function selectionToWire(selection: FieldSelection): string[] {
  return selection === ALL_FIELDS ? [] : [...selection];
}

export interface SubscriptionEngineOptions {
  /** Interval between pushes in milliseconds. */
  refreshMs: number;
}

export class SubscriptionEngine {
  private _registry: ObjectRegistry;
  private _reactor: Reactor;
  private _refreshMs: number;

  private _ready = false;
  private _stopped = false;
  private _timerStarted = false;
  private _timer: ReactorTimer;

  private _availableObjects = new Map<string, string[]>();
  private _subscriptions = new Map<string, FieldSelection>();
  private _clients = new Map<number, { connection: ClientConnection; template: JsonObject }>();

  constructor(registry: ObjectRegistry, reactor: Reactor, router: EndpointRegistrar, options: SubscriptionEngineOptions) {
    this._registry = registry;
    this._reactor = reactor;
    this._refreshMs = options.refreshMs;
    this._timer = this._reactor.registerTimer((eventtime) => this._handleTick(eventtime), NEVER);

    router.registerEndpoint('objects/list', (request) => this._handleObjectList(request));
    router.registerEndpoint('objects/status', (request) => this._handleStatusRequest(request));
    router.registerEndpoint('objects/subscription', (request) => this._handleSubscriptionRequest(request));
    router.registerEndpoint('objects/list_subscription', (request) => this._handleListSubscription(request));
  }

  get ready(): boolean {
    return this._ready;
  }

  /**
   * Whether the push timer is running.
   */
  get timerStarted(): boolean {
    return this._timerStarted;
  }

  /**
   * Catalog of queryable objects and their field names.
   */
  get availableObjects(): ReadonlyMap<string, readonly string[]> {
    return this._availableObjects;
  }

  /**
   * Merged subscription state across all clients.
   */
  get subscriptions(): SubscriptionSet {
    return this._subscriptions;
  }

  /**
   * Number of connections receiving pushes.
   */
  get subscriberCount(): number {
    return this._clients.size;
  }

  /**
   * Host is ready: rebuild the catalog from every object with a status accessor.
   */
  handleReady(): void {
    const eventtime = this._reactor.monotonic();
    this._availableObjects = new Map();
    for (const [name, obj] of this._registry.lookupObjects()) {
      if (!hasStatus(obj)) continue;
      this._availableObjects.set(name, Object.keys(obj.getStatus(eventtime)));
    }
    this._ready = true;
    debug('Catalog rebuilt with %d objects', this._availableObjects.size);
  }

  /**
   * Host restart requested: stop answering and pushing until ready again.
   */
  handleRestart(): void {
    this._ready = false;
    this._availableObjects = new Map();
    if (!this._stopped) {
      this._reactor.updateTimer(this._timer, NEVER);
    }
    this._timerStarted = false;
    debug('Not ready; push timer stopped');
  }

  /**
   * Build a status snapshot for the requested objects.
   */
  querySnapshot(requested: SubscriptionSet, eventtime: number): Record<string, unknown> {
    if (!this._ready) {
      return { ...NOT_READY_STATUS };
    }

    const result: Record<string, Record<string, unknown>> = {};
    for (const [name, selection] of requested) {
      if (!this._availableObjects.has(name)) continue;
      const obj = this._registry.lookupObject(name);
      if (!hasStatus(obj)) continue;

      const fields: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj.getStatus(eventtime))) {
        if (typeof value === 'function') continue;
        if (selection !== ALL_FIELDS && !selection.has(key)) continue;
        fields[key] = value;
      }
      result[name] = fields;
    }
    return result;
  }

  /**
   * Merge a client's interest into the global subscription and register the
   * client for pushes. Unknown objects and fields are logged and dropped.
   */
  subscribe(newInterest: SubscriptionSet, connection: ClientConnection, template: JsonObject): void {
    this.addSubscription(newInterest);
    this._clients.set(connection.uid, { connection, template });
    if (!this._timerStarted && !this._stopped) {
      this._reactor.updateTimer(this._timer, NOW);
      this._timerStarted = true;
    }
  }

  /**
   * Merge validated interest into the global subscription table.
   */
  addSubscription(newInterest: SubscriptionSet): void {
    for (const [name, requested] of newInterest) {
      const available = this._availableObjects.get(name);
      if (!available) {
        debug('Object {%s} not available for subscription', name);
        continue;
      }

      let selection = requested;
      if (selection !== ALL_FIELDS) {
        const valid = new Set<string>();
        const invalid: string[] = [];
        for (const field of selection) {
          if (available.includes(field)) valid.add(field);
          else invalid.push(field);
        }
        if (invalid.length > 0) {
          debug('Removed invalid items [%s] from subscription request %s', invalid.join(', '), name);
        }
        if (valid.size === 0) continue;
        selection = valid;
      }

      this._subscriptions.set(name, mergeFieldSelection(this._subscriptions.get(name), selection));
    }
  }

  /**
   * Remove the push timer for good. Used when the server shuts down; later
   * subscriptions and restarts leave the timer alone.
   */
  stop(): void {
    if (this._stopped) return;
    this._stopped = true;
    this._reactor.unregisterTimer(this._timer);
    this._timerStarted = false;
    this._clients.clear();
  }

  private _handleTick(eventtime: number): number {
    try {
      this._pushStatus(eventtime);
    } catch (err) {
      // A status that cannot be gathered or encoded skips this tick only.
      debug('Status push failed: %O', err);
    }
    return eventtime + this._refreshMs;
  }

  private _pushStatus(eventtime: number): void {
    const status = this.querySnapshot(this._subscriptions, eventtime);
    for (const [uid, { connection, template }] of [...this._clients]) {
      if (connection.isClosed()) {
        this._clients.delete(uid);
        continue;
      }
      const push: PushFrame = { ...copy(template), params: { status } };
      connection.enqueue(push);
    }
  }

  private _handleObjectList(request: WebRequest): void {
    const result: Record<string, string[]> = {};
    for (const [name, fields] of this._availableObjects) {
      result[name] = [...fields];
    }
    request.send(result);
  }

  private _handleStatusRequest(request: WebRequest): void {
    const requested = parseSubscriptionSet(request.args.toObject());
    request.send(this.querySnapshot(requested, this._reactor.monotonic()));
  }

  private _handleSubscriptionRequest(request: WebRequest): void {
    if (request.args.size === 0) {
      throw new InvalidArgumentError('Invalid argument');
    }
    const template = request.getOptional(RESPONSE_TEMPLATE_ARG, {});
    if (!isJsonObject(template)) {
      throw new InvalidArgumentError(`Invalid Argument [${RESPONSE_TEMPLATE_ARG}]: expected object`);
    }
    const interest = parseSubscriptionSet(request.args.toObject(), [RESPONSE_TEMPLATE_ARG]);
    this.subscribe(interest, request.connection, template);
  }

  private _handleListSubscription(request: WebRequest): void {
    const result: Record<string, string[]> = {};
    for (const [name, selection] of this._subscriptions) {
      result[name] = selectionToWire(selection);
    }
    request.send(result);
  }
}
