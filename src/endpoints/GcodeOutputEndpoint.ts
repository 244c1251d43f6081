/**
 * G-Code console output relay.
 *
 * Clients call `subscribe_gcode_output` once; every console message the
 * host's `gcode` object emits afterwards is pushed to them inside their own
 * response template.
 */

import createDebug from 'debug';
import copy from 'fast-copy';
import { InvalidArgumentError, WebRequestError } from '../errors.ts';
import { isGcodeOutputSource, isJsonObject } from '../types.ts';
import type { ClientConnection, EndpointRegistrar, JsonObject, ObjectRegistry } from '../types.ts';
import type { WebRequest } from '../WebRequest.ts';
import type { PushFrame } from '../wire.ts';
import { RESPONSE_TEMPLATE_ARG } from './SubscriptionEngine.ts';

const debug = createDebug('api-server:gcode-output');

/** Registry name of the object publishing console output. */
export const GCODE_OBJECT_NAME = 'gcode';

export class GcodeOutputEndpoint {
  private _registry: ObjectRegistry;
  private _isRegistered = false;
  private _clients = new Map<number, { connection: ClientConnection; template: JsonObject }>();

  constructor(registry: ObjectRegistry, router: EndpointRegistrar) {
    this._registry = registry;
    router.registerEndpoint('subscribe_gcode_output', (request) => this._handleSubscribe(request));
  }

  get subscriberCount(): number {
    return this._clients.size;
  }

  /**
   * Push one console message to every live subscriber.
   */
  relay(message: string): void {
    for (const [uid, { connection, template }] of [...this._clients]) {
      if (connection.isClosed()) {
        this._clients.delete(uid);
        continue;
      }
      const push: PushFrame = { ...copy(template), params: { response: message } };
      connection.enqueue(push);
    }
  }

  private _handleSubscribe(request: WebRequest): void {
    const template = request.getOptional(RESPONSE_TEMPLATE_ARG, {});
    if (!isJsonObject(template)) {
      throw new InvalidArgumentError(`Invalid Argument [${RESPONSE_TEMPLATE_ARG}]: expected object`);
    }

    if (!this._isRegistered) {
      const gcode = this._registry.lookupObject(GCODE_OBJECT_NAME);
      if (!isGcodeOutputSource(gcode)) {
        throw new WebRequestError('G-Code output is not available');
      }
      gcode.registerOutputHandler((message) => this.relay(message));
      this._isRegistered = true;
      debug('Registered G-Code output handler');
    }

    this._clients.set(request.connection.uid, { connection: request.connection, template });
  }
}
