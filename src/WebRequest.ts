/**
 * A single client request and its (at most one) response.
 */

import { InvalidArgumentError, MultipleResponseError } from './errors.ts';
import type { WebRequestError } from './errors.ts';
import { isJsonObject } from './types.ts';
import type { ClientConnection, JsonObject, JsonValue } from './types.ts';
import type { ReplyFrame, RequestFrame } from './wire.ts';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Typed view over a request's argument mapping.
 *
 * Every accessor fails with `InvalidArgumentError` when the argument is
 * missing (and no default is given) or has the wrong type.
 */
export class RequestArgs {
  private readonly _values: Readonly<JsonObject>;

  constructor(values: JsonObject) {
    this._values = Object.freeze({ ...values });
  }

  has(name: string): boolean {
    return Object.hasOwn(this._values, name);
  }

  /**
   * Get a required argument.
   */
  get(name: string): JsonValue {
    const value = this.has(name) ? this._values[name] : undefined;
    if (value === undefined) {
      throw new InvalidArgumentError(`Invalid Argument [${name}]`);
    }
    return value;
  }

  /**
   * Get an argument, or `defaultValue` if it is absent.
   */
  getOptional(name: string, defaultValue: JsonValue): JsonValue {
    return this.has(name) ? this.get(name) : defaultValue;
  }

  getInt(name: string): number {
    const value = this.get(name);
    if (typeof value === 'number' && Number.isInteger(value)) return value;
    if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
      return parseInt(value, 10);
    }
    throw new InvalidArgumentError(`Invalid Argument [${name}]: expected integer`);
  }

  getFloat(name: string): number {
    const value = this.get(name);
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && value.trim() !== '') {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) return parsed;
    }
    throw new InvalidArgumentError(`Invalid Argument [${name}]: expected number`);
  }

  getString(name: string): string {
    const value = this.get(name);
    if (typeof value !== 'string') {
      throw new InvalidArgumentError(`Invalid Argument [${name}]: expected string`);
    }
    return value;
  }

  getObject(name: string): JsonObject {
    const value = this.get(name);
    if (!isJsonObject(value)) {
      throw new InvalidArgumentError(`Invalid Argument [${name}]: expected object`);
    }
    return value;
  }

  /**
   * All arguments as a plain object.
   */
  toObject(): Readonly<JsonObject> {
    return this._values;
  }

  get size(): number {
    return Object.keys(this._values).length;
  }
}

/**
 * A decoded request bound to the connection it arrived on.
 */
export class WebRequest {
  readonly id: JsonValue;
  readonly path: string;
  readonly args: RequestArgs;
  readonly connection: ClientConnection;

  private _response: unknown = undefined;
  private _hasResponse = false;
  private _finished = false;

  constructor(connection: ClientConnection, frame: RequestFrame) {
    this.connection = connection;
    this.id = frame.id;
    this.path = frame.path;
    this.args = new RequestArgs(frame.args);
  }

  get(name: string): JsonValue {
    return this.args.get(name);
  }

  getOptional(name: string, defaultValue: JsonValue): JsonValue {
    return this.args.getOptional(name, defaultValue);
  }

  getInt(name: string): number {
    return this.args.getInt(name);
  }

  getFloat(name: string): number {
    return this.args.getFloat(name);
  }

  /**
   * Set the response payload.
   *
   * @throws MultipleResponseError if a response was already sent
   */
  send(data: unknown): void {
    if (this._hasResponse) {
      throw new MultipleResponseError();
    }
    this._response = data;
    this._hasResponse = true;
  }

  /**
   * Replace any response with an error payload.
   */
  setError(error: WebRequestError): void {
    this._response = error.toDict();
    this._hasResponse = true;
  }

  get finished(): boolean {
    return this._finished;
  }

  /**
   * Build the reply frame. A request that was never answered replies `"ok"`.
   */
  finish(): ReplyFrame {
    if (this._finished) {
      throw new Error(`Request ${JSON.stringify(this.id)} already finished`);
    }
    this._finished = true;
    return {
      request_id: this.id,
      response: this._hasResponse ? this._response : 'ok',
    };
  }
}
