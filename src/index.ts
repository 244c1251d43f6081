/**
 * machine-api-server: local control-plane API server for machine-control hosts.
 *
 * ## Public API
 * - `ApiServer`: embed in the host, start it, and feed it host events
 * - `CommandError`: throw from handlers for a recoverable, client-visible error
 *
 * ## Example
 * ```ts
 * import { ApiServer, CommandError } from 'machine-api-server';
 *
 * const server = new ApiServer(host, {
 *   plugins: [
 *     {
 *       name: 'fan',
 *       endpoints: {
 *         'fan/set_speed': (request) => {
 *           const speed = request.getFloat('speed');
 *           if (speed < 0 || speed > 1) throw new CommandError('speed must be within 0..1');
 *           fan.setSpeed(speed);
 *         },
 *       },
 *     },
 *   ],
 * });
 * await server.start();
 * ```
 *
 * Clients connect to the Unix socket named by the host's `apiServer` start
 * argument and exchange JSON frames terminated by 0x03:
 *
 * ```text
 * -> {"id": 1, "method": "objects/subscription", "params": {"toolhead": [], "response_template": {"id": 5}}}\x03
 * <- {"request_id": 1, "response": "ok"}\x03
 * <- {"id": 5, "params": {"status": {"toolhead": {"position": [0, 0, 0, 0]}}}}\x03
 * ```
 *
 * @packageDocumentation
 */

// Runtime exports
export { ApiServer } from './ApiServer.ts';
export { RequestRouter, invokeHandler, EMERGENCY_STOP_REASON } from './RequestRouter.ts';
export { WebRequest, RequestArgs } from './WebRequest.ts';
export { NodeReactor, NOW, NEVER } from './reactor.ts';
export { encodeFrame, splitFrames, decodeFrame, FRAME_TERMINATOR } from './codec.ts';
export {
  SubscriptionEngine,
  ALL_FIELDS,
  mergeFieldSelection,
  parseFieldSelection,
  parseSubscriptionSet,
} from './endpoints/SubscriptionEngine.ts';
export { GcodeOutputEndpoint } from './endpoints/GcodeOutputEndpoint.ts';
export { ListenerService } from './server/ListenerService.ts';
export { ConnectionChannel } from './server/ConnectionChannel.ts';
export { bindUnixSocket, NetListenSocket, NetStreamSocket } from './transports/index.ts';
export { definePlugin } from './plugins.ts';
export {
  ErrorCode,
  CommandError,
  WebRequestError,
  InvalidArgumentError,
  UnknownEndpointError,
  DuplicateEndpointError,
  MultipleResponseError,
  ValidationError,
  SocketError,
  hasErrorCode,
  getErrorCode,
} from './errors.ts';

// Type-only exports
export type {
  JsonValue,
  JsonObject,
  HostState,
  HostEvent,
  StartArgs,
  StatusProvider,
  GcodeOutputSource,
  ObjectRegistry,
  HostControl,
  HostEvents,
  Host,
  ApiServerOptions,
  EndpointHandler,
  EndpointRegistrar,
  ClientConnection,
} from './types.ts';

export type { RequestTask, HandlerOutcome } from './RequestRouter.ts';
export type { FieldSelection, SubscriptionSet } from './endpoints/SubscriptionEngine.ts';
export type { Reactor, ReactorTimer, FdHandle, Pollable, TimerCallback } from './reactor.ts';
export type { StreamSocket, ListenSocket, ListenSocketFactory } from './transports/index.ts';
export type { IncomingRequestFrame, RequestFrame, ReplyFrame, PushFrame } from './wire.ts';
export type { ApiPlugin, PluginContext } from './plugins.ts';
export type { ErrorPayload } from './errors.ts';
