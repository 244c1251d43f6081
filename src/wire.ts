/**
 * Wire protocol frames for the framed JSON Unix socket protocol.
 *
 * Every frame, in either direction, is one JSON value followed by 0x03.
 */

import type { JsonObject, JsonValue } from './types.ts';

// Client -> Server

/**
 * Request envelope as sent by a client.
 *
 * Clients name the target with either `path` or `method` and pass arguments
 * with either `args` or `params`.
 */
export interface IncomingRequestFrame {
  id: JsonValue;
  path?: string;
  method?: string;
  args?: JsonObject;
  params?: JsonObject;
}

/**
 * Request envelope after normalization.
 */
export interface RequestFrame {
  id: JsonValue;
  path: string;
  args: JsonObject;
}

// Server -> Client

/**
 * Direct reply to one request.
 */
export interface ReplyFrame {
  request_id: JsonValue;
  response: unknown;
}

/**
 * Server-initiated push: the client's own template with `params` replaced
 * by one key holding the live payload.
 */
export interface PushFrame {
  [key: string]: unknown;
  params: Record<string, unknown>;
}
