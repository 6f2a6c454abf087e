/**
 * Closed classification of inbound client envelopes.
 *
 * The router never branches on raw method strings; it switches on the
 * `ClientCall` union produced here, so adding a method kind is a compile
 * error until every consumer handles it.
 */

import type {
  Envelope,
  NotificationEnvelope,
  Params,
  RequestEnvelope,
  RequestId,
  ResponseEnvelope,
} from './codec.js';

export const INITIALIZE = 'initialize';
export const INITIALIZED = 'notifications/initialized';
export const CANCELLED = 'notifications/cancelled';
export const PING = 'ping';

export type ClientCall =
  | { type: 'initialize'; request: RequestEnvelope }
  | { type: 'initialized'; notification: NotificationEnvelope }
  | { type: 'cancelled'; notification: NotificationEnvelope; requestId?: RequestId }
  | { type: 'request'; request: RequestEnvelope }
  | { type: 'notification'; notification: NotificationEnvelope }
  | { type: 'response'; response: ResponseEnvelope };

export function classify(envelope: Envelope): ClientCall {
  switch (envelope.kind) {
    case 'request':
      return envelope.method === INITIALIZE
        ? { type: 'initialize', request: envelope }
        : { type: 'request', request: envelope };
    case 'notification': {
      if (envelope.method === INITIALIZED) {
        return { type: 'initialized', notification: envelope };
      }
      if (envelope.method === CANCELLED) {
        const requestId = envelope.params?.requestId;
        return typeof requestId === 'string' || typeof requestId === 'number'
          ? { type: 'cancelled', notification: envelope, requestId }
          : { type: 'cancelled', notification: envelope };
      }
      return { type: 'notification', notification: envelope };
    }
    case 'response':
    case 'error':
      return { type: 'response', response: envelope };
  }
}

/** Thrown at the end of an exhaustive switch. */
export function assertNever(value: never): never {
  throw new Error(`Unhandled case: ${JSON.stringify(value)}`);
}

// ── params.server ──────────────────────────────────────────────────────────

export const SERVER_PARAM = 'server';

/**
 * The backend named by `params.server`.
 * Returns `undefined` when absent; `null` when present but not a usable name.
 */
export function readServerParam(params: Params | undefined): string | undefined | null {
  if (params === undefined || !(SERVER_PARAM in params)) return undefined;
  const server = params[SERVER_PARAM];
  return typeof server === 'string' && server.length > 0 ? server : null;
}

/** Params as forwarded to a backend: the routing field is gateway-only. */
export function stripServerParam(params: Params | undefined): Params | undefined {
  if (params === undefined || !(SERVER_PARAM in params)) return params;
  const { [SERVER_PARAM]: _server, ...rest } = params;
  return rest;
}
