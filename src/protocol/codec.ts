/**
 * JSON-RPC envelope codec.
 *
 * Decodes raw frames into a tagged `Envelope` union and encodes envelopes
 * back to their wire form. Holds no state and knows nothing about routing:
 * the only thing it guarantees is structural well-formedness.
 *
 *   request       { jsonrpc, id, method, params? }
 *   notification  { jsonrpc, method, params? }
 *   response      { jsonrpc, id, result }
 *   error         { jsonrpc, id | null, error: { code, message, data? } }
 */

import { z } from 'zod';

import { GatewayError } from '../shared/errors.js';

export const JSONRPC_VERSION = '2.0';

// ── Envelope types ─────────────────────────────────────────────────────────

export type RequestId = string | number;
export type Params = Record<string, unknown>;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface RequestEnvelope {
  kind: 'request';
  id: RequestId;
  method: string;
  params?: Params;
}

export interface NotificationEnvelope {
  kind: 'notification';
  method: string;
  params?: Params;
}

export interface ResultEnvelope {
  kind: 'response';
  id: RequestId;
  result: unknown;
}

export interface ErrorEnvelope {
  kind: 'error';
  id: RequestId | null;
  error: JsonRpcErrorObject;
}

export type ResponseEnvelope = ResultEnvelope | ErrorEnvelope;
export type Envelope = RequestEnvelope | NotificationEnvelope | ResponseEnvelope;

/** The plain JSON-RPC object an envelope is serialized as. */
export interface WireMessage {
  jsonrpc: typeof JSONRPC_VERSION;
  id?: RequestId | null;
  method?: string;
  params?: Params;
  result?: unknown;
  error?: JsonRpcErrorObject;
}

// ── Schema ─────────────────────────────────────────────────────────────────

const requestIdSchema = z.union([z.string(), z.number()]);

const wireSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: requestIdSchema.nullable().optional(),
  method: z.string().min(1).optional(),
  params: z.record(z.string(), z.unknown()).optional(),
  error: z
    .object({
      code: z.number().int(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

function has(value: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(value, key);
}

function malformed(message: string): GatewayError {
  return new GatewayError('Malformed', message);
}

// ── Decode ─────────────────────────────────────────────────────────────────

/** Validate an already-parsed JSON value as an envelope. */
export function decodeValue(value: unknown): Envelope {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw malformed('JSON-RPC message must be an object');
  }

  const parsed = wireSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'message';
    throw malformed(`Invalid JSON-RPC message: ${where}: ${issue.message}`);
  }
  const msg = parsed.data;
  const hasResult = has(value, 'result');
  const hasError = msg.error !== undefined;

  if (msg.method !== undefined) {
    if (hasResult || hasError) {
      throw malformed('A message cannot carry both a method and a result or error');
    }
    if (msg.id === undefined) {
      return { kind: 'notification', method: msg.method, ...(msg.params && { params: msg.params }) };
    }
    if (msg.id === null) {
      throw malformed('Request id must be a string or a number');
    }
    return { kind: 'request', id: msg.id, method: msg.method, ...(msg.params && { params: msg.params }) };
  }

  if (msg.id === undefined) {
    throw malformed('Message has neither a method nor an id');
  }
  if (hasResult === hasError) {
    throw malformed('A response must carry exactly one of result or error');
  }
  if (msg.error !== undefined) {
    return { kind: 'error', id: msg.id, error: msg.error };
  }
  if (msg.id === null) {
    throw malformed('Result response id must be a string or a number');
  }
  const result: unknown = Reflect.get(value, 'result');
  return { kind: 'response', id: msg.id, result };
}

/** Decode one frame (a JSON text, with or without its trailing newline). */
export function decode(frame: string | Buffer): Envelope {
  const text = (typeof frame === 'string' ? frame : frame.toString('utf-8')).trim();
  if (text.length === 0) {
    throw malformed('Empty message');
  }
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    throw malformed('Parse error: body is not valid JSON');
  }
  return decodeValue(value);
}

// ── Encode ─────────────────────────────────────────────────────────────────

export function toWire(envelope: Envelope): WireMessage {
  switch (envelope.kind) {
    case 'request':
      return {
        jsonrpc: JSONRPC_VERSION,
        id: envelope.id,
        method: envelope.method,
        ...(envelope.params && { params: envelope.params }),
      };
    case 'notification':
      return {
        jsonrpc: JSONRPC_VERSION,
        method: envelope.method,
        ...(envelope.params && { params: envelope.params }),
      };
    case 'response':
      return { jsonrpc: JSONRPC_VERSION, id: envelope.id, result: envelope.result };
    case 'error':
      return { jsonrpc: JSONRPC_VERSION, id: envelope.id, error: envelope.error };
  }
}

export function encode(envelope: Envelope): string {
  return JSON.stringify(toWire(envelope));
}

// ── Builders ───────────────────────────────────────────────────────────────

export function makeRequest(id: RequestId, method: string, params?: Params): RequestEnvelope {
  return { kind: 'request', id, method, ...(params && { params }) };
}

export function makeNotification(method: string, params?: Params): NotificationEnvelope {
  return { kind: 'notification', method, ...(params && { params }) };
}

export function makeResult(id: RequestId, result: unknown): ResultEnvelope {
  return { kind: 'response', id, result };
}

export function makeError(id: RequestId | null, error: JsonRpcErrorObject): ErrorEnvelope {
  return { kind: 'error', id, error };
}

export function errorEnvelope(id: RequestId | null, err: GatewayError): ErrorEnvelope {
  return makeError(id, err.toJsonRpcError());
}

/** Same response, different id. */
export function withId<T extends ResponseEnvelope>(response: T, id: RequestId): T {
  return { ...response, id };
}
