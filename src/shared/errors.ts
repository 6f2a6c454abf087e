/**
 * Gateway error taxonomy.
 *
 * Every failure the gateway reports to a client is a `GatewayError` with a
 * `kind`. Transport adapters turn the kind into their own surface: a JSON-RPC
 * error object (both transports) and an HTTP status (HTTP only).
 */

export type GatewayErrorKind =
  | 'Malformed'
  | 'MissingServerParameter'
  | 'ServerNotFound'
  | 'UnsupportedProtocolVersion'
  | 'HandshakeNotComplete'
  | 'InvalidServerBinding'
  | 'SessionNotFound'
  | 'BackendUnreachable'
  | 'BackendHandshakeFailed'
  | 'BackendTimeout'
  | 'BackendUnavailable'
  | 'RequestCancelled'
  | 'Internal';

interface ErrorSurface {
  /** JSON-RPC error code */
  code: number;
  /** HTTP status used by the HTTP adapter */
  httpStatus: number;
}

export const ERROR_SURFACES: Record<GatewayErrorKind, ErrorSurface> = {
  Malformed: { code: -32700, httpStatus: 400 },
  MissingServerParameter: { code: -32602, httpStatus: 400 },
  ServerNotFound: { code: -32001, httpStatus: 200 },
  UnsupportedProtocolVersion: { code: -32602, httpStatus: 400 },
  HandshakeNotComplete: { code: -32002, httpStatus: 400 },
  InvalidServerBinding: { code: -32602, httpStatus: 400 },
  SessionNotFound: { code: -32003, httpStatus: 404 },
  BackendUnreachable: { code: -32010, httpStatus: 200 },
  BackendHandshakeFailed: { code: -32011, httpStatus: 200 },
  BackendTimeout: { code: -32012, httpStatus: 200 },
  BackendUnavailable: { code: -32013, httpStatus: 200 },
  RequestCancelled: { code: -32800, httpStatus: 200 },
  Internal: { code: -32603, httpStatus: 500 },
};

export interface GatewayErrorOptions extends ErrorOptions {
  /** Backend server the failure relates to, when there is one */
  server?: string;
}

export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly server?: string;

  constructor(kind: GatewayErrorKind, message: string, options: GatewayErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GatewayError';
    this.kind = kind;
    this.server = options.server;
  }

  get code(): number {
    return ERROR_SURFACES[this.kind].code;
  }

  get httpStatus(): number {
    return ERROR_SURFACES[this.kind].httpStatus;
  }

  /** The `error` member of a JSON-RPC error response. */
  toJsonRpcError(): { code: number; message: string; data: { type: GatewayErrorKind; server?: string } } {
    return {
      code: this.code,
      message: this.message,
      data: {
        type: this.kind,
        ...(this.server !== undefined && { server: this.server }),
      },
    };
  }
}

// ── Utilities ──

export function isGatewayError(value: unknown, kind?: GatewayErrorKind): value is GatewayError {
  return value instanceof GatewayError && (kind === undefined || value.kind === kind);
}

/** Coerce an unknown thrown value to a GatewayError (preserves the cause chain). */
export function toGatewayError(value: unknown): GatewayError {
  if (value instanceof GatewayError) return value;
  return new GatewayError('Internal', errorMessage(value), { cause: value });
}

/** Extract an error message string from an unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return 'Unknown error';
  return String(value);
}
