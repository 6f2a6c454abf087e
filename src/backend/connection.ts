/**
 * BackendConnection — one multiplexed stream to one named backend server.
 *
 * Performs the backend-side initialize handshake once, then carries calls
 * from any number of sessions. Outstanding calls live in the connection's
 * CorrelationTable; replies are matched by gateway id and handed back to
 * whoever is awaiting `forward()`.
 *
 * Lifecycle:
 *
 *   open()  ──► transport.start()            (BackendUnreachable on failure)
 *           ──► initialize  ──► result       (BackendHandshakeFailed on error/timeout)
 *           ──► notifications/initialized
 *           ──► open, handshake Done
 *
 *   transport closes ──► every pending call fails with BackendUnavailable,
 *                        'closed' is emitted, the connection is never reused.
 *
 * Events:
 *   'notification' (envelope: NotificationEnvelope) — sent by the backend on its own
 *   'closed'       (reason: GatewayError)
 */

import { EventEmitter } from 'node:events';

import {
  decodeValue,
  makeError,
  makeNotification,
  makeRequest,
  makeResult,
  toWire,
  type Envelope,
  type Params,
  type RequestEnvelope,
  type RequestId,
  type ResponseEnvelope,
} from '../protocol/codec.js';
import { CANCELLED, INITIALIZE, INITIALIZED, PING } from '../protocol/methods.js';
import { GatewayError, errorMessage, isGatewayError } from '../shared/errors.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { CorrelationTable, type CallOrigin, type Registration } from './correlation.js';
import type { BackendTransport } from './transport.js';

export type HandshakeState = 'NotStarted' | 'InFlight' | 'Done';
export type ConnectionState = 'idle' | 'opening' | 'open' | 'closed';

export interface BackendConnectionOptions {
  handshakeTimeoutMs: number;
  requestTimeoutMs: number;
  /** Protocol version requested from the backend */
  protocolVersion: string;
  clientInfo: { name: string; version: string };
}

export interface ForwardedCall {
  sessionId: string;
  clientId: RequestId;
  method: string;
  params?: Params;
}

const METHOD_NOT_FOUND = -32601;

export class BackendConnection extends EventEmitter {
  readonly table: CorrelationTable;
  private state: ConnectionState = 'idle';
  private handshake: HandshakeState = 'NotStarted';
  private initializeResult: Params | null = null;
  private readonly log: Logger;

  constructor(
    readonly serverName: string,
    private readonly transport: BackendTransport,
    private readonly options: BackendConnectionOptions,
  ) {
    super();
    this.table = new CorrelationTable(serverName);
    this.log = createLogger(`backend:${serverName}`);
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  get handshakeState(): HandshakeState {
    return this.handshake;
  }

  /** The backend's InitializeResult, available once the handshake is done. */
  get serverInitializeResult(): Params {
    if (this.initializeResult === null) {
      throw new GatewayError('Internal', `${this.serverName} has not completed its handshake`, {
        server: this.serverName,
      });
    }
    return this.initializeResult;
  }

  get pendingCount(): number {
    return this.table.size;
  }

  // ── Lifecycle ────────────────────────────────────────────────────────────

  /** Start the transport and run the backend handshake. Returns the InitializeResult. */
  async open(): Promise<Params> {
    if (this.state !== 'idle') {
      throw new GatewayError('Internal', `connection to ${this.serverName} was already opened`, {
        server: this.serverName,
      });
    }
    this.state = 'opening';

    this.transport.onmessage = (message) => this.onBackendMessage(message);
    this.transport.onclose = () => {
      this.teardown(
        new GatewayError('BackendUnavailable', `Connection to ${this.serverName} closed`, {
          server: this.serverName,
        }),
      );
    };
    this.transport.onerror = (error) => {
      this.log.warn(`Transport error: ${error.message}`);
    };

    try {
      await this.transport.start();
    } catch (err) {
      this.state = 'closed';
      throw new GatewayError('BackendUnreachable', `Cannot reach ${this.serverName}: ${errorMessage(err)}`, {
        server: this.serverName,
        cause: err,
      });
    }

    this.handshake = 'InFlight';
    try {
      const result = await this.initialize();
      await this.send(makeNotification(INITIALIZED));
      this.initializeResult = result;
      this.handshake = 'Done';
      this.state = 'open';
      this.log.info('Handshake complete');
      return result;
    } catch (err) {
      this.handshake = 'NotStarted';
      const failure = isGatewayError(err, 'BackendHandshakeFailed')
        ? err
        : new GatewayError('BackendHandshakeFailed', `Handshake with ${this.serverName} failed: ${errorMessage(err)}`, {
            server: this.serverName,
            cause: err,
          });
      await this.close(failure);
      throw failure;
    }
  }

  private async initialize(): Promise<Params> {
    const params = {
      protocolVersion: this.options.protocolVersion,
      capabilities: {},
      clientInfo: this.options.clientInfo,
    };
    const reply = await this.call({ method: INITIALIZE }, params, this.options.handshakeTimeoutMs);
    if (reply.kind === 'error') {
      throw new GatewayError('BackendHandshakeFailed', `${this.serverName} rejected initialize: ${reply.error.message}`, {
        server: this.serverName,
      });
    }
    const result = reply.result;
    if (typeof result !== 'object' || result === null || Array.isArray(result)) {
      throw new GatewayError('BackendHandshakeFailed', `${this.serverName} sent an invalid InitializeResult`, {
        server: this.serverName,
      });
    }
    return { ...result };
  }

  /**
   * Close the connection. Pending calls fail with `reason`
   * (BackendUnavailable by default).
   */
  async close(reason?: GatewayError): Promise<void> {
    this.teardown(
      reason ??
        new GatewayError('BackendUnavailable', `Connection to ${this.serverName} was closed by the gateway`, {
          server: this.serverName,
        }),
    );
    try {
      await this.transport.close();
    } catch (err) {
      this.log.warn(`Error closing transport: ${errorMessage(err)}`);
    }
  }

  private teardown(reason: GatewayError): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    const drained = this.table.drain(reason);
    if (drained > 0) {
      this.log.warn(`Connection lost with ${drained} call(s) in flight`);
    } else {
      this.log.info('Connection closed');
    }
    this.emit('closed', reason);
  }

  // ── Outbound ─────────────────────────────────────────────────────────────

  /**
   * Forward a session's request. Resolves with the backend's reply, whose id
   * is still the gateway id; mapping it back to the client id is the caller's job.
   */
  async forward(call: ForwardedCall): Promise<ResponseEnvelope> {
    if (!this.isOpen) {
      throw new GatewayError('BackendUnreachable', `Connection to ${this.serverName} is not open`, {
        server: this.serverName,
      });
    }
    return this.call(
      { sessionId: call.sessionId, clientId: call.clientId, method: call.method },
      call.params,
      this.options.requestTimeoutMs,
    );
  }

  /** Forward a notification from a session. */
  async notify(method: string, params?: Params): Promise<void> {
    if (!this.isOpen) {
      throw new GatewayError('BackendUnreachable', `Connection to ${this.serverName} is not open`, {
        server: this.serverName,
      });
    }
    await this.sendOrFail(makeNotification(method, params));
  }

  /**
   * Relay a client's cancellation of one of its own calls. The request id is
   * rewritten to the gateway id; the waiting caller gets RequestCancelled.
   * Returns false when the session has no such call outstanding.
   */
  async cancel(sessionId: string, clientId: RequestId, params?: Params): Promise<boolean> {
    const gatewayId = this.table.findGatewayId(sessionId, clientId);
    if (gatewayId === undefined || !this.isOpen) return false;
    await this.sendOrFail(makeNotification(CANCELLED, { ...params, requestId: gatewayId }));
    this.table.fail(
      gatewayId,
      new GatewayError('RequestCancelled', `Request ${String(clientId)} was cancelled by the client`, {
        server: this.serverName,
      }),
    );
    return true;
  }

  private async call(origin: CallOrigin, params: Params | undefined, timeoutMs: number): Promise<ResponseEnvelope> {
    let registration: Registration;
    try {
      registration = this.table.register(origin, timeoutMs);
    } catch (err) {
      // A broken correlation table is fatal to this connection only.
      this.log.error(`Correlation invariant violated: ${errorMessage(err)}`);
      await this.close();
      throw new GatewayError('BackendUnavailable', `Connection to ${this.serverName} was reset`, {
        server: this.serverName,
        cause: err,
      });
    }

    const { gatewayId, response } = registration;
    // The caller's own call fails as unreachable; everything else still
    // pending on the dead stream is drained as unavailable.
    const sent = this.send(makeRequest(gatewayId, origin.method, params)).catch(async (err: unknown) => {
      const failure = toUnreachable(this.serverName, err);
      this.table.fail(gatewayId, failure);
      this.log.warn(`Send failed: ${failure.message}`);
      await this.close(this.lostConnection(err));
      throw failure;
    });
    const [, reply] = await Promise.all([sent, response]);
    return reply;
  }

  private lostConnection(cause: unknown): GatewayError {
    return new GatewayError('BackendUnavailable', `Connection to ${this.serverName} failed`, {
      server: this.serverName,
      cause,
    });
  }

  private async send(envelope: Envelope): Promise<void> {
    await this.transport.send(toWire(envelope));
  }

  /** Send, tearing the connection down if the stream is gone. */
  private async sendOrFail(envelope: Envelope): Promise<void> {
    try {
      await this.send(envelope);
    } catch (err) {
      const failure = toUnreachable(this.serverName, err);
      this.log.warn(`Send failed: ${failure.message}`);
      await this.close(this.lostConnection(err));
      throw failure;
    }
  }

  // ── Inbound ──────────────────────────────────────────────────────────────

  /** Handle one message from the backend. */
  onBackendMessage(message: unknown): void {
    let envelope: Envelope;
    try {
      envelope = decodeValue(message);
    } catch (err) {
      this.log.warn(`Dropping malformed message: ${errorMessage(err)}`);
      return;
    }

    switch (envelope.kind) {
      case 'response':
      case 'error': {
        const record = this.table.resolve(envelope);
        if (!record) {
          this.log.warn(`Dropping reply with unknown id ${JSON.stringify(envelope.id)}`);
        }
        return;
      }
      case 'notification':
        this.log.debug(`Notification ${envelope.method}`);
        this.emit('notification', envelope);
        return;
      case 'request':
        this.answerBackendRequest(envelope);
        return;
    }
  }

  /** Requests a backend sends on its own: only ping is served. */
  private answerBackendRequest(request: RequestEnvelope): void {
    const reply =
      request.method === PING
        ? makeResult(request.id, {})
        : makeError(request.id, {
            code: METHOD_NOT_FOUND,
            message: `Method not supported by the gateway: ${request.method}`,
          });
    if (request.method !== PING) {
      this.log.debug(`Refusing backend request ${request.method}`);
    }
    this.send(reply).catch((err: unknown) => {
      this.log.warn(`Could not answer ${request.method}: ${errorMessage(err)}`);
    });
  }
}

function toUnreachable(serverName: string, err: unknown): GatewayError {
  if (isGatewayError(err, 'BackendUnreachable')) return err;
  return new GatewayError('BackendUnreachable', `Cannot send to ${serverName}: ${errorMessage(err)}`, {
    server: serverName,
    cause: err,
  });
}
