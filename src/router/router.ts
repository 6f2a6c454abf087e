/**
 * Router — decides what happens to every envelope a client sends.
 *
 * Transport adapters hand over a decoded envelope plus the session id they
 * hold (if any); the router enforces handshake ordering through the
 * SessionManager, picks the backend, rewrites ids through the backend
 * connection and maps the reply back to the id the client used.
 *
 * Failures that concern the client's own envelope are thrown as
 * GatewayError; each adapter renders them in its own way.
 */

import type { BackendRegistry } from '../backend/registry.js';
import {
  makeResult,
  withId,
  type NotificationEnvelope,
  type Params,
  type RequestEnvelope,
  type RequestId,
  type ResponseEnvelope,
  type Envelope,
} from '../protocol/codec.js';
import { assertNever, classify, readServerParam, stripServerParam } from '../protocol/methods.js';
import type { NotificationPolicy } from '../shared/config.js';
import { GatewayError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { ClientInfo, DeliverySink, Session, SessionManager, TransportKind } from '../session/manager.js';

const log = createLogger('router');

export interface DispatchContext {
  /** Session the adapter currently holds for this client */
  sessionId?: string;
  transport: TransportKind;
  /** Sink for backend notifications; stored on sessions created by this dispatch */
  deliver?: DeliverySink;
}

export interface DispatchResult {
  /** Reply for the client; absent for notifications and client responses */
  response?: ResponseEnvelope;
  /** Session the envelope was handled in (new after an initialize) */
  sessionId?: string;
}

export interface RouterOptions {
  notificationPolicy: NotificationPolicy;
}

export class Router {
  private readonly onSessionClosed = (session: Session) => {
    const released = this.registry.releaseSession(session.id);
    if (released > 0) {
      log.debug(`Released ${released} in-flight call(s) of session ${session.id}`);
    }
  };

  private readonly onBackendNotification = (server: string, envelope: NotificationEnvelope) => {
    this.fanOut(server, envelope);
  };

  constructor(
    private readonly sessions: SessionManager,
    private readonly registry: BackendRegistry,
    private readonly options: RouterOptions,
  ) {
    sessions.on('closed', this.onSessionClosed);
    registry.on('notification', this.onBackendNotification);
  }

  /** Stop listening to the session manager and the registry. */
  detach(): void {
    this.sessions.off('closed', this.onSessionClosed);
    this.registry.off('notification', this.onBackendNotification);
  }

  async dispatch(envelope: Envelope, ctx: DispatchContext): Promise<DispatchResult> {
    if (ctx.sessionId !== undefined) {
      this.sessions.touch(ctx.sessionId);
    }

    const call = classify(envelope);
    switch (call.type) {
      case 'initialize':
        return this.initialize(call.request, ctx);
      case 'initialized': {
        const session = this.sessions.completeHandshake(this.requireSessionId(ctx));
        return { sessionId: session.id };
      }
      case 'cancelled':
        await this.cancel(call.notification, call.requestId, ctx);
        return this.continued(ctx);
      case 'request':
        return this.forward(call.request, ctx);
      case 'notification':
        await this.relayNotification(call.notification, ctx);
        return this.continued(ctx);
      case 'response':
        log.debug(`Dropping client response to ${JSON.stringify(call.response.id)}`);
        return this.continued(ctx);
      default:
        return assertNever(call);
    }
  }

  // ── initialize ───────────────────────────────────────────────────────────

  private async initialize(request: RequestEnvelope, ctx: DispatchContext): Promise<DispatchResult> {
    const server = readServerParam(request.params);
    if (server === undefined || server === null) {
      throw new GatewayError('MissingServerParameter', 'initialize requires params.server naming a backend');
    }
    if (!this.registry.isConfigured(server)) {
      throw new GatewayError('ServerNotFound', `Server not found: ${server}`, { server });
    }
    const protocolVersion = request.params?.protocolVersion;
    if (typeof protocolVersion !== 'string') {
      throw new GatewayError('UnsupportedProtocolVersion', 'initialize requires params.protocolVersion');
    }

    if (ctx.sessionId !== undefined) {
      this.sessions.close(ctx.sessionId, 're-initialized');
    }

    const clientInfo = readClientInfo(request.params);
    const session = this.sessions.createSession({
      protocolVersion,
      boundServer: server,
      transport: ctx.transport,
      ...(clientInfo && { clientInfo }),
      ...(ctx.deliver && { deliver: ctx.deliver }),
    });

    try {
      const conn = await this.registry.get(server);
      if (!this.sessions.get(session.id)) {
        throw new GatewayError('RequestCancelled', 'Session closed during initialize', { server });
      }
      this.sessions.markInitializeRelayed(session.id);
      const result = { ...conn.serverInitializeResult, protocolVersion: session.protocolVersion };
      return { response: makeResult(request.id, result), sessionId: session.id };
    } catch (err) {
      this.sessions.close(session.id, `initialize failed: ${errorMessage(err)}`);
      throw err;
    }
  }

  // ── Requests ─────────────────────────────────────────────────────────────

  private async forward(request: RequestEnvelope, ctx: DispatchContext): Promise<DispatchResult> {
    const session = this.sessions.requireActive(this.requireSessionId(ctx));
    const server = this.resolveTarget(session, request.params);

    // Establishing may re-run the backend handshake; the session can close meanwhile
    const conn = await this.registry.get(server);
    if (this.sessions.get(session.id)?.state !== 'Active') {
      throw new GatewayError('RequestCancelled', 'Session closed before the request was forwarded', { server });
    }

    const reply = await conn.forward({
      sessionId: session.id,
      clientId: request.id,
      method: request.method,
      ...(request.params && { params: stripServerParam(request.params) }),
    });

    if (!this.sessions.get(session.id)) {
      log.debug(`Discarding reply for closed session ${session.id}`);
      throw new GatewayError('RequestCancelled', 'Session closed while the request was in flight', { server });
    }
    return { response: withId(reply, request.id), sessionId: session.id };
  }

  /** Sessions are sticky: `params.server`, when given, must name the bound backend. */
  private resolveTarget(session: Session, params: Params | undefined): string {
    const named = readServerParam(params);
    if (named === undefined) return session.boundServer;
    if (named === null) {
      throw new GatewayError('InvalidServerBinding', 'params.server must be a non-empty string');
    }
    if (!this.registry.isConfigured(named)) {
      throw new GatewayError('ServerNotFound', `Server not found: ${named}`, { server: named });
    }
    if (named !== session.boundServer) {
      throw new GatewayError(
        'InvalidServerBinding',
        `Session is bound to ${session.boundServer}, not ${named}`,
        { server: named },
      );
    }
    return named;
  }

  // ── Notifications ────────────────────────────────────────────────────────

  private async cancel(
    notification: NotificationEnvelope,
    requestId: RequestId | undefined,
    ctx: DispatchContext,
  ): Promise<void> {
    const session = this.sessions.lookup(this.requireSessionId(ctx));
    const conn = this.registry.peek(session.boundServer);
    if (requestId === undefined || !conn) {
      log.debug(`Dropping cancellation from session ${session.id}: nothing to cancel`);
      return;
    }
    const params = stripServerParam(notification.params);
    try {
      const cancelled = await conn.cancel(session.id, requestId, params);
      if (!cancelled) {
        log.debug(`Dropping cancellation of ${JSON.stringify(requestId)}: not in flight`);
      }
    } catch (err) {
      log.warn(`Could not relay cancellation to ${session.boundServer}: ${errorMessage(err)}`);
    }
  }

  private async relayNotification(notification: NotificationEnvelope, ctx: DispatchContext): Promise<void> {
    const session = this.sessions.lookup(this.requireSessionId(ctx));
    if (session.state !== 'Active') {
      log.debug(`Dropping ${notification.method} from session ${session.id} (${session.state})`);
      return;
    }
    try {
      const conn = await this.registry.get(session.boundServer);
      await conn.notify(notification.method, stripServerParam(notification.params));
    } catch (err) {
      log.warn(`Could not relay ${notification.method} to ${session.boundServer}: ${errorMessage(err)}`);
    }
  }

  /** Hand a backend's own notification to the sessions bound to it. */
  private fanOut(server: string, envelope: NotificationEnvelope): void {
    if (this.options.notificationPolicy === 'drop') {
      log.debug(`Dropping ${envelope.method} from ${server}`);
      return;
    }
    for (const session of this.sessions.sessionsBoundTo(server)) {
      if (session.state !== 'Active' || !session.deliver) continue;
      try {
        session.deliver(envelope);
      } catch (err) {
        log.warn(`Delivery to session ${session.id} failed: ${errorMessage(err)}`);
      }
    }
  }

  // ── Helpers ──────────────────────────────────────────────────────────────

  private requireSessionId(ctx: DispatchContext): string {
    if (ctx.sessionId === undefined) {
      throw new GatewayError('HandshakeNotComplete', 'No session: send initialize first');
    }
    return ctx.sessionId;
  }

  private continued(ctx: DispatchContext): DispatchResult {
    return ctx.sessionId !== undefined ? { sessionId: ctx.sessionId } : {};
  }
}

function readClientInfo(params: Params | undefined): ClientInfo | undefined {
  const info = params?.clientInfo;
  if (typeof info !== 'object' || info === null) return undefined;
  const name: unknown = Reflect.get(info, 'name');
  const version: unknown = Reflect.get(info, 'version');
  return typeof name === 'string' && typeof version === 'string' ? { name, version } : undefined;
}
