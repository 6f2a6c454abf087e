/**
 * HTTP transport adapter (express).
 *
 * One JSON-RPC envelope per POST. The session travels in the
 * `Mcp-Session-Id` header: it is issued on a successful initialize and must
 * accompany every later call.
 *
 *   POST   <endpoint>   envelope in, envelope out (202 for notifications)
 *   GET    <endpoint>   liveness probe
 *   DELETE <endpoint>   end the session named by Mcp-Session-Id
 *   GET    /health      gateway status
 *
 * Requests whose Origin header names a host outside the allow-list are
 * refused with 403 before anything else happens.
 */

import express, { type ErrorRequestHandler, type RequestHandler } from 'express';

import type { GatewayCore } from '../core.js';
import { decode, errorEnvelope, toWire, type Envelope, type RequestId } from '../protocol/codec.js';
import type { HttpSettings } from '../shared/config.js';
import { GatewayError, errorMessage, toGatewayError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('http');

export const SESSION_HEADER = 'Mcp-Session-Id';
export const PROTOCOL_VERSION_HEADER = 'MCP-Protocol-Version';

export type HttpAppOptions = Pick<HttpSettings, 'endpoint' | 'allowedOriginHosts'>;

/**
 * Origins are compared by hostname. The literal "null" origin (file:// pages,
 * sandboxed frames on the local machine) is accepted.
 */
export function isOriginAllowed(origin: string, allowedHosts: readonly string[]): boolean {
  if (origin === 'null') return true;
  if (!URL.canParse(origin)) return false;
  return allowedHosts.includes(new URL(origin).hostname);
}

function originGuard(allowedHosts: readonly string[]): RequestHandler {
  return (req, res, next) => {
    const origin = req.get('Origin');
    if (origin !== undefined && !isOriginAllowed(origin, allowedHosts)) {
      log.warn(`Rejected request from origin ${origin}`);
      res.status(403).json({ error: 'Origin not allowed' });
      return;
    }
    next();
  };
}

export function createHttpApp(core: GatewayCore, options: HttpAppOptions) {
  const app = express();
  const { endpoint } = options;

  app.use(originGuard(options.allowedOriginHosts));
  // Bodies are decoded by the codec, not by express
  app.use(endpoint, express.raw({ type: () => true, limit: '4mb' }));

  // ── JSON-RPC ───────────────────────────────────────────────────────────

  app.post(endpoint, async (req, res) => {
    const sessionId = req.get(SESSION_HEADER);
    let envelope: Envelope | undefined;

    try {
      envelope = decode(Buffer.isBuffer(req.body) ? req.body : '');

      const version = req.get(PROTOCOL_VERSION_HEADER);
      if (version !== undefined && !core.sessions.isSupportedVersion(version)) {
        throw new GatewayError('UnsupportedProtocolVersion', `Unsupported ${PROTOCOL_VERSION_HEADER}: ${version}`);
      }

      const result = await core.router.dispatch(envelope, {
        transport: 'http',
        ...(sessionId !== undefined && { sessionId }),
      });

      if (result.sessionId !== undefined) {
        res.set(SESSION_HEADER, result.sessionId);
      }
      if (!result.response) {
        res.status(202).end();
        return;
      }
      res.status(200).json(toWire(result.response));
    } catch (err) {
      const failure = toGatewayError(err);
      const id: RequestId | null = envelope?.kind === 'request' ? envelope.id : null;
      if (failure.kind === 'Internal') {
        log.error(`Unexpected failure handling request: ${failure.message}`, err);
      } else {
        log.debug(`${failure.kind}: ${failure.message}`);
      }
      if (sessionId !== undefined && core.sessions.get(sessionId)) {
        res.set(SESSION_HEADER, sessionId);
      }
      res.status(failure.httpStatus).json(toWire(errorEnvelope(id, failure)));
    }
  });

  app.get(endpoint, (_req, res) => {
    res.json({ status: 'ok', endpoint });
  });

  app.delete(endpoint, (req, res) => {
    const sessionId = req.get(SESSION_HEADER);
    if (sessionId === undefined) {
      const failure = new GatewayError('HandshakeNotComplete', `Missing ${SESSION_HEADER} header`);
      res.status(failure.httpStatus).json(toWire(errorEnvelope(null, failure)));
      return;
    }
    if (!core.sessions.close(sessionId, 'closed by client')) {
      const failure = new GatewayError('SessionNotFound', `Session not found: ${sessionId}`);
      res.status(failure.httpStatus).json(toWire(errorEnvelope(null, failure)));
      return;
    }
    res.status(204).end();
  });

  // ── Health check ───────────────────────────────────────────────────────

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      activeSessions: core.sessions.size,
      backends: core.registry.status(),
      uptime: process.uptime(),
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    log.warn(`Request rejected: ${errorMessage(err)}`);
    const failure = new GatewayError('Malformed', `Unreadable request body: ${errorMessage(err)}`);
    res.status(failure.httpStatus).json(toWire(errorEnvelope(null, failure)));
  };
  app.use(onError);

  return app;
}
