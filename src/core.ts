/**
 * Wires the transport-independent parts of the gateway together:
 * sessions, the backend pool and the router between them.
 */

import { BackendRegistry } from './backend/registry.js';
import type { BackendTransportFactory } from './backend/transport.js';
import { Router } from './router/router.js';
import { SessionManager } from './session/manager.js';
import type { GatewayConfig } from './shared/config.js';

export interface GatewayCore {
  sessions: SessionManager;
  registry: BackendRegistry;
  router: Router;
  readonly startedAt: number;
  /** Close every session and backend connection. */
  close(): Promise<void>;
}

export function createGatewayCore(config: GatewayConfig, transportFactory: BackendTransportFactory): GatewayCore {
  const sessions = new SessionManager({
    supportedProtocolVersions: config.supportedProtocolVersions,
    idleTimeoutMs: config.sessions.idleTimeoutMs,
    sweepIntervalMs: config.sessions.sweepIntervalMs,
  });

  const { backends } = config;
  const registry = new BackendRegistry(Object.keys(config.mcpServers), {
    handshakeTimeoutMs: backends.handshakeTimeoutMs,
    requestTimeoutMs: backends.requestTimeoutMs,
    protocolVersion: backends.protocolVersion,
    clientInfo: { name: backends.clientName, version: backends.clientVersion },
    transportFactory,
  });

  const router = new Router(sessions, registry, { notificationPolicy: backends.notificationPolicy });

  return {
    sessions,
    registry,
    router,
    startedAt: Date.now(),
    async close() {
      sessions.stop();
      sessions.closeAll('gateway shutting down');
      router.detach();
      await registry.closeAll();
    },
  };
}
