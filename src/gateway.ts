/**
 * MCP Session Gateway — entry point.
 *
 * Fronts several MCP servers behind one endpoint. Clients connect over HTTP
 * and/or a Unix-domain socket, initialize a session bound to one backend by
 * name, and have their calls multiplexed onto a single shared connection per
 * backend.
 *
 *   client ──HTTP / socket──► gateway ──stdio──► backend "github"
 *   client ──────────────────►        ──stdio──► backend "filesystem"
 */

import 'dotenv/config';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';

import { createStdioTransportFactory } from './backend/stdio-transport.js';
import type { BackendTransportFactory } from './backend/transport.js';
import { createGatewayCore, type GatewayCore } from './core.js';
import { getConfigPath, loadGatewayConfig, type GatewayConfig } from './shared/config.js';
import { createLogger } from './shared/logger.js';
import { createHttpApp } from './transports/http.js';
import { UnixSocketServer } from './transports/unix-socket.js';

const log = createLogger('gateway');

export interface RunningGateway {
  core: GatewayCore;
  /** Bound HTTP address, when the HTTP transport is enabled */
  httpAddress?: AddressInfo;
  socketPath?: string;
  stop(): Promise<void>;
}

/**
 * Start every enabled transport in front of a fresh gateway core.
 * Backends are spawned over stdio unless another transport factory is given.
 */
export async function startGateway(
  config: GatewayConfig,
  transportFactory: BackendTransportFactory = createStdioTransportFactory(config.mcpServers),
): Promise<RunningGateway> {
  const core = createGatewayCore(config, transportFactory);
  core.sessions.startSweeper();

  const servers = core.registry.serverNames();
  log.info(`${servers.length} backend server(s) configured${servers.length > 0 ? `: ${servers.join(', ')}` : ''}`);

  let httpServer: Server | undefined;
  let socketServer: UnixSocketServer | undefined;

  try {
    if (config.http.enabled) {
      const app = createHttpApp(core, config.http);
      const { host, port, endpoint } = config.http;
      httpServer = await new Promise<Server>((resolve, reject) => {
        const server = app.listen(port, host, (err?: Error) => (err ? reject(err) : resolve(server)));
        server.once('error', reject);
      });
      log.info(`HTTP transport listening on http://${host}:${port}${endpoint}`);
    }

    if (config.socket.enabled) {
      socketServer = new UnixSocketServer(core, config.socket);
      await socketServer.start();
    }
  } catch (err) {
    await closeHttp(httpServer);
    await core.close();
    throw err;
  }

  const address = httpServer?.address();
  return {
    core,
    ...(address !== undefined && address !== null && typeof address !== 'string' && { httpAddress: address }),
    ...(socketServer && { socketPath: socketServer.path }),
    async stop() {
      await socketServer?.stop();
      await closeHttp(httpServer);
      await core.close();
    },
  };
}

async function closeHttp(server: Server | undefined): Promise<void> {
  if (!server) return;
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

// ── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const configPath = getConfigPath();
  log.info(`Loading config from ${configPath}`);
  const config = loadGatewayConfig(configPath);

  if (!config.http.enabled && !config.socket.enabled) {
    throw new Error('No transport enabled: set http.enabled or socket.enabled in the config');
  }

  const gateway = await startGateway(config);

  // Graceful shutdown on SIGTERM / SIGINT
  const shutdown = () => {
    log.info('Shutting down gracefully...');
    gateway.stop().then(
      () => {
        log.info('Gateway stopped.');
        process.exit(0);
      },
      (err: unknown) => {
        log.error('Error during shutdown:', err);
        process.exit(1);
      },
    );

    // Force exit after 10 seconds if connections don't drain
    setTimeout(() => {
      log.error('Forced shutdown after timeout.');
      process.exit(1);
    }, 10_000).unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

// Only run when executed directly (not when imported by tests)
const isDirectRun = process.argv[1]?.endsWith('gateway.ts') || process.argv[1]?.endsWith('gateway.js');

if (isDirectRun) {
  main().catch((err: unknown) => {
    log.error('Fatal error:', err);
    process.exit(1);
  });
}
