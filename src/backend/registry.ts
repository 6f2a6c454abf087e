/**
 * BackendRegistry — owns the pool of backend connections.
 *
 * Keyed by server name, with at most one live connection per name shared by
 * every session bound to it. Connections are established lazily on first
 * use; concurrent first requests for the same name join a single in-flight
 * establishment (one transport, one handshake). A connection that closes is
 * dropped from the pool and the next request re-establishes it.
 *
 * Events:
 *   'notification' (serverName: string, envelope: NotificationEnvelope)
 */

import { EventEmitter } from 'node:events';

import type { NotificationEnvelope, ResponseEnvelope } from '../protocol/codec.js';
import { GatewayError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import {
  BackendConnection,
  type BackendConnectionOptions,
  type ConnectionState,
  type ForwardedCall,
} from './connection.js';
import type { BackendTransport, BackendTransportFactory } from './transport.js';

const log = createLogger('registry');

export interface BackendRegistryOptions extends BackendConnectionOptions {
  transportFactory: BackendTransportFactory;
}

export interface BackendStatus {
  server: string;
  state: ConnectionState;
  pendingCalls: number;
  /** Completed backend handshakes since the gateway started */
  handshakes: number;
}

export class BackendRegistry extends EventEmitter {
  private readonly servers: ReadonlySet<string>;
  private readonly connections = new Map<string, BackendConnection>();
  private readonly establishing = new Map<string, Promise<BackendConnection>>();
  private readonly handshakes = new Map<string, number>();

  constructor(
    servers: Iterable<string>,
    private readonly options: BackendRegistryOptions,
  ) {
    super();
    this.servers = new Set(servers);
  }

  isConfigured(serverName: string): boolean {
    return this.servers.has(serverName);
  }

  serverNames(): string[] {
    return [...this.servers].sort();
  }

  /** The live connection for a name, without establishing one. */
  peek(serverName: string): BackendConnection | undefined {
    const conn = this.connections.get(serverName);
    return conn?.isOpen ? conn : undefined;
  }

  /**
   * Get the live connection for a backend, establishing it if needed.
   *
   * @throws GatewayError ServerNotFound (nothing is contacted),
   *   BackendUnreachable, BackendHandshakeFailed.
   */
  async get(serverName: string): Promise<BackendConnection> {
    if (!this.isConfigured(serverName)) {
      throw new GatewayError('ServerNotFound', `Server not found: ${serverName}`, { server: serverName });
    }

    const live = this.peek(serverName);
    if (live) return live;

    const inFlight = this.establishing.get(serverName);
    if (inFlight) return inFlight;

    const attempt = this.establish(serverName);
    this.establishing.set(serverName, attempt);
    try {
      return await attempt;
    } finally {
      this.establishing.delete(serverName);
    }
  }

  private async establish(serverName: string): Promise<BackendConnection> {
    log.info(`Connecting to backend ${serverName}`);

    let transport: BackendTransport;
    try {
      transport = await this.options.transportFactory(serverName);
    } catch (err) {
      throw new GatewayError('BackendUnreachable', `Cannot open transport to ${serverName}: ${errorMessage(err)}`, {
        server: serverName,
        cause: err,
      });
    }

    const conn = new BackendConnection(serverName, transport, this.options);
    conn.on('notification', (envelope: NotificationEnvelope) => {
      this.emit('notification', serverName, envelope);
    });
    conn.on('closed', (reason: GatewayError) => {
      if (this.connections.get(serverName) === conn) {
        this.connections.delete(serverName);
        log.warn(`Backend ${serverName} removed from pool: ${reason.message}`);
      }
    });

    try {
      await conn.open();
    } catch (err) {
      log.error(`Backend ${serverName} failed to connect: ${errorMessage(err)}`);
      throw err;
    }

    this.connections.set(serverName, conn);
    this.handshakes.set(serverName, (this.handshakes.get(serverName) ?? 0) + 1);
    return conn;
  }

  /** Forward a session's request to the named backend. */
  async forward(serverName: string, call: ForwardedCall): Promise<ResponseEnvelope> {
    const conn = await this.get(serverName);
    return conn.forward(call);
  }

  /** Release every correlation record a session holds, on every connection. */
  releaseSession(sessionId: string): number {
    let released = 0;
    for (const conn of this.connections.values()) {
      released += conn.table.releaseSession(sessionId);
    }
    return released;
  }

  status(): BackendStatus[] {
    return this.serverNames().map((server) => {
      const conn = this.connections.get(server);
      const state: ConnectionState = this.establishing.has(server) ? 'opening' : (conn?.connectionState ?? 'idle');
      return {
        server,
        state,
        pendingCalls: conn?.pendingCount ?? 0,
        handshakes: this.handshakes.get(server) ?? 0,
      };
    });
  }

  async closeAll(): Promise<void> {
    const conns = [...this.connections.values()];
    this.connections.clear();
    await Promise.all(conns.map((conn) => conn.close()));
  }
}
