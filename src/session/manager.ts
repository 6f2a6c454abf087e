/**
 * SessionManager — authoritative table of client sessions.
 *
 * Transport adapters only ever hold a session id; everything else about a
 * session (handshake phase, negotiated version, bound backend, activity)
 * lives here.
 *
 *   Uninitialized ──markInitializeRelayed──► AwaitingInitializedNotification
 *                                                │ completeHandshake
 *                                                ▼
 *                                              Active
 *
 * Closed is reachable from every state and is terminal; a closed session is
 * removed from the table, so a later lookup fails with SessionNotFound.
 *
 * Events:
 *   'closed' (session: Session, reason: string)
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';

import type { NotificationEnvelope } from '../protocol/codec.js';
import { GatewayError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('sessions');

export type SessionState = 'Uninitialized' | 'AwaitingInitializedNotification' | 'Active' | 'Closed';
export type TransportKind = 'http' | 'socket';

export interface ClientInfo {
  name: string;
  version: string;
}

/** Where backend-initiated notifications for a session are written. */
export type DeliverySink = (envelope: NotificationEnvelope) => void;

export interface Session {
  readonly id: string;
  readonly protocolVersion: string;
  readonly clientInfo?: ClientInfo;
  readonly boundServer: string;
  readonly transport: TransportKind;
  state: SessionState;
  readonly createdAt: number;
  lastActivity: number;
  deliver?: DeliverySink;
}

export interface CreateSessionInput {
  protocolVersion: string;
  clientInfo?: ClientInfo;
  boundServer: string;
  transport: TransportKind;
  deliver?: DeliverySink;
}

export interface SessionManagerOptions {
  supportedProtocolVersions: readonly string[];
  idleTimeoutMs: number;
  sweepIntervalMs: number;
}

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  Uninitialized: ['AwaitingInitializedNotification', 'Closed'],
  AwaitingInitializedNotification: ['Active', 'Closed'],
  Active: ['Closed'],
  Closed: [],
};

export class SessionManager extends EventEmitter {
  private readonly sessions = new Map<string, Session>();
  private readonly supported: ReadonlySet<string>;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(private readonly options: SessionManagerOptions) {
    super();
    this.supported = new Set(options.supportedProtocolVersions);
  }

  get size(): number {
    return this.sessions.size;
  }

  isSupportedVersion(version: string): boolean {
    return this.supported.has(version);
  }

  /** @throws GatewayError('UnsupportedProtocolVersion') */
  createSession(input: CreateSessionInput): Session {
    if (!this.isSupportedVersion(input.protocolVersion)) {
      throw new GatewayError(
        'UnsupportedProtocolVersion',
        `Unsupported protocol version: ${input.protocolVersion} (supported: ${[...this.supported].join(', ')})`,
      );
    }
    const now = Date.now();
    const session: Session = {
      id: randomUUID(),
      protocolVersion: input.protocolVersion,
      ...(input.clientInfo && { clientInfo: input.clientInfo }),
      boundServer: input.boundServer,
      transport: input.transport,
      state: 'Uninitialized',
      createdAt: now,
      lastActivity: now,
      ...(input.deliver && { deliver: input.deliver }),
    };
    this.sessions.set(session.id, session);
    log.info(`Session ${session.id} created (${session.transport}, server=${session.boundServer})`);
    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  /** @throws GatewayError('SessionNotFound') for unknown or closed sessions */
  lookup(id: string): Session {
    const session = this.sessions.get(id);
    if (!session) {
      throw new GatewayError('SessionNotFound', `Session not found: ${id}`);
    }
    return session;
  }

  touch(id: string): void {
    const session = this.sessions.get(id);
    if (session) session.lastActivity = Date.now();
  }

  markInitializeRelayed(id: string): Session {
    const session = this.lookup(id);
    this.transition(session, 'AwaitingInitializedNotification');
    return session;
  }

  /** Idempotent once the session is Active. */
  completeHandshake(id: string): Session {
    const session = this.lookup(id);
    if (session.state === 'Active') return session;
    if (session.state !== 'AwaitingInitializedNotification') {
      throw new GatewayError('HandshakeNotComplete', `Session ${id} has not finished initialize`);
    }
    this.transition(session, 'Active');
    log.debug(`Session ${id} active`);
    return session;
  }

  /** @throws GatewayError('SessionNotFound' | 'HandshakeNotComplete') */
  requireActive(id: string): Session {
    const session = this.lookup(id);
    if (session.state !== 'Active') {
      throw new GatewayError(
        'HandshakeNotComplete',
        `Session ${id} is not active; send notifications/initialized first`,
      );
    }
    return session;
  }

  /** Close a session. Returns false when there was nothing to close. */
  close(id: string, reason: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    this.transition(session, 'Closed');
    this.sessions.delete(id);
    log.info(`Session ${id} closed: ${reason}`);
    this.emit('closed', session, reason);
    return true;
  }

  sessionsBoundTo(server: string): Session[] {
    return [...this.sessions.values()].filter((s) => s.boundServer === server);
  }

  all(): Session[] {
    return [...this.sessions.values()];
  }

  /** Close every session idle for longer than `maxIdleMs`. Returns the evicted ids. */
  evictIdle(maxIdleMs: number, now: number = Date.now()): string[] {
    const evicted: string[] = [];
    for (const session of [...this.sessions.values()]) {
      if (now - session.lastActivity > maxIdleMs) {
        this.close(session.id, 'idle timeout');
        evicted.push(session.id);
      }
    }
    return evicted;
  }

  startSweeper(): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => {
      const evicted = this.evictIdle(this.options.idleTimeoutMs);
      if (evicted.length > 0) {
        log.info(`Evicted ${evicted.length} idle session(s)`);
      }
    }, this.options.sweepIntervalMs);
    this.sweeper.unref();
  }

  stop(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  closeAll(reason: string): void {
    for (const id of [...this.sessions.keys()]) {
      this.close(id, reason);
    }
  }

  private transition(session: Session, next: SessionState): void {
    if (!TRANSITIONS[session.state].includes(next)) {
      throw new GatewayError('Internal', `Session ${session.id} cannot go from ${session.state} to ${next}`);
    }
    session.state = next;
  }
}
