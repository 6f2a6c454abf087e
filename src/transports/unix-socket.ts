/**
 * Unix-domain socket transport adapter.
 *
 * A persistent stream of newline-delimited JSON-RPC envelopes. Each
 * connection carries at most one session at a time; closing the connection
 * closes its session. Backend notifications for the session are written to
 * the same stream.
 *
 * Lines are dispatched as they arrive and answered as they resolve, except
 * that anything arriving while an initialize is pending waits for it, so a
 * client may pipeline initialize, notifications/initialized and its first
 * request without waiting for the initialize result.
 */

import fs from 'node:fs';
import net from 'node:net';
import readline from 'node:readline';

import type { GatewayCore } from '../core.js';
import { decode, encode, errorEnvelope, type Envelope } from '../protocol/codec.js';
import { INITIALIZE } from '../protocol/methods.js';
import type { Session } from '../session/manager.js';
import { DEFAULT_MAX_BUFFERED_BYTES, DEFAULT_MAX_LINE_BYTES, type SocketSettings } from '../shared/config.js';
import { GatewayError, errorMessage, toGatewayError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('socket');

export type UnixSocketOptions = Pick<SocketSettings, 'path'> &
  Partial<Pick<SocketSettings, 'maxLineBytes' | 'maxBufferedBytes'>>;

interface StreamLimits {
  maxLineBytes: number;
  maxBufferedBytes: number;
}

export class UnixSocketServer {
  private server: net.Server | null = null;
  private readonly connections = new Map<net.Socket, SocketConnection>();
  private readonly limits: StreamLimits;

  /** Sessions the manager closes on its own (idle eviction) are forgotten by their stream. */
  private readonly onSessionClosed = (session: Session) => {
    for (const conn of this.connections.values()) {
      conn.sessionClosed(session.id);
    }
  };

  constructor(
    private readonly core: GatewayCore,
    private readonly options: UnixSocketOptions,
  ) {
    this.limits = {
      maxLineBytes: options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES,
      maxBufferedBytes: options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES,
    };
  }

  get path(): string {
    return this.options.path;
  }

  async start(): Promise<void> {
    const socketPath = this.options.path;
    if (fs.existsSync(socketPath)) {
      log.warn(`Removing stale socket ${socketPath}`);
      fs.unlinkSync(socketPath);
    }

    const server = net.createServer((socket) => this.accept(socket));
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(socketPath, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (err) => log.error(`Socket server error: ${err.message}`));
    fs.chmodSync(socketPath, 0o600);
    this.core.sessions.on('closed', this.onSessionClosed);

    this.server = server;
    log.info(`Listening on ${socketPath}`);
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    this.core.sessions.off('closed', this.onSessionClosed);

    for (const socket of this.connections.keys()) {
      socket.destroy();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (fs.existsSync(this.options.path)) {
      fs.unlinkSync(this.options.path);
    }
    log.info('Socket server stopped');
  }

  private accept(socket: net.Socket): void {
    const conn = new SocketConnection(this.core, socket, this.limits);
    this.connections.set(socket, conn);
    log.debug(`Client connected (${this.connections.size} open)`);

    socket.on('error', (err) => log.debug(`Client socket error: ${err.message}`));
    socket.on('close', () => {
      this.connections.delete(socket);
      conn.closed();
    });
  }
}

/** One client stream and the session it currently carries. */
class SocketConnection {
  private sessionId: string | undefined;
  private open = true;
  /** Settles when the latest initialize on this stream has been handled */
  private barrier: Promise<void> = Promise.resolve();
  /** Bytes received since the last newline */
  private pendingBytes = 0;
  private overflowed = false;
  private readonly lines: readline.Interface;

  constructor(
    private readonly core: GatewayCore,
    private readonly socket: net.Socket,
    private readonly limits: StreamLimits,
  ) {
    socket.on('data', (chunk: Buffer) => this.measure(chunk));
    this.lines = readline.createInterface({ input: socket, crlfDelay: Infinity });
    this.lines.on('line', (line) => this.onLine(line));
  }

  sessionClosed(sessionId: string): void {
    if (this.sessionId === sessionId) {
      log.debug(`Session ${sessionId} closed under its stream`);
      this.sessionId = undefined;
    }
  }

  closed(): void {
    this.open = false;
    if (this.sessionId !== undefined) {
      this.core.sessions.close(this.sessionId, 'socket closed');
      this.sessionId = undefined;
    }
  }

  private measure(chunk: Buffer): void {
    if (this.overflowed) return;
    const first = chunk.indexOf(0x0a);
    if (first === -1) {
      this.pendingBytes += chunk.length;
    } else if (this.pendingBytes + first > this.limits.maxLineBytes) {
      this.pendingBytes += first;
    } else {
      this.pendingBytes = chunk.length - chunk.lastIndexOf(0x0a) - 1;
    }
    if (this.pendingBytes > this.limits.maxLineBytes) {
      this.overflow();
    }
  }

  /** Refuse an over-long line and end the stream; whatever follows is discarded. */
  private overflow(): void {
    this.overflowed = true;
    const max = this.limits.maxLineBytes;
    log.warn(`Client sent a line over ${max} bytes; ending stream`);
    this.write(errorEnvelope(null, new GatewayError('Malformed', `Line exceeds ${max} bytes`)));
    this.lines.close();
    this.socket.end();
    this.socket.resume();
  }

  private onLine(line: string): void {
    if (this.overflowed || line.trim().length === 0) return;

    let envelope: Envelope;
    try {
      envelope = decode(line);
    } catch (err) {
      this.write(errorEnvelope(null, toGatewayError(err)));
      return;
    }

    const task = this.barrier.then(() => this.process(envelope));
    task.catch((err: unknown) => log.error(`Unhandled failure on client stream: ${errorMessage(err)}`));
    if (envelope.kind === 'request' && envelope.method === INITIALIZE) {
      this.barrier = task;
    }
  }

  /** Dispatch one envelope and write whatever it produces. Never rejects. */
  private async process(envelope: Envelope): Promise<void> {
    const isInitialize = envelope.kind === 'request' && envelope.method === INITIALIZE;
    try {
      const result = await this.core.router.dispatch(envelope, {
        transport: 'socket',
        deliver: (notification) => this.write(notification),
        ...(this.sessionId !== undefined && { sessionId: this.sessionId }),
      });
      if (isInitialize) {
        if (!this.open && result.sessionId !== undefined) {
          this.core.sessions.close(result.sessionId, 'socket closed');
          return;
        }
        this.sessionId = result.sessionId;
      }
      if (result.response) {
        this.write(result.response);
      }
    } catch (err) {
      if (isInitialize) {
        this.sessionId = undefined;
      }
      const failure = toGatewayError(err);
      if (envelope.kind === 'request') {
        this.write(errorEnvelope(envelope.id, failure));
      } else {
        log.debug(`Dropped ${envelope.kind}: ${failure.message}`);
      }
    }
  }

  private write(envelope: Envelope): void {
    if (!this.socket.writable) return;
    try {
      this.socket.write(`${encode(envelope)}\n`);
    } catch (err) {
      log.warn(`Write to client failed: ${errorMessage(err)}`);
    }
    if (this.socket.writableLength > this.limits.maxBufferedBytes) {
      log.warn(`Client is not reading (${this.socket.writableLength} bytes queued); disconnecting`);
      this.socket.destroy();
    }
  }
}
