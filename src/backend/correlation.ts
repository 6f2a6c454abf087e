/**
 * Correlation table for one backend connection.
 *
 * Many sessions share a backend stream and their client-chosen ids collide
 * freely, so nothing a client sends is used as an id on the backend side.
 * Each forwarded call gets a gateway id (monotonic per connection) and a
 * record remembering who asked and under which id. The reply is matched on
 * the gateway id only.
 *
 * The table is owned by exactly one BackendConnection and only ever touched
 * from the event loop, so registration and resolution cannot interleave.
 */

import type { RequestId, ResponseEnvelope } from '../protocol/codec.js';
import { GatewayError } from '../shared/errors.js';

export interface CorrelationRecord {
  gatewayId: number;
  /** Session that issued the call; absent for gateway-originated calls */
  sessionId?: string;
  /** Id the client used; never sent to the backend */
  clientId?: RequestId;
  method: string;
  startedAt: number;
}

export interface CallOrigin {
  sessionId?: string;
  clientId?: RequestId;
  method: string;
}

export interface Registration {
  gatewayId: number;
  /** Settles with the backend's reply (still carrying the gateway id) */
  response: Promise<ResponseEnvelope>;
}

interface PendingCall {
  record: CorrelationRecord;
  resolve: (response: ResponseEnvelope) => void;
  reject: (err: GatewayError) => void;
  timer?: NodeJS.Timeout;
}

export class CorrelationTable {
  private nextId = 1;
  private readonly pending = new Map<number, PendingCall>();

  constructor(private readonly serverName: string) {}

  get size(): number {
    return this.pending.size;
  }

  has(gatewayId: number): boolean {
    return this.pending.has(gatewayId);
  }

  records(): CorrelationRecord[] {
    return [...this.pending.values()].map((p) => p.record);
  }

  /**
   * Allocate a gateway id and start waiting for its reply.
   * With `timeoutMs`, the call settles with BackendTimeout if no reply arrives
   * in time; the record is dropped and a late reply is ignored.
   *
   * @throws GatewayError('Internal') if the id is already outstanding.
   */
  register(origin: CallOrigin, timeoutMs?: number): Registration {
    const gatewayId = this.nextId++;
    if (this.pending.has(gatewayId)) {
      throw new GatewayError('Internal', `gateway id ${gatewayId} is already outstanding`, {
        server: this.serverName,
      });
    }

    const record: CorrelationRecord = {
      gatewayId,
      ...(origin.sessionId !== undefined && { sessionId: origin.sessionId }),
      ...(origin.clientId !== undefined && { clientId: origin.clientId }),
      method: origin.method,
      startedAt: Date.now(),
    };

    const response = new Promise<ResponseEnvelope>((resolve, reject) => {
      const entry: PendingCall = { record, resolve, reject };
      if (timeoutMs !== undefined) {
        entry.timer = setTimeout(() => {
          this.pending.delete(gatewayId);
          reject(
            new GatewayError(
              'BackendTimeout',
              `${this.serverName} did not answer ${origin.method} within ${timeoutMs}ms`,
              { server: this.serverName },
            ),
          );
        }, timeoutMs);
      }
      this.pending.set(gatewayId, entry);
    });

    return { gatewayId, response };
  }

  /**
   * Settle the call a backend reply belongs to.
   * Returns the record, or `undefined` when the id matches nothing outstanding.
   */
  resolve(response: ResponseEnvelope): CorrelationRecord | undefined {
    if (typeof response.id !== 'number') return undefined;
    const entry = this.take(response.id);
    if (!entry) return undefined;
    entry.resolve(response);
    return entry.record;
  }

  /** Fail one outstanding call. */
  fail(gatewayId: number, err: GatewayError): boolean {
    const entry = this.take(gatewayId);
    if (!entry) return false;
    entry.reject(err);
    return true;
  }

  /** Gateway id of a session's outstanding call, looked up by the client's id. */
  findGatewayId(sessionId: string, clientId: RequestId): number | undefined {
    for (const { record } of this.pending.values()) {
      if (record.sessionId === sessionId && record.clientId === clientId) {
        return record.gatewayId;
      }
    }
    return undefined;
  }

  /**
   * Drop every record held for a session. Waiting callers get RequestCancelled;
   * replies arriving later no longer match anything.
   */
  releaseSession(sessionId: string): number {
    let released = 0;
    for (const [gatewayId, entry] of [...this.pending]) {
      if (entry.record.sessionId !== sessionId) continue;
      this.take(gatewayId);
      entry.reject(
        new GatewayError('RequestCancelled', `Session closed while ${entry.record.method} was in flight`, {
          server: this.serverName,
        }),
      );
      released++;
    }
    return released;
  }

  /** Fail every outstanding call with `err` (connection teardown). */
  drain(err: GatewayError): number {
    const entries = [...this.pending.values()];
    for (const entry of entries) {
      this.take(entry.record.gatewayId);
      entry.reject(err);
    }
    return entries.length;
  }

  private take(gatewayId: number): PendingCall | undefined {
    const entry = this.pending.get(gatewayId);
    if (!entry) return undefined;
    this.pending.delete(gatewayId);
    if (entry.timer) clearTimeout(entry.timer);
    return entry;
  }
}
