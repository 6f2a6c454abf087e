import { describe, it, expect, vi } from 'vitest';

import { isGatewayError } from '../shared/errors.js';
import { FakeBackend, type FakeBackendOptions } from '../testing/fake-backend.js';
import { BackendConnection, type BackendConnectionOptions } from './connection.js';

const OPTIONS: BackendConnectionOptions = {
  handshakeTimeoutMs: 200,
  requestTimeoutMs: 200,
  protocolVersion: '2025-06-18',
  clientInfo: { name: 'test-gateway', version: '0.0.1' },
};

function setup(fakeOptions: FakeBackendOptions = {}, overrides: Partial<BackendConnectionOptions> = {}) {
  const fake = new FakeBackend('github', fakeOptions);
  const conn = new BackendConnection('github', fake, { ...OPTIONS, ...overrides });
  return { fake, conn };
}

describe('BackendConnection handshake', () => {
  it('should initialize once and then announce initialized', async () => {
    const { fake, conn } = setup();
    const result = await conn.open();

    expect(fake.received).toEqual([
      {
        jsonrpc: '2.0',
        id: 1,
        method: 'initialize',
        params: { protocolVersion: '2025-06-18', capabilities: {}, clientInfo: OPTIONS.clientInfo },
      },
      { jsonrpc: '2.0', method: 'notifications/initialized' },
    ]);
    expect(result).toEqual({
      protocolVersion: '2025-06-18',
      capabilities: { tools: {} },
      serverInfo: { name: 'github', version: '1.0.0' },
    });
    expect(conn.serverInitializeResult).toEqual(result);
    expect(conn.handshakeState).toBe('Done');
    expect(conn.isOpen).toBe(true);
  });

  it('should report an unreachable backend when the transport cannot start', async () => {
    const { conn } = setup({ startError: new Error('spawn ENOENT') });
    await expect(conn.open()).rejects.toMatchObject({
      kind: 'BackendUnreachable',
      server: 'github',
      message: 'Cannot reach github: spawn ENOENT',
    });
    expect(conn.connectionState).toBe('closed');
  });

  it('should fail the handshake on an error reply', async () => {
    const { fake, conn } = setup({ rejectInitialize: true });
    await expect(conn.open()).rejects.toMatchObject({
      kind: 'BackendHandshakeFailed',
      message: 'github rejected initialize: initialize refused',
    });
    expect(fake.closed).toBe(true);
    expect(fake.sent('notifications/initialized')).toEqual([]);
  });

  it('should fail the handshake when initialize times out', async () => {
    const { fake, conn } = setup({ silentMethods: ['initialize'] }, { handshakeTimeoutMs: 20 });
    await expect(conn.open()).rejects.toMatchObject({ kind: 'BackendHandshakeFailed', server: 'github' });
    expect(conn.connectionState).toBe('closed');
    expect(conn.handshakeState).toBe('NotStarted');
    expect(fake.closed).toBe(true);
  });

  it('should refuse to read the InitializeResult before the handshake', () => {
    const { conn } = setup();
    expect(() => conn.serverInitializeResult).toThrow('github has not completed its handshake');
  });
});

describe('BackendConnection calls', () => {
  it('should rewrite colliding client ids to distinct gateway ids', async () => {
    const { fake, conn } = setup();
    await conn.open();

    const [a, b] = await Promise.all([
      conn.forward({ sessionId: 's1', clientId: 1, method: 'echo', params: { q: 'a' } }),
      conn.forward({ sessionId: 's2', clientId: 1, method: 'echo', params: { q: 'b' } }),
    ]);

    expect(fake.sent('echo').map((m) => m.id)).toEqual([2, 3]);
    expect(a).toEqual({ kind: 'response', id: 2, result: { server: 'github', params: { q: 'a' } } });
    expect(b).toEqual({ kind: 'response', id: 3, result: { server: 'github', params: { q: 'b' } } });
    expect(conn.pendingCount).toBe(0);
  });

  it('should time out one call without closing the connection', async () => {
    const { conn } = setup({ silentMethods: ['tools/call'] }, { requestTimeoutMs: 20 });
    await conn.open();

    await expect(conn.forward({ sessionId: 's1', clientId: 1, method: 'tools/call' })).rejects.toMatchObject({
      kind: 'BackendTimeout',
    });
    expect(conn.isOpen).toBe(true);
    await expect(conn.forward({ sessionId: 's1', clientId: 2, method: 'tools/list' })).resolves.toMatchObject({
      kind: 'response',
      result: { tools: [{ name: 'github_tool' }] },
    });
  });

  it('should fail every pending call when the backend goes away', async () => {
    const { fake, conn } = setup({ silentMethods: ['tools/call'] });
    await conn.open();
    const onClosed = vi.fn();
    conn.on('closed', onClosed);

    const first = conn.forward({ sessionId: 's1', clientId: 1, method: 'tools/call' });
    const second = conn.forward({ sessionId: 's2', clientId: 1, method: 'tools/call' });
    const settled = Promise.allSettled([first, second]);
    fake.drop();

    const outcomes = await settled;
    const kinds = outcomes.map((o) => (o.status === 'rejected' && isGatewayError(o.reason) ? o.reason.kind : o.status));
    expect(kinds).toEqual(['BackendUnavailable', 'BackendUnavailable']);
    expect(onClosed).toHaveBeenCalledTimes(1);
    expect(conn.connectionState).toBe('closed');
    await expect(conn.forward({ sessionId: 's1', clientId: 3, method: 'tools/list' })).rejects.toMatchObject({
      kind: 'BackendUnreachable',
    });
  });

  it('should relay a cancellation under the gateway id', async () => {
    const { fake, conn } = setup({ silentMethods: ['tools/call'] });
    await conn.open();

    const pending = conn.forward({ sessionId: 's1', clientId: 'c-1', method: 'tools/call' });
    const outcome = expect(pending).rejects.toMatchObject({ kind: 'RequestCancelled' });

    await expect(conn.cancel('s1', 'c-1', { requestId: 'c-1', reason: 'user' })).resolves.toBe(true);
    expect(fake.sent('notifications/cancelled')).toEqual([
      { jsonrpc: '2.0', method: 'notifications/cancelled', params: { requestId: 2, reason: 'user' } },
    ]);
    await outcome;
    await expect(conn.cancel('s1', 'c-1')).resolves.toBe(false);
  });

  it('should forward client notifications', async () => {
    const { fake, conn } = setup();
    await conn.open();
    await conn.notify('notifications/roots/list_changed');
    expect(fake.sent('notifications/roots/list_changed')).toEqual([
      { jsonrpc: '2.0', method: 'notifications/roots/list_changed' },
    ]);
  });
});

describe('BackendConnection inbound traffic', () => {
  it('should answer a backend ping', async () => {
    const { fake, conn } = setup();
    await conn.open();
    fake.deliver({ jsonrpc: '2.0', id: 'b-1', method: 'ping' });
    expect(fake.replies()).toEqual([{ jsonrpc: '2.0', id: 'b-1', result: {} }]);
  });

  it('should refuse other backend requests with method not found', async () => {
    const { fake, conn } = setup();
    await conn.open();
    fake.deliver({ jsonrpc: '2.0', id: 7, method: 'sampling/createMessage' });
    expect(fake.replies()).toEqual([
      {
        jsonrpc: '2.0',
        id: 7,
        error: { code: -32601, message: 'Method not supported by the gateway: sampling/createMessage' },
      },
    ]);
  });

  it('should emit backend notifications', async () => {
    const { fake, conn } = setup();
    await conn.open();
    const onNotification = vi.fn();
    conn.on('notification', onNotification);

    fake.deliver({ jsonrpc: '2.0', method: 'notifications/tools/list_changed' });
    expect(onNotification).toHaveBeenCalledWith({ kind: 'notification', method: 'notifications/tools/list_changed' });
  });

  it('should drop stray replies and malformed messages', async () => {
    const { fake, conn } = setup();
    await conn.open();

    fake.deliver({ jsonrpc: '2.0', id: 404, result: {} });
    fake.deliver({ nonsense: true });
    expect(conn.isOpen).toBe(true);
    expect(conn.pendingCount).toBe(0);
  });
});
