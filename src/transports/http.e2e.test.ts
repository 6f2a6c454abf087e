/**
 * End-to-end tests for the HTTP transport.
 *
 * Boots the real express app on an ephemeral port in front of in-process
 * fake backends and drives it with fetch.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'node:http';

import { createGatewayCore, type GatewayCore } from '../core.js';
import { parseConfig } from '../shared/config.js';
import { createFakeBackendPool, type FakeBackendPool } from '../testing/fake-backend.js';
import { createHttpApp, isOriginAllowed } from './http.js';

let server: Server;
let baseUrl: string;
let core: GatewayCore;
let pool: FakeBackendPool;

beforeAll(async () => {
  pool = createFakeBackendPool();
  const config = parseConfig({
    mcpServers: { github: { command: 'github-mcp' } },
    http: { enabled: true, port: 0 },
  });
  core = createGatewayCore(config, pool.factory);
  const app = createHttpApp(core, config.http);

  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const addr = server.address();
  if (addr === null || typeof addr === 'string') throw new Error('server is not listening on TCP');
  baseUrl = `http://127.0.0.1:${addr.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await core.close();
});

function post(body: unknown, headers: Record<string, string> = {}) {
  return fetch(`${baseUrl}/mcp`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

function initialize(id: number | string = 1, params: Record<string, unknown> = {}) {
  return post({
    jsonrpc: '2.0',
    id,
    method: 'initialize',
    params: {
      server: 'github',
      protocolVersion: '2025-06-18',
      capabilities: {},
      clientInfo: { name: 'test-client', version: '1.0.0' },
      ...params,
    },
  });
}

/** Full handshake; returns the session id. */
async function openSession(): Promise<string> {
  const res = await initialize();
  const sessionId = res.headers.get('mcp-session-id');
  if (!sessionId) throw new Error('no session issued');
  await post({ jsonrpc: '2.0', method: 'notifications/initialized' }, { 'Mcp-Session-Id': sessionId });
  return sessionId;
}

describe('HTTP transport', () => {
  it('should run the full handshake and list tools', async () => {
    const init = await initialize();
    expect(init.status).toBe(200);
    const sessionId = init.headers.get('mcp-session-id') ?? '';
    expect(sessionId).not.toBe('');
    const initBody = await init.json();
    expect(initBody).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: {
        protocolVersion: '2025-06-18',
        capabilities: { tools: {} },
        serverInfo: { name: 'github', version: '1.0.0' },
      },
    });

    const initialized = await post(
      { jsonrpc: '2.0', method: 'notifications/initialized' },
      { 'Mcp-Session-Id': sessionId },
    );
    expect(initialized.status).toBe(202);
    expect(await initialized.text()).toBe('');

    const list = await post(
      { jsonrpc: '2.0', id: 2, method: 'tools/list', params: { server: 'github' } },
      { 'Mcp-Session-Id': sessionId, 'MCP-Protocol-Version': '2025-06-18' },
    );
    expect(list.status).toBe(200);
    expect(list.headers.get('mcp-session-id')).toBe(sessionId);
    expect(await list.json()).toEqual({ jsonrpc: '2.0', id: 2, result: { tools: [{ name: 'github_tool' }] } });
  });

  it('should answer 404 for a session that was never issued', async () => {
    const res = await post({ jsonrpc: '2.0', id: 3, method: 'tools/list' }, { 'Mcp-Session-Id': 'never-issued' });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      id: 3,
      error: { code: -32003, message: 'Session not found: never-issued', data: { type: 'SessionNotFound' } },
    });
  });

  it('should answer 400 Malformed for a body that is not JSON', async () => {
    const res = await post('not json');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32700, message: 'Parse error: body is not valid JSON', data: { type: 'Malformed' } },
    });
  });

  it('should answer 400 for a request without a session', async () => {
    const res = await post({ jsonrpc: '2.0', id: 4, method: 'tools/list' });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ id: 4, error: { data: { type: 'HandshakeNotComplete' } } });
  });

  it('should answer 400 for a request before notifications/initialized', async () => {
    const init = await initialize();
    const sessionId = init.headers.get('mcp-session-id') ?? '';
    const res = await post({ jsonrpc: '2.0', id: 5, method: 'tools/list' }, { 'Mcp-Session-Id': sessionId });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ id: 5, error: { code: -32002 } });
  });

  it('should report an unknown server as a JSON-RPC error with status 200', async () => {
    const res = await initialize(6, { server: 'unregistered' });
    expect(res.status).toBe(200);
    expect(res.headers.get('mcp-session-id')).toBeNull();
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      id: 6,
      error: {
        code: -32001,
        message: 'Server not found: unregistered',
        data: { type: 'ServerNotFound', server: 'unregistered' },
      },
    });
  });

  it('should keep the session header on JSON-RPC errors of an established session', async () => {
    const sessionId = await openSession();
    const res = await post(
      { jsonrpc: '2.0', id: 8, method: 'tools/list', params: { server: 'unregistered' } },
      { 'Mcp-Session-Id': sessionId },
    );
    expect(res.status).toBe(200);
    expect(res.headers.get('mcp-session-id')).toBe(sessionId);
    expect(await res.json()).toMatchObject({ id: 8, error: { code: -32001, data: { type: 'ServerNotFound' } } });
  });

  it('should answer 400 for a missing server parameter', async () => {
    const res = await initialize(7, { server: undefined });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ id: 7, error: { data: { type: 'MissingServerParameter' } } });
  });

  it('should reject an unsupported MCP-Protocol-Version header', async () => {
    const sessionId = await openSession();
    const res = await post(
      { jsonrpc: '2.0', id: 8, method: 'tools/list' },
      { 'Mcp-Session-Id': sessionId, 'MCP-Protocol-Version': '1999-01-01' },
    );
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ id: 8, error: { data: { type: 'UnsupportedProtocolVersion' } } });
  });

  it('should refuse foreign origins and accept local ones', async () => {
    const foreign = await post({ jsonrpc: '2.0', id: 9, method: 'tools/list' }, { Origin: 'https://evil.example' });
    expect(foreign.status).toBe(403);

    const local = await initialize(10, {});
    expect(local.status).toBe(200);
    const withLocalOrigin = await fetch(`${baseUrl}/mcp`, { headers: { Origin: 'http://localhost:5173' } });
    expect(withLocalOrigin.status).toBe(200);
  });

  it('should close a session on DELETE', async () => {
    const sessionId = await openSession();

    const del = await fetch(`${baseUrl}/mcp`, { method: 'DELETE', headers: { 'Mcp-Session-Id': sessionId } });
    expect(del.status).toBe(204);

    const after = await post({ jsonrpc: '2.0', id: 11, method: 'tools/list' }, { 'Mcp-Session-Id': sessionId });
    expect(after.status).toBe(404);

    const again = await fetch(`${baseUrl}/mcp`, { method: 'DELETE', headers: { 'Mcp-Session-Id': sessionId } });
    expect(again.status).toBe(404);
  });

  it('should answer the liveness probe and health check', async () => {
    const probe = await fetch(`${baseUrl}/mcp`);
    expect(probe.status).toBe(200);
    expect(await probe.json()).toEqual({ status: 'ok', endpoint: '/mcp' });

    const health = await fetch(`${baseUrl}/health`);
    expect(await health.json()).toEqual({
      status: 'ok',
      activeSessions: core.sessions.size,
      backends: [{ server: 'github', state: 'open', pendingCalls: 0, handshakes: 1 }],
      uptime: expect.any(Number),
    });
    expect(pool.opened.get('github')).toHaveLength(1);
  });

  it('should answer 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/elsewhere`);
    expect(res.status).toBe(404);
  });
});

describe('isOriginAllowed', () => {
  const hosts = ['localhost', '127.0.0.1'];

  it('should compare hostnames regardless of port and scheme', () => {
    expect(isOriginAllowed('http://localhost:3000', hosts)).toBe(true);
    expect(isOriginAllowed('https://127.0.0.1', hosts)).toBe(true);
    expect(isOriginAllowed('http://localhost.evil.example', hosts)).toBe(false);
  });

  it('should accept the null origin and refuse garbage', () => {
    expect(isOriginAllowed('null', hosts)).toBe(true);
    expect(isOriginAllowed('not a url', hosts)).toBe(false);
  });
});
