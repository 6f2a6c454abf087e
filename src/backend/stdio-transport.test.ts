import { describe, it, expect, afterEach } from 'vitest';

import { isGatewayError } from '../shared/errors.js';
import { createStdioTransportFactory, StdioBackendTransport } from './stdio-transport.js';

// Answers one request with what it saw, then exits
const ECHO_ONCE = `
const rl = require('node:readline').createInterface({ input: process.stdin });
rl.once('line', (line) => {
  const msg = JSON.parse(line);
  const reply = {
    jsonrpc: '2.0',
    id: msg.id,
    result: {
      method: msg.method,
      marker: process.env.STDIO_TEST_MARKER ?? null,
      hasPath: typeof process.env.PATH === 'string',
    },
  };
  process.stdout.write(JSON.stringify(reply) + '\\n', () => process.exit(0));
});
`;

let transport: StdioBackendTransport | undefined;

afterEach(async () => {
  await transport?.close();
  transport = undefined;
});

describe('StdioBackendTransport', () => {
  it('should round-trip one message with the child and report its exit', async () => {
    transport = new StdioBackendTransport('echo', {
      command: process.execPath,
      args: ['-e', ECHO_ONCE],
      env: { STDIO_TEST_MARKER: 'from-config' },
    });
    const current = transport;
    const received: unknown[] = [];
    const reply = new Promise<void>((resolve) => {
      current.onmessage = (message) => {
        received.push(message);
        resolve();
      };
    });
    const exited = new Promise<void>((resolve) => {
      current.onclose = () => resolve();
    });

    await current.start();
    await current.send({ jsonrpc: '2.0', id: 1, method: 'tools/list' });
    await reply;
    await exited;

    expect(received).toEqual([
      { jsonrpc: '2.0', id: 1, result: { method: 'tools/list', marker: 'from-config', hasPath: true } },
    ]);
  });

  it('should refuse to send a message that is not JSON-RPC', async () => {
    transport = new StdioBackendTransport('echo', { command: process.execPath, args: ['-e', ECHO_ONCE], env: {} });
    await expect(transport.send({ jsonrpc: '2.0' })).rejects.toThrow();
  });
});

describe('createStdioTransportFactory', () => {
  it('should build a transport for a configured server', () => {
    const factory = createStdioTransportFactory({
      github: { command: 'github-mcp', args: ['--stdio'], env: {} },
    });
    const created = factory('github');
    expect(created).toBeInstanceOf(StdioBackendTransport);
  });

  it('should refuse a server that is not configured', () => {
    const factory = createStdioTransportFactory({});
    let kind: string | undefined;
    try {
      void factory('missing');
    } catch (err) {
      kind = isGatewayError(err) ? err.kind : 'not a GatewayError';
    }
    expect(kind).toBe('ServerNotFound');
  });
});
