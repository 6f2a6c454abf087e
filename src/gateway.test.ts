import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { startGateway, type RunningGateway } from './gateway.js';
import { parseConfig } from './shared/config.js';
import { createFakeBackendPool } from './testing/fake-backend.js';

let gateway: RunningGateway | undefined;
let tmpDir: string | undefined;

afterEach(async () => {
  await gateway?.stop();
  gateway = undefined;
  if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
  tmpDir = undefined;
});

describe('startGateway', () => {
  it('should start both transports in front of one core', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gateway-start-'));
    const socketPath = path.join(tmpDir, 'gateway.sock');
    const config = parseConfig({
      socket: { path: socketPath },
      http: { enabled: true, port: 0 },
      mcpServers: { github: { command: 'github-mcp' } },
    });

    gateway = await startGateway(config, createFakeBackendPool().factory);

    expect(gateway.socketPath).toBe(socketPath);
    expect(fs.existsSync(socketPath)).toBe(true);
    const port = gateway.httpAddress?.port ?? 0;
    expect(port).toBeGreaterThan(0);

    const health = await fetch(`http://127.0.0.1:${port}/health`);
    expect(await health.json()).toMatchObject({
      status: 'ok',
      activeSessions: 0,
      backends: [{ server: 'github', state: 'idle', pendingCalls: 0, handshakes: 0 }],
    });

    await gateway.stop();
    gateway = undefined;
    expect(fs.existsSync(socketPath)).toBe(false);
  });

  it('should start without HTTP when only the socket is enabled', async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gateway-start-'));
    const config = parseConfig({ socket: { path: path.join(tmpDir, 'only.sock') } });

    gateway = await startGateway(config, createFakeBackendPool().factory);
    expect(gateway.httpAddress).toBeUndefined();
    expect(gateway.core.registry.serverNames()).toEqual([]);
  });
});
