/**
 * Default backend transport: spawn the configured command and speak
 * newline-delimited JSON-RPC over its stdio, using the MCP SDK client
 * transport. The child inherits the SDK's safe default environment plus the
 * server's own `env` block.
 */

import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { JSONRPCMessageSchema } from '@modelcontextprotocol/sdk/types.js';

import type { WireMessage } from '../protocol/codec.js';
import type { ServerDefinition } from '../shared/config.js';
import { GatewayError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { BackendTransport, BackendTransportFactory } from './transport.js';

const log = createLogger('stdio');

export class StdioBackendTransport implements BackendTransport {
  private readonly inner: StdioClientTransport;

  onmessage?: (message: unknown) => void;
  onclose?: () => void;
  onerror?: (error: Error) => void;

  constructor(
    readonly serverName: string,
    definition: ServerDefinition,
  ) {
    this.inner = new StdioClientTransport({
      command: definition.command,
      args: definition.args,
      env: { ...getDefaultEnvironment(), ...definition.env },
      stderr: 'inherit',
      ...(definition.cwd !== undefined && { cwd: definition.cwd }),
    });
    this.inner.onmessage = (message) => this.onmessage?.(message);
    this.inner.onclose = () => this.onclose?.();
    this.inner.onerror = (error) => this.onerror?.(error);
  }

  async start(): Promise<void> {
    await this.inner.start();
    log.debug(`${this.serverName} spawned (pid ${this.inner.pid ?? 'unknown'})`);
  }

  async send(message: WireMessage): Promise<void> {
    await this.inner.send(JSONRPCMessageSchema.parse(message));
  }

  async close(): Promise<void> {
    await this.inner.close();
  }
}

/** Factory spawning one child process per backend connection. */
export function createStdioTransportFactory(servers: Record<string, ServerDefinition>): BackendTransportFactory {
  return (serverName) => {
    const definition = servers[serverName];
    if (!definition) {
      throw new GatewayError('ServerNotFound', `Server not found: ${serverName}`, { server: serverName });
    }
    log.info(`Spawning ${serverName}: ${[definition.command, ...definition.args].join(' ')}`);
    return new StdioBackendTransport(serverName, definition);
  };
}
