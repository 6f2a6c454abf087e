/**
 * The stream a BackendConnection talks over.
 *
 * Shaped after the MCP SDK `Transport` (start/send/close plus callback
 * slots) but carrying plain wire objects, so the connection never depends on
 * the SDK's message types. Incoming messages are `unknown` until the codec
 * has validated them.
 */

import type { WireMessage } from '../protocol/codec.js';

export interface BackendTransport {
  start(): Promise<void>;
  send(message: WireMessage): Promise<void>;
  close(): Promise<void>;
  onmessage?: (message: unknown) => void;
  onclose?: () => void;
  onerror?: (error: Error) => void;
}

/** Opens a fresh transport to the named backend. */
export type BackendTransportFactory = (serverName: string) => BackendTransport | Promise<BackendTransport>;
