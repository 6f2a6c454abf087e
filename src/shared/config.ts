/**
 * Configuration schema and loading for the gateway.
 *
 * Config file: <config dir>/config.json, where the config dir defaults to
 * .mcp-gateway/ in the current working directory and can be moved with the
 * MCP_GATEWAY_CONFIG_DIR env var. Every section is optional; missing fields
 * fall back to the defaults declared in the schema.
 *
 * Backend servers come from the `mcpServers` block, optionally merged with
 * the `mcpServers` block of a desktop-client config file (`serversFile`).
 * Entries in config.json win over imported ones.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { createLogger } from './logger.js';

const log = createLogger('config');

export function getConfigDir(): string {
  return process.env.MCP_GATEWAY_CONFIG_DIR || path.join(process.cwd(), '.mcp-gateway');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

// ── Schema ─────────────────────────────────────────────────────────────────

const port = z.number().int().min(0).max(65535);
const positiveMs = z.number().int().positive();

export const serverDefinitionSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  /** Values may be literals or contain ${ENV_VAR} placeholders */
  env: z.record(z.string(), z.string()).default({}),
  cwd: z.string().optional(),
});

export const DEFAULT_MAX_LINE_BYTES = 4 * 1024 * 1024;
export const DEFAULT_MAX_BUFFERED_BYTES = 8 * 1024 * 1024;

const socketSchema = z
  .object({
    enabled: z.boolean().default(true),
    path: z.string().min(1).default('/tmp/mcp-gateway.sock'),
    /** Longest accepted line; a client sending more is answered Malformed and disconnected */
    maxLineBytes: z.number().int().positive().default(DEFAULT_MAX_LINE_BYTES),
    /** Unsent output a client may leave queued before it is disconnected */
    maxBufferedBytes: z.number().int().positive().default(DEFAULT_MAX_BUFFERED_BYTES),
  })
  .default({});

const httpSchema = z
  .object({
    enabled: z.boolean().default(false),
    host: z.string().default('127.0.0.1'),
    port: port.default(3000),
    endpoint: z.string().startsWith('/').default('/mcp'),
    /** Hostnames accepted in an Origin header. Requests without Origin are allowed. */
    allowedOriginHosts: z.array(z.string()).default(['localhost', '127.0.0.1']),
  })
  .default({});

const sessionsSchema = z
  .object({
    idleTimeoutMs: positiveMs.default(60 * 60 * 1000),
    sweepIntervalMs: positiveMs.default(60_000),
  })
  .default({});

const backendsSchema = z
  .object({
    handshakeTimeoutMs: positiveMs.default(10_000),
    requestTimeoutMs: positiveMs.default(60_000),
    /** Protocol version the gateway requests when initializing a backend */
    protocolVersion: z.string().default('2025-06-18'),
    /** What to do with notifications a backend sends on its own */
    notificationPolicy: z.enum(['broadcast', 'drop']).default('broadcast'),
    clientName: z.string().default('mcp-session-gateway'),
    clientVersion: z.string().default('0.1.0'),
  })
  .default({});

export const gatewayConfigSchema = z.object({
  socket: socketSchema,
  http: httpSchema,
  sessions: sessionsSchema,
  backends: backendsSchema,
  supportedProtocolVersions: z.array(z.string()).min(1).default(['2025-06-18', '2025-03-26']),
  serversFile: z.string().optional(),
  mcpServers: z.record(z.string(), serverDefinitionSchema).default({}),
});

const desktopConfigSchema = z.object({
  mcpServers: z.record(z.string(), serverDefinitionSchema).default({}),
});

export type ServerDefinition = z.infer<typeof serverDefinitionSchema>;
export type GatewayConfig = z.infer<typeof gatewayConfigSchema>;
export type BackendSettings = GatewayConfig['backends'];
export type HttpSettings = GatewayConfig['http'];
export type SocketSettings = GatewayConfig['socket'];
export type NotificationPolicy = BackendSettings['notificationPolicy'];

/** The fully defaulted configuration. */
export function defaultConfig(): GatewayConfig {
  return gatewayConfigSchema.parse({});
}

// ── Placeholders ───────────────────────────────────────────────────────────

/**
 * Replace ${VAR} placeholders in a string with values from `vars`.
 * Unknown placeholders are left unchanged (with a warning).
 */
export function resolvePlaceholders(str: string, vars: Record<string, string | undefined>): string {
  return str.replace(/\$\{(\w+)\}/g, (match, name: string) => {
    const value = vars[name];
    if (value !== undefined) return value;
    log.warn(`placeholder ${match} has no value in the environment`);
    return match;
  });
}

/**
 * Resolve a backend's env block. A value that is exactly "${VAR}" and has no
 * value in `source` is dropped rather than passed through literally.
 */
export function resolveServerEnv(
  env: Record<string, string>,
  source: Record<string, string | undefined> = process.env,
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    const whole = /^\$\{(\w+)\}$/.exec(value);
    if (whole) {
      const envVal = source[whole[1]];
      if (envVal !== undefined) {
        resolved[key] = envVal;
      } else {
        log.warn(`env var ${whole[1]} not found for key ${key}`);
      }
    } else {
      resolved[key] = resolvePlaceholders(value, source);
    }
  }
  return resolved;
}

// ── Loading ────────────────────────────────────────────────────────────────

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function readJson(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid JSON in ${filePath}`, { cause: err });
  }
}

/** Validate a raw config object, filling defaults. */
export function parseConfig(raw: unknown, source = 'config'): GatewayConfig {
  const result = gatewayConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/** Read the `mcpServers` block of a desktop-client config file. */
export function loadServersFile(filePath: string): Record<string, ServerDefinition> {
  const result = desktopConfigSchema.safeParse(readJson(filePath));
  if (!result.success) {
    throw new Error(`Invalid servers file ${filePath}: ${formatIssues(result.error)}`);
  }
  return result.data.mcpServers;
}

/**
 * Load the gateway configuration. A missing config file yields the defaults.
 * Backend env placeholders are resolved against `process.env`.
 */
export function loadGatewayConfig(configPath: string = getConfigPath()): GatewayConfig {
  const config = fs.existsSync(configPath)
    ? parseConfig(readJson(configPath), configPath)
    : defaultConfig();

  let servers = config.mcpServers;
  if (config.serversFile) {
    const serversFile = path.resolve(path.dirname(configPath), config.serversFile);
    servers = { ...loadServersFile(serversFile), ...servers };
    log.info(`Imported servers from ${serversFile}`);
  }

  const mcpServers: Record<string, ServerDefinition> = {};
  for (const [name, def] of Object.entries(servers)) {
    mcpServers[name] = { ...def, env: resolveServerEnv(def.env) };
  }

  return { ...config, mcpServers };
}
