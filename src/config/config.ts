// This module validates runtime configuration from the environment and command-line overrides.

import { z } from 'zod';

export const transportModeSchema = z.enum(['stdio', 'websocket']);

export type TransportMode = z.infer<typeof transportModeSchema>;

// Environment values arrive as strings, so numeric fields are coerced before range checks.
const configSchema = z.object({
  transport: transportModeSchema.default('stdio'),
  host: z.string().trim().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65_535).default(8080),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  maxFrameBytes: z.coerce.number().int().min(1024).default(16 * 1024 * 1024),
  maxInFlight: z.coerce.number().int().min(1).max(1024).default(16),
  shutdownTimeoutMs: z.coerce.number().int().min(0).default(10_000),
  heartbeatIntervalMs: z.coerce.number().int().min(0).default(30_000),
  dangerousTools: z.enum(['allow', 'deny']).default('allow')
});

export type ServerConfig = z.infer<typeof configSchema>;

// Raised when startup configuration is unusable; the process reports it and exits.
export class ConfigError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(`Invalid server configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export interface CliOverrides {
  transport?: string;
  host?: string;
  port?: string;
}

// This helper treats empty environment values as unset so defaults still apply.
function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

// This function merges environment variables with CLI overrides and validates the result once at startup.
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: CliOverrides = {}): ServerConfig {
  const parsed = configSchema.safeParse({
    transport: overrides.transport ?? envValue(env, 'FILEIO_TRANSPORT'),
    host: overrides.host ?? envValue(env, 'HOST'),
    port: overrides.port ?? envValue(env, 'PORT'),
    logLevel: envValue(env, 'LOG_LEVEL'),
    maxFrameBytes: envValue(env, 'FILEIO_MAX_FRAME_BYTES'),
    maxInFlight: envValue(env, 'FILEIO_MAX_IN_FLIGHT'),
    shutdownTimeoutMs: envValue(env, 'FILEIO_SHUTDOWN_TIMEOUT_MS'),
    heartbeatIntervalMs: envValue(env, 'FILEIO_WS_HEARTBEAT_MS'),
    dangerousTools: envValue(env, 'FILEIO_DANGEROUS_TOOLS')
  });

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  return parsed.data;
}
