// This test suite verifies configuration defaults, environment parsing and command-line precedence.

import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from '../src/config/config.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      transport: 'stdio',
      host: '0.0.0.0',
      port: 8080,
      logLevel: 'info',
      maxFrameBytes: 16 * 1024 * 1024,
      maxInFlight: 16,
      shutdownTimeoutMs: 10_000,
      heartbeatIntervalMs: 30_000,
      dangerousTools: 'allow'
    });
  });

  it('reads and coerces environment values', () => {
    const config = loadConfig({
      FILEIO_TRANSPORT: 'websocket',
      PORT: '9000',
      FILEIO_MAX_IN_FLIGHT: '2',
      FILEIO_DANGEROUS_TOOLS: 'deny',
      LOG_LEVEL: 'debug'
    });

    expect(config).toMatchObject({
      transport: 'websocket',
      port: 9000,
      maxInFlight: 2,
      dangerousTools: 'deny',
      logLevel: 'debug'
    });
  });

  it('lets command-line overrides win over the environment', () => {
    const config = loadConfig({ FILEIO_TRANSPORT: 'stdio', HOST: 'env-host', PORT: '1' }, { transport: 'websocket', port: '7000' });

    expect(config.transport).toBe('websocket');
    expect(config.host).toBe('env-host');
    expect(config.port).toBe(7000);
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ PORT: '  ', LOG_LEVEL: '' }).port).toBe(8080);
  });

  it('reports every invalid field', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: '70000', FILEIO_MAX_IN_FLIGHT: '0' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toEqual([
        'port: Number must be less than or equal to 65535',
        'maxInFlight: Number must be greater than or equal to 1'
      ]);
    }
  });
});
