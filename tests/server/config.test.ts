import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../server/config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      depot: 'Depot',
      logLevel: 'info',
      rateLimitMax: 60,
      seedNetwork: true,
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      DEPOT_NAME: 'Warehouse',
      LOG_LEVEL: 'debug',
      RATE_LIMIT_MAX: '5',
      SEED_NETWORK: 'false',
    });
    expect(config).toEqual({
      port: 8080,
      depot: 'Warehouse',
      logLevel: 'debug',
      rateLimitMax: 5,
      seedNetwork: false,
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow();
  });
});
