import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONFIG,
  effectiveRadius,
  loadEnvironmentConfig,
  resolveDispatchConfig
} from '../src/config/config';

describe('dispatch configuration', () => {
  it('merges overrides onto the defaults', () => {
    const config = resolveDispatchConfig({ defaultSearchRadiusKm: 5 });

    expect(config).toEqual({ ...DEFAULT_CONFIG, defaultSearchRadiusKm: 5 });
  });

  it('rejects a default radius above the maximum', () => {
    expect(() => resolveDispatchConfig({ defaultSearchRadiusKm: 50, maxSearchRadiusKm: 10 })).toThrow(
      'Invalid dispatch configuration: defaultSearchRadiusKm: defaultSearchRadiusKm must not exceed maxSearchRadiusKm'
    );
  });

  it('rejects non-positive radii', () => {
    expect(() => resolveDispatchConfig({ maxSearchRadiusKm: 0 })).toThrow(/^Invalid dispatch configuration/);
  });

  describe('effectiveRadius', () => {
    it('takes the first usable candidate', () => {
      expect(effectiveRadius(DEFAULT_CONFIG, undefined, 7, 12)).toBe(7);
      expect(effectiveRadius(DEFAULT_CONFIG, 0, 12)).toBe(12);
    });

    it('falls back to the default', () => {
      expect(effectiveRadius(DEFAULT_CONFIG)).toBe(20);
    });

    it('clamps to the maximum', () => {
      expect(effectiveRadius(DEFAULT_CONFIG, 250)).toBe(100);
    });
  });
});

describe('loadEnvironmentConfig', () => {
  it('uses defaults for an empty environment', () => {
    const env = loadEnvironmentConfig({});

    expect(env.port).toBe(3001);
    expect(env.nodeEnv).toBe('development');
    expect(env.logLevel).toBe('debug');
    expect(env.googleMapsApiKey).toBe('');
    expect(env.allowedOrigins).toEqual(['http://localhost:5173']);
    expect(env.dispatch).toEqual(DEFAULT_CONFIG);
  });

  it('reads values from the environment', () => {
    const env = loadEnvironmentConfig({
      PORT: '8080',
      NODE_ENV: 'production',
      LOG_LEVEL: 'warn',
      ALLOWED_ORIGINS: 'https://a.example, https://b.example',
      GOOGLE_MAPS_API_KEY: 'test-key',
      DISPATCH_DEFAULT_RADIUS_KM: '15',
      DISPATCH_MAX_RADIUS_KM: '40'
    });

    expect(env.port).toBe(8080);
    expect(env.nodeEnv).toBe('production');
    expect(env.logLevel).toBe('warn');
    expect(env.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(env.googleMapsApiKey).toBe('test-key');
    expect(env.dispatch.defaultSearchRadiusKm).toBe(15);
    expect(env.dispatch.maxSearchRadiusKm).toBe(40);
  });

  it('ignores unknown log levels and unparseable numbers', () => {
    const env = loadEnvironmentConfig({ NODE_ENV: 'production', LOG_LEVEL: 'verbose', DISPATCH_MAX_RADIUS_KM: 'far' });

    expect(env.logLevel).toBe('info');
    expect(env.dispatch.maxSearchRadiusKm).toBe(100);
  });
});
