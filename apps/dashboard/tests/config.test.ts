import { describe, it, expect } from 'vitest';
import { readDashboardConfig } from '../src/config.js';

describe('readDashboardConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(readDashboardConfig({})).toEqual({
      host: '127.0.0.1',
      port: 3000,
      sessionIdleMs: 3_600_000,
      maxBodyBytes: 1_048_576,
      geocoder: {
        enabled: true,
        baseUrl: 'https://nominatim.openstreetmap.org',
        userAgent: 'townsquare-community-map',
      },
      languageModel: {
        apiKey: undefined,
        model: 'gpt-4o-mini',
        temperature: 0.7,
      },
      logging: {
        level: 'info',
        service: 'townsquare-dashboard',
      },
    });
  });

  it('reads overrides', () => {
    const config = readDashboardConfig({
      HOST: '0.0.0.0',
      PORT: '8080',
      SESSION_IDLE_MINUTES: '5',
      GEOCODER_ENABLED: 'off',
      OPENAI_API_KEY: ' test-secret ',
      OPENAI_TEMPERATURE: '0',
      LOG_LEVEL: ' WARN ',
      LOG_SERVICE_NAME: 'dashboard-test',
    });

    expect(config.host).toBe('0.0.0.0');
    expect(config.port).toBe(8080);
    expect(config.sessionIdleMs).toBe(300_000);
    expect(config.geocoder.enabled).toBe(false);
    expect(config.languageModel.apiKey).toBe('test-secret');
    expect(config.languageModel.temperature).toBe(0);
    expect(config.logging).toEqual({ level: 'warn', service: 'dashboard-test' });
  });

  it('falls back on malformed values', () => {
    const config = readDashboardConfig({
      PORT: 'eighty',
      MAX_BODY_BYTES: '-1',
      GEOCODER_ENABLED: 'maybe',
      OPENAI_API_KEY: '   ',
      OPENAI_TEMPERATURE: '3.5',
      LOG_LEVEL: 'chatty',
    });

    expect(config.port).toBe(3000);
    expect(config.maxBodyBytes).toBe(1_048_576);
    expect(config.geocoder.enabled).toBe(true);
    expect(config.languageModel.apiKey).toBeUndefined();
    expect(config.languageModel.temperature).toBe(0.7);
    expect(config.logging.level).toBe('info');
  });
});
