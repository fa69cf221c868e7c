import { loadAppConfig } from './app.config';

describe('loadAppConfig', () => {
  const base = { DATABASE_URL: 'postgresql://localhost/storefront_test' };

  it('applies defaults', () => {
    expect(loadAppConfig(base)).toEqual({
      port: 8000,
      databaseUrl: 'postgresql://localhost/storefront_test',
      sessionSecret: 'dev-session-secret',
      sessionMaxAgeMs: 1209600000,
      production: false,
    });
  });

  it('reads overrides', () => {
    const config = loadAppConfig({
      ...base,
      PORT: '4100',
      SESSION_SECRET: 'test-secret',
      SESSION_MAX_AGE_MS: '60000',
    });
    expect(config.port).toBe(4100);
    expect(config.sessionSecret).toBe('test-secret');
    expect(config.sessionMaxAgeMs).toBe(60000);
  });

  it('requires a database url', () => {
    expect(() => loadAppConfig({})).toThrow('Missing DATABASE_URL');
  });

  it('rejects a malformed port', () => {
    expect(() => loadAppConfig({ ...base, PORT: 'eighty' })).toThrow(
      'PORT must be a positive integer, got "eighty"',
    );
  });

  it('refuses the development secret in production', () => {
    expect(() => loadAppConfig({ ...base, NODE_ENV: 'production' })).toThrow(
      'SESSION_SECRET must be set in production',
    );
  });
});
