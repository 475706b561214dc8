import { loadEnv } from '../../../src/config/env';

describe('loadEnv', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadEnv({})).toEqual({
      nodeEnv: 'development',
      port: 5001,
      logLevel: 'info',
      requestLogFile: undefined,
      firebaseProjectId: undefined,
      eventsCollection: 'events',
      usersCollection: 'users',
      paginationDefaultPageSize: 12,
      paginationMaxPageSize: 100,
      paginationTimeoutMs: 10000,
      cursorSigningSecret: undefined,
      allowedOrigins: [],
    });
  });

  it('caps the maximum page size at 100 and the default at the maximum', () => {
    expect(loadEnv({ PAGINATION_MAX_PAGE_SIZE: '500' }).paginationMaxPageSize).toBe(100);

    const small = loadEnv({ PAGINATION_MAX_PAGE_SIZE: '5', PAGINATION_DEFAULT_PAGE_SIZE: '20' });
    expect(small.paginationMaxPageSize).toBe(5);
    expect(small.paginationDefaultPageSize).toBe(5);
  });

  it('ignores unparseable numbers and trims origin lists', () => {
    const config = loadEnv({
      PORT: 'abc',
      PAGINATION_TIMEOUT_MS: '-3',
      ALLOWED_ORIGINS: 'https://app.example.com/, https://admin.example.com,,',
    });
    expect(config.port).toBe(5001);
    expect(config.paginationTimeoutMs).toBe(10000);
    expect(config.allowedOrigins).toEqual(['https://app.example.com', 'https://admin.example.com']);
  });
});
