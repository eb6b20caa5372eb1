import { corsOrigins, defaultLogLevel, loadConfig, TICKETMASTER_EVENTS_URL } from '../env.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      NODE_ENV: 'development',
      HOST: '127.0.0.1',
      PORT: 8080,
      SWAGGER_TITLE: 'City Events Service',
      SWAGGER_VERSION: '1.0.0',
      TICKETMASTER_BASE_URL: TICKETMASTER_EVENTS_URL,
      CORS_ORIGINS: '*',
    });
  });

  it('coerces the port', () => {
    expect(loadConfig({ PORT: '9090', HOST: '0.0.0.0' })).toMatchObject({ PORT: 9090, HOST: '0.0.0.0' });
  });

  it('fails on invalid values', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      expect(() => loadConfig({ PORT: 'eighty' })).toThrow('ENV validation failed');
      expect(() => loadConfig({ TICKETMASTER_BASE_URL: 'not a url' })).toThrow('ENV validation failed');
      expect(errorSpy).toHaveBeenCalledTimes(2);
    } finally {
      errorSpy.mockRestore();
    }
  });
});

describe('defaultLogLevel', () => {
  it('follows NODE_ENV unless LOG_LEVEL is set', () => {
    expect(defaultLogLevel({ NODE_ENV: 'development' })).toBe('debug');
    expect(defaultLogLevel({ NODE_ENV: 'production' })).toBe('info');
    expect(defaultLogLevel({ NODE_ENV: 'test' })).toBe('silent');
    expect(defaultLogLevel({ NODE_ENV: 'production', LOG_LEVEL: 'warn' })).toBe('warn');
  });
});

describe('corsOrigins', () => {
  it('returns * for any-origin settings', () => {
    expect(corsOrigins({ CORS_ORIGINS: '*' })).toBe('*');
    expect(corsOrigins({ CORS_ORIGINS: ' ' })).toBe('*');
  });

  it('splits and trims a list of origins', () => {
    expect(corsOrigins({ CORS_ORIGINS: 'http://localhost:3000, https://app.example.org' }))
      .toEqual(new Set(['http://localhost:3000', 'https://app.example.org']));
  });
});
