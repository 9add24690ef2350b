/**
 * Unit tests for environment parsing
 */

import { DataValidationError } from '../../errors/index';
import { parseEnv } from '../env';

describe('parseEnv', () => {
  it('should apply defaults to an empty environment', () => {
    expect(parseEnv({})).toEqual({
      PORT: 3001,
      LOG_LEVEL: 'info',
      CACHE_TTL_MS: 120_000,
      ODDS_API_BASE_URL: 'https://api.the-odds-api.com',
      GEMINI_MODEL: 'gemini-2.5-flash',
      OPENAI_MODEL: 'gpt-4.1-mini',
    });
  });

  it('should coerce numbers and keep keys', () => {
    const env = parseEnv({ PORT: '8080', CACHE_TTL_MS: '0', ODDS_API_KEY: 'test-secret', LOG_LEVEL: 'debug' });

    expect(env.PORT).toBe(8080);
    expect(env.CACHE_TTL_MS).toBe(0);
    expect(env.ODDS_API_KEY).toBe('test-secret');
    expect(env.LOG_LEVEL).toBe('debug');
  });

  it('should treat empty values as unset', () => {
    const env = parseEnv({ ODDS_API_KEY: '', GEMINI_API_KEY: '   ', PORT: '' });

    expect(env.ODDS_API_KEY).toBeUndefined();
    expect(env.GEMINI_API_KEY).toBeUndefined();
    expect(env.PORT).toBe(3001);
  });

  it('should name the invalid variable', () => {
    expect(() => parseEnv({ PORT: 'abc' })).toThrow(DataValidationError);
    expect(() => parseEnv({ PORT: 'abc' })).toThrow('Invalid environment variable PORT');

    try {
      parseEnv({ LOG_LEVEL: 'verbose' });
      throw new Error('expected parseEnv to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(DataValidationError);
      expect(error).toMatchObject({ field: 'LOG_LEVEL' });
    }
  });
});
