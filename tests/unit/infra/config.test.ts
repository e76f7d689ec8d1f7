/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env).toEqual({
        NODE_ENV: 'development',
        LOG_LEVEL: 'info',
        DATABASE_URL: undefined,
        LEARNER_STATE_MAX_RETRIES: 3,
        MASTERY_HALF_LIFE_DAYS: 14,
        TOPIC_TAXONOMY_PATH: 'data/topic-taxonomy.yaml',
      });
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        const env = parseEnv({ LOG_LEVEL: level });
        expect(env.LOG_LEVEL).toBe(level);
      }
    });

    it('treats an empty DATABASE_URL as absent', () => {
      expect(parseEnv({ DATABASE_URL: '' }).DATABASE_URL).toBeUndefined();
      expect(parseEnv({ DATABASE_URL: 'postgres://localhost/test' }).DATABASE_URL).toBe(
        'postgres://localhost/test'
      );
    });

    it('parses numeric settings', () => {
      const env = parseEnv({ LEARNER_STATE_MAX_RETRIES: '5', MASTERY_HALF_LIFE_DAYS: '7.5' });

      expect(env.LEARNER_STATE_MAX_RETRIES).toBe(5);
      expect(env.MASTERY_HALF_LIFE_DAYS).toBe(7.5);
    });

    it('throws on out-of-range retries', () => {
      expect(() => parseEnv({ LEARNER_STATE_MAX_RETRIES: '0' })).toThrow(
        'Invalid environment configuration'
      );
      expect(() => parseEnv({ LEARNER_STATE_MAX_RETRIES: '11' })).toThrow(
        'Invalid environment configuration'
      );
      expect(() => parseEnv({ LEARNER_STATE_MAX_RETRIES: '2.5' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on a non-positive or non-numeric half-life', () => {
      expect(() => parseEnv({ MASTERY_HALF_LIFE_DAYS: '0' })).toThrow(
        'Invalid environment configuration'
      );
      expect(() => parseEnv({ MASTERY_HALF_LIFE_DAYS: 'two weeks' })).toThrow(
        'Invalid environment configuration'
      );
    });

    it('throws on an unknown NODE_ENV', () => {
      expect(() => parseEnv({ NODE_ENV: 'staging' })).toThrow('Invalid environment configuration');
    });
  });

  describe('createConfig', () => {
    it('creates env flags', () => {
      const prodConfig = createConfig(parseEnv({ NODE_ENV: 'production' }));
      expect(prodConfig.env).toEqual({ isDevelopment: false, isProduction: true, isTest: false });
      expect(prodConfig.logger.pretty).toBe(false);

      const devConfig = createConfig(parseEnv({ NODE_ENV: 'development' }));
      expect(devConfig.env.isDevelopment).toBe(true);
      expect(devConfig.logger.pretty).toBe(true);
    });

    it('maps the learner state settings', () => {
      const config = createConfig(
        parseEnv({
          LEARNER_STATE_MAX_RETRIES: '4',
          MASTERY_HALF_LIFE_DAYS: '21',
          TOPIC_TAXONOMY_PATH: '/etc/topics.yaml',
        })
      );

      expect(config.learnerState).toEqual({
        maxWriteAttempts: 4,
        masteryHalfLifeDays: 21,
        topicTaxonomyPath: '/etc/topics.yaml',
      });
      expect(config.database.url).toBeUndefined();
    });
  });
});
