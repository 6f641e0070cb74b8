import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from '@/config/app.config';

describe('loadConfig', () => {
  it('fills every setting with its default', () => {
    const config = loadConfig({});

    assert.equal(config.port, 4000);
    assert.equal(config.nodeEnv, 'development');
    assert.equal(config.logLevel, 'info');
    assert.deepEqual(config.corsOrigins, ['http://localhost:3000']);
    assert.equal(config.openai.apiKey, undefined);
    assert.equal(config.openai.smallModel, 'gpt-4o-mini');
    assert.equal(config.embedder, 'simple');
    assert.equal(config.dataDir, process.cwd());
    assert.deepEqual(config.sessions, { store: 'memory', redisUrl: 'redis://localhost:6379', ttlMinutes: 1440, maxEntries: 1000 });
    assert.deepEqual(config.pipeline, { stageTimeoutMs: 60_000, defaultNumMeals: 5 });
    assert.deepEqual(config.llmRetry, { maxRetries: 5, initialDelay: 1000, maxDelay: 60_000 });
    assert.equal(config.profileRecallMinScore, 0.75);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ PORT: '  ', OPENAI_API_KEY: '', SESSION_STORE: '' });

    assert.equal(config.port, 4000);
    assert.equal(config.openai.apiKey, undefined);
    assert.equal(config.sessions.store, 'memory');
  });

  it('coerces numbers and splits the CORS origin list', () => {
    const config = loadConfig({ PORT: '8080', SESSION_TTL_MINUTES: '15', CORS_ORIGIN: 'http://a.test, http://b.test,' });

    assert.equal(config.port, 8080);
    assert.equal(config.sessions.ttlMinutes, 15);
    assert.deepEqual(config.corsOrigins, ['http://a.test', 'http://b.test']);
  });

  it('names every invalid variable', () => {
    assert.throws(
      () => loadConfig({ LOG_LEVEL: 'loud', PORT: '-1' }),
      (err: unknown) => {
        assert.ok(err instanceof Error);
        assert.match(err.message, /^Invalid environment configuration: /);
        assert.match(err.message, /PORT: /);
        assert.match(err.message, /LOG_LEVEL: /);
        return true;
      },
    );
  });
});
