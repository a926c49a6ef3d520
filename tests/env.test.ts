import { describe, expect, it } from 'vitest';
import { baseEnv, loadModule, storageEnv } from './helpers';

type EnvModule = typeof import('../src/config/env');

describe('environment configuration', () => {
  it('parses valid environment variables', async () => {
    const { loadEnv } = await loadModule<EnvModule>('../src/config/env');
    const env = loadEnv();

    expect(env.PROVIDER_API_URL).toBe(baseEnv.PROVIDER_API_URL);
    expect(env.PUBLIC_BASE_URL).toBe('https://relay.test');
    expect(env.ALLOWED_ORIGINS).toEqual(['https://frontend.test']);
    expect(env.TIMINGS).toEqual({
      pushTimeoutMs: 180_000,
      pollIntervalMs: 3_000,
      totalTimeoutMs: 360_000,
      pollMode: 'fallback',
    });
    expect(env.STORAGE).toBeUndefined();
    expect(env.LOCAL_RUNTIME_URL).toBeUndefined();
    expect(env.PORT).toBe(8787);
  });

  it('applies timing defaults when they are omitted', async () => {
    const { env } = await loadModule<EnvModule>('../src/config/env', {
      PUSH_TIMEOUT_MS: undefined,
      POLL_INTERVAL_MS: undefined,
      TOTAL_TIMEOUT_MS: undefined,
      POLL_MODE: undefined,
    });

    expect(env.TIMINGS.pushTimeoutMs).toBe(180_000);
    expect(env.TIMINGS.pollIntervalMs).toBe(3_000);
    expect(env.TIMINGS.totalTimeoutMs).toBe(360_000);
    expect(env.TIMINGS.pollMode).toBe('fallback');
  });

  it('strips trailing slashes from service URLs', async () => {
    const { env } = await loadModule<EnvModule>('../src/config/env', {
      PROVIDER_API_URL: 'https://provider.test/v1/',
      LOCAL_RUNTIME_URL: 'http://127.0.0.1:7860/',
    });

    expect(env.PROVIDER_API_URL).toBe('https://provider.test/v1');
    expect(env.LOCAL_RUNTIME_URL).toBe('http://127.0.0.1:7860');
  });

  it('fails fast when allowed origins are missing', async () => {
    await expect(loadModule('../src/config/env', { ALLOWED_ORIGINS: '' })).rejects.toThrowError(/ALLOWED_ORIGINS/);
  });

  it('requires the provider credentials', async () => {
    await expect(loadModule('../src/config/env', { PROVIDER_API_KEY: undefined })).rejects.toThrowError(
      /PROVIDER_API_KEY is required/
    );
  });

  it('rejects a poll interval that is not shorter than the total timeout', async () => {
    await expect(
      loadModule('../src/config/env', { POLL_INTERVAL_MS: '400000' })
    ).rejects.toThrowError(/POLL_INTERVAL_MS must be shorter than TOTAL_TIMEOUT_MS/);
  });

  it('rejects a push timeout past the total timeout in fallback mode only', async () => {
    await expect(
      loadModule('../src/config/env', { PUSH_TIMEOUT_MS: '360000' })
    ).rejects.toThrowError(/PUSH_TIMEOUT_MS/);

    const { env } = await loadModule<EnvModule>('../src/config/env', {
      PUSH_TIMEOUT_MS: '360000',
      POLL_MODE: 'parallel',
    });
    expect(env.TIMINGS.pollMode).toBe('parallel');
  });

  it('rejects unknown poll modes', async () => {
    await expect(loadModule('../src/config/env', { POLL_MODE: 'sometimes' })).rejects.toThrowError(
      /POLL_MODE must be fallback or parallel/
    );
  });

  it('requires storage settings when artifact persistence is on', async () => {
    await expect(
      loadModule('../src/config/env', { FEATURES_PERSIST_ARTIFACTS: 'true' })
    ).rejects.toThrowError(/R2_BUCKET is required when FEATURES_PERSIST_ARTIFACTS is true/);
  });

  it('builds the storage config when artifact persistence is on', async () => {
    const { env } = await loadModule<EnvModule>('../src/config/env', {
      ...storageEnv,
      R2_S3_ENDPOINT: 'example.r2.cloudflarestorage.com/',
    });

    expect(env.FEATURES.PERSIST_ARTIFACTS).toBe(true);
    expect(env.STORAGE).toEqual({
      REGION: 'auto',
      R2_S3_ENDPOINT: 'https://example.r2.cloudflarestorage.com',
      R2_BUCKET: 'relay-test',
      R2_ACCESS_KEY_ID: 'test-access-key',
      R2_SECRET_ACCESS_KEY: 'test-secret',
    });
  });

  it('requires a callback token whenever callbacks are advertised', async () => {
    await expect(loadModule('../src/config/env', { CALLBACK_TOKEN: undefined })).rejects.toThrowError(
      /CALLBACK_TOKEN is required when PUBLIC_BASE_URL is set/
    );

    const { env } = await loadModule<EnvModule>('../src/config/env', {
      PUBLIC_BASE_URL: undefined,
      CALLBACK_TOKEN: undefined,
    });
    expect(env.PUBLIC_BASE_URL).toBeUndefined();
    expect(env.CALLBACK_TOKEN).toBeUndefined();
  });

  it('rejects timings beyond the largest timer delay', async () => {
    await expect(loadModule('../src/config/env', { TOTAL_TIMEOUT_MS: '2147483648' })).rejects.toThrowError(
      /TOTAL_TIMEOUT_MS must be at most 2147483647/
    );
  });
});
