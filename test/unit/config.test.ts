import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { loadConfig } from '../../src/core/config.js';
import { ConfigurationError } from '../../src/core/errors.js';

describe('loadConfig', () => {
  const tmpDir = path.join(os.tmpdir(), `tandem-config-test-${Date.now()}`);
  const configPath = path.join(tmpDir, 'config.json');

  beforeEach(async () => {
    await fs.mkdir(tmpDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should fall back to defaults when the file is missing', async () => {
    const config = await loadConfig(path.join(tmpDir, 'missing.json'), {});

    expect(config).toEqual({
      llm: { provider: 'openai', model: 'gpt-4o-mini' },
      runner: { maxSteps: 20 },
      logger: { level: 'info', format: 'pretty' }
    });
  });

  it('should read values from the file', async () => {
    await fs.writeFile(configPath, JSON.stringify({
      llm: { model: 'gpt-test', apiKey: 'test-secret', temperature: 0.3 },
      runner: { maxSteps: 5, recordTo: '/tmp/run.jsonl' },
      logger: { level: 'debug', format: 'json' }
    }));

    const config = await loadConfig(configPath, {});

    expect(config.llm).toEqual({ provider: 'openai', model: 'gpt-test', apiKey: 'test-secret', temperature: 0.3 });
    expect(config.runner).toEqual({ maxSteps: 5, recordTo: '/tmp/run.jsonl' });
    expect(config.logger).toEqual({ level: 'debug', format: 'json' });
  });

  it('should let environment variables override the file', async () => {
    await fs.writeFile(configPath, JSON.stringify({ llm: { model: 'from-file' }, runner: { maxSteps: 5 } }));

    const config = await loadConfig(configPath, {
      TANDEM_MODEL: 'from-env',
      TANDEM_BASE_URL: 'https://llm.example.test/v1',
      OPENAI_API_KEY: 'test-secret',
      TANDEM_MAX_STEPS: '8',
      TANDEM_LOG_LEVEL: 'warn'
    });

    expect(config.llm).toMatchObject({ model: 'from-env', baseUrl: 'https://llm.example.test/v1', apiKey: 'test-secret' });
    expect(config.runner.maxSteps).toBe(8);
    expect(config.logger.level).toBe('warn');
  });

  it('should let an API key from the environment replace the one in the file', async () => {
    await fs.writeFile(configPath, JSON.stringify({ llm: { apiKey: 'file-secret' } }));

    expect((await loadConfig(configPath, { TANDEM_API_KEY: 'env-secret' })).llm.apiKey).toBe('env-secret');
    expect((await loadConfig(configPath, { OPENAI_API_KEY: 'env-secret' })).llm.apiKey).toBe('env-secret');
    expect((await loadConfig(configPath, {})).llm.apiKey).toBe('file-secret');
  });

  it('should reject invalid values with their path', async () => {
    await fs.writeFile(configPath, JSON.stringify({ runner: { maxSteps: 0 } }));

    await expect(loadConfig(configPath, {})).rejects.toThrow(ConfigurationError);
    await expect(loadConfig(configPath, {})).rejects.toThrow(`Invalid configuration in ${configPath}: runner.maxSteps:`);
  });

  it('should reject invalid environment values', async () => {
    await expect(loadConfig(configPath, { TANDEM_MAX_STEPS: 'many' })).rejects.toThrow(
      `Invalid configuration in ${configPath} + environment: runner.maxSteps:`
    );
  });

  it('should reject malformed JSON', async () => {
    await fs.writeFile(configPath, '{ "llm": ');

    await expect(loadConfig(configPath, {})).rejects.toThrow(`Invalid JSON in ${configPath}`);
  });
});
