import { test } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { loadConfig, resolveConfig } from '../src/config.js';
import { MockServerError } from '../src/errors.js';

test('resolveConfig returns the defaults', () => {
  assert.deepEqual(resolveConfig(), {
    host: '127.0.0.1',
    port: 0,
    cors: true,
    bodyLimit: '5mb',
    mocks: undefined,
    logging: { maxEntries: 500, verbose: false }
  });
});

test('resolveConfig merges nested overrides over the defaults', () => {
  const config = resolveConfig({ port: 8080, logging: { verbose: true } }, { cors: false });

  assert.equal(config.port, 8080);
  assert.equal(config.cors, false);
  assert.deepEqual(config.logging, { maxEntries: 500, verbose: true });
});

test('loadConfig layers the config file under the overrides', async () => {
  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'http-scenario-mock-config-'));
  const configPath = path.join(tmpDir, 'http-scenario-mock.config.mjs');
  const configPayload = {
    host: '0.0.0.0',
    port: 7000,
    mocks: 'mocks.json',
    logging: { maxEntries: 20 }
  };
  await fs.writeFile(configPath, `export default ${JSON.stringify(configPayload, null, 2)};`, 'utf8');

  const config = await loadConfig(configPath, { port: 9090 });

  assert.equal(config.host, '0.0.0.0');
  assert.equal(config.port, 9090);
  assert.equal(config.mocks, path.resolve('mocks.json'));
  assert.deepEqual(config.logging, { maxEntries: 20, verbose: false });
});

test('loadConfig fails on a missing config file', async () => {
  const missing = path.join(os.tmpdir(), 'http-scenario-mock-missing', 'nope.config.js');

  await assert.rejects(loadConfig(missing), (error: unknown) => {
    return error instanceof MockServerError && error.code === 'CONFIG_NOT_FOUND';
  });
});
