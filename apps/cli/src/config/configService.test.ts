import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import test from 'node:test';

import assert from 'node:assert/strict';

import { ConfigService } from './configService.js';
import { resolveConfigFilePath } from './configPaths.js';
import { ConfigStore } from './configStore.js';

function createTempPath(): string {
  const dir = mkdtempSync(join(tmpdir(), 'estate-lens-config-'));
  return join(dir, 'config.json');
}

function cleanupTempPath(configPath: string): void {
  rmSync(dirname(configPath), { recursive: true, force: true });
}

test('ConfigService seeds a default profile pointing at the hosted endpoint', async () => {
  const configPath = createTempPath();
  try {
    const service = new ConfigService(new ConfigStore(configPath), {});

    await service.initialize();
    const profile = await service.getProfile('default');

    assert.equal(profile.name, 'default');
    assert.equal(profile.endpoint, 'https://api.perplexity.ai');
    assert.equal(profile.model, 'sonar');
    assert.equal(profile.apiKeyEnv, 'PERPLEXITY_API_KEY');
    assert.equal(profile.apiKey, undefined);
  } finally {
    cleanupTempPath(configPath);
  }
});

test('ConfigService resolves the API key from the profile environment variable', async () => {
  const configPath = createTempPath();
  try {
    const service = new ConfigService(new ConfigStore(configPath), {
      PERPLEXITY_API_KEY: '  test-secret  ',
      STAGING_KEY: 'staging-secret',
    });

    await service.initialize();
    await service.upsertProfile('staging', {
      endpoint: 'https://staging.example.com',
      model: 'sonar-pro',
      apiKeyEnv: 'STAGING_KEY',
      timeoutMs: 45_000,
    });

    assert.equal((await service.getProfile()).apiKey, 'test-secret');
    const staging = await service.getProfile('staging');
    assert.equal(staging.apiKey, 'staging-secret');
    assert.equal(staging.timeoutMs, 45_000);
  } finally {
    cleanupTempPath(configPath);
  }
});

test('ConfigService persists profiles across instances without storing keys', async () => {
  const configPath = createTempPath();
  try {
    const first = new ConfigService(new ConfigStore(configPath), {});
    await first.initialize();
    await first.upsertProfile('prod', {
      endpoint: 'https://api.example.com',
      model: 'sonar-pro',
      logFile: '/tmp/estate-lens.log',
    });

    const second = new ConfigService(new ConfigStore(configPath), {});
    const profile = await second.getProfile('prod');

    assert.equal(profile.endpoint, 'https://api.example.com');
    assert.equal(profile.logFile, '/tmp/estate-lens.log');
    assert.equal(profile.apiKeyEnv, 'PERPLEXITY_API_KEY');
  } finally {
    cleanupTempPath(configPath);
  }
});

test('ConfigService switches the default profile and errors on a missing one', async () => {
  const configPath = createTempPath();
  try {
    const service = new ConfigService(new ConfigStore(configPath), {});

    await service.initialize();
    await service.upsertProfile('staging', {
      endpoint: 'https://staging.example.com',
      model: 'sonar',
    });

    await service.setDefaultProfile('staging');
    assert.equal((await service.getProfile()).name, 'staging');

    const profiles = await service.listProfiles();
    assert.equal(profiles.find((item) => item.name === 'staging')?.isDefault, true);
    assert.equal(profiles.find((item) => item.name === 'default')?.isDefault, false);

    await assert.rejects(service.getProfile('missing'), /profile 'missing' does not exist/);
    await assert.rejects(service.setDefaultProfile('missing'), { name: 'ConfigError' });
    await assert.rejects(service.getProfile('toString'), /profile 'toString' does not exist/);
    await assert.rejects(service.setDefaultProfile('constructor'), /profile 'constructor' does not exist/);
  } finally {
    cleanupTempPath(configPath);
  }
});

test('ConfigStore rejects a config file that fails validation', async () => {
  const configPath = createTempPath();
  try {
    writeFileSync(configPath, JSON.stringify({ schemaVersion: 1, defaultProfile: 'default', profiles: { default: { model: 3 } } }));
    const store = new ConfigStore(configPath);

    await assert.rejects(store.load(), (error: unknown) => {
      assert.ok(error instanceof Error);
      assert.equal(error.name, 'ConfigError');
      assert.match(error.message, /profiles\.default\.endpoint/);
      return true;
    });

    writeFileSync(configPath, '{ not json');
    await assert.rejects(store.load(), /is not valid JSON/);
  } finally {
    cleanupTempPath(configPath);
  }
});

test('resolveConfigFilePath honours the override and platform defaults', () => {
  assert.equal(resolveConfigFilePath({ ESTATE_LENS_CONFIG_PATH: '/custom/config.json' }, 'linux'), '/custom/config.json');
  assert.equal(
    resolveConfigFilePath({ XDG_CONFIG_HOME: '/home/test/.config' }, 'linux'),
    join('/home/test/.config', 'estate-lens', 'config.json'),
  );
  assert.equal(
    resolveConfigFilePath({ APPDATA: 'C:\\Users\\test\\AppData\\Roaming' }, 'win32'),
    join('C:\\Users\\test\\AppData\\Roaming', 'EstateLens', 'config.json'),
  );
});
