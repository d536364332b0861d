import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, loadConfigOrDefaults, defaultConfig, interpolateEnvVars, parseConfig } from './config-parser.js';
import { ConfigError } from '../types/errors.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'commonroom-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load a valid config file', async () => {
    const configContent = `
version: "1"
site:
  name: Test Room
  baseUrl: https://room.test/
server:
  port: 8080
database:
  url: postgres://localhost/commonroom
auth:
  requireConfirmedLogin: true
mail:
  provider: resend
  from: Test Room <noreply@room.test>
  apiKey: test-secret
docs:
  upstreamVersion: "11.x"
  translatedVersion: "10.x"
`;
    writeFileSync(join(tempDir, '.commonroom.yaml'), configContent);

    const result = await loadConfig(tempDir);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.site).toEqual({ name: 'Test Room', baseUrl: 'https://room.test' });
      expect(result.value.server.port).toBe(8080);
      expect(result.value.database?.url).toBe('postgres://localhost/commonroom');
      expect(result.value.database?.poolMax).toBe(10);
      expect(result.value.auth.requireConfirmedLogin).toBe(true);
      expect(result.value.auth.sessionTtlMinutes).toBe(120);
      expect(result.value.mail.provider).toBe('resend');
      expect(result.value.docs.translatedVersion).toBe('10.x');
    }
  });

  it('should apply defaults for missing sections', async () => {
    writeFileSync(join(tempDir, '.commonroom.yaml'), 'version: "1"\n');

    const result = await loadConfig(tempDir);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual(defaultConfig());
      expect(result.value.database).toBeUndefined();
      expect(result.value.mail.provider).toBe('log');
      expect(result.value.auth.passwordMinLength).toBe(6);
    }
  });

  it('should return error on invalid YAML', async () => {
    writeFileSync(join(tempDir, '.commonroom.yaml'), 'site: [unclosed');

    const result = await loadConfig(tempDir);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message).toContain('Invalid YAML');
    }
  });

  it('should return a not_found error when the file does not exist', async () => {
    const result = await loadConfig(tempDir);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.reason).toBe('not_found');
      expect(result.error.message).toContain('Config file not found');
    }
  });

  it('should return error when config file contains a scalar value', async () => {
    writeFileSync(join(tempDir, '.commonroom.yaml'), 'just a string');

    const result = await loadConfig(tempDir);

    expect(result._unsafeUnwrapErr().message).toBe('Config file is empty or not a valid YAML object');
  });

  it('should return validation error for an out-of-range port', async () => {
    writeFileSync(join(tempDir, '.commonroom.yaml'), 'server:\n  port: 70000\n');

    const result = await loadConfig(tempDir);

    expect(result._unsafeUnwrapErr().message).toBe('Config validation failed: server.port: Port must be at most 65535');
  });

  it('should return validation error for an unknown mail provider', async () => {
    writeFileSync(join(tempDir, '.commonroom.yaml'), 'mail:\n  provider: smtp\n');

    const result = await loadConfig(tempDir);

    expect(result._unsafeUnwrapErr().message).toContain('mail.provider');
  });

  it('should require a database url when the section is present', async () => {
    writeFileSync(join(tempDir, '.commonroom.yaml'), 'database:\n  poolMax: 5\n');

    const result = await loadConfig(tempDir);

    expect(result._unsafeUnwrapErr().message).toContain('database.url');
  });

  it('should fall back to defaults only when the file is missing', async () => {
    expect((await loadConfigOrDefaults(tempDir))._unsafeUnwrap()).toEqual(defaultConfig());

    writeFileSync(join(tempDir, '.commonroom.yaml'), 'server:\n  port: -1\n');
    expect((await loadConfigOrDefaults(tempDir)).isErr()).toBe(true);
  });
});

describe('interpolateEnvVars', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('should substitute environment variables in nested values', () => {
    process.env['COMMONROOM_TEST_KEY'] = 'test-secret';

    expect(interpolateEnvVars({ mail: { apiKey: '${COMMONROOM_TEST_KEY}' }, list: ['x-${COMMONROOM_TEST_KEY}'] })).toEqual({
      mail: { apiKey: 'test-secret' },
      list: ['x-test-secret'],
    });
  });

  it('should keep escaped references literal', () => {
    expect(interpolateEnvVars('\\${NOT_A_VAR}')).toBe('${NOT_A_VAR}');
  });

  it('should report missing variables', () => {
    delete process.env['COMMONROOM_MISSING'];

    const result = interpolateEnvVars('${COMMONROOM_MISSING}');

    expect(result).toBeInstanceOf(ConfigError);
    if (result instanceof ConfigError) {
      expect(result.message).toBe(
        'Missing environment variable(s): COMMONROOM_MISSING. Set them before starting Commonroom.',
      );
    }
  });

  it('should leave non-string values untouched', () => {
    expect(interpolateEnvVars({ port: 3000, flag: true, none: null })).toEqual({ port: 3000, flag: true, none: null });
  });
});

describe('parseConfig', () => {
  it('should interpolate before validating', () => {
    process.env['COMMONROOM_TEST_DB'] = 'postgres://db.test/commonroom';

    const result = parseConfig({ database: { url: '${COMMONROOM_TEST_DB}' } });

    expect(result._unsafeUnwrap().database?.url).toBe('postgres://db.test/commonroom');
    delete process.env['COMMONROOM_TEST_DB'];
  });
});
