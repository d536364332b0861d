import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import type { CommonroomConfig } from '../types/config.js';
import { ConfigError } from '../types/errors.js';

export const CONFIG_FILE_NAME = '.commonroom.yaml';

// --- Zod Schemas ---

const siteConfigSchema = z.object({
  name: z.string().min(1, 'Site name must not be empty').default('Commonroom'),
  baseUrl: z
    .string()
    .url('baseUrl must be an absolute URL')
    .default('http://localhost:3000')
    .transform((url) => url.replace(/\/+$/, '')),
});

const serverConfigSchema = z.object({
  port: z.number().int('Port must be an integer').min(1).max(65535, 'Port must be at most 65535').default(3000),
  corsOrigin: z.string().min(1).default('*'),
});

const databaseConfigSchema = z.object({
  url: z.string().min(1, 'Database url must not be empty'),
  poolMax: z.number().int().positive('poolMax must be positive').default(10),
  connectionTimeoutMs: z.number().int().nonnegative().default(5000),
  idleTimeoutMs: z.number().int().nonnegative().default(30000),
  statementTimeoutMs: z.number().int().nonnegative().default(10000),
});

const authConfigSchema = z.object({
  sessionTtlMinutes: z.number().int().positive('sessionTtlMinutes must be positive').default(120),
  rememberTtlDays: z.number().int().positive('rememberTtlDays must be positive').default(30),
  requireConfirmedLogin: z.boolean().default(false),
  failDelayMs: z.number().int().nonnegative().default(250),
  passwordMinLength: z.number().int().min(1, 'passwordMinLength must be at least 1').default(6),
  bcryptRounds: z.number().int().min(4, 'bcryptRounds must be between 4 and 31').max(31).default(10),
});

const mailConfigSchema = z.object({
  provider: z.enum(['log', 'resend']).default('log'),
  from: z.string().min(1, 'Mail sender must not be empty').default('Commonroom <noreply@localhost>'),
  apiKey: z.string().min(1).optional(),
});

const docsConfigSchema = z.object({
  upstreamVersion: z.string().min(1).optional(),
  translatedVersion: z.string().min(1).optional(),
});

const commonroomConfigSchema = z.object({
  version: z.string().min(1, 'Version must not be empty').default('1'),
  site: siteConfigSchema.default({}),
  server: serverConfigSchema.default({}),
  database: databaseConfigSchema.optional(),
  auth: authConfigSchema.default({}),
  mail: mailConfigSchema.default({}),
  docs: docsConfigSchema.default({}),
});

/** The configuration used when no config file exists: in-memory store, log mailer. */
export function defaultConfig(): CommonroomConfig {
  return commonroomConfigSchema.parse({});
}

// --- Environment variable interpolation ---

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;
const ESCAPED_ENV_VAR_PATTERN = /\\\$\{([^}]+)\}/g;
const ESCAPE_MARK = '\x00';
const RESTORE_PATTERN = /\x00([^\x00]+)\x00/g;

function interpolateEnvVarsInString(value: string): string | ConfigError {
  // Park escaped \${...} so the substitution below skips it
  const parked = value.replace(ESCAPED_ENV_VAR_PATTERN, `${ESCAPE_MARK}$1${ESCAPE_MARK}`);

  const missing: string[] = [];
  const resolved = parked.replace(ENV_VAR_PATTERN, (match, varName: string) => {
    const envValue = process.env[varName];
    if (envValue === undefined) {
      missing.push(varName);
      return match;
    }
    return envValue;
  });

  if (missing.length > 0) {
    return new ConfigError(
      `Missing environment variable(s): ${missing.join(', ')}. Set them before starting Commonroom.`,
    );
  }

  return resolved.replace(RESTORE_PATTERN, (_match, varName: string) => `\${${varName}}`);
}

export function interpolateEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVarsInString(obj);
  }
  if (Array.isArray(obj)) {
    const result: unknown[] = [];
    for (const item of obj) {
      const interpolated = interpolateEnvVars(item);
      if (interpolated instanceof ConfigError) return interpolated;
      result.push(interpolated);
    }
    return result;
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const interpolated = interpolateEnvVars(value);
      if (interpolated instanceof ConfigError) return interpolated;
      result[key] = interpolated;
    }
    return result;
  }
  return obj;
}

// --- Helpers ---

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/** Validates an already-parsed document, filling in defaults. */
export function parseConfig(document: unknown): Result<CommonroomConfig, ConfigError> {
  const interpolated = interpolateEnvVars(document);
  if (interpolated instanceof ConfigError) {
    return err(interpolated);
  }

  const validationResult = commonroomConfigSchema.safeParse(interpolated);
  if (!validationResult.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(validationResult.data);
}

// --- Main ---

export async function loadConfig(rootDir: string): Promise<Result<CommonroomConfig, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch {
    return err(new ConfigError(`Config file not found: ${configPath}`, 'not_found'));
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigError(`Invalid YAML in config file: ${message}`));
  }

  if (parsed === null || parsed === undefined || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  return parseConfig(parsed);
}

/** Like loadConfig, but a missing file yields {@link defaultConfig}. */
export async function loadConfigOrDefaults(rootDir: string): Promise<Result<CommonroomConfig, ConfigError>> {
  const result = await loadConfig(rootDir);
  if (result.isErr() && result.error.reason === 'not_found') {
    return ok(defaultConfig());
  }
  return result;
}
