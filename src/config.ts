/**
 * Configuration
 *
 * Settings come from an optional `.schema-evolution.json` file, overlaid by
 * environment variables:
 * - SCHEMA_EVOLUTION_STORE: snapshot store directory
 * - SCHEMA_EVOLUTION_MIN_SEVERITY: minor | major | critical
 * - SCHEMA_EVOLUTION_CUSTOM_SCALARS: comma-separated scalar names
 * - SCHEMA_EVOLUTION_POLICY: base-name | structural
 * - SCHEMA_EVOLUTION_LOG_LEVEL: debug | info | warn | error | silent
 *
 * CLI flags take precedence over both.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, describeError } from './core/errors';
import { DEFAULT_CUSTOM_SCALARS } from './core/type-ref';

export const CONFIG_FILE_NAME = '.schema-evolution.json';

export const configSchema = z
  .object({
    store: z.string().min(1).default('./schemas'),
    minSeverity: z.enum(['minor', 'major', 'critical']).default('minor'),
    customScalars: z.array(z.string().min(1)).default([...DEFAULT_CUSTOM_SCALARS]),
    typeChangePolicy: z.enum(['base-name', 'structural']).default('base-name'),
    format: z.enum(['console', 'json', 'markdown']).default('console'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;

export interface LoadConfigOptions {
  /** Directory the default config file is looked up in */
  cwd?: string;

  /** Explicit config file; it must exist */
  file?: string;

  env?: NodeJS.ProcessEnv;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  if (env.SCHEMA_EVOLUTION_STORE) overrides.store = env.SCHEMA_EVOLUTION_STORE;
  if (env.SCHEMA_EVOLUTION_MIN_SEVERITY) overrides.minSeverity = env.SCHEMA_EVOLUTION_MIN_SEVERITY;
  if (env.SCHEMA_EVOLUTION_POLICY) overrides.typeChangePolicy = env.SCHEMA_EVOLUTION_POLICY;
  if (env.SCHEMA_EVOLUTION_LOG_LEVEL) overrides.logLevel = env.SCHEMA_EVOLUTION_LOG_LEVEL;
  if (env.SCHEMA_EVOLUTION_CUSTOM_SCALARS) {
    overrides.customScalars = env.SCHEMA_EVOLUTION_CUSTOM_SCALARS.split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }

  return overrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(filePath, [describeError(error)]);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(filePath, ['expected a JSON object']);
  }
  return parsed;
}

/**
 * Load and validate configuration.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const filePath = path.resolve(cwd, options.file ?? CONFIG_FILE_NAME);

  let fromFile: Record<string, unknown> = {};
  if (fs.existsSync(filePath)) {
    fromFile = readConfigFile(filePath);
  } else if (options.file) {
    throw new ConfigError(filePath, ['file does not exist']);
  }

  const result = configSchema.safeParse({ ...fromFile, ...envOverrides(env) });
  if (!result.success) {
    throw new ConfigError(
      fs.existsSync(filePath) ? filePath : 'environment',
      result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }
  return result.data;
}
