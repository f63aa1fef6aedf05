import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { MockServerError } from './errors.js';

export interface MockServerConfig {
  host: string;
  /** 0 binds any free port. */
  port: number;
  cors: boolean;
  bodyLimit: string;
  /** Declaration file served by the CLI. */
  mocks?: string;
  logging: {
    maxEntries: number;
    verbose: boolean;
  };
}

export const DEFAULT_CONFIG_FILE = 'http-scenario-mock.config.js';

const defaultConfig: MockServerConfig = {
  host: '127.0.0.1',
  port: 0,
  cors: true,
  bodyLimit: '5mb',
  logging: {
    maxEntries: 500,
    verbose: false
  }
};

export type PartialDeep<T> = {
  [K in keyof T]?: T[K] extends object ? PartialDeep<T[K]> : T[K];
};

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function mergeRecords(base: object, override: object): Record<string, unknown> {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(base));
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const baseValue = result[key];
    if (isObject(baseValue) && isObject(value)) {
      result[key] = mergeRecords(baseValue, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function toConfig(merged: Record<string, unknown>): MockServerConfig {
  const logging: Record<string, unknown> = isObject(merged.logging) ? merged.logging : {};
  return {
    host: typeof merged.host === 'string' ? merged.host : defaultConfig.host,
    port: coerceNumber(merged.port, defaultConfig.port) ?? defaultConfig.port,
    cors: typeof merged.cors === 'boolean' ? merged.cors : defaultConfig.cors,
    bodyLimit: typeof merged.bodyLimit === 'string' ? merged.bodyLimit : defaultConfig.bodyLimit,
    mocks: typeof merged.mocks === 'string' && merged.mocks ? merged.mocks : undefined,
    logging: {
      maxEntries: coerceNumber(logging.maxEntries, defaultConfig.logging.maxEntries) ?? defaultConfig.logging.maxEntries,
      verbose: typeof logging.verbose === 'boolean' ? logging.verbose : defaultConfig.logging.verbose
    }
  };
}

export function resolveConfig(...layers: PartialDeep<MockServerConfig>[]): MockServerConfig {
  let merged = mergeRecords(defaultConfig, {});
  for (const layer of layers) {
    merged = mergeRecords(merged, layer);
  }
  return toConfig(merged);
}

async function loadConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new MockServerError({
      code: 'CONFIG_NOT_FOUND',
      message: `Config file not found: ${resolved}`
    });
  }
  const fileUrl = pathToFileURL(resolved).href;
  const imported: unknown = await import(fileUrl);
  const config = isObject(imported) && imported.default !== undefined ? imported.default : imported;
  if (!isObject(config)) {
    throw new Error('Config file must export an object.');
  }
  return config;
}

/**
 * Defaults, then the config file (explicit path, or the default file in the working
 * directory when present), then the overrides. `mocks` comes back as an absolute path.
 */
export async function loadConfig(
  configPath?: string,
  overrides: PartialDeep<MockServerConfig> = {}
): Promise<MockServerConfig> {
  let fileConfig: Record<string, unknown> = {};
  const defaultConfigPath = path.resolve(DEFAULT_CONFIG_FILE);

  if (configPath) {
    fileConfig = await loadConfigFile(configPath);
  } else if (fs.existsSync(defaultConfigPath)) {
    fileConfig = await loadConfigFile(defaultConfigPath);
  }

  const merged = toConfig(mergeRecords(mergeRecords(defaultConfig, fileConfig), overrides));
  if (merged.mocks) {
    merged.mocks = path.resolve(merged.mocks);
  }
  return merged;
}

export function coerceNumber(value: unknown, fallback?: number): number | undefined {
  if (value === undefined || value === null || value === '') return fallback;
  const num = Number(value);
  if (Number.isNaN(num)) return fallback;
  return num;
}
