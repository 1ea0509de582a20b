/**
 * Stream configuration
 *
 * Loads configuration from framepipe-config.js or framepipe-config.json in
 * the working directory (or the file named by FRAMEPIPE_CONFIG), then
 * applies FRAMEPIPE_HOST / FRAMEPIPE_PORT. Every setting is optional.
 */

import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';

import { createLogger } from '../utils/logger.js';
import { DEFAULT_TIMEOUTS } from '../utils/timeout.js';
import { DEFAULT_MAX_FRAME_BYTES, DEFAULT_QUALITY } from '../encoders/frame/constants.js';
import { DEFAULT_PING_PATH, DEFAULT_UPLOAD_PATH } from '../protocol/constants.js';

const logger = createLogger('StreamConfig');

export interface StreamConfig {
  /** JPEG quality, 0-100 */
  quality: number;
  /** Encoded frame size ceiling in bytes */
  maxFrameBytes: number;
  host: string;
  port: number;
  pingPath: string;
  uploadPath: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  writeTimeoutMs: number;
  probeReadTimeoutMs: number;
  /** Consecutive network failures that end a session */
  maxConsecutiveFailures: number;
  displayFps: number;
  /** Receiver status report period */
  statusIntervalMs: number;
}

export const DEFAULT_STREAM_CONFIG: Readonly<StreamConfig> = Object.freeze({
  quality: DEFAULT_QUALITY,
  maxFrameBytes: DEFAULT_MAX_FRAME_BYTES,
  host: '127.0.0.1',
  port: 9001,
  pingPath: DEFAULT_PING_PATH,
  uploadPath: DEFAULT_UPLOAD_PATH,
  connectTimeoutMs: DEFAULT_TIMEOUTS.connect,
  readTimeoutMs: DEFAULT_TIMEOUTS.read,
  writeTimeoutMs: DEFAULT_TIMEOUTS.write,
  probeReadTimeoutMs: DEFAULT_TIMEOUTS.probeRead,
  maxConsecutiveFailures: 1,
  displayFps: 30,
  statusIntervalMs: 10_000,
});

type NumericKey = { [K in keyof StreamConfig]: StreamConfig[K] extends number ? K : never }[keyof StreamConfig];
type StringKey = { [K in keyof StreamConfig]: StreamConfig[K] extends string ? K : never }[keyof StreamConfig];

const NUMERIC_KEYS: readonly NumericKey[] = [
  'quality',
  'maxFrameBytes',
  'port',
  'connectTimeoutMs',
  'readTimeoutMs',
  'writeTimeoutMs',
  'probeReadTimeoutMs',
  'maxConsecutiveFailures',
  'displayFps',
  'statusIntervalMs',
];

const STRING_KEYS: readonly StringKey[] = ['host', 'pingPath', 'uploadPath'];

const CONFIG_FILES = ['framepipe-config.js', 'framepipe-config.json'];

let cachedConfig: StreamConfig | null = null;

/**
 * Keep only known keys with the right primitive type
 */
export function sanitizeConfig(raw: unknown): Partial<StreamConfig> {
  if (!raw || typeof raw !== 'object') {
    return {};
  }

  const entries: [string, unknown][] = Object.entries(raw);
  const src = new Map(entries);
  const config: Partial<StreamConfig> = {};

  for (const key of NUMERIC_KEYS) {
    const value = src.get(key);
    if (typeof value === 'number') {
      config[key] = value;
    } else if (value !== undefined) {
      logger.warn(`Ignoring config key "${key}": expected a number`);
    }
  }
  for (const key of STRING_KEYS) {
    const value = src.get(key);
    if (typeof value === 'string') {
      config[key] = value;
    } else if (value !== undefined) {
      logger.warn(`Ignoring config key "${key}": expected a string`);
    }
  }

  return config;
}

function requireInteger(config: StreamConfig, key: NumericKey, min: number, max = Number.MAX_SAFE_INTEGER): void {
  const value = config[key];
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new TypeError(`${key} must be an integer in [${min}, ${max}], got ${value}`);
  }
}

function requirePath(config: StreamConfig, key: 'pingPath' | 'uploadPath'): void {
  if (!config[key].startsWith('/')) {
    throw new TypeError(`${key} must start with "/", got "${config[key]}"`);
  }
}

/**
 * Merge overrides over the defaults and validate the result.
 *
 * @throws TypeError on any out-of-range or malformed value
 */
export function resolveStreamConfig(overrides: Partial<StreamConfig> = {}): StreamConfig {
  const config: StreamConfig = { ...DEFAULT_STREAM_CONFIG };
  for (const key of NUMERIC_KEYS) {
    const value = overrides[key];
    if (value !== undefined) config[key] = value;
  }
  for (const key of STRING_KEYS) {
    const value = overrides[key];
    if (value !== undefined) config[key] = value;
  }

  requireInteger(config, 'quality', 0, 100);
  requireInteger(config, 'maxFrameBytes', 1);
  requireInteger(config, 'port', 1, 65535);
  requireInteger(config, 'connectTimeoutMs', 1);
  requireInteger(config, 'readTimeoutMs', 1);
  requireInteger(config, 'writeTimeoutMs', 1);
  requireInteger(config, 'probeReadTimeoutMs', 1);
  requireInteger(config, 'maxConsecutiveFailures', 1);
  requireInteger(config, 'statusIntervalMs', 1);
  if (!(config.displayFps > 0) || !Number.isFinite(config.displayFps)) {
    throw new TypeError(`displayFps must be a positive number, got ${config.displayFps}`);
  }
  if (config.host.trim() === '') {
    throw new TypeError('host must not be empty');
  }
  requirePath(config, 'pingPath');
  requirePath(config, 'uploadPath');

  return config;
}

async function readConfigFile(file: string): Promise<unknown> {
  try {
    if (file.endsWith('.json')) {
      const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
      return parsed;
    }
    const mod: { default?: unknown } = await import(pathToFileURL(file).href);
    return mod.default ?? mod;
  } catch (err) {
    throw new TypeError(`Failed to load config file ${file}`, { cause: err });
  }
}

function findConfigFile(cwd: string, env: NodeJS.ProcessEnv): string | null {
  if (env.FRAMEPIPE_CONFIG) {
    if (!fs.existsSync(env.FRAMEPIPE_CONFIG)) {
      throw new TypeError(`FRAMEPIPE_CONFIG points to a missing file: ${env.FRAMEPIPE_CONFIG}`);
    }
    return env.FRAMEPIPE_CONFIG;
  }
  for (const name of CONFIG_FILES) {
    const candidate = path.join(cwd, name);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

function envOverrides(env: NodeJS.ProcessEnv): Partial<StreamConfig> {
  const overrides: Partial<StreamConfig> = {};
  if (env.FRAMEPIPE_HOST) {
    overrides.host = env.FRAMEPIPE_HOST;
  }
  if (env.FRAMEPIPE_PORT) {
    overrides.port = Number(env.FRAMEPIPE_PORT);
  }
  return overrides;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Get the loaded configuration (cached after the first call)
 *
 * @throws TypeError when the config file cannot be read or holds invalid values
 */
export async function loadStreamConfig(options: LoadConfigOptions = {}): Promise<StreamConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const file = findConfigFile(cwd, env);
  const fromFile = file ? sanitizeConfig(await readConfigFile(file)) : {};
  if (file) {
    logger.info(`Loaded configuration from ${file}`);
  }

  cachedConfig = resolveStreamConfig({ ...fromFile, ...envOverrides(env) });
  return cachedConfig;
}

/**
 * Clear cached config (for testing or reloading)
 */
export function resetStreamConfigCache(): void {
  cachedConfig = null;
}
