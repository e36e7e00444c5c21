/**
 * @fileoverview Configuration loading and merging for the bridge.
 * Reads vpi-bridge.json (or a package.json `vpiBridge` section) and layers it
 * between the defaults and explicit overrides.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, getErrorMessage } from '../bridge/errors';
import {
  VALID_BIT_ORDERS,
  VALID_DEBUG_LEVELS,
  VALID_MODES,
  VALID_PROTOCOLS,
  assertValidConfig,
  isOneOf,
  validateBridgeConfig,
} from './config-validation';
import { DEFAULT_CONFIG, type BridgeConfig, type BridgeConfigFile } from './types';

export const CONFIG_FILE_NAMES = ['vpi-bridge.json', '.vpi-bridge.json'] as const;

const PACKAGE_SECTION = 'vpiBridge';

/**
 * Searches for a configuration file starting from startDir and walking up
 * the directory tree. A package.json counts only if it has a `vpiBridge`
 * section.
 *
 * @returns The absolute path to the config file, or undefined if not found
 */
export function findConfigFile(
  startDir: string,
  candidates: readonly string[] = CONFIG_FILE_NAMES
): string | undefined {
  for (let dir = path.resolve(startDir); ; ) {
    for (const candidate of candidates) {
      const full = path.join(dir, candidate);
      if (fs.existsSync(full)) {
        return full;
      }
    }
    const pkgPath = path.join(dir, 'package.json');
    if (fs.existsSync(pkgPath) && hasPackageSection(pkgPath)) {
      return pkgPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

function hasPackageSection(pkgPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    return isRecord(pkg) && pkg[PACKAGE_SECTION] !== undefined;
  } catch {
    // a broken package.json is not ours to report
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readJson(configPath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${configPath}: ${getErrorMessage(error)}`, {
      path: configPath,
    });
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse ${configPath}: ${getErrorMessage(error)}`, {
      path: configPath,
    });
  }
}

/**
 * Keeps the recognised, well-typed fields of a validated object.
 */
export function toConfigFile(raw: Record<string, unknown>): BridgeConfigFile {
  const config: BridgeConfigFile = {};
  const { host, port, protocol, bitOrder, mode, debugLevel, pollInterval, timeoutSeconds, idcode } =
    raw;
  if (typeof host === 'string') config.host = host;
  if (typeof port === 'number') config.port = port;
  if (isOneOf(protocol, VALID_PROTOCOLS)) config.protocol = protocol;
  if (isOneOf(bitOrder, VALID_BIT_ORDERS)) config.bitOrder = bitOrder;
  if (isOneOf(mode, VALID_MODES)) config.mode = mode;
  if (isOneOf(debugLevel, VALID_DEBUG_LEVELS)) config.debugLevel = debugLevel;
  if (typeof pollInterval === 'number') config.pollInterval = pollInterval;
  if (typeof timeoutSeconds === 'number') config.timeoutSeconds = timeoutSeconds;
  if (typeof idcode === 'number') config.idcode = idcode;
  return config;
}

/**
 * Loads and validates one configuration file.
 *
 * @throws {ConfigurationError} if the file cannot be read, parsed or validated
 */
export function loadConfigFile(configPath: string): BridgeConfigFile {
  const parsed = readJson(configPath);
  const section = path.basename(configPath) === 'package.json' && isRecord(parsed)
    ? parsed[PACKAGE_SECTION]
    : parsed;
  if (section === undefined) {
    return {};
  }
  assertValidConfig(section, configPath);
  return isRecord(section) ? toConfigFile(section) : {};
}

/**
 * Merges configuration layers. Priority: overrides > file > defaults
 */
export function mergeConfig(
  file: BridgeConfigFile,
  overrides: BridgeConfigFile = {}
): BridgeConfig {
  return { ...DEFAULT_CONFIG, ...file, ...overrides };
}

export interface LoadConfigOptions {
  /** Directory the file search starts from; defaults to the working directory */
  startDir?: string;
  /** Explicit file; skips the search */
  configPath?: string;
  overrides?: BridgeConfigFile;
}

export interface LoadedConfig {
  config: BridgeConfig;
  /** File the values came from, if one was found */
  source: string | undefined;
  warnings: string[];
}

/**
 * Finds, loads, merges and validates the configuration.
 *
 * @throws {ConfigurationError} on any invalid layer
 */
export function loadBridgeConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const source = options.configPath ?? findConfigFile(options.startDir ?? process.cwd());
  const file = source !== undefined ? loadConfigFile(source) : {};
  const config = mergeConfig(file, options.overrides);
  const result = validateBridgeConfig(config);
  if (!result.valid) {
    throw new ConfigurationError(`Invalid configuration:\n- ${result.errors.join('\n- ')}`, {
      errors: result.errors,
    });
  }
  return { config, source, warnings: result.warnings };
}
