/**
 * @file Configuration validation for the JTAG VPI bridge.
 * @description Runtime checks of configuration values read from JSON, with
 * one message per offending field.
 * @module config/config-validation
 */

import { ConfigurationError } from '../bridge/errors';
import type { BridgeConfig } from './types';

// ============================================================================
// Constants
// ============================================================================

export const VALID_PROTOCOLS = ['auto', 'openocd', 'legacy'] as const;
export const VALID_BIT_ORDERS = ['lsb-first', 'msb-first'] as const;
export const VALID_MODES = ['jtag', 'cjtag'] as const;
export const VALID_DEBUG_LEVELS = [0, 1, 2] as const;

const PORT_MIN = 0;
const PORT_MAX = 65535;

const POLL_INTERVAL_MIN = 1;
const POLL_INTERVAL_MAX = 1_000_000;

/** Runs shorter than this rarely finish an OpenOCD init sequence */
const SHORT_TIMEOUT_SECONDS = 5;

// ============================================================================
// Validation Result Types
// ============================================================================

export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Type guard over a literal list.
 */
export function isOneOf<T extends string | number>(
  value: unknown,
  choices: readonly T[]
): value is T {
  return choices.some((choice) => choice === value);
}

function ok(warnings: string[] = []): ValidationResult {
  return { valid: true, errors: [], warnings };
}

function fail(message: string): ValidationResult {
  return { valid: false, errors: [message], warnings: [] };
}

// ============================================================================
// Individual Validators
// ============================================================================

/**
 * Accepts undefined (field falls back to its default) or one of `choices`.
 */
export function validateChoice(
  value: unknown,
  fieldName: string,
  choices: readonly (string | number)[]
): ValidationResult {
  if (value === undefined) {
    return ok();
  }
  if ((typeof value !== 'string' && typeof value !== 'number') || !choices.includes(value)) {
    return fail(`${fieldName} must be one of ${choices.join(', ')}, got ${JSON.stringify(value)}`);
  }
  return ok();
}

/**
 * Validates an integer field against an inclusive range.
 */
export function validateInteger(
  value: unknown,
  fieldName: string,
  min: number,
  max: number
): ValidationResult {
  if (value === undefined) {
    return ok();
  }
  if (typeof value !== 'number') {
    return fail(`${fieldName} must be a number, got ${typeof value}`);
  }
  if (!Number.isInteger(value)) {
    return fail(`${fieldName} must be an integer, got ${value}`);
  }
  if (value < min || value > max) {
    return fail(`${fieldName} must be between ${min} and ${max}, got ${value}`);
  }
  return ok();
}

export function validateHost(value: unknown): ValidationResult {
  if (value === undefined) {
    return ok();
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return fail('host must be a non-empty string');
  }
  if (value !== '127.0.0.1' && value !== 'localhost' && value !== '::1') {
    return ok([`host ${value} exposes the JTAG port beyond this machine`]);
  }
  return ok();
}

export function validateTimeout(value: unknown): ValidationResult {
  if (value === undefined) {
    return ok();
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return fail(`timeoutSeconds must be a positive number, got ${JSON.stringify(value)}`);
  }
  if (value < SHORT_TIMEOUT_SECONDS) {
    return ok([`timeoutSeconds ${value} is very short`]);
  }
  return ok();
}

/**
 * Validates a whole configuration object, file contents or merged.
 */
export function validateBridgeConfig(config: unknown): ValidationResult {
  if (config === null || typeof config !== 'object' || Array.isArray(config)) {
    return fail('configuration must be an object');
  }
  const entries = new Map<string, unknown>(Object.entries(config));
  const field = (name: keyof BridgeConfig): unknown => entries.get(name);

  return mergeResults([
    validateHost(field('host')),
    validateInteger(field('port'), 'port', PORT_MIN, PORT_MAX),
    validateChoice(field('protocol'), 'protocol', VALID_PROTOCOLS),
    validateChoice(field('bitOrder'), 'bitOrder', VALID_BIT_ORDERS),
    validateChoice(field('mode'), 'mode', VALID_MODES),
    validateChoice(field('debugLevel'), 'debugLevel', VALID_DEBUG_LEVELS),
    validateInteger(field('pollInterval'), 'pollInterval', POLL_INTERVAL_MIN, POLL_INTERVAL_MAX),
    validateTimeout(field('timeoutSeconds')),
    validateInteger(field('idcode'), 'idcode', 0, 0xffffffff),
  ]);
}

/**
 * @throws {ConfigurationError} listing every invalid field
 */
export function assertValidConfig(config: unknown, source = 'configuration'): void {
  const result = validateBridgeConfig(config);
  if (!result.valid) {
    throw new ConfigurationError(`Invalid ${source}:\n- ${result.errors.join('\n- ')}`, {
      errors: result.errors,
    });
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

function mergeResults(results: ValidationResult[]): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  let valid = true;

  for (const result of results) {
    if (!result.valid) {
      valid = false;
    }
    errors.push(...result.errors);
    warnings.push(...result.warnings);
  }

  return { valid, errors, warnings };
}
