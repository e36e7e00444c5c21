/**
 * @fileoverview Command-line flags for the simulation entry point.
 */

import { ConfigurationError } from './bridge/errors';
import {
  VALID_DEBUG_LEVELS,
  VALID_MODES,
  VALID_PROTOCOLS,
  isOneOf,
} from './config/config-validation';
import type { BridgeConfigFile } from './config/types';

export interface CliArgs {
  configPath?: string;
  overrides: BridgeConfigFile;
  help: boolean;
  /** Suppress the status lines printed around a run */
  quiet: boolean;
}

export const USAGE = [
  'Usage: jtag-vpi-sim [options]',
  '  --config <file>          configuration file (default: search for vpi-bridge.json)',
  '  --host <addr>            listen address',
  '  --port <n>               listen port',
  '  --proto <auto|openocd|legacy>',
  '  --mode <jtag|cjtag>      initial interface mode',
  '  --cjtag                  same as --mode cjtag',
  '  --msb-first              MSB-first bit order in scan buffers',
  '  -d, --debug <0|1|2>      log level',
  '  --poll-interval <n>      cycles between bridge polls',
  '  --timeout <seconds>      stop after this long',
  '  --idcode <n>             IDCODE of the simulated TAP',
  '  -q, --quiet              no status lines',
  '  -v, --verbose            status lines (default)',
  '  -h, --help',
  'Options taking a value also accept --option=value.',
].join('\n');

const VALUE_FLAGS: ReadonlySet<string> = new Set([
  '--config',
  '--host',
  '--port',
  '--proto',
  '--mode',
  '--debug',
  '-d',
  '--poll-interval',
  '--timeout',
  '--idcode',
]);

function numberFlag(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ConfigurationError(`${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

/**
 * Parses flags into config overrides. Range checks are left to config
 * validation; only the shape of each value is checked here.
 *
 * @throws {ConfigurationError} on unknown flags or malformed values
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { overrides: {}, help: false, quiet: false };
  const { overrides } = args;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const switchFlag = eq === -1;
    if (switchFlag && (flag === '-h' || flag === '--help')) {
      args.help = true;
      continue;
    }
    if (switchFlag && flag === '--msb-first') {
      overrides.bitOrder = 'msb-first';
      continue;
    }
    if (switchFlag && flag === '--cjtag') {
      overrides.mode = 'cjtag';
      continue;
    }
    if (switchFlag && (flag === '-q' || flag === '--quiet')) {
      args.quiet = true;
      continue;
    }
    if (switchFlag && (flag === '-v' || flag === '--verbose')) {
      args.quiet = false;
      continue;
    }
    if (!VALUE_FLAGS.has(flag)) {
      throw new ConfigurationError(`Unknown option ${arg}\n${USAGE}`);
    }
    let value: string | undefined;
    if (eq === -1) {
      value = argv[i + 1];
      i += 1;
    } else {
      value = arg.slice(eq + 1);
    }
    if (value === undefined) {
      throw new ConfigurationError(`${flag} needs a value`);
    }
    switch (flag) {
      case '--config':
        args.configPath = value;
        break;
      case '--host':
        overrides.host = value;
        break;
      case '--port':
        overrides.port = numberFlag(flag, value);
        break;
      case '--proto':
        if (!isOneOf(value, VALID_PROTOCOLS)) {
          throw new ConfigurationError(`--proto must be one of ${VALID_PROTOCOLS.join(', ')}`);
        }
        overrides.protocol = value;
        break;
      case '--mode':
        if (!isOneOf(value, VALID_MODES)) {
          throw new ConfigurationError(`--mode must be one of ${VALID_MODES.join(', ')}`);
        }
        overrides.mode = value;
        break;
      case '-d':
      case '--debug': {
        const level = numberFlag(flag, value);
        if (!isOneOf(level, VALID_DEBUG_LEVELS)) {
          throw new ConfigurationError('--debug must be 0, 1 or 2');
        }
        overrides.debugLevel = level;
        break;
      }
      case '--poll-interval':
        overrides.pollInterval = numberFlag(flag, value);
        break;
      case '--timeout':
        overrides.timeoutSeconds = numberFlag(flag, value);
        break;
      case '--idcode':
        overrides.idcode = numberFlag(flag, value);
        break;
      default:
        break;
    }
  }
  return args;
}
