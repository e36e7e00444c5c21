#!/usr/bin/env node
/**
 * @fileoverview Simulation entry point: the reference TAP behind the bridge,
 * run until the client stops the simulation or the timeout expires.
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { getErrorMessage, isConfigurationError } from './bridge/errors';
import { JtagBridge } from './bridge/jtag-bridge';
import { USAGE, parseCliArgs } from './cli';
import { loadBridgeConfig } from './config/config-loader';
import type { BridgeConfig } from './config/types';
import { createLogger, type BridgeLogger } from './logging/logger';
import { SimulationStepper } from './sim/stepper';
import { TapModel } from './sim/tap-model';

/** Cycles simulated between yields to the event loop */
const CYCLES_PER_SLICE = 1000;

export type StopReason = 'stop-simulation' | 'timeout';

export interface RunResult {
  reason: StopReason;
  cycles: number;
}

export async function runSimulation(
  config: BridgeConfig,
  logger: BridgeLogger = createLogger(config.debugLevel)
): Promise<RunResult> {
  let stopRequested = false;
  const bridge = JtagBridge.fromConfig(config, {
    logger,
    onStopSimulation: () => {
      stopRequested = true;
    },
  });
  await bridge.init();

  const stepper = new SimulationStepper(bridge, new TapModel(config.idcode), {
    pollInterval: config.pollInterval,
  });
  const deadline = Date.now() + config.timeoutSeconds * 1000;
  logger.info(
    `simulating (mode=${config.mode}, protocol=${config.protocol}, ` +
      `timeout=${config.timeoutSeconds}s)`
  );

  try {
    while (!stopRequested && Date.now() < deadline) {
      stepper.run(CYCLES_PER_SLICE);
      // socket events are only delivered between slices
      await yieldToEventLoop();
    }
  } finally {
    stepper.stop();
    await bridge.close();
  }

  const reason: StopReason = stopRequested ? 'stop-simulation' : 'timeout';
  logger.info(`simulation finished after ${stepper.clock.cycles} cycles (${reason})`);
  return { reason, cycles: stepper.clock.cycles };
}

/**
 * @returns process exit code
 */
export async function main(argv: readonly string[]): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      process.stdout.write(`${USAGE}\n`);
      return 0;
    }
    const { config, source, warnings } = loadBridgeConfig(
      args.configPath === undefined
        ? { overrides: args.overrides }
        : { configPath: args.configPath, overrides: args.overrides }
    );
    const logger = createLogger(config.debugLevel);
    if (source !== undefined) {
      logger.info(`configuration from ${source}`);
    }
    for (const warning of warnings) {
      logger.warn(warning);
    }
    if (!args.quiet) {
      process.stdout.write(`jtag-vpi-sim: ${config.mode} on ${config.host}:${config.port}\n`);
    }
    const result = await runSimulation(config, logger);
    if (!args.quiet) {
      process.stdout.write(
        `jtag-vpi-sim: stopped after ${result.cycles} cycles (${result.reason})\n`
      );
    }
    return 0;
  } catch (error) {
    const prefix = isConfigurationError(error) ? 'configuration error' : 'fatal';
    process.stderr.write(`${prefix}: ${getErrorMessage(error)}\n`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${getErrorMessage(error)}\n`);
      process.exitCode = 1;
    }
  );
}
