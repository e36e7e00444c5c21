/**
 * @fileoverview Drives a DUT from the bridge's pending signals, polling the
 * bridge on a fixed cycle interval.
 */

import type { Bit, DutSample, PendingSignal } from '../bridge/types';
import type { Dut } from './dut';
import { SimulationClock } from './simulation-clock';

/**
 * The part of the bridge the stepper talks to.
 */
export interface BridgePort {
  tick(sample: DutSample): PendingSignal | undefined;
}

export interface StepperOptions {
  /** Cycles between bridge polls */
  pollInterval: number;
  clock?: SimulationClock;
}

/**
 * On every poll the stepper reports the DUT's current outputs, which reflect
 * the signal applied on the previous poll, and applies whatever the bridge
 * hands back. A TCK pulse is a rising then a falling edge inside one poll; a
 * TCKC toggle flips the clock level once.
 */
export class SimulationStepper {
  readonly clock: SimulationClock;
  private readonly bridge: BridgePort;
  private readonly dut: Dut;
  private clockLevel: Bit = 0;
  private applied = 0;
  private readonly taskId: number;

  constructor(bridge: BridgePort, dut: Dut, options: StepperOptions) {
    this.bridge = bridge;
    this.dut = dut;
    this.clock = options.clock ?? new SimulationClock();
    this.taskId = this.clock.every(options.pollInterval, () => this.service());
  }

  /** Signals applied to the DUT so far, 'none' requests included. */
  get signalsApplied(): number {
    return this.applied;
  }

  /**
   * DUT outputs as the bridge sees them. A tri-stated TDO reads as 1.
   */
  sample(): DutSample {
    const out = this.dut.outputs();
    return {
      tdo: out.tdoEnable ? out.tdo : 1,
      tdoEnable: out.tdoEnable,
      idcode: out.idcode,
      activeMode: out.activeMode,
    };
  }

  /** One bridge poll: report, then apply. */
  service(): void {
    const signal = this.bridge.tick(this.sample());
    if (signal !== undefined) {
      this.apply(signal);
    }
  }

  run(cycles: number): void {
    this.clock.tick(cycles);
  }

  /**
   * Runs until `done` returns true, checking after every cycle.
   *
   * @returns false if `maxCycles` ran out first
   */
  runUntil(done: () => boolean, maxCycles: number): boolean {
    for (let cycle = 0; cycle < maxCycles; cycle++) {
      if (done()) {
        return true;
      }
      this.clock.tick();
    }
    return done();
  }

  stop(): void {
    this.clock.cancel(this.taskId);
  }

  private apply(signal: PendingSignal): void {
    this.applied += 1;
    this.dut.drive({ tms: signal.tms, tdi: signal.tdi, modeSelect: signal.modeSelect });
    switch (signal.kind) {
      case 'tck-pulse':
        if (this.clockLevel === 1) {
          this.dut.setClock(0);
        }
        this.dut.setClock(1);
        this.dut.setClock(0);
        this.clockLevel = 0;
        return;
      case 'tckc-toggle':
        this.clockLevel = this.clockLevel === 1 ? 0 : 1;
        this.dut.setClock(this.clockLevel);
        return;
      case 'none':
        return;
    }
  }
}
