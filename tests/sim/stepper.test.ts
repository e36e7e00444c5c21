/**
 * @file Simulation stepper tests.
 */

import { describe, it, expect, vi } from 'vitest';
import type { DutSample, PendingSignal } from '../../src/bridge/types';
import type { Dut, DutOutputs } from '../../src/sim/dut';
import { SimulationStepper, type BridgePort } from '../../src/sim/stepper';

function recordingDut(outputs: DutOutputs): Dut & { log: string[] } {
  const log: string[] = [];
  return {
    log,
    drive: (inputs) => log.push(`drive ${inputs.tms}${inputs.tdi}${inputs.modeSelect}`),
    setClock: (level) => log.push(`clock ${level}`),
    outputs: () => outputs,
  };
}

function scriptedBridge(signals: (PendingSignal | undefined)[]): BridgePort & { samples: DutSample[] } {
  const samples: DutSample[] = [];
  return {
    samples,
    tick: (sample) => {
      samples.push(sample);
      return signals.shift();
    },
  };
}

describe('SimulationStepper', () => {
  it('polls the bridge every pollInterval cycles', () => {
    const tick = vi.fn((): PendingSignal | undefined => undefined);
    const stepper = new SimulationStepper({ tick }, recordingDut({ tdo: 0, tdoEnable: 1, idcode: 0, activeMode: 0 }), {
      pollInterval: 10,
    });
    stepper.run(35);
    expect(tick).toHaveBeenCalledTimes(3);
    stepper.stop();
    stepper.run(20);
    expect(tick).toHaveBeenCalledTimes(3);
  });

  it('reports a tri-stated TDO as 1', () => {
    const bridge = scriptedBridge([]);
    const stepper = new SimulationStepper(
      bridge,
      recordingDut({ tdo: 0, tdoEnable: 0, idcode: 0x1234, activeMode: 1 }),
      { pollInterval: 1 }
    );
    stepper.run(1);
    expect(bridge.samples).toEqual([{ tdo: 1, tdoEnable: 0, idcode: 0x1234, activeMode: 1 }]);
  });

  it('applies pulses as two edges and toggles as one', () => {
    const dut = recordingDut({ tdo: 0, tdoEnable: 1, idcode: 0, activeMode: 0 });
    const stepper = new SimulationStepper(
      scriptedBridge([
        { tms: 1, tdi: 0, modeSelect: 0, kind: 'tck-pulse' },
        { tms: 1, tdi: 0, modeSelect: 1, kind: 'tckc-toggle' },
        { tms: 0, tdi: 1, modeSelect: 1, kind: 'tck-pulse' },
        { tms: 0, tdi: 0, modeSelect: 0, kind: 'none' },
      ]),
      dut,
      { pollInterval: 1 }
    );
    stepper.run(4);
    expect(dut.log).toEqual([
      'drive 100',
      'clock 1',
      'clock 0',
      'drive 101',
      'clock 1',
      'drive 011',
      'clock 0',
      'clock 1',
      'clock 0',
      'drive 000',
    ]);
    expect(stepper.signalsApplied).toBe(4);
  });

  it('stops early once the condition holds', () => {
    const stepper = new SimulationStepper(
      scriptedBridge([]),
      recordingDut({ tdo: 0, tdoEnable: 1, idcode: 0, activeMode: 0 }),
      { pollInterval: 1 }
    );
    expect(stepper.runUntil(() => stepper.clock.cycles === 7, 100)).toBe(true);
    expect(stepper.clock.cycles).toBe(7);
    expect(stepper.runUntil(() => false, 3)).toBe(false);
    expect(stepper.clock.cycles).toBe(10);
  });
});
