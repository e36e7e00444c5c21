export { JtagBridge, type JtagBridgeOptions } from './bridge/jtag-bridge';
export { ConnectionManager } from './bridge/connection-manager';
export { SignalMailbox } from './bridge/mailbox';
export * from './bridge/errors';
export * from './bridge/types';

export * from './protocol/constants';
export * from './protocol/bit-buffer';
export * from './protocol/minimal-codec';
export * from './protocol/vpi-codec';
export { FramingDetector, classifyDialect, type ConfiguredProtocol } from './protocol/framing-detector';

export type { Transport, TransportListener, ReadResult, WriteResult } from './transport/transport';
export { TcpListener } from './transport/tcp-listener';
export { SocketTransport } from './transport/socket-transport';

export { createLogger, silentLogger, type BridgeLogger, type DebugLevel } from './logging/logger';

export { DEFAULT_CONFIG, type BridgeConfig, type BridgeConfigFile } from './config/types';
export { loadBridgeConfig, findConfigFile, loadConfigFile, mergeConfig } from './config/config-loader';
export { validateBridgeConfig, assertValidConfig } from './config/config-validation';

export type { Dut, DutInputs, DutOutputs } from './sim/dut';
export { SimulationClock } from './sim/simulation-clock';
export { SimulationStepper, type BridgePort } from './sim/stepper';
export { TapModel, INSTRUCTION_BYPASS, INSTRUCTION_IDCODE } from './sim/tap-model';
export { runSimulation } from './main';
