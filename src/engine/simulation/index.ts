/**
 * Simulation module - virtual clock driver and transfer scenarios.
 *
 * @module engine/simulation
 */

export {
  Simulator,
  type SimulatorOptions,
  type RunOptions,
  type RunResult,
  type StopReason,
} from './simulator.js';
export {
  runTransfer,
  type TransferOptions,
  type TransferContext,
  type TransferReport,
  type WindowSample,
} from './transfer.js';
