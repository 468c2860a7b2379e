/**
 * CLI Commands Index
 *
 * Exports all CLI command implementations.
 *
 * @module cli/commands
 */

// Simulate command
export {
  executeSimulate,
  SimulateCommand,
  SimulateResult,
  ReportSummary,
  runSimulate,
  reportStatus,
  summarizeReport,
  type SimulateCommandOptions,
} from './simulate.js';

// Trace command
export {
  executeTrace,
  TraceCommand,
  TraceResultView,
  runTrace,
  collectTrace,
  formatTraceEntry,
  type TraceCommandOptions,
  type TraceEntry,
} from './trace.js';
