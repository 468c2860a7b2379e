/**
 * Values shared by the engine and the CLI.
 *
 * @module shared/constants
 */

export const VERSION = '0.1.0';

export const APP_NAME = 'rtsim';

/** Epoch the CLI uses to print virtual timestamps (simulated time starts here) */
export const SIMULATION_EPOCH = Date.UTC(2000, 0, 1);
