#!/usr/bin/env node
/**
 * rtsim CLI Entry Point
 *
 * This module handles command-line argument parsing and routes
 * to the appropriate command implementations.
 *
 * @module cli
 */

import React from 'react';
import { render, Text, Box } from 'ink';
import meow from 'meow';
import { APP_NAME, VERSION } from '../shared/constants.js';
import { TransportError } from '../engine/types.js';
import { buildTransferOptions, loadConfigFile, type SimulationFlags } from './utils/options.js';
import type { TransferOptions } from '../engine/simulation/transfer.js';

// Import command implementations
import { executeSimulate, exitCodeFor, runSimulate } from './commands/simulate.js';
import { executeTrace, runTrace } from './commands/trace.js';

// =============================================================================
// CLI Configuration
// =============================================================================

const cli = meow(
  `
  Usage
    $ rtsim <command> [options]

  Commands
    simulate            Run a bulk transfer and print a report
    trace               Run a small transfer and log every segment

  Transfer
    --bytes, -b         Bytes to transfer (default: 100000, trace: 4096)
    --seed, -s          Seed for payload, network and hosts (default: 1)
    --max-time          Simulated time limit in ms (default: 600000)
    --config, -c        JSON file with transport and network options

  Network
    --loss              Loss probability (0-1)
    --duplicate         Duplication probability (0-1)
    --reorder           Probability that a datagram is held back (0-1)
    --reorder-delay     How long held-back datagrams wait, in ms
    --corrupt           Bit-flip probability (0-1)
    --refuse            Probability that a send is refused (0-1)
    --latency           One-way delay in ms (default: 10)
    --jitter            Extra random delay in ms
    --queue             Undelivered datagrams per host before sends are refused

  Transport
    --mss               Maximum segment size in bytes
    --window            Receive window in bytes

  Output
    --verbose           Show the congestion window trace (simulate)
    --limit             Most trace entries to show (trace, default: 200)
    --plain             Print plain text instead of rendering with Ink
    --version, -v       Show version
    --help, -h          Show help

  Examples
    $ rtsim simulate --bytes 1000000 --loss 0.02 --latency 25
    $ rtsim simulate --mss 500 --window 4000 --verbose
    $ rtsim trace --bytes 2000 --loss 0.2 --seed 7
    $ rtsim simulate --config lossy.json
`,
  {
    importMeta: import.meta,
    version: VERSION,
    flags: {
      version: { type: 'boolean', shortFlag: 'v' },
      bytes: { type: 'number', shortFlag: 'b' },
      seed: { type: 'number', shortFlag: 's' },
      maxTime: { type: 'number' },
      config: { type: 'string', shortFlag: 'c' },
      loss: { type: 'number' },
      duplicate: { type: 'number' },
      reorder: { type: 'number' },
      reorderDelay: { type: 'number' },
      corrupt: { type: 'number' },
      refuse: { type: 'number' },
      latency: { type: 'number' },
      jitter: { type: 'number' },
      queue: { type: 'number' },
      mss: { type: 'number' },
      window: { type: 'number' },
      verbose: { type: 'boolean', default: false },
      limit: { type: 'number' },
      plain: { type: 'boolean', default: false },
    },
  }
);

const DEFAULT_TRACE_BYTES = 4096;

// =============================================================================
// Error Display Component
// =============================================================================

interface ErrorProps {
  message: string;
}

/**
 * Error display component
 */
function ErrorDisplay({ message }: ErrorProps) {
  return (
    <Box flexDirection="column" padding={1}>
      <Text color="red" bold>
        Error: {message}
      </Text>
      <Box marginTop={1}>
        <Text>Run </Text>
        <Text color="yellow">{APP_NAME} --help</Text>
        <Text> for usage information</Text>
      </Box>
    </Box>
  );
}

function fail(message: string): void {
  render(<ErrorDisplay message={message} />);
  process.exit(1);
}

// =============================================================================
// Command Routing
// =============================================================================

/**
 * Build transfer options from flags, or report why they are invalid.
 */
function resolveTransfer(flags: SimulationFlags): TransferOptions | null {
  try {
    const file = flags.config !== undefined ? loadConfigFile(flags.config) : undefined;
    return buildTransferOptions(flags, file);
  } catch (err) {
    if (err instanceof TransportError) {
      fail(err.message);
      return null;
    }
    throw err;
  }
}

/**
 * Route the command to the appropriate handler
 */
function routeCommand(): void {
  const [command] = cli.input;
  const flags = cli.flags;

  // Handle version flag
  if (flags.version) {
    console.log(VERSION);
    process.exit(0);
  }

  if (!command) {
    cli.showHelp(0);
    return;
  }

  switch (command.toLowerCase()) {
    case 'simulate':
    case 'sim':
    case 'run': {
      const transfer = resolveTransfer(flags);
      if (!transfer) return;

      if (flags.plain) {
        const report = executeSimulate({ transfer, verbose: flags.verbose });
        process.exit(exitCodeFor(report));
      }
      runSimulate({ transfer, verbose: flags.verbose });
      break;
    }

    case 'trace': {
      const transfer = resolveTransfer({ ...flags, bytes: flags.bytes ?? DEFAULT_TRACE_BYTES });
      if (!transfer) return;

      if (flags.plain) {
        const { report } = executeTrace({ transfer, limit: flags.limit });
        process.exit(exitCodeFor(report));
      }
      runTrace({ transfer, limit: flags.limit });
      break;
    }

    default: {
      fail(`Unknown command: ${command}`);
    }
  }
}

// =============================================================================
// Main Entry Point
// =============================================================================

routeCommand();
