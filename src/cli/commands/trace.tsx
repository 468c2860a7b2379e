/**
 * Trace command for rtsim CLI.
 *
 * Runs a (usually small) transfer and logs every segment, state change,
 * retransmission, window change and network impairment on a timeline of
 * simulated time.
 *
 * @module cli/commands/trace
 */

import React, { useEffect, useState } from 'react';
import { render, Text, Box, useApp } from 'ink';
import { describeSegment } from '../../engine/segment/codec.js';
import {
  runTransfer,
  type TransferOptions,
  type TransferReport,
} from '../../engine/simulation/transfer.js';
import type { TransportStack } from '../../engine/stack/stack.js';
import { formatInfoBlock, logLine, padText, stateNames } from '../utils/output.js';
import { ReportSummary, exitCodeFor, reportStatus, summarizeReport } from './simulate.js';

// =============================================================================
// Types
// =============================================================================

export type TraceSource = 'client' | 'server' | 'net';

export type TraceKind =
  | 'send'
  | 'receive'
  | 'state'
  | 'retransmit'
  | 'window'
  | 'drop'
  | 'failure'
  | 'network';

/**
 * One line of the timeline.
 */
export interface TraceEntry {
  time: number;
  source: TraceSource;
  kind: TraceKind;
  message: string;
}

export interface TraceResult {
  report: TransferReport;
  entries: TraceEntry[];
}

export interface TraceCommandOptions {
  transfer: TransferOptions;
  /** Most entries to display (default: 200) */
  limit?: number;
  onFinish?: (exitCode: number) => void;
}

interface TraceResultProps {
  result: TraceResult | null;
  error: string | null;
  loading: boolean;
  limit: number;
}

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_LIMIT = 200;

const KIND_COLORS: Record<TraceKind, string | undefined> = {
  send: 'cyan',
  receive: undefined,
  state: 'green',
  retransmit: 'yellow',
  window: 'magenta',
  drop: 'red',
  failure: 'red',
  network: 'gray',
};

// =============================================================================
// Trace Collection
// =============================================================================

function follow(stack: TransportStack, source: TraceSource, entries: TraceEntry[], clock: () => number): void {
  const add = (time: number, kind: TraceKind, message: string): void => {
    entries.push({ time, source, kind, message });
  };

  stack.on('segment', ({ direction, segment, retransmission, now }) => {
    const arrow = direction === 'out' ? '->' : '<-';
    const suffix = retransmission ? ' [rtx]' : '';
    add(now, direction === 'out' ? 'send' : 'receive', `${arrow} ${describeSegment(segment)}${suffix}`);
  });
  stack.on('connection:state', ({ from, to, now }) => {
    add(now, 'state', `${stateNames[from]} -> ${stateNames[to]}`);
  });
  stack.on('segment:retransmit', ({ seq, reason, now }) => {
    add(now, 'retransmit', `retransmit seq=${seq} (${reason})`);
  });
  stack.on('congestion:window', ({ reason, phase, window, threshold, now }) => {
    add(now, 'window', `cwnd=${window} ssthresh=${threshold} ${phase} (${reason})`);
  });
  stack.on('segment:dropped', ({ from, reason, now }) => {
    add(now, 'drop', `dropped segment from ${from}: ${reason}`);
  });
  stack.on('connection:failed', ({ error }) => {
    add(clock(), 'failure', `${error.name}: ${error.message}`);
  });
}

/**
 * Run a transfer and record its timeline.
 */
export function collectTrace(transfer: TransferOptions): TraceResult {
  const entries: TraceEntry[] = [];

  const report = runTransfer({
    ...transfer,
    observe: (context) => {
      transfer.observe?.(context);
      const { simulator, client, server } = context;
      const clock = (): number => simulator.now;

      follow(client, 'client', entries, clock);
      follow(server, 'server', entries, clock);

      simulator.network.on('send', ({ from, to, size, now, outcome, duplicated, corrupted, reordered }) => {
        const notes: string[] = [];
        if (outcome !== 'queued') notes.push(outcome);
        if (corrupted) notes.push('corrupted');
        if (duplicated) notes.push('duplicated');
        if (reordered) notes.push('reordered');
        if (notes.length > 0) {
          entries.push({
            time: now,
            source: 'net',
            kind: 'network',
            message: `${from} -> ${to} ${size}B ${notes.join(', ')}`,
          });
        }
      });
    },
  });

  return { report, entries };
}

/**
 * Format an entry as a timestamped log line.
 */
export function formatTraceEntry(entry: TraceEntry): string {
  return logLine(entry.time, `${padText(entry.source, 6)} ${entry.message}`);
}

// =============================================================================
// Components
// =============================================================================

/**
 * Trace result display component
 */
export function TraceResultView({ result, error, loading, limit }: TraceResultProps) {
  if (loading) {
    return (
      <Box>
        <Text color="cyan">Tracing transfer...</Text>
      </Box>
    );
  }

  if (error || !result) {
    return (
      <Box flexDirection="column">
        <Text color="red" bold>
          Error: {error ?? 'No trace'}
        </Text>
      </Box>
    );
  }

  const shown = result.entries.slice(0, limit);
  const hidden = result.entries.length - shown.length;

  return (
    <Box flexDirection="column">
      {shown.map((entry, index) => (
        <Text key={index} color={KIND_COLORS[entry.kind]}>
          {formatTraceEntry(entry)}
        </Text>
      ))}
      {hidden > 0 && <Text dimColor>... {hidden} more entries</Text>}
      <Box marginTop={1}>
        <ReportSummary report={result.report} />
      </Box>
    </Box>
  );
}

// =============================================================================
// Command Implementation
// =============================================================================

/**
 * Execute the trace command and print plain text output.
 */
export function executeTrace(options: TraceCommandOptions): TraceResult {
  const result = collectTrace(options.transfer);
  const limit = options.limit ?? DEFAULT_LIMIT;

  for (const entry of result.entries.slice(0, limit)) {
    console.log(formatTraceEntry(entry));
  }
  if (result.entries.length > limit) {
    console.log(`... ${result.entries.length - limit} more entries`);
  }

  console.log('');
  console.log(`Result: ${reportStatus(result.report).label}`);
  console.log(formatInfoBlock(summarizeReport(result.report)));

  return result;
}

/**
 * Trace command component
 */
export function TraceCommand({ transfer, limit = DEFAULT_LIMIT, onFinish }: TraceCommandOptions) {
  const { exit } = useApp();
  const [result, setResult] = useState<TraceResult | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    try {
      setResult(collectTrace(transfer));
    } catch (err) {
      setError(err instanceof Error ? err.message : String(err));
    }
  }, [transfer]);

  useEffect(() => {
    if (result) {
      onFinish?.(exitCodeFor(result.report));
      exit();
    } else if (error) {
      onFinish?.(1);
      exit();
    }
  }, [result, error, exit, onFinish]);

  return <TraceResultView result={result} error={error} loading={!result && !error} limit={limit} />;
}

/**
 * Run the trace command with Ink rendering
 */
export function runTrace(options: TraceCommandOptions): void {
  let exitCode = 0;
  const { waitUntilExit } = render(
    <TraceCommand
      {...options}
      onFinish={(code) => {
        exitCode = code;
      }}
    />
  );
  waitUntilExit().then(
    () => process.exit(exitCode),
    () => process.exit(1)
  );
}

export default executeTrace;
