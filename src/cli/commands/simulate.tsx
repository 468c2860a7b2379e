/**
 * Simulate command for rtsim CLI.
 *
 * Runs one client-to-server transfer over the simulated network and
 * prints how it went: integrity, timing, retransmissions and the final
 * congestion state.
 *
 * @module cli/commands/simulate
 */

import React, { useEffect, useState } from 'react';
import { render, Text, Box, useApp } from 'ink';
import {
  runTransfer,
  type TransferOptions,
  type TransferReport,
  type WindowSample,
} from '../../engine/simulation/transfer.js';
import {
  formatBytes,
  formatSpeed,
  formatMilliseconds,
  formatInfoBlock,
  logLine,
  stateNames,
  successMessage,
  errorMessage,
  warnMessage,
} from '../utils/output.js';

// =============================================================================
// Types
// =============================================================================

export interface SimulateCommandOptions {
  /** Transfer to run */
  transfer: TransferOptions;
  /** Also print every congestion window change */
  verbose?: boolean;
  /** Receives the process exit code once the run is over */
  onFinish?: (exitCode: number) => void;
}

interface SimulateResultProps {
  report: TransferReport | null;
  error: string | null;
  loading: boolean;
  verbose: boolean;
}

/**
 * Overall verdict of a transfer.
 */
export interface ReportStatus {
  ok: boolean;
  label: string;
}

// =============================================================================
// Report Formatting
// =============================================================================

/**
 * Decide whether a transfer succeeded.
 */
export function reportStatus(report: TransferReport): ReportStatus {
  if (report.error !== undefined) {
    return { ok: false, label: `failed: ${report.error}` };
  }
  if (!report.completed) {
    return { ok: false, label: `incomplete (${report.stopReason})` };
  }
  if (!report.intact) {
    return { ok: false, label: 'delivered data does not match what was written' };
  }
  return { ok: true, label: 'complete, data intact' };
}

/**
 * Label/value rows describing a transfer.
 */
export function summarizeReport(report: TransferReport): Array<[string, string]> {
  const { client, server, network } = report;
  const stats = client.stats;

  return [
    ['Delivered', `${formatBytes(report.bytesDelivered)} of ${formatBytes(report.bytesWritten)}`],
    ['Duration', formatMilliseconds(report.duration)],
    ['Finished at', formatMilliseconds(report.finishedAt)],
    ['Goodput', formatSpeed(report.goodput)],
    ['Data segments', String(stats.dataSegmentsSent)],
    ['Segments sent', `${stats.segmentsSent} client / ${server?.stats.segmentsSent ?? 0} server`],
    [
      'Retransmissions',
      `${stats.retransmissions} (${stats.timeouts} timeouts, ${stats.fastRetransmits} fast)`,
    ],
    ['Duplicate ACKs', String(stats.duplicateAcks)],
    ['Send retries', String(stats.sendRetries)],
    [
      'Final window',
      `cwnd ${formatBytes(client.congestionWindow)}, ssthresh ${formatBytes(client.slowStartThreshold)}`,
    ],
    [
      'Round trip',
      client.smoothedRtt === undefined
        ? '--'
        : `srtt ${formatMilliseconds(client.smoothedRtt)}, rto ${formatMilliseconds(client.retransmissionTimeout)}`,
    ],
    [
      'Network',
      `${network.sent} sent, ${network.delivered} delivered, ${network.lost} lost, ` +
        `${network.duplicated} duplicated, ${network.reordered} reordered, ` +
        `${network.corrupted} corrupted, ${network.refused} refused`,
    ],
    ['Final states', `${stateNames[client.state]} / ${server ? stateNames[server.state] : '--'}`],
  ];
}

/**
 * One log line per congestion window change.
 */
export function formatWindowSample(sample: WindowSample): string {
  return logLine(
    sample.time,
    `cwnd=${sample.window} ssthresh=${sample.threshold} ${sample.phase} (${sample.reason})`
  );
}

/**
 * Exit code for a finished run.
 */
export function exitCodeFor(report: TransferReport): number {
  return reportStatus(report).ok ? 0 : 1;
}

// =============================================================================
// Components
// =============================================================================

/**
 * Labelled rows of a report
 */
export const ReportSummary: React.FC<{ report: TransferReport }> = ({ report }) => {
  const status = reportStatus(report);
  return (
    <Box flexDirection="column">
      <Box>
        <Box width={18}>
          <Text dimColor>Result:</Text>
        </Box>
        <Text color={status.ok ? 'green' : 'red'} bold>
          {status.label}
        </Text>
      </Box>
      {summarizeReport(report).map(([label, value]) => (
        <Box key={label}>
          <Box width={18}>
            <Text dimColor>{label}:</Text>
          </Box>
          <Text>{value}</Text>
        </Box>
      ))}
    </Box>
  );
};

/**
 * Congestion window changes, oldest first
 */
const WindowTrace: React.FC<{ samples: WindowSample[] }> = ({ samples }) => (
  <Box flexDirection="column" marginTop={1}>
    <Text bold>Congestion window ({samples.length} changes)</Text>
    {samples.map((sample, index) => (
      <Text key={index} color={sample.reason === 'timeout' ? 'red' : sample.reason === 'ack' ? undefined : 'yellow'}>
        {formatWindowSample(sample)}
      </Text>
    ))}
  </Box>
);

/**
 * Simulate result display component
 */
export function SimulateResult({ report, error, loading, verbose }: SimulateResultProps) {
  if (loading) {
    return (
      <Box>
        <Text color="cyan">Running simulation...</Text>
      </Box>
    );
  }

  if (error || !report) {
    return (
      <Box flexDirection="column">
        <Text color="red" bold>
          Error: {error ?? 'No report'}
        </Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      <Box marginBottom={1}>
        <Text bold>Transfer of {formatBytes(report.bytesWritten)} </Text>
        <Text dimColor>
          {report.client.local.address} to {report.client.remote.address}:{report.client.remote.port}
        </Text>
      </Box>
      <ReportSummary report={report} />
      {verbose && <WindowTrace samples={report.windowTrace} />}
    </Box>
  );
}

// =============================================================================
// Command Implementation
// =============================================================================

/**
 * Execute the simulate command and print plain text output.
 */
export function executeSimulate(options: SimulateCommandOptions): TransferReport {
  const report = runTransfer(options.transfer);
  const status = reportStatus(report);

  console.log(status.ok ? successMessage(status.label) : errorMessage(status.label));
  console.log(formatInfoBlock(summarizeReport(report)));

  if (options.verbose) {
    console.log('');
    for (const sample of report.windowTrace) {
      console.log(formatWindowSample(sample));
    }
  }
  if (report.stopReason === 'time-limit') {
    console.log(warnMessage('Simulated time limit reached before both sides closed'));
  }

  return report;
}

/**
 * Simulate command component
 */
export function SimulateCommand({ transfer, verbose = false, onFinish }: SimulateCommandOptions) {
  const { exit } = useApp();
  const [report, setReport] = useState<TransferReport | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    try {
      setReport(runTransfer(transfer));
    } catch (err) {
      setError(err instanceof Error ? err.message : String(err));
    }
  }, [transfer]);

  useEffect(() => {
    if (report) {
      onFinish?.(exitCodeFor(report));
      exit();
    } else if (error) {
      onFinish?.(1);
      exit();
    }
  }, [report, error, exit, onFinish]);

  return <SimulateResult report={report} error={error} loading={!report && !error} verbose={verbose} />;
}

/**
 * Run the simulate command with Ink rendering
 */
export function runSimulate(options: SimulateCommandOptions): void {
  let exitCode = 0;
  const { waitUntilExit } = render(
    <SimulateCommand
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

export default executeSimulate;
