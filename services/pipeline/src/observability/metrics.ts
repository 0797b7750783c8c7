import { promises as fs } from 'node:fs';
import path from 'node:path';
import { Gauge, Registry } from 'prom-client';
import type { AggregationSummary } from '../aggregation/aggregator';
import type { CropYieldSummary } from '../ingestion/cropYieldIngestor';
import type { IngestionSummary } from '../ingestion/ingestor';
import { cropYieldRejectionCodes } from '../parsing/cropYieldParser';
import { rejectionCodes } from '../parsing/lineParser';

export interface PipelineMetrics {
  register: Registry;
  ingestFiles: Gauge<'outcome'>;
  ingestRecords: Gauge<'outcome'>;
  ingestRejections: Gauge<'reason'>;
  aggregatePairs: Gauge<'outcome'>;
  yieldRecords: Gauge<'outcome'>;
  yieldRejections: Gauge<'reason'>;
  runDuration: Gauge<'job'>;
  runAborted: Gauge<'job'>;
  lastRunTimestamp: Gauge<'job'>;
}

export type RunSummary =
  | { job: 'ingest'; summary: IngestionSummary }
  | { job: 'aggregate'; summary: AggregationSummary }
  | { job: 'ingest-yield'; summary: CropYieldSummary };

export const createMetrics = (): PipelineMetrics => {
  const register = new Registry();

  const ingestFiles = new Gauge({
    name: 'wxdata_ingest_files',
    help: 'Station files seen by the last ingestion run, by outcome',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const ingestRecords = new Gauge({
    name: 'wxdata_ingest_records',
    help: 'Records handled by the last ingestion run, by outcome',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const ingestRejections = new Gauge({
    name: 'wxdata_ingest_rejections',
    help: 'Lines rejected by the last ingestion run, by reason',
    registers: [register],
    labelNames: ['reason'] as const
  });

  const aggregatePairs = new Gauge({
    name: 'wxdata_aggregate_pairs',
    help: 'Station-years handled by the last aggregation run, by outcome',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const yieldRecords = new Gauge({
    name: 'wxdata_yield_records',
    help: 'Crop yield records handled by the last yield ingestion run, by outcome',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const yieldRejections = new Gauge({
    name: 'wxdata_yield_rejections',
    help: 'Lines rejected by the last yield ingestion run, by reason',
    registers: [register],
    labelNames: ['reason'] as const
  });

  const runDuration = new Gauge({
    name: 'wxdata_run_duration_seconds',
    help: 'Wall-clock duration of the last run',
    registers: [register],
    labelNames: ['job'] as const
  });

  const runAborted = new Gauge({
    name: 'wxdata_run_aborted',
    help: 'Whether the last run was cut short by a store outage (1) or not (0)',
    registers: [register],
    labelNames: ['job'] as const
  });

  const lastRunTimestamp = new Gauge({
    name: 'wxdata_last_run_timestamp_seconds',
    help: 'Unix time at which the last run finished',
    registers: [register],
    labelNames: ['job'] as const
  });

  return {
    register,
    ingestFiles,
    ingestRecords,
    ingestRejections,
    aggregatePairs,
    yieldRecords,
    yieldRejections,
    runDuration,
    runAborted,
    lastRunTimestamp
  };
};

export function recordRunSummary(metrics: PipelineMetrics, run: RunSummary, finishedAtMs: number): void {
  if (run.job === 'ingest') {
    const { summary } = run;
    metrics.ingestFiles.set({ outcome: 'processed' }, summary.filesProcessed);
    metrics.ingestFiles.set({ outcome: 'failed' }, summary.filesFailed);
    metrics.ingestRecords.set({ outcome: 'read' }, summary.linesRead);
    metrics.ingestRecords.set({ outcome: 'accepted' }, summary.accepted);
    metrics.ingestRecords.set({ outcome: 'rejected' }, summary.rejected);
    metrics.ingestRecords.set({ outcome: 'inserted' }, summary.inserted);
    metrics.ingestRecords.set({ outcome: 'updated' }, summary.updated);
    metrics.ingestRecords.set({ outcome: 'failed' }, summary.failedRecords);
    for (const code of rejectionCodes) {
      metrics.ingestRejections.set({ reason: code }, summary.rejections[code]);
    }
    metrics.runDuration.set({ job: 'ingest' }, summary.durationSeconds);
  } else if (run.job === 'aggregate') {
    const { summary } = run;
    metrics.aggregatePairs.set({ outcome: 'total' }, summary.totalPairs);
    metrics.aggregatePairs.set({ outcome: 'skipped_existing' }, summary.skippedExisting);
    metrics.aggregatePairs.set({ outcome: 'processed' }, summary.processed);
    metrics.aggregatePairs.set({ outcome: 'successful' }, summary.successful);
    metrics.aggregatePairs.set({ outcome: 'failed' }, summary.failed);
    metrics.runDuration.set({ job: 'aggregate' }, summary.durationSeconds);
  } else {
    const { summary } = run;
    metrics.yieldRecords.set({ outcome: 'read' }, summary.linesRead);
    metrics.yieldRecords.set({ outcome: 'accepted' }, summary.accepted);
    metrics.yieldRecords.set({ outcome: 'rejected' }, summary.rejected);
    metrics.yieldRecords.set({ outcome: 'inserted' }, summary.inserted);
    metrics.yieldRecords.set({ outcome: 'updated' }, summary.updated);
    metrics.yieldRecords.set({ outcome: 'failed' }, summary.failedRecords);
    for (const code of cropYieldRejectionCodes) {
      metrics.yieldRejections.set({ reason: code }, summary.rejections[code]);
    }
    metrics.runDuration.set({ job: 'ingest-yield' }, summary.durationSeconds);
  }
  metrics.runAborted.set({ job: run.job }, run.summary.aborted === null ? 0 : 1);
  metrics.lastRunTimestamp.set({ job: run.job }, Math.floor(finishedAtMs / 1000));
}

/**
 * Writes the run's metrics in Prometheus text format, for a node-exporter
 * textfile collector. The file is replaced atomically.
 */
export async function writeMetricsFile(filePath: string, run: RunSummary, finishedAtMs = Date.now()): Promise<void> {
  const metrics = createMetrics();
  recordRunSummary(metrics, run, finishedAtMs);
  const body = await metrics.register.metrics();

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, body, 'utf8');
  await fs.rename(tempPath, filePath);
}
