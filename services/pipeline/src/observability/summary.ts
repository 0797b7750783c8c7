import type { AggregationSummary } from '../aggregation/aggregator';
import type { CropYieldSummary } from '../ingestion/cropYieldIngestor';
import type { IngestionSummary } from '../ingestion/ingestor';
import { cropYieldRejectionCodes } from '../parsing/cropYieldParser';
import { rejectionCodes } from '../parsing/lineParser';
import type { StoreTotals, YearFilter } from '../store/types';

const LABEL_WIDTH = 24;

function row(label: string, value: string | number, indent = 2): string {
  return `${' '.repeat(indent)}${`${label}:`.padEnd(LABEL_WIDTH - indent)} ${value}`;
}

function seconds(value: number): string {
  return `${value.toFixed(2)} s`;
}

function rate(value: number, unit: string): string {
  return `${value.toFixed(1)} ${unit}/s`;
}

function heading(title: string, dryRun: boolean, aborted: string | null): string[] {
  const notes: string[] = [];
  if (dryRun) {
    notes.push('dry run');
  }
  if (aborted !== null) {
    notes.push('aborted');
  }
  const lines = [notes.length > 0 ? `${title} (${notes.join(', ')})` : title];
  if (aborted !== null) {
    lines.push(row('Aborted', aborted));
  }
  return lines;
}

export function describeFilter(filter: YearFilter): string {
  const parts: string[] = [];
  if (filter.stationId !== undefined) {
    parts.push(`station=${filter.stationId}`);
  }
  if (filter.year !== undefined) {
    parts.push(`year=${filter.year}`);
  }
  if (filter.startYear !== undefined || filter.endYear !== undefined) {
    parts.push(`years=${filter.startYear ?? '*'}..${filter.endYear ?? '*'}`);
  }
  return parts.length > 0 ? parts.join(' ') : 'all';
}

export function formatTotals(totals: StoreTotals): string {
  const years = totals.firstYear !== null && totals.lastYear !== null ? `${totals.firstYear}-${totals.lastYear}` : 'none';
  return `${totals.stations} stations, ${totals.observations} observations, ${totals.yearlyStats} yearly stats, years ${years}`;
}

export function formatIngestionSummary(summary: IngestionSummary): string {
  const lines = heading('Ingestion summary', summary.dryRun, summary.aborted);
  lines.push(row('Data directory', summary.dataDir));
  lines.push(row('Files processed', `${summary.filesProcessed} of ${summary.filesDiscovered} (${summary.filesFailed} failed)`));
  if (!summary.dryRun) {
    lines.push(row('Stations', `${summary.stationsCreated} created, ${summary.stationsExisting} existing`));
  }
  if (summary.cleared) {
    lines.push(row('Cleared', `${summary.cleared.observations} observations, ${summary.cleared.stations} stations`));
  }
  lines.push(row('Lines read', summary.linesRead));
  lines.push(row('Accepted', summary.accepted));
  lines.push(row('Rejected', summary.rejected));
  for (const code of rejectionCodes) {
    const count = summary.rejections[code];
    if (count > 0) {
      lines.push(row(code, count, 4));
    }
  }
  if (!summary.dryRun) {
    lines.push(row('Inserted', summary.inserted));
    lines.push(row('Updated (duplicates)', summary.updated));
    lines.push(row('Failed batches', `${summary.failedBatches} (${summary.failedRecords} records)`));
  }
  lines.push(row('Duration', seconds(summary.durationSeconds)));
  lines.push(row('Throughput', rate(summary.recordsPerSecond, 'records')));

  const failedFiles = summary.files.filter((file) => file.status === 'failed');
  for (const file of failedFiles) {
    lines.push(row(`Failed file ${file.fileName}`, file.error ?? 'unknown error'));
  }
  if (summary.totals) {
    lines.push(row('Store totals', formatTotals(summary.totals)));
  }
  return lines.join('\n');
}

export function formatAggregationSummary(summary: AggregationSummary): string {
  const lines = heading('Aggregation summary', summary.dryRun, summary.aborted);
  lines.push(row('Filter', describeFilter(summary.filter)));
  if (summary.cleared !== null) {
    lines.push(row(summary.dryRun ? 'Would clear' : 'Cleared', `${summary.cleared} yearly stats`));
  }
  lines.push(row('Station-years', summary.totalPairs));
  lines.push(row('Skipped existing', summary.skippedExisting));
  lines.push(row('Processed', summary.processed));
  lines.push(row('Successful', summary.successful));
  lines.push(row('Failed', summary.failed));
  lines.push(row('Batches', `${summary.batches} (${summary.failedBatches} failed)`));
  lines.push(row('Duration', seconds(summary.durationSeconds)));
  lines.push(row('Throughput', rate(summary.pairsPerSecond, 'pairs')));
  lines.push(row('Success rate', `${summary.successPercentage.toFixed(1)}%`));
  if (summary.totals) {
    lines.push(row('Store totals', formatTotals(summary.totals)));
  }
  return lines.join('\n');
}

export function formatCropYieldSummary(summary: CropYieldSummary): string {
  const { series } = summary;
  const region = series.state ? `${series.country}-${series.state}` : series.country;
  const lines = heading('Crop yield summary', summary.dryRun, summary.aborted);
  lines.push(row('Data file', summary.dataFile));
  lines.push(row('Series', `${series.cropType} ${region} (${series.unit})`));
  if (summary.cleared !== null) {
    lines.push(row('Cleared', `${summary.cleared} crop yields`));
  }
  lines.push(row('Lines read', summary.linesRead));
  lines.push(row('Accepted', summary.accepted));
  lines.push(row('Rejected', summary.rejected));
  for (const code of cropYieldRejectionCodes) {
    const count = summary.rejections[code];
    if (count > 0) {
      lines.push(row(code, count, 4));
    }
  }
  if (!summary.dryRun) {
    lines.push(row('Inserted', summary.inserted));
    lines.push(row('Updated', summary.updated));
    lines.push(row('Failed batches', `${summary.failedBatches} (${summary.failedRecords} records)`));
  }
  lines.push(row('Duration', seconds(summary.durationSeconds)));
  lines.push(row('Throughput', rate(summary.recordsPerSecond, 'records')));
  if (summary.storedRecords !== null) {
    lines.push(row('Crop yields in store', summary.storedRecords));
  }
  return lines.join('\n');
}
