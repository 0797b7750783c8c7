import { constants, promises as fs } from 'node:fs';
import type { Logger } from '@wxdata/shared';
import type { CropYieldConfig } from '../config/jobConfig';
import { JobConfigError, StoreUnavailableError, describeError, errorCode } from '../errors';
import { ProgressReporter, systemClock, type Clock } from '../observability/progress';
import { parseCropYieldLine, type CropYieldRejectionCode } from '../parsing/cropYieldParser';
import type { CropYieldStore } from '../store/types';
import type { CropYield, CropYieldSeries } from '../types';
import { readFileLines, type LineSource } from './lineReader';

export type CropYieldOptions = Pick<
  CropYieldConfig,
  'dataFile' | 'series' | 'batchSize' | 'progressInterval' | 'clearExisting' | 'dryRun'
>;

export type CropYieldRejectionHistogram = Record<CropYieldRejectionCode, number>;

export type CropYieldSummary = {
  dryRun: boolean;
  dataFile: string;
  series: CropYieldSeries;
  aborted: string | null;
  /** Rows deleted by clear mode. */
  cleared: number | null;
  linesRead: number;
  accepted: number;
  rejected: number;
  rejections: CropYieldRejectionHistogram;
  inserted: number;
  updated: number;
  failedBatches: number;
  failedRecords: number;
  durationSeconds: number;
  recordsPerSecond: number;
  /** Rows in the table once the run finished. */
  storedRecords: number | null;
};

type CropYieldTally = Pick<
  CropYieldSummary,
  'linesRead' | 'accepted' | 'rejected' | 'rejections' | 'inserted' | 'updated' | 'failedBatches' | 'failedRecords'
>;

export type CropYieldIngestorDependencies = {
  store?: CropYieldStore | null;
  logger: Logger;
  clock?: Clock;
  readLines?: LineSource;
};

export function emptyCropYieldRejections(): CropYieldRejectionHistogram {
  return {
    field_count: 0,
    invalid_year: 0,
    year_out_of_range: 0,
    invalid_yield: 0,
    negative_yield: 0
  };
}

export function cropYieldHasFailures(summary: CropYieldSummary): boolean {
  return summary.aborted !== null || summary.failedBatches > 0;
}

async function assertReadableFile(filePath: string): Promise<void> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      throw new JobConfigError(`Data file ${filePath} is not a file`);
    }
    await fs.access(filePath, constants.R_OK);
  } catch (error) {
    if (error instanceof JobConfigError) {
      throw error;
    }
    if (errorCode(error) === 'ENOENT') {
      throw new JobConfigError(`Data file ${filePath} does not exist`);
    }
    throw new JobConfigError(`Data file ${filePath} is not readable: ${describeError(error)}`);
  }
}

/**
 * Loads one crop's yearly yield series from a `YEAR YIELD` text file. Works
 * like the station ingestion: bad lines are tallied, failed batches recorded,
 * and a store outage stops the run with what was committed so far.
 */
export class CropYieldIngestor {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly readLines: LineSource;
  private readonly store: CropYieldStore | null;

  constructor(
    private readonly options: CropYieldOptions,
    dependencies: CropYieldIngestorDependencies
  ) {
    this.logger = dependencies.logger;
    this.clock = dependencies.clock ?? systemClock;
    this.readLines = dependencies.readLines ?? readFileLines;
    this.store = dependencies.store ?? null;
  }

  async run(): Promise<CropYieldSummary> {
    const { dataFile, series, dryRun } = this.options;
    const store = dryRun ? null : this.requireStore();
    await assertReadableFile(dataFile);
    this.logger.info({ dataFile, series, dryRun }, 'starting crop yield ingestion');

    let cleared: number | null = null;
    if (store) {
      await store.ping();
      if (this.options.clearExisting) {
        cleared = await store.clearCropYields();
        this.logger.info({ deleted: cleared }, 'cleared existing crop yields');
      }
    } else if (this.options.clearExisting) {
      this.logger.info('dry run: existing crop yields would be cleared');
    }

    const progress = new ProgressReporter({
      label: 'ingest-yield',
      interval: this.options.progressInterval,
      logger: this.logger,
      clock: this.clock,
      unit: 'records'
    });
    const tally: CropYieldTally = {
      linesRead: 0,
      accepted: 0,
      rejected: 0,
      rejections: emptyCropYieldRejections(),
      inserted: 0,
      updated: 0,
      failedBatches: 0,
      failedRecords: 0
    };

    let aborted: string | null = null;
    try {
      await this.ingestLines(store, tally, progress);
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) {
        throw err;
      }
      aborted = describeError(err);
      this.logger.error({ err }, 'store unavailable, stopping crop yield ingestion');
    }

    const { durationSeconds } = progress.finish();
    const storedRecords = store && aborted === null ? await store.countCropYields() : null;
    return {
      dryRun,
      dataFile,
      series,
      aborted,
      cleared,
      ...tally,
      durationSeconds,
      recordsPerSecond: durationSeconds > 0 ? tally.accepted / durationSeconds : 0,
      storedRecords
    };
  }

  private requireStore(): CropYieldStore {
    if (!this.store) {
      throw new Error('CropYieldIngestor needs a store unless running dry');
    }
    return this.store;
  }

  private async ingestLines(
    store: CropYieldStore | null,
    tally: CropYieldTally,
    progress: ProgressReporter
  ): Promise<void> {
    const { dataFile, series, batchSize } = this.options;
    let batch: CropYield[] = [];
    let lineNumber = 0;

    for await (const line of this.readLines(dataFile)) {
      lineNumber += 1;
      if (line.trim().length === 0) {
        continue;
      }
      tally.linesRead += 1;

      const outcome = parseCropYieldLine(line, lineNumber);
      if (!outcome.ok) {
        const { rejection } = outcome;
        tally.rejected += 1;
        tally.rejections[rejection.code] += 1;
        this.logger.warn(
          { file: series.source, lineNumber: rejection.lineNumber, code: rejection.code, reason: rejection.reason },
          'rejected line'
        );
        continue;
      }

      tally.accepted += 1;
      progress.advance(1);
      batch.push({ ...series, ...outcome.record });
      if (batch.length >= batchSize) {
        await this.flush(batch, tally, store);
        batch = [];
      }
    }

    if (batch.length > 0) {
      await this.flush(batch, tally, store);
    }
  }

  private async flush(batch: CropYield[], tally: CropYieldTally, store: CropYieldStore | null): Promise<void> {
    if (!store) {
      return;
    }
    try {
      const written = await store.upsertCropYields(batch);
      tally.inserted += written.inserted;
      tally.updated += written.updated;
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        throw err;
      }
      tally.failedBatches += 1;
      tally.failedRecords += batch.length;
      this.logger.error({ records: batch.length, firstYear: batch[0]?.year, err }, 'failed to write crop yield batch');
    }
  }
}
