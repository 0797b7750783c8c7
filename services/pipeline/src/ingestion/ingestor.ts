import type { Logger } from '@wxdata/shared';
import type { IngestionConfig } from '../config/jobConfig';
import { StoreUnavailableError, describeError } from '../errors';
import { ProgressReporter, systemClock, type Clock } from '../observability/progress';
import { parseObservationLine, rejectionCodes, type RejectionCode } from '../parsing/lineParser';
import type { ObservationClearResult, ObservationWriter, StoreInspector, StoreTotals } from '../store/types';
import type { DailyObservation } from '../types';
import { listStationFiles, type StationFile } from './discovery';
import { readFileLines, type LineSource } from './lineReader';

export type IngestionOptions = Pick<
  IngestionConfig,
  'dataDir' | 'pattern' | 'batchSize' | 'progressInterval' | 'clearExisting' | 'dryRun'
>;

export type IngestionStore = ObservationWriter & StoreInspector;

export type RejectionHistogram = Record<RejectionCode, number>;

export type FileIngestionResult = {
  fileName: string;
  stationId: string;
  status: 'completed' | 'failed';
  error: string | null;
  stationCreated: boolean | null;
  linesRead: number;
  accepted: number;
  rejected: number;
  rejections: RejectionHistogram;
  inserted: number;
  updated: number;
  failedBatches: number;
  failedRecords: number;
  durationSeconds: number;
};

export type IngestionSummary = {
  dryRun: boolean;
  dataDir: string;
  /** Why the run stopped early when the store went away; committed batches stay committed. */
  aborted: string | null;
  filesDiscovered: number;
  /** Files attempted, in order; an aborted run stops short of the rest. */
  files: FileIngestionResult[];
  filesProcessed: number;
  filesFailed: number;
  stationsCreated: number;
  stationsExisting: number;
  linesRead: number;
  accepted: number;
  rejected: number;
  rejections: RejectionHistogram;
  inserted: number;
  updated: number;
  failedBatches: number;
  failedRecords: number;
  cleared: ObservationClearResult | null;
  durationSeconds: number;
  recordsPerSecond: number;
  totals: StoreTotals | null;
};

export type WeatherIngestorDependencies = {
  /** Required unless running dry; a dry run never touches it. */
  store?: IngestionStore | null;
  logger: Logger;
  clock?: Clock;
  readLines?: LineSource;
};

export function emptyRejectionHistogram(): RejectionHistogram {
  return {
    field_count: 0,
    invalid_date: 0,
    invalid_number: 0,
    temperature_inversion: 0,
    negative_precipitation: 0
  };
}

function createFileResult(file: StationFile): FileIngestionResult {
  return {
    fileName: file.fileName,
    stationId: file.stationId,
    status: 'completed',
    error: null,
    stationCreated: null,
    linesRead: 0,
    accepted: 0,
    rejected: 0,
    rejections: emptyRejectionHistogram(),
    inserted: 0,
    updated: 0,
    failedBatches: 0,
    failedRecords: 0,
    durationSeconds: 0
  };
}

export function ingestionHasFailures(summary: IngestionSummary): boolean {
  return summary.aborted !== null || summary.filesFailed > 0 || summary.failedBatches > 0;
}

/**
 * Loads every station file in a directory into the observation store, one
 * transactional batch at a time. Bad lines are tallied and skipped; a bad
 * file or batch is recorded and the run moves on. A store that goes away
 * mid-run stops it, and the summary of the work done so far comes back marked
 * aborted.
 */
export class WeatherIngestor {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly readLines: LineSource;
  private readonly store: IngestionStore | null;

  constructor(
    private readonly options: IngestionOptions,
    dependencies: WeatherIngestorDependencies
  ) {
    this.logger = dependencies.logger;
    this.clock = dependencies.clock ?? systemClock;
    this.readLines = dependencies.readLines ?? readFileLines;
    this.store = dependencies.store ?? null;
  }

  async run(): Promise<IngestionSummary> {
    const { dataDir, pattern, dryRun } = this.options;
    const store = dryRun ? null : this.requireStore();
    const files = await listStationFiles(dataDir, pattern);
    this.logger.info({ dataDir, pattern, files: files.length, dryRun }, 'starting ingestion');

    let cleared: ObservationClearResult | null = null;
    if (store) {
      await store.ping();
      if (this.options.clearExisting) {
        cleared = await store.clearObservations();
        this.logger.info(cleared, 'cleared existing observations and stations');
      }
    } else if (this.options.clearExisting) {
      this.logger.info('dry run: existing observations would be cleared');
    }

    const progress = new ProgressReporter({
      label: 'ingest',
      interval: this.options.progressInterval,
      logger: this.logger,
      clock: this.clock,
      unit: 'records'
    });

    const results: FileIngestionResult[] = [];
    let aborted: string | null = null;
    for (const file of files) {
      const result = createFileResult(file);
      results.push(result);
      const startedAt = this.clock();
      try {
        await this.ingestFile(file, result, store, progress);
      } catch (err) {
        result.status = 'failed';
        result.error = describeError(err);
        const outage = err instanceof StoreUnavailableError;
        if (outage) {
          aborted = result.error;
        }
        this.logger.error(
          { file: file.fileName, stationId: file.stationId, err },
          outage ? 'store unavailable, stopping ingestion' : 'failed to ingest file'
        );
      } finally {
        result.durationSeconds = Math.max(0, this.clock() - startedAt) / 1000;
      }
      if (aborted !== null) {
        break;
      }
      if (result.status === 'completed') {
        this.logger.info(
          {
            file: result.fileName,
            linesRead: result.linesRead,
            accepted: result.accepted,
            rejected: result.rejected,
            inserted: result.inserted,
            updated: result.updated,
            failedBatches: result.failedBatches
          },
          'file ingested'
        );
      }
    }

    const timing = progress.finish();
    const totals = store && aborted === null ? await store.totals() : null;
    return this.summarize(
      { files: results, filesDiscovered: files.length, aborted, cleared },
      timing.durationSeconds,
      totals
    );
  }

  private requireStore(): IngestionStore {
    if (!this.store) {
      throw new Error('WeatherIngestor needs a store unless running dry');
    }
    return this.store;
  }

  private async ingestFile(
    file: StationFile,
    result: FileIngestionResult,
    store: IngestionStore | null,
    progress: ProgressReporter
  ): Promise<void> {
    if (store) {
      const registration = await store.registerStation(file.stationId);
      result.stationCreated = registration.created;
    }

    let batch: DailyObservation[] = [];
    let lineNumber = 0;

    for await (const line of this.readLines(file.filePath)) {
      lineNumber += 1;
      if (line.trim().length === 0) {
        continue;
      }
      result.linesRead += 1;

      const outcome = parseObservationLine(line, lineNumber);
      if (!outcome.ok) {
        const { rejection } = outcome;
        result.rejected += 1;
        result.rejections[rejection.code] += 1;
        this.logger.warn(
          { file: file.fileName, lineNumber: rejection.lineNumber, code: rejection.code, reason: rejection.reason },
          'rejected line'
        );
        continue;
      }

      result.accepted += 1;
      progress.advance(1);
      batch.push({ stationId: file.stationId, ...outcome.observation });
      if (batch.length >= this.options.batchSize) {
        await this.flush(batch, file, result, store);
        batch = [];
      }
    }

    if (batch.length > 0) {
      await this.flush(batch, file, result, store);
    }
  }

  private async flush(
    batch: DailyObservation[],
    file: StationFile,
    result: FileIngestionResult,
    store: IngestionStore | null
  ): Promise<void> {
    if (!store) {
      return;
    }
    try {
      const written = await store.upsertObservations(batch);
      result.inserted += written.inserted;
      result.updated += written.updated;
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        throw err;
      }
      result.failedBatches += 1;
      result.failedRecords += batch.length;
      this.logger.error(
        { file: file.fileName, records: batch.length, firstDate: batch[0]?.date, err },
        'failed to write observation batch'
      );
    }
  }

  private summarize(
    run: Pick<IngestionSummary, 'files' | 'filesDiscovered' | 'aborted' | 'cleared'>,
    durationSeconds: number,
    totals: StoreTotals | null
  ): IngestionSummary {
    const { files } = run;
    const rejections = emptyRejectionHistogram();
    let stationsCreated = 0;
    let stationsExisting = 0;
    let linesRead = 0;
    let accepted = 0;
    let rejected = 0;
    let inserted = 0;
    let updated = 0;
    let failedBatches = 0;
    let failedRecords = 0;

    for (const file of files) {
      if (file.stationCreated === true) {
        stationsCreated += 1;
      } else if (file.stationCreated === false) {
        stationsExisting += 1;
      }
      linesRead += file.linesRead;
      accepted += file.accepted;
      rejected += file.rejected;
      inserted += file.inserted;
      updated += file.updated;
      failedBatches += file.failedBatches;
      failedRecords += file.failedRecords;
      for (const code of rejectionCodes) {
        rejections[code] += file.rejections[code];
      }
    }

    const filesFailed = files.filter((file) => file.status === 'failed').length;
    return {
      dryRun: this.options.dryRun,
      dataDir: this.options.dataDir,
      aborted: run.aborted,
      filesDiscovered: run.filesDiscovered,
      files,
      filesProcessed: files.length - filesFailed,
      filesFailed,
      stationsCreated,
      stationsExisting,
      linesRead,
      accepted,
      rejected,
      rejections,
      inserted,
      updated,
      failedBatches,
      failedRecords,
      cleared: run.cleared,
      durationSeconds,
      recordsPerSecond: durationSeconds > 0 ? accepted / durationSeconds : 0,
      totals
    };
  }
}
