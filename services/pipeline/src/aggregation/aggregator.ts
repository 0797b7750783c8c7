import type { Logger } from '@wxdata/shared';
import { MAX_YEAR, MIN_YEAR, type AggregationConfig } from '../config/jobConfig';
import { JobConfigError, StoreUnavailableError, describeError } from '../errors';
import { ProgressReporter, systemClock, type Clock } from '../observability/progress';
import type { ObservationReader, StoreInspector, StoreTotals, YearFilter, YearlyStatsStore } from '../store/types';
import { stationYearKey, type StationYear, type YearlyStats } from '../types';
import { roundHalfAwayFromZero } from '../units';
import { computeYearlyStats } from './yearlyStats';

export type AggregationOptions = Pick<
  AggregationConfig,
  'batchSize' | 'progressInterval' | 'clearExisting' | 'forceRecompute' | 'dryRun'
> & { filter: YearFilter };

export type AggregationStore = ObservationReader & YearlyStatsStore & StoreInspector;

export type AggregationSummary = {
  dryRun: boolean;
  filter: YearFilter;
  /** Why the run stopped early when the store went away; written batches stay written. */
  aborted: string | null;
  /** Rows deleted by clear mode; in a dry run, the rows that would have been. */
  cleared: number | null;
  totalPairs: number;
  skippedExisting: number;
  processed: number;
  successful: number;
  failed: number;
  batches: number;
  failedBatches: number;
  durationSeconds: number;
  pairsPerSecond: number;
  successPercentage: number;
  totals: StoreTotals | null;
};

export type YearlyStatsAggregatorDependencies = {
  store: AggregationStore;
  logger: Logger;
  clock?: Clock;
};

function inRange(year: number | undefined): boolean {
  return year === undefined || (Number.isInteger(year) && year >= MIN_YEAR && year <= MAX_YEAR);
}

export function validateYearFilter(filter: YearFilter): void {
  const issues: string[] = [];
  if (!inRange(filter.year)) {
    issues.push(`year must be between ${MIN_YEAR} and ${MAX_YEAR}`);
  }
  if (!inRange(filter.startYear)) {
    issues.push(`startYear must be between ${MIN_YEAR} and ${MAX_YEAR}`);
  }
  if (!inRange(filter.endYear)) {
    issues.push(`endYear must be between ${MIN_YEAR} and ${MAX_YEAR}`);
  }
  if (filter.year !== undefined && (filter.startYear !== undefined || filter.endYear !== undefined)) {
    issues.push('year cannot be combined with startYear/endYear');
  }
  if (filter.startYear !== undefined && filter.endYear !== undefined && filter.startYear > filter.endYear) {
    issues.push(`Start year (${filter.startYear}) cannot be after end year (${filter.endYear})`);
  }
  if (issues.length > 0) {
    throw new JobConfigError(`Invalid aggregation filter: ${issues.join('; ')}`, issues);
  }
}

export function aggregationHasFailures(summary: AggregationSummary): boolean {
  return summary.aborted !== null || summary.failed > 0 || summary.failedBatches > 0;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

export class YearlyStatsAggregator {
  private readonly store: AggregationStore;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly options: AggregationOptions,
    dependencies: YearlyStatsAggregatorDependencies
  ) {
    this.store = dependencies.store;
    this.logger = dependencies.logger;
    this.clock = dependencies.clock ?? systemClock;
  }

  async run(): Promise<AggregationSummary> {
    const { filter, dryRun } = this.options;
    validateYearFilter(filter);
    await this.store.ping();

    if (!dryRun && filter.stationId !== undefined && !(await this.store.stationExists(filter.stationId))) {
      throw new JobConfigError(`Station ${filter.stationId} does not exist`);
    }

    const cleared = this.options.clearExisting ? await this.clear(filter, dryRun) : null;

    const pairs = await this.store.listStationYears(filter);
    const pending = await this.selectPending(pairs, filter);
    const skippedExisting = pairs.length - pending.length;
    this.logger.info(
      { filter, totalPairs: pairs.length, pending: pending.length, skippedExisting, dryRun },
      'starting yearly aggregation'
    );

    const progress = new ProgressReporter({
      label: 'aggregate',
      interval: this.options.progressInterval,
      logger: this.logger,
      clock: this.clock,
      unit: 'batches'
    });

    let processed = 0;
    let successful = 0;
    let failed = 0;
    let failedBatches = 0;
    let aborted: string | null = null;
    const batches = chunk(pending, this.options.batchSize);

    for (const [index, batch] of batches.entries()) {
      let computed: YearlyStats[];
      try {
        computed = await this.computeBatch(batch);
      } catch (err) {
        aborted = this.stopOnOutage(err, index + 1);
        break;
      }
      processed += batch.length;
      failed += batch.length - computed.length;

      if (dryRun) {
        successful += computed.length;
      } else if (computed.length > 0) {
        try {
          await this.store.upsertYearlyStats(computed);
          successful += computed.length;
        } catch (err) {
          failedBatches += 1;
          failed += computed.length;
          if (err instanceof StoreUnavailableError) {
            aborted = this.stopOnOutage(err, index + 1);
            break;
          }
          this.logger.error({ batch: index + 1, pairs: computed.length, err }, 'failed to write yearly stats batch');
        }
      }
      progress.advance(1);
    }

    const timing = progress.finish();
    const totals = aborted === null ? await this.store.totals() : null;
    return {
      dryRun,
      filter,
      aborted,
      cleared,
      totalPairs: pairs.length,
      skippedExisting,
      processed,
      successful,
      failed,
      batches: batches.length,
      failedBatches,
      durationSeconds: timing.durationSeconds,
      pairsPerSecond: timing.durationSeconds > 0 ? processed / timing.durationSeconds : 0,
      successPercentage: roundHalfAwayFromZero((successful / Math.max(processed, 1)) * 100, 1),
      totals
    };
  }

  /** Returns the reason to stop for a store outage; anything else propagates. */
  private stopOnOutage(err: unknown, batch: number): string {
    if (!(err instanceof StoreUnavailableError)) {
      throw err;
    }
    this.logger.error({ batch, err }, 'store unavailable, stopping aggregation');
    return describeError(err);
  }

  private async clear(filter: YearFilter, dryRun: boolean): Promise<number> {
    if (dryRun) {
      const count = await this.store.countYearlyStats(filter);
      this.logger.info({ filter, count }, 'dry run: yearly stats would be deleted');
      return count;
    }
    const deleted = await this.store.clearYearlyStats(filter);
    this.logger.info({ filter, deleted }, 'cleared yearly stats');
    return deleted;
  }

  private async selectPending(pairs: StationYear[], filter: YearFilter): Promise<StationYear[]> {
    if (this.options.forceRecompute || this.options.clearExisting) {
      return pairs;
    }
    const existing = new Set((await this.store.listYearlyStatsKeys(filter)).map(stationYearKey));
    return pairs.filter((pair) => !existing.has(stationYearKey(pair)));
  }

  private async computeBatch(batch: StationYear[]): Promise<YearlyStats[]> {
    const computed: YearlyStats[] = [];
    for (const pair of batch) {
      try {
        const observations = await this.store.listObservations(pair);
        computed.push(computeYearlyStats(pair.stationId, pair.year, observations));
      } catch (err) {
        if (err instanceof StoreUnavailableError) {
          throw err;
        }
        this.logger.error(
          { stationId: pair.stationId, year: pair.year, error: describeError(err) },
          'failed to compute yearly stats'
        );
      }
    }
    return computed;
  }
}
