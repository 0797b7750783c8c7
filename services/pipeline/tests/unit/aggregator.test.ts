import test from 'node:test';
import assert from 'node:assert/strict';
import {
  YearlyStatsAggregator,
  aggregationHasFailures,
  validateYearFilter,
  type AggregationOptions
} from '../../src/aggregation/aggregator';
import { JobConfigError, StoreUnavailableError, StoreWriteError } from '../../src/errors';
import type { DailyObservation } from '../../src/types';
import { createSteppingClock } from '../helpers/clock';
import { createTestLogger } from '../helpers/logger';
import { MemoryWeatherStore } from '../helpers/memoryStore';

function observation(stationId: string, date: string, max: number | null, min: number | null, precipitation: number | null): DailyObservation {
  return {
    stationId,
    date,
    maxTemperatureTenthsC: max,
    minTemperatureTenthsC: min,
    precipitationTenthsMm: precipitation
  };
}

function seededStore(): MemoryWeatherStore {
  const store = new MemoryWeatherStore();
  store.seedObservations([
    observation('USC00000001', '2022-07-01', 300, 200, 10),
    observation('USC00000001', '2023-06-15', 289, 178, 25),
    observation('USC00000001', '2023-06-16', null, null, null),
    observation('USC00000002', '2023-01-01', 10, -20, 0)
  ]);
  return store;
}

function options(overrides: Partial<AggregationOptions> = {}): AggregationOptions {
  return {
    filter: {},
    batchSize: 100,
    progressInterval: 10,
    clearExisting: false,
    forceRecompute: false,
    dryRun: false,
    ...overrides
  };
}

test('computes every station-year and reports the outcome', async () => {
  const store = seededStore();
  const { logger } = createTestLogger('silent');

  const summary = await new YearlyStatsAggregator(options(), { store, logger, clock: createSteppingClock(250) }).run();

  assert.equal(summary.totalPairs, 3);
  assert.equal(summary.processed, 3);
  assert.equal(summary.successful, 3);
  assert.equal(summary.failed, 0);
  assert.equal(summary.skippedExisting, 0);
  assert.equal(summary.batches, 1);
  assert.equal(summary.successPercentage, 100);
  assert.equal(aggregationHasFailures(summary), false);
  assert.deepEqual(Array.from(store.yearlyStats.keys()), ['USC00000001:2022', 'USC00000001:2023', 'USC00000002:2023']);

  const stats = store.yearlyStats.get('USC00000001:2023');
  assert.equal(stats?.avgMaxTemperatureTenthsC, 289);
  assert.equal(stats?.totalRecords, 2);
  assert.equal(stats?.recordsWithTemperature, 1);
  assert.equal(stats?.temperatureCompletenessPct, 50);
});

test('existing rows are left untouched unless recomputation is forced', async () => {
  const store = seededStore();
  const { logger } = createTestLogger('silent');
  await new YearlyStatsAggregator(options(), { store, logger }).run();

  store.seedObservations([observation('USC00000001', '2023-06-16', 311, 150, 5)]);

  const skipped = await new YearlyStatsAggregator(options(), { store, logger }).run();
  assert.equal(skipped.skippedExisting, 3);
  assert.equal(skipped.processed, 0);
  assert.equal(skipped.successPercentage, 0);
  assert.equal(store.yearlyStats.get('USC00000001:2023')?.avgMaxTemperatureTenthsC, 289);

  const forced = await new YearlyStatsAggregator(options({ forceRecompute: true }), { store, logger }).run();
  assert.equal(forced.skippedExisting, 0);
  assert.equal(forced.successful, 3);
  assert.equal(store.yearlyStats.get('USC00000001:2023')?.avgMaxTemperatureTenthsC, 300);
  assert.equal(store.yearlyStats.get('USC00000001:2023')?.recordsWithTemperature, 2);
});

test('only pairs without statistics are computed by default', async () => {
  const store = seededStore();
  const { logger } = createTestLogger('silent');
  await new YearlyStatsAggregator(options({ filter: { year: 2023 } }), { store, logger }).run();

  const summary = await new YearlyStatsAggregator(options(), { store, logger }).run();

  assert.equal(summary.totalPairs, 3);
  assert.equal(summary.skippedExisting, 2);
  assert.equal(summary.processed, 1);
  assert.ok(store.yearlyStats.has('USC00000001:2022'));
});

test('filters by station, year and year range', async () => {
  const { logger } = createTestLogger('silent');

  const byYear = seededStore();
  await new YearlyStatsAggregator(options({ filter: { year: 2022 } }), { store: byYear, logger }).run();
  assert.deepEqual(Array.from(byYear.yearlyStats.keys()), ['USC00000001:2022']);

  const byStation = seededStore();
  await new YearlyStatsAggregator(options({ filter: { stationId: 'USC00000002' } }), { store: byStation, logger }).run();
  assert.deepEqual(Array.from(byStation.yearlyStats.keys()), ['USC00000002:2023']);

  const byRange = seededStore();
  const summary = await new YearlyStatsAggregator(options({ filter: { startYear: 2023, endYear: 2024 } }), {
    store: byRange,
    logger
  }).run();
  assert.equal(summary.totalPairs, 2);
  assert.deepEqual(Array.from(byRange.yearlyStats.keys()), ['USC00000001:2023', 'USC00000002:2023']);
});

test('clear mode deletes matching statistics and recomputes them', async () => {
  const store = seededStore();
  const { logger } = createTestLogger('silent');
  await new YearlyStatsAggregator(options(), { store, logger }).run();

  const summary = await new YearlyStatsAggregator(
    options({ clearExisting: true, filter: { stationId: 'USC00000001' } }),
    { store, logger }
  ).run();

  assert.equal(summary.cleared, 2);
  assert.equal(summary.skippedExisting, 0);
  assert.equal(summary.successful, 2);
  assert.equal(store.yearlyStats.size, 3);
  assert.equal(store.calls.filter((call) => call === 'clearYearlyStats').length, 1);
});

test('dry run never mutates the store under any flag combination', async () => {
  const { logger } = createTestLogger('silent');
  const combinations: Partial<AggregationOptions>[] = [
    {},
    { clearExisting: true },
    { forceRecompute: true },
    { clearExisting: true, forceRecompute: true, filter: { stationId: 'USC00000001', year: 2023 } }
  ];

  for (const combination of combinations) {
    const store = seededStore();
    await new YearlyStatsAggregator(options(), { store, logger }).run();
    const before = JSON.stringify(Array.from(store.yearlyStats.entries()));
    store.calls.length = 0;

    const summary = await new YearlyStatsAggregator(options({ ...combination, dryRun: true }), { store, logger }).run();

    assert.deepEqual(store.mutations(), []);
    assert.equal(JSON.stringify(Array.from(store.yearlyStats.entries())), before);
    assert.equal(summary.dryRun, true);
  }
});

test('dry run reports how many rows clear mode would delete', async () => {
  const store = seededStore();
  const { logger } = createTestLogger('silent');
  await new YearlyStatsAggregator(options(), { store, logger }).run();

  const summary = await new YearlyStatsAggregator(options({ clearExisting: true, dryRun: true }), { store, logger }).run();

  assert.equal(summary.cleared, 3);
  assert.equal(summary.processed, 3);
  assert.equal(summary.successful, 3);
  assert.equal(store.yearlyStats.size, 3);
});

test('an unknown station is rejected before any work', async () => {
  const store = seededStore();
  const { logger } = createTestLogger('silent');

  await assert.rejects(
    new YearlyStatsAggregator(options({ filter: { stationId: 'USC99999999' } }), { store, logger }).run(),
    (err: unknown) => {
      assert.ok(err instanceof JobConfigError);
      assert.equal(err.message, 'Station USC99999999 does not exist');
      return true;
    }
  );
  assert.deepEqual(store.mutations(), []);
});

test('rejects contradictory or out-of-range filters', () => {
  assert.throws(() => validateYearFilter({ year: 1700 }), {
    name: 'JobConfigError',
    message: 'Invalid aggregation filter: year must be between 1800 and 2100'
  });
  assert.throws(() => validateYearFilter({ startYear: 2023, endYear: 2020 }), {
    message: 'Invalid aggregation filter: Start year (2023) cannot be after end year (2020)'
  });
  assert.throws(() => validateYearFilter({ year: 2023, startYear: 2020 }), {
    message: 'Invalid aggregation filter: year cannot be combined with startYear/endYear'
  });
  assert.doesNotThrow(() => validateYearFilter({ startYear: 1800, endYear: 2100 }));
});

test('a failed computation marks only that pair as failed', async () => {
  const store = seededStore();
  store.beforeObservationRead = (pair) => {
    if (pair.stationId === 'USC00000001' && pair.year === 2022) {
      throw new Error('corrupt row');
    }
  };
  const { logger } = createTestLogger('silent');

  const summary = await new YearlyStatsAggregator(options(), { store, logger }).run();

  assert.equal(summary.processed, 3);
  assert.equal(summary.successful, 2);
  assert.equal(summary.failed, 1);
  assert.equal(summary.successPercentage, 66.7);
  assert.equal(aggregationHasFailures(summary), true);
  assert.equal(store.yearlyStats.has('USC00000001:2022'), false);
});

test('a failed batch write is counted and later batches still run', async () => {
  const store = seededStore();
  store.beforeStatsWrite = (stats) => {
    if (stats.some((entry) => entry.stationId === 'USC00000002')) {
      throw new StoreWriteError('deadlock detected');
    }
  };
  const { logger } = createTestLogger('silent');

  const summary = await new YearlyStatsAggregator(options({ batchSize: 2 }), { store, logger }).run();

  assert.equal(summary.batches, 2);
  assert.equal(summary.failedBatches, 1);
  assert.equal(summary.failed, 1);
  assert.equal(summary.successful, 2);
  assert.deepEqual(Array.from(store.yearlyStats.keys()), ['USC00000001:2022', 'USC00000001:2023']);
});

test('a store outage while writing stops the run and keeps earlier batches', async () => {
  const store = seededStore();
  let writes = 0;
  store.beforeStatsWrite = () => {
    writes += 1;
    if (writes === 2) {
      throw new StoreUnavailableError('server closed the connection');
    }
  };
  const { logger } = createTestLogger('silent');

  const summary = await new YearlyStatsAggregator(options({ batchSize: 1 }), { store, logger }).run();

  assert.equal(summary.aborted, 'server closed the connection');
  assert.equal(summary.batches, 3);
  assert.equal(summary.processed, 2);
  assert.equal(summary.successful, 1);
  assert.equal(summary.failed, 1);
  assert.equal(summary.failedBatches, 1);
  assert.equal(summary.successPercentage, 50);
  assert.equal(summary.totals, null);
  assert.equal(aggregationHasFailures(summary), true);
  assert.deepEqual(Array.from(store.yearlyStats.keys()), ['USC00000001:2022']);
  assert.equal(store.calls.includes('totals'), false);
});

test('a store outage while reading stops before the batch is counted', async () => {
  const store = seededStore();
  store.beforeObservationRead = (pair) => {
    if (pair.stationId === 'USC00000002') {
      throw new StoreUnavailableError('Connection terminated unexpectedly');
    }
  };
  const { logger } = createTestLogger('silent');

  const summary = await new YearlyStatsAggregator(options({ batchSize: 1 }), { store, logger }).run();

  assert.equal(summary.aborted, 'Connection terminated unexpectedly');
  assert.equal(summary.processed, 2);
  assert.equal(summary.successful, 2);
  assert.equal(summary.failed, 0);
  assert.equal(summary.failedBatches, 0);
  assert.deepEqual(Array.from(store.yearlyStats.keys()), ['USC00000001:2022', 'USC00000001:2023']);
});

test('logs progress every interval of batches', async () => {
  const store = seededStore();
  const { logger, entries } = createTestLogger('info');

  await new YearlyStatsAggregator(options({ batchSize: 1, progressInterval: 2 }), { store, logger }).run();

  const checkpoints = entries.filter((entry) => entry.msg === 'progress');
  assert.deepEqual(
    checkpoints.map((entry) => [entry.processed, entry.unit]),
    [[2, 'batches']]
  );
});
