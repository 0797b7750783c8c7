import test from 'node:test';
import assert from 'node:assert/strict';
import { redactDatabaseUrl } from '../../src/db/client';
import { PostgresWeatherStore, buildFilter, defaultStationName } from '../../src/db/postgresStore';
import { StoreSchemaError, StoreUnavailableError, StoreWriteError } from '../../src/errors';
import type { DailyObservation } from '../../src/types';
import { createStubClient, createStubDatabase, pgError, type QueryResponder } from '../helpers/pgStub';

function storeWith(respond?: QueryResponder) {
  const stub = createStubClient(respond);
  const db = createStubDatabase(stub.client);
  return { store: new PostgresWeatherStore(db), db, ...stub };
}

function observation(date: string, max: number | null): DailyObservation {
  return {
    stationId: 'USC00000001',
    date,
    maxTemperatureTenthsC: max,
    minTemperatureTenthsC: null,
    precipitationTenthsMm: 0
  };
}

test('bulk upsert sends column arrays and splits inserted from updated rows', async () => {
  const { store, queries, statements } = storeWith((text) =>
    text.startsWith('INSERT INTO daily_observations') ? { rows: [{ inserted: true }, { inserted: false }] } : undefined
  );

  const result = await store.upsertObservations([
    observation('2023-01-01', 10),
    observation('2023-01-02', 20),
    observation('2023-01-01', 15)
  ]);

  assert.deepEqual(result, { inserted: 1, updated: 1 });
  assert.deepEqual(statements().filter((text) => !text.startsWith('INSERT')), ['BEGIN', 'COMMIT']);
  const insert = queries.find((query) => query.text.startsWith('INSERT INTO daily_observations'));
  assert.deepEqual(insert?.values, [
    ['USC00000001', 'USC00000001'],
    ['2023-01-01', '2023-01-02'],
    [15, 20],
    [null, null],
    [0, 0]
  ]);
});

test('an empty batch issues no statements', async () => {
  const { store, queries } = storeWith();
  assert.deepEqual(await store.upsertObservations([]), { inserted: 0, updated: 0 });
  assert.equal(await store.upsertYearlyStats([]), 0);
  assert.equal(queries.length, 0);
});

test('registering a station reports whether the row was new', async () => {
  let rowCount = 1;
  const { store, queries } = storeWith((text) => (text.startsWith('INSERT INTO weather_stations') ? { rowCount } : undefined));

  assert.deepEqual(await store.registerStation('USC00000001'), { stationId: 'USC00000001', created: true });
  rowCount = 0;
  assert.deepEqual(await store.registerStation('USC00000001'), { stationId: 'USC00000001', created: false });

  const insert = queries.find((query) => query.text.startsWith('INSERT INTO weather_stations'));
  assert.deepEqual(insert?.values, ['USC00000001', defaultStationName('USC00000001')]);
  assert.equal(defaultStationName('USC00000001'), 'Weather Station USC00000001');
});

test('station-year listing filters observations by date range', async () => {
  const { store, queries } = storeWith((text) =>
    text.startsWith('SELECT DISTINCT') ? { rows: [{ station_id: 'USC00000001', year: 2000 }] } : undefined
  );

  const pairs = await store.listStationYears({ stationId: 'USC00000001', startYear: 2000, endYear: 2001 });

  assert.deepEqual(pairs, [{ stationId: 'USC00000001', year: 2000 }]);
  assert.equal(
    queries[0].text,
    'SELECT DISTINCT station_id, EXTRACT(YEAR FROM observed_on)::int AS year FROM daily_observations ' +
      'WHERE station_id = $1 AND observed_on >= $2::date AND observed_on < $3::date ORDER BY station_id, year'
  );
  assert.deepEqual(queries[0].values, ['USC00000001', '2000-01-01', '2002-01-01']);
});

test('filters on yearly stats compare the year column', () => {
  assert.deepEqual(buildFilter({ year: 2023 }, 'stats'), {
    where: 'WHERE year >= $1 AND year <= $2',
    values: [2023, 2023]
  });
  assert.deepEqual(buildFilter({}, 'observations'), { where: '', values: [] });
  assert.deepEqual(buildFilter({ endYear: 1999 }, 'observations'), {
    where: 'WHERE observed_on < $1::date',
    values: ['2000-01-01']
  });
});

test('observations of one station-year map back to domain records', async () => {
  const { store, queries } = storeWith(() => ({
    rows: [
      {
        station_id: 'USC00000001',
        observed_on: '2023-06-15',
        max_temperature_tenths_c: 289,
        min_temperature_tenths_c: 178,
        precipitation_tenths_mm: null
      }
    ]
  }));

  const observations = await store.listObservations({ stationId: 'USC00000001', year: 2023 });

  assert.deepEqual(observations, [
    {
      stationId: 'USC00000001',
      date: '2023-06-15',
      maxTemperatureTenthsC: 289,
      minTemperatureTenthsC: 178,
      precipitationTenthsMm: null
    }
  ]);
  assert.deepEqual(queries[0].values, ['USC00000001', '2023-01-01', '2024-01-01']);
});

test('clearing yearly stats returns the deleted row count', async () => {
  const { store, queries } = storeWith(() => ({ rowCount: 4 }));

  assert.equal(await store.clearYearlyStats({ stationId: 'USC00000001' }), 4);
  assert.equal(queries[1].text, 'DELETE FROM yearly_weather_stats WHERE station_id = $1');
  assert.deepEqual(queries[1].values, ['USC00000001']);
});

test('totals map column names and default to empty', async () => {
  const populated = storeWith(() => ({
    rows: [{ stations: 2, observations: 3, yearly_stats: 1, first_year: 2022, last_year: 2023 }]
  }));
  assert.deepEqual(await populated.store.totals(), {
    stations: 2,
    observations: 3,
    yearlyStats: 1,
    firstYear: 2022,
    lastYear: 2023
  });

  const empty = storeWith();
  assert.deepEqual(await empty.store.totals(), {
    stations: 0,
    observations: 0,
    yearlyStats: 0,
    firstYear: null,
    lastYear: null
  });
});

test('a failing write is rolled back and surfaced as a write error', async () => {
  const { store, statements } = storeWith((text) =>
    text.startsWith('INSERT INTO daily_observations') ? pgError('integer out of range', '22003') : undefined
  );

  await assert.rejects(store.upsertObservations([observation('2023-01-01', 10)]), (err: unknown) => {
    assert.ok(err instanceof StoreWriteError);
    assert.equal(err.message, 'Failed to upsert observations: integer out of range');
    return true;
  });
  assert.equal(statements().at(-1), 'ROLLBACK');
});

test('connection failures surface as an unavailable store', async () => {
  const stub = createStubClient();
  const store = new PostgresWeatherStore(
    createStubDatabase(stub.client, pgError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED'))
  );

  await assert.rejects(store.ping(), (err: unknown) => {
    assert.ok(err instanceof StoreUnavailableError);
    assert.equal(err.message, 'Database unavailable during ping: connect ECONNREFUSED 127.0.0.1:5432');
    return true;
  });
  await assert.rejects(store.registerStation('USC00000001'), StoreUnavailableError);
});

test('crop yields upsert on their series key and report inserts', async () => {
  const { store, queries } = storeWith((text) =>
    text.startsWith('INSERT INTO crop_yields') ? { rows: [{ inserted: false }, { inserted: true }] } : undefined
  );
  const series = { cropType: 'corn_grain', country: 'US', state: '', unit: 'thousand_metric_tons', source: 'corn.txt' };

  const result = await store.upsertCropYields([
    { ...series, year: 1985, yieldValue: 1 },
    { ...series, year: 1986, yieldValue: 2 },
    { ...series, year: 1985, yieldValue: 3 }
  ]);

  assert.deepEqual(result, { inserted: 1, updated: 1 });
  const insert = queries.find((query) => query.text.startsWith('INSERT INTO crop_yields'));
  assert.ok(insert?.text.includes('ON CONFLICT (crop_type, country, state, year) DO UPDATE'));
  assert.deepEqual(insert?.values, [
    [1985, 1986],
    ['corn_grain', 'corn_grain'],
    ['US', 'US'],
    ['', ''],
    [3, 2],
    ['thousand_metric_tons', 'thousand_metric_tons'],
    ['corn.txt', 'corn.txt']
  ]);
});

test('crop yields are counted and cleared as a whole', async () => {
  const { store, statements } = storeWith((text) => {
    if (text.startsWith('SELECT COUNT(*) AS count FROM crop_yields')) {
      return { rows: [{ count: 42 }] };
    }
    return text === 'DELETE FROM crop_yields' ? { rowCount: 42 } : undefined;
  });

  assert.equal(await store.countCropYields(), 42);
  assert.equal(await store.clearCropYields(), 42);
  assert.deepEqual(statements().slice(-3), ['BEGIN', 'DELETE FROM crop_yields', 'COMMIT']);
});

test('missing tables end the run and point at the migrate command', async () => {
  const { store } = storeWith((text) =>
    text.startsWith('SELECT') || text.startsWith('INSERT')
      ? pgError('relation "yearly_weather_stats" does not exist', '42P01')
      : undefined
  );

  await assert.rejects(store.totals(), (err: unknown) => {
    assert.ok(err instanceof StoreSchemaError);
    assert.ok(err instanceof StoreUnavailableError);
    assert.equal(
      err.message,
      `Database schema is missing during read totals (relation "yearly_weather_stats" does not exist); run 'wxdata migrate' first`
    );
    return true;
  });
  await assert.rejects(store.registerStation('USC00000001'), StoreSchemaError);
});

test('closing the store closes the pool', async () => {
  const { store, db } = storeWith();
  await store.close();
  assert.equal(db.closed(), true);
});

test('connection strings are logged without their password', () => {
  assert.equal(redactDatabaseUrl('postgres://wxdata:test-secret@db:5432/wx'), 'postgres://wxdata:***@db:5432/wx');
  assert.equal(redactDatabaseUrl('postgres://db:5432/wx'), 'postgres://db:5432/wx');
  assert.equal(redactDatabaseUrl('not a url'), '<unparseable DATABASE_URL>');
});
