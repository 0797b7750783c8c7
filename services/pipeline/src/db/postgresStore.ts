import type { PoolClient } from 'pg';
import type { PostgresHelpers } from '@wxdata/shared';
import { StoreSchemaError, StoreUnavailableError, StoreWriteError, describeError } from '../errors';
import type { CropYield, DailyObservation, StationYear, YearlyStats } from '../types';
import {
  dedupeCropYields,
  dedupeObservations,
  type CropYieldUpsertResult,
  type ObservationClearResult,
  type ObservationUpsertResult,
  type StationRegistration,
  type StoreTotals,
  type WeatherStore,
  type YearFilter
} from '../store/types';
import { isConnectionError, isMissingSchemaError } from './errors';

export type StoreDatabase = PostgresHelpers;

type StationYearRow = {
  station_id: string;
  year: number;
};

type ObservationRow = {
  station_id: string;
  observed_on: string;
  max_temperature_tenths_c: number | null;
  min_temperature_tenths_c: number | null;
  precipitation_tenths_mm: number | null;
};

type TotalsRow = {
  stations: number;
  observations: number;
  yearly_stats: number;
  first_year: number | null;
  last_year: number | null;
};

type SqlFilter = {
  where: string;
  values: unknown[];
};

/** Failures that end the run rather than one batch, or null for anything else. */
function unavailableError(operation: string, err: unknown): StoreUnavailableError | null {
  if (isConnectionError(err)) {
    return new StoreUnavailableError(`Database unavailable during ${operation}: ${describeError(err)}`, err);
  }
  if (isMissingSchemaError(err)) {
    return new StoreSchemaError(
      `Database schema is missing during ${operation} (${describeError(err)}); run 'wxdata migrate' first`,
      err
    );
  }
  return null;
}

export function defaultStationName(stationId: string): string {
  return `Weather Station ${stationId}`;
}

function yearStart(year: number): string {
  return `${String(year).padStart(4, '0')}-01-01`;
}

function yearBounds(filter: YearFilter): { lower?: number; upper?: number } {
  if (filter.year !== undefined) {
    return { lower: filter.year, upper: filter.year };
  }
  return { lower: filter.startYear, upper: filter.endYear };
}

/**
 * Observations are filtered on date ranges so the `(station_id, observed_on)`
 * index stays usable; stats rows carry the year directly.
 */
export function buildFilter(filter: YearFilter, target: 'observations' | 'stats'): SqlFilter {
  const conditions: string[] = [];
  const values: unknown[] = [];
  const { lower, upper } = yearBounds(filter);

  if (filter.stationId !== undefined) {
    values.push(filter.stationId);
    conditions.push(`station_id = $${values.length}`);
  }

  if (target === 'observations') {
    if (lower !== undefined) {
      values.push(yearStart(lower));
      conditions.push(`observed_on >= $${values.length}::date`);
    }
    if (upper !== undefined) {
      values.push(yearStart(upper + 1));
      conditions.push(`observed_on < $${values.length}::date`);
    }
  } else {
    if (lower !== undefined) {
      values.push(lower);
      conditions.push(`year >= $${values.length}`);
    }
    if (upper !== undefined) {
      values.push(upper);
      conditions.push(`year <= $${values.length}`);
    }
  }

  return {
    where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    values
  };
}

const UPSERT_OBSERVATIONS_SQL = `
  INSERT INTO daily_observations (
    station_id,
    observed_on,
    max_temperature_tenths_c,
    min_temperature_tenths_c,
    precipitation_tenths_mm
  )
  SELECT * FROM UNNEST($1::text[], $2::date[], $3::int[], $4::int[], $5::int[])
  ON CONFLICT (station_id, observed_on) DO UPDATE SET
    max_temperature_tenths_c = EXCLUDED.max_temperature_tenths_c,
    min_temperature_tenths_c = EXCLUDED.min_temperature_tenths_c,
    precipitation_tenths_mm = EXCLUDED.precipitation_tenths_mm,
    updated_at = NOW()
  RETURNING (xmax = 0) AS inserted
`;

const UPSERT_YEARLY_STATS_SQL = `
  INSERT INTO yearly_weather_stats (
    station_id,
    year,
    avg_max_temperature,
    min_max_temperature,
    max_max_temperature,
    avg_min_temperature,
    min_min_temperature,
    max_min_temperature,
    total_precipitation,
    avg_precipitation,
    max_precipitation,
    total_records,
    records_with_temperature,
    records_with_precipitation,
    temperature_completeness_pct,
    precipitation_completeness_pct
  )
  SELECT * FROM UNNEST(
    $1::text[], $2::int[],
    $3::numeric[], $4::int[], $5::int[],
    $6::numeric[], $7::int[], $8::int[],
    $9::int[], $10::numeric[], $11::int[],
    $12::int[], $13::int[], $14::int[],
    $15::numeric[], $16::numeric[]
  )
  ON CONFLICT (station_id, year) DO UPDATE SET
    avg_max_temperature = EXCLUDED.avg_max_temperature,
    min_max_temperature = EXCLUDED.min_max_temperature,
    max_max_temperature = EXCLUDED.max_max_temperature,
    avg_min_temperature = EXCLUDED.avg_min_temperature,
    min_min_temperature = EXCLUDED.min_min_temperature,
    max_min_temperature = EXCLUDED.max_min_temperature,
    total_precipitation = EXCLUDED.total_precipitation,
    avg_precipitation = EXCLUDED.avg_precipitation,
    max_precipitation = EXCLUDED.max_precipitation,
    total_records = EXCLUDED.total_records,
    records_with_temperature = EXCLUDED.records_with_temperature,
    records_with_precipitation = EXCLUDED.records_with_precipitation,
    temperature_completeness_pct = EXCLUDED.temperature_completeness_pct,
    precipitation_completeness_pct = EXCLUDED.precipitation_completeness_pct,
    computed_at = NOW()
`;

const UPSERT_CROP_YIELDS_SQL = `
  INSERT INTO crop_yields (year, crop_type, country, state, yield_value, yield_unit, source)
  SELECT * FROM UNNEST($1::int[], $2::text[], $3::text[], $4::text[], $5::bigint[], $6::text[], $7::text[])
  ON CONFLICT (crop_type, country, state, year) DO UPDATE SET
    yield_value = EXCLUDED.yield_value,
    yield_unit = EXCLUDED.yield_unit,
    source = EXCLUDED.source,
    updated_at = NOW()
  RETURNING (xmax = 0) AS inserted
`;

function toObservation(row: ObservationRow): DailyObservation {
  return {
    stationId: row.station_id,
    date: row.observed_on,
    maxTemperatureTenthsC: row.max_temperature_tenths_c,
    minTemperatureTenthsC: row.min_temperature_tenths_c,
    precipitationTenthsMm: row.precipitation_tenths_mm
  } satisfies DailyObservation;
}

function toStationYear(row: StationYearRow): StationYear {
  return { stationId: row.station_id, year: row.year };
}

export class PostgresWeatherStore implements WeatherStore {
  constructor(private readonly db: StoreDatabase) {}

  async ping(): Promise<void> {
    await this.read('ping', (client) => client.query('SELECT 1'));
  }

  async registerStation(stationId: string): Promise<StationRegistration> {
    const result = await this.write('register station', (client) =>
      client.query(
        `INSERT INTO weather_stations (station_id, name)
         VALUES ($1, $2)
         ON CONFLICT (station_id) DO NOTHING
         RETURNING station_id`,
        [stationId, defaultStationName(stationId)]
      )
    );
    return { stationId, created: (result.rowCount ?? 0) > 0 };
  }

  async upsertObservations(observations: DailyObservation[]): Promise<ObservationUpsertResult> {
    const batch = dedupeObservations(observations);
    if (batch.length === 0) {
      return { inserted: 0, updated: 0 };
    }

    const { rows } = await this.write('upsert observations', (client) =>
      client.query<{ inserted: boolean }>(UPSERT_OBSERVATIONS_SQL, [
        batch.map((entry) => entry.stationId),
        batch.map((entry) => entry.date),
        batch.map((entry) => entry.maxTemperatureTenthsC),
        batch.map((entry) => entry.minTemperatureTenthsC),
        batch.map((entry) => entry.precipitationTenthsMm)
      ])
    );

    const inserted = rows.filter((row) => row.inserted).length;
    return { inserted, updated: rows.length - inserted };
  }

  async clearObservations(): Promise<ObservationClearResult> {
    return this.write('clear observations', async (client) => {
      const observations = await client.query('DELETE FROM daily_observations');
      const stations = await client.query('DELETE FROM weather_stations');
      return { observations: observations.rowCount ?? 0, stations: stations.rowCount ?? 0 };
    });
  }

  async stationExists(stationId: string): Promise<boolean> {
    const { rows } = await this.read('look up station', (client) =>
      client.query('SELECT 1 FROM weather_stations WHERE station_id = $1', [stationId])
    );
    return rows.length > 0;
  }

  async listStationYears(filter: YearFilter): Promise<StationYear[]> {
    const { where, values } = buildFilter(filter, 'observations');
    const { rows } = await this.read('list station years', (client) =>
      client.query<StationYearRow>(
        `SELECT DISTINCT station_id, EXTRACT(YEAR FROM observed_on)::int AS year
         FROM daily_observations
         ${where}
         ORDER BY station_id, year`,
        values
      )
    );
    return rows.map(toStationYear);
  }

  async listObservations(pair: StationYear): Promise<DailyObservation[]> {
    const { rows } = await this.read('list observations', (client) =>
      client.query<ObservationRow>(
        `SELECT station_id, observed_on, max_temperature_tenths_c, min_temperature_tenths_c, precipitation_tenths_mm
         FROM daily_observations
         WHERE station_id = $1 AND observed_on >= $2::date AND observed_on < $3::date
         ORDER BY observed_on`,
        [pair.stationId, yearStart(pair.year), yearStart(pair.year + 1)]
      )
    );
    return rows.map(toObservation);
  }

  async listYearlyStatsKeys(filter: YearFilter): Promise<StationYear[]> {
    const { where, values } = buildFilter(filter, 'stats');
    const { rows } = await this.read('list yearly stats', (client) =>
      client.query<StationYearRow>(
        `SELECT station_id, year FROM yearly_weather_stats ${where} ORDER BY station_id, year`,
        values
      )
    );
    return rows.map(toStationYear);
  }

  async upsertYearlyStats(stats: YearlyStats[]): Promise<number> {
    if (stats.length === 0) {
      return 0;
    }
    const result = await this.write('upsert yearly stats', (client) =>
      client.query(UPSERT_YEARLY_STATS_SQL, [
        stats.map((entry) => entry.stationId),
        stats.map((entry) => entry.year),
        stats.map((entry) => entry.avgMaxTemperatureTenthsC),
        stats.map((entry) => entry.minMaxTemperatureTenthsC),
        stats.map((entry) => entry.maxMaxTemperatureTenthsC),
        stats.map((entry) => entry.avgMinTemperatureTenthsC),
        stats.map((entry) => entry.minMinTemperatureTenthsC),
        stats.map((entry) => entry.maxMinTemperatureTenthsC),
        stats.map((entry) => entry.totalPrecipitationTenthsMm),
        stats.map((entry) => entry.avgPrecipitationTenthsMm),
        stats.map((entry) => entry.maxPrecipitationTenthsMm),
        stats.map((entry) => entry.totalRecords),
        stats.map((entry) => entry.recordsWithTemperature),
        stats.map((entry) => entry.recordsWithPrecipitation),
        stats.map((entry) => entry.temperatureCompletenessPct),
        stats.map((entry) => entry.precipitationCompletenessPct)
      ])
    );
    return result.rowCount ?? 0;
  }

  async countYearlyStats(filter: YearFilter): Promise<number> {
    const { where, values } = buildFilter(filter, 'stats');
    const { rows } = await this.read('count yearly stats', (client) =>
      client.query<{ count: number }>(`SELECT COUNT(*) AS count FROM yearly_weather_stats ${where}`, values)
    );
    return rows[0]?.count ?? 0;
  }

  async clearYearlyStats(filter: YearFilter): Promise<number> {
    const { where, values } = buildFilter(filter, 'stats');
    const result = await this.write('clear yearly stats', (client) =>
      client.query(`DELETE FROM yearly_weather_stats ${where}`, values)
    );
    return result.rowCount ?? 0;
  }

  async upsertCropYields(records: CropYield[]): Promise<CropYieldUpsertResult> {
    const batch = dedupeCropYields(records);
    if (batch.length === 0) {
      return { inserted: 0, updated: 0 };
    }

    const { rows } = await this.write('upsert crop yields', (client) =>
      client.query<{ inserted: boolean }>(UPSERT_CROP_YIELDS_SQL, [
        batch.map((entry) => entry.year),
        batch.map((entry) => entry.cropType),
        batch.map((entry) => entry.country),
        batch.map((entry) => entry.state),
        batch.map((entry) => entry.yieldValue),
        batch.map((entry) => entry.unit),
        batch.map((entry) => entry.source)
      ])
    );

    const inserted = rows.filter((row) => row.inserted).length;
    return { inserted, updated: rows.length - inserted };
  }

  async countCropYields(): Promise<number> {
    const { rows } = await this.read('count crop yields', (client) =>
      client.query<{ count: number }>('SELECT COUNT(*) AS count FROM crop_yields')
    );
    return rows[0]?.count ?? 0;
  }

  async clearCropYields(): Promise<number> {
    const result = await this.write('clear crop yields', (client) => client.query('DELETE FROM crop_yields'));
    return result.rowCount ?? 0;
  }

  async totals(): Promise<StoreTotals> {
    const { rows } = await this.read('read totals', (client) =>
      client.query<TotalsRow>(
        `SELECT
           (SELECT COUNT(*) FROM weather_stations) AS stations,
           (SELECT COUNT(*) FROM daily_observations) AS observations,
           (SELECT COUNT(*) FROM yearly_weather_stats) AS yearly_stats,
           (SELECT EXTRACT(YEAR FROM MIN(observed_on))::int FROM daily_observations) AS first_year,
           (SELECT EXTRACT(YEAR FROM MAX(observed_on))::int FROM daily_observations) AS last_year`
      )
    );
    const row = rows[0];
    return {
      stations: row?.stations ?? 0,
      observations: row?.observations ?? 0,
      yearlyStats: row?.yearly_stats ?? 0,
      firstYear: row?.first_year ?? null,
      lastYear: row?.last_year ?? null
    };
  }

  async close(): Promise<void> {
    await this.db.closePool();
  }

  private async read<T>(operation: string, fn: (client: PoolClient) => Promise<T>): Promise<T> {
    try {
      return await this.db.withConnection(fn);
    } catch (err) {
      throw unavailableError(operation, err) ?? err;
    }
  }

  private async write<T>(operation: string, fn: (client: PoolClient) => Promise<T>): Promise<T> {
    try {
      return await this.db.withTransaction(fn);
    } catch (err) {
      throw unavailableError(operation, err) ?? new StoreWriteError(`Failed to ${operation}: ${describeError(err)}`, err);
    }
  }
}
