import type { PoolClient } from 'pg';

type Migration = {
  id: string;
  statements: string[];
};

export const MIGRATION_TABLE = 'wxdata_schema_migrations';

export const migrations: Migration[] = [
  {
    id: '001_weather_initial_schema',
    statements: [
      `CREATE TABLE IF NOT EXISTS weather_stations (
         station_id TEXT PRIMARY KEY,
         name TEXT NOT NULL,
         latitude NUMERIC(9, 6),
         longitude NUMERIC(9, 6),
         elevation NUMERIC(7, 2),
         state TEXT,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       );`,
      `CREATE TABLE IF NOT EXISTS daily_observations (
         id BIGSERIAL PRIMARY KEY,
         station_id TEXT NOT NULL REFERENCES weather_stations(station_id) ON DELETE CASCADE,
         observed_on DATE NOT NULL,
         max_temperature_tenths_c INTEGER,
         min_temperature_tenths_c INTEGER,
         precipitation_tenths_mm INTEGER,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         UNIQUE (station_id, observed_on),
         CONSTRAINT daily_observations_temperature_order CHECK (
           max_temperature_tenths_c IS NULL
           OR min_temperature_tenths_c IS NULL
           OR max_temperature_tenths_c >= min_temperature_tenths_c
         ),
         CONSTRAINT daily_observations_precipitation_non_negative CHECK (
           precipitation_tenths_mm IS NULL OR precipitation_tenths_mm >= 0
         )
       );`,
      `CREATE INDEX IF NOT EXISTS idx_daily_observations_observed_on
         ON daily_observations(observed_on);`,
      `CREATE INDEX IF NOT EXISTS idx_daily_observations_station_year
         ON daily_observations(station_id, (EXTRACT(YEAR FROM observed_on)));`
    ]
  },
  {
    id: '002_weather_yearly_stats',
    statements: [
      `CREATE TABLE IF NOT EXISTS yearly_weather_stats (
         id BIGSERIAL PRIMARY KEY,
         station_id TEXT NOT NULL REFERENCES weather_stations(station_id) ON DELETE CASCADE,
         year INTEGER NOT NULL,
         avg_max_temperature NUMERIC(6, 1),
         min_max_temperature INTEGER,
         max_max_temperature INTEGER,
         avg_min_temperature NUMERIC(6, 1),
         min_min_temperature INTEGER,
         max_min_temperature INTEGER,
         total_precipitation INTEGER,
         avg_precipitation NUMERIC(6, 1),
         max_precipitation INTEGER,
         total_records INTEGER NOT NULL DEFAULT 0,
         records_with_temperature INTEGER NOT NULL DEFAULT 0,
         records_with_precipitation INTEGER NOT NULL DEFAULT 0,
         temperature_completeness_pct NUMERIC(5, 2) NOT NULL DEFAULT 0,
         precipitation_completeness_pct NUMERIC(5, 2) NOT NULL DEFAULT 0,
         computed_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         UNIQUE (station_id, year)
       );`,
      `CREATE INDEX IF NOT EXISTS idx_yearly_weather_stats_year
         ON yearly_weather_stats(year);`
    ]
  },
  {
    id: '003_crop_yields',
    statements: [
      `CREATE TABLE IF NOT EXISTS crop_yields (
         id BIGSERIAL PRIMARY KEY,
         year INTEGER NOT NULL,
         crop_type TEXT NOT NULL,
         country TEXT NOT NULL,
         state TEXT NOT NULL DEFAULT '',
         yield_value BIGINT NOT NULL,
         yield_unit TEXT NOT NULL,
         source TEXT NOT NULL,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         UNIQUE (crop_type, country, state, year),
         CONSTRAINT crop_yields_year_range CHECK (year BETWEEN 1800 AND 2100),
         CONSTRAINT crop_yields_value_non_negative CHECK (yield_value >= 0)
       );`,
      `CREATE INDEX IF NOT EXISTS idx_crop_yields_year
         ON crop_yields(year);`
    ]
  }
];

export async function runMigrations(client: PoolClient): Promise<string[]> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
      id TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  const { rows } = await client.query<{ id: string }>(`SELECT id FROM ${MIGRATION_TABLE}`);
  const applied = new Set(rows.map((row) => row.id));
  const newlyApplied: string[] = [];

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }

    await client.query('BEGIN');
    try {
      for (const statement of migration.statements) {
        await client.query(statement);
      }
      await client.query(`INSERT INTO ${MIGRATION_TABLE} (id) VALUES ($1) ON CONFLICT DO NOTHING`, [migration.id]);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
    newlyApplied.push(migration.id);
  }

  return newlyApplied;
}
