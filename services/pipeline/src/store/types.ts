import type { CropYield, DailyObservation, StationYear, YearlyStats } from '../types';

export type StationRegistration = {
  stationId: string;
  created: boolean;
};

export type ObservationUpsertResult = {
  inserted: number;
  updated: number;
};

export type CropYieldUpsertResult = ObservationUpsertResult;

export type ObservationClearResult = {
  observations: number;
  stations: number;
};

export type YearFilter = {
  stationId?: string;
  year?: number;
  startYear?: number;
  endYear?: number;
};

export type StoreTotals = {
  stations: number;
  observations: number;
  yearlyStats: number;
  firstYear: number | null;
  lastYear: number | null;
};

/** Write side of the ingestion pipeline. Each call commits on its own. */
export interface ObservationWriter {
  ping(): Promise<void>;
  registerStation(stationId: string): Promise<StationRegistration>;
  upsertObservations(observations: DailyObservation[]): Promise<ObservationUpsertResult>;
  clearObservations(): Promise<ObservationClearResult>;
}

export interface ObservationReader {
  ping(): Promise<void>;
  stationExists(stationId: string): Promise<boolean>;
  listStationYears(filter: YearFilter): Promise<StationYear[]>;
  listObservations(pair: StationYear): Promise<DailyObservation[]>;
}

export interface YearlyStatsStore {
  listYearlyStatsKeys(filter: YearFilter): Promise<StationYear[]>;
  upsertYearlyStats(stats: YearlyStats[]): Promise<number>;
  countYearlyStats(filter: YearFilter): Promise<number>;
  clearYearlyStats(filter: YearFilter): Promise<number>;
}

export interface CropYieldStore {
  ping(): Promise<void>;
  upsertCropYields(records: CropYield[]): Promise<CropYieldUpsertResult>;
  countCropYields(): Promise<number>;
  clearCropYields(): Promise<number>;
}

export interface StoreInspector {
  totals(): Promise<StoreTotals>;
}

export interface WeatherStore
  extends ObservationWriter,
    ObservationReader,
    YearlyStatsStore,
    CropYieldStore,
    StoreInspector {
  close(): Promise<void>;
}

/**
 * Collapses repeated (station, date) keys so one bulk statement never touches
 * the same row twice. The last occurrence wins.
 */
export function dedupeObservations(observations: DailyObservation[]): DailyObservation[] {
  const byKey = new Map<string, DailyObservation>();
  for (const observation of observations) {
    byKey.set(`${observation.stationId}|${observation.date}`, observation);
  }
  return Array.from(byKey.values());
}

export function cropYieldKey(record: CropYield): string {
  return `${record.cropType}|${record.country}|${record.state}|${record.year}`;
}

/** Same as `dedupeObservations`, keyed by crop, country, state and year. */
export function dedupeCropYields(records: CropYield[]): CropYield[] {
  const byKey = new Map<string, CropYield>();
  for (const record of records) {
    byKey.set(cropYieldKey(record), record);
  }
  return Array.from(byKey.values());
}
