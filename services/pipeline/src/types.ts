/** Calendar date as `YYYY-MM-DD`. */
export type ObservationDate = string;

export type DailyObservation = {
  stationId: string;
  date: ObservationDate;
  maxTemperatureTenthsC: number | null;
  minTemperatureTenthsC: number | null;
  precipitationTenthsMm: number | null;
};

export type StationYear = {
  stationId: string;
  year: number;
};

export type YearlyStats = StationYear & {
  avgMaxTemperatureTenthsC: number | null;
  minMaxTemperatureTenthsC: number | null;
  maxMaxTemperatureTenthsC: number | null;
  avgMinTemperatureTenthsC: number | null;
  minMinTemperatureTenthsC: number | null;
  maxMinTemperatureTenthsC: number | null;
  totalPrecipitationTenthsMm: number | null;
  avgPrecipitationTenthsMm: number | null;
  maxPrecipitationTenthsMm: number | null;
  totalRecords: number;
  recordsWithTemperature: number;
  recordsWithPrecipitation: number;
  temperatureCompletenessPct: number;
  precipitationCompletenessPct: number;
};

/** One national or state yield figure for a crop and year, in `unit`. */
export type CropYield = {
  year: number;
  cropType: string;
  country: string;
  /** Empty for national figures. */
  state: string;
  yieldValue: number;
  unit: string;
  source: string;
};

/** Everything a yield file's lines share; each line adds the year and value. */
export type CropYieldSeries = Omit<CropYield, 'year' | 'yieldValue'>;

export function stationYearKey({ stationId, year }: StationYear): string {
  return `${stationId}:${year}`;
}

export function yearOf(date: ObservationDate): number {
  return Number.parseInt(date.slice(0, 4), 10);
}
