import { yearOf, type DailyObservation, type YearlyStats } from '../types';
import { completenessPercentage, roundHalfAwayFromZero } from '../units';

type Series = {
  count: number;
  sum: number;
  min: number | null;
  max: number | null;
};

function emptySeries(): Series {
  return { count: 0, sum: 0, min: null, max: null };
}

function include(series: Series, value: number | null): void {
  if (value === null) {
    return;
  }
  series.count += 1;
  series.sum += value;
  series.min = series.min === null ? value : Math.min(series.min, value);
  series.max = series.max === null ? value : Math.max(series.max, value);
}

function mean(series: Series): number | null {
  return series.count === 0 ? null : roundHalfAwayFromZero(series.sum / series.count, 1);
}

/**
 * Summarises one station-year. Missing values are left out of every
 * aggregate; a day counts toward temperature completeness only when both
 * readings are present.
 */
export function computeYearlyStats(stationId: string, year: number, observations: DailyObservation[]): YearlyStats {
  const maxTemperature = emptySeries();
  const minTemperature = emptySeries();
  const precipitation = emptySeries();
  let recordsWithTemperature = 0;

  for (const observation of observations) {
    if (observation.stationId !== stationId || yearOf(observation.date) !== year) {
      throw new Error(`Observation ${observation.stationId} ${observation.date} does not belong to ${stationId}:${year}`);
    }
    include(maxTemperature, observation.maxTemperatureTenthsC);
    include(minTemperature, observation.minTemperatureTenthsC);
    include(precipitation, observation.precipitationTenthsMm);
    if (observation.maxTemperatureTenthsC !== null && observation.minTemperatureTenthsC !== null) {
      recordsWithTemperature += 1;
    }
  }

  const totalRecords = observations.length;
  return {
    stationId,
    year,
    avgMaxTemperatureTenthsC: mean(maxTemperature),
    minMaxTemperatureTenthsC: maxTemperature.min,
    maxMaxTemperatureTenthsC: maxTemperature.max,
    avgMinTemperatureTenthsC: mean(minTemperature),
    minMinTemperatureTenthsC: minTemperature.min,
    maxMinTemperatureTenthsC: minTemperature.max,
    totalPrecipitationTenthsMm: precipitation.count === 0 ? null : precipitation.sum,
    avgPrecipitationTenthsMm: mean(precipitation),
    maxPrecipitationTenthsMm: precipitation.max,
    totalRecords,
    recordsWithTemperature,
    recordsWithPrecipitation: precipitation.count,
    temperatureCompletenessPct: completenessPercentage(recordsWithTemperature, totalRecords),
    precipitationCompletenessPct: completenessPercentage(precipitation.count, totalRecords)
  };
}
