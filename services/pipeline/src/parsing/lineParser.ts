import type { DailyObservation, ObservationDate } from '../types';
import { MISSING_VALUE_SENTINEL, formatTenths, tenthsToCelsius, tenthsToMillimeters } from '../units';

export const rejectionCodes = [
  'field_count',
  'invalid_date',
  'invalid_number',
  'temperature_inversion',
  'negative_precipitation'
] as const;

export type RejectionCode = (typeof rejectionCodes)[number];

export type LineRejection = {
  code: RejectionCode;
  reason: string;
  lineNumber: number;
};

export type ParsedObservation = Omit<DailyObservation, 'stationId'>;

export type ParseOutcome =
  | { ok: true; observation: ParsedObservation }
  | { ok: false; rejection: LineRejection };

const EXPECTED_FIELDS = 4;
const DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;
const INTEGER_PATTERN = /^[-+]?\d+$/;
// observation columns are int4
const INT4_MIN = -2147483648;
const INT4_MAX = 2147483647;

type NumericField = 'max_temp' | 'min_temp' | 'precipitation';

function reject(code: RejectionCode, reason: string, lineNumber: number): ParseOutcome {
  return { ok: false, rejection: { code, reason, lineNumber } };
}

export function parseObservationDate(raw: string): ObservationDate | null {
  const match = DATE_PATTERN.exec(raw);
  if (!match) {
    return null;
  }
  const [, yearText, monthText, dayText] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  // no year zero in the proleptic calendar the date columns use
  if (year === 0) {
    return null;
  }

  // Feb 30 rolls over into March; a round trip catches it. setUTCFullYear
  // keeps years below 100 literal where Date.UTC would map them to 19xx.
  const candidate = new Date(0);
  candidate.setUTCFullYear(year, month - 1, day);
  if (
    candidate.getUTCFullYear() !== year ||
    candidate.getUTCMonth() !== month - 1 ||
    candidate.getUTCDate() !== day
  ) {
    return null;
  }
  return `${yearText}-${monthText}-${dayText}`;
}

type NumericResult = { ok: true; value: number | null } | { ok: false };

function parseTenths(raw: string): NumericResult {
  if (!INTEGER_PATTERN.test(raw)) {
    return { ok: false };
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value) || value < INT4_MIN || value > INT4_MAX) {
    return { ok: false };
  }
  return { ok: true, value: value === MISSING_VALUE_SENTINEL ? null : value };
}

/**
 * Parses one `YYYYMMDD max min precip` line. Malformed input always comes
 * back as a rejection outcome.
 */
export function parseObservationLine(line: string, lineNumber: number): ParseOutcome {
  const fields = line.trim().split(/\s+/).filter((field) => field.length > 0);
  if (fields.length !== EXPECTED_FIELDS) {
    return reject('field_count', `expected ${EXPECTED_FIELDS} fields, got ${fields.length}`, lineNumber);
  }

  const [dateText, maxText, minText, precipText] = fields;
  const date = parseObservationDate(dateText);
  if (!date) {
    return reject('invalid_date', `Invalid date '${dateText}'`, lineNumber);
  }

  const values: Record<NumericField, number | null> = { max_temp: null, min_temp: null, precipitation: null };
  const rawValues: [NumericField, string][] = [
    ['max_temp', maxText],
    ['min_temp', minText],
    ['precipitation', precipText]
  ];
  for (const [field, raw] of rawValues) {
    const parsed = parseTenths(raw);
    if (!parsed.ok) {
      return reject('invalid_number', `Invalid ${field} value '${raw}'`, lineNumber);
    }
    values[field] = parsed.value;
  }

  const { max_temp: maxTemp, min_temp: minTemp, precipitation } = values;
  if (maxTemp !== null && minTemp !== null && maxTemp < minTemp) {
    return reject(
      'temperature_inversion',
      `Max temp (${formatTenths(maxTemp)}) < Min temp (${formatTenths(minTemp)})`,
      lineNumber
    );
  }

  if (precipitation !== null && precipitation < 0) {
    return reject('negative_precipitation', `Negative precipitation (${formatTenths(precipitation)})`, lineNumber);
  }

  return {
    ok: true,
    observation: {
      date,
      maxTemperatureTenthsC: maxTemp,
      minTemperatureTenthsC: minTemp,
      precipitationTenthsMm: precipitation
    }
  };
}

export type MetricObservation = {
  date: ObservationDate;
  maxTemperatureC: number | null;
  minTemperatureC: number | null;
  precipitationMm: number | null;
};

export function toMetricObservation(observation: ParsedObservation): MetricObservation {
  return {
    date: observation.date,
    maxTemperatureC: tenthsToCelsius(observation.maxTemperatureTenthsC),
    minTemperatureC: tenthsToCelsius(observation.minTemperatureTenthsC),
    precipitationMm: tenthsToMillimeters(observation.precipitationTenthsMm)
  };
}
