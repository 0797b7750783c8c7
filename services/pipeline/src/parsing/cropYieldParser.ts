import { MAX_YEAR, MIN_YEAR } from '../config/jobConfig';

export const cropYieldRejectionCodes = [
  'field_count',
  'invalid_year',
  'year_out_of_range',
  'invalid_yield',
  'negative_yield'
] as const;

export type CropYieldRejectionCode = (typeof cropYieldRejectionCodes)[number];

export type CropYieldRejection = {
  code: CropYieldRejectionCode;
  reason: string;
  lineNumber: number;
};

export type ParsedCropYield = {
  year: number;
  yieldValue: number;
};

export type CropYieldParseOutcome =
  | { ok: true; record: ParsedCropYield }
  | { ok: false; rejection: CropYieldRejection };

const EXPECTED_FIELDS = 2;
const INTEGER_PATTERN = /^[-+]?\d+$/;

function reject(code: CropYieldRejectionCode, reason: string, lineNumber: number): CropYieldParseOutcome {
  return { ok: false, rejection: { code, reason, lineNumber } };
}

function parseInteger(raw: string): number | null {
  if (!INTEGER_PATTERN.test(raw)) {
    return null;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) ? value : null;
}

/** Parses one `YEAR YIELD` line; yields are whole units, typically thousand metric tons. */
export function parseCropYieldLine(line: string, lineNumber: number): CropYieldParseOutcome {
  const fields = line.trim().split(/\s+/).filter((field) => field.length > 0);
  if (fields.length !== EXPECTED_FIELDS) {
    return reject('field_count', `expected ${EXPECTED_FIELDS} fields, got ${fields.length}`, lineNumber);
  }

  const [yearText, yieldText] = fields;
  const year = parseInteger(yearText);
  if (year === null) {
    return reject('invalid_year', `Invalid year '${yearText}'`, lineNumber);
  }
  if (year < MIN_YEAR || year > MAX_YEAR) {
    return reject('year_out_of_range', `Year ${year} is outside ${MIN_YEAR}-${MAX_YEAR}`, lineNumber);
  }

  const yieldValue = parseInteger(yieldText);
  if (yieldValue === null) {
    return reject('invalid_yield', `Invalid yield value '${yieldText}'`, lineNumber);
  }
  if (yieldValue < 0) {
    return reject('negative_yield', `Negative yield value (${yieldValue})`, lineNumber);
  }

  return { ok: true, record: { year, yieldValue } };
}
