import path from 'node:path';
import { z } from 'zod';
import { LOG_FORMATS, LOG_LEVELS, formatIssue, formatIssues } from '@wxdata/shared';
import { JobConfigError } from '../errors';
import type { LoggingConfig } from './serviceConfig';

export const MIN_YEAR = 1800;
export const MAX_YEAR = 2100;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const flag = z.boolean().default(false);
const yearOption = z.coerce.number().int().min(MIN_YEAR).max(MAX_YEAR).optional();
const optionalPath = z
  .string()
  .trim()
  .min(1)
  .optional()
  .transform((value) => (value ? path.resolve(value) : null));

const loggingOverridesSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).optional(),
  logFormat: z.enum(LOG_FORMATS).optional(),
  logFile: z.string().trim().min(1).optional()
});

export const ingestionOptionsSchema = loggingOverridesSchema
  .extend({
    dataDir: z.string().trim().min(1).default('wx_data'),
    pattern: z.string().trim().min(1).default('*.txt'),
    batchSize: positiveInt(1000),
    progressInterval: positiveInt(1000),
    clear: flag,
    dryRun: flag,
    metricsFile: optionalPath,
    json: flag
  })
  .transform((options) => ({
    dataDir: path.resolve(options.dataDir),
    pattern: options.pattern,
    batchSize: options.batchSize,
    progressInterval: options.progressInterval,
    clearExisting: options.clear,
    dryRun: options.dryRun,
    metricsFile: options.metricsFile,
    json: options.json,
    logging: pickLogging(options)
  }));

export const aggregationOptionsSchema = loggingOverridesSchema
  .extend({
    year: yearOption,
    startYear: yearOption,
    endYear: yearOption,
    station: z.string().trim().min(1).optional(),
    batchSize: positiveInt(100),
    progressInterval: positiveInt(10),
    clear: flag,
    forceRecompute: flag,
    dryRun: flag,
    metricsFile: optionalPath,
    json: flag
  })
  .superRefine((options, ctx) => {
    if (options.year !== undefined && (options.startYear !== undefined || options.endYear !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['year'],
        message: 'cannot be combined with startYear/endYear'
      });
    }
    if (options.startYear !== undefined && options.endYear !== undefined && options.startYear > options.endYear) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['startYear'],
        message: `Start year (${options.startYear}) cannot be after end year (${options.endYear})`
      });
    }
  })
  .transform((options) => ({
    filter: {
      stationId: options.station,
      year: options.year,
      startYear: options.startYear,
      endYear: options.endYear
    },
    batchSize: options.batchSize,
    progressInterval: options.progressInterval,
    clearExisting: options.clear,
    forceRecompute: options.forceRecompute,
    dryRun: options.dryRun,
    metricsFile: options.metricsFile,
    json: options.json,
    logging: pickLogging(options)
  }));

const seriesLabel = z
  .string()
  .trim()
  .min(1)
  .regex(/^[A-Za-z0-9_]+$/, 'may only contain letters, digits and underscores');

export const cropYieldOptionsSchema = loggingOverridesSchema
  .extend({
    dataFile: z.string().trim().min(1).default('yld_data/US_corn_grain_yield.txt'),
    cropType: seriesLabel.default('corn_grain'),
    country: seriesLabel.default('US'),
    state: z.string().trim().default(''),
    unit: seriesLabel.default('thousand_metric_tons'),
    batchSize: positiveInt(1000),
    progressInterval: positiveInt(1000),
    clear: flag,
    dryRun: flag,
    metricsFile: optionalPath,
    json: flag
  })
  .transform((options) => ({
    dataFile: path.resolve(options.dataFile),
    series: {
      cropType: options.cropType,
      country: options.country,
      state: options.state,
      unit: options.unit,
      source: path.basename(options.dataFile)
    },
    batchSize: options.batchSize,
    progressInterval: options.progressInterval,
    clearExisting: options.clear,
    dryRun: options.dryRun,
    metricsFile: options.metricsFile,
    json: options.json,
    logging: pickLogging(options)
  }));

export const commonOptionsSchema = loggingOverridesSchema
  .extend({
    json: flag
  })
  .transform((options) => ({
    json: options.json,
    logging: pickLogging(options)
  }));

export type LoggingOverrides = Partial<LoggingConfig>;
export type CommonOptions = z.output<typeof commonOptionsSchema>;
export type IngestionConfig = z.output<typeof ingestionOptionsSchema>;
export type AggregationConfig = z.output<typeof aggregationOptionsSchema>;
export type CropYieldConfig = z.output<typeof cropYieldOptionsSchema>;

function pickLogging(options: z.output<typeof loggingOverridesSchema>): LoggingOverrides {
  const overrides: LoggingOverrides = {};
  if (options.logLevel) {
    overrides.level = options.logLevel;
  }
  if (options.logFormat) {
    overrides.format = options.logFormat;
  }
  if (options.logFile) {
    overrides.file = path.resolve(options.logFile);
  }
  return overrides;
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, job: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
    throw new JobConfigError(formatIssues(`[wxdata:${job}] Invalid options`, issues), issues.map(formatIssue));
  }
  return result.data;
}

export function parseIngestionOptions(raw: unknown): IngestionConfig {
  return parseWith(ingestionOptionsSchema, raw, 'ingest');
}

export function parseAggregationOptions(raw: unknown): AggregationConfig {
  return parseWith(aggregationOptionsSchema, raw, 'aggregate');
}

export function parseCropYieldOptions(raw: unknown): CropYieldConfig {
  return parseWith(cropYieldOptionsSchema, raw, 'ingest-yield');
}

export function parseCommonOptions(raw: unknown, job: string): CommonOptions {
  return parseWith(commonOptionsSchema, raw, job);
}

export function resolveLoggingConfig(base: LoggingConfig, overrides: LoggingOverrides): LoggingConfig {
  return { ...base, ...overrides };
}
