import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

type IssueTarget = {
  path: (string | number)[];
  message: string;
};

export function formatIssue({ path, message }: IssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

export function formatIssues(header: string, issues: IssueTarget[]): string {
  const details = issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
  return `${header}\n${details}`;
}

/**
 * Parses `env` (a copy of `process.env` by default) with `schema`. All issues
 * are collected into a single `EnvConfigError`.
 */
export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'wxdata';

  const result = schema.safeParse(envSource);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
  throw new EnvConfigError(formatIssues(`[${context}] Invalid environment configuration`, issues), issues.map(formatIssue));
}

type BaseOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

type FieldResult<T> = { ok: true; value: T } | { ok: false; message: string };

function accept<T>(value: T): FieldResult<T> {
  return { ok: true, value };
}

function fail<T>(message: string): FieldResult<T> {
  return { ok: false, message };
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Shared shape of every variable: blank means unset, then default, then
 * required; anything else is trimmed and handed to `parse`. Issues name the
 * variable by `description`, falling back to its key.
 */
function envVar<T>(options: BaseOptions<T> | undefined, parse: (raw: string, name: string) => FieldResult<T>) {
  return z
    .union([z.string(), z.number(), z.boolean()])
    .nullable()
    .optional()
    .transform((value, ctx): T | undefined => {
      const key = ctx.path.at(-1);
      const name = options?.description ?? (key === undefined || key === '' ? 'value' : String(key));

      if (isBlank(value)) {
        if (options?.defaultValue !== undefined) {
          return options.defaultValue;
        }
        if (options?.required) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${name}` });
          return z.NEVER;
        }
        return undefined;
      }

      const result = parse(String(value).trim(), name);
      if (!result.ok) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.message });
        return z.NEVER;
      }
      return result.value;
    });
}

export type BooleanVarOptions = BaseOptions<boolean>;

export function booleanVar(options?: BooleanVarOptions) {
  return envVar(options, (raw, name) => {
    const normalized = raw.toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return accept(true);
    }
    if (FALSE_VALUES.has(normalized)) {
      return accept(false);
    }
    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    return fail(`Invalid ${name}. Accepted boolean values: ${accepted}`);
  });
}

export type IntegerVarOptions = BaseOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: IntegerVarOptions) {
  return envVar(options, (raw, name) => {
    if (!/^[-+]?\d+$/.test(raw)) {
      return fail(`Expected ${name} to be an integer`);
    }
    const parsed = Number.parseInt(raw, 10);
    if (options?.min !== undefined && parsed < options.min) {
      return fail(`${name} must be >= ${options.min}`);
    }
    if (options?.max !== undefined && parsed > options.max) {
      return fail(`${name} must be <= ${options.max}`);
    }
    return accept(parsed);
  });
}

export type StringVarOptions = BaseOptions<string> & {
  pattern?: RegExp;
};

export function stringVar(options?: StringVarOptions) {
  return envVar(options, (raw, name) =>
    options?.pattern && !options.pattern.test(raw) ? fail(`${name} does not match expected pattern`) : accept(raw)
  );
}

export type EnumVarOptions<T extends string> = BaseOptions<T>;

/** Case-insensitive match against `values`. */
export function enumVar<const T extends string>(values: readonly T[], options?: EnumVarOptions<T>) {
  return envVar<T>(options, (raw, name) => {
    const normalized = raw.toLowerCase();
    const match = values.find((candidate) => candidate === normalized);
    return match ? accept(match) : fail(`Invalid ${name}. Expected one of: ${values.join(', ')}`);
  });
}
