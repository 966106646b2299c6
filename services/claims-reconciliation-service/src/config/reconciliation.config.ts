import { z } from 'zod';
import { createLogger, Logger, LogLevel } from '@claims-recon/shared';
import { ConfigurationError } from '../domain/errors';

export const RECONCILIATION_CONFIG = Symbol('RECONCILIATION_CONFIG');

export interface ReconciliationConfig {
  serviceName: string;
  logLevel: LogLevel;
  prettyLogs: boolean;
  jaegerEndpoint?: string;
  /** Effective date used when no contributing coverage record carries a timestamp. */
  coverageEpochFloor: Date;
  validDateRange: { min: Date; max: Date };
  amountLimit: number;
  decimalErrorFactor: number;
  maxDaysToPayment: number;
  database: {
    host: string;
    port: number;
    username: string;
    password: string;
    database: string;
    synchronize: boolean;
  };
}

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .transform((value) => new Date(`${value}T00:00:00.000Z`));

const flag = z.enum(['true', 'false']).transform((value) => value === 'true');

const envSchema = z
  .object({
    SERVICE_NAME: z.string().min(1).default('claims-reconciliation-service'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LOG_PRETTY: flag.optional(),
    NODE_ENV: z.string().optional(),
    JAEGER_ENDPOINT: z.string().url().optional(),
    COVERAGE_EPOCH_FLOOR: isoDate.default('2020-01-01'),
    VALID_DATE_MIN: isoDate.default('2020-01-01'),
    VALID_DATE_MAX: isoDate.default('2030-12-31'),
    AMOUNT_MAX: z.coerce.number().positive().default(10000),
    DECIMAL_ERROR_FACTOR: z.coerce.number().positive().default(10),
    MAX_DAYS_TO_PAYMENT: z.coerce.number().int().positive().default(365),
    DB_HOST: z.string().default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_USER: z.string().default('postgres'),
    DB_PASSWORD: z.string().default('postgres'),
    DB_NAME: z.string().default('postgres'),
    DB_SYNC: flag.default('false'),
  })
  .refine((env) => env.VALID_DATE_MIN.getTime() <= env.VALID_DATE_MAX.getTime(), {
    message: 'must not be after VALID_DATE_MAX',
    path: ['VALID_DATE_MIN'],
  });

export function loadReconciliationConfig(env: NodeJS.ProcessEnv = process.env): ReconciliationConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = parsed.data;
  const quiet = values.LOG_LEVEL === 'silent' || values.NODE_ENV === 'production' || values.NODE_ENV === 'test';

  return {
    serviceName: values.SERVICE_NAME,
    logLevel: values.LOG_LEVEL,
    prettyLogs: values.LOG_PRETTY ?? !quiet,
    jaegerEndpoint: values.JAEGER_ENDPOINT,
    coverageEpochFloor: values.COVERAGE_EPOCH_FLOOR,
    validDateRange: { min: values.VALID_DATE_MIN, max: values.VALID_DATE_MAX },
    amountLimit: values.AMOUNT_MAX,
    decimalErrorFactor: values.DECIMAL_ERROR_FACTOR,
    maxDaysToPayment: values.MAX_DAYS_TO_PAYMENT,
    database: {
      host: values.DB_HOST,
      port: values.DB_PORT,
      username: values.DB_USER,
      password: values.DB_PASSWORD,
      database: values.DB_NAME,
      synchronize: values.DB_SYNC,
    },
  };
}

export const createReconciliationLogger = (config: ReconciliationConfig, component: string): Logger =>
  createLogger({
    serviceName: config.serviceName,
    level: config.logLevel,
    prettyPrint: config.prettyLogs,
  }).child({ component });
