import { z } from 'zod';
import { ConfigError } from './errors';
import { isIsoDate } from './utils/date-range';
import { LOG_LEVELS } from './utils/logger';

export const ZERO_SALES_POLICIES = ['exclude', 'fail'] as const;
export type ZeroSalesPolicy = (typeof ZERO_SALES_POLICIES)[number];

const isoDate = z.string().trim().refine(isIsoDate, { message: 'expected a calendar date as YYYY-MM-DD' });

export const configSchema = z
  .object({
    minDate: isoDate,
    maxDate: isoDate,
    top: z.coerce.number().int().positive(),
    dataDir: z.string().min(1),
    featuresOut: z.string().min(1),
    wmapeOut: z.string().min(1),
    onZeroSales: z.enum(ZERO_SALES_POLICIES),
    logLevel: z.enum(LOG_LEVELS),
  })
  .refine(c => c.minDate <= c.maxDate, { message: 'minDate must not be after maxDate', path: ['minDate'] });

export type PipelineConfig = z.infer<typeof configSchema>;

/** The subset of configuration the in-memory pipeline reads. */
export type PipelineOptions = Pick<PipelineConfig, 'minDate' | 'maxDate' | 'top' | 'onZeroSales'>;

export const DEFAULT_CONFIG: PipelineConfig = {
  minDate: '2021-01-08',
  maxDate: '2021-05-30',
  top: 5,
  dataDir: './data',
  featuresOut: 'features.csv',
  wmapeOut: 'mapes.csv',
  onZeroSales: 'exclude',
  logLevel: 'info',
};

/** Overlay defined values onto the defaults and validate the result. */
export function resolveConfig(overrides: Readonly<Record<string, unknown>> = {}): PipelineConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join('.') || 'config'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return result.data;
}
