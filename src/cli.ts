import { Command } from 'commander';
import { DEFAULT_CONFIG, ZERO_SALES_POLICIES, resolveConfig, type PipelineConfig } from './config';
import { LOG_LEVELS, setLogLevel } from './utils/logger';

export type Runner = (config: PipelineConfig) => Promise<unknown>;

export function createProgram(run: Runner): Command {
  const program = new Command();

  program
    .name('sales-features')
    .description('Derive rolling and lag sales features and report the groups the 7-day mean forecasts worst')
    .option('--min-date <date>', 'first date to include (YYYY-MM-DD)', DEFAULT_CONFIG.minDate)
    .option('--max-date <date>', 'last date to include (YYYY-MM-DD)', DEFAULT_CONFIG.maxDate)
    .option('--top <n>', 'number of rows in the WMAPE output', String(DEFAULT_CONFIG.top))
    .option('--data-dir <dir>', 'directory with sales.csv, product.csv, brand.csv and store.csv', DEFAULT_CONFIG.dataDir)
    .option('--features-out <file>', 'features output file', DEFAULT_CONFIG.featuresOut)
    .option('--wmape-out <file>', 'WMAPE output file', DEFAULT_CONFIG.wmapeOut)
    .option(
      '--on-zero-sales <policy>',
      `groups with zero total sales: ${ZERO_SALES_POLICIES.join(' | ')}`,
      DEFAULT_CONFIG.onZeroSales,
    )
    .option('--log-level <level>', LOG_LEVELS.join(' | '), DEFAULT_CONFIG.logLevel)
    .action(async (options: Record<string, unknown>) => {
      const config = resolveConfig(options);
      setLogLevel(config.logLevel);
      await run(config);
    });

  return program;
}
