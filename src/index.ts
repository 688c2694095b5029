export * from './types/data';
export * from './errors';
export { DEFAULT_CONFIG, ZERO_SALES_POLICIES, resolveConfig } from './config';
export type { PipelineConfig, PipelineOptions, ZeroSalesPolicy } from './config';
export { innerJoin, mergeSalesTables, toSalesRecords, MERGED_COLUMNS } from './engine/merge';
export type { JoinOptions } from './engine/merge';
export {
  sortByDateWithinGroup,
  rollingMean,
  lag,
  withWindowFeatures,
  aggregateDaily,
  WINDOW_SIZE,
  MIN_PERIODS,
  LAG_OFFSET,
} from './engine/windows';
export type { DailyTotal, Windowed } from './engine/windows';
export { computeFeatures } from './engine/features';
export { scoreAccuracy, isComplete } from './engine/wmape';
export type { AccuracyScore, ScoreOptions } from './engine/wmape';
export { runPipeline, sortFeatures, rankWorstGroups } from './engine/pipeline';
export type { PipelineResult, PipelineStats } from './engine/pipeline';
export { filterByDateRange, isIsoDate } from './utils/date-range';
export { parseTable, loadSourceTables } from './utils/csv-parser';
export { featuresToCsv, wmapeToCsv, writeCsv } from './utils/csv-writer';
export { runFromFiles } from './run';
export { createLogger, setLogLevel } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';
