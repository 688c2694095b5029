import type { PipelineConfig } from './config';
import { runPipeline, type PipelineResult } from './engine/pipeline';
import { loadSourceTables } from './utils/csv-parser';
import { featuresToCsv, wmapeToCsv, writeCsv } from './utils/csv-writer';
import { createLogger } from './utils/logger';

const logger = createLogger('run');

/** Load the four CSVs from `dataDir`, run the pipeline, then write both outputs. */
export async function runFromFiles(config: PipelineConfig): Promise<PipelineResult> {
  const tables = await loadSourceTables(config.dataDir);
  const result = runPipeline(tables, config);

  await writeCsv(config.featuresOut, featuresToCsv(result.features));
  logger.info(`First output written to: ${config.featuresOut}`);
  await writeCsv(config.wmapeOut, wmapeToCsv(result.wmape));
  logger.info(`Second output written to: ${config.wmapeOut}`);

  return result;
}
