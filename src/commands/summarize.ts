/**
 * summarize - load a snapshot, compute the summary, write it.
 */

import { createLogger } from '../utils/logger';
import { loadSnapshot } from '../ingest/snapshot';
import { summarizeCatalog } from '../engine/index';
import { writeSummary } from '../export/writer';
import type { EngineOptions, MarketplaceSummary } from '../types';

const logger = createLogger('summarize');

export interface SummarizeOptions {
  inputFile: string;
  /** Omit to compute without writing an artifact. */
  outputFile?: string;
  engine: EngineOptions;
}

/**
 * Nothing is written unless the snapshot loads and the summary completes.
 */
export async function runSummarize(options: SummarizeOptions): Promise<MarketplaceSummary> {
  logger.info({ input: options.inputFile, output: options.outputFile }, 'Starting summary run');

  const families = await loadSnapshot(options.inputFile);
  const summary = summarizeCatalog(families, options.engine);

  if (options.outputFile) {
    await writeSummary(summary, options.outputFile);
  }
  return summary;
}
