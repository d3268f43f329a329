#!/usr/bin/env node
/**
 * Pricewatch CLI
 *
 * Commands:
 * - pricewatch summarize [input]   - Compute the marketplace pricing summary
 */

import { Command, InvalidArgumentError } from 'commander';
import { ZodError } from 'zod';
import { loadConfig, toEngineOptions } from '../utils/config';
import { logger } from '../utils/logger';
import { runSummarize } from '../commands/summarize';
import { serializeSummary } from '../export/writer';
import { PricewatchError } from '../errors';

const program = new Command();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
  process.exit(1);
});

function parseIntOption(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function reportFailure(err: unknown): void {
  if (err instanceof PricewatchError) {
    logger.error({ code: err.code, cause: err.cause }, err.message);
    console.error(`\n  \x1b[31m✗\x1b[0m ${err.message}\n`);
  } else if (err instanceof ZodError) {
    logger.error({ issues: err.issues }, 'Invalid configuration');
    console.error(`\n  \x1b[31m✗\x1b[0m Invalid configuration: ${err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}\n`);
  } else {
    logger.error({ err }, 'Summary run failed');
    console.error(`\n  \x1b[31m✗\x1b[0m ${err instanceof Error ? err.message : String(err)}\n`);
  }
}

program
  .name('pricewatch')
  .description('Price normalization and gouging detection for marketplace catalog snapshots')
  .version('0.1.0');

// ============================================================================
// summarize - Compute the summary artifact
// ============================================================================
program
  .command('summarize')
  .description('Summarize a catalog snapshot into per-SKU, per-seller and per-category pricing signals')
  .argument('[input]', 'Catalog snapshot (JSON array of product families)')
  .option('-o, --output <file>', 'Summary output file')
  .option('--top <n>', 'Number of top gouged offers to keep', parseIntOption)
  .option('--shards <n>', 'Split families into n shards before merging', parseIntOption)
  .option('--stdout', 'Print the summary JSON instead of writing a file')
  .action(async (input: string | undefined, options: { output?: string; top?: number; shards?: number; stdout?: boolean }) => {
    try {
      const config = loadConfig();
      const engine = toEngineOptions(config);
      if (options.top !== undefined) engine.topN = options.top;
      if (options.shards !== undefined) engine.shardCount = Math.max(1, options.shards);

      const summary = await runSummarize({
        inputFile: input ?? config.inputFile,
        outputFile: options.stdout ? undefined : options.output ?? config.outputFile,
        engine,
      });

      if (options.stdout) {
        process.stdout.write(serializeSummary(summary));
        return;
      }

      console.log(`\n  \x1b[32m✓\x1b[0m Summary written: ${options.output ?? config.outputFile}`);
      console.log(`  \x1b[32m✓\x1b[0m Total products: ${summary.total_products}`);
      console.log(`  \x1b[32m✓\x1b[0m Total SKUs: ${summary.total_skus}`);
      console.log(`  \x1b[32m✓\x1b[0m Marketplace health score: ${summary.marketplace_health_score}\n`);
    } catch (err) {
      reportFailure(err);
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((err: unknown) => {
  reportFailure(err);
  process.exitCode = 1;
});
