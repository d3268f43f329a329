/**
 * Summary writer
 *
 * The artifact is written to a sibling temp file and renamed into place, so
 * readers never see a half-written summary.
 */

import { promises as fs } from 'fs';
import path from 'path';
import crypto from 'crypto';
import { createLogger } from '../utils/logger';
import { OutputWriteError } from '../errors';
import type { MarketplaceSummary } from '../types';

const logger = createLogger('writer');

export function serializeSummary(summary: MarketplaceSummary): string {
  return JSON.stringify(summary, null, 4) + '\n';
}

export async function writeSummary(summary: MarketplaceSummary, outputPath: string): Promise<void> {
  const dir = path.dirname(outputPath);
  const tmpPath = path.join(dir, `.${path.basename(outputPath)}.${crypto.randomBytes(4).toString('hex')}.tmp`);

  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(tmpPath, serializeSummary(summary), 'utf-8');
    await fs.rename(tmpPath, outputPath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw new OutputWriteError(outputPath, err);
  }

  logger.info({ path: outputPath }, 'Summary written');
}
