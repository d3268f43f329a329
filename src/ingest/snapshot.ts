/**
 * Snapshot loading
 *
 * Reads the whole catalog snapshot up front. Anything that prevents reading a
 * structurally valid catalog is a SourceUnavailableError; a missing or corrupt
 * file is never treated as an empty catalog.
 */

import { promises as fs } from 'fs';
import { createLogger } from '../utils/logger';
import { isRecord } from '../utils/fields';
import { SourceUnavailableError } from '../errors';
import { snapshotSchema } from './schema';
import type { ProductFamily } from '../types';

const logger = createLogger('snapshot');

export function parseSnapshot(text: string, source = '<memory>'): ProductFamily[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new SourceUnavailableError(source, 'not valid JSON', err);
  }

  const result = snapshotSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new SourceUnavailableError(
      source,
      `not a catalog snapshot${where}: ${issue?.message ?? 'invalid structure'}`,
      result.error,
    );
  }
  return result.data;
}

export async function loadSnapshot(path: string): Promise<ProductFamily[]> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf-8');
  } catch (err) {
    const reason = isRecord(err) && err.code === 'ENOENT' ? 'file not found' : 'file could not be read';
    throw new SourceUnavailableError(path, reason, err);
  }

  const families = parseSnapshot(text, path);
  logger.info({ path, families: families.length }, 'Snapshot loaded');
  return families;
}
