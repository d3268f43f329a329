/**
 * Pricewatch errors
 *
 * Per-record problems (unparseable prices, variants without an asin) are not
 * errors: they are absorbed where they occur and counted in the summary.
 * Only failures that make the whole run meaningless are thrown.
 */

export type PricewatchErrorCode = 'SOURCE_UNAVAILABLE' | 'OUTPUT_FAILED';

export class PricewatchError extends Error {
  readonly code: PricewatchErrorCode;

  constructor(code: PricewatchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PricewatchError';
    this.code = code;
  }
}

/**
 * The snapshot could not be read or is not a catalog. Fatal: no output is written.
 */
export class SourceUnavailableError extends PricewatchError {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super('SOURCE_UNAVAILABLE', `Snapshot unavailable (${path}): ${reason}`, { cause });
    this.name = 'SourceUnavailableError';
    this.path = path;
  }
}

/**
 * The summary could not be written.
 */
export class OutputWriteError extends PricewatchError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('OUTPUT_FAILED', `Failed to write summary to ${path}`, { cause });
    this.name = 'OutputWriteError';
    this.path = path;
  }
}
