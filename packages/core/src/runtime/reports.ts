/**
 * @fileoverview Report generator contract
 *
 * Statistical reports live outside this package. They are produced for a
 * finished day on rollover and on day change; failures never propagate.
 */

import { createLogger } from '../logging/index.js';

const logger = createLogger('runtime:reports');

export interface ReportGenerator {
  /** Build the report for a finished day (YYYY-MM-DD) */
  generate(dateKey: string): void | Promise<void>;
}

/**
 * Run the generator, logging any failure
 * @returns true when the report was produced
 */
export async function generateReport(generator: ReportGenerator | undefined, dateKey: string): Promise<boolean> {
  if (!generator) return false;
  try {
    await generator.generate(dateKey);
    logger.info('Report generated', { date: dateKey });
    return true;
  } catch (error) {
    logger.warn('Report generation failed', { date: dateKey, error: String(error) });
    return false;
  }
}
