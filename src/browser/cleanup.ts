import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Runs a release step on an error path; its own failure is only logged so
 * the original error still reaches the caller
 */
export async function releaseQuietly(what: string, release: () => Promise<void>): Promise<void> {
  try {
    await release();
  } catch (error) {
    logger.warn(`Error releasing ${what}: ${describeError(error)}`);
  }
}
