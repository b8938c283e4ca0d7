/**
 * Process exit codes
 */

import type { BatchSummary } from '../types/index.js';

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  partial: 2,
  interrupted: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * 0 when everything succeeded, 1 when nothing did (or nothing ran),
 * 2 for a mix
 */
export function exitCodeFor(summary: Pick<BatchSummary, 'succeeded' | 'failed'>): ExitCode {
  if (summary.succeeded === 0) {
    return EXIT_CODES.failure;
  }
  return summary.failed === 0 ? EXIT_CODES.success : EXIT_CODES.partial;
}
