/**
 * Batch report written after a run
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { BatchResult, BatchSummary } from '../types/index.js';

export interface BatchReport {
  mode: string;
  source: string;
  finishedAt: string;
  summary: BatchSummary;
  results: BatchResult[];
  placeErrors?: Array<{ place: string; error: string }>;
}

export async function writeBatchReport(
  report: BatchReport,
  outputDir: string,
  fileName: string = config.output.reportFile
): Promise<string> {
  const reportPath = path.join(outputDir, fileName);
  await mkdir(outputDir, { recursive: true });
  await writeFile(reportPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');

  logger.info({ reportPath }, 'Batch report written');
  return reportPath;
}
