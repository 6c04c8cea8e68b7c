/**
 * Outcome counts read from an Allure results directory
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

export const RESULT_STATUSES = ['passed', 'failed', 'broken', 'skipped', 'unknown'] as const;

export type ResultStatus = typeof RESULT_STATUSES[number];

export type ResultStats = Record<ResultStatus, number>;

const RESULT_FILE_SUFFIX = '-result.json';

const resultFileSchema = z.object({
  status: z.string().optional(),
});

function isResultStatus(value: string): value is ResultStatus {
  return RESULT_STATUSES.some((status) => status === value);
}

/**
 * Count test results by status. Each `*-result.json` file is one test result;
 * statuses outside the known set count as unknown.
 */
export async function collectResultStats(resultsDir: string): Promise<ResultStats> {
  const stats: ResultStats = { passed: 0, failed: 0, broken: 0, skipped: 0, unknown: 0 };
  const entries = await fs.promises.readdir(resultsDir, { withFileTypes: true });

  for (const entry of entries) {
    if (!entry.isFile() || !entry.name.endsWith(RESULT_FILE_SUFFIX)) continue;

    try {
      const raw = await fs.promises.readFile(path.join(resultsDir, entry.name), 'utf-8');
      const { status } = resultFileSchema.parse(JSON.parse(raw));
      stats[status && isResultStatus(status) ? status : 'unknown']++;
    } catch (error) {
      console.warn(
        `[ReportUpload:Stats] Skipping ${entry.name}:`,
        error instanceof Error ? error.message : error,
      );
    }
  }

  return stats;
}
