/**
 * Analysis Writer
 * Validates an Analysis against its schema and saves it to disk
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { contentHash } from '@/utils/hash';
import { createChildLogger } from '@/utils/logger';
import { validateAnalysis } from '@/validation/ajv_instance';
import type { Analysis } from '@/types/analysis';

const logger = createChildLogger('analysis_writer');

export interface WriteResult {
  runId: string;
  filePath: string;
  contentHash: string;
}

export class AnalysisValidationError extends Error {
  constructor(public errors: string[]) {
    super(`Analysis failed schema validation: ${errors.join('; ')}`);
    this.name = 'AnalysisValidationError';
  }
}

function resolveRunsDir(outputDir?: string): string {
  if (!outputDir) return join(process.cwd(), 'data', 'runs');
  return isAbsolute(outputDir) ? outputDir : join(process.cwd(), outputDir);
}

export function writeAnalysis(analysis: Analysis, outputDir?: string): WriteResult {
  const validation = validateAnalysis(analysis);
  if (!validation.valid) {
    throw new AnalysisValidationError(validation.errors ?? []);
  }

  const runsDir = resolveRunsDir(outputDir);
  if (!existsSync(runsDir)) {
    mkdirSync(runsDir, { recursive: true });
  }

  const filePath = join(runsDir, `${analysis.runId}.json`);
  const hash = contentHash(analysis);

  writeFileSync(filePath, JSON.stringify(analysis, null, 2), 'utf-8');
  logger.info({ runId: analysis.runId, filePath }, 'Analysis written');

  return { runId: analysis.runId, filePath, contentHash: hash };
}
