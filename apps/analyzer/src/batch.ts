import { mkdirSync, readdirSync, writeFileSync } from 'fs';
import path from 'path';
import type { Logger } from 'winston';
import type { MatchDocument } from '@match-digest/shared-types';
import type { MatchAnalyzer } from './analyzer.js';
import { MatchParser } from './data/match-parser.js';
import { MalformedMatchError } from './utils/errors.js';

export interface SkippedMatchFile {
  file: string;
  reason: string;
  /** Set when the record itself is malformed */
  fieldPath: string | null;
}

export interface BatchResult {
  documents: MatchDocument[];
  skipped: SkippedMatchFile[];
  warnings: number;
}

/**
 * Match files in a directory, sorted by name
 */
export function listMatchFiles(directory: string): string[] {
  return readdirSync(directory)
    .filter((file) => MatchParser.detectFormat(file) !== null)
    .sort();
}

/**
 * Analyze files one at a time. A file that fails for any reason is logged and
 * skipped; the rest of the run still produces documents.
 */
export function analyzeMatchFiles(
  analyzer: MatchAnalyzer,
  directory: string,
  files: string[],
  logger: Logger,
  onProgress?: (processed: number, total: number) => void
): BatchResult {
  const result: BatchResult = { documents: [], skipped: [], warnings: 0 };

  files.forEach((file, index) => {
    try {
      const { stats, document } = analyzer.analyzeFile(path.join(directory, file));
      if (MatchParser.hasBallByBall(stats.record)) {
        result.documents.push(document);
        result.warnings += stats.warnings.length;
      } else {
        result.skipped.push({ file, reason: 'no ball-by-ball data', fieldPath: null });
        logger.warn('Skipping match without ball-by-ball data', { file });
      }
    } catch (error) {
      const skipped: SkippedMatchFile =
        error instanceof MalformedMatchError
          ? { file, reason: error.reason, fieldPath: error.fieldPath }
          : { file, reason: error instanceof Error ? error.message : String(error), fieldPath: null };
      result.skipped.push(skipped);
      logger.error('Skipping match file', skipped);
    }

    onProgress?.(index + 1, files.length);
  });

  return result;
}

/**
 * One JSON line per document
 */
export function writeMatchDocuments(outputPath: string, documents: MatchDocument[]): void {
  mkdirSync(path.dirname(outputPath), { recursive: true });
  const lines = documents.map((document) => `${JSON.stringify(document)}\n`);
  writeFileSync(outputPath, lines.join(''), 'utf-8');
}
