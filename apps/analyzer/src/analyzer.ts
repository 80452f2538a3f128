import path from 'path';
import type { Logger } from 'winston';
import type { MatchDocument, MatchRecord, MatchStats, PhasePolicy } from '@match-digest/shared-types';
import { MatchParser } from './data/match-parser.js';
import { StatsAggregator } from './data/stats-aggregator.js';
import { buildMatchDocument } from './report/document-builder.js';
import { createMatchLogger } from './utils/logger.js';

export interface AnalyzerOptions {
  /** Overrides the preset chosen from the match type */
  phasePolicy?: PhasePolicy;
  partnershipBreakdownMinRuns?: number;
}

export interface MatchAnalysis {
  stats: MatchStats;
  document: MatchDocument;
}

/**
 * Parse, aggregate and render one match at a time
 */
export class MatchAnalyzer {
  private logger: Logger;
  private options: AnalyzerOptions;

  constructor(logger: Logger, options: AnalyzerOptions = {}) {
    this.logger = logger;
    this.options = options;
  }

  /**
   * Analyze an already-decoded match structure
   */
  analyze(raw: unknown, filename: string): MatchAnalysis {
    const matchId = path.basename(filename, path.extname(filename));
    return this.analyzeRecord(MatchParser.parse(raw, matchId), filename);
  }

  analyzeFile(filePath: string): MatchAnalysis {
    return this.analyzeRecord(MatchParser.parseMatchFile(filePath), path.basename(filePath));
  }

  private analyzeRecord(record: MatchRecord, filename: string): MatchAnalysis {
    const logger = createMatchLogger(this.logger, record.matchId);
    const stats = StatsAggregator.aggregateMatch(record, {
      phasePolicy: this.options.phasePolicy,
      logger,
    });
    const document = buildMatchDocument(stats, filename, {
      partnershipBreakdownMinRuns: this.options.partnershipBreakdownMinRuns,
    });

    logger.info('Match analyzed', {
      teams: record.teams.join(' vs '),
      innings: stats.innings.length,
      warnings: stats.warnings.length,
    });

    return { stats, document };
  }
}
