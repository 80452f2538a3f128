/**
 * Match Statistics Aggregator
 */

import type { Logger } from 'winston';
import type { InningsStats, MatchRecord, MatchStats, MatchTotals, PhasePolicy } from '@match-digest/shared-types';
import { InningsAggregator } from './innings-aggregator.js';
import { resolvePhasePolicy } from './phases.js';
import { createSilentLogger } from '../utils/logger.js';

export interface AggregationOptions {
  phasePolicy?: PhasePolicy;
  logger?: Logger;
}

export class StatsAggregator {
  /**
   * Aggregate every innings of a match, in order, each with its own state
   */
  static aggregateMatch(record: MatchRecord, options: AggregationOptions = {}): MatchStats {
    const logger = options.logger ?? createSilentLogger();
    const phasePolicy = resolvePhasePolicy(record.matchType, options.phasePolicy);
    const knownPlayers = StatsAggregator.collectSquads(record);

    const innings = record.innings.map((entry) =>
      InningsAggregator.aggregate(entry, {
        ballsPerOver: record.ballsPerOver,
        phasePolicy,
        knownPlayers,
        logger,
      })
    );

    return {
      record,
      phasePolicy,
      innings,
      totals: StatsAggregator.aggregateTotals(innings),
      warnings: innings.flatMap((entry) => entry.warnings),
    };
  }

  /**
   * Every player named in either squad, or null when the match lists none
   */
  static collectSquads(record: MatchRecord): Set<string> | null {
    const names = new Set<string>();
    for (const squad of Object.values(record.players)) {
      for (const player of squad) {
        names.add(player);
      }
    }
    return names.size > 0 ? names : null;
  }

  static aggregateTotals(innings: readonly InningsStats[]): MatchTotals {
    const totals: MatchTotals = { runs: 0, wickets: 0, fours: 0, sixes: 0, extras: 0, balls: 0 };

    for (const entry of innings) {
      totals.runs += entry.totals.runs;
      totals.wickets += entry.totals.wickets;
      totals.fours += entry.totals.fours;
      totals.sixes += entry.totals.sixes;
      totals.extras += entry.totals.extras.total;
      totals.balls += entry.totals.balls;
    }

    return totals;
  }
}
