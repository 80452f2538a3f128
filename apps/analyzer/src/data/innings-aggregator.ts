/**
 * Innings Statistics Aggregator
 *
 * One instance walks one innings delivery by delivery and owns all of the
 * running state for it: the open partnership, batter/bowler/fielder tables,
 * the matchup table and the over in progress.
 */

import type { Logger } from 'winston';
import type {
  AnalysisWarning,
  BatterDismissal,
  BatterStat,
  BowlerStat,
  Delivery,
  DeliveryWarningCode,
  ExtrasBreakdown,
  FallOfWicket,
  Fielder,
  FielderStat,
  Innings,
  InningsStats,
  MatchupCounters,
  OverSummary,
  Partnership,
  PartnershipBowlerSplit,
  PhasePolicy,
  PlayerRole,
  UnknownPlayerReference,
  Wicket,
} from '@match-digest/shared-types';
import { DISMISSAL_RULES, UNKNOWN, type DismissalRule } from '@match-digest/constants';
import { PairTable } from './pair-table.js';
import { buildPhaseSplits, classifyOver } from './phases.js';

export interface InningsContext {
  ballsPerOver: number;
  phasePolicy: PhasePolicy;
  /** Names from both squads; null when the match lists no squads */
  knownPlayers: ReadonlySet<string> | null;
  logger: Logger;
}

interface BatterState {
  name: string;
  runs: number;
  balls: number;
  fours: number;
  sixes: number;
  dots: number;
  dismissal: BatterDismissal | null;
}

interface BowlerState {
  name: string;
  balls: number;
  maidens: number;
  runsConceded: number;
  wickets: number;
  wides: number;
  noballs: number;
  dots: number;
  fours: number;
  sixes: number;
}

interface PartnershipState {
  batters: [string, string];
  startScore: number;
  runs: number;
  balls: number;
  fours: number;
  sixes: number;
  dots: number;
  extras: number;
  vsBowlers: Map<string, Omit<PartnershipBowlerSplit, 'runRate'>>;
}

interface OverState {
  over: number;
  bowlers: Set<string>;
  runs: number;
  wickets: number;
  fours: number;
  sixes: number;
  extras: number;
  dots: number;
  balls: number;
  validBalls: number;
}

interface ScoreState {
  runs: number;
  wickets: number;
  balls: number;
  validBalls: number;
  fours: number;
  sixes: number;
  dots: number;
  extras: ExtrasBreakdown;
}

const emptyMatchup = (): MatchupCounters => ({
  runs: 0,
  balls: 0,
  fours: 0,
  sixes: 0,
  dots: 0,
  dismissals: 0,
});

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function percent(part: number, whole: number): number {
  return whole > 0 ? (part * 100) / whole : 0;
}

export class InningsAggregator {
  private innings: Innings;
  private context: InningsContext;
  private logger: Logger;

  private score: ScoreState = {
    runs: 0,
    wickets: 0,
    balls: 0,
    validBalls: 0,
    fours: 0,
    sixes: 0,
    dots: 0,
    extras: { wides: 0, noballs: 0, byes: 0, legbyes: 0, penalty: 0, total: 0 },
  };

  private batters = new Map<string, BatterState>();
  private bowlers = new Map<string, BowlerState>();
  private fielders = new Map<string, FielderStat>();
  private matchups = new PairTable<MatchupCounters>(emptyMatchup);

  private partnership: PartnershipState | null = null;
  private partnerships: Partnership[] = [];
  private currentOver: OverState | null = null;
  private lastOverNumber: number | null = null;
  private overs: OverSummary[] = [];
  private fallOfWickets: FallOfWicket[] = [];

  private warnings: AnalysisWarning[] = [];
  private unknownPlayers = new Map<string, UnknownPlayerReference>();
  private finished = false;

  constructor(innings: Innings, context: InningsContext) {
    this.innings = innings;
    this.context = context;
    this.logger = context.logger;

    for (const anomaly of innings.anomalies) {
      this.addWarning('malformed-field', anomaly.path, anomaly.message);
    }
  }

  /**
   * Run a whole innings through a fresh aggregator
   */
  static aggregate(innings: Innings, context: InningsContext): InningsStats {
    const aggregator = new InningsAggregator(innings, context);

    innings.overs.forEach((over, overIndex) => {
      const overPath = `innings[${innings.index}].overs[${overIndex}]`;
      aggregator.beginOver(over.over, overPath);
      over.deliveries.forEach((delivery, deliveryIndex) => {
        aggregator.processDelivery(delivery, `${overPath}.deliveries[${deliveryIndex}]`);
      });
      aggregator.endOver();
    });

    return aggregator.finish();
  }

  beginOver(over: number, overPath: string): void {
    this.assertOpen();
    if (this.currentOver) {
      this.endOver();
    }

    if (this.lastOverNumber !== null && over <= this.lastOverNumber) {
      this.addWarning(
        'over-out-of-order',
        `${overPath}.over`,
        `over ${over} follows over ${this.lastOverNumber}`
      );
    }
    this.lastOverNumber = over;

    this.currentOver = {
      over,
      bowlers: new Set(),
      runs: 0,
      wickets: 0,
      fours: 0,
      sixes: 0,
      extras: 0,
      dots: 0,
      balls: 0,
      validBalls: 0,
    };
  }

  /**
   * Apply one delivery. A failure is recorded as a warning on this innings
   * and the pass carries on with the next delivery.
   */
  processDelivery(delivery: Delivery, deliveryPath: string): void {
    this.assertOpen();
    const over = this.currentOver;
    if (!over) {
      throw new Error(`Delivery ${deliveryPath} processed outside an over`);
    }

    try {
      this.applyDelivery(over, delivery, deliveryPath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.addWarning('aggregation-failed', deliveryPath, `delivery skipped: ${message}`);
    }
  }

  /**
   * Finalize the over in progress into an OverSummary
   */
  endOver(): void {
    const over = this.currentOver;
    if (!over) {
      return;
    }
    this.currentOver = null;

    const { ballsPerOver, phasePolicy } = this.context;
    const maiden = over.runs === 0 && over.validBalls === ballsPerOver;

    if (maiden && over.bowlers.size === 1) {
      const [bowlerName] = over.bowlers;
      this.ensureBowler(bowlerName).maidens += 1;
    }

    this.overs.push({
      over: over.over,
      bowlers: Array.from(over.bowlers),
      runs: over.runs,
      wickets: over.wickets,
      fours: over.fours,
      sixes: over.sixes,
      extras: over.extras,
      dots: over.dots,
      balls: over.balls,
      validBalls: over.validBalls,
      cumulativeRuns: this.score.runs,
      cumulativeWickets: this.score.wickets,
      runRate: over.validBalls > 0 ? (over.runs * ballsPerOver) / over.validBalls : 0,
      cumulativeRunRate:
        this.score.validBalls > 0 ? (this.score.runs * ballsPerOver) / this.score.validBalls : 0,
      maiden,
      phase: classifyOver(over.over, phasePolicy),
    });
  }

  /**
   * Close everything still open and compute the derived rates
   */
  finish(): InningsStats {
    this.assertOpen();
    this.endOver();
    this.closePartnership('innings-end');
    this.finished = true;

    const { ballsPerOver, phasePolicy } = this.context;
    const bowlers = Array.from(this.bowlers.values());
    const bowlerWickets = bowlers.reduce((sum, bowler) => sum + bowler.wickets, 0);

    const stats: InningsStats = {
      index: this.innings.index,
      team: this.innings.team,
      superOver: this.innings.superOver,
      target: this.innings.target,
      totals: {
        runs: this.score.runs,
        wickets: this.score.wickets,
        balls: this.score.balls,
        validBalls: this.score.validBalls,
        runRate: this.score.validBalls > 0 ? (this.score.runs * ballsPerOver) / this.score.validBalls : 0,
        fours: this.score.fours,
        sixes: this.score.sixes,
        dots: this.score.dots,
        extras: { ...this.score.extras },
      },
      overs: this.overs,
      phases: buildPhaseSplits(this.overs, phasePolicy, ballsPerOver),
      partnerships: this.partnerships,
      batters: Array.from(this.batters.values()).map((batter) => this.finalizeBatter(batter)),
      bowlers: bowlers.map((bowler) => this.finalizeBowler(bowler, bowlerWickets)),
      fielders: Array.from(this.fielders.values()),
      fallOfWickets: this.fallOfWickets,
      warnings: this.warnings,
    };

    this.logger.debug('Innings aggregated', {
      innings: stats.index,
      team: stats.team,
      score: `${stats.totals.runs}/${stats.totals.wickets}`,
      warnings: stats.warnings.length,
    });

    return stats;
  }

  private applyDelivery(over: OverState, delivery: Delivery, deliveryPath: string): void {
    const { runs, extras } = delivery;
    const valid = extras.wides === 0 && extras.noballs === 0;
    const dot = valid && runs.total === 0;
    const four = !runs.nonBoundary && runs.batter === 4;
    const six = !runs.nonBoundary && runs.batter === 6;

    this.checkPlayer(delivery.batter, 'batter', `${deliveryPath}.batter`);
    this.checkPlayer(delivery.nonStriker, 'non-striker', `${deliveryPath}.non_striker`);
    this.checkPlayer(delivery.bowler, 'bowler', `${deliveryPath}.bowler`);

    if (runs.total !== runs.batter + runs.extras) {
      this.addWarning(
        'runs-mismatch',
        `${deliveryPath}.runs.total`,
        `total ${runs.total} differs from batter ${runs.batter} + extras ${runs.extras}; total used`
      );
    }

    // Over in progress
    over.balls += 1;
    over.bowlers.add(delivery.bowler);
    over.runs += runs.total;
    over.extras += runs.extras;
    if (valid) over.validBalls += 1;
    if (dot) over.dots += 1;
    if (four) over.fours += 1;
    if (six) over.sixes += 1;

    // Partnership
    const partnership = this.partnership ?? this.openPartnership(delivery.batter, delivery.nonStriker);
    const split = this.ensurePartnershipSplit(partnership, delivery.bowler);
    partnership.runs += runs.total;
    partnership.extras += runs.extras;
    split.runs += runs.total;
    if (valid) {
      partnership.balls += 1;
      split.balls += 1;
    }
    if (dot) {
      partnership.dots += 1;
      split.dots += 1;
    }
    if (four) {
      partnership.fours += 1;
      split.fours += 1;
    }
    if (six) {
      partnership.sixes += 1;
      split.sixes += 1;
    }

    // Batter, bowler and their matchup
    const batter = this.ensureBatter(delivery.batter);
    this.ensureBatter(delivery.nonStriker);
    const bowler = this.ensureBowler(delivery.bowler);
    const matchup = this.matchups.ensure(delivery.batter, delivery.bowler);

    batter.runs += runs.batter;
    matchup.runs += runs.batter;
    bowler.runsConceded += runs.total - extras.byes - extras.legbyes - extras.penalty;
    bowler.wides += extras.wides;
    bowler.noballs += extras.noballs;

    if (valid) {
      batter.balls += 1;
      matchup.balls += 1;
      bowler.balls += 1;
    }
    if (dot) {
      batter.dots += 1;
      matchup.dots += 1;
      bowler.dots += 1;
    }
    if (four) {
      batter.fours += 1;
      matchup.fours += 1;
      bowler.fours += 1;
    }
    if (six) {
      batter.sixes += 1;
      matchup.sixes += 1;
      bowler.sixes += 1;
    }

    // Team score
    this.score.balls += 1;
    this.score.runs += runs.total;
    if (valid) this.score.validBalls += 1;
    if (dot) this.score.dots += 1;
    if (four) this.score.fours += 1;
    if (six) this.score.sixes += 1;
    this.score.extras.wides += extras.wides;
    this.score.extras.noballs += extras.noballs;
    this.score.extras.byes += extras.byes;
    this.score.extras.legbyes += extras.legbyes;
    this.score.extras.penalty += extras.penalty;
    this.score.extras.total += runs.extras;

    delivery.wickets.forEach((wicket, index) => {
      this.applyWicket(over, delivery, wicket, `${deliveryPath}.wickets[${index}]`);
    });
  }

  private applyWicket(over: OverState, delivery: Delivery, wicket: Wicket, wicketPath: string): void {
    const rule = DISMISSAL_RULES[wicket.kind];

    this.checkPlayer(wicket.playerOut, 'dismissed', `${wicketPath}.player_out`);
    const credited = this.creditFielders(wicket, rule, delivery.bowler, wicketPath);

    this.ensureBatter(wicket.playerOut).dismissal = {
      kind: wicket.kind,
      rawKind: wicket.rawKind,
      bowler: delivery.bowler,
      fielders: credited.map((fielder) => fielder.name),
    };

    if (rule.creditsBowler) {
      this.matchups.ensure(wicket.playerOut, delivery.bowler).dismissals += 1;
      this.ensureBowler(delivery.bowler).wickets += 1;
    }

    if (rule.countsAsWicket) {
      this.score.wickets += 1;
      over.wickets += 1;
      this.fallOfWickets.push({
        wicket: this.score.wickets,
        playerOut: wicket.playerOut,
        kind: wicket.kind,
        score: this.score.runs,
        over: over.over,
        ball: over.validBalls,
      });
    }

    this.closePartnership('wicket');
  }

  private creditFielders(wicket: Wicket, rule: DismissalRule, bowler: string, wicketPath: string): Fielder[] {
    if (!rule.fielding) {
      return [];
    }

    let credited: Fielder[] =
      rule.creditedFielders === 'first'
        ? wicket.fielders.slice(0, 1)
        : rule.creditedFielders === 'all'
          ? [...wicket.fielders]
          : [];

    if (credited.length === 0 && wicket.kind === 'caught and bowled') {
      credited = [{ name: bowler, position: 'bowler', substitute: false }];
    }

    credited.forEach((fielder, index) => {
      if (!fielder.substitute) {
        this.checkPlayer(fielder.name, 'fielder', `${wicketPath}.fielders[${index}]`);
      }

      const stat = this.ensureFielder(fielder.name);
      switch (rule.fielding) {
        case 'catch':
          stat.catches += 1;
          increment(stat.catchesByPosition, fielder.position);
          break;
        case 'stumping':
          stat.stumpings += 1;
          increment(stat.stumpingsByPosition, fielder.position);
          break;
        case 'run-out':
          stat.runOuts += 1;
          increment(stat.runOutsByPosition, fielder.position);
          break;
      }
    });

    return credited;
  }

  private openPartnership(striker: string, nonStriker: string): PartnershipState {
    const partnership: PartnershipState = {
      batters: [striker, nonStriker],
      startScore: this.score.runs,
      runs: 0,
      balls: 0,
      fours: 0,
      sixes: 0,
      dots: 0,
      extras: 0,
      vsBowlers: new Map(),
    };
    this.partnership = partnership;
    return partnership;
  }

  private ensurePartnershipSplit(
    partnership: PartnershipState,
    bowler: string
  ): Omit<PartnershipBowlerSplit, 'runRate'> {
    let split = partnership.vsBowlers.get(bowler);
    if (!split) {
      split = { bowler, runs: 0, balls: 0, fours: 0, sixes: 0, dots: 0 };
      partnership.vsBowlers.set(bowler, split);
    }
    return split;
  }

  private closePartnership(endedBy: Partnership['endedBy']): void {
    const partnership = this.partnership;
    if (!partnership) {
      return;
    }
    this.partnership = null;

    const { ballsPerOver } = this.context;
    this.partnerships.push({
      wicket: this.partnerships.length + 1,
      batters: partnership.batters,
      startScore: partnership.startScore,
      endScore: this.score.runs,
      runs: partnership.runs,
      balls: partnership.balls,
      fours: partnership.fours,
      sixes: partnership.sixes,
      dots: partnership.dots,
      extras: partnership.extras,
      runRate: partnership.balls > 0 ? (partnership.runs * ballsPerOver) / partnership.balls : 0,
      boundaryPercent: percent(partnership.fours + partnership.sixes, partnership.balls),
      dotPercent: percent(partnership.dots, partnership.balls),
      vsBowlers: Array.from(partnership.vsBowlers.values()).map((split) => ({
        ...split,
        runRate: split.balls > 0 ? (split.runs * ballsPerOver) / split.balls : 0,
      })),
      endedBy,
    });
  }

  private ensureBatter(name: string): BatterState {
    let batter = this.batters.get(name);
    if (!batter) {
      batter = { name, runs: 0, balls: 0, fours: 0, sixes: 0, dots: 0, dismissal: null };
      this.batters.set(name, batter);
    }
    return batter;
  }

  private ensureBowler(name: string): BowlerState {
    let bowler = this.bowlers.get(name);
    if (!bowler) {
      bowler = {
        name,
        balls: 0,
        maidens: 0,
        runsConceded: 0,
        wickets: 0,
        wides: 0,
        noballs: 0,
        dots: 0,
        fours: 0,
        sixes: 0,
      };
      this.bowlers.set(name, bowler);
    }
    return bowler;
  }

  private ensureFielder(name: string): FielderStat {
    let fielder = this.fielders.get(name);
    if (!fielder) {
      fielder = {
        name,
        catches: 0,
        stumpings: 0,
        runOuts: 0,
        catchesByPosition: {},
        stumpingsByPosition: {},
        runOutsByPosition: {},
      };
      this.fielders.set(name, fielder);
    }
    return fielder;
  }

  private finalizeBatter(batter: BatterState): BatterStat {
    return {
      ...batter,
      strikeRate: batter.balls > 0 ? (batter.runs * 100) / batter.balls : 0,
      vsBowlers: this.matchups.row(batter.name).map(([bowler, counters]) => ({
        bowler,
        ...counters,
        strikeRate: counters.balls > 0 ? (counters.runs * 100) / counters.balls : 0,
        boundaryPercent: percent(counters.fours + counters.sixes, counters.balls),
        dotPercent: percent(counters.dots, counters.balls),
      })),
    };
  }

  private finalizeBowler(bowler: BowlerState, bowlerWickets: number): BowlerStat {
    const { ballsPerOver } = this.context;
    const overs = bowler.balls / ballsPerOver;

    return {
      ...bowler,
      overs,
      economy: overs > 0 ? bowler.runsConceded / overs : 0,
      wicketShare: percent(bowler.wickets, bowlerWickets),
      vsBatters: this.matchups.column(bowler.name).map(([batter, counters]) => {
        const matchupOvers = counters.balls / ballsPerOver;
        return {
          batter,
          ...counters,
          economy: matchupOvers > 0 ? counters.runs / matchupOvers : 0,
        };
      }),
    };
  }

  private checkPlayer(name: string, role: PlayerRole, fieldPath: string): void {
    const { knownPlayers } = this.context;
    if (name !== UNKNOWN && (knownPlayers === null || knownPlayers.has(name))) {
      return;
    }

    const key = `${role}\u0000${name}`;
    const existing = this.unknownPlayers.get(key);
    if (existing) {
      existing.occurrences += 1;
      return;
    }

    const reference: UnknownPlayerReference = {
      kind: 'unknown-player',
      innings: this.innings.index,
      path: fieldPath,
      player: name,
      role,
      occurrences: 1,
    };
    this.unknownPlayers.set(key, reference);
    this.warnings.push(reference);
    this.logger.warn('Unknown player reference', { innings: reference.innings, player: name, role, path: fieldPath });
  }

  private addWarning(code: DeliveryWarningCode, fieldPath: string, message: string): void {
    this.warnings.push({
      kind: 'delivery',
      code,
      innings: this.innings.index,
      path: fieldPath,
      message,
    });
    this.logger.warn('Delivery warning', { innings: this.innings.index, code, path: fieldPath, message });
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error(`Innings ${this.innings.index} has already been finalized`);
    }
  }
}
