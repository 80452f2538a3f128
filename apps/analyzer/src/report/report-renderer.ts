/**
 * Match Report Renderer
 *
 * Turns aggregated match statistics into ordered plain-text sections. Every
 * number printed here is read from MatchStats; nothing is recomputed.
 */

import type {
  BatterDismissal,
  FielderStat,
  InningsStats,
  MatchStats,
  ReportSection,
} from '@match-digest/shared-types';
import { PHASE_LABELS, REPORT_DEFAULTS, UNKNOWN } from '@match-digest/constants';

export interface RenderOptions {
  /** Partnerships of at least this many runs get a per-bowler breakdown */
  partnershipBreakdownMinRuns?: number;
}

const rate = (value: number): string => value.toFixed(2);
const pct = (value: number): string => value.toFixed(1);

/**
 * Balls as overs in o.b notation, e.g. 22 balls of 6 -> "3.4"
 */
export function formatOvers(balls: number, ballsPerOver: number): string {
  return `${Math.floor(balls / ballsPerOver)}.${balls % ballsPerOver}`;
}

/**
 * Scorecard dismissal text, e.g. "c Fielder b Bowler"
 */
export function formatDismissal(dismissal: BatterDismissal | null): string {
  if (!dismissal) {
    return 'not out';
  }

  const { bowler, fielders } = dismissal;
  const fielder = fielders.length > 0 ? fielders[0] : null;

  switch (dismissal.kind) {
    case 'bowled':
      return `b ${bowler}`;
    case 'lbw':
      return `lbw b ${bowler}`;
    case 'caught':
      return fielder ? `c ${fielder} b ${bowler}` : `caught b ${bowler}`;
    case 'caught and bowled':
      return `c & b ${bowler}`;
    case 'stumped':
      return fielder ? `st ${fielder} b ${bowler}` : `stumped b ${bowler}`;
    case 'hit wicket':
      return `hit wicket b ${bowler}`;
    case 'run out':
      return fielders.length > 0 ? `run out (${fielders.join('/')})` : 'run out';
    default:
      return dismissal.rawKind;
  }
}

function positionBreakdown(counts: Record<string, number>): string {
  return Object.entries(counts)
    .map(([position, count]) => `${position} x${count}`)
    .join(', ');
}

export class ReportRenderer {
  private breakdownMinRuns: number;

  constructor(options: RenderOptions = {}) {
    this.breakdownMinRuns = options.partnershipBreakdownMinRuns ?? REPORT_DEFAULTS.PARTNERSHIP_BREAKDOWN_MIN_RUNS;
  }

  /**
   * Build every section in report order. Sections with nothing to say are left out.
   */
  buildSections(stats: MatchStats): ReportSection[] {
    const sections: ReportSection[] = [this.buildHeaderSection(stats)];

    sections.push(...this.buildSquadSections(stats));

    for (const innings of stats.innings) {
      sections.push(...this.buildInningsSections(innings, stats.record.ballsPerOver));
    }

    sections.push(this.buildMatchSummarySection(stats));

    const result = this.buildResultSection(stats);
    if (result) {
      sections.push(result);
    }

    return sections;
  }

  render(stats: MatchStats): string {
    return this.buildSections(stats)
      .map((section) => (section.title !== null ? [section.title, ...section.lines] : section.lines).join('\n'))
      .join(REPORT_DEFAULTS.SECTION_SEPARATOR);
  }

  private buildHeaderSection(stats: MatchStats): ReportSection {
    const { record } = stats;
    const lines: string[] = [`Date: ${record.date}`, `Venue: ${record.venue}`];

    // Optional metadata is only printed when the record carries it
    const optional: Array<[string, string]> = [
      ['City', record.city],
      ['Event', record.matchNumber !== null ? `${record.event} (Match ${record.matchNumber})` : record.event],
      ['Match Type', record.matchType],
      ['Gender', record.gender],
      ['Season', record.season],
    ];
    for (const [label, value] of optional) {
      if (value !== UNKNOWN) {
        lines.push(`${label}: ${value}`);
      }
    }

    if (record.toss) {
      lines.push(`Toss: ${record.toss.winner} won the toss and chose to ${record.toss.decision}`);
    }

    const officials: Array<[string, readonly string[]]> = [
      ['Umpires', record.officials.umpires],
      ['TV Umpires', record.officials.tvUmpires],
      ['Reserve Umpires', record.officials.reserveUmpires],
      ['Match Referees', record.officials.matchReferees],
    ];
    for (const [label, names] of officials) {
      if (names.length > 0) {
        lines.push(`${label}: ${names.join(', ')}`);
      }
    }

    if (record.playerOfMatch.length > 0) {
      lines.push(`Player of the Match: ${record.playerOfMatch.join(', ')}`);
    }

    return {
      id: 'header',
      title: `Match Analysis: ${record.teams[0]} vs ${record.teams[1]}`,
      lines,
    };
  }

  private buildSquadSections(stats: MatchStats): ReportSection[] {
    const { record } = stats;

    return record.teams
      .filter((team) => (record.players[team] ?? []).length > 0)
      .map((team) => ({
        id: `squad:${team}`,
        title: `${team} Playing XI`,
        lines: (record.players[team] ?? []).map((player) => `- ${player}`),
      }));
  }

  private buildInningsSections(innings: InningsStats, ballsPerOver: number): ReportSection[] {
    const n = innings.index + 1;
    const candidates: Array<ReportSection | null> = [
      this.buildInningsSummarySection(innings, ballsPerOver),
      this.buildOversSection(innings),
      this.buildPhasesSection(innings),
      this.buildPartnershipsSection(innings),
      this.buildMatchupsSection(innings),
      this.buildBattingSection(innings),
      this.buildBowlingSection(innings, ballsPerOver),
      this.buildWicketsSection(innings),
      this.buildFallOfWicketsSection(innings),
      this.buildFieldingSection(innings),
    ];

    return candidates
      .filter((section): section is ReportSection => section !== null)
      .map((section) => ({ ...section, id: `${section.id}:${n}` }));
  }

  private buildInningsSummarySection(innings: InningsStats, ballsPerOver: number): ReportSection {
    const { totals } = innings;
    const { extras } = totals;
    const lines = [
      `Total: ${totals.runs}/${totals.wickets} (${formatOvers(totals.validBalls, ballsPerOver)} overs)`,
      `Run Rate: ${rate(totals.runRate)}`,
    ];

    if (innings.target) {
      const overs = innings.target.overs !== null ? ` in ${innings.target.overs} overs` : '';
      lines.push(`Target: ${innings.target.runs} runs${overs}`);
    }

    lines.push(
      `Boundaries: fours ${totals.fours}, sixes ${totals.sixes}`,
      `Dot Balls: ${totals.dots}`,
      `Extras: ${extras.total} (wides ${extras.wides}, no-balls ${extras.noballs}, byes ${extras.byes}, ` +
        `leg-byes ${extras.legbyes}, penalty ${extras.penalty})`
    );

    return {
      id: 'innings-summary',
      title: `Innings ${innings.index + 1}: ${innings.team}${innings.superOver ? ' (Super Over)' : ''}`,
      lines,
    };
  }

  private buildOversSection(innings: InningsStats): ReportSection | null {
    if (innings.overs.length === 0) {
      return null;
    }

    return {
      id: 'overs',
      title: 'Over-by-Over',
      lines: innings.overs.map(
        (over) =>
          `Over ${over.over + 1} (${over.bowlers.join(', ')}): runs ${over.runs}, wickets ${over.wickets}, ` +
          `fours ${over.fours}, sixes ${over.sixes}, extras ${over.extras}, dots ${over.dots} | ` +
          `Score ${over.cumulativeRuns}/${over.cumulativeWickets} | ` +
          `RR ${rate(over.runRate)} (overall ${rate(over.cumulativeRunRate)})${over.maiden ? ' | maiden' : ''}`
      ),
    };
  }

  private buildPhasesSection(innings: InningsStats): ReportSection | null {
    const lines = innings.phases
      .filter((split) => split.overs > 0)
      .map((split) => {
        const range =
          split.lastOver !== null ? `overs ${split.firstOver + 1}-${split.lastOver + 1}` : `overs ${split.firstOver + 1}+`;
        return (
          `${PHASE_LABELS[split.phase]} (${range}): runs ${split.runs}, wickets ${split.wickets}, ` +
          `RR ${rate(split.runRate)}, fours ${split.fours}, sixes ${split.sixes}, ` +
          `extras ${split.extras}, dots ${split.dots}`
        );
      });

    return lines.length > 0 ? { id: 'phases', title: 'Phase Analysis', lines } : null;
  }

  private buildPartnershipsSection(innings: InningsStats): ReportSection | null {
    if (innings.partnerships.length === 0) {
      return null;
    }

    const lines: string[] = [];
    for (const partnership of innings.partnerships) {
      const [first, second] = partnership.batters;
      const unbroken = partnership.endedBy === 'innings-end' ? ' (unbroken)' : '';

      lines.push(
        `Wicket ${partnership.wicket}: ${first} & ${second} - runs ${partnership.runs}, balls ${partnership.balls}, ` +
          `RR ${rate(partnership.runRate)}, score ${partnership.startScore} to ${partnership.endScore}${unbroken}`,
        `  Boundaries: fours ${partnership.fours}, sixes ${partnership.sixes} ` +
          `(${pct(partnership.boundaryPercent)}% of balls)`,
        `  Dots: ${partnership.dots} (${pct(partnership.dotPercent)}%)`,
        `  Extras: ${partnership.extras}`
      );

      if (partnership.runs >= this.breakdownMinRuns && partnership.vsBowlers.length > 0) {
        lines.push('  By bowler:');
        for (const split of partnership.vsBowlers) {
          lines.push(
            `    ${split.bowler}: runs ${split.runs}, balls ${split.balls}, RR ${rate(split.runRate)}, ` +
              `fours ${split.fours}, sixes ${split.sixes}, dots ${split.dots}`
          );
        }
      }
    }

    return { id: 'partnerships', title: 'Partnerships', lines };
  }

  private buildMatchupsSection(innings: InningsStats): ReportSection | null {
    const lines: string[] = [];

    for (const batter of innings.batters) {
      if (batter.vsBowlers.length === 0) {
        continue;
      }
      lines.push(`${batter.name}:`);
      for (const matchup of batter.vsBowlers) {
        const dismissed = matchup.dismissals > 0 ? `, dismissed ${matchup.dismissals}` : '';
        lines.push(
          `  vs ${matchup.bowler}: runs ${matchup.runs}, balls ${matchup.balls}, SR ${pct(matchup.strikeRate)}, ` +
            `fours ${matchup.fours}, sixes ${matchup.sixes} (${pct(matchup.boundaryPercent)}% boundaries), ` +
            `dots ${matchup.dots} (${pct(matchup.dotPercent)}%)${dismissed}`
        );
      }
    }

    return lines.length > 0 ? { id: 'matchups', title: 'Batter vs Bowler', lines } : null;
  }

  private buildBattingSection(innings: InningsStats): ReportSection | null {
    if (innings.batters.length === 0) {
      return null;
    }

    return {
      id: 'batting',
      title: 'Batting',
      lines: innings.batters.map(
        (batter) =>
          `${batter.name}: ${batter.runs} (${batter.balls}), fours ${batter.fours}, sixes ${batter.sixes}, ` +
          `SR ${rate(batter.strikeRate)} - ${formatDismissal(batter.dismissal)}`
      ),
    };
  }

  private buildBowlingSection(innings: InningsStats, ballsPerOver: number): ReportSection | null {
    if (innings.bowlers.length === 0) {
      return null;
    }

    // O-M-R-W figures
    return {
      id: 'bowling',
      title: 'Bowling',
      lines: innings.bowlers.map(
        (bowler) =>
          `${bowler.name}: ${formatOvers(bowler.balls, ballsPerOver)}-${bowler.maidens}-` +
          `${bowler.runsConceded}-${bowler.wickets}, econ ${rate(bowler.economy)}, dots ${bowler.dots}, ` +
          `wides ${bowler.wides}, no-balls ${bowler.noballs}`
      ),
    };
  }

  private buildWicketsSection(innings: InningsStats): ReportSection | null {
    const lines = innings.bowlers
      .filter((bowler) => bowler.wickets > 0)
      .map((bowler) => `${bowler.name}: ${bowler.wickets} (${pct(bowler.wicketShare)}%)`);

    return lines.length > 0 ? { id: 'wickets', title: 'Wicket Analysis', lines } : null;
  }

  private buildFallOfWicketsSection(innings: InningsStats): ReportSection | null {
    if (innings.fallOfWickets.length === 0) {
      return null;
    }

    return {
      id: 'fall-of-wickets',
      title: 'Fall of Wickets',
      lines: innings.fallOfWickets.map(
        (fall) => `${fall.wicket}-${fall.score} (${fall.playerOut}, ${fall.kind}, over ${fall.over}.${fall.ball})`
      ),
    };
  }

  private buildFieldingSection(innings: InningsStats): ReportSection | null {
    const lines = innings.fielders
      .map((fielder) => this.formatFielder(fielder))
      .filter((line): line is string => line !== null);

    return lines.length > 0 ? { id: 'fielding', title: 'Fielding', lines } : null;
  }

  private formatFielder(fielder: FielderStat): string | null {
    const parts: string[] = [];
    if (fielder.catches > 0) {
      parts.push(`catches ${fielder.catches} (${positionBreakdown(fielder.catchesByPosition)})`);
    }
    if (fielder.stumpings > 0) {
      parts.push(`stumpings ${fielder.stumpings} (${positionBreakdown(fielder.stumpingsByPosition)})`);
    }
    if (fielder.runOuts > 0) {
      parts.push(`run outs ${fielder.runOuts} (${positionBreakdown(fielder.runOutsByPosition)})`);
    }
    return parts.length > 0 ? `${fielder.name}: ${parts.join(', ')}` : null;
  }

  private buildMatchSummarySection(stats: MatchStats): ReportSection {
    const { totals } = stats;

    return {
      id: 'match-summary',
      title: 'Match Summary',
      lines: [
        `Total Runs: ${totals.runs}`,
        `Total Wickets: ${totals.wickets}`,
        `Total Boundaries: fours ${totals.fours}, sixes ${totals.sixes}`,
        `Total Extras: ${totals.extras}`,
        `Total Deliveries: ${totals.balls}`,
      ],
    };
  }

  private buildResultSection(stats: MatchStats): ReportSection | null {
    const { outcome } = stats.record;
    if (!outcome) {
      return null;
    }

    const lines: string[] = [];
    if (outcome.winner !== null) {
      lines.push(`Winner: ${outcome.winner}`);
      const margins = (['runs', 'wickets', 'innings'] as const)
        .filter((key) => outcome.by[key] !== undefined)
        .map((key) => `${outcome.by[key]} ${key}`);
      if (margins.length > 0) {
        lines.push(`Margin: by ${margins.join(', ')}`);
      }
    } else if (outcome.result !== null) {
      lines.push(`Result: ${outcome.result}`);
    }
    if (outcome.method !== null) {
      lines.push(`Method: ${outcome.method}`);
    }
    if (outcome.eliminator !== null) {
      lines.push(`Eliminator: ${outcome.eliminator}`);
    }

    return lines.length > 0 ? { id: 'result', title: 'Result', lines } : null;
  }
}

export function buildReportSections(stats: MatchStats, options: RenderOptions = {}): ReportSection[] {
  return new ReportRenderer(options).buildSections(stats);
}

export function renderMatchReport(stats: MatchStats, options: RenderOptions = {}): string {
  return new ReportRenderer(options).render(stats);
}
