/**
 * Cricsheet Match Record Parser
 *
 * Turns a raw match structure (JSON, YAML, or the older YAML layout whose
 * deliveries are keyed by "over.ball") into an immutable MatchRecord.
 */

import { parse as parseYaml } from 'yaml';
import { readFileSync } from 'fs';
import path from 'path';
import type {
  Delivery,
  FieldAnomaly,
  Fielder,
  Innings,
  MatchOutcome,
  MatchRecord,
  Officials,
  Over,
  TossInfo,
  Wicket,
} from '@match-digest/shared-types';
import { DEFAULT_BALLS_PER_OVER, UNKNOWN, isDismissalKind } from '@match-digest/constants';
import { MalformedMatchError, MatchDigestError } from '../utils/errors.js';

export type MatchFileFormat = 'json' | 'yaml';

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim() === '' ? undefined : value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.toISOString().slice(0, 10);
  }
  return undefined;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const items: unknown[] = value;
  return items.map(asString).filter((item): item is string => item !== undefined);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toOverIndex(value: unknown): number | null {
  const numeric = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof numeric === 'number' && Number.isInteger(numeric) && numeric >= 0) {
    return numeric;
  }
  return null;
}

/**
 * Collects the non-fatal issues of one innings while it is normalized
 */
class AnomalyLog {
  readonly entries: FieldAnomaly[] = [];

  add(fieldPath: string, message: string): void {
    this.entries.push({ path: fieldPath, message });
  }

  count(value: unknown, fieldPath: string): number {
    if (value === undefined) {
      return 0;
    }
    const numeric = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof numeric === 'number' && Number.isFinite(numeric) && numeric >= 0) {
      return numeric;
    }
    this.add(fieldPath, `expected a non-negative number, got ${JSON.stringify(value)}; treated as 0`);
    return 0;
  }
}

export class MatchParser {
  /**
   * Normalize a raw match structure. Throws MalformedMatchError when the
   * innings, over or delivery structure is missing or unusable.
   */
  static parse(raw: unknown, matchId: string = UNKNOWN): MatchRecord {
    if (!isRecord(raw)) {
      throw new MalformedMatchError('$', 'match record must be an object');
    }

    const info: UnknownRecord = isRecord(raw.info) ? raw.info : {};
    const teamNames = stringList(info.teams);
    const teams: [string, string] = [teamNames[0] ?? UNKNOWN, teamNames[1] ?? UNKNOWN];

    if (raw.innings === undefined) {
      throw new MalformedMatchError('innings', 'innings list is missing');
    }
    if (!Array.isArray(raw.innings)) {
      throw new MalformedMatchError('innings', 'innings must be a list');
    }

    const rawInnings: unknown[] = raw.innings;
    const innings = rawInnings.map((entry, index) => MatchParser.parseInnings(entry, index, teams));
    const dates = stringList(info.dates);
    const ballsPerOver = optionalNumber(info.balls_per_over);

    return {
      matchId,
      teams,
      venue: asString(info.venue) ?? UNKNOWN,
      city: asString(info.city) ?? UNKNOWN,
      dates,
      date: dates[0] ?? UNKNOWN,
      event: MatchParser.parseEventName(info),
      matchNumber: isRecord(info.event) ? optionalNumber(info.event.match_number) ?? null : null,
      matchType: asString(info.match_type) ?? UNKNOWN,
      gender: asString(info.gender) ?? UNKNOWN,
      season: asString(info.season) ?? UNKNOWN,
      teamType: asString(info.team_type) ?? UNKNOWN,
      ballsPerOver:
        ballsPerOver !== undefined && Number.isInteger(ballsPerOver) && ballsPerOver > 0
          ? ballsPerOver
          : DEFAULT_BALLS_PER_OVER,
      toss: MatchParser.parseToss(info.toss),
      players: MatchParser.parsePlayers(info.players),
      officials: MatchParser.parseOfficials(info.officials),
      outcome: MatchParser.parseOutcome(info.outcome),
      playerOfMatch: stringList(info.player_of_match),
      innings,
    };
  }

  /**
   * Parse match text in the given format
   */
  static parseText(content: string, format: MatchFileFormat, matchId?: string): MatchRecord {
    let data: unknown;
    try {
      data = format === 'json' ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new MalformedMatchError('$', `not valid ${format.toUpperCase()}: ${detail}`);
    }
    return MatchParser.parse(data, matchId);
  }

  /**
   * Parse a match file (.json, .yaml or .yml); the match id is the file name
   */
  static parseMatchFile(filePath: string): MatchRecord {
    const format = MatchParser.detectFormat(filePath);
    if (!format) {
      throw new MatchDigestError(`Unsupported match file type: ${filePath}`);
    }

    const content = readFileSync(filePath, 'utf-8');
    const matchId = path.basename(filePath, path.extname(filePath));
    return MatchParser.parseText(content, format, matchId);
  }

  static detectFormat(filePath: string): MatchFileFormat | null {
    const extension = path.extname(filePath).toLowerCase();
    if (extension === '.json') return 'json';
    if (extension === '.yaml' || extension === '.yml') return 'yaml';
    return null;
  }

  static hasBallByBall(record: MatchRecord): boolean {
    return record.innings.some((innings) => innings.overs.some((over) => over.deliveries.length > 0));
  }

  private static parseEventName(info: UnknownRecord): string {
    if (isRecord(info.event)) {
      return asString(info.event.name) ?? UNKNOWN;
    }
    return asString(info.event) ?? asString(info.competition) ?? UNKNOWN;
  }

  private static parseToss(value: unknown): TossInfo | null {
    if (!isRecord(value)) {
      return null;
    }
    return {
      winner: asString(value.winner) ?? UNKNOWN,
      decision: asString(value.decision) ?? UNKNOWN,
    };
  }

  private static parsePlayers(value: unknown): Record<string, string[]> {
    const players: Record<string, string[]> = {};
    if (isRecord(value)) {
      for (const [team, squad] of Object.entries(value)) {
        players[team] = stringList(squad);
      }
    }
    return players;
  }

  private static parseOfficials(value: unknown): Officials {
    const officials: UnknownRecord = isRecord(value) ? value : {};
    return {
      umpires: stringList(officials.umpires),
      tvUmpires: stringList(officials.tv_umpires),
      reserveUmpires: stringList(officials.reserve_umpires),
      matchReferees: stringList(officials.match_referees),
    };
  }

  private static parseOutcome(value: unknown): MatchOutcome | null {
    if (!isRecord(value)) {
      return null;
    }

    const by: { runs?: number; wickets?: number; innings?: number } = {};
    if (isRecord(value.by)) {
      const runs = optionalNumber(value.by.runs);
      const wickets = optionalNumber(value.by.wickets);
      const innings = optionalNumber(value.by.innings);
      if (runs !== undefined) by.runs = runs;
      if (wickets !== undefined) by.wickets = wickets;
      if (innings !== undefined) by.innings = innings;
    }

    return {
      winner: asString(value.winner) ?? null,
      by,
      method: asString(value.method) ?? null,
      result: asString(value.result) ?? null,
      eliminator: asString(value.eliminator) ?? null,
    };
  }

  private static parseInnings(entry: unknown, index: number, teams: readonly [string, string]): Innings {
    const inningsPath = `innings[${index}]`;
    if (!isRecord(entry)) {
      throw new MalformedMatchError(inningsPath, 'innings entry must be an object');
    }

    const anomalies = new AnomalyLog();
    const legacy = MatchParser.unwrapLegacyInnings(entry);
    const body = legacy ?? entry;

    const team = asString(body.team) ?? UNKNOWN;
    if (team === UNKNOWN) {
      anomalies.add(`${inningsPath}.team`, 'batting team is missing');
    } else if (!teams.includes(UNKNOWN) && !teams.includes(team)) {
      throw new MalformedMatchError(`${inningsPath}.team`, `team "${team}" is not one of ${teams.join(', ')}`);
    }

    const rawOvers = legacy
      ? MatchParser.groupLegacyDeliveries(legacy.deliveries, inningsPath)
      : MatchParser.requireList(body.overs, `${inningsPath}.overs`, 'overs');

    const overs = rawOvers.map((rawOver, overIndex) =>
      MatchParser.parseOver(rawOver, `${inningsPath}.overs[${overIndex}]`, anomalies)
    );

    let target: Innings['target'] = null;
    if (isRecord(body.target)) {
      const runs = optionalNumber(body.target.runs);
      if (runs !== undefined) {
        target = { runs, overs: optionalNumber(body.target.overs) ?? null };
      }
    }

    return {
      index,
      team,
      overs,
      target,
      superOver: body.super_over === true,
      anomalies: anomalies.entries,
    };
  }

  private static requireList(value: unknown, fieldPath: string, label: string): unknown[] {
    if (value === undefined) {
      throw new MalformedMatchError(fieldPath, `${label} list is missing`);
    }
    if (!Array.isArray(value)) {
      throw new MalformedMatchError(fieldPath, `${label} must be a list`);
    }
    return value;
  }

  /**
   * Older Cricsheet YAML wraps each innings as `{ "1st innings": { team, deliveries } }`
   */
  private static unwrapLegacyInnings(entry: UnknownRecord): UnknownRecord | null {
    const keys = Object.keys(entry);
    if (keys.length !== 1 || 'overs' in entry || 'team' in entry) {
      return null;
    }
    const inner = entry[keys[0]];
    return isRecord(inner) && Array.isArray(inner.deliveries) ? inner : null;
  }

  private static groupLegacyDeliveries(deliveries: unknown, inningsPath: string): UnknownRecord[] {
    const list = MatchParser.requireList(deliveries, `${inningsPath}.deliveries`, 'deliveries');
    const overs = new Map<number, unknown[]>();

    list.forEach((entry, index) => {
      const entryPath = `${inningsPath}.deliveries[${index}]`;
      if (!isRecord(entry) || Object.keys(entry).length !== 1) {
        throw new MalformedMatchError(entryPath, 'expected a single "over.ball" keyed delivery');
      }

      const [ballKey] = Object.keys(entry);
      const overNumber = Math.floor(parseFloat(ballKey));
      if (Number.isNaN(overNumber) || overNumber < 0) {
        throw new MalformedMatchError(entryPath, `ball key "${ballKey}" is not numeric`);
      }

      const ball = entry[ballKey];
      const normalized = isRecord(ball) && isRecord(ball.wicket) && ball.wickets === undefined
        ? { ...ball, wickets: [ball.wicket] }
        : ball;

      const bucket = overs.get(overNumber);
      if (bucket) {
        bucket.push(normalized);
      } else {
        overs.set(overNumber, [normalized]);
      }
    });

    return Array.from(overs.entries()).map(([over, grouped]) => ({ over, deliveries: grouped }));
  }

  private static parseOver(rawOver: unknown, overPath: string, anomalies: AnomalyLog): Over {
    if (!isRecord(rawOver)) {
      throw new MalformedMatchError(overPath, 'over entry must be an object');
    }

    if (rawOver.over === undefined) {
      throw new MalformedMatchError(`${overPath}.over`, 'over index is missing');
    }
    const over = toOverIndex(rawOver.over);
    if (over === null) {
      throw new MalformedMatchError(
        `${overPath}.over`,
        `over index must be a non-negative integer, got ${JSON.stringify(rawOver.over)}`
      );
    }

    const rawDeliveries = MatchParser.requireList(rawOver.deliveries, `${overPath}.deliveries`, 'deliveries');
    const deliveries = rawDeliveries.map((delivery, index) =>
      MatchParser.parseDelivery(delivery, `${overPath}.deliveries[${index}]`, anomalies)
    );

    return { over, deliveries };
  }

  private static parseDelivery(raw: unknown, deliveryPath: string, anomalies: AnomalyLog): Delivery {
    if (!isRecord(raw)) {
      throw new MalformedMatchError(deliveryPath, 'delivery must be an object');
    }

    let runs: UnknownRecord = {};
    if (isRecord(raw.runs)) {
      runs = raw.runs;
    } else {
      anomalies.add(`${deliveryPath}.runs`, 'runs are missing; treated as 0');
    }

    const batterRuns = anomalies.count(runs.batter ?? runs.batsman, `${deliveryPath}.runs.batter`);
    const extraRuns = anomalies.count(runs.extras, `${deliveryPath}.runs.extras`);
    const totalRuns =
      runs.total === undefined
        ? batterRuns + extraRuns
        : anomalies.count(runs.total, `${deliveryPath}.runs.total`);

    const extras: UnknownRecord = isRecord(raw.extras) ? raw.extras : {};
    const bowler = asString(raw.bowler) ?? UNKNOWN;

    let rawWickets: unknown[] = [];
    if (Array.isArray(raw.wickets)) {
      rawWickets = raw.wickets;
    } else if (isRecord(raw.wicket)) {
      rawWickets = [raw.wicket];
    } else if (raw.wickets !== undefined) {
      anomalies.add(`${deliveryPath}.wickets`, 'wickets must be a list; ignored');
    }

    const wickets: Wicket[] = [];
    rawWickets.forEach((wicket, index) => {
      const parsed = MatchParser.parseWicket(wicket, `${deliveryPath}.wickets[${index}]`, anomalies);
      if (parsed) {
        wickets.push(parsed);
      }
    });

    return {
      batter: asString(raw.batter) ?? asString(raw.batsman) ?? UNKNOWN,
      nonStriker: asString(raw.non_striker) ?? UNKNOWN,
      bowler,
      runs: {
        batter: batterRuns,
        extras: extraRuns,
        total: totalRuns,
        nonBoundary: runs.non_boundary === true,
      },
      extras: {
        wides: anomalies.count(extras.wides, `${deliveryPath}.extras.wides`),
        noballs: anomalies.count(extras.noballs, `${deliveryPath}.extras.noballs`),
        byes: anomalies.count(extras.byes, `${deliveryPath}.extras.byes`),
        legbyes: anomalies.count(extras.legbyes, `${deliveryPath}.extras.legbyes`),
        penalty: anomalies.count(extras.penalty, `${deliveryPath}.extras.penalty`),
      },
      wickets,
    };
  }

  private static parseWicket(raw: unknown, wicketPath: string, anomalies: AnomalyLog): Wicket | null {
    if (!isRecord(raw)) {
      anomalies.add(wicketPath, 'wicket entry must be an object; ignored');
      return null;
    }

    const rawKind = asString(raw.kind) ?? UNKNOWN;
    const normalizedKind = rawKind.trim().toLowerCase();
    let kind: Wicket['kind'] = 'other';
    if (isDismissalKind(normalizedKind)) {
      kind = normalizedKind;
    } else {
      anomalies.add(`${wicketPath}.kind`, `unrecognised dismissal kind "${rawKind}"; treated as other`);
    }

    const fielders: Fielder[] = [];
    if (Array.isArray(raw.fielders)) {
      const rawFielders: unknown[] = raw.fielders;
      rawFielders.forEach((fielder, index) => {
        const name = typeof fielder === 'string' ? asString(fielder) : isRecord(fielder) ? asString(fielder.name) : undefined;
        if (name === undefined) {
          anomalies.add(`${wicketPath}.fielders[${index}]`, 'fielder has no name; ignored');
          return;
        }
        fielders.push({
          name,
          position: isRecord(fielder) ? asString(fielder.position) ?? UNKNOWN : UNKNOWN,
          substitute: isRecord(fielder) && fielder.substitute === true,
        });
      });
    }

    return {
      playerOut: asString(raw.player_out) ?? UNKNOWN,
      kind,
      rawKind,
      fielders,
    };
  }
}
