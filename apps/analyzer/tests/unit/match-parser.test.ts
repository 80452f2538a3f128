import { readFileSync } from 'fs';
import { describe, expect, it } from 'vitest';

import { MatchParser } from '../../src/data/match-parser.js';
import { MalformedMatchError, MatchDigestError } from '../../src/utils/errors.js';
import { delivery, fixturePath, innings, over, rawMatch } from '../helpers/raw-match.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error to be thrown');
}

describe('MatchParser.parseMatchFile', () => {
  it('reads match metadata', () => {
    const record = MatchParser.parseMatchFile(fixturePath('harbour-v-valley.json'));

    expect(record.matchId).toBe('harbour-v-valley');
    expect(record.teams).toEqual(['Harbour Hawks', 'Valley Vipers']);
    expect(record.venue).toBe('Harbour Oval');
    expect(record.city).toBe('Port Town');
    expect(record.date).toBe('2024-04-12');
    expect(record.event).toBe('Coastal League');
    expect(record.matchNumber).toBe(7);
    expect(record.matchType).toBe('T20');
    expect(record.season).toBe('2024');
    expect(record.ballsPerOver).toBe(6);
    expect(record.toss).toEqual({ winner: 'Valley Vipers', decision: 'field' });
    expect(record.officials).toEqual({
      umpires: ['U One', 'U Two'],
      tvUmpires: [],
      reserveUmpires: [],
      matchReferees: ['M Ref'],
    });
    expect(record.outcome).toEqual({
      winner: 'Harbour Hawks',
      by: { runs: 4 },
      method: null,
      result: null,
      eliminator: null,
    });
    expect(record.players['Valley Vipers']).toEqual(['P Price', 'Q Quinn', 'R Reed', 'S Shaw']);
  });

  it('normalizes innings, overs and deliveries', () => {
    const record = MatchParser.parseMatchFile(fixturePath('harbour-v-valley.json'));
    const [first, second] = record.innings;

    expect(record.innings).toHaveLength(2);
    expect(first.team).toBe('Harbour Hawks');
    expect(first.target).toBeNull();
    expect(second.target).toEqual({ runs: 14, overs: 20 });
    expect(first.overs.map((entry) => entry.deliveries.length)).toEqual([7, 6]);
    expect(first.anomalies).toEqual([]);

    expect(first.overs[0].deliveries[2].extras).toEqual({ wides: 1, noballs: 0, byes: 0, legbyes: 0, penalty: 0 });
    expect(first.overs[0].deliveries[5].wickets).toEqual([
      {
        playerOut: 'B Baker',
        kind: 'caught',
        rawKind: 'caught',
        fielders: [{ name: 'R Reed', position: 'deep midwicket', substitute: false }],
      },
    ]);
    expect(second.overs[0].deliveries[3].runs).toEqual({ batter: 4, extras: 0, total: 4, nonBoundary: true });
  });

  it('gives the same record for JSON, YAML and the legacy YAML layout', () => {
    const json = MatchParser.parseText(readFileSync(fixturePath('short.json'), 'utf-8'), 'json', 'short');
    const yaml = MatchParser.parseText(readFileSync(fixturePath('short.yaml'), 'utf-8'), 'yaml', 'short');
    const legacy = MatchParser.parseText(readFileSync(fixturePath('short-legacy.yaml'), 'utf-8'), 'yaml', 'short');

    expect(yaml).toEqual(json);
    expect(legacy).toEqual(json);
    expect(legacy.innings[0].overs.map((entry) => entry.over)).toEqual([0, 1]);
  });

  it('names the field path of a bad over index', () => {
    const error = catchError(() => MatchParser.parseMatchFile(fixturePath('broken-over.json')));

    expect(error).toBeInstanceOf(MalformedMatchError);
    expect(error).toMatchObject({ fieldPath: 'innings[0].overs[1].over' });
    expect(error instanceof Error ? error.message : '').toBe(
      'Malformed match record at innings[0].overs[1].over: over index must be a non-negative integer, got "second"'
    );
  });

  it('rejects unsupported file types with a plain digest error', () => {
    const error = catchError(() => MatchParser.parseMatchFile('/tmp/match.csv'));

    expect(error).toBeInstanceOf(MatchDigestError);
    expect(error).not.toBeInstanceOf(MalformedMatchError);
  });
});

describe('MatchParser.parse', () => {
  it('fails when the record is not an object', () => {
    expect(catchError(() => MatchParser.parse([]))).toMatchObject({ fieldPath: '$' });
  });

  it('fails when innings are missing or not a list', () => {
    expect(catchError(() => MatchParser.parse({ info: {} }))).toMatchObject({
      fieldPath: 'innings',
      reason: 'innings list is missing',
    });
    expect(catchError(() => MatchParser.parse({ innings: {} }))).toMatchObject({
      fieldPath: 'innings',
      reason: 'innings must be a list',
    });
  });

  it('fails when overs or deliveries are missing', () => {
    expect(catchError(() => MatchParser.parse({ innings: [{ team: 'North' }] }))).toMatchObject({
      fieldPath: 'innings[0].overs',
    });
    expect(catchError(() => MatchParser.parse(rawMatch([innings('North', [{ over: 0 }])])))).toMatchObject({
      fieldPath: 'innings[0].overs[0].deliveries',
    });
    expect(
      catchError(() => MatchParser.parse({ innings: [{ team: 'North', overs: [{ over: 0, deliveries: ['x'] }] }] }))
    ).toMatchObject({ fieldPath: 'innings[0].overs[0].deliveries[0]' });
  });

  it('fails when an innings is batted by a team not in the match', () => {
    const raw = rawMatch([innings('East', [over(0, [delivery('E One', 'S One', 'E Two')])])]);

    expect(catchError(() => MatchParser.parse(raw))).toMatchObject({ fieldPath: 'innings[0].team' });
  });

  it('defaults optional metadata', () => {
    const record = MatchParser.parse({ innings: [] });

    expect(record.matchId).toBe('Unknown');
    expect(record.teams).toEqual(['Unknown', 'Unknown']);
    expect(record.date).toBe('Unknown');
    expect(record.ballsPerOver).toBe(6);
    expect(record.toss).toBeNull();
    expect(record.outcome).toBeNull();
    expect(record.innings).toEqual([]);
  });

  it('reads a plain event string and numeric over indexes given as strings', () => {
    const record = MatchParser.parse({
      info: { teams: ['North', 'South'], event: 'Summer Cup' },
      innings: [{ team: 'North', overs: [{ over: '3', deliveries: [] }] }],
    });

    expect(record.event).toBe('Summer Cup');
    expect(record.innings[0].overs[0].over).toBe(3);
  });

  it('records recoverable problems as anomalies', () => {
    const raw = rawMatch([
      {
        overs: [
          over(0, [
            { batter: 'N One', bowler: 'S One', non_striker: 'N Two' },
            delivery('N One', 'S One', 'N Two', 0, {
              wickets: [{ player_out: 'N One', kind: 'mystery' }],
            }),
            delivery('N Two', 'S One', 'N Three', 0, { extras: { byes: -1 } }),
          ]),
        ],
      },
    ]);

    const [parsed] = MatchParser.parse(raw).innings;

    expect(parsed.team).toBe('Unknown');
    expect(parsed.anomalies).toEqual([
      { path: 'innings[0].team', message: 'batting team is missing' },
      { path: 'innings[0].overs[0].deliveries[0].runs', message: 'runs are missing; treated as 0' },
      {
        path: 'innings[0].overs[0].deliveries[1].wickets[0].kind',
        message: 'unrecognised dismissal kind "mystery"; treated as other',
      },
      {
        path: 'innings[0].overs[0].deliveries[2].extras.byes',
        message: 'expected a non-negative number, got -1; treated as 0',
      },
    ]);
    expect(parsed.overs[0].deliveries[1].wickets[0].kind).toBe('other');
    expect(parsed.overs[0].deliveries[0].runs.total).toBe(0);
  });

  it('fills in missing player names and reads the old batsman field', () => {
    const [parsed] = MatchParser.parse(
      rawMatch([innings('North', [over(0, [{ batsman: 'N One', runs: { batsman: 2, extras: 0, total: 2 } }])])])
    ).innings;

    expect(parsed.overs[0].deliveries[0]).toMatchObject({
      batter: 'N One',
      nonStriker: 'Unknown',
      bowler: 'Unknown',
      runs: { batter: 2, total: 2 },
    });
  });
});

describe('MatchParser helpers', () => {
  it('reports malformed text as a field path of $', () => {
    expect(catchError(() => MatchParser.parseText('{ "info": ', 'json'))).toMatchObject({ fieldPath: '$' });
  });

  it('detects file formats by extension', () => {
    expect(MatchParser.detectFormat('a/b/match.JSON')).toBe('json');
    expect(MatchParser.detectFormat('match.yml')).toBe('yaml');
    expect(MatchParser.detectFormat('match.txt')).toBeNull();
  });

  it('identifies records with ball-by-ball data', () => {
    const record = MatchParser.parseMatchFile(fixturePath('short.json'));

    expect(MatchParser.hasBallByBall(record)).toBe(true);
    expect(MatchParser.hasBallByBall(MatchParser.parse({ innings: [] }))).toBe(false);
  });
});
