import { describe, expect, it } from 'vitest';

import { MatchParser } from '../../src/data/match-parser.js';
import { StatsAggregator } from '../../src/data/stats-aggregator.js';
import { buildMatchDocument } from '../../src/report/document-builder.js';
import { renderMatchReport } from '../../src/report/report-renderer.js';
import { fixturePath } from '../helpers/raw-match.js';

describe('buildMatchDocument', () => {
  const stats = StatsAggregator.aggregateMatch(MatchParser.parseMatchFile(fixturePath('harbour-v-valley.json')));

  it('pairs the report text with match metadata', () => {
    const document = buildMatchDocument(stats, 'harbour-v-valley.json');

    expect(document.metadata).toEqual({
      filename: 'harbour-v-valley.json',
      match_id: 'harbour-v-valley',
      teams: ['Harbour Hawks', 'Valley Vipers'],
      date: '2024-04-12',
      venue: 'Harbour Oval',
      event: 'Coastal League',
    });
    expect(document.text).toBe(renderMatchReport(stats));
  });

  it('passes render options through', () => {
    const document = buildMatchDocument(stats, 'harbour-v-valley.json', { partnershipBreakdownMinRuns: 0 });

    expect(document.text).toContain('  By bowler:\n    Q Quinn: runs 0, balls 3, RR 0.00, fours 0, sixes 0, dots 3');
  });

  it('defaults metadata the record does not carry', () => {
    const short = StatsAggregator.aggregateMatch(MatchParser.parse({ innings: [] }));

    expect(buildMatchDocument(short, 'empty.json').metadata).toEqual({
      filename: 'empty.json',
      match_id: 'Unknown',
      teams: ['Unknown', 'Unknown'],
      date: 'Unknown',
      venue: 'Unknown',
      event: 'Unknown',
    });
  });
});
