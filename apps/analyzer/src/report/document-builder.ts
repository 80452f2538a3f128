import type { MatchDocument, MatchStats } from '@match-digest/shared-types';
import { renderMatchReport, type RenderOptions } from './report-renderer.js';

/**
 * Package a rendered report with the metadata an indexer keys on
 */
export function buildMatchDocument(stats: MatchStats, filename: string, options: RenderOptions = {}): MatchDocument {
  const { record } = stats;

  return {
    text: renderMatchReport(stats, options),
    metadata: {
      filename,
      match_id: record.matchId,
      teams: [...record.teams],
      date: record.date,
      venue: record.venue,
      event: record.event,
    },
  };
}
