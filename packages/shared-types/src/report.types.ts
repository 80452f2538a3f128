export interface ReportSection {
  id: string;
  title: string | null;
  lines: string[];
}

export interface MatchDocumentMetadata {
  filename: string;
  match_id: string;
  teams: string[];
  date: string;
  venue: string;
  event: string;
}

export interface MatchDocument {
  text: string;
  metadata: MatchDocumentMetadata;
}
