export { MatchAnalyzer, type AnalyzerOptions, type MatchAnalysis } from './analyzer.js';
export {
  analyzeMatchFiles,
  listMatchFiles,
  writeMatchDocuments,
  type BatchResult,
  type SkippedMatchFile,
} from './batch.js';
export { MatchParser, type MatchFileFormat } from './data/match-parser.js';
export { StatsAggregator, type AggregationOptions } from './data/stats-aggregator.js';
export { InningsAggregator, type InningsContext } from './data/innings-aggregator.js';
export { PairTable } from './data/pair-table.js';
export { buildPhaseSplits, classifyOver, resolvePhasePolicy } from './data/phases.js';
export {
  ReportRenderer,
  buildReportSections,
  formatDismissal,
  formatOvers,
  renderMatchReport,
  type RenderOptions,
} from './report/report-renderer.js';
export { buildMatchDocument } from './report/document-builder.js';
export { ConfigurationError, MalformedMatchError, MatchDigestError } from './utils/errors.js';
export { createLogger, createMatchLogger, createSilentLogger, type LoggerConfig } from './utils/logger.js';
export { loadConfig, getConfig, resetConfig, type AppConfig } from './utils/config.js';
