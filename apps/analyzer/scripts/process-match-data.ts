#!/usr/bin/env tsx
/**
 * Match Data Processing Script
 *
 * Analyzes every match file in the data directory and writes one JSON line
 * per match document for indexing
 */

import {
  MatchAnalyzer,
  analyzeMatchFiles,
  createLogger,
  listMatchFiles,
  loadConfig,
  writeMatchDocuments,
} from '../src/index.js';

const config = loadConfig();
const logger = createLogger('match-processor', config.logging);

console.log('🏏 Match Digest - Match Data Processor\n');
console.log('Configuration:');
console.log(`  Match Data: ${config.data.matchDataDir}`);
console.log(`  Output: ${config.data.outputPath}`);
console.log(`  Partnership breakdown from: ${config.analysis.partnershipBreakdownMinRuns} runs\n`);

// Step 1: Find match files
console.log('📋 Step 1: Scanning match files...');

let matchFiles: string[];
try {
  matchFiles = listMatchFiles(config.data.matchDataDir);
} catch (error) {
  console.error('  ❌ Error reading match data directory:', error);
  process.exit(1);
}

console.log(`  ✅ Found ${matchFiles.length} match files\n`);

// Step 2: Analyze each match on its own
console.log('📊 Step 2: Analyzing matches...');

const analyzer = new MatchAnalyzer(logger, {
  phasePolicy: config.analysis.phasePolicy,
  partnershipBreakdownMinRuns: config.analysis.partnershipBreakdownMinRuns,
});

const { documents, skipped, warnings } = analyzeMatchFiles(
  analyzer,
  config.data.matchDataDir,
  matchFiles,
  logger,
  (processed, total) => {
    if (processed % 100 === 0) {
      console.log(`  Processed ${processed}/${total} matches...`);
    }
  }
);

console.log(`  ✅ Analyzed ${documents.length} matches`);
console.log(`  ⚠️  Skipped ${skipped.length} files, ${warnings} warnings recorded\n`);

// Step 3: Write documents
console.log('💾 Step 3: Writing match documents...');

writeMatchDocuments(config.data.outputPath, documents);

console.log(`  ✅ Wrote ${documents.length} documents to ${config.data.outputPath}\n`);
console.log('✨ Match data processing complete!');
