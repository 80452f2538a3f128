import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { MatchAnalyzer } from '../../src/analyzer.js';
import { analyzeMatchFiles, listMatchFiles, writeMatchDocuments } from '../../src/batch.js';
import { createSilentLogger } from '../../src/utils/logger.js';
import { fixturePath } from '../helpers/raw-match.js';

describe('batch run', () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'match-digest-batch-'));
    fs.copyFileSync(fixturePath('short.json'), path.join(directory, 'short.json'));
    fs.copyFileSync(fixturePath('broken-over.json'), path.join(directory, 'broken-over.json'));
    fs.writeFileSync(path.join(directory, 'empty.json'), '{ "innings": [] }');
    fs.writeFileSync(path.join(directory, 'notes.txt'), 'not a match');
    fs.mkdirSync(path.join(directory, 'bad.json'));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('lists match files by name', () => {
    expect(listMatchFiles(directory)).toEqual(['bad.json', 'broken-over.json', 'empty.json', 'short.json']);
  });

  it('keeps going past files that cannot be analyzed', () => {
    const logger = createSilentLogger();
    const logError = vi.spyOn(logger, 'error');
    const progress = vi.fn();

    const result = analyzeMatchFiles(
      new MatchAnalyzer(createSilentLogger()),
      directory,
      listMatchFiles(directory),
      logger,
      progress
    );

    expect(result.documents.map((document) => document.metadata.filename)).toEqual(['short.json']);
    expect(result.warnings).toBe(0);
    expect(result.skipped).toHaveLength(3);
    expect(result.skipped[0]).toMatchObject({ file: 'bad.json', fieldPath: null });
    expect(result.skipped[0].reason).toContain('EISDIR');
    expect(result.skipped[1]).toEqual({
      file: 'broken-over.json',
      reason: 'over index must be a non-negative integer, got "second"',
      fieldPath: 'innings[0].overs[1].over',
    });
    expect(result.skipped[2]).toEqual({ file: 'empty.json', reason: 'no ball-by-ball data', fieldPath: null });
    expect(logError).toHaveBeenCalledTimes(2);
    expect(logError).toHaveBeenCalledWith('Skipping match file', result.skipped[1]);
    expect(progress).toHaveBeenCalledTimes(4);
    expect(progress).toHaveBeenLastCalledWith(4, 4);
  });

  it('writes one JSON line per document', () => {
    const { documents } = analyzeMatchFiles(
      new MatchAnalyzer(createSilentLogger()),
      directory,
      ['short.json'],
      createSilentLogger()
    );
    const outputPath = path.join(directory, 'out', 'documents.jsonl');

    writeMatchDocuments(outputPath, documents);

    const lines = fs.readFileSync(outputPath, 'utf-8').split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[1]).toBe('');
    expect(JSON.parse(lines[0])).toEqual(documents[0]);
  });

  it('writes an empty file when nothing was analyzed', () => {
    const outputPath = path.join(directory, 'empty.jsonl');

    writeMatchDocuments(outputPath, []);

    expect(fs.readFileSync(outputPath, 'utf-8')).toBe('');
  });
});
