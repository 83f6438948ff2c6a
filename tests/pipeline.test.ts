import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createDefaultAnalysts } from '../src/analysts.js';
import { AnalysisPipeline } from '../src/pipeline.js';
import { SessionStore } from '../src/session-store.js';
import type { AgentName, Analyst } from '../src/types.js';

function stubAnalyst(name: AgentName, analyze: Analyst['analyze']): Analyst {
  return { name, title: `${name} stub`, analyze };
}

describe('AnalysisPipeline', () => {
  let dir: string;
  let store: SessionStore;
  let pipeline: AnalysisPipeline;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'pipeline-'));
    store = new SessionStore({ now: () => new Date('2025-01-15T10:00:00.000Z') });
    pipeline = new AnalysisPipeline(store, { now: () => new Date('2025-01-15T10:00:00.000Z') });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function fixture(name: string, content: string): Promise<string> {
    const filePath = path.join(dir, name);
    await writeFile(filePath, content);
    return filePath;
  }

  describe('storeContent', () => {
    it('stores pasted text and records it in the history', () => {
      const outcome = pipeline.storeContent('Revenue: $500K ARR', 'pitch_deck', 'Acme');

      expect(outcome).toMatchObject({ status: 'success', doc_id: 'pitch_deck_0', startup_name: 'Acme' });
      expect(store.getDocument('pitch_deck_0')?.metadata).toEqual({ startup_name: 'Acme' });
      expect(store.searchHistory('pitch_deck').map(entry => entry.userMessage)).toEqual([
        'Provided pitch_deck content for Acme'
      ]);
    });

    it('returns an error signal for blank content', () => {
      expect(pipeline.storeContent('  ', 'pitch_deck', 'Acme')).toEqual({
        status: 'error',
        error_code: 'invalid_input',
        error_message: 'Document content is required and must be a non-empty string'
      });
    });
  });

  describe('processFile', () => {
    it('extracts, stores and previews a text file', async () => {
      const filePath = await fixture('deck.txt', 'Acme deck\nRevenue: $500K ARR');
      const outcome = await pipeline.processFile(filePath, 'Acme');

      expect(outcome).toEqual({
        status: 'success',
        doc_id: 'text_document_0',
        file_name: 'deck.txt',
        file_type: '.txt',
        document_kind: 'text_document',
        extracted_length: 28,
        preview: 'Acme deck\nRevenue: $500K ARR',
        startup_name: 'Acme',
        message: 'Successfully processed deck.txt. Document stored in memory.',
        auto_analyze_ready: true
      });
      expect(store.getDocument('text_document_0')?.metadata).toEqual({
        startup_name: 'Acme',
        original_file: 'deck.txt',
        file_type: '.txt'
      });
      expect(store.getContext().history.map(entry => entry.userMessage)).toEqual(['Uploaded document: deck.txt']);
    });

    it('truncates the preview', async () => {
      const shortPreview = new AnalysisPipeline(new SessionStore({ config: { previewLength: 4 } }));
      const filePath = await fixture('notes.txt', 'abcdefgh');
      const outcome = await shortPreview.processFile(filePath);

      expect(outcome).toMatchObject({ status: 'success', preview: 'abcd...', startup_name: 'Unknown' });
    });

    it('reports a missing file', async () => {
      const missing = path.join(dir, 'missing.pdf');
      expect(await pipeline.processFile(missing)).toEqual({
        status: 'error',
        error_code: 'file_not_found',
        error_message: `File not found: ${missing}`
      });
    });

    it('reports a directory as not found', async () => {
      const folder = path.join(dir, 'folder.txt');
      await mkdir(folder);
      expect(await pipeline.processFile(folder)).toMatchObject({ error_code: 'file_not_found' });
    });

    it('reports a format without a parser', async () => {
      const filePath = await fixture('deck.pptx', 'binary');
      expect(await pipeline.processFile(filePath)).toMatchObject({
        status: 'error',
        error_code: 'unsupported_file_type'
      });
      expect(store.documentCount).toBe(0);
    });

    it('reports a failing parser as an extraction failure', async () => {
      const filePath = await fixture('deck.pdf', 'binary');
      pipeline.extractors.register('pdf', async () => {
        throw new Error('bad xref table');
      });

      expect(await pipeline.processFile(filePath)).toEqual({
        status: 'error',
        error_code: 'extraction_failed',
        error_message: `Failed to extract text from ${filePath}: bad xref table`
      });
    });
  });

  describe('processFiles', () => {
    it('continues past a failed file', async () => {
      const good = await fixture('memo.md', 'Team: two founders');
      const bad = path.join(dir, 'gone.txt');
      const outcome = await pipeline.processFiles([bad, good], 'Acme');

      expect(outcome.status).toBe('success');
      expect(outcome.processed).toBe(1);
      expect(outcome.failed).toBe(1);
      expect(outcome.results.map(r => [r.file_path, r.status])).toEqual([
        [bad, 'error'],
        [good, 'success']
      ]);
      expect(store.documentCount).toBe(1);
    });

    it('is an error when nothing was processed', async () => {
      const outcome = await pipeline.processFiles([path.join(dir, 'gone.txt')]);
      expect(outcome).toMatchObject({ status: 'error', processed: 0, failed: 1 });
    });
  });

  describe('runAnalysis', () => {
    it('refuses to run without documents', async () => {
      expect(await pipeline.runAnalysis('Acme')).toEqual({
        status: 'error',
        error_code: 'empty_analysis',
        error_message: 'No documents found to analyze. Please upload documents first.'
      });
    });

    it('runs every analyst in order', async () => {
      const calls: AgentName[] = [];
      const analysts = createDefaultAnalysts().map(analyst =>
        stubAnalyst(analyst.name, () => {
          calls.push(analyst.name);
          return { done: true };
        })
      );
      const ordered = new AnalysisPipeline(store, { analysts });
      store.storeDocument('text', 'deck');

      const outcome = await ordered.runAnalysis('Acme');

      expect(outcome).toMatchObject({ status: 'success', startup_name: 'Acme', failures: [] });
      expect(calls).toEqual(createDefaultAnalysts().map(a => a.name));
      expect(Object.keys(store.getAnalyses('Acme'))).toHaveLength(8);
    });

    it('collects failures without stopping', async () => {
      const later = vi.fn(() => 'fine');
      const mixed = new AnalysisPipeline(store, {
        analysts: [
          stubAnalyst('pitch_deck_agent', () => {
            throw new Error('model unavailable');
          }),
          stubAnalyst('market_agent', () => ({ score: Number.NaN })),
          stubAnalyst('team_agent', later)
        ]
      });
      store.storeDocument('text', 'deck');

      const outcome = await mixed.runAnalysis('Acme');

      expect(later).toHaveBeenCalledTimes(1);
      expect(outcome).toEqual({
        status: 'success',
        startup_name: 'Acme',
        analyses_completed: ['team_agent'],
        failures: [
          {
            agent: 'pitch_deck_agent',
            status: 'error',
            error_code: 'analysis_failed',
            error_message: 'pitch_deck_agent stub failed: model unavailable'
          },
          {
            agent: 'market_agent',
            status: 'error',
            error_code: 'malformed_result',
            error_message: 'Result is not JSON-safe at market_agent.score: non-finite number NaN'
          }
        ]
      });
      expect(Object.keys(store.getAnalyses('Acme'))).toEqual(['team_agent']);
    });

    it('is an error when every analyst fails', async () => {
      const failing = new AnalysisPipeline(store, {
        analysts: [stubAnalyst('risk_agent', async () => Promise.reject(new Error('timeout')))]
      });
      store.storeDocument('text', 'deck');

      expect(await failing.runAnalysis('Acme')).toMatchObject({
        status: 'error',
        error_code: 'analysis_failed',
        error_message: 'Every analyst failed for Acme'
      });
    });

    it('keys analyses by the trimmed subject', async () => {
      store.storeDocument('pitch_deck', 'Acme deck', { startup_name: 'Acme' });

      await pipeline.runAnalysis(' Acme ');
      const report = pipeline.generateReport(' Acme ');

      expect(Object.keys(store.getAnalyses('Acme'))).toHaveLength(8);
      expect(store.getAnalyses(' Acme ')).toEqual({});
      if (report.status !== 'success') throw new Error(report.error_message);
      expect(report.startup_name).toBe('Acme');
      expect(report.report).toContain('**Analyses Completed:** 8 of 8  ');
    });
  });

  describe('runAnalyst', () => {
    it('stores one result and counts reruns', async () => {
      store.storeDocument('pitch_deck', 'Acme deck', { startup_name: 'Acme' });

      await pipeline.runAnalyst('team_agent', 'Acme');
      const outcome = await pipeline.runAnalyst('team_agent', 'Acme');

      if (outcome.status !== 'success') throw new Error(outcome.error_message);
      expect(outcome.record.run).toBe(2);
      expect(outcome.record.result).toMatchObject({ agent: 'Team Assessment Specialist', documents_analyzed: 1 });
    });

    it('passes the focus and stage to the analyst', async () => {
      store.storeDocument('pitch_deck', 'Acme deck', { startup_name: 'Acme' });

      const focused = await pipeline.runAnalyst('pitch_deck_agent', 'Acme', { focus: 'unit economics' });
      const checklist = await pipeline.runAnalyst('dd_agent', 'Acme', { stage: 'Series A' });
      const unfocused = await pipeline.runAnalyst('market_agent', 'Acme');

      expect(store.getAnalyses('Acme').pitch_deck_agent?.result).toMatchObject({ specific_focus: 'unit economics' });
      expect(store.getAnalyses('Acme').dd_agent?.result).toMatchObject({ stage: 'Series A' });
      expect(focused.status).toBe('success');
      expect(checklist.status).toBe('success');
      if (unfocused.status !== 'success') throw new Error(unfocused.error_message);
      expect(unfocused.record.result).not.toHaveProperty('focus_area');
    });

    it('reports an agent with no analyst', async () => {
      const partial = new AnalysisPipeline(store, { analysts: [] });
      expect(await partial.runAnalyst('dd_agent', 'Acme')).toEqual({
        status: 'error',
        error_code: 'analysis_failed',
        error_message: 'No analyst registered for dd_agent'
      });
    });
  });

  describe('reports', () => {
    it('signals no data for an empty session', () => {
      expect(pipeline.generateReport('Acme')).toEqual({
        status: 'error',
        error_code: 'no_data_available',
        error_message: 'No data available for Acme: store documents or run an analysis first.'
      });
    });

    it('analyzes uploaded files end to end', async () => {
      const filePath = await fixture('deck.txt', 'Acme: rural marketplace\nRevenue: $500K ARR, Growth: 200% YoY');
      await pipeline.processFile(filePath, 'Acme');

      const outcome = await pipeline.autoAnalyze('Acme');
      if (outcome.status !== 'success') throw new Error(outcome.error_message);

      expect(outcome.analyses_completed).toHaveLength(8);
      expect(outcome.failures).toEqual([]);
      expect(outcome.report).toContain('# Investor Analysis: Acme');
      expect(outcome.report).toContain('**Analysis Date:** 2025-01-15  ');
      expect(outcome.report).toContain('- Revenue: $500K ARR, Growth: 200% YoY');
      expect(outcome.report).toContain('| Market Risk | To be determined from document analysis | Strategies based on competitive landscape |');
      expect(store.searchHistory('auto-analysis').map(entry => entry.agentResponse)).toEqual([
        'Completed 8-agent analysis'
      ]);
    });

    it('stops before the report when there is nothing to analyze', async () => {
      expect(await pipeline.autoAnalyze('Acme')).toMatchObject({ error_code: 'empty_analysis' });
      expect(store.getContext().history).toEqual([]);
    });
  });

  it('describes the workflow and what is stored', () => {
    store.storeDocument('pitch_deck', 'deck');
    const overview = pipeline.describeWorkflow('Acme');

    expect(overview.total_documents).toBe(1);
    expect(overview.available_documents).toEqual(['pitch_deck']);
    expect(overview.agents_activated[0]).toBe('Pitch Deck Analyst');
    expect(overview.agents_activated).toHaveLength(8);
  });

  it('lists previous analyses for the subject asked about only', async () => {
    store.storeDocument('pitch_deck', 'Acme and Beta decks');
    await pipeline.runAnalyst('team_agent', 'Acme');

    expect(pipeline.describeWorkflow('Acme').previous_analyses).toEqual(['team_agent']);
    expect(pipeline.describeWorkflow('Gamma').previous_analyses).toEqual([]);
  });
});
