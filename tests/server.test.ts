import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { InvestorAnalysisMCPServer } from '../src/server.js';

describe('InvestorAnalysisMCPServer', () => {
  let server: InvestorAnalysisMCPServer;
  let client: Client;
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'server-'));
    server = new InvestorAnalysisMCPServer({ now: () => new Date('2025-01-15T10:00:00.000Z') });
    client = new Client({ name: 'test-client', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await rm(dir, { recursive: true, force: true });
  });

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const texts = result.content.flatMap(item => (item.type === 'text' ? [item.text] : []));
    return { isError: result.isError ?? false, texts };
  }

  it('lists the tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map(tool => tool.name)).toEqual([
      'store_document_content',
      'process_uploaded_file',
      'process_uploaded_files',
      'retrieve_all_documents',
      'search_conversation_history',
      'record_conversation',
      'run_specialist_analysis',
      'auto_analyze_documents',
      'generate_investor_report',
      'orchestrate_full_analysis',
      'get_session_summary'
    ]);
  });

  it('stores pasted content', async () => {
    const { isError, texts } = await call('store_document_content', {
      content: 'Revenue: $500K ARR, Growth: 200% YoY',
      startup_name: 'Acme'
    });

    expect(isError).toBe(false);
    expect(JSON.parse(texts[0])).toMatchObject({ status: 'success', doc_id: 'pitch_deck_0', startup_name: 'Acme' });
  });

  it('rejects blank content as invalid params', async () => {
    await expect(call('store_document_content', { content: '  ' })).rejects.toThrow(
      /Document content is required and must be a non-empty string/
    );
  });

  it('rejects arguments of the wrong type', async () => {
    await expect(call('store_document_content', { content: 42 })).rejects.toThrow(/Invalid arguments: content/);
  });

  it('rejects an unknown agent', async () => {
    await expect(call('run_specialist_analysis', { agent: 'oracle_agent', startup_name: 'Acme' })).rejects.toThrow(
      /Agent must be one of: pitch_deck_agent/
    );
  });

  it('rejects unexpected arguments to the summary tool', async () => {
    await expect(call('get_session_summary', { verbose: true })).rejects.toThrow(/Invalid arguments/);
  });

  it('rejects an unknown tool', async () => {
    await expect(call('delete_everything')).rejects.toThrow(/Unknown tool: delete_everything/);
  });

  it('returns a missing file as an error result', async () => {
    const missing = path.join(dir, 'deck.pdf');
    const { isError, texts } = await call('process_uploaded_file', { file_path: missing });

    expect(isError).toBe(true);
    expect(JSON.parse(texts[0])).toEqual({
      status: 'error',
      error_code: 'file_not_found',
      error_message: `File not found: ${missing}`
    });
  });

  it('refuses to analyze an empty session', async () => {
    const { isError, texts } = await call('auto_analyze_documents', { startup_name: 'Acme' });

    expect(isError).toBe(true);
    expect(JSON.parse(texts[0])).toMatchObject({
      error_code: 'empty_analysis',
      error_message: 'No documents found to analyze. Please upload documents first.'
    });
  });

  it('runs the whole flow from upload to report', async () => {
    const deck = path.join(dir, 'deck.md');
    await writeFile(deck, '# Acme\n\nRevenue: $500K ARR, Growth: 200% YoY\n');

    const upload = await call('process_uploaded_file', { file_path: deck, startup_name: 'Acme' });
    expect(JSON.parse(upload.texts[0])).toMatchObject({ doc_id: 'text_document_0', document_kind: 'text_document' });

    const analysis = await call('auto_analyze_documents', { startup_name: 'Acme' });
    expect(analysis.isError).toBe(false);
    expect(analysis.texts[0]).toContain('# Investor Analysis: Acme');
    expect(analysis.texts[0]).toContain('### Financial Metrics\n\n- Revenue: $500K ARR, Growth: 200% YoY');
    expect(JSON.parse(analysis.texts[1]).analyses_completed).toHaveLength(8);

    const report = await call('generate_investor_report', { startup_name: 'Acme', stage: 'Series A' });
    expect(report.texts[0]).toContain('**Stage:** Series A');
    expect(JSON.parse(report.texts[1])).toMatchObject({ status: 'success', decision: 'UNDER REVIEW' });

    const summary = await call('get_session_summary');
    expect(JSON.parse(summary.texts[0])).toMatchObject({ total_documents: 1, total_analyses: 8, current_subject: 'Acme' });
  });

  it('summarises the analyses of every subject', async () => {
    await call('store_document_content', { content: 'Acme and Beta decks' });
    await call('auto_analyze_documents', { startup_name: 'Acme' });
    await call('auto_analyze_documents', { startup_name: 'Beta' });

    const summary = JSON.parse((await call('get_session_summary')).texts[0]);
    expect(summary.total_analyses).toBe(16);
    expect(summary.current_subject).toBe('Beta');
    expect(Object.keys(summary.analyses)).toEqual(['Acme', 'Beta']);
    expect(Object.keys(summary.analyses.Acme)).toHaveLength(8);

    const workflow = JSON.parse((await call('orchestrate_full_analysis', { startup_name: 'Gamma' })).texts[0]);
    expect(workflow.previous_analyses).toEqual([]);
  });

  it('passes the focus to a specialist', async () => {
    await call('store_document_content', { content: 'Acme deck', startup_name: 'Acme' });
    const { texts } = await call('run_specialist_analysis', {
      agent: 'market_agent',
      startup_name: 'Acme',
      focus: 'rural freight'
    });

    expect(JSON.parse(texts[0]).result).toMatchObject({ focus_area: 'rural freight' });
  });

  it('reruns a single specialist', async () => {
    await call('store_document_content', { content: 'Acme team: two founders', source_type: 'memo' });
    await call('run_specialist_analysis', { agent: 'team_agent', startup_name: 'Acme' });
    const { texts } = await call('run_specialist_analysis', { agent: 'team_agent', startup_name: 'Acme' });

    expect(JSON.parse(texts[0])).toMatchObject({
      status: 'success',
      agent: 'team_agent',
      startup_name: 'Acme',
      run: 2,
      result: { agent: 'Team Assessment Specialist', documents_analyzed: 1, document_types: ['memo'] }
    });
  });

  it('previews stored documents unless asked for content', async () => {
    await call('store_document_content', { content: 'Deck body', startup_name: 'Acme' });

    const listed = JSON.parse((await call('retrieve_all_documents')).texts[0]);
    expect(listed.total_documents).toBe(1);
    expect(listed.documents[0]).toMatchObject({ doc_id: 'pitch_deck_0', preview: 'Deck body', length: 9 });
    expect(listed.documents[0].content).toBeUndefined();

    const full = JSON.parse((await call('retrieve_all_documents', { include_content: true })).texts[0]);
    expect(full.documents[0].content).toBe('Deck body');
  });

  it('lists analyses and the conversation alongside the documents', async () => {
    await call('store_document_content', { content: 'Acme deck', startup_name: 'Acme' });
    await call('run_specialist_analysis', { agent: 'team_agent', startup_name: 'Acme' });

    const listed = JSON.parse((await call('retrieve_all_documents')).texts[0]);
    expect(listed.previous_analyses).toEqual({ Acme: ['team_agent'] });
    expect(listed.complete_conversation_history.map((entry: { userMessage: string }) => entry.userMessage)).toEqual([
      'Provided pitch_deck content for Acme'
    ]);
  });

  it('records and searches the conversation', async () => {
    await call('record_conversation', { user_message: 'What is the burn rate?', agent_response: '$80K per month' });
    await call('record_conversation', { user_message: 'Who leads sales?' });

    const { texts } = await call('search_conversation_history', { query: 'BURN' });
    const found = JSON.parse(texts[0]);

    expect(found.matches).toBe(1);
    expect(found.results[0]).toMatchObject({ index: 0, userMessage: 'What is the burn rate?' });
  });

  it('describes the workflow', async () => {
    await call('store_document_content', { content: 'Deck body' });
    const { texts } = await call('orchestrate_full_analysis', { startup_name: 'Acme' });

    expect(JSON.parse(texts[0])).toMatchObject({
      status: 'success',
      startup: 'Acme',
      total_documents: 1,
      available_documents: ['pitch_deck']
    });
  });
});
