import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createDefaultAnalysts } from './analysts.js';
import {
  AnalysisError,
  EmptyAnalysisError,
  FileNotFoundError,
  NoDataAvailableError,
  errorMessage,
  toErrorSignal
} from './errors.js';
import { ExtractorRegistry } from './extractors.js';
import { type Logger, createSilentLogger } from './logger.js';
import { type Decision, assembleReport } from './report-assembler.js';
import { SessionStore } from './session-store.js';
import type {
  AgentName,
  AnalysisOptions,
  AnalysisRecord,
  Analyst,
  ErrorSignal,
  Outcome
} from './types.js';

export interface PipelineOptions {
  extractors?: ExtractorRegistry;
  analysts?: Analyst[];
  logger?: Logger;
  now?: () => Date;
}

export type StoredDocument = Outcome<{
  doc_id: string;
  startup_name: string;
  message: string;
  auto_analyze_ready: boolean;
}>;

export type ProcessedFile = Outcome<{
  doc_id: string;
  file_name: string;
  file_type: string;
  document_kind: string;
  extracted_length: number;
  preview: string;
  startup_name: string;
  message: string;
  auto_analyze_ready: boolean;
}>;

export type ProcessedFiles = {
  status: 'success' | 'error';
  startup_name: string;
  processed: number;
  failed: number;
  results: Array<{ file_path: string } & ProcessedFile>;
};

export type AgentFailure = { agent: AgentName } & ErrorSignal;

export type SpecialistRun = Outcome<{ agent: AgentName; record: AnalysisRecord }>;

export type AnalysisRun = Outcome<{
  startup_name: string;
  analyses_completed: AgentName[];
  failures: AgentFailure[];
}>;

export type GeneratedReport = Outcome<{
  startup_name: string;
  report: string;
  overall_score: number | null;
  decision: Decision;
}>;

export type AutoAnalysis = Outcome<{
  startup_name: string;
  report: string;
  analyses_completed: AgentName[];
  failures: AgentFailure[];
  note: string;
}>;

/**
 * Drives one session: extraction into the store, the specialist analysts in
 * their fixed order, and report assembly. Failures come back as error
 * signals; nothing here ends the session.
 */
export class AnalysisPipeline {
  readonly extractors: ExtractorRegistry;
  readonly analysts: readonly Analyst[];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(readonly store: SessionStore, options: PipelineOptions = {}) {
    this.extractors = options.extractors ?? new ExtractorRegistry();
    this.analysts = options.analysts ?? createDefaultAnalysts();
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'pipeline' });
    this.now = options.now ?? (() => new Date());
  }

  storeContent(content: string, sourceType = 'pitch_deck', subject = ''): StoredDocument {
    try {
      const docId = this.store.storeDocument(sourceType, content, { startup_name: subject });
      this.store.addToHistory(
        `Provided ${sourceType} content for ${subject || 'unnamed startup'}`,
        `Stored ${sourceType} in local memory`
      );
      this.logger.info({ docId, sourceType, chars: content.length }, 'stored pasted content');
      return {
        status: 'success',
        doc_id: docId,
        startup_name: subject,
        message: 'Document stored in local memory. All specialist agents have access.',
        auto_analyze_ready: true
      };
    } catch (error) {
      this.logger.warn({ sourceType, err: errorMessage(error) }, 'failed to store content');
      return toErrorSignal(error);
    }
  }

  async processFile(filePath: string, subject = ''): Promise<ProcessedFile> {
    const fileName = path.basename(filePath);
    try {
      await this.assertFile(filePath);
      const extraction = await this.extractors.extract(filePath);

      const docId = this.store.storeDocument(extraction.kind, extraction.text, {
        startup_name: subject,
        original_file: fileName,
        file_type: extraction.extension
      });
      this.store.addToHistory(
        `Uploaded document: ${fileName}`,
        `Processed and stored ${extraction.kind} document`
      );
      this.logger.info({ docId, fileName, kind: extraction.kind, chars: extraction.text.length }, 'processed file');

      const { previewLength } = this.store.config;
      const text = extraction.text;
      return {
        status: 'success',
        doc_id: docId,
        file_name: fileName,
        file_type: extraction.extension,
        document_kind: extraction.kind,
        extracted_length: text.length,
        preview: text.length > previewLength ? `${text.slice(0, previewLength)}...` : text,
        startup_name: subject || 'Unknown',
        message: `Successfully processed ${fileName}. Document stored in memory.`,
        auto_analyze_ready: true
      };
    } catch (error) {
      this.logger.warn({ filePath, err: errorMessage(error) }, 'failed to process file');
      return toErrorSignal(error);
    }
  }

  async processFiles(filePaths: string[], subject = ''): Promise<ProcessedFiles> {
    const results: ProcessedFiles['results'] = [];
    for (const filePath of filePaths) {
      results.push({ file_path: filePath, ...await this.processFile(filePath, subject) });
    }
    const processed = results.filter(r => r.status === 'success').length;
    return {
      status: processed > 0 ? 'success' : 'error',
      startup_name: subject,
      processed,
      failed: results.length - processed,
      results
    };
  }

  async runAnalyst(agent: AgentName, subject: string, options: AnalysisOptions = {}): Promise<SpecialistRun> {
    subject = subject.trim();
    const analyst = this.analysts.find(a => a.name === agent);
    if (!analyst) {
      return toErrorSignal(new AnalysisError('analysis_failed', `No analyst registered for ${agent}`));
    }

    this.store.setSubject(subject);
    try {
      const record = await this.invoke(analyst, subject, options);
      return { status: 'success', agent, record };
    } catch (error) {
      this.logger.warn({ agent, err: errorMessage(error) }, 'analyst failed');
      return toErrorSignal(error);
    }
  }

  async runAnalysis(subject: string, options: AnalysisOptions = {}): Promise<AnalysisRun> {
    subject = subject.trim();
    this.store.setSubject(subject);
    if (this.store.documentCount === 0) {
      return toErrorSignal(new EmptyAnalysisError());
    }

    this.logger.info({ subject, analysts: this.analysts.length }, 'running analysis');
    const completed: AgentName[] = [];
    const failures: AgentFailure[] = [];

    for (const analyst of this.analysts) {
      try {
        await this.invoke(analyst, subject, options);
        completed.push(analyst.name);
      } catch (error) {
        this.logger.warn({ agent: analyst.name, err: errorMessage(error) }, 'analyst failed');
        failures.push({ agent: analyst.name, ...toErrorSignal(error) });
      }
    }

    if (completed.length === 0) {
      return toErrorSignal(new AnalysisError('analysis_failed', `Every analyst failed for ${subject}`));
    }
    return { status: 'success', startup_name: subject, analyses_completed: completed, failures };
  }

  generateReport(subject: string, stage?: string): GeneratedReport {
    subject = subject.trim();
    this.store.setSubject(subject);
    const outcome = assembleReport(subject, this.store.getContext(), {
      stage,
      generatedAt: this.now(),
      config: this.store.config
    });

    if (outcome.status === 'no_data') {
      return toErrorSignal(new NoDataAvailableError(subject));
    }
    return {
      status: 'success',
      startup_name: subject,
      report: outcome.report,
      overall_score: outcome.overall_score,
      decision: outcome.decision
    };
  }

  async autoAnalyze(subject: string, stage?: string): Promise<AutoAnalysis> {
    subject = subject.trim();
    const run = await this.runAnalysis(subject, { stage });
    if (run.status === 'error') return run;

    this.store.addToHistory(
      `Auto-analysis triggered for ${subject}`,
      `Completed ${run.analyses_completed.length}-agent analysis`
    );

    const report = this.generateReport(subject, stage);
    if (report.status === 'error') return report;

    return {
      status: 'success',
      startup_name: subject,
      report: report.report,
      analyses_completed: run.analyses_completed,
      failures: run.failures,
      note: 'Analysis complete. All data stored in local memory. Ask follow-up questions anytime!'
    };
  }

  describeWorkflow(subject: string) {
    subject = subject.trim();
    const context = this.store.getContext();
    return {
      status: 'success' as const,
      startup: subject,
      total_documents: context.documents.length,
      agents_activated: this.analysts.map(a => a.title),
      workflow: [
        '1. All documents distributed to specialized agents',
        '2. Each agent analyzes from their perspective',
        '3. Results stored and cross-referenced',
        '4. Final synthesis generated',
        '5. Investment recommendation produced'
      ],
      available_documents: context.documents.map(doc => doc.kind),
      previous_analyses: Object.keys(this.store.getAnalyses(subject)),
      next_action: `Ask specific questions or request analysis from any specialized agent for ${subject}`
    };
  }

  private async invoke(analyst: Analyst, subject: string, options: AnalysisOptions): Promise<AnalysisRecord> {
    let result: unknown;
    try {
      result = await analyst.analyze(subject, this.store.getContext(), options);
    } catch (error) {
      throw new AnalysisError('analysis_failed', `${analyst.title} failed: ${errorMessage(error)}`, { cause: error });
    }
    // Rejects results that are not JSON-safe before anything is stored.
    return this.store.storeAnalysis(analyst.name, result, subject);
  }

  private async assertFile(filePath: string): Promise<void> {
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) throw new FileNotFoundError(filePath);
    } catch (error) {
      if (error instanceof FileNotFoundError) throw error;
      throw new FileNotFoundError(filePath);
    }
  }
}
