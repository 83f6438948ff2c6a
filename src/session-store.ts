import type {
  AgentName,
  AnalysisMap,
  AnalysisRecord,
  DocumentRecord,
  HistoryEntry,
  JsonObject,
  SessionContext,
  SessionSummary
} from './types.js';
import { type AnalysisServerConfig, resolveConfig } from './config.js';
import { assertJsonValue, deepFreeze, freezeCopy, isJsonObject } from './json-value.js';
import * as Validation from './validation.js';

export interface SessionStoreOptions {
  config?: AnalysisServerConfig;
  now?: () => Date;
}

/**
 * Process-lifetime store for one analysis session: uploaded documents,
 * per-agent analysis results and the conversation log.
 *
 * Every record handed out is a frozen copy. Mutation only happens through
 * the methods below.
 */
export class SessionStore {
  private documents = new Map<string, DocumentRecord>();
  // subject -> agent -> record
  private analyses = new Map<string, Map<AgentName, AnalysisRecord>>();
  private history: HistoryEntry[] = [];
  private subject = '';

  readonly config: Required<AnalysisServerConfig>;
  private readonly now: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    this.config = resolveConfig(options.config);
    this.now = options.now ?? (() => new Date());
  }

  get currentSubject(): string {
    return this.subject;
  }

  setSubject(subject: string): void {
    this.subject = subject.trim();
  }

  // Documents
  storeDocument(kind: string, content: string, metadata: JsonObject = {}): string {
    Validation.validateDocumentKind(kind);
    Validation.validateContent(content, this.config);
    Validation.validateDocumentCount(this.documents.size, this.config);
    assertJsonValue(metadata, 'metadata');
    if (!isJsonObject(metadata)) {
      throw new Validation.ValidationError('Document metadata must be an object');
    }

    const docId = `${kind}_${this.documents.size}`;
    const record: DocumentRecord = deepFreeze({
      id: docId,
      kind,
      content,
      metadata: freezeCopy(metadata),
      storedAt: this.timestamp()
    });

    this.documents.set(docId, record);
    return docId;
  }

  getDocument(docId: string): DocumentRecord | null {
    return this.documents.get(docId) ?? null;
  }

  /** Insertion-ordered view; each iteration walks the documents stored at that moment. */
  getAllDocuments(): Iterable<DocumentRecord> {
    const documents = this.documents;
    return {
      *[Symbol.iterator]() {
        yield* documents.values();
      }
    };
  }

  get documentCount(): number {
    return this.documents.size;
  }

  // Analyses
  storeAnalysis(agent: AgentName, result: unknown, subject: string = this.subject): AnalysisRecord {
    assertJsonValue(result, agent);

    let bySubject = this.analyses.get(subject);
    if (!bySubject) {
      bySubject = new Map();
      this.analyses.set(subject, bySubject);
    }

    const previous = bySubject.get(agent);
    const record: AnalysisRecord = deepFreeze({
      agent,
      subject,
      result: freezeCopy(result),
      run: (previous?.run ?? 0) + 1,
      recordedAt: this.timestamp()
    });

    bySubject.set(agent, record);
    return record;
  }

  getAnalyses(subject: string = this.subject): AnalysisMap {
    const bySubject = this.analyses.get(subject);
    return bySubject ? Object.fromEntries(bySubject) : {};
  }

  /** Every stored analysis, grouped by subject in the order subjects were first analysed. */
  getAllAnalyses(): Record<string, AnalysisMap> {
    const grouped: Record<string, AnalysisMap> = {};
    for (const [subject, bySubject] of this.analyses) {
      grouped[subject] = Object.fromEntries(bySubject);
    }
    return deepFreeze(grouped);
  }

  get analysisCount(): number {
    let count = 0;
    for (const bySubject of this.analyses.values()) count += bySubject.size;
    return count;
  }

  // Conversation history
  addToHistory(userMessage: string, agentResponse = ''): HistoryEntry {
    const entry: HistoryEntry = deepFreeze({
      index: this.history.length,
      userMessage,
      agentResponse,
      timestamp: this.timestamp()
    });
    this.history.push(entry);
    return entry;
  }

  searchHistory(keyword: string): HistoryEntry[] {
    const needle = keyword.toLowerCase();
    return this.history.filter(entry =>
      entry.userMessage.toLowerCase().includes(needle) ||
      entry.agentResponse.toLowerCase().includes(needle)
    );
  }

  // Aggregate views
  getContext(): SessionContext {
    return deepFreeze({
      subject: this.subject,
      documents: [...this.documents.values()],
      analyses: this.getAnalyses(),
      history: [...this.history]
    });
  }

  getSummary(): SessionSummary {
    const context = this.getContext();
    return {
      total_documents: context.documents.length,
      total_conversations: context.history.length,
      total_analyses: this.analysisCount,
      current_subject: context.subject,
      documents: context.documents,
      analyses: this.getAllAnalyses(),
      history: context.history
    };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
