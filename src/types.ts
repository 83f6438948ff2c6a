export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** Specialist agents, in the order they run and appear in the report. */
export const AGENT_NAMES = [
  'pitch_deck_agent',
  'market_agent',
  'team_agent',
  'financial_agent',
  'competitive_agent',
  'risk_agent',
  'dd_agent',
  'thesis_agent'
] as const;

export type AgentName = typeof AGENT_NAMES[number];

export interface DocumentRecord {
  id: string;
  kind: string;
  content: string;
  metadata: JsonObject;
  storedAt: string;
}

export interface AnalysisRecord {
  agent: AgentName;
  subject: string;
  result: JsonValue;
  run: number;  // writes so far for this (subject, agent) key
  recordedAt: string;
}

export type AnalysisMap = Partial<Record<AgentName, AnalysisRecord>>;

export interface HistoryEntry {
  index: number;
  userMessage: string;
  agentResponse: string;
  timestamp: string;
}

export interface SessionContext {
  subject: string;
  documents: readonly DocumentRecord[];
  analyses: Readonly<AnalysisMap>;
  history: readonly HistoryEntry[];
}

export interface SessionSummary {
  total_documents: number;
  total_conversations: number;
  // Across every subject analysed in the session.
  total_analyses: number;
  current_subject: string;
  documents: readonly DocumentRecord[];
  // subject -> agent -> record
  analyses: Readonly<Record<string, AnalysisMap>>;
  history: readonly HistoryEntry[];
}

/** Caller-supplied direction for a run; each analyst uses what applies to it. */
export interface AnalysisOptions {
  focus?: string;
  stage?: string;
}

export interface Analyst {
  readonly name: AgentName;
  readonly title: string;
  analyze(subject: string, context: SessionContext, options?: AnalysisOptions): JsonValue | Promise<JsonValue>;
}

export interface ErrorSignal {
  status: 'error';
  error_code: string;
  error_message: string;
}

export type Outcome<T extends object> = ({ status: 'success' } & T) | ErrorSignal;

export function isAgentName(value: string): value is AgentName {
  return AGENT_NAMES.some(name => name === value);
}
