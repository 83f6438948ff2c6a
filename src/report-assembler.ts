import { type AnalysisServerConfig, resolveConfig } from './config.js';
import { isJsonObject } from './json-value.js';
import { bulletList, formatPrimitive, humanize, renderField, table } from './markdown.js';
import * as Insights from './report-insights.js';
import {
  AGENT_NAMES,
  type AgentName,
  type AnalysisRecord,
  type JsonObject,
  type JsonValue,
  type SessionContext
} from './types.js';

export interface ReportOptions {
  stage?: string;
  generatedAt: Date;
  config?: Pick<
    AnalysisServerConfig,
    'reportExcerptLength' | 'metricScanLines' | 'structureScanLines' | 'maxMetricLines'
  >;
}

export type ReportOutcome =
  | { status: 'success'; report: string; overall_score: number | null; decision: Decision }
  | { status: 'no_data'; message: string };

export type Decision = 'INVEST' | 'REVISIT LATER' | 'PASS' | 'UNDER REVIEW';

export const SECTION_HEADINGS: Record<AgentName, string> = {
  pitch_deck_agent: 'Pitch Deck Analysis',
  market_agent: 'Market Analysis',
  team_agent: 'Team Assessment',
  financial_agent: 'Financial Analysis',
  competitive_agent: 'Competitive Analysis',
  risk_agent: 'Risk Assessment',
  dd_agent: 'Due Diligence Checklist',
  thesis_agent: 'Investment Thesis'
};

interface ScorecardCategory {
  label: string;
  weight: number;
  agent: AgentName;
  rationale: (corpus: string) => string;
}

const SCORECARD: readonly ScorecardCategory[] = [
  { label: 'Market Opportunity', weight: 25, agent: 'market_agent', rationale: Insights.marketInsight },
  { label: 'Team Quality', weight: 25, agent: 'team_agent', rationale: Insights.teamInsight },
  { label: 'Product/Traction', weight: 20, agent: 'pitch_deck_agent', rationale: Insights.tractionInsight },
  { label: 'Financial Health', weight: 15, agent: 'financial_agent', rationale: Insights.financialInsight },
  { label: 'Competitive Position', weight: 10, agent: 'competitive_agent', rationale: Insights.competitiveInsight },
  { label: 'Risk Profile', weight: 5, agent: 'risk_agent', rationale: Insights.riskInsight }
];

const RISK_TYPES = ['market_risk', 'execution_risk', 'financial_risk', 'competitive_risk', 'regulatory_risk'] as const;

// Fields rendered in the header lines of an agent subsection rather than as findings.
const HEADER_FIELDS = new Set([
  'status', 'agent', 'startup_name', 'documents_analyzed', 'document_types', 'recommendation', 'score'
]);

const DEFAULT_EXIT_SCENARIOS = [
  'Strategic acquisition (3-5 years)',
  'IPO (5-7 years)',
  'Secondary market (2-4 years)'
];

const NEXT_STEPS = [
  'Deep dive into specific metrics',
  'Founder/team meetings',
  'Customer reference calls',
  'Financial model review'
];

interface ReportInputs {
  subject: string;
  context: SessionContext;
  corpus: string;
  stage: string;
  date: string;
  metricLimits: Insights.ScanLimits;
  structureLimits: Insights.ScanLimits;
  scores: Map<AgentName, number>;
  overall: number | null;
  decision: Decision;
}

function resultObject(record: AnalysisRecord | undefined): JsonObject | null {
  return record && isJsonObject(record.result) ? record.result : null;
}

function stringField(obj: JsonObject | null, key: string): string | null {
  const value = obj?.[key];
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

/** Numeric `score` field of an agent result, accepted when it lies in 0..10. */
export function agentScore(record: AnalysisRecord | undefined): number | null {
  const value = resultObject(record)?.score;
  return typeof value === 'number' && value >= 0 && value <= 10 ? value : null;
}

export function overallScore(scores: ReadonlyMap<AgentName, number>): number | null {
  let weighted = 0;
  let weights = 0;
  for (const category of SCORECARD) {
    const score = scores.get(category.agent);
    if (score === undefined) continue;
    weighted += score * category.weight;
    weights += category.weight;
  }
  return weights === 0 ? null : Math.round((weighted / weights) * 10) / 10;
}

export function decide(overall: number | null, complete: boolean): Decision {
  if (overall === null || !complete) return 'UNDER REVIEW';
  if (overall >= 7) return 'INVEST';
  if (overall >= 5) return 'REVISIT LATER';
  return 'PASS';
}

// Sections

function executiveSummary(input: ReportInputs): string {
  const { subject, context, corpus } = input;
  const completed = AGENT_NAMES.filter(agent => context.analyses[agent]).length;
  const highlights = context.documents.length > 0 ? Insights.keyHighlights(corpus) : [];

  return [
    `# Investor Analysis: ${subject}`,
    '',
    '## Executive Summary',
    '',
    `**Company:** ${subject}  `,
    `**Documents Analyzed:** ${context.documents.length}  `,
    `**Analyses Completed:** ${completed} of ${AGENT_NAMES.length}  `,
    `**Analysis Date:** ${input.date}  `,
    `**Stage:** ${input.stage}`,
    '',
    '### Key Highlights',
    '',
    bulletList(
      highlights,
      context.documents.length > 0 ? 'Comprehensive business documentation provided' : 'No documents stored yet'
    )
  ].join('\n');
}

function scorecard(input: ReportInputs): string {
  const { scores, overall, corpus } = input;
  const hasDocuments = input.context.documents.length > 0;

  let overallLine: string;
  if (overall === null) {
    overallLine = 'Pending: no agent has reported a score';
  } else if (scores.size < SCORECARD.length) {
    overallLine = `${overall.toFixed(1)}/10 (partial: ${scores.size} of ${SCORECARD.length} categories scored)`;
  } else {
    overallLine = `${overall.toFixed(1)}/10`;
  }

  const rows = SCORECARD.map(category => {
    const score = scores.get(category.agent);
    return [
      category.label,
      score === undefined ? 'TBD/10' : `${score}/10`,
      `${category.weight}%`,
      hasDocuments ? category.rationale(corpus) : 'No documents stored'
    ];
  });

  return [
    '## Investment Scorecard',
    '',
    `**Overall Score:** ${overallLine}`,
    '',
    table(['Category', 'Score', 'Weight', 'Rationale'], rows)
  ].join('\n');
}

function keyMetrics(input: ReportInputs): string {
  const { corpus, metricLimits } = input;
  return [
    '## Key Metrics',
    '',
    '### Financial Metrics',
    '',
    bulletList(Insights.financialMetrics(corpus, metricLimits), 'No financial metrics found in documents'),
    '',
    '### Market Metrics',
    '',
    bulletList(Insights.marketMetrics(corpus, metricLimits), 'No market size metrics found in documents'),
    '',
    '### Traction Metrics',
    '',
    bulletList(Insights.tractionMetrics(corpus, metricLimits), 'No traction metrics found in documents')
  ].join('\n');
}

export function formatAnalysis(record: AnalysisRecord | undefined): string {
  if (!record) return '_No analysis recorded for this agent yet._';

  const { result } = record;
  if (!isJsonObject(result)) {
    if (Array.isArray(result)) {
      return result.flatMap((item, i) => renderField(`Item ${i + 1}`, item)).join('\n') || '_Empty result._';
    }
    return formatPrimitive(result);
  }

  const lines: string[] = [];
  const agent = stringField(result, 'agent');
  if (agent) lines.push(`**Agent:** ${agent}  `);
  if (typeof result.documents_analyzed === 'number') {
    lines.push(`**Documents Analyzed:** ${result.documents_analyzed}  `);
  }
  const score = agentScore(record);
  if (score !== null) lines.push(`**Score:** ${score}/10  `);

  const findings = Object.entries(result).filter(([key]) => !HEADER_FIELDS.has(key));
  if (findings.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push('**Key Findings:**', '');
    for (const [key, value] of findings) {
      lines.push(...renderField(humanize(key), value));
    }
  }

  const recommendation = stringField(result, 'recommendation');
  if (recommendation) {
    if (lines.length > 0) lines.push('');
    lines.push(`**Recommendation:** ${recommendation}`);
  }

  return lines.length > 0 ? lines.join('\n') : '_Empty result._';
}

function detailedAnalysis(input: ReportInputs): string {
  const parts = ['## Detailed Agent Analysis'];
  AGENT_NAMES.forEach((agent, i) => {
    parts.push('', `### ${i + 1}. ${SECTION_HEADINGS[agent]}`, '', formatAnalysis(input.context.analyses[agent]));
  });
  return parts.join('\n');
}

function riskField(value: JsonObject, keys: readonly string[]): string | null {
  for (const key of keys) {
    const field = value[key];
    if (typeof field === 'string' && field.trim() !== '') return field;
  }
  return null;
}

// A bare string entry is the risk level.
function riskLevel(value: JsonValue | undefined): string {
  if (typeof value === 'string') return value;
  return (isJsonObject(value) && riskField(value, ['severity', 'level'])) || 'TBD';
}

function riskMitigation(value: JsonValue | undefined): string {
  return (isJsonObject(value) && riskField(value, ['mitigation'])) || 'To be determined';
}

function riskMatrix(input: ReportInputs): string {
  const risk = resultObject(input.context.analyses.risk_agent);
  const rows = RISK_TYPES
    .filter(type => risk !== null && risk[type] !== undefined)
    .map(type => [
      humanize(type),
      riskLevel(risk?.[type]),
      riskMitigation(risk?.[type])
    ]);

  const parts = ['## Risk Assessment Matrix', ''];
  if (rows.length === 0) {
    parts.push('_Risk assessment not available._');
    return parts.join('\n');
  }

  parts.push(table(['Risk Type', 'Level', 'Mitigation'], rows));
  const overall = stringField(risk, 'overall_risk_rating');
  if (overall) parts.push('', `**Overall Risk Rating:** ${overall}`);
  return parts.join('\n');
}

function investmentStructure(input: ReportInputs): string {
  const { corpus, structureLimits } = input;
  return [
    '## Investment Structure',
    '',
    `**Funding Ask:** ${Insights.fundingAsk(corpus, structureLimits.scanLines) ?? 'Not stated in documents'}  `,
    `**Valuation:** ${Insights.valuation(corpus, structureLimits.scanLines) ?? 'Not stated in documents'}  `,
    `**Stage:** ${input.stage}`,
    '',
    '### Use of Funds',
    '',
    bulletList(Insights.useOfFunds(corpus, structureLimits), 'Use of funds breakdown not found in documents')
  ].join('\n');
}

function investmentThesis(input: ReportInputs): string {
  const { subject, context, corpus } = input;
  const thesis = resultObject(context.analyses.thesis_agent);
  const highlights = context.documents.length > 0 ? Insights.keyHighlights(corpus) : [];

  const parts = [
    '## Investment Thesis',
    '',
    `### Why Invest in ${subject}?`,
    '',
    bulletList(highlights, 'No supporting evidence found in documents yet')
  ];

  const conviction = stringField(thesis, 'conviction_level');
  const milestones = stringField(thesis, 'key_milestones');
  if (conviction || milestones) {
    parts.push('');
    if (conviction) parts.push(`**Conviction:** ${conviction}  `);
    if (milestones) parts.push(`**Key Milestones:** ${milestones}`);
  }

  const exits = thesis?.exit_scenarios;
  const scenarios = Array.isArray(exits) && exits.length > 0
    ? exits.map(item => (isJsonObject(item) || Array.isArray(item) ? JSON.stringify(item) : formatPrimitive(item)))
    : DEFAULT_EXIT_SCENARIOS;

  parts.push('', '### Exit Scenarios', '', bulletList(scenarios, 'No exit scenarios'));
  return parts.join('\n');
}

function finalRecommendation(input: ReportInputs): string {
  const { context, corpus, overall, decision } = input;
  const completed = AGENT_NAMES.filter(agent => context.analyses[agent]).length;
  const strengths = context.documents.length > 0 ? Insights.keyHighlights(corpus) : [];

  const parts = ['## Final Recommendation', '', `**Investment Decision:** ${decision}`];
  if (overall !== null) parts.push('', `**Overall Score:** ${overall.toFixed(1)}/10`);
  parts.push(
    '',
    '**Strengths:**',
    '',
    bulletList(strengths, 'None identified from documents yet'),
    '',
    '**Next Steps:**',
    '',
    bulletList(NEXT_STEPS, 'None'),
    '',
    `**Confidence Level:** Based on ${context.documents.length} documents analyzed by ${completed} of ${AGENT_NAMES.length} specialized agents`
  );
  return parts.join('\n');
}

/**
 * Renders the investor report for `subject` from a session snapshot.
 * Pure: the same inputs always produce the same text. The caller supplies
 * the report date.
 */
export function assembleReport(subject: string, context: SessionContext, options: ReportOptions): ReportOutcome {
  const hasAnalyses = AGENT_NAMES.some(agent => context.analyses[agent]);
  if (context.documents.length === 0 && !hasAnalyses) {
    return {
      status: 'no_data',
      message: `No data available for ${subject}: store documents or run an analysis first.`
    };
  }

  const config = resolveConfig(options.config);
  const corpus = Insights.buildCorpus(context.documents, config.reportExcerptLength);

  const scores = new Map<AgentName, number>();
  for (const category of SCORECARD) {
    const score = agentScore(context.analyses[category.agent]);
    if (score !== null) scores.set(category.agent, score);
  }
  const overall = overallScore(scores);
  const decision = decide(overall, scores.size === SCORECARD.length);

  const inputs: ReportInputs = {
    subject,
    context,
    corpus,
    stage: options.stage?.trim() || Insights.investmentStage(corpus) || 'Not stated in documents',
    date: options.generatedAt.toISOString().slice(0, 10),
    metricLimits: { scanLines: config.metricScanLines, maxLines: config.maxMetricLines },
    structureLimits: { scanLines: config.structureScanLines, maxLines: config.maxMetricLines },
    scores,
    overall,
    decision
  };

  const report = [
    executiveSummary(inputs),
    scorecard(inputs),
    keyMetrics(inputs),
    detailedAnalysis(inputs),
    riskMatrix(inputs),
    investmentStructure(inputs),
    investmentThesis(inputs),
    finalRecommendation(inputs)
  ].join('\n\n---\n\n') + '\n';

  return { status: 'success', report, overall_score: overall, decision };
}
