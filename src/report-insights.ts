import type { DocumentRecord } from './types.js';

// Keyword heuristics over the stored document text. They pick out lines
// worth quoting; they do not interpret them.

export interface ScanLimits {
  scanLines: number;
  maxLines: number;
}

const FINANCIAL_PATTERN = /\b(revenue|arr|mrr|sales|funding|raised|capital)\b/i;
const MARKET_PATTERN = /\b(market size|tam|sam|som|billion|million)\b/i;
const TRACTION_PATTERN = /\b(users|customers|growth|orders)\b/i;
const FUNDING_ASK_PATTERN = /\b(funding|raising|seeking)\b/i;
const VALUATION_PATTERN = /\b(valuation|valued at)\b/i;
const USE_OF_FUNDS_PATTERN = /\b(use of funds|allocation|spend|budget)\b/i;

const HIGHLIGHT_RULES: ReadonlyArray<{ pattern: RegExp; highlight: string }> = [
  { pattern: /\b(rural|village)/i, highlight: 'Targeting rural markets' },
  { pattern: /\b(e-?commerce|commerce|marketplace)\b/i, highlight: 'E-commerce/marketplace platform' },
  { pattern: /\b(subscription|saas|recurring)\b/i, highlight: 'Recurring revenue model' },
  { pattern: /\b(revenue|sales)\b/i, highlight: 'Revenue generation model identified' },
  { pattern: /\b(growth|expansion)\b/i, highlight: 'Growth and expansion plans documented' },
  { pattern: /\b(patent|proprietary)\b/i, highlight: 'Proprietary technology or IP referenced' }
];

const STAGES: ReadonlyArray<{ pattern: RegExp; label: string }> = [
  { pattern: /\bseed\b/i, label: 'Seed Stage' },
  { pattern: /\bseries a\b/i, label: 'Series A' },
  { pattern: /\bseries b\b/i, label: 'Series B' }
];

/** Leading excerpt of every document, in storage order. */
export function buildCorpus(documents: readonly DocumentRecord[], excerptLength: number): string {
  return documents.map(doc => doc.content.slice(0, excerptLength)).join('\n\n');
}

function scanLines(corpus: string, limit: number): string[] {
  return corpus.split(/\r?\n/).slice(0, limit).map(line => line.trim());
}

export function matchLines(corpus: string, pattern: RegExp, limits: ScanLimits): string[] {
  return scanLines(corpus, limits.scanLines)
    .filter(line => line !== '' && pattern.test(line))
    .slice(0, limits.maxLines);
}

function firstMatch(corpus: string, pattern: RegExp, limit: number): string | null {
  return scanLines(corpus, limit).find(line => line !== '' && pattern.test(line)) ?? null;
}

export function keyHighlights(corpus: string): string[] {
  return HIGHLIGHT_RULES.filter(rule => rule.pattern.test(corpus)).map(rule => rule.highlight);
}

export function financialMetrics(corpus: string, limits: ScanLimits): string[] {
  return matchLines(corpus, FINANCIAL_PATTERN, limits);
}

export function marketMetrics(corpus: string, limits: ScanLimits): string[] {
  return matchLines(corpus, MARKET_PATTERN, limits);
}

export function tractionMetrics(corpus: string, limits: ScanLimits): string[] {
  return matchLines(corpus, TRACTION_PATTERN, limits);
}

export function useOfFunds(corpus: string, limits: ScanLimits): string[] {
  return matchLines(corpus, USE_OF_FUNDS_PATTERN, limits);
}

export function fundingAsk(corpus: string, scanLimit: number): string | null {
  return firstMatch(corpus, FUNDING_ASK_PATTERN, scanLimit);
}

export function valuation(corpus: string, scanLimit: number): string | null {
  return firstMatch(corpus, VALUATION_PATTERN, scanLimit);
}

export function investmentStage(corpus: string): string | null {
  return STAGES.find(stage => stage.pattern.test(corpus))?.label ?? null;
}

// Scorecard rationales

export function marketInsight(corpus: string): string {
  if (/rural india/i.test(corpus)) return 'Large rural India market opportunity';
  if (/market size/i.test(corpus)) return 'Market size detailed in documents';
  return 'Market analysis from documents';
}

export function teamInsight(corpus: string): string {
  if (/\b(founder|ceo)\b/i.test(corpus)) return 'Founder/leadership information provided';
  return 'Team information in documents';
}

export function tractionInsight(corpus: string): string {
  if (/\b(users|customers)\b/i.test(corpus)) return 'User/customer metrics available';
  return 'Traction data in documents';
}

export function financialInsight(corpus: string): string {
  if (/\brevenue\b/i.test(corpus)) return 'Revenue information provided';
  if (/\bfinancial\b/i.test(corpus)) return 'Financial details available';
  return 'Financial data in documents';
}

export function competitiveInsight(corpus: string): string {
  if (/\b(competitive|competition)\b/i.test(corpus)) return 'Competitive analysis included';
  return 'Market positioning documented';
}

export function riskInsight(_corpus: string): string {
  return 'Risk factors identified and documented';
}
