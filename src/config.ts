import { z } from 'zod';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface AnalysisServerConfig {
  // Store limits
  maxDocuments?: number;  // Default: 500
  maxContentLength?: number;  // Default: 2,000,000 characters per document

  // Tool output
  previewLength?: number;  // Default: 500

  // Report scanning
  reportExcerptLength?: number;  // Default: 1000 characters taken from each document
  metricScanLines?: number;  // Default: 50
  structureScanLines?: number;  // Default: 100
  maxMetricLines?: number;  // Default: 10

  logLevel?: LogLevel;  // Default: info
}

export const defaultConfig: Required<AnalysisServerConfig> = {
  maxDocuments: 500,
  maxContentLength: 2_000_000,
  previewLength: 500,
  reportExcerptLength: 1000,
  metricScanLines: 50,
  structureScanLines: 100,
  maxMetricLines: 10,
  logLevel: 'info'
};

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  INVESTOR_ANALYSIS_MAX_DOCUMENTS: positiveInt.optional(),
  INVESTOR_ANALYSIS_MAX_CONTENT_LENGTH: positiveInt.optional(),
  INVESTOR_ANALYSIS_PREVIEW_LENGTH: positiveInt.optional(),
  INVESTOR_ANALYSIS_EXCERPT_LENGTH: positiveInt.optional(),
  INVESTOR_ANALYSIS_METRIC_SCAN_LINES: positiveInt.optional(),
  INVESTOR_ANALYSIS_STRUCTURE_SCAN_LINES: positiveInt.optional(),
  INVESTOR_ANALYSIS_MAX_METRIC_LINES: positiveInt.optional(),
  INVESTOR_ANALYSIS_LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .optional()
});

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Required<AnalysisServerConfig> {
  const parsed = EnvSchema.parse(env);

  return resolveConfig({
    maxDocuments: parsed.INVESTOR_ANALYSIS_MAX_DOCUMENTS,
    maxContentLength: parsed.INVESTOR_ANALYSIS_MAX_CONTENT_LENGTH,
    previewLength: parsed.INVESTOR_ANALYSIS_PREVIEW_LENGTH,
    reportExcerptLength: parsed.INVESTOR_ANALYSIS_EXCERPT_LENGTH,
    metricScanLines: parsed.INVESTOR_ANALYSIS_METRIC_SCAN_LINES,
    structureScanLines: parsed.INVESTOR_ANALYSIS_STRUCTURE_SCAN_LINES,
    maxMetricLines: parsed.INVESTOR_ANALYSIS_MAX_METRIC_LINES,
    logLevel: parsed.INVESTOR_ANALYSIS_LOG_LEVEL
  });
}

/** Fills unset fields from `defaultConfig`. */
export function resolveConfig(config: AnalysisServerConfig = {}): Required<AnalysisServerConfig> {
  return {
    maxDocuments: config.maxDocuments ?? defaultConfig.maxDocuments,
    maxContentLength: config.maxContentLength ?? defaultConfig.maxContentLength,
    previewLength: config.previewLength ?? defaultConfig.previewLength,
    reportExcerptLength: config.reportExcerptLength ?? defaultConfig.reportExcerptLength,
    metricScanLines: config.metricScanLines ?? defaultConfig.metricScanLines,
    structureScanLines: config.structureScanLines ?? defaultConfig.structureScanLines,
    maxMetricLines: config.maxMetricLines ?? defaultConfig.maxMetricLines,
    logLevel: config.logLevel ?? defaultConfig.logLevel
  };
}
