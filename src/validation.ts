import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { AnalysisServerConfig } from './config.js';
import { AGENT_NAMES, type AgentName, isAgentName } from './types.js';

export class ValidationError extends McpError {
  // McpError prefixes the message with the error code; `reason` keeps the bare text.
  constructor(readonly reason: string) {
    super(ErrorCode.InvalidParams, reason);
  }
}

const DOCUMENT_KIND_PATTERN = /^[a-z][a-z0-9_]*$/;

function requireNonEmpty(value: string | undefined, message: string): string {
  if (!value || typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(message);
  }
  return value;
}

export function validateSubject(subject: string | undefined): string {
  return requireNonEmpty(subject, 'Startup name is required and must be a non-empty string').trim();
}

export function validateDocumentKind(kind: string | undefined): void {
  requireNonEmpty(kind, 'Document kind is required and must be a non-empty string');
  if (!DOCUMENT_KIND_PATTERN.test(kind ?? '')) {
    throw new ValidationError(`Document kind must be a lowercase identifier (got "${kind}")`);
  }
}

export function validateContent(content: string | undefined, config: AnalysisServerConfig): void {
  requireNonEmpty(content, 'Document content is required and must be a non-empty string');

  if (config.maxContentLength && (content ?? '').length > config.maxContentLength) {
    throw new ValidationError(`Document content cannot exceed ${config.maxContentLength} characters`);
  }
}

export function validateDocumentCount(current: number, config: AnalysisServerConfig): void {
  if (config.maxDocuments && current >= config.maxDocuments) {
    throw new ValidationError(`Cannot exceed ${config.maxDocuments} documents per session`);
  }
}

export function validateFilePath(filePath: string | undefined): void {
  requireNonEmpty(filePath, 'File path is required and must be a non-empty string');
}

export function validateFilePaths(filePaths: string[] | undefined): void {
  if (!Array.isArray(filePaths)) {
    throw new ValidationError('File paths must be an array');
  }

  if (filePaths.length === 0) {
    throw new ValidationError('At least one file path is required');
  }

  filePaths.forEach(validateFilePath);
}

export function validateKeyword(keyword: string | undefined): void {
  requireNonEmpty(keyword, 'Search query is required and must be a non-empty string');
}

export function validateMessage(message: string | undefined): void {
  requireNonEmpty(message, 'User message is required and must be a non-empty string');
}

export function validateAgentName(agent: string | undefined): AgentName {
  if (!agent || !isAgentName(agent)) {
    throw new ValidationError(`Agent must be one of: ${AGENT_NAMES.join(', ')}`);
  }
  return agent;
}

/** Parses tool arguments against a zod schema, reporting every issue as one InvalidParams error. */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid arguments: ${issues}`);
  }
  return parsed.data;
}
