import type { ErrorSignal } from './types.js';
import { ValidationError } from './validation.js';

export type AnalysisErrorCode =
  | 'file_not_found'
  | 'unsupported_file_type'
  | 'extraction_failed'
  | 'empty_analysis'
  | 'malformed_result'
  | 'no_data_available'
  | 'analysis_failed';

export class AnalysisError extends Error {
  constructor(
    readonly code: AnalysisErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AnalysisError';
  }
}

export class FileNotFoundError extends AnalysisError {
  constructor(readonly filePath: string) {
    super('file_not_found', `File not found: ${filePath}`);
    this.name = 'FileNotFoundError';
  }
}

export class UnsupportedFileTypeError extends AnalysisError {
  constructor(readonly extension: string, detail: string) {
    super('unsupported_file_type', `Unsupported file type: ${extension || '(none)'}\n\n${detail}`);
    this.name = 'UnsupportedFileTypeError';
  }
}

export class ExtractionError extends AnalysisError {
  constructor(readonly filePath: string, reason: string, cause?: unknown) {
    super('extraction_failed', `Failed to extract text from ${filePath}: ${reason}`, { cause });
    this.name = 'ExtractionError';
  }
}

export class EmptyAnalysisError extends AnalysisError {
  constructor() {
    super('empty_analysis', 'No documents found to analyze. Please upload documents first.');
    this.name = 'EmptyAnalysisError';
  }
}

export class MalformedResultError extends AnalysisError {
  constructor(readonly path: string, reason: string) {
    super('malformed_result', `Result is not JSON-safe at ${path}: ${reason}`);
    this.name = 'MalformedResultError';
  }
}

export class NoDataAvailableError extends AnalysisError {
  constructor(subject: string) {
    super('no_data_available', `No data available for ${subject}: store documents or run an analysis first.`);
    this.name = 'NoDataAvailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toErrorSignal(error: unknown): ErrorSignal {
  if (error instanceof AnalysisError) {
    return { status: 'error', error_code: error.code, error_message: error.message };
  }
  if (error instanceof ValidationError) {
    return { status: 'error', error_code: 'invalid_input', error_message: error.reason };
  }
  return { status: 'error', error_code: 'analysis_failed', error_message: errorMessage(error) };
}
