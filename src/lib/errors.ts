import type { Language } from './types';

export type PipelineErrorCode =
  | 'InvalidQuery'
  | 'UnsupportedLanguage'
  | 'NodeUnavailable'
  | 'SearchProviderFailure';

/**
 * Base class for every failure the pipeline knows how to classify.
 * Only InvalidQuery and UnsupportedLanguage ever reach a caller; the
 * other two are recovered inside the pipeline.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly statusCode: number;

  constructor(code: PipelineErrorCode, statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${code}Error`;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class InvalidQueryError extends PipelineError {
  constructor(message = 'Query text must not be empty') {
    super('InvalidQuery', 400, message);
  }
}

export class UnsupportedLanguageError extends PipelineError {
  readonly language: string;
  readonly supportedLanguages: Language[];

  constructor(language: string, supportedLanguages: Language[]) {
    super(
      'UnsupportedLanguage',
      422,
      `Language '${language}' is not supported. Supported languages: ${supportedLanguages.join(', ')}`
    );
    this.language = language;
    this.supportedLanguages = supportedLanguages;
  }
}

export class NodeUnavailableError extends PipelineError {
  readonly nodeId: string;

  constructor(nodeId: string, cause: unknown) {
    super('NodeUnavailable', 503, `Language node ${nodeId} unavailable: ${describeError(cause)}`, { cause });
    this.nodeId = nodeId;
  }
}

export class SearchProviderError extends PipelineError {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, status?: number, cause?: unknown) {
    super('SearchProviderFailure', 502, `${provider}: ${message}`, { cause });
    this.provider = provider;
    this.status = status;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
