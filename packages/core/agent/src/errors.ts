/**
 * Error types for the query workflow
 */

import type { DegradedReason } from './types.js';

export type AgentError =
  | { type: 'llm_error'; provider: string; message: string; cause?: unknown }
  | { type: 'timeout'; operation: string; timeoutMs: number }
  | { type: 'parse_error'; message: string; rawResponse?: string }
  | { type: 'adapter_error'; source: string; reason: DegradedReason; message: string }
  | { type: 'configuration_error'; message: string }
  | { type: 'persistence_error'; message: string; cause?: unknown }
  | { type: 'validation'; field: string; message: string }
  | { type: 'cancelled'; stage: string };

export function describeAgentError(error: AgentError): string {
  switch (error.type) {
    case 'llm_error':
      return `${error.provider}: ${error.message}`;
    case 'timeout':
      return `${error.operation} timed out after ${error.timeoutMs}ms`;
    case 'adapter_error':
      return `${error.source} (${error.reason}): ${error.message}`;
    case 'validation':
      return `Validation error on ${error.field}: ${error.message}`;
    case 'cancelled':
      return `Cancelled during ${error.stage}`;
    case 'parse_error':
    case 'configuration_error':
    case 'persistence_error':
      return error.message;
  }
}

/**
 * A query that produced no turn at all. Only raised for fatal faults.
 */
export class QueryFailedError extends Error {
  readonly error: AgentError;

  constructor(error: AgentError) {
    super(describeAgentError(error));
    this.name = 'QueryFailedError';
    this.error = error;
  }
}

/**
 * The caller cancelled before anything was persisted
 */
export class QueryCancelledError extends Error {
  readonly stage: string;

  constructor(stage: string) {
    super(`Query cancelled during ${stage}`);
    this.name = 'QueryCancelledError';
    this.stage = stage;
  }
}

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export type LLMProviderErrorKind = 'timeout' | 'http' | 'empty' | 'cancelled';

export class LLMProviderError extends Error {
  readonly kind: LLMProviderErrorKind;
  readonly status?: number;

  constructor(kind: LLMProviderErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'LLMProviderError';
    this.kind = kind;
    this.status = options.status;
  }
}

/**
 * A capability adapter call that produced no usable result
 */
export class AdapterError extends Error {
  readonly reason: DegradedReason;
  readonly status?: number;

  constructor(reason: DegradedReason, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'AdapterError';
    this.reason = reason;
    this.status = options.status;
  }
}

export class DeadlineExceededError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
    this.timeoutMs = timeoutMs;
  }
}

export class OperationCancelledError extends Error {
  constructor(message: string = 'Operation cancelled') {
    super(message);
    this.name = 'OperationCancelledError';
  }
}
