/**
 * In-process fakes shared by the agent tests
 */

import { vi } from 'vitest';
import type { DataRow, Logger, NewTurn, Turn } from '@campaign-agent/shared';
import type { ListRecentOptions, RecordTokenUsageInput, Result, StorageError } from '@campaign-agent/storage';
import { LLMProviderError } from '../errors.js';
import { ANALYSIS_SYSTEM_PROMPT } from '../prompts.js';
import type { PersistentMemory } from '../orchestrator.js';
import type {
  CallOptions,
  DocumentHit,
  DocumentSearchAdapter,
  GenerateRequest,
  GenerateResult,
  LLMProvider,
  ModelUsage,
  StructuredDataAdapter,
  StructuredQuery,
  StructuredQueryResult,
} from '../types.js';

export function silentLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export type ScriptedReply = string | Error;

/**
 * Returns queued replies in order; throws once the script runs out
 */
export class ScriptedLLM implements LLMProvider {
  readonly name = 'scripted';
  readonly requests: GenerateRequest[] = [];

  constructor(
    private replies: ScriptedReply[],
    private usage: ModelUsage = { inputTokens: 10, outputTokens: 5 }
  ) {}

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) {
      throw new LLMProviderError('http', 'No scripted reply left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return { text: next, usage: { ...this.usage } };
  }
}

/**
 * Answers analysis prompts and response prompts with separate handlers
 */
export class RoutingLLM implements LLMProvider {
  readonly name = 'routing';
  readonly requests: GenerateRequest[] = [];

  constructor(
    private handlers: {
      analyze: (request: GenerateRequest) => string | Promise<string>;
      respond: (request: GenerateRequest) => string | Promise<string>;
    },
    private usage: ModelUsage = { inputTokens: 100, outputTokens: 20 }
  ) {}

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    this.requests.push(request);
    const handler = request.system === ANALYSIS_SYSTEM_PROMPT ? this.handlers.analyze : this.handlers.respond;
    return { text: await handler(request), usage: { ...this.usage } };
  }
}

export function analysisJson(
  intent: string,
  needsData: boolean,
  needsDocumentSearch: boolean,
  entities: Record<string, unknown> = {}
): string {
  return JSON.stringify({ intent, needs_data: needsData, needs_document_search: needsDocumentSearch, entities });
}

/**
 * The text of the latest user message in a request
 */
export function lastUserMessage(request: GenerateRequest): string {
  const messages = request.messages.filter(message => message.role === 'user');
  return messages[messages.length - 1]?.content ?? '';
}

export function campaignRow(id: number, overrides: DataRow = {}): DataRow {
  return {
    campaign_id: id,
    campaign_topic: 'Summer Sale',
    customer_segment: 'Students',
    conversion_rate: 0.05,
    opens: 400,
    clicks: 80,
    conversions: 20,
    ...overrides,
  };
}

export type StructuredHandler = (query: StructuredQuery, signal?: AbortSignal) => Promise<DataRow[]>;

export class FakeCampaignData implements StructuredDataAdapter {
  readonly calls: StructuredQuery[] = [];

  constructor(private handler: StructuredHandler) {}

  endpointFor(query: StructuredQuery): string {
    return query.kind === 'top' ? `/campaigns/top/${query.metric}?limit=${query.limit}` : `/campaigns/${query.kind}`;
  }

  async query(query: StructuredQuery, options: CallOptions = {}): Promise<StructuredQueryResult> {
    this.calls.push(query);
    return { source_ref: this.endpointFor(query), rows: await this.handler(query, options.signal) };
  }
}

export class FakeDocumentSearch implements DocumentSearchAdapter {
  readonly sourceRef = '/search';
  readonly queries: string[] = [];

  constructor(private handler: (text: string, topK: number) => Promise<DocumentHit[]>) {}

  async search(text: string, topK: number, _options: CallOptions = {}): Promise<DocumentHit[]> {
    this.queries.push(text);
    return this.handler(text, topK);
  }
}

/**
 * Rejects when the signal aborts and never settles otherwise
 */
export function hangUntilAborted<T>(signal?: AbortSignal): Promise<T> {
  return new Promise<T>((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

const unavailable: StorageError = { type: 'unavailable', message: 'store offline' };

/**
 * Persistent memory held in arrays. `readsDown` and `writesDown` simulate an
 * unreachable backend.
 */
export class InMemoryPersistentMemory implements PersistentMemory {
  readonly turns: Turn[] = [];
  readonly usage: RecordTokenUsageInput[] = [];
  readsDown = false;
  writesDown = false;
  usageDown = false;
  private nextId = 1;

  async listRecent(threadId: string, limit: number, options: ListRecentOptions = {}): Promise<Result<Turn[], StorageError>> {
    if (this.readsDown) {
      return { ok: false, error: unavailable };
    }
    const matching = this.turns.filter(
      turn => turn.thread_id === threadId && (options.includeAllTypes || turn.response_type === 'text')
    );
    return { ok: true, value: structuredClone(limit === 0 ? [] : matching.slice(-limit)) };
  }

  async appendExchange(threadId: string, exchange: [NewTurn, NewTurn]): Promise<Result<[Turn, Turn], StorageError>> {
    if (this.writesDown) {
      return { ok: false, error: unavailable };
    }
    const first: Turn = { ...structuredClone(exchange[0]), thread_id: threadId, turn_id: this.nextId++ };
    const second: Turn = { ...structuredClone(exchange[1]), thread_id: threadId, turn_id: this.nextId++ };
    this.turns.push(first, second);
    return { ok: true, value: [structuredClone(first), structuredClone(second)] };
  }

  async recordTokenUsage(input: RecordTokenUsageInput): Promise<Result<{ recorded: boolean }, StorageError>> {
    if (this.writesDown || this.usageDown) {
      return { ok: false, error: unavailable };
    }
    if (this.usage.some(entry => entry.query_id === input.query_id)) {
      return { ok: true, value: { recorded: false } };
    }
    this.usage.push({ ...input });
    return { ok: true, value: { recorded: true } };
  }

  async clear(threadId: string): Promise<Result<number, StorageError>> {
    if (this.writesDown) {
      return { ok: false, error: unavailable };
    }
    const before = this.turns.length;
    const kept = this.turns.filter(turn => turn.thread_id !== threadId);
    this.turns.splice(0, this.turns.length, ...kept);
    return { ok: true, value: before - kept.length };
  }
}

export function requestAt(llm: { requests: GenerateRequest[] }, index: number): GenerateRequest {
  const request = llm.requests[index];
  if (!request) {
    throw new Error(`No model request at index ${index}`);
  }
  return request;
}
