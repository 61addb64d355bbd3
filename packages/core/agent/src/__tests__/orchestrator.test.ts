import { describe, it, expect } from 'vitest';
import type { Logger, NewTurn, Turn } from '@campaign-agent/shared';
import { SessionStore, type Result, type StorageError } from '@campaign-agent/storage';
import { QueryAnalyzer, type AnalyzeInput } from '../analyzer.js';
import { QueryCancelledError, QueryFailedError } from '../errors.js';
import { GENERATION_FAILED_MESSAGE, ResponseGenerator } from '../generator.js';
import { Orchestrator } from '../orchestrator.js';
import { DataRetriever } from '../retriever.js';
import type { GenerateRequest, QueryAnalysis, RetrievedDataBundle } from '../types.js';
import {
  FakeCampaignData,
  FakeDocumentSearch,
  InMemoryPersistentMemory,
  RoutingLLM,
  analysisJson,
  campaignRow,
  hangUntilAborted,
  lastUserMessage,
  silentLogger,
} from './helpers.js';

const NOW = new Date('2024-06-15T12:00:00.000Z');
const TOP_FIVE = 'What are the top 5 campaigns by conversion rate?';
const GREETING = 'Hello, what can you do?';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

function questionOf(request: GenerateRequest): string {
  const match = /QUESTION:\n([\s\S]*?)\n\nRespond with JSON/.exec(lastUserMessage(request));
  return match?.[1] ?? '';
}

interface Harness {
  orchestrator: Orchestrator;
  persistent: InMemoryPersistentMemory;
  session: SessionStore<QueryAnalysis, RetrievedDataBundle>;
  structured: FakeCampaignData;
  llm: RoutingLLM;
  logger: Logger;
}

function createHarness(
  options: {
    classify?: (question: string) => string;
    respond?: (request: GenerateRequest) => string;
    structured?: FakeCampaignData;
    documents?: FakeDocumentSearch;
    persistent?: InMemoryPersistentMemory;
    analyzer?: { analyze(input: AnalyzeInput): Promise<QueryAnalysis> };
    maxPendingPerThread?: number;
  } = {}
): Harness {
  const logger = silentLogger();
  const classify = options.classify ?? ((question: string) =>
    question === TOP_FIVE ? analysisJson('performance', true, false) : analysisJson('general', false, false));
  const llm = new RoutingLLM({
    analyze: request => classify(questionOf(request)),
    respond: options.respond ?? (() => 'Here is what I found.'),
  });
  const structured =
    options.structured ?? new FakeCampaignData(async () => [1, 2, 3, 4, 5].map(id => campaignRow(id)));
  const persistent = options.persistent ?? new InMemoryPersistentMemory();
  const session = new SessionStore<QueryAnalysis, RetrievedDataBundle>({ maxThreads: 10 });

  const orchestrator = new Orchestrator({
    analyzer: options.analyzer ?? new QueryAnalyzer({ llm, logger, now: () => NOW }),
    retriever: new DataRetriever({ structured, documents: options.documents, timeoutMs: 50, logger }),
    generator: new ResponseGenerator({ llm, logger }),
    persistent,
    session,
    maxPendingPerThread: options.maxPendingPerThread,
    logger,
  });

  return { orchestrator, persistent, session, structured, llm, logger };
}

describe('Orchestrator', () => {
  describe('processQuery', () => {
    it('should answer a ranking question with a table from structured data', async () => {
      const { orchestrator, persistent, structured } = createHarness();

      const outcome = await orchestrator.processQuery({ threadId: 'thread-a', userId: 'user-1', text: TOP_FIVE });

      expect(outcome.analysis.intent).toBe('performance');
      expect(outcome.analysis.needs_data).toBe(true);
      expect(outcome.route).toBe('DataRetriever');
      expect(structured.calls).toEqual([{ kind: 'top', metric: 'conversion_rate', limit: 5 }]);
      expect(outcome.turn.response_type).toBe('table');
      expect(outcome.turn.payload?.table?.rows).toHaveLength(5);
      expect(outcome.turn.source_attributions).toEqual([
        { source_kind: 'structured', source_ref: '/campaigns/top/conversion_rate?limit=5' },
      ]);
      expect(outcome.trace).toEqual(['Start', 'Analyzing', 'Routing', 'Retrieving', 'Generating', 'Persisting', 'Done']);
      expect(outcome.persisted).toBe(true);
      expect(outcome.pendingRetry).toBe(false);
      expect(outcome.userTurn.turn_id).toBe(1);
      expect(outcome.turn.turn_id).toBe(2);
      expect(outcome.tokenUsage).toEqual({ input: 200, output: 40, total: 240 });
      expect(persistent.usage).toEqual([
        expect.objectContaining({ user_id: 'user-1', thread_id: 'thread-a', input_tokens: 200, output_tokens: 40 }),
      ]);
    });

    it('should answer a greeting without retrieval or attributions', async () => {
      const { orchestrator, structured } = createHarness();

      const outcome = await orchestrator.processQuery({ threadId: 'thread-b', text: GREETING });

      expect(outcome.analysis).toEqual({
        intent: 'general',
        entities: {},
        needs_data: false,
        needs_document_search: false,
      });
      expect(outcome.route).toBe('ResponseGenerator');
      expect(outcome.trace).toEqual(['Start', 'Analyzing', 'Routing', 'Generating', 'Persisting', 'Done']);
      expect(outcome.turn.response_type).toBe('text');
      expect(outcome.turn.source_attributions).toEqual([]);
      expect(structured.calls).toEqual([]);
    });

    it('should still answer in text when structured data times out', async () => {
      const structured = new FakeCampaignData((_query, signal) => hangUntilAborted(signal));
      const documents = new FakeDocumentSearch(async () => [
        { snippet: 'Students responded best to Summer Sale.', source_ref: 'summer-report.pdf', score: 0.9 },
      ]);
      const { orchestrator, logger } = createHarness({
        classify: () => analysisJson('performance', true, true),
        structured,
        documents,
      });

      const outcome = await orchestrator.processQuery({
        threadId: 'thread-c',
        text: 'How is conversion rate trending and what do the reports say?',
      });

      expect(outcome.turn.response_type).toBe('text');
      expect(outcome.turn.source_attributions).toEqual([
        { source_kind: 'document', source_ref: 'summer-report.pdf', score: 0.9 },
      ]);
      expect(logger.warn).toHaveBeenCalledWith(
        'Degraded data source',
        expect.objectContaining({ source_kind: 'structured', reason: 'timeout' })
      );
    });

    it('should store the user turn and response in order with increasing ids', async () => {
      const { orchestrator, persistent } = createHarness();

      await orchestrator.processQuery({ threadId: 'thread-1', text: GREETING });
      await orchestrator.processQuery({ threadId: 'thread-1', text: TOP_FIVE });

      const recent = await persistent.listRecent('thread-1', 10, { includeAllTypes: true });
      if (!recent.ok) throw new Error('listRecent failed');

      expect(recent.value.map(turn => [turn.turn_id, turn.role, turn.response_type])).toEqual([
        [1, 'user', 'text'],
        [2, 'assistant', 'text'],
        [3, 'user', 'text'],
        [4, 'assistant', 'table'],
      ]);
    });

    it('should update the session checkpoint', async () => {
      const { orchestrator, session } = createHarness();

      const outcome = await orchestrator.processQuery({ threadId: 'thread-1', text: GREETING });
      const checkpoint = session.get('thread-1');

      expect(checkpoint?.lastAnalysis).toEqual(outcome.analysis);
      expect(checkpoint?.lastBundle).toBeNull();
      expect(checkpoint?.turnCursor).toBe(2);
      expect(checkpoint?.recentTurns.map(turn => turn.content)).toEqual([GREETING, 'Here is what I found.']);
      expect(checkpoint?.degraded).toBe(false);
    });

    it('should rebuild context from persisted turns when the session is lost', async () => {
      const persistent = new InMemoryPersistentMemory();
      await createHarness({ persistent }).orchestrator.processQuery({ threadId: 'thread-1', text: GREETING });

      const restarted = createHarness({ persistent });
      await restarted.orchestrator.processQuery({ threadId: 'thread-1', text: 'And what about campaigns?' });

      const analysisRequest = restarted.llm.requests[0];
      expect(analysisRequest && lastUserMessage(analysisRequest)).toContain(`User: ${GREETING}`);
    });

    it('should take context from the checkpoint without reading the persistent log', async () => {
      const { orchestrator, persistent, llm } = createHarness();
      await orchestrator.processQuery({ threadId: 'thread-1', text: GREETING });
      persistent.readsDown = true;

      const outcome = await orchestrator.processQuery({ threadId: 'thread-1', text: 'Tell me more' });

      expect(outcome.persisted).toBe(true);
      const analysisRequest = llm.requests[2];
      expect(analysisRequest && lastUserMessage(analysisRequest)).toContain(`User: ${GREETING}`);
    });

    it('should add flushed turns to the checkpoint context', async () => {
      const { orchestrator, persistent, session } = createHarness();
      persistent.writesDown = true;
      await orchestrator.processQuery({ threadId: 'thread-1', text: GREETING });
      expect(session.get('thread-1')?.recentTurns).toEqual([]);

      persistent.writesDown = false;
      await orchestrator.flushPending('thread-1');

      const checkpoint = session.get('thread-1');
      expect(checkpoint?.turnCursor).toBe(2);
      expect(checkpoint?.recentTurns.map(turn => [turn.turn_id, turn.content])).toEqual([
        [1, GREETING],
        [2, 'Here is what I found.'],
      ]);
    });

    it('should persist and account an error reply when the response model fails', async () => {
      const { orchestrator, persistent } = createHarness({
        respond: () => {
          throw new Error('model offline');
        },
      });

      const outcome = await orchestrator.processQuery({ threadId: 'thread-g', userId: 'user-1', text: GREETING });

      expect(outcome.turn.response_type).toBe('error');
      expect(outcome.turn.content).toBe(GENERATION_FAILED_MESSAGE);
      expect(outcome.turn.turn_id).toBe(2);
      expect(outcome.persisted).toBe(true);
      expect(outcome.tokenUsage).toEqual({ input: 100, output: 20, total: 120 });
      expect(persistent.turns.map(turn => [turn.role, turn.response_type])).toEqual([
        ['user', 'text'],
        ['assistant', 'error'],
      ]);
      expect(persistent.usage).toEqual([
        expect.objectContaining({ user_id: 'user-1', thread_id: 'thread-g', input_tokens: 100, output_tokens: 20 }),
      ]);
    });

    it('should reject empty text before touching any state', async () => {
      const { orchestrator, llm, session } = createHarness();

      const result = orchestrator.processQuery({ threadId: 'thread-1', text: '   ' });

      await expect(result).rejects.toBeInstanceOf(QueryFailedError);
      await expect(result).rejects.toMatchObject({ error: { type: 'validation', field: 'text' } });
      expect(llm.requests).toHaveLength(0);
      expect(session.size).toBe(0);
    });

    it('should fail the query when history cannot be read', async () => {
      const persistent = new InMemoryPersistentMemory();
      persistent.readsDown = true;
      const { orchestrator, llm } = createHarness({ persistent });

      const result = orchestrator.processQuery({ threadId: 'thread-1', text: GREETING });

      await expect(result).rejects.toMatchObject({ error: { type: 'persistence_error' } });
      expect(llm.requests).toHaveLength(0);
    });
  });

  describe('persistence failures', () => {
    it('should return the response and flush it once the store recovers', async () => {
      const persistent = new InMemoryPersistentMemory();
      const { orchestrator } = createHarness({ persistent });
      persistent.writesDown = true;

      const outcome = await orchestrator.processQuery({ threadId: 'thread-d', text: GREETING });

      expect(outcome.turn.content).toBe('Here is what I found.');
      expect(outcome.turn.turn_id).toBeNull();
      expect(outcome.persisted).toBe(false);
      expect(outcome.pendingRetry).toBe(true);
      expect(orchestrator.pendingCount('thread-d')).toBe(1);
      expect(persistent.turns).toEqual([]);

      persistent.writesDown = false;
      expect(await orchestrator.flushPending()).toEqual({ flushed: 1, remaining: 0 });

      const recent = await persistent.listRecent('thread-d', 10);
      if (!recent.ok) throw new Error('listRecent failed');
      expect(recent.value.map(turn => turn.content)).toEqual([GREETING, 'Here is what I found.']);
      expect(persistent.usage).toHaveLength(1);
      expect(orchestrator.pendingCount()).toBe(0);
    });

    it('should flush queued turns before the next query on the thread', async () => {
      const persistent = new InMemoryPersistentMemory();
      const { orchestrator } = createHarness({ persistent });

      persistent.writesDown = true;
      await orchestrator.processQuery({ threadId: 'thread-d', text: GREETING });
      persistent.writesDown = false;
      const second = await orchestrator.processQuery({ threadId: 'thread-d', text: TOP_FIVE });

      expect(second.persisted).toBe(true);
      expect(persistent.turns.map(turn => [turn.turn_id, turn.content])).toEqual([
        [1, GREETING],
        [2, 'Here is what I found.'],
        [3, TOP_FIVE],
        [4, 'Here is what I found.'],
      ]);
      expect(persistent.usage).toHaveLength(2);
    });

    it('should keep queued turns in context while the store is down', async () => {
      const persistent = new InMemoryPersistentMemory();
      const { orchestrator, llm } = createHarness({ persistent });
      persistent.writesDown = true;

      await orchestrator.processQuery({ threadId: 'thread-d', text: GREETING });
      const second = await orchestrator.processQuery({ threadId: 'thread-d', text: 'Tell me more' });

      expect(second.pendingRetry).toBe(true);
      expect(orchestrator.pendingCount('thread-d')).toBe(2);
      const analysisRequest = llm.requests[2];
      expect(analysisRequest && lastUserMessage(analysisRequest)).toContain(`User: ${GREETING}`);
    });

    it('should retry only the token usage when the turns were stored', async () => {
      const persistent = new InMemoryPersistentMemory();
      const { orchestrator } = createHarness({ persistent });
      persistent.usageDown = true;

      const outcome = await orchestrator.processQuery({ threadId: 'thread-u', text: GREETING });

      expect(outcome.turn.turn_id).toBe(2);
      expect(outcome.pendingRetry).toBe(true);
      expect(outcome.persisted).toBe(false);

      persistent.usageDown = false;
      await orchestrator.flushPending('thread-u');

      expect(persistent.turns).toHaveLength(2);
      expect(persistent.usage).toEqual([expect.objectContaining({ user_id: 'anonymous', thread_id: 'thread-u' })]);
    });

    it('should drop the oldest queued commit when the queue is full', async () => {
      const persistent = new InMemoryPersistentMemory();
      const { orchestrator, logger } = createHarness({ persistent, maxPendingPerThread: 2 });
      persistent.writesDown = true;

      for (const text of ['first', 'second', 'third']) {
        await orchestrator.processQuery({ threadId: 'thread-q', text });
      }

      expect(orchestrator.pendingCount('thread-q')).toBe(2);
      expect(logger.error).toHaveBeenCalledWith(
        'Pending commit queue full, dropping oldest entry',
        expect.objectContaining({ threadId: 'thread-q' })
      );

      persistent.writesDown = false;
      await orchestrator.flushPending('thread-q');
      expect(persistent.turns.filter(turn => turn.role === 'user').map(turn => turn.content)).toEqual(['second', 'third']);
    });
  });

  describe('concurrency', () => {
    it('should serialize queries on the same thread', async () => {
      const seen: Array<QueryAnalysis | null | undefined> = [];
      const analyzer = {
        async analyze(input: AnalyzeInput): Promise<QueryAnalysis> {
          seen.push(input.previous);
          await delay(20);
          return {
            intent: 'performance',
            entities: { campaign_ids: [input.text.includes('101') ? 101 : 102] },
            needs_data: false,
            needs_document_search: false,
          };
        },
      };
      const { orchestrator, persistent } = createHarness({ analyzer });

      const [first] = await Promise.all([
        orchestrator.processQuery({ threadId: 'thread-e', text: 'How did campaign 101 do?' }),
        orchestrator.processQuery({ threadId: 'thread-e', text: 'How did campaign 102 do?' }),
      ]);

      expect(seen).toEqual([null, first.analysis]);
      expect(persistent.turns.map(turn => turn.content)).toEqual([
        'How did campaign 101 do?',
        'Here is what I found.',
        'How did campaign 102 do?',
        'Here is what I found.',
      ]);
    });

    it('should not block queries on other threads', async () => {
      const finished: string[] = [];
      const analyzer = {
        async analyze(input: AnalyzeInput): Promise<QueryAnalysis> {
          await delay(input.text === 'slow' ? 50 : 1);
          return { intent: 'general', entities: {}, needs_data: false, needs_document_search: false };
        },
      };
      const { orchestrator } = createHarness({ analyzer });

      await Promise.all([
        orchestrator.processQuery({ threadId: 'thread-slow', text: 'slow' }).then(() => finished.push('slow')),
        orchestrator.processQuery({ threadId: 'thread-fast', text: 'fast' }).then(() => finished.push('fast')),
      ]);

      expect(finished).toEqual(['fast', 'slow']);
    });
  });

  describe('cancellation', () => {
    it('should discard everything when cancelled before persisting', async () => {
      const controller = new AbortController();
      const analyzer = {
        async analyze(): Promise<QueryAnalysis> {
          controller.abort();
          return { intent: 'general', entities: {}, needs_data: false, needs_document_search: false };
        },
      };
      const { orchestrator, persistent, session } = createHarness({ analyzer });

      const result = orchestrator.processQuery({ threadId: 'thread-x', text: GREETING, signal: controller.signal });

      await expect(result).rejects.toBeInstanceOf(QueryCancelledError);
      await expect(result).rejects.toMatchObject({ stage: 'Analyzing' });
      expect(persistent.turns).toEqual([]);
      expect(persistent.usage).toEqual([]);
      expect(session.get('thread-x')).toBeUndefined();
    });

    it('should finish the write when cancelled while persisting', async () => {
      const controller = new AbortController();

      class AbortingMemory extends InMemoryPersistentMemory {
        override async appendExchange(
          threadId: string,
          exchange: [NewTurn, NewTurn]
        ): Promise<Result<[Turn, Turn], StorageError>> {
          controller.abort();
          return super.appendExchange(threadId, exchange);
        }
      }
      const persistent = new AbortingMemory();
      const { orchestrator } = createHarness({ persistent });

      const outcome = await orchestrator.processQuery({ threadId: 'thread-x', text: GREETING, signal: controller.signal });

      expect(outcome.persisted).toBe(true);
      expect(persistent.turns).toHaveLength(2);
      expect(persistent.usage).toHaveLength(1);
    });

    it('should reject a query whose signal is already aborted', async () => {
      const { orchestrator, llm } = createHarness();
      const controller = new AbortController();
      controller.abort();

      await expect(
        orchestrator.processQuery({ threadId: 'thread-x', text: GREETING, signal: controller.signal })
      ).rejects.toBeInstanceOf(QueryCancelledError);
      expect(llm.requests).toHaveLength(0);
    });
  });

  describe('clearThread', () => {
    it('should drop the checkpoint, queued commits and persisted turns', async () => {
      const { orchestrator, persistent, session } = createHarness();
      await orchestrator.processQuery({ threadId: 'thread-1', text: GREETING });
      await orchestrator.processQuery({ threadId: 'thread-2', text: GREETING });

      const deleted = await orchestrator.clearThread('thread-1');

      expect(deleted).toBe(2);
      expect(session.get('thread-1')).toBeUndefined();
      expect(persistent.turns.map(turn => turn.thread_id)).toEqual(['thread-2', 'thread-2']);
      expect(persistent.usage).toHaveLength(2);
    });

    it('should raise when the store cannot clear', async () => {
      const persistent = new InMemoryPersistentMemory();
      const { orchestrator } = createHarness({ persistent });
      persistent.writesDown = true;

      await expect(orchestrator.clearThread('thread-1')).rejects.toMatchObject({
        error: { type: 'persistence_error', message: 'store offline' },
      });
    });
  });
});
