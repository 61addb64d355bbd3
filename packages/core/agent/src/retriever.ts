/**
 * Data Retriever - plans adapter calls from an analysis and merges their results
 */

import { consoleLogger, type Logger, type SourceAttribution } from '@campaign-agent/shared';
import { buildChartSpec, buildRowsChart } from './chart.js';
import { MAX_LIMIT } from './entity-extractor.js';
import { AdapterError, DeadlineExceededError, OperationCancelledError } from './errors.js';
import { withDeadline } from './timeout.js';
import {
  RANKABLE_METRICS,
  type BundleItem,
  type DegradedSource,
  type DocumentSearchAdapter,
  type QueryAnalysis,
  type RankableMetric,
  type RetrievedDataBundle,
  type StructuredDataAdapter,
  type StructuredItem,
  type StructuredQuery,
} from './types.js';

export interface DataRetrieverConfig {
  structured?: StructuredDataAdapter;
  documents?: DocumentSearchAdapter;
  /** Per adapter call (default 10000) */
  timeoutMs?: number;
  /** Document snippets per search (default 3) */
  topK?: number;
  logger?: Logger;
}

export const DEFAULT_TOP_LIMIT = 5;
const CHART_TOP_LIMIT = 10;
const MAX_CAMPAIGN_LOOKUPS = 5;
const STRUCTURED_SOURCE = 'campaign-api';
const DOCUMENT_SOURCE = 'document-search';

const TABULAR_CALLS: ReadonlySet<StructuredQuery['kind']> = new Set(['top', 'compare', 'byTopic', 'bySegment', 'all']);

function rankableMetric(analysis: QueryAnalysis): RankableMetric {
  for (const metric of analysis.entities.metric_names ?? []) {
    const rankable = RANKABLE_METRICS.find(candidate => candidate === metric);
    if (rankable) {
      return rankable;
    }
  }
  return 'conversion_rate';
}

/**
 * Structured calls for an analysis, in the order their rows are merged
 */
export function planStructuredQueries(analysis: QueryAnalysis): StructuredQuery[] {
  const { entities } = analysis;
  const ids = entities.campaign_ids ?? [];
  const topics = entities.topics ?? [];
  const segments = entities.segments ?? [];

  const [first, second] = ids;
  if (first !== undefined && second !== undefined && analysis.intent === 'comparison') {
    return [{ kind: 'compare', campaignIds: [first, second] }];
  }
  if (ids.length > 0) {
    return ids.slice(0, MAX_CAMPAIGN_LOOKUPS).map((campaignId): StructuredQuery => ({ kind: 'campaign', campaignId }));
  }

  if (entities.visual_requested && entities.chart_kind && topics.length === 0 && segments.length === 0) {
    return entities.chart_kind === 'conversion_rate'
      ? [{ kind: 'top', metric: 'conversion_rate', limit: CHART_TOP_LIMIT }]
      : [{ kind: 'all' }];
  }

  if (topics.length > 0 || segments.length > 0) {
    return [
      ...topics.map((topic): StructuredQuery => ({ kind: 'byTopic', topic })),
      ...segments.map((segment): StructuredQuery => ({ kind: 'bySegment', segment })),
    ];
  }

  if ((entities.metric_names?.length ?? 0) > 0 || entities.limit !== undefined) {
    const limit = Math.min(Math.max(entities.limit ?? DEFAULT_TOP_LIMIT, 1), MAX_LIMIT);
    return [{ kind: 'top', metric: rankableMetric(analysis), limit }];
  }

  return [{ kind: 'summary' }];
}

type CallOutcome = { ok: true; items: BundleItem[] } | { ok: false; degraded: DegradedSource };

function degradedFrom(error: unknown, source: Pick<DegradedSource, 'source_kind' | 'source_ref'>): DegradedSource {
  if (error instanceof DeadlineExceededError) {
    return { ...source, reason: 'timeout', message: error.message };
  }
  if (error instanceof OperationCancelledError) {
    return { ...source, reason: 'cancelled', message: error.message };
  }
  if (error instanceof AdapterError) {
    return { ...source, reason: error.reason, message: error.message };
  }
  return { ...source, reason: 'unavailable', message: error instanceof Error ? error.message : String(error) };
}

/**
 * Runs the planned adapter calls concurrently. A failing call becomes a
 * degraded marker; retrieval itself never fails.
 */
export class DataRetriever {
  private structured?: StructuredDataAdapter;
  private documents?: DocumentSearchAdapter;
  private timeoutMs: number;
  private topK: number;
  private logger: Logger;

  constructor(config: DataRetrieverConfig) {
    this.structured = config.structured;
    this.documents = config.documents;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.topK = config.topK ?? 3;
    this.logger = config.logger ?? consoleLogger;
  }

  async retrieve(analysis: QueryAnalysis, queryText: string, signal?: AbortSignal): Promise<RetrievedDataBundle> {
    const consulted: SourceAttribution[] = [];
    const calls: Promise<CallOutcome>[] = [];

    if (analysis.needs_data) {
      const structured = this.structured;
      for (const query of planStructuredQueries(analysis)) {
        if (!structured) {
          consulted.push({ source_kind: 'structured', source_ref: STRUCTURED_SOURCE });
          calls.push(Promise.resolve(this.missing('structured', STRUCTURED_SOURCE)));
          break;
        }
        const source_ref = structured.endpointFor(query);
        consulted.push({ source_kind: 'structured', source_ref });
        calls.push(
          this.call({ source_kind: 'structured', source_ref }, signal, async callSignal => {
            const result = await structured.query(query, { signal: callSignal });
            const item: StructuredItem = {
              source_kind: 'structured',
              source_ref: result.source_ref,
              call: query.kind,
              rows: result.rows,
              tabular: TABULAR_CALLS.has(query.kind),
            };
            return [item];
          })
        );
      }
    }

    if (analysis.needs_document_search) {
      const documents = this.documents;
      if (!documents) {
        consulted.push({ source_kind: 'document', source_ref: DOCUMENT_SOURCE });
        calls.push(Promise.resolve(this.missing('document', DOCUMENT_SOURCE)));
      } else {
        const source_ref = documents.sourceRef;
        consulted.push({ source_kind: 'document', source_ref });
        calls.push(
          this.call({ source_kind: 'document', source_ref }, signal, async callSignal => {
            const hits = await documents.search(queryText, this.topK, { signal: callSignal });
            return hits.map(
              (hit): BundleItem => ({
                source_kind: 'document',
                source_ref: hit.source_ref,
                snippet: hit.snippet,
                score: hit.score,
              })
            );
          })
        );
      }
    }

    const outcomes = await Promise.all(calls);
    const items = outcomes.flatMap(outcome => (outcome.ok ? outcome.items : []));
    const degraded = outcomes.flatMap(outcome => (outcome.ok ? [] : [outcome.degraded]));

    this.logger.debug('Retrieval finished', { items: items.length, degraded: degraded.length });

    return { items, degraded, consulted, chart: this.chartFor(analysis, items) };
  }

  private async call(
    source: Pick<DegradedSource, 'source_kind' | 'source_ref'>,
    signal: AbortSignal | undefined,
    work: (signal: AbortSignal) => Promise<BundleItem[]>
  ): Promise<CallOutcome> {
    try {
      return { ok: true, items: await withDeadline(work, this.timeoutMs, signal) };
    } catch (error) {
      return { ok: false, degraded: degradedFrom(error, source) };
    }
  }

  private missing(source_kind: DegradedSource['source_kind'], source_ref: string): CallOutcome {
    return {
      ok: false,
      degraded: { source_kind, source_ref, reason: 'unavailable', message: `No ${source_kind} adapter configured` },
    };
  }

  private chartFor(analysis: QueryAnalysis, items: BundleItem[]): RetrievedDataBundle['chart'] {
    if (!analysis.entities.visual_requested) {
      return null;
    }

    const rows = items.flatMap(item => (item.source_kind === 'structured' ? item.rows : []));
    if (rows.length === 0) {
      return null;
    }

    const kind = analysis.entities.chart_kind;
    if (kind) {
      const spec = buildChartSpec(kind, rows);
      if (spec) {
        return { kind, spec };
      }
    }

    const spec = buildRowsChart(rows, analysis.entities.metric_names?.[0] ?? 'conversion_rate');
    return spec ? { kind: 'rows', spec } : null;
  }
}
