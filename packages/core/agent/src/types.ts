/**
 * Core types for the campaign query workflow
 */

import type {
  ChartSpec,
  DataRow,
  SourceAttribution,
  Turn,
} from '@campaign-agent/shared';

// Analysis

export const INTENTS = ['performance', 'comparison', 'topic_lookup', 'general', 'ambiguous'] as const;

export type Intent = (typeof INTENTS)[number];

export const METRIC_NAMES = [
  'conversion_rate',
  'open_rate',
  'click_rate',
  'opens',
  'clicks',
  'conversions',
  'audience_size',
  'sent',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/** Metrics the campaign API can rank by */
export const RANKABLE_METRICS = [
  'conversion_rate',
  'open_rate',
  'click_rate',
  'opens',
  'clicks',
  'conversions',
] as const;

export type RankableMetric = (typeof RANKABLE_METRICS)[number];

export const CHART_KINDS = ['audience_by_topic', 'conversion_rate', 'segment_performance', 'trends'] as const;

export type PredefinedChart = (typeof CHART_KINDS)[number];

/** Inclusive ISO dates (YYYY-MM-DD) */
export interface DateRange {
  start: string;
  end: string;
}

export interface QueryEntities {
  campaign_ids?: number[];
  date_range?: DateRange;
  metric_names?: MetricName[];
  segments?: string[];
  topics?: string[];
  limit?: number;
  visual_requested?: boolean;
  chart_kind?: PredefinedChart;
}

export interface QueryAnalysis {
  intent: Intent;
  entities: QueryEntities;
  needs_data: boolean;
  needs_document_search: boolean;
}

/**
 * The slice of a turn the analyzer and generator read as conversation context
 */
export type ContextTurn = Pick<Turn, 'role' | 'content' | 'response_type'>;

// Routing and workflow

export type NextStage = 'DataRetriever' | 'ResponseGenerator';

export type WorkflowState =
  | 'Start'
  | 'Analyzing'
  | 'Routing'
  | 'Retrieving'
  | 'Generating'
  | 'Persisting'
  | 'Done'
  | 'Errored';

// Capability adapters

export type StructuredQuery =
  | { kind: 'campaign'; campaignId: number }
  | { kind: 'compare'; campaignIds: [number, number] }
  | { kind: 'top'; metric: RankableMetric; limit: number }
  | { kind: 'byTopic'; topic: string }
  | { kind: 'bySegment'; segment: string }
  | { kind: 'summary' }
  | { kind: 'all' };

export interface StructuredQueryResult {
  /** Endpoint path the rows came from */
  source_ref: string;
  rows: DataRow[];
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Structured campaign data, one request per query
 */
export interface StructuredDataAdapter {
  endpointFor(query: StructuredQuery): string;
  query(query: StructuredQuery, options?: CallOptions): Promise<StructuredQueryResult>;
}

export interface DocumentHit {
  snippet: string;
  source_ref: string;
  score: number;
}

/**
 * Semantic search over ingested campaign documents. May return no hits.
 */
export interface DocumentSearchAdapter {
  readonly sourceRef: string;
  search(text: string, topK: number, options?: CallOptions): Promise<DocumentHit[]>;
}

// Retrieval bundle

export type DegradedReason = 'timeout' | 'http_error' | 'malformed' | 'unavailable' | 'cancelled';

export interface StructuredItem {
  source_kind: 'structured';
  source_ref: string;
  call: StructuredQuery['kind'];
  rows: DataRow[];
  /** Multi-row listings that read well as a table */
  tabular: boolean;
}

export interface DocumentItem {
  source_kind: 'document';
  source_ref: string;
  snippet: string;
  score: number;
}

export type BundleItem = StructuredItem | DocumentItem;

export interface DegradedSource {
  source_kind: 'structured' | 'document';
  source_ref: string;
  reason: DegradedReason;
  message: string;
}

export interface RetrievedDataBundle {
  /** Adapter results concatenated in call order, each tagged with its source */
  items: BundleItem[];
  degraded: DegradedSource[];
  /** Every source that was asked, whether or not it answered */
  consulted: SourceAttribution[];
  chart: { kind: PredefinedChart | 'rows'; spec: ChartSpec } | null;
}

// Language model

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface GenerateRequest {
  system: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Ask the model for a single JSON object */
  jsonMode?: boolean;
  signal?: AbortSignal;
}

export interface ModelUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface GenerateResult {
  text: string;
  usage: ModelUsage;
}

export interface LLMProvider {
  readonly name: string;
  generate(request: GenerateRequest): Promise<GenerateResult>;
}
