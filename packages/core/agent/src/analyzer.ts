/**
 * Query Analyzer - intent classification and entity extraction
 */

import { z } from 'zod';
import { consoleLogger, type Logger } from '@campaign-agent/shared';
import { LLMProviderError } from './errors.js';
import { extractEntities, loadDefaultVocabulary, MAX_LIMIT, type Vocabulary } from './entity-extractor.js';
import { stripCodeFences } from './model-output.js';
import { ANALYSIS_SYSTEM_PROMPT, buildAnalysisPrompt } from './prompts.js';
import type { TokenRecorder } from './token-recorder.js';
import {
  INTENTS,
  METRIC_NAMES,
  type ContextTurn,
  type LLMProvider,
  type MetricName,
  type QueryAnalysis,
  type QueryEntities,
} from './types.js';

export interface QueryAnalyzerConfig {
  llm: LLMProvider;
  vocabulary?: Vocabulary;
  logger?: Logger;
  /** Clock for relative dates such as "last month" */
  now?: () => Date;
}

export interface AnalyzeInput {
  text: string;
  recentTurns: ContextTurn[];
  /** Analysis of the thread's previous query, from the session checkpoint */
  previous?: QueryAnalysis | null;
  recorder?: TokenRecorder;
  signal?: AbortSignal;
}

const RANKING_WORDS = /\b(top|best|worst|highest|lowest|bottom|most|least|rank(?:ed|ing)?)\b/i;
const INSIGHT_WORDS = /\b(insights?|summar(?:y|ies|ize|ise)|recommend(?:s|ed|ations?)?|reports?|why)\b/i;
const FOLLOW_UP_WORDS = /\b(it|its|that|this|those|these|them|they|their|same)\b|^\s*(and|what about|how about)\b/i;

const stringList = z.array(z.string()).nullish();

const modelAnalysisSchema = z.object({
  intent: z.enum(INTENTS),
  needs_data: z.boolean(),
  needs_document_search: z.boolean(),
  entities: z
    .object({
      campaign_ids: z.array(z.coerce.number().int().positive()).nullish(),
      metric_names: stringList,
      topics: stringList,
      segments: stringList,
      limit: z.number().int().positive().nullish(),
    })
    .nullish(),
});

type ModelAnalysis = z.infer<typeof modelAnalysisSchema>;

function toMetricName(value: string, vocabulary: Vocabulary): MetricName | undefined {
  const normalized = value.trim().toLowerCase();
  return METRIC_NAMES.find(metric => metric === normalized.replace(/[\s-]+/g, '_')) ?? vocabulary.metrics[normalized];
}

function nonEmpty<T>(values: T[] | null | undefined): T[] | undefined {
  return values && values.length > 0 ? values : undefined;
}

/**
 * Parse a model answer. Returns null for anything that is not a valid analysis.
 */
export function parseModelAnalysis(text: string): ModelAnalysis | null {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFences(text));
  } catch {
    return null;
  }
  const parsed = modelAnalysisSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Fill entity fields the text did not state with what the model found.
 * Deterministic matches always win.
 */
function mergeEntities(detected: QueryEntities, model: ModelAnalysis, vocabulary: Vocabulary): QueryEntities {
  const fromModel = model.entities;
  const merged: QueryEntities = { ...detected };
  if (!fromModel) {
    return merged;
  }

  const campaignIds = nonEmpty(fromModel.campaign_ids);
  if (!merged.campaign_ids && campaignIds) {
    merged.campaign_ids = [...new Set(campaignIds)];
  }

  const metrics = nonEmpty(
    (fromModel.metric_names ?? []).flatMap(name => {
      const metric = toMetricName(name, vocabulary);
      return metric ? [metric] : [];
    })
  );
  if (!merged.metric_names && metrics) {
    merged.metric_names = [...new Set(metrics)];
  }

  const topics = nonEmpty(fromModel.topics?.map(topic => topic.trim()).filter(Boolean));
  if (!merged.topics && topics) {
    merged.topics = topics;
  }

  const segments = nonEmpty(fromModel.segments?.map(segment => segment.trim()).filter(Boolean));
  if (!merged.segments && segments) {
    merged.segments = segments;
  }

  if (merged.limit === undefined && fromModel.limit) {
    merged.limit = Math.min(fromModel.limit, MAX_LIMIT);
  }

  return merged;
}

/**
 * Rules that override the model's flags when the wording is unambiguous
 */
export function applyGuards(analysis: QueryAnalysis, text: string): QueryAnalysis {
  const { entities } = analysis;
  let { intent, needs_data, needs_document_search } = analysis;

  const campaignIds = entities.campaign_ids ?? [];
  const rankedMetric = (entities.metric_names?.length ?? 0) > 0 && RANKING_WORDS.test(text);
  const predefinedChart = entities.visual_requested === true && entities.chart_kind !== undefined;

  if (campaignIds.length > 0 || rankedMetric || predefinedChart) {
    needs_data = true;
    if (intent === 'general' || intent === 'ambiguous') {
      intent = campaignIds.length >= 2 ? 'comparison' : 'performance';
    }
  }

  if (INSIGHT_WORDS.test(text)) {
    needs_document_search = true;
  }

  if (intent === 'general') {
    needs_data = false;
    needs_document_search = false;
  }

  return { intent, entities, needs_data, needs_document_search };
}

/**
 * Classifies a query and extracts its entities. Never throws for valid
 * input: unusable model output degrades to an "ambiguous" analysis.
 */
export class QueryAnalyzer {
  private llm: LLMProvider;
  private vocabulary: Vocabulary;
  private logger: Logger;
  private now: () => Date;

  constructor(config: QueryAnalyzerConfig) {
    this.llm = config.llm;
    this.vocabulary = config.vocabulary ?? loadDefaultVocabulary();
    this.logger = config.logger ?? consoleLogger;
    this.now = config.now ?? (() => new Date());
  }

  async analyze(input: AnalyzeInput): Promise<QueryAnalysis> {
    const detected = extractEntities(input.text, { vocabulary: this.vocabulary, now: this.now() });
    const inherited = this.inheritedCampaignIds(input, detected);

    const model = await this.classify(input, detected);
    if (!model) {
      return {
        intent: 'ambiguous',
        entities: inherited ? { ...detected, campaign_ids: inherited } : detected,
        needs_data: false,
        needs_document_search: false,
      };
    }

    const analysis = applyGuards(
      {
        intent: model.intent,
        entities: mergeEntities(detected, model, this.vocabulary),
        needs_data: model.needs_data,
        needs_document_search: model.needs_document_search,
      },
      input.text
    );

    // Inherited ids only count once the query is known to be about campaigns
    if (!inherited || analysis.intent === 'general' || analysis.entities.campaign_ids) {
      return analysis;
    }
    return applyGuards({ ...analysis, entities: { ...analysis.entities, campaign_ids: inherited } }, input.text);
  }

  /**
   * Follow-ups such as "what about its open rate?" keep the previous campaigns in focus
   */
  private inheritedCampaignIds(input: AnalyzeInput, detected: QueryEntities): number[] | undefined {
    const previousIds = input.previous?.entities.campaign_ids;
    if (detected.campaign_ids || !previousIds || previousIds.length === 0 || !FOLLOW_UP_WORDS.test(input.text)) {
      return undefined;
    }
    return [...previousIds];
  }

  /**
   * Ask the model, retrying once with a stricter prompt on unusable output.
   * Returns null when no usable classification was produced.
   */
  private async classify(input: AnalyzeInput, detected: QueryEntities): Promise<ModelAnalysis | null> {
    for (const strict of [false, true]) {
      let text: string;
      try {
        const result = await this.llm.generate({
          system: ANALYSIS_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: buildAnalysisPrompt(input.text, input.recentTurns, detected, strict) }],
          temperature: 0,
          jsonMode: true,
          signal: input.signal,
        });
        input.recorder?.add(result.usage);
        text = result.text;
      } catch (error) {
        if (error instanceof LLMProviderError && error.kind === 'empty') {
          this.logger.warn('Analysis model returned no content', { strict });
          continue;
        }
        this.logger.warn('Analysis model call failed, falling back to ambiguous', {
          error: error instanceof Error ? error.message : String(error),
        });
        return null;
      }

      const parsed = parseModelAnalysis(text);
      if (parsed) {
        return parsed;
      }
      this.logger.warn('Analysis model output was not a valid analysis', { strict, raw: text.slice(0, 200) });
    }

    return null;
  }
}
