/**
 * Response Generator - turns retrieved data and model prose into an assistant reply
 */

import {
  consoleLogger,
  type AssistantReply,
  type DataRow,
  type Logger,
  type ResponseType,
  type SourceAttribution,
  type TableData,
  type TurnPayload,
} from '@campaign-agent/shared';
import { buildResponsePrompt, RESPONSE_SYSTEM_PROMPT, type ResponseShape } from './prompts.js';
import type { TokenRecorder } from './token-recorder.js';
import type { ChatMessage, ContextTurn, LLMProvider, QueryAnalysis, RetrievedDataBundle } from './types.js';

export const NO_DATA_MESSAGE =
  "I couldn't find relevant campaign information for your question. Please try rephrasing or ask about a specific campaign, metric, topic or segment!";

export const GENERATION_FAILED_MESSAGE = "Sorry, I couldn't generate a response right now. Please try again in a moment.";

const MAX_CONTEXT_ROWS = 50;

export interface ResponseGeneratorConfig {
  llm: LLMProvider;
  maxTokens?: number;
  logger?: Logger;
}

export interface GenerateInput {
  text: string;
  analysis: QueryAnalysis;
  /** Null when the query was routed straight to generation */
  bundle: RetrievedDataBundle | null;
  recentTurns: ContextTurn[];
  recorder?: TokenRecorder;
  signal?: AbortSignal;
}

function tabularRows(bundle: RetrievedDataBundle): DataRow[] {
  return bundle.items.flatMap(item => (item.source_kind === 'structured' && item.tabular ? item.rows : []));
}

/**
 * Deterministic choice of reply shape from the bundle and the analysis
 */
export function selectResponseShape(analysis: QueryAnalysis, bundle: RetrievedDataBundle | null): ResponseShape {
  if (!bundle) {
    return 'text';
  }
  if (analysis.entities.visual_requested && bundle.chart) {
    return 'chart';
  }
  if (
    (analysis.intent === 'performance' || analysis.intent === 'comparison') &&
    tabularRows(bundle).length > 0
  ) {
    return 'table';
  }
  return 'text';
}

export function toTable(rows: DataRow[]): TableData {
  const first = rows[0];
  return { columns: first ? Object.keys(first) : [], rows };
}

/**
 * Attributions in bundle order: one per structured call, one per snippet
 */
export function attributionsFor(bundle: RetrievedDataBundle): SourceAttribution[] {
  return bundle.items.map((item): SourceAttribution =>
    item.source_kind === 'structured'
      ? { source_kind: 'structured', source_ref: item.source_ref }
      : { source_kind: 'document', source_ref: item.source_ref, score: item.score }
  );
}

/**
 * Render the bundle as plain text for the answer prompt
 */
export function formatBundle(bundle: RetrievedDataBundle): string {
  const sections: string[] = [];

  for (const item of bundle.items) {
    if (item.source_kind === 'structured') {
      const rows = item.rows.slice(0, MAX_CONTEXT_ROWS).map(row => JSON.stringify(row));
      sections.push(`[campaign data ${item.source_ref}]\n${rows.join('\n')}`);
    } else {
      sections.push(`[document ${item.source_ref} score=${item.score.toFixed(2)}]\n${item.snippet}`);
    }
  }

  for (const source of bundle.degraded) {
    sections.push(`[unavailable ${source.source_kind} source ${source.source_ref}: ${source.reason}]`);
  }

  return sections.join('\n\n');
}

/**
 * Produces the assistant reply for a query. Never throws: a failed model
 * call becomes an error reply with a user-safe message.
 */
export class ResponseGenerator {
  private llm: LLMProvider;
  private maxTokens: number;
  private logger: Logger;

  constructor(config: ResponseGeneratorConfig) {
    this.llm = config.llm;
    this.maxTokens = config.maxTokens ?? 800;
    this.logger = config.logger ?? consoleLogger;
  }

  async generate(input: GenerateInput): Promise<AssistantReply> {
    const { bundle, analysis } = input;

    if (bundle && bundle.items.length === 0) {
      // Nothing came back; name the sources that were asked
      return {
        content: NO_DATA_MESSAGE,
        response_type: 'text',
        source_attributions: bundle.consulted.map(source => ({ ...source })),
        payload: null,
      };
    }

    const shape = selectResponseShape(analysis, bundle);
    const history: ChatMessage[] = input.recentTurns.map(turn => ({ role: turn.role, content: turn.content }));

    let content: string;
    try {
      const result = await this.llm.generate({
        system: RESPONSE_SYSTEM_PROMPT,
        messages: [
          ...history,
          { role: 'user', content: buildResponsePrompt(input.text, bundle ? formatBundle(bundle) : null, shape) },
        ],
        temperature: 0.3,
        maxTokens: this.maxTokens,
        signal: input.signal,
      });
      input.recorder?.add(result.usage);
      content = result.text;
    } catch (error) {
      this.logger.error('Response generation failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return { content: GENERATION_FAILED_MESSAGE, response_type: 'error', source_attributions: [], payload: null };
    }

    if (!bundle) {
      return { content, response_type: 'text', source_attributions: [], payload: null };
    }

    const source_attributions = attributionsFor(bundle);
    let payload: TurnPayload | null = null;
    let response_type: ResponseType = shape;

    if (shape === 'chart' && bundle.chart) {
      payload = { chart: bundle.chart.spec };
      source_attributions.push({ source_kind: 'chart', source_ref: `chart:${bundle.chart.kind}` });
    } else if (shape === 'table') {
      payload = { table: toTable(tabularRows(bundle)) };
    } else {
      response_type = 'text';
    }

    return { content, response_type, source_attributions, payload };
  }
}
