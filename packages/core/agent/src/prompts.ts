/**
 * Prompts for the analysis and response model calls
 */

import type { ContextTurn, QueryEntities } from './types.js';

/**
 * Render recent turns as compact history, oldest first
 */
export function formatHistory(turns: ContextTurn[], maxChars: number = 400): string {
    if (turns.length === 0) {
        return '(no earlier messages)';
    }
    return turns
        .map(turn => {
            const content = turn.content.length > maxChars ? `${turn.content.slice(0, maxChars)}...` : turn.content;
            return `${turn.role === 'user' ? 'User' : 'Assistant'}: ${content}`;
        })
        .join('\n');
}

export const ANALYSIS_SYSTEM_PROMPT = `You classify questions sent to a marketing campaign analytics assistant.
The assistant can read structured campaign data (opens, clicks, conversions, rates, audience sizes per campaign, topic and customer segment)
and search campaign documents (reports, insights, recommendations).`;

/**
 * Build the classification prompt for one query.
 *
 * @param strict - Stricter wording used for the single retry after unusable output
 */
export function buildAnalysisPrompt(
    queryText: string,
    history: ContextTurn[],
    detected: QueryEntities,
    strict: boolean = false
): string {
    const strictRules = strict
        ? `
Your previous answer could not be parsed.
- Output exactly one JSON object and nothing else.
- Use only the keys shown above. "intent" must be one of the five listed values.
- Booleans are true or false, never strings.`
        : '';

    return `Classify the latest user question.

Return STRICT JSON with this shape:
{
  "intent": "performance" | "comparison" | "topic_lookup" | "general" | "ambiguous",
  "needs_data": true | false,
  "needs_document_search": true | false,
  "entities": {
    "campaign_ids": [101],
    "metric_names": ["conversion_rate"],
    "topics": ["Summer Sale"],
    "segments": ["Students"],
    "limit": 5
  }
}

Rules:
- "performance": metrics or rankings for campaigns. "comparison": two or more campaigns side by side.
- "topic_lookup": campaigns about a topic or for a customer segment.
- "general": greetings, questions about the assistant, anything that needs no campaign data.
- "ambiguous": cannot tell what is asked.
- needs_data is true when campaign numbers are required to answer.
- needs_document_search is true when the answer needs written insights, summaries or recommendations.
- Leave out entity keys you cannot find. Metric names use snake_case.
- Use the conversation to resolve words like "it" or "that campaign".${strictRules}

ALREADY DETECTED ENTITIES:
${JSON.stringify(detected)}

CONVERSATION:
---
${formatHistory(history)}
---

QUESTION:
${queryText}

Respond with JSON only, no markdown code fences.`;
}

export const RESPONSE_SYSTEM_PROMPT = `You are a marketing campaign analytics assistant.
You answer questions about email campaign performance: opens, clicks, conversions, their rates, audiences, topics and customer segments.
Politely decline questions unrelated to campaign analytics and say what you can help with.
Never invent numbers. Use only the data provided to you.`;

export type ResponseShape = 'text' | 'table' | 'chart';

/**
 * Build the answer prompt. For tables and charts the model only writes a
 * short lead-in; the data itself is attached to the turn.
 */
export function buildResponsePrompt(queryText: string, context: string | null, shape: ResponseShape): string {
    const instructions: Record<ResponseShape, string> = {
        text: 'Answer in a few clear sentences. Cite campaign ids and numbers from the data where relevant.',
        table: 'The data will be shown to the user as a table below your answer. Write one or two sentences introducing it and pointing out the standout result.',
        chart: 'The data will be shown to the user as a chart below your answer. Write one or two sentences describing what the chart shows.',
    };

    const data = context === null ? '' : `\n\nDATA:\n---\n${context}\n---`;

    return `${instructions[shape]}${data}

QUESTION:
${queryText}`;
}
