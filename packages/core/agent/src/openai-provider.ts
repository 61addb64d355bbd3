import OpenAI from 'openai';
import { DeadlineExceededError, LLMProviderError, OperationCancelledError } from './errors.js';
import { cleanModelOutput } from './model-output.js';
import { withDeadline } from './timeout.js';
import type { GenerateRequest, GenerateResult, LLMProvider } from './types.js';

export interface OpenAIProviderConfig {
    apiKey: string;
    /** OpenAI-compatible server, e.g. LM Studio at http://localhost:1234/v1 */
    baseURL?: string;
    model?: string;
    timeoutMs?: number;
}

function statusOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

/**
 * LLMProvider over the OpenAI chat completions API
 */
export class OpenAIProvider implements LLMProvider {
    readonly name = 'openai';
    private openai: OpenAI;
    private model: string;
    private timeoutMs: number;

    constructor(config: OpenAIProviderConfig) {
        this.openai = new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseURL,
            maxRetries: 0,
        });
        this.model = config.model ?? 'gpt-4o-mini';
        this.timeoutMs = config.timeoutMs ?? 20_000;
    }

    async generate(request: GenerateRequest): Promise<GenerateResult> {
        let completion: OpenAI.Chat.Completions.ChatCompletion;

        try {
            completion = await withDeadline(
                signal =>
                    this.openai.chat.completions.create(
                        {
                            model: this.model,
                            messages: [
                                { role: 'system', content: request.system },
                                ...request.messages.map(
                                    (message): OpenAI.Chat.Completions.ChatCompletionMessageParam =>
                                        message.role === 'user'
                                            ? { role: 'user', content: message.content }
                                            : { role: 'assistant', content: message.content }
                                ),
                            ],
                            temperature: request.temperature ?? 0,
                            ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
                            ...(request.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
                        },
                        { signal }
                    ),
                this.timeoutMs,
                request.signal
            );
        } catch (error) {
            if (error instanceof DeadlineExceededError) {
                throw new LLMProviderError('timeout', `Model call timed out after ${this.timeoutMs}ms`, { cause: error });
            }
            if (error instanceof OperationCancelledError) {
                throw new LLMProviderError('cancelled', 'Model call cancelled', { cause: error });
            }
            const status = statusOf(error);
            const message = error instanceof Error ? error.message : String(error);
            throw new LLMProviderError('http', `Model call failed: ${message}`, { status, cause: error });
        }

        const text = cleanModelOutput(completion.choices[0]?.message.content ?? '');
        if (!text) {
            throw new LLMProviderError('empty', 'Model returned no content');
        }

        return {
            text,
            usage: {
                inputTokens: completion.usage?.prompt_tokens ?? 0,
                outputTokens: completion.usage?.completion_tokens ?? 0,
            },
        };
    }
}
