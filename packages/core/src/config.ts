/**
 * Environment configuration for the campaign assistant
 */

import { z } from 'zod';
import { ConfigurationError } from '@campaign-agent/agent';
import type { CampaignApiConfig, DocumentSearchConfig, OpenAIProviderConfig, Vocabulary } from '@campaign-agent/agent';
import type { SessionStoreConfig, StorageConfig } from '@campaign-agent/storage';
import type { Logger } from '@campaign-agent/shared';

export interface CampaignAssistantConfig {
    llm: OpenAIProviderConfig;
    /** Null disables structured campaign data */
    campaignApi: CampaignApiConfig | null;
    /** Null disables document search */
    documentSearch: DocumentSearchConfig | null;
    /** Snippets per document search (default 3) */
    topK?: number;
    /** Per adapter call (default 10000) */
    adapterTimeoutMs?: number;
    /** `sqlite://path` or a full storage config */
    storage: string | StorageConfig;
    contextLimit?: number;
    session?: SessionStoreConfig;
    maxPendingPerThread?: number;
    vocabulary?: Vocabulary;
    logger?: Logger;
}

const blankToUndefined = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const optionalUrl = z.preprocess(blankToUndefined, z.string().trim().url().optional());

const urlWithDefault = (fallback: string) =>
    z.preprocess(blankToUndefined, z.string().trim().url().default(fallback));

const positiveInt = (fallback: number) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const flag = z.preprocess(
    blankToUndefined,
    z
        .enum(['true', 'false', '1', '0', 'yes', 'no'])
        .default('false')
        .transform(value => value === 'true' || value === '1' || value === 'yes')
);

const envSchema = z.object({
    OPENAI_API_KEY: optionalText,
    OPENAI_BASE_URL: optionalUrl,
    OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().trim().default('gpt-4o-mini')),
    USE_LOCAL_LLM: flag,
    LM_STUDIO_URL: urlWithDefault('http://localhost:1234'),
    CAMPAIGN_API_URL: urlWithDefault('http://localhost:8000'),
    CAMPAIGN_API_KEY: optionalText,
    DOCUMENT_SEARCH_URL: urlWithDefault('http://localhost:8030'),
    DOCUMENT_SEARCH_TOP_K: positiveInt(3),
    STORAGE_URL: z.preprocess(
        blankToUndefined,
        z.string().trim().startsWith('sqlite://', 'must start with sqlite://').default('sqlite://data/conversations.db')
    ),
    SUPABASE_URL: optionalUrl,
    SUPABASE_KEY: optionalText,
    LLM_TIMEOUT_MS: positiveInt(20_000),
    ADAPTER_TIMEOUT_MS: positiveInt(10_000),
    CONTEXT_TURN_LIMIT: positiveInt(10),
    SESSION_MAX_THREADS: positiveInt(500),
    SESSION_TTL_SECONDS: positiveInt(3600),
});

export type EnvSource = Record<string, string | undefined>;

/**
 * Build the assistant config from environment variables.
 * Throws ConfigurationError listing every bad key.
 */
export function loadConfig(env: EnvSource = process.env): CampaignAssistantConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigurationError(
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    const values = parsed.data;

    const issues: string[] = [];
    if (!values.USE_LOCAL_LLM && !values.OPENAI_API_KEY) {
        issues.push('OPENAI_API_KEY: required unless USE_LOCAL_LLM is set');
    }
    if (Boolean(values.SUPABASE_URL) !== Boolean(values.SUPABASE_KEY)) {
        issues.push('SUPABASE_URL and SUPABASE_KEY must be set together');
    }
    if (issues.length > 0) {
        throw new ConfigurationError(issues);
    }

    const llm: OpenAIProviderConfig = {
        // Local servers ignore the key but the SDK insists on one
        apiKey: values.OPENAI_API_KEY ?? 'not-needed',
        baseURL:
            values.OPENAI_BASE_URL ??
            (values.USE_LOCAL_LLM ? `${values.LM_STUDIO_URL.replace(/\/+$/, '')}/v1` : undefined),
        model: values.OPENAI_MODEL,
        timeoutMs: values.LLM_TIMEOUT_MS,
    };

    const storage: string | StorageConfig =
        values.SUPABASE_URL && values.SUPABASE_KEY
            ? { postgres: { url: values.SUPABASE_URL, apiKey: values.SUPABASE_KEY } }
            : values.STORAGE_URL;

    return {
        llm,
        campaignApi: {
            baseURL: values.CAMPAIGN_API_URL,
            apiKey: values.CAMPAIGN_API_KEY,
            timeoutMs: values.ADAPTER_TIMEOUT_MS,
        },
        documentSearch: {
            baseURL: values.DOCUMENT_SEARCH_URL,
            timeoutMs: values.ADAPTER_TIMEOUT_MS,
        },
        topK: values.DOCUMENT_SEARCH_TOP_K,
        adapterTimeoutMs: values.ADAPTER_TIMEOUT_MS,
        storage,
        contextLimit: values.CONTEXT_TURN_LIMIT,
        session: {
            maxThreads: values.SESSION_MAX_THREADS,
            ttlSeconds: values.SESSION_TTL_SECONDS,
        },
    };
}
