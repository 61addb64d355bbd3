/**
 * @campaign-agent/core - campaign analytics assistant with conversation memory
 *
 * ```typescript
 * const assistant = await CampaignAssistant.fromEnv();
 * const { turn } = await assistant.processQuery({ threadId: 't-1', text: 'Top 5 campaigns by conversion rate?' });
 * await assistant.close();
 * ```
 */

import 'dotenv/config';
import {
    CampaignApiAdapter,
    ConfigurationError,
    DataRetriever,
    HttpDocumentSearchAdapter,
    OpenAIProvider,
    Orchestrator,
    QueryAnalyzer,
    ResponseGenerator,
    type DocumentSearchAdapter,
    type FlushResult,
    type LLMProvider,
    type ProcessQueryInput,
    type QueryAnalysis,
    type QueryOutcome,
    type RetrievedDataBundle,
    type StructuredDataAdapter,
} from '@campaign-agent/agent';
import {
    ConversationStore,
    SessionStore,
    describeStorageError,
    openStorage,
    parseStorageUrl,
    type HistoryFilters,
    type Result,
    type SessionStoreStats,
    type StorageAdapter,
    type StorageConfig,
    type StorageError,
} from '@campaign-agent/storage';
import {
    consoleLogger,
    type Logger,
    type ThreadStats,
    type TokenActivity,
    type Turn,
    type UserTokenStats,
} from '@campaign-agent/shared';
import { loadConfig, type CampaignAssistantConfig, type EnvSource } from './config.js';

/**
 * Replacements for the networked collaborators the config would build
 */
export interface AssistantOverrides {
    llm?: LLMProvider;
    structured?: StructuredDataAdapter;
    documents?: DocumentSearchAdapter;
}

function resolveStorage(storage: string | StorageConfig, logger: Logger): StorageConfig {
    if (typeof storage !== 'string') {
        return { ...storage, logger: storage.logger ?? logger };
    }
    try {
        return { ...parseStorageUrl(storage), logger };
    } catch (error) {
        throw new ConfigurationError([`storage: ${error instanceof Error ? error.message : String(error)}`]);
    }
}

function unwrap<T>(result: Result<T, StorageError>, action: string): T {
    if (!result.ok) {
        throw new Error(`${action} failed: ${describeStorageError(result.error)}`, { cause: result.error });
    }
    return result.value;
}

/**
 * CampaignAssistant - answers campaign analytics questions per conversation thread
 */
export class CampaignAssistant {
    private constructor(
        private orchestrator: Orchestrator,
        private conversations: ConversationStore,
        private adapter: StorageAdapter,
        private session: SessionStore<QueryAnalysis, RetrievedDataBundle>,
        private logger: Logger
    ) {}

    /**
     * Open storage, apply migrations and wire the workflow
     */
    static async open(config: CampaignAssistantConfig, overrides: AssistantOverrides = {}): Promise<CampaignAssistant> {
        const logger = config.logger ?? consoleLogger;
        const storageConfig = resolveStorage(config.storage, logger);

        const llm = overrides.llm ?? new OpenAIProvider(config.llm);
        const structured =
            overrides.structured ?? (config.campaignApi ? new CampaignApiAdapter(config.campaignApi) : undefined);
        const documents =
            overrides.documents ??
            (config.documentSearch ? new HttpDocumentSearchAdapter(config.documentSearch) : undefined);

        const { adapter, conversations } = await openStorage(storageConfig);
        const session = new SessionStore<QueryAnalysis, RetrievedDataBundle>(config.session);

        const orchestrator = new Orchestrator({
            analyzer: new QueryAnalyzer({ llm, vocabulary: config.vocabulary, logger }),
            retriever: new DataRetriever({
                structured,
                documents,
                timeoutMs: config.adapterTimeoutMs,
                topK: config.topK,
                logger,
            }),
            generator: new ResponseGenerator({ llm, logger }),
            persistent: conversations,
            session,
            contextLimit: config.contextLimit,
            maxPendingPerThread: config.maxPendingPerThread,
            logger,
        });

        logger.info('Campaign assistant ready', {
            llm: llm.name,
            storage: storageConfig.sqlite ? 'sqlite' : 'postgres',
            structured: Boolean(structured),
            documents: Boolean(documents),
        });

        return new CampaignAssistant(orchestrator, conversations, adapter, session, logger);
    }

    /**
     * Open from environment variables (see loadConfig)
     */
    static async fromEnv(env: EnvSource = process.env, overrides: AssistantOverrides = {}): Promise<CampaignAssistant> {
        return CampaignAssistant.open(loadConfig(env), overrides);
    }

    async processQuery(input: ProcessQueryInput): Promise<QueryOutcome> {
        return this.orchestrator.processQuery(input);
    }

    /**
     * Delete a thread's history and session state. Returns the deleted turn count.
     */
    async clearThread(threadId: string): Promise<number> {
        return this.orchestrator.clearThread(threadId);
    }

    /**
     * Full history for display, including table and chart turns with their payloads
     */
    async getHistory(threadId: string, filters?: HistoryFilters): Promise<Turn[]> {
        return unwrap(await this.conversations.listHistory(threadId, filters), 'Loading history');
    }

    async getThreadStats(threadId: string): Promise<ThreadStats> {
        return unwrap(await this.conversations.getThreadStats(threadId), 'Loading thread stats');
    }

    async getUserTokenStats(userId: string): Promise<UserTokenStats> {
        return unwrap(await this.conversations.getUserTokenStats(userId), 'Loading token stats');
    }

    async getRecentActivity(userId: string, limit?: number): Promise<TokenActivity[]> {
        return unwrap(await this.conversations.getRecentActivity(userId, limit), 'Loading recent activity');
    }

    getSessionStats(): SessionStoreStats {
        return this.session.getStats();
    }

    async flushPending(threadId?: string): Promise<FlushResult> {
        return this.orchestrator.flushPending(threadId);
    }

    /**
     * Retry queued writes once more, then close the storage backend
     */
    async close(): Promise<void> {
        const { remaining } = await this.flushPending();
        if (remaining > 0) {
            this.logger.warn('Closing with unsaved turns', { remaining });
        }
        await this.adapter.close();
    }
}

export { loadConfig } from './config.js';
export type { CampaignAssistantConfig, EnvSource } from './config.js';
export type { ProcessQueryInput, QueryOutcome, FlushResult } from '@campaign-agent/agent';
export type { StorageConfig } from '@campaign-agent/storage';
