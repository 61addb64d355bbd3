/**
 * @campaign-agent/agent - query workflow for the campaign analytics assistant
 */

export * from './types.js';
export * from './errors.js';
export { withDeadline, throwIfAborted } from './timeout.js';
export { cleanModelOutput, stripCodeFences } from './model-output.js';
export {
  extractEntities,
  extractCampaignIds,
  extractDateRange,
  extractLimit,
  extractMetrics,
  extractTopicsAndSegments,
  loadDefaultVocabulary,
  MAX_LIMIT,
} from './entity-extractor.js';
export type { Vocabulary, ExtractOptions } from './entity-extractor.js';
export { QueryAnalyzer, applyGuards, parseModelAnalysis } from './analyzer.js';
export type { QueryAnalyzerConfig, AnalyzeInput } from './analyzer.js';
export { route } from './router.js';
export { DataRetriever, planStructuredQueries, DEFAULT_TOP_LIMIT } from './retriever.js';
export type { DataRetrieverConfig } from './retriever.js';
export {
  ResponseGenerator,
  selectResponseShape,
  NO_DATA_MESSAGE,
  GENERATION_FAILED_MESSAGE,
} from './generator.js';
export type { ResponseGeneratorConfig, GenerateInput } from './generator.js';
export { buildChartSpec, buildRowsChart } from './chart.js';
export { TokenRecorder } from './token-recorder.js';
export { KeyedMutex } from './keyed-mutex.js';
export { Orchestrator, ANONYMOUS_USER } from './orchestrator.js';
export type {
  OrchestratorConfig,
  PersistentMemory,
  SessionMemory,
  WorkflowCheckpoint,
  ProcessQueryInput,
  QueryOutcome,
  ReturnedTurn,
  FlushResult,
} from './orchestrator.js';
export { OpenAIProvider } from './openai-provider.js';
export type { OpenAIProviderConfig } from './openai-provider.js';
export { CampaignApiAdapter } from './campaign-api-adapter.js';
export type { CampaignApiConfig } from './campaign-api-adapter.js';
export { HttpDocumentSearchAdapter } from './document-search-adapter.js';
export type { DocumentSearchConfig } from './document-search-adapter.js';
