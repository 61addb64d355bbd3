import type { NextStage, QueryAnalysis } from './types.js';

/**
 * The workflow's one branch: retrieve when any data source is needed
 */
export function route(analysis: Pick<QueryAnalysis, 'needs_data' | 'needs_document_search'>): NextStage {
  return analysis.needs_data || analysis.needs_document_search ? 'DataRetriever' : 'ResponseGenerator';
}
