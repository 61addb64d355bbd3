import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { toAdapterError } from './http-errors.js';
import type { CallOptions, DocumentHit, DocumentSearchAdapter } from './types.js';

export interface DocumentSearchConfig {
  baseURL: string;
  apiKey?: string;
  timeoutMs?: number;
}

const searchResponse = z.object({
  results: z.array(
    z.object({
      snippet: z.string(),
      source_ref: z.string(),
      score: z.number(),
    })
  ),
});

/**
 * Semantic search over ingested campaign documents, via POST /search
 */
export class HttpDocumentSearchAdapter implements DocumentSearchAdapter {
  readonly sourceRef = '/search';
  private client: AxiosInstance;

  constructor(config: DocumentSearchConfig) {
    this.client = axios.create({
      baseURL: config.baseURL,
      timeout: config.timeoutMs ?? 10_000,
      headers: {
        ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
        'Content-Type': 'application/json',
      },
    });
  }

  async search(text: string, topK: number, options: CallOptions = {}): Promise<DocumentHit[]> {
    try {
      const response = await this.client.post<unknown>(
        this.sourceRef,
        { query: text, top_k: topK },
        { signal: options.signal }
      );
      return searchResponse
        .parse(response.data)
        .results.filter(hit => hit.snippet.trim().length > 0)
        .slice(0, topK);
    } catch (error) {
      throw toAdapterError(error, this.sourceRef);
    }
  }
}
