import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { DataRow } from '@campaign-agent/shared';
import { toAdapterError } from './http-errors.js';
import type { CallOptions, StructuredDataAdapter, StructuredQuery, StructuredQueryResult } from './types.js';

export interface CampaignApiConfig {
  baseURL: string;
  apiKey?: string;
  timeoutMs?: number;
}

const cellValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const campaignRow = z.object({ campaign_id: z.number() }).catchall(cellValue);

const campaignList = z.object({ campaigns: z.array(campaignRow) });

const comparison = z.object({ campaign_1: campaignRow, campaign_2: campaignRow });

const summary = z.record(cellValue);

/**
 * Structured data adapter over the campaign analytics HTTP API
 */
export class CampaignApiAdapter implements StructuredDataAdapter {
  private client: AxiosInstance;

  constructor(config: CampaignApiConfig) {
    this.client = axios.create({
      baseURL: config.baseURL,
      timeout: config.timeoutMs ?? 10_000,
      headers: {
        ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
        Accept: 'application/json',
      },
    });
  }

  endpointFor(query: StructuredQuery): string {
    switch (query.kind) {
      case 'campaign':
        return `/campaigns/${query.campaignId}`;
      case 'compare':
        return `/campaigns/compare/${query.campaignIds[0]}/${query.campaignIds[1]}`;
      case 'top':
        return `/campaigns/top/${query.metric}?limit=${query.limit}`;
      case 'byTopic':
        return `/campaigns/topic/${encodeURIComponent(query.topic)}`;
      case 'bySegment':
        return `/campaigns/segment/${encodeURIComponent(query.segment)}`;
      case 'summary':
        return '/campaigns/summary';
      case 'all':
        return '/campaigns/all';
    }
  }

  async query(query: StructuredQuery, options: CallOptions = {}): Promise<StructuredQueryResult> {
    const endpoint = this.endpointFor(query);

    try {
      const response = await this.client.get<unknown>(endpoint, { signal: options.signal });
      return { source_ref: endpoint, rows: toRows(query, response.data) };
    } catch (error) {
      throw toAdapterError(error, endpoint);
    }
  }
}

function toRows(query: StructuredQuery, data: unknown): DataRow[] {
  switch (query.kind) {
    case 'campaign':
      return [campaignRow.parse(data)];
    case 'compare': {
      const parsed = comparison.parse(data);
      return [parsed.campaign_1, parsed.campaign_2];
    }
    case 'summary':
      return [summary.parse(data)];
    case 'top':
    case 'byTopic':
    case 'bySegment':
    case 'all':
      return campaignList.parse(data).campaigns;
  }
}
