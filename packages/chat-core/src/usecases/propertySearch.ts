import type { LLMClient } from '../llm/types.js';
import { approximateTokenCount, estimateCost } from './costEstimator.js';
import { extractImageUrls } from './imageUrlScan.js';
import { extractPropertyRecord } from './propertyExtraction.js';
import { buildChatRequest } from './requestBuilder.js';
import type {
  CostEstimate,
  ExtractionResult,
  SamplingOptions,
  SearchRequest,
} from './search.types.js';

export interface PropertySearchOptions extends SamplingOptions {
  /** Cap on image URLs for IMAGE_SEARCH; 0 keeps every match. */
  maxImages?: number;
}

export type SearchResult =
  | { kind: 'property'; extraction: ExtractionResult }
  | { kind: 'images'; urls: string[] };

export interface SearchOutcome {
  request: SearchRequest;
  rawReply: string;
  cost: CostEstimate;
  usageApproximated: boolean;
  result: SearchResult;
}

export async function searchProperty(
  llm: LLMClient,
  request: SearchRequest,
  options: PropertySearchOptions = {},
): Promise<SearchOutcome> {
  const chatRequest = buildChatRequest(request, {
    temperature: options.temperature,
    maxTokens: options.maxTokens,
  });

  const response = await llm.complete(chatRequest);
  const rawReply = response.text;

  const cost = response.usage
    ? estimateCost(request.model, response.usage.promptTokens, response.usage.completionTokens)
    : estimateCost(request.model, approximateTokenCount(chatRequest.prompt), approximateTokenCount(rawReply));

  const result: SearchResult =
    request.taskKind === 'IMAGE_SEARCH'
      ? { kind: 'images', urls: extractImageUrls(rawReply, options.maxImages ?? 0) }
      : { kind: 'property', extraction: extractPropertyRecord(rawReply) };

  return {
    request,
    rawReply,
    cost,
    usageApproximated: !response.usage,
    result,
  };
}
