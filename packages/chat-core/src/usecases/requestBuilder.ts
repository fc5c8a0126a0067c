import { ChatCoreError } from '../errors.js';
import type { LLMRequest } from '../llm/types.js';
import {
  TASK_KINDS,
  type ChatPrompt,
  type SamplingOptions,
  type SearchRequest,
  type TaskKind,
} from './search.types.js';

export const DEFAULT_TEMPERATURE = 0.2;

const DEFAULT_MAX_TOKENS: Record<TaskKind, number> = {
  PROPERTY_FACTS: 1024,
  IMAGE_SEARCH: 512,
};

const LISTING_SOURCES = ['SquareYards', '99acres', 'Housing', 'MagicBricks'];

export function isTaskKind(value: unknown): value is TaskKind {
  return typeof value === 'string' && (TASK_KINDS as readonly string[]).includes(value);
}

function requireQuery(query: string): string {
  const trimmed = (query ?? '').trim();
  if (!trimmed) {
    throw new ChatCoreError('INVALID_ARGUMENT', 'query must not be empty');
  }
  return trimmed;
}

export function createSearchRequest(input: {
  query: string;
  model: string;
  taskKind: TaskKind;
}): SearchRequest {
  const query = requireQuery(input.query);
  const model = (input.model ?? '').trim();

  if (!model) {
    throw new ChatCoreError('INVALID_ARGUMENT', 'model must not be empty');
  }

  if (!isTaskKind(input.taskKind)) {
    throw new ChatCoreError('INVALID_ARGUMENT', `unsupported task kind: ${String(input.taskKind)}`);
  }

  return Object.freeze({ query, model, taskKind: input.taskKind });
}

function propertyFactsPrompt(query: string): ChatPrompt {
  return `
Given the property query: "${query}"
1. Find the latest pricing information for every unit type: configuration (2 BHK, 3 BHK etc), area in sq ft, and total price in INR.
2. Name the builder (developer) of the project.
3. List the amenities offered.
4. Extract at least 2 image URLs (interior/exterior) from known listing sources like ${LISTING_SOURCES.join(', ')}.
Respond with JSON only, no commentary, in exactly this shape:
{
  "images": ["image_url_1", "image_url_2"],
  "pricing": [
    {
      "configuration": "2 BHK",
      "area_sqft": "1286",
      "price_inr": "55.3 Lakh"
    },
    {
      "configuration": "3 BHK",
      "area_sqft": "1448",
      "price_inr": "62.3 Lakh"
    }
  ],
  "builder": "builder name",
  "amenities": ["amenity_1", "amenity_2"]
}
`.trim();
}

function imageSearchPrompt(query: string): ChatPrompt {
  return `
Find photos of the property: "${query}"
Return only direct image URLs (ending in .jpg, .jpeg, .png, .webp or .gif), one URL per line.
Do not add numbering, labels, markdown or any other text.
`.trim();
}

export function buildPrompt(query: string, taskKind: TaskKind): ChatPrompt {
  const normalized = requireQuery(query);

  switch (taskKind) {
    case 'PROPERTY_FACTS':
      return propertyFactsPrompt(normalized);
    case 'IMAGE_SEARCH':
      return imageSearchPrompt(normalized);
    default:
      throw new ChatCoreError('INVALID_ARGUMENT', `unsupported task kind: ${String(taskKind)}`);
  }
}

export function buildChatRequest(request: SearchRequest, sampling: SamplingOptions = {}): LLMRequest {
  return {
    model: request.model,
    prompt: buildPrompt(request.query, request.taskKind),
    temperature: sampling.temperature ?? DEFAULT_TEMPERATURE,
    maxTokens: sampling.maxTokens ?? DEFAULT_MAX_TOKENS[request.taskKind],
  };
}
