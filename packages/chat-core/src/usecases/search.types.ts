export const TASK_KINDS = ['PROPERTY_FACTS', 'IMAGE_SEARCH'] as const;

export type TaskKind = (typeof TASK_KINDS)[number];

export interface SearchRequest {
  readonly query: string;
  readonly model: string;
  readonly taskKind: TaskKind;
}

export type ChatPrompt = string;

export interface SamplingOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface PricingEntry {
  configuration: string;
  areaSqft: string;
  priceInr: string;
}

export interface InvalidImage {
  index: number;
  value: string;
  reason: string;
}

export interface PropertyRecord {
  images: string[];
  invalidImages: InvalidImage[];
  pricing: PricingEntry[];
  builder?: string;
  amenities: string[];
}

export type ExtractionFailureCode = 'NO_JSON_FOUND' | 'MALFORMED_JSON';

export interface ExtractionFailure {
  code: ExtractionFailureCode;
  message: string;
  rawReply: string;
}

export type ExtractionResult =
  | {
      ok: true;
      record: PropertyRecord;
      warnings: string[];
      /** Recovery strategy that made the candidate parse; absent when it parsed as-is. */
      recoveredBy?: string;
    }
  | { ok: false; failure: ExtractionFailure };

export interface CostEstimate {
  readonly model: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly amountUsd: number;
  readonly pricingKnown: boolean;
}

export interface SessionTally {
  readonly calls: number;
  readonly totalUsd: number;
  readonly entries: readonly CostEstimate[];
}
