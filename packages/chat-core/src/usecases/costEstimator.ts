import { ChatCoreError } from '../errors.js';
import type { CostEstimate } from './search.types.js';

export interface ModelRate {
  /** USD per 1,000 prompt tokens */
  input: number;
  /** USD per 1,000 completion tokens */
  output: number;
}

const MODEL_RATES: Readonly<Record<string, ModelRate>> = Object.freeze({
  sonar: { input: 0.001, output: 0.001 },
  'sonar-pro': { input: 0.003, output: 0.015 },
  'sonar-reasoning': { input: 0.001, output: 0.005 },
  'sonar-reasoning-pro': { input: 0.002, output: 0.008 },
  'sonar-deep-research': { input: 0.002, output: 0.008 },
  'r1-1776': { input: 0.002, output: 0.008 },
  'mistral-7b-instruct': { input: 0.0002, output: 0.0002 },
  'llama-3.1-sonar-small-128k-online': { input: 0.0002, output: 0.0002 },
  'llama-3.1-sonar-large-128k-online': { input: 0.001, output: 0.001 },
});

/** Flat rate applied in both directions to models missing from the table. */
export const DEFAULT_RATE: ModelRate = Object.freeze({ input: 0.002, output: 0.002 });

function roundUsd(amount: number): number {
  return Math.round(amount * 1_000_000) / 1_000_000;
}

function requireTokenCount(label: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ChatCoreError('INVALID_ARGUMENT', `${label} must be a non-negative integer, got ${value}`);
  }
  return value;
}

export function listKnownModels(): string[] {
  return Object.keys(MODEL_RATES);
}

export function lookupRate(model: string): { rate: ModelRate; known: boolean } {
  const key = model.trim().toLowerCase();
  const rate = Object.prototype.hasOwnProperty.call(MODEL_RATES, key) ? MODEL_RATES[key] : undefined;
  return rate ? { rate, known: true } : { rate: DEFAULT_RATE, known: false };
}

export function estimateCost(model: string, inputTokens: number, outputTokens: number): CostEstimate {
  const input = requireTokenCount('inputTokens', inputTokens);
  const output = requireTokenCount('outputTokens', outputTokens);
  const { rate, known } = lookupRate(model);

  return Object.freeze({
    model,
    inputTokens: input,
    outputTokens: output,
    amountUsd: roundUsd((input * rate.input + output * rate.output) / 1000),
    pricingKnown: known,
  });
}

export function formatUsd(amount: number, digits = 4): string {
  return `$${amount.toFixed(Math.max(4, digits))}`;
}

/** Rough count used when the endpoint omits a usage block. */
export function approximateTokenCount(text: string): number {
  return Math.ceil((text ?? '').length / 4);
}
