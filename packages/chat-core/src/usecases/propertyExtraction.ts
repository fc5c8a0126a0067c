import { z } from 'zod';

import type {
  ExtractionResult,
  InvalidImage,
  PricingEntry,
  PropertyRecord,
} from './search.types.js';

export const NOT_AVAILABLE = 'N/A';

export interface RecoveryStrategy {
  name: string;
  transform(candidate: string): string;
}

const CONTROL_CHARACTERS = /[\u0000-\u001F\u007F-\u009F]/g;

export function stripControlCharacters(text: string): string {
  return text.replace(CONTROL_CHARACTERS, '');
}

/**
 * Attempts are made in order and the first candidate that parses wins.
 * Append to a copy of this list to add recovery passes.
 */
export const DEFAULT_RECOVERY_STRATEGIES: readonly RecoveryStrategy[] = Object.freeze([
  { name: 'as-is', transform: (candidate: string) => candidate },
  { name: 'strip-control-characters', transform: stripControlCharacters },
]);

const textField = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim() || NOT_AVAILABLE)
  .catch(NOT_AVAILABLE);

const pricingEntrySchema = z.object({
  configuration: textField,
  area_sqft: textField,
  price_inr: textField,
});

const replySchema = z.object({
  images: z.unknown(),
  pricing: z.unknown(),
  builder: z.unknown(),
  amenities: z.unknown(),
});

function locateJsonCandidate(reply: string): string | undefined {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');

  if (start === -1 || end === -1 || end < start) {
    return undefined;
  }

  return reply.slice(start, end + 1);
}

type ParseAttempt =
  | { ok: true; value: unknown; strategy: string; position: number }
  | { ok: false; errors: string[] };

function parseWithStrategies(candidate: string, strategies: readonly RecoveryStrategy[]): ParseAttempt {
  const errors: string[] = [];

  for (const [position, strategy] of strategies.entries()) {
    try {
      const value: unknown = JSON.parse(strategy.transform(candidate));
      return { ok: true, value, strategy: strategy.name, position };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      errors.push(`${strategy.name}: ${reason}`);
    }
  }

  return { ok: false, errors };
}

function describe(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function readImages(value: unknown, warnings: string[]): { images: string[]; invalidImages: InvalidImage[] } {
  const images: string[] = [];
  const invalidImages: InvalidImage[] = [];

  if (value === undefined || value === null) {
    return { images, invalidImages };
  }

  if (!Array.isArray(value)) {
    warnings.push('images is not a list and was ignored');
    return { images, invalidImages };
  }

  value.forEach((item: unknown, index) => {
    if (typeof item !== 'string') {
      invalidImages.push({ index, value: describe(item), reason: 'not a string' });
      return;
    }

    const url = item.trim();
    if (!url) {
      invalidImages.push({ index, value: item, reason: 'empty' });
      return;
    }

    if (!url.startsWith('http')) {
      invalidImages.push({ index, value: item, reason: 'does not start with http' });
      return;
    }

    images.push(url);
  });

  return { images, invalidImages };
}

function readPricing(value: unknown, warnings: string[]): PricingEntry[] {
  if (value === undefined || value === null) {
    return [];
  }

  if (!Array.isArray(value)) {
    warnings.push('pricing is not a list and was ignored');
    return [];
  }

  const entries: PricingEntry[] = [];

  value.forEach((item: unknown, index) => {
    const parsed = pricingEntrySchema.safeParse(item);
    if (!parsed.success) {
      warnings.push(`pricing[${index}] is not an object and was skipped`);
      return;
    }

    entries.push({
      configuration: parsed.data.configuration,
      areaSqft: parsed.data.area_sqft,
      priceInr: parsed.data.price_inr,
    });
  });

  return entries;
}

function readBuilder(value: unknown, warnings: string[]): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    warnings.push('builder is not text and was ignored');
    return undefined;
  }

  return value.trim() || undefined;
}

function readAmenities(value: unknown, warnings: string[]): string[] {
  if (value === undefined || value === null) {
    return [];
  }

  if (!Array.isArray(value)) {
    warnings.push('amenities is not a list and was ignored');
    return [];
  }

  const amenities: string[] = [];

  value.forEach((item: unknown, index) => {
    if (typeof item !== 'string' || !item.trim()) {
      warnings.push(`amenities[${index}] is not text and was dropped`);
      return;
    }
    amenities.push(item.trim());
  });

  return amenities;
}

export function extractPropertyRecord(
  reply: string,
  strategies: readonly RecoveryStrategy[] = DEFAULT_RECOVERY_STRATEGIES,
): ExtractionResult {
  const rawReply = reply ?? '';
  const candidate = locateJsonCandidate(rawReply);

  if (candidate === undefined) {
    return {
      ok: false,
      failure: {
        code: 'NO_JSON_FOUND',
        message: 'The reply does not contain a JSON object.',
        rawReply,
      },
    };
  }

  const attempt = parseWithStrategies(candidate, strategies);

  if (!attempt.ok) {
    return {
      ok: false,
      failure: {
        code: 'MALFORMED_JSON',
        message: `The JSON in the reply could not be parsed (${attempt.errors.join('; ')}).`,
        rawReply,
      },
    };
  }

  const shape = replySchema.safeParse(attempt.value);

  if (!shape.success) {
    return {
      ok: false,
      failure: {
        code: 'MALFORMED_JSON',
        message: 'The JSON in the reply is not an object.',
        rawReply,
      },
    };
  }

  const warnings: string[] = [];
  const { images, invalidImages } = readImages(shape.data.images, warnings);
  const builder = readBuilder(shape.data.builder, warnings);

  const record: PropertyRecord = {
    images,
    invalidImages,
    pricing: readPricing(shape.data.pricing, warnings),
    ...(builder ? { builder } : {}),
    amenities: readAmenities(shape.data.amenities, warnings),
  };

  return attempt.position === 0
    ? { ok: true, record, warnings }
    : { ok: true, record, warnings, recoveredBy: attempt.strategy };
}
