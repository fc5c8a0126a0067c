import {
  formatUsd,
  isImageUrl,
  type CostEstimate,
  type ExtractionFailure,
  type PropertyRecord,
  type SessionTally,
} from '@estate-lens/chat-core';

export function renderCost(cost: CostEstimate, approximated: boolean): string {
  const tokens = `${cost.inputTokens} in / ${cost.outputTokens} out${approximated ? ', approximated' : ''}`;
  const pricing = cost.pricingKnown ? '' : ', default rate';
  return `Cost: ${formatUsd(cost.amountUsd)} (${cost.model}, ${tokens}${pricing})`;
}

export function renderSessionTotal(tally: SessionTally): string {
  return `Session total: ${formatUsd(tally.totalUsd)} over ${tally.calls} call(s)`;
}

export function renderPropertyRecord(record: PropertyRecord, warnings: string[]): string[] {
  const lines: string[] = [];

  lines.push(`Builder: ${record.builder ?? 'unknown'}`);

  if (record.pricing.length > 0) {
    lines.push('Pricing:');
    for (const entry of record.pricing) {
      lines.push(`  - ${entry.configuration}: ${entry.areaSqft} sq ft → ₹${entry.priceInr}`);
    }
  } else {
    lines.push('Pricing: none reported');
  }

  lines.push(`Amenities: ${record.amenities.length > 0 ? record.amenities.join(', ') : 'none reported'}`);

  if (record.images.length > 0) {
    lines.push('Images:');
    for (const url of record.images) {
      lines.push(`  - ${url}${isImageUrl(url) ? '' : ' (not a direct image link)'}`);
    }
  } else {
    lines.push('Images: none reported');
  }

  const notes = [
    ...record.invalidImages.map(
      (image) => `image #${image.index + 1} skipped (${image.reason}): ${image.value}`,
    ),
    ...warnings,
  ];

  if (notes.length > 0) {
    lines.push('Warnings:');
    for (const note of notes) {
      lines.push(`  - ${note}`);
    }
  }

  return lines;
}

export function renderImageUrls(urls: string[]): string[] {
  return urls.length > 0 ? [...urls] : ['No image URLs found in the reply.'];
}

export function renderFailure(failure: ExtractionFailure): string[] {
  return [`Could not interpret the reply [${failure.code}]: ${failure.message}`, '--- raw reply ---', failure.rawReply];
}
