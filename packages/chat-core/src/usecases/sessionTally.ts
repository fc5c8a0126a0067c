import type { CostEstimate, SessionTally } from './search.types.js';

export function createSessionTally(): SessionTally {
  return Object.freeze({ calls: 0, totalUsd: 0, entries: Object.freeze([]) });
}

export function recordCost(tally: SessionTally, estimate: CostEstimate): SessionTally {
  return Object.freeze({
    calls: tally.calls + 1,
    totalUsd: Math.round((tally.totalUsd + estimate.amountUsd) * 1_000_000) / 1_000_000,
    entries: Object.freeze([...tally.entries, estimate]),
  });
}
