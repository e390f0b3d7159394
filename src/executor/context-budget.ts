/**
 * Observation budget for the agent context.
 *
 * Tool results are grouped in batches (one batch per backend step). When the
 * total exceeds the budget, the oldest results are replaced by a placeholder;
 * the newest batch is truncated only when it alone is over budget.
 */

export const OMITTED_OBSERVATION = '[Earlier tool result omitted to fit the context budget]';
export const TRUNCATION_MARKER = '\n...[truncated]';

export interface ObservationEntry {
  toolUseId: string;
  content: string;
  isError: boolean;
  omitted?: boolean;
}

/**
 * Characters of tool-result text still in the context. Placeholders count as zero.
 */
export function observationSize(batches: readonly (readonly ObservationEntry[])[]): number {
  let total = 0;
  for (const batch of batches) {
    for (const entry of batch) {
      if (!entry.omitted) total += entry.content.length;
    }
  }
  return total;
}

/**
 * Apply the budget. Returns new batches; the input is not modified.
 */
export function enforceObservationBudget(
  batches: readonly (readonly ObservationEntry[])[],
  budget: number
): ObservationEntry[][] {
  const result = batches.map((batch) => batch.map((entry) => ({ ...entry })));
  let total = observationSize(result);
  if (total <= budget || result.length === 0) return result;

  // Oldest first, never the newest batch
  for (const batch of result.slice(0, -1)) {
    for (const entry of batch) {
      if (entry.omitted) continue;
      total -= entry.content.length;
      entry.content = OMITTED_OBSERVATION;
      entry.omitted = true;
      if (total <= budget) return result;
    }
  }

  const newest = result[result.length - 1];
  const share = Math.floor(budget / newest.length);
  for (const entry of newest) {
    if (entry.content.length > share) {
      entry.content = entry.content.slice(0, Math.max(0, share - TRUNCATION_MARKER.length)) + TRUNCATION_MARKER;
    }
  }
  return result;
}
