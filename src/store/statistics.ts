import type { RuleStatistics } from "./types.js";

/**
 * Folds one more occurrence into a statistics row:
 * avg_n = (avg_{n-1} * (n - 1) + score) / n.
 */
export function applyOccurrence(
  stats: RuleStatistics,
  confidence: number,
  seenAt: Date
): RuleStatistics {
  const occurrenceCount = stats.occurrenceCount + 1;
  const avgConfidence =
    (stats.avgConfidence * (occurrenceCount - 1) + confidence) / occurrenceCount;

  return {
    ...stats,
    occurrenceCount,
    avgConfidence,
    firstSeen: seenAt < stats.firstSeen ? seenAt : stats.firstSeen,
    lastSeen: seenAt > stats.lastSeen ? seenAt : stats.lastSeen,
    updatedAt: new Date(),
  };
}
