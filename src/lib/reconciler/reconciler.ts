/**
 * Reconciler
 *
 * Annotates each channel with the display name of the most similar guide
 * entry. Annotations describe one pass against one guide snapshot: a
 * channel that finds no match loses any earlier annotation.
 */

import type { ChannelRecord, GuideGroups } from '@/types';
import { uniqueInOrder } from '@/lib/concurrency';
import { createLogger, type Logger } from '@/lib/logger';
import { characterBound, lengthBound, similarity } from './similarity';

export interface ReconcileOptions {
  /** Minimum similarity in [0, 1] */
  threshold: number;
}

export interface ReconcileResult {
  channels: ChannelRecord[];
  /** Channels annotated in this pass */
  matched: number;
}

/**
 * Non-empty guide display names in group order, then entry order
 */
export function buildCandidatePool(groups: GuideGroups): string[] {
  const names: string[] = [];
  for (const entries of groups.values()) {
    for (const entry of entries) {
      if (entry.displayName) names.push(entry.displayName);
    }
  }
  return uniqueInOrder(names);
}

/**
 * Highest-scoring candidate at or above the threshold.
 * Earlier candidates win ties.
 */
export function findBestMatch(
  name: string,
  pool: readonly string[],
  threshold: number
): { candidate: string; score: number } | null {
  let best: { candidate: string; score: number } | null = null;

  for (const candidate of pool) {
    const floor = best ? Math.max(best.score, threshold) : threshold;
    // Bounds only skip candidates that cannot qualify
    if (lengthBound(name, candidate) < floor) continue;
    if (characterBound(name, candidate) < floor) continue;

    const score = similarity(name, candidate);
    if (score >= threshold && (!best || score > best.score)) {
      best = { candidate, score };
      if (score === 1) break;
    }
  }

  return best;
}

/**
 * Match every named channel against the guide display names
 */
export function reconcile(
  channels: readonly ChannelRecord[],
  groups: GuideGroups,
  options: ReconcileOptions,
  logger?: Logger
): ReconcileResult {
  const log = logger ?? createLogger('Reconciler');
  const pool = buildCandidatePool(groups);
  let matched = 0;

  const annotated = channels.map((channel): ChannelRecord => {
    const { matchedGuideId: _previous, ...unmatched } = channel;
    if (!channel.displayName) return unmatched;

    const best = findBestMatch(channel.displayName, pool, options.threshold);
    if (!best) {
      log.debug(`[MATCH] No guide match for ${channel.displayName}`);
      return unmatched;
    }

    matched++;
    log.debug(`[MATCH] ${channel.displayName} → ${best.candidate}`, { score: best.score });
    return { ...unmatched, matchedGuideId: best.candidate };
  });

  log.info(`[MATCH] Matched ${matched} of ${channels.length} channels against ${pool.length} guide names`);

  return { channels: annotated, matched };
}
