import type { ISampleChain } from '@seqtape/kernel';
import { CORRELATION_THRESHOLD } from './constants';
import { findOccurrences } from './correlator';
import type { Occurrence } from './correlator';

/**
 * Locate occurrences of the pattern track inside the target track.
 * Both chains are materialized in full; neither is modified.
 */
export function identify(
    target: ISampleChain,
    pattern: ISampleChain,
    threshold: number = CORRELATION_THRESHOLD
): Occurrence[] {
    if (target.length() === 0 || pattern.length() === 0) return [];
    return findOccurrences(target.toArray(), pattern.toArray(), threshold);
}

/**
 * Render matches as `start,end` lines (empty string for no matches).
 */
export function formatOccurrences(matches: readonly Occurrence[]): string {
    return matches.map(m => `${m.start},${m.end}`).join('\n');
}
