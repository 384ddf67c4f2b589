import { CORRELATION_THRESHOLD } from './constants';

export type Samples = Int16Array | ArrayLike<number>;

/**
 * An inclusive [start, end] range of target indices matching the pattern.
 */
export interface Occurrence {
    start: number;
    end: number;
}

/**
 * Sum of squares of the pattern, in float64.
 */
export function selfEnergy(pattern: Samples): number {
    let energy = 0;
    for (let j = 0; j < pattern.length; j++) {
        energy += pattern[j] * pattern[j];
    }
    return energy;
}

/**
 * Unnormalized cross-correlation of `pattern` against `target` at offset `i`.
 */
export function correlateAt(target: Samples, pattern: Samples, i: number): number {
    let sum = 0;
    for (let j = 0; j < pattern.length; j++) {
        sum += target[i + j] * pattern[j];
    }
    return sum;
}

/**
 * Scan `target` for windows whose correlation with `pattern` reaches
 * `threshold` times the pattern's self-energy.
 *
 * A match skips the whole window, so results never overlap and come out in
 * ascending order. The test is not scale invariant: a louder copy of the
 * pattern matches, a quieter one may not. A silent pattern (zero energy)
 * matches at every window boundary.
 */
export function findOccurrences(
    target: Samples,
    pattern: Samples,
    threshold: number = CORRELATION_THRESHOLD
): Occurrence[] {
    const n = target.length;
    const m = pattern.length;
    const matches: Occurrence[] = [];

    if (n === 0 || m === 0 || m > n) return matches;

    const required = threshold * selfEnergy(pattern);
    let i = 0;

    while (i <= n - m) {
        if (correlateAt(target, pattern, i) >= required) {
            matches.push({ start: i, end: i + m - 1 });
            i += m;
        } else {
            i++;
        }
    }

    return matches;
}
