import { findOccurrences, selfEnergy, correlateAt } from '../correlator';

describe('correlator', () => {
    const pattern = [10, 20, 30];

    test('self energy is the sum of squares', () => {
        expect(selfEnergy(pattern)).toBe(1400);
        expect(selfEnergy(new Int16Array([-3, 4]))).toBe(25);
        expect(selfEnergy([])).toBe(0);
    });

    test('correlates a window against the pattern', () => {
        const target = [1, 2, 3, 10, 20, 30];
        expect(correlateAt(target, pattern, 0)).toBe(140);
        expect(correlateAt(target, pattern, 3)).toBe(1400);
    });

    test('finds non-overlapping occurrences in order', () => {
        const target = new Int16Array([1, 2, 3, 10, 20, 30, 4, 5, 6, 10, 20, 30, 7, 8, 9]);
        expect(findOccurrences(target, new Int16Array(pattern))).toEqual([
            { start: 3, end: 5 },
            { start: 9, end: 11 }
        ]);
    });

    test('returns nothing for empty inputs', () => {
        expect(findOccurrences([], pattern)).toEqual([]);
        expect(findOccurrences([1, 2, 3], [])).toEqual([]);
    });

    test('returns nothing when the pattern is longer than the target', () => {
        expect(findOccurrences([10, 20], pattern)).toEqual([]);
    });

    test('matches a pattern filling the whole target', () => {
        expect(findOccurrences([10, 20, 30], pattern)).toEqual([{ start: 0, end: 2 }]);
    });

    test('is not scale invariant', () => {
        // Louder copy reaches the threshold, quieter copy does not
        expect(findOccurrences([20, 40, 60], pattern)).toEqual([{ start: 0, end: 2 }]);
        expect(findOccurrences([5, 10, 15], pattern)).toEqual([]);
    });

    test('honours a custom threshold', () => {
        expect(findOccurrences([5, 10, 15], pattern, 0.5)).toEqual([{ start: 0, end: 2 }]);
    });

    test('a silent pattern matches at every window boundary', () => {
        expect(findOccurrences([7, 7, 7, 7, 7], [0, 0])).toEqual([
            { start: 0, end: 1 },
            { start: 2, end: 3 }
        ]);
    });

    test('skips past a match instead of overlapping it', () => {
        // Windows at 0 and 1 both reach the threshold; only 0 is reported
        expect(findOccurrences([1, 1, 1, 1], [1, 1])).toEqual([
            { start: 0, end: 1 },
            { start: 2, end: 3 }
        ]);
    });
});
