// src/core/mapping/similarity.utils.ts
import { distance as levenshteinDistance } from 'fastest-levenshtein';
import { normalizeHeader } from '../normalization';

const MIN_PARTIAL_LENGTH = 3;

/** Plain edit-distance ratio on 0-100. */
function ratio(a: string, b: string): number {
    const longest = Math.max(a.length, b.length);
    if (longest === 0) return 100;
    return 100 * (1 - levenshteinDistance(a, b) / longest);
}

/** Best ratio of the shorter string against every same-length window of the longer one. */
function partialRatio(a: string, b: string): number {
    const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
    if (shorter.length === 0) return 0;
    let best = 0;
    for (let start = 0; start + shorter.length <= longer.length; start++) {
        const score = ratio(shorter, longer.slice(start, start + shorter.length));
        if (score > best) best = score;
        if (best === 100) break;
    }
    return best;
}

function sortTokens(s: string): string {
    return s.split(' ').sort().join(' ');
}

/**
 * Weighted similarity of two header-like strings on 0-100.
 * Both sides are normalised first. Combines the plain ratio, a token-sorted
 * ratio (x0.95) and, for strings of uneven length, a partial ratio
 * (x0.9, or x0.6 when one side is 8+ times longer). No partial ratio when
 * the shorter side has fewer than 3 characters.
 * Deterministic for fixed inputs; higher means closer.
 */
export function scoreSimilarity(left: string, right: string): number {
    const a = normalizeHeader(left);
    const b = normalizeHeader(right);
    if (!a || !b) return 0;
    if (a === b) return 100;

    const base = ratio(a, b);
    const sorted = ratio(sortTokens(a), sortTokens(b)) * 0.95;
    const lengthRatio = Math.max(a.length, b.length) / Math.min(a.length, b.length);
    if (lengthRatio < 1.5 || Math.min(a.length, b.length) < MIN_PARTIAL_LENGTH) {
        return Math.max(base, sorted);
    }
    const partialScale = lengthRatio < 8 ? 0.9 : 0.6;
    return Math.max(base, sorted, partialRatio(a, b) * partialScale);
}

/**
 * Picks the candidate most similar to `target`, if its score reaches `threshold`.
 * Ties keep the earliest candidate.
 */
export function bestMatch(
    target: string,
    candidates: readonly string[],
    threshold: number
): { candidate: string; score: number } | null {
    let best: { candidate: string; score: number } | null = null;
    for (const candidate of candidates) {
        const score = scoreSimilarity(target, candidate);
        if (!best || score > best.score) {
            best = { candidate, score };
        }
    }
    return best && best.score >= threshold ? best : null;
}

/**
 * True when the normalised header contains the hint as a whole token
 * (or, for multi-word hints, as a contiguous run of tokens).
 */
export function headerHasHint(normalizedHeader: string, hint: string): boolean {
    if (!normalizedHeader || !hint) return false;
    return ` ${normalizedHeader} `.includes(` ${hint} `);
}
