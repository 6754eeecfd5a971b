/**
 * News Sentiment
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * score = Σ(polarity · weight) / Σ weight over the items in the window,
 * each polarity and the result clipped to [-1, 1]. No items → 0.
 *
 * Polarity comes from a PolarityScorer. The default trusts the feed's own
 * classification; `createKeywordScorer` scores headlines against a keyword
 * table and falls back to the feed polarity when nothing matches.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { clamp } from '../utils/math';
import defaultKeywords from './sentimentKeywords.json';
import { NewsItem, PolarityScorer } from './types';

export interface SentimentResult {
    score: number;
    sampleSize: number;
    totalWeight: number;
}

export type KeywordTable = Record<string, number>;

export const DEFAULT_KEYWORDS: KeywordTable = defaultKeywords;

export const feedPolarityScorer: PolarityScorer = (item) => item.polarity;

/**
 * Score headlines by the mean weight of the keywords they contain.
 */
export function createKeywordScorer(
    keywords: KeywordTable = DEFAULT_KEYWORDS,
    fallback: PolarityScorer = feedPolarityScorer
): PolarityScorer {
    const table = new Map(Object.entries(keywords).map(([word, weight]) => [word.toLowerCase(), weight]));

    return (item) => {
        if (typeof item.headline !== 'string' || item.headline === '') return fallback(item);

        const words = item.headline.toLowerCase().split(/[^a-z0-9]+/);
        let total = 0;
        let matches = 0;
        for (const word of words) {
            const weight = table.get(word);
            if (weight !== undefined) {
                total += weight;
                matches++;
            }
        }

        return matches > 0 ? total / matches : fallback(item);
    };
}

export function itemWeight(item: NewsItem): number {
    const weight = item.weight ?? 1;
    return Number.isFinite(weight) && weight > 0 ? weight : 0;
}

export function computeSentiment(items: readonly NewsItem[], scorer: PolarityScorer = feedPolarityScorer): SentimentResult {
    let weighted = 0;
    let totalWeight = 0;
    let sampleSize = 0;

    for (const item of items) {
        const weight = itemWeight(item);
        const polarity = scorer(item);
        if (weight === 0 || !Number.isFinite(polarity)) continue;

        weighted += clamp(polarity, -1, 1) * weight;
        totalWeight += weight;
        sampleSize++;
    }

    if (totalWeight === 0) {
        return { score: 0, sampleSize: 0, totalWeight: 0 };
    }

    return {
        score: clamp(weighted / totalWeight, -1, 1),
        sampleSize,
        totalWeight,
    };
}
