/**
 * Prediction-Market Confidence
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * confidence = Σ(yesProbability · volume) / Σ volume over relevant markets.
 * Only the latest reading per market counts. When every relevant market reports
 * zero volume the plain mean is used. No relevant markets → 0.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ConfidenceLabel, ConfidenceThresholds, MarketReading } from './types';

export interface ConfidenceResult {
    confidence: number;
    sampleSize: number;
    totalVolume: number;
}

export function isRelevantMarket(market: MarketReading, relevantTags: readonly string[]): boolean {
    if (relevantTags.length === 0) return true;
    const wanted = new Set(relevantTags.map(t => t.toLowerCase()));
    return market.relevanceTags.some(tag => typeof tag === 'string' && wanted.has(tag.toLowerCase()));
}

export function computeConfidence(markets: readonly MarketReading[], relevantTags: readonly string[] = []): ConfidenceResult {
    const relevant = markets.filter(m =>
        isRelevantMarket(m, relevantTags) &&
        Number.isFinite(m.yesProbability) &&
        m.yesProbability >= 0 &&
        m.yesProbability <= 1
    );

    if (relevant.length === 0) {
        return { confidence: 0, sampleSize: 0, totalVolume: 0 };
    }

    const volumeOf = (m: MarketReading): number => (Number.isFinite(m.volume) && m.volume > 0 ? m.volume : 0);
    const totalVolume = relevant.reduce((sum, m) => sum + volumeOf(m), 0);

    const confidence = totalVolume > 0
        ? relevant.reduce((sum, m) => sum + m.yesProbability * volumeOf(m), 0) / totalVolume
        : relevant.reduce((sum, m) => sum + m.yesProbability, 0) / relevant.length;

    return { confidence, sampleSize: relevant.length, totalVolume };
}

export function labelConfidence(confidence: number, thresholds: ConfidenceThresholds): ConfidenceLabel {
    if (confidence < thresholds.low) return 'low_confidence';
    if (confidence <= thresholds.high) return 'medium_confidence';
    return 'high_confidence';
}
