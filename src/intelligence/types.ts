/**
 * Market Intelligence - Type Definitions
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Two independent input streams (classified news, prediction markets) are merged
 * into one IntelligenceSnapshot per refresh. Snapshots carry no opportunity
 * context, so one snapshot serves every evaluation until the next refresh.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

/**
 * Classified news item from the news/sentiment feed.
 */
export interface NewsItem {
    id?: string;
    timestamp: number;
    /** Classifier polarity, -1 (bearish) .. +1 (bullish) */
    polarity: number;
    /** Reach/volume weight, defaults to 1 */
    weight?: number;
    topicTags: string[];
    isRegulatory: boolean;
    headline?: string;
}

/**
 * Prediction-market reading from the market feed.
 */
export interface MarketReading {
    marketId: string;
    /** 0..1 */
    yesProbability: number;
    volume: number;
    relevanceTags: string[];
    timestamp: number;
}

/**
 * Maps a classified item to a polarity in [-1, 1]. Swappable without touching
 * aggregation or decision logic.
 */
export type PolarityScorer = (item: NewsItem) => number;

export type ConfidenceLabel = 'low_confidence' | 'medium_confidence' | 'high_confidence';

export type RiskFlag = 'REGULATORY_RISK';

export interface IntelligenceSnapshot {
    readonly id: string;
    /** Monotonic refresh counter, 0 for the neutral default */
    readonly sequence: number;
    readonly generatedAt: number;

    /** Weighted mean polarity, clipped to [-1, 1] */
    readonly sentiment: number;
    readonly sentimentSampleSize: number;

    /** Volume-weighted mean yes probability, 0..1 */
    readonly confidence: number;
    readonly confidenceLabel: ConfidenceLabel;
    readonly marketSampleSize: number;

    readonly riskFlags: readonly RiskFlag[];
    readonly regulatoryEvidenceCount: number;

    /** True only for the neutral default served before the first refresh */
    readonly isDefault: boolean;
}

export interface ConfidenceThresholds {
    /** Below this → low_confidence */
    low: number;
    /** Above this → high_confidence */
    high: number;
}

export interface IntelligenceConfig {
    /** Sliding window over news and market readings */
    windowMs: number;
    confidenceThresholds: ConfidenceThresholds;
    /** REGULATORY_RISK is raised when the regulatory item count exceeds this */
    riskEvidenceThreshold: number;
    /** Markets must carry one of these tags. Empty = all markets */
    relevantTags: string[];
}
