/**
 * Market Intelligence Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * SIGNALS:
 * - News sentiment (weighted mean polarity, pluggable scorer)
 * - Prediction-market confidence (volume-weighted yes probability, bucketed)
 * - Regulatory risk (evidence count over threshold)
 *
 * INTEGRATION:
 *   aggregator.ingestNews(items);
 *   aggregator.ingestMarkets(readings);
 *   aggregator.refresh();                       // on the intelligence cadence
 *   const snapshot = aggregator.currentSnapshot(); // from the scan loop
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type {
    NewsItem,
    MarketReading,
    PolarityScorer,
    ConfidenceLabel,
    ConfidenceThresholds,
    RiskFlag,
    IntelligenceSnapshot,
    IntelligenceConfig,
} from './types';

export {
    DEFAULT_INTELLIGENCE_CONFIG,
    createIntelligenceConfig,
    validateIntelligenceConfig,
} from './config';

export {
    computeSentiment,
    createKeywordScorer,
    feedPolarityScorer,
    DEFAULT_KEYWORDS,
} from './sentiment';
export type { SentimentResult, KeywordTable } from './sentiment';

export { computeConfidence, labelConfidence, isRelevantMarket } from './predictionMarkets';
export type { ConfidenceResult } from './predictionMarkets';

export { assessRisk } from './riskFlags';
export type { RiskAssessment } from './riskFlags';

export { isMarketReading, isNewsItem } from './validation';

export { IntelligenceAggregator, NEUTRAL_SNAPSHOT } from './aggregator';
export type { AggregatorOptions } from './aggregator';
