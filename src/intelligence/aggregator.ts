/**
 * Intelligence Aggregator
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Merge news sentiment, prediction-market confidence and regulatory
 * risk into one IntelligenceSnapshot on the aggregator's own cadence.
 *
 * BEHAVIOR:
 * - `ingestNews` / `ingestMarkets` only buffer feed data
 * - `refresh` is a pure merge of the buffered window into a new frozen snapshot
 * - `currentSnapshot` never waits and never fails: before the first refresh it
 *   returns the neutral default. Between refreshes it returns the same object.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { generateSnapshotId } from '../utils/id';
import { Clock } from '../graph';
import { createIntelligenceConfig } from './config';
import { computeSentiment, feedPolarityScorer } from './sentiment';
import { computeConfidence, labelConfidence } from './predictionMarkets';
import { assessRisk } from './riskFlags';
import { describeFeedItem, isMarketReading, isNewsItem } from './validation';
import {
    IntelligenceConfig,
    IntelligenceSnapshot,
    MarketReading,
    NewsItem,
    PolarityScorer,
} from './types';

export const NEUTRAL_SNAPSHOT: IntelligenceSnapshot = Object.freeze({
    id: 'snap_neutral',
    sequence: 0,
    generatedAt: 0,
    sentiment: 0,
    sentimentSampleSize: 0,
    confidence: 0,
    confidenceLabel: 'low_confidence',
    marketSampleSize: 0,
    riskFlags: Object.freeze([]),
    regulatoryEvidenceCount: 0,
    isDefault: true,
});

export interface AggregatorOptions {
    config?: Partial<IntelligenceConfig>;
    scorer?: PolarityScorer;
    now?: Clock;
}

export class IntelligenceAggregator {
    private readonly config: IntelligenceConfig;
    private readonly scorer: PolarityScorer;
    private readonly now: Clock;

    private news: NewsItem[] = [];
    private readonly markets = new Map<string, MarketReading>();
    private latest: IntelligenceSnapshot | null = null;
    private sequence = 0;

    constructor(options: AggregatorOptions = {}) {
        this.config = createIntelligenceConfig(options.config ?? {});
        this.scorer = options.scorer ?? feedPolarityScorer;
        this.now = options.now ?? Date.now;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INGESTION
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Buffer news items. Items of the wrong shape are dropped here so a bad
     * feed payload never reaches `refresh`.
     */
    ingestNews(items: readonly unknown[]): number {
        let accepted = 0;
        for (const item of items) {
            if (!isNewsItem(item)) {
                logger.warn(`[INTEL] dropping malformed news item ${describeFeedItem(item)}`);
                continue;
            }
            this.news.push(item);
            accepted++;
        }
        return accepted;
    }

    /**
     * Keep the newest reading per market.
     */
    ingestMarkets(readings: readonly unknown[]): number {
        let accepted = 0;
        for (const reading of readings) {
            if (!isMarketReading(reading)) {
                logger.warn(`[INTEL] dropping malformed market reading ${describeFeedItem(reading)}`);
                continue;
            }
            const existing = this.markets.get(reading.marketId);
            if (existing && existing.timestamp > reading.timestamp) continue;
            this.markets.set(reading.marketId, reading);
            accepted++;
        }
        return accepted;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // REFRESH
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Prune the window and publish a new snapshot.
     */
    refresh(at: number = this.now()): IntelligenceSnapshot {
        const windowStart = at - this.config.windowMs;

        this.news = this.news.filter(item => item.timestamp >= windowStart);
        for (const [marketId, reading] of this.markets) {
            if (reading.timestamp < windowStart) this.markets.delete(marketId);
        }

        const window = this.news.filter(item => item.timestamp <= at);
        const marketWindow = [...this.markets.values()].filter(m => m.timestamp <= at);

        const sentiment = computeSentiment(window, this.scorer);
        const confidence = computeConfidence(marketWindow, this.config.relevantTags);
        const risk = assessRisk(window, this.config.riskEvidenceThreshold);

        this.sequence++;
        const snapshot: IntelligenceSnapshot = Object.freeze({
            id: generateSnapshotId(),
            sequence: this.sequence,
            generatedAt: at,
            sentiment: sentiment.score,
            sentimentSampleSize: sentiment.sampleSize,
            confidence: confidence.confidence,
            confidenceLabel: labelConfidence(confidence.confidence, this.config.confidenceThresholds),
            marketSampleSize: confidence.sampleSize,
            riskFlags: Object.freeze(risk.flags),
            regulatoryEvidenceCount: risk.regulatoryEvidenceCount,
            isDefault: false,
        });

        this.latest = snapshot;

        logger.info(
            `[INTEL] snapshot #${snapshot.sequence} | sentiment=${snapshot.sentiment.toFixed(3)} (${snapshot.sentimentSampleSize} items)` +
            ` | confidence=${snapshot.confidence.toFixed(3)} ${snapshot.confidenceLabel} (${snapshot.marketSampleSize} markets)` +
            ` | regulatory=${snapshot.regulatoryEvidenceCount}${snapshot.riskFlags.length > 0 ? ' RISK' : ''}`
        );

        return snapshot;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // READS
    // ═══════════════════════════════════════════════════════════════════════════

    currentSnapshot(): IntelligenceSnapshot {
        return this.latest ?? NEUTRAL_SNAPSHOT;
    }

    get bufferedNewsCount(): number {
        return this.news.length;
    }

    get trackedMarketCount(): number {
        return this.markets.size;
    }
}
