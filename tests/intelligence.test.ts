/**
 * Market Intelligence Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Test Cases:
 *   1. Sentiment: weighted mean polarity, clipped, 0 without items
 *   2. Keyword scorer replaces the feed polarity when headlines match
 *   3. Confidence: volume-weighted, latest reading per market, tag filter
 *   4. Labels bucket at the configured thresholds
 *   5. Regulatory risk raised strictly above the evidence threshold
 *   6. Aggregator: neutral default, idempotent reads, sliding window
 *   7. Mistyped feed items are dropped at ingest and never break a refresh
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ConfigurationError } from '../src/core/errors';
import {
    IntelligenceAggregator,
    MarketReading,
    NEUTRAL_SNAPSHOT,
    NewsItem,
    assessRisk,
    computeConfidence,
    computeSentiment,
    createIntelligenceConfig,
    createKeywordScorer,
    isMarketReading,
    isNewsItem,
    isRelevantMarket,
    labelConfidence,
} from '../src/intelligence';
import { NOW } from './fixtures';

function news(partial: Partial<NewsItem> = {}): NewsItem {
    return {
        timestamp: NOW,
        polarity: 0,
        topicTags: ['lisk'],
        isRegulatory: false,
        ...partial,
    };
}

function market(partial: Partial<MarketReading> = {}): MarketReading {
    return {
        marketId: 'm1',
        yesProbability: 0.5,
        volume: 100,
        relevanceTags: ['lisk'],
        timestamp: NOW,
        ...partial,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SENTIMENT
// ═══════════════════════════════════════════════════════════════════════════════

describe('computeSentiment', () => {
    test('no items is neutral', () => {
        expect(computeSentiment([])).toEqual({ score: 0, sampleSize: 0, totalWeight: 0 });
    });

    test('weighted mean of polarities', () => {
        const result = computeSentiment([
            news({ polarity: 1, weight: 3 }),
            news({ polarity: -1, weight: 1 }),
        ]);
        expect(result.score).toBeCloseTo(0.5, 10);
        expect(result.sampleSize).toBe(2);
        expect(result.totalWeight).toBe(4);
    });

    test('polarities outside [-1, 1] are clipped before averaging', () => {
        const result = computeSentiment([news({ polarity: 5 }), news({ polarity: 0 })]);
        expect(result.score).toBeCloseTo(0.5, 10);
    });

    test('zero-weight and non-finite items are ignored', () => {
        const result = computeSentiment([
            news({ polarity: 1, weight: 0 }),
            news({ polarity: Number.NaN }),
            news({ polarity: -0.4 }),
        ]);
        expect(result.score).toBeCloseTo(-0.4, 10);
        expect(result.sampleSize).toBe(1);
    });
});

describe('createKeywordScorer', () => {
    const scorer = createKeywordScorer({ approval: 0.6, hack: -0.8, listing: 0.4 });

    test('averages matched keyword weights', () => {
        expect(scorer(news({ headline: 'Exchange listing follows ETF approval', polarity: -1 }))).toBeCloseTo(0.5, 10);
    });

    test('matching ignores case and punctuation', () => {
        expect(scorer(news({ headline: 'HACK: bridge drained', polarity: 1 }))).toBeCloseTo(-0.8, 10);
    });

    test('falls back to the feed polarity without a match or headline', () => {
        expect(scorer(news({ headline: 'quiet day', polarity: 0.2 }))).toBe(0.2);
        expect(scorer(news({ polarity: -0.3 }))).toBe(-0.3);
    });

    test('a non-string headline from the wire falls back to the feed polarity', () => {
        const fromFeed: NewsItem = JSON.parse('{"timestamp":1,"polarity":0.3,"topicTags":[],"isRegulatory":false,"headline":42}');
        expect(scorer(fromFeed)).toBe(0.3);
    });
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIDENCE
// ═══════════════════════════════════════════════════════════════════════════════

describe('computeConfidence', () => {
    test('no markets is zero confidence', () => {
        expect(computeConfidence([])).toEqual({ confidence: 0, sampleSize: 0, totalVolume: 0 });
    });

    test('volume-weighted yes probability', () => {
        const result = computeConfidence([
            market({ marketId: 'a', yesProbability: 0.9, volume: 300 }),
            market({ marketId: 'b', yesProbability: 0.5, volume: 100 }),
        ]);
        expect(result.confidence).toBeCloseTo(0.8, 10);
        expect(result.totalVolume).toBe(400);
    });

    test('plain mean when no market reports volume', () => {
        const result = computeConfidence([
            market({ marketId: 'a', yesProbability: 0.9, volume: 0 }),
            market({ marketId: 'b', yesProbability: 0.5, volume: 0 }),
        ]);
        expect(result.confidence).toBeCloseTo(0.7, 10);
    });

    test('irrelevant markets and invalid probabilities are excluded', () => {
        const result = computeConfidence(
            [
                market({ marketId: 'a', yesProbability: 0.9, relevanceTags: ['LISK'] }),
                market({ marketId: 'b', yesProbability: 0.1, relevanceTags: ['sports'] }),
                market({ marketId: 'c', yesProbability: 1.4 }),
            ],
            ['lisk']
        );
        expect(result.sampleSize).toBe(1);
        expect(result.confidence).toBeCloseTo(0.9, 10);
    });

    test('an empty tag list accepts every market', () => {
        expect(isRelevantMarket(market({ relevanceTags: [] }), [])).toBe(true);
        expect(isRelevantMarket(market({ relevanceTags: [] }), ['lisk'])).toBe(false);
    });
});

describe('labelConfidence', () => {
    const thresholds = { low: 0.4, high: 0.7 };

    test.each([
        [0.39, 'low_confidence'],
        [0.4, 'medium_confidence'],
        [0.7, 'medium_confidence'],
        [0.71, 'high_confidence'],
    ])('%p → %s', (confidence, label) => {
        expect(labelConfidence(confidence, thresholds)).toBe(label);
    });
});

describe('assessRisk', () => {
    test('flag is raised only when evidence exceeds the threshold', () => {
        const two = [news({ isRegulatory: true }), news({ isRegulatory: true }), news()];
        expect(assessRisk(two, 2)).toEqual({ flags: [], regulatoryEvidenceCount: 2 });
        expect(assessRisk([...two, news({ isRegulatory: true })], 2)).toEqual({
            flags: ['REGULATORY_RISK'],
            regulatoryEvidenceCount: 3,
        });
    });
});

// ═══════════════════════════════════════════════════════════════════════════════
// AGGREGATOR
// ═══════════════════════════════════════════════════════════════════════════════

describe('IntelligenceAggregator', () => {
    test('serves the neutral default before the first refresh', () => {
        const aggregator = new IntelligenceAggregator({ now: () => NOW });
        const snapshot = aggregator.currentSnapshot();

        expect(snapshot).toBe(NEUTRAL_SNAPSHOT);
        expect(snapshot).toMatchObject({
            sentiment: 0,
            confidence: 0,
            confidenceLabel: 'low_confidence',
            riskFlags: [],
            isDefault: true,
        });
        expect(Object.isFrozen(snapshot)).toBe(true);
    });

    test('refresh merges all three signals into one frozen snapshot', () => {
        const aggregator = new IntelligenceAggregator({
            now: () => NOW,
            config: { riskEvidenceThreshold: 1 },
        });
        aggregator.ingestNews([
            news({ polarity: 0.6 }),
            news({ polarity: 0.2, isRegulatory: true }),
            news({ polarity: 0.4, isRegulatory: true }),
        ]);
        aggregator.ingestMarkets([market({ yesProbability: 0.8 })]);

        const snapshot = aggregator.refresh();

        expect(snapshot.sentiment).toBeCloseTo(0.4, 10);
        expect(snapshot.sentimentSampleSize).toBe(3);
        expect(snapshot.confidence).toBeCloseTo(0.8, 10);
        expect(snapshot.confidenceLabel).toBe('high_confidence');
        expect(snapshot.riskFlags).toEqual(['REGULATORY_RISK']);
        expect(snapshot.regulatoryEvidenceCount).toBe(2);
        expect(snapshot.sequence).toBe(1);
        expect(snapshot.generatedAt).toBe(NOW);
        expect(snapshot.isDefault).toBe(false);
        expect(snapshot.id).toMatch(/^snap_/);
        expect(Object.isFrozen(snapshot)).toBe(true);
    });

    test('reads between refreshes return the same snapshot', () => {
        const aggregator = new IntelligenceAggregator({ now: () => NOW });
        const published = aggregator.refresh();

        aggregator.ingestNews([news({ polarity: 1 })]);

        expect(aggregator.currentSnapshot()).toBe(published);
        expect(aggregator.currentSnapshot()).toBe(aggregator.currentSnapshot());
    });

    test('only the latest reading per market counts', () => {
        const aggregator = new IntelligenceAggregator({ now: () => NOW });
        aggregator.ingestMarkets([
            market({ yesProbability: 0.2, timestamp: NOW - 10 }),
            market({ yesProbability: 0.9, timestamp: NOW - 5 }),
            market({ yesProbability: 0.1, timestamp: NOW - 20 }),
        ]);

        expect(aggregator.trackedMarketCount).toBe(1);
        expect(aggregator.refresh().confidence).toBeCloseTo(0.9, 10);
    });

    test('items outside the window are pruned', () => {
        let clock = NOW;
        const aggregator = new IntelligenceAggregator({ now: () => clock, config: { windowMs: 1_000 } });
        aggregator.ingestNews([news({ polarity: 1, timestamp: NOW - 2_000 }), news({ polarity: -0.5, timestamp: NOW })]);
        aggregator.ingestMarkets([market({ timestamp: NOW - 2_000 })]);

        const snapshot = aggregator.refresh();
        expect(snapshot.sentiment).toBeCloseTo(-0.5, 10);
        expect(snapshot.marketSampleSize).toBe(0);
        expect(aggregator.bufferedNewsCount).toBe(1);

        clock = NOW + 5_000;
        const later = aggregator.refresh();
        expect(later.sentimentSampleSize).toBe(0);
        expect(later.sentiment).toBe(0);
        expect(later.sequence).toBe(2);
    });

    test('a custom scorer replaces the feed polarity', () => {
        const aggregator = new IntelligenceAggregator({
            now: () => NOW,
            scorer: createKeywordScorer({ approval: 0.6 }),
        });
        aggregator.ingestNews([news({ polarity: -1, headline: 'ETF approval granted' })]);

        expect(aggregator.refresh().sentiment).toBeCloseTo(0.6, 10);
    });

    test('items without a usable timestamp are not buffered', () => {
        const aggregator = new IntelligenceAggregator({ now: () => NOW });
        expect(aggregator.ingestNews([news({ timestamp: Number.NaN }), news()])).toBe(1);
    });

    test('inverted confidence thresholds are a configuration error', () => {
        expect(() => new IntelligenceAggregator({ config: { confidenceThresholds: { low: 0.8, high: 0.2 } } }))
            .toThrow(ConfigurationError);
        expect(() => createIntelligenceConfig({ windowMs: 0 })).toThrow(ConfigurationError);
    });

    test('createIntelligenceConfig fills defaults', () => {
        expect(createIntelligenceConfig({ relevantTags: ['lisk'] })).toEqual({
            windowMs: 3_600_000,
            confidenceThresholds: { low: 0.4, high: 0.7 },
            riskEvidenceThreshold: 2,
            relevantTags: ['lisk'],
        });
    });
});

// ═══════════════════════════════════════════════════════════════════════════════
// FEED VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

describe('feed validation', () => {
    test('a news item with a numeric headline is dropped and refresh still publishes', () => {
        const aggregator = new IntelligenceAggregator({
            now: () => NOW,
            scorer: createKeywordScorer({ approval: 0.6 }),
        });

        const accepted = aggregator.ingestNews([
            { timestamp: NOW, polarity: 0.9, headline: 42, topicTags: ['lisk'], isRegulatory: false },
            news({ polarity: 0.2 }),
        ]);

        expect(accepted).toBe(1);
        const snapshot = aggregator.refresh();
        expect(snapshot.sequence).toBe(1);
        expect(snapshot.sentiment).toBeCloseTo(0.2, 10);
        expect(aggregator.currentSnapshot()).toBe(snapshot);
    });

    test('a market with non-string tags is dropped and refresh still publishes', () => {
        const aggregator = new IntelligenceAggregator({ now: () => NOW, config: { relevantTags: ['eth'] } });

        const accepted = aggregator.ingestMarkets([
            { marketId: 'bad', yesProbability: 0.1, volume: 10, relevanceTags: [7], timestamp: NOW },
            market({ marketId: 'good', yesProbability: 0.8, relevanceTags: ['ETH'] }),
        ]);

        expect(accepted).toBe(1);
        expect(aggregator.trackedMarketCount).toBe(1);
        const snapshot = aggregator.refresh();
        expect(snapshot.sequence).toBe(1);
        expect(snapshot.confidence).toBeCloseTo(0.8, 10);
    });

    test.each([
        ['null', null],
        ['string polarity', { timestamp: NOW, polarity: '0.5', topicTags: [], isRegulatory: false }],
        ['string weight', { timestamp: NOW, polarity: 0.5, weight: '2', topicTags: [], isRegulatory: false }],
        ['numeric regulatory flag', { timestamp: NOW, polarity: 0.5, topicTags: [], isRegulatory: 1 }],
        ['non-string topic tag', { timestamp: NOW, polarity: 0.5, topicTags: [null], isRegulatory: false }],
        ['missing topic tags', { timestamp: NOW, polarity: 0.5, isRegulatory: false }],
    ])('%s is not a news item', (_name, value) => {
        expect(isNewsItem(value)).toBe(false);
    });

    test('well-formed items pass', () => {
        expect(isNewsItem(news({ headline: 'ok', weight: 2, id: 'n1' }))).toBe(true);
        expect(isMarketReading(market())).toBe(true);
        expect(isMarketReading({ ...market(), volume: '100' })).toBe(false);
        expect(isMarketReading({ ...market(), marketId: '' })).toBe(false);
    });
});
