import { MarketReading, NewsItem } from './types';

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((v: unknown) => typeof v === 'string');
}

/**
 * Shape check for feed items before they are buffered. Value ranges
 * (non-finite polarity, zero weight, probability outside 0..1) are left to
 * the aggregation functions, which skip them per item.
 */
export function isNewsItem(value: unknown): value is NewsItem {
    if (typeof value !== 'object' || value === null) return false;
    if (!('timestamp' in value) || typeof value.timestamp !== 'number' || !Number.isFinite(value.timestamp)) return false;
    if (!('polarity' in value) || typeof value.polarity !== 'number') return false;
    if (!('topicTags' in value) || !isStringArray(value.topicTags)) return false;
    if (!('isRegulatory' in value) || typeof value.isRegulatory !== 'boolean') return false;
    if ('weight' in value && value.weight !== undefined && typeof value.weight !== 'number') return false;
    if ('headline' in value && value.headline !== undefined && typeof value.headline !== 'string') return false;
    if ('id' in value && value.id !== undefined && typeof value.id !== 'string') return false;
    return true;
}

export function isMarketReading(value: unknown): value is MarketReading {
    if (typeof value !== 'object' || value === null) return false;
    return (
        'marketId' in value && typeof value.marketId === 'string' && value.marketId !== '' &&
        'yesProbability' in value && typeof value.yesProbability === 'number' &&
        'volume' in value && typeof value.volume === 'number' &&
        'relevanceTags' in value && isStringArray(value.relevanceTags) &&
        'timestamp' in value && typeof value.timestamp === 'number' && Number.isFinite(value.timestamp)
    );
}

/**
 * Short label for a rejected item in logs.
 */
export function describeFeedItem(value: unknown): string {
    if (typeof value !== 'object' || value === null) return String(value);
    if ('id' in value && typeof value.id === 'string') return value.id;
    if ('marketId' in value && typeof value.marketId === 'string') return value.marketId;
    return 'item';
}
