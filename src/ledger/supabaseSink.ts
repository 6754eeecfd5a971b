/**
 * Supabase Ledger Mirror
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * TABLES:
 * - opportunity_ledger   (one row per LedgerEntry, id PRIMARY KEY)
 * - opportunity_outcomes (one row per OutcomeRecord, entry_id → opportunity_ledger.id)
 *
 * Fixed-point values are written as decimal strings so nothing is rounded
 * through a float on the way to the database.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SupabaseClient } from '@supabase/supabase-js';
import { LedgerEntry, LedgerSink, OutcomeRecord } from './types';

export interface LedgerRow {
    id: string;
    recorded_at: string;
    opportunity_id: string;
    kind: string;
    start_asset: string;
    asset_path: string[];
    pool_keys: string[];
    notional_in: string;
    amount_out: string;
    gross_profit_ratio: string;
    net_profit_ratio: string;
    graph_generation: number;
    snapshot_id: string;
    sentiment: number;
    confidence: number;
    confidence_label: string;
    risk_flags: string[];
    action: string;
    multiplier: number;
    rule: string;
    reason: string;
}

export interface OutcomeRow {
    entry_id: string;
    status: string;
    detail: string;
    estimated_profit: string | null;
    recorded_at: string;
}

export function toLedgerRow(entry: LedgerEntry): LedgerRow {
    const { opportunity, snapshot, verdict } = entry;
    return {
        id: entry.id,
        recorded_at: new Date(entry.timestamp).toISOString(),
        opportunity_id: opportunity.id,
        kind: opportunity.kind,
        start_asset: opportunity.startAsset,
        asset_path: [...opportunity.assetPath],
        pool_keys: opportunity.hops.map(h => h.poolKey),
        notional_in: opportunity.notionalIn.toFixed(),
        amount_out: opportunity.amountOut.toFixed(),
        gross_profit_ratio: opportunity.grossProfitRatio.toFixed(),
        net_profit_ratio: opportunity.netProfitRatio.toFixed(),
        graph_generation: opportunity.generation,
        snapshot_id: snapshot.id,
        sentiment: snapshot.sentiment,
        confidence: snapshot.confidence,
        confidence_label: snapshot.confidenceLabel,
        risk_flags: [...snapshot.riskFlags],
        action: verdict.action,
        multiplier: verdict.multiplier,
        rule: verdict.rule,
        reason: verdict.reason,
    };
}

export function toOutcomeRow(outcome: OutcomeRecord): OutcomeRow {
    return {
        entry_id: outcome.entryId,
        status: outcome.status,
        detail: outcome.detail,
        estimated_profit: outcome.estimatedProfit,
        recorded_at: new Date(outcome.recordedAt).toISOString(),
    };
}

export class SupabaseLedgerSink implements LedgerSink {
    constructor(private readonly client: SupabaseClient) {}

    async writeEntry(entry: LedgerEntry): Promise<void> {
        const { error } = await this.client.from('opportunity_ledger').insert(toLedgerRow(entry));
        if (error) {
            throw new Error(`opportunity_ledger insert failed: ${error.message}`);
        }
    }

    async writeOutcome(outcome: OutcomeRecord): Promise<void> {
        const { error } = await this.client.from('opportunity_outcomes').insert(toOutcomeRow(outcome));
        if (error) {
            throw new Error(`opportunity_outcomes insert failed: ${error.message}`);
        }
    }
}
