/**
 * Regulatory Risk Flags
 */

import { NewsItem, RiskFlag } from './types';

export interface RiskAssessment {
    flags: RiskFlag[];
    regulatoryEvidenceCount: number;
}

/**
 * REGULATORY_RISK is raised when the number of regulatory items in the window
 * exceeds `threshold`.
 */
export function assessRisk(items: readonly NewsItem[], threshold: number): RiskAssessment {
    const regulatoryEvidenceCount = items.filter(i => i.isRegulatory === true).length;
    const flags: RiskFlag[] = regulatoryEvidenceCount > threshold ? ['REGULATORY_RISK'] : [];
    return { flags, regulatoryEvidenceCount };
}
