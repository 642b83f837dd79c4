/**
 * ComplianceClassifier: pure decision per employee per run.
 */

import { round2 } from '../../utils/dateHelpers.js';
import type { ComplianceClassification } from './types.js';

export interface ComplianceInput {
    activeHours: number;
    requiredHours: number;
    acceptableHours: number;
    /** Days needing no work: leave, holidays and weekend */
    coveredDays: number;
    weekDays: number;
}

export interface ComplianceDecision {
    classification: ComplianceClassification;
    shortfall: number | null;
}

/**
 * 1. whole week covered        → exempt, no shortfall
 * 2. active ≥ acceptable        → compliant
 * 3. otherwise                  → non_compliant, shortfall = acceptable − active
 */
export function classifyCompliance(input: ComplianceInput): ComplianceDecision {
    if (input.coveredDays >= input.weekDays) {
        return { classification: 'exempt', shortfall: null };
    }

    if (input.activeHours >= input.acceptableHours) {
        return { classification: 'compliant', shortfall: null };
    }

    return {
        classification: 'non_compliant',
        shortfall: round2(Math.max(input.acceptableHours - input.activeHours, 0)),
    };
}
