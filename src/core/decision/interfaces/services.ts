// src/core/decision/interfaces/services.ts
import { DecisionOutcome, YearMonth } from '../../common/interfaces/models';

/** Defines the contract for the Decision Engine */
export interface IDecisionEngine {
    /**
     * Applies the month/year ordering rule.
     * @param planned - Planned year/month, null or {0, 0} when unparsed.
     * @param received - Received year/month, null or {0, 0} when unparsed.
     * @param category - Optional catalog category; a manual-review category wins over dates.
     */
    decide(planned: YearMonth | null, received: YearMonth | null, category?: string): DecisionOutcome;

    /** Whether the category forces manual review */
    isManualReviewCategory(category: string | undefined): boolean;

    /** Human explanation of an outcome */
    describe(outcome: DecisionOutcome): string;
}
