import { DecisionOutcome } from '../../../src/core/common/interfaces/models';
import { DecisionEngine } from '../../../src/core/decision';
import logger from '../../../src/infrastructure/logger';

describe('DecisionEngine', () => {
    const engine = new DecisionEngine(logger);

    it.each([
        [{ year: 2025, month: 5 }, { year: 2025, month: 5 }, DecisionOutcome.OPEN_NOW],
        [{ year: 2025, month: 4 }, { year: 2025, month: 5 }, DecisionOutcome.OPEN_NOW],
        [{ year: 2024, month: 12 }, { year: 2025, month: 1 }, DecisionOutcome.OPEN_NOW],
        [{ year: 2025, month: 6 }, { year: 2025, month: 5 }, DecisionOutcome.WAIT_FOR_MONTH_CLOSE],
        [{ year: 2026, month: 1 }, { year: 2025, month: 12 }, DecisionOutcome.WAIT_FOR_MONTH_CLOSE],
    ])('planned %j received %j -> %s', (planned, received, expected) => {
        expect(engine.decide(planned, received)).toBe(expected);
    });

    it('reports an invalid date format when either side is unparsed', () => {
        expect(engine.decide({ year: 0, month: 0 }, { year: 2025, month: 5 })).toBe(DecisionOutcome.DATE_FORMAT_INVALID);
        expect(engine.decide({ year: 2025, month: 5 }, null)).toBe(DecisionOutcome.DATE_FORMAT_INVALID);
    });

    it('sends manual-review categories to review regardless of dates', () => {
        expect(engine.decide(null, null, ' Engineering-Network ')).toBe(DecisionOutcome.MANUAL_REVIEW);
        expect(engine.decide({ year: 2025, month: 1 }, { year: 2025, month: 5 }, 'engineering-network')).toBe(DecisionOutcome.MANUAL_REVIEW);
    });

    it('ignores other categories', () => {
        expect(engine.isManualReviewCategory('hardware')).toBe(false);
        expect(engine.isManualReviewCategory(undefined)).toBe(false);
        expect(engine.decide({ year: 2025, month: 1 }, { year: 2025, month: 5 }, 'hardware')).toBe(DecisionOutcome.OPEN_NOW);
    });

    it('describes every outcome', () => {
        expect(engine.describe(DecisionOutcome.OPEN_NOW)).toBe('Ticket can be opened now');
        expect(engine.describe(DecisionOutcome.WAIT_FOR_MONTH_CLOSE)).toBe('Open the ticket after the month close');
        expect(engine.describe(DecisionOutcome.MANUAL_REVIEW)).toBe('Category requires manual review');
        expect(engine.describe(DecisionOutcome.DATE_FORMAT_INVALID)).toBe('Invalid date format');
    });
});
