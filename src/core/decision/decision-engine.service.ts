// src/core/decision/decision-engine.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { DecisionOutcome, YearMonth } from '../common/interfaces/models';
import { IDecisionEngine } from './interfaces/services';

const OUTCOME_MESSAGES: Readonly<Record<DecisionOutcome, string>> = {
    [DecisionOutcome.OPEN_NOW]: 'Ticket can be opened now',
    [DecisionOutcome.WAIT_FOR_MONTH_CLOSE]: 'Open the ticket after the month close',
    [DecisionOutcome.MANUAL_REVIEW]: 'Category requires manual review',
    [DecisionOutcome.DATE_FORMAT_INVALID]: 'Invalid date format',
};

function normalizeCategory(category: string): string {
    return category.trim().toLowerCase();
}

function isParsed(value: YearMonth | null): value is YearMonth {
    return value !== null && value.year > 0 && value.month > 0;
}

@singleton()
@injectable()
export class DecisionEngine implements IDecisionEngine {

    private readonly manualReviewCategories: ReadonlySet<string>;

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.manualReviewCategories = new Set(config.decision.manualReviewCategories.map(normalizeCategory));
        this.logger.info(`DecisionEngine initialized. Manual-review categories: ${[...this.manualReviewCategories].join(', ')}`);
    }

    isManualReviewCategory(category: string | undefined): boolean {
        if (!category) return false;
        return this.manualReviewCategories.has(normalizeCategory(category));
    }

    decide(planned: YearMonth | null, received: YearMonth | null, category?: string): DecisionOutcome {
        if (this.isManualReviewCategory(category)) {
            return DecisionOutcome.MANUAL_REVIEW;
        }
        if (!isParsed(planned) || !isParsed(received)) {
            return DecisionOutcome.DATE_FORMAT_INVALID;
        }

        // Same month counts as reached
        const outcome = (planned.year < received.year) || (planned.year === received.year && planned.month <= received.month)
            ? DecisionOutcome.OPEN_NOW
            : DecisionOutcome.WAIT_FOR_MONTH_CLOSE;

        this.logger.debug(`Decision: planned ${planned.year}-${planned.month}, received ${received.year}-${received.month} -> ${outcome}`);
        return outcome;
    }

    describe(outcome: DecisionOutcome): string {
        return OUTCOME_MESSAGES[outcome];
    }
}
