// src/core/validation/validation.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { PlanningCatalogService } from '../catalog';
import { DateParseError, DuplicateRecordError, InputError } from '../common/errors';
import { DecisionOutcome, ValidationResult, YearMonth } from '../common/interfaces/models';
import {
    IVerificationRecordRepository,
    VERIFICATION_RECORD_REPOSITORY_TOKEN
} from '../common/interfaces/repositories';
import { MAX_REGION_LENGTH, normalizeDocumentNumber, recordKey } from '../common/normalization.utils';
import { errorMessage } from '../common/utils';
import { DecisionEngine, formatIsoDate, parseCalendarDate, parseYearMonth } from '../decision';
import {
    CATALOG_MISS_MESSAGE,
    DUPLICATE_RECORD_MESSAGE,
    IValidationService,
    UNSAVED_RECORD_PREFIX
} from './interfaces/services';

const PERSISTED_OUTCOMES: ReadonlySet<DecisionOutcome> = new Set([
    DecisionOutcome.OPEN_NOW,
    DecisionOutcome.WAIT_FOR_MONTH_CLOSE,
    DecisionOutcome.MANUAL_REVIEW,
]);

interface ValidatedInput {
    region: string;
    invoice: string;
    order: string;
    receivedDate: string;
}

function isParsedYearMonth(value: YearMonth): boolean {
    return value.year > 0 && value.month > 0;
}

@singleton()
@injectable()
export class ValidationService implements IValidationService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(PlanningCatalogService) private catalog: PlanningCatalogService,
        @inject(DecisionEngine) private decisionEngine: DecisionEngine,
        @inject(VERIFICATION_RECORD_REPOSITORY_TOKEN) private store: IVerificationRecordRepository
    ) {
        this.logger.info('ValidationService Initialized');
    }

    async validate(region: string, invoice: string, order: string, receivedDate: string): Promise<ValidationResult> {
        const input = this.validateInput(region, invoice, order, receivedDate);
        this.logger.info(`Validating ${input.region}/${input.invoice}/${input.order} received ${input.receivedDate}`);

        const result: ValidationResult = {
            region: input.region,
            invoice: input.invoice,
            order: input.order,
            receivedDate: input.receivedDate,
            valid: false,
            plannedDate: '',
            decision: '',
            message: '',
        };

        const entry = await this.catalog.lookup(input.region, input.invoice, input.order);
        if (!entry) {
            result.message = CATALOG_MISS_MESSAGE;
            this.logger.info(`${recordKey(input.region, input.invoice)}: not in planning catalog.`);
            return result;
        }
        result.plannedDate = entry.planningToken;

        const planned = parseYearMonth(entry.planningToken);
        const received = parseYearMonth(input.receivedDate);
        const decision = this.decisionEngine.decide(planned, received, entry.category);

        result.decision = decision;
        result.valid = decision !== DecisionOutcome.DATE_FORMAT_INVALID;
        result.message = this.decisionEngine.describe(decision);
        this.logger.info(`${recordKey(input.region, input.invoice)}: ${decision}.`);

        if (PERSISTED_OUTCOMES.has(decision)) {
            const note = await this.persist(input, planned, result);
            if (note) {
                result.message = `${result.message}; ${note}`;
            }
        }
        return result;
    }

    private validateInput(region: string, invoice: string, order: string, receivedDate: string): ValidatedInput {
        const trimmed = {
            region: region.trim().toUpperCase(),
            invoice: invoice.trim(),
            order: order.trim(),
            receivedDate: receivedDate.trim(),
        };
        if (!trimmed.region || !trimmed.invoice || !trimmed.order || !trimmed.receivedDate) {
            throw new InputError('All fields are required: region, invoice, order and received date');
        }
        if (trimmed.region.length > MAX_REGION_LENGTH) {
            throw new InputError(`Region must have at most ${MAX_REGION_LENGTH} characters`);
        }
        const canonicalInvoice = normalizeDocumentNumber(trimmed.invoice);
        const canonicalOrder = normalizeDocumentNumber(trimmed.order);
        if (!canonicalInvoice || !canonicalOrder) {
            throw new InputError('Invoice and order numbers must be non-negative integers');
        }
        return { ...trimmed, invoice: canonicalInvoice, order: canonicalOrder };
    }

    /**
     * Stores the outcome. Returns a note for the result message when the
     * record was not stored, or null on success.
     */
    private async persist(input: ValidatedInput, planned: YearMonth, result: ValidationResult): Promise<string | null> {
        const received = parseCalendarDate(input.receivedDate);
        if (received instanceof DateParseError) {
            // Only reachable for manual-review categories, which skip the date comparison
            this.logger.warn(`${recordKey(input.region, input.invoice)}: received date "${input.receivedDate}" unreadable, record not saved.`);
            return `${UNSAVED_RECORD_PREFIX}: unreadable received date`;
        }

        try {
            const record = await this.store.create({
                region: input.region,
                invoiceNumber: input.invoice,
                orderNumber: input.order,
                receivedDate: formatIsoDate(received),
                isValid: result.valid,
                plannedDate: isParsedYearMonth(planned) ? formatIsoDate({ ...planned, day: 1 }) : null,
                decision: result.decision,
                message: result.message,
            });
            this.logger.debug(`Recorded ${recordKey(record.region, record.invoiceNumber)} as ${record.id}.`);
            return null;
        } catch (error: unknown) {
            if (error instanceof DuplicateRecordError) {
                this.logger.info(`${recordKey(input.region, input.invoice)}: already registered.`);
                return DUPLICATE_RECORD_MESSAGE;
            }
            this.logger.warn(`${recordKey(input.region, input.invoice)}: record could not be saved: ${errorMessage(error)}`);
            return `${UNSAVED_RECORD_PREFIX}: ${errorMessage(error)}`;
        }
    }
}
