// src/core/validation/interfaces/services.ts
import { ValidationResult } from '../../common/interfaces/models';

export const CATALOG_MISS_MESSAGE = 'Invoice not found in planning catalog';
export const DUPLICATE_RECORD_MESSAGE = 'record already registered for this region and invoice';
export const UNSAVED_RECORD_PREFIX = 'record could not be saved';

export interface IValidationService {
    /**
     * Checks a received invoice against the planning catalog, decides the
     * ticket outcome and records accepted results.
     *
     * Persistence problems are reported in `message`; they never change
     * `valid` or `decision`.
     *
     * @throws {InputError} If a field is blank, the region is too long or the
     *         invoice/order numbers are not non-negative integers.
     * @throws {CatalogLoadError} If the planning catalog cannot be loaded.
     */
    validate(region: string, invoice: string, order: string, receivedDate: string): Promise<ValidationResult>;
}
