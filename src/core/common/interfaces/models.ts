// src/core/common/interfaces/models.ts

/**
 * Terminal outcomes of the ticket decision.
 */
export enum DecisionOutcome {
    OPEN_NOW = 'OpenNow',
    WAIT_FOR_MONTH_CLOSE = 'WaitForMonthClose',
    MANUAL_REVIEW = 'ManualReview',
    DATE_FORMAT_INVALID = 'DateFormatInvalid',
}

/** A calendar date without time. Month and day are 1-based. */
export interface CalendarDate {
    readonly year: number;
    readonly month: number;
    readonly day: number;
}

/** Year/month pair; year 0 or month 0 marks an unparsed value. */
export interface YearMonth {
    readonly year: number;
    readonly month: number;
}

/**
 * One row of the planning catalog (reference data, read-only).
 */
export interface PlanningEntry {
    /** Region code, upper-cased */
    readonly region: string;
    /** Canonical digit string */
    readonly invoiceNumber: string;
    /** Canonical digit string */
    readonly orderNumber: string;
    /** Raw planning token as it appears in the catalog, e.g. "2025/maio" */
    readonly planningToken: string;
    readonly category?: string;
    /** Line number in the source sheet (header is line 1) */
    readonly originalLineNumber?: number;
}

/**
 * A persisted verification record.
 */
export interface VerificationRecord {
    id: string;
    region: string;
    invoiceNumber: string;
    orderNumber: string;
    /** ISO date (YYYY-MM-DD) */
    receivedDate: string;
    isValid: boolean;
    /** ISO date of the first day of the planned month, or null without a catalog match */
    plannedDate: string | null;
    decision: DecisionOutcome | '';
    message: string;
    createdAt: Date;
    updatedAt: Date;
}

/** Fields a caller supplies on create; identity and timestamps belong to the store. */
export type NewVerificationRecord = Omit<VerificationRecord, 'id' | 'createdAt' | 'updatedAt'>;

export type VerificationRecordUpdate = Partial<NewVerificationRecord>;

/** Exact-match filter over the record's scalar fields */
export type VerificationRecordFilter = Partial<Pick<VerificationRecord,
    'region' | 'invoiceNumber' | 'orderNumber' | 'receivedDate' | 'isValid' | 'plannedDate' | 'decision'>>;

/**
 * The single result object returned by a validation call.
 * Every field is a string except `valid`.
 */
export interface ValidationResult {
    region: string;
    invoice: string;
    order: string;
    receivedDate: string;
    valid: boolean;
    /** Echo of the catalog planning token, or '' */
    plannedDate: string;
    decision: DecisionOutcome | '';
    message: string;
}

/**
 * Wire/export shape of a persisted record (ISO dates and timestamps).
 */
export interface VerificationRecordView {
    id: string;
    region: string;
    invoice: string;
    order: string;
    receivedDate: string;
    valid: boolean;
    plannedDate: string;
    decision: string;
    message: string;
    createdAt: string;
    updatedAt: string;
}

export function toRecordView(record: VerificationRecord): VerificationRecordView {
    return {
        id: record.id,
        region: record.region,
        invoice: record.invoiceNumber,
        order: record.orderNumber,
        receivedDate: record.receivedDate,
        valid: record.isValid,
        plannedDate: record.plannedDate ?? '',
        decision: record.decision,
        message: record.message,
        createdAt: record.createdAt.toISOString(),
        updatedAt: record.updatedAt.toISOString(),
    };
}

/**
 * Summary returned by a bulk import.
 */
export interface ImportSummary {
    /** Rows read from the source */
    total: number;
    imported: number;
    skipped: number;
    failed: number;
    /** "REGION|invoice" keys created by this run */
    importedKeys: string[];
    failures: ImportFailure[];
}

export interface ImportFailure {
    /** Source line (header is line 1) */
    line?: number;
    key?: string;
    reason: string;
}

export interface IntegrityReport {
    totalRecords: number;
    invalidRecords: number;
    problems: string[];
}

const DECISION_TAGS: readonly DecisionOutcome[] = Object.values(DecisionOutcome);

/** Maps a stored decision tag back to the enum; anything unknown reads as '' */
export function parseDecisionTag(value: string): DecisionOutcome | '' {
    return DECISION_TAGS.find(tag => tag === value) ?? '';
}
