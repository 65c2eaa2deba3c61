// src/core/common/errors.ts

/**
 * Base class for custom application errors.
 * Allows for operational errors (expected, like validation) vs programmer errors.
 */
export class AppError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(
        name: string,
        message: string,
        statusCode: number = 500, // Default to Internal Server Error
        isOperational: boolean = true // Assume operational unless specified
        ) {
        super(message);
        this.name = name;
        this.statusCode = statusCode;
        this.isOperational = isOperational;

        // Maintain proper stack trace (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }

        // Set the prototype explicitly for extending built-in classes
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Error for issues during configuration loading or validation.
 */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        // Configuration errors are typically not operational; they prevent startup.
        super('ConfigurationError', message, 500, false);
    }
}

/**
 * Caller supplied a blank, oversized or non-numeric field.
 */
export class InputError extends AppError {
    constructor(message: string = 'Invalid input') {
        super('InputError', message, 400, true);
    }
}

/**
 * Error for resources not found.
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super('NotFoundError', message, 404, true);
    }
}

/**
 * Error specifically for failures during file parsing.
 */
export class FileParsingError extends AppError {
    constructor(message: string, originalError?: Error) {
        const fullMessage = originalError
            ? `${message}: ${originalError.message}`
            : message;
        super('FileParsingError', fullMessage, 400, true);
        if (originalError) {
            this.stack = originalError.stack; // Preserve original stack if available
        }
    }
}

/**
 * The planning catalog is missing, unreadable or lacks required columns.
 * Distinct from a lookup miss, which is a normal negative result.
 */
export class CatalogLoadError extends AppError {
    constructor(message: string, originalError?: Error) {
        const fullMessage = originalError
            ? `${message}: ${originalError.message}`
            : message;
        super('CatalogLoadError', fullMessage, 503, true);
    }
}

/**
 * Returned (not thrown) by the date parser when no known pattern matches.
 */
export class DateParseError extends AppError {
    public readonly input: string;

    constructor(input: string) {
        super('DateParseError', `Unrecognized date format: "${input}"`, 400, true);
        this.input = input;
    }
}

/**
 * A record with the same (region, invoice number) already exists.
 */
export class DuplicateRecordError extends AppError {
    public readonly region: string;
    public readonly invoiceNumber: string;

    constructor(region: string, invoiceNumber: string) {
        super('DuplicateRecordError', `A record for region ${region} and invoice ${invoiceNumber} already exists`, 409, true);
        this.region = region;
        this.invoiceNumber = invoiceNumber;
    }
}

/**
 * The storage backend was unreachable or rejected the operation for a reason
 * other than a uniqueness violation.
 */
export class PersistenceError extends AppError {
    public readonly originalError?: unknown;

    constructor(message: string, originalError?: unknown) {
        const reason = originalError instanceof Error ? `: ${originalError.message}` : '';
        super('PersistenceError', `${message}${reason}`, 503, false);
        this.originalError = originalError;
    }
}
