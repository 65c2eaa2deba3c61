import { NewVerificationRecord } from '../../src/core/common/interfaces/models';

export function newRecord(overrides: Partial<NewVerificationRecord> = {}): NewVerificationRecord {
    return {
        region: 'SP',
        invoiceNumber: '15733',
        orderNumber: '75710',
        receivedDate: '2025-05-20',
        isValid: true,
        plannedDate: '2025-05-01',
        decision: '',
        message: '',
        ...overrides,
    };
}
