// src/core/integrity/interfaces/services.ts
import { IntegrityReport } from '../../common/interfaces/models';

export interface IIntegrityService {
    /**
     * Reads every stored record and reports those with an unreadable received
     * date or keys that are not in canonical form.
     */
    check(): Promise<IntegrityReport>;
}
