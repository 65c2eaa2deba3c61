// src/infrastructure/spreadsheet/rate-limited.gateway.ts
import { sleep } from '../../core/common/utils';
import { SheetRow, SpreadsheetGateway } from './spreadsheet.gateway';

export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

const systemClock: Clock = { now: () => Date.now(), sleep };

/**
 * Serializes calls to the wrapped gateway and starts each one at least
 * `minIntervalMs` after the previous one started.
 */
export class RateLimitedSpreadsheetGateway implements SpreadsheetGateway {

    private lastStartedAt: number | null = null;
    private queue: Promise<void> = Promise.resolve();

    constructor(
        private readonly inner: SpreadsheetGateway,
        private readonly minIntervalMs: number,
        private readonly clock: Clock = systemClock
    ) { }

    describe(): string {
        return this.inner.describe();
    }

    readRows(): Promise<SheetRow[]> {
        return this.schedule(() => this.inner.readRows());
    }

    appendRows(rows: SheetRow[]): Promise<void> {
        return this.schedule(() => this.inner.appendRows(rows));
    }

    updateRow(rowNumber: number, row: SheetRow): Promise<void> {
        return this.schedule(() => this.inner.updateRow(rowNumber, row));
    }

    deleteRow(rowNumber: number): Promise<void> {
        return this.schedule(() => this.inner.deleteRow(rowNumber));
    }

    private schedule<T>(operation: () => Promise<T>): Promise<T> {
        const run = this.queue.then(async () => {
            await this.waitForSlot();
            return operation();
        });
        // The caller receives the failure through `run`; the queue only tracks completion
        this.queue = run.then(() => undefined, () => undefined);
        return run;
    }

    private async waitForSlot(): Promise<void> {
        if (this.lastStartedAt !== null) {
            const wait = this.lastStartedAt + this.minIntervalMs - this.clock.now();
            if (wait > 0) {
                await this.clock.sleep(wait);
            }
        }
        this.lastStartedAt = this.clock.now();
    }
}
