import { Clock, RateLimitedSpreadsheetGateway } from '../../../src/infrastructure/spreadsheet/rate-limited.gateway';
import { SheetRow, SpreadsheetGateway } from '../../../src/infrastructure/spreadsheet/spreadsheet.gateway';

class FakeClock implements Clock {
    current = 0;
    readonly sleeps: number[] = [];

    now(): number {
        return this.current;
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.current += ms;
    }
}

/** Records the clock time at which each call starts */
class TimedGateway implements SpreadsheetGateway {
    readonly starts: number[] = [];
    failNext: Error | null = null;

    constructor(private readonly clock: FakeClock) { }

    describe(): string {
        return 'timed';
    }

    private async start(): Promise<void> {
        this.starts.push(this.clock.now());
        if (this.failNext) {
            const error = this.failNext;
            this.failNext = null;
            throw error;
        }
    }

    async readRows(): Promise<SheetRow[]> {
        await this.start();
        return [];
    }

    async appendRows(): Promise<void> {
        await this.start();
    }

    async updateRow(): Promise<void> {
        await this.start();
    }

    async deleteRow(): Promise<void> {
        await this.start();
    }
}

describe('RateLimitedSpreadsheetGateway', () => {
    let clock: FakeClock;
    let inner: TimedGateway;
    let gateway: RateLimitedSpreadsheetGateway;

    beforeEach(() => {
        clock = new FakeClock();
        inner = new TimedGateway(clock);
        gateway = new RateLimitedSpreadsheetGateway(inner, 1000, clock);
    });

    it('spaces concurrent calls by the minimum interval', async () => {
        await Promise.all([
            gateway.readRows(),
            gateway.appendRows([['a']]),
            gateway.updateRow(2, ['b']),
        ]);

        expect(inner.starts).toEqual([0, 1000, 2000]);
        expect(clock.sleeps).toEqual([1000, 1000]);
    });

    it('waits only for the remainder of the interval', async () => {
        await gateway.readRows();
        clock.current += 400;
        await gateway.deleteRow(2);

        expect(inner.starts).toEqual([0, 1000]);
        expect(clock.sleeps).toEqual([600]);
    });

    it('does not wait once the interval has passed', async () => {
        await gateway.readRows();
        clock.current += 2500;
        await gateway.readRows();

        expect(inner.starts).toEqual([0, 2500]);
        expect(clock.sleeps).toEqual([]);
    });

    it('passes failures to the caller and keeps serving', async () => {
        inner.failNext = new Error('backend down');
        const failed = gateway.readRows();
        const next = gateway.readRows();

        await expect(failed).rejects.toThrow('backend down');
        await expect(next).resolves.toEqual([]);
        expect(inner.starts).toEqual([0, 1000]);
    });

    it('delegates describe', () => {
        expect(gateway.describe()).toBe('timed');
    });
});
