import { ICatalogSource } from '../../src/core/catalog';
import { CatalogLoadError } from '../../src/core/common/errors';

export class MemoryCatalogSource implements ICatalogSource {
    reads = 0;

    constructor(public content: Buffer | null) { }

    describe(): string {
        return 'memory';
    }

    async read(): Promise<Buffer> {
        this.reads++;
        if (!this.content) {
            throw new CatalogLoadError('Planning catalog not readable at memory');
        }
        return this.content;
    }

    async write(content: Buffer): Promise<void> {
        this.content = content;
    }
}
