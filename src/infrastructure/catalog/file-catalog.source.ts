// src/infrastructure/catalog/file-catalog.source.ts
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import { CatalogLoadError } from '../../core/common/errors';
import { ICatalogSource } from '../../core/catalog';

/**
 * Planning catalog stored as a workbook on the local filesystem.
 */
export class FileCatalogSource implements ICatalogSource {

    constructor(private readonly filePath: string) { }

    describe(): string {
        return path.resolve(this.filePath);
    }

    async read(): Promise<Buffer> {
        try {
            return await readFile(this.filePath);
        } catch (error: unknown) {
            throw new CatalogLoadError(`Planning catalog not readable at ${this.describe()}`, error instanceof Error ? error : undefined);
        }
    }

    async write(content: Buffer): Promise<void> {
        await mkdir(path.dirname(this.filePath), { recursive: true });
        // Write beside the target and rename so readers never see a half-written file
        const tempPath = `${this.filePath}.${process.pid}.tmp`;
        await writeFile(tempPath, content);
        await rename(tempPath, this.filePath);
    }
}
