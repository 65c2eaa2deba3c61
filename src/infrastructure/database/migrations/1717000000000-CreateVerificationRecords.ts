// src/infrastructure/database/migrations/1717000000000-CreateVerificationRecords.ts
import { ColumnType, MigrationInterface, QueryRunner, Table } from 'typeorm';

/**
 * Creates `verification_records` with its unique (region, invoiceNumber) index.
 * Column types go through the driver so one migration serves sqlite and SQL Server.
 */
export class CreateVerificationRecords1717000000000 implements MigrationInterface {
    name = 'CreateVerificationRecords1717000000000';

    public async up(queryRunner: QueryRunner): Promise<void> {
        const driver = queryRunner.connection.driver;
        const typeOf = (type: ColumnType): string => driver.normalizeType({ type });
        const { createDate, createDateDefault, updateDate, updateDateDefault } = driver.mappedDataTypes;

        await queryRunner.createTable(new Table({
            name: 'verification_records',
            columns: [
                { name: 'id', type: typeOf('uuid'), isPrimary: true, isGenerated: true, generationStrategy: 'uuid' },
                { name: 'region', type: 'varchar', length: '6' },
                { name: 'invoiceNumber', type: 'varchar', length: '20' },
                { name: 'orderNumber', type: 'varchar', length: '20' },
                { name: 'receivedDate', type: 'date' },
                { name: 'isValid', type: typeOf(Boolean) },
                { name: 'plannedDate', type: 'date', isNullable: true },
                { name: 'decision', type: 'varchar', length: '32', default: "''" },
                { name: 'message', type: 'varchar', length: '1000', default: "''" },
                { name: 'createdAt', type: typeOf(createDate), default: createDateDefault },
                { name: 'updatedAt', type: typeOf(updateDate), default: updateDateDefault },
            ],
            indices: [
                { name: 'UQ_verification_records_region_invoice', columnNames: ['region', 'invoiceNumber'], isUnique: true },
                { name: 'IDX_verification_records_order_number', columnNames: ['orderNumber'] },
                { name: 'IDX_verification_records_decision', columnNames: ['decision'] },
            ],
        }), true);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.dropTable('verification_records', true);
    }
}
