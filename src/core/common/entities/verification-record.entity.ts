// src/core/common/entities/verification-record.entity.ts
import {
    Column,
    CreateDateColumn,
    Entity,
    Index,
    PrimaryGeneratedColumn,
    UpdateDateColumn,
} from 'typeorm';
import { DecisionOutcome } from '../interfaces/models';

@Entity('verification_records')
@Index('UQ_verification_records_region_invoice', ['region', 'invoiceNumber'], { unique: true })
export class VerificationRecordEntity {

    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Column({ type: 'varchar', length: 6 })
    region!: string;

    @Column({ type: 'varchar', length: 20 }) // Up to 2^64-1
    invoiceNumber!: string;

    @Index('IDX_verification_records_order_number')
    @Column({ type: 'varchar', length: 20 })
    orderNumber!: string;

    @Column({ type: 'date' })
    receivedDate!: string;

    @Column()
    isValid!: boolean;

    @Column({ type: 'date', nullable: true })
    plannedDate!: string | null;

    @Index('IDX_verification_records_decision')
    @Column({ type: 'varchar', length: 32, default: '' })
    decision!: DecisionOutcome | '';

    @Column({ type: 'varchar', length: 1000, default: '' })
    message!: string;

    @CreateDateColumn()
    createdAt!: Date;

    @UpdateDateColumn()
    updatedAt!: Date;
}
