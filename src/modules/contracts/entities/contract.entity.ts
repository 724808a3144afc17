import {
    Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne,
    PrimaryGeneratedColumn, UpdateDateColumn,
} from 'typeorm';
import { Unit } from '../../units/entities/unit.entity';
import { Tenant } from '../../tenants/entities/tenant.entity';
import { ContractStatus, PaymentFrequency } from '../contract.enums';
import { bigintToNumber } from '../../../database/bigint.transformer';

@Entity('contracts')
// At most one active contract per unit, enforced by the database as well as the service
@Index('UQ_contracts_active_unit', ['unitId'], { unique: true, where: `"status" = 'active'` })
export class Contract {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Column({ type: 'varchar', length: 100, nullable: true, unique: true })
    contractNumber!: string | null;

    @Index()
    @Column({ type: 'uuid' })
    unitId!: string;

    @ManyToOne(() => Unit, unit => unit.contracts, { onDelete: 'RESTRICT' })
    @JoinColumn({ name: 'unitId' })
    unit?: Unit;

    @Index()
    @Column({ type: 'uuid' })
    tenantId!: string;

    @ManyToOne(() => Tenant, tenant => tenant.contracts, { onDelete: 'RESTRICT' })
    @JoinColumn({ name: 'tenantId' })
    tenant?: Tenant;

    // Gregorian, YYYY-MM-DD
    @Column({ type: 'date' })
    startDate!: string;

    @Column({ type: 'date' })
    endDate!: string;

    // Total obligation over the whole term, in halalas
    @Column({ type: 'bigint', transformer: bigintToNumber })
    totalAmount!: number;

    @Column({ type: 'simple-enum', enum: PaymentFrequency, default: PaymentFrequency.MONTHLY })
    paymentFrequency!: PaymentFrequency;

    @Column({ type: 'simple-enum', enum: ContractStatus, default: ContractStatus.ACTIVE })
    status!: ContractStatus;

    @Column({ type: 'text', nullable: true })
    notes!: string | null;

    @Column({ type: 'varchar', length: 255, nullable: true })
    documentKey!: string | null;

    @Column({ type: 'varchar', length: 255, nullable: true })
    documentName!: string | null;

    @Column({ type: 'varchar', length: 120, nullable: true })
    documentMimeType!: string | null;

    @Column({ type: 'integer', nullable: true })
    documentSize!: number | null;

    @CreateDateColumn()
    createdAt!: Date;

    @UpdateDateColumn()
    updatedAt!: Date;
}
