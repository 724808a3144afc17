import {
    Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne,
    OneToOne, PrimaryGeneratedColumn, UpdateDateColumn,
} from 'typeorm';
import { Contract } from '../../contracts/entities/contract.entity';
import { Unit } from '../../units/entities/unit.entity';
import { Commission } from './commission.entity';
import { PayerType } from '../payer-type.enum';
import { bigintToNumber } from '../../../database/bigint.transformer';

@Entity('payments')
export class Payment {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Index()
    @Column({ type: 'uuid' })
    contractId!: string;

    @ManyToOne(() => Contract, { onDelete: 'RESTRICT' })
    @JoinColumn({ name: 'contractId' })
    contract?: Contract;

    // Copied from the contract so project/unit filters do not need the contract join
    @Index()
    @Column({ type: 'uuid' })
    unitId!: string;

    @ManyToOne(() => Unit, { onDelete: 'RESTRICT' })
    @JoinColumn({ name: 'unitId' })
    unit?: Unit;

    @Column({ type: 'simple-enum', enum: PayerType, default: PayerType.TENANT })
    payerType!: PayerType;

    @Column({ type: 'uuid', nullable: true })
    payerId!: string | null;

    // Halalas
    @Column({ type: 'bigint', transformer: bigintToNumber })
    amount!: number;

    @Index()
    @Column({ type: 'date' })
    paidOn!: string;

    @Column({ type: 'varchar', length: 255, nullable: true })
    description!: string | null;

    @Column({ type: 'integer' })
    companyRateBp!: number;

    @Column({ type: 'integer' })
    vatRateBp!: number;

    @Column({ type: 'varchar', length: 80, default: 'system' })
    recordedBy!: string;

    @OneToOne(() => Commission, commission => commission.payment)
    commission?: Commission;

    @CreateDateColumn()
    createdAt!: Date;

    @UpdateDateColumn()
    updatedAt!: Date;
}
