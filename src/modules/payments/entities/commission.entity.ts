import { Column, Entity, JoinColumn, OneToOne, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { Payment } from './payment.entity';
import { bigintToNumber } from '../../../database/bigint.transformer';

/**
 * Derived from its payment by calculateCommission; never edited directly.
 */
@Entity('commissions')
export class Commission {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Column({ type: 'uuid', unique: true })
    paymentId!: string;

    @OneToOne(() => Payment, payment => payment.commission, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'paymentId' })
    payment?: Payment;

    @Column({ type: 'bigint', transformer: bigintToNumber })
    companyCommission!: number;

    @Column({ type: 'bigint', transformer: bigintToNumber })
    vatOnCommission!: number;

    @Column({ type: 'bigint', transformer: bigintToNumber })
    netToOwner!: number;

    @Column({ type: 'integer' })
    companyRateBp!: number;

    @Column({ type: 'integer' })
    vatRateBp!: number;

    @UpdateDateColumn()
    computedAt!: Date;
}
