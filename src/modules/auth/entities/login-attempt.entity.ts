import { Column, Entity, Index, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { bigintToNumber } from '../../../database/bigint.transformer';

@Entity('login_attempts')
@Index(['username', 'ipAddress'], { unique: true })
export class LoginAttempt {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Column({ type: 'varchar', length: 80 })
    username!: string;

    @Column({ type: 'varchar', length: 64 })
    ipAddress!: string;

    @Column({ type: 'integer', default: 0 })
    attempts!: number;

    @Column({ type: 'bigint', nullable: true, transformer: bigintToNumber })
    lockedUntil!: number | null;

    @UpdateDateColumn()
    updatedAt!: Date;
}
