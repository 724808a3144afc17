import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('audit_logs')
export class AuditLog {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Column({ type: 'varchar', length: 255 })
    action!: string;

    @Column({ type: 'varchar', length: 40, nullable: true })
    entityType!: string | null;

    @Column({ type: 'varchar', length: 36, nullable: true })
    entityId!: string | null;

    @Column({ type: 'varchar', length: 36, nullable: true })
    userId!: string | null;

    @Column({ type: 'varchar', length: 80, default: 'system' })
    username!: string;

    @Column({ type: 'varchar', length: 64, nullable: true })
    ipAddress!: string | null;

    @Index()
    @CreateDateColumn()
    createdAt!: Date;
}
