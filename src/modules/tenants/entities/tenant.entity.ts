import { Column, CreateDateColumn, Entity, Index, OneToMany, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { Contract } from '../../contracts/entities/contract.entity';

@Entity('tenants')
export class Tenant {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Index()
    @Column({ type: 'varchar', length: 120 })
    name!: string;

    @Column({ type: 'varchar', length: 50, nullable: true })
    phone!: string | null;

    @Column({ type: 'varchar', length: 120, nullable: true })
    email!: string | null;

    @Column({ type: 'varchar', length: 50, nullable: true })
    nationalId!: string | null;

    @Column({ type: 'varchar', length: 50, nullable: true })
    bankAccountNumber!: string | null;

    @OneToMany(() => Contract, contract => contract.tenant)
    contracts?: Contract[];

    @CreateDateColumn()
    createdAt!: Date;

    @UpdateDateColumn()
    updatedAt!: Date;
}
