import {
    Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne,
    OneToMany, PrimaryGeneratedColumn, UpdateDateColumn,
} from 'typeorm';
import { Project } from '../../projects/entities/project.entity';
import { Owner } from '../../owners/entities/owner.entity';
import { Contract } from '../../contracts/entities/contract.entity';
import { UnitStatus } from '../unit-status.enum';

@Entity('units')
@Index(['projectId', 'unitNumber'], { unique: true })
export class Unit {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Column({ type: 'uuid' })
    projectId!: string;

    @ManyToOne(() => Project, project => project.units, { onDelete: 'RESTRICT' })
    @JoinColumn({ name: 'projectId' })
    project?: Project;

    @Column({ type: 'varchar', length: 50 })
    unitNumber!: string;

    // apartment, office, shop...
    @Column({ type: 'varchar', length: 50, nullable: true })
    type!: string | null;

    @Column({ type: 'real', nullable: true })
    area!: number | null;

    @Index()
    @Column({ type: 'uuid', nullable: true })
    ownerId!: string | null;

    @ManyToOne(() => Owner, owner => owner.units, { nullable: true, onDelete: 'RESTRICT' })
    @JoinColumn({ name: 'ownerId' })
    owner?: Owner | null;

    @Column({ type: 'simple-enum', enum: UnitStatus, default: UnitStatus.AVAILABLE })
    status!: UnitStatus;

    @OneToMany(() => Contract, contract => contract.unit)
    contracts?: Contract[];

    @CreateDateColumn()
    createdAt!: Date;

    @UpdateDateColumn()
    updatedAt!: Date;
}
