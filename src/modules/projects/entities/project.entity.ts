import { Column, CreateDateColumn, Entity, OneToMany, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { Unit } from '../../units/entities/unit.entity';

@Entity('projects')
export class Project {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Column({ type: 'varchar', length: 150, unique: true })
    name!: string;

    @Column({ type: 'varchar', length: 150, nullable: true })
    location!: string | null;

    @Column({ type: 'text', nullable: true })
    description!: string | null;

    @OneToMany(() => Unit, unit => unit.project)
    units?: Unit[];

    @CreateDateColumn()
    createdAt!: Date;

    @UpdateDateColumn()
    updatedAt!: Date;
}
