import { Column, CreateDateColumn, Entity, Index, OneToMany, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { Unit } from '../../units/entities/unit.entity';

@Entity('owners')
export class Owner {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Index()
    @Column({ type: 'varchar', length: 120 })
    name!: string;

    @Column({ type: 'varchar', length: 50, nullable: true })
    nationalId!: string | null;

    @Column({ type: 'varchar', length: 50, nullable: true })
    phone!: string | null;

    @Column({ type: 'varchar', length: 120, nullable: true })
    email!: string | null;

    @Column({ type: 'varchar', length: 255, nullable: true })
    address!: string | null;

    // Bank (SAB) account the owner's net amounts are paid to
    @Column({ type: 'varchar', length: 50, nullable: true })
    bankAccountNumber!: string | null;

    @OneToMany(() => Unit, unit => unit.owner)
    units?: Unit[];

    @CreateDateColumn()
    createdAt!: Date;

    @UpdateDateColumn()
    updatedAt!: Date;
}
