import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { Role } from '../role.enum';

@Entity('users')
export class User {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Column({ type: 'varchar', length: 80, unique: true })
    username!: string;

    @Column({ type: 'varchar', length: 120 })
    fullName!: string;

    @Column({ type: 'varchar', length: 120, nullable: true })
    email!: string | null;

    @Column({ type: 'varchar', length: 100, select: false })
    password!: string;

    @Column({ type: 'simple-enum', enum: Role, default: Role.CLERK })
    role!: Role;

    @Column({ type: 'boolean', default: true })
    isActive!: boolean;

    @CreateDateColumn()
    createdAt!: Date;

    @UpdateDateColumn()
    updatedAt!: Date;
}
