import { BadRequestException, ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { User } from './entities/user.entity';
import { Role } from './role.enum';
import { CreateUserDto } from './dto/create-user.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { ActivityService } from '../activity/activity.service';
import { Actor } from '../activity/actor';
import { isUniqueViolation } from '../../database/unique-violation';

export const BCRYPT_ROUNDS = 10;

@Injectable()
export class UsersService {
    constructor(
        @InjectRepository(User)
        private users: Repository<User>,
        private activityService: ActivityService,
    ) { }

    async create(createUserDto: CreateUserDto, actor: Actor) {
        const hashedPassword = await bcrypt.hash(createUserDto.password, BCRYPT_ROUNDS);
        try {
            const user = await this.users.save(this.users.create({
                username: createUserDto.username,
                fullName: createUserDto.fullName,
                email: createUserDto.email ?? null,
                password: hashedPassword,
                role: createUserDto.role ?? Role.CLERK,
            }));

            await this.activityService.create({
                action: `Created User: ${user.fullName} (${user.role})`,
                entityType: 'user',
                entityId: user.id,
            }, actor);

            return this.findById(user.id);
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new ConflictException('Username already exists');
            }
            throw error;
        }
    }

    async findAll(search?: string) {
        const qb = this.users.createQueryBuilder('user').orderBy('user.createdAt', 'DESC');
        if (search) {
            qb.where('LOWER(user.fullName) LIKE :search OR LOWER(user.username) LIKE :search', {
                search: `%${search.toLowerCase()}%`,
            });
        }
        return qb.getMany();
    }

    async findOptionalById(id: string) {
        return this.users.findOne({ where: { id } });
    }

    async findById(id: string) {
        const user = await this.findOptionalById(id);
        if (!user) {
            throw new NotFoundException('User not found');
        }
        return user;
    }

    /** Includes the password hash; only for credential checks. */
    async findForLogin(username: string) {
        return this.users
            .createQueryBuilder('user')
            .addSelect('user.password')
            .where('user.username = :username', { username })
            .getOne();
    }

    async update(id: string, updateUserDto: UpdateUserDto, actor: Actor) {
        const user = await this.findById(id);

        // Admin Protection: the last active admin keeps its role and stays active
        const losesAdmin = (updateUserDto.role !== undefined && updateUserDto.role !== Role.ADMIN)
            || updateUserDto.isActive === false;
        if (user.role === Role.ADMIN && user.isActive && losesAdmin) {
            await this.assertNotLastAdmin('Cannot change the role or deactivate the last Administrator.');
        }

        const changes: Partial<User> = {};
        if (updateUserDto.fullName !== undefined) changes.fullName = updateUserDto.fullName;
        if (updateUserDto.email !== undefined) changes.email = updateUserDto.email;
        if (updateUserDto.role !== undefined) changes.role = updateUserDto.role;
        if (updateUserDto.isActive !== undefined) changes.isActive = updateUserDto.isActive;
        if (updateUserDto.password) {
            changes.password = await bcrypt.hash(updateUserDto.password, BCRYPT_ROUNDS);
        }

        await this.users.update({ id }, changes);
        const updated = await this.findById(id);

        await this.activityService.create({
            action: `Updated User: ${updated.fullName}`,
            entityType: 'user',
            entityId: id,
        }, actor);

        return updated;
    }

    async remove(id: string, actor: Actor) {
        const user = await this.findById(id);

        if (user.role === Role.ADMIN && user.isActive) {
            await this.assertNotLastAdmin('Cannot delete the last Administrator account.');
        }

        await this.users.delete({ id });
        await this.activityService.create({
            action: `Deleted User: ${user.fullName}`,
            entityType: 'user',
            entityId: id,
        }, actor);

        return { success: true };
    }

    private async assertNotLastAdmin(message: string) {
        const adminCount = await this.users.count({ where: { role: Role.ADMIN, isActive: true } });
        if (adminCount <= 1) {
            throw new BadRequestException(message);
        }
    }
}
