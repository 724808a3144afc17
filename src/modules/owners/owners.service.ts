import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Owner } from './entities/owner.entity';
import { Unit } from '../units/entities/unit.entity';
import { CreateOwnerDto } from './dto/create-owner.dto';
import { UpdateOwnerDto } from './dto/update-owner.dto';
import { ActivityService } from '../activity/activity.service';
import { Actor } from '../activity/actor';
import { Paginated, likePattern, pageWindow, toPage } from '../../common/utils/pagination';

@Injectable()
export class OwnersService {
    constructor(
        @InjectRepository(Owner)
        private owners: Repository<Owner>,
        @InjectRepository(Unit)
        private units: Repository<Unit>,
        private activityService: ActivityService,
    ) { }

    async create(createOwnerDto: CreateOwnerDto, actor: Actor) {
        const owner = await this.owners.save(this.owners.create({
            name: createOwnerDto.name,
            nationalId: createOwnerDto.nationalId ?? null,
            phone: createOwnerDto.phone ?? null,
            email: createOwnerDto.email ?? null,
            address: createOwnerDto.address ?? null,
            bankAccountNumber: createOwnerDto.bankAccountNumber ?? null,
        }));

        await this.activityService.create({ action: `Created Owner: ${owner.name}`, entityType: 'owner', entityId: owner.id }, actor);
        return owner;
    }

    async findAll(query: { search?: string; page?: number; perPage?: number }): Promise<Paginated<Owner>> {
        const { page, perPage, skip, take } = pageWindow(query);
        const qb = this.owners.createQueryBuilder('owner')
            .loadRelationCountAndMap('owner.unitCount', 'owner.units')
            .orderBy('owner.name', 'ASC')
            .skip(skip)
            .take(take);

        if (query.search) {
            qb.where(
                "(LOWER(owner.name) LIKE :search ESCAPE '\\' OR LOWER(owner.nationalId) LIKE :search ESCAPE '\\' OR LOWER(owner.phone) LIKE :search ESCAPE '\\')",
                { search: likePattern(query.search) },
            );
        }

        const [items, total] = await qb.getManyAndCount();
        return toPage(items, total, page, perPage);
    }

    async findOne(id: string) {
        const owner = await this.owners.findOne({
            where: { id },
            relations: { units: { project: true } },
        });
        if (!owner) {
            throw new NotFoundException(`Owner with ID ${id} not found`);
        }
        return owner;
    }

    async update(id: string, updateOwnerDto: UpdateOwnerDto, actor: Actor) {
        await this.findOne(id);
        await this.owners.update({ id }, { ...updateOwnerDto });

        const updated = await this.findOne(id);
        await this.activityService.create({ action: `Updated Owner: ${updated.name}`, entityType: 'owner', entityId: id }, actor);
        return updated;
    }

    async remove(id: string, actor: Actor) {
        const owner = await this.findOne(id);

        const unitCount = await this.units.count({ where: { ownerId: id } });
        if (unitCount > 0) {
            throw new ConflictException(`Cannot delete owner: ${unitCount} unit(s) are assigned to them`);
        }

        await this.owners.delete({ id });
        await this.activityService.create({ action: `Deleted Owner: ${owner.name}`, entityType: 'owner', entityId: id }, actor);
        return { success: true };
    }
}
