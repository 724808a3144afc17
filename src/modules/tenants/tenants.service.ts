import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Tenant } from './entities/tenant.entity';
import { Contract } from '../contracts/entities/contract.entity';
import { CreateTenantDto } from './dto/create-tenant.dto';
import { UpdateTenantDto } from './dto/update-tenant.dto';
import { ActivityService } from '../activity/activity.service';
import { Actor } from '../activity/actor';
import { Paginated, likePattern, pageWindow, toPage } from '../../common/utils/pagination';

@Injectable()
export class TenantsService {
    constructor(
        @InjectRepository(Tenant)
        private tenants: Repository<Tenant>,
        @InjectRepository(Contract)
        private contracts: Repository<Contract>,
        private activityService: ActivityService,
    ) { }

    async create(createTenantDto: CreateTenantDto, actor: Actor) {
        const tenant = await this.tenants.save(this.tenants.create({
            name: createTenantDto.name,
            phone: createTenantDto.phone ?? null,
            email: createTenantDto.email ?? null,
            nationalId: createTenantDto.nationalId ?? null,
            bankAccountNumber: createTenantDto.bankAccountNumber ?? null,
        }));

        await this.activityService.create({ action: `Created Tenant: ${tenant.name}`, entityType: 'tenant', entityId: tenant.id }, actor);
        return tenant;
    }

    async findAll(query: { search?: string; page?: number; perPage?: number }): Promise<Paginated<Tenant>> {
        const { page, perPage, skip, take } = pageWindow(query);
        const qb = this.tenants.createQueryBuilder('tenant')
            .orderBy('tenant.name', 'ASC')
            .skip(skip)
            .take(take);

        if (query.search) {
            qb.where(
                "(LOWER(tenant.name) LIKE :search ESCAPE '\\' OR LOWER(tenant.phone) LIKE :search ESCAPE '\\' OR LOWER(tenant.nationalId) LIKE :search ESCAPE '\\')",
                { search: likePattern(query.search) },
            );
        }

        const [items, total] = await qb.getManyAndCount();
        return toPage(items, total, page, perPage);
    }

    async findOne(id: string) {
        const tenant = await this.tenants.findOne({
            where: { id },
            relations: { contracts: { unit: true } },
        });
        if (!tenant) {
            throw new NotFoundException(`Tenant with ID ${id} not found`);
        }
        return tenant;
    }

    async update(id: string, updateTenantDto: UpdateTenantDto, actor: Actor) {
        await this.findOne(id);
        await this.tenants.update({ id }, { ...updateTenantDto });

        const updated = await this.findOne(id);
        await this.activityService.create({ action: `Updated Tenant: ${updated.name}`, entityType: 'tenant', entityId: id }, actor);
        return updated;
    }

    async remove(id: string, actor: Actor) {
        const tenant = await this.findOne(id);

        const contractCount = await this.contracts.count({ where: { tenantId: id } });
        if (contractCount > 0) {
            throw new ConflictException(`Cannot delete tenant: they have ${contractCount} contract(s)`);
        }

        await this.tenants.delete({ id });
        await this.activityService.create({ action: `Deleted Tenant: ${tenant.name}`, entityType: 'tenant', entityId: id }, actor);
        return { success: true };
    }
}
