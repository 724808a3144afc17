import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Unit } from './entities/unit.entity';
import { Project } from '../projects/entities/project.entity';
import { Owner } from '../owners/entities/owner.entity';
import { Contract } from '../contracts/entities/contract.entity';
import { ContractStatus } from '../contracts/contract.enums';
import { UnitStatus } from './unit-status.enum';
import { CreateUnitDto } from './dto/create-unit.dto';
import { UpdateUnitDto } from './dto/update-unit.dto';
import { UnitQueryDto } from './dto/unit-query.dto';
import { ActivityService } from '../activity/activity.service';
import { Actor } from '../activity/actor';
import { Paginated, likePattern, pageWindow, toPage } from '../../common/utils/pagination';
import { hijriString } from '../../common/utils/hijri.util';
import { fromHalalas } from '../../common/utils/money.util';

export interface UnitDetails {
    id: string;
    unitNumber: string;
    type: string | null;
    area: number | null;
    status: UnitStatus;
    projectId: string;
    projectName: string | null;
    owner: { id: string; name: string } | null;
    isRented: boolean;
    activeContract: {
        id: string;
        contractNumber: string | null;
        tenant: { id: string; name: string; phone: string | null } | null;
        startDate: string;
        endDate: string;
        startDateHijri: string | null;
        endDateHijri: string | null;
        totalAmount: number;
    } | null;
}

@Injectable()
export class UnitsService {
    private readonly logger = new Logger(UnitsService.name);

    constructor(
        @InjectRepository(Unit)
        private units: Repository<Unit>,
        @InjectRepository(Project)
        private projects: Repository<Project>,
        @InjectRepository(Owner)
        private owners: Repository<Owner>,
        @InjectRepository(Contract)
        private contracts: Repository<Contract>,
        private activityService: ActivityService,
    ) { }

    async create(createUnitDto: CreateUnitDto, actor: Actor) {
        const project = await this.requireProject(createUnitDto.projectId);
        if (createUnitDto.ownerId) {
            await this.requireOwner(createUnitDto.ownerId);
        }
        await this.assertNumberAvailable(createUnitDto.projectId, createUnitDto.unitNumber);

        const unit = await this.units.save(this.units.create({
            projectId: createUnitDto.projectId,
            unitNumber: createUnitDto.unitNumber,
            type: createUnitDto.type ?? null,
            area: createUnitDto.area ?? null,
            ownerId: createUnitDto.ownerId ?? null,
            status: createUnitDto.status ?? UnitStatus.AVAILABLE,
        }));

        await this.activityService.create({
            action: `Created Unit: ${unit.unitNumber} in ${project.name}`,
            entityType: 'unit',
            entityId: unit.id,
        }, actor);
        return unit;
    }

    async findAll(query: UnitQueryDto): Promise<Paginated<Unit>> {
        const { page, perPage, skip, take } = pageWindow(query);
        const qb = this.units.createQueryBuilder('unit')
            .leftJoinAndSelect('unit.project', 'project')
            .leftJoinAndSelect('unit.owner', 'owner')
            .orderBy('project.name', 'ASC')
            .addOrderBy('unit.unitNumber', 'ASC')
            .skip(skip)
            .take(take);

        if (query.status) {
            qb.andWhere('unit.status = :status', { status: query.status });
        }
        if (query.projectId) {
            qb.andWhere('unit.projectId = :projectId', { projectId: query.projectId });
        }
        if (query.ownerId) {
            qb.andWhere('unit.ownerId = :ownerId', { ownerId: query.ownerId });
        }
        if (query.search) {
            qb.andWhere(
                "(LOWER(unit.unitNumber) LIKE :search ESCAPE '\\' OR LOWER(unit.type) LIKE :search ESCAPE '\\' OR LOWER(project.name) LIKE :search ESCAPE '\\' OR LOWER(owner.name) LIKE :search ESCAPE '\\')",
                { search: likePattern(query.search) },
            );
        }

        const [items, total] = await qb.getManyAndCount();
        return toPage(items, total, page, perPage);
    }

    async findOne(id: string) {
        const unit = await this.units.findOne({
            where: { id },
            relations: { project: true, owner: true },
        });
        if (!unit) {
            throw new NotFoundException(`Unit with ID ${id} not found`);
        }
        return unit;
    }

    async details(id: string): Promise<UnitDetails> {
        const unit = await this.findOne(id);
        const contract = await this.contracts.findOne({
            where: { unitId: id, status: ContractStatus.ACTIVE },
            relations: { tenant: true },
        });

        return {
            id: unit.id,
            unitNumber: unit.unitNumber,
            type: unit.type,
            area: unit.area,
            status: unit.status,
            projectId: unit.projectId,
            projectName: unit.project?.name ?? null,
            owner: unit.owner ? { id: unit.owner.id, name: unit.owner.name } : null,
            isRented: contract !== null,
            activeContract: contract ? {
                id: contract.id,
                contractNumber: contract.contractNumber,
                tenant: contract.tenant
                    ? { id: contract.tenant.id, name: contract.tenant.name, phone: contract.tenant.phone }
                    : null,
                startDate: contract.startDate,
                endDate: contract.endDate,
                startDateHijri: hijriString(contract.startDate),
                endDateHijri: hijriString(contract.endDate),
                totalAmount: fromHalalas(contract.totalAmount),
            } : null,
        };
    }

    async update(id: string, updateUnitDto: UpdateUnitDto, actor: Actor) {
        const unit = await this.findOne(id);

        const projectId = updateUnitDto.projectId ?? unit.projectId;
        const unitNumber = updateUnitDto.unitNumber ?? unit.unitNumber;
        if (updateUnitDto.projectId !== undefined) {
            await this.requireProject(updateUnitDto.projectId);
        }
        if (updateUnitDto.ownerId) {
            await this.requireOwner(updateUnitDto.ownerId);
        }
        if (projectId !== unit.projectId || unitNumber !== unit.unitNumber) {
            await this.assertNumberAvailable(projectId, unitNumber);
        }
        if (updateUnitDto.status !== undefined && updateUnitDto.status !== UnitStatus.RENTED) {
            const active = await this.contracts.count({ where: { unitId: id, status: ContractStatus.ACTIVE } });
            if (active > 0) {
                throw new ConflictException('Unit has an active contract; end or terminate it first');
            }
        }

        await this.units.update({ id }, {
            projectId,
            unitNumber,
            ...(updateUnitDto.type !== undefined && { type: updateUnitDto.type }),
            ...(updateUnitDto.area !== undefined && { area: updateUnitDto.area }),
            ...(updateUnitDto.ownerId !== undefined && { ownerId: updateUnitDto.ownerId }),
            ...(updateUnitDto.status !== undefined && { status: updateUnitDto.status }),
        });

        const updated = await this.findOne(id);
        await this.activityService.create({ action: `Updated Unit: ${updated.unitNumber}`, entityType: 'unit', entityId: id }, actor);
        return updated;
    }

    async remove(id: string, actor: Actor) {
        const unit = await this.findOne(id);

        const contractCount = await this.contracts.count({ where: { unitId: id } });
        if (contractCount > 0) {
            throw new ConflictException(`Cannot delete unit: it has ${contractCount} contract(s)`);
        }

        await this.units.delete({ id });
        this.logger.log(`Deleted unit ${unit.unitNumber} (${id})`);
        await this.activityService.create({ action: `Deleted Unit: ${unit.unitNumber}`, entityType: 'unit', entityId: id }, actor);
        return { success: true };
    }

    private async requireProject(id: string) {
        const project = await this.projects.findOne({ where: { id } });
        if (!project) {
            throw new NotFoundException(`Project with ID ${id} not found`);
        }
        return project;
    }

    private async requireOwner(id: string) {
        const owner = await this.owners.findOne({ where: { id } });
        if (!owner) {
            throw new NotFoundException(`Owner with ID ${id} not found`);
        }
        return owner;
    }

    private async assertNumberAvailable(projectId: string, unitNumber: string) {
        const existing = await this.units.findOne({ where: { projectId, unitNumber } });
        if (existing) {
            throw new ConflictException(`Unit ${unitNumber} already exists in this project`);
        }
    }
}
