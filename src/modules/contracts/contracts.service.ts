import { BadRequestException, ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, LessThan, Repository } from 'typeorm';
import { Contract } from './entities/contract.entity';
import { ContractStatus, PaymentFrequency } from './contract.enums';
import { ContractView, toContractView } from './contract.view';
import { resolveContractDates } from './contract-dates';
import { lockContract } from './contract-lock';
import { CreateContractDto } from './dto/create-contract.dto';
import { UpdateContractDto } from './dto/update-contract.dto';
import { ContractQueryDto } from './dto/contract-query.dto';
import { Unit } from '../units/entities/unit.entity';
import { UnitStatus } from '../units/unit-status.enum';
import { Tenant } from '../tenants/entities/tenant.entity';
import { Payment } from '../payments/entities/payment.entity';
import { StorageService } from '../storage/storage.service';
import { documentKey, isInlineViewable } from '../storage/document-name';
import { ActivityService } from '../activity/activity.service';
import { Actor, SYSTEM_ACTOR } from '../activity/actor';
import { Paginated, likePattern, pageWindow, toPage } from '../../common/utils/pagination';
import { toHalalas } from '../../common/utils/money.util';
import { todayDateOnly } from '../../common/utils/date-only.util';
import { runInTransaction } from '../../database/transaction';

export interface ContractDocument {
    content: Buffer;
    name: string;
    mimeType: string;
    inline: boolean;
}

export interface UploadedDocument {
    originalname: string;
    mimetype: string;
    size: number;
    buffer: Buffer;
}

@Injectable()
export class ContractsService {
    private readonly logger = new Logger(ContractsService.name);

    constructor(
        @InjectRepository(Contract)
        private contracts: Repository<Contract>,
        @InjectRepository(Unit)
        private units: Repository<Unit>,
        @InjectRepository(Tenant)
        private tenants: Repository<Tenant>,
        @InjectRepository(Payment)
        private payments: Repository<Payment>,
        @InjectDataSource()
        private dataSource: DataSource,
        private storageService: StorageService,
        private activityService: ActivityService,
    ) { }

    async create(createContractDto: CreateContractDto, actor: Actor): Promise<ContractView> {
        const { startDate, endDate } = resolveContractDates(createContractDto);

        const unit = await this.units.findOne({ where: { id: createContractDto.unitId } });
        if (!unit) {
            throw new NotFoundException(`Unit with ID ${createContractDto.unitId} not found`);
        }
        if (unit.status === UnitStatus.SOLD) {
            throw new ConflictException(`Unit ${unit.unitNumber} is sold and cannot be leased`);
        }
        const tenant = await this.tenants.findOne({ where: { id: createContractDto.tenantId } });
        if (!tenant) {
            throw new NotFoundException(`Tenant with ID ${createContractDto.tenantId} not found`);
        }
        if (createContractDto.contractNumber) {
            await this.assertNumberAvailable(createContractDto.contractNumber);
        }

        const saved = await runInTransaction(this.dataSource, async manager => {
            const active = await manager.count(Contract, { where: { unitId: unit.id, status: ContractStatus.ACTIVE } });
            if (active > 0) {
                throw new ConflictException(`Unit ${unit.unitNumber} already has an active contract`);
            }

            const contract = await manager.save(manager.create(Contract, {
                contractNumber: createContractDto.contractNumber ?? null,
                unitId: unit.id,
                tenantId: tenant.id,
                startDate,
                endDate,
                totalAmount: toHalalas(createContractDto.totalAmount),
                paymentFrequency: createContractDto.paymentFrequency ?? PaymentFrequency.MONTHLY,
                status: ContractStatus.ACTIVE,
                notes: createContractDto.notes ?? null,
            }));
            await manager.update(Unit, { id: unit.id }, { status: UnitStatus.RENTED });
            await this.activityService.create({
                action: `Created Contract for unit ${unit.unitNumber} (tenant ${tenant.name})`,
                entityType: 'contract',
                entityId: contract.id,
            }, actor, manager);
            return contract;
        });

        this.logger.log(`Contract ${saved.id} created for unit ${unit.unitNumber}`);
        return this.findOne(saved.id);
    }

    async findAll(query: ContractQueryDto): Promise<Paginated<ContractView>> {
        const { page, perPage, skip, take } = pageWindow(query);
        const qb = this.contracts.createQueryBuilder('contract')
            .leftJoinAndSelect('contract.unit', 'unit')
            .leftJoinAndSelect('unit.project', 'project')
            .leftJoinAndSelect('contract.tenant', 'tenant')
            .orderBy('contract.startDate', 'DESC')
            .skip(skip)
            .take(take);

        if (query.status) {
            qb.andWhere('contract.status = :status', { status: query.status });
        }
        if (query.unitId) {
            qb.andWhere('contract.unitId = :unitId', { unitId: query.unitId });
        }
        if (query.tenantId) {
            qb.andWhere('contract.tenantId = :tenantId', { tenantId: query.tenantId });
        }
        if (query.search) {
            qb.andWhere(
                "(LOWER(contract.contractNumber) LIKE :search ESCAPE '\\' OR LOWER(tenant.name) LIKE :search ESCAPE '\\' OR LOWER(unit.unitNumber) LIKE :search ESCAPE '\\')",
                { search: likePattern(query.search) },
            );
        }

        const [items, total] = await qb.getManyAndCount();
        return toPage(items.map(toContractView), total, page, perPage);
    }

    async findEntity(id: string): Promise<Contract> {
        const contract = await this.contracts.findOne({
            where: { id },
            relations: { unit: { project: true }, tenant: true },
        });
        if (!contract) {
            throw new NotFoundException(`Contract with ID ${id} not found`);
        }
        return contract;
    }

    async findOne(id: string): Promise<ContractView> {
        return toContractView(await this.findEntity(id));
    }

    async update(id: string, updateContractDto: UpdateContractDto, actor: Actor): Promise<ContractView> {
        const current = await this.findEntity(id);
        if (updateContractDto.contractNumber && updateContractDto.contractNumber !== current.contractNumber) {
            await this.assertNumberAvailable(updateContractDto.contractNumber);
        }

        // Same lock as payment recording, so the paid total cannot move under the check
        await runInTransaction(this.dataSource, async manager => {
            const contract = await lockContract(manager, id);
            const { startDate, endDate } = resolveContractDates(updateContractDto, contract);

            let totalAmount = contract.totalAmount;
            if (updateContractDto.totalAmount !== undefined) {
                totalAmount = toHalalas(updateContractDto.totalAmount);
                const paid = await this.paidTotal(manager, id);
                if (totalAmount < paid) {
                    throw new ConflictException('Total amount cannot be less than the payments already recorded');
                }
            }

            await manager.update(Contract, { id }, {
                startDate,
                endDate,
                totalAmount,
                ...(updateContractDto.contractNumber !== undefined && { contractNumber: updateContractDto.contractNumber }),
                ...(updateContractDto.paymentFrequency !== undefined && { paymentFrequency: updateContractDto.paymentFrequency }),
                ...(updateContractDto.notes !== undefined && { notes: updateContractDto.notes }),
            });
            await this.activityService.create({
                action: `Updated Contract ${contract.contractNumber ?? id}`,
                entityType: 'contract',
                entityId: id,
            }, actor, manager);
        });

        return this.findOne(id);
    }

    end(id: string, actor: Actor) {
        return this.close(id, ContractStatus.ENDED, actor);
    }

    terminate(id: string, actor: Actor) {
        return this.close(id, ContractStatus.TERMINATED, actor);
    }

    /**
     * Ends every active contract whose end date is before `today`; returns how many changed.
     */
    async expireEnded(today: string = todayDateOnly(), actor: Actor = SYSTEM_ACTOR): Promise<number> {
        const expired = await this.contracts.find({
            where: { status: ContractStatus.ACTIVE, endDate: LessThan(today) },
        });

        let closed = 0;
        for (const contract of expired) {
            const changed = await runInTransaction(this.dataSource, async manager => {
                if (!await this.closeWithin(manager, contract, ContractStatus.ENDED)) {
                    return false;
                }
                await this.activityService.create({
                    action: `Contract ${contract.contractNumber ?? contract.id} expired on ${contract.endDate}`,
                    entityType: 'contract',
                    entityId: contract.id,
                }, actor, manager);
                return true;
            });
            if (changed) closed++;
        }
        return closed;
    }

    async remove(id: string, actor: Actor) {
        const contract = await this.findEntity(id);

        const paymentCount = await this.payments.count({ where: { contractId: id } });
        if (paymentCount > 0) {
            throw new ConflictException(`Cannot delete contract: it has ${paymentCount} payment(s); terminate it instead`);
        }

        await runInTransaction(this.dataSource, async manager => {
            if (contract.status === ContractStatus.ACTIVE) {
                await this.releaseUnit(manager, contract.unitId);
            }
            await manager.delete(Contract, { id });
            await this.activityService.create({
                action: `Deleted Contract ${contract.contractNumber ?? id}`,
                entityType: 'contract',
                entityId: id,
            }, actor, manager);
        });

        if (contract.documentKey) {
            await this.storageService.delete(contract.documentKey);
        }
        return { success: true };
    }

    async attachDocument(id: string, file: UploadedDocument | undefined, actor: Actor): Promise<ContractView> {
        if (!file || file.size === 0) {
            throw new BadRequestException('No document uploaded');
        }
        const contract = await this.findEntity(id);

        const key = documentKey(file.originalname);
        await this.storageService.put(key, file.buffer, file.mimetype);
        await this.contracts.update({ id }, {
            documentKey: key,
            documentName: file.originalname,
            documentMimeType: file.mimetype,
            documentSize: file.size,
        });

        if (contract.documentKey && contract.documentKey !== key) {
            await this.storageService.delete(contract.documentKey);
        }

        await this.activityService.create({ action: `Uploaded document ${file.originalname}`, entityType: 'contract', entityId: id }, actor);
        return this.findOne(id);
    }

    async readDocument(id: string): Promise<ContractDocument> {
        const contract = await this.findEntity(id);
        if (!contract.documentKey || !contract.documentName) {
            throw new NotFoundException('Contract has no document');
        }

        return {
            content: await this.storageService.get(contract.documentKey),
            name: contract.documentName,
            mimeType: contract.documentMimeType ?? 'application/octet-stream',
            inline: isInlineViewable(contract.documentName),
        };
    }

    async removeDocument(id: string, actor: Actor): Promise<ContractView> {
        const contract = await this.findEntity(id);
        if (!contract.documentKey) {
            throw new NotFoundException('Contract has no document');
        }

        await this.storageService.delete(contract.documentKey);
        await this.contracts.update({ id }, {
            documentKey: null,
            documentName: null,
            documentMimeType: null,
            documentSize: null,
        });

        await this.activityService.create({ action: `Removed document ${contract.documentName ?? ''}`, entityType: 'contract', entityId: id }, actor);
        return this.findOne(id);
    }

    private async close(id: string, status: ContractStatus.ENDED | ContractStatus.TERMINATED, actor: Actor) {
        await runInTransaction(this.dataSource, async manager => {
            const contract = await lockContract(manager, id);
            if (!await this.closeWithin(manager, contract, status)) {
                throw new ConflictException(`Contract is already ${contract.status}`);
            }
            await this.activityService.create({
                action: `Contract ${contract.contractNumber ?? id} ${status}`,
                entityType: 'contract',
                entityId: id,
            }, actor, manager);
        });
        return this.findOne(id);
    }

    /**
     * Moves an active contract to `status` and frees its unit. Returns false, changing
     * nothing, when the contract was no longer active.
     */
    private async closeWithin(manager: EntityManager, contract: Contract, status: ContractStatus): Promise<boolean> {
        const result = await manager.createQueryBuilder()
            .update(Contract)
            .set({ status })
            .where('id = :id', { id: contract.id })
            .andWhere('status = :active', { active: ContractStatus.ACTIVE })
            .execute();
        if ((result.affected ?? 0) === 0) {
            return false;
        }
        await this.releaseUnit(manager, contract.unitId);
        return true;
    }

    // A sold unit stays sold
    private async releaseUnit(manager: EntityManager, unitId: string) {
        await manager.createQueryBuilder()
            .update(Unit)
            .set({ status: UnitStatus.AVAILABLE })
            .where('id = :unitId', { unitId })
            .andWhere('status <> :sold', { sold: UnitStatus.SOLD })
            .execute();
    }

    private async paidTotal(manager: EntityManager, contractId: string): Promise<number> {
        const row = await manager.getRepository(Payment).createQueryBuilder('payment')
            .select('COALESCE(SUM(payment.amount), 0)', 'total')
            .where('payment.contractId = :contractId', { contractId })
            .getRawOne<{ total: string | number }>();
        return Number(row?.total ?? 0);
    }

    private async assertNumberAvailable(contractNumber: string) {
        const existing = await this.contracts.findOne({ where: { contractNumber } });
        if (existing) {
            throw new ConflictException(`Contract number ${contractNumber} already exists`);
        }
    }
}
