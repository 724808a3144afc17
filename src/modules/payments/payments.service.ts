import { BadRequestException, ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Payment } from './entities/payment.entity';
import { Commission } from './entities/commission.entity';
import { PayerType } from './payer-type.enum';
import { calculateCommission } from './commission.calculator';
import { PaymentFilter, applyPaymentFilter } from './payment-filter';
import { PaymentView, toPaymentView } from './payment.view';
import { CreatePaymentDto } from './dto/create-payment.dto';
import { UpdatePaymentDto } from './dto/update-payment.dto';
import { Contract } from '../contracts/entities/contract.entity';
import { ContractStatus } from '../contracts/contract.enums';
import { lockContract } from '../contracts/contract-lock';
import { Unit } from '../units/entities/unit.entity';
import { ActivityService } from '../activity/activity.service';
import { Actor } from '../activity/actor';
import { AppConfig } from '../../config/configuration';
import { runInTransaction } from '../../database/transaction';
import { Paginated, pageWindow, toPage } from '../../common/utils/pagination';
import { formatSar, percentToBasisPoints, toHalalas } from '../../common/utils/money.util';
import { isDateOnly, todayDateOnly } from '../../common/utils/date-only.util';

interface PayerInput {
    payerType?: PayerType;
    payerId?: string;
}

/**
 * The payment and commission ledger. Every mutation runs in one transaction that also
 * writes the commission and the audit entry.
 */
@Injectable()
export class PaymentsService {
    private readonly logger = new Logger(PaymentsService.name);

    constructor(
        @InjectRepository(Payment)
        private payments: Repository<Payment>,
        @InjectDataSource()
        private dataSource: DataSource,
        private configService: ConfigService,
        private activityService: ActivityService,
    ) { }

    async record(createPaymentDto: CreatePaymentDto, actor: Actor): Promise<PaymentView> {
        const amount = toHalalas(createPaymentDto.amount);
        if (amount <= 0) {
            throw new BadRequestException('Payment amount must be positive');
        }
        const paidOn = this.resolvePaidOn(createPaymentDto.paidOn);
        const { companyRateBp, vatRateBp } = this.resolveRates(createPaymentDto);

        const paymentId = await runInTransaction(this.dataSource, async manager => {
            const contract = await lockContract(manager, createPaymentDto.contractId);
            if (contract.status !== ContractStatus.ACTIVE) {
                throw new ConflictException(`Contract is ${contract.status}; payments can only be recorded on active contracts`);
            }
            const payer = await this.resolvePayer(manager, contract, createPaymentDto);

            const paid = await this.paidTotal(manager, contract.id);
            this.assertWithinObligation(contract, paid, amount);

            const payment = await manager.save(manager.create(Payment, {
                contractId: contract.id,
                unitId: contract.unitId,
                payerType: payer.payerType,
                payerId: payer.payerId,
                amount,
                paidOn,
                description: createPaymentDto.description ?? null,
                companyRateBp,
                vatRateBp,
                recordedBy: actor.username,
            }));
            await this.writeCommission(manager, payment);
            await this.activityService.create({
                action: `Recorded payment of ${formatSar(amount)} SAR on contract ${contract.contractNumber ?? contract.id}`,
                entityType: 'payment',
                entityId: payment.id,
            }, actor, manager);
            return payment.id;
        });

        this.logger.log(`Payment ${paymentId} recorded (${formatSar(amount)} SAR)`);
        return this.findOne(paymentId);
    }

    async update(id: string, updatePaymentDto: UpdatePaymentDto, actor: Actor): Promise<PaymentView> {
        await runInTransaction(this.dataSource, async manager => {
            const payment = await manager.findOne(Payment, { where: { id } });
            if (!payment) {
                throw new NotFoundException(`Payment with ID ${id} not found`);
            }
            const contract = await lockContract(manager, payment.contractId);

            const amount = updatePaymentDto.amount !== undefined ? toHalalas(updatePaymentDto.amount) : payment.amount;
            if (amount <= 0) {
                throw new BadRequestException('Payment amount must be positive');
            }
            const paid = await this.paidTotal(manager, contract.id, payment.id);
            this.assertWithinObligation(contract, paid, amount);

            const payer = updatePaymentDto.payerType !== undefined || updatePaymentDto.payerId !== undefined
                ? await this.resolvePayer(manager, contract, {
                    payerType: updatePaymentDto.payerType ?? payment.payerType,
                    payerId: updatePaymentDto.payerId,
                })
                : { payerType: payment.payerType, payerId: payment.payerId };

            payment.amount = amount;
            payment.payerType = payer.payerType;
            payment.payerId = payer.payerId;
            if (updatePaymentDto.paidOn !== undefined) {
                payment.paidOn = this.resolvePaidOn(updatePaymentDto.paidOn);
            }
            if (updatePaymentDto.description !== undefined) {
                payment.description = updatePaymentDto.description;
            }
            if (updatePaymentDto.companyRate !== undefined) {
                payment.companyRateBp = percentToBasisPoints(updatePaymentDto.companyRate);
            }
            if (updatePaymentDto.vatRate !== undefined) {
                payment.vatRateBp = percentToBasisPoints(updatePaymentDto.vatRate);
            }

            await manager.save(payment);
            await this.writeCommission(manager, payment);
            await this.activityService.create({
                action: `Updated payment ${id} (${formatSar(amount)} SAR)`,
                entityType: 'payment',
                entityId: id,
            }, actor, manager);
        });

        return this.findOne(id);
    }

    async remove(id: string, actor: Actor) {
        await runInTransaction(this.dataSource, async manager => {
            const payment = await manager.findOne(Payment, { where: { id } });
            if (!payment) {
                throw new NotFoundException(`Payment with ID ${id} not found`);
            }

            await manager.delete(Commission, { paymentId: id });
            await manager.delete(Payment, { id });
            await this.activityService.create({
                action: `Deleted payment of ${formatSar(payment.amount)} SAR`,
                entityType: 'payment',
                entityId: id,
            }, actor, manager);
        });

        this.logger.log(`Payment ${id} deleted`);
        return { success: true };
    }

    /**
     * Re-derives the commission from the stored payment. Safe to run any number of times.
     */
    async recomputeCommission(paymentId: string, manager?: EntityManager): Promise<Commission> {
        const run = async (tx: EntityManager) => {
            const payment = await tx.findOne(Payment, { where: { id: paymentId } });
            if (!payment) {
                throw new NotFoundException(`Payment with ID ${paymentId} not found`);
            }
            return this.writeCommission(tx, payment);
        };
        return manager ? run(manager) : runInTransaction(this.dataSource, run);
    }

    async findAll(query: PaymentFilter & { page?: number; perPage?: number }): Promise<Paginated<PaymentView>> {
        const { page, perPage, skip, take } = pageWindow(query);
        const qb = this.payments.createQueryBuilder('payment')
            .leftJoinAndSelect('payment.commission', 'commission')
            .leftJoinAndSelect('payment.contract', 'contract')
            .leftJoinAndSelect('payment.unit', 'unit')
            .leftJoinAndSelect('unit.project', 'project')
            .orderBy('payment.paidOn', 'DESC')
            .addOrderBy('payment.createdAt', 'DESC')
            .skip(skip)
            .take(take);
        applyPaymentFilter(qb, query);

        const [items, total] = await qb.getManyAndCount();
        return toPage(items.map(toPaymentView), total, page, perPage);
    }

    async findOne(id: string): Promise<PaymentView> {
        const payment = await this.payments.findOne({
            where: { id },
            relations: { commission: true, contract: true, unit: { project: true } },
        });
        if (!payment) {
            throw new NotFoundException(`Payment with ID ${id} not found`);
        }
        return toPaymentView(payment);
    }

    async recent(limit = 10): Promise<PaymentView[]> {
        const items = await this.payments.find({
            relations: { commission: true, contract: true, unit: { project: true } },
            order: { paidOn: 'DESC', createdAt: 'DESC' },
            take: limit,
        });
        return items.map(toPaymentView);
    }

    private async writeCommission(manager: EntityManager, payment: Payment): Promise<Commission> {
        const breakdown = calculateCommission(payment.amount, payment.companyRateBp, payment.vatRateBp);
        const existing = await manager.findOne(Commission, { where: { paymentId: payment.id } });
        const commission = existing ?? manager.create(Commission, { paymentId: payment.id });

        commission.companyCommission = breakdown.companyCommission;
        commission.vatOnCommission = breakdown.vatOnCommission;
        commission.netToOwner = breakdown.netToOwner;
        commission.companyRateBp = payment.companyRateBp;
        commission.vatRateBp = payment.vatRateBp;
        return manager.save(commission);
    }

    private async paidTotal(manager: EntityManager, contractId: string, excludePaymentId?: string): Promise<number> {
        const qb = manager.getRepository(Payment).createQueryBuilder('payment')
            .select('COALESCE(SUM(payment.amount), 0)', 'total')
            .where('payment.contractId = :contractId', { contractId });
        if (excludePaymentId) {
            qb.andWhere('payment.id <> :excludePaymentId', { excludePaymentId });
        }
        const row = await qb.getRawOne<{ total: string | number }>();
        return Number(row?.total ?? 0);
    }

    private assertWithinObligation(contract: Contract, alreadyPaid: number, amount: number) {
        const outstanding = contract.totalAmount - alreadyPaid;
        if (amount > outstanding) {
            throw new ConflictException(
                `Payment of ${formatSar(amount)} SAR exceeds the outstanding balance of ${formatSar(Math.max(0, outstanding))} SAR`,
            );
        }
    }

    private async resolvePayer(manager: EntityManager, contract: Contract, input: PayerInput) {
        const payerType = input.payerType ?? PayerType.TENANT;

        if (payerType === PayerType.TENANT) {
            if (input.payerId && input.payerId !== contract.tenantId) {
                throw new BadRequestException('Payer is not the tenant of this contract');
            }
            return { payerType, payerId: contract.tenantId };
        }

        const unit = await manager.findOne(Unit, { where: { id: contract.unitId } });
        if (!unit?.ownerId) {
            throw new BadRequestException('The unit of this contract has no owner');
        }
        if (input.payerId && input.payerId !== unit.ownerId) {
            throw new BadRequestException('Payer is not the owner of this unit');
        }
        return { payerType, payerId: unit.ownerId };
    }

    private resolvePaidOn(value: string | undefined): string {
        if (value === undefined) return todayDateOnly();
        if (!isDateOnly(value)) {
            throw new BadRequestException('paidOn is not a valid date');
        }
        return value;
    }

    private resolveRates(input: { companyRate?: number; vatRate?: number }) {
        const defaults = this.configService.get<AppConfig['ledger']>('ledger');
        return {
            companyRateBp: input.companyRate !== undefined
                ? percentToBasisPoints(input.companyRate)
                : defaults?.defaultCompanyRateBp ?? 500,
            vatRateBp: input.vatRate !== undefined
                ? percentToBasisPoints(input.vatRate)
                : defaults?.defaultVatRateBp ?? 1500,
        };
    }
}
