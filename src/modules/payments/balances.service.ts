import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, SelectQueryBuilder } from 'typeorm';
import { Payment } from './entities/payment.entity';
import { Installment, buildSchedule } from './schedule';
import { Contract } from '../contracts/entities/contract.entity';
import { Unit } from '../units/entities/unit.entity';
import { Owner } from '../owners/entities/owner.entity';
import { fromHalalas } from '../../common/utils/money.util';
import { todayDateOnly } from '../../common/utils/date-only.util';

/** Sums in halalas. */
export interface LedgerTotals {
    paymentCount: number;
    paid: number;
    companyCommission: number;
    vatOnCommission: number;
    netToOwner: number;
}

export interface Balance {
    obligation: number;
    paid: number;
    outstanding: number;
    companyCommission: number;
    vatOnCommission: number;
    netToOwner: number;
    paymentCount: number;
}

export interface ContractSchedule {
    contractId: string;
    asOf: string;
    installments: Installment[];
}

interface TotalsRow {
    paymentCount: string | number | null;
    paid: string | number | null;
    companyCommission: string | number | null;
    vatOnCommission: string | number | null;
    netToOwner: string | number | null;
}

// Money in SAR for the HTTP responses
export function balanceInSar(balance: Balance): Balance {
    return {
        ...balance,
        obligation: fromHalalas(balance.obligation),
        paid: fromHalalas(balance.paid),
        outstanding: fromHalalas(balance.outstanding),
        companyCommission: fromHalalas(balance.companyCommission),
        vatOnCommission: fromHalalas(balance.vatOnCommission),
        netToOwner: fromHalalas(balance.netToOwner),
    };
}

@Injectable()
export class BalancesService {
    constructor(
        @InjectRepository(Payment)
        private payments: Repository<Payment>,
        @InjectRepository(Contract)
        private contracts: Repository<Contract>,
        @InjectRepository(Unit)
        private units: Repository<Unit>,
        @InjectRepository(Owner)
        private owners: Repository<Owner>,
    ) { }

    async forContract(contractId: string): Promise<Balance> {
        const contract = await this.contracts.findOne({ where: { id: contractId } });
        if (!contract) {
            throw new NotFoundException(`Contract with ID ${contractId} not found`);
        }
        const totals = await this.totals(qb => qb.where('payment.contractId = :contractId', { contractId }));
        return toBalance(contract.totalAmount, totals);
    }

    async forUnit(unitId: string): Promise<Balance> {
        const unit = await this.units.findOne({ where: { id: unitId } });
        if (!unit) {
            throw new NotFoundException(`Unit with ID ${unitId} not found`);
        }
        const obligation = await this.obligation(qb => qb.where('contract.unitId = :unitId', { unitId }));
        const totals = await this.totals(qb => qb.where('payment.unitId = :unitId', { unitId }));
        return toBalance(obligation, totals);
    }

    async forOwner(ownerId: string): Promise<Balance> {
        const owner = await this.owners.findOne({ where: { id: ownerId } });
        if (!owner) {
            throw new NotFoundException(`Owner with ID ${ownerId} not found`);
        }
        const obligation = await this.obligation(qb => qb
            .innerJoin('contract.unit', 'unit')
            .where('unit.ownerId = :ownerId', { ownerId }));
        const totals = await this.totals(qb => qb
            .innerJoin('payment.unit', 'unit')
            .where('unit.ownerId = :ownerId', { ownerId }));
        return toBalance(obligation, totals);
    }

    async schedule(contractId: string, asOf: string = todayDateOnly()): Promise<ContractSchedule> {
        const contract = await this.contracts.findOne({ where: { id: contractId } });
        if (!contract) {
            throw new NotFoundException(`Contract with ID ${contractId} not found`);
        }
        const totals = await this.totals(qb => qb.where('payment.contractId = :contractId', { contractId }));
        return {
            contractId,
            asOf,
            installments: buildSchedule(contract, totals.paid, asOf),
        };
    }

    async totals(scope: (qb: SelectQueryBuilder<Payment>) => SelectQueryBuilder<Payment> = qb => qb): Promise<LedgerTotals> {
        const qb = scope(this.payments.createQueryBuilder('payment').leftJoin('payment.commission', 'commission'))
            .select('COUNT(payment.id)', 'paymentCount')
            .addSelect('COALESCE(SUM(payment.amount), 0)', 'paid')
            .addSelect('COALESCE(SUM(commission.companyCommission), 0)', 'companyCommission')
            .addSelect('COALESCE(SUM(commission.vatOnCommission), 0)', 'vatOnCommission')
            .addSelect('COALESCE(SUM(commission.netToOwner), 0)', 'netToOwner');

        const row = await qb.getRawOne<TotalsRow>();
        return {
            paymentCount: Number(row?.paymentCount ?? 0),
            paid: Number(row?.paid ?? 0),
            companyCommission: Number(row?.companyCommission ?? 0),
            vatOnCommission: Number(row?.vatOnCommission ?? 0),
            netToOwner: Number(row?.netToOwner ?? 0),
        };
    }

    private async obligation(scope: (qb: SelectQueryBuilder<Contract>) => SelectQueryBuilder<Contract>): Promise<number> {
        const row = await scope(this.contracts.createQueryBuilder('contract'))
            .select('COALESCE(SUM(contract.totalAmount), 0)', 'total')
            .getRawOne<{ total: string | number | null }>();
        return Number(row?.total ?? 0);
    }
}

function toBalance(obligation: number, totals: LedgerTotals): Balance {
    return {
        obligation,
        paid: totals.paid,
        outstanding: obligation - totals.paid,
        companyCommission: totals.companyCommission,
        vatOnCommission: totals.vatOnCommission,
        netToOwner: totals.netToOwner,
        paymentCount: totals.paymentCount,
    };
}

export function scheduleInSar(schedule: ContractSchedule): ContractSchedule {
    return {
        ...schedule,
        installments: schedule.installments.map(installment => ({
            ...installment,
            amount: fromHalalas(installment.amount),
            paid: fromHalalas(installment.paid),
            outstanding: fromHalalas(installment.outstanding),
        })),
    };
}
