import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Owner } from '../owners/entities/owner.entity';
import { Tenant } from '../tenants/entities/tenant.entity';
import { Project } from '../projects/entities/project.entity';
import { Unit } from '../units/entities/unit.entity';
import { UnitStatus } from '../units/unit-status.enum';
import { Contract } from '../contracts/entities/contract.entity';
import { ContractStatus } from '../contracts/contract.enums';
import { BalancesService } from '../payments/balances.service';
import { PaymentsService } from '../payments/payments.service';
import { PaymentView } from '../payments/payment.view';
import { ActivityService } from '../activity/activity.service';
import { AuditLog } from '../activity/entities/audit-log.entity';
import { fromHalalas } from '../../common/utils/money.util';

const RECENT_LIMIT = 10;

export interface DashboardStats {
    ledger: {
        paymentCount: number;
        totalPayments: number;
        companyCommission: number;
        vatOnCommission: number;
        netToOwners: number;
    };
    counts: {
        owners: number;
        tenants: number;
        projects: number;
        units: number;
        availableUnits: number;
        rentedUnits: number;
        soldUnits: number;
        activeContracts: number;
    };
    recentPayments: PaymentView[];
    recentActivity: AuditLog[];
}

@Injectable()
export class DashboardService {
    constructor(
        @InjectRepository(Owner)
        private owners: Repository<Owner>,
        @InjectRepository(Tenant)
        private tenants: Repository<Tenant>,
        @InjectRepository(Project)
        private projects: Repository<Project>,
        @InjectRepository(Unit)
        private units: Repository<Unit>,
        @InjectRepository(Contract)
        private contracts: Repository<Contract>,
        private balancesService: BalancesService,
        private paymentsService: PaymentsService,
        private activityService: ActivityService,
    ) { }

    async getStats(): Promise<DashboardStats> {
        const [
            totals,
            owners,
            tenants,
            projects,
            units,
            availableUnits,
            rentedUnits,
            soldUnits,
            activeContracts,
            recentPayments,
            recentActivity,
        ] = await Promise.all([
            this.balancesService.totals(),
            this.owners.count(),
            this.tenants.count(),
            this.projects.count(),
            this.units.count(),
            this.units.count({ where: { status: UnitStatus.AVAILABLE } }),
            this.units.count({ where: { status: UnitStatus.RENTED } }),
            this.units.count({ where: { status: UnitStatus.SOLD } }),
            this.contracts.count({ where: { status: ContractStatus.ACTIVE } }),
            this.paymentsService.recent(RECENT_LIMIT),
            this.activityService.recent(RECENT_LIMIT),
        ]);

        return {
            ledger: {
                paymentCount: totals.paymentCount,
                totalPayments: fromHalalas(totals.paid),
                companyCommission: fromHalalas(totals.companyCommission),
                vatOnCommission: fromHalalas(totals.vatOnCommission),
                netToOwners: fromHalalas(totals.netToOwner),
            },
            counts: { owners, tenants, projects, units, availableUnits, rentedUnits, soldUnits, activeContracts },
            recentPayments,
            recentActivity,
        };
    }
}
