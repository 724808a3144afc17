import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { DashboardModule } from './dashboard.module';
import { DashboardService } from './dashboard.service';
import { PaymentsService } from '../payments/payments.service';
import { Unit } from '../units/entities/unit.entity';
import { UnitStatus } from '../units/unit-status.enum';
import { testDatabaseImports } from '../../../test/utils/test-database';
import { TEST_ACTOR, createLease } from '../../../test/utils/fixtures';

describe('DashboardService', () => {
    let moduleRef: TestingModule;

    beforeEach(async () => {
        moduleRef = await Test.createTestingModule({
            imports: [...testDatabaseImports(), DashboardModule],
        }).compile();
    });

    afterEach(async () => {
        await moduleRef.close();
    });

    it('sums the ledger and counts the portfolio', async () => {
        const dataSource = moduleRef.get(DataSource);
        const payments = moduleRef.get(PaymentsService);
        const lease = await createLease(dataSource);
        await createLease(dataSource);
        await dataSource.getRepository(Unit).save({ projectId: lease.project.id, unitNumber: 'S-1', status: UnitStatus.SOLD });
        await payments.record({ contractId: lease.contract.id, amount: 1000, paidOn: '2024-02-01' }, TEST_ACTOR);

        const stats = await moduleRef.get(DashboardService).getStats();

        expect(stats.ledger).toEqual({
            paymentCount: 1,
            totalPayments: 1000,
            companyCommission: 50,
            vatOnCommission: 7.5,
            netToOwners: 942.5,
        });
        expect(stats.counts).toEqual({
            owners: 2,
            tenants: 2,
            projects: 2,
            units: 3,
            availableUnits: 0,
            rentedUnits: 2,
            soldUnits: 1,
            activeContracts: 2,
        });
        expect(stats.recentPayments.map(payment => payment.amount)).toEqual([1000]);
        expect(stats.recentActivity[0].entityType).toBe('payment');
    });
});
