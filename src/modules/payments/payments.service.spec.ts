import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { PaymentsModule } from './payments.module';
import { PaymentsService } from './payments.service';
import { BalancesService } from './balances.service';
import { Payment } from './entities/payment.entity';
import { Commission } from './entities/commission.entity';
import { PayerType } from './payer-type.enum';
import { Contract } from '../contracts/entities/contract.entity';
import { ContractStatus } from '../contracts/contract.enums';
import { AuditLog } from '../activity/entities/audit-log.entity';
import { testDatabaseImports } from '../../../test/utils/test-database';
import { TEST_ACTOR, createLease } from '../../../test/utils/fixtures';

describe('PaymentsService', () => {
    let moduleRef: TestingModule;
    let dataSource: DataSource;
    let service: PaymentsService;
    let balances: BalancesService;

    beforeEach(async () => {
        moduleRef = await Test.createTestingModule({
            imports: [...testDatabaseImports(), PaymentsModule],
        }).compile();

        dataSource = moduleRef.get(DataSource);
        service = moduleRef.get(PaymentsService);
        balances = moduleRef.get(BalancesService);
    });

    afterEach(async () => {
        await moduleRef.close();
    });

    describe('record', () => {
        it('stores the payment with its commission and an audit entry', async () => {
            const lease = await createLease(dataSource);

            const view = await service.record({ contractId: lease.contract.id, amount: 1500.5, paidOn: '2024-02-01' }, TEST_ACTOR);

            expect(view).toMatchObject({
                contractId: lease.contract.id,
                unitId: lease.unit.id,
                payerType: PayerType.TENANT,
                payerId: lease.tenant.id,
                amount: 1500.5,
                paidOn: '2024-02-01',
                companyRate: 5,
                vatRate: 15,
                companyCommission: 75.03,
                vatOnCommission: 11.25,
                netToOwner: 1414.22,
                recordedBy: 'tester',
            });

            const commission = await dataSource.getRepository(Commission).findOneByOrFail({ paymentId: view.id });
            expect(commission.companyCommission + commission.vatOnCommission + commission.netToOwner).toBe(150050);

            const audit = await dataSource.getRepository(AuditLog).findBy({ entityType: 'payment', entityId: view.id });
            expect(audit).toHaveLength(1);
            expect(audit[0].username).toBe('tester');
        });

        it('uses the rates given on the payment', async () => {
            const lease = await createLease(dataSource);

            const view = await service.record({
                contractId: lease.contract.id,
                amount: 1000,
                paidOn: '2024-02-01',
                companyRate: 2.5,
                vatRate: 0,
            }, TEST_ACTOR);

            expect(view.companyCommission).toBe(25);
            expect(view.vatOnCommission).toBe(0);
            expect(view.netToOwner).toBe(975);
        });

        it('rejects an overpayment without writing anything', async () => {
            const lease = await createLease(dataSource, { totalAmount: 1000000 });
            await service.record({ contractId: lease.contract.id, amount: 9000, paidOn: '2024-02-01' }, TEST_ACTOR);

            await expect(
                service.record({ contractId: lease.contract.id, amount: 1000.01, paidOn: '2024-03-01' }, TEST_ACTOR),
            ).rejects.toBeInstanceOf(ConflictException);

            expect(await dataSource.getRepository(Payment).count()).toBe(1);
            expect(await dataSource.getRepository(Commission).count()).toBe(1);
            expect(await dataSource.getRepository(AuditLog).countBy({ entityType: 'payment' })).toBe(1);
        });

        it('accepts a payment that settles the contract exactly', async () => {
            const lease = await createLease(dataSource, { totalAmount: 1000000 });
            await service.record({ contractId: lease.contract.id, amount: 9000, paidOn: '2024-02-01' }, TEST_ACTOR);
            await service.record({ contractId: lease.contract.id, amount: 1000, paidOn: '2024-03-01' }, TEST_ACTOR);

            const balance = await balances.forContract(lease.contract.id);
            expect(balance.outstanding).toBe(0);
        });

        it('refuses payments on contracts that are not active', async () => {
            const lease = await createLease(dataSource);
            await dataSource.getRepository(Contract).update({ id: lease.contract.id }, { status: ContractStatus.ENDED });

            await expect(
                service.record({ contractId: lease.contract.id, amount: 100, paidOn: '2024-02-01' }, TEST_ACTOR),
            ).rejects.toBeInstanceOf(ConflictException);
        });

        it('rejects an unknown contract', async () => {
            await expect(
                service.record({ contractId: '00000000-0000-4000-8000-000000000000', amount: 100 }, TEST_ACTOR),
            ).rejects.toBeInstanceOf(NotFoundException);
        });

        it('takes owner payments from the unit owner', async () => {
            const lease = await createLease(dataSource);

            const view = await service.record({
                contractId: lease.contract.id,
                amount: 200,
                paidOn: '2024-02-01',
                payerType: PayerType.OWNER,
            }, TEST_ACTOR);

            expect(view.payerType).toBe(PayerType.OWNER);
            expect(view.payerId).toBe(lease.owner.id);
        });

        it('rejects a payer that does not belong to the contract', async () => {
            const lease = await createLease(dataSource);
            const other = await createLease(dataSource);

            await expect(service.record({
                contractId: lease.contract.id,
                amount: 100,
                payerType: PayerType.TENANT,
                payerId: other.tenant.id,
            }, TEST_ACTOR)).rejects.toBeInstanceOf(BadRequestException);
        });

        it('rejects owner payments on a unit without an owner', async () => {
            const lease = await createLease(dataSource, { withOwner: false });

            await expect(service.record({
                contractId: lease.contract.id,
                amount: 100,
                payerType: PayerType.OWNER,
            }, TEST_ACTOR)).rejects.toBeInstanceOf(BadRequestException);
        });
    });

    describe('recomputeCommission', () => {
        it('yields the same record however often it runs', async () => {
            const lease = await createLease(dataSource);
            const view = await service.record({ contractId: lease.contract.id, amount: 3333.33, paidOn: '2024-02-01' }, TEST_ACTOR);

            const first = await service.recomputeCommission(view.id);
            const second = await service.recomputeCommission(view.id);

            const values = (c: Commission) => [c.id, c.companyCommission, c.vatOnCommission, c.netToOwner, c.companyRateBp, c.vatRateBp];
            expect(values(second)).toEqual(values(first));
            expect(values(first)).toEqual([first.id, 16667, 2500, 314166, 500, 1500]);
            expect(await dataSource.getRepository(Commission).countBy({ paymentId: view.id })).toBe(1);
        });

        it('recreates a missing commission', async () => {
            const lease = await createLease(dataSource);
            const view = await service.record({ contractId: lease.contract.id, amount: 1000, paidOn: '2024-02-01' }, TEST_ACTOR);
            await dataSource.getRepository(Commission).delete({ paymentId: view.id });

            const commission = await service.recomputeCommission(view.id);

            expect(commission.companyCommission).toBe(5000);
            expect(commission.vatOnCommission).toBe(750);
            expect(commission.netToOwner).toBe(94250);
        });
    });

    describe('update', () => {
        it('re-derives the commission and ignores the edited payment in the overpayment check', async () => {
            const lease = await createLease(dataSource, { totalAmount: 1000000 });
            const view = await service.record({ contractId: lease.contract.id, amount: 9000, paidOn: '2024-02-01' }, TEST_ACTOR);

            const updated = await service.update(view.id, { amount: 10000, description: 'Full year' }, TEST_ACTOR);

            expect(updated.amount).toBe(10000);
            expect(updated.description).toBe('Full year');
            expect(updated.companyCommission).toBe(500);
            expect(updated.vatOnCommission).toBe(75);
            expect(updated.netToOwner).toBe(9425);
        });

        it('rejects an edit that would overpay', async () => {
            const lease = await createLease(dataSource, { totalAmount: 1000000 });
            await service.record({ contractId: lease.contract.id, amount: 5000, paidOn: '2024-02-01' }, TEST_ACTOR);
            const second = await service.record({ contractId: lease.contract.id, amount: 1000, paidOn: '2024-03-01' }, TEST_ACTOR);

            await expect(service.update(second.id, { amount: 5000.01 }, TEST_ACTOR)).rejects.toBeInstanceOf(ConflictException);

            const reloaded = await service.findOne(second.id);
            expect(reloaded.amount).toBe(1000);
        });
    });

    describe('findAll', () => {
        it('finds payments by amount as well as description', async () => {
            const lease = await createLease(dataSource, { totalAmount: 1000000 });
            const rent = await service.record({ contractId: lease.contract.id, amount: 1500.5, paidOn: '2024-02-01', description: 'February rent' }, TEST_ACTOR);
            await service.record({ contractId: lease.contract.id, amount: 700, paidOn: '2024-03-01', description: 'Parking' }, TEST_ACTOR);

            const byAmount = await service.findAll({ search: '1,500.50' });
            expect(byAmount.items.map(payment => payment.id)).toEqual([rent.id]);

            const byText = await service.findAll({ search: 'parking' });
            expect(byText.items.map(payment => payment.amount)).toEqual([700]);
        });
    });

    describe('remove', () => {
        it('deletes the payment together with its commission', async () => {
            const lease = await createLease(dataSource);
            const view = await service.record({ contractId: lease.contract.id, amount: 100, paidOn: '2024-02-01' }, TEST_ACTOR);

            await service.remove(view.id, TEST_ACTOR);

            expect(await dataSource.getRepository(Payment).count()).toBe(0);
            expect(await dataSource.getRepository(Commission).count()).toBe(0);
        });
    });

    describe('balances', () => {
        it('rolls payments up per contract, unit and owner', async () => {
            const lease = await createLease(dataSource, { totalAmount: 1000000 });
            await service.record({ contractId: lease.contract.id, amount: 1000, paidOn: '2024-02-01' }, TEST_ACTOR);
            await service.record({ contractId: lease.contract.id, amount: 500, paidOn: '2024-03-01' }, TEST_ACTOR);

            const expected = {
                obligation: 1000000,
                paid: 150000,
                outstanding: 850000,
                companyCommission: 7500,
                vatOnCommission: 1125,
                netToOwner: 141375,
                paymentCount: 2,
            };
            expect(await balances.forContract(lease.contract.id)).toEqual(expected);
            expect(await balances.forUnit(lease.unit.id)).toEqual(expected);
            expect(await balances.forOwner(lease.owner.id)).toEqual(expected);
        });

        it('lists installments against what was paid', async () => {
            const lease = await createLease(dataSource, { totalAmount: 1000000 });
            await service.record({ contractId: lease.contract.id, amount: 3000, paidOn: '2024-02-01' }, TEST_ACTOR);

            const schedule = await balances.schedule(lease.contract.id, '2024-05-01');

            expect(schedule.installments.map(i => i.status)).toEqual(['paid', 'overdue', 'due', 'due']);
            expect(schedule.installments[1].paid).toBe(50000);
        });

        it('counts only the payments of the unit asked for', async () => {
            const lease = await createLease(dataSource);
            const other = await createLease(dataSource);
            await service.record({ contractId: other.contract.id, amount: 100, paidOn: '2024-02-01' }, TEST_ACTOR);

            expect(await balances.forUnit(lease.unit.id)).toMatchObject({ obligation: 1000000, paid: 0, paymentCount: 0 });
        });
    });
});
