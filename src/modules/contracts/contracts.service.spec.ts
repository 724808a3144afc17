import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { existsSync, mkdtempSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ContractsModule } from './contracts.module';
import { ContractsService } from './contracts.service';
import { Contract } from './entities/contract.entity';
import { ContractStatus, PaymentFrequency } from './contract.enums';
import { Unit } from '../units/entities/unit.entity';
import { UnitStatus } from '../units/unit-status.enum';
import { Tenant } from '../tenants/entities/tenant.entity';
import { Project } from '../projects/entities/project.entity';
import { Payment } from '../payments/entities/payment.entity';
import { PaymentsModule } from '../payments/payments.module';
import { PaymentsService } from '../payments/payments.service';
import { AuditLog } from '../activity/entities/audit-log.entity';
import { testDatabaseImports } from '../../../test/utils/test-database';
import { TEST_ACTOR, createLease } from '../../../test/utils/fixtures';

describe('ContractsService', () => {
    let moduleRef: TestingModule;
    let dataSource: DataSource;
    let service: ContractsService;
    let payments: PaymentsService;
    let uploadDir: string;

    beforeEach(async () => {
        uploadDir = mkdtempSync(join(tmpdir(), 'contracts-'));
        moduleRef = await Test.createTestingModule({
            imports: [
                ...testDatabaseImports({ uploads: { dir: uploadDir, maxFileSizeBytes: 16 * 1024 * 1024 } }),
                ContractsModule,
                PaymentsModule,
            ],
        }).compile();

        dataSource = moduleRef.get(DataSource);
        service = moduleRef.get(ContractsService);
        payments = moduleRef.get(PaymentsService);
    });

    afterEach(async () => {
        await moduleRef.close();
        rmSync(uploadDir, { recursive: true, force: true });
    });

    async function vacantUnit() {
        const project = await dataSource.getRepository(Project).save({ name: `Vacant ${Date.now()}-${Math.random()}` });
        const unit = await dataSource.getRepository(Unit).save({ projectId: project.id, unitNumber: 'V-1' });
        const tenant = await dataSource.getRepository(Tenant).save({ name: 'New Tenant' });
        return { unit, tenant };
    }

    describe('create', () => {
        it('leases the unit and returns both calendars', async () => {
            const { unit, tenant } = await vacantUnit();

            const view = await service.create({
                unitId: unit.id,
                tenantId: tenant.id,
                contractNumber: 'C-100',
                startDate: '2024-03-11',
                endDate: '2025-03-10',
                totalAmount: 24000,
                paymentFrequency: PaymentFrequency.MONTHLY,
            }, TEST_ACTOR);

            expect(view).toMatchObject({
                contractNumber: 'C-100',
                unitNumber: 'V-1',
                tenantName: 'New Tenant',
                startDate: '2024-03-11',
                startDateHijri: '1445-09-01',
                totalAmount: 24000,
                status: ContractStatus.ACTIVE,
                document: null,
            });
            const stored = await dataSource.getRepository(Contract).findOneByOrFail({ id: view.id });
            expect(stored.totalAmount).toBe(2400000);
            expect((await dataSource.getRepository(Unit).findOneByOrFail({ id: unit.id })).status).toBe(UnitStatus.RENTED);
        });

        it('accepts Hijri dates', async () => {
            const { unit, tenant } = await vacantUnit();

            const view = await service.create({
                unitId: unit.id,
                tenantId: tenant.id,
                startDateHijri: '1446-01-01',
                endDateHijri: '1446-12-01',
                totalAmount: 1000,
            }, TEST_ACTOR);

            expect(view.startDate).toBe('2024-07-07');
            expect(view.startDateHijri).toBe('1446-01-01');
            expect(view.endDateHijri).toBe('1446-12-01');
        });

        it('allows only one active contract per unit', async () => {
            const lease = await createLease(dataSource);

            await expect(service.create({
                unitId: lease.unit.id,
                tenantId: lease.tenant.id,
                startDate: '2024-06-01',
                endDate: '2025-05-31',
                totalAmount: 1000,
            }, TEST_ACTOR)).rejects.toBeInstanceOf(ConflictException);

            expect(await dataSource.getRepository(Contract).countBy({ unitId: lease.unit.id })).toBe(1);
        });

        it('leases the unit again once the previous contract is terminated', async () => {
            const lease = await createLease(dataSource);
            await service.terminate(lease.contract.id, TEST_ACTOR);

            const view = await service.create({
                unitId: lease.unit.id,
                tenantId: lease.tenant.id,
                startDate: '2025-01-01',
                endDate: '2025-12-31',
                totalAmount: 1000,
            }, TEST_ACTOR);

            expect(view.status).toBe(ContractStatus.ACTIVE);
            expect(await dataSource.getRepository(Contract).countBy({ unitId: lease.unit.id, status: ContractStatus.ACTIVE })).toBe(1);
        });

        it('rejects an end date before the start date', async () => {
            const { unit, tenant } = await vacantUnit();

            await expect(service.create({
                unitId: unit.id,
                tenantId: tenant.id,
                startDate: '2024-05-01',
                endDate: '2024-04-01',
                totalAmount: 1000,
            }, TEST_ACTOR)).rejects.toBeInstanceOf(BadRequestException);
        });

        it('refuses to lease a sold unit', async () => {
            const { unit, tenant } = await vacantUnit();
            await dataSource.getRepository(Unit).update({ id: unit.id }, { status: UnitStatus.SOLD });

            await expect(service.create({
                unitId: unit.id,
                tenantId: tenant.id,
                startDate: '2024-01-01',
                endDate: '2024-12-31',
                totalAmount: 1000,
            }, TEST_ACTOR)).rejects.toBeInstanceOf(ConflictException);
        });
    });

    describe('closing', () => {
        it('frees the unit when a contract is terminated', async () => {
            const lease = await createLease(dataSource);

            const view = await service.terminate(lease.contract.id, TEST_ACTOR);

            expect(view.status).toBe(ContractStatus.TERMINATED);
            expect((await dataSource.getRepository(Unit).findOneByOrFail({ id: lease.unit.id })).status).toBe(UnitStatus.AVAILABLE);
        });

        it('leaves a sold unit sold', async () => {
            const lease = await createLease(dataSource);
            await dataSource.getRepository(Unit).update({ id: lease.unit.id }, { status: UnitStatus.SOLD });

            await service.end(lease.contract.id, TEST_ACTOR);

            expect((await dataSource.getRepository(Unit).findOneByOrFail({ id: lease.unit.id })).status).toBe(UnitStatus.SOLD);
        });

        it('cannot close a contract twice', async () => {
            const lease = await createLease(dataSource);
            await service.end(lease.contract.id, TEST_ACTOR);

            await expect(service.terminate(lease.contract.id, TEST_ACTOR)).rejects.toBeInstanceOf(ConflictException);
        });

        it('ends contracts whose end date has passed', async () => {
            const expired = await createLease(dataSource, { endDate: '2024-12-31' });
            const running = await createLease(dataSource, { endDate: '2025-06-30' });

            expect(await service.expireEnded('2025-01-01', TEST_ACTOR)).toBe(1);
            expect(await service.expireEnded('2025-01-01', TEST_ACTOR)).toBe(0);

            const contracts = dataSource.getRepository(Contract);
            expect((await contracts.findOneByOrFail({ id: expired.contract.id })).status).toBe(ContractStatus.ENDED);
            expect((await contracts.findOneByOrFail({ id: running.contract.id })).status).toBe(ContractStatus.ACTIVE);
            expect((await dataSource.getRepository(Unit).findOneByOrFail({ id: expired.unit.id })).status).toBe(UnitStatus.AVAILABLE);
        });

        it('closes a contract once when expiry and termination overlap', async () => {
            const lease = await createLease(dataSource, { endDate: '2024-12-31' });

            const [expiry, termination] = await Promise.allSettled([
                service.expireEnded('2025-06-01', TEST_ACTOR),
                service.terminate(lease.contract.id, TEST_ACTOR),
            ]);

            const expiredCount = expiry.status === 'fulfilled' ? expiry.value : 0;
            const terminated = termination.status === 'fulfilled' ? 1 : 0;
            expect(expiredCount + terminated).toBe(1);
            if (termination.status === 'rejected') {
                expect(termination.reason).toBeInstanceOf(ConflictException);
            }

            const audit = await dataSource.getRepository(AuditLog).findBy({ entityType: 'contract', entityId: lease.contract.id });
            expect(audit).toHaveLength(1);
            expect((await dataSource.getRepository(Unit).findOneByOrFail({ id: lease.unit.id })).status).toBe(UnitStatus.AVAILABLE);
        });
    });

    describe('update', () => {
        it('keeps the total above what has been paid', async () => {
            const lease = await createLease(dataSource, { totalAmount: 1000000 });
            await dataSource.getRepository(Payment).save({
                contractId: lease.contract.id,
                unitId: lease.unit.id,
                amount: 600000,
                paidOn: '2024-02-01',
                companyRateBp: 500,
                vatRateBp: 1500,
            });

            await expect(service.update(lease.contract.id, { totalAmount: 5999.99 }, TEST_ACTOR))
                .rejects.toBeInstanceOf(ConflictException);

            const view = await service.update(lease.contract.id, { totalAmount: 6000, notes: 'Reduced' }, TEST_ACTOR);
            expect(view.totalAmount).toBe(6000);
            expect(view.notes).toBe('Reduced');
        });

        it('never lowers the total below a payment recorded at the same time', async () => {
            const lease = await createLease(dataSource, { totalAmount: 1000000 });

            const results = await Promise.allSettled([
                payments.record({ contractId: lease.contract.id, amount: 8000, paidOn: '2024-02-01' }, TEST_ACTOR),
                service.update(lease.contract.id, { totalAmount: 5000 }, TEST_ACTOR),
            ]);

            expect(results.map(result => result.status).sort()).toEqual(['fulfilled', 'rejected']);
            for (const result of results) {
                if (result.status === 'rejected') {
                    expect(result.reason).toBeInstanceOf(ConflictException);
                }
            }

            const contract = await dataSource.getRepository(Contract).findOneByOrFail({ id: lease.contract.id });
            const recorded = await dataSource.getRepository(Payment).findBy({ contractId: lease.contract.id });
            const paid = recorded.reduce((sum, payment) => sum + payment.amount, 0);
            expect(paid).toBeLessThanOrEqual(contract.totalAmount);
        });
    });

    describe('remove', () => {
        it('refuses while payments exist', async () => {
            const lease = await createLease(dataSource);
            await dataSource.getRepository(Payment).save({
                contractId: lease.contract.id,
                unitId: lease.unit.id,
                amount: 100,
                paidOn: '2024-02-01',
                companyRateBp: 500,
                vatRateBp: 1500,
            });

            await expect(service.remove(lease.contract.id, TEST_ACTOR)).rejects.toBeInstanceOf(ConflictException);
        });

        it('deletes the contract, its document and frees the unit', async () => {
            const lease = await createLease(dataSource);
            await service.attachDocument(lease.contract.id, {
                originalname: 'lease.pdf',
                mimetype: 'application/pdf',
                size: 4,
                buffer: Buffer.from('%PDF'),
            }, TEST_ACTOR);

            await service.remove(lease.contract.id, TEST_ACTOR);

            await expect(service.findOne(lease.contract.id)).rejects.toBeInstanceOf(NotFoundException);
            expect(readdirSync(uploadDir)).toEqual([]);
            expect((await dataSource.getRepository(Unit).findOneByOrFail({ id: lease.unit.id })).status).toBe(UnitStatus.AVAILABLE);
        });
    });

    describe('documents', () => {
        it('returns the uploaded bytes unchanged', async () => {
            const lease = await createLease(dataSource);
            const content = Buffer.from([0x25, 0x50, 0x44, 0x46, 0x00, 0xff, 0x10, 0x80]);

            const view = await service.attachDocument(lease.contract.id, {
                originalname: 'signed lease.pdf',
                mimetype: 'application/pdf',
                size: content.length,
                buffer: content,
            }, TEST_ACTOR);
            expect(view.document).toEqual({ name: 'signed lease.pdf', mimeType: 'application/pdf', size: 8 });

            const document = await service.readDocument(lease.contract.id);
            expect(document.content.equals(content)).toBe(true);
            expect(document.mimeType).toBe('application/pdf');
            expect(document.inline).toBe(true);

            const stored = await dataSource.getRepository(Contract).findOneByOrFail({ id: lease.contract.id });
            expect(stored.documentKey).toMatch(/^\d+_[0-9a-f-]{36}_signed_lease\.pdf$/);
        });

        it('replaces the previous document', async () => {
            const lease = await createLease(dataSource);
            await service.attachDocument(lease.contract.id, {
                originalname: 'draft.docx',
                mimetype: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
                size: 5,
                buffer: Buffer.from('draft'),
            }, TEST_ACTOR);
            const first = await dataSource.getRepository(Contract).findOneByOrFail({ id: lease.contract.id });

            await service.attachDocument(lease.contract.id, {
                originalname: 'final.docx',
                mimetype: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
                size: 5,
                buffer: Buffer.from('final'),
            }, TEST_ACTOR);

            const document = await service.readDocument(lease.contract.id);
            expect(document.content.toString()).toBe('final');
            expect(document.inline).toBe(false);
            expect(existsSync(join(uploadDir, first.documentKey ?? ''))).toBe(false);
            expect(readdirSync(uploadDir)).toHaveLength(1);
        });

        it('rejects an empty upload', async () => {
            const lease = await createLease(dataSource);
            await expect(service.attachDocument(lease.contract.id, undefined, TEST_ACTOR))
                .rejects.toBeInstanceOf(BadRequestException);
        });

        it('keeps same-named documents of different contracts apart', async () => {
            const first = await createLease(dataSource);
            const second = await createLease(dataSource);
            const upload = (text: string) => ({
                originalname: 'lease.pdf',
                mimetype: 'application/pdf',
                size: text.length,
                buffer: Buffer.from(text),
            });

            await service.attachDocument(first.contract.id, upload('contract A'), TEST_ACTOR);
            await service.attachDocument(second.contract.id, upload('contract B'), TEST_ACTOR);

            expect((await service.readDocument(first.contract.id)).content.toString()).toBe('contract A');
            expect((await service.readDocument(second.contract.id)).content.toString()).toBe('contract B');

            await service.removeDocument(second.contract.id, TEST_ACTOR);
            expect((await service.readDocument(first.contract.id)).content.toString()).toBe('contract A');
        });

        it('reports a missing document', async () => {
            const lease = await createLease(dataSource);
            await expect(service.readDocument(lease.contract.id)).rejects.toBeInstanceOf(NotFoundException);
        });
    });
});
