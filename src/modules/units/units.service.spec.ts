import { ConflictException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { UnitsModule } from './units.module';
import { UnitsService } from './units.service';
import { UnitStatus } from './unit-status.enum';
import { Project } from '../projects/entities/project.entity';
import { testDatabaseImports } from '../../../test/utils/test-database';
import { TEST_ACTOR, createLease } from '../../../test/utils/fixtures';

describe('UnitsService', () => {
    let moduleRef: TestingModule;
    let dataSource: DataSource;
    let service: UnitsService;

    beforeEach(async () => {
        moduleRef = await Test.createTestingModule({
            imports: [...testDatabaseImports(), UnitsModule],
        }).compile();

        dataSource = moduleRef.get(DataSource);
        service = moduleRef.get(UnitsService);
    });

    afterEach(async () => {
        await moduleRef.close();
    });

    it('creates a unit in an existing project', async () => {
        const project = await dataSource.getRepository(Project).save({ name: 'Creek View' });

        const unit = await service.create({ projectId: project.id, unitNumber: '101', type: 'apartment', area: 120.5 }, TEST_ACTOR);

        expect(unit).toMatchObject({ unitNumber: '101', type: 'apartment', area: 120.5, status: UnitStatus.AVAILABLE, ownerId: null });
        await expect(service.create({ projectId: project.id, unitNumber: '101' }, TEST_ACTOR))
            .rejects.toBeInstanceOf(ConflictException);
    });

    it('rejects an unknown project', async () => {
        await expect(service.create({ projectId: '00000000-0000-4000-8000-000000000000', unitNumber: '1' }, TEST_ACTOR))
            .rejects.toBeInstanceOf(NotFoundException);
    });

    it('describes the unit with its active lease', async () => {
        const lease = await createLease(dataSource, { startDate: '2024-03-11', endDate: '2025-03-10', totalAmount: 2400000 });

        const details = await service.details(lease.unit.id);

        expect(details).toMatchObject({
            unitNumber: lease.unit.unitNumber,
            projectName: lease.project.name,
            owner: { id: lease.owner.id, name: lease.owner.name },
            isRented: true,
            activeContract: {
                id: lease.contract.id,
                tenant: { id: lease.tenant.id, name: lease.tenant.name, phone: null },
                startDate: '2024-03-11',
                startDateHijri: '1445-09-01',
                totalAmount: 24000,
            },
        });
    });

    it('keeps a leased unit rented', async () => {
        const lease = await createLease(dataSource);

        await expect(service.update(lease.unit.id, { status: UnitStatus.AVAILABLE }, TEST_ACTOR))
            .rejects.toBeInstanceOf(ConflictException);
        const updated = await service.update(lease.unit.id, { area: 80 }, TEST_ACTOR);
        expect(updated.status).toBe(UnitStatus.RENTED);
    });

    it('does not delete a unit with contracts', async () => {
        const lease = await createLease(dataSource);
        await expect(service.remove(lease.unit.id, TEST_ACTOR)).rejects.toBeInstanceOf(ConflictException);
    });
});
