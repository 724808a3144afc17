import { DataSource } from 'typeorm';
import { Owner } from '../../src/modules/owners/entities/owner.entity';
import { Tenant } from '../../src/modules/tenants/entities/tenant.entity';
import { Project } from '../../src/modules/projects/entities/project.entity';
import { Unit } from '../../src/modules/units/entities/unit.entity';
import { UnitStatus } from '../../src/modules/units/unit-status.enum';
import { Contract } from '../../src/modules/contracts/entities/contract.entity';
import { ContractStatus, PaymentFrequency } from '../../src/modules/contracts/contract.enums';
import { Actor } from '../../src/modules/activity/actor';

export const TEST_ACTOR: Actor = { userId: null, username: 'tester', ipAddress: '127.0.0.1' };

export interface Lease {
    owner: Owner;
    tenant: Tenant;
    project: Project;
    unit: Unit;
    contract: Contract;
}

let sequence = 0;

/**
 * Owner, tenant, project and unit with one active contract. Amounts in halalas.
 */
export async function createLease(
    dataSource: DataSource,
    options: { totalAmount?: number; startDate?: string; endDate?: string; withOwner?: boolean; projectName?: string } = {},
): Promise<Lease> {
    sequence += 1;
    const owner = await dataSource.getRepository(Owner).save({ name: `Owner ${sequence}` });
    const tenant = await dataSource.getRepository(Tenant).save({ name: `Tenant ${sequence}` });
    const project = await dataSource.getRepository(Project).save({ name: options.projectName ?? `Project ${sequence}` });
    const unit = await dataSource.getRepository(Unit).save({
        projectId: project.id,
        unitNumber: `U-${sequence}`,
        ownerId: options.withOwner === false ? null : owner.id,
        status: UnitStatus.RENTED,
    });
    const contract = await dataSource.getRepository(Contract).save({
        unitId: unit.id,
        tenantId: tenant.id,
        startDate: options.startDate ?? '2024-01-01',
        endDate: options.endDate ?? '2024-12-31',
        totalAmount: options.totalAmount ?? 1000000,
        paymentFrequency: PaymentFrequency.QUARTERLY,
        status: ContractStatus.ACTIVE,
    });
    return { owner, tenant, project, unit, contract };
}
