import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from '../src/app.module';
import { UsersService } from '../src/modules/users/users.service';
import { OwnersService } from '../src/modules/owners/owners.service';
import { TenantsService } from '../src/modules/tenants/tenants.service';
import { ProjectsService } from '../src/modules/projects/projects.service';
import { UnitsService } from '../src/modules/units/units.service';
import { ContractsService } from '../src/modules/contracts/contracts.service';
import { PaymentsService } from '../src/modules/payments/payments.service';
import { PaymentFrequency } from '../src/modules/contracts/contract.enums';
import { PayerType } from '../src/modules/payments/payer-type.enum';
import { Role } from '../src/modules/users/role.enum';
import { SYSTEM_ACTOR } from '../src/modules/activity/actor';
import seedData from './seed-data.json';

const logger = new Logger('Seed');

function lookup(ids: Map<string, string>, key: string, kind: string): string {
    const id = ids.get(key);
    if (!id) throw new Error(`Seed data references unknown ${kind} "${key}"`);
    return id;
}

function isFrequency(value: string): value is PaymentFrequency {
    return Object.values(PaymentFrequency).some(f => f === value);
}

async function main() {
    const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn', 'log'] });

    try {
        const users = app.get(UsersService);
        if (!(await users.findForLogin('admin'))) {
            const password = process.env.SEED_ADMIN_PASSWORD ?? 'admin1234';
            await users.create({ username: 'admin', fullName: 'Administrator', password, role: Role.ADMIN }, SYSTEM_ACTOR);
            logger.warn('Created user "admin"; change its password after the first login');
        }

        const owners = app.get(OwnersService);
        const tenants = app.get(TenantsService);
        const projects = app.get(ProjectsService);
        const units = app.get(UnitsService);
        const contracts = app.get(ContractsService);
        const payments = app.get(PaymentsService);

        const existing = await projects.findAll({ perPage: 1 });
        if (existing.total > 0) {
            logger.log('Database already has projects; skipping sample data');
            return;
        }

        const ids = new Map<string, string>();
        for (const { key, ...owner } of seedData.owners) {
            ids.set(key, (await owners.create(owner, SYSTEM_ACTOR)).id);
        }
        for (const { key, ...tenant } of seedData.tenants) {
            ids.set(key, (await tenants.create(tenant, SYSTEM_ACTOR)).id);
        }
        for (const { key, ...project } of seedData.projects) {
            ids.set(key, (await projects.create(project, SYSTEM_ACTOR)).id);
        }
        for (const unit of seedData.units) {
            const created = await units.create({
                projectId: lookup(ids, unit.project, 'project'),
                unitNumber: unit.unitNumber,
                type: unit.type,
                area: unit.area,
                ownerId: unit.owner ? lookup(ids, unit.owner, 'owner') : undefined,
            }, SYSTEM_ACTOR);
            ids.set(unit.key, created.id);
        }
        for (const contract of seedData.contracts) {
            if (!isFrequency(contract.paymentFrequency)) {
                throw new Error(`Unknown payment frequency "${contract.paymentFrequency}"`);
            }
            const created = await contracts.create({
                unitId: lookup(ids, contract.unit, 'unit'),
                tenantId: lookup(ids, contract.tenant, 'tenant'),
                contractNumber: contract.contractNumber,
                startDate: contract.startDate,
                endDate: contract.endDate,
                startDateHijri: contract.startDateHijri,
                endDateHijri: contract.endDateHijri,
                totalAmount: contract.totalAmount,
                paymentFrequency: contract.paymentFrequency,
            }, SYSTEM_ACTOR);
            ids.set(contract.key, created.id);
        }
        for (const payment of seedData.payments) {
            await payments.record({
                contractId: lookup(ids, payment.contract, 'contract'),
                amount: payment.amount,
                paidOn: payment.paidOn,
                description: payment.description,
                payerType: payment.payerType === 'owner' ? PayerType.OWNER : PayerType.TENANT,
                companyRate: payment.companyRate,
            }, SYSTEM_ACTOR);
        }

        logger.log(`Seeded ${seedData.units.length} units, ${seedData.contracts.length} contracts and ${seedData.payments.length} payments`);
    } finally {
        await app.close();
    }
}

main().catch((error: unknown) => {
    logger.error('Seeding failed', error instanceof Error ? error.stack : String(error));
    process.exit(1);
});
