import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from '../../src/modules/users/entities/user.entity';
import { LoginAttempt } from '../../src/modules/auth/entities/login-attempt.entity';
import { AuditLog } from '../../src/modules/activity/entities/audit-log.entity';
import { Owner } from '../../src/modules/owners/entities/owner.entity';
import { Tenant } from '../../src/modules/tenants/entities/tenant.entity';
import { Project } from '../../src/modules/projects/entities/project.entity';
import { Unit } from '../../src/modules/units/entities/unit.entity';
import { Contract } from '../../src/modules/contracts/entities/contract.entity';
import { Payment } from '../../src/modules/payments/entities/payment.entity';
import { Commission } from '../../src/modules/payments/entities/commission.entity';

export const ALL_ENTITIES = [User, LoginAttempt, AuditLog, Owner, Tenant, Project, Unit, Contract, Payment, Commission];

/**
 * Global config plus a fresh in-memory SQLite database for one testing module.
 */
export function testDatabaseImports(config: Record<string, unknown> = {}) {
    return [
        ConfigModule.forRoot({
            isGlobal: true,
            ignoreEnvFile: true,
            load: [() => ({
                nodeEnv: 'test',
                secretKey: 'test-secret-key-0123',
                csrfSecretKey: 'test-csrf-secret-0123',
                ledger: { defaultCompanyRateBp: 500, defaultVatRateBp: 1500 },
                uploads: { dir: 'uploads-test', maxFileSizeBytes: 16 * 1024 * 1024 },
                aws: {},
                ...config,
            })],
        }),
        TypeOrmModule.forRoot({
            type: 'better-sqlite3',
            database: ':memory:',
            entities: ALL_ENTITIES,
            synchronize: true,
        }),
    ];
}
