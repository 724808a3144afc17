import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { access, mkdir } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import configuration from '../src/config/configuration';
import { validateEnv } from '../src/config/env.validation';
import { buildDataSourceOptions } from '../src/database/database.module';

const logger = new Logger('DeploymentCheck');

interface Check {
    name: string;
    run: () => Promise<string>;
}

async function checkEnvironment(): Promise<string> {
    validateEnv({ ...process.env });
    const config = configuration();
    if (config.nodeEnv === 'production' && !config.database.url) {
        return 'variables valid (warning: production without DATABASE_URL uses a local SQLite file)';
    }
    return 'variables valid';
}

async function checkDatabase(): Promise<string> {
    const config = configuration();
    // Connection only; entities are not needed for SELECT 1
    const dataSource = new DataSource({ ...buildDataSourceOptions(config.database, config.nodeEnv), synchronize: false });
    await dataSource.initialize();
    try {
        await dataSource.query('SELECT 1');
        return `${dataSource.options.type} reachable`;
    } finally {
        await dataSource.destroy();
    }
}

async function checkUploadDirectory(): Promise<string> {
    const config = configuration();
    if (config.aws.bucketName) {
        return `documents go to S3 bucket ${config.aws.bucketName}`;
    }
    const dir = path.resolve(config.uploads.dir);
    await mkdir(dir, { recursive: true });
    await access(dir, constants.W_OK);
    return `${dir} writable`;
}

async function main() {
    const checks: Check[] = [
        { name: 'Environment', run: checkEnvironment },
        { name: 'Database', run: checkDatabase },
        { name: 'Upload directory', run: checkUploadDirectory },
    ];

    let failed = 0;
    for (const check of checks) {
        try {
            logger.log(`${check.name}: ${await check.run()}`);
        } catch (error) {
            failed += 1;
            logger.error(`${check.name}: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    if (failed > 0) {
        logger.error(`${failed} of ${checks.length} checks failed`);
        process.exit(1);
    }
    logger.log('All checks passed');
}

main().catch((error: unknown) => {
    logger.error('Deployment check crashed', error instanceof Error ? error.stack : String(error));
    process.exit(1);
});
