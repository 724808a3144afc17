import { Module, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DataSourceOptions } from 'typeorm';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { AppConfig } from '../config/configuration';

const logger = new Logger('DatabaseModule');

/**
 * PostgreSQL when DATABASE_URL is set, a SQLite file otherwise. Entities are added by the caller.
 */
export function buildDataSourceOptions(database: AppConfig['database'], nodeEnv: string): DataSourceOptions {
    const synchronize = nodeEnv !== 'production' || process.env.DB_SYNCHRONIZE === 'true';

    if (database.url) {
        logger.log('Using PostgreSQL from DATABASE_URL');
        return {
            type: 'postgres',
            url: database.url,
            synchronize,
            ssl: nodeEnv === 'production' ? { rejectUnauthorized: false } : false,
        };
    }

    if (database.sqlitePath !== ':memory:') {
        mkdirSync(dirname(database.sqlitePath), { recursive: true });
    }
    logger.log(`Using SQLite database at ${database.sqlitePath}`);

    return {
        type: 'better-sqlite3',
        database: database.sqlitePath,
        synchronize,
    };
}

export function buildTypeOrmOptions(config: ConfigService): TypeOrmModuleOptions {
    const database = config.get<AppConfig['database']>('database') ?? { sqlitePath: 'data/property.db' };
    const nodeEnv = config.get<string>('nodeEnv') ?? 'development';
    return {
        ...buildDataSourceOptions(database, nodeEnv),
        autoLoadEntities: true,
    };
}

@Module({
    imports: [
        TypeOrmModule.forRootAsync({
            inject: [ConfigService],
            useFactory: buildTypeOrmOptions,
        }),
    ],
})
export class DatabaseModule { }
