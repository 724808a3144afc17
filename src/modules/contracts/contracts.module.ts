import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { TypeOrmModule } from '@nestjs/typeorm';
import { memoryStorage } from 'multer';
import { Contract } from './entities/contract.entity';
import { Unit } from '../units/entities/unit.entity';
import { Tenant } from '../tenants/entities/tenant.entity';
import { Payment } from '../payments/entities/payment.entity';
import { ContractsService } from './contracts.service';
import { ContractsController } from './contracts.controller';
import { ActivityModule } from '../activity/activity.module';
import { StorageModule } from '../storage/storage.module';
import { AppConfig } from '../../config/configuration';

@Module({
    imports: [
        TypeOrmModule.forFeature([Contract, Unit, Tenant, Payment]),
        MulterModule.registerAsync({
            inject: [ConfigService],
            useFactory: (configService: ConfigService) => ({
                storage: memoryStorage(),
                limits: { fileSize: configService.get<AppConfig['uploads']>('uploads')?.maxFileSizeBytes },
            }),
        }),
        ActivityModule,
        StorageModule,
    ],
    controllers: [ContractsController],
    providers: [ContractsService],
    exports: [ContractsService],
})
export class ContractsModule { }
