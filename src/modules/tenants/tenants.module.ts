import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Tenant } from './entities/tenant.entity';
import { Contract } from '../contracts/entities/contract.entity';
import { TenantsService } from './tenants.service';
import { TenantsController } from './tenants.controller';
import { ActivityModule } from '../activity/activity.module';

@Module({
    imports: [TypeOrmModule.forFeature([Tenant, Contract]), ActivityModule],
    controllers: [TenantsController],
    providers: [TenantsService],
})
export class TenantsModule { }
