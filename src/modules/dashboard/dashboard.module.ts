import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Owner } from '../owners/entities/owner.entity';
import { Tenant } from '../tenants/entities/tenant.entity';
import { Project } from '../projects/entities/project.entity';
import { Unit } from '../units/entities/unit.entity';
import { Contract } from '../contracts/entities/contract.entity';
import { DashboardService } from './dashboard.service';
import { DashboardController } from './dashboard.controller';
import { PaymentsModule } from '../payments/payments.module';
import { ActivityModule } from '../activity/activity.module';

@Module({
    imports: [TypeOrmModule.forFeature([Owner, Tenant, Project, Unit, Contract]), PaymentsModule, ActivityModule],
    controllers: [DashboardController],
    providers: [DashboardService],
})
export class DashboardModule { }
